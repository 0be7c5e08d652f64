/**
 * Ajustes de usuario persistidos en settings.json (secciones video, photo, download, system).
 *
 * Al cargar, el archivo se fusiona por sección sobre los valores por defecto; si no existe,
 * no es JSON o no pasa la validación se usan los valores por defecto. save() fusiona el
 * cambio parcial, valida y escribe de forma atómica (archivo temporal + rename).
 *
 * @module SettingsService
 */

import { promises as fs } from 'fs';
import path from 'path';
import BaseService, { type ServiceResponse } from './BaseService';
import config from '../config';
import { ERRORS } from '../constants/errors';
import {
  userSettingsSchema,
  validate,
  validateSettingsPatch,
  type SettingsPatch,
  type UserSettings,
} from '../utils/schemas';
import type { MediaKind } from '../../shared/types';

export type SettingsChangeListener = (_settings: UserSettings) => void;

export interface SettingsServiceOptions {
  settingsPath?: string;
}

export function createDefaultSettings(): UserSettings {
  return {
    video: { resolution: 'Best Available', count: 5, all: false },
    photo: { quality: 'Best Available' },
    download: {
      extension: 'Best',
      videoPath: '',
      photoPath: '',
      writeMetadata: config.downloads.writeMetadata,
    },
    system: {
      threads: config.downloads.maxConcurrency,
      maxRetries: config.downloads.maxRetries,
    },
  };
}

export function mergeSettings(base: UserSettings, patch: SettingsPatch): UserSettings {
  return {
    video: { ...base.video, ...patch.video },
    photo: { ...base.photo, ...patch.photo },
    download: { ...base.download, ...patch.download },
    system: { ...base.system, ...patch.system },
  };
}

export default class SettingsService extends BaseService {
  private readonly settingsPath: string;
  private settings: UserSettings = createDefaultSettings();
  private readonly listeners = new Set<SettingsChangeListener>();

  constructor(options: SettingsServiceOptions = {}) {
    super('SettingsService');
    this.settingsPath = options.settingsPath ?? config.paths.settingsPath;
  }

  async initialize(): Promise<void> {
    this.settings = await this.load();
    await super.initialize();
  }

  /** Lee settings.json fusionado con los valores por defecto. */
  async load(): Promise<UserSettings> {
    const defaults = createDefaultSettings();
    let raw: string;
    try {
      raw = await fs.readFile(this.settingsPath, 'utf8');
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code !== 'ENOENT') {
        this.log.warn(`${ERRORS.SETTINGS.LOAD_FAILED}: ${err.message}`);
      }
      return defaults;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.log.warn(`${ERRORS.SETTINGS.INVALID} (${this.settingsPath}):`, error);
      return defaults;
    }

    const patch = validateSettingsPatch(json);
    if (!patch.success || !patch.data) {
      this.log.warn(`${ERRORS.SETTINGS.INVALID}: ${patch.error ?? ''}`);
      return defaults;
    }
    return mergeSettings(defaults, patch.data);
  }

  /** Copia de los ajustes actuales. */
  get(): UserSettings {
    return mergeSettings(this.settings, {});
  }

  /** Fusiona el cambio parcial, lo valida y lo guarda. */
  async save(patch: unknown): Promise<ServiceResponse<UserSettings>> {
    const parsedPatch = validateSettingsPatch(patch);
    if (!parsedPatch.success || !parsedPatch.data) {
      return this.invalid(parsedPatch.error, 'save');
    }
    const merged = validate(userSettingsSchema, mergeSettings(this.settings, parsedPatch.data));
    if (!merged.success || !merged.data) {
      return this.invalid(merged.error, 'save');
    }

    try {
      await this.write(merged.data);
    } catch (error) {
      return this.handleError(error, ERRORS.SETTINGS.SAVE_FAILED);
    }
    this.settings = merged.data;
    this.log.info('Ajustes guardados');
    this.notify();
    return this.success(this.get());
  }

  /** Vuelve a los valores por defecto y los guarda. */
  async reset(): Promise<ServiceResponse<UserSettings>> {
    const defaults = createDefaultSettings();
    try {
      await this.write(defaults);
    } catch (error) {
      return this.handleError(error, ERRORS.SETTINGS.SAVE_FAILED);
    }
    this.settings = defaults;
    this.notify();
    return this.success(this.get());
  }

  onChange(listener: SettingsChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Carpeta de descarga para un tipo de medio (videoPath/photoPath o la de config). */
  destinationDirFor(kind: MediaKind): string {
    const { videoPath, photoPath } = this.settings.download;
    const configured = kind === 'photo' ? photoPath : videoPath;
    return configured.trim() || config.paths.defaultDownloadDir;
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.get());
      } catch (error) {
        this.log.error('Error en listener de ajustes:', error);
      }
    }
  }

  private async write(settings: UserSettings): Promise<void> {
    await fs.mkdir(path.dirname(this.settingsPath), { recursive: true });
    const tmpPath = `${this.settingsPath}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(settings, null, 2), 'utf8');
    await fs.rename(tmpPath, this.settingsPath);
  }

  async destroy(): Promise<void> {
    this.listeners.clear();
    await super.destroy();
  }
}
