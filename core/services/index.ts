/**
 * Capa de servicios del núcleo.
 *
 * ServiceManager inicializa SettingsService y DownloadService en ese orden (los ajustes
 * fijan concurrencia y reintentos antes de cargar la cola) y los destruye en orden inverso.
 *
 * @module services
 */

import BaseService from './BaseService';
import DownloadService from './DownloadService';
import SettingsService from './SettingsService';

class ServiceManager {
  private _initialized = false;

  constructor(
    readonly settings: SettingsService,
    readonly downloads: DownloadService
  ) {}

  get initialized(): boolean {
    return this._initialized;
  }

  /** Inicializa los servicios en orden; idempotente. */
  async initialize(): Promise<void> {
    if (this._initialized) return;
    await this.settings.initialize();
    await this.downloads.initialize();
    this._initialized = true;
  }

  async destroy(): Promise<void> {
    if (!this._initialized) return;
    await this.downloads.destroy();
    await this.settings.destroy();
    this._initialized = false;
  }
}

export { BaseService, DownloadService, SettingsService, ServiceManager };
export { createDefaultSettings, mergeSettings } from './SettingsService';
export type { SettingsChangeListener, SettingsServiceOptions } from './SettingsService';
export type {
  DownloadServiceDeps,
  PlaylistSkippedEntry,
  PlaylistSubmitResult,
  VariantResolver,
} from './DownloadService';
export type { ServiceResponse } from './BaseService';
