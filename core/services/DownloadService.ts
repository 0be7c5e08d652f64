/**
 * API de envío, control y lectura del gestor de descargas.
 *
 * submit() valida los parámetros con Zod, crea el job en resolving y lanza la resolución
 * en segundo plano: el resolver devuelve las variantes, se elige una según el selector (o
 * las preferencias de SettingsService) y el job pasa a la cola. Un ResolutionError hace
 * fallar el job sin reintento. Cancelar un job en resolving aborta la resolución.
 *
 * Ningún método lanza: todos devuelven ServiceResponse, salvo subscribe() que devuelve la
 * suscripción al bus de eventos.
 *
 * @module DownloadService
 */

import BaseService, { type ServiceResponse } from './BaseService';
import type SettingsService from './SettingsService';
import config from '../config';
import type DownloadEngine from '../engines/DownloadEngine';
import type { EngineEventListener, Subscription, SubscriptionFilter } from '../engines/EventBus';
import {
  ResolutionError,
  ResolutionErrorKind,
  SchedulerError,
  SchedulerErrorKind,
} from '../engines/errors';
import { isLiveState } from '../engines/JobStateMachine';
import { JobStatus } from '../engines/types';
import { selectVariant, selectorFromPreferences } from '../resolvers/variantSelection';
import type { PlaylistEntry } from '../resolvers/types';
import {
  validateConcurrency,
  validateJobId,
  validatePlaylistParams,
  validatePriority,
  validateSubmitParams,
  type VariantSelector,
} from '../utils/schemas';
import type { JobSnapshot, MediaKind, MediaVariant, QueueSnapshot } from '../../shared/types';

/** Lo que el servicio necesita del Resolver Adapter (ResolverRegistry lo cumple). */
export interface VariantResolver {
  canHandle(_url: string): boolean;
  resolve(_url: string, _signal?: AbortSignal): Promise<MediaVariant[]>;
  resolvePlaylist(_url: string, _maxEntries: number, _signal?: AbortSignal): Promise<PlaylistEntry[]>;
}

export interface DownloadServiceDeps {
  engine: DownloadEngine;
  resolver: VariantResolver;
  settings?: SettingsService | null;
}

interface ResolutionRequest {
  selector: VariantSelector | null;
  fileName?: string;
  /** Sin carpeta explícita, la carpeta se decide por el mediaKind de la variante elegida. */
  destinationByKind?: boolean;
}

interface PendingResolution {
  controller: AbortController;
  task: Promise<void>;
}

export interface PlaylistSkippedEntry {
  url: string;
  error: string;
}

export interface PlaylistSubmitResult {
  jobs: JobSnapshot[];
  skipped: PlaylistSkippedEntry[];
}

export default class DownloadService extends BaseService {
  private readonly engine: DownloadEngine;
  private readonly resolver: VariantResolver;
  private readonly settings: SettingsService | null;
  /** Selector y nombre pedidos por job, para volver a resolver tras un retry. */
  private readonly requests = new Map<string, ResolutionRequest>();
  private readonly resolutions = new Map<string, PendingResolution>();
  private unsubscribeSettings: (() => void) | null = null;

  constructor(deps: DownloadServiceDeps) {
    super('DownloadService');
    this.engine = deps.engine;
    this.resolver = deps.resolver;
    this.settings = deps.settings ?? null;
  }

  /**
   * Carga la cola persistida, aplica los ajustes y vuelve a resolver los jobs que se
   * quedaron en resolving en la sesión anterior.
   */
  async initialize(): Promise<void> {
    if (this.settings) {
      this.applySettings();
      this.unsubscribeSettings = this.settings.onChange(() => this.applySettings());
    }
    this.engine.initialize();
    for (const job of this.engine.list()) {
      if (job.status === JobStatus.RESOLVING) {
        this.log.info(`Reanudando resolución de ${job.id}`);
        this.startResolution(job.id, job.sourceUrl, { selector: null });
      }
    }
    await super.initialize();
  }

  /** Aborta resoluciones en curso y cierra el motor (pausa lo activo y persiste). */
  async destroy(): Promise<void> {
    this.unsubscribeSettings?.();
    this.unsubscribeSettings = null;
    for (const { controller } of this.resolutions.values()) controller.abort();
    await this.settleResolutions();
    await this.engine.shutdown();
    await super.destroy();
  }

  /** Resuelve cuando no quedan resoluciones ni transferencias en curso. */
  async whenIdle(): Promise<void> {
    await this.settleResolutions();
    await this.engine.whenIdle();
  }

  private async settleResolutions(): Promise<void> {
    while (this.resolutions.size > 0) {
      await Promise.allSettled([...this.resolutions.values()].map(entry => entry.task));
    }
  }

  private applySettings(): void {
    if (!this.settings) return;
    const { system, download } = this.settings.get();
    this.engine.setConcurrency(system.threads);
    this.engine.applySettings({ maxRetries: system.maxRetries, writeMetadata: download.writeMetadata });
  }

  // =====================
  // ENVÍO
  // =====================

  /**
   * Crea un job para la URL. Con `variant` ya elegida entra directamente en la cola; si no,
   * queda en resolving mientras se consultan las variantes.
   */
  submit(params: unknown, variant: MediaVariant | null = null): ServiceResponse<JobSnapshot> {
    const validation = validateSubmitParams(params);
    if (!validation.success || !validation.data) {
      return this.invalid(validation.error, 'submit');
    }
    const { url, selector, fileName, priority } = validation.data;

    if (!this.resolver.canHandle(url)) {
      return this.handleError(new ResolutionError(ResolutionErrorKind.NOT_SUPPORTED, url), 'submit');
    }

    try {
      if (validation.data.destinationDir === undefined) this.assertNotQueuedAsPhoto(url);
      const job = this.engine.submit({
        sourceUrl: url,
        destinationDir:
          validation.data.destinationDir ?? this.defaultDestinationDir(variant?.mediaKind ?? 'video'),
        variant,
        fileName,
        priority,
      });
      const request: ResolutionRequest = {
        selector: selector ?? null,
        fileName,
        destinationByKind: validation.data.destinationDir === undefined,
      };
      this.requests.set(job.id, request);
      if (job.status === JobStatus.RESOLVING) this.startResolution(job.id, url, request);
      return this.success(job);
    } catch (error) {
      return this.handleError(error, 'submit');
    }
  }

  /**
   * Expande una playlist o perfil y crea un job por entrada. Las entradas duplicadas o no
   * soportadas se devuelven en skipped.
   */
  async submitPlaylist(params: unknown): Promise<ServiceResponse<PlaylistSubmitResult>> {
    const validation = validatePlaylistParams(params);
    if (!validation.success || !validation.data) {
      return this.invalid(validation.error, 'submitPlaylist');
    }
    const { url, selector, priority } = validation.data;
    const maxEntries = validation.data.maxEntries ?? this.defaultPlaylistSize();

    let entries: PlaylistEntry[];
    try {
      entries = await this.resolver.resolvePlaylist(url, maxEntries);
    } catch (error) {
      return this.handleError(error, 'submitPlaylist');
    }

    const result: PlaylistSubmitResult = { jobs: [], skipped: [] };
    for (const entry of entries) {
      const response = this.submit({
        url: entry.url,
        destinationDir: validation.data.destinationDir,
        selector,
        priority,
      });
      if (response.success && response.data) {
        result.jobs.push(response.data);
      } else {
        result.skipped.push({ url: entry.url, error: response.error ?? '' });
      }
    }
    this.log.info(
      `Playlist ${url}: ${result.jobs.length} jobs creados, ${result.skipped.length} omitidos`
    );
    return this.success(result);
  }

  // =====================
  // RESOLUCIÓN
  // =====================

  private startResolution(jobId: string, url: string, request: ResolutionRequest): void {
    this.resolutions.get(jobId)?.controller.abort();
    const controller = new AbortController();
    const task = this.resolveJob(jobId, url, request, controller.signal)
      .catch(error => {
        this.log.error(`Error inesperado resolviendo ${jobId}:`, error);
      })
      .finally(() => {
        if (this.resolutions.get(jobId)?.controller === controller) {
          this.resolutions.delete(jobId);
        }
      });
    this.resolutions.set(jobId, { controller, task });
  }

  private async resolveJob(
    jobId: string,
    url: string,
    request: ResolutionRequest,
    signal: AbortSignal
  ): Promise<void> {
    let variant: MediaVariant;
    try {
      const variants = await this.resolver.resolve(url, signal);
      const chosen = selectVariant(variants, request.selector ?? this.defaultSelector(variants));
      if (!chosen) {
        throw new ResolutionError(ResolutionErrorKind.PLATFORM_CHANGED, 'sin variantes descargables');
      }
      variant = chosen;
    } catch (error) {
      if (signal.aborted) return;
      this.engine.failResolution(jobId, error);
      return;
    }

    if (signal.aborted || this.engine.get(jobId)?.status !== JobStatus.RESOLVING) return;
    this.log.info(`Variante elegida para ${jobId}: ${variant.formatId} (${variant.resolutionLabel})`);
    const destinationDir = request.destinationByKind
      ? this.defaultDestinationDir(variant.mediaKind)
      : undefined;
    this.engine.assignVariant(jobId, variant, request.fileName, destinationDir);
  }

  private defaultSelector(variants: readonly MediaVariant[]): VariantSelector {
    if (!this.settings) return 'best';
    const { video, photo, download } = this.settings.get();
    if (variants.length > 0 && variants.every(v => v.mediaKind === 'photo')) {
      return selectorFromPreferences(photo.quality, 'best');
    }
    return selectorFromPreferences(video.resolution, download.extension);
  }

  /** Un envío sin carpeta también choca con el mismo job ya movido a la carpeta de fotos. */
  private assertNotQueuedAsPhoto(url: string): void {
    const photoDir = this.defaultDestinationDir('photo');
    const duplicate = this.engine
      .list()
      .find(job => isLiveState(job.status) && job.sourceUrl === url && job.destinationDir === photoDir);
    if (duplicate) {
      throw new SchedulerError(SchedulerErrorKind.DUPLICATE_SUBMISSION, `${url} (job ${duplicate.id})`);
    }
  }

  private defaultDestinationDir(kind: MediaKind): string {
    return this.settings?.destinationDirFor(kind) ?? config.paths.defaultDownloadDir;
  }

  private defaultPlaylistSize(): number {
    if (!this.settings) return config.resolver.playlistMaxEntries;
    const { video } = this.settings.get();
    return video.all ? config.resolver.playlistMaxEntries : video.count;
  }

  // =====================
  // CONTROL
  // =====================

  private control(
    jobId: unknown,
    context: string,
    action: (_id: string) => JobSnapshot
  ): ServiceResponse<JobSnapshot> {
    const validation = validateJobId(jobId);
    if (!validation.success || !validation.data) {
      return this.invalid(validation.error, context);
    }
    try {
      return this.success(action(validation.data));
    } catch (error) {
      return this.handleError(error, context);
    }
  }

  pause(jobId: unknown): ServiceResponse<JobSnapshot> {
    return this.control(jobId, 'pause', id => this.engine.pause(id));
  }

  resume(jobId: unknown): ServiceResponse<JobSnapshot> {
    return this.control(jobId, 'resume', id => this.engine.resume(id));
  }

  cancel(jobId: unknown): ServiceResponse<JobSnapshot> {
    return this.control(jobId, 'cancel', id => {
      this.resolutions.get(id)?.controller.abort();
      return this.engine.cancel(id);
    });
  }

  /** Reintento explícito de un job fallido; si no tenía variante se vuelve a resolver. */
  retry(jobId: unknown): ServiceResponse<JobSnapshot> {
    return this.control(jobId, 'retry', id => {
      const job = this.engine.retry(id);
      if (job.status === JobStatus.RESOLVING) {
        this.startResolution(id, job.sourceUrl, this.requests.get(id) ?? { selector: null });
      }
      return job;
    });
  }

  remove(jobId: unknown): ServiceResponse<null> {
    const validation = validateJobId(jobId);
    if (!validation.success || !validation.data) {
      return this.invalid(validation.error, 'remove');
    }
    try {
      this.engine.remove(validation.data);
      this.requests.delete(validation.data);
      return this.success(null);
    } catch (error) {
      return this.handleError(error, 'remove');
    }
  }

  setConcurrency(n: unknown): ServiceResponse<number> {
    const validation = validateConcurrency(n);
    if (validation.data === undefined || !validation.success) {
      return this.invalid(validation.error, 'setConcurrency');
    }
    return this.success(this.engine.setConcurrency(validation.data));
  }

  setPriority(jobId: unknown, priority: unknown): ServiceResponse<JobSnapshot> {
    const validation = validatePriority(priority);
    if (validation.data === undefined || !validation.success) {
      return this.invalid(validation.error, 'setPriority');
    }
    const level = validation.data;
    return this.control(jobId, 'setPriority', id => this.engine.setPriority(id, level));
  }

  // =====================
  // LECTURA
  // =====================

  get(jobId: unknown): ServiceResponse<JobSnapshot> {
    return this.control(jobId, 'get', id => {
      const job = this.engine.get(id);
      if (!job) throw new SchedulerError(SchedulerErrorKind.JOB_NOT_FOUND, id);
      return job;
    });
  }

  list(): ServiceResponse<JobSnapshot[]> {
    return this.success(this.engine.list());
  }

  snapshot(): ServiceResponse<QueueSnapshot> {
    return this.success(this.engine.snapshot());
  }

  /** Suscripción a eventos de estado y progreso, opcionalmente filtrada por jobId. */
  subscribe(filter: SubscriptionFilter = {}, listener: EngineEventListener | null = null): Subscription {
    return this.engine.subscribe(filter, listener);
  }
}
