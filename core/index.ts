/**
 * Punto de entrada del núcleo: arma el gestor de descargas con sus colaboradores reales.
 *
 * createDownloadManager() configura el logger, abre la persistencia SQLite, crea el motor
 * de transferencia HTTP, el DownloadEngine, el registro de resolvers sobre yt-dlp y los
 * servicios. El llamador es dueño de la instancia: initialize() al arrancar y destroy() al
 * salir (pausa lo activo y persiste la cola).
 *
 * @module core
 */

import config from './config';
import { configureLogger, cleanOldLogs, logger } from './utils';
import DownloadEngine from './engines/DownloadEngine';
import { StateStore } from './engines/StateStore';
import { HttpTransferEngine } from './engines/TransferEngine';
import { createDefaultRegistry, type ResolverRegistry } from './resolvers/ResolverRegistry';
import type { BrowserAutomation, ExtractionBackend } from './resolvers/types';
import { DownloadService, ServiceManager, SettingsService } from './services';

const log = logger.child('Main');

export interface DownloadManagerOptions {
  /** Rutas de la cola SQLite, de settings.json y de los logs; por defecto config.paths. */
  dbPath?: string;
  settingsPath?: string;
  logDir?: string;
  /** Backend de extracción alternativo (por defecto yt-dlp). */
  backend?: ExtractionBackend;
  /** Automatización de navegador para páginas que solo renderizan con JavaScript. */
  browserAutomation?: BrowserAutomation | null;
  configureLogging?: boolean;
}

export interface DownloadManager {
  readonly engine: DownloadEngine;
  readonly registry: ResolverRegistry;
  readonly services: ServiceManager;
  readonly downloads: DownloadService;
  readonly settings: SettingsService;
  initialize(): Promise<void>;
  destroy(): Promise<void>;
}

export function createDownloadManager(options: DownloadManagerOptions = {}): DownloadManager {
  if (options.configureLogging !== false) {
    configureLogger({ logDir: options.logDir ?? config.paths.logsPath, isDev: config.isDev });
  }

  const persistence = new StateStore({ dbPath: options.dbPath ?? config.paths.queueDbPath });
  const engine = new DownloadEngine({
    transferEngine: new HttpTransferEngine(),
    persistence,
  });
  const registry = createDefaultRegistry({
    backend: options.backend,
    browserAutomation: options.browserAutomation,
  });
  const settings = new SettingsService({ settingsPath: options.settingsPath });
  const downloads = new DownloadService({ engine, resolver: registry, settings });
  const services = new ServiceManager(settings, downloads);

  return {
    engine,
    registry,
    services,
    downloads,
    settings,
    async initialize() {
      log.separator('Inicio del gestor de descargas');
      persistence.initialize();
      await services.initialize();
      if (options.configureLogging !== false) {
        await cleanOldLogs();
      }
      log.info(`Gestor listo: ${engine.list().length} jobs, concurrencia ${engine.maxConcurrency}`);
    },
    async destroy() {
      await services.destroy();
      log.info('Gestor de descargas cerrado');
    },
  };
}

export { default as config } from './config';
export * from './engines';
export * from './resolvers';
export * from './services';
export { logger, configureLogger } from './utils';
export * from '../shared/types';
export { JOB_STATUSES, JOB_PRIORITIES, isJobStatus, isJobPriority } from '../shared/constants/queue';
