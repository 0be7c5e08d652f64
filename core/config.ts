/**
 * Configuración por defecto del núcleo (valores de runtime).
 *
 * Aquí se definen timeouts, límites de cola, parámetros del motor de descargas, del bus
 * de eventos, del resolver y rutas de datos. Los ajustes que el usuario cambia (carpeta de
 * descargas, descargas simultáneas, calidad preferida) se guardan en settings.json bajo
 * dataPath y los gestiona SettingsService (no aquí).
 *
 * Variables de entorno: MEDIA_DM_DATA_DIR, MEDIA_DM_DOWNLOAD_DIR, MEDIA_DM_YTDLP,
 * MEDIA_DM_MAX_CONCURRENCY.
 *
 * @module config
 */

import os from 'os';
import path from 'path';

export interface NetworkConfig {
  /** Tiempo máximo (ms) hasta recibir cabeceras de respuesta. */
  responseTimeout: number;
  /** Ventana (ms) sin bytes recibidos tras la cual la transferencia se considera estancada. */
  idleTimeout: number;
  userAgent: string;
}

export interface RetryBackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  growthFactor: number;
  /** Fracción del delay que se suma/resta de forma aleatoria (0 = determinista). */
  jitterFactor: number;
}

export interface DownloadsConfig {
  maxConcurrency: number;
  minConcurrency: number;
  maxConcurrencyLimit: number;
  maxRetries: number;
  backoff: RetryBackoffConfig;
  /** Intervalo mínimo (ms) entre actualizaciones de progreso. */
  progressUpdateInterval: number;
  /** Bytes mínimos entre actualizaciones de progreso (lo que ocurra antes). */
  progressBytesThreshold: number;
  stagingSuffix: string;
  writeMetadata: boolean;
}

export interface EventsConfig {
  /** Capacidad del buffer por suscriptor antes de descartar eventos de progreso. */
  subscriberBufferSize: number;
}

export interface ResolverConfig {
  ytDlpPath: string;
  resolveTimeout: number;
  playlistMaxEntries: number;
}

export interface PathsConfig {
  dataPath: string;
  settingsPath: string;
  queueDbPath: string;
  logsPath: string;
  defaultDownloadDir: string;
}

export interface AppConfig {
  network: NetworkConfig;
  downloads: DownloadsConfig;
  events: EventsConfig;
  resolver: ResolverConfig;
  paths: PathsConfig;
  isDev: boolean;
}

function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

const dataPath = process.env.MEDIA_DM_DATA_DIR || path.join(os.homedir(), '.media-dm');

const config: AppConfig = {
  network: {
    responseTimeout: 30000,
    idleTimeout: 60000,
    userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
  },

  downloads: {
    maxConcurrency: envInt('MEDIA_DM_MAX_CONCURRENCY', 3),
    minConcurrency: 1,
    maxConcurrencyLimit: 10,
    maxRetries: 3,
    backoff: {
      baseDelayMs: 1000,
      maxDelayMs: 60000,
      growthFactor: 2,
      jitterFactor: 0.2,
    },
    progressUpdateInterval: 500,
    progressBytesThreshold: 1024 * 1024,
    stagingSuffix: '.part',
    writeMetadata: false,
  },

  events: {
    subscriberBufferSize: 256,
  },

  resolver: {
    ytDlpPath: process.env.MEDIA_DM_YTDLP || 'yt-dlp',
    resolveTimeout: 120000,
    playlistMaxEntries: 100,
  },

  paths: {
    dataPath,
    settingsPath: path.join(dataPath, 'settings.json'),
    queueDbPath: path.join(dataPath, 'queue-state.db'),
    logsPath: path.join(dataPath, 'logs'),
    defaultDownloadDir:
      process.env.MEDIA_DM_DOWNLOAD_DIR || path.join(os.homedir(), 'Downloads', 'media-dm'),
  },

  isDev: process.env.NODE_ENV === 'development',
};

export default config;
