/**
 * Contratos del Resolver Adapter: resolvers por plataforma, backend de extracción externo
 * y colaborador de automatización de navegador.
 *
 * @module resolvers/types
 */

import type { EventEmitter } from 'events';
import type { Readable } from 'stream';
import type { MediaKind, MediaVariant } from '../../shared/types';
import type { ExtractorInfo } from '../utils/schemas';

export interface PlaylistEntry {
  url: string;
  title: string | null;
}

/** Traduce una URL de origen en variantes descargables. No muta estado compartido. */
export interface IResolver {
  readonly name: string;
  canHandle(_url: string): boolean;
  resolve(_url: string, _signal?: AbortSignal): Promise<MediaVariant[]>;
  resolvePlaylist(_url: string, _maxEntries: number, _signal?: AbortSignal): Promise<PlaylistEntry[]>;
}

/** Extractor externo (yt-dlp) que devuelve el JSON de información de un medio o playlist. */
export interface ExtractionBackend {
  extract(_url: string, _signal?: AbortSignal): Promise<ExtractorInfo>;
  extractPlaylist(_url: string, _maxEntries: number, _signal?: AbortSignal): Promise<ExtractorInfo>;
}

/** Proceso hijo mínimo que necesita el backend (ChildProcess de Node lo cumple). */
export interface ChildProcessLike extends EventEmitter {
  stdout: Readable | null;
  stderr: Readable | null;
  kill(_signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFn = (_command: string, _args: readonly string[]) => ChildProcessLike;

/** Recurso multimedia capturado al renderizar una página dinámica. */
export interface CapturedMedia {
  url: string;
  mimeType: string | null;
  width?: number;
  height?: number;
  sizeBytes?: number;
  headers?: Record<string, string>;
}

/** Sesión de navegador; close() debe poder llamarse más de una vez. */
export interface BrowserSession {
  open(_url: string, _signal: AbortSignal): Promise<void>;
  collectMedia(): Promise<CapturedMedia[]>;
  title(): Promise<string | null>;
  cookies(): Promise<string | null>;
  close(): Promise<void>;
}

/** Colaborador externo de automatización de navegador. */
export interface BrowserAutomation {
  newSession(): Promise<BrowserSession>;
}

export interface PlatformDefinition {
  name: string;
  /** Patrones de dominio: "youtube.com" o "*.youtube.com" (incluye el dominio raíz). */
  domains: readonly string[];
  defaultMediaKind: MediaKind;
}
