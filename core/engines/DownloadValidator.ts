/**
 * Utilidades de red y reintento para el motor de descargas.
 *
 * isTransientNetworkError: detecta errores que merecen reintento (ECONNRESET, ETIMEDOUT, etc.).
 * parseContentRange: interpreta la cabecera Content-Range de una respuesta 206/416.
 * calculateBackoffDelay: delay exponencial con jitter según retryCount y config.
 *
 * @module engines/DownloadValidator
 */

import config from '../config';
import type { RetryBackoffConfig } from '../config';

const TRANSIENT_ERROR_CODES = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ECONNABORTED',
  'ERR_STREAM_PREMATURE_CLOSE',
];

const TRANSIENT_ERROR_STRINGS = ['socket hang up', 'aborted', 'timeout', 'Timeout'];

/** Indica si el error es de red transitorio (reintento razonable). */
export function isTransientNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const errorCode = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  if (errorCode && TRANSIENT_ERROR_CODES.includes(errorCode)) {
    return true;
  }
  return TRANSIENT_ERROR_STRINGS.some(str => error.message.includes(str));
}

export interface ContentRange {
  start: number | null;
  end: number | null;
  total: number | null;
}

/**
 * Parsea "bytes 100-199/1000", "bytes *\/1000" o "bytes 0-9/*". Devuelve null si no es válida.
 */
export function parseContentRange(header: string | undefined): ContentRange | null {
  if (!header) return null;
  const match = /^bytes\s+(?:(\d+)-(\d+)|\*)\/(\d+|\*)$/i.exec(header.trim());
  if (!match) return null;
  return {
    start: match[1] != null ? parseInt(match[1], 10) : null,
    end: match[2] != null ? parseInt(match[2], 10) : null,
    total: match[3] !== '*' ? parseInt(match[3], 10) : null,
  };
}

/**
 * Calcula el delay de reintento en ms: base * growthFactor^retryCount, acotado a maxDelayMs,
 * con jitter proporcional (±jitterFactor). random se inyecta en tests.
 */
export function calculateBackoffDelay(
  retryCount: number,
  backoff: RetryBackoffConfig = config.downloads.backoff,
  random: () => number = Math.random
): number {
  const attempt = Math.max(0, retryCount);
  const exponentialDelay = backoff.baseDelayMs * Math.pow(backoff.growthFactor, attempt);
  const capped = Math.min(exponentialDelay, backoff.maxDelayMs);
  const jitter = capped * backoff.jitterFactor * (random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitter));
}
