/**
 * Motor de transferencia HTTP: descarga un FetchDescriptor a disco con reanudación por Range.
 *
 * Escribe en `destinationPath + stagingSuffix` y solo renombra al nombre final tras sync()
 * del archivo completo. Reanuda desde el tamaño del parcial en disco cuando el servidor
 * responde 206; con 200 (sin soporte de rangos) reinicia desde cero y lo señala con
 * restartedFromZero. La pausa y la cancelación se observan por chunk (TransferSignal);
 * la pausa conserva el parcial y la cancelación lo borra. Sin bytes durante idleTimeout
 * la transferencia se aborta como NETWORK_ERROR.
 *
 * El acceso a la red pasa por un StreamOpener inyectable: por defecto http/https de Node.
 *
 * @module engines/TransferEngine
 */

import fs from 'fs';
import { promises as fsPromises } from 'fs';
import http from 'http';
import https from 'https';
import path from 'path';
import type { IncomingHttpHeaders } from 'http';
import type { Readable } from 'stream';
import config from '../config';
import {
  logger,
  formatBytes,
  getAvailableDiskSpace,
  getFileSize,
  removeFileIfExists,
  resolveUniqueDestination,
} from '../utils';
import { ProgressThrottle } from './ProgressThrottle';
import { parseContentRange } from './DownloadValidator';
import { TransferError, TransferErrorKind, classifyTransferError } from './errors';
import {
  CancelMode,
  TransferOutcome,
  type ITransferEngine,
  type TransferRequest,
  type TransferResult,
} from './types';
import type { FetchDescriptor } from '../../shared/types';

const log = logger.child('TransferEngine');

export interface OpenedStream {
  statusCode: number;
  headers: IncomingHttpHeaders;
  body: Readable;
}

/** Abre la petición GET y resuelve con la respuesta (cabeceras recibidas, cuerpo sin leer). */
export type StreamOpener = (
  _url: string,
  _headers: Record<string, string>,
  _signal: AbortSignal
) => Promise<OpenedStream>;

export interface HttpStreamOpenerOptions {
  responseTimeout?: number;
  maxRedirects?: number;
}

const REDIRECT_STATUS = [301, 302, 303, 307, 308];

/** StreamOpener sobre http/https de Node. Sigue redirecciones hasta maxRedirects. */
export function createHttpStreamOpener(options: HttpStreamOpenerOptions = {}): StreamOpener {
  const responseTimeout = options.responseTimeout ?? config.network.responseTimeout;
  const maxRedirects = options.maxRedirects ?? 5;

  const open = (
    url: string,
    headers: Record<string, string>,
    signal: AbortSignal,
    redirectsLeft: number
  ): Promise<OpenedStream> =>
    new Promise<OpenedStream>((resolve, reject) => {
      const client = url.startsWith('https:') ? https : http;
      const req = client.get(url, { headers, signal }, res => {
        req.setTimeout(0);
        const statusCode = res.statusCode ?? 0;
        const location = res.headers.location;
        if (REDIRECT_STATUS.includes(statusCode) && location) {
          res.resume();
          if (redirectsLeft <= 0) {
            reject(new TransferError(TransferErrorKind.NETWORK_ERROR, 'Demasiadas redirecciones'));
            return;
          }
          const next = new URL(location, url).toString();
          open(next, headers, signal, redirectsLeft - 1).then(resolve, reject);
          return;
        }
        resolve({ statusCode, headers: res.headers, body: res });
      });
      req.setTimeout(responseTimeout, () => {
        req.destroy(
          new TransferError(
            TransferErrorKind.NETWORK_ERROR,
            `Sin respuesta en ${responseTimeout}ms`
          )
        );
      });
      req.on('error', reject);
    });

  return (url, headers, signal) => open(url, headers, signal, maxRedirects);
}

export interface HttpTransferEngineOptions {
  opener?: StreamOpener;
  stagingSuffix?: string;
  idleTimeout?: number;
  userAgent?: string;
  progressInterval?: number;
  progressBytesThreshold?: number;
  now?: () => number;
  /** Espacio libre en el volumen de la ruta (null si no se puede saber). */
  diskSpace?: (_filePath: string) => Promise<number | null>;
}

function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function contentLength(headers: IncomingHttpHeaders): number | null {
  const raw = headerValue(headers, 'content-length');
  if (raw == null) return null;
  const parsed = parseInt(raw, 10);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : null;
}

/** Interrupción por pausa o cancelación detectada en mitad de la E/S. */
class TransferInterrupted extends Error {
  constructor() {
    super('Transferencia interrumpida');
    this.name = 'TransferInterrupted';
  }
}

export class HttpTransferEngine implements ITransferEngine {
  readonly stagingSuffix: string;
  private readonly opener: StreamOpener;
  private readonly idleTimeout: number;
  private readonly userAgent: string;
  private readonly progressInterval: number;
  private readonly progressBytesThreshold: number;
  private readonly now: () => number;
  private readonly diskSpace: (_filePath: string) => Promise<number | null>;

  constructor(options: HttpTransferEngineOptions = {}) {
    this.opener = options.opener ?? createHttpStreamOpener();
    this.stagingSuffix = options.stagingSuffix ?? config.downloads.stagingSuffix;
    this.idleTimeout = options.idleTimeout ?? config.network.idleTimeout;
    this.userAgent = options.userAgent ?? config.network.userAgent;
    this.progressInterval = options.progressInterval ?? config.downloads.progressUpdateInterval;
    this.progressBytesThreshold =
      options.progressBytesThreshold ?? config.downloads.progressBytesThreshold;
    this.now = options.now ?? Date.now;
    this.diskSpace = options.diskSpace ?? getAvailableDiskSpace;
  }

  private buildHeaders(descriptor: FetchDescriptor, offset: number): Record<string, string> {
    const headers: Record<string, string> = { 'User-Agent': this.userAgent, ...descriptor.headers };
    if (descriptor.cookies) headers.Cookie = descriptor.cookies;
    if (offset > 0) headers.Range = `bytes=${offset}-`;
    return headers;
  }

  /** Offset de reanudación según lo que realmente hay en disco. */
  private async resolveStartOffset(
    stagingPath: string,
    request: TransferRequest
  ): Promise<{ offset: number; restarted: boolean }> {
    const onDisk = (await getFileSize(stagingPath)) ?? 0;
    if (request.resumeOffset > 0 && onDisk < request.resumeOffset) {
      log.warn(
        `Parcial más corto de lo registrado (${onDisk} < ${request.resumeOffset}), reinicio desde cero: ${stagingPath}`
      );
      return { offset: 0, restarted: true };
    }
    if (request.expectedTotal != null && onDisk > request.expectedTotal) {
      log.warn(`Parcial mayor que el total esperado, reinicio desde cero: ${stagingPath}`);
      return { offset: 0, restarted: request.resumeOffset > 0 };
    }
    return { offset: onDisk, restarted: false };
  }

  async transfer(request: TransferRequest): Promise<TransferResult> {
    const { descriptor, destinationPath, signal } = request;
    const stagingPath = destinationPath + this.stagingSuffix;
    const throttle = new ProgressThrottle(request.onProgress, {
      intervalMs: this.progressInterval,
      bytesThreshold: this.progressBytesThreshold,
      now: this.now,
    });

    let { offset, restarted } = await this.resolveStartOffset(stagingPath, request);
    let downloaded = offset;
    let total: number | null = request.expectedTotal;

    const result = (outcome: TransferResult['outcome'], finalPath = destinationPath): TransferResult => {
      throttle.flush({ bytesDownloaded: downloaded, bytesTotal: total, restartedFromZero: restarted });
      return {
        outcome,
        bytesDownloaded: downloaded,
        bytesTotal: total,
        resumeOffset: outcome === TransferOutcome.PAUSED ? downloaded : 0,
        restartedFromZero: restarted,
        stagingPath,
        finalPath,
      };
    };

    const interrupted = async (): Promise<TransferResult> => {
      if (signal.requested === CancelMode.CANCEL) {
        await removeFileIfExists(stagingPath);
        return result(TransferOutcome.CANCELLED);
      }
      return result(TransferOutcome.PAUSED);
    };

    if (signal.requested) return interrupted();

    if (request.expectedTotal != null) {
      const needed = request.expectedTotal - offset;
      const available = await this.diskSpace(stagingPath);
      if (available != null && available < needed) {
        throttle.flush({ bytesDownloaded: downloaded, bytesTotal: total, restartedFromZero: restarted });
        throw new TransferError(
          TransferErrorKind.DISK_FULL,
          `Necesarios ${formatBytes(needed)}, disponibles ${formatBytes(available)}`
        );
      }
    }

    let response: OpenedStream;
    try {
      response = await this.opener(
        descriptor.url,
        this.buildHeaders(descriptor, offset),
        signal.abortSignal
      );
    } catch (error) {
      if (signal.requested) return interrupted();
      throttle.flush({ bytesDownloaded: downloaded, bytesTotal: total, restartedFromZero: restarted });
      throw classifyTransferError(error);
    }

    const { statusCode, headers, body } = response;
    let append = offset > 0;

    try {
      if (statusCode === 416 && offset > 0) {
        body.resume();
        const range = parseContentRange(headerValue(headers, 'content-range'));
        if (range?.total != null && range.total === offset && (total == null || total === offset)) {
          total = range.total;
          log.info(`Parcial ya completo (${formatBytes(offset)}): ${destinationPath}`);
          return await this.finalize(stagingPath, destinationPath, null, result);
        }
        throw new TransferError(
          TransferErrorKind.SERVER_REJECTED_RANGE,
          `HTTP 416 para bytes=${offset}-`
        );
      }

      if (statusCode === 206 && offset > 0) {
        const range = parseContentRange(headerValue(headers, 'content-range'));
        if (range?.start != null && range.start !== offset) {
          body.resume();
          throw new TransferError(
            TransferErrorKind.SERVER_REJECTED_RANGE,
            `Rango devuelto desde ${range.start}, pedido desde ${offset}`
          );
        }
        const length = contentLength(headers);
        const announced = range?.total ?? (length != null ? offset + length : null);
        total = this.checkTotal(total, announced, body);
      } else if (statusCode === 200 || statusCode === 206) {
        if (offset > 0) {
          log.info(`El servidor no admite rangos, reinicio desde cero: ${descriptor.url}`);
          offset = 0;
          downloaded = 0;
          restarted = true;
          append = false;
        }
        const range = statusCode === 206 ? parseContentRange(headerValue(headers, 'content-range')) : null;
        total = this.checkTotal(total, range?.total ?? contentLength(headers), body);
      } else {
        body.resume();
        throw new TransferError(TransferErrorKind.NETWORK_ERROR, `HTTP ${statusCode}`);
      }
    } catch (error) {
      throttle.flush({ bytesDownloaded: downloaded, bytesTotal: total, restartedFromZero: restarted });
      if (error instanceof TransferError && error.kind === TransferErrorKind.CORRUPT) {
        await removeFileIfExists(stagingPath);
      }
      throw error;
    }

    if (restarted) {
      throttle.update({ bytesDownloaded: 0, bytesTotal: total, restartedFromZero: true });
    }

    let handle: fsPromises.FileHandle | null = null;
    let idleTimer: ReturnType<typeof setTimeout> | null = null;
    const onAbort = (): void => {
      body.destroy(new TransferInterrupted());
    };

    try {
      handle = await fsPromises.open(stagingPath, append ? 'r+' : 'w');
      if (append) await handle.truncate(offset);

      const armIdleTimer = (): void => {
        if (idleTimer) clearTimeout(idleTimer);
        idleTimer = setTimeout(() => {
          body.destroy(
            new TransferError(
              TransferErrorKind.NETWORK_ERROR,
              `Sin datos durante ${this.idleTimeout}ms`
            )
          );
        }, this.idleTimeout);
      };

      signal.abortSignal.addEventListener('abort', onAbort, { once: true });
      armIdleTimer();

      for await (const chunk of body) {
        if (signal.requested) throw new TransferInterrupted();
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        armIdleTimer();
        if (total != null && downloaded + buffer.length > total) {
          throw new TransferError(
            TransferErrorKind.CORRUPT,
            `Recibidos más bytes (${downloaded + buffer.length}) que el total anunciado (${total})`
          );
        }
        await handle.write(buffer, 0, buffer.length, downloaded);
        downloaded += buffer.length;
        throttle.update({ bytesDownloaded: downloaded, bytesTotal: total, restartedFromZero: false });
      }

      if (signal.requested) throw new TransferInterrupted();

      if (total != null && downloaded < total) {
        throw new TransferError(
          TransferErrorKind.NETWORK_ERROR,
          `Conexión cerrada en ${downloaded} de ${total} bytes`
        );
      }
      if (total == null) total = downloaded;

      const fileHandle = handle;
      handle = null;
      return await this.finalize(stagingPath, destinationPath, fileHandle, result);
    } catch (error) {
      if (handle) {
        await handle.sync().catch(syncError => log.debug('sync del parcial falló:', syncError));
        await handle.close();
        handle = null;
      }
      if (signal.requested) return await interrupted();
      const transferError = classifyTransferError(error);
      throttle.flush({ bytesDownloaded: downloaded, bytesTotal: total, restartedFromZero: restarted });
      if (transferError.kind === TransferErrorKind.CORRUPT) {
        await removeFileIfExists(stagingPath);
      }
      throw transferError;
    } finally {
      if (idleTimer) clearTimeout(idleTimer);
      signal.abortSignal.removeEventListener('abort', onAbort);
      if (handle) await handle.close();
      if (!body.destroyed) body.destroy();
    }
  }

  /** Un total distinto del ya conocido invalida el parcial. */
  private checkTotal(known: number | null, announced: number | null, body: Readable): number | null {
    if (known != null && announced != null && known !== announced) {
      body.resume();
      throw new TransferError(
        TransferErrorKind.CORRUPT,
        `El servidor anuncia ${announced} bytes, se esperaban ${known}`
      );
    }
    return known ?? announced;
  }

  /** sync + cierre del staging y rename atómico al nombre final (libre). */
  private async finalize(
    stagingPath: string,
    destinationPath: string,
    handle: fsPromises.FileHandle | null,
    result: (_outcome: TransferResult['outcome'], _finalPath?: string) => TransferResult
  ): Promise<TransferResult> {
    if (handle) {
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
    } else {
      const existing = await fsPromises.open(stagingPath, 'r+');
      try {
        await existing.sync();
      } finally {
        await existing.close();
      }
    }
    const finalPath = fs.existsSync(destinationPath)
      ? resolveUniqueDestination(
          path.dirname(destinationPath),
          path.basename(destinationPath),
          candidate => fs.existsSync(candidate)
        )
      : destinationPath;
    if (finalPath !== destinationPath) {
      log.warn(`Ya existe ${destinationPath}, se guarda como ${finalPath}`);
    }
    await fsPromises.rename(stagingPath, finalPath);
    log.info(`Transferencia completada: ${finalPath}`);
    return result(TransferOutcome.COMPLETED, finalPath);
  }
}

export default HttpTransferEngine;
