/**
 * Backend de extracción sobre el ejecutable yt-dlp (`yt-dlp -J`).
 *
 * Lanza el proceso sin shell, acumula stdout y valida el JSON con Zod. Si la señal se
 * aborta o vence resolveTimeout se mata el proceso. El stderr se traduce a ResolutionError
 * (NOT_SUPPORTED, PRIVATE_OR_REMOVED, NETWORK_ERROR o PLATFORM_CHANGED).
 *
 * @module resolvers/YtDlpBackend
 */

import { spawn } from 'child_process';
import config from '../config';
import { logger } from '../utils';
import { extractorInfoSchema, type ExtractorInfo } from '../utils/schemas';
import { ResolutionError, ResolutionErrorKind, type ResolutionErrorKindType } from '../engines/errors';
import type { ChildProcessLike, ExtractionBackend, SpawnFn } from './types';

const log = logger.child('YtDlpBackend');

export interface YtDlpBackendOptions {
  binaryPath?: string;
  timeoutMs?: number;
  spawnFn?: SpawnFn;
}

const STDERR_RULES: ReadonlyArray<[RegExp, ResolutionErrorKindType]> = [
  [/Unsupported URL/i, ResolutionErrorKind.NOT_SUPPORTED],
  [
    /private|has been removed|no longer available|not available|unavailable|login required|HTTP Error 40[134]/i,
    ResolutionErrorKind.PRIVATE_OR_REMOVED,
  ],
  [
    /Unable to download webpage|timed out|Connection|getaddrinfo|Network is unreachable|HTTP Error 5\d\d|HTTP Error 429/i,
    ResolutionErrorKind.NETWORK_ERROR,
  ],
];

/** Traduce el stderr de yt-dlp a un tipo de ResolutionError. */
export function classifyExtractorError(stderr: string): ResolutionErrorKindType {
  for (const [pattern, kind] of STDERR_RULES) {
    if (pattern.test(stderr)) return kind;
  }
  return ResolutionErrorKind.PLATFORM_CHANGED;
}

function lastErrorLine(stderr: string): string {
  const lines = stderr
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean);
  return lines.find(line => line.startsWith('ERROR:')) ?? lines[lines.length - 1] ?? '';
}

const defaultSpawn: SpawnFn = (command, args) =>
  spawn(command, [...args], { shell: false, windowsHide: true });

export class YtDlpBackend implements ExtractionBackend {
  private readonly binaryPath: string;
  private readonly timeoutMs: number;
  private readonly spawnFn: SpawnFn;

  constructor(options: YtDlpBackendOptions = {}) {
    this.binaryPath = options.binaryPath ?? config.resolver.ytDlpPath;
    this.timeoutMs = options.timeoutMs ?? config.resolver.resolveTimeout;
    this.spawnFn = options.spawnFn ?? defaultSpawn;
  }

  extract(url: string, signal?: AbortSignal): Promise<ExtractorInfo> {
    return this.run(['-J', '--no-warnings', '--no-playlist', url], signal);
  }

  extractPlaylist(url: string, maxEntries: number, signal?: AbortSignal): Promise<ExtractorInfo> {
    return this.run(
      ['-J', '--no-warnings', '--flat-playlist', '--playlist-end', String(maxEntries), url],
      signal
    );
  }

  private run(args: readonly string[], signal?: AbortSignal): Promise<ExtractorInfo> {
    if (signal?.aborted) {
      return Promise.reject(new ResolutionError(ResolutionErrorKind.CANCELLED));
    }

    return new Promise<ExtractorInfo>((resolve, reject) => {
      let child: ChildProcessLike;
      try {
        child = this.spawnFn(this.binaryPath, args);
      } catch (error) {
        reject(
          new ResolutionError(ResolutionErrorKind.NOT_SUPPORTED, `No se pudo lanzar ${this.binaryPath}`, {
            cause: error,
          })
        );
        return;
      }

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | null = null;

      const finish = (error: ResolutionError | null, info?: ExtractorInfo): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (error) reject(error);
        else if (info) resolve(info);
      };

      const onAbort = (): void => {
        child.kill('SIGTERM');
        finish(new ResolutionError(ResolutionErrorKind.CANCELLED));
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      timer = setTimeout(() => {
        child.kill('SIGTERM');
        finish(
          new ResolutionError(
            ResolutionErrorKind.NETWORK_ERROR,
            `yt-dlp no respondió en ${this.timeoutMs}ms`
          )
        );
      }, this.timeoutMs);

      child.stdout?.on('data', (data: Buffer) => {
        stdoutChunks.push(data);
      });
      child.stderr?.on('data', (data: Buffer) => {
        stderrChunks.push(data);
      });

      child.on('error', (err: NodeJS.ErrnoException) => {
        log.error('Error ejecutando yt-dlp:', err);
        const detail =
          err.code === 'ENOENT' ? `No se encontró el ejecutable ${this.binaryPath}` : err.message;
        finish(new ResolutionError(ResolutionErrorKind.NOT_SUPPORTED, detail, { cause: err }));
      });

      child.on('close', (code: number | null) => {
        if (code !== 0) {
          const stderr = Buffer.concat(stderrChunks).toString('utf8');
          const kind = classifyExtractorError(stderr);
          log.warn(`yt-dlp terminó con código ${code} (${kind}): ${lastErrorLine(stderr)}`);
          finish(new ResolutionError(kind, lastErrorLine(stderr) || `código ${code}`));
          return;
        }
        let json: unknown;
        try {
          json = JSON.parse(Buffer.concat(stdoutChunks).toString('utf8'));
        } catch (error) {
          finish(
            new ResolutionError(ResolutionErrorKind.PLATFORM_CHANGED, 'Salida JSON ilegible', {
              cause: error,
            })
          );
          return;
        }
        const parsed = extractorInfoSchema.safeParse(json);
        if (!parsed.success) {
          finish(
            new ResolutionError(
              ResolutionErrorKind.PLATFORM_CHANGED,
              parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
            )
          );
          return;
        }
        finish(null, parsed.data);
      });
    });
  }
}

export default YtDlpBackend;
