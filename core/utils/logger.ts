/**
 * @fileoverview Logging del núcleo sobre electron-log (entrada para Node).
 * @module utils/logger
 *
 * Cada módulo toma un logger con scope (`logger.child('DownloadEngine')`). Los errores
 * pasados como segundo argumento se escriben con su stack.
 */

import log from 'electron-log/node';
import path from 'path';
import fsSync from 'fs';
import { promises as fs } from 'fs';

type Level = 'error' | 'warn' | 'info' | 'debug';

export interface ConfigureLoggerOptions {
  fileLevel?: Level | false;
  consoleLevel?: Level | false;
  maxSize?: number;
  /** Directorio de logs; si se omite se usa el que elige electron-log. */
  logDir?: string;
  isDev?: boolean;
}

export interface ScopedLogger {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  /** Registra el inicio y devuelve la función que registra el fin con la duración. */
  startOperation: (_operation: string) => (_result?: string) => void;
  separator: (_title?: string) => void;
  child: (_subScope: string) => ScopedLogger;
}

function describeArg(arg: unknown): unknown {
  if (arg instanceof Error) return `${arg.message}\n${arg.stack ?? ''}`;
  return arg;
}

interface LogSink {
  error(..._args: unknown[]): void;
  warn(..._args: unknown[]): void;
  info(..._args: unknown[]): void;
  debug(..._args: unknown[]): void;
}

const scopedLoggers = new Map<string, ScopedLogger>();

function buildLogger(sink: LogSink, scope: string | null): ScopedLogger {
  const write =
    (level: Level) =>
    (...args: unknown[]): void => {
      sink[level](...args.map(describeArg));
    };

  return {
    error: write('error'),
    warn: write('warn'),
    info: write('info'),
    debug: write('debug'),
    startOperation(operation: string) {
      const start = Date.now();
      sink.info(`▶ ${operation}`);
      return (result = 'completado') => {
        sink.info(`✓ ${operation}: ${result} (${Date.now() - start}ms)`);
      };
    },
    separator(title = '') {
      sink.info(title ? `${'='.repeat(20)} ${title} ${'='.repeat(20)}` : '='.repeat(50));
    },
    child(subScope: string) {
      return createScopedLogger(scope ? `${scope}:${subScope}` : subScope);
    },
  };
}

function createScopedLogger(scope: string): ScopedLogger {
  const existing = scopedLoggers.get(scope);
  if (existing) return existing;
  const created = buildLogger(log.scope(scope), scope);
  scopedLoggers.set(scope, created);
  return created;
}

/** Logger raíz, sin scope. */
export const logger: ScopedLogger = buildLogger(log, null);

/**
 * Configura los transportes de archivo y consola. Fuera de desarrollo la consola solo
 * muestra avisos y errores. El archivo lleno se archiva con la fecha del día.
 */
export function configureLogger(options: ConfigureLoggerOptions = {}): void {
  const {
    fileLevel = 'info',
    consoleLevel = 'debug',
    maxSize = 10 * 1024 * 1024,
    logDir,
    isDev = process.env.NODE_ENV === 'development',
  } = options;

  log.transports.file.level = fileLevel;
  log.transports.file.maxSize = maxSize;
  log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}';
  if (logDir) {
    log.transports.file.resolvePathFn = () => path.join(logDir, 'media-dm.log');
  }
  log.transports.file.archiveLogFn = oldLogFile => {
    const parsed = path.parse(oldLogFile.path);
    const day = new Date().toISOString().slice(0, 10);
    try {
      fsSync.renameSync(oldLogFile.path, path.join(parsed.dir, `${parsed.name}-${day}${parsed.ext}`));
    } catch (error) {
      console.warn('No se pudo archivar el log:', error);
    }
  };

  log.transports.console.level = isDev ? consoleLevel : 'warn';
  log.transports.console.format = '[{h}:{i}:{s}] [{level}]{scope} {text}';

  log.errorHandler.startCatching({
    showDialog: false,
    onError: ({ error }) => {
      log.error('Error no capturado:', describeArg(error));
    },
  });

  logger.info(`Logger listo (${isDev ? 'desarrollo' : 'producción'}): ${log.transports.file.getFile()?.path ?? 'sin archivo'}`);
}

/** Borra los .log del directorio de logs con más de daysToKeep días. */
export async function cleanOldLogs(daysToKeep = 30): Promise<void> {
  const current = log.transports.file.getFile()?.path;
  if (!current) {
    logger.warn('Directorio de logs desconocido, no se limpian logs antiguos');
    return;
  }
  const logDir = path.dirname(current);
  const cutoff = Date.now() - daysToKeep * 24 * 60 * 60 * 1000;
  try {
    for (const file of await fs.readdir(logDir)) {
      if (!file.endsWith('.log')) continue;
      const filePath = path.join(logDir, file);
      const stats = await fs.stat(filePath);
      if (stats.mtime.getTime() < cutoff) {
        await fs.unlink(filePath);
        logger.info(`Log antiguo eliminado: ${file}`);
      }
    }
  } catch (error) {
    logger.error('Error limpiando logs antiguos:', error);
  }
}
