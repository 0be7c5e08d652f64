/**
 * @fileoverview Módulo índice que centraliza las utilidades reexportadas.
 * @module utils
 *
 * metadata se consume por ruta directa (solo lo usa el DownloadEngine).
 */

export { logger, configureLogger, cleanOldLogs, type ScopedLogger } from './logger';

export * from './fileHelpers';

export * as schemas from './schemas';
