/**
 * Clase base para los servicios del núcleo (Download, Settings).
 *
 * Proporciona: name, log (logger.child), initialized, initialize(), destroy(), handleError()
 * y success() para respuestas tipadas. Los servicios concretos sobrescriben initialize()
 * según sus dependencias.
 *
 * @module BaseService
 */

import { logger, type ScopedLogger } from '../utils/logger';
import { ERRORS } from '../constants/errors';
import { describeError, isDownloadManagerError } from '../engines/errors';

/** Respuesta estándar de servicios: success, data opcional, error/code/context en fallo. */
export interface ServiceResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  code?: string;
  context?: string;
}

export default class BaseService {
  readonly name: string;
  protected readonly log: ScopedLogger;
  protected initialized: boolean;

  constructor(name: string) {
    this.name = name;
    this.log = logger.child(`Service:${name}`);
    this.initialized = false;
  }

  async initialize(): Promise<void> {
    this.initialized = true;
    this.log.info('Servicio inicializado');
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  async destroy(): Promise<void> {
    this.initialized = false;
    this.log.info('Servicio destruido');
  }

  /**
   * Registra el error y devuelve ServiceResponse con success: false. Los errores del
   * núcleo aportan su code ("scheduler.DUPLICATE_SUBMISSION"…).
   */
  handleError<T = never>(error: unknown, context = ''): ServiceResponse<T> {
    const reason = describeError(error);
    const message = context
      ? `Error en ${this.name} - ${context}: ${reason}`
      : `Error en ${this.name}: ${reason}`;

    if (isDownloadManagerError(error)) {
      this.log.warn(message);
    } else {
      this.log.error(message, error);
    }
    return {
      success: false,
      error: reason || ERRORS.GENERAL.UNKNOWN,
      code: isDownloadManagerError(error) ? error.code : undefined,
      context,
    };
  }

  /** Respuesta de validación fallida (sin pasar por el log de errores). */
  invalid<T = never>(error: string | undefined, context = ''): ServiceResponse<T> {
    this.log.warn(`Parámetros inválidos en ${context || this.name}: ${error ?? ''}`);
    return {
      success: false,
      error: error || ERRORS.GENERAL.INVALID_PARAMS,
      code: 'validation',
      context,
    };
  }

  /** Devuelve ServiceResponse con success: true y data. */
  success<T>(data: T, message = ''): ServiceResponse<T> {
    return {
      success: true,
      data,
      message,
    };
  }
}
