/**
 * Taxonomía de errores del núcleo: resolución, transferencia, scheduler y sistema.
 *
 * Cada error lleva category y kind (constantes congeladas). describeError() produce el
 * motivo legible que se guarda en lastError de los jobs fallidos; classifyTransferError()
 * traduce errores de Node (errno) a TransferError.
 *
 * @module engines/errors
 */

import { ERRORS } from '../constants/errors';

export const ErrorCategory = Object.freeze({
  RESOLUTION: 'resolution',
  TRANSFER: 'transfer',
  SCHEDULER: 'scheduler',
  SYSTEM: 'system',
} as const);

export type ErrorCategoryType = (typeof ErrorCategory)[keyof typeof ErrorCategory];

export const ResolutionErrorKind = Object.freeze({
  NOT_SUPPORTED: 'NOT_SUPPORTED',
  NETWORK_ERROR: 'NETWORK_ERROR',
  PLATFORM_CHANGED: 'PLATFORM_CHANGED',
  PRIVATE_OR_REMOVED: 'PRIVATE_OR_REMOVED',
  CANCELLED: 'CANCELLED',
} as const);

export type ResolutionErrorKindType = (typeof ResolutionErrorKind)[keyof typeof ResolutionErrorKind];

export const TransferErrorKind = Object.freeze({
  NETWORK_ERROR: 'NETWORK_ERROR',
  DISK_FULL: 'DISK_FULL',
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  SERVER_REJECTED_RANGE: 'SERVER_REJECTED_RANGE',
  CORRUPT: 'CORRUPT',
} as const);

export type TransferErrorKindType = (typeof TransferErrorKind)[keyof typeof TransferErrorKind];

export const SchedulerErrorKind = Object.freeze({
  DESTINATION_UNWRITABLE: 'DESTINATION_UNWRITABLE',
  DUPLICATE_SUBMISSION: 'DUPLICATE_SUBMISSION',
  JOB_NOT_FOUND: 'JOB_NOT_FOUND',
  INVALID_TRANSITION: 'INVALID_TRANSITION',
} as const);

export type SchedulerErrorKindType = (typeof SchedulerErrorKind)[keyof typeof SchedulerErrorKind];

export const SystemErrorKind = Object.freeze({
  PERSISTENCE_CORRUPT: 'PERSISTENCE_CORRUPT',
} as const);

export type SystemErrorKindType = (typeof SystemErrorKind)[keyof typeof SystemErrorKind];

/** Base común: category + kind + detalle opcional (mensaje técnico de la causa). */
export abstract class DownloadManagerError extends Error {
  abstract readonly category: ErrorCategoryType;
  abstract readonly kind: string;
  readonly detail: string | null;

  constructor(message: string, detail: string | null = null, options?: { cause?: unknown }) {
    super(detail ? `${message}: ${detail}` : message, options);
    this.name = new.target.name;
    this.detail = detail;
  }

  /** Código estable para ServiceResponse.code, p. ej. "transfer.DISK_FULL". */
  get code(): string {
    return `${this.category}.${this.kind}`;
  }
}

export class ResolutionError extends DownloadManagerError {
  readonly category = ErrorCategory.RESOLUTION;
  readonly kind: ResolutionErrorKindType;

  constructor(kind: ResolutionErrorKindType, detail: string | null = null, options?: { cause?: unknown }) {
    super(ERRORS.RESOLUTION[kind] ?? kind, detail, options);
    this.kind = kind;
  }
}

export class TransferError extends DownloadManagerError {
  readonly category = ErrorCategory.TRANSFER;
  readonly kind: TransferErrorKindType;

  constructor(kind: TransferErrorKindType, detail: string | null = null, options?: { cause?: unknown }) {
    super(ERRORS.TRANSFER[kind] ?? kind, detail, options);
    this.kind = kind;
  }

  /** Solo los errores de red se reintentan automáticamente. */
  get retryable(): boolean {
    return this.kind === TransferErrorKind.NETWORK_ERROR;
  }
}

export class SchedulerError extends DownloadManagerError {
  readonly category = ErrorCategory.SCHEDULER;
  readonly kind: SchedulerErrorKindType;

  constructor(kind: SchedulerErrorKindType, detail: string | null = null, options?: { cause?: unknown }) {
    super(ERRORS.SCHEDULER[kind] ?? kind, detail, options);
    this.kind = kind;
  }
}

export class SystemError extends DownloadManagerError {
  readonly category = ErrorCategory.SYSTEM;
  readonly kind: SystemErrorKindType;

  constructor(kind: SystemErrorKindType, detail: string | null = null, options?: { cause?: unknown }) {
    super(ERRORS.SYSTEM[kind] ?? kind, detail, options);
    this.kind = kind;
  }
}

export function isDownloadManagerError(error: unknown): error is DownloadManagerError {
  return error instanceof DownloadManagerError;
}

/** Motivo legible para un job fallido. */
export function describeError(error: unknown): string {
  if (error instanceof DownloadManagerError) return error.message;
  if (error instanceof Error && error.message) return `${ERRORS.GENERAL.UNEXPECTED}: ${error.message}`;
  if (typeof error === 'string' && error) return error;
  return ERRORS.GENERAL.UNKNOWN;
}

const DISK_FULL_CODES = ['ENOSPC', 'EDQUOT', 'EFBIG'];
const PERMISSION_CODES = ['EACCES', 'EPERM', 'EROFS', 'EISDIR', 'ENOTDIR', 'ENAMETOOLONG'];

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Traduce un error cualquiera de la transferencia a TransferError.
 * Errores de disco (ENOSPC, EACCES, ENAMETOOLONG…) a su tipo; el resto se considera de red.
 */
export function classifyTransferError(error: unknown): TransferError {
  if (error instanceof TransferError) return error;
  const code = errnoCode(error);
  const message = error instanceof Error ? error.message : String(error);
  const detail = code ? `${code}: ${message}` : message;
  if (code && DISK_FULL_CODES.includes(code)) {
    return new TransferError(TransferErrorKind.DISK_FULL, detail, { cause: error });
  }
  if (code && PERMISSION_CODES.includes(code)) {
    return new TransferError(TransferErrorKind.PERMISSION_DENIED, detail, { cause: error });
  }
  return new TransferError(TransferErrorKind.NETWORK_ERROR, detail, { cause: error });
}
