/**
 * Tipos y constantes compartidos por el motor de descargas.
 *
 * Define los contratos que el DownloadEngine necesita de sus colaboradores: el motor de
 * transferencia (ITransferEngine), la persistencia de la cola (IJobPersistence) y la
 * comprobación de destino en la admisión. Así se pueden inyectar dobles en tests.
 *
 * @module engines/types
 */

import type { FetchDescriptor, JobSnapshot } from '../../shared/types';
import type { TransferSignal } from './TransferControl';
import type { SystemError } from './errors';

export {
  JobStatus,
  JobPriority,
  type JobStatusType,
  type JobPriorityLevel,
} from '../../shared/constants/queue';

/** Modo de interrupción cooperativa: pausa conserva el parcial, cancelación lo borra. */
export const CancelMode = Object.freeze({
  PAUSE: 'pause',
  CANCEL: 'cancel',
} as const);

export type CancelModeType = (typeof CancelMode)[keyof typeof CancelMode];

export const TransferOutcome = Object.freeze({
  COMPLETED: 'completed',
  PAUSED: 'paused',
  CANCELLED: 'cancelled',
} as const);

export type TransferOutcomeType = (typeof TransferOutcome)[keyof typeof TransferOutcome];

/** Actualización de progreso que el motor de transferencia entrega al job. */
export interface TransferProgress {
  bytesDownloaded: number;
  bytesTotal: number | null;
  /** true en la primera actualización tras descartar el parcial y empezar de cero. */
  restartedFromZero: boolean;
}

export type ProgressSink = (_progress: TransferProgress) => void;

export interface TransferRequest {
  descriptor: FetchDescriptor;
  destinationPath: string;
  resumeOffset: number;
  /** Tamaño ya conocido por el job; si el servidor anuncia otro, el parcial no es válido. */
  expectedTotal: number | null;
  onProgress: ProgressSink;
  signal: TransferSignal;
}

export interface TransferResult {
  outcome: TransferOutcomeType;
  bytesDownloaded: number;
  bytesTotal: number | null;
  /** Offset desde el que se puede reanudar (igual a bytesDownloaded en pausa). */
  resumeOffset: number;
  restartedFromZero: boolean;
  stagingPath: string;
  /** Ruta final del archivo; difiere de destinationPath si apareció otro archivo con ese nombre. */
  finalPath: string;
}

/** Motor de transferencia: descarga un descriptor a destinationPath (vía archivo staging). */
export interface ITransferEngine {
  readonly stagingSuffix: string;
  transfer(_request: TransferRequest): Promise<TransferResult>;
}

export interface DroppedPersistedJob {
  id: string;
  error: SystemError;
}

export interface PersistenceLoadResult {
  jobs: JobSnapshot[];
  dropped: DroppedPersistedJob[];
}

/** Adaptador de persistencia de la tabla de jobs. */
export interface IJobPersistence {
  load(): PersistenceLoadResult;
  save(_job: JobSnapshot): void;
  remove(_jobId: string): void;
  close(): void;
}

export interface DestinationCheck {
  writable: boolean;
  error?: string;
}

export type DestinationChecker = (_dir: string) => DestinationCheck;
