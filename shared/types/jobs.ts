/**
 * @fileoverview Tipos de jobs, variantes y eventos compartidos entre el núcleo y sus observadores.
 * @module shared/types/jobs
 */

import type { JobPriorityLevel, JobStatusType } from '../constants/queue';

export type MediaKind = 'video' | 'audio' | 'photo';

/**
 * Descriptor opaco para obtener los bytes de una variante: URL directa más cabeceras
 * y cookies que la plataforma exige.
 */
export interface FetchDescriptor {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly cookies?: string;
}

/** Variante seleccionable (calidad/formato) de un medio. Inmutable una vez producida por el resolver. */
export interface MediaVariant {
  readonly sourceUrl: string;
  readonly formatId: string;
  readonly container: string;
  readonly resolutionLabel: string;
  readonly estimatedSizeBytes: number | null;
  readonly fetchDescriptor: FetchDescriptor;
  readonly mediaKind: MediaKind;
  readonly title?: string;
  readonly width?: number;
  readonly height?: number;
}

/** Vista de solo lectura de un job (lo que devuelven get/list/snapshot). */
export interface JobSnapshot {
  readonly id: string;
  readonly sourceUrl: string;
  readonly selectedVariant: MediaVariant | null;
  readonly destinationDir: string;
  readonly destinationPath: string | null;
  readonly status: JobStatusType;
  readonly bytesDownloaded: number;
  readonly bytesTotal: number | null;
  readonly createdAt: number;
  readonly updatedAt: number;
  readonly retryCount: number;
  readonly lastError: string | null;
  readonly priority: JobPriorityLevel;
  readonly enqueueSeq: number;
  readonly retryAt: number | null;
}

export interface QueueSummary {
  queued: number;
  resolving: number;
  downloading: number;
  paused: number;
  completed: number;
  failed: number;
  cancelled: number;
  total: number;
}

export interface QueueSnapshot {
  readonly stateVersion: number;
  readonly maxConcurrency: number;
  readonly jobs: readonly JobSnapshot[];
  readonly summary: QueueSummary;
}

export interface JobStatusChangedEvent {
  readonly type: 'statusChanged';
  readonly jobId: string;
  readonly from: JobStatusType | null;
  readonly to: JobStatusType;
  readonly reason: string | null;
  readonly job: JobSnapshot;
  readonly timestamp: number;
}

export interface JobProgressEvent {
  readonly type: 'progress';
  readonly jobId: string;
  readonly bytesDownloaded: number;
  readonly bytesTotal: number | null;
  readonly speedBytesPerSec: number;
  readonly remainingSeconds: number | null;
  readonly restartedFromZero: boolean;
  readonly timestamp: number;
}

export interface JobRemovedEvent {
  readonly type: 'removed';
  readonly jobId: string;
  readonly timestamp: number;
}

export type EngineEvent = JobStatusChangedEvent | JobProgressEvent | JobRemovedEvent;
