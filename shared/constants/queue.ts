/**
 * Constantes de cola compartidas (estados y prioridad de los jobs).
 * @module shared/constants/queue
 *
 * Fuente única de verdad para los valores de estado y prioridad. El motor (Job, Scheduler,
 * DownloadEngine, StateStore) y cualquier capa de presentación deben importar desde aquí.
 */

/** Estados posibles de un job de descarga (valores persistidos, minúsculas). */
export const JobStatus = Object.freeze({
  QUEUED: 'queued',
  RESOLVING: 'resolving',
  DOWNLOADING: 'downloading',
  PAUSED: 'paused',
  COMPLETED: 'completed',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
} as const);

export type JobStatusType = (typeof JobStatus)[keyof typeof JobStatus];

export const JOB_STATUSES: readonly JobStatusType[] = Object.values(JobStatus);

/** Niveles de prioridad de un job en la cola (valor numérico para ordenamiento). */
export const JobPriority = Object.freeze({
  LOW: 0,
  NORMAL: 1,
  HIGH: 2,
} as const);

export type JobPriorityLevel = (typeof JobPriority)[keyof typeof JobPriority];

export const JOB_PRIORITIES: readonly JobPriorityLevel[] = [
  JobPriority.LOW,
  JobPriority.NORMAL,
  JobPriority.HIGH,
];

export function isJobStatus(value: unknown): value is JobStatusType {
  return typeof value === 'string' && (JOB_STATUSES as readonly string[]).includes(value);
}

export function isJobPriority(value: unknown): value is JobPriorityLevel {
  return typeof value === 'number' && (JOB_PRIORITIES as readonly number[]).includes(value);
}
