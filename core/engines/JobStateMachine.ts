/**
 * Máquina de estados explícita para jobs de descarga.
 *
 * Define las transiciones permitidas desde cada estado; cualquier transición no listada
 * es inválida. Los side-effects (liberar slot, borrar staging, persistir offset) los
 * ejecuta el DownloadEngine al aplicar la transición sobre el Job.
 *
 * @module JobStateMachine
 */

import { JobStatus, type JobStatusType } from './types';

/**
 * Transiciones permitidas: desde cada estado, lista de estados destino válidos.
 * - downloading → queued: reencolado automático tras error de red con reintentos disponibles.
 * - failed → queued: reintento explícito del usuario.
 * - completed y cancelled no tienen salida (solo eliminación).
 */
const TRANSITIONS: Record<JobStatusType, readonly JobStatusType[]> = {
  [JobStatus.QUEUED]: [
    JobStatus.RESOLVING,
    JobStatus.DOWNLOADING,
    JobStatus.PAUSED,
    JobStatus.FAILED,
    JobStatus.CANCELLED,
  ],
  [JobStatus.RESOLVING]: [JobStatus.QUEUED, JobStatus.FAILED, JobStatus.CANCELLED],
  [JobStatus.DOWNLOADING]: [
    JobStatus.COMPLETED,
    JobStatus.PAUSED,
    JobStatus.FAILED,
    JobStatus.QUEUED,
    JobStatus.CANCELLED,
  ],
  [JobStatus.PAUSED]: [JobStatus.QUEUED, JobStatus.CANCELLED],
  [JobStatus.COMPLETED]: [],
  [JobStatus.FAILED]: [JobStatus.QUEUED],
  [JobStatus.CANCELLED]: [],
};

export function canTransition(from: JobStatusType, to: JobStatusType): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Estados terminales: solo admiten reintento explícito (failed) o eliminación. */
export const TERMINAL_STATES: readonly JobStatusType[] = [
  JobStatus.COMPLETED,
  JobStatus.FAILED,
  JobStatus.CANCELLED,
];

export function isTerminalState(state: JobStatusType): boolean {
  return TERMINAL_STATES.includes(state);
}

/** Estados en los que el job sigue vivo en la cola (cuentan para duplicados y nombres reservados). */
export function isLiveState(state: JobStatusType): boolean {
  return !isTerminalState(state);
}
