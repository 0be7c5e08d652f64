/**
 * Orden de estados de la cola (única fuente de verdad para listados y snapshots).
 * Valores menores = aparecen antes en la lista ordenada.
 *
 * @module shared/constants/queueStateOrder
 */

import { isJobStatus, type JobStatusType } from './queue';

/** Mapa estado → orden numérico (downloading primero, completed al final). */
export const STATE_ORDER: Record<JobStatusType, number> = {
  downloading: 0,
  resolving: 1,
  queued: 2,
  paused: 3,
  failed: 4,
  cancelled: 5,
  completed: 6,
};

/**
 * Devuelve el orden numérico de un estado. Estados desconocidos devuelven 99.
 */
export function getStateOrder(state: string | undefined): number {
  if (!state) return 99;
  const key = state.toLowerCase();
  return isJobStatus(key) ? STATE_ORDER[key] : 99;
}
