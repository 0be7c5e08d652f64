/**
 * Planificador de la cola: decide cuántos jobs pueden estar descargando y cuáles admitir.
 *
 * Respeta maxConcurrency (global). El orden de admisión es prioridad descendente y, a igual
 * prioridad, orden de encolado (FIFO); el desempate usa enqueueSeq, que es único y
 * monótono, así que el orden es estable y determinista. Bajar el límite no interrumpe
 * descargas en curso: solo bloquea nuevas admisiones hasta que el conteo baje.
 *
 * @module Scheduler
 */

import { logger } from '../utils';
import config from '../config';
import type { JobPriorityLevel } from './types';

const _log = logger.child('Scheduler');

/** Lo mínimo que el scheduler necesita de un job para ordenarlo. */
export interface AdmissionCandidate {
  id: string;
  priority: JobPriorityLevel;
  enqueueSeq: number;
}

/** Resultado de canAdmit: si hay slot, motivo de denegación y slots libres. */
export interface CanAdmitResult {
  canStart: boolean;
  reason?: string;
  slotsAvailable: number;
}

export interface SchedulerOptions {
  maxConcurrency?: number;
  minConcurrency?: number;
  maxConcurrencyLimit?: number;
}

/** Comparador de admisión: prioridad alta primero, luego el más antiguo en la cola. */
export function compareForAdmission(a: AdmissionCandidate, b: AdmissionCandidate): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  return a.enqueueSeq - b.enqueueSeq;
}

export default class Scheduler {
  private _maxConcurrency: number;
  private readonly minConcurrency: number;
  private readonly maxConcurrencyLimit: number;

  constructor(options: SchedulerOptions = {}) {
    this.minConcurrency = options.minConcurrency ?? config.downloads.minConcurrency;
    this.maxConcurrencyLimit = options.maxConcurrencyLimit ?? config.downloads.maxConcurrencyLimit;
    this._maxConcurrency = this.clamp(options.maxConcurrency ?? config.downloads.maxConcurrency);
  }

  get maxConcurrency(): number {
    return this._maxConcurrency;
  }

  private clamp(n: number): number {
    const value = Number.isFinite(n) ? Math.floor(n) : config.downloads.maxConcurrency;
    return Math.min(this.maxConcurrencyLimit, Math.max(this.minConcurrency, value));
  }

  /** Actualiza el límite global (clamped). Devuelve el valor efectivo. */
  setMaxConcurrency(n: number): number {
    const previous = this._maxConcurrency;
    this._maxConcurrency = this.clamp(n);
    if (previous !== this._maxConcurrency) {
      _log.info(`Scheduler: maxConcurrency ${previous} → ${this._maxConcurrency}`);
    }
    return this._maxConcurrency;
  }

  canAdmit(currentActiveCount: number): CanAdmitResult {
    if (currentActiveCount >= this._maxConcurrency) {
      return {
        canStart: false,
        reason: 'Límite global de descargas alcanzado',
        slotsAvailable: 0,
      };
    }
    return { canStart: true, slotsAvailable: this._maxConcurrency - currentActiveCount };
  }

  /** Siguiente candidato a admitir, o null si no hay slot o la cola está vacía. */
  pickNext<T extends AdmissionCandidate>(
    candidates: readonly T[],
    currentActiveCount: number
  ): T | null {
    if (candidates.length === 0) return null;
    if (!this.canAdmit(currentActiveCount).canStart) return null;
    let best = candidates[0];
    for (let i = 1; i < candidates.length; i++) {
      if (compareForAdmission(candidates[i], best) < 0) best = candidates[i];
    }
    return best;
  }
}
