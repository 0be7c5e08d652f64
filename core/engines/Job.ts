/**
 * Job: una descarga pedida por el usuario (una URL, una variante elegida).
 *
 * Encapsula el estado y los contadores de progreso y hace cumplir sus invariantes:
 * las transiciones pasan por JobStateMachine, bytesDownloaded no decrece salvo reinicio
 * explícito desde cero y bytesTotal, una vez conocido, no cambia. Solo el DownloadEngine
 * (dueño de la tabla de jobs) muta instancias; hacia fuera solo salen snapshots congelados.
 *
 * @module engines/Job
 */

import { randomUUID } from 'crypto';
import type { JobSnapshot, MediaVariant } from '../../shared/types';
import { canTransition } from './JobStateMachine';
import {
  JobPriority,
  JobStatus,
  type JobPriorityLevel,
  type JobStatusType,
  type TransferProgress,
} from './types';

export interface CreateJobInput {
  sourceUrl: string;
  destinationDir: string;
  variant?: MediaVariant | null;
  destinationPath?: string | null;
  priority?: JobPriorityLevel;
  enqueueSeq: number;
  now: number;
}

export class Job {
  readonly id: string;
  readonly sourceUrl: string;
  readonly createdAt: number;
  priority: JobPriorityLevel;
  enqueueSeq: number;

  private _status: JobStatusType;
  private _variant: MediaVariant | null;
  private _destinationDir: string;
  private _destinationPath: string | null;
  private _bytesDownloaded = 0;
  private _bytesTotal: number | null = null;
  private _updatedAt: number;
  private _retryCount = 0;
  private _lastError: string | null = null;
  private _retryAt: number | null = null;

  private constructor(id: string, input: CreateJobInput, status: JobStatusType) {
    this.id = id;
    this.sourceUrl = input.sourceUrl;
    this._destinationDir = input.destinationDir;
    this.createdAt = input.now;
    this._updatedAt = input.now;
    this.priority = input.priority ?? JobPriority.NORMAL;
    this.enqueueSeq = input.enqueueSeq;
    this._status = status;
    this._variant = input.variant ?? null;
    this._destinationPath = input.destinationPath ?? null;
  }

  /** Nuevo job: queued si ya trae variante, resolving si falta elegirla. */
  static create(input: CreateJobInput): Job {
    const status = input.variant ? JobStatus.QUEUED : JobStatus.RESOLVING;
    return new Job(randomUUID(), input, status);
  }

  /** Reconstruye un job persistido (restauración al arrancar). */
  static fromSnapshot(snapshot: JobSnapshot): Job {
    const job = new Job(
      snapshot.id,
      {
        sourceUrl: snapshot.sourceUrl,
        destinationDir: snapshot.destinationDir,
        variant: snapshot.selectedVariant,
        destinationPath: snapshot.destinationPath,
        priority: snapshot.priority,
        enqueueSeq: snapshot.enqueueSeq,
        now: snapshot.createdAt,
      },
      snapshot.status
    );
    job._bytesDownloaded = snapshot.bytesDownloaded;
    job._bytesTotal = snapshot.bytesTotal;
    job._updatedAt = snapshot.updatedAt;
    job._retryCount = snapshot.retryCount;
    job._lastError = snapshot.lastError;
    job._retryAt = snapshot.retryAt;
    return job;
  }

  get status(): JobStatusType {
    return this._status;
  }

  get variant(): MediaVariant | null {
    return this._variant;
  }

  get destinationDir(): string {
    return this._destinationDir;
  }

  get destinationPath(): string | null {
    return this._destinationPath;
  }

  get bytesDownloaded(): number {
    return this._bytesDownloaded;
  }

  get bytesTotal(): number | null {
    return this._bytesTotal;
  }

  get retryCount(): number {
    return this._retryCount;
  }

  get lastError(): string | null {
    return this._lastError;
  }

  get retryAt(): number | null {
    return this._retryAt;
  }

  get updatedAt(): number {
    return this._updatedAt;
  }

  canTransitionTo(to: JobStatusType): boolean {
    return canTransition(this._status, to);
  }

  /** Aplica la transición si la máquina de estados la permite. Devuelve el estado anterior o null. */
  transition(to: JobStatusType, now: number): JobStatusType | null {
    if (!canTransition(this._status, to)) return null;
    const from = this._status;
    this._status = to;
    this._updatedAt = now;
    if (to !== JobStatus.QUEUED) this._retryAt = null;
    return from;
  }

  /** Fija variante y ruta final (al terminar la resolución). Solo mientras no hay bytes. */
  assignVariant(variant: MediaVariant, destinationPath: string, now: number): void {
    if (this._variant && this._variant.formatId !== variant.formatId) {
      this.restartFromZero(now);
      this._bytesTotal = null;
    }
    this._variant = variant;
    this._destinationPath = destinationPath;
    this._updatedAt = now;
  }

  /** Cambia la carpeta de destino mientras el job aún no tiene ruta final. */
  retarget(destinationDir: string, now: number): void {
    this._destinationDir = destinationDir;
    this._updatedAt = now;
  }

  /** Nueva ruta final cuando el nombre reservado quedó ocupado al completar. */
  relocate(destinationPath: string, now: number): void {
    this._destinationPath = destinationPath;
    this._updatedAt = now;
  }

  /**
   * Aplica progreso del motor de transferencia. Sin reinicio, los bytes solo avanzan.
   * Devuelve true si algo cambió.
   */
  applyProgress(progress: TransferProgress, now: number): boolean {
    let changed = false;
    if (progress.restartedFromZero) {
      this._bytesDownloaded = Math.max(0, progress.bytesDownloaded);
      changed = true;
    } else if (progress.bytesDownloaded > this._bytesDownloaded) {
      this._bytesDownloaded = progress.bytesDownloaded;
      changed = true;
    }
    if (progress.bytesTotal != null && this._bytesTotal == null) {
      this._bytesTotal = progress.bytesTotal;
      changed = true;
    }
    if (changed) this._updatedAt = now;
    return changed;
  }

  /** Reinicio explícito desde cero (parcial descartado o variante distinta). */
  restartFromZero(now: number): void {
    this._bytesDownloaded = 0;
    this._updatedAt = now;
  }

  recordError(reason: string | null, now: number): void {
    this._lastError = reason;
    this._updatedAt = now;
  }

  incrementRetry(now: number): number {
    this._retryCount++;
    this._updatedAt = now;
    return this._retryCount;
  }

  /** Marca el job como reencolado con backoff: no es admisible antes de retryAt. */
  deferUntil(retryAt: number | null): void {
    this._retryAt = retryAt;
  }

  isAdmissible(now: number): boolean {
    return this._status === JobStatus.QUEUED && (this._retryAt == null || this._retryAt <= now);
  }

  toSnapshot(): JobSnapshot {
    return Object.freeze({
      id: this.id,
      sourceUrl: this.sourceUrl,
      selectedVariant: this._variant,
      destinationDir: this.destinationDir,
      destinationPath: this._destinationPath,
      status: this._status,
      bytesDownloaded: this._bytesDownloaded,
      bytesTotal: this._bytesTotal,
      createdAt: this.createdAt,
      updatedAt: this._updatedAt,
      retryCount: this._retryCount,
      lastError: this._lastError,
      priority: this.priority,
      enqueueSeq: this.enqueueSeq,
      retryAt: this._retryAt,
    });
  }
}
