/**
 * Orquestador del motor de descargas: dueño de la tabla de jobs.
 *
 * Coordina Scheduler (límite global y orden de admisión), el motor de transferencia
 * (ITransferEngine), la persistencia (IJobPersistence), el EventBus, SpeedTracker y
 * SessionManager. Todas las mutaciones de la tabla ocurren de forma síncrona dentro de
 * un método del motor, así que nunca hay dos a la vez ni lecturas a medias; hacia fuera
 * solo salen snapshots congelados.
 *
 * processQueue() admite jobs en cola mientras haya slots: comprueba que el destino sea
 * escribible (si no, el job falla sin ocupar slot), pasa a downloading y lanza un worker
 * (una llamada a transfer) con su TransferControl. Los callbacks de un worker cuya sesión
 * ya no es la actual (job cancelado) se ignoran.
 *
 * @module DownloadEngine
 */

import fs from 'fs';
import config from '../config';
import type { RetryBackoffConfig } from '../config';
import {
  logger,
  buildMediaFileName,
  fileNameBudget,
  fitFileName,
  checkDirectoryWritable,
  formatBytes,
  removeFileIfExists,
  resolveUniqueDestination,
  sanitizeFilename,
} from '../utils';
import { saveMetadata } from '../utils/metadata';
import type {
  JobSnapshot,
  MediaVariant,
  QueueSnapshot,
  QueueSummary,
} from '../../shared/types';
import { getStateOrder } from '../../shared/constants/queueStateOrder';
import { Job } from './Job';
import { isLiveState, isTerminalState } from './JobStateMachine';
import Scheduler from './Scheduler';
import { EventBus, type EngineEventListener, type Subscription, type SubscriptionFilter } from './EventBus';
import { SpeedTracker } from './SpeedTracker';
import { SessionManager } from './SessionManager';
import { TransferControl } from './TransferControl';
import { calculateBackoffDelay } from './DownloadValidator';
import {
  SchedulerError,
  SchedulerErrorKind,
  classifyTransferError,
  describeError,
} from './errors';
import {
  JobStatus,
  TransferOutcome,
  type DestinationChecker,
  type IJobPersistence,
  type ITransferEngine,
  type JobPriorityLevel,
  type JobStatusType,
  type TransferProgress,
  type TransferResult,
} from './types';

const log = logger.child('DownloadEngine');

/** Dependencias inyectables del motor (tests e instancias independientes). */
export interface DownloadEngineDeps {
  transferEngine: ITransferEngine;
  persistence?: IJobPersistence | null;
  eventBus?: EventBus;
  scheduler?: Scheduler;
  speedTracker?: SpeedTracker;
  sessionManager?: SessionManager;
  checkDestination?: DestinationChecker;
  maxRetries?: number;
  backoff?: RetryBackoffConfig;
  writeMetadata?: boolean;
  now?: () => number;
  random?: () => number;
}

export interface SubmitJobInput {
  sourceUrl: string;
  destinationDir: string;
  variant?: MediaVariant | null;
  /** Nombre de archivo deseado; la ruta final se desambigua con sufijo numérico. */
  fileName?: string;
  priority?: JobPriorityLevel;
}

interface ActiveTransfer {
  sessionId: string;
  control: TransferControl;
  /** Se pidió reanudar mientras la pausa aún no había terminado. */
  resumeRequested: boolean;
  promise: Promise<void>;
}

export class DownloadEngine {
  private readonly jobs = new Map<string, Job>();
  private readonly active = new Map<string, ActiveTransfer>();
  private readonly retryTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly pendingTasks = new Set<Promise<void>>();
  private readonly transferEngine: ITransferEngine;
  private readonly persistence: IJobPersistence | null;
  private readonly scheduler: Scheduler;
  private readonly speedTracker: SpeedTracker;
  private readonly sessions: SessionManager;
  private readonly checkDestination: DestinationChecker;
  private maxRetries: number;
  private readonly backoff: RetryBackoffConfig;
  private writeMetadata: boolean;
  private readonly now: () => number;
  private readonly random: () => number;
  readonly eventBus: EventBus;

  private nextEnqueueSeq = 1;
  private _stateVersion = 0;
  private _initialized = false;
  private _closed = false;

  constructor(deps: DownloadEngineDeps) {
    this.transferEngine = deps.transferEngine;
    this.persistence = deps.persistence ?? null;
    this.now = deps.now ?? Date.now;
    this.random = deps.random ?? Math.random;
    this.eventBus = deps.eventBus ?? new EventBus({ now: this.now });
    this.scheduler = deps.scheduler ?? new Scheduler();
    this.speedTracker = deps.speedTracker ?? new SpeedTracker(0.3, 0.1, this.now);
    this.sessions = deps.sessionManager ?? new SessionManager();
    this.checkDestination = deps.checkDestination ?? checkDirectoryWritable;
    this.maxRetries = deps.maxRetries ?? config.downloads.maxRetries;
    this.backoff = deps.backoff ?? config.downloads.backoff;
    this.writeMetadata = deps.writeMetadata ?? config.downloads.writeMetadata;
  }

  get stateVersion(): number {
    return this._stateVersion;
  }

  get maxConcurrency(): number {
    return this.scheduler.maxConcurrency;
  }

  get isClosed(): boolean {
    return this._closed;
  }

  /** Jobs en downloading (los que ocupan slot). */
  get activeCount(): number {
    let count = 0;
    for (const job of this.jobs.values()) {
      if (job.status === JobStatus.DOWNLOADING) count++;
    }
    return count;
  }

  // =====================
  // CICLO DE VIDA
  // =====================

  /**
   * Carga la tabla persistida. Los jobs que estaban descargando se restauran en pausa (el
   * parcial se verifica contra el disco al reanudar). Las filas dañadas se descartan.
   */
  initialize(): void {
    if (this._initialized) {
      log.warn('DownloadEngine ya está inicializado');
      return;
    }
    this._initialized = true;
    if (!this.persistence) return;

    const { jobs, dropped } = this.persistence.load();
    for (const { id, error } of dropped) {
      log.warn(`Job persistido descartado (${id}): ${error.message}`);
    }

    for (const snapshot of jobs) {
      const job = Job.fromSnapshot(snapshot);
      if (job.status === JobStatus.DOWNLOADING) {
        job.transition(JobStatus.PAUSED, this.now());
        this.persist(job);
        log.info(`Job ${job.id} restaurado en pausa (${formatBytes(job.bytesDownloaded)} en disco)`);
      }
      this.jobs.set(job.id, job);
      this.nextEnqueueSeq = Math.max(this.nextEnqueueSeq, job.enqueueSeq + 1);
    }
    this.bumpVersion();
    log.info(`DownloadEngine inicializado: ${this.jobs.size} jobs restaurados, ${dropped.length} descartados`);
    this.processQueue();
  }

  /**
   * Cierre ordenado: pausa las transferencias activas, espera a sus workers y a las
   * limpiezas pendientes, persiste y cierra bus y persistencia.
   */
  async shutdown(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    const end = logger.startOperation('Cierre del motor de descargas');

    for (const timer of this.retryTimers.values()) clearTimeout(timer);
    this.retryTimers.clear();

    for (const entry of this.active.values()) {
      entry.resumeRequested = false;
      entry.control.pause();
    }
    await this.whenIdle();

    for (const job of this.jobs.values()) this.persist(job);
    this.eventBus.clear();
    this.speedTracker.clear();
    this.sessions.clear();
    this.persistence?.close();
    end(`${this.jobs.size} jobs persistidos`);
  }

  /** Resuelve cuando no quedan workers ni limpiezas en curso. */
  async whenIdle(): Promise<void> {
    while (this.active.size > 0 || this.pendingTasks.size > 0) {
      await Promise.allSettled([
        ...[...this.active.values()].map(entry => entry.promise),
        ...this.pendingTasks,
      ]);
    }
  }

  // =====================
  // API DE ENVÍO Y CONTROL
  // =====================

  /**
   * Crea un job: queued si trae variante, resolving si no. Lanza DUPLICATE_SUBMISSION si
   * ya hay un job vivo con la misma URL y carpeta de destino.
   */
  submit(input: SubmitJobInput): JobSnapshot {
    this.assertOpen();
    const duplicate = [...this.jobs.values()].find(
      job =>
        isLiveState(job.status) &&
        job.sourceUrl === input.sourceUrl &&
        job.destinationDir === input.destinationDir
    );
    if (duplicate) {
      throw new SchedulerError(
        SchedulerErrorKind.DUPLICATE_SUBMISSION,
        `${input.sourceUrl} (job ${duplicate.id})`
      );
    }

    const now = this.now();
    const job = Job.create({
      sourceUrl: input.sourceUrl,
      destinationDir: input.destinationDir,
      priority: input.priority,
      enqueueSeq: this.nextEnqueueSeq++,
      now,
    });
    this.jobs.set(job.id, job);

    if (input.variant) {
      const destinationPath = this.reserveDestination(job, input.variant, input.fileName);
      job.assignVariant(input.variant, destinationPath, now);
      job.transition(JobStatus.QUEUED, now);
    }

    this.commit(job, null);
    log.info(`Job ${job.id} creado (${job.status}): ${job.sourceUrl}`);
    this.processQueue();
    return job.toSnapshot();
  }

  /**
   * Fija la variante elegida de un job en resolving y lo pasa a la cola. Con destinationDir
   * el job cambia de carpeta antes de reservar el nombre final.
   */
  assignVariant(
    jobId: string,
    variant: MediaVariant,
    fileName?: string,
    destinationDir?: string
  ): JobSnapshot {
    const job = this.requireJob(jobId);
    if (job.status !== JobStatus.RESOLVING) {
      throw new SchedulerError(
        SchedulerErrorKind.INVALID_TRANSITION,
        `${jobId}: ${job.status} → ${JobStatus.QUEUED}`
      );
    }
    const now = this.now();
    if (destinationDir && destinationDir !== job.destinationDir) {
      log.info(`Job ${job.id} se guarda en ${destinationDir}`);
      job.retarget(destinationDir, now);
    }
    job.assignVariant(variant, this.reserveDestination(job, variant, fileName), now);
    this.transitionOrThrow(job, JobStatus.QUEUED);
    this.processQueue();
    return job.toSnapshot();
  }

  /** Fallo de resolución: el job falla sin reintento automático. */
  failResolution(jobId: string, error: unknown): JobSnapshot | null {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== JobStatus.RESOLVING) return job?.toSnapshot() ?? null;
    const reason = describeError(error);
    job.recordError(reason, this.now());
    this.transitionOrThrow(job, JobStatus.FAILED, reason);
    log.warn(`Resolución fallida para ${job.id}: ${reason}`);
    return job.toSnapshot();
  }

  /**
   * Pausa. En cola pasa directamente a paused; descargando pide la pausa al worker y el
   * estado cambia cuando este devuelve el resultado (el parcial queda en disco).
   */
  pause(jobId: string): JobSnapshot {
    const job = this.requireJob(jobId);
    switch (job.status) {
      case JobStatus.PAUSED:
        return job.toSnapshot();
      case JobStatus.QUEUED:
        this.clearRetryTimer(job.id);
        this.transitionOrThrow(job, JobStatus.PAUSED);
        return job.toSnapshot();
      case JobStatus.DOWNLOADING: {
        const entry = this.active.get(job.id);
        if (entry) {
          entry.resumeRequested = false;
          entry.control.pause();
          log.info(`Pausa solicitada para ${job.id}`);
        }
        return job.toSnapshot();
      }
      default:
        throw new SchedulerError(
          SchedulerErrorKind.INVALID_TRANSITION,
          `${jobId}: ${job.status} → ${JobStatus.PAUSED}`
        );
    }
  }

  /** Reanuda: paused vuelve a la cola con el offset conservado. */
  resume(jobId: string): JobSnapshot {
    const job = this.requireJob(jobId);
    switch (job.status) {
      case JobStatus.QUEUED:
        return job.toSnapshot();
      case JobStatus.DOWNLOADING: {
        const entry = this.active.get(job.id);
        if (entry && entry.control.requested) entry.resumeRequested = true;
        return job.toSnapshot();
      }
      case JobStatus.PAUSED:
        job.enqueueSeq = this.nextEnqueueSeq++;
        this.transitionOrThrow(job, JobStatus.QUEUED);
        this.processQueue();
        return job.toSnapshot();
      default:
        throw new SchedulerError(
          SchedulerErrorKind.INVALID_TRANSITION,
          `${jobId}: ${job.status} → ${JobStatus.QUEUED}`
        );
    }
  }

  /**
   * Cancela de inmediato cualquier job no terminal. El slot se libera en el acto; el worker
   * (si lo hay) se detiene en el siguiente chunk y los archivos del job se borran.
   */
  cancel(jobId: string): JobSnapshot {
    const job = this.requireJob(jobId);
    if (isTerminalState(job.status)) {
      if (job.status === JobStatus.CANCELLED) return job.toSnapshot();
      throw new SchedulerError(
        SchedulerErrorKind.INVALID_TRANSITION,
        `${jobId}: ${job.status} → ${JobStatus.CANCELLED}`
      );
    }

    this.clearRetryTimer(job.id);
    const entry = this.active.get(job.id);
    this.sessions.invalidate(job.id);
    this.speedTracker.stopTracking(job.id);
    if (entry) entry.control.cancel();

    this.transitionOrThrow(job, JobStatus.CANCELLED);
    if (!entry) this.track(this.removeStaging(job));
    log.info(`Job ${job.id} cancelado`);
    this.processQueue();
    return job.toSnapshot();
  }

  /** Reintento explícito de un job fallido: incrementa retryCount y limpia lastError. */
  retry(jobId: string): JobSnapshot {
    const job = this.requireJob(jobId);
    if (job.status !== JobStatus.FAILED) {
      throw new SchedulerError(
        SchedulerErrorKind.INVALID_TRANSITION,
        `${jobId}: ${job.status} → ${JobStatus.QUEUED}`
      );
    }
    const now = this.now();
    job.incrementRetry(now);
    job.recordError(null, now);
    job.enqueueSeq = this.nextEnqueueSeq++;
    this.transitionOrThrow(job, JobStatus.QUEUED, 'retry');
    // Sin variante (falló la resolución) se vuelve a resolver
    if (!job.variant) this.transitionOrThrow(job, JobStatus.RESOLVING, 'retry');
    this.processQueue();
    return job.toSnapshot();
  }

  /** Quita de la tabla un job terminal (los completados conservan su archivo). */
  remove(jobId: string): void {
    const job = this.requireJob(jobId);
    if (!isTerminalState(job.status)) {
      throw new SchedulerError(
        SchedulerErrorKind.INVALID_TRANSITION,
        `${jobId}: ${job.status} no es terminal`
      );
    }
    if (job.status === JobStatus.FAILED) this.track(this.removeStaging(job));
    this.jobs.delete(job.id);
    this.persistence?.remove(job.id);
    this.eventBus.emitRemoved(job.id);
    this.bumpVersion();
    log.info(`Job ${job.id} eliminado`);
  }

  /** Cambia la prioridad de un job no terminal; afecta a la próxima admisión. */
  setPriority(jobId: string, priority: JobPriorityLevel): JobSnapshot {
    const job = this.requireJob(jobId);
    if (isTerminalState(job.status)) {
      throw new SchedulerError(
        SchedulerErrorKind.INVALID_TRANSITION,
        `${jobId}: ${job.status} no admite cambio de prioridad`
      );
    }
    if (job.priority !== priority) {
      job.priority = priority;
      this.persist(job);
      this.bumpVersion();
      this.processQueue();
    }
    return job.toSnapshot();
  }

  /** Ajustes de reintento y sidecar que pueden cambiar en caliente. */
  applySettings(options: { maxRetries?: number; writeMetadata?: boolean }): void {
    if (options.maxRetries !== undefined) this.maxRetries = options.maxRetries;
    if (options.writeMetadata !== undefined) this.writeMetadata = options.writeMetadata;
  }

  /** Cambia el límite global. Bajarlo no detiene descargas en curso. */
  setConcurrency(n: number): number {
    const effective = this.scheduler.setMaxConcurrency(n);
    this.bumpVersion();
    this.processQueue();
    return effective;
  }

  // =====================
  // LECTURA
  // =====================

  get(jobId: string): JobSnapshot | null {
    return this.jobs.get(jobId)?.toSnapshot() ?? null;
  }

  /** Jobs por orden de estado, luego prioridad y orden de encolado. */
  list(): JobSnapshot[] {
    return [...this.jobs.values()]
      .sort(
        (a, b) =>
          getStateOrder(a.status) - getStateOrder(b.status) ||
          b.priority - a.priority ||
          a.enqueueSeq - b.enqueueSeq
      )
      .map(job => job.toSnapshot());
  }

  snapshot(): QueueSnapshot {
    const jobs = this.list();
    const summary: QueueSummary = {
      queued: 0,
      resolving: 0,
      downloading: 0,
      paused: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
      total: jobs.length,
    };
    for (const job of jobs) summary[job.status]++;
    return Object.freeze({
      stateVersion: this._stateVersion,
      maxConcurrency: this.scheduler.maxConcurrency,
      jobs,
      summary,
    });
  }

  subscribe(filter: SubscriptionFilter = {}, listener: EngineEventListener | null = null): Subscription {
    return this.eventBus.subscribe(filter, listener);
  }

  // =====================
  // ADMISIÓN
  // =====================

  /** Admite jobs en cola mientras haya slots libres. */
  processQueue(): void {
    if (this._closed) return;
    const now = this.now();

    for (;;) {
      const candidates = [...this.jobs.values()].filter(
        job => job.isAdmissible(now) && job.variant != null && job.destinationPath != null
      );
      const next = this.scheduler.pickNext(candidates, this.activeCount);
      if (!next) break;

      const destination = this.checkDestination(next.destinationDir);
      if (!destination.writable) {
        const error = new SchedulerError(
          SchedulerErrorKind.DESTINATION_UNWRITABLE,
          destination.error ?? next.destinationDir
        );
        const reason = describeError(error);
        next.recordError(reason, now);
        this.transitionOrThrow(next, JobStatus.FAILED, reason);
        log.warn(`Admisión rechazada para ${next.id}: ${reason}`);
        continue;
      }
      this.admit(next);
    }
  }

  private admit(job: Job): void {
    const { variant, destinationPath } = job;
    if (!variant || !destinationPath) return;

    this.clearRetryTimer(job.id);
    this.transitionOrThrow(job, JobStatus.DOWNLOADING);

    const sessionId = this.sessions.createSession(job.id);
    const control = new TransferControl();
    this.speedTracker.startTracking(job.id, job.bytesDownloaded);
    log.info(
      `Admitido ${job.id} (${this.activeCount}/${this.scheduler.maxConcurrency}) desde ${formatBytes(job.bytesDownloaded)}`
    );

    const entry: ActiveTransfer = {
      sessionId,
      control,
      resumeRequested: false,
      promise: Promise.resolve(),
    };
    this.active.set(job.id, entry);

    entry.promise = this.transferEngine
      .transfer({
        descriptor: variant.fetchDescriptor,
        destinationPath,
        resumeOffset: job.bytesDownloaded,
        expectedTotal: job.bytesTotal,
        onProgress: progress => this.handleProgress(job.id, sessionId, progress),
        signal: control,
      })
      .then(
        result => this.handleTransferResult(job.id, sessionId, result),
        error => this.handleTransferError(job.id, sessionId, error)
      )
      .catch(error => log.error(`Error procesando el resultado de ${job.id}:`, error))
      .finally(() => {
        if (this.active.get(job.id)?.sessionId === sessionId) this.active.delete(job.id);
        this.processQueue();
      });
  }

  // =====================
  // CALLBACKS DEL WORKER
  // =====================

  private handleProgress(jobId: string, sessionId: string, progress: TransferProgress): void {
    if (!this.sessions.isCurrent(jobId, sessionId)) return;
    const job = this.jobs.get(jobId);
    if (!job || job.status !== JobStatus.DOWNLOADING) return;

    if (progress.restartedFromZero) {
      log.info(`Job ${jobId} reinicia desde cero`);
      this.speedTracker.startTracking(jobId, 0);
    }
    job.applyProgress(progress, this.now());
    const speed = this.speedTracker.update(jobId, job.bytesDownloaded, job.bytesTotal);
    this.persist(job);
    this.eventBus.emitProgress(jobId, {
      bytesDownloaded: job.bytesDownloaded,
      bytesTotal: job.bytesTotal,
      speedBytesPerSec: speed?.speedBytesPerSec ?? 0,
      remainingSeconds: speed?.remainingSeconds ?? null,
      restartedFromZero: progress.restartedFromZero,
    });
  }

  private handleTransferResult(jobId: string, sessionId: string, result: TransferResult): void {
    const job = this.jobs.get(jobId);
    if (!this.sessions.isCurrent(jobId, sessionId) || !job || job.status !== JobStatus.DOWNLOADING) {
      // Worker de un job cancelado: lo que haya dejado en disco sobra
      if (!job || job.status === JobStatus.CANCELLED) {
        if (result.outcome === TransferOutcome.COMPLETED) this.track(this.removeFile(result.finalPath));
        this.track(this.removeFile(result.stagingPath));
      }
      return;
    }

    this.sessions.invalidate(jobId);
    this.speedTracker.stopTracking(jobId);
    const entry = this.active.get(jobId);
    const now = this.now();
    job.applyProgress(
      {
        bytesDownloaded: result.bytesDownloaded,
        bytesTotal: result.bytesTotal,
        restartedFromZero: result.restartedFromZero,
      },
      now
    );

    switch (result.outcome) {
      case TransferOutcome.COMPLETED:
        if (result.finalPath !== job.destinationPath) job.relocate(result.finalPath, now);
        this.transitionOrThrow(job, JobStatus.COMPLETED);
        log.info(`Job ${jobId} completado: ${result.finalPath} (${formatBytes(result.bytesDownloaded)})`);
        if (this.writeMetadata) this.track(this.writeSidecar(job));
        break;
      case TransferOutcome.PAUSED:
        this.transitionOrThrow(job, JobStatus.PAUSED);
        log.info(`Job ${jobId} en pausa en ${formatBytes(result.resumeOffset)}`);
        if (entry?.resumeRequested && !this._closed) {
          job.enqueueSeq = this.nextEnqueueSeq++;
          this.transitionOrThrow(job, JobStatus.QUEUED);
        }
        break;
      case TransferOutcome.CANCELLED:
        this.transitionOrThrow(job, JobStatus.CANCELLED);
        break;
    }
  }

  /**
   * Error del worker. NETWORK_ERROR se reencola con backoff mientras retryCount < maxRetries;
   * el resto de errores (y la red tras agotar reintentos) dejan el job en failed.
   */
  private handleTransferError(jobId: string, sessionId: string, error: unknown): void {
    const job = this.jobs.get(jobId);
    if (!this.sessions.isCurrent(jobId, sessionId) || !job || job.status !== JobStatus.DOWNLOADING) {
      if (job?.status === JobStatus.CANCELLED) this.track(this.removeStaging(job));
      return;
    }

    this.sessions.invalidate(jobId);
    this.speedTracker.stopTracking(jobId);
    const transferError = classifyTransferError(error);
    const reason = describeError(transferError);
    const now = this.now();
    job.recordError(reason, now);

    if (transferError.retryable && job.retryCount < this.maxRetries && !this._closed) {
      const attempt = job.incrementRetry(now);
      const delay = calculateBackoffDelay(attempt - 1, this.backoff, this.random);
      this.transitionOrThrow(job, JobStatus.QUEUED, reason, () => job.deferUntil(now + delay));
      this.scheduleRetry(job.id, delay);
      log.warn(`Job ${jobId} reencolado (intento ${attempt}/${this.maxRetries}) en ${delay}ms: ${reason}`);
      return;
    }

    this.transitionOrThrow(job, JobStatus.FAILED, reason);
    log.error(`Job ${jobId} fallido: ${reason}`);
  }

  // =====================
  // INTERNOS
  // =====================

  private assertOpen(): void {
    if (this._closed) {
      throw new SchedulerError(SchedulerErrorKind.INVALID_TRANSITION, 'El motor está cerrado');
    }
  }

  private requireJob(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) throw new SchedulerError(SchedulerErrorKind.JOB_NOT_FOUND, jobId);
    return job;
  }

  /**
   * Aplica la transición, persiste y publica. beforeCommit permite ajustar el job tras la
   * transición y antes de que el snapshot salga hacia persistencia y observadores.
   */
  private transitionOrThrow(
    job: Job,
    to: JobStatusType,
    reason: string | null = null,
    beforeCommit?: () => void
  ): void {
    const from = job.transition(to, this.now());
    if (from == null) {
      throw new SchedulerError(SchedulerErrorKind.INVALID_TRANSITION, `${job.id}: ${job.status} → ${to}`);
    }
    beforeCommit?.();
    this.commit(job, from, reason);
  }

  private commit(job: Job, from: JobStatusType | null, reason: string | null = null): void {
    this.persist(job);
    this.bumpVersion();
    this.eventBus.emitStatusChanged(job.toSnapshot(), from, reason);
  }

  private persist(job: Job): void {
    if (!this.persistence) return;
    try {
      this.persistence.save(job.toSnapshot());
    } catch (error) {
      log.error(`No se pudo persistir el job ${job.id}:`, error);
    }
  }

  private bumpVersion(): void {
    this._stateVersion++;
  }

  /**
   * Ruta final libre para el job: no existe en disco (ni su staging) y ningún otro job la
   * tiene reservada.
   */
  private reserveDestination(job: Job, variant: MediaVariant, fileName?: string): string {
    const suffix = this.transferEngine.stagingSuffix;
    const reserved = new Set<string>();
    for (const other of this.jobs.values()) {
      if (other.id !== job.id && other.destinationPath && other.status !== JobStatus.CANCELLED) {
        reserved.add(other.destinationPath);
      }
    }
    const budget = fileNameBudget(suffix);
    const name = fileName
      ? fitFileName(sanitizeFilename(fileName), budget)
      : buildMediaFileName(variant.title, variant.formatId, variant.container, budget);
    return resolveUniqueDestination(
      job.destinationDir,
      name,
      candidate =>
        reserved.has(candidate) || fs.existsSync(candidate) || fs.existsSync(candidate + suffix)
    );
  }

  private scheduleRetry(jobId: string, delay: number): void {
    this.clearRetryTimer(jobId);
    const timer = setTimeout(() => {
      this.retryTimers.delete(jobId);
      this.processQueue();
    }, delay);
    this.retryTimers.set(jobId, timer);
  }

  private clearRetryTimer(jobId: string): void {
    const timer = this.retryTimers.get(jobId);
    if (timer) {
      clearTimeout(timer);
      this.retryTimers.delete(jobId);
    }
  }

  private track(task: Promise<void>): void {
    const tracked = task
      .catch(error => log.error('Tarea en segundo plano fallida:', error))
      .finally(() => this.pendingTasks.delete(tracked));
    this.pendingTasks.add(tracked);
  }

  private async removeFile(filePath: string): Promise<void> {
    await removeFileIfExists(filePath);
  }

  private async removeStaging(job: Job): Promise<void> {
    if (!job.destinationPath) return;
    await removeFileIfExists(job.destinationPath + this.transferEngine.stagingSuffix);
  }

  private async writeSidecar(job: Job): Promise<void> {
    const { variant, destinationPath } = job;
    if (!variant || !destinationPath) return;
    await saveMetadata(destinationPath, {
      sourceUrl: job.sourceUrl,
      title: variant.title ?? null,
      formatId: variant.formatId,
      container: variant.container,
      resolutionLabel: variant.resolutionLabel,
      mediaKind: variant.mediaKind,
      bytesTotal: job.bytesTotal,
      downloadedAt: this.now(),
    });
  }
}

export default DownloadEngine;
