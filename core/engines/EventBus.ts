/**
 * Bus de eventos entre el motor de descargas y sus observadores (UI, logger, tests).
 *
 * Publica: statusChanged (cada transición de un job), progress (actualizaciones ya
 * limitadas por el motor de transferencia) y removed. La publicación nunca bloquea al
 * publicador: cada suscripción tiene su propio buffer acotado y se entrega en diferido
 * (setImmediate en modo listener, pull en modo iterador). Si un buffer se desborda se
 * descartan primero los eventos de progreso más antiguos; los de transición nunca.
 * El último progreso de cada job queda siempre disponible vía snapshot().
 *
 * @module EventBus
 */

import type { EngineEvent, JobProgressEvent, JobSnapshot } from '../../shared/types';
import type { JobStatusType } from './types';
import config from '../config';
import { logger } from '../utils';

const log = logger.child('EventBus');

export interface SubscriptionFilter {
  /** Solo eventos de este job. */
  jobId?: string;
  /** Solo estos tipos de evento. */
  types?: readonly EngineEvent['type'][];
}

export type EngineEventListener = (_event: EngineEvent) => void;

export interface ProgressPayload {
  bytesDownloaded: number;
  bytesTotal: number | null;
  speedBytesPerSec: number;
  remainingSeconds: number | null;
  restartedFromZero: boolean;
}

/**
 * Suscripción con buffer propio. Se consume con un listener (push diferido) o con
 * `for await` (pull). Ordena los eventos como se publicaron.
 */
export class Subscription implements AsyncIterable<EngineEvent> {
  readonly id: number;
  private readonly filter: SubscriptionFilter;
  private readonly capacity: number;
  private readonly listener: EngineEventListener | null;
  private readonly onClose: (_sub: Subscription) => void;
  private buffer: EngineEvent[] = [];
  private waiters: Array<(_result: IteratorResult<EngineEvent>) => void> = [];
  private drainScheduled = false;
  private _closed = false;
  private _dropped = 0;

  constructor(
    id: number,
    filter: SubscriptionFilter,
    capacity: number,
    listener: EngineEventListener | null,
    onClose: (_sub: Subscription) => void
  ) {
    this.id = id;
    this.filter = filter;
    this.capacity = Math.max(1, capacity);
    this.listener = listener;
    this.onClose = onClose;
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Eventos de progreso descartados por desbordamiento. */
  get dropped(): number {
    return this._dropped;
  }

  /** Eventos pendientes de entregar. */
  get pending(): number {
    return this.buffer.length;
  }

  matches(event: EngineEvent): boolean {
    if (this.filter.jobId && event.jobId !== this.filter.jobId) return false;
    if (this.filter.types && !this.filter.types.includes(event.type)) return false;
    return true;
  }

  /** Encola un evento (lo llama EventBus.publish). */
  push(event: EngineEvent): void {
    if (this._closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: event, done: false });
      return;
    }

    this.buffer.push(event);
    while (this.buffer.length > this.capacity) {
      const idx = this.buffer.findIndex(e => e.type === 'progress');
      if (idx === -1) break;
      this.buffer.splice(idx, 1);
      this._dropped++;
    }

    if (this.listener) this.scheduleDrain();
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    setImmediate(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    if (!this.listener) return;
    const events = this.buffer;
    this.buffer = [];
    for (const event of events) {
      if (this._closed) return;
      try {
        this.listener(event);
      } catch (error) {
        log.error(`Listener de la suscripción ${this.id} lanzó un error:`, error);
      }
    }
  }

  next(): Promise<IteratorResult<EngineEvent>> {
    const event = this.buffer.shift();
    if (event) return Promise.resolve({ value: event, done: false });
    if (this._closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise(resolve => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<EngineEvent> {
    return {
      next: () => this.next(),
      return: async (): Promise<IteratorResult<EngineEvent>> => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.buffer = [];
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
    this.onClose(this);
  }
}

export interface EventBusOptions {
  bufferSize?: number;
  now?: () => number;
}

export class EventBus {
  private readonly subscriptions = new Set<Subscription>();
  private readonly latestProgress = new Map<string, JobProgressEvent>();
  private readonly bufferSize: number;
  private readonly now: () => number;
  private nextId = 1;

  constructor(options: EventBusOptions = {}) {
    this.bufferSize = options.bufferSize ?? config.events.subscriberBufferSize;
    this.now = options.now ?? Date.now;
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  subscribe(filter: SubscriptionFilter = {}, listener: EngineEventListener | null = null): Subscription {
    const sub = new Subscription(this.nextId++, filter, this.bufferSize, listener, s =>
      this.subscriptions.delete(s)
    );
    this.subscriptions.add(sub);
    return sub;
  }

  publish(event: EngineEvent): void {
    if (event.type === 'progress') {
      this.latestProgress.set(event.jobId, event);
    } else if (event.type === 'removed') {
      this.latestProgress.delete(event.jobId);
    }
    for (const sub of this.subscriptions) {
      if (sub.matches(event)) sub.push(event);
    }
  }

  emitStatusChanged(job: JobSnapshot, from: JobStatusType | null, reason: string | null = null): void {
    this.publish({
      type: 'statusChanged',
      jobId: job.id,
      from,
      to: job.status,
      reason,
      job,
      timestamp: this.now(),
    });
  }

  emitProgress(jobId: string, progress: ProgressPayload): void {
    this.publish({
      type: 'progress',
      jobId,
      ...progress,
      timestamp: this.now(),
    });
  }

  emitRemoved(jobId: string): void {
    this.publish({ type: 'removed', jobId, timestamp: this.now() });
  }

  /** Último progreso publicado para el job (aunque se haya descartado de algún buffer). */
  snapshot(jobId: string): JobProgressEvent | null {
    return this.latestProgress.get(jobId) ?? null;
  }

  /** Cierra todas las suscripciones (usado en el cierre del motor). */
  clear(): void {
    for (const sub of [...this.subscriptions]) {
      sub.close();
    }
    this.subscriptions.clear();
    this.latestProgress.clear();
  }
}

export default EventBus;
