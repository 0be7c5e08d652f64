/**
 * Limita la frecuencia de actualizaciones de progreso: deja pasar una actualización si pasó
 * intervalMs desde la última emitida o si avanzaron bytesThreshold bytes. La actualización
 * final (flush) siempre se emite.
 *
 * @module engines/ProgressThrottle
 */

import config from '../config';
import type { ProgressSink, TransferProgress } from './types';

export interface ProgressThrottleOptions {
  intervalMs?: number;
  bytesThreshold?: number;
  now?: () => number;
}

export class ProgressThrottle {
  private readonly sink: ProgressSink;
  private readonly intervalMs: number;
  private readonly bytesThreshold: number;
  private readonly now: () => number;
  private lastEmitTime = -Infinity;
  private lastEmitBytes = 0;
  private pending: TransferProgress | null = null;
  private restartPending = false;

  constructor(sink: ProgressSink, options: ProgressThrottleOptions = {}) {
    this.sink = sink;
    this.intervalMs = options.intervalMs ?? config.downloads.progressUpdateInterval;
    this.bytesThreshold = options.bytesThreshold ?? config.downloads.progressBytesThreshold;
    this.now = options.now ?? Date.now;
  }

  /** Registra progreso; lo emite si supera el umbral de tiempo o de bytes. */
  update(progress: TransferProgress): boolean {
    // Un reinicio desde cero debe llegar al job aunque la siguiente actualización se limite
    if (progress.restartedFromZero) this.restartPending = true;
    this.pending = progress;
    const now = this.now();
    const elapsed = now - this.lastEmitTime;
    const advanced = Math.abs(progress.bytesDownloaded - this.lastEmitBytes);
    if (progress.restartedFromZero || elapsed >= this.intervalMs || advanced >= this.bytesThreshold) {
      this.emit(now);
      return true;
    }
    return false;
  }

  /** Emite la última actualización registrada sin limitar (salida de la transferencia). */
  flush(final?: TransferProgress): void {
    if (final) this.pending = final;
    if (!this.pending) return;
    this.emit(this.now());
  }

  private emit(now: number): void {
    if (!this.pending) return;
    const progress: TransferProgress = {
      ...this.pending,
      restartedFromZero: this.pending.restartedFromZero || this.restartPending,
    };
    this.restartPending = false;
    this.pending = null;
    this.lastEmitTime = now;
    this.lastEmitBytes = progress.bytesDownloaded;
    this.sink(progress);
  }
}

export default ProgressThrottle;
