/**
 * Velocidad de descarga y ETA por job usando media móvil exponencial (EMA).
 *
 * startTracking inicia la sesión (una por admisión); update() recibe bytes descargados y total
 * y devuelve speedBytesPerSec y remainingSeconds. stopTracking limpia la entrada.
 *
 * @module engines/SpeedTracker
 */

export interface SpeedTrackerEntry {
  sessionStartTime: number;
  sessionDownloaded: number;
  lastUpdate: number;
  lastDownloaded: number;
  emaSpeed: number;
  emaRemainingSeconds: number | null;
}

export interface SpeedUpdateResult {
  speedBytesPerSec: number;
  remainingSeconds: number | null;
}

export class SpeedTracker {
  private trackers = new Map<string, SpeedTrackerEntry>();
  private readonly alpha: number;
  private readonly minTimeDelta: number;
  private readonly now: () => number;

  constructor(alpha = 0.3, minTimeDelta = 0.1, now: () => number = Date.now) {
    this.alpha = alpha;
    this.minTimeDelta = minTimeDelta;
    this.now = now;
  }

  /**
   * Inicia (o reinicia) el tracking. Al reanudar, initialDownloadedBytes evita que el primer
   * cálculo cuente todo el histórico como incremento.
   */
  startTracking(jobId: string, initialDownloadedBytes = 0): void {
    const now = this.now();
    this.trackers.set(jobId, {
      sessionStartTime: now,
      sessionDownloaded: 0,
      lastUpdate: now,
      lastDownloaded: Math.max(0, initialDownloadedBytes),
      emaSpeed: 0,
      emaRemainingSeconds: null,
    });
  }

  isTracking(jobId: string): boolean {
    return this.trackers.has(jobId);
  }

  update(jobId: string, downloadedBytes: number, totalBytes: number | null): SpeedUpdateResult | null {
    const tracker = this.trackers.get(jobId);
    if (!tracker) return null;

    const now = this.now();
    const timeDelta = (now - tracker.lastUpdate) / 1000;
    const bytesDelta = downloadedBytes - tracker.lastDownloaded;

    if (bytesDelta < 0) {
      // Reinicio desde cero: se descarta la historia de la sesión
      tracker.lastDownloaded = downloadedBytes;
      tracker.lastUpdate = now;
      tracker.emaSpeed = 0;
      tracker.emaRemainingSeconds = null;
      return { speedBytesPerSec: 0, remainingSeconds: null };
    }

    let instantSpeed = 0;
    if (timeDelta >= this.minTimeDelta) {
      instantSpeed = bytesDelta / timeDelta;
      tracker.lastUpdate = now;
      tracker.lastDownloaded = downloadedBytes;
      tracker.sessionDownloaded += bytesDelta;
    }

    let speedBytesPerSec = tracker.emaSpeed;
    if (instantSpeed > 0) {
      tracker.emaSpeed =
        tracker.emaSpeed === 0
          ? instantSpeed
          : this.alpha * instantSpeed + (1 - this.alpha) * tracker.emaSpeed;
      speedBytesPerSec = tracker.emaSpeed;
    } else if (tracker.emaSpeed === 0) {
      const totalElapsed = (now - tracker.sessionStartTime) / 1000;
      if (totalElapsed >= this.minTimeDelta && tracker.sessionDownloaded > 0) {
        speedBytesPerSec = tracker.sessionDownloaded / totalElapsed;
        tracker.emaSpeed = speedBytesPerSec;
      }
    }

    let remainingSeconds: number | null = null;
    const remainingBytes = totalBytes != null ? totalBytes - downloadedBytes : null;
    if (remainingBytes != null && remainingBytes >= 0 && speedBytesPerSec > 0) {
      const instantRemaining = remainingBytes / speedBytesPerSec;
      tracker.emaRemainingSeconds =
        tracker.emaRemainingSeconds == null
          ? instantRemaining
          : this.alpha * instantRemaining + (1 - this.alpha) * tracker.emaRemainingSeconds;
      remainingSeconds = remainingBytes === 0 ? 0 : tracker.emaRemainingSeconds;
    }

    return { speedBytesPerSec, remainingSeconds };
  }

  stopTracking(jobId: string): void {
    this.trackers.delete(jobId);
  }

  clear(): void {
    this.trackers.clear();
  }
}

export default SpeedTracker;
