/**
 * Señal cooperativa de pausa/cancelación para una transferencia en curso.
 *
 * TransferControl la posee el DownloadEngine; el motor de transferencia solo ve la
 * TransferSignal (lectura + suscripción). La señal se observa por chunk de E/S y además
 * aborta el AbortSignal asociado para desbloquear lecturas o peticiones detenidas.
 *
 * @module engines/TransferControl
 */

import { CancelMode, type CancelModeType } from './types';

export interface TransferSignal {
  readonly requested: CancelModeType | null;
  readonly abortSignal: AbortSignal;
}

export class TransferControl implements TransferSignal {
  private readonly controller = new AbortController();
  private _requested: CancelModeType | null = null;

  get requested(): CancelModeType | null {
    return this._requested;
  }

  get abortSignal(): AbortSignal {
    return this.controller.signal;
  }

  /** Pide pausa. No tiene efecto si ya se pidió cancelación. */
  pause(): void {
    this.request(CancelMode.PAUSE);
  }

  /** Pide cancelación; prevalece sobre una pausa pendiente. */
  cancel(): void {
    this.request(CancelMode.CANCEL);
  }

  private request(mode: CancelModeType): void {
    if (this._requested === CancelMode.CANCEL) return;
    if (this._requested === mode) return;
    this._requested = mode;
    if (!this.controller.signal.aborted) {
      this.controller.abort(mode);
    }
  }
}
