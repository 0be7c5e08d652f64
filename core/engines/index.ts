/**
 * Punto de entrada del motor: reexporta DownloadEngine, HttpTransferEngine, Scheduler,
 * EventBus, StateStore, la máquina de estados de Job, utilidades de validación de descarga
 * y la taxonomía de errores.
 *
 * @module engines
 */

export { default as DownloadEngine } from './DownloadEngine';
export type { DownloadEngineDeps, SubmitJobInput } from './DownloadEngine';
export { HttpTransferEngine, createHttpStreamOpener } from './TransferEngine';
export type {
  HttpTransferEngineOptions,
  HttpStreamOpenerOptions,
  OpenedStream,
  StreamOpener,
} from './TransferEngine';
export { default as Scheduler, compareForAdmission } from './Scheduler';
export type { AdmissionCandidate, CanAdmitResult, SchedulerOptions } from './Scheduler';
export { EventBus, Subscription } from './EventBus';
export type { EngineEventListener, EventBusOptions, SubscriptionFilter } from './EventBus';
export { StateStore } from './StateStore';
export type { StateStoreOptions } from './StateStore';
export { Job } from './Job';
export type { CreateJobInput } from './Job';
export {
  canTransition,
  isTerminalState,
  isLiveState,
  TERMINAL_STATES,
} from './JobStateMachine';
export { TransferControl } from './TransferControl';
export { SpeedTracker } from './SpeedTracker';
export { SessionManager } from './SessionManager';
export { ProgressThrottle } from './ProgressThrottle';
export {
  isTransientNetworkError,
  parseContentRange,
  calculateBackoffDelay,
} from './DownloadValidator';
export type { ContentRange } from './DownloadValidator';
export * from './errors';
export * from './types';
