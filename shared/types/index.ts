/**
 * @fileoverview Punto de entrada de tipos compartidos entre el núcleo y las capas de presentación.
 * @module shared/types
 */

export type {
  MediaKind,
  FetchDescriptor,
  MediaVariant,
  JobSnapshot,
  QueueSummary,
  QueueSnapshot,
  JobStatusChangedEvent,
  JobProgressEvent,
  JobRemovedEvent,
  EngineEvent,
} from './jobs';
