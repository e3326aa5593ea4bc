import type { ImportArchiveSummary, ImportTableResult } from '../model/ImportResult.js';
import type { TransferAttempt } from '../model/TransferAttempt.js';

/** Emitted after the scanner produced a schema for an archive member. */
export interface TableScannedEvent {
  readonly type: 'table:scanned';
  readonly tableName: string;
  readonly member: string;
  readonly columns: number;
  readonly rowsScanned: number;
  readonly timestamp: number;
}

/** Emitted when the `CREATE TABLE` invocation of the loader succeeded. */
export interface TableCreatedEvent {
  readonly type: 'table:created';
  readonly tableName: string;
  readonly timestamp: number;
}

/** Emitted when the reader closed the channel early and the session backs off. */
export interface TransferAttemptFailedEvent {
  readonly type: 'transfer:attempt-failed';
  readonly tableName: string;
  readonly attempt: TransferAttempt;
  /** Exponent of the next attempt, or `0` when none is left. */
  readonly nextExponent: number;
  readonly timestamp: number;
}

/** Emitted when every byte of the source reached the loader. */
export interface TransferCompletedEvent {
  readonly type: 'transfer:completed';
  readonly tableName: string;
  readonly result: ImportTableResult;
  readonly timestamp: number;
}

/** Emitted when one table could not be imported. */
export interface TableFailedEvent {
  readonly type: 'table:failed';
  readonly tableName: string;
  readonly error: string;
  readonly code?: string;
  readonly timestamp: number;
}

/** Emitted once the archive walk finished. */
export interface ImportCompletedEvent {
  readonly type: 'import:completed';
  readonly summary: ImportArchiveSummary;
  readonly timestamp: number;
}

/** Emitted when the archive walk stopped on an unrecoverable error. */
export interface ImportFailedEvent {
  readonly type: 'import:failed';
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | TableScannedEvent
  | TableCreatedEvent
  | TransferAttemptFailedEvent
  | TransferCompletedEvent
  | TableFailedEvent
  | ImportCompletedEvent
  | ImportFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
