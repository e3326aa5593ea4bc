import type { TransferAttempt } from './TransferAttempt.js';

/** Outcome of loading one table. */
export interface ImportTableResult {
  readonly tableName: string;
  readonly bytesTransferred: number;
  /** Chunk size of the successful attempt. */
  readonly chunkSize: number;
  readonly attempts: readonly TransferAttempt[];
  readonly elapsedMs: number;
}

export interface FailedTable {
  readonly tableName: string;
  readonly error: Error;
}

/** Final summary of an archive import. */
export interface ImportArchiveSummary {
  readonly imported: readonly ImportTableResult[];
  readonly failed: readonly FailedTable[];
  /** Members skipped by the extension check or the name filter. */
  readonly skipped: readonly string[];
  readonly elapsedMs: number;
}
