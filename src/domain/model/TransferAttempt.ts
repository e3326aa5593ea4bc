export type TransferOutcome = 'completed' | 'reader_closed';

/** One pass over the source at a fixed chunk size. */
export interface TransferAttempt {
  /** 1-based attempt number within the session. */
  readonly attempt: number;
  readonly exponent: number;
  /** `2 ** exponent` bytes. */
  readonly chunkSize: number;
  readonly bytesWritten: number;
  readonly outcome: TransferOutcome;
  /** Message of the transport failure, when the attempt failed. */
  readonly error?: string;
}

export interface TransferReport {
  readonly bytesTransferred: number;
  readonly exponent: number;
  readonly chunkSize: number;
  /** Every attempt in order; the last one is the successful attempt. */
  readonly attempts: readonly TransferAttempt[];
}
