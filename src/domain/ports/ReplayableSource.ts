/**
 * A byte source of known length that can be read again from offset zero.
 *
 * The transfer session rewinds the source before every attempt, so an
 * implementation must be able to restart its underlying stream.
 */
export interface ReplayableSource {
  /** Human-readable name, used in logs. */
  readonly name: string;
  /** Total number of bytes the source yields from start to end. */
  readonly byteLength: number;
  /** Reposition at offset zero. Must be called before the first `read()`. */
  rewind(): Promise<void>;
  /** Read up to `maxBytes` bytes. Resolves with an empty buffer at end of stream. */
  read(maxBytes: number): Promise<Buffer>;
  /** Release the underlying stream. Safe to call more than once. */
  close(): Promise<void>;
}
