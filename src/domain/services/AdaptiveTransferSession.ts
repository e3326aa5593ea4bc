import type { ChannelSink } from '../ports/ChannelManager.js';
import type { Logger } from '../ports/Logger.js';
import type { ReplayableSource } from '../ports/ReplayableSource.js';
import type { TransferAttempt, TransferReport } from '../model/TransferAttempt.js';
import { noopLogger } from '../ports/Logger.js';
import { TransferError, TransferExhaustedError, isTransportError, toErrorMessage } from '../errors/Zip2SqliteError.js';

export const DEFAULT_INITIAL_EXPONENT = 24;
export const MAX_INITIAL_EXPONENT = 30;

export interface TransferSessionOptions {
  /** Chunk size of the first attempt is `2 ** initialExponent`. Default: `24` (16 MiB). */
  readonly initialExponent?: number;
  readonly logger?: Logger;
}

/** Where the session writes, and how it is told about attempts. */
export interface TransferTarget {
  /** Open a fresh write end. Called once per attempt. */
  openSink(): Promise<ChannelSink>;
  /** Awaited after a failed attempt, before the next one opens its sink. */
  beforeRetry?(failed: TransferAttempt, nextExponent: number): Promise<void>;
  /** Called for every finished attempt, failed or not. */
  onAttempt?(attempt: TransferAttempt, nextExponent: number): void;
}

type AttemptResult =
  | { readonly ok: true; readonly bytesWritten: number }
  | { readonly ok: false; readonly bytesWritten: number; readonly error: unknown };

/**
 * Copies a replayable source into a channel, halving the chunk size each time
 * the reader closes its end early. Every attempt restarts from offset zero.
 */
export class AdaptiveTransferSession {
  private readonly initialExponent: number;
  private readonly logger: Logger;

  constructor(options?: TransferSessionOptions) {
    const initialExponent = options?.initialExponent ?? DEFAULT_INITIAL_EXPONENT;
    if (!Number.isInteger(initialExponent) || initialExponent < 1 || initialExponent > MAX_INITIAL_EXPONENT) {
      throw new RangeError(`initialExponent must be an integer in [1..${MAX_INITIAL_EXPONENT}], got ${initialExponent}`);
    }
    this.initialExponent = initialExponent;
    this.logger = options?.logger ?? noopLogger;
  }

  /**
   * Transfer all `source.byteLength` bytes.
   *
   * @throws TransferExhaustedError when every exponent down to 1 failed with a transport failure.
   * @throws TransferError when the source ends before its declared length.
   */
  async run(source: ReplayableSource, target: TransferTarget): Promise<TransferReport> {
    const attempts: TransferAttempt[] = [];
    let exponent = this.initialExponent;
    let lastError: unknown;

    while (exponent > 0) {
      const chunkSize = 2 ** exponent;
      const result = await this.attempt(source, target, chunkSize);

      if (result.ok) {
        const done: TransferAttempt = {
          attempt: attempts.length + 1,
          exponent,
          chunkSize,
          bytesWritten: result.bytesWritten,
          outcome: 'completed',
        };
        attempts.push(done);
        target.onAttempt?.(done, exponent);
        this.logger.info({ source: source.name, exponent, attempts: attempts.length }, 'transfer completed');
        return { bytesTransferred: result.bytesWritten, exponent, chunkSize, attempts };
      }

      lastError = result.error;
      const failed: TransferAttempt = {
        attempt: attempts.length + 1,
        exponent,
        chunkSize,
        bytesWritten: result.bytesWritten,
        outcome: 'reader_closed',
        error: toErrorMessage(result.error),
      };
      attempts.push(failed);
      exponent -= 1;
      target.onAttempt?.(failed, exponent);
      this.logger.warn(
        { source: source.name, exponent: failed.exponent, bytesWritten: failed.bytesWritten, nextExponent: exponent },
        'reader closed the channel early, backing off',
      );

      if (exponent > 0) {
        await target.beforeRetry?.(failed, exponent);
      }
    }

    throw new TransferExhaustedError(source.name, attempts.length, lastError);
  }

  private async attempt(source: ReplayableSource, target: TransferTarget, chunkSize: number): Promise<AttemptResult> {
    let sink: ChannelSink | undefined;
    let bytesWritten = 0;

    try {
      sink = await target.openSink();
      this.logger.debug({ source: source.name, chunkSize }, 'channel open for writing');
      await source.rewind();

      let remaining = source.byteLength;
      while (remaining > 0) {
        const chunk = await source.read(Math.min(remaining, chunkSize));
        if (chunk.length === 0) {
          throw new TransferError({
            code: 'source_truncated',
            message: `Source "${source.name}" ended ${remaining} bytes short of its declared length ${source.byteLength}`,
            context: { source: source.name, remaining },
          });
        }
        await sink.write(chunk);
        await sink.flush();
        remaining -= chunk.length;
        bytesWritten += chunk.length;
      }

      const opened = sink;
      sink = undefined;
      await opened.close();
      return { ok: true, bytesWritten };
    } catch (error) {
      if (sink) {
        await this.closeAfterFailure(sink);
      }
      if (!isTransportError(error)) {
        throw error;
      }
      return { ok: false, bytesWritten, error };
    }
  }

  private async closeAfterFailure(sink: ChannelSink): Promise<void> {
    try {
      await sink.close();
    } catch (error) {
      this.logger.warn({ error: toErrorMessage(error) }, 'closing the channel writer failed');
    }
  }
}
