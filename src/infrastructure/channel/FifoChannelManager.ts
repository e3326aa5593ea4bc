import { execFile } from 'node:child_process';
import { randomBytes } from 'node:crypto';
import { constants } from 'node:fs';
import { mkdtemp, open, rm, rmdir, unlink } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { promisify } from 'node:util';
import type { Channel } from '../../domain/model/Channel.js';
import type { ChannelManager, ChannelSink, OpenWriterOptions } from '../../domain/ports/ChannelManager.js';
import type { Logger } from '../../domain/ports/Logger.js';
import { noopLogger } from '../../domain/ports/Logger.js';
import { ResourceError, TransportError, toErrorMessage } from '../../domain/errors/Zip2SqliteError.js';

const execFileAsync = promisify(execFile);

export interface FifoChannelManagerOptions {
  /** Parent of the per-job directories. Default: `os.tmpdir()`. */
  readonly baseDirectory?: string;
  /** Binary used to create the FIFO. Default: `'mkfifo'`. */
  readonly mkfifoBinary?: string;
  readonly logger?: Logger;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/** Channel name: table name made filesystem-safe, plus 64 random bits. */
export function channelFileName(tableName: string): string {
  const safe = tableName.replace(/[^A-Za-z0-9_-]/g, '_') || 'table';
  return `${safe}_${randomBytes(8).toString('hex')}`;
}

class FifoSink implements ChannelSink {
  private closed = false;

  constructor(
    private readonly handle: FileHandle,
    private readonly channel: Channel,
  ) {}

  async write(chunk: Buffer): Promise<void> {
    let offset = 0;
    while (offset < chunk.length) {
      try {
        const { bytesWritten } = await this.handle.write(chunk, offset, chunk.length - offset);
        offset += bytesWritten;
      } catch (error) {
        if (hasErrorCode(error, 'EPIPE')) {
          throw new TransportError({
            code: 'reader_closed',
            message: `Reader closed ${this.channel.path} with ${chunk.length - offset} bytes of the chunk unsent`,
            context: { path: this.channel.path, unsent: chunk.length - offset },
            cause: error,
          });
        }
        throw error;
      }
    }
  }

  // Writes go straight to the pipe descriptor; there is no user-space buffer to drain.
  flush(): Promise<void> {
    return Promise.resolve();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

/** Creates one named FIFO per job inside a private temporary directory. POSIX only. */
export class FifoChannelManager implements ChannelManager {
  private readonly baseDirectory: string;
  private readonly mkfifoBinary: string;
  private readonly logger: Logger;

  constructor(options?: FifoChannelManagerOptions) {
    this.baseDirectory = options?.baseDirectory ?? tmpdir();
    this.mkfifoBinary = options?.mkfifoBinary ?? 'mkfifo';
    this.logger = options?.logger ?? noopLogger;
  }

  async open(tableName: string): Promise<Channel> {
    let directory: string | undefined;
    try {
      directory = await mkdtemp(join(this.baseDirectory, 'zip2sqlite-'));
      const path = join(directory, channelFileName(tableName));
      await execFileAsync(this.mkfifoBinary, ['-m', '600', path]);
      this.logger.debug({ path }, 'mkfifo');
      return { path, directory, tableName };
    } catch (error) {
      if (directory) {
        await this.discardDirectory(directory);
      }
      throw new ResourceError({
        code: 'channel_create_failed',
        message: `Failed to create a channel for "${tableName}": ${toErrorMessage(error)}`,
        context: { tableName, directory },
        cause: error,
      });
    }
  }

  async openForWriting(channel: Channel, options?: OpenWriterOptions): Promise<ChannelSink> {
    const signal = options?.signal;
    if (signal?.aborted) {
      throw this.abortedOpen(channel);
    }

    // Blocks in the thread pool until the loader opens the read end.
    const opening = open(channel.path, constants.O_WRONLY);
    if (!signal) {
      return new FifoSink(await opening, channel);
    }

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<null>((resolve) => {
      onAbort = () => resolve(null);
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      const handle = await Promise.race([opening, aborted]);
      if (handle) {
        return new FifoSink(handle, channel);
      }
    } finally {
      if (onAbort) signal.removeEventListener('abort', onAbort);
    }

    await this.releaseBlockedWriter(channel, opening);
    throw this.abortedOpen(channel);
  }

  async close(channel: Channel): Promise<void> {
    try {
      await unlink(channel.path);
      this.logger.debug({ path: channel.path }, 'removed fifo');
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        await this.removeDirectoryAfterFailure(channel);
        throw new ResourceError({
          code: 'channel_remove_failed',
          message: `Failed to remove ${channel.path}: ${toErrorMessage(error)}`,
          context: { path: channel.path },
          cause: error,
        });
      }
      this.logger.warn({ path: channel.path }, 'fifo already removed');
    }

    try {
      await rmdir(channel.directory);
      this.logger.debug({ directory: channel.directory }, 'removed channel directory');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        this.logger.warn({ directory: channel.directory }, 'channel directory already removed');
        return;
      }
      throw new ResourceError({
        code: 'channel_remove_failed',
        message: `Failed to remove ${channel.directory}: ${toErrorMessage(error)}`,
        context: { directory: channel.directory },
        cause: error,
      });
    }
  }

  /** Open the read end ourselves so a writer blocked in `open()` returns, then close both. */
  private async releaseBlockedWriter(channel: Channel, opening: Promise<FileHandle>): Promise<void> {
    const reader = await open(channel.path, constants.O_RDONLY | constants.O_NONBLOCK);
    try {
      const writer = await opening;
      await writer.close();
    } finally {
      await reader.close();
    }
  }

  private abortedOpen(channel: Channel): TransportError {
    return new TransportError({
      code: 'writer_open_aborted',
      message: `Gave up waiting for a reader on ${channel.path}`,
      context: { path: channel.path },
    });
  }

  private async removeDirectoryAfterFailure(channel: Channel): Promise<void> {
    try {
      await rmdir(channel.directory);
    } catch (error) {
      this.logger.error({ directory: channel.directory, error: toErrorMessage(error) }, 'failed to remove channel directory');
    }
  }

  private async discardDirectory(directory: string): Promise<void> {
    try {
      await rm(directory, { recursive: true, force: true });
    } catch (error) {
      this.logger.error({ directory, error: toErrorMessage(error) }, 'failed to discard channel directory');
    }
  }
}
