import type { Channel } from '../domain/model/Channel.js';
import type { TableSchema } from '../domain/model/TableSchema.js';
import type { LoaderController, LoaderHandle } from '../domain/ports/LoaderController.js';
import type { Logger } from '../domain/ports/Logger.js';
import { toErrorMessage } from '../domain/errors/Zip2SqliteError.js';

/**
 * Owns the streaming loader of one table.
 *
 * `signal` aborts as soon as the current process exits, so a writer waiting
 * for the FIFO's read end is released when no reader will ever come.
 */
export class LoaderLease {
  private handle: LoaderHandle | null = null;
  private controller = new AbortController();
  private watch: Promise<void> = Promise.resolve();

  private constructor(
    private readonly loader: LoaderController,
    private readonly channel: Channel,
    private readonly schema: TableSchema,
    private readonly databasePath: string,
    private readonly logger: Logger,
  ) {}

  static async start(
    loader: LoaderController,
    channel: Channel,
    schema: TableSchema,
    databasePath: string,
    logger: Logger,
  ): Promise<LoaderLease> {
    const lease = new LoaderLease(loader, channel, schema, databasePath, logger);
    await lease.spawn();
    return lease;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Stop the current loader, empty the table, and start a fresh loader on the same channel. */
  async restart(): Promise<void> {
    await this.release();
    await this.loader.runOnce(this.loader.script.truncate(this.schema.tableName), this.databasePath);
    this.logger.debug({}, 'table emptied before retry');
    await this.spawn();
  }

  /** Terminate the current loader, if any. Termination failures are logged, not thrown. */
  async release(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;

    this.logger.info({ loader: handle.id }, 'sending quit to loader');
    try {
      await this.loader.terminate(handle);
      this.logger.info({ loader: handle.id }, 'loader exited');
    } catch (error) {
      this.logger.error({ loader: handle.id, error: toErrorMessage(error) }, 'loader did not terminate cleanly');
    }
    await this.watch;
  }

  private async spawn(): Promise<void> {
    const commands = this.loader.script.importFromChannel(this.channel, this.schema);
    const handle = await this.loader.start(commands, this.databasePath);
    const controller = new AbortController();
    this.handle = handle;
    this.controller = controller;
    this.watch = handle.exited.then(() => controller.abort());
  }
}
