import type { Channel } from '../../domain/model/Channel.js';
import type { ImportTableResult } from '../../domain/model/ImportResult.js';
import type { TableSchema } from '../../domain/model/TableSchema.js';
import type { Logger } from '../../domain/ports/Logger.js';
import type { ReplayableSource } from '../../domain/ports/ReplayableSource.js';
import { AdaptiveTransferSession } from '../../domain/services/AdaptiveTransferSession.js';
import { SchemaError, toErrorMessage } from '../../domain/errors/Zip2SqliteError.js';
import type { ImportContext } from '../ImportContext.js';
import { LoaderLease } from '../LoaderLease.js';
import { withResource } from '../withResource.js';

export interface ImportTableInput {
  readonly source: ReplayableSource;
  readonly schema: TableSchema;
  readonly databasePath: string;
}

/**
 * Use case: load one table through one FIFO.
 *
 * Cleanup order on every exit path: terminate the loader, remove the channel,
 * close the source. Cleanup failures are logged and never replace the
 * transfer's own result.
 */
export class ImportTable {
  constructor(private readonly ctx: ImportContext) {}

  async execute(input: ImportTableInput): Promise<ImportTableResult> {
    const { source, schema } = input;
    const logger = this.ctx.logger.child({ table: schema.tableName });

    try {
      return await withResource(
        () => this.ctx.channels.open(schema.tableName),
        (channel) => this.loadThroughChannel(channel, input, logger),
        async (channel) => {
          logger.info({ path: channel.path }, 'removing channel');
          await this.ctx.channels.close(channel);
        },
        (error) => logger.error({ error: toErrorMessage(error) }, 'channel cleanup failed'),
      );
    } finally {
      await this.closeSource(source, logger);
    }
  }

  private async loadThroughChannel(channel: Channel, input: ImportTableInput, logger: Logger): Promise<ImportTableResult> {
    const { source, schema, databasePath } = input;
    const startedAt = Date.now();

    try {
      await this.ctx.loader.runOnce(this.ctx.loader.script.createTable(schema), databasePath);
    } catch (error) {
      throw new SchemaError(schema.tableName, error);
    }
    logger.debug({}, 'table created');
    this.ctx.eventBus.emit({ type: 'table:created', tableName: schema.tableName, timestamp: Date.now() });

    const session = new AdaptiveTransferSession({ initialExponent: this.ctx.initialExponent, logger });

    const report = await withResource(
      () => LoaderLease.start(this.ctx.loader, channel, schema, databasePath, logger),
      (lease) =>
        session.run(source, {
          openSink: () => this.ctx.channels.openForWriting(channel, { signal: lease.signal }),
          beforeRetry: () => lease.restart(),
          onAttempt: (attempt, nextExponent) => {
            if (attempt.outcome === 'completed') return;
            this.ctx.eventBus.emit({
              type: 'transfer:attempt-failed',
              tableName: schema.tableName,
              attempt,
              nextExponent,
              timestamp: Date.now(),
            });
          },
        }),
      (lease) => lease.release(),
      (error) => logger.error({ error: toErrorMessage(error) }, 'loader cleanup failed'),
    );

    const result: ImportTableResult = {
      tableName: schema.tableName,
      bytesTransferred: report.bytesTransferred,
      chunkSize: report.chunkSize,
      attempts: report.attempts,
      elapsedMs: Date.now() - startedAt,
    };
    this.ctx.eventBus.emit({ type: 'transfer:completed', tableName: schema.tableName, result, timestamp: Date.now() });
    return result;
  }

  private async closeSource(source: ReplayableSource, logger: Logger): Promise<void> {
    try {
      await source.close();
      logger.debug({ source: source.name }, 'source closed');
    } catch (error) {
      logger.error({ source: source.name, error: toErrorMessage(error) }, 'failed to close source');
    }
  }
}
