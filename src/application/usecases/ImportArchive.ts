import type { FailedTable, ImportArchiveSummary, ImportTableResult } from '../../domain/model/ImportResult.js';
import type { TableSchema } from '../../domain/model/TableSchema.js';
import type { ArchiveReader } from '../../domain/ports/ArchiveReader.js';
import type { ReplayableSource } from '../../domain/ports/ReplayableSource.js';
import { Zip2SqliteError, toErrorMessage } from '../../domain/errors/Zip2SqliteError.js';
import type { ImportContext } from '../ImportContext.js';
import { ImportTable } from './ImportTable.js';
import { selectMembers } from './ScanArchive.js';

/** Use case: scan and load every selected member, one table at a time. */
export class ImportArchive {
  constructor(private readonly ctx: ImportContext) {}

  async execute(archive: ArchiveReader, databasePath: string, nameFilter?: RegExp): Promise<ImportArchiveSummary> {
    const startedAt = Date.now();
    const imported: ImportTableResult[] = [];
    const failed: FailedTable[] = [];
    const { selected, skipped } = await selectMembers(archive, nameFilter);
    const loadedFrom = new Map<string, string>();

    try {
      for (const { member, tableName } of selected) {
        const previous = loadedFrom.get(tableName);
        if (previous !== undefined) {
          // A retry empties the table, which would also drop the earlier member's rows.
          const error = new Error(`table "${tableName}" was already loaded from ${previous}`);
          this.recordFailure(failed, tableName, error);
          if (!this.ctx.continueOnError) throw error;
          continue;
        }
        loadedFrom.set(tableName, member.name);

        try {
          const source = await archive.openMember(member);
          const schema = await this.scanOrClose(source, tableName, member.name);
          imported.push(await new ImportTable(this.ctx).execute({ source, schema, databasePath }));
        } catch (error) {
          this.recordFailure(failed, tableName, error);
          if (!this.ctx.continueOnError) throw error;
        }
      }
    } catch (error) {
      this.ctx.eventBus.emit({ type: 'import:failed', error: toErrorMessage(error), timestamp: Date.now() });
      throw error;
    }

    const summary: ImportArchiveSummary = { imported, failed, skipped, elapsedMs: Date.now() - startedAt };
    this.ctx.logger.info(
      { imported: imported.length, failed: failed.length, skipped: skipped.length, elapsedMs: summary.elapsedMs },
      'archive import finished',
    );
    this.ctx.eventBus.emit({ type: 'import:completed', summary, timestamp: Date.now() });
    return summary;
  }

  private async scanOrClose(source: ReplayableSource, tableName: string, memberName: string): Promise<TableSchema> {
    let schema: TableSchema;
    try {
      schema = await this.ctx.scanner.scan(source, tableName, { maxRows: this.ctx.maxRows });
    } catch (error) {
      await source.close();
      throw error;
    }
    this.ctx.eventBus.emit({
      type: 'table:scanned',
      tableName,
      member: memberName,
      columns: schema.columns.length,
      rowsScanned: schema.rowsScanned,
      timestamp: Date.now(),
    });
    return schema;
  }

  private recordFailure(failed: FailedTable[], tableName: string, reason: unknown): void {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    failed.push({ tableName, error });
    this.ctx.logger.error({ table: tableName, error: error.message }, 'table import failed');
    this.ctx.eventBus.emit({
      type: 'table:failed',
      tableName,
      error: error.message,
      code: error instanceof Zip2SqliteError ? error.code : undefined,
      timestamp: Date.now(),
    });
  }
}
