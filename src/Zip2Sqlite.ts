import type { ImportArchiveSummary, ImportTableResult } from './domain/model/ImportResult.js';
import type { TableSchema } from './domain/model/TableSchema.js';
import type { ArchiveReader } from './domain/ports/ArchiveReader.js';
import type { ChannelManager } from './domain/ports/ChannelManager.js';
import type { LoaderController } from './domain/ports/LoaderController.js';
import type { Logger } from './domain/ports/Logger.js';
import type { ReplayableSource } from './domain/ports/ReplayableSource.js';
import type { SchemaScanner } from './domain/ports/SchemaScanner.js';
import type { EventType, EventPayload } from './domain/events/DomainEvents.js';
import type { ImporterConfig, ImporterConfigInput } from './config/ImporterConfig.js';
import type { ImportContext } from './application/ImportContext.js';
import { noopLogger } from './domain/ports/Logger.js';
import { ConfigurationError } from './domain/errors/Zip2SqliteError.js';
import { resolveImporterConfig } from './config/ImporterConfig.js';
import { EventBus } from './application/EventBus.js';
import { ImportArchive } from './application/usecases/ImportArchive.js';
import { ImportTable } from './application/usecases/ImportTable.js';
import { ScanArchive } from './application/usecases/ScanArchive.js';
import { FifoChannelManager } from './infrastructure/channel/FifoChannelManager.js';
import { Sqlite3LoaderController } from './infrastructure/loader/Sqlite3LoaderController.js';
import { CsvSchemaScanner } from './infrastructure/scanner/CsvSchemaScanner.js';
import { ZipArchive } from './infrastructure/archive/ZipArchive.js';

/** Collaborators that replace the built-in adapters. */
export interface Zip2SqliteDependencies {
  readonly logger?: Logger;
  readonly channels?: ChannelManager;
  readonly loader?: LoaderController;
  readonly scanner?: SchemaScanner;
  /** Opens the archive at a path. Default: `ZipArchive.open`. */
  readonly openArchive?: (path: string) => Promise<ArchiveReader>;
}

/**
 * Loads the CSV members of a ZIP archive into SQLite tables through the
 * `sqlite3` shell, one FIFO per table.
 *
 * @example
 * ```ts
 * const importer = new Zip2Sqlite({ databasePath: 'out.db', nameFilter: 'data/' });
 * importer.on('transfer:completed', (e) => console.log(e.tableName, e.result.bytesTransferred));
 * const summary = await importer.importArchive('export.zip');
 * ```
 */
export class Zip2Sqlite {
  readonly config: ImporterConfig;
  private readonly ctx: ImportContext;
  private readonly openArchive: (path: string) => Promise<ArchiveReader>;

  constructor(config: ImporterConfigInput = {}, dependencies: Zip2SqliteDependencies = {}) {
    this.config = resolveImporterConfig(config);
    const logger = dependencies.logger ?? noopLogger;
    this.ctx = {
      channels: dependencies.channels ?? new FifoChannelManager({ logger }),
      loader: dependencies.loader ?? new Sqlite3LoaderController({ binary: this.config.loaderBinary, logger }),
      scanner: dependencies.scanner ?? new CsvSchemaScanner(),
      eventBus: new EventBus(logger),
      logger,
      initialExponent: this.config.initialExponent,
      maxRows: this.config.maxRows,
      continueOnError: this.config.continueOnError,
    };
    this.openArchive = dependencies.openArchive ?? ((path) => ZipArchive.open(path));
  }

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Infer a schema for every selected member. Nothing is written. */
  async scan(archivePath: string): Promise<Map<string, TableSchema>> {
    return this.withArchive(archivePath, (archive) => new ScanArchive(this.ctx).execute(archive, this.config.nameFilter));
  }

  /** Scan and load every selected member into `databasePath` (default: the configured one). */
  async importArchive(archivePath: string, databasePath = this.config.databasePath): Promise<ImportArchiveSummary> {
    if (!databasePath) {
      throw new ConfigurationError(['databasePath: required to import an archive']);
    }
    return this.withArchive(archivePath, (archive) =>
      new ImportArchive(this.ctx).execute(archive, databasePath, this.config.nameFilter),
    );
  }

  /** Load a single source whose schema is already known. The source is closed afterwards. */
  async importTable(source: ReplayableSource, schema: TableSchema, databasePath: string): Promise<ImportTableResult> {
    return new ImportTable(this.ctx).execute({ source, schema, databasePath });
  }

  private async withArchive<T>(archivePath: string, use: (archive: ArchiveReader) => Promise<T>): Promise<T> {
    const archive = await this.openArchive(archivePath);
    try {
      return await use(archive);
    } finally {
      await archive.close();
    }
  }
}
