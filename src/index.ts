// Main entry point
export { Zip2Sqlite } from './Zip2Sqlite.js';
export type { Zip2SqliteDependencies } from './Zip2Sqlite.js';

// Configuration
export { resolveImporterConfig, LOG_LEVELS } from './config/ImporterConfig.js';
export type { ImporterConfig, ImporterConfigInput, LogLevel } from './config/ImporterConfig.js';
export { loadEnvDefaults } from './config/env.js';

// Domain model
export type { Channel } from './domain/model/Channel.js';
export { LoaderState, canTransition } from './domain/model/LoaderState.js';
export type { TransferAttempt, TransferOutcome, TransferReport } from './domain/model/TransferAttempt.js';
export type { ColumnAffinity, ColumnDefinition, TableSchema } from './domain/model/TableSchema.js';
export type { ImportTableResult, ImportArchiveSummary, FailedTable } from './domain/model/ImportResult.js';

// Errors
export {
  Zip2SqliteError,
  ConfigurationError,
  ResourceError,
  LoaderError,
  SchemaError,
  TransportError,
  TransferError,
  TransferExhaustedError,
  LoaderTerminationError,
  isTransportError,
} from './domain/errors/Zip2SqliteError.js';
export type { Zip2SqliteErrorCode, LoaderDiagnostics } from './domain/errors/Zip2SqliteError.js';

// Domain services
export { AdaptiveTransferSession, DEFAULT_INITIAL_EXPONENT } from './domain/services/AdaptiveTransferSession.js';
export type { TransferSessionOptions, TransferTarget } from './domain/services/AdaptiveTransferSession.js';
export { ColumnTypeInferrer, classifyValue } from './domain/services/ColumnTypeInferrer.js';
export { tableNameFor, isCsvMember, compileNameFilter } from './domain/services/memberSelection.js';

// Application
export { EventBus } from './application/EventBus.js';
export { withResource } from './application/withResource.js';
export { ImportTable } from './application/usecases/ImportTable.js';
export { ImportArchive } from './application/usecases/ImportArchive.js';
export { ScanArchive } from './application/usecases/ScanArchive.js';
export type { ImportContext } from './application/ImportContext.js';

// Ports (for custom implementations)
export type { ReplayableSource } from './domain/ports/ReplayableSource.js';
export type { ChannelManager, ChannelSink, OpenWriterOptions } from './domain/ports/ChannelManager.js';
export type { LoaderController, LoaderHandle, LoaderExit, LoaderScript } from './domain/ports/LoaderController.js';
export type { SchemaScanner, ScanOptions } from './domain/ports/SchemaScanner.js';
export type { ArchiveReader, ArchiveMember } from './domain/ports/ArchiveReader.js';
export type { Logger, LogFields } from './domain/ports/Logger.js';
export { noopLogger } from './domain/ports/Logger.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  TableScannedEvent,
  TableCreatedEvent,
  TransferAttemptFailedEvent,
  TransferCompletedEvent,
  TableFailedEvent,
  ImportCompletedEvent,
  ImportFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { FifoChannelManager } from './infrastructure/channel/FifoChannelManager.js';
export type { FifoChannelManagerOptions } from './infrastructure/channel/FifoChannelManager.js';
export { Sqlite3LoaderController, spawnProcess } from './infrastructure/loader/Sqlite3LoaderController.js';
export type { Sqlite3LoaderControllerOptions, SpawnedProcess, ProcessSpawner } from './infrastructure/loader/Sqlite3LoaderController.js';
export { sqliteScript, quoteIdentifier } from './infrastructure/loader/sqliteScript.js';
export { CsvSchemaScanner } from './infrastructure/scanner/CsvSchemaScanner.js';
export type { CsvSchemaScannerOptions } from './infrastructure/scanner/CsvSchemaScanner.js';
export { ZipArchive } from './infrastructure/archive/ZipArchive.js';
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { ZipEntrySource } from './infrastructure/sources/ZipEntrySource.js';
export { createLogger, fromPino } from './infrastructure/logging/pinoLogger.js';
