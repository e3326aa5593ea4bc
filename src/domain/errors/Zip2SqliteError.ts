export type Zip2SqliteErrorCode =
  | 'invalid_config'
  | 'channel_create_failed'
  | 'channel_remove_failed'
  | 'loader_failed'
  | 'schema_failed'
  | 'reader_closed'
  | 'writer_open_aborted'
  | 'source_truncated'
  | 'transfer_exhausted'
  | 'loader_termination_failed';

export type ErrorContext = Readonly<Record<string, string | number | boolean | undefined>>;

interface ErrorArgs<C extends Zip2SqliteErrorCode> {
  readonly code: C;
  readonly message: string;
  readonly context?: ErrorContext;
  readonly cause?: unknown;
}

/** Base class for every error the importer raises. */
export class Zip2SqliteError<C extends Zip2SqliteErrorCode = Zip2SqliteErrorCode> extends Error {
  readonly code: C;
  readonly context: ErrorContext;
  readonly cause?: unknown;

  constructor(args: ErrorArgs<C>) {
    super(args.message);
    this.name = 'Zip2SqliteError';
    this.code = args.code;
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends Zip2SqliteError<'invalid_config'> {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super({ code: 'invalid_config', message: `Invalid configuration: ${issues.join('; ')}` });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** Channel or temporary directory could not be created or removed. */
export class ResourceError extends Zip2SqliteError<'channel_create_failed' | 'channel_remove_failed'> {
  constructor(args: ErrorArgs<'channel_create_failed' | 'channel_remove_failed'>) {
    super(args);
    this.name = 'ResourceError';
  }
}

export interface LoaderDiagnostics {
  readonly exitCode: number | null;
  readonly signal: string | null;
  readonly stdout: string;
  readonly stderr: string;
}

/** The loader exited non-zero, was killed, or could not be spawned. */
export class LoaderError extends Zip2SqliteError<'loader_failed'> {
  readonly diagnostics: LoaderDiagnostics;

  constructor(message: string, diagnostics: LoaderDiagnostics, cause?: unknown) {
    super({
      code: 'loader_failed',
      message,
      context: { exitCode: diagnostics.exitCode ?? undefined, signal: diagnostics.signal ?? undefined },
      cause,
    });
    this.name = 'LoaderError';
    this.diagnostics = diagnostics;
  }
}

export class SchemaError extends Zip2SqliteError<'schema_failed'> {
  constructor(tableName: string, cause: unknown) {
    super({
      code: 'schema_failed',
      message: `Failed to create table "${tableName}": ${toErrorMessage(cause)}`,
      context: { tableName },
      cause,
    });
    this.name = 'SchemaError';
  }
}

/** The reader side of the channel went away while bytes were still pending. */
export class TransportError extends Zip2SqliteError<'reader_closed' | 'writer_open_aborted'> {
  constructor(args: ErrorArgs<'reader_closed' | 'writer_open_aborted'>) {
    super(args);
    this.name = 'TransportError';
  }
}

/** A transfer failed for a reason that smaller chunks cannot fix. */
export class TransferError extends Zip2SqliteError<'source_truncated'> {
  constructor(args: ErrorArgs<'source_truncated'>) {
    super(args);
    this.name = 'TransferError';
  }
}

export class TransferExhaustedError extends Zip2SqliteError<'transfer_exhausted'> {
  readonly attempts: number;

  constructor(tableName: string, attempts: number, cause?: unknown) {
    super({
      code: 'transfer_exhausted',
      message: `Transfer of "${tableName}" failed at every chunk size (${attempts} attempts)`,
      context: { tableName, attempts },
      cause,
    });
    this.name = 'TransferExhaustedError';
    this.attempts = attempts;
  }
}

export class LoaderTerminationError extends Zip2SqliteError<'loader_termination_failed'> {
  constructor(message: string, cause?: unknown) {
    super({ code: 'loader_termination_failed', message, cause });
    this.name = 'LoaderTerminationError';
  }
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function toErrorMessage(reason: unknown): string {
  if (reason instanceof Error) return reason.message;
  return String(reason);
}
