import type { Channel } from '../model/Channel.js';
import type { LoaderState } from '../model/LoaderState.js';
import type { TableSchema } from '../model/TableSchema.js';

export interface LoaderExit {
  readonly exitCode: number | null;
  readonly signal: string | null;
  /** Set when the process could not be spawned or crashed outside its own exit path. */
  readonly error?: string;
}

/** A running loader process bound to a channel. */
export interface LoaderHandle {
  readonly id: number;
  readonly state: LoaderState;
  /** Settles when the process exits, whether or not `terminate()` was called. Never rejects. */
  readonly exited: Promise<LoaderExit>;
}

/** Renders the loader's line-oriented control commands. */
export interface LoaderScript {
  createTable(schema: TableSchema): string[];
  /** Set the input format and separator, then import from the channel into the table. */
  importFromChannel(channel: Channel, schema: TableSchema): string[];
  /** Empty the table so a retried import starts from zero rows. */
  truncate(tableName: string): string[];
  readonly quitCommand: string;
}

export interface LoaderController {
  readonly script: LoaderScript;
  /** Run the loader with `commands` and wait for it to exit successfully. */
  runOnce(commands: readonly string[], databasePath: string): Promise<void>;
  /** Spawn the long-lived loader; it blocks on the channel until a writer connects. */
  start(commands: readonly string[], databasePath: string): Promise<LoaderHandle>;
  /** Send the quit command and wait for the process to exit. */
  terminate(handle: LoaderHandle): Promise<LoaderExit>;
}
