import type { ChannelManager } from '../domain/ports/ChannelManager.js';
import type { LoaderController } from '../domain/ports/LoaderController.js';
import type { Logger } from '../domain/ports/Logger.js';
import type { SchemaScanner } from '../domain/ports/SchemaScanner.js';
import type { EventBus } from './EventBus.js';

/** Collaborators and settings shared by the import use cases. */
export interface ImportContext {
  readonly channels: ChannelManager;
  readonly loader: LoaderController;
  readonly scanner: SchemaScanner;
  readonly eventBus: EventBus;
  readonly logger: Logger;
  /** Exponent of the first transfer attempt's chunk size. */
  readonly initialExponent: number;
  /** Rows sampled by the scanner; `0` scans everything. */
  readonly maxRows: number;
  /** Keep importing the remaining tables after one fails. */
  readonly continueOnError: boolean;
}
