import pino from 'pino';
import type { DestinationStream, Logger as PinoLogger } from 'pino';
import type { LogFields, Logger } from '../../domain/ports/Logger.js';
import type { LogLevel } from '../../config/ImporterConfig.js';

export interface CreateLoggerOptions {
  readonly level: LogLevel;
  /** Default: stderr, so stdout stays free for command output. */
  readonly destination?: DestinationStream;
}

/** Adapt a pino logger to the injected `Logger` port. */
export function fromPino(base: PinoLogger): Logger {
  return {
    debug: (fields: LogFields, message: string) => base.debug(fields, message),
    info: (fields: LogFields, message: string) => base.info(fields, message),
    warn: (fields: LogFields, message: string) => base.warn(fields, message),
    error: (fields: LogFields, message: string) => base.error(fields, message),
    child: (bindings: LogFields) => fromPino(base.child(bindings)),
  };
}

export function createLogger(options: CreateLoggerOptions): Logger {
  const destination = options.destination ?? pino.destination(2);
  return fromPino(pino({ name: 'zip2sqlite', level: options.level }, destination));
}
