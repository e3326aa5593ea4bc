import { Command, CommanderError } from 'commander';
import type { Logger } from '../domain/ports/Logger.js';
import type { ImporterConfigInput, LogLevel } from '../config/ImporterConfig.js';
import { resolveImporterConfig } from '../config/ImporterConfig.js';
import { loadEnvDefaults } from '../config/env.js';
import { Zip2Sqlite } from '../Zip2Sqlite.js';
import type { Zip2SqliteDependencies } from '../Zip2Sqlite.js';
import { createLogger } from '../infrastructure/logging/pinoLogger.js';
import { buildCliErrorEnvelope, isDebugMode } from './errorEnvelope.js';

export interface CliIo {
  readonly out: (text: string) => void;
  readonly err: (text: string) => void;
  readonly env: NodeJS.ProcessEnv;
}

export interface CliDependencies extends Zip2SqliteDependencies {
  readonly createLogger?: (level: LogLevel) => Logger;
}

interface CliOptions {
  zip?: string;
  sqlite?: string;
  filter?: string;
  max?: string;
  loader?: string;
  chunkExponent?: string;
  logLevel?: string;
}

const defaultIo: CliIo = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
  env: process.env,
};

export function createProgram(io: CliIo): Command {
  return new Command()
    .name('zip2sqlite')
    .description('Load the CSV files of a ZIP archive into SQLite tables through the sqlite3 shell')
    .option('-z, --zip <path>', 'ZIP archive to read')
    .option('-s, --sqlite <path>', 'SQLite database to load; without it the inferred CREATE TABLE statements are printed')
    .option('-f, --filter <regex>', 'only members whose path matches at its start (case-insensitive)')
    .option('-n, --max <rows>', 'rows sampled per file for type inference, 0 for all', '0')
    .option('--loader <binary>', 'sqlite3 executable')
    .option('--chunk-exponent <n>', 'first transfer attempt writes chunks of 2^n bytes')
    .option('--log-level <level>', 'fatal, error, warn, info, debug, trace or silent')
    .exitOverride()
    .configureOutput({ writeOut: (text) => io.out(text), writeErr: (text) => io.err(text) });
}

/** Run the CLI and resolve with the process exit code. */
export async function runCli(
  argv: readonly string[],
  io: CliIo = defaultIo,
  dependencies: CliDependencies = {},
): Promise<number> {
  const program = createProgram(io);
  try {
    program.parse([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  const options = program.opts<CliOptions>();
  if (!options.zip) {
    program.outputHelp();
    return 0;
  }
  const archivePath = options.zip;

  try {
    const envDefaults = loadEnvDefaults(io.env);
    const input: ImporterConfigInput = {
      archivePath,
      databasePath: options.sqlite,
      nameFilter: options.filter,
      maxRows: options.max,
      loaderBinary: options.loader ?? envDefaults.loaderBinary,
      initialExponent: options.chunkExponent ?? envDefaults.initialExponent,
      logLevel: options.logLevel ?? envDefaults.logLevel,
    };
    const config = resolveImporterConfig(input);
    const logger = (dependencies.createLogger ?? ((level: LogLevel) => createLogger({ level })))(config.logLevel);
    const importer = new Zip2Sqlite(input, { ...dependencies, logger });

    if (!config.databasePath) {
      const schemas = await importer.scan(archivePath);
      for (const schema of schemas.values()) {
        io.out(`${schema.createTableSql}\n`);
      }
      return 0;
    }

    const summary = await importer.importArchive(archivePath, config.databasePath);
    io.out(
      `${JSON.stringify({
        event: 'import.completed',
        imported: summary.imported.map((table) => ({
          table: table.tableName,
          bytes: table.bytesTransferred,
          attempts: table.attempts.length,
        })),
        failed: summary.failed.map((table) => ({ table: table.tableName, message: table.error.message })),
        skipped: summary.skipped.length,
      })}\n`,
    );
    return summary.failed.length > 0 ? 1 : 0;
  } catch (error) {
    io.err(`${JSON.stringify(buildCliErrorEnvelope(error, isDebugMode(io.env)))}\n`);
    return 1;
  }
}
