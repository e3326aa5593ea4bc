import { spawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import type { LoaderController, LoaderExit, LoaderHandle, LoaderScript } from '../../domain/ports/LoaderController.js';
import type { Logger } from '../../domain/ports/Logger.js';
import { noopLogger } from '../../domain/ports/Logger.js';
import { LoaderState, canTransition } from '../../domain/model/LoaderState.js';
import { LoaderError, LoaderTerminationError, toErrorMessage } from '../../domain/errors/Zip2SqliteError.js';
import { sqliteScript } from './sqliteScript.js';

/** The slice of `ChildProcess` the controller relies on. */
export interface SpawnedProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

export type ProcessSpawner = (command: string, args: readonly string[]) => SpawnedProcess;

export const spawnProcess: ProcessSpawner = (command, args) => spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });

export interface Sqlite3LoaderControllerOptions {
  /** Path or name of the sqlite3 shell. Default: `'sqlite3'`. */
  readonly binary?: string;
  readonly spawner?: ProcessSpawner;
  readonly logger?: Logger;
}

class OutputCollector {
  private readonly chunks: Buffer[] = [];

  constructor(stream: Readable) {
    stream.on('data', (chunk: Buffer | string) => {
      this.chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    });
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf-8').trim();
  }
}

function waitForExit(proc: SpawnedProcess): Promise<LoaderExit> {
  return new Promise((resolve) => {
    let settled = false;
    proc.once('close', (exitCode, signal) => {
      if (settled) return;
      settled = true;
      resolve({ exitCode, signal });
    });
    proc.once('error', (error) => {
      if (settled) return;
      settled = true;
      resolve({ exitCode: null, signal: null, error: error.message });
    });
  });
}

function isCleanExit(exit: LoaderExit): boolean {
  return exit.error === undefined && exit.exitCode === 0;
}

function describeExit(exit: LoaderExit): string {
  if (exit.error !== undefined) return exit.error;
  if (exit.signal) return `killed by ${exit.signal}`;
  return `exit code ${String(exit.exitCode)}`;
}

class RunningLoader implements LoaderHandle {
  state: LoaderState = LoaderState.NOT_STARTED;
  readonly exited: Promise<LoaderExit>;
  readonly stdout: OutputCollector;
  readonly stderr: OutputCollector;

  constructor(
    readonly id: number,
    readonly child: SpawnedProcess,
  ) {
    this.exited = waitForExit(child);
    this.stdout = new OutputCollector(child.stdout);
    this.stderr = new OutputCollector(child.stderr);
  }

  transitionTo(next: LoaderState): void {
    if (!canTransition(this.state, next)) {
      throw new Error(`Loader ${this.id} cannot move from ${this.state} to ${next}`);
    }
    this.state = next;
  }
}

/**
 * Drives the `sqlite3` command-line shell.
 *
 * Control commands are passed as `-cmd` arguments; the quit command goes to
 * stdin, because the shell does not reliably exit when the FIFO hits EOF.
 */
export class Sqlite3LoaderController implements LoaderController {
  readonly script: LoaderScript = sqliteScript;
  private readonly binary: string;
  private readonly spawner: ProcessSpawner;
  private readonly logger: Logger;
  private readonly running = new Map<number, RunningLoader>();
  private nextId = 1;

  constructor(options?: Sqlite3LoaderControllerOptions) {
    this.binary = options?.binary ?? 'sqlite3';
    this.spawner = options?.spawner ?? spawnProcess;
    this.logger = options?.logger ?? noopLogger;
  }

  async runOnce(commands: readonly string[], databasePath: string): Promise<void> {
    const loader = this.spawn(['-bail', ...this.commandArgs(commands), databasePath]);
    loader.child.stdin.end();

    const exit = await loader.exited;
    loader.transitionTo(LoaderState.TERMINATING);
    loader.transitionTo(LoaderState.EXITED);
    this.logDiagnostics(loader);

    if (!isCleanExit(exit)) {
      throw new LoaderError(`${this.binary} failed (${describeExit(exit)}): ${loader.stderr.text()}`, {
        exitCode: exit.exitCode,
        signal: exit.signal,
        stdout: loader.stdout.text(),
        stderr: loader.stderr.text(),
      });
    }
  }

  start(commands: readonly string[], databasePath: string): Promise<LoaderHandle> {
    const loader = this.spawn([...this.commandArgs(commands), databasePath]);
    this.running.set(loader.id, loader);
    this.logger.debug({ loader: loader.id }, 'loader started, blocked on channel');
    return Promise.resolve(loader);
  }

  async terminate(handle: LoaderHandle): Promise<LoaderExit> {
    const loader = this.running.get(handle.id);
    if (!loader) {
      throw new LoaderTerminationError(`Loader ${handle.id} is not running under this controller`);
    }

    loader.transitionTo(LoaderState.TERMINATING);
    let quitError: unknown;
    try {
      await Promise.race([this.sendQuit(loader.child.stdin), loader.exited]);
    } catch (error) {
      quitError = error;
      this.logger.warn({ loader: loader.id, error: toErrorMessage(error) }, 'quit command could not be delivered');
    }

    const exit = await loader.exited;
    loader.transitionTo(LoaderState.EXITED);
    this.running.delete(loader.id);
    this.logDiagnostics(loader);

    if (!isCleanExit(exit)) {
      throw new LoaderTerminationError(
        `Loader ${loader.id} did not exit cleanly (${describeExit(exit)}): ${loader.stderr.text()}`,
        quitError,
      );
    }
    return exit;
  }

  private spawn(args: readonly string[]): RunningLoader {
    const id = this.nextId++;
    let child: SpawnedProcess;
    try {
      child = this.spawner(this.binary, args);
    } catch (error) {
      throw new LoaderError(
        `Failed to spawn ${this.binary}: ${toErrorMessage(error)}`,
        { exitCode: null, signal: null, stdout: '', stderr: '' },
        error,
      );
    }
    // A loader that dies early closes its stdin; the resulting EPIPE is reported by terminate().
    child.stdin.on('error', (error: Error) => {
      this.logger.debug({ loader: id, error: error.message }, 'loader control input error');
    });

    const loader = new RunningLoader(id, child);
    loader.transitionTo(LoaderState.RUNNING);
    this.logger.debug({ loader: id, args }, 'spawned loader');
    return loader;
  }

  private sendQuit(stdin: Writable): Promise<void> {
    if (stdin.destroyed || stdin.writableEnded) {
      return Promise.reject(new Error('loader control input is already closed'));
    }
    return new Promise((resolve, reject) => {
      stdin.once('error', reject);
      stdin.end(`${this.script.quitCommand}\n`, () => {
        stdin.off('error', reject);
        resolve();
      });
    });
  }

  private commandArgs(commands: readonly string[]): string[] {
    return commands.flatMap((command) => ['-cmd', command]);
  }

  private logDiagnostics(loader: RunningLoader): void {
    const stdout = loader.stdout.text();
    const stderr = loader.stderr.text();
    if (stdout || stderr) {
      this.logger.debug({ loader: loader.id, stdout, stderr }, 'loader output');
    }
  }
}
