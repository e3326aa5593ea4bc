import { describe, it, expect } from 'vitest';
import { runCli } from '../../../src/cli/program.js';
import type { CliIo } from '../../../src/cli/program.js';
import { noopLogger } from '../../../src/domain/ports/Logger.js';

function createIo(env: NodeJS.ProcessEnv = {}): CliIo & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return { stdout, stderr, out: (text) => stdout.push(text), err: (text) => stderr.push(text), env };
}

describe('runCli', () => {
  it('should print help and exit 0 without --zip', async () => {
    const io = createIo();

    const code = await runCli(['node', 'zip2sqlite'], io);

    expect(code).toBe(0);
    expect(io.stdout.join('')).toContain('Usage: zip2sqlite [options]');
    expect(io.stdout.join('')).toContain('-z, --zip <path>');
  });

  it('should exit 0 for --help', async () => {
    const io = createIo();

    const code = await runCli(['node', 'zip2sqlite', '--help'], io);

    expect(code).toBe(0);
    expect(io.stdout.join('')).toContain('--chunk-exponent <n>');
  });

  it('should reject an unknown option', async () => {
    const io = createIo();

    const code = await runCli(['node', 'zip2sqlite', '--zap'], io);

    expect(code).toBe(1);
    expect(io.stderr.join('')).toContain("unknown option '--zap'");
  });

  it('should print a configuration error envelope and exit 1', async () => {
    const io = createIo();

    const code = await runCli(['node', 'zip2sqlite', '--zip', 'export.zip', '--max=-1'], io, {
      createLogger: () => noopLogger,
    });

    expect(code).toBe(1);
    expect(io.stdout).toEqual([]);
    expect(JSON.parse(io.stderr[0] ?? '')).toEqual({
      event: 'import.failed',
      name: 'ConfigurationError',
      message: 'Invalid configuration: maxRows: Number must be greater than or equal to 0',
      code: 'invalid_config',
      issues: ['maxRows: Number must be greater than or equal to 0'],
    });
  });

  it('should take the chunk exponent from the environment', async () => {
    const io = createIo({ ZIP2SQLITE_CHUNK_EXPONENT: '40' });

    const fromEnv = await runCli(['node', 'zip2sqlite', '-z', 'export.zip'], io, { createLogger: () => noopLogger });

    expect(fromEnv).toBe(1);
    expect(JSON.parse(io.stderr[0] ?? '')).toMatchObject({
      issues: ['initialExponent: Number must be less than or equal to 30'],
    });
  });

  it('should report a missing archive', async () => {
    const io = createIo();

    const code = await runCli(['node', 'zip2sqlite', '-z', '/nonexistent/export.zip'], io, {
      createLogger: () => noopLogger,
    });

    expect(code).toBe(1);
    expect(JSON.parse(io.stderr[0] ?? '')).toMatchObject({ event: 'import.failed', code: 'ENOENT' });
  });
});
