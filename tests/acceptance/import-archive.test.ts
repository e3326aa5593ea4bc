import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { mkdtempSync, readdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Zip2Sqlite } from '../../src/Zip2Sqlite.js';
import { runCli } from '../../src/cli/program.js';
import type { CliIo } from '../../src/cli/program.js';
import { FifoChannelManager } from '../../src/infrastructure/channel/FifoChannelManager.js';
import { ConfigurationError } from '../../src/domain/errors/Zip2SqliteError.js';
import type { DomainEvent } from '../../src/domain/events/DomainEvents.js';
import { noopLogger } from '../../src/domain/ports/Logger.js';
import { InProcessSqliteLoader } from '../support/InProcessSqliteLoader.js';
import { writeZip } from '../support/zipFixtures.js';

// --- Helpers ---

const PEOPLE = 'id,name,height\n1,Alice,1.62\n2,Bob,1.80\n';
const ORDERS = 'order_id;customer;total\n10;1;19.99\n11;2;5\n12;1;\n';

let testDir = '';
let archivePath = '';
let channelDir = '';
let loader: InProcessSqliteLoader;

beforeAll(async () => {
  testDir = mkdtempSync(join(tmpdir(), 'zip2sqlite-archive-'));
  archivePath = await writeZip(join(testDir, 'export.zip'), [
    { name: 'data/' },
    { name: 'data/people.csv', content: PEOPLE },
    { name: 'data/orders.CSV', content: ORDERS },
    { name: 'archive/people.csv', content: 'id\n99\n' },
    { name: 'notes.txt', content: 'not a table' },
  ]);
});

afterAll(() => {
  rmSync(testDir, { recursive: true, force: true });
});

afterEach(() => {
  loader.close();
  rmSync(channelDir, { recursive: true, force: true });
});

function createImporter(config: { nameFilter?: string; maxRows?: number; continueOnError?: boolean } = {}) {
  channelDir = mkdtempSync(join(tmpdir(), 'zip2sqlite-archive-channels-'));
  loader = new InProcessSqliteLoader();
  const importer = new Zip2Sqlite(
    { databasePath: 'export.db', initialExponent: 16, ...config },
    { loader, channels: new FifoChannelManager({ baseDirectory: channelDir }) },
  );
  const events: DomainEvent[] = [];
  for (const type of ['table:scanned', 'table:failed', 'import:completed', 'import:failed'] as const) {
    importer.on(type, (event) => events.push(event));
  }
  return { importer, events };
}

function createIo(env: NodeJS.ProcessEnv = {}): CliIo & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return { stdout, stderr, out: (text) => stdout.push(text), err: (text) => stderr.push(text), env };
}

// ============================================================
// Scanning
// ============================================================
describe('Zip2Sqlite.scan()', () => {
  it('should infer a schema for every CSV member matching the filter', async () => {
    const { importer } = createImporter({ nameFilter: 'data/' });

    const schemas = await importer.scan(archivePath);

    expect([...schemas.keys()]).toEqual(['people', 'orders']);
    expect(schemas.get('people')?.createTableSql).toBe(
      'CREATE TABLE "people" ("id" INTEGER, "name" TEXT, "height" REAL);',
    );
    expect(schemas.get('orders')?.createTableSql).toBe(
      'CREATE TABLE "orders" ("order_id" INTEGER, "customer" INTEGER, "total" REAL);',
    );
    expect(loader.history).toEqual([]);
  });
});

// ============================================================
// Importing
// ============================================================
describe('Zip2Sqlite.importArchive()', () => {
  it('should load every selected member into its own table', async () => {
    const { importer, events } = createImporter({ nameFilter: 'data/' });

    const summary = await importer.importArchive(archivePath);

    expect(summary.imported.map((table) => table.tableName)).toEqual(['people', 'orders']);
    expect(summary.failed).toEqual([]);
    expect(summary.skipped).toEqual(['archive/people.csv', 'notes.txt']);

    expect(await loader.query('export.db', 'SELECT id, name, height FROM people ORDER BY id')).toEqual([
      { id: 1, name: 'Alice', height: 1.62 },
      { id: 2, name: 'Bob', height: 1.8 },
    ]);
    expect(await loader.query('export.db', 'SELECT order_id, customer, total FROM orders ORDER BY order_id')).toEqual([
      { order_id: 10, customer: 1, total: 19.99 },
      { order_id: 11, customer: 2, total: 5 },
      { order_id: 12, customer: 1, total: '' },
    ]);
    expect(events.map((event) => event.type)).toEqual(['table:scanned', 'table:scanned', 'import:completed']);
    expect(readdirSync(channelDir)).toEqual([]);
  });

  it('should record a second member with the same table name as a failure', async () => {
    const { importer, events } = createImporter();

    const summary = await importer.importArchive(archivePath);

    expect(summary.imported.map((table) => table.tableName)).toEqual(['people', 'orders']);
    expect(summary.failed.map((table) => [table.tableName, table.error.message])).toEqual([
      ['people', 'table "people" was already loaded from data/people.csv'],
    ]);
    expect(events.filter((event) => event.type === 'table:failed')).toHaveLength(1);
    expect(await loader.query('export.db', 'SELECT COUNT(*) AS rows FROM people')).toEqual([{ rows: 2 }]);
  });

  it('should stop at the first failure when continueOnError is false', async () => {
    const { importer, events } = createImporter({ continueOnError: false });

    await expect(importer.importArchive(archivePath)).rejects.toThrow('table "people" was already loaded');
    expect(events.map((event) => event.type)).toEqual([
      'table:scanned',
      'table:scanned',
      'table:failed',
      'import:failed',
    ]);
  });

  it('should require a database path', async () => {
    loader = new InProcessSqliteLoader();
    channelDir = mkdtempSync(join(tmpdir(), 'zip2sqlite-archive-channels-'));
    const importer = new Zip2Sqlite({}, { loader, channels: new FifoChannelManager({ baseDirectory: channelDir }) });

    await expect(importer.importArchive(archivePath)).rejects.toBeInstanceOf(ConfigurationError);
  });
});

// ============================================================
// CLI
// ============================================================
describe('zip2sqlite CLI', () => {
  it('should print the CREATE TABLE statements without --sqlite', async () => {
    loader = new InProcessSqliteLoader();
    channelDir = mkdtempSync(join(tmpdir(), 'zip2sqlite-archive-channels-'));
    const io = createIo();

    const code = await runCli(['node', 'zip2sqlite', '-z', archivePath, '-f', 'data/people'], io, {
      createLogger: () => noopLogger,
    });

    expect(code).toBe(0);
    expect(io.stdout).toEqual(['CREATE TABLE "people" ("id" INTEGER, "name" TEXT, "height" REAL);\n']);
    expect(io.stderr).toEqual([]);
  });

  it('should import and print a summary line with --sqlite', async () => {
    loader = new InProcessSqliteLoader();
    channelDir = mkdtempSync(join(tmpdir(), 'zip2sqlite-archive-channels-'));
    const io = createIo({ ZIP2SQLITE_CHUNK_EXPONENT: '16' });

    const code = await runCli(['node', 'zip2sqlite', '--zip', archivePath, '--sqlite', 'cli.db', '--filter', 'data/'], io, {
      createLogger: () => noopLogger,
      loader,
      channels: new FifoChannelManager({ baseDirectory: channelDir }),
    });

    expect(code).toBe(0);
    expect(io.stdout).toHaveLength(1);
    expect(JSON.parse(io.stdout[0] ?? '')).toEqual({
      event: 'import.completed',
      imported: [
        { table: 'people', bytes: Buffer.byteLength(PEOPLE), attempts: 1 },
        { table: 'orders', bytes: Buffer.byteLength(ORDERS), attempts: 1 },
      ],
      failed: [],
      skipped: 2,
    });
    expect(await loader.query('cli.db', 'SELECT COUNT(*) AS rows FROM orders')).toEqual([{ rows: 3 }]);
  });

  it('should exit 1 when a table fails', async () => {
    loader = new InProcessSqliteLoader();
    channelDir = mkdtempSync(join(tmpdir(), 'zip2sqlite-archive-channels-'));
    const io = createIo();

    const code = await runCli(['node', 'zip2sqlite', '-z', archivePath, '-s', 'cli.db'], io, {
      createLogger: () => noopLogger,
      loader,
      channels: new FifoChannelManager({ baseDirectory: channelDir }),
    });

    expect(code).toBe(1);
    expect(JSON.parse(io.stdout[0] ?? '')).toMatchObject({
      failed: [{ table: 'people', message: 'table "people" was already loaded from data/people.csv' }],
    });
  });
});
