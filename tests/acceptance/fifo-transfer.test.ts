import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Zip2Sqlite } from '../../src/Zip2Sqlite.js';
import { FifoChannelManager } from '../../src/infrastructure/channel/FifoChannelManager.js';
import { CsvSchemaScanner } from '../../src/infrastructure/scanner/CsvSchemaScanner.js';
import { BufferSource } from '../../src/infrastructure/sources/BufferSource.js';
import { SchemaError } from '../../src/domain/errors/Zip2SqliteError.js';
import type { TransferAttemptFailedEvent } from '../../src/domain/events/DomainEvents.js';
import { InProcessSqliteLoader } from '../support/InProcessSqliteLoader.js';
import { createRecordingLogger } from '../support/fakes.js';

// --- Helpers ---

function generateCsv(count: number): string {
  const rows = ['id,name,score'];
  for (let i = 1; i <= count; i++) {
    rows.push(`${String(i)},name-${String(i)},${String(i * 1.5)}`);
  }
  return rows.join('\n') + '\n';
}

let baseDirectory = '';
let loader: InProcessSqliteLoader;

beforeEach(() => {
  baseDirectory = mkdtempSync(join(tmpdir(), 'zip2sqlite-fifo-'));
});

afterEach(() => {
  loader.close();
  rmSync(baseDirectory, { recursive: true, force: true });
});

async function importCsv(csv: string, options: { initialExponent: number; loader: InProcessSqliteLoader }) {
  const logger = createRecordingLogger();
  const importer = new Zip2Sqlite(
    { initialExponent: options.initialExponent },
    { loader: options.loader, channels: new FifoChannelManager({ baseDirectory, logger }), logger },
  );
  const failed: TransferAttemptFailedEvent[] = [];
  importer.on('transfer:attempt-failed', (event) => failed.push(event));

  const source = new BufferSource(csv, 'people.csv');
  const schema = await new CsvSchemaScanner().scan(source, 'people', { maxRows: 0 });
  const result = await importer.importTable(source, schema, 'people.db');
  return { result, failed, logger };
}

// ============================================================
// Transfers through a real FIFO
// ============================================================
describe('transfer through a named FIFO', () => {
  it('should load every row in one attempt and remove the channel', async () => {
    loader = new InProcessSqliteLoader();
    const csv = generateCsv(3);

    const { result } = await importCsv(csv, { initialExponent: 16, loader });

    expect(result.bytesTransferred).toBe(Buffer.byteLength(csv));
    expect(result.attempts).toHaveLength(1);
    expect(await loader.query('people.db', 'SELECT id, name, score FROM people ORDER BY id')).toEqual([
      { id: 1, name: 'name-1', score: 1.5 },
      { id: 2, name: 'name-2', score: 3 },
      { id: 3, name: 'name-3', score: 4.5 },
    ]);
    expect(readdirSync(baseDirectory)).toEqual([]);
  });

  it('should back off after the reader closes early and load each row exactly once', async () => {
    loader = new InProcessSqliteLoader({ closeAfter: (start) => (start === 0 ? 16 * 1024 : undefined) });
    const csv = generateCsv(20_000);

    const { result, failed } = await importCsv(csv, { initialExponent: 17, loader });

    expect(result.attempts.map((attempt) => [attempt.exponent, attempt.outcome])).toEqual([
      [17, 'reader_closed'],
      [16, 'completed'],
    ]);
    expect(failed).toHaveLength(1);
    expect(loader.history).toContain('DELETE FROM "people";');
    expect(await loader.query('people.db', 'SELECT COUNT(*) AS rows, SUM(id) AS ids FROM people')).toEqual([
      { rows: 20_000, ids: (20_000 * 20_001) / 2 },
    ]);
    expect(readdirSync(baseDirectory)).toEqual([]);
  });

  it('should refuse a table that already exists and leave its rows alone', async () => {
    loader = new InProcessSqliteLoader({ closeAfter: (start) => (start === 0 ? 1000 : undefined) });
    await loader.query('people.db', 'CREATE TABLE people (id INTEGER, name TEXT, score REAL)');
    await loader.query('people.db', "INSERT INTO people VALUES (-1, 'kept', 0)");

    const error = await importCsv(generateCsv(5000), { initialExponent: 14, loader }).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(SchemaError);
    expect(loader.history).not.toContain('DELETE FROM "people";');
    expect(loader.starts).toBe(0);
    expect(await loader.query('people.db', 'SELECT id, name FROM people')).toEqual([{ id: -1, name: 'kept' }]);
    expect(readdirSync(baseDirectory)).toEqual([]);
  });

  it('should stop waiting for a loader that died before opening the channel', async () => {
    loader = new InProcessSqliteLoader({ dieOnStart: (start) => start === 0 });
    const csv = generateCsv(10);

    const { result, logger } = await importCsv(csv, { initialExponent: 12, loader });

    expect(result.attempts.map((attempt) => [attempt.exponent, attempt.outcome])).toEqual([
      [12, 'reader_closed'],
      [11, 'completed'],
    ]);
    expect(await loader.query('people.db', 'SELECT COUNT(*) AS rows FROM people')).toEqual([{ rows: 10 }]);
    expect(logger.entries.filter((entry) => entry.level === 'error').map((entry) => entry.message)).toEqual([
      'loader did not terminate cleanly',
    ]);
    expect(readdirSync(baseDirectory)).toEqual([]);
  });

  it('should load a tab-separated file without a header row', async () => {
    loader = new InProcessSqliteLoader();
    const logger = createRecordingLogger();
    const importer = new Zip2Sqlite({}, { loader, channels: new FifoChannelManager({ baseDirectory, logger }), logger });
    const source = new BufferSource('7\tseven\n8\teight\n', 'numbers.tsv');
    const schema = await new CsvSchemaScanner({ hasHeader: false }).scan(source, 'numbers', { maxRows: 0 });

    await importer.importTable(source, schema, 'numbers.db');

    expect(loader.history).toContain('.separator \\t \\n');
    expect(await loader.query('numbers.db', 'SELECT column_1, column_2 FROM numbers')).toEqual([
      { column_1: 7, column_2: 'seven' },
      { column_1: 8, column_2: 'eight' },
    ]);
  });
});
