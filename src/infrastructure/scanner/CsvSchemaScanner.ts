import Papa from 'papaparse';
import type { ColumnDefinition, TableSchema } from '../../domain/model/TableSchema.js';
import type { ReplayableSource } from '../../domain/ports/ReplayableSource.js';
import type { ScanOptions, SchemaScanner } from '../../domain/ports/SchemaScanner.js';
import { ColumnTypeInferrer } from '../../domain/services/ColumnTypeInferrer.js';
import { SchemaError } from '../../domain/errors/Zip2SqliteError.js';
import { quoteIdentifier } from '../loader/sqliteScript.js';

const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'] as const;
const READ_CHUNK_BYTES = 65536;

export interface CsvSchemaScannerOptions {
  /** Force a delimiter instead of detecting one. */
  readonly delimiter?: string;
  /** Default: `true`. */
  readonly hasHeader?: boolean;
  /** Bytes pulled from the source per read. Default: `65536`. */
  readonly readChunkBytes?: number;
}

/** Pick the delimiter that splits the first lines into the most columns. */
export function detectDelimiter(sample: string): string {
  const firstLines = sample.split('\n').slice(0, 5).join('\n');

  let bestDelimiter = ',';
  let maxColumns = 0;

  for (const delimiter of CANDIDATE_DELIMITERS) {
    const result = Papa.parse<string[]>(firstLines, { delimiter, header: false });
    const firstRow = result.data[0];
    if (firstRow && firstRow.length > maxColumns) {
      maxColumns = firstRow.length;
      bestDelimiter = delimiter;
    }
  }

  return bestDelimiter;
}

/** Header cells become column names: trimmed, never empty, never repeated. */
export function normalizeColumnNames(header: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return header.map((cell, index) => {
    const base = cell.replace(/[\r\n]+/g, ' ').trim() || `column_${index + 1}`;
    const count = (seen.get(base.toLowerCase()) ?? 0) + 1;
    seen.set(base.toLowerCase(), count);
    return count === 1 ? base : `${base}_${count}`;
  });
}

export function renderCreateTable(tableName: string, columns: readonly ColumnDefinition[]): string {
  const body = columns.map((column) => `${quoteIdentifier(column.name)} ${column.affinity}`).join(', ');
  return `CREATE TABLE ${quoteIdentifier(tableName)} (${body});`;
}

/** Index of the last newline that ends a record, ignoring newlines inside quoted cells; `-1` if none. */
export function lastRecordBoundary(text: string): number {
  let inQuotes = false;
  let boundary = -1;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code === 0x22) {
      inQuotes = !inQuotes;
    } else if (code === 0x0a && !inQuotes) {
      boundary = i;
    }
  }
  return boundary;
}

interface ScanState {
  delimiter: string | undefined;
  names: string[] | undefined;
  inferrers: ColumnTypeInferrer[];
  rowsScanned: number;
}

/**
 * Infers a SQLite table schema from a CSV source, using papaparse.
 *
 * The source is decoded and parsed one record-aligned segment at a time, so
 * scanning every row never holds more than a read chunk plus one record.
 */
export class CsvSchemaScanner implements SchemaScanner {
  private readonly forcedDelimiter: string | undefined;
  private readonly hasHeader: boolean;
  private readonly readChunkBytes: number;

  constructor(options?: CsvSchemaScannerOptions) {
    this.forcedDelimiter = options?.delimiter;
    this.hasHeader = options?.hasHeader ?? true;
    this.readChunkBytes = options?.readChunkBytes ?? READ_CHUNK_BYTES;
  }

  async scan(source: ReplayableSource, tableName: string, options: ScanOptions): Promise<TableSchema> {
    const limit = options.maxRows > 0 ? options.maxRows : Number.POSITIVE_INFINITY;
    const state: ScanState = { delimiter: this.forcedDelimiter, names: undefined, inferrers: [], rowsScanned: 0 };
    // Drops a leading byte order mark.
    const decoder = new TextDecoder('utf-8');

    await source.rewind();
    let pending = '';
    let wantMore = true;

    while (wantMore) {
      const chunk = await source.read(this.readChunkBytes);
      if (chunk.length === 0) break;

      pending += decoder.decode(chunk, { stream: true });

      const boundary = lastRecordBoundary(pending);
      if (boundary < 0) continue;
      wantMore = this.consume(pending.slice(0, boundary + 1), state, limit);
      pending = pending.slice(boundary + 1);
    }

    if (wantMore) {
      pending += decoder.decode();
      this.consume(pending, state, limit);
    }

    const names = state.names;
    if (!names || names.length === 0) {
      throw new SchemaError(tableName, new Error(`source "${source.name}" has no columns`));
    }

    const columns: ColumnDefinition[] = names.map((name, index) => ({
      name,
      affinity: state.inferrers[index]?.affinity ?? 'TEXT',
      observed: state.inferrers[index]?.observed ?? 0,
    }));

    return {
      tableName,
      columns,
      delimiter: state.delimiter ?? ',',
      hasHeader: this.hasHeader,
      rowsScanned: state.rowsScanned,
      createTableSql: renderCreateTable(tableName, columns),
    };
  }

  /** Feed complete records to the inferrers. Returns `false` once `limit` data rows were seen. */
  private consume(text: string, state: ScanState, limit: number): boolean {
    if (!/\S/.test(text)) return state.rowsScanned < limit;

    const delimiter = state.delimiter ?? detectDelimiter(text);
    state.delimiter = delimiter;
    const result = Papa.parse<string[]>(text, { delimiter, header: false, skipEmptyLines: true, dynamicTyping: false });

    for (const row of result.data) {
      if (!state.names) {
        state.names = this.hasHeader ? normalizeColumnNames(row) : row.map((_, index) => `column_${index + 1}`);
        state.inferrers = state.names.map(() => new ColumnTypeInferrer());
        if (this.hasHeader) continue;
      }
      if (state.rowsScanned >= limit) return false;
      state.inferrers.forEach((inferrer, index) => inferrer.observe(row[index] ?? ''));
      state.rowsScanned++;
    }

    return state.rowsScanned < limit;
  }
}
