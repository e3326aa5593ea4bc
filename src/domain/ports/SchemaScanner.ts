import type { TableSchema } from '../model/TableSchema.js';
import type { ReplayableSource } from './ReplayableSource.js';

export interface ScanOptions {
  /** Data rows to sample. `0` scans the whole source. */
  readonly maxRows: number;
}

export interface SchemaScanner {
  scan(source: ReplayableSource, tableName: string, options: ScanOptions): Promise<TableSchema>;
}
