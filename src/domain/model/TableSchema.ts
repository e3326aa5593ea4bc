/** SQLite column affinities the scanner can infer. */
export type ColumnAffinity = 'INTEGER' | 'REAL' | 'TEXT';

export interface ColumnDefinition {
  readonly name: string;
  readonly affinity: ColumnAffinity;
  /** Non-empty values observed while scanning. */
  readonly observed: number;
}

export interface TableSchema {
  readonly tableName: string;
  readonly columns: readonly ColumnDefinition[];
  /** Field separator detected in the source. */
  readonly delimiter: string;
  /** Whether the first source row holds column names. */
  readonly hasHeader: boolean;
  /** Data rows sampled for inference. */
  readonly rowsScanned: number;
  /** Single-line `CREATE TABLE` statement, usable as one loader command. */
  readonly createTableSql: string;
}
