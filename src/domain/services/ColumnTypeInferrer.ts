import type { ColumnAffinity } from '../model/TableSchema.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const REAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
// SQLite integers are 64-bit; longer digit runs would lose precision.
const MAX_INTEGER_DIGITS = 18;

const RANK: Record<ColumnAffinity, number> = { INTEGER: 0, REAL: 1, TEXT: 2 };

/** Affinity of a single cell, or `null` for an empty cell. */
export function classifyValue(raw: string): ColumnAffinity | null {
  const value = raw.trim();
  if (value === '') return null;

  if (INTEGER_PATTERN.test(value)) {
    const digits = value.replace(/^[+-]/, '');
    // Leading zeros carry meaning (postcodes, account numbers).
    if (digits.length > 1 && digits.startsWith('0')) return 'TEXT';
    return digits.length <= MAX_INTEGER_DIGITS ? 'INTEGER' : 'TEXT';
  }
  if (REAL_PATTERN.test(value)) return 'REAL';
  return 'TEXT';
}

export function widen(a: ColumnAffinity, b: ColumnAffinity): ColumnAffinity {
  return RANK[a] >= RANK[b] ? a : b;
}

/** Tracks the narrowest affinity that fits every value seen in one column. */
export class ColumnTypeInferrer {
  private current: ColumnAffinity | null = null;
  private count = 0;

  observe(raw: string): void {
    const affinity = classifyValue(raw);
    if (affinity === null) return;
    this.count++;
    this.current = this.current === null ? affinity : widen(this.current, affinity);
  }

  /** A column with no non-empty values is `TEXT`. */
  get affinity(): ColumnAffinity {
    return this.current ?? 'TEXT';
  }

  get observed(): number {
    return this.count;
  }
}
