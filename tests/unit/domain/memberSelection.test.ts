import { describe, it, expect } from 'vitest';
import {
  compileNameFilter,
  isCsvMember,
  matchesFilter,
  tableNameFor,
} from '../../../src/domain/services/memberSelection.js';

describe('tableNameFor', () => {
  it('should use the basename up to the first dot', () => {
    expect(tableNameFor('people.csv')).toBe('people');
    expect(tableNameFor('data/2024/people.v2.csv')).toBe('people');
  });

  it('should give an empty name for a basename that starts with a dot', () => {
    expect(tableNameFor('data/.csv')).toBe('');
  });

  it('should keep a name without dots', () => {
    expect(tableNameFor('exports/orders')).toBe('orders');
  });
});

describe('isCsvMember', () => {
  it('should match the extension case-insensitively', () => {
    expect(isCsvMember('a.csv')).toBe(true);
    expect(isCsvMember('dir/B.CSV')).toBe(true);
  });

  it('should reject other files', () => {
    expect(isCsvMember('readme.txt')).toBe(false);
    expect(isCsvMember('data.csv.bak')).toBe(false);
  });
});

describe('compileNameFilter', () => {
  it('should match at the start of the path, ignoring case', () => {
    const filter = compileNameFilter('data/');
    expect(matchesFilter('DATA/people.csv', filter)).toBe(true);
    expect(matchesFilter('raw/data/people.csv', filter)).toBe(false);
  });

  it('should apply the anchor to every alternative', () => {
    const filter = compileNameFilter('a|b');
    expect(matchesFilter('b/x.csv', filter)).toBe(true);
    expect(matchesFilter('cb/x.csv', filter)).toBe(false);
  });

  it('should throw on an invalid pattern', () => {
    expect(() => compileNameFilter('(')).toThrow(SyntaxError);
  });

  it('should accept every member without a filter', () => {
    expect(matchesFilter('anything.csv')).toBe(true);
  });
});
