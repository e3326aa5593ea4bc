const CSV_EXTENSION = /\.csv$/i;

/** Table name of an archive member: its basename up to the first dot. */
export function tableNameFor(memberName: string): string {
  const base = memberName.split('/').pop() ?? memberName;
  return base.split('.')[0] ?? base;
}

export function isCsvMember(memberName: string): boolean {
  return CSV_EXTENSION.test(memberName);
}

/**
 * Compile a user-supplied member filter. Like a prefix match: the pattern must
 * match at the start of the member path, case-insensitively.
 */
export function compileNameFilter(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})`, 'i');
}

export function matchesFilter(memberName: string, filter?: RegExp): boolean {
  return filter ? filter.test(memberName) : true;
}
