import type { Channel } from '../../domain/model/Channel.js';
import type { TableSchema } from '../../domain/model/TableSchema.js';
import type { LoaderScript } from '../../domain/ports/LoaderController.js';

/** Quote an SQL identifier for SQLite. */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** Quote one argument of a sqlite3 dot-command. */
export function quoteDotArgument(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/** Dot-command spelling of a field separator; the shell resolves the backslash escapes. */
export function separatorArgument(delimiter: string): string {
  if (delimiter === '\t') return '\\t';
  return quoteDotArgument(delimiter);
}

export const sqliteScript: LoaderScript = {
  quitCommand: '.quit',

  createTable(schema: TableSchema): string[] {
    return [schema.createTableSql];
  },

  importFromChannel(channel: Channel, schema: TableSchema): string[] {
    const skip = schema.hasHeader ? '--skip 1 ' : '';
    return [
      '.mode csv',
      `.separator ${separatorArgument(schema.delimiter)} \\n`,
      `.import ${skip}${quoteDotArgument(channel.path)} ${quoteDotArgument(schema.tableName)}`,
    ];
  },

  truncate(tableName: string): string[] {
    return [`DELETE FROM ${quoteIdentifier(tableName)};`];
  },
};
