import type { TableSchema } from '../../domain/model/TableSchema.js';
import type { ArchiveMember, ArchiveReader } from '../../domain/ports/ArchiveReader.js';
import { isCsvMember, matchesFilter, tableNameFor } from '../../domain/services/memberSelection.js';
import type { ImportContext } from '../ImportContext.js';

export interface SelectedMember {
  readonly member: ArchiveMember;
  readonly tableName: string;
}

export interface MemberSelection {
  readonly selected: readonly SelectedMember[];
  readonly skipped: readonly string[];
}

/** CSV members that pass the filter and name a table, in archive order. */
export async function selectMembers(archive: ArchiveReader, nameFilter?: RegExp): Promise<MemberSelection> {
  const selected: SelectedMember[] = [];
  const skipped: string[] = [];
  for (const member of await archive.members()) {
    const tableName = tableNameFor(member.name);
    // `dir/.csv` has no basename to name its table after.
    if (tableName !== '' && isCsvMember(member.name) && matchesFilter(member.name, nameFilter)) {
      selected.push({ member, tableName });
    } else {
      skipped.push(member.name);
    }
  }
  return { selected, skipped };
}

/** Use case: infer the schema of every selected member without touching a database. */
export class ScanArchive {
  constructor(private readonly ctx: ImportContext) {}

  async execute(archive: ArchiveReader, nameFilter?: RegExp): Promise<Map<string, TableSchema>> {
    const { selected } = await selectMembers(archive, nameFilter);
    const schemas = new Map<string, TableSchema>();

    for (const { member, tableName } of selected) {
      const source = await archive.openMember(member);
      try {
        const schema = await this.ctx.scanner.scan(source, tableName, { maxRows: this.ctx.maxRows });
        schemas.set(tableName, schema);
        this.ctx.eventBus.emit({
          type: 'table:scanned',
          tableName,
          member: member.name,
          columns: schema.columns.length,
          rowsScanned: schema.rowsScanned,
          timestamp: Date.now(),
        });
      } finally {
        await source.close();
      }
    }

    return schemas;
  }
}
