import type { ReplayableSource } from './ReplayableSource.js';

export interface ArchiveMember {
  /** Path of the member inside the archive. */
  readonly name: string;
  /** Uncompressed size in bytes. */
  readonly size: number;
}

export interface ArchiveReader {
  members(): Promise<readonly ArchiveMember[]>;
  openMember(member: ArchiveMember): Promise<ReplayableSource>;
  close(): Promise<void>;
}
