import { createWriteStream } from 'node:fs';
import { pipeline } from 'node:stream/promises';
import yazl from 'yazl';

export interface ZipFixtureEntry {
  readonly name: string;
  /** Omit for a directory entry. */
  readonly content?: string | Buffer;
}

/** Write a ZIP archive with yazl, compressing every file entry. */
export async function writeZip(path: string, entries: readonly ZipFixtureEntry[]): Promise<string> {
  const zip = new yazl.ZipFile();
  for (const entry of entries) {
    if (entry.content === undefined) {
      zip.addEmptyDirectory(entry.name);
    } else {
      const content = typeof entry.content === 'string' ? Buffer.from(entry.content, 'utf-8') : entry.content;
      zip.addBuffer(content, entry.name, { compress: true });
    }
  }
  zip.end();
  await pipeline(zip.outputStream, createWriteStream(path));
  return path;
}
