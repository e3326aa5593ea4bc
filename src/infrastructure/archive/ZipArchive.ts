import type { Readable } from 'node:stream';
import yauzl from 'yauzl';
import type { Entry, ZipFile } from 'yauzl';
import type { ArchiveMember, ArchiveReader } from '../../domain/ports/ArchiveReader.js';
import type { ReplayableSource } from '../../domain/ports/ReplayableSource.js';
import { ZipEntrySource } from '../sources/ZipEntrySource.js';

function openZip(path: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(path, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(err ?? new Error(`Unable to open archive ${path}`));
        return;
      }
      resolve(zipfile);
    });
  });
}

function listEntries(zipfile: ZipFile): Promise<Entry[]> {
  return new Promise((resolve, reject) => {
    const entries: Entry[] = [];
    zipfile.on('entry', (entry: Entry) => {
      entries.push(entry);
      zipfile.readEntry();
    });
    zipfile.once('end', () => resolve(entries));
    zipfile.once('error', reject);
    zipfile.readEntry();
  });
}

/**
 * Random-access ZIP reader built on yauzl.
 *
 * The central directory is read once; every member stream is opened on demand,
 * which is what lets a member source rewind.
 */
export class ZipArchive implements ArchiveReader {
  private entries: Map<string, Entry> | null = null;

  private constructor(
    private readonly path: string,
    private readonly zipfile: ZipFile,
  ) {}

  static async open(path: string): Promise<ZipArchive> {
    return new ZipArchive(path, await openZip(path));
  }

  async members(): Promise<readonly ArchiveMember[]> {
    const entries = await this.loadEntries();
    return [...entries.values()].map((entry) => ({ name: entry.fileName, size: entry.uncompressedSize }));
  }

  async openMember(member: ArchiveMember): Promise<ReplayableSource> {
    const entries = await this.loadEntries();
    const entry = entries.get(member.name);
    if (!entry) {
      throw new Error(`Archive ${this.path} has no member named ${member.name}`);
    }
    return new ZipEntrySource(member.name, entry.uncompressedSize, () => this.openEntryStream(entry));
  }

  close(): Promise<void> {
    this.zipfile.close();
    return Promise.resolve();
  }

  private async loadEntries(): Promise<Map<string, Entry>> {
    if (!this.entries) {
      const all = await listEntries(this.zipfile);
      this.entries = new Map(all.filter((entry) => !entry.fileName.endsWith('/')).map((entry) => [entry.fileName, entry]));
    }
    return this.entries;
  }

  private openEntryStream(entry: Entry): Promise<Readable> {
    return new Promise((resolve, reject) => {
      this.zipfile.openReadStream(entry, (err, stream) => {
        if (err || !stream) {
          reject(err ?? new Error(`Unable to open ${entry.fileName} in ${this.path}`));
          return;
        }
        resolve(stream);
      });
    });
  }
}
