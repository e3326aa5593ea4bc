import type { Readable } from 'node:stream';
import type { ReplayableSource } from '../../domain/ports/ReplayableSource.js';
import { StreamChunkReader } from './StreamChunkReader.js';

/** Opens a fresh decompressed stream of one archive member. */
export type EntryStreamOpener = () => Promise<Readable>;

/** Source over one ZIP member. Rewinding reopens the member's stream. */
export class ZipEntrySource implements ReplayableSource {
  private reader: StreamChunkReader | null = null;

  constructor(
    readonly name: string,
    readonly byteLength: number,
    private readonly openStream: EntryStreamOpener,
  ) {}

  async rewind(): Promise<void> {
    this.reader?.destroy();
    this.reader = null;
    this.reader = new StreamChunkReader(await this.openStream());
  }

  read(maxBytes: number): Promise<Buffer> {
    if (!this.reader) {
      return Promise.reject(new Error(`ZipEntrySource "${this.name}" must be rewound before reading`));
    }
    return this.reader.read(maxBytes);
  }

  close(): Promise<void> {
    this.reader?.destroy();
    this.reader = null;
    return Promise.resolve();
  }
}
