import { createReadStream, statSync } from 'node:fs';
import { basename } from 'node:path';
import type { ReplayableSource } from '../../domain/ports/ReplayableSource.js';
import { StreamChunkReader } from './StreamChunkReader.js';

export interface FilePathSourceOptions {
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/** Source backed by a local file. Each rewind opens a new `createReadStream`. Node.js only. */
export class FilePathSource implements ReplayableSource {
  readonly name: string;
  readonly byteLength: number;
  private readonly highWaterMark: number;
  private reader: StreamChunkReader | null = null;

  constructor(
    private readonly filePath: string,
    options?: FilePathSourceOptions,
  ) {
    this.name = basename(filePath);
    this.byteLength = statSync(filePath).size;
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  rewind(): Promise<void> {
    this.reader?.destroy();
    this.reader = new StreamChunkReader(createReadStream(this.filePath, { highWaterMark: this.highWaterMark }));
    return Promise.resolve();
  }

  read(maxBytes: number): Promise<Buffer> {
    if (!this.reader) {
      return Promise.reject(new Error(`FilePathSource "${this.name}" must be rewound before reading`));
    }
    return this.reader.read(maxBytes);
  }

  close(): Promise<void> {
    this.reader?.destroy();
    this.reader = null;
    return Promise.resolve();
  }
}
