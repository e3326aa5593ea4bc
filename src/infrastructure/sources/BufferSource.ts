import type { ReplayableSource } from '../../domain/ports/ReplayableSource.js';

/** In-memory source. Rewinding only resets the read offset. */
export class BufferSource implements ReplayableSource {
  readonly name: string;
  readonly byteLength: number;
  private readonly content: Buffer;
  private offset = 0;

  constructor(data: string | Buffer, name = 'buffer-input') {
    this.content = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    this.byteLength = this.content.length;
    this.name = name;
  }

  rewind(): Promise<void> {
    this.offset = 0;
    return Promise.resolve();
  }

  read(maxBytes: number): Promise<Buffer> {
    const end = Math.min(this.offset + maxBytes, this.content.length);
    const chunk = this.content.subarray(this.offset, end);
    this.offset = end;
    return Promise.resolve(chunk);
  }

  close(): Promise<void> {
    return Promise.resolve();
  }
}
