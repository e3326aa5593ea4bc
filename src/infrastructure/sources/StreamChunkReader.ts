import type { Readable } from 'node:stream';

/**
 * Pulls exact-size reads out of a readable stream's chunk sequence.
 * Chunks are queued as they arrive and copied at most once, when a read spans several.
 */
export class StreamChunkReader {
  private readonly iterator: AsyncIterator<unknown>;
  private readonly queue: Buffer[] = [];
  private buffered = 0;
  private ended = false;

  constructor(private readonly stream: Readable) {
    this.iterator = stream[Symbol.asyncIterator]();
  }

  /** Resolve with up to `maxBytes` bytes; an empty buffer means the stream ended. */
  async read(maxBytes: number): Promise<Buffer> {
    while (this.buffered < maxBytes && !this.ended) {
      const next = await this.iterator.next();
      if (next.done) {
        this.ended = true;
        break;
      }
      const value: unknown = next.value;
      const chunk = Buffer.isBuffer(value) ? value : Buffer.from(String(value));
      this.queue.push(chunk);
      this.buffered += chunk.length;
    }
    return this.take(maxBytes);
  }

  destroy(): void {
    this.stream.destroy();
  }

  private take(maxBytes: number): Buffer {
    const parts: Buffer[] = [];
    let taken = 0;

    while (taken < maxBytes) {
      const head = this.queue.shift();
      if (!head) break;
      const wanted = maxBytes - taken;
      if (head.length > wanted) {
        parts.push(head.subarray(0, wanted));
        this.queue.unshift(head.subarray(wanted));
        taken += wanted;
      } else {
        parts.push(head);
        taken += head.length;
      }
    }

    this.buffered -= taken;
    const [only] = parts;
    return parts.length === 1 && only ? only : Buffer.concat(parts, taken);
  }
}
