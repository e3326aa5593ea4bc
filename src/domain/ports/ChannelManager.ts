import type { Channel } from '../model/Channel.js';

/** Write end of an open channel. */
export interface ChannelSink {
  /** Write the whole chunk. Rejects with `TransportError` when the reader has gone away. */
  write(chunk: Buffer): Promise<void>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

export interface OpenWriterOptions {
  /** Aborting releases a writer still blocked waiting for a reader. */
  readonly signal?: AbortSignal;
}

export interface ChannelManager {
  open(tableName: string): Promise<Channel>;
  /** Resolves once a reader has opened the other end. */
  openForWriting(channel: Channel, options?: OpenWriterOptions): Promise<ChannelSink>;
  close(channel: Channel): Promise<void>;
}
