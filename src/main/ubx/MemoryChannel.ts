import type { ByteChannel } from './types';
import { ConnectionError } from '../utils/errors';

export interface MemoryChannelOptions {
  /** Largest number of bytes a single read hands out; emulates a slow link */
  chunkSize?: number;
}

/**
 * In-process ByteChannel backed by a byte queue.
 *
 * Bytes queued with `feed()` are handed out by `read()`; everything written is
 * captured in `written`. Reads on an empty queue return an empty buffer
 * immediately, like a serial read that timed out.
 */
export class MemoryChannel implements ByteChannel {
  public written: Buffer[] = [];
  public readCalls = 0;

  private queue: Buffer = Buffer.alloc(0);
  private closed = false;
  private readonly chunkSize: number;

  constructor(options: MemoryChannelOptions = {}) {
    this.chunkSize = options.chunkSize ?? Number.POSITIVE_INFINITY;
  }

  feed(data: Buffer | number[]): void {
    this.queue = Buffer.concat([this.queue, Buffer.from(data)]);
  }

  get pending(): number {
    return this.queue.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  async write(data: Buffer): Promise<void> {
    if (this.closed) {
      throw new ConnectionError('Channel closed');
    }
    this.written.push(Buffer.from(data));
    await this.onWrite(data);
  }

  async read(maxBytes: number): Promise<Buffer> {
    if (this.closed) {
      throw new ConnectionError('Channel closed');
    }
    this.readCalls++;

    const count = Math.min(maxBytes, this.chunkSize, this.queue.length);
    const chunk = Buffer.from(this.queue.subarray(0, count));
    this.queue = this.queue.subarray(count);
    return chunk;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.queue = Buffer.alloc(0);
  }

  /** Hook for subclasses that answer writes */
  protected async onWrite(_data: Buffer): Promise<void> {}
}
