import { UBXChecksum, UBXFrame } from './UBXFrame';
import { UBX_PROTOCOL } from './types';
import type { ByteChannel, FrameReadFailure, FrameReadResult, ReadBudget, ReaderState } from './types';
import { EXCHANGE } from '../../shared/constants';

const SYNC_MARKER = [UBX_PROTOCOL.SYNC1, UBX_PROTOCOL.SYNC2] as const;

/**
 * Pulls UBX frames out of a byte stream.
 *
 * Every sync or read step gets a fresh budget: it gives up after
 * `maxAttempts` channel reads or `timeoutMs`, whichever comes first.
 * Failures are reported as values, never thrown; retrying is up to the caller.
 */
export class FrameReader {
  private _state: ReaderState = 'seeking-sync';
  private readonly budget: ReadBudget;

  constructor(
    private channel: ByteChannel,
    budget: Partial<ReadBudget> = {}
  ) {
    this.budget = {
      maxAttempts: budget.maxAttempts ?? EXCHANGE.READ_BUDGET_ATTEMPTS,
      timeoutMs: budget.timeoutMs ?? EXCHANGE.READ_TIMEOUT,
    };
  }

  get state(): ReaderState {
    return this._state;
  }

  /**
   * Consume bytes one at a time until the sync marker has been seen.
   * A byte that breaks the marker is dropped and matching restarts from the
   * first sync byte with the next byte read.
   */
  async syncToFrame(): Promise<boolean> {
    this._state = 'seeking-sync';
    const hasBudget = this.startBudget();
    let matched = 0;

    while (hasBudget()) {
      const chunk = await this.channel.read(1);
      if (chunk.length === 0) continue;

      if (chunk[0] === SYNC_MARKER[matched]) {
        matched++;
        if (matched === SYNC_MARKER.length) {
          this._state = 'reading-header';
          return true;
        }
      } else {
        matched = 0;
      }
    }

    this._state = 'failed';
    return false;
  }

  /**
   * Collect exactly `count` bytes, or null once the budget runs out.
   */
  async readExact(count: number): Promise<Buffer | null> {
    const chunks: Buffer[] = [];
    let received = 0;
    const hasBudget = this.startBudget();

    while (received < count) {
      if (!hasBudget()) {
        return null;
      }
      const chunk = await this.channel.read(count - received);
      if (chunk.length > 0) {
        chunks.push(chunk);
        received += chunk.length;
      }
    }

    return Buffer.concat(chunks, count);
  }

  /**
   * Read the rest of a frame after a successful sync.
   * Returns null on timeout or checksum mismatch.
   */
  async readFrame(): Promise<UBXFrame | null> {
    const result = await this.readFrameBody();
    return result.ok ? result.frame : null;
  }

  /** Sync, then read one frame, keeping the reason when it fails */
  async nextFrame(): Promise<FrameReadResult> {
    if (!(await this.syncToFrame())) {
      return { ok: false, reason: 'sync-timeout' };
    }
    return this.readFrameBody();
  }

  private async readFrameBody(): Promise<FrameReadResult> {
    const checksum = new UBXChecksum();

    this._state = 'reading-header';
    const header = await this.readExact(2);
    if (!header) return this.fail('read-timeout');
    checksum.update(header);

    this._state = 'reading-length';
    const lengthBytes = await this.readExact(2);
    if (!lengthBytes) return this.fail('read-timeout');
    checksum.update(lengthBytes);
    const length = lengthBytes.readUInt16LE(0);

    this._state = 'reading-payload';
    const payload = await this.readExact(length);
    if (!payload) return this.fail('read-timeout');
    checksum.update(payload);

    this._state = 'reading-checksum';
    const received = await this.readExact(UBX_PROTOCOL.CHECKSUM_SIZE);
    if (!received) return this.fail('read-timeout');

    const [ckA, ckB] = checksum.digest();
    if (received[0] !== ckA || received[1] !== ckB) {
      return this.fail('checksum-mismatch');
    }

    this._state = 'done';
    return { ok: true, frame: new UBXFrame(header[0], header[1], payload) };
  }

  private fail(reason: FrameReadFailure): FrameReadResult {
    this._state = 'failed';
    return { ok: false, reason };
  }

  private startBudget(): () => boolean {
    const deadline = Date.now() + this.budget.timeoutMs;
    let attempts = 0;
    return () => attempts++ < this.budget.maxAttempts && Date.now() < deadline;
  }
}
