import { FrameReader } from './FrameReader';
import { UBXFrame } from './UBXFrame';
import { CFG_SAVE, UBXClass, UBXMessageId } from './types';
import type {
  AttemptFailure,
  ByteChannel,
  ExchangeFailureKind,
  ExchangeOperation,
  ExchangeResult,
  FrameReadResult,
  ReadBudget,
} from './types';
import type { Profile } from '../../shared/types/profile.types';
import { payloadFor } from '../profiles/ProfileCatalog';
import { getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { EXCHANGE } from '../../shared/constants';

export interface ExchangeOptions {
  /** Attempts per operation; each attempt re-sends the full request */
  maxAttempts?: number;
  readBudget?: Partial<ReadBudget>;
}

interface AttemptError {
  kind: ExchangeFailureKind;
  message: string;
}

type AttemptOutcome = { ok: true; reply: UBXFrame } | ({ ok: false } & AttemptError);

/** Returns null when the reply is the one expected */
type ReplyCheck = (reply: UBXFrame, request: UBXFrame) => AttemptError | null;

const FAILURE_MESSAGES: Record<ExchangeFailureKind, string> = {
  'sync-timeout': 'no sync marker before timeout',
  'read-timeout': 'incomplete frame before timeout',
  'checksum-mismatch': 'checksum mismatch',
  'unexpected-reply': 'unexpected reply',
  'rejected': 'request rejected (ACK-NAK)',
  'channel-error': 'channel error',
};

/**
 * Request/response driver for CFG-NAV5 and CFG-CFG.
 *
 * Every operation writes its request, reads the next frame and checks it
 * against the expected reply. Anything else counts as a failed attempt and
 * the whole request is sent again, up to `maxAttempts`. Failures are
 * returned, never thrown.
 */
export class UBXExchange {
  private readonly reader: FrameReader;
  private readonly maxAttempts: number;

  constructor(
    private channel: ByteChannel,
    options: ExchangeOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? EXCHANGE.MAX_ATTEMPTS;
    this.reader = new FrameReader(channel, options.readBudget);
  }

  /** Poll for a `poll` profile, set otherwise */
  async configure(profile: Profile): Promise<ExchangeResult> {
    return profile.kind === 'poll' ? this.get() : this.set(profile);
  }

  /** Send a CFG-NAV5 block and wait for its ACK-ACK */
  async set(profile: Profile): Promise<ExchangeResult> {
    const request = new UBXFrame(UBXClass.CFG, UBXMessageId.CFG_NAV5, payloadFor(profile));
    logger.debug(`Setting ${profile.name} profile`);
    return this.transact('set', request, expectAck);
  }

  /**
   * Poll the current CFG-NAV5 block. The receiver echoes the block under the
   * request's class and id, then acknowledges the poll; that ACK-ACK is read
   * and dropped so it cannot be taken for the reply to a later request.
   */
  async get(): Promise<ExchangeResult> {
    const request = new UBXFrame(UBXClass.CFG, UBXMessageId.CFG_NAV5);
    const result = await this.transact('get', request, expectEcho);
    if (result.ok) {
      await this.discardTrailingAck(request);
    }
    return result;
  }

  /** Persist the current configuration with CFG-CFG */
  async save(): Promise<ExchangeResult> {
    const request = new UBXFrame(UBXClass.CFG, UBXMessageId.CFG_CFG, buildSavePayload());
    return this.transact('save', request, expectAck);
  }

  /** A missing acknowledgement does not fail the poll */
  private async discardTrailingAck(request: UBXFrame): Promise<void> {
    let result: FrameReadResult;
    try {
      result = await this.reader.nextFrame();
    } catch (error) {
      logger.warn(`get: reading the poll acknowledgement failed: ${getErrorMessage(error)}`);
      return;
    }

    if (!result.ok) {
      logger.debug(`get: no acknowledgement after the poll reply (${FAILURE_MESSAGES[result.reason]})`);
    } else if (result.frame.isAckFor(request)) {
      logger.debug('get: poll acknowledged');
    } else {
      logger.warn(`get: dropped ${result.frame} following the poll reply`);
    }
  }

  private async transact(
    operation: ExchangeOperation,
    request: UBXFrame,
    check: ReplyCheck
  ): Promise<ExchangeResult> {
    const message = request.serialize();
    const failures: AttemptFailure[] = [];

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const outcome = await this.attempt(message, request, check);

      if (outcome.ok) {
        logger.debug(`${operation}: ${outcome.reply} accepted on attempt ${attempt}`);
        return { ok: true, operation, attempts: attempt, reply: outcome.reply, failures };
      }

      failures.push({ attempt, kind: outcome.kind, message: outcome.message });
      logger.warn(`${operation}: attempt ${attempt}/${this.maxAttempts} failed: ${outcome.message}`);
    }

    const last = failures[failures.length - 1];
    return {
      ok: false,
      operation,
      attempts: this.maxAttempts,
      failures,
      reason: last
        ? `${operation} failed after ${this.maxAttempts} attempts: ${last.message}`
        : `${operation} not attempted`,
    };
  }

  private async attempt(
    message: Buffer,
    request: UBXFrame,
    check: ReplyCheck
  ): Promise<AttemptOutcome> {
    let result: FrameReadResult;
    try {
      await this.channel.write(message);
      result = await this.reader.nextFrame();
    } catch (error) {
      return {
        ok: false,
        kind: 'channel-error',
        message: `${FAILURE_MESSAGES['channel-error']}: ${getErrorMessage(error)}`,
      };
    }

    if (!result.ok) {
      return { ok: false, kind: result.reason, message: FAILURE_MESSAGES[result.reason] };
    }

    const error = check(result.frame, request);
    return error ? { ok: false, ...error } : { ok: true, reply: result.frame };
  }
}

function expectAck(reply: UBXFrame, request: UBXFrame): AttemptError | null {
  if (reply.isAckFor(request)) {
    return null;
  }
  if (reply.isNakFor(request)) {
    return { kind: 'rejected', message: FAILURE_MESSAGES.rejected };
  }
  return { kind: 'unexpected-reply', message: `${FAILURE_MESSAGES['unexpected-reply']} ${reply}` };
}

function expectEcho(reply: UBXFrame, request: UBXFrame): AttemptError | null {
  if (reply.msgClass === request.msgClass && reply.msgId === request.msgId) {
    return null;
  }
  if (reply.isNakFor(request)) {
    return { kind: 'rejected', message: FAILURE_MESSAGES.rejected };
  }
  return { kind: 'unexpected-reply', message: `${FAILURE_MESSAGES['unexpected-reply']} ${reply}` };
}

/** CFG-CFG: clearMask, saveMask, loadMask (u32 LE each), deviceMask (u8) */
export function buildSavePayload(): Buffer {
  const payload = Buffer.alloc(13);
  payload.writeUInt32LE(CFG_SAVE.CLEAR_MASK, 0);
  payload.writeUInt32LE(CFG_SAVE.SAVE_MASK, 4);
  payload.writeUInt32LE(CFG_SAVE.LOAD_MASK, 8);
  payload.writeUInt8(CFG_SAVE.DEVICE_MASK, 12);
  return payload;
}
