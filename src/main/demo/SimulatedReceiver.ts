import { MemoryChannel, type MemoryChannelOptions } from '../ubx/MemoryChannel';
import { FrameReader } from '../ubx/FrameReader';
import { UBXFrame } from '../ubx/UBXFrame';
import { UBXClass, UBXMessageId, UBX_PROTOCOL } from '../ubx/types';
import type { ConfiguredProfileName } from '../../shared/types/profile.types';
import { getProfile, payloadFor } from '../profiles/ProfileCatalog';
import { logger } from '../utils/logger';

export interface SimulatedReceiverOptions extends MemoryChannelOptions {
  /** Profile the receiver starts out with */
  initialProfile?: ConfiguredProfileName;
  /** Requests at the start of the session that get no answer */
  dropReplies?: number;
  /** Bytes sent ahead of every answer */
  noise?: Buffer;
}

const CFG_CFG_PAYLOAD_SIZES = [12, 13];

/**
 * In-process stand-in for a u-blox receiver, used by --demo.
 *
 * Answers CFG-NAV5 set/poll and CFG-CFG the way the receiver does; anything
 * it does not understand gets an ACK-NAK. Malformed requests get no answer.
 */
export class SimulatedReceiver extends MemoryChannel {
  private nav5: Buffer;
  private saved: Buffer | null = null;
  private dropsLeft: number;
  private readonly noise: Buffer;

  constructor(options: SimulatedReceiverOptions = {}) {
    super(options);
    this.nav5 = payloadFor(getProfile(options.initialProfile ?? 'portable'));
    this.dropsLeft = options.dropReplies ?? 0;
    this.noise = options.noise ?? Buffer.alloc(0);
  }

  /** CFG-NAV5 block currently in RAM */
  get currentConfig(): Buffer {
    return Buffer.from(this.nav5);
  }

  /** CFG-NAV5 block last persisted with CFG-CFG, if any */
  get savedConfig(): Buffer | null {
    return this.saved ? Buffer.from(this.saved) : null;
  }

  protected async onWrite(data: Buffer): Promise<void> {
    const request = await parseRequest(data);
    if (!request) {
      logger.debug('Simulated receiver: ignoring malformed request');
      return;
    }

    if (this.dropsLeft > 0) {
      this.dropsLeft--;
      logger.debug(`Simulated receiver: dropping reply to ${request}`);
      return;
    }

    const replies = this.respond(request);
    this.feed(Buffer.concat([this.noise, ...replies.map(frame => frame.serialize())]));
  }

  private respond(request: UBXFrame): UBXFrame[] {
    const nak = [UBXFrame.ackNak(request.msgClass, request.msgId)];
    const ack = UBXFrame.ackAck(request.msgClass, request.msgId);

    if (request.msgClass !== UBXClass.CFG) {
      return nak;
    }

    switch (request.msgId) {
      case UBXMessageId.CFG_NAV5:
        if (request.length === 0) {
          return [new UBXFrame(UBXClass.CFG, UBXMessageId.CFG_NAV5, this.nav5), ack];
        }
        if (request.length === UBX_PROTOCOL.NAV5_PAYLOAD_SIZE) {
          this.nav5 = request.payload;
          return [ack];
        }
        return nak;

      case UBXMessageId.CFG_CFG:
        if (!CFG_CFG_PAYLOAD_SIZES.includes(request.length)) {
          return nak;
        }
        this.saved = Buffer.from(this.nav5);
        return [ack];

      default:
        return nak;
    }
  }
}

async function parseRequest(data: Buffer): Promise<UBXFrame | null> {
  const source = new MemoryChannel();
  source.feed(data);
  const reader = new FrameReader(source, { maxAttempts: data.length + 1 });
  const result = await reader.nextFrame();
  return result.ok ? result.frame : null;
}
