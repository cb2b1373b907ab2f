import { UBXClass, UBXMessageId, UBX_PROTOCOL } from './types';
import { UBXError } from '../utils/errors';

/**
 * Running 8-bit Fletcher checksum used by UBX.
 * Covers class, id, length and payload; never the sync bytes.
 */
export class UBXChecksum {
  private ckA = 0;
  private ckB = 0;

  update(data: Uint8Array | number[]): this {
    for (const byte of data) {
      this.ckA = (this.ckA + byte) & 0xff;
      this.ckB = (this.ckB + this.ckA) & 0xff;
    }
    return this;
  }

  digest(): [number, number] {
    return [this.ckA, this.ckB];
  }
}

export function ubxChecksum(data: Uint8Array | number[]): [number, number] {
  return new UBXChecksum().update(data).digest();
}

function assertByte(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new UBXError(`Invalid ${label}: ${value}`);
  }
}

export class UBXFrame {
  readonly msgClass: number;
  readonly msgId: number;
  private readonly data: Buffer;

  constructor(msgClass: number, msgId: number, payload: Buffer | number[] = Buffer.alloc(0)) {
    assertByte(msgClass, 'message class');
    assertByte(msgId, 'message id');

    if (payload.length > UBX_PROTOCOL.MAX_PAYLOAD_SIZE) {
      throw new UBXError(`Payload too large: ${payload.length} > ${UBX_PROTOCOL.MAX_PAYLOAD_SIZE}`);
    }

    this.msgClass = msgClass;
    this.msgId = msgId;
    this.data = Buffer.from(payload);
  }

  static ackAck(msgClass: number, msgId: number): UBXFrame {
    return new UBXFrame(UBXClass.ACK, UBXMessageId.ACK_ACK, [msgClass, msgId]);
  }

  static ackNak(msgClass: number, msgId: number): UBXFrame {
    return new UBXFrame(UBXClass.ACK, UBXMessageId.ACK_NAK, [msgClass, msgId]);
  }

  /** Copy of the payload; the frame itself stays immutable */
  get payload(): Buffer {
    return Buffer.from(this.data);
  }

  get length(): number {
    return this.data.length;
  }

  /**
   * Encode to wire format:
   * SYNC1 SYNC2 class id length(u16 LE) payload ckA ckB
   */
  serialize(): Buffer {
    const size = this.data.length;
    const buffer = Buffer.alloc(UBX_PROTOCOL.HEADER_SIZE + size + UBX_PROTOCOL.CHECKSUM_SIZE);

    buffer[0] = UBX_PROTOCOL.SYNC1;
    buffer[1] = UBX_PROTOCOL.SYNC2;
    buffer[2] = this.msgClass;
    buffer[3] = this.msgId;
    buffer.writeUInt16LE(size, 4);
    this.data.copy(buffer, UBX_PROTOCOL.HEADER_SIZE);

    const [ckA, ckB] = ubxChecksum(buffer.subarray(2, UBX_PROTOCOL.HEADER_SIZE + size));
    buffer[UBX_PROTOCOL.HEADER_SIZE + size] = ckA;
    buffer[UBX_PROTOCOL.HEADER_SIZE + size + 1] = ckB;

    return buffer;
  }

  /** Structural equality on class, id and payload */
  equals(other: UBXFrame): boolean {
    return (
      this.msgClass === other.msgClass &&
      this.msgId === other.msgId &&
      this.data.equals(other.data)
    );
  }

  isAckFor(request: UBXFrame): boolean {
    return this.equals(UBXFrame.ackAck(request.msgClass, request.msgId));
  }

  isNakFor(request: UBXFrame): boolean {
    return this.equals(UBXFrame.ackNak(request.msgClass, request.msgId));
  }

  toString(): string {
    const hex = (value: number) => `0x${value.toString(16).padStart(2, '0')}`;
    return `UBX(${hex(this.msgClass)}, ${hex(this.msgId)}, ${this.data.length} bytes)`;
  }
}
