import type { UBXFrame } from './UBXFrame';

export enum UBXClass {
  ACK = 0x05,
  CFG = 0x06,
}

export enum UBXMessageId {
  ACK_NAK = 0x00,
  ACK_ACK = 0x01,
  CFG_CFG = 0x09,
  CFG_NAV5 = 0x24,
}

export const UBX_PROTOCOL = {
  SYNC1: 0xb5,
  SYNC2: 0x62,
  HEADER_SIZE: 6, // sync(2) + class + id + length(2)
  CHECKSUM_SIZE: 2,
  MAX_PAYLOAD_SIZE: 0xffff,
  NAV5_PAYLOAD_SIZE: 36,
} as const;

/** CFG-CFG masks used when persisting the current configuration */
export const CFG_SAVE = {
  CLEAR_MASK: 0x00000000,
  SAVE_MASK: 0x0000ffff, // every configuration section
  LOAD_MASK: 0x00000000,
  DEVICE_MASK: 0x17, // BBR | Flash | EEPROM | SPI flash
} as const;

/**
 * Minimal byte-level view of the serial link.
 * `read` may return fewer bytes than requested, or none at all.
 */
export interface ByteChannel {
  write(data: Buffer): Promise<void>;
  read(maxBytes: number): Promise<Buffer>;
  close(): Promise<void>;
}

export interface ReadBudget {
  /** Channel reads allowed per sync or read step */
  maxAttempts: number;
  /** Wall-clock limit per sync or read step (ms) */
  timeoutMs: number;
}

export type ReaderState =
  | 'seeking-sync'
  | 'reading-header'
  | 'reading-length'
  | 'reading-payload'
  | 'reading-checksum'
  | 'done'
  | 'failed';

export type FrameReadFailure = 'sync-timeout' | 'read-timeout' | 'checksum-mismatch';

export type FrameReadResult =
  | { ok: true; frame: UBXFrame }
  | { ok: false; reason: FrameReadFailure };

export type ExchangeFailureKind =
  | FrameReadFailure
  | 'unexpected-reply'
  | 'rejected'
  | 'channel-error';

export type ExchangeOperation = 'set' | 'get' | 'save';

export interface AttemptFailure {
  attempt: number;
  kind: ExchangeFailureKind;
  message: string;
}

export type ExchangeResult =
  | {
      ok: true;
      operation: ExchangeOperation;
      attempts: number;
      reply: UBXFrame;
      failures: AttemptFailure[];
    }
  | {
      ok: false;
      operation: ExchangeOperation;
      attempts: number;
      failures: AttemptFailure[];
      reason: string;
    };
