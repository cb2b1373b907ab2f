import { describe, it, expect, vi } from 'vitest';

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { SimulatedReceiver } from './SimulatedReceiver';
import { UBXExchange } from '../ubx/UBXExchange';
import { decodeNav5, getProfile, payloadFor } from '../profiles/ProfileCatalog';
import {
  ACK_ACK_CFG,
  ACK_ACK_NAV5,
  POLL_NAV5_FRAME,
  SAVE_FRAME,
  STATIONARY_NAV5_FRAME,
  buildAckNak,
  buildUBXFrame,
  flipBit,
} from '../ubx/test/ubxFrameFactory';

const FAST_BUDGET = { maxAttempts: 64, timeoutMs: 1000 };

async function drain(receiver: SimulatedReceiver): Promise<Buffer> {
  return receiver.read(receiver.pending);
}

describe('SimulatedReceiver', () => {
  describe('raw requests', () => {
    it('stores a CFG-NAV5 block and acknowledges it', async () => {
      const receiver = new SimulatedReceiver();
      await receiver.write(STATIONARY_NAV5_FRAME);

      expect(await drain(receiver)).toEqual(ACK_ACK_NAV5);
      expect(receiver.currentConfig).toEqual(payloadFor(getProfile('stationary')));
    });

    it('answers a poll with the current block followed by an acknowledgement', async () => {
      const receiver = new SimulatedReceiver({ initialProfile: 'stationary' });
      await receiver.write(POLL_NAV5_FRAME);

      expect(await drain(receiver)).toEqual(Buffer.concat([STATIONARY_NAV5_FRAME, ACK_ACK_NAV5]));
    });

    it('starts out with the portable model', () => {
      const receiver = new SimulatedReceiver();
      expect(decodeNav5(receiver.currentConfig).profile).toBe('portable');
    });

    it('persists the current block on CFG-CFG', async () => {
      const receiver = new SimulatedReceiver({ initialProfile: 'sea' });
      expect(receiver.savedConfig).toBeNull();

      await receiver.write(SAVE_FRAME);

      expect(await drain(receiver)).toEqual(ACK_ACK_CFG);
      expect(receiver.savedConfig).toEqual(payloadFor(getProfile('sea')));
    });

    it('rejects a CFG-NAV5 block of the wrong size', async () => {
      const receiver = new SimulatedReceiver();
      await receiver.write(buildUBXFrame(0x06, 0x24, [1, 2, 3]));

      expect(await drain(receiver)).toEqual(buildAckNak(0x06, 0x24));
      expect(decodeNav5(receiver.currentConfig).profile).toBe('portable');
    });

    it('rejects messages it does not implement', async () => {
      const receiver = new SimulatedReceiver();
      await receiver.write(buildUBXFrame(0x06, 0x01));

      expect(await drain(receiver)).toEqual(buildAckNak(0x06, 0x01));
    });

    it('stays silent on a corrupted request', async () => {
      const receiver = new SimulatedReceiver();
      await receiver.write(flipBit(STATIONARY_NAV5_FRAME, 12, 0));

      expect(receiver.pending).toBe(0);
    });

    it('puts configured noise ahead of every answer', async () => {
      const receiver = new SimulatedReceiver({ noise: Buffer.from([0x24, 0x47]) });
      await receiver.write(SAVE_FRAME);

      expect(await drain(receiver)).toEqual(Buffer.concat([Buffer.from([0x24, 0x47]), ACK_ACK_CFG]));
    });
  });

  describe('with UBXExchange', () => {
    it('sets, polls and saves a profile', async () => {
      const receiver = new SimulatedReceiver();
      const exchange = new UBXExchange(receiver, { readBudget: FAST_BUDGET });

      const set = await exchange.set(getProfile('airborne_lt_2g'));
      const polled = await exchange.get();

      expect(set.ok).toBe(true);
      expect(polled.ok).toBe(true);
      if (polled.ok) {
        expect(decodeNav5(polled.reply.payload).profile).toBe('airborne_lt_2g');
      }
      expect(receiver.currentConfig).toEqual(payloadFor(getProfile('airborne_lt_2g')));
    });

    it('persists a polled configuration with a single save request', async () => {
      const receiver = new SimulatedReceiver({ initialProfile: 'sea' });
      const exchange = new UBXExchange(receiver, { readBudget: FAST_BUDGET });

      const polled = await exchange.get();
      const saved = await exchange.save();

      expect(polled.ok).toBe(true);
      expect(saved.attempts).toBe(1);
      expect(receiver.written.filter(frame => frame.equals(SAVE_FRAME))).toHaveLength(1);
      expect(receiver.pending).toBe(0);
      expect(receiver.savedConfig).toEqual(payloadFor(getProfile('sea')));
    });

    it('gets through dropped replies by retrying', async () => {
      const receiver = new SimulatedReceiver({ dropReplies: 2 });
      const exchange = new UBXExchange(receiver, { readBudget: FAST_BUDGET });

      const result = await exchange.set(getProfile('automotive'));

      expect(result.ok).toBe(true);
      expect(result.attempts).toBe(3);
      expect(receiver.written).toHaveLength(3);
    });

    it('gives up when every reply is dropped', async () => {
      const receiver = new SimulatedReceiver({ dropReplies: 10 });
      const exchange = new UBXExchange(receiver, { readBudget: FAST_BUDGET });

      const result = await exchange.set(getProfile('automotive'));

      expect(result.ok).toBe(false);
      expect(result.attempts).toBe(5);
    });
  });
});
