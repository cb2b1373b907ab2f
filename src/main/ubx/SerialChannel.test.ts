import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MockSerialPort, type MockPortOptions } from './test/MockSerialPort';

// Track mock port instances across test and SerialChannel
const ports = vi.hoisted((): { last: MockSerialPort | null } => ({ last: null }));

vi.mock('serialport', async () => {
  const mock = await import('./test/MockSerialPort');

  class SerialPort extends mock.MockSerialPort {
    constructor(opts: MockPortOptions, callback?: (error: Error | null) => void) {
      super(opts, callback);
      ports.last = this;
    }
  }

  return { SerialPort };
});

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

// Import after mocks are set up
import { SerialChannel } from './SerialChannel';
import { ConnectionError } from '../utils/errors';
import { ACK_ACK_NAV5 } from './test/ubxFrameFactory';

describe('SerialChannel', () => {
  let channel: SerialChannel;

  beforeEach(() => {
    ports.last = null;
    channel = new SerialChannel();
  });

  afterEach(() => {
    channel.removeAllListeners();
  });

  function getPort(): MockSerialPort {
    if (!ports.last) {
      throw new Error('no port created');
    }
    return ports.last;
  }

  // ─── open() ─────────────────────────────────────────────────

  describe('open', () => {
    it('opens 8N1 without flow control', async () => {
      await channel.open('/dev/ttyACM0', { baudRate: 38400 });
      const port = getPort();

      expect(port.path).toBe('/dev/ttyACM0');
      expect(port.options).toMatchObject({
        baudRate: 38400,
        dataBits: 8,
        stopBits: 1,
        parity: 'none',
        rtscts: false,
        xon: false,
        xoff: false,
      });
      expect(channel.isOpen()).toBe(true);
    });

    it('uses the default baud rate 9600', async () => {
      await channel.open('/dev/ttyACM0');
      expect(getPort().baudRate).toBe(9600);
    });

    it('flushes input before first use', async () => {
      await channel.open('/dev/ttyACM0');
      expect(getPort().flushCount).toBe(1);
    });

    it('throws ConnectionError when the device cannot be opened', async () => {
      MockSerialPort.failNextOpen();
      await expect(channel.open('/dev/missing')).rejects.toThrow(ConnectionError);
      expect(channel.isOpen()).toBe(false);
    });

    it('closes the port again when the input flush fails', async () => {
      const pending = channel.open('/dev/ttyACM0');
      getPort().failFlush();

      await expect(pending).rejects.toThrow('Failed to flush /dev/ttyACM0: Flush failed');
      expect(getPort().isOpen).toBe(false);
      expect(channel.isOpen()).toBe(false);
    });

    it('throws ConnectionError if already open', async () => {
      await channel.open('/dev/ttyACM0');
      await expect(channel.open('/dev/ttyACM0')).rejects.toThrow('Port already open');
    });

    it('opens through the static helper', async () => {
      const opened = await SerialChannel.open('/dev/ttyUSB1', { baudRate: 115200 });
      expect(opened.isOpen()).toBe(true);
      expect(getPort().baudRate).toBe(115200);
    });
  });

  // ─── write() ────────────────────────────────────────────────

  describe('write', () => {
    it('writes and drains', async () => {
      await channel.open('/dev/ttyACM0');
      await channel.write(Buffer.from([0xb5, 0x62]));

      expect(getPort().getAllWrittenBytes()).toEqual(Buffer.from([0xb5, 0x62]));
    });

    it('rejects when the port fails the write', async () => {
      await channel.open('/dev/ttyACM0');
      getPort().failWrites();

      await expect(channel.write(Buffer.from([1]))).rejects.toThrow('Failed to write: Write failed');
    });

    it('rejects when the port is not open', async () => {
      await expect(channel.write(Buffer.from([1]))).rejects.toThrow('Port not open');
    });
  });

  // ─── read() ─────────────────────────────────────────────────

  describe('read', () => {
    it('hands out buffered data in pieces', async () => {
      await channel.open('/dev/ttyACM0');
      getPort().injectData(ACK_ACK_NAV5);

      expect(await channel.read(4)).toEqual(ACK_ACK_NAV5.subarray(0, 4));
      expect(await channel.read(100)).toEqual(ACK_ACK_NAV5.subarray(4));
    });

    it('returns an empty buffer when nothing arrives in time', async () => {
      await channel.open('/dev/ttyACM0', { readTimeoutMs: 5 });
      expect((await channel.read(1)).length).toBe(0);
    });

    it('wakes up as soon as data arrives', async () => {
      await channel.open('/dev/ttyACM0', { readTimeoutMs: 10_000 });
      const pending = channel.read(2);
      getPort().injectData(Buffer.from([0xb5, 0x62, 0x05]));

      expect(await pending).toEqual(Buffer.from([0xb5, 0x62]));
    });

    it('rejects when the port is not open', async () => {
      await expect(channel.read(1)).rejects.toThrow(ConnectionError);
    });
  });

  // ─── close() ────────────────────────────────────────────────

  describe('close', () => {
    it('resolves immediately if port not open', async () => {
      await expect(channel.close()).resolves.toBeUndefined();
    });

    it('closes the port', async () => {
      await channel.open('/dev/ttyACM0');
      await channel.close();

      expect(channel.isOpen()).toBe(false);
      expect(getPort().isOpen).toBe(false);
    });

    it('rejects when the port fails to close', async () => {
      await channel.open('/dev/ttyACM0');
      getPort().failClose();

      await expect(channel.close()).rejects.toThrow('Failed to close port: Close failed');
    });
  });

  // ─── port events ────────────────────────────────────────────

  describe('port events', () => {
    it('re-emits port errors without throwing', async () => {
      await channel.open('/dev/ttyACM0');
      const errorSpy = vi.fn();
      channel.on('port-error', errorSpy);

      getPort().injectError(new Error('device unplugged'));

      expect(errorSpy).toHaveBeenCalledWith(new Error('device unplugged'));
    });

    it('emits disconnected when the device goes away', async () => {
      await channel.open('/dev/ttyACM0');
      const disconnectedSpy = vi.fn();
      channel.on('disconnected', disconnectedSpy);

      getPort().injectClose();

      expect(disconnectedSpy).toHaveBeenCalledTimes(1);
      expect(channel.isOpen()).toBe(false);
    });
  });
});
