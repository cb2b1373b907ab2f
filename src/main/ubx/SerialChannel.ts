import { SerialPort } from 'serialport';
import { EventEmitter } from 'events';
import type { ByteChannel } from './types';
import { ConnectionError } from '../utils/errors';
import { logger } from '../utils/logger';
import { SERIAL } from '../../shared/constants';

export interface SerialChannelOptions {
  baudRate?: number;
  /** How long a read on an empty buffer waits for data before returning empty */
  readTimeoutMs?: number;
}

/**
 * ByteChannel over a serial device.
 *
 * Incoming data is buffered as it arrives; `read()` hands it out in pieces.
 * The port is opened 8N1 with no flow control and its input is flushed
 * before first use.
 */
export class SerialChannel extends EventEmitter implements ByteChannel {
  private port: SerialPort | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private readTimeoutMs: number = SERIAL.READ_POLL_INTERVAL;

  static async open(path: string, options: SerialChannelOptions = {}): Promise<SerialChannel> {
    const channel = new SerialChannel();
    await channel.open(path, options);
    return channel;
  }

  async open(path: string, options: SerialChannelOptions = {}): Promise<void> {
    if (this.port?.isOpen) {
      throw new ConnectionError('Port already open');
    }

    const baudRate = options.baudRate ?? SERIAL.DEFAULT_BAUD_RATE;
    this.readTimeoutMs = options.readTimeoutMs ?? SERIAL.READ_POLL_INTERVAL;

    const port = await new Promise<SerialPort>((resolve, reject) => {
      const opened: SerialPort = new SerialPort({
        path,
        baudRate,
        dataBits: 8,
        stopBits: 1,
        parity: 'none',
        rtscts: false,
        xon: false,
        xoff: false,
      }, (error) => {
        if (error) {
          reject(new ConnectionError(`Failed to open ${path}: ${error.message}`, error));
          return;
        }
        resolve(opened);
      });
    });

    await new Promise<void>((resolve, reject) => {
      port.flush((error) => {
        if (error) {
          const failure = new ConnectionError(`Failed to flush ${path}: ${error.message}`, error);
          // not handed to the caller, so release it here
          port.close((closeError) => {
            if (closeError) {
              logger.warn(`Failed to close ${path} after flush error: ${closeError.message}`);
            }
            reject(failure);
          });
          return;
        }
        resolve();
      });
    });

    this.port = port;
    this.buffer = Buffer.alloc(0);
    this.setupListeners(port);
    logger.debug(`Opened ${path} at ${baudRate} baud`);
  }

  isOpen(): boolean {
    return this.port?.isOpen ?? false;
  }

  async write(data: Buffer): Promise<void> {
    const port = this.requirePort();

    return new Promise((resolve, reject) => {
      port.write(data, (error) => {
        if (error) {
          reject(new ConnectionError(`Failed to write: ${error.message}`, error));
          return;
        }
        port.drain(() => resolve());
      });
    });
  }

  async read(maxBytes: number): Promise<Buffer> {
    this.requirePort();

    if (this.buffer.length === 0) {
      await this.waitForData();
    }

    const chunk = Buffer.from(this.buffer.subarray(0, maxBytes));
    this.buffer = this.buffer.subarray(chunk.length);
    return chunk;
  }

  async close(): Promise<void> {
    const port = this.port;
    if (!port?.isOpen) {
      this.port = null;
      return;
    }

    return new Promise((resolve, reject) => {
      port.close((error) => {
        if (error) {
          reject(new ConnectionError(`Failed to close port: ${error.message}`, error));
          return;
        }

        this.port = null;
        this.buffer = Buffer.alloc(0);
        logger.debug('Port closed');
        resolve();
      });
    });
  }

  private requirePort(): SerialPort {
    if (!this.port?.isOpen) {
      throw new ConnectionError('Port not open');
    }
    return this.port;
  }

  private waitForData(): Promise<void> {
    return new Promise((resolve) => {
      const onData = () => {
        clearTimeout(timeoutId);
        resolve();
      };
      const timeoutId = setTimeout(() => {
        this.removeListener('buffered', onData);
        resolve();
      }, this.readTimeoutMs);

      this.once('buffered', onData);
    });
  }

  private setupListeners(port: SerialPort): void {
    port.on('data', (data: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, data]);
      this.emit('buffered');
    });

    port.on('error', (error: Error) => {
      logger.error('Serial port error:', error);
      this.emit('port-error', error);
    });

    port.on('close', () => {
      logger.debug('Port closed by device');
      this.emit('disconnected');
    });
  }
}
