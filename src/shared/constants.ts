export const APP_NAME = 'gnss-dynmodel';
export const APP_VERSION = '0.1.0';

export const SERIAL = {
  DEFAULT_DEVICE: '/dev/ttyACM0',
  DEFAULT_BAUD_RATE: 9600,
  /** How long a single channel read waits for bytes before returning empty */
  READ_POLL_INTERVAL: 20,
} as const;

export const EXCHANGE = {
  MAX_ATTEMPTS: 5,
  /** Channel reads allowed per sync or read step */
  READ_BUDGET_ATTEMPTS: 16384,
  /** Wall-clock limit per sync or read step (ms) */
  READ_TIMEOUT: 1500,
} as const;

export const EXIT_CODES = {
  OK: 0,
  EXCHANGE_FAILED: 1,
  INVALID_INPUT: 2,
  CHANNEL_OPEN_FAILED: 3,
} as const;

export const LOG_LEVELS = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug'
} as const;
