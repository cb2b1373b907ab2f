import log from 'electron-log/node';
import { LOG_LEVELS } from '../../shared/constants';

export interface LoggerOptions {
  verbose?: boolean;
  logFile?: string;
}

class Logger {
  constructor() {
    log.transports.file.level = false;
    log.transports.console.level = LOG_LEVELS.INFO;
    log.transports.console.format = '{text}';
  }

  configure(options: LoggerOptions): void {
    log.transports.console.level = options.verbose ? LOG_LEVELS.DEBUG : LOG_LEVELS.INFO;

    if (options.logFile) {
      const logFile = options.logFile;
      log.transports.file.resolvePathFn = () => logFile;
      log.transports.file.level = LOG_LEVELS.DEBUG;
    } else {
      log.transports.file.level = false;
    }
  }

  error(message: string, ...args: unknown[]): void {
    log.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    log.warn(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    log.info(message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    log.debug(message, ...args);
  }
}

export const logger = new Logger();
