import type { ByteChannel, ExchangeResult } from '../ubx/types';
import type { DecodedNav5, Profile } from '../../shared/types/profile.types';
import { UBXExchange } from '../ubx/UBXExchange';
import { SerialChannel } from '../ubx/SerialChannel';
import { SimulatedReceiver } from '../demo/SimulatedReceiver';
import { applyOverrides, getProfile, decodeNav5 } from '../profiles/ProfileCatalog';
import { USAGE, describeCatalog, parseCommandLine } from './args';
import type { ParsedCommand, RunConfig } from './args';
import { PreflightError, UBXError, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { EXIT_CODES } from '../../shared/constants';

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface SkippedSave {
  ok: true;
  operation: 'save';
  skipped: true;
  reason: string;
}

export type SaveOutcome = ExchangeResult | SkippedSave;

export interface SessionOptions {
  save: boolean;
  maxAttempts: number;
  timeoutMs: number;
}

export interface SessionOutcome {
  ok: boolean;
  configure: ExchangeResult;
  save: SaveOutcome;
  /** Present after a successful poll whose reply could be decoded */
  decoded?: DecodedNav5;
}

export type ChannelOpener = (config: RunConfig) => Promise<ByteChannel>;

export const openChannel: ChannelOpener = async (config) => {
  if (config.demo) {
    logger.info('Demo mode: using a simulated receiver');
    return new SimulatedReceiver();
  }
  return SerialChannel.open(config.device, { baudRate: config.baudRate });
};

/**
 * One set-or-poll followed by an optional save, over an already open channel.
 */
export async function runSession(
  channel: ByteChannel,
  profile: Profile,
  options: SessionOptions
): Promise<SessionOutcome> {
  const exchange = new UBXExchange(channel, {
    maxAttempts: options.maxAttempts,
    readBudget: { timeoutMs: options.timeoutMs },
  });

  const configure = await exchange.configure(profile);
  const decoded = configure.ok && configure.operation === 'get'
    ? decodeReply(configure.reply.payload)
    : undefined;

  let save: SaveOutcome;
  if (!options.save) {
    save = skippedSave('not requested');
  } else if (!configure.ok) {
    save = skippedSave(`${configure.operation} failed`);
  } else {
    save = await exchange.save();
  }

  return { ok: configure.ok && save.ok, configure, save, decoded };
}

function skippedSave(reason: string): SkippedSave {
  return { ok: true, operation: 'save', skipped: true, reason };
}

function decodeReply(payload: Buffer): DecodedNav5 | undefined {
  try {
    return decodeNav5(payload);
  } catch (error) {
    if (error instanceof UBXError) {
      logger.warn(`Cannot decode CFG-NAV5 reply: ${error.message}`);
      return undefined;
    }
    throw error;
  }
}

function attempts(count: number): string {
  return count === 1 ? '1 attempt' : `${count} attempts`;
}

/** One line per field, in wire order */
export function formatDecoded(decoded: DecodedNav5): string[] {
  return decoded.fields.map(field => `  ${field.name.padEnd(18)} ${field.value}`);
}

export function reportSession(profile: Profile, outcome: SessionOutcome): void {
  const { configure, save, decoded } = outcome;

  if (!configure.ok) {
    logger.error(configure.reason);
  } else if (profile.kind === 'configured') {
    logger.info(`Profile ${profile.name} applied after ${attempts(configure.attempts)}`);
  } else if (decoded) {
    logger.info(`Receiver dynamic model: ${decoded.profile ?? 'unknown'} (${decoded.dynModel})`);
    formatDecoded(decoded).forEach(line => logger.info(line));
  }

  if ('skipped' in save) {
    if (configure.ok) {
      logger.debug(`Save ${save.reason}`);
    } else {
      logger.warn(`Save skipped: ${save.reason}`);
    }
  } else if (save.ok) {
    logger.info(`Configuration saved after ${attempts(save.attempts)}`);
  } else {
    logger.error(save.reason);
  }
}

function parseOrReport(argv: string[]): ParsedCommand | null {
  try {
    return parseCommandLine(argv);
  } catch (error) {
    if (error instanceof PreflightError) {
      logger.error(error.message);
      logger.info(`Run with --help for usage`);
      return null;
    }
    throw error;
  }
}

function buildProfile(config: RunConfig): Profile | null {
  try {
    return applyOverrides(getProfile(config.profile), config.overrides);
  } catch (error) {
    if (error instanceof PreflightError) {
      logger.error(error.message);
      return null;
    }
    throw error;
  }
}

/**
 * Command-line entry point. Everything the user can get wrong is checked
 * before the device is opened.
 */
export async function main(argv: string[], open: ChannelOpener = openChannel): Promise<ExitCode> {
  const command = parseOrReport(argv);
  if (!command) {
    return EXIT_CODES.INVALID_INPUT;
  }

  if (command.command === 'help') {
    logger.info(USAGE);
    return EXIT_CODES.OK;
  }
  if (command.command === 'list') {
    describeCatalog().forEach(line => logger.info(line));
    return EXIT_CODES.OK;
  }

  const { config } = command;
  logger.configure({ verbose: config.verbose, logFile: config.logFile });

  const profile = buildProfile(config);
  if (!profile) {
    return EXIT_CODES.INVALID_INPUT;
  }

  let channel: ByteChannel;
  try {
    channel = await open(config);
  } catch (error) {
    const target = config.demo ? 'simulated receiver' : config.device;
    logger.error(`Cannot open ${target}: ${getErrorMessage(error)}`);
    return EXIT_CODES.CHANNEL_OPEN_FAILED;
  }

  try {
    const outcome = await runSession(channel, profile, config);
    reportSession(profile, outcome);
    return outcome.ok ? EXIT_CODES.OK : EXIT_CODES.EXCHANGE_FAILED;
  } finally {
    await channel.close().catch((error: unknown) => {
      logger.warn(`Failed to close channel: ${getErrorMessage(error)}`);
    });
  }
}
