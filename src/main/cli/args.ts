import { parseArgs } from 'node:util';
import type { FieldOverride, ProfileName } from '../../shared/types/profile.types';
import {
  CONFIGURED_PROFILE_NAMES,
  DYN_MODELS,
  NAV5_FIELDS,
  isProfileName,
} from '../profiles/ProfileCatalog';
import { layoutType } from '../profiles/fieldCodec';
import { InvalidOverrideError, UnknownProfileError, UsageError, getErrorMessage } from '../utils/errors';
import { APP_NAME, APP_VERSION, EXCHANGE, SERIAL } from '../../shared/constants';

export interface RunConfig {
  profile: ProfileName;
  overrides: FieldOverride[];
  save: boolean;
  device: string;
  baudRate: number;
  maxAttempts: number;
  timeoutMs: number;
  verbose: boolean;
  logFile?: string;
  demo: boolean;
}

export type ParsedCommand =
  | { command: 'help' }
  | { command: 'list' }
  | { command: 'run'; config: RunConfig };

const INTEGER_PATTERN = /^(-?)(0x[0-9a-f]+|\d+)$/i;

export const USAGE = `${APP_NAME} ${APP_VERSION}

Usage: ${APP_NAME} [options] <profile> [field=value ...]

Sets the CFG-NAV5 dynamic platform model of a u-blox receiver.
"poll" reads the current configuration back instead.

Options:
  -d, --device <path>   serial device (default ${SERIAL.DEFAULT_DEVICE})
  -b, --baud <n>        baud rate (default ${SERIAL.DEFAULT_BAUD_RATE})
  -s, --save            persist the configuration after it is applied
  -r, --retries <n>     attempts per operation (default ${EXCHANGE.MAX_ATTEMPTS})
  -t, --timeout <ms>    read timeout per sync or read step (default ${EXCHANGE.READ_TIMEOUT})
  -v, --verbose         debug logging
      --log-file <path> also write the log to a file
      --demo            talk to a simulated receiver instead of a device
  -l, --list            list profiles and overridable fields
  -h, --help            show this help

Values are decimal, optionally negative, or 0x hex.`;

/**
 * Parse a decimal or 0x hex integer, with an optional leading minus.
 * Returns null for anything else.
 */
export function parseInteger(text: string): number | null {
  const match = INTEGER_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, sign, digits] = match;
  const magnitude = digits.toLowerCase().startsWith('0x')
    ? parseInt(digits.slice(2), 16)
    : parseInt(digits, 10);
  return sign ? -magnitude : magnitude;
}

/**
 * Split a `field=value` argument. Field names are checked later, against the
 * profile they are applied to.
 */
export function parseOverride(text: string): FieldOverride {
  const separator = text.indexOf('=');
  if (separator <= 0) {
    throw new InvalidOverrideError(text, 'expected field=value');
  }

  const name = text.slice(0, separator).trim();
  const value = parseInteger(text.slice(separator + 1));
  if (value === null) {
    throw new InvalidOverrideError(text, 'value must be a decimal or 0x hex integer');
  }

  return { name, value };
}

function parsePositive(text: string | undefined, option: string, fallback: number): number {
  if (text === undefined) {
    return fallback;
  }
  const value = parseInteger(text);
  if (value === null || value < 1) {
    throw new UsageError(`Option ${option} expects a positive integer, got "${text}"`);
  }
  return value;
}

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        device: { type: 'string', short: 'd' },
        baud: { type: 'string', short: 'b' },
        save: { type: 'boolean', short: 's' },
        retries: { type: 'string', short: 'r' },
        timeout: { type: 'string', short: 't' },
        verbose: { type: 'boolean', short: 'v' },
        'log-file': { type: 'string' },
        demo: { type: 'boolean' },
        list: { type: 'boolean', short: 'l' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new UsageError(getErrorMessage(error));
  }
}

/**
 * @throws PreflightError subclasses for anything that makes the run impossible
 */
export function parseCommandLine(argv: string[]): ParsedCommand {
  const { values, positionals } = readArgv(argv);

  if (values.help) {
    return { command: 'help' };
  }
  if (values.list) {
    return { command: 'list' };
  }

  const [profile, ...rest] = positionals;
  if (profile === undefined) {
    throw new UsageError('No profile given');
  }
  if (!isProfileName(profile)) {
    throw new UnknownProfileError(profile);
  }

  return {
    command: 'run',
    config: {
      profile,
      overrides: rest.map(parseOverride),
      save: values.save ?? false,
      device: values.device ?? SERIAL.DEFAULT_DEVICE,
      baudRate: parsePositive(values.baud, '--baud', SERIAL.DEFAULT_BAUD_RATE),
      maxAttempts: parsePositive(values.retries, '--retries', EXCHANGE.MAX_ATTEMPTS),
      timeoutMs: parsePositive(values.timeout, '--timeout', EXCHANGE.READ_TIMEOUT),
      verbose: values.verbose ?? false,
      logFile: values['log-file'],
      demo: values.demo ?? false,
    },
  };
}

/** Lines printed by --list */
export function describeCatalog(): string[] {
  const lines = ['Profiles:'];
  for (const name of CONFIGURED_PROFILE_NAMES) {
    lines.push(`  ${name.padEnd(16)} dynModel ${DYN_MODELS[name]}`);
  }
  lines.push(`  ${'poll'.padEnd(16)} read the current configuration`);

  lines.push('', 'Overridable fields:');
  for (const spec of NAV5_FIELDS) {
    if (!spec.overridable) continue;
    lines.push(`  ${spec.name.padEnd(18)} ${layoutType(spec)}  default ${spec.defaultValue}`);
  }
  return lines;
}
