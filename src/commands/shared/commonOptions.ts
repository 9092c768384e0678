import { Option } from 'commander';
import type { Command } from 'commander';

import { DEFAULT_KDB_HOST, DEFAULT_KDB_PORT } from '@/constants.js';
import type { KdbConnectionConfig } from '@/connection/index.js';
import { CommandError } from '@/ui/errors/index.js';
import { invalidOptionError } from '@/ui/messages/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

import type { BaseCommandOptions } from './CommandRunner.js';

const MIN_PORT = 1;
const MAX_PORT = 65535;

/**
 * Flags shared by every command that talks to a kdb+ process.
 */
export interface ConnectionCommandOptions extends BaseCommandOptions {
  host: string;
  port: number;
  /** `user` or `user:password` */
  user?: string;
  tls?: boolean;
  timeout?: number;
  compress?: boolean;
}

function parseIntegerOption(option: string, expected: string, min: number, max: number) {
  return (value: string): number => {
    const n = Number(value.trim());
    if (!Number.isInteger(n) || n < min || n > max) {
      throw new CommandError(invalidOptionError(option, value, expected), {}, EXIT_CODES.INVALID_ARGUMENTS);
    }
    return n;
  };
}

/**
 * Shared --json flag for all commands that support JSON output.
 * Standard option for machine-readable output.
 *
 * @example
 * ```typescript
 * program
 *   .command('ping')
 *   .addOption(jsonOption)
 *   .action((options) => {
 *     if (options.json) {
 *       console.log(JSON.stringify(data));
 *     }
 *   });
 * ```
 */
export const jsonOption = new Option('-j, --json', 'Output as JSON').default(false);

export const hostOption = new Option('-H, --host <host>', 'kdb+ host').default(DEFAULT_KDB_HOST);

export const portOption = new Option('-p, --port <port>', 'kdb+ port')
  .default(DEFAULT_KDB_PORT)
  .argParser(parseIntegerOption('--port', `an integer between ${MIN_PORT} and ${MAX_PORT}`, MIN_PORT, MAX_PORT));

export const userOption = new Option('-u, --user <user[:password]>', 'Credentials sent in the handshake');

export const tlsOption = new Option('--tls', 'Connect over TLS').default(false);

export const timeoutOption = new Option(
  '--timeout <ms>',
  'Milliseconds to wait on connect, reads and writes (0 = forever)'
).argParser(parseIntegerOption('--timeout', 'a non-negative integer', 0, Number.MAX_SAFE_INTEGER));

export const compressOption = new Option(
  '--compress',
  'Compress messages above 2000 bytes to remote hosts'
).default(false);

/**
 * Attach the connection flags and --json to a command.
 */
export function addConnectionOptions(command: Command): Command {
  return command
    .addOption(hostOption)
    .addOption(portOption)
    .addOption(userOption)
    .addOption(tlsOption)
    .addOption(timeoutOption)
    .addOption(compressOption)
    .addOption(jsonOption);
}

/**
 * Translate parsed flags into connection configuration.
 *
 * The password is everything after the first colon of --user, so it may
 * itself contain colons.
 */
export function toConnectionConfig(options: ConnectionCommandOptions): Partial<KdbConnectionConfig> {
  const config: Partial<KdbConnectionConfig> = {
    host: options.host,
    port: options.port,
    tls: options.tls ?? false,
    compress: options.compress ?? false,
  };
  if (options.timeout !== undefined) {
    config.timeoutMs = options.timeout;
  }
  if (options.user !== undefined) {
    const colon = options.user.indexOf(':');
    config.user = colon === -1 ? options.user : options.user.slice(0, colon);
    config.password = colon === -1 ? '' : options.user.slice(colon + 1);
  }
  return config;
}

/**
 * `host:port` as shown in messages.
 */
export function describeTarget(options: Pick<ConnectionCommandOptions, 'host' | 'port'>): string {
  return `${options.host}:${options.port}`;
}
