import type { Command } from 'commander';

import type { CommandResult } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import {
  addConnectionOptions,
  describeTarget,
  toConnectionConfig,
} from '@/commands/shared/commonOptions.js';
import type { ConnectionCommandOptions } from '@/commands/shared/commonOptions.js';
import { DEFAULT_PING_EXPRESSION } from '@/constants.js';
import { KdbConnection } from '@/connection/index.js';
import type { SocketFactory } from '@/connection/index.js';
import { alignFields } from '@/ui/formatting.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Flags supported by `kdbipc ping`.
 */
export interface PingOptions extends ConnectionCommandOptions {
  /** Expression round-tripped as the liveness check */
  expression: string;
}

export interface PingResult {
  target: string;
  alive: boolean;
  /** Negotiated protocol version */
  version: number;
  loopback: boolean;
}

/**
 * Connect, round-trip the ping expression and report the negotiated
 * protocol details.
 */
export async function executePing(
  options: PingOptions,
  socketFactory?: SocketFactory
): Promise<CommandResult<PingResult>> {
  const connection = await KdbConnection.open({
    ...toConnectionConfig(options),
    pingExpression: options.expression,
    ...(socketFactory ? { socketFactory } : {}),
  });
  try {
    const alive = await connection.isConnected();
    if (!alive) {
      return {
        success: false,
        error: `${connection.target} did not answer the ping`,
        exitCode: EXIT_CODES.CONNECTION_FAILURE,
      };
    }
    return {
      success: true,
      data: {
        target: connection.target,
        alive,
        version: connection.version,
        loopback: connection.isLoopback,
      },
    };
  } finally {
    connection.close();
  }
}

function formatPing(data: PingResult): string {
  return alignFields([
    ['Target', data.target],
    ['Status', data.alive ? 'alive' : 'down'],
    ['Protocol', String(data.version)],
    ['Loopback', data.loopback ? 'yes' : 'no'],
  ]);
}

/**
 * Register ping command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerPingCommand(program: Command): void {
  addConnectionOptions(
    program
      .command('ping')
      .description('Check that a kdb+ process answers')
      .option('-e, --expression <q>', 'Expression sent as the liveness check', DEFAULT_PING_EXPRESSION)
  ).action(async (options: PingOptions) => {
    await runCommand<PingOptions, PingResult>(
      (opts) => executePing(opts),
      options,
      describeTarget(options),
      formatPing
    );
  });
}
