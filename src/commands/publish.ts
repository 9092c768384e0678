import type { Command } from 'commander';

import type { CommandResult } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import {
  addConnectionOptions,
  describeTarget,
  toConnectionConfig,
} from '@/commands/shared/commonOptions.js';
import type { ConnectionCommandOptions } from '@/commands/shared/commonOptions.js';
import { DEFAULT_PUBLISH_FUNCTION, DEFAULT_PUBLISH_TABLE } from '@/constants.js';
import type { SocketFactory } from '@/connection/index.js';
import { KdbPublisher } from '@/publisher/index.js';
import { pluralize } from '@/ui/formatting.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Flags supported by `kdbipc publish`.
 */
export interface PublishOptions extends ConnectionCommandOptions {
  /** Remote function receiving the payload */
  function: string;
  /** Table name passed as a symbol */
  table: string;
  /** Do not wait for the server's reply */
  async?: boolean;
}

export interface PublishResult {
  target: string;
  function: string;
  table: string;
  mode: 'async' | 'sync';
  /** Payload length in characters */
  length: number;
}

/**
 * Deliver one payload through `function[`table; payload]`.
 *
 * Failures come back as an unsuccessful result carrying the publisher's
 * last error.
 */
export async function executePublish(
  payload: string,
  options: PublishOptions,
  socketFactory?: SocketFactory
): Promise<CommandResult<PublishResult>> {
  const publisher = new KdbPublisher({
    ...toConnectionConfig(options),
    ...(socketFactory ? { socketFactory } : {}),
  });
  const mode = options.async ? 'async' : 'sync';
  try {
    const delivered = await publisher.send(options.function, options.table, payload, {
      async: mode === 'async',
    });
    if (!delivered) {
      return {
        success: false,
        error: `Publish to ${describeTarget(options)} failed: ${publisher.lastError ?? 'unknown error'}`,
        exitCode: EXIT_CODES.SOFTWARE_ERROR,
      };
    }
    return {
      success: true,
      data: {
        target: describeTarget(options),
        function: options.function,
        table: options.table,
        mode,
        length: payload.length,
      },
    };
  } finally {
    publisher.close();
  }
}

function formatPublish(data: PublishResult): string {
  return `Published ${pluralize(data.length, 'char')} to ${data.function} for ${data.table} (${data.mode})`;
}

/**
 * Register publish command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerPublishCommand(program: Command): void {
  addConnectionOptions(
    program
      .command('publish')
      .description('Send a JSON payload to a publish function')
      .argument('<payload>', 'Payload text, sent as a char vector')
      .option('-f, --function <name>', 'Remote function', DEFAULT_PUBLISH_FUNCTION)
      .option('-t, --table <name>', 'Table name', DEFAULT_PUBLISH_TABLE)
      .option('--async', 'Send without waiting for a reply', false)
  ).action(async (payload: string, options: PublishOptions) => {
    await runCommand<PublishOptions, PublishResult>(
      (opts) => executePublish(payload, opts),
      options,
      describeTarget(options),
      formatPublish
    );
  });
}
