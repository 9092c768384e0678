import type { Command } from 'commander';

import type { CommandResult } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import {
  addConnectionOptions,
  describeTarget,
  toConnectionConfig,
} from '@/commands/shared/commonOptions.js';
import type { ConnectionCommandOptions } from '@/commands/shared/commonOptions.js';
import { KdbConnection } from '@/connection/index.js';
import type { SocketFactory } from '@/connection/index.js';
import { typeCode } from '@/model/index.js';
import { formatValue, toJson } from '@/ui/formatters/index.js';
import type { JsonValue } from '@/ui/formatters/index.js';

/**
 * Flags supported by `kdbipc query`.
 */
export type QueryOptions = ConnectionCommandOptions;

export interface QueryResult {
  target: string;
  expression: string;
  /** Wire type code of the result */
  type: number;
  result: JsonValue;
  /** Result in q display form */
  text: string;
}

/**
 * Evaluate one expression synchronously and close the connection.
 *
 * @throws KdbRemoteError when the server rejects the expression
 */
export async function executeQuery(
  expression: string,
  options: QueryOptions,
  socketFactory?: SocketFactory
): Promise<CommandResult<QueryResult>> {
  const connection = await KdbConnection.open({
    ...toConnectionConfig(options),
    ...(socketFactory ? { socketFactory } : {}),
  });
  try {
    const value = await connection.sendSync(expression);
    return {
      success: true,
      data: {
        target: connection.target,
        expression,
        type: typeCode(value),
        result: toJson(value),
        text: formatValue(value),
      },
    };
  } finally {
    connection.close();
  }
}

function formatQuery(data: QueryResult): string {
  return data.text;
}

/**
 * Register query command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerQueryCommand(program: Command): void {
  addConnectionOptions(
    program
      .command('query')
      .description('Evaluate a q expression and print the result')
      .argument('<expression>', 'q expression, e.g. "til 10"')
  ).action(async (expression: string, options: QueryOptions) => {
    await runCommand<QueryOptions, QueryResult>(
      (opts) => executeQuery(expression, opts),
      options,
      describeTarget(options),
      formatQuery
    );
  });
}
