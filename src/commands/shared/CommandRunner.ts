import { KdbError } from '@/connection/errors.js';
import { CommandError } from '@/ui/errors/index.js';
import { genericError } from '@/ui/messages/errors.js';
import { OutputBuilder } from '@/ui/OutputBuilder.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Standard options supported by CommandRunner.
 * All commands that use CommandRunner must extend this interface.
 */
export interface BaseCommandOptions {
  /** Output as JSON instead of human-readable format */
  json?: boolean;
}

/**
 * Result from a command handler.
 * Handler functions should return this structure to indicate success/failure.
 */
export interface CommandResult<T = unknown> {
  /** Whether the command succeeded */
  success: boolean;
  /** Data to output (for successful commands) */
  data?: T;
  /** Error message (for failed commands) */
  error?: string;
  /** Optional exit code override (defaults: SUCCESS=0, error codes from EXIT_CODES) */
  exitCode?: number;
}

/**
 * Handler function type.
 * Command logic should be implemented as a function matching this signature.
 */
export type CommandHandler<TOptions extends BaseCommandOptions, TResult = unknown> = (
  options: TOptions
) => Promise<CommandResult<TResult>>;

/**
 * Formatter function type for human-readable output.
 * Receives the command result data and returns a formatted string.
 */
export type CommandFormatter<TResult = unknown> = (data: TResult) => string;

/**
 * Exit code for an error escaping a command handler.
 */
export function exitCodeForError(error: unknown): number {
  if (error instanceof CommandError || error instanceof KdbError) {
    return error.exitCode;
  }
  return EXIT_CODES.UNHANDLED_EXCEPTION;
}

/**
 * Run a command with consistent error handling, output formatting, and exit codes.
 * Eliminates boilerplate try-catch and JSON output logic from command handlers.
 *
 * This helper:
 * - Wraps command logic in try-catch
 * - Turns thrown errors into a CommandError (exit code, kdb+ context)
 * - Formats output as JSON or human-readable based on --json flag
 * - Calls process.exit() with appropriate exit code
 *
 * @param handler - Command logic that returns CommandResult or throws
 * @param options - Command options (must include json flag)
 * @param target - `host:port` shown in suggestions
 * @param formatter - Optional human-readable formatter (if not provided, outputs raw JSON)
 *
 * @example
 * ```typescript
 * await runCommand(
 *   async (opts) => {
 *     const value = await conn.sendSync(opts.expression);
 *     return { success: true, data: toJson(value) };
 *   },
 *   options,
 *   'localhost:5010',
 *   formatData
 * );
 * ```
 */
export async function runCommand<TOptions extends BaseCommandOptions, TResult = unknown>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  target: string,
  formatter?: CommandFormatter<TResult>
): Promise<void> {
  try {
    const result = await handler(options);

    if (!result.success) {
      throw new CommandError(result.error ?? 'Unknown error', {}, result.exitCode ?? EXIT_CODES.GENERIC_FAILURE);
    }

    if (options.json) {
      console.log(JSON.stringify(OutputBuilder.success(result.data ?? null), null, 2));
    } else if (formatter && result.data !== undefined) {
      console.log(formatter(result.data));
    } else {
      // Fallback: JSON output if no formatter provided
      console.log(JSON.stringify(result.data ?? null, null, 2));
    }

    process.exit(EXIT_CODES.SUCCESS);
  } catch (error) {
    const failure = CommandError.from(error, target);
    if (options.json) {
      console.log(JSON.stringify(OutputBuilder.failure(failure), null, 2));
    } else {
      console.error(genericError(failure.message, failure.metadata.suggestion));
    }
    process.exit(failure.exitCode);
  }
}
