#!/usr/bin/env node

import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { CommandError } from '@/ui/errors/index.js';
import { createLogger, enableDebugLogging } from '@/ui/logging/index.js';
import { genericError } from '@/ui/messages/errors.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { VERSION } from '@/utils/version.js';

// ============================================================================
// Constants
// ============================================================================

// Commander Configuration
const CLI_NAME = 'kdbipc';
const CLI_DESCRIPTION = 'Query and publish to kdb+ processes over IPC';

// ============================================================================
// Utilities
// ============================================================================

const log = createLogger('kdbipc');

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Main entry point.
 *
 * Process flow:
 * 1. Enable debug logging when --debug is present
 * 2. Initialize Commander and register command handlers
 * 3. Parse arguments and route to appropriate command
 */
async function main(): Promise<void> {
  // Check for --debug flag early, before any connection logs
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }

  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('--debug', 'Enable debug logging (verbose output)');

  commandRegistry.forEach((register) => register(program));

  await program.parseAsync();
}

main().catch((error: unknown) => {
  // Option parsers throw CommandError before any handler runs
  if (error instanceof CommandError) {
    console.error(genericError(error.message));
    process.exit(error.exitCode);
  }
  log.info(`Fatal: ${getErrorMessage(error)}`);
  process.exit(EXIT_CODES.UNHANDLED_EXCEPTION);
});
