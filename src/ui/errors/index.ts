/**
 * Error handling for the kdbipc CLI.
 *
 * Provides structured error classes for CLI commands.
 */

// CLI-level errors (user-facing command errors)
export { CommandError } from './CommandError.js';
export type { ErrorMetadata } from './CommandError.js';
