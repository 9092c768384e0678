/**
 * JSON envelopes printed by `--json`.
 *
 * Every command prints exactly one envelope on stdout, tagged with the CLI
 * version so scripts can detect format changes.
 */

import type { CommandError, ErrorMetadata } from '@/ui/errors/index.js';
import { VERSION } from '@/utils/version.js';

export interface JsonSuccess<T> {
  version: string;
  success: true;
  data: T;
}

export interface JsonFailure extends ErrorMetadata {
  version: string;
  success: false;
  error: string;
  exitCode: number;
}

export class OutputBuilder {
  static success<T>(data: T): JsonSuccess<T> {
    return { version: VERSION, success: true, data };
  }

  /**
   * Envelope for a failed command: message, exit code and whatever kdb+
   * context the error carries.
   */
  static failure(error: CommandError): JsonFailure {
    return {
      version: VERSION,
      success: false,
      error: error.message,
      exitCode: error.exitCode,
      ...error.metadata,
    };
  }
}
