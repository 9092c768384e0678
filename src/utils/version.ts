import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { log } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

const FALLBACK_VERSION = '0.0.0';

/**
 * Get the package version.
 * Reads package.json once and caches the result.
 */
let cachedVersion: string = '';

function hasVersion(pkg: unknown): pkg is { version: string } {
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string';
}

export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  try {
    const pkgPath = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    cachedVersion = hasVersion(pkg) ? pkg.version : FALLBACK_VERSION;
  } catch (error) {
    log('kdbipc', `Cannot read package version: ${getErrorMessage(error)}`);
    cachedVersion = FALLBACK_VERSION;
  }

  return cachedVersion;
}

export const VERSION: string = getVersion();
