import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

import { isRecord } from '@/config/validation.js';

const FALLBACK_VERSION = '0.0.0';

let cachedVersion = '';

/**
 * Get the package version.
 * Reads package.json (two levels above this file in src/ and dist/) once.
 */
export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  try {
    const pkgPath = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    cachedVersion = isRecord(pkg) && typeof pkg['version'] === 'string' ? pkg['version'] : FALLBACK_VERSION;
  } catch {
    // Missing or unreadable package.json, e.g. when bundled
    cachedVersion = FALLBACK_VERSION;
  }

  return cachedVersion;
}

export const VERSION: string = getVersion();
