/**
 * Package version lookup.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { isPlainObject } from '../store/json.js';

/** Read version from package.json (single source of truth). */
export function getPackageVersion(): string {
  try {
    // src/core/version.ts and dist/core/version.js both sit two levels below the root
    const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (isPlainObject(pkg) && typeof pkg['version'] === 'string') {
      return pkg['version'];
    }
  } catch {
    // unreadable package.json reports as 0.0.0
  }
  return '0.0.0';
}
