/**
 * @fileoverview Package version lookup.
 *
 * Walks up from this module to the nearest package.json, which works both
 * from `src/` under vitest and from `dist/src/` after a build.
 *
 * @module version
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

let cached: string | null = null;

export function getVersion(): string {
  if (cached) return cached;

  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 5; i++) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      try {
        const pkg = JSON.parse(readFileSync(candidate, 'utf-8')) as { version?: unknown };
        if (typeof pkg.version === 'string') {
          cached = pkg.version;
          return cached;
        }
      } catch {
        // Unreadable package.json, keep walking up
      }
    }
    dir = dirname(dir);
  }
  cached = 'unknown';
  return cached;
}
