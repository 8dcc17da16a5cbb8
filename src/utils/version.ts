/**
 * Version of this package, read from the nearest package.json
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const PACKAGE_NAME = 'screenshot-matrix';

let cached: string | undefined;

export function getToolVersion(): string {
  if (cached) {
    return cached;
  }

  // Sources and the compiled output sit at different depths
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const version = readPackageVersion(join(dir, 'package.json'));
    if (version) {
      cached = version;
      return version;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      cached = 'unknown';
      return cached;
    }
    dir = parent;
  }
}

function readPackageVersion(path: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || Reflect.get(parsed, 'name') !== PACKAGE_NAME) {
    return undefined;
  }
  const version: unknown = Reflect.get(parsed, 'version');
  return typeof version === 'string' ? version : undefined;
}
