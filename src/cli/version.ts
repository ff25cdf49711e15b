import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { log } from '../core/logger.js';

const FALLBACK_VERSION = '0.0.0';

/** Reads the version from the package.json two levels above this module (src/cli or dist/cli). */
export function readPackageVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const pkgPath = resolve(here, '../../package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(pkgPath, 'utf8'));
    if (packageJson && typeof packageJson === 'object' && 'version' in packageJson && typeof packageJson.version === 'string') {
      return packageJson.version;
    }
  } catch (error) {
    log(1, 'version', `Cannot read ${pkgPath}`, { error: String(error) });
  }
  return FALLBACK_VERSION;
}
