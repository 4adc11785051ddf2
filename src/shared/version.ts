/**
 * Package version, read once from package.json
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const FALLBACK_VERSION = '0.0.0';

let cachedVersion: string | null = null;

export function getVersion(): string {
  if (cachedVersion) return cachedVersion;

  // src/shared/ and dist/shared/ both sit two levels below the package root
  const pkgPath = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    cachedVersion =
      typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
        ? pkg.version
        : FALLBACK_VERSION;
  } catch {
    cachedVersion = FALLBACK_VERSION;
  }
  return cachedVersion;
}
