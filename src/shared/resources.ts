/**
 * Location of the bundled resources directory (prompts, data files).
 *
 * Resolves to `<package root>/resources` from both `src/` and `dist/`.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export function getResourcesDir(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return join(here, '..', '..', 'resources');
}

export function getResourcePath(fileName: string): string {
  return join(getResourcesDir(), fileName);
}

/** Version field of the package manifest */
export function getPackageVersion(): string {
  const manifestPath = join(getResourcesDir(), '..', 'package.json');
  const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf-8'));
  if (manifest && typeof manifest === 'object' && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}
