/**
 * keel version constants.
 *
 * Reads the version from the nearest keel package manifest above this module:
 * `packages/core/package.json` when running from sources, the root `keel`
 * manifest when running from a `dist` build.
 */
import { existsSync, readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const MANIFEST_NAMES = new Set(['@keel/core', 'keel']);

interface Manifest {
  name: string;
  version: string;
}

function isManifest(value: unknown): value is Manifest {
  return (
    typeof value === 'object' && value !== null &&
    'name' in value && typeof value.name === 'string' &&
    'version' in value && typeof value.version === 'string'
  );
}

/**
 * Version of the first manifest named @keel/core or keel found walking up
 * from `startDir`.
 *
 * @throws Error when no such manifest exists
 */
export function findKeelVersion(startDir: string): string {
  let dir = startDir;
  for (;;) {
    const manifestPath = join(dir, 'package.json');
    if (existsSync(manifestPath)) {
      const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf-8'));
      if (isManifest(manifest) && MANIFEST_NAMES.has(manifest.name)) {
        return manifest.version;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`No keel package manifest found above ${startDir}`);
    }
    dir = parent;
  }
}

/** Full keel version string (e.g., "0.3.0-beta") */
export const KEEL_VERSION: string = findKeelVersion(dirname(fileURLToPath(import.meta.url)));

/**
 * Extract major.minor.patch from a version string, stripping pre-release tags.
 *
 * "0.3.0-beta" → "0.3.0"
 * "1.0.0-alpha.1" → "1.0.0"
 */
export function getSchemaVersion(version: string): string {
  return version.split('-')[0];
}
