/**
 * Scoped temporary directories.
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

export interface TempDirOptions {
  /** Directory name prefix (default "keel-") */
  prefix?: string;
  /** Parent directory (default: the OS temp dir) */
  parent?: string;
}

/**
 * Create a fresh directory, run `body` with its path, then remove the
 * directory and everything in it, whether `body` resolved or threw.
 */
export async function withTempDir<T>(
  body: (dir: string) => Promise<T>,
  options: TempDirOptions = {}
): Promise<T> {
  const dir = await mkdtemp(join(options.parent ?? tmpdir(), options.prefix ?? 'keel-'));
  try {
    return await body(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
