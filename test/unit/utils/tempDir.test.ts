/**
 * withTempDir tests
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { existsSync, mkdtempSync, readdirSync, rmSync, statSync, writeFileSync } from 'fs';
import { basename, dirname, join } from 'path';
import { tmpdir } from 'os';
import { withTempDir } from '@keel/core';

describe('withTempDir', () => {
  let parent: string;

  beforeEach(() => {
    parent = mkdtempSync(join(tmpdir(), 'keel-tempdir-test-'));
  });

  afterEach(() => {
    rmSync(parent, { recursive: true, force: true });
  });

  it('should pass a fresh directory and return the body result', async () => {
    let seen = '';
    const result = await withTempDir(async (dir) => {
      seen = dir;
      assert.ok(statSync(dir).isDirectory());
      assert.deepStrictEqual(readdirSync(dir), []);
      return 42;
    }, { parent, prefix: 'meta-' });

    assert.strictEqual(result, 42);
    assert.strictEqual(dirname(seen), parent);
    assert.ok(basename(seen).startsWith('meta-'));
    assert.strictEqual(existsSync(seen), false);
  });

  it('should remove the directory and its contents when the body throws', async () => {
    await assert.rejects(
      withTempDir(async (dir) => {
        writeFileSync(join(dir, 'partial.json'), '{}');
        throw new Error('body failed');
      }, { parent }),
      { message: 'body failed' }
    );
    assert.deepStrictEqual(readdirSync(parent), []);
  });

  it('should default the prefix to keel-', async () => {
    await withTempDir(async (dir) => {
      assert.ok(basename(dir).startsWith('keel-'));
    }, { parent });
  });
});
