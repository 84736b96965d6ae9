/**
 * fetchMetadata tests
 *
 * Requests go through an undici MockAgent with network access disabled.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { MockAgent, errors } from 'undici';
import { fetchMetadata, parseBundle, classifyRequestError, FetchError } from '@keel/core';

const ORIGIN = 'https://metadata.test';
const BUNDLE_URL = `${ORIGIN}/bundle.json`;

function isFetchError(code: string, message?: string): (err: unknown) => boolean {
  return (err: unknown) => {
    assert.ok(err instanceof FetchError, `expected FetchError, got ${String(err)}`);
    assert.strictEqual(err.code, code);
    if (message !== undefined) {
      assert.strictEqual(err.message, message);
    }
    return true;
  };
}

describe('fetchMetadata', () => {
  let dir: string;
  let agent: MockAgent;

  function serve(status: number, body: string): void {
    agent.get(ORIGIN).intercept({ path: '/bundle.json', method: 'GET' }).reply(status, body);
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'keel-fetch-test-'));
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write every bundle file below the directory', async () => {
    serve(200, JSON.stringify({
      version: '2024.06',
      files: {
        'series/quality-profiles/web-1080p.json': { name: 'WEB-1080p', minSize: 2, maxSize: 100 },
        'indexer/categories.json': [5000, 5030],
      },
    }));

    const result = await fetchMetadata(dir, { url: BUNDLE_URL, timeout: 5 }, { dispatcher: agent });

    assert.deepStrictEqual(result, {
      version: '2024.06',
      files: ['indexer/categories.json', 'series/quality-profiles/web-1080p.json'],
    });
    assert.strictEqual(
      readFileSync(join(dir, 'series', 'quality-profiles', 'web-1080p.json'), 'utf-8'),
      '{\n  "name": "WEB-1080p",\n  "minSize": 2,\n  "maxSize": 100\n}\n'
    );
    assert.strictEqual(readFileSync(join(dir, 'indexer', 'categories.json'), 'utf-8'), '[\n  5000,\n  5030\n]\n');
  });

  it('should fail without a configured BUNDLE_URL', async () => {
    await assert.rejects(
      fetchMetadata(dir, { timeout: 5 }, { dispatcher: agent }),
      (err: unknown) => {
        assert.ok(err instanceof FetchError);
        assert.strictEqual(err.code, 'ERR_METADATA_FETCH');
        assert.strictEqual(err.suggestion, 'Set keel.metadata.url in the configuration file');
        return true;
      }
    );
  });

  it('should fail on a non-200 status', async () => {
    serve(404, 'not found');
    await assert.rejects(
      fetchMetadata(dir, { url: BUNDLE_URL, timeout: 5 }, { dispatcher: agent }),
      isFetchError('ERR_METADATA_FETCH', `Metadata request to ${BUNDLE_URL} failed with status 404`)
    );
  });

  it('should fail when the host cannot be reached', async () => {
    await assert.rejects(
      fetchMetadata(dir, { url: 'https://unreachable.test/bundle.json', timeout: 5 }, { dispatcher: agent }),
      isFetchError('ERR_METADATA_FETCH')
    );
  });

  it('should time out on a slow answer', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/bundle.json', method: 'GET' })
      .reply(200, JSON.stringify({ version: '1', files: {} }))
      .delay(500);

    await assert.rejects(
      fetchMetadata(dir, { url: BUNDLE_URL, timeout: 0.05 }, { dispatcher: agent }),
      isFetchError('ERR_METADATA_TIMEOUT', `Metadata request to ${BUNDLE_URL} timed out after 0.05s`)
    );
    assert.deepStrictEqual(readdirSync(dir), []);
  });

  it('should reject a body that is not JSON', async () => {
    serve(200, '<html>');
    await assert.rejects(
      fetchMetadata(dir, { url: BUNDLE_URL, timeout: 5 }, { dispatcher: agent }),
      isFetchError('ERR_METADATA_INVALID')
    );
  });

  it('should reject paths leaving the directory without writing anything', async () => {
    serve(200, JSON.stringify({ version: '1', files: { '../escape.json': {} } }));
    await assert.rejects(
      fetchMetadata(dir, { url: BUNDLE_URL, timeout: 5 }, { dispatcher: agent }),
      isFetchError('ERR_METADATA_INVALID', `Metadata bundle from ${BUNDLE_URL} contains an invalid path: '../escape.json'`)
    );
    assert.deepStrictEqual(readdirSync(dir), []);
    assert.strictEqual(existsSync(join(dir, '..', 'escape.json')), false);
  });
});

describe('parseBundle', () => {
  it('should accept a version and a files object', () => {
    assert.deepStrictEqual(parseBundle('{"version":"1","files":{}}', BUNDLE_URL), { version: '1', files: {} });
  });

  it('should reject a non-object document', () => {
    assert.throws(
      () => parseBundle('[]', BUNDLE_URL),
      isFetchError('ERR_METADATA_INVALID', `Metadata bundle from ${BUNDLE_URL} must be a JSON object`)
    );
  });

  it('should reject a missing version', () => {
    assert.throws(
      () => parseBundle('{"files":{}}', BUNDLE_URL),
      isFetchError('ERR_METADATA_INVALID', `Metadata bundle from ${BUNDLE_URL} has no version`)
    );
  });

  it('should reject files that are not an object', () => {
    assert.throws(
      () => parseBundle('{"version":"1","files":[]}', BUNDLE_URL),
      isFetchError('ERR_METADATA_INVALID', `Metadata bundle from ${BUNDLE_URL}: files must be an object`)
    );
  });
});

describe('classifyRequestError', () => {
  it('should pass keel errors through', () => {
    const original = new FetchError('boom', 'ERR_METADATA_FETCH');
    assert.strictEqual(classifyRequestError(original, BUNDLE_URL, false, 5000), original);
  });

  it('should report our own timer as a timeout', () => {
    const error = classifyRequestError(new Error('This operation was aborted'), BUNDLE_URL, true, 30000);
    assert.strictEqual(error.code, 'ERR_METADATA_TIMEOUT');
    assert.strictEqual(error.message, `Metadata request to ${BUNDLE_URL} timed out after 30s`);
  });

  it('should report undici timeouts as a timeout', () => {
    assert.strictEqual(classifyRequestError(new errors.HeadersTimeoutError(), BUNDLE_URL, false, 5000).code, 'ERR_METADATA_TIMEOUT');
    assert.strictEqual(classifyRequestError(new errors.BodyTimeoutError(), BUNDLE_URL, false, 5000).code, 'ERR_METADATA_TIMEOUT');
  });

  it('should report anything else as a fetch failure', () => {
    const error = classifyRequestError(new Error('getaddrinfo ENOTFOUND'), BUNDLE_URL, false, 5000);
    assert.strictEqual(error.code, 'ERR_METADATA_FETCH');
    assert.strictEqual(error.message, `Metadata request to ${BUNDLE_URL} failed: getaddrinfo ENOTFOUND`);
  });
});
