/**
 * fetchMetadata - downloads the metadata bundle and unpacks it into a directory.
 *
 * Bundle format (JSON):
 *
 * ```json
 * {
 *   "version": "2024.06",
 *   "files": {
 *     "series/quality-profiles/web-1080p.json": { "name": "WEB-1080p", "minSize": 2, "maxSize": 100 }
 *   }
 * }
 * ```
 *
 * Every entry of `files` is written below the target directory as pretty JSON.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'path';
import { errors, request, type Dispatcher } from 'undici';
import type { Logger } from '@keel/types';
import type { MetadataSettings } from '../config/ConfigLoader.js';
import { isRecord } from '../config/fields.js';
import { FetchError, KeelError } from '../errors/KeelError.js';
import { silentLogger } from '../logging/Logger.js';

export interface MetadataBundle {
  version: string;
  files: Record<string, unknown>;
}

export interface FetchMetadataOptions {
  /** undici dispatcher to send the request through (tests pass a MockAgent) */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

export interface FetchMetadataResult {
  version: string;
  /** Relative paths written, sorted */
  files: string[];
}

/**
 * Download the bundle from `settings.url` and write its files into `dir`.
 *
 * @throws FetchError ERR_METADATA_FETCH when the URL is unset, unreachable or answers non-200
 * @throws FetchError ERR_METADATA_TIMEOUT when no complete answer arrives within `settings.timeout` seconds
 * @throws FetchError ERR_METADATA_INVALID when the answer is not a valid bundle
 */
export async function fetchMetadata(
  dir: string,
  settings: MetadataSettings,
  options: FetchMetadataOptions = {}
): Promise<FetchMetadataResult> {
  const logger = options.logger ?? silentLogger;
  const { url } = settings;
  if (!url) {
    throw new FetchError(
      'No metadata URL configured',
      'ERR_METADATA_FETCH',
      {},
      'Set keel.metadata.url in the configuration file'
    );
  }

  const timeoutMs = settings.timeout * 1000;
  logger.debug('Fetching metadata bundle', { url, timeoutMs });

  const body = await download(url, timeoutMs, options.dispatcher);
  const bundle = parseBundle(body, url);
  const files = await writeBundle(dir, bundle, url);

  logger.debug('Metadata bundle unpacked', { version: bundle.version, files: files.length });
  return { version: bundle.version, files };
}

async function download(url: string, timeoutMs: number, dispatcher: Dispatcher | undefined): Promise<string> {
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  try {
    const response = await request(url, {
      method: 'GET',
      signal: controller.signal,
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      ...(dispatcher ? { dispatcher } : {}),
    });

    if (response.statusCode !== 200) {
      await response.body.dump();
      throw new FetchError(
        `Metadata request to ${url} failed with status ${response.statusCode}`,
        'ERR_METADATA_FETCH',
        { url, statusCode: response.statusCode }
      );
    }

    return await response.body.text();
  } catch (error) {
    throw classifyRequestError(error, url, timedOut, timeoutMs);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Map whatever the HTTP request threw to a FetchError.
 *
 * FetchErrors pass through. Abort after our own timer fired and undici's
 * headers/body/connect timeouts become ERR_METADATA_TIMEOUT; anything else is
 * ERR_METADATA_FETCH.
 */
export function classifyRequestError(error: unknown, url: string, timedOut: boolean, timeoutMs: number): KeelError {
  if (error instanceof KeelError) {
    return error;
  }

  const isTimeout =
    timedOut ||
    error instanceof errors.HeadersTimeoutError ||
    error instanceof errors.BodyTimeoutError ||
    error instanceof errors.ConnectTimeoutError;

  if (isTimeout) {
    return new FetchError(
      `Metadata request to ${url} timed out after ${timeoutMs / 1000}s`,
      'ERR_METADATA_TIMEOUT',
      { url },
      'Raise keel.metadata.timeout or check connectivity to the metadata host'
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  return new FetchError(`Metadata request to ${url} failed: ${message}`, 'ERR_METADATA_FETCH', { url });
}

/**
 * Parse and shape-check a bundle document.
 */
export function parseBundle(text: string, url: string): MetadataBundle {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FetchError(`Metadata bundle from ${url} is not valid JSON: ${message}`, 'ERR_METADATA_INVALID', { url });
  }

  if (!isRecord(parsed)) {
    throw new FetchError(`Metadata bundle from ${url} must be a JSON object`, 'ERR_METADATA_INVALID', { url });
  }
  const { version, files } = parsed;
  if (typeof version !== 'string' || version === '') {
    throw new FetchError(`Metadata bundle from ${url} has no version`, 'ERR_METADATA_INVALID', { url });
  }
  if (!isRecord(files)) {
    throw new FetchError(`Metadata bundle from ${url}: files must be an object`, 'ERR_METADATA_INVALID', { url });
  }
  return { version, files };
}

async function writeBundle(dir: string, bundle: MetadataBundle, url: string): Promise<string[]> {
  const root = resolve(dir);
  const paths = Object.keys(bundle.files).sort();

  for (const path of paths) {
    const target = resolve(root, path);
    const rel = relative(root, target);
    if (path === '' || isAbsolute(path) || rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new FetchError(
        `Metadata bundle from ${url} contains an invalid path: '${path}'`,
        'ERR_METADATA_INVALID',
        { url, path }
      );
    }
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, JSON.stringify(bundle.files[path], null, 2) + '\n');
  }

  return paths;
}
