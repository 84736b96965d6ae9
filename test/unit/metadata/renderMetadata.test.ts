/**
 * renderMetadata tests
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  renderMetadata,
  RunState,
  ManagerRegistry,
  SeriesManager,
  RenderError,
  QUALITY_PROFILE_DIR,
} from '@keel/core';
import type { IInstanceManager, InstanceConfig, SeriesInstanceConfig } from '@keel/core';

class BrokenSeriesManager extends SeriesManager {
  async renderExternalMetadata(_config: SeriesInstanceConfig, _metadataDir: string): Promise<SeriesInstanceConfig> {
    throw new TypeError('template exploded');
  }
}

describe('renderMetadata', () => {
  let dir: string;

  function writeProfile(guide: string, profile: unknown): void {
    mkdirSync(join(dir, QUALITY_PROFILE_DIR), { recursive: true });
    writeFileSync(join(dir, QUALITY_PROFILE_DIR, `${guide}.json`), JSON.stringify(profile));
  }

  function stateWith(manager: IInstanceManager, raw: Record<string, Record<string, unknown>>, order: string[]): RunState {
    const state = new RunState('keel.yml', new Set(), new ManagerRegistry([manager]));
    state.managers = new Map([['series', manager]]);
    const instances = new Map<string, InstanceConfig>();
    for (const [name, fields] of Object.entries(raw)) {
      instances.set(name, manager.parseInstanceConfig(fields));
    }
    state.instanceConfigs = new Map([['series', instances]]);
    state.executionOrder = order.map(instance => ({ plugin: 'series', instance }));
    return state;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'keel-render-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should render guide profiles in execution order', async () => {
    writeProfile('web-1080p', { name: 'WEB-1080p', minSize: 2, maxSize: 100 });
    writeProfile('anime', { name: 'Anime', minSize: 1, maxSize: 40 });
    const manager: IInstanceManager = new SeriesManager();
    const state = stateWith(manager, {
      a: { qualityProfile: { guide: 'anime' }, dependsOn: ['b'] },
      b: { qualityProfile: { guide: 'web-1080p' } },
      c: { qualityProfile: { name: 'Inline', minSize: 0, maxSize: 10 } },
    }, ['b', 'a', 'c']);
    const inline = state.instanceConfigs.get('series')?.get('c');

    const rendered = await renderMetadata(state, dir);

    assert.deepStrictEqual(rendered, [
      { plugin: 'series', instance: 'b' },
      { plugin: 'series', instance: 'a' },
    ]);
    const configs = state.instanceConfigs.get('series');
    assert.ok(configs);
    const profileOf = (name: string): unknown => {
      const config = configs.get(name);
      assert.ok(config);
      return manager.dumpInstanceConfig(config).qualityProfile;
    };
    assert.deepStrictEqual(profileOf('a'), { name: 'Anime', minSize: 1, maxSize: 40 });
    assert.deepStrictEqual(profileOf('b'), { name: 'WEB-1080p', minSize: 2, maxSize: 100 });
    assert.strictEqual(configs.get('c'), inline);
  });

  it('should return nothing when no instance uses metadata', async () => {
    const state = stateWith(new SeriesManager(), { a: {} }, ['a']);
    assert.deepStrictEqual(await renderMetadata(state, dir), []);
  });

  it('should keep the unrendered configs when an instance fails', async () => {
    writeProfile('web-1080p', { name: 'WEB-1080p', minSize: 2, maxSize: 100 });
    const state = stateWith(new SeriesManager(), {
      a: { qualityProfile: { guide: 'web-1080p' } },
      b: { qualityProfile: { guide: 'missing' } },
    }, ['a', 'b']);
    const before = state.instanceConfigs;

    await assert.rejects(renderMetadata(state, dir), (err: unknown) => {
      assert.ok(err instanceof RenderError);
      assert.strictEqual(
        err.message,
        "Failed to render metadata for series.instances['b']: Quality profile 'missing' not found in metadata"
      );
      assert.strictEqual(err.context.plugin, 'series');
      assert.strictEqual(err.context.instance, 'b');
      assert.strictEqual(err.context.field, 'qualityProfile.guide');
      assert.strictEqual(err.suggestion, 'Check the guide id against the metadata bundle');
      return true;
    });
    assert.strictEqual(state.instanceConfigs, before);
  });

  it('should wrap errors that are not keel errors', async () => {
    const state = stateWith(new BrokenSeriesManager(), { a: { qualityProfile: { guide: 'p' } } }, ['a']);

    await assert.rejects(renderMetadata(state, dir), (err: unknown) => {
      assert.ok(err instanceof RenderError);
      assert.strictEqual(err.message, "Failed to render metadata for series.instances['a']: template exploded");
      assert.strictEqual(err.suggestion, undefined);
      return true;
    });
  });
});
