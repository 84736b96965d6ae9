/**
 * KeelError hierarchy tests
 *
 * - Every error is an Error and a KeelError
 * - Codes, context and suggestions
 * - PipelineError keeps the stage's own error untouched
 * - toJSON for the --json report
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  KeelError,
  ConfigError,
  ManagerLoadError,
  InstanceConfigError,
  NoActiveConfigurationError,
  DanglingDependencyError,
  CyclicDependencyError,
  FetchError,
  RenderError,
  PipelineError,
} from '@keel/core';

describe('KeelError', () => {
  it('should be instances of Error and KeelError', () => {
    const errors: KeelError[] = [
      new ConfigError('bad', 'ERR_CONFIG_INVALID'),
      new ManagerLoadError('dup', 'ERR_PLUGIN_DUPLICATE'),
      new InstanceConfigError('bad instance'),
      new NoActiveConfigurationError(),
      new FetchError('down', 'ERR_METADATA_FETCH'),
      new RenderError('no profile'),
    ];
    for (const error of errors) {
      assert.ok(error instanceof Error);
      assert.ok(error instanceof KeelError);
      assert.strictEqual(error.severity, 'fatal');
    }
  });

  it('should set name to the class name', () => {
    assert.strictEqual(new RenderError('x').name, 'RenderError');
    assert.strictEqual(new ConfigError('x', 'ERR_CONFIG_PARSE').name, 'ConfigError');
  });

  it('should carry code, context and suggestion', () => {
    const error = new InstanceConfigError('port must be a number', { plugin: 'series', instance: 'main', field: 'port' }, 'Use 8989');
    assert.strictEqual(error.code, 'ERR_INSTANCE_INVALID');
    assert.deepStrictEqual(error.context, { plugin: 'series', instance: 'main', field: 'port' });
    assert.strictEqual(error.suggestion, 'Use 8989');
  });

  it('NoActiveConfigurationError has a default message', () => {
    const error = new NoActiveConfigurationError();
    assert.strictEqual(error.message, 'No configuration defined for any selected plugins');
    assert.strictEqual(error.code, 'ERR_NO_ACTIVE_CONFIGURATION');
  });

  it('DanglingDependencyError exposes source and reference', () => {
    const error = new DanglingDependencyError(
      { plugin: 'series', instance: 'A' },
      { plugin: 'X', instance: 'Z' },
      "but plugin 'X' has no configured instances"
    );
    assert.deepStrictEqual(error.reference, { plugin: 'X', instance: 'Z' });
    assert.strictEqual(error.context.plugin, 'series');
    assert.strictEqual(error.context.instance, 'A');
  });

  it('CyclicDependencyError formats the loop', () => {
    const A = { plugin: 'series', instance: 'A' };
    const error = new CyclicDependencyError([A, A]);
    assert.strictEqual(error.message, "Dependency cycle detected: series.instances['A'] -> series.instances['A']");
  });

  describe('PipelineError', () => {
    it('should keep the original error object as cause', () => {
      const cause = new ConfigError('Configuration file not found: /x/keel.yml', 'ERR_CONFIG_NOT_FOUND', {}, 'Create keel.yml');
      const error = new PipelineError('Loading configuration', cause, []);

      assert.strictEqual(error.cause, cause);
      assert.strictEqual(error.stage, 'Loading configuration');
      assert.strictEqual(error.code, 'ERR_STAGE_FAILED');
      assert.strictEqual(error.message, 'Loading configuration: Configuration file not found: /x/keel.yml');
      assert.strictEqual(error.suggestion, 'Create keel.yml');
      assert.strictEqual(error.context.stage, 'Loading configuration');
    });

    it('should accept non-keel causes', () => {
      const error = new PipelineError('Fetching metadata', new TypeError('boom'), []);
      assert.strictEqual(error.message, 'Fetching metadata: boom');
      assert.strictEqual(error.suggestion, undefined);
    });

    it('toJSON should include the cause', () => {
      const cause = new RenderError('profile missing', { plugin: 'series', instance: 'main' });
      const json = new PipelineError('Rendering metadata', cause, []).toJSON();

      assert.strictEqual(json.code, 'ERR_STAGE_FAILED');
      assert.deepStrictEqual(json.context.cause, {
        code: 'ERR_METADATA_RENDER',
        severity: 'fatal',
        message: 'profile missing',
        context: { plugin: 'series', instance: 'main' },
        suggestion: undefined,
      });
    });
  });
});
