/**
 * KeelError - Error hierarchy for keel
 *
 * All errors extend the native JavaScript Error class so stage bodies and
 * managers can throw them like any other error.
 *
 * Error types:
 * - ConfigError: configuration file missing, unparseable or invalid (fatal)
 * - ManagerLoadError: unknown or duplicate plugin (fatal)
 * - InstanceConfigError: instance configuration rejected by its manager (fatal)
 * - NoActiveConfigurationError: nothing configured for the selected plugins (fatal)
 * - DanglingDependencyError: dependency on an instance that isn't configured (fatal)
 * - CyclicDependencyError: instances depend on each other in a loop (fatal)
 * - FetchError: metadata bundle download failed or timed out (fatal)
 * - RenderError: metadata could not be rendered into an instance (fatal)
 * - PipelineError: wraps the first stage failure with the stage name
 */

import type { InstanceKey, InstanceReference, StageResult } from '@keel/types';
import { formatInstanceKey } from '../core/InstanceKey.js';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  plugin?: string;
  instance?: string;
  stage?: string;
  [key: string]: unknown;
}

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * JSON representation of KeelError
 */
export interface KeelErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all keel errors.
 */
export abstract class KeelError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for the --json report
   */
  toJSON(): KeelErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - file missing, YAML syntax, invalid structure, include cycles
 *
 * Codes: ERR_CONFIG_NOT_FOUND, ERR_CONFIG_PARSE, ERR_CONFIG_INVALID, ERR_CONFIG_INCLUDE_CYCLE
 */
export class ConfigError extends KeelError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Manager load error - plugin filter names a plugin that isn't installed,
 * or two managers claim the same plugin name
 *
 * Codes: ERR_PLUGIN_UNKNOWN, ERR_PLUGIN_DUPLICATE
 */
export class ManagerLoadError extends KeelError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Instance configuration rejected by its plugin's manager
 */
export class InstanceConfigError extends KeelError {
  readonly code = 'ERR_INSTANCE_INVALID';
  readonly severity = 'fatal' as const;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
  }
}

/**
 * No instance configured for any selected plugin.
 * An empty configuration is a failure, not a vacuous pass.
 */
export class NoActiveConfigurationError extends KeelError {
  readonly code = 'ERR_NO_ACTIVE_CONFIGURATION';
  readonly severity = 'fatal' as const;

  constructor(message = 'No configuration defined for any selected plugins', context: ErrorContext = {}) {
    super(
      message,
      context,
      'Add an instance section for at least one installed plugin, or check the --plugin filter'
    );
  }
}

/**
 * Dependency reference to an instance that isn't configured.
 * `reference` is always fully qualified.
 */
export class DanglingDependencyError extends KeelError {
  readonly code = 'ERR_DANGLING_DEPENDENCY';
  readonly severity = 'fatal' as const;
  readonly source: InstanceKey;
  readonly reference: InstanceKey;

  constructor(source: InstanceKey, reference: InstanceKey, reason: string) {
    super(
      `${formatInstanceKey(source)} depends on ${formatInstanceKey(reference)}, ${reason}`,
      { plugin: source.plugin, instance: source.instance, reference },
      `Configure ${formatInstanceKey(reference)} or remove the reference`
    );
    this.source = source;
    this.reference = reference;
  }
}

/**
 * Dependency cycle between instances.
 * `cycle` repeats its first key at the end: [A, B, A].
 */
export class CyclicDependencyError extends KeelError {
  readonly code = 'ERR_DEPENDENCY_CYCLE';
  readonly severity = 'fatal' as const;
  readonly cycle: InstanceKey[];

  constructor(cycle: InstanceKey[]) {
    super(
      `Dependency cycle detected: ${cycle.map(formatInstanceKey).join(' -> ')}`,
      { cycle },
      'Remove one of the references in the cycle'
    );
    this.cycle = cycle;
  }
}

/**
 * Metadata bundle download failed, timed out or had an invalid shape
 *
 * Codes: ERR_METADATA_FETCH, ERR_METADATA_TIMEOUT, ERR_METADATA_INVALID
 */
export class FetchError extends KeelError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Metadata could not be rendered into an instance configuration
 */
export class RenderError extends KeelError {
  readonly code = 'ERR_METADATA_RENDER';
  readonly severity = 'fatal' as const;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
  }
}

/**
 * First stage failure of a pipeline run.
 *
 * `cause` is the error the stage threw, untouched. `report` holds every
 * stage result up to and including the failed one.
 */
export class PipelineError extends KeelError {
  readonly code = 'ERR_STAGE_FAILED';
  readonly severity = 'fatal' as const;
  readonly stage: string;
  readonly cause: Error;
  readonly report: StageResult[];

  constructor(stage: string, cause: Error, report: StageResult[]) {
    super(
      `${stage}: ${cause.message}`,
      { stage },
      cause instanceof KeelError ? cause.suggestion : undefined
    );
    this.stage = stage;
    this.cause = cause;
    this.report = report;
  }

  toJSON(): KeelErrorJSON {
    const base = super.toJSON();
    return {
      ...base,
      context: {
        ...base.context,
        cause: this.cause instanceof KeelError ? this.cause.toJSON() : { message: this.cause.message },
      },
    };
  }
}
