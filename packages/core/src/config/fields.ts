/**
 * Field readers for instance configuration schemas.
 *
 * Each reader validates one field of a raw YAML mapping and throws
 * InstanceConfigError naming the field on bad input. The instance loader
 * adds plugin/instance context before the error leaves the stage.
 */

import type { InstanceReference } from '@keel/types';
import { InstanceConfigError } from '../errors/KeelError.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(field: string, expected: string, value: unknown): InstanceConfigError {
  const got = value === null ? 'null' : Array.isArray(value) ? 'list' : typeof value;
  return new InstanceConfigError(`${field} must be ${expected}, got ${got}`, { field });
}

export function readString(raw: Record<string, unknown>, field: string, fallback?: string): string {
  const value = raw[field];
  if (value === undefined || value === null) {
    if (fallback !== undefined) return fallback;
    throw new InstanceConfigError(`${field} is required`, { field });
  }
  if (typeof value !== 'string' || !value.trim()) {
    throw invalid(field, 'a non-empty string', value);
  }
  return value;
}

export function readOptionalString(raw: Record<string, unknown>, field: string): string | undefined {
  const value = raw[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || !value.trim()) {
    throw invalid(field, 'a non-empty string', value);
  }
  return value;
}

export function readPort(raw: Record<string, unknown>, field: string, fallback: number): number {
  const value = raw[field];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > 65535) {
    throw invalid(field, 'an integer between 1 and 65535', value);
  }
  return value;
}

export function readNumber(raw: Record<string, unknown>, field: string, options: { min?: number } = {}): number {
  const value = raw[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw invalid(field, 'a number', value);
  }
  if (options.min !== undefined && value < options.min) {
    throw new InstanceConfigError(`${field} must be at least ${options.min}, got ${value}`, { field });
  }
  return value;
}

export function readEnum<T extends string>(
  raw: Record<string, unknown>,
  field: string,
  allowed: readonly T[],
  fallback: T
): T {
  const value = raw[field];
  if (value === undefined || value === null) return fallback;
  const match = allowed.find(option => option === value);
  if (match === undefined) {
    throw invalid(field, `one of ${allowed.join(', ')}`, value);
  }
  return match;
}

export function readRecord(raw: Record<string, unknown>, field: string): Record<string, unknown> | undefined {
  const value = raw[field];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw invalid(field, 'a mapping', value);
  }
  return value;
}

/**
 * Parse one dependency reference.
 *
 * Accepted forms:
 *   "main"                              same plugin as the declaring instance
 *   { instance: main }                  same as above
 *   { plugin: series, instance: main }  explicit cross-plugin reference
 */
export function parseReference(value: unknown, field: string, options: { requirePlugin?: boolean } = {}): InstanceReference {
  if (typeof value === 'string' && value.trim()) {
    if (options.requirePlugin) {
      throw new InstanceConfigError(
        `${field} must name the plugin: { plugin: <name>, instance: <name> }`,
        { field }
      );
    }
    return { instance: value };
  }

  if (isRecord(value)) {
    const { plugin, instance } = value;
    for (const key of Object.keys(value)) {
      if (key !== 'plugin' && key !== 'instance') {
        throw new InstanceConfigError(`${field} has unknown key '${key}'`, { field });
      }
    }
    if (typeof instance !== 'string' || !instance.trim()) {
      throw invalid(`${field}.instance`, 'a non-empty string', instance);
    }
    if (plugin === undefined || plugin === null) {
      if (options.requirePlugin) {
        throw new InstanceConfigError(`${field}.plugin is required`, { field: `${field}.plugin` });
      }
      return { instance };
    }
    if (typeof plugin !== 'string' || !plugin.trim()) {
      throw invalid(`${field}.plugin`, 'a non-empty string', plugin);
    }
    return { plugin, instance };
  }

  throw invalid(field, 'an instance name or { plugin, instance } mapping', value);
}

export function readReferences(
  raw: Record<string, unknown>,
  field: string,
  options: { requirePlugin?: boolean } = {}
): InstanceReference[] {
  const value = raw[field];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw invalid(field, 'a list', value);
  }
  return value.map((entry, index) => parseReference(entry, `${field}[${index}]`, options));
}
