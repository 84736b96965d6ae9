/**
 * SeriesManager - series library server instances.
 *
 * Besides the base fields, an instance lists its root folders and picks a
 * quality profile, either inline or from the metadata bundle:
 *
 * ```yaml
 * series:
 *   instances:
 *     main:
 *       rootFolders: [/data/tv]
 *       qualityProfile:
 *         guide: web-1080p        # rendered from series/quality-profiles/web-1080p.json
 *     anime:
 *       dependsOn: [main]
 *       qualityProfile: { name: Anime, minSize: 1, maxSize: 400 }
 * ```
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import type { InstanceConfig, ManagerMetadata } from '@keel/types';
import { InstanceManager } from '../InstanceManager.js';
import { InstanceConfigError, RenderError } from '../../errors/KeelError.js';
import { isRecord, readNumber, readRecord, readString } from '../../config/fields.js';

export interface QualityProfile {
  readonly name: string;
  /** Minimum size in MB per minute of runtime */
  readonly minSize: number;
  /** Maximum size in MB per minute of runtime */
  readonly maxSize: number;
}

/** Quality profile to be filled in from the metadata bundle */
export interface GuideQualityProfile {
  readonly guide: string;
}

export interface SeriesInstanceConfig extends InstanceConfig {
  readonly rootFolders: readonly string[];
  readonly qualityProfile?: QualityProfile | GuideQualityProfile;
}

/** Location of guide profiles inside the metadata directory */
export const QUALITY_PROFILE_DIR = join('series', 'quality-profiles');

const GUIDE_ID = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export function isGuideProfile(profile: QualityProfile | GuideQualityProfile | undefined): profile is GuideQualityProfile {
  return profile !== undefined && 'guide' in profile;
}

export class SeriesManager extends InstanceManager<SeriesInstanceConfig> {
  get metadata(): ManagerMetadata {
    return {
      name: 'series',
      description: 'Series library servers',
      defaultPort: 8989,
    };
  }

  parseInstanceConfig(raw: Record<string, unknown>): SeriesInstanceConfig {
    this.rejectUnknownFields(raw, ['rootFolders', 'qualityProfile']);
    return {
      ...this.parseBaseFields(raw),
      rootFolders: parseRootFolders(raw.rootFolders),
      qualityProfile: parseQualityProfile(readRecord(raw, 'qualityProfile')),
    };
  }

  usesExternalMetadata(config: SeriesInstanceConfig): boolean {
    return isGuideProfile(config.qualityProfile);
  }

  async renderExternalMetadata(config: SeriesInstanceConfig, metadataDir: string): Promise<SeriesInstanceConfig> {
    const profile = config.qualityProfile;
    if (!isGuideProfile(profile)) {
      return config;
    }

    const file = join(metadataDir, QUALITY_PROFILE_DIR, `${profile.guide}.json`);
    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch {
      throw new RenderError(
        `Quality profile '${profile.guide}' not found in metadata`,
        { field: 'qualityProfile.guide', filePath: file },
        'Check the guide id against the metadata bundle'
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new RenderError(`Quality profile '${profile.guide}' is not valid JSON: ${message}`, { filePath: file });
    }

    if (!isRecord(parsed)) {
      throw new RenderError(`Quality profile '${profile.guide}' must be a JSON object`, { filePath: file });
    }

    let rendered: QualityProfile;
    try {
      rendered = parseInlineProfile(parsed);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new RenderError(`Quality profile '${profile.guide}' is invalid: ${message}`, { filePath: file });
    }

    return { ...config, qualityProfile: rendered };
  }
}

function parseRootFolders(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || value.some(entry => typeof entry !== 'string' || !entry.startsWith('/'))) {
    throw new InstanceConfigError('rootFolders must be a list of absolute paths', { field: 'rootFolders' });
  }
  const folders = value.filter((entry): entry is string => typeof entry === 'string');
  const duplicate = folders.find((folder, index) => folders.indexOf(folder) !== index);
  if (duplicate !== undefined) {
    throw new InstanceConfigError(`rootFolders lists '${duplicate}' twice`, { field: 'rootFolders' });
  }
  return folders;
}

function parseQualityProfile(raw: Record<string, unknown> | undefined): QualityProfile | GuideQualityProfile | undefined {
  if (raw === undefined) return undefined;

  if ('guide' in raw) {
    if (Object.keys(raw).length > 1) {
      throw new InstanceConfigError(
        'qualityProfile.guide cannot be combined with inline profile fields',
        { field: 'qualityProfile' }
      );
    }
    const guide = readString(raw, 'guide');
    if (!GUIDE_ID.test(guide)) {
      throw new InstanceConfigError(
        `qualityProfile.guide must be a profile id (letters, digits, '-', '_'), got '${guide}'`,
        { field: 'qualityProfile.guide' }
      );
    }
    return { guide };
  }

  return parseInlineProfile(raw);
}

function parseInlineProfile(raw: Record<string, unknown>): QualityProfile {
  const name = readString(raw, 'name');
  const minSize = readNumber(raw, 'minSize', { min: 0 });
  const maxSize = readNumber(raw, 'maxSize', { min: 0 });
  if (maxSize < minSize) {
    throw new InstanceConfigError(
      `qualityProfile.maxSize (${maxSize}) must not be below minSize (${minSize})`,
      { field: 'qualityProfile.maxSize' }
    );
  }
  return { name, minSize, maxSize };
}
