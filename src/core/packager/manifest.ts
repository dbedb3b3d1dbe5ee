/**
 * blender_manifest.toml (스키마 1.0.0) 및 release_config.toml 생성
 */

import { stringify } from 'smol-toml';
import type { BlenderPlatform, ExtensionPermission, ProjectConfig, ReleaseProfile, WheelDescriptor } from '../../types';
import { ManifestValidationError } from '../errors';
import { BLENDER_PLATFORMS } from '../blender/platforms';
import { compareVersions } from '../shared/version-utils';

export const MANIFEST_FILENAME = 'blender_manifest.toml';
export const RELEASE_CONFIG_FILENAME = 'release_config.toml';
export const MANIFEST_SCHEMA_VERSION = '1.0.0';

export type BlenderManifest = {
  schema_version: string;
  id: string;
  version: string;
  name: string;
  tagline: string;
  maintainer: string;
  type: 'add-on';
  blender_version_min: string;
  blender_version_max?: string;
  license: string[];
  copyright?: string[];
  tags?: string[];
  platforms?: BlenderPlatform[];
  permissions?: Partial<Record<ExtensionPermission, string>>;
  website?: string;
  wheels?: string[];
};

export interface ManifestTarget {
  blenderVersionMin: string;
  blenderVersionMax?: string;
  platforms: readonly BlenderPlatform[];
  wheels: readonly WheelDescriptor[];
}

// Blender 확장 CLI가 사용하는 semver 정규식
const SEMVER_PATTERN =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-((?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*)(?:\.(?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*))*))?(?:\+([0-9a-zA-Z-]+(?:\.[0-9a-zA-Z-]+)*))?$/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const COPYRIGHT_PATTERN = /^\d{4}(-\d{4})? \S/;
const CONTROL_CHARS = /[\x00-\x1f\x7f]/;
const MAX_TERSE_LENGTH = 64;

/**
 * 릴리스 프로필별 release_config.toml 내용
 */
const RELEASE_PROFILE_CONFIG: Record<ReleaseProfile, Record<string, string | boolean>> = {
  test: {
    use_log_file: true,
    log_file_name: 'addon.log',
    log_file_level: 'debug',
    use_log_console: true,
    log_console_level: 'info',
  },
  dev: {
    use_log_file: true,
    log_file_name: 'addon.log',
    log_file_level: 'debug',
    use_log_console: true,
    log_console_level: 'info',
  },
  release: {
    use_log_file: false,
    log_file_level: 'debug',
    use_log_console: true,
    log_console_level: 'warning',
  },
  'release-debug': {
    use_log_file: true,
    log_file_name: 'addon.log',
    log_file_level: 'debug',
    use_log_console: true,
    log_console_level: 'info',
  },
};

export function buildManifest(config: ProjectConfig, target: ManifestTarget): BlenderManifest {
  const manifest: BlenderManifest = {
    schema_version: MANIFEST_SCHEMA_VERSION,
    id: config.id,
    version: config.version,
    name: config.prettyName,
    tagline: config.tagline,
    maintainer: config.maintainer,
    type: 'add-on',
    blender_version_min: target.blenderVersionMin,
    license: [config.license.startsWith('SPDX:') ? config.license : `SPDX:${config.license}`],
  };

  if (target.blenderVersionMax) manifest.blender_version_max = target.blenderVersionMax;
  if (config.copyright.length > 0) manifest.copyright = [...config.copyright];
  if (config.tags.length > 0) manifest.tags = [...config.tags].sort();
  manifest.platforms = BLENDER_PLATFORMS.filter((p) => target.platforms.includes(p));
  if (Object.keys(config.permissions).length > 0) manifest.permissions = { ...config.permissions };
  if (config.website) manifest.website = config.website;

  const wheels = [...new Set(target.wheels.map((w) => `./wheels/${w.filename}`))].sort();
  if (wheels.length > 0) manifest.wheels = wheels;

  return manifest;
}

function isTerseDescription(value: string): boolean {
  return value.length > 0 && value.length <= MAX_TERSE_LENGTH && /[A-Za-z0-9)\]}]$/.test(value);
}

function isCleanString(value: string): boolean {
  return value.trim().length > 0 && value.trim() === value && !CONTROL_CHARS.test(value);
}

/**
 * 매니페스트 검증
 * @param validTags 대상 릴리스가 허용하는 태그
 * @throws ManifestValidationError 모든 문제를 한 번에 보고
 */
export function validateManifest(manifest: BlenderManifest, validTags: readonly string[]): void {
  const problems: string[] = [];

  if (!IDENTIFIER_PATTERN.test(manifest.id) || manifest.id.startsWith('_') || manifest.id.endsWith('_') || manifest.id.includes('__')) {
    problems.push(`id '${manifest.id}' must be a Python identifier without leading, trailing or double underscores`);
  }
  if (!SEMVER_PATTERN.test(manifest.version)) {
    problems.push(`version '${manifest.version}' is not semantic versioning (e.g. 1.0.0)`);
  }
  if (!isCleanString(manifest.name)) {
    problems.push('name must be non-empty without surrounding whitespace or control characters');
  }
  if (!isTerseDescription(manifest.tagline)) {
    problems.push(`tagline must be 1-${MAX_TERSE_LENGTH} characters and must not end in punctuation`);
  }
  if (!isCleanString(manifest.maintainer)) {
    problems.push('maintainer must be non-empty without surrounding whitespace or control characters');
  }
  if (!/^\d+\.\d+\.\d+$/.test(manifest.blender_version_min) || compareVersions(manifest.blender_version_min, '4.2.0') < 0) {
    problems.push(`blender_version_min '${manifest.blender_version_min}' must be 4.2.0 or newer`);
  }
  if (manifest.blender_version_max && compareVersions(manifest.blender_version_max, manifest.blender_version_min) <= 0) {
    problems.push(`blender_version_max '${manifest.blender_version_max}' must be greater than blender_version_min`);
  }
  for (const license of manifest.license) {
    if (!/^SPDX:\S+$/.test(license)) problems.push(`license '${license}' must be an SPDX identifier`);
  }
  for (const line of manifest.copyright ?? []) {
    if (!COPYRIGHT_PATTERN.test(line)) problems.push(`copyright '${line}' must look like "2025 Name"`);
  }
  for (const tag of manifest.tags ?? []) {
    if (!validTags.includes(tag)) problems.push(`tag '${tag}' is not a known extension tag`);
  }
  for (const platform of manifest.platforms ?? []) {
    if (!BLENDER_PLATFORMS.includes(platform)) problems.push(`platform '${platform}' is not supported`);
  }
  for (const [permission, reason] of Object.entries(manifest.permissions ?? {})) {
    if (reason !== undefined && !isTerseDescription(reason)) {
      problems.push(`permission '${permission}' reason must be 1-${MAX_TERSE_LENGTH} characters and must not end in punctuation`);
    }
  }
  if (manifest.website !== undefined && !isCleanString(manifest.website)) {
    problems.push('website must be non-empty without surrounding whitespace');
  }
  for (const wheel of manifest.wheels ?? []) {
    if (wheel.includes('"') || wheel.includes('\\') || !wheel.toLowerCase().endsWith('.whl')) {
      problems.push(`wheel path '${wheel}' is invalid`);
    }
  }

  if (problems.length > 0) {
    throw new ManifestValidationError(problems);
  }
}

export function renderManifest(manifest: BlenderManifest): string {
  return `${stringify(manifest)}\n`;
}

export function renderReleaseConfig(profile: ReleaseProfile): string {
  return `${stringify(RELEASE_PROFILE_CONFIG[profile])}\n`;
}
