/**
 * Blender 릴리스 레퍼런스 테이블
 * releases.json에서 한 번 로드하며 이후 변경하지 않음
 */

import fs from 'fs-extra';
import { fileURLToPath } from 'url';
import type { BlenderPlatform, BlenderRelease, OsVersion, ReferencePin } from '../../types';
import { ConfigError } from '../errors';
import { parseOsVersion } from '../shared/pip-tags';
import { normalizePackageName } from '../shared/pip-wheel';
import { compareVersions, isVersionCompatible } from '../shared/version-utils';
import { blenderPlatformInfo, isBlenderPlatform } from './platforms';

const RELEASES_FILE = fileURLToPath(new URL('./releases.json', import.meta.url));

interface SeriesData {
  pythonVersion: string;
  minGlibcVersion: OsVersion;
  minMacosVersion: OsVersion;
  markerExtra: string;
  manifestVersions: string[];
  packages: Map<string, string>;
}

let releaseCache: readonly BlenderRelease[] | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(obj: Record<string, unknown>, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new ConfigError(`${where}: '${key}' must be a string`, { file: RELEASES_FILE });
  }
  return value;
}

function readStringArray(obj: Record<string, unknown>, key: string, where: string): string[] {
  const value = obj[key];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`${where}: '${key}' must be a string array`, { file: RELEASES_FILE });
  }
  return value;
}

function readOsVersion(obj: Record<string, unknown>, key: string, where: string): OsVersion {
  const version = parseOsVersion(readString(obj, key, where));
  if (!version) {
    throw new ConfigError(`${where}: '${key}' must look like 2.28`, { file: RELEASES_FILE });
  }
  return version;
}

function parseSeries(series: string, raw: unknown): SeriesData {
  const where = `series ${series}`;
  if (!isRecord(raw) || !isRecord(raw.packages)) {
    throw new ConfigError(`${where}: invalid entry`, { file: RELEASES_FILE });
  }
  const packages = new Map<string, string>();
  for (const [name, version] of Object.entries(raw.packages)) {
    if (typeof version !== 'string') {
      throw new ConfigError(`${where}: version of '${name}' must be a string`, { file: RELEASES_FILE });
    }
    packages.set(normalizePackageName(name), version);
  }
  return {
    pythonVersion: readString(raw, 'pythonVersion', where),
    minGlibcVersion: readOsVersion(raw, 'minGlibcVersion', where),
    minMacosVersion: readOsVersion(raw, 'minMacosVersion', where),
    markerExtra: readString(raw, 'markerExtra', where),
    manifestVersions: readStringArray(raw, 'manifestVersions', where),
    packages,
  };
}

/**
 * 릴리스 테이블 원본 데이터 검증 및 변환
 */
export function parseReleaseTable(raw: unknown): BlenderRelease[] {
  if (!isRecord(raw) || !isRecord(raw.series) || !Array.isArray(raw.releases)) {
    throw new ConfigError('Invalid Blender release table', { file: RELEASES_FILE });
  }
  const validTags = readStringArray(raw, 'extensionTags', 'release table');

  const series = new Map<string, SeriesData>();
  for (const [name, value] of Object.entries(raw.series)) {
    series.set(name, parseSeries(name, value));
  }

  const releases = raw.releases.map((entry: unknown): BlenderRelease => {
    if (!isRecord(entry)) {
      throw new ConfigError('Invalid Blender release entry', { file: RELEASES_FILE });
    }
    const version = readString(entry, 'version', 'release');
    const seriesName = version.split('.').slice(0, 2).join('.');
    const data = series.get(seriesName);
    if (!data) {
      throw new ConfigError(`release ${version}: unknown series ${seriesName}`, { file: RELEASES_FILE });
    }
    const platforms = readStringArray(entry, 'platforms', `release ${version}`).map((p): BlenderPlatform => {
      if (!isBlenderPlatform(p)) {
        throw new ConfigError(`release ${version}: unknown platform ${p}`, { file: RELEASES_FILE });
      }
      return p;
    });

    const referencePackages = new Map<string, ReferencePin>();
    for (const [name, pinned] of data.packages) {
      referencePackages.set(name, { name, version: pinned, platforms });
    }

    return {
      version,
      series: seriesName,
      releasedAt: readString(entry, 'releasedAt', `release ${version}`),
      pythonVersion: data.pythonVersion,
      minGlibcVersion: data.minGlibcVersion,
      minMacosVersion: data.minMacosVersion,
      platforms,
      manifestVersions: data.manifestVersions,
      validTags,
      markerExtra: data.markerExtra,
      referencePackages,
    };
  });

  return releases.sort((a, b) => compareVersions(a.version, b.version));
}

/**
 * 알려진 모든 Blender 릴리스 (버전 오름차순)
 */
export function listBlenderReleases(): readonly BlenderRelease[] {
  if (!releaseCache) {
    const raw: unknown = fs.readJsonSync(RELEASES_FILE);
    releaseCache = Object.freeze(parseReleaseTable(raw));
  }
  return releaseCache;
}

export function findBlenderRelease(version: string): BlenderRelease | undefined {
  return listBlenderReleases().find((r) => compareVersions(r.version, version) === 0);
}

/**
 * 버전으로 릴리스 조회
 * @throws ConfigError 알 수 없는 버전
 */
export function getBlenderRelease(version: string): BlenderRelease {
  const release = findBlenderRelease(version);
  if (!release) {
    const known = listBlenderReleases().map((r) => r.version);
    throw new ConfigError(`Unknown Blender version ${version}. Known: ${known.join(', ')}`, { version });
  }
  return release;
}

/**
 * 범위 내 릴리스 (min 포함, max 미포함)
 */
export function releasesInRange(min: string, max?: string): BlenderRelease[] {
  return listBlenderReleases().filter(
    (r) => compareVersions(r.version, min) >= 0 && (max === undefined || compareVersions(r.version, max) < 0)
  );
}

/**
 * 릴리스가 번들하는 패키지 집합
 */
export function referencePlatformSet(release: BlenderRelease): ReadonlyMap<string, ReferencePin> {
  return release.referencePackages;
}

function admits(release: BlenderRelease, name: string, specifier: string): boolean {
  const pin = release.referencePackages.get(name);
  return !pin || isVersionCompatible(pin.version, specifier, { prereleases: true });
}

/**
 * 레퍼런스 충돌 해결 방법 제안
 * 제약을 만족하는 가장 가까운 릴리스를 기준으로 Blender 버전 범위 조정을 제안
 */
export function suggestReferenceRemedy(name: string, specifier: string, release: BlenderRelease): string {
  const releases = listBlenderReleases();
  const index = releases.findIndex((r) => r.version === release.version);
  const suggestions: string[] = [];

  const newer = releases.slice(index + 1).find((r) => admits(r, name, specifier));
  if (newer) {
    suggestions.push(`raise blender_version_min to ${newer.version}`);
  }
  const older = releases
    .slice(0, Math.max(index, 0))
    .reverse()
    .find((r) => admits(r, name, specifier));
  if (older) {
    suggestions.push(`lower blender_version_max to ${release.version}`);
  }

  const pin = release.referencePackages.get(name);
  if (pin) {
    suggestions.push(`relax '${name}${specifier}' to admit ${name}==${pin.version}`);
  }
  return suggestions.join(', or ');
}

/**
 * 공식 배포 아카이브 URL
 */
export function blenderDownloadUrl(release: BlenderRelease, platform: BlenderPlatform): string {
  const ext = blenderPlatformInfo(platform).archiveExtension;
  return `https://download.blender.org/release/Blender${release.series}/blender-${release.version}-${platform}.${ext}`;
}
