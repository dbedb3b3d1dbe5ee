/**
 * 휠 선택기
 * 해결된 (패키지, 버전)마다 타겟에 설치할 휠을 정확히 하나 고른다.
 */

import type {
  OsVersion,
  PackageRelease,
  ResolvedDependency,
  TargetEnvironment,
  WheelDescriptor,
  WheelPlatformTag,
} from '../../types';
import logger from '../../utils/logger';
import { NoCompatibleWheelError, type RejectedWheel } from '../errors';
import type { PackageIndex } from '../shared/pip-index';
import {
  compareOsVersions,
  formatOsVersion,
  isCompatible,
  isCompatibleIgnoringOsVersion,
  tagSpecificity,
} from '../shared/pip-tags';
import { getWheelSupportIndex } from '../shared/pip-wheel';

/** 호환 휠과 순위 키 */
interface RankedWheel {
  wheel: WheelDescriptor;
  specificity: number;
  minOsVersion: OsVersion | null;
}

/** null은 가장 낮은 버전으로 취급 */
function compareMinimums(a: OsVersion | null, b: OsVersion | null): number {
  if (a && b) return compareOsVersions(a, b);
  if (a) return 1;
  if (b) return -1;
  return 0;
}

/**
 * 휠의 호환 태그 중 최선 (구체성 우선, 다음은 최신 최소 버전)
 */
function bestTag(tags: readonly WheelPlatformTag[], target: TargetEnvironment): WheelPlatformTag {
  return [...tags].sort(
    (a, b) =>
      tagSpecificity(b, target.platformTag) - tagSpecificity(a, target.platformTag) ||
      compareMinimums(b.minOsVersion, a.minOsVersion)
  )[0];
}

function compareRanked(a: RankedWheel, b: RankedWheel): number {
  return (
    b.specificity - a.specificity ||
    compareMinimums(b.minOsVersion, a.minOsVersion) ||
    a.wheel.size - b.wheel.size ||
    (a.wheel.hash < b.wheel.hash ? -1 : a.wheel.hash > b.wheel.hash ? 1 : 0) ||
    (a.wheel.filename < b.wheel.filename ? -1 : a.wheel.filename > b.wheel.filename ? 1 : 0)
  );
}

/**
 * 최소 OS 버전 때문에만 거부된 휠이 있으면 가장 작은 상향 제안
 */
function osVersionRemedy(rejected: readonly RejectedWheel[], target: TargetEnvironment): string | undefined {
  const required = rejected
    .flatMap((r) => (r.reason === 'os-version' && r.requiredOsVersion ? [r.requiredOsVersion] : []))
    .sort(compareOsVersions)[0];
  if (!required) return undefined;
  const label = target.platformTag.os === 'macos' ? 'macOS' : 'glibc';
  return `raise your minimum ${label} version to ${formatOsVersion(required)}`;
}

/**
 * 타겟에 맞는 휠 하나 선택
 * @throws NoCompatibleWheelError
 */
export function selectWheel(release: PackageRelease, target: TargetEnvironment): WheelDescriptor {
  const ranked: RankedWheel[] = [];
  const rejected: RejectedWheel[] = [];

  for (const wheel of release.wheels) {
    if (getWheelSupportIndex(wheel, target.interpreterTags) < 0) {
      rejected.push({ filename: wheel.filename, reason: 'interpreter' });
      continue;
    }

    const compatible = wheel.platformTags.filter((tag) => isCompatible(tag, target.platformTag));
    if (compatible.length === 0) {
      const requiredOsVersion = wheel.platformTags
        .filter((tag) => isCompatibleIgnoringOsVersion(tag, target.platformTag))
        .flatMap((tag) => (tag.minOsVersion ? [tag.minOsVersion] : []))
        .sort(compareOsVersions)[0];
      rejected.push(
        requiredOsVersion
          ? { filename: wheel.filename, reason: 'os-version', requiredOsVersion }
          : { filename: wheel.filename, reason: 'platform' }
      );
      continue;
    }

    const tag = bestTag(compatible, target);
    ranked.push({ wheel, specificity: tagSpecificity(tag, target.platformTag), minOsVersion: tag.minOsVersion });
  }

  if (ranked.length === 0) {
    throw new NoCompatibleWheelError(
      release.name,
      release.version,
      target.key,
      rejected,
      osVersionRemedy(rejected, target)
    );
  }

  return ranked.sort(compareRanked)[0].wheel;
}

export interface WheelSelectionResult {
  /** 휠이 채워진 의존성 (선택 실패한 항목 제외) */
  resolved: ResolvedDependency[];
  /** 타겟 내 모든 선택 실패 */
  errors: NoCompatibleWheelError[];
}

/**
 * 해결된 의존성마다 휠 선택
 * 첫 실패에서 멈추지 않고 모든 NoCompatibleWheelError를 모음
 */
export async function selectWheels(
  resolved: readonly ResolvedDependency[],
  target: TargetEnvironment,
  index: PackageIndex,
  signal?: AbortSignal
): Promise<WheelSelectionResult> {
  const result: WheelSelectionResult = { resolved: [], errors: [] };

  for (const dep of resolved) {
    const release = await index.getRelease(dep.name, dep.version, signal);
    try {
      const wheel = selectWheel(release, target);
      result.resolved.push({
        ...dep,
        wheels: [{ platform: target.platform, platformTag: target.platformTag, wheel }],
      });
    } catch (error) {
      if (!(error instanceof NoCompatibleWheelError)) throw error;
      logger.debug('호환 휠 없음', { target: target.key, package: dep.name, version: dep.version });
      result.errors.push(error);
    }
  }

  return result;
}
