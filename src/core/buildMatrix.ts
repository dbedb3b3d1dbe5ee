/**
 * 빌드 매트릭스
 * 타겟 (Blender 버전 x 플랫폼 x Python ABI)마다 의존성 해결과 휠 선택을 수행한다.
 * 한 타겟의 실패는 다른 타겟을 중단시키지 않는다.
 */

import PQueue from 'p-queue';
import type { BlenderPlatform, BlenderRelease, DependencySpec, ResolvedDependency, TargetEnvironment } from '../types';
import logger from '../utils/logger';
import type { BuildConfig } from './config';
import { BuildCancelledError, formatError } from './errors';
import { markerEnvironmentFor, toPlatformTag } from './blender/platforms';
import { getBlenderRelease } from './blender/releases';
import { DependencyResolver } from './resolver/dependencyResolver';
import { selectWheels } from './resolver/wheelSelector';
import { IndexQueryCache, type IndexCacheStats } from './shared/pip-cache';
import type { PackageIndex } from './shared/pip-index';
import { compareOsVersions, formatOsVersion, supportedInterpreterTags, versionToNodot } from './shared/pip-tags';

/** 성공한 타겟의 해결 결과 */
export interface TargetResolution {
  target: TargetEnvironment;
  release: BlenderRelease;
  dependencies: ResolvedDependency[];
}

/** 실패한 타겟과 수집된 모든 에러 */
export interface TargetFailure {
  target: TargetEnvironment;
  errors: Error[];
}

export interface BuildMatrixResult {
  targets: TargetResolution[];
  failures: TargetFailure[];
  indexStats: IndexCacheStats;
}

export interface ResolveMatrixOptions {
  signal?: AbortSignal;
  /** 타겟 하나가 끝날 때마다 호출 */
  onTargetComplete?: (target: TargetEnvironment, ok: boolean) => void;
}

type OsMinimums = Pick<BuildConfig, 'minGlibcVersion' | 'minMacosVersion'>;

/**
 * 릴리스와 플랫폼으로 타겟 환경 생성
 * 프로젝트가 지정한 OS 최소 버전은 릴리스 기본값을 대체
 */
export function createTargetEnvironment(
  release: BlenderRelease,
  platform: BlenderPlatform,
  minimums: OsMinimums = { minGlibcVersion: null, minMacosVersion: null }
): TargetEnvironment {
  const platformTag = toPlatformTag(platform, {
    glibc: minimums.minGlibcVersion ?? release.minGlibcVersion,
    macos: minimums.minMacosVersion ?? release.minMacosVersion,
  });
  return {
    key: `${release.version}/${platform}/cp${versionToNodot(release.pythonVersion)}`,
    blenderVersion: release.version,
    series: release.series,
    platform,
    pythonVersion: release.pythonVersion,
    interpreterTags: supportedInterpreterTags({ version: release.pythonVersion }),
    platformTag,
    markerEnvironment: markerEnvironmentFor(platform, release.pythonVersion),
    extras: [release.markerExtra],
  };
}

/**
 * 빌드 설정을 타겟 목록으로 전개 (릴리스 순, 설정한 플랫폼 순)
 */
export function planTargets(config: BuildConfig): TargetEnvironment[] {
  const targets: TargetEnvironment[] = [];

  for (const version of config.blenderVersions) {
    const release = getBlenderRelease(version);
    warnModifiedMinimums(release, config);
    for (const platform of config.platforms) {
      if (!release.platforms.includes(platform)) continue;
      targets.push(createTargetEnvironment(release, platform, config));
    }
  }

  return targets;
}

function warnModifiedMinimums(release: BlenderRelease, config: OsMinimums): void {
  const modified: Record<string, string> = {};
  if (config.minGlibcVersion && compareOsVersions(config.minGlibcVersion, release.minGlibcVersion) !== 0) {
    modified.glibc = formatOsVersion(config.minGlibcVersion);
  }
  if (config.minMacosVersion && compareOsVersions(config.minMacosVersion, release.minMacosVersion) !== 0) {
    modified.macos = formatOsVersion(config.minMacosVersion);
  }
  if (Object.keys(modified).length > 0) {
    logger.info('수정된 플랫폼 지원 사용', { blender: release.version, ...modified });
  }
}

/**
 * 단일 타겟 해결 (의존성 해결 + 휠 선택)
 * @returns 성공 시 해결 결과, 실패 시 모든 에러
 */
export async function resolveTarget(
  target: TargetEnvironment,
  specs: readonly DependencySpec[],
  index: PackageIndex,
  config: Pick<BuildConfig, 'maxBacktracks' | 'allowPrereleases'>,
  signal?: AbortSignal
): Promise<TargetResolution | TargetFailure> {
  const release = getBlenderRelease(target.blenderVersion);
  const resolver = new DependencyResolver(index, release, target, {
    maxBacktracks: config.maxBacktracks,
    allowPrereleases: config.allowPrereleases,
    signal,
  });

  try {
    const resolved = await resolver.resolve(specs);
    const selection = await selectWheels(resolved, target, index, signal);
    if (selection.errors.length > 0) {
      return { target, errors: selection.errors };
    }
    return { target, release, dependencies: selection.resolved };
  } catch (error) {
    if (error instanceof BuildCancelledError) throw error;
    logger.debug('타겟 해결 실패', { target: target.key, error: String(error) });
    return { target, errors: [error instanceof Error ? error : new Error(String(error))] };
  }
}

function isFailure(result: TargetResolution | TargetFailure): result is TargetFailure {
  return 'errors' in result;
}

/**
 * 모든 타겟 해결
 * 인덱스 조회 캐시를 모든 타겟이 공유하며, 결과는 planTargets 순서를 따름
 */
export async function resolveBuildMatrix(
  config: BuildConfig,
  specs: readonly DependencySpec[],
  index: PackageIndex,
  options: ResolveMatrixOptions = {}
): Promise<BuildMatrixResult> {
  const { signal, onTargetComplete } = options;
  const targets = planTargets(config);
  const cache = new IndexQueryCache(index);
  const queue = new PQueue({ concurrency: config.concurrency });
  const results: (TargetResolution | TargetFailure | undefined)[] = targets.map(() => undefined);

  logger.info('빌드 매트릭스 해결 시작', { targets: targets.length, concurrency: config.concurrency });

  // 취소되면 대기 중인 작업은 시작하자마자 종료
  await Promise.all(
    targets.map((target, i) =>
      queue.add(async () => {
        if (signal?.aborted) return;
        const result = await resolveTarget(target, specs, cache, config, signal);
        results[i] = result;
        onTargetComplete?.(target, !isFailure(result));
      })
    )
  );

  if (signal?.aborted) {
    throw new BuildCancelledError('resolution');
  }

  const result: BuildMatrixResult = { targets: [], failures: [], indexStats: cache.stats() };
  for (const entry of results) {
    if (!entry) continue;
    if (isFailure(entry)) {
      result.failures.push(entry);
    } else {
      result.targets.push(entry);
    }
  }

  logger.info('빌드 매트릭스 해결 완료', {
    succeeded: result.targets.length,
    failed: result.failures.length,
    ...result.indexStats,
  });
  return result;
}

/**
 * 타겟별 실패를 사람이 읽을 수 있는 문자열로 변환
 */
export function formatFailures(result: Pick<BuildMatrixResult, 'failures'>): string {
  return result.failures
    .map((failure) => {
      const errors = failure.errors.map((e) => formatError(e).replace(/^/gm, '    ')).join('\n');
      return `  ${failure.target.key}:\n${errors}`;
    })
    .join('\n');
}
