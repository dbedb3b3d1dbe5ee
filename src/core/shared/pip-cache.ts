/**
 * 인덱스 조회 메모이제이션
 * 한 번의 빌드 동안 모든 타겟이 공유하며, 같은 키의 동시 요청은 하나로 합침
 */

import type { PackageRelease } from '../../types';
import logger from '../../utils/logger';
import type { PackageIndex } from './pip-index';
import { normalizePackageName } from './pip-wheel';

export interface IndexCacheStats {
  hits: number;
  misses: number;
  entries: number;
}

/**
 * PackageIndex를 감싸는 조회 캐시
 * 실패한 조회는 캐시하지 않음
 */
export class IndexQueryCache implements PackageIndex {
  /** key: packageName */
  private versions = new Map<string, Promise<string[]>>();
  /** key: packageName@version */
  private releases = new Map<string, Promise<PackageRelease>>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly index: PackageIndex) {}

  listVersions(name: string, signal?: AbortSignal): Promise<string[]> {
    const key = normalizePackageName(name);
    return this.memo(this.versions, key, () => this.index.listVersions(key, signal));
  }

  getRelease(name: string, version: string, signal?: AbortSignal): Promise<PackageRelease> {
    const normalized = normalizePackageName(name);
    return this.memo(this.releases, `${normalized}@${version}`, () =>
      this.index.getRelease(normalized, version, signal)
    );
  }

  /**
   * 캐시 통계 조회
   */
  stats(): IndexCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      entries: this.versions.size + this.releases.size,
    };
  }

  /**
   * 캐시 초기화
   */
  clear(): void {
    this.versions.clear();
    this.releases.clear();
    this.hits = 0;
    this.misses = 0;
  }

  private memo<T>(cache: Map<string, Promise<T>>, key: string, load: () => Promise<T>): Promise<T> {
    const existing = cache.get(key);
    if (existing) {
      this.hits++;
      return existing;
    }

    this.misses++;
    const pending = load().catch((error: unknown) => {
      cache.delete(key);
      logger.debug('인덱스 조회 실패, 캐시에서 제거', { key });
      throw error;
    });
    cache.set(key, pending);
    return pending;
  }
}
