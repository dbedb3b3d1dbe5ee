import { describe, it, expect, vi } from 'vitest';
import { IndexQueryCache } from './pip-cache';
import type { PackageIndex } from './pip-index';
import type { PackageRelease } from '../../types';

function release(name: string, version: string): PackageRelease {
  return { name, version, requiresDist: [], requiresPython: null, wheels: [] };
}

function createIndex() {
  const listVersions = vi.fn<PackageIndex['listVersions']>(async () => ['1.0', '2.0']);
  const getRelease = vi.fn<PackageIndex['getRelease']>(async (name, version) => release(name, version));
  return { listVersions, getRelease };
}

describe('IndexQueryCache', () => {
  it('같은 패키지 조회는 한 번만 요청', async () => {
    const index = createIndex();
    const cache = new IndexQueryCache(index);

    await cache.listVersions('Requests');
    await cache.listVersions('requests');

    expect(index.listVersions).toHaveBeenCalledTimes(1);
    expect(index.listVersions).toHaveBeenCalledWith('requests', undefined);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, entries: 1 });
  });

  it('동시 요청은 진행 중인 요청을 공유', async () => {
    const index = createIndex();
    const cache = new IndexQueryCache(index);

    const [a, b] = await Promise.all([cache.getRelease('numpy', '1.24.3'), cache.getRelease('numpy', '1.24.3')]);

    expect(a).toBe(b);
    expect(index.getRelease).toHaveBeenCalledTimes(1);
  });

  it('버전마다 별도 키', async () => {
    const index = createIndex();
    const cache = new IndexQueryCache(index);

    await cache.getRelease('numpy', '1.24.3');
    await cache.getRelease('numpy', '1.26.4');

    expect(index.getRelease).toHaveBeenCalledTimes(2);
    expect(cache.stats().entries).toBe(2);
  });

  it('실패한 조회는 캐시하지 않음', async () => {
    const index = createIndex();
    index.listVersions.mockRejectedValueOnce(new Error('timeout'));
    const cache = new IndexQueryCache(index);

    await expect(cache.listVersions('scipy')).rejects.toThrow('timeout');
    await expect(cache.listVersions('scipy')).resolves.toEqual(['1.0', '2.0']);
    expect(index.listVersions).toHaveBeenCalledTimes(2);
  });

  it('clear 후 통계 초기화', async () => {
    const cache = new IndexQueryCache(createIndex());
    await cache.listVersions('a');
    cache.clear();
    expect(cache.stats()).toEqual({ hits: 0, misses: 0, entries: 0 });
  });
});
