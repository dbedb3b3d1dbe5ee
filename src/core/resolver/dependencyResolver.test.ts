import { describe, it, expect } from 'vitest';
import { DependencyResolver, findCommonAncestor } from './dependencyResolver';
import { createTargetEnvironment } from '../buildMatrix';
import { getBlenderRelease } from '../blender/releases';
import { parseRequirement } from '../shared/pip-requirement';
import {
  BacktrackLimitError,
  NoMatchingVersionError,
  ReferenceConflictError,
  ResolutionConflictError,
} from '../errors';
import { FakePackageIndex, type FakePackages } from '../../test-utils/fakeIndex';
import type { BlenderPlatform, DependencySpec } from '../../types';

function specs(...requirements: string[]): DependencySpec[] {
  return requirements.map(parseRequirement);
}

function createResolver(packages: FakePackages, options: { platform?: BlenderPlatform; blender?: string; maxBacktracks?: number } = {}) {
  const release = getBlenderRelease(options.blender ?? '4.2.0');
  const target = createTargetEnvironment(release, options.platform ?? 'linux-x64');
  const index = new FakePackageIndex(packages);
  const resolver = new DependencyResolver(index, release, target, {
    maxBacktracks: options.maxBacktracks ?? 100,
    allowPrereleases: false,
  });
  return { resolver, index };
}

function versions(result: { name: string; version: string }[]): string[] {
  return result.map((d) => `${d.name}==${d.version}`);
}

describe('DependencyResolver', () => {
  describe('레퍼런스 고정 패키지', () => {
    it('scipy는 번들된 numpy를 허용하는 가장 최신 버전으로 결정', async () => {
      const { resolver, index } = createResolver({
        scipy: {
          '1.16.0': { requiresDist: ['numpy<2.6,>=1.25.2'] },
          '1.15.2': { requiresDist: ['numpy<2.5,>=1.23.5'] },
          '1.15.1': { requiresDist: ['numpy<2.5,>=1.23.5'] },
        },
      });

      const result = await resolver.resolve(specs('scipy>=1.15.1'));

      expect(versions(result)).toEqual(['scipy==1.15.2']);
      expect(index.listCalls).not.toContain('numpy');
    });

    it('루트 요구사항이 고정 버전과 충돌하면 ReferenceConflictError', async () => {
      const { resolver } = createResolver({});

      const error = await resolver.resolve(specs('numpy>=2.0')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ReferenceConflictError);
      expect(error).toMatchObject({
        packageName: 'numpy',
        pinnedVersion: '1.24.3',
        constraint: '>=2.0',
        blenderVersion: '4.2.0',
        remedy: "relax 'numpy>=2.0' to admit numpy==1.24.3",
      });
    });

    it('더 새로운 Blender가 제약을 만족하면 최소 버전 상향 제안', async () => {
      const { resolver } = createResolver({});

      await expect(resolver.resolve(specs('numpy>=1.26'))).rejects.toMatchObject({
        remedy: "raise blender_version_min to 4.4.0, or relax 'numpy>=1.26' to admit numpy==1.24.3",
      });
    });

    it('고정 버전을 만족하는 루트 요구사항은 결과에서 제외', async () => {
      const { resolver } = createResolver({});
      await expect(resolver.resolve(specs('numpy>=1.20', 'requests'))).resolves.toEqual([]);
    });

    it('전이 의존성이 고정 버전과 충돌하면 다른 후보 선택', async () => {
      const { resolver } = createResolver({
        pandas: {
          '2.2.0': { requiresDist: ['numpy>=1.26.0'] },
          '2.1.0': { requiresDist: ['numpy>=1.23.2'] },
        },
      });

      const result = await resolver.resolve(specs('pandas'));

      expect(versions(result)).toEqual(['pandas==2.1.0']);
      expect(resolver.getBacktrackCount()).toBe(1);
    });

    it('모든 후보가 고정 버전과 충돌하면 Blender를 요구자로 포함한 충돌', async () => {
      const { resolver } = createResolver({
        pandas: { '2.2.0': { requiresDist: ['numpy>=1.26.0'] } },
      });

      const error = await resolver.resolve(specs('pandas')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ResolutionConflictError);
      expect(error).toMatchObject({
        packageName: 'numpy',
        commonAncestor: '<project>',
        candidates: ['1.24.3'],
        requirers: [
          { requirer: 'pandas', constraint: '>=1.26.0', path: ['<project>', 'pandas'] },
          { requirer: 'Blender 4.2.0', constraint: '==1.24.3', path: ['Blender 4.2.0'] },
        ],
      });
    });
  });

  describe('백트래킹', () => {
    it('충돌하는 후보를 버리고 이전 버전으로 해결', async () => {
      const { resolver } = createResolver({
        alpha: {
          '2.0': { requiresDist: ['beta==1.0'] },
          '1.0': {},
        },
        beta: { '1.0': {}, '2.0': {} },
      });

      const result = await resolver.resolve(specs('alpha', 'beta>=2'));

      expect(versions(result)).toEqual(['alpha==1.0', 'beta==2.0']);
      expect(result[0].requiredBy).toEqual(['<project>']);
    });

    it('두 요구자가 양립할 수 없으면 최소 충돌 집합 보고', async () => {
      const { resolver } = createResolver({
        alpha: { '1.0': { requiresDist: ['gamma>=2'] } },
        beta: { '1.0': { requiresDist: ['gamma<2'] } },
        gamma: { '1.0': {}, '2.0': {} },
      });

      const error = await resolver.resolve(specs('alpha', 'beta')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ResolutionConflictError);
      expect(error).toMatchObject({
        packageName: 'gamma',
        commonAncestor: '<project>',
        candidates: ['2.0', '1.0'],
        requirers: [
          { requirer: 'alpha', constraint: '>=2', path: ['<project>', 'alpha'] },
          { requirer: 'beta', constraint: '<2', path: ['<project>', 'beta'] },
        ],
      });
    });

    it('단일 요구자를 만족하는 버전이 없으면 NoMatchingVersionError', async () => {
      const { resolver } = createResolver({ alpha: { '1.0': {} } });

      const error = await resolver.resolve(specs('alpha>=5')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NoMatchingVersionError);
      expect(error).toMatchObject({
        packageName: 'alpha',
        availableVersions: ['1.0'],
        source: { requirer: '<project>', constraint: '>=5' },
      });
    });

    it('백트래킹 한도를 넘으면 BacktrackLimitError', async () => {
      const { resolver } = createResolver(
        {
          alpha: { '2.0': { requiresDist: ['beta==1.0'] }, '1.0': {} },
          beta: { '1.0': {}, '2.0': {} },
        },
        { maxBacktracks: 0 }
      );

      await expect(resolver.resolve(specs('alpha', 'beta>=2'))).rejects.toBeInstanceOf(BacktrackLimitError);
    });
  });

  describe('마커와 extra', () => {
    it('타겟에 맞지 않는 루트 요구사항 제거', async () => {
      const { resolver, index } = createResolver({ tqdm: { '4.66.0': {} } });

      const result = await resolver.resolve(
        specs('pywin32; sys_platform == "win32"', 'tomli; python_version < "3.11"', 'tqdm')
      );

      expect(versions(result)).toEqual(['tqdm==4.66.0']);
      expect(index.listCalls).toEqual(['tqdm']);
    });

    it('Blender 시리즈 전용 요구사항은 해당 시리즈에서만 적용', async () => {
      const { resolver } = createResolver({ tqdm: { '4.66.0': {} }, rich: { '13.0.0': {} } });
      const onlyFor43: DependencySpec = { ...parseRequirement('rich'), blenderSeries: '4.3' };
      const onlyFor42: DependencySpec = { ...parseRequirement('tqdm'), blenderSeries: '4.2' };

      const result = await resolver.resolve([onlyFor43, onlyFor42]);

      expect(versions(result)).toEqual(['tqdm==4.66.0']);
    });

    it('Blender extra 마커는 해당 시리즈에서 참', async () => {
      const { resolver } = createResolver({ tqdm: { '4.66.0': {} } });
      const result = await resolver.resolve(specs('tqdm; extra == "blender4_2"'));
      expect(versions(result)).toEqual(['tqdm==4.66.0']);
    });

    it('요청한 extra의 의존성 확장', async () => {
      const { resolver } = createResolver({
        httpx: { '0.27.0': { requiresDist: ['socksio==1.*; extra == "socks"', 'h2<5,>=3; extra == "http2"'] } },
        socksio: { '1.0.0': {} },
      });

      const result = await resolver.resolve(specs('httpx[socks]'));

      expect(versions(result)).toEqual(['httpx==0.27.0', 'socksio==1.0.0']);
    });

    it('이미 결정된 패키지에 나중에 추가된 extra도 확장', async () => {
      const { resolver } = createResolver({
        httpx: { '0.27.0': { requiresDist: ['socksio==1.*; extra == "socks"'] } },
        client: { '1.0': { requiresDist: ['httpx[socks]'] } },
        socksio: { '1.0.0': {} },
      });

      const result = await resolver.resolve(specs('httpx', 'client'));

      expect(versions(result)).toEqual(['httpx==0.27.0', 'client==1.0', 'socksio==1.0.0']);
      expect(result[0].requiredBy).toEqual(['<project>', 'client']);
    });
  });

  describe('후보 필터링', () => {
    it('requires_python을 만족하지 않는 버전은 건너뜀', async () => {
      const { resolver } = createResolver({
        rich: { '14.0.0': { requiresPython: '>=3.12' }, '13.0.0': { requiresPython: '>=3.8' } },
      });
      const result = await resolver.resolve(specs('rich'));
      expect(versions(result)).toEqual(['rich==13.0.0']);
    });

    it('사용 가능한 버전이 없으면 이유와 함께 NoMatchingVersionError', async () => {
      const { resolver } = createResolver({
        rich: { '14.0.0': { requiresPython: '>=3.12' }, '13.0.0': { wheels: [] } },
      });

      const error = await resolver.resolve(specs('rich')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NoMatchingVersionError);
      expect(error).toMatchObject({ availableVersions: ['14.0.0', '13.0.0'] });
      expect(error instanceof Error ? error.message : '').toContain('(no wheels usable with Python 3.11.7)');
    });

    it('프리릴리스는 명시한 경우에만 선택', async () => {
      const packages = { rich: { '13.0.0': {}, '14.0.0b1': {} } };
      const stable = await createResolver(packages).resolver.resolve(specs('rich'));
      const pre = await createResolver(packages).resolver.resolve(specs('rich>=14.0.0b1'));

      expect(versions(stable)).toEqual(['rich==13.0.0']);
      expect(versions(pre)).toEqual(['rich==14.0.0b1']);
    });
  });

  describe('findCommonAncestor', () => {
    it('가장 긴 공통 경로의 마지막 요소', () => {
      expect(
        findCommonAncestor([
          ['<project>', 'app', 'alpha'],
          ['<project>', 'app', 'beta'],
        ])
      ).toBe('app');
      expect(findCommonAncestor([['<project>', 'alpha'], ['Blender 4.2.0']])).toBe('<project>');
    });
  });
});
