import { describe, it, expect } from 'vitest';
import { createTargetEnvironment, formatFailures, planTargets, resolveBuildMatrix } from './buildMatrix';
import { createBuildConfig, getDefaultConfig, type ProjectTargetSettings } from './config';
import { getBlenderRelease } from './blender/releases';
import { parseRequirement } from './shared/pip-requirement';
import { BuildCancelledError } from './errors';
import { FakePackageIndex } from '../test-utils/fakeIndex';
import type { BlenderPlatform } from '../types';

function buildConfig(project: Partial<ProjectTargetSettings> = {}, platforms?: BlenderPlatform[]) {
  return createBuildConfig(
    getDefaultConfig(),
    { blenderVersionMin: '4.2.0', blenderVersionMax: '4.2.2', ...project },
    { platforms, concurrency: 2 },
    '/cache'
  );
}

describe('buildMatrix', () => {
  describe('createTargetEnvironment', () => {
    it('릴리스 Python과 플랫폼 정보로 타겟 생성', () => {
      const target = createTargetEnvironment(getBlenderRelease('4.2.0'), 'macos-arm64');

      expect(target.key).toBe('4.2.0/macos-arm64/cp311');
      expect(target.series).toBe('4.2');
      expect(target.pythonVersion).toBe('3.11.7');
      expect(target.platformTag).toEqual({ os: 'macos', arch: 'arm64', minOsVersion: { major: 11, minor: 0 } });
      expect(target.interpreterTags[0]).toEqual({ python: 'cp311', abi: 'cp311' });
      expect(target.extras).toEqual(['blender4-2']);
      expect(target.markerEnvironment.python_version).toBe('3.11');
    });

    it('프로젝트 glibc 최소 버전이 릴리스 기본값을 대체', () => {
      const target = createTargetEnvironment(getBlenderRelease('4.2.0'), 'linux-x64', {
        minGlibcVersion: { major: 2, minor: 17 },
        minMacosVersion: null,
      });
      expect(target.platformTag.minOsVersion).toEqual({ major: 2, minor: 17 });
    });

    it('Windows는 최소 OS 버전 없음', () => {
      expect(createTargetEnvironment(getBlenderRelease('4.2.0'), 'windows-x64').platformTag.minOsVersion).toBeNull();
    });
  });

  describe('planTargets', () => {
    it('릴리스가 지원하지 않는 플랫폼은 제외', () => {
      const keys = planTargets(buildConfig({}, ['linux-x64', 'windows-arm64'])).map((t) => t.key);
      expect(keys).toEqual(['4.2.0/linux-x64/cp311', '4.2.1/linux-x64/cp311', '4.2.1/windows-arm64/cp311']);
    });
  });

  describe('resolveBuildMatrix', () => {
    it('모든 타겟을 해결하고 인덱스 조회 공유', async () => {
      const index = new FakePackageIndex({
        tqdm: { '4.66.0': {} },
      });
      const completed: string[] = [];

      const result = await resolveBuildMatrix(
        buildConfig({}, ['linux-x64', 'windows-x64']),
        [parseRequirement('tqdm')],
        index,
        { onTargetComplete: (target, ok) => completed.push(`${target.key}:${ok}`) }
      );

      expect(result.failures).toEqual([]);
      expect(result.targets.map((t) => t.target.key)).toEqual([
        '4.2.0/linux-x64/cp311',
        '4.2.0/windows-x64/cp311',
        '4.2.1/linux-x64/cp311',
        '4.2.1/windows-x64/cp311',
      ]);
      expect(result.targets[0].dependencies[0].wheels[0].wheel.filename).toBe('tqdm-4.66.0-py3-none-any.whl');
      expect(completed).toHaveLength(4);
      expect(index.listCalls).toEqual(['tqdm']);
      expect(index.releaseCalls).toEqual(['tqdm@4.66.0']);
    });

    it('한 타겟의 실패는 다른 타겟에 영향 없음', async () => {
      const index = new FakePackageIndex({
        pywin: { '1.0': { wheels: ['pywin-1.0-cp311-cp311-win_amd64.whl'] } },
      });

      const result = await resolveBuildMatrix(
        buildConfig({ blenderVersionMax: '4.2.1' }, ['linux-x64', 'windows-x64']),
        [parseRequirement('pywin')],
        index
      );

      expect(result.targets.map((t) => t.target.key)).toEqual(['4.2.0/windows-x64/cp311']);
      expect(result.failures.map((f) => f.target.key)).toEqual(['4.2.0/linux-x64/cp311']);
      expect(formatFailures(result)).toBe(
        '  4.2.0/linux-x64/cp311:\n    No wheel of pywin==1.0 is compatible with 4.2.0/linux-x64/cp311 (1 rejected)'
      );
    });

    it('인덱스 에러도 타겟 실패로 수집', async () => {
      const result = await resolveBuildMatrix(
        buildConfig({ blenderVersionMax: '4.2.1' }, ['linux-x64']),
        [parseRequirement('missing-package')],
        new FakePackageIndex({})
      );

      expect(result.failures).toHaveLength(1);
      expect(result.failures[0].errors[0].message).toBe("Package 'missing_package' not found");
    });

    it('취소되면 BuildCancelledError', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        resolveBuildMatrix(buildConfig(), [parseRequirement('tqdm')], new FakePackageIndex({}), {
          signal: controller.signal,
        })
      ).rejects.toBeInstanceOf(BuildCancelledError);
    });
  });
});
