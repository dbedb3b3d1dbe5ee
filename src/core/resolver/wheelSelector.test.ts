import { describe, it, expect } from 'vitest';
import { selectWheel, selectWheels } from './wheelSelector';
import { createTargetEnvironment } from '../buildMatrix';
import { getBlenderRelease } from '../blender/releases';
import { NoCompatibleWheelError } from '../errors';
import { createWheelDescriptor } from '../shared/pip-wheel';
import { FakePackageIndex, fakeWheel } from '../../test-utils/fakeIndex';
import type { BlenderPlatform, OsVersion, PackageRelease, WheelDescriptor } from '../../types';

const release42 = getBlenderRelease('4.2.0');

function target(platform: BlenderPlatform, minimums: { glibc?: OsVersion; macos?: OsVersion } = {}) {
  return createTargetEnvironment(release42, platform, {
    minGlibcVersion: minimums.glibc ?? null,
    minMacosVersion: minimums.macos ?? null,
  });
}

function packageRelease(...wheels: WheelDescriptor[]): PackageRelease {
  return { name: 'demo', version: '1.0', requiresDist: [], requiresPython: null, wheels };
}

function wheels(...filenames: string[]): WheelDescriptor[] {
  return filenames.map((f) => fakeWheel(f));
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

const GLIBC_2_17 = { major: 2, minor: 17 };

describe('selectWheel', () => {
  it('glibc 2.17 타겟은 manylinux_2_17 휠 선택', () => {
    const release = packageRelease(
      ...wheels(
        'demo-1.0-cp311-cp311-manylinux_2_28_x86_64.whl',
        'demo-1.0-cp311-cp311-manylinux_2_17_x86_64.manylinux2014_x86_64.whl'
      )
    );

    const selected = selectWheel(release, target('linux-x64', { glibc: GLIBC_2_17 }));

    expect(selected.filename).toBe('demo-1.0-cp311-cp311-manylinux_2_17_x86_64.manylinux2014_x86_64.whl');
  });

  it('기본 glibc 2.28 타겟은 더 최신 최소 버전 휠 선택', () => {
    const release = packageRelease(
      ...wheels(
        'demo-1.0-cp311-cp311-manylinux_2_17_x86_64.whl',
        'demo-1.0-cp311-cp311-manylinux_2_28_x86_64.whl'
      )
    );

    expect(selectWheel(release, target('linux-x64')).filename).toBe('demo-1.0-cp311-cp311-manylinux_2_28_x86_64.whl');
  });

  it('OS 최소 버전 때문에만 거부되면 상향 제안', () => {
    const release = packageRelease(...wheels('demo-1.0-cp311-cp311-manylinux_2_28_x86_64.whl'));

    const error = catchError(() => selectWheel(release, target('linux-x64', { glibc: GLIBC_2_17 })));

    expect(error).toBeInstanceOf(NoCompatibleWheelError);
    expect(error).toMatchObject({
      packageName: 'demo',
      version: '1.0',
      targetKey: '4.2.0/linux-x64/cp311',
      remedy: 'raise your minimum glibc version to 2.28',
      rejected: [
        {
          filename: 'demo-1.0-cp311-cp311-manylinux_2_28_x86_64.whl',
          reason: 'os-version',
          requiredOsVersion: { major: 2, minor: 28 },
        },
      ],
    });
  });

  it('macOS 최소 버전 제안', () => {
    const release = packageRelease(...wheels('demo-1.0-cp311-cp311-macosx_14_0_arm64.whl'));
    expect(catchError(() => selectWheel(release, target('macos-arm64')))).toMatchObject({
      remedy: 'raise your minimum macOS version to 14.0',
    });
  });

  it('인터프리터나 플랫폼이 맞지 않으면 제안 없이 실패', () => {
    const release = packageRelease(
      ...wheels('demo-1.0-cp312-cp312-win_amd64.whl', 'demo-1.0-cp311-cp311-macosx_11_0_x86_64.whl')
    );

    const error = catchError(() => selectWheel(release, target('windows-x64')));

    expect(error).toBeInstanceOf(NoCompatibleWheelError);
    expect(error).toMatchObject({
      remedy: undefined,
      rejected: [
        { filename: 'demo-1.0-cp312-cp312-win_amd64.whl', reason: 'interpreter' },
        { filename: 'demo-1.0-cp311-cp311-macosx_11_0_x86_64.whl', reason: 'platform' },
      ],
    });
  });

  it('네이티브 태그 > win32 > any 순으로 선호', () => {
    const all = wheels(
      'demo-1.0-py3-none-any.whl',
      'demo-1.0-cp311-cp311-win32.whl',
      'demo-1.0-cp311-cp311-win_amd64.whl'
    );

    expect(selectWheel(packageRelease(...all), target('windows-x64')).filename).toBe(
      'demo-1.0-cp311-cp311-win_amd64.whl'
    );
    expect(selectWheel(packageRelease(all[0], all[1]), target('windows-x64')).filename).toBe(
      'demo-1.0-cp311-cp311-win32.whl'
    );
    expect(selectWheel(packageRelease(all[0], all[1]), target('windows-arm64')).filename).toBe(
      'demo-1.0-py3-none-any.whl'
    );
  });

  it('universal2와 abi3 휠 허용', () => {
    const release = packageRelease(...wheels('demo-1.0-cp39-abi3-macosx_10_9_universal2.whl'));
    expect(selectWheel(release, target('macos-arm64')).filename).toBe('demo-1.0-cp39-abi3-macosx_10_9_universal2.whl');
    expect(selectWheel(release, target('macos-x64')).filename).toBe('demo-1.0-cp39-abi3-macosx_10_9_universal2.whl');
  });

  it('동순위면 크기, 해시, 파일명 순', () => {
    const big = fakeWheel('demo-1.0-1-cp311-cp311-win_amd64.whl', 2000);
    const small = fakeWheel('demo-1.0-2-cp311-cp311-win_amd64.whl', 1000);
    expect(selectWheel(packageRelease(big, small), target('windows-x64'))).toBe(small);

    const hashB = createWheelDescriptor({
      filename: 'demo-1.0-3-cp311-cp311-win_amd64.whl',
      url: 'https://files.test/b.whl',
      size: 1000,
      sha256: 'b'.repeat(64),
    });
    const hashA = createWheelDescriptor({
      filename: 'demo-1.0-4-cp311-cp311-win_amd64.whl',
      url: 'https://files.test/a.whl',
      size: 1000,
      sha256: 'a'.repeat(64),
    });
    expect(selectWheel(packageRelease(hashB, hashA), target('windows-x64'))).toBe(hashA);

    const sameHash = { ...hashA, filename: 'demo-1.0-0-cp311-cp311-win_amd64.whl' };
    expect(selectWheel(packageRelease(hashA, sameHash), target('windows-x64'))).toBe(sameHash);
  });

  it('입력 순서와 무관하게 같은 휠 선택', () => {
    const all = wheels(
      'demo-1.0-cp311-cp311-manylinux_2_17_x86_64.whl',
      'demo-1.0-cp311-abi3-manylinux_2_28_x86_64.whl',
      'demo-1.0-py3-none-any.whl',
      'demo-1.0-cp311-cp311-musllinux_1_2_x86_64.whl'
    );
    const expected = selectWheel(packageRelease(...all), target('linux-x64')).filename;

    expect(expected).toBe('demo-1.0-cp311-abi3-manylinux_2_28_x86_64.whl');
    expect(selectWheel(packageRelease(...[...all].reverse()), target('linux-x64')).filename).toBe(expected);
    expect(selectWheel(packageRelease(all[2], all[0], all[3], all[1]), target('linux-x64')).filename).toBe(expected);
  });
});

describe('selectWheels', () => {
  it('타겟 내 모든 실패를 수집', async () => {
    const index = new FakePackageIndex({
      alpha: { '1.0': { wheels: ['alpha-1.0-cp311-cp311-win_amd64.whl'] } },
      beta: { '2.0': { wheels: ['beta-2.0-cp311-cp311-win_amd64.whl'] } },
      gamma: { '3.0': {} },
    });
    const resolved = [
      { name: 'alpha', version: '1.0', requiredBy: ['<project>'], wheels: [] },
      { name: 'beta', version: '2.0', requiredBy: ['<project>'], wheels: [] },
      { name: 'gamma', version: '3.0', requiredBy: ['<project>'], wheels: [] },
    ];

    const result = await selectWheels(resolved, target('linux-x64'), index);

    expect(result.errors.map((e) => e.packageName)).toEqual(['alpha', 'beta']);
    expect(result.resolved).toHaveLength(1);
    expect(result.resolved[0].wheels).toEqual([
      {
        platform: 'linux-x64',
        platformTag: { os: 'linux', arch: 'x64', minOsVersion: { major: 2, minor: 28 } },
        wheel: fakeWheel('gamma-3.0-py3-none-any.whl'),
      },
    ]);
  });
});
