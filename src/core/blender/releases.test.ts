import { describe, it, expect } from 'vitest';
import {
  blenderDownloadUrl,
  findBlenderRelease,
  getBlenderRelease,
  listBlenderReleases,
  parseReleaseTable,
  referencePlatformSet,
  releasesInRange,
  suggestReferenceRemedy,
} from './releases';
import { blenderPlatformInfo, markerEnvironmentFor, toPlatformTag } from './platforms';
import { ConfigError } from '../errors';

describe('releases', () => {
  it('릴리스 목록은 버전 오름차순', () => {
    const versions = listBlenderReleases().map((r) => r.version);
    expect(versions[0]).toBe('4.2.0');
    expect(versions[versions.length - 1]).toBe('4.4.0');
    expect(versions).toHaveLength(13);
  });

  it('시리즈별 Python 버전과 OS 최소 버전', () => {
    const r42 = getBlenderRelease('4.2.3');
    expect(r42.pythonVersion).toBe('3.11.7');
    expect(r42.minGlibcVersion).toEqual({ major: 2, minor: 28 });
    expect(r42.minMacosVersion).toEqual({ major: 11, minor: 0 });
    expect(r42.markerExtra).toBe('blender4-2');

    const r44 = getBlenderRelease('4.4.0');
    expect(r44.pythonVersion).toBe('3.11.11');
    expect(r44.minMacosVersion).toEqual({ major: 12, minor: 0 });
  });

  it('4.2.0은 windows-arm64 미지원', () => {
    expect(getBlenderRelease('4.2.0').platforms).not.toContain('windows-arm64');
    expect(getBlenderRelease('4.2.1').platforms).toContain('windows-arm64');
  });

  it('번들 패키지 고정 버전', () => {
    expect(referencePlatformSet(getBlenderRelease('4.2.0')).get('numpy')?.version).toBe('1.24.3');
    expect(referencePlatformSet(getBlenderRelease('4.4.0')).get('numpy')?.version).toBe('1.26.4');
    expect(referencePlatformSet(getBlenderRelease('4.3.0')).has('toml')).toBe(false);
  });

  it('알 수 없는 버전', () => {
    expect(findBlenderRelease('3.6.0')).toBeUndefined();
    expect(() => getBlenderRelease('3.6.0')).toThrow(ConfigError);
  });

  it('범위 조회는 min 포함 max 미포함', () => {
    expect(releasesInRange('4.2.7', '4.3.1').map((r) => r.version)).toEqual(['4.2.7', '4.2.8', '4.3.0']);
    expect(releasesInRange('4.3.2').map((r) => r.version)).toEqual(['4.3.2', '4.4.0']);
  });

  describe('suggestReferenceRemedy', () => {
    it('제약을 만족하는 최신 릴리스로 최소 버전 상향 제안', () => {
      expect(suggestReferenceRemedy('numpy', '>=1.25', getBlenderRelease('4.2.0'))).toBe(
        "raise blender_version_min to 4.4.0, or relax 'numpy>=1.25' to admit numpy==1.24.3"
      );
    });

    it('이전 릴리스가 만족하면 최대 버전 하향 제안', () => {
      expect(suggestReferenceRemedy('numpy', '<1.25', getBlenderRelease('4.4.0'))).toBe(
        "lower blender_version_max to 4.4.0, or relax 'numpy<1.25' to admit numpy==1.26.4"
      );
    });
  });

  it('공식 다운로드 URL', () => {
    expect(blenderDownloadUrl(getBlenderRelease('4.2.1'), 'linux-x64')).toBe(
      'https://download.blender.org/release/Blender4.2/blender-4.2.1-linux-x64.tar.xz'
    );
  });

  it('잘못된 테이블은 ConfigError', () => {
    expect(() => parseReleaseTable({ series: {}, releases: [{ version: '9.9.0' }], extensionTags: [] })).toThrow(
      ConfigError
    );
    expect(() => parseReleaseTable(null)).toThrow(ConfigError);
  });
});

describe('platforms', () => {
  it('플랫폼 정보', () => {
    expect(blenderPlatformInfo('macos-arm64').wheelTagPrefix).toBe('macosx_');
    expect(blenderPlatformInfo('windows-x64').platformMachines).toEqual(['amd64']);
  });

  it('PlatformTag 생성 시 Windows는 최소 버전 없음', () => {
    const minimums = { glibc: { major: 2, minor: 28 }, macos: { major: 11, minor: 0 } };
    expect(toPlatformTag('linux-arm64', minimums)).toEqual({
      os: 'linux',
      arch: 'arm64',
      minOsVersion: { major: 2, minor: 28 },
    });
    expect(toPlatformTag('windows-arm64', minimums).minOsVersion).toBeNull();
  });

  it('마커 환경', () => {
    const env = markerEnvironmentFor('macos-x64', '3.11.9');
    expect(env.python_version).toBe('3.11');
    expect(env.sys_platform).toBe('darwin');
    expect(env.platform_machine).toEqual(['x86_64', 'i386']);
  });
});
