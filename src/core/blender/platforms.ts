/**
 * Blender 확장 플랫폼 정보
 */

import type { BlenderPlatform, CpuArch, MarkerEnvironment, OsKind, OsVersion, PlatformTag } from '../../types';

export interface BlenderPlatformInfo {
  platform: BlenderPlatform;
  os: OsKind;
  arch: CpuArch;
  /** 휠 플랫폼 태그 접두사 */
  wheelTagPrefix: 'manylinux_' | 'macosx_' | 'win';
  /** 공식 배포 아카이브 확장자 */
  archiveExtension: 'tar.xz' | 'dmg' | 'zip';
  osName: 'posix' | 'nt';
  platformSystem: 'Linux' | 'Darwin' | 'Windows';
  sysPlatform: 'linux' | 'darwin' | 'win32';
  /** 이 플랫폼에서 platform_machine이 가질 수 있는 값 */
  platformMachines: readonly string[];
}

const PLATFORMS: Record<BlenderPlatform, BlenderPlatformInfo> = {
  'linux-x64': {
    platform: 'linux-x64',
    os: 'linux',
    arch: 'x64',
    wheelTagPrefix: 'manylinux_',
    archiveExtension: 'tar.xz',
    osName: 'posix',
    platformSystem: 'Linux',
    sysPlatform: 'linux',
    platformMachines: ['x86_64'],
  },
  'linux-arm64': {
    platform: 'linux-arm64',
    os: 'linux',
    arch: 'arm64',
    wheelTagPrefix: 'manylinux_',
    archiveExtension: 'tar.xz',
    osName: 'posix',
    platformSystem: 'Linux',
    sysPlatform: 'linux',
    platformMachines: ['aarch64', 'armv7l', 'arm64'],
  },
  'macos-x64': {
    platform: 'macos-x64',
    os: 'macos',
    arch: 'x64',
    wheelTagPrefix: 'macosx_',
    archiveExtension: 'dmg',
    osName: 'posix',
    platformSystem: 'Darwin',
    sysPlatform: 'darwin',
    platformMachines: ['x86_64', 'i386'],
  },
  'macos-arm64': {
    platform: 'macos-arm64',
    os: 'macos',
    arch: 'arm64',
    wheelTagPrefix: 'macosx_',
    archiveExtension: 'dmg',
    osName: 'posix',
    platformSystem: 'Darwin',
    sysPlatform: 'darwin',
    platformMachines: ['arm64'],
  },
  'windows-x64': {
    platform: 'windows-x64',
    os: 'windows',
    arch: 'x64',
    wheelTagPrefix: 'win',
    archiveExtension: 'zip',
    osName: 'nt',
    platformSystem: 'Windows',
    sysPlatform: 'win32',
    platformMachines: ['amd64'],
  },
  'windows-arm64': {
    platform: 'windows-arm64',
    os: 'windows',
    arch: 'arm64',
    wheelTagPrefix: 'win',
    archiveExtension: 'zip',
    osName: 'nt',
    platformSystem: 'Windows',
    sysPlatform: 'win32',
    platformMachines: ['arm64'],
  },
};

export const BLENDER_PLATFORMS: readonly BlenderPlatform[] = [
  'linux-x64',
  'linux-arm64',
  'macos-x64',
  'macos-arm64',
  'windows-x64',
  'windows-arm64',
];

export function isBlenderPlatform(value: string): value is BlenderPlatform {
  return BLENDER_PLATFORMS.some((p) => p === value);
}

/**
 * 플랫폼 정보 조회
 */
export function blenderPlatformInfo(platform: BlenderPlatform): BlenderPlatformInfo {
  return PLATFORMS[platform];
}

/**
 * 플랫폼과 OS 최소 버전으로 PlatformTag 생성
 * Windows는 최소 버전을 갖지 않음
 */
export function toPlatformTag(
  platform: BlenderPlatform,
  minimums: { glibc: OsVersion | null; macos: OsVersion | null }
): PlatformTag {
  const info = PLATFORMS[platform];
  let minOsVersion: OsVersion | null = null;
  if (info.os === 'linux') minOsVersion = minimums.glibc;
  if (info.os === 'macos') minOsVersion = minimums.macos;
  return { os: info.os, arch: info.arch, minOsVersion };
}

/**
 * Blender 번들 Python 기준 마커 환경 생성
 */
export function markerEnvironmentFor(platform: BlenderPlatform, pythonVersion: string): MarkerEnvironment {
  const info = PLATFORMS[platform];
  return {
    python_version: pythonVersion.split('.').slice(0, 2).join('.'),
    python_full_version: pythonVersion,
    os_name: info.osName,
    sys_platform: info.sysPlatform,
    platform_release: '',
    platform_system: info.platformSystem,
    platform_version: '',
    platform_machine: info.platformMachines,
    platform_python_implementation: 'CPython',
    implementation_name: 'cpython',
    implementation_version: pythonVersion,
  };
}
