/**
 * PEP 425 / PEP 600 호환성 태그
 *
 * 참고:
 * - https://peps.python.org/pep-0425/
 * - https://peps.python.org/pep-0600/
 */

import type { CpuArch, InterpreterTag, OsVersion, PlatformTag, WheelPlatformTag } from '../../types';
import { UnrecognizedTagError } from '../errors';

/**
 * 타겟 Python 환경 설정
 */
export interface TargetPythonConfig {
  /** Python 버전 (예: "3.11", "3.11.7") */
  version: string;
  /** Python 구현체 (예: "cp" for CPython) */
  implementation?: string;
}

/**
 * Python 버전을 nodot 형식으로 변환 (3.11 -> 311)
 */
export function versionToNodot(version: string): string {
  return version.split('.').slice(0, 2).join('');
}

function parseMajorMinor(version: string): [number, number] {
  const [major, minor] = version.split('.').map(Number);
  if (!Number.isInteger(major) || !Number.isInteger(minor)) {
    throw new UnrecognizedTagError(version, 'python version must be <major>.<minor>');
  }
  return [major, minor];
}

/**
 * CPython 태그 생성 (구현체 + ABI)
 */
export function generateCPythonTags(config: TargetPythonConfig): InterpreterTag[] {
  const impl = config.implementation || 'cp';
  const nodot = versionToNodot(config.version);
  const [major, minor] = parseMajorMinor(config.version);

  const tags: InterpreterTag[] = [
    { python: `${impl}${nodot}`, abi: `${impl}${nodot}` },
    { python: `${impl}${nodot}`, abi: 'abi3' },
    { python: `${impl}${nodot}`, abi: 'none' },
  ];

  // abi3 태그 (stable ABI) - 이전 버전들도 포함
  if (major >= 3) {
    for (let m = minor - 1; m >= 2; m--) {
      tags.push({ python: `${impl}${major}${m}`, abi: 'abi3' });
    }
  }

  return tags;
}

/**
 * 범용 Python 태그 생성 (순수 Python 패키지용)
 */
export function generateCompatibleTags(config: TargetPythonConfig): InterpreterTag[] {
  const [major, minor] = parseMajorMinor(config.version);
  const tags: InterpreterTag[] = [];

  for (let m = minor; m >= 0; m--) {
    tags.push({ python: `py${major}${m}`, abi: 'none' });
  }
  tags.push({ python: `py${major}`, abi: 'none' });

  return tags;
}

/**
 * 지원되는 인터프리터 태그 목록 (우선순위 순)
 */
export function supportedInterpreterTags(config: TargetPythonConfig): InterpreterTag[] {
  const impl = config.implementation || 'cp';
  const tags = impl === 'cp' ? generateCPythonTags(config) : [];
  tags.push(...generateCompatibleTags(config));

  const seen = new Set<string>();
  return tags.filter((tag) => {
    const key = interpreterTagToString(tag);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function interpreterTagToString(tag: InterpreterTag): string {
  return `${tag.python}-${tag.abi}`;
}

// ============================================
// 플랫폼 태그
// ============================================

/** PEP 600 이전 manylinux 태그 → glibc 버전 */
const LEGACY_MANYLINUX: Record<string, OsVersion> = {
  manylinux1: { major: 2, minor: 5 },
  manylinux2010: { major: 2, minor: 12 },
  manylinux2014: { major: 2, minor: 17 },
};

/** 휠 아키텍처 → Blender 타겟 아키텍처 */
const LINUX_ARCHES: Record<string, readonly CpuArch[]> = {
  x86_64: ['x64'],
  aarch64: ['arm64'],
  armv7l: ['arm64'],
  arm64: ['arm64'],
};

const MACOS_ARCHES: Record<string, readonly CpuArch[]> = {
  x86_64: ['x64'],
  intel: ['x64'],
  fat3: ['x64'],
  fat64: ['x64'],
  universal: ['x64'],
  arm64: ['arm64'],
  universal2: ['x64', 'arm64'],
};

// win32 휠은 x64 Windows에서 동작하므로 x64로 취급
const WINDOWS_TAGS: Record<string, readonly CpuArch[]> = {
  win_amd64: ['x64'],
  win32: ['x64'],
  win_arm64: ['arm64'],
  win_arm32: [],
  win_ia64: [],
};

const ALL_ARCHES: readonly CpuArch[] = ['x64', 'arm64'];

function lookupArches(table: Record<string, readonly CpuArch[]>, arch: string): readonly CpuArch[] {
  return Object.prototype.hasOwnProperty.call(table, arch) ? table[arch] : [];
}

/**
 * 레거시 manylinux 태그를 PEP 600 형식으로 변환 (멱등)
 * manylinux2014_x86_64 -> manylinux_2_17_x86_64
 */
export function legacyManylinuxToPep600(tag: string): string {
  const match = /^(manylinux1|manylinux2010|manylinux2014)_(.+)$/.exec(tag);
  if (!match) return tag;
  const glibc = LEGACY_MANYLINUX[match[1]];
  return `manylinux_${glibc.major}_${glibc.minor}_${match[2]}`;
}

/**
 * 휠 플랫폼 태그 정규화
 * @throws UnrecognizedTagError 알 수 없는 형식
 */
export function normalizePlatformTag(raw: string): WheelPlatformTag {
  const tag = legacyManylinuxToPep600(raw.trim().toLowerCase().replace(/[-.]/g, '_'));

  if (tag === 'any') {
    return { tag, os: 'any', arches: ALL_ARCHES, minOsVersion: null };
  }

  let match = /^manylinux_(\d+)_(\d+)_(\w+)$/.exec(tag);
  if (match) {
    return {
      tag,
      os: 'linux',
      arches: lookupArches(LINUX_ARCHES, match[3]),
      minOsVersion: { major: Number(match[1]), minor: Number(match[2]) },
    };
  }

  // musl 및 비표준 linux 휠은 Blender에서 사용할 수 없음
  match = /^(?:musllinux_\d+_\d+|linux)_(\w+)$/.exec(tag);
  if (match) {
    return { tag, os: 'linux', arches: [], minOsVersion: null };
  }

  match = /^macosx_(\d+)_(\d+)_(\w+)$/.exec(tag);
  if (match) {
    return {
      tag,
      os: 'macos',
      arches: lookupArches(MACOS_ARCHES, match[3]),
      minOsVersion: { major: Number(match[1]), minor: Number(match[2]) },
    };
  }

  if (Object.prototype.hasOwnProperty.call(WINDOWS_TAGS, tag)) {
    return { tag, os: 'windows', arches: WINDOWS_TAGS[tag], minOsVersion: null };
  }

  throw new UnrecognizedTagError(raw, 'unknown platform tag format');
}

/**
 * OS 버전 비교
 */
export function compareOsVersions(a: OsVersion, b: OsVersion): number {
  return a.major !== b.major ? a.major - b.major : a.minor - b.minor;
}

export function formatOsVersion(version: OsVersion): string {
  return `${version.major}.${version.minor}`;
}

/**
 * "2.28" 또는 [2, 28] 형식 파싱
 */
export function parseOsVersion(value: string | readonly number[]): OsVersion | null {
  const parts = typeof value === 'string' ? value.split('.').map(Number) : [...value];
  if (parts.length < 1 || parts.length > 3 || parts.some((n) => !Number.isInteger(n) || n < 0)) {
    return null;
  }
  return { major: parts[0], minor: parts[1] ?? 0 };
}

/**
 * 휠 플랫폼 태그가 타겟과 호환되는지 확인
 * 타겟 최소 버전을 올려도 호환 휠이 비호환이 되지 않음 (단조성)
 */
export function isCompatible(wheelTag: WheelPlatformTag, target: PlatformTag): boolean {
  if (wheelTag.os === 'any') return true;
  if (wheelTag.os !== target.os) return false;
  if (!wheelTag.arches.includes(target.arch)) return false;
  if (wheelTag.minOsVersion && target.minOsVersion) {
    return compareOsVersions(target.minOsVersion, wheelTag.minOsVersion) >= 0;
  }
  return true;
}

/**
 * OS 최소 버전을 무시하면 호환되는지 확인
 */
export function isCompatibleIgnoringOsVersion(wheelTag: WheelPlatformTag, target: PlatformTag): boolean {
  return isCompatible(wheelTag, { ...target, minOsVersion: null });
}

/**
 * 태그 구체성 (높을수록 선호)
 * 네이티브 태그 > win32 대체 태그 > any
 */
export function tagSpecificity(wheelTag: WheelPlatformTag, target: PlatformTag): number {
  if (wheelTag.os === 'any') return 0;
  if (wheelTag.tag === 'win32' && target.os === 'windows' && target.arch === 'x64') return 1;
  return 2;
}
