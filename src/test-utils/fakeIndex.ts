/**
 * 테스트용 메모리 패키지 인덱스
 */

import { createHash } from 'crypto';
import type { PackageRelease, WheelDescriptor } from '../types';
import { PackageNotFoundError } from '../core/errors';
import type { PackageIndex } from '../core/shared/pip-index';
import { createWheelDescriptor, normalizePackageName } from '../core/shared/pip-wheel';

export interface FakeWheelInput {
  filename: string;
  size?: number;
}

export interface FakeRelease {
  requiresDist?: string[];
  requiresPython?: string;
  /** 생략하면 py3-none-any 휠 하나 */
  wheels?: (string | FakeWheelInput)[];
}

/** 패키지 이름 -> 버전 -> 릴리스 */
export type FakePackages = Record<string, Record<string, FakeRelease>>;

/**
 * 파일명으로 결정적인 해시를 갖는 휠 생성
 */
export function fakeWheel(filename: string, size = 1000): WheelDescriptor {
  return createWheelDescriptor({
    filename,
    url: `https://files.test/${filename}`,
    size,
    sha256: createHash('sha256').update(filename).digest('hex'),
  });
}

export class FakePackageIndex implements PackageIndex {
  readonly listCalls: string[] = [];
  readonly releaseCalls: string[] = [];
  private readonly packages = new Map<string, Record<string, FakeRelease>>();

  constructor(packages: FakePackages) {
    for (const [name, versions] of Object.entries(packages)) {
      this.packages.set(normalizePackageName(name), versions);
    }
  }

  async listVersions(name: string): Promise<string[]> {
    this.listCalls.push(name);
    const versions = this.packages.get(normalizePackageName(name));
    if (!versions) throw new PackageNotFoundError(name);
    return Object.keys(versions);
  }

  async getRelease(name: string, version: string): Promise<PackageRelease> {
    this.releaseCalls.push(`${name}@${version}`);
    const normalized = normalizePackageName(name);
    const release = this.packages.get(normalized)?.[version];
    if (!release) throw new PackageNotFoundError(name, version);

    const wheels = (release.wheels ?? [`${normalized}-${version}-py3-none-any.whl`]).map((w) =>
      typeof w === 'string' ? fakeWheel(w) : fakeWheel(w.filename, w.size)
    );
    return {
      name: normalized,
      version,
      requiresDist: release.requiresDist ?? [],
      requiresPython: release.requiresPython ?? null,
      wheels,
    };
  }
}
