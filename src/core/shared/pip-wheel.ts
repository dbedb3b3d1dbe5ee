/**
 * Wheel 파일명 파싱
 *
 * 참고:
 * - https://peps.python.org/pep-0427/ (Wheel 형식)
 */

import type { BuildTag, InterpreterTag, WheelDescriptor, WheelPlatformTag } from '../../types';
import { UnrecognizedTagError } from '../errors';
import { interpreterTagToString, normalizePlatformTag } from './pip-tags';

/**
 * 파싱된 Wheel 파일명
 */
export interface WheelFilename {
  name: string;
  version: string;
  buildTag: BuildTag;
  pythonTags: string[];
  abiTags: string[];
  platformTags: WheelPlatformTag[];
}

/**
 * Wheel 파일명 파싱 정규식
 * 형식: {distribution}-{version}(-{build tag})?-{python tag}-{abi tag}-{platform tag}.whl
 */
const WHEEL_FILENAME_REGEX =
  /^(?<name>[A-Za-z0-9](?:[A-Za-z0-9._]*[A-Za-z0-9])?)-(?<version>[A-Za-z0-9_.!+]+?)(?:-(?<build>\d+[^-]*))?-(?<pyver>[^-]+)-(?<abi>[^-]+)-(?<plat>[^-]+)\.whl$/;

const SHA256_HASH = /^sha256:[0-9a-f]{64}$/;

/**
 * 패키지 이름 정규화 (PEP 503, 구분자는 _)
 */
export function normalizePackageName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '_');
}

/**
 * Wheel 파일명 파싱 (압축 태그셋 확장)
 * @throws UnrecognizedTagError 형식이 잘못되었거나 알 수 없는 플랫폼 태그
 */
export function parseWheelFilename(filename: string): WheelFilename {
  const match = WHEEL_FILENAME_REGEX.exec(filename);
  if (!match || !match.groups) {
    throw new UnrecognizedTagError(filename, 'not a valid wheel filename');
  }

  const { name, version, build, pyver, abi, plat } = match.groups;

  let buildTag: BuildTag = [];
  if (build) {
    buildTag = [parseInt(build, 10), build.replace(/^\d+/, '')];
  }

  const platformTags: WheelPlatformTag[] = [];
  const seen = new Set<string>();
  for (const raw of plat.split('.')) {
    const normalized = normalizePlatformTag(raw);
    if (!seen.has(normalized.tag)) {
      seen.add(normalized.tag);
      platformTags.push(normalized);
    }
  }

  return {
    name: normalizePackageName(name),
    version,
    buildTag,
    pythonTags: pyver.split('.'),
    abiTags: abi.split('.'),
    platformTags,
  };
}

/**
 * 인덱스 파일 정보로 WheelDescriptor 생성
 */
export function createWheelDescriptor(file: {
  filename: string;
  url: string;
  size: number;
  sha256: string;
}): WheelDescriptor {
  const parsed = parseWheelFilename(file.filename);
  const hash = `sha256:${file.sha256.toLowerCase()}`;
  if (!SHA256_HASH.test(hash)) {
    throw new UnrecognizedTagError(file.filename, `invalid sha256 digest '${file.sha256}'`);
  }

  return {
    filename: file.filename,
    name: parsed.name,
    version: parsed.version,
    buildTag: parsed.buildTag,
    pythonTags: parsed.pythonTags,
    abiTags: parsed.abiTags,
    platformTags: parsed.platformTags,
    size: file.size,
    hash,
    url: file.url,
  };
}

/**
 * sha256:<hex>에서 hex 부분 추출
 */
export function hashHex(hash: string): string {
  return hash.startsWith('sha256:') ? hash.slice('sha256:'.length) : hash;
}

/**
 * Wheel의 (python, abi) 조합 중 지원되는 태그의 최선 우선순위
 * 낮을수록 더 선호됨, 호환되지 않으면 -1
 */
export function getWheelSupportIndex(
  wheel: Pick<WheelDescriptor, 'pythonTags' | 'abiTags'>,
  supportedTags: readonly InterpreterTag[]
): number {
  const fileTags = new Set<string>();
  for (const python of wheel.pythonTags) {
    for (const abi of wheel.abiTags) {
      fileTags.add(`${python}-${abi}`);
    }
  }
  return supportedTags.findIndex((tag) => fileTags.has(interpreterTagToString(tag)));
}

/**
 * Wheel 파일명의 Python|ABI 태그 요약 (예: cp311|cp311)
 */
export function formatInterpreterTags(wheel: Pick<WheelDescriptor, 'pythonTags' | 'abiTags'>): string {
  return `${wheel.pythonTags.join('.')}|${wheel.abiTags.join('.')}`;
}
