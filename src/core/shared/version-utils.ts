// PEP 440 버전 파싱, 비교, specifier 매칭 유틸리티

import { VersionSyntaxError } from '../errors';

type PreLabel = 'a' | 'b' | 'rc';

/** 파싱된 PEP 440 버전 */
export interface Pep440Version {
  epoch: number;
  release: readonly number[];
  pre: readonly [PreLabel, number] | null;
  post: number | null;
  dev: number | null;
  local: readonly (number | string)[] | null;
}

/** 단일 specifier (예: >=1.0) */
export interface Specifier {
  operator: SpecifierOperator;
  version: string;
}

export type SpecifierOperator = '~=' | '===' | '==' | '!=' | '<=' | '>=' | '<' | '>';

export interface MatchOptions {
  /** true면 프리릴리스 허용, 생략 시 specifier가 프리릴리스를 명시한 경우에만 허용 */
  prereleases?: boolean;
}

const VERSION_PATTERN =
  /^\s*v?(?:(?:(?<epoch>[0-9]+)!)?(?<release>[0-9]+(?:\.[0-9]+)*)(?<pre>[-_.]?(?<preL>alpha|a|beta|b|preview|pre|c|rc)[-_.]?(?<preN>[0-9]+)?)?(?<post>(?:-(?<postN1>[0-9]+))|(?:[-_.]?(?<postL>post|rev|r)[-_.]?(?<postN2>[0-9]+)?))?(?<dev>[-_.]?(?<devL>dev)[-_.]?(?<devN>[0-9]+)?)?)(?:\+(?<local>[a-z0-9]+(?:[-_.][a-z0-9]+)*))?\s*$/i;

const SPECIFIER_PATTERN = /^(~=|===|==|!=|<=|>=|<|>)\s*([^\s,;]+)$/;

function normalizePreLabel(label: string): PreLabel {
  switch (label.toLowerCase()) {
    case 'a':
    case 'alpha':
      return 'a';
    case 'b':
    case 'beta':
      return 'b';
    default:
      return 'rc';
  }
}

/**
 * PEP 440 버전 파싱 (실패 시 null)
 */
export function tryParseVersion(version: string): Pep440Version | null {
  const match = VERSION_PATTERN.exec(version);
  if (!match || !match.groups) {
    return null;
  }
  const g = match.groups;

  let post: number | null = null;
  if (g.post !== undefined) {
    post = Number(g.postN1 ?? g.postN2 ?? 0);
  }

  return {
    epoch: g.epoch ? Number(g.epoch) : 0,
    release: g.release.split('.').map(Number),
    pre: g.preL ? [normalizePreLabel(g.preL), Number(g.preN ?? 0)] : null,
    post,
    dev: g.dev !== undefined ? Number(g.devN ?? 0) : null,
    local: g.local
      ? g.local
          .toLowerCase()
          .split(/[-_.]/)
          .map((part) => (/^\d+$/.test(part) ? Number(part) : part))
      : null,
  };
}

/**
 * PEP 440 버전 파싱
 */
export function parseVersion(version: string): Pep440Version {
  const parsed = tryParseVersion(version);
  if (!parsed) {
    throw new VersionSyntaxError(version);
  }
  return parsed;
}

/** 프리릴리스/개발 릴리스 여부 */
export function isPrerelease(version: string | Pep440Version): boolean {
  const v = typeof version === 'string' ? parseVersion(version) : version;
  return v.pre !== null || v.dev !== null;
}

function compareNumbers(a: number, b: number): number {
  return a === b ? 0 : a < b ? -1 : 1;
}

function compareRelease(a: readonly number[], b: readonly number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = compareNumbers(a[i] ?? 0, b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

function compareTuples(a: readonly number[], b: readonly number[]): number {
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const diff = compareNumbers(a[i], b[i]);
    if (diff !== 0) return diff;
  }
  return compareNumbers(a.length, b.length);
}

const PRE_RANK: Record<PreLabel, number> = { a: 0, b: 1, rc: 2 };

// dev만 있는 버전은 모든 프리릴리스보다 앞, 프리릴리스 없는 버전은 뒤
function preKey(v: Pep440Version): number[] {
  if (v.pre === null && v.post === null && v.dev !== null) return [0];
  if (v.pre === null) return [2];
  return [1, PRE_RANK[v.pre[0]], v.pre[1]];
}

function postKey(v: Pep440Version): number[] {
  return v.post === null ? [0] : [1, v.post];
}

function devKey(v: Pep440Version): number[] {
  return v.dev === null ? [1] : [0, v.dev];
}

function compareLocal(a: Pep440Version['local'], b: Pep440Version['local']): number {
  if (a === null || b === null) {
    return a === b ? 0 : a === null ? -1 : 1;
  }
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const x = a[i];
    const y = b[i];
    if (typeof x === 'number' && typeof y === 'number') {
      if (x !== y) return compareNumbers(x, y);
    } else if (typeof x === 'number') {
      return 1;
    } else if (typeof y === 'number') {
      return -1;
    } else if (x !== y) {
      return x < y ? -1 : 1;
    }
  }
  return compareNumbers(a.length, b.length);
}

function compareParsed(a: Pep440Version, b: Pep440Version): number {
  return (
    compareNumbers(a.epoch, b.epoch) ||
    compareRelease(a.release, b.release) ||
    compareTuples(preKey(a), preKey(b)) ||
    compareTuples(postKey(a), postKey(b)) ||
    compareTuples(devKey(a), devKey(b)) ||
    compareLocal(a.local, b.local)
  );
}

/**
 * PEP 440 버전 비교
 * @returns a > b면 양수, a < b면 음수, 같으면 0
 */
export function compareVersions(a: string, b: string): number {
  return compareParsed(parseVersion(a), parseVersion(b));
}

function publicVersion(v: Pep440Version): Pep440Version {
  return { ...v, local: null };
}

function baseRelease(v: Pep440Version): Pep440Version {
  return { epoch: v.epoch, release: v.release, pre: null, post: null, dev: null, local: null };
}

/**
 * specifier set 파싱 (콤마 구분 AND)
 */
export function parseSpecifierSet(spec: string): Specifier[] {
  const trimmed = spec.trim();
  if (trimmed === '') return [];

  return trimmed.split(',').map((part) => {
    const match = SPECIFIER_PATTERN.exec(part.trim());
    if (!match) {
      throw new VersionSyntaxError(part.trim());
    }
    const operator = match[1];
    if (!isSpecifierOperator(operator)) {
      throw new VersionSyntaxError(part.trim());
    }
    const specifier: Specifier = { operator, version: match[2] };
    validateSpecifier(specifier);
    return specifier;
  });
}

/**
 * specifier set 파싱 (실패 시 null)
 */
export function tryParseSpecifierSet(spec: string): Specifier[] | null {
  try {
    return parseSpecifierSet(spec);
  } catch (error) {
    if (error instanceof VersionSyntaxError) return null;
    throw error;
  }
}

function isSpecifierOperator(op: string): op is SpecifierOperator {
  return ['~=', '===', '==', '!=', '<=', '>=', '<', '>'].includes(op);
}

function validateSpecifier(spec: Specifier): void {
  if (spec.operator === '===') return;
  const text = `${spec.operator}${spec.version}`;
  if (spec.version.endsWith('.*')) {
    if (spec.operator !== '==' && spec.operator !== '!=') {
      throw new VersionSyntaxError(text);
    }
    if (!/^(?:[0-9]+!)?[0-9]+(?:\.[0-9]+)*$/.test(spec.version.slice(0, -2))) {
      throw new VersionSyntaxError(text);
    }
    return;
  }
  const parsed = tryParseVersion(spec.version);
  if (!parsed) {
    throw new VersionSyntaxError(text);
  }
  if (spec.operator === '~=' && parsed.release.length < 2) {
    throw new VersionSyntaxError(text);
  }
  if (parsed.local !== null && spec.operator !== '==' && spec.operator !== '!=') {
    throw new VersionSyntaxError(text);
  }
}

function matchesPrefix(candidate: Pep440Version, prefix: string): boolean {
  const [epochPart, releasePart] = prefix.includes('!') ? prefix.split('!') : ['0', prefix];
  const wanted = releasePart.split('.').map(Number);
  if (candidate.epoch !== Number(epochPart)) return false;
  return wanted.every((n, i) => (candidate.release[i] ?? 0) === n);
}

function matchesSingle(candidate: Pep440Version, rawCandidate: string, spec: Specifier): boolean {
  if (spec.operator === '===') {
    return rawCandidate.trim().toLowerCase() === spec.version.toLowerCase();
  }

  if (spec.version.endsWith('.*')) {
    const matched = matchesPrefix(candidate, spec.version.slice(0, -2));
    return spec.operator === '==' ? matched : !matched;
  }

  const target = parseVersion(spec.version);
  switch (spec.operator) {
    case '==':
    case '!=': {
      const left = target.local === null ? publicVersion(candidate) : candidate;
      const equal = compareParsed(left, target) === 0;
      return spec.operator === '==' ? equal : !equal;
    }
    case '~=': {
      const prefix = target.release.slice(0, -1).join('.');
      const withEpoch = target.epoch ? `${target.epoch}!${prefix}` : prefix;
      return compareParsed(publicVersion(candidate), target) >= 0 && matchesPrefix(candidate, withEpoch);
    }
    case '<=':
      return compareParsed(publicVersion(candidate), target) <= 0;
    case '>=':
      return compareParsed(publicVersion(candidate), target) >= 0;
    case '<': {
      if (compareParsed(candidate, target) >= 0) return false;
      // <V는 V의 프리릴리스를 제외 (V 자체가 프리릴리스가 아닌 경우)
      if (!isPrerelease(target) && isPrerelease(candidate)) {
        return compareParsed(baseRelease(candidate), baseRelease(target)) !== 0;
      }
      return true;
    }
    case '>': {
      if (compareParsed(candidate, target) <= 0) return false;
      // >V는 V의 포스트릴리스와 로컬 버전을 제외
      const sameBase = compareParsed(baseRelease(candidate), baseRelease(target)) === 0;
      if (target.post === null && candidate.post !== null && sameBase) return false;
      if (candidate.local !== null && sameBase) return false;
      return true;
    }
  }
}

/**
 * specifier set이 프리릴리스를 명시하는지 확인
 */
export function specifierAllowsPrereleases(spec: string | readonly Specifier[]): boolean {
  const specs = typeof spec === 'string' ? parseSpecifierSet(spec) : spec;
  return specs.some((s) => s.operator !== '!=' && isPrereleaseText(s.version.replace(/\.\*$/, '')));
}

function isPrereleaseText(version: string): boolean {
  const parsed = tryParseVersion(version);
  return parsed !== null && isPrerelease(parsed);
}

/**
 * 버전 스펙 호환성 체크
 * 지원: ==, !=, <=, >=, <, >, ~=, ===, 와일드카드(==X.*, !=X.*), 콤마 구분 AND
 * @param version 체크할 버전
 * @param spec 버전 스펙 (예: ">=1.0,<2.0")
 * @returns 호환되면 true
 */
export function isVersionCompatible(
  version: string,
  spec: string | readonly Specifier[],
  options: MatchOptions = {}
): boolean {
  const candidate = tryParseVersion(version);
  const specs = typeof spec === 'string' ? parseSpecifierSet(spec) : spec;
  if (!candidate) {
    const raw = version.trim().toLowerCase();
    return specs.length > 0 && specs.every((s) => s.operator === '===' && s.version.toLowerCase() === raw);
  }

  const allowPre = options.prereleases ?? specifierAllowsPrereleases(specs);
  if (!allowPre && isPrerelease(candidate)) {
    return false;
  }
  return specs.every((s) => matchesSingle(candidate, version, s));
}

/**
 * 버전 배열을 내림차순으로 정렬
 */
export function sortVersionsDescending(versions: readonly string[]): string[] {
  return [...versions].sort((a, b) => compareVersions(b, a));
}

/**
 * 버전 배열을 오름차순으로 정렬
 */
export function sortVersionsAscending(versions: readonly string[]): string[] {
  return [...versions].sort((a, b) => compareVersions(a, b));
}

/**
 * 버전 스펙에 맞는 최신 버전 찾기
 * @returns 호환되는 최신 버전 또는 null
 */
export function findLatestCompatibleVersion(
  versions: readonly string[],
  spec: string,
  options: MatchOptions = {}
): string | null {
  for (const version of sortVersionsDescending(versions)) {
    if (isVersionCompatible(version, spec, options)) {
      return version;
    }
  }
  return null;
}
