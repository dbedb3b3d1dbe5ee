// ============================================
// 플랫폼 관련 타입
// ============================================

/** 지원하는 OS */
export type OsKind = 'linux' | 'macos' | 'windows';

/** 지원하는 CPU 아키텍처 */
export type CpuArch = 'x64' | 'arm64';

/** Blender 확장 플랫폼 식별자 */
export type BlenderPlatform =
  | 'linux-x64'
  | 'linux-arm64'
  | 'macos-x64'
  | 'macos-arm64'
  | 'windows-x64'
  | 'windows-arm64';

/** OS 최소 버전 (Linux는 glibc, macOS는 macOS 버전) */
export interface OsVersion {
  major: number;
  minor: number;
}

/** 빌드 타겟 플랫폼 */
export interface PlatformTag {
  os: OsKind;
  arch: CpuArch;
  minOsVersion: OsVersion | null;
}

/** 정규화된 휠 플랫폼 태그 */
export interface WheelPlatformTag {
  /** PEP 600 정규형 태그 문자열 */
  tag: string;
  os: OsKind | 'any';
  /** 이 태그로 설치 가능한 아키텍처 (빈 배열이면 Blender 타겟과 호환되지 않음) */
  arches: readonly CpuArch[];
  minOsVersion: OsVersion | null;
}

// ============================================
// 휠 관련 타입
// ============================================

/** 빌드 태그 (빌드 번호 + 빌드 문자열) */
export type BuildTag = readonly [number, string] | readonly [];

/** 인터프리터 태그 (python, abi) 쌍 */
export interface InterpreterTag {
  python: string;
  abi: string;
}

/** 인덱스에서 조회한 휠 파일 */
export interface WheelDescriptor {
  filename: string;
  /** 정규화된 패키지 이름 */
  name: string;
  version: string;
  buildTag: BuildTag;
  pythonTags: readonly string[];
  abiTags: readonly string[];
  platformTags: readonly WheelPlatformTag[];
  size: number;
  /** sha256:<hex> */
  hash: string;
  url: string;
}

/** 특정 버전의 패키지 메타데이터 */
export interface PackageRelease {
  name: string;
  version: string;
  requiresDist: readonly string[];
  requiresPython: string | null;
  wheels: readonly WheelDescriptor[];
}

// ============================================
// 마커 / 요구사항 관련 타입
// ============================================

/** PEP 508 마커 변수 */
export type MarkerVariable =
  | 'python_version'
  | 'python_full_version'
  | 'os_name'
  | 'sys_platform'
  | 'platform_release'
  | 'platform_system'
  | 'platform_version'
  | 'platform_machine'
  | 'platform_python_implementation'
  | 'implementation_name'
  | 'implementation_version'
  | 'extra';

export type MarkerOperator = '<' | '<=' | '==' | '!=' | '>=' | '>' | '~=' | '===' | 'in' | 'not in';

export type MarkerOperand =
  | { kind: 'variable'; name: MarkerVariable }
  | { kind: 'string'; value: string };

export type MarkerNode =
  | { kind: 'compare'; left: MarkerOperand; op: MarkerOperator; right: MarkerOperand }
  | { kind: 'and' | 'or'; left: MarkerNode; right: MarkerNode };

/** 마커 평가 환경 (platform_machine은 집합) */
export interface MarkerEnvironment {
  python_version: string;
  python_full_version: string;
  os_name: string;
  sys_platform: string;
  platform_release: string;
  platform_system: string;
  platform_version: string;
  platform_machine: readonly string[];
  platform_python_implementation: string;
  implementation_name: string;
  implementation_version: string;
}

/** 프로젝트가 선언한 의존성 */
export interface DependencySpec {
  /** 정규화된 이름 */
  name: string;
  rawName: string;
  extras: readonly string[];
  /** PEP 440 specifier set (빈 문자열이면 모든 버전) */
  specifier: string;
  marker: MarkerNode | null;
  markerText: string | null;
  /** 특정 Blender 시리즈 (예: "4.2")에만 적용 */
  blenderSeries?: string;
}

// ============================================
// Blender 레퍼런스 관련 타입
// ============================================

/** Blender가 번들하는 패키지 고정 버전 */
export interface ReferencePin {
  name: string;
  version: string;
  platforms: readonly BlenderPlatform[];
}

export type ReferencePlatformSet = ReadonlyMap<string, ReferencePin>;

/** Blender 릴리스 정보 */
export interface BlenderRelease {
  version: string;
  /** major.minor */
  series: string;
  releasedAt: string;
  pythonVersion: string;
  minGlibcVersion: OsVersion;
  minMacosVersion: OsVersion;
  platforms: readonly BlenderPlatform[];
  manifestVersions: readonly string[];
  validTags: readonly string[];
  /** 마커의 extra 값 (예: blender4-2) */
  markerExtra: string;
  referencePackages: ReferencePlatformSet;
}

// ============================================
// 해결 결과 관련 타입
// ============================================

/** 빌드 타겟 (Blender 버전 x 플랫폼 x Python ABI) */
export interface TargetEnvironment {
  /** 예: 4.2.0/linux-x64/cp311 */
  key: string;
  blenderVersion: string;
  series: string;
  platform: BlenderPlatform;
  pythonVersion: string;
  interpreterTags: readonly InterpreterTag[];
  platformTag: PlatformTag;
  markerEnvironment: MarkerEnvironment;
  /** 마커 평가 시 항상 참인 extra (예: blender4-2) */
  extras: readonly string[];
}

/** 타겟별로 선택된 휠 */
export interface SelectedWheel {
  platform: BlenderPlatform;
  platformTag: PlatformTag;
  wheel: WheelDescriptor;
}

/** 해결된 의존성 */
export interface ResolvedDependency {
  name: string;
  version: string;
  /** 이 패키지를 요구한 패키지 (루트는 <project>) */
  requiredBy: readonly string[];
  wheels: readonly SelectedWheel[];
}

// ============================================
// 빌드 관련 타입
// ============================================

/** 릴리스 프로필 */
export type ReleaseProfile = 'test' | 'dev' | 'release' | 'release-debug';

/** 로그 레벨 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const RELEASE_PROFILES: readonly ReleaseProfile[] = ['test', 'dev', 'release', 'release-debug'];

/** 매니페스트 permissions 키 */
export type ExtensionPermission = 'files' | 'network' | 'clipboard' | 'camera' | 'microphone';

// ============================================
// 프로젝트 관련 타입
// ============================================

/** pyproject.toml 또는 인라인 스크립트 메타데이터에서 읽은 확장 정보 */
export interface ProjectConfig {
  /** project.name (확장 id, 패키지 디렉토리 이름) */
  id: string;
  prettyName: string;
  version: string;
  /** project.description */
  tagline: string;
  /** "이름 <이메일>" */
  maintainer: string;
  /** SPDX 식별자 */
  license: string;
  requiresPython: string | null;
  blenderVersionMin: string;
  /** 미포함 상한 */
  blenderVersionMax?: string;
  copyright: readonly string[];
  tags: readonly string[];
  /** 지정하지 않으면 릴리스가 지원하는 모든 플랫폼 */
  platforms?: readonly BlenderPlatform[];
  permissions: Readonly<Partial<Record<ExtensionPermission, string>>>;
  website: string | null;
  minGlibcVersion?: OsVersion;
  minMacosVersion?: OsVersion;
}

export interface LoadedProject {
  config: ProjectConfig;
  dependencies: readonly DependencySpec[];
}
