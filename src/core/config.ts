import fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import type { BlenderPlatform, LogLevel, OsVersion, ReleaseProfile } from '../types';
import { BLENDER_PLATFORMS } from './blender/platforms';
import { getBlenderRelease, releasesInRange } from './blender/releases';
import { compareVersions } from './shared/version-utils';

// 전역 설정 인터페이스 정의 (~/.blpack/settings.json)
export interface Config {
  // 다운로드 설정
  concurrentDownloads: number;
  maxRetries: number;
  retryDelayMs: number;
  requestTimeoutMs: number;

  // 캐시 설정
  cacheEnabled: boolean;
  /** 빈 문자열이면 기본 경로 사용 */
  cachePath: string;
  maxCacheSizeGB: number;

  // 인덱스 설정
  indexUrl: string;
  allowPrereleases: boolean;

  // 기타 설정
  logLevel: LogLevel;
}

// 기본 설정값
const DEFAULT_CONFIG: Config = {
  concurrentDownloads: 5,
  maxRetries: 3,
  retryDelayMs: 1000,
  requestTimeoutMs: 30000,
  cacheEnabled: true,
  cachePath: '',
  maxCacheSizeGB: 10,
  indexUrl: 'https://pypi.org',
  allowPrereleases: false,
  logLevel: 'info',
};

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export type ConfigKey = keyof Config;

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(DEFAULT_CONFIG, key);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * 저장된 값을 기본값 타입에 맞춰 병합 (타입이 맞지 않는 항목은 기본값 사용)
 */
function sanitizeConfig(raw: unknown): Config {
  const config: Config = { ...DEFAULT_CONFIG };
  if (typeof raw !== 'object' || raw === null) return config;

  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key)) continue;
    assignValue(config, key, value);
  }
  return config;
}

function assignValue(config: Config, key: ConfigKey, value: unknown): boolean {
  switch (key) {
    case 'logLevel':
      if (!isLogLevel(value)) return false;
      config.logLevel = value;
      return true;
    case 'cachePath':
    case 'indexUrl':
      if (typeof value !== 'string') return false;
      config[key] = value;
      return true;
    case 'cacheEnabled':
    case 'allowPrereleases':
      if (typeof value !== 'boolean') return false;
      config[key] = value;
      return true;
    default:
      if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) return false;
      config[key] = value;
      return true;
  }
}

/**
 * CLI 문자열 값을 설정 타입으로 변환
 */
function coerceValue(key: ConfigKey, value: string): unknown {
  const defaultValue = DEFAULT_CONFIG[key];
  if (typeof defaultValue === 'boolean') {
    if (value === 'true') return true;
    if (value === 'false') return false;
    return value;
  }
  if (typeof defaultValue === 'number') {
    return value.trim() === '' ? value : Number(value);
  }
  return value;
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;
  private cacheDir: string;

  constructor(baseDir?: string) {
    this.configDir = baseDir || process.env.BLPACK_HOME || path.join(os.homedir(), '.blpack');
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
    this.cacheDir = path.join(this.configDir, 'cache');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
    await fs.ensureDir(this.cacheDir);
  }

  /**
   * 설정을 로드합니다. 파일이 없으면 기본값을 생성합니다.
   */
  async loadConfig(): Promise<Config> {
    await this.ensureDirectories();

    if (await fs.pathExists(this.configPath)) {
      const raw: unknown = await fs.readJson(this.configPath);
      return sanitizeConfig(raw);
    }

    await this.saveConfig(DEFAULT_CONFIG);
    return { ...DEFAULT_CONFIG };
  }

  /**
   * 설정을 저장합니다.
   */
  async saveConfig(config: Config): Promise<void> {
    await this.ensureDirectories();
    await fs.writeJson(this.configPath, config, { spaces: 2 });
  }

  /**
   * 설정을 기본값으로 초기화합니다.
   */
  async resetToDefaults(): Promise<Config> {
    await this.saveConfig(DEFAULT_CONFIG);
    return { ...DEFAULT_CONFIG };
  }

  /**
   * 특정 설정값을 업데이트합니다.
   */
  async updateConfig(updates: Partial<Config>): Promise<Config> {
    const currentConfig = await this.loadConfig();
    const newConfig = sanitizeConfig({ ...currentConfig, ...updates });
    await this.saveConfig(newConfig);
    return newConfig;
  }

  /**
   * 설정 디렉토리 경로를 반환합니다.
   */
  getConfigDir(): string {
    return this.configDir;
  }

  /**
   * 로그 디렉토리 경로를 반환합니다.
   */
  getLogsDir(): string {
    return this.logsDir;
  }

  /**
   * 캐시 디렉토리 경로를 반환합니다. (cachePath 설정 우선)
   */
  getCacheDir(config?: Config): string {
    return config?.cachePath || this.cacheDir;
  }

  /**
   * 설정을 동기적으로 로드합니다 (CLI용).
   */
  getConfig(): Config {
    if (fs.pathExistsSync(this.configPath)) {
      const raw: unknown = fs.readJsonSync(this.configPath);
      return sanitizeConfig(raw);
    }
    return { ...DEFAULT_CONFIG };
  }

  /**
   * 설정값을 동기적으로 설정합니다 (CLI용).
   * @returns 값이 올바르지 않으면 false
   */
  set(key: ConfigKey, value: string): boolean {
    const config = this.getConfig();
    if (!assignValue(config, key, coerceValue(key, value))) {
      return false;
    }
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, config, { spaces: 2 });
    return true;
  }

  /**
   * 설정을 동기적으로 초기화합니다 (CLI용).
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, DEFAULT_CONFIG, { spaces: 2 });
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}

// ============================================
// 빌드 설정 (불변)
// ============================================

/** 프로젝트가 선언한 빌드 타겟 범위 */
export interface ProjectTargetSettings {
  blenderVersionMin: string;
  /** 미포함 상한 */
  blenderVersionMax?: string;
  platforms?: readonly BlenderPlatform[];
  minGlibcVersion?: OsVersion;
  minMacosVersion?: OsVersion;
}

/** CLI에서 지정한 값 (프로젝트 설정보다 우선) */
export interface BuildOverrides {
  blenderVersions?: readonly string[];
  platforms?: readonly BlenderPlatform[];
  concurrency?: number;
  profile?: ReleaseProfile;
  maxBacktracks?: number;
}

/** 한 번의 빌드 동안 사용하는 불변 설정 */
export interface BuildConfig {
  readonly blenderVersions: readonly string[];
  readonly platforms: readonly BlenderPlatform[];
  readonly minGlibcVersion: OsVersion | null;
  readonly minMacosVersion: OsVersion | null;
  readonly concurrency: number;
  readonly maxBacktracks: number;
  readonly allowPrereleases: boolean;
  readonly cacheEnabled: boolean;
  readonly cacheDir: string;
  readonly maxCacheSizeBytes: number;
  readonly indexUrl: string;
  readonly requestTimeoutMs: number;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly profile: ReleaseProfile;
}

export const DEFAULT_MAX_BACKTRACKS = 10000;

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * 전역 설정 + 프로젝트 설정 + CLI 값으로 BuildConfig 생성
 */
export function createBuildConfig(
  global: Config,
  project: ProjectTargetSettings,
  overrides: BuildOverrides = {},
  defaultCacheDir: string = getConfigManager().getCacheDir()
): BuildConfig {
  // 지정 순서와 상관없이 중복 없는 오름차순
  const blenderVersions = overrides.blenderVersions?.length
    ? [...new Set(overrides.blenderVersions.map((v) => getBlenderRelease(v).version))].sort(compareVersions)
    : releasesInRange(project.blenderVersionMin, project.blenderVersionMax).map((r) => r.version);

  return deepFreeze({
    blenderVersions: [...blenderVersions],
    platforms: [...(overrides.platforms ?? project.platforms ?? BLENDER_PLATFORMS)],
    minGlibcVersion: project.minGlibcVersion ? { ...project.minGlibcVersion } : null,
    minMacosVersion: project.minMacosVersion ? { ...project.minMacosVersion } : null,
    concurrency: Math.max(1, overrides.concurrency ?? global.concurrentDownloads),
    maxBacktracks: overrides.maxBacktracks ?? DEFAULT_MAX_BACKTRACKS,
    allowPrereleases: global.allowPrereleases,
    cacheEnabled: global.cacheEnabled,
    cacheDir: global.cachePath || defaultCacheDir,
    maxCacheSizeBytes: global.maxCacheSizeGB * 1024 * 1024 * 1024,
    indexUrl: global.indexUrl.replace(/\/+$/, ''),
    requestTimeoutMs: global.requestTimeoutMs,
    maxRetries: global.maxRetries,
    retryDelayMs: global.retryDelayMs,
    profile: overrides.profile ?? 'release',
  });
}

export function getDefaultConfig(): Config {
  return { ...DEFAULT_CONFIG };
}
