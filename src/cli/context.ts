/**
 * 명령어 공통 준비 작업
 * 전역 설정 로드, 로거 초기화, 프로젝트 위치 확정 및 BuildConfig 생성
 */

import chalk from 'chalk';
import { RELEASE_PROFILES, type BlenderPlatform, type ReleaseProfile } from '../types';
import logger from '../utils/logger';
import {
  createBuildConfig,
  getConfigManager,
  type BuildConfig,
  type BuildOverrides,
  type Config,
} from '../core/config';
import { ConfigError } from '../core/errors';
import { isBlenderPlatform } from '../core/blender/platforms';
import { PyPIJsonIndex, type PackageIndex } from '../core/shared/pip-index';
import {
  defaultLocateDependencies,
  locate,
  parseProjectLocation,
  type ProjectFiles,
} from '../core/project/location';
import { loadProject, type ProjectSource } from '../core/project/projectLoader';

/** 프로젝트를 다루는 명령어의 공통 옵션 */
export interface ProjectCommandOptions {
  platform?: string[];
  blender?: string[];
  concurrency?: string;
  profile?: string;
}

export interface ProjectContext {
  settings: Config;
  files: Extract<ProjectFiles, { kind: 'source' }>;
  project: ProjectSource;
  config: BuildConfig;
}

/**
 * 전역 설정 로드 및 로거 초기화
 */
export async function initializeCli(): Promise<Config> {
  const manager = getConfigManager();
  const settings = await manager.loadConfig();
  await logger.initialize({ level: settings.logLevel, logsDir: manager.getLogsDir() });
  return settings;
}

function isReleaseProfile(value: string): value is ReleaseProfile {
  return RELEASE_PROFILES.some((p) => p === value);
}

/**
 * CLI 옵션을 BuildOverrides로 변환
 * @throws ConfigError 알 수 없는 플랫폼, 프로필 또는 잘못된 동시 실행 수
 */
export function parseOverrides(options: ProjectCommandOptions): BuildOverrides {
  const overrides: BuildOverrides = {};

  if (options.platform?.length) {
    const platforms: BlenderPlatform[] = [];
    for (const value of options.platform) {
      if (!isBlenderPlatform(value)) {
        throw new ConfigError(`Unknown platform '${value}'`, { platform: value });
      }
      platforms.push(value);
    }
    overrides.platforms = platforms;
  }

  if (options.blender?.length) {
    overrides.blenderVersions = options.blender;
  }

  if (options.concurrency !== undefined) {
    const concurrency = Number(options.concurrency);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigError(`--concurrency must be a positive integer, got '${options.concurrency}'`);
    }
    overrides.concurrency = concurrency;
  }

  if (options.profile !== undefined) {
    if (!isReleaseProfile(options.profile)) {
      throw new ConfigError(`Unknown profile '${options.profile}'. Use one of: ${RELEASE_PROFILES.join(', ')}`);
    }
    overrides.profile = options.profile;
  }

  return overrides;
}

/**
 * 프로젝트 위치 확정 (패킹된 zip 포함)
 */
export async function locateProject(projectArg: string | undefined, settings: Config): Promise<ProjectFiles> {
  const manager = getConfigManager();
  return locate(
    parseProjectLocation(projectArg),
    defaultLocateDependencies(manager.getCacheDir(settings), settings.requestTimeoutMs)
  );
}

/**
 * 확정된 위치의 소스 프로젝트를 로드하고 BuildConfig 생성
 * @throws ConfigError 패킹된 zip이거나 범위에 해당하는 릴리스가 없음
 */
export async function createProjectContext(
  settings: Config,
  files: ProjectFiles,
  options: ProjectCommandOptions = {}
): Promise<ProjectContext> {
  const overrides = parseOverrides(options);

  if (files.kind === 'packed') {
    throw new ConfigError(`${files.archivePath} is a packed extension; only 'show manifest' accepts one`, {
      archivePath: files.archivePath,
    });
  }

  const project = await loadProject(files);
  const config = createBuildConfig(settings, project.config, overrides, getConfigManager().getCacheDir(settings));

  logger.info('프로젝트 로드 완료', {
    id: project.config.id,
    version: project.config.version,
    specPath: files.specPath,
    blenderVersions: config.blenderVersions,
    platforms: config.platforms,
  });

  if (config.blenderVersions.length === 0) {
    throw new ConfigError(
      `No known Blender release in [${project.config.blenderVersionMin}, ${project.config.blenderVersionMax ?? '∞'})`
    );
  }

  return { settings, files, project, config };
}

/**
 * 설정 로드부터 프로젝트 로드까지
 */
export async function loadProjectContext(
  projectArg: string | undefined,
  options: ProjectCommandOptions = {}
): Promise<ProjectContext> {
  const settings = await initializeCli();
  parseOverrides(options);
  const files = await locateProject(projectArg, settings);
  return createProjectContext(settings, files, options);
}

export function createPackageIndex(config: BuildConfig): PackageIndex {
  return new PyPIJsonIndex({ indexUrl: config.indexUrl, timeoutMs: config.requestTimeoutMs });
}

/**
 * Ctrl+C로 취소되는 AbortSignal
 */
export function createInterruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.log(chalk.yellow('\n취소 중...'));
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onInterrupt);
    },
  };
}
