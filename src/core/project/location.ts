/**
 * 확장 프로젝트 위치
 * 경로, 스크립트 URL, git 저장소, 이미 패킹된 zip 중 하나
 */

import fs from 'fs-extra';
import * as path from 'path';
import { createHash } from 'crypto';
import { execFile } from 'child_process';
import { promisify } from 'util';
import axios from 'axios';
import logger from '../../utils/logger';
import { ProjectConfigError } from '../errors';

const execFileAsync = promisify(execFile);

export const PROJECT_SPEC_FILE = 'pyproject.toml';
export const LOCAL_CACHE_DIRNAME = '.blpack_cache';

export type ProjectLocation =
  | { kind: 'path'; path: string | null }
  | { kind: 'url'; url: string }
  | { kind: 'git'; url: string; ref: string | null; entrypoint: string | null }
  | { kind: 'packed'; path: string };

export type ProjectFiles =
  | {
      kind: 'source';
      /** pyproject.toml 또는 .py 스크립트 */
      specPath: string;
      isScript: boolean;
      projectCacheDir: string;
    }
  | {
      kind: 'packed';
      archivePath: string;
      projectCacheDir: string;
    };

export interface LocateDependencies {
  /** 전역 캐시 디렉토리 */
  cacheDir: string;
  cwd?: string;
  fetchText(url: string): Promise<string>;
  runGit(args: string[], cwd?: string): Promise<void>;
}

/**
 * CLI 인자를 위치로 해석
 * git+<url>[@ref][#entrypoint], http(s) 스크립트 URL, .zip, 그 외는 경로
 */
export function parseProjectLocation(input?: string): ProjectLocation {
  if (!input) return { kind: 'path', path: null };

  if (input.startsWith('git+')) {
    const [withRef, entrypoint] = splitOnce(input.slice('git+'.length), '#');
    const atIndex = withRef.lastIndexOf('@');
    const schemeEnd = withRef.indexOf('://');
    const hasRef = atIndex > schemeEnd + 3 && !withRef.slice(atIndex).includes('/');
    return {
      kind: 'git',
      url: hasRef ? withRef.slice(0, atIndex) : withRef,
      ref: hasRef ? withRef.slice(atIndex + 1) : null,
      entrypoint: entrypoint || null,
    };
  }

  if (/^https?:\/\//.test(input)) return { kind: 'url', url: input };
  if (input.toLowerCase().endsWith('.zip')) return { kind: 'packed', path: input };
  return { kind: 'path', path: input };
}

export function formatProjectLocation(location: ProjectLocation): string {
  switch (location.kind) {
    case 'path':
      return location.path ?? '.';
    case 'url':
      return location.url;
    case 'git':
      return `git+${location.url}${location.ref ? `@${location.ref}` : ''}${location.entrypoint ? `#${location.entrypoint}` : ''}`;
    case 'packed':
      return location.path;
  }
}

function splitOnce(value: string, separator: string): [string, string] {
  const index = value.indexOf(separator);
  return index < 0 ? [value, ''] : [value.slice(0, index), value.slice(index + 1)];
}

function shortHash(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16);
}

/**
 * 위치를 로컬 파일로 확정
 */
export async function locate(location: ProjectLocation, deps: LocateDependencies): Promise<ProjectFiles> {
  const cwd = deps.cwd ?? process.cwd();

  switch (location.kind) {
    case 'path': {
      const specPath = location.path
        ? await findSpecAt(path.resolve(cwd, location.path))
        : await findSpecInParents(cwd);
      return sourceFiles(specPath, deps.cacheDir);
    }

    case 'url':
      return locateUrl(location.url, deps);

    case 'git':
      return locateGit(location, deps);

    case 'packed': {
      const archivePath = path.resolve(cwd, location.path);
      if (!(await fs.pathExists(archivePath))) {
        throw new ProjectConfigError(archivePath, 'location', 'no such file');
      }
      return {
        kind: 'packed',
        archivePath,
        projectCacheDir: await globalProjectDir(deps.cacheDir, archivePath),
      };
    }
  }
}

async function findSpecAt(target: string): Promise<string> {
  if (!(await fs.pathExists(target))) {
    throw new ProjectConfigError(target, 'location', 'no such file or directory');
  }

  const stat = await fs.stat(target);
  if (stat.isDirectory()) {
    const specPath = path.join(target, PROJECT_SPEC_FILE);
    if (await fs.pathExists(specPath)) return specPath;
    throw new ProjectConfigError(target, 'location', `directory has no ${PROJECT_SPEC_FILE}`);
  }

  if (target.endsWith('.py') || path.basename(target) === PROJECT_SPEC_FILE) return target;
  throw new ProjectConfigError(target, 'location', `only ${PROJECT_SPEC_FILE} and .py scripts are supported`);
}

async function findSpecInParents(start: string): Promise<string> {
  let dir = path.resolve(start);
  for (;;) {
    const specPath = path.join(dir, PROJECT_SPEC_FILE);
    if (await fs.pathExists(specPath)) return specPath;
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new ProjectConfigError(start, 'location', `no ${PROJECT_SPEC_FILE} in this directory or its parents`);
    }
    dir = parent;
  }
}

async function sourceFiles(specPath: string, cacheDir: string): Promise<ProjectFiles> {
  const isScript = specPath.endsWith('.py');
  return {
    kind: 'source',
    specPath,
    isScript,
    projectCacheDir: isScript
      ? await globalProjectDir(cacheDir, specPath)
      : await localProjectDir(path.dirname(specPath), cacheDir, specPath),
  };
}

/**
 * 프로젝트 루트가 쓰기 가능하면 <root>/.blpack_cache, 아니면 전역 캐시
 */
async function localProjectDir(root: string, cacheDir: string, specPath: string): Promise<string> {
  try {
    await fs.access(root, fs.constants.W_OK);
  } catch {
    logger.debug('프로젝트 디렉토리에 쓸 수 없어 전역 캐시 사용', { root });
    return globalProjectDir(cacheDir, specPath);
  }
  const dir = path.join(root, LOCAL_CACHE_DIRNAME);
  await fs.ensureDir(dir);
  return dir;
}

async function globalProjectDir(cacheDir: string, key: string): Promise<string> {
  const dir = path.join(cacheDir, 'projects', shortHash(path.resolve(key)));
  await fs.ensureDir(dir);
  return dir;
}

async function locateUrl(url: string, deps: LocateDependencies): Promise<ProjectFiles> {
  const filename = path.posix.basename(new URL(url).pathname);
  if (!filename.endsWith('.py')) {
    throw new ProjectConfigError(url, 'location', 'only single-file .py scripts can be fetched by URL');
  }

  const dir = path.join(deps.cacheDir, 'projects', shortHash(url));
  await fs.ensureDir(dir);
  const specPath = path.join(dir, filename);

  logger.info('스크립트 다운로드', { url });
  await fs.writeFile(specPath, await deps.fetchText(url));

  return { kind: 'source', specPath, isScript: true, projectCacheDir: dir };
}

async function locateGit(
  location: Extract<ProjectLocation, { kind: 'git' }>,
  deps: LocateDependencies
): Promise<ProjectFiles> {
  const repoDir = path.join(deps.cacheDir, 'git', shortHash(location.url));
  const ref = location.ref ?? 'HEAD';

  if (await fs.pathExists(path.join(repoDir, '.git'))) {
    logger.info('git 저장소 갱신', { url: location.url, ref });
    await deps.runGit(['fetch', '--depth', '1', 'origin', ref], repoDir);
  } else {
    logger.info('git 저장소 복제', { url: location.url, ref });
    await fs.ensureDir(path.dirname(repoDir));
    await deps.runGit(['clone', '--depth', '1', '--no-checkout', location.url, repoDir]);
    await deps.runGit(['fetch', '--depth', '1', 'origin', ref], repoDir);
  }
  await deps.runGit(['checkout', '--force', 'FETCH_HEAD'], repoDir);

  const specPath = await findSpecAt(path.join(repoDir, location.entrypoint ?? ''));
  const isScript = specPath.endsWith('.py');
  return {
    kind: 'source',
    specPath,
    isScript,
    projectCacheDir: await globalProjectDir(deps.cacheDir, `${location.url}@${ref}`),
  };
}

/**
 * 실제 네트워크와 git을 사용하는 기본 구현
 */
export function defaultLocateDependencies(cacheDir: string, timeoutMs: number): LocateDependencies {
  return {
    cacheDir,
    async fetchText(url) {
      try {
        const response = await axios.get<string>(url, { responseType: 'text', timeout: timeoutMs });
        return response.data;
      } catch (error) {
        throw new ProjectConfigError(url, 'location', error instanceof Error ? error.message : String(error));
      }
    },
    async runGit(args, cwd) {
      try {
        await execFileAsync('git', args, { cwd });
      } catch (error) {
        const stderr =
          typeof error === 'object' && error !== null && 'stderr' in error ? String(error.stderr).trim() : '';
        const message = stderr || (error instanceof Error ? error.message : String(error));
        throw new ProjectConfigError(args.join(' '), 'git', message);
      }
    },
  };
}
