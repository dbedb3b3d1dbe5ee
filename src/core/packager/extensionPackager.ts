/**
 * Blender 확장 zip 패키저
 * 같은 휠이 필요한 연속된 릴리스를 하나의 확장으로 묶어 archiver로 압축
 */

import * as path from 'path';
import fs from 'fs-extra';
import archiver from 'archiver';
import AdmZip from 'adm-zip';
import type { BlenderPlatform, ReleaseProfile, WheelDescriptor } from '../../types';
import logger from '../../utils/logger';
import { BlpackError, ErrorCodes, ProjectConfigError } from '../errors';
import { BLENDER_PLATFORMS } from '../blender/platforms';
import { compareVersions } from '../shared/version-utils';
import type { TargetResolution } from '../buildMatrix';
import type { ProjectSource } from '../project/projectLoader';
import {
  MANIFEST_FILENAME,
  RELEASE_CONFIG_FILENAME,
  buildManifest,
  renderManifest,
  renderReleaseConfig,
  validateManifest,
} from './manifest';

const EXCLUDED_SEGMENTS = new Set(['__pycache__', '.git', '.blpack_cache']);

/** 하나의 zip으로 묶이는 릴리스 그룹 */
export interface ExtensionGroup {
  /** 그룹에 속한 Blender 릴리스 (오름차순) */
  releases: string[];
  blenderVersionMin: string;
  /** 마지막 릴리스의 patch + 1 */
  blenderVersionMax: string;
  platforms: BlenderPlatform[];
  wheels: WheelDescriptor[];
  validTags: readonly string[];
}

export interface PackExtensionOptions {
  project: ProjectSource;
  group: ExtensionGroup;
  /** 휠 해시 → 로컬 파일 경로 */
  wheelPaths: ReadonlyMap<string, string>;
  outputDir: string;
  profile: ReleaseProfile;
  /** 그룹이 여러 개면 파일명에 Blender 최소 버전을 붙임 */
  multipleGroups?: boolean;
  compressionLevel?: number;
}

export interface PackResult {
  archivePath: string;
  size: number;
  group: ExtensionGroup;
}

function nextPatch(version: string): string {
  const [major, minor, patch] = version.split('.').map(Number);
  return `${major}.${minor}.${(patch || 0) + 1}`;
}

/**
 * 릴리스 하나의 플랫폼별 휠 파일명 서명
 */
function releaseSignature(targets: readonly TargetResolution[]): string {
  return targets
    .map((t) => {
      const filenames = t.dependencies
        .flatMap((dep) => dep.wheels.map((w) => w.wheel.filename))
        .sort();
      return `${t.target.platform}=${[...new Set(filenames)].join(',')}`;
    })
    .sort()
    .join(';');
}

/**
 * 타겟을 확장 그룹으로 묶기
 * 플랫폼별 휠 집합이 같은 연속 릴리스가 하나의 그룹이 됨
 */
export function groupTargets(targets: readonly TargetResolution[]): ExtensionGroup[] {
  const byRelease = new Map<string, TargetResolution[]>();
  for (const resolution of targets) {
    const version = resolution.release.version;
    const list = byRelease.get(version) ?? [];
    list.push(resolution);
    byRelease.set(version, list);
  }

  const groups: ExtensionGroup[] = [];
  let lastSignature: string | null = null;

  const ordered = [...byRelease].sort(([a], [b]) => compareVersions(a, b));
  for (const [version, releaseTargets] of ordered) {
    const signature = releaseSignature(releaseTargets);
    const current = groups.at(-1);

    if (current && signature === lastSignature) {
      current.releases.push(version);
      current.blenderVersionMax = nextPatch(version);
      continue;
    }

    const wheels = new Map<string, WheelDescriptor>();
    for (const resolution of releaseTargets) {
      for (const dep of resolution.dependencies) {
        for (const selected of dep.wheels) wheels.set(selected.wheel.hash, selected.wheel);
      }
    }

    groups.push({
      releases: [version],
      blenderVersionMin: version,
      blenderVersionMax: nextPatch(version),
      platforms: BLENDER_PLATFORMS.filter((p) => releaseTargets.some((t) => t.target.platform === p)),
      wheels: [...wheels.values()].sort((a, b) => a.filename.localeCompare(b.filename)),
      validTags: releaseTargets[0].release.validTags,
    });
    lastSignature = signature;
  }

  return groups;
}

/**
 * 그룹에 필요한데 받지 못한 휠
 */
export function missingWheels(group: ExtensionGroup, wheelPaths: ReadonlyMap<string, string>): WheelDescriptor[] {
  return group.wheels.filter((wheel) => !wheelPaths.has(wheel.hash));
}

export function archiveFilename(id: string, version: string, group: ExtensionGroup, multipleGroups: boolean): string {
  return multipleGroups ? `${id}-${version}-blender${group.blenderVersionMin}.zip` : `${id}-${version}.zip`;
}

function isExcluded(name: string): boolean {
  return name.split(/[\\/]/).some((segment) => EXCLUDED_SEGMENTS.has(segment)) || name.endsWith('.pyc');
}

/**
 * 확장 zip 생성
 */
export async function packExtension(options: PackExtensionOptions): Promise<PackResult> {
  const { project, group, wheelPaths, outputDir, profile } = options;
  const { config } = project;

  const manifest = buildManifest(config, {
    blenderVersionMin: group.blenderVersionMin,
    blenderVersionMax: group.blenderVersionMax,
    platforms: group.platforms,
    wheels: group.wheels,
  });
  validateManifest(manifest, group.validTags);

  const wheelFiles = group.wheels.map((wheel) => {
    const filePath = wheelPaths.get(wheel.hash);
    if (!filePath) {
      throw new BlpackError(`Wheel ${wheel.filename} was not downloaded`, ErrorCodes.DOWNLOAD_ERROR, {
        filename: wheel.filename,
      });
    }
    return { filePath, name: `wheels/${wheel.filename}` };
  });

  await fs.ensureDir(outputDir);
  const archivePath = path.join(
    outputDir,
    archiveFilename(config.id, config.version, group, options.multipleGroups ?? false)
  );

  logger.info('확장 패키징 시작', {
    archivePath,
    releases: group.releases,
    platforms: group.platforms,
    wheels: wheelFiles.length,
  });

  await new Promise<void>((resolve, reject) => {
    const output = fs.createWriteStream(archivePath);
    const archive = archiver('zip', { zlib: { level: options.compressionLevel ?? 9 } });

    output.on('close', () => resolve());
    output.on('error', reject);
    archive.on('error', reject);
    archive.on('warning', (err) => {
      logger.warn('압축 경고', { error: err.message });
    });

    archive.pipe(output);

    archive.append(renderManifest(manifest), { name: MANIFEST_FILENAME });
    archive.append(renderReleaseConfig(profile), { name: RELEASE_CONFIG_FILENAME });

    if (project.isScript) {
      archive.file(project.sourcePath, { name: '__init__.py' });
    } else {
      archive.directory(project.sourcePath, false, (entry) => (isExcluded(entry.name) ? false : entry));
    }

    for (const wheel of wheelFiles) {
      archive.file(wheel.filePath, { name: wheel.name });
    }

    archive.finalize().catch(reject);
  });

  const { size } = await fs.stat(archivePath);
  logger.info('확장 패키징 완료', { archivePath, size });

  return { archivePath, size, group };
}

/**
 * 패킹된 확장에서 blender_manifest.toml 읽기
 */
export function readPackedManifest(archivePath: string): string {
  let zip: AdmZip;
  try {
    zip = new AdmZip(archivePath);
  } catch (error) {
    throw new ProjectConfigError(archivePath, 'archive', error instanceof Error ? error.message : String(error));
  }

  const entry = zip.getEntry(MANIFEST_FILENAME);
  if (!entry) {
    throw new ProjectConfigError(archivePath, MANIFEST_FILENAME, 'not found in archive');
  }
  return zip.readAsText(entry, 'utf8');
}

/**
 * 패킹된 확장의 파일 목록
 */
export function listPackedEntries(archivePath: string): string[] {
  return new AdmZip(archivePath)
    .getEntries()
    .filter((e) => !e.isDirectory)
    .map((e) => e.entryName)
    .sort();
}
