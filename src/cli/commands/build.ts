import cliProgress from 'cli-progress';
import chalk from 'chalk';
import * as path from 'path';
import fs from 'fs-extra';
import logger from '../../utils/logger';
import { formatBytes, formatDuration, formatSpeed } from '../../utils/format';
import { formatFailures, planTargets, resolveBuildMatrix, type BuildMatrixResult } from '../../core/buildMatrix';
import { WheelCache } from '../../core/cacheManager';
import { WheelDownloadManager, downloadRequestsFor, type DownloadResult } from '../../core/downloadManager';
import { BuildCancelledError } from '../../core/errors';
import {
  groupTargets,
  missingWheels,
  packExtension,
  type ExtensionGroup,
  type PackResult,
} from '../../core/packager/extensionPackager';
import {
  createInterruptSignal,
  createPackageIndex,
  loadProjectContext,
  type ProjectCommandOptions,
  type ProjectContext,
} from '../context';

export const LAST_BUILD_FILENAME = 'last-build.json';

export interface BuildCommandOptions extends ProjectCommandOptions {
  output: string;
}

/**
 * 타겟 해결 (진행률 바 표시)
 */
export async function resolveWithProgress(
  ctx: ProjectContext,
  signal: AbortSignal,
  options: { quiet?: boolean } = {}
): Promise<BuildMatrixResult> {
  const { config, project } = ctx;
  const total = planTargets(config).length;

  // 진행률 바는 stderr로 출력됨
  if (!options.quiet) {
    console.log(chalk.cyan(`Blender ${config.blenderVersions.join(', ')}`));
    console.log(chalk.cyan(`플랫폼: ${config.platforms.join(', ')}\n`));
  }

  const bar = new cliProgress.SingleBar(
    { format: ' {bar} | 의존성 해결 | {value}/{total} 타겟', hideCursor: true },
    cliProgress.Presets.shades_classic
  );
  bar.start(total, 0);

  try {
    return await resolveBuildMatrix(config, project.dependencies, createPackageIndex(config), {
      signal,
      onTargetComplete: () => bar.increment(),
    });
  } finally {
    bar.stop();
  }
}

/**
 * 실패한 타겟이 있으면 모든 에러를 출력하고 종료
 */
export function exitOnFailures(matrix: BuildMatrixResult): void {
  if (matrix.failures.length === 0) return;
  console.error(chalk.red(`\n✗ ${matrix.failures.length}개 타겟 해결 실패:\n`));
  console.error(chalk.red(formatFailures(matrix)));
  process.exit(1);
}

async function downloadWheels(
  ctx: ProjectContext,
  cache: WheelCache,
  matrix: BuildMatrixResult,
  signal: AbortSignal
): Promise<DownloadResult> {
  const { config } = ctx;
  const manager = new WheelDownloadManager(cache, config);
  manager.addToQueue(downloadRequestsFor(matrix.targets));

  const multibar = new cliProgress.MultiBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: ' {bar} | {filename} | {percentage}% | {speed}',
    },
    cliProgress.Presets.shades_classic
  );
  const overallBar = multibar.create(100, 0, { filename: '휠 다운로드', speed: 'N/A' });

  manager.on('progress', (_item, overall) => {
    overallBar.update(Math.round(overall.overallProgress), {
      filename: '휠 다운로드',
      speed: formatSpeed(overall.currentSpeed),
    });
  });
  manager.on('itemFailed', (item, error) => {
    multibar.log(chalk.red(`✗ ${item.wheel.filename}: ${error.message}\n`));
  });

  try {
    return await manager.startDownload({ signal });
  } finally {
    multibar.stop();
  }
}

/**
 * build 명령어 핸들러
 * 해결, 다운로드, 패킹 순으로 진행하며 한 타겟이라도 실패하면 종료 코드 1
 * 다운로드 실패와 무관한 그룹은 패킹한 뒤 종료
 */
export async function buildCommand(projectArg: string | undefined, options: BuildCommandOptions): Promise<void> {
  const ctx = await loadProjectContext(projectArg, options);
  const { project, config, files } = ctx;
  const cache = new WheelCache({
    cacheDir: config.cacheDir,
    maxSizeBytes: config.maxCacheSizeBytes,
    enabled: config.cacheEnabled,
  });
  await cache.initialize();
  const interrupt = createInterruptSignal();
  const startTime = Date.now();

  console.log(chalk.cyan(`${project.config.prettyName} ${project.config.version} 빌드 준비 중...`));

  try {
    const matrix = await resolveWithProgress(ctx, interrupt.signal);
    exitOnFailures(matrix);

    const download = await downloadWheels(ctx, cache, matrix, interrupt.signal);
    if (download.cancelled) {
      throw new BuildCancelledError('download');
    }
    if (!download.success) {
      console.error(chalk.red(`\n✗ 휠 다운로드 실패로 빌드할 수 없는 타겟: ${download.failedTargets.join(', ')}`));
      for (const item of download.items.filter((i) => i.status === 'failed')) {
        console.error(chalk.red(`  - ${item.wheel.filename}: ${item.error ?? 'unknown error'}`));
      }
    }

    const wheelPaths = new Map<string, string>();
    for (const item of download.items) {
      if (item.filePath) wheelPaths.set(item.wheel.hash, item.filePath);
    }

    const outputDir = path.resolve(options.output);
    const groups = groupTargets(matrix.targets);
    const packed: PackResult[] = [];
    const skipped: ExtensionGroup[] = [];
    for (const group of groups) {
      if (missingWheels(group, wheelPaths).length > 0) {
        skipped.push(group);
        continue;
      }
      packed.push(
        await packExtension({
          project,
          group,
          wheelPaths,
          outputDir,
          profile: config.profile,
          multipleGroups: groups.length > 1,
        })
      );
    }

    await fs.writeJson(
      path.join(files.projectCacheDir, LAST_BUILD_FILENAME),
      {
        builtAt: new Date().toISOString(),
        profile: config.profile,
        targets: matrix.targets.map((t) => t.target.key),
        archives: packed.map((p) => ({ path: p.archivePath, size: p.size, releases: p.group.releases })),
      },
      { spaces: 2 }
    );

    if (skipped.length > 0) {
      for (const group of skipped) {
        console.error(chalk.red(`✗ Blender ${group.releases.join(', ')}: 휠이 없어 패킹하지 않음`));
      }
      if (packed.length > 0) {
        console.log(chalk.yellow(`\n일부만 빌드됨: ${packed.map((p) => p.archivePath).join(', ')}`));
      }
      process.exit(1);
    }

    console.log(chalk.green('\n✓ 빌드 완료!'));
    for (const result of packed) {
      console.log(
        `  ${result.archivePath} ${chalk.gray(
          `(${formatBytes(result.size)}, Blender ${result.group.blenderVersionMin} ~ ${result.group.blenderVersionMax})`
        )}`
      );
    }
    console.log(chalk.gray(`  다운로드: ${formatBytes(download.totalSize)}, 소요 시간: ${formatDuration(Date.now() - startTime)}`));
    logger.info('빌드 완료', { archives: packed.map((p) => p.archivePath) });
  } finally {
    cache.release();
    interrupt.dispose();
  }
}
