import chalk from 'chalk';
import Table from 'cli-table3';
import type { BlenderRelease } from '../../types';
import { getBlenderRelease, listBlenderReleases, blenderDownloadUrl } from '../../core/blender/releases';
import { formatOsVersion } from '../../core/shared/pip-tags';
import { formatRequirement } from '../../core/shared/pip-requirement';
import { buildManifest, renderManifest, validateManifest } from '../../core/packager/manifest';
import { groupTargets, readPackedManifest } from '../../core/packager/extensionPackager';
import {
  createInterruptSignal,
  createProjectContext,
  initializeCli,
  loadProjectContext,
  locateProject,
  type ProjectCommandOptions,
} from '../context';
import { exitOnFailures, resolveWithProgress } from './build';

export interface ShowManifestOptions extends ProjectCommandOptions {
  resolve?: boolean;
}

function releaseToJson(release: BlenderRelease): Record<string, unknown> {
  return {
    version: release.version,
    releasedAt: release.releasedAt,
    pythonVersion: release.pythonVersion,
    minGlibcVersion: formatOsVersion(release.minGlibcVersion),
    minMacosVersion: formatOsVersion(release.minMacosVersion),
    platforms: release.platforms,
    manifestVersions: release.manifestVersions,
    referencePackages: Object.fromEntries([...release.referencePackages.values()].map((p) => [p.name, p.version])),
  };
}

/**
 * Blender 레퍼런스 테이블 출력
 */
export async function showBlender(version: string | undefined, options: { json?: boolean }): Promise<void> {
  await initializeCli();

  if (!version) {
    const releases = listBlenderReleases();
    if (options.json) {
      console.log(JSON.stringify(releases.map(releaseToJson), null, 2));
      return;
    }

    const table = new Table({
      head: ['Blender', 'Python', 'glibc', 'macOS', '플랫폼', '출시일'].map((h) => chalk.cyan(h)),
    });
    for (const release of releases) {
      table.push([
        release.version,
        release.pythonVersion,
        formatOsVersion(release.minGlibcVersion),
        formatOsVersion(release.minMacosVersion),
        release.platforms.join(', '),
        release.releasedAt,
      ]);
    }
    console.log(table.toString());
    return;
  }

  const release = getBlenderRelease(version);
  if (options.json) {
    console.log(JSON.stringify(releaseToJson(release), null, 2));
    return;
  }

  console.log(chalk.cyan(`\nBlender ${release.version}`) + chalk.gray(` (${release.releasedAt})`));
  console.log(`  Python: ${release.pythonVersion}`);
  console.log(`  최소 glibc: ${formatOsVersion(release.minGlibcVersion)}`);
  console.log(`  최소 macOS: ${formatOsVersion(release.minMacosVersion)}`);
  console.log(`  매니페스트 스키마: ${release.manifestVersions.join(', ')}`);

  const platforms = new Table({ head: ['플랫폼', '다운로드'].map((h) => chalk.cyan(h)) });
  for (const platform of release.platforms) {
    platforms.push([platform, blenderDownloadUrl(release, platform)]);
  }
  console.log(platforms.toString());

  const packages = new Table({ head: ['번들 패키지', '버전'].map((h) => chalk.cyan(h)) });
  for (const pin of [...release.referencePackages.values()].sort((a, b) => a.name.localeCompare(b.name))) {
    packages.push([pin.name, pin.version]);
  }
  console.log(packages.toString());
}

/**
 * blender_manifest.toml 출력
 * 패킹된 zip이면 그 안의 매니페스트, 아니면 프로젝트 설정으로 생성
 */
export async function showManifest(projectArg: string | undefined, options: ShowManifestOptions): Promise<void> {
  const settings = await initializeCli();
  const files = await locateProject(projectArg, settings);
  if (files.kind === 'packed') {
    process.stdout.write(readPackedManifest(files.archivePath));
    return;
  }

  const ctx = await createProjectContext(settings, files, options);
  const { project, config } = ctx;

  if (!options.resolve) {
    const first = getBlenderRelease(config.blenderVersions[0]);
    const manifest = buildManifest(project.config, {
      blenderVersionMin: project.config.blenderVersionMin,
      blenderVersionMax: project.config.blenderVersionMax,
      platforms: config.platforms,
      wheels: [],
    });
    validateManifest(manifest, first.validTags);
    process.stdout.write(renderManifest(manifest));
    return;
  }

  const interrupt = createInterruptSignal();
  try {
    const matrix = await resolveWithProgress(ctx, interrupt.signal, { quiet: true });
    exitOnFailures(matrix);

    for (const group of groupTargets(matrix.targets)) {
      const manifest = buildManifest(project.config, group);
      validateManifest(manifest, group.validTags);
      console.log(chalk.gray(`# Blender ${group.releases.join(', ')}`));
      process.stdout.write(renderManifest(manifest));
    }
  } finally {
    interrupt.dispose();
  }
}

/**
 * 파싱된 프로젝트 설정과 빌드 설정 출력
 */
export async function showConfig(projectArg: string | undefined, options: ProjectCommandOptions): Promise<void> {
  const { project, config, files } = await loadProjectContext(projectArg, options);

  console.log(
    JSON.stringify(
      {
        specPath: files.specPath,
        sourcePath: project.sourcePath,
        projectCacheDir: files.projectCacheDir,
        project: project.config,
        dependencies: project.dependencies.map((d) =>
          d.blenderSeries ? `${formatRequirement(d)} (Blender ${d.blenderSeries})` : formatRequirement(d)
        ),
        build: config,
      },
      null,
      2
    )
  );
}
