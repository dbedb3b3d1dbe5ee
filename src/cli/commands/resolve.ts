import chalk from 'chalk';
import type { BuildMatrixResult } from '../../core/buildMatrix';
import { buildDependencyReport, isReportSortKey, renderDependencyReport, REPORT_SORT_KEYS } from '../../core/report';
import { ConfigError, formatError } from '../../core/errors';
import { createInterruptSignal, loadProjectContext, type ProjectCommandOptions } from '../context';
import { exitOnFailures, resolveWithProgress } from './build';

export interface ResolveCommandOptions extends ProjectCommandOptions {
  json?: boolean;
}

export interface DepsCommandOptions extends ProjectCommandOptions {
  sortBy: string;
}

/**
 * JSON 출력용 변환
 */
export function matrixToJson(matrix: BuildMatrixResult): Record<string, unknown> {
  return {
    targets: matrix.targets.map(({ target, dependencies }) => ({
      target: target.key,
      dependencies: dependencies.map((dep) => ({
        name: dep.name,
        version: dep.version,
        requiredBy: dep.requiredBy,
        wheels: dep.wheels.map((w) => ({ filename: w.wheel.filename, url: w.wheel.url, hash: w.wheel.hash })),
      })),
    })),
    failures: matrix.failures.map(({ target, errors }) => ({
      target: target.key,
      errors: errors.map(formatError),
    })),
    indexStats: matrix.indexStats,
  };
}

/**
 * resolve 명령어 핸들러
 */
export async function resolveCommand(projectArg: string | undefined, options: ResolveCommandOptions): Promise<void> {
  const ctx = await loadProjectContext(projectArg, options);
  const interrupt = createInterruptSignal();

  try {
    const matrix = await resolveWithProgress(ctx, interrupt.signal, { quiet: options.json });

    if (options.json) {
      console.log(JSON.stringify(matrixToJson(matrix), null, 2));
      if (matrix.failures.length > 0) process.exit(1);
      return;
    }

    for (const { target, dependencies } of matrix.targets) {
      console.log(chalk.bold(`\n${target.key}`));
      if (dependencies.length === 0) {
        console.log(chalk.gray('  (의존성 없음)'));
      }
      for (const dep of dependencies) {
        const files = dep.wheels.map((w) => w.wheel.filename).join(', ');
        console.log(`  ${chalk.green(`${dep.name}==${dep.version}`)} ${chalk.gray(files)}`);
      }
    }

    exitOnFailures(matrix);
    console.log(chalk.green(`\n✓ ${matrix.targets.length}개 타겟 해결 완료`));
  } finally {
    interrupt.dispose();
  }
}

/**
 * deps 명령어 핸들러
 */
export async function depsCommand(projectArg: string | undefined, options: DepsCommandOptions): Promise<void> {
  const sortBy = options.sortBy;
  if (!isReportSortKey(sortBy)) {
    throw new ConfigError(`--sort-by must be one of: ${REPORT_SORT_KEYS.join(', ')}`);
  }

  const ctx = await loadProjectContext(projectArg, options);
  const interrupt = createInterruptSignal();

  try {
    const matrix = await resolveWithProgress(ctx, interrupt.signal);
    exitOnFailures(matrix);

    console.log(renderDependencyReport(buildDependencyReport(matrix.targets, { sortBy })));
  } finally {
    interrupt.dispose();
  }
}
