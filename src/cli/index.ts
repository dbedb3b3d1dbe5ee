#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { withErrorHandling } from '../core/errors';
import { RELEASE_PROFILES } from '../types';
import { REPORT_SORT_KEYS } from '../core/report';
import type { ProjectCommandOptions } from './context';
import type { BuildCommandOptions } from './commands/build';
import type { DepsCommandOptions, ResolveCommandOptions } from './commands/resolve';
import type { ShowManifestOptions } from './commands/show';

// 버전 정보
const VERSION = '0.3.0';

const PROJECT_ARGUMENT = '프로젝트 경로, 스크립트, URL, git+ 저장소 또는 패킹된 zip (기본: 현재 디렉토리)';

/**
 * 프로젝트를 다루는 명령어 공통 옵션
 */
function withProjectOptions(command: Command): Command {
  return command
    .argument('[project]', PROJECT_ARGUMENT)
    .option('--platform <platform...>', '빌드할 플랫폼 (예: linux-x64 windows-x64)')
    .option('--blender <version...>', '빌드할 Blender 버전 (예: 4.2.0 4.3.0)')
    .option('--concurrency <num>', '동시 실행 수');
}

// 메인 프로그램
const program = new Command();

program
  .name('blpack')
  .description(chalk.cyan('blpack - 파이썬 휠을 포함한 Blender 확장 빌드 도구'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시');

// build 명령어
withProjectOptions(program.command('build').description('의존성 해결, 휠 다운로드 후 확장 zip 생성'))
  .option('-o, --output <path>', '출력 경로', 'dist')
  .option('--profile <name>', `릴리스 프로필 (${RELEASE_PROFILES.join(', ')})`)
  .action(
    withErrorHandling(async (project: string | undefined, options: BuildCommandOptions) => {
      const { buildCommand } = await import('./commands/build');
      await buildCommand(project, options);
    })
  );

// resolve 명령어
withProjectOptions(program.command('resolve').description('타겟별 의존성 해결 결과 출력'))
  .option('--json', 'JSON으로 출력')
  .action(
    withErrorHandling(async (project: string | undefined, options: ResolveCommandOptions) => {
      const { resolveCommand } = await import('./commands/resolve');
      await resolveCommand(project, options);
    })
  );

// deps 명령어
withProjectOptions(program.command('deps').description('번들될 휠 목록과 크기 출력'))
  .option('--sort-by <key>', `정렬 기준 (${REPORT_SORT_KEYS.join(', ')})`, 'filename')
  .action(
    withErrorHandling(async (project: string | undefined, options: DepsCommandOptions) => {
      const { depsCommand } = await import('./commands/resolve');
      await depsCommand(project, options);
    })
  );

// show 명령어
program
  .command('show')
  .description('정보 출력')
  .addCommand(
    new Command('blender')
      .description('지원하는 Blender 릴리스 정보')
      .argument('[version]', 'Blender 버전')
      .option('--json', 'JSON으로 출력')
      .action(
        withErrorHandling(async (version: string | undefined, options: { json?: boolean }) => {
          const { showBlender } = await import('./commands/show');
          await showBlender(version, options);
        })
      )
  )
  .addCommand(
    withProjectOptions(new Command('manifest').description('blender_manifest.toml 출력'))
      .option('--resolve', '의존성을 해결해 휠 목록까지 포함')
      .action(
        withErrorHandling(async (project: string | undefined, options: ShowManifestOptions) => {
          const { showManifest } = await import('./commands/show');
          await showManifest(project, options);
        })
      )
  )
  .addCommand(
    withProjectOptions(new Command('config').description('파싱된 프로젝트 설정과 빌드 설정')).action(
      withErrorHandling(async (project: string | undefined, options: ProjectCommandOptions) => {
        const { showConfig } = await import('./commands/show');
        await showConfig(project, options);
      })
    )
  );

// cache 명령어
program
  .command('cache')
  .description('휠 캐시 관리')
  .addCommand(
    new Command('size').description('캐시 크기 확인').action(
      withErrorHandling(async () => {
        const { cacheSize } = await import('./commands/cache');
        await cacheSize();
      })
    )
  )
  .addCommand(
    new Command('clear')
      .description('캐시 삭제')
      .option('-f, --force', '확인 없이 삭제')
      .action(
        withErrorHandling(async (options: { force?: boolean }) => {
          const { cacheClear } = await import('./commands/cache');
          await cacheClear(options);
        })
      )
  )
  .addCommand(
    new Command('list').description('캐시된 휠 목록').action(
      withErrorHandling(async () => {
        const { cacheList } = await import('./commands/cache');
        await cacheList();
      })
    )
  );

// config 명령어
program
  .command('config')
  .description('전역 설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(
        withErrorHandling(async (key: string | undefined) => {
          const { configGet } = await import('./commands/config');
          await configGet(key);
        })
      )
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(
        withErrorHandling(async (key: string, value: string) => {
          const { configSet } = await import('./commands/config');
          await configSet(key, value);
        })
      )
  )
  .addCommand(
    new Command('list').description('모든 설정 표시').action(
      withErrorHandling(async () => {
        const { configList } = await import('./commands/config');
        await configList();
      })
    )
  )
  .addCommand(
    new Command('reset').description('설정 초기화').action(
      withErrorHandling(async () => {
        const { configReset } = await import('./commands/config');
        await configReset();
      })
    )
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

// 명령어가 없으면 도움말 표시
if (process.argv.length <= 2) {
  console.log(chalk.cyan('\n  blpack - 파이썬 휠을 포함한 Blender 확장 빌드 도구\n'));
  console.log('  사용법: blpack <명령어> [옵션]\n');
  console.log('  명령어:');
  console.log('    build       확장 zip 생성');
  console.log('    resolve     의존성 해결 결과 출력');
  console.log('    deps        번들될 휠 목록');
  console.log('    show        Blender 릴리스, 매니페스트, 프로젝트 설정 출력');
  console.log('    cache       휠 캐시 관리');
  console.log('    config      전역 설정 관리');
  console.log('\n  예시:');
  console.log(chalk.gray('    blpack build'));
  console.log(chalk.gray('    blpack build ./my_addon --platform linux-x64 --blender 4.2.0'));
  console.log(chalk.gray('    blpack deps tool.py --sort-by size'));
  console.log(chalk.gray('    blpack show blender 4.2.0'));
  console.log('\n  자세한 내용: blpack --help\n');
} else {
  await program.parseAsync(process.argv);
}
