import chalk from 'chalk';
import Table from 'cli-table3';
import * as readline from 'readline';
import { getConfigManager, type Config } from '../../core/config';
import { WheelCache } from '../../core/cacheManager';
import { formatBytes } from '../../utils/format';
import { initializeCli } from '../context';

async function openCache(settings: Config): Promise<WheelCache> {
  const cache = new WheelCache({
    cacheDir: getConfigManager().getCacheDir(settings),
    maxSizeBytes: settings.maxCacheSizeGB * 1024 * 1024 * 1024,
    enabled: settings.cacheEnabled,
  });
  await cache.initialize();
  return cache;
}

/**
 * 캐시 크기 확인
 */
export async function cacheSize(): Promise<void> {
  const cache = await openCache(await initializeCli());
  const stats = await cache.getStats();

  console.log(chalk.cyan('\n캐시 정보:'));
  console.log(`  경로: ${stats.cacheDir}`);
  console.log(`  사용: ${stats.enabled ? '예' : chalk.yellow('아니오')}`);
  console.log(`  휠: ${stats.entryCount}개`);
  console.log(`  크기: ${formatBytes(stats.totalSize)}`);
  console.log(`  최대 크기: ${formatBytes(stats.maxSize)}`);
  console.log(`  사용률: ${stats.usagePercent.toFixed(1)}%`);
}

/**
 * 캐시 삭제
 */
export async function cacheClear(options: { force?: boolean }): Promise<void> {
  const cache = await openCache(await initializeCli());
  const stats = await cache.getStats();

  if (stats.entryCount === 0) {
    console.log(chalk.yellow('삭제할 캐시가 없습니다'));
    return;
  }

  if (!options.force) {
    const confirm = await askConfirmation(`휠 ${stats.entryCount}개를 삭제하시겠습니까?`);
    if (!confirm) {
      console.log(chalk.yellow('캐시 삭제가 취소되었습니다'));
      return;
    }
  }

  await cache.clearCache();
  console.log(chalk.green(`✓ 캐시가 삭제되었습니다 (${formatBytes(stats.totalSize)} 확보)`));
}

/**
 * 캐시된 휠 목록
 */
export async function cacheList(): Promise<void> {
  const cache = await openCache(await initializeCli());
  const entries = await cache.getCacheEntries();

  if (entries.length === 0) {
    console.log(chalk.yellow('캐시된 휠이 없습니다'));
    return;
  }

  const table = new Table({
    head: [chalk.cyan('패키지'), chalk.cyan('버전'), chalk.cyan('파일'), chalk.cyan('크기'), chalk.cyan('최근 사용')],
  });

  for (const entry of entries) {
    table.push([
      entry.name,
      entry.version,
      entry.filename,
      formatBytes(entry.size),
      new Date(entry.lastAccessedAt).toLocaleString('ko-KR'),
    ]);
  }

  console.log(chalk.cyan('\n캐시된 휠 목록:\n'));
  console.log(table.toString());
  console.log(chalk.gray(`\n총 ${entries.length}개 휠`));
}

/**
 * 확인 프롬프트
 */
async function askConfirmation(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(`${question} (y/N) `, (answer) => {
      rl.close();
      resolve(answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes');
    });
  });
}
