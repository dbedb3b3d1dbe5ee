import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager, isConfigKey, type ConfigKey } from '../../core/config';
import { ConfigError } from '../../core/errors';

const DESCRIPTIONS: Record<ConfigKey, string> = {
  concurrentDownloads: '동시 다운로드 및 해결 수',
  maxRetries: '다운로드 재시도 횟수',
  retryDelayMs: '재시도 기본 대기 시간 (ms)',
  requestTimeoutMs: '요청 타임아웃 (ms)',
  cacheEnabled: '휠 캐시 재사용 여부',
  cachePath: '캐시 경로 (비어 있으면 기본 경로)',
  maxCacheSizeGB: '최대 캐시 크기 (GB)',
  indexUrl: '패키지 인덱스 URL',
  allowPrereleases: '프리릴리스 허용 여부',
  logLevel: '로그 레벨 (error, warn, info, debug)',
};

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new ConfigError(`Unknown setting '${key}'. Use one of: ${Object.keys(DESCRIPTIONS).join(', ')}`, {
      key,
    });
  }
  return key;
}

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const config = getConfigManager().getConfig();

  if (key) {
    const name = requireKey(key);
    console.log(chalk.cyan(`${name}: `) + chalk.white(JSON.stringify(config[name])));
  } else {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(config, null, 2));
  }
}

/**
 * 설정값 변경
 * @throws ConfigError 알 수 없는 키이거나 값의 타입이 맞지 않음
 */
export async function configSet(key: string, value: string): Promise<void> {
  const name = requireKey(key);
  const configManager = getConfigManager();

  if (!configManager.set(name, value)) {
    throw new ConfigError(`Invalid value for ${name}: '${value}'`, { key: name, value });
  }
  console.log(chalk.green(`✓ 설정이 저장되었습니다: ${name} = ${JSON.stringify(configManager.getConfig()[name])}`));
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const config = getConfigManager().getConfig();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
  });

  for (const [key, description] of Object.entries(DESCRIPTIONS)) {
    const value = isConfigKey(key) ? config[key] : undefined;
    table.push([key, value === '' ? chalk.gray('(기본값)') : String(value), description]);
  }

  console.log(chalk.cyan('\n설정 목록:\n'));
  console.log(table.toString());
  console.log(chalk.gray(`\n설정 파일: ${getConfigManager().getConfigDir()}`));
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  getConfigManager().reset();
  console.log(chalk.green('✓ 설정이 초기화되었습니다'));
}
