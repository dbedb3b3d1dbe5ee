import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { ConfigManager, createBuildConfig, getConfigManager, getDefaultConfig, isConfigKey } from './config';
import { ConfigError } from './errors';

describe('config', () => {
  let baseDir: string;
  let manager: ConfigManager;

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'blpack-config-'));
    manager = new ConfigManager(baseDir);
  });

  afterEach(async () => {
    await fs.remove(baseDir);
  });

  describe('ConfigManager', () => {
    it('싱글톤 인스턴스 반환', () => {
      expect(getConfigManager()).toBe(getConfigManager());
    });

    it('설정 파일이 없으면 기본값 생성', async () => {
      const config = await manager.loadConfig();
      expect(config).toEqual(getDefaultConfig());
      expect(await fs.pathExists(path.join(baseDir, 'settings.json'))).toBe(true);
      expect(await fs.pathExists(path.join(baseDir, 'logs'))).toBe(true);
    });

    it('저장된 값과 기본값 병합, 잘못된 타입은 무시', async () => {
      await fs.writeJson(path.join(baseDir, 'settings.json'), {
        concurrentDownloads: 8,
        logLevel: 'verbose',
        unknownKey: 1,
      });
      const config = await manager.loadConfig();
      expect(config.concurrentDownloads).toBe(8);
      expect(config.logLevel).toBe('info');
      expect(Object.keys(config)).not.toContain('unknownKey');
    });

    it('CLI 문자열 값 변환 후 저장', () => {
      expect(manager.set('maxRetries', '5')).toBe(true);
      expect(manager.set('cacheEnabled', 'false')).toBe(true);
      expect(manager.getConfig().maxRetries).toBe(5);
      expect(manager.getConfig().cacheEnabled).toBe(false);
    });

    it('잘못된 값은 저장하지 않음', () => {
      expect(manager.set('maxRetries', 'many')).toBe(false);
      expect(manager.set('logLevel', 'loud')).toBe(false);
      expect(manager.getConfig().maxRetries).toBe(3);
    });

    it('초기화', async () => {
      await manager.updateConfig({ indexUrl: 'http://index.test' });
      manager.reset();
      expect(manager.getConfig().indexUrl).toBe('https://pypi.org');
    });

    it('cachePath 설정이 기본 캐시 경로보다 우선', () => {
      expect(manager.getCacheDir()).toBe(path.join(baseDir, 'cache'));
      expect(manager.getCacheDir({ ...getDefaultConfig(), cachePath: '/tmp/wheels' })).toBe('/tmp/wheels');
    });

    it('설정 키 판별', () => {
      expect(isConfigKey('indexUrl')).toBe(true);
      expect(isConfigKey('smtpHost')).toBe(false);
    });
  });

  describe('createBuildConfig', () => {
    it('범위 내 Blender 버전과 기본 플랫폼', () => {
      const config = createBuildConfig(
        getDefaultConfig(),
        { blenderVersionMin: '4.3.0', blenderVersionMax: '4.4.0' },
        {},
        '/cache'
      );
      expect(config.blenderVersions).toEqual(['4.3.0', '4.3.1', '4.3.2']);
      expect(config.platforms).toHaveLength(6);
      expect(config.cacheDir).toBe('/cache');
      expect(config.maxCacheSizeBytes).toBe(10 * 1024 * 1024 * 1024);
      expect(config.profile).toBe('release');
    });

    it('CLI 값이 프로젝트 설정보다 우선', () => {
      const config = createBuildConfig(
        getDefaultConfig(),
        { blenderVersionMin: '4.2.0', platforms: ['linux-x64'] },
        { blenderVersions: ['4.4.0'], platforms: ['windows-x64'], concurrency: 0, profile: 'dev' },
        '/cache'
      );
      expect(config.blenderVersions).toEqual(['4.4.0']);
      expect(config.platforms).toEqual(['windows-x64']);
      expect(config.concurrency).toBe(1);
      expect(config.profile).toBe('dev');
    });

    it('CLI Blender 버전은 중복 제거 후 오름차순', () => {
      const config = createBuildConfig(
        getDefaultConfig(),
        { blenderVersionMin: '4.2.0' },
        { blenderVersions: ['4.3.0', '4.2.0', '4.2', '4.3.0'] },
        '/cache'
      );
      expect(config.blenderVersions).toEqual(['4.2.0', '4.3.0']);
    });

    it('생성된 설정은 불변', () => {
      const config = createBuildConfig(getDefaultConfig(), { blenderVersionMin: '4.4.0' }, {}, '/cache');
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.platforms)).toBe(true);
    });

    it('알 수 없는 Blender 버전은 에러', () => {
      expect(() =>
        createBuildConfig(getDefaultConfig(), { blenderVersionMin: '4.2.0' }, { blenderVersions: ['2.79'] }, '/c')
      ).toThrow(ConfigError);
    });
  });
});
