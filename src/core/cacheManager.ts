/**
 * 휠 캐시
 * 내용 주소 기반 저장소: <cacheDir>/wheels/<hex[0:2]>/<hex>/<filename>
 * 임시 파일에 쓴 뒤 검증이 끝나면 rename 하므로 최종 경로에는 완전한 파일만 존재
 */

import fs from 'fs-extra';
import * as path from 'path';
import * as crypto from 'crypto';
import type { WheelDescriptor } from '../types';
import logger from '../utils/logger';
import { IntegrityError } from './errors';
import { hashHex } from './shared/pip-wheel';

export interface WheelCacheOptions {
  cacheDir: string;
  maxSizeBytes: number;
  /** false이면 캐시된 파일을 재사용하지 않음 */
  enabled?: boolean;
}

export interface CacheEntry {
  /** sha256 hex */
  hash: string;
  filename: string;
  name: string;
  version: string;
  filePath: string;
  size: number;
  cachedAt: string;
  lastAccessedAt: string;
}

interface CacheManifest {
  version: string;
  entries: Map<string, CacheEntry>;
  totalSize: number;
  lastUpdated: string;
}

interface CacheManifestJson {
  version: string;
  entries: CacheEntry[];
  totalSize: number;
  lastUpdated: string;
}

export interface CacheStats {
  enabled: boolean;
  cacheDir: string;
  totalSize: number;
  maxSize: number;
  entryCount: number;
  usagePercent: number;
}

/** 임시 파일 경로에 휠을 기록하는 함수 */
export type WheelProducer = (tempPath: string) => Promise<void>;

export interface EnsureResult {
  filePath: string;
  fromCache: boolean;
}

const MANIFEST_FILE = 'manifest.json';
const CACHE_VERSION = '1.0';

function isCacheEntry(value: unknown): value is CacheEntry {
  if (typeof value !== 'object' || value === null) return false;
  const entry: Record<string, unknown> = { ...value };
  return (
    typeof entry.hash === 'string' &&
    typeof entry.filename === 'string' &&
    typeof entry.filePath === 'string' &&
    typeof entry.size === 'number' &&
    typeof entry.lastAccessedAt === 'string'
  );
}

/**
 * 파일의 sha256 hex 계산
 */
export async function calculateChecksum(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath);

    stream.on('data', (data) => hash.update(data));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', reject);
  });
}

export class WheelCache {
  private readonly cacheDir: string;
  private readonly maxSizeBytes: number;
  private readonly enabled: boolean;
  private manifest: CacheManifest | null = null;
  /** hash -> 진행 중인 ensure */
  private inflight = new Map<string, Promise<EnsureResult>>();
  /** 이번 실행에서 경로를 넘겨준 해시 (release 전까지 LRU 제거 대상 아님) */
  private pinned = new Set<string>();
  private saveChain: Promise<void> = Promise.resolve();

  constructor(options: WheelCacheOptions) {
    this.cacheDir = options.cacheDir;
    this.maxSizeBytes = options.maxSizeBytes;
    this.enabled = options.enabled !== false;
  }

  /**
   * 캐시 초기화 (남은 임시 파일 정리)
   */
  async initialize(): Promise<void> {
    await fs.ensureDir(this.cacheDir);
    await fs.remove(this.tempDir());
    await this.loadManifest();
  }

  /**
   * 최종 저장 경로
   */
  getWheelPath(wheel: Pick<WheelDescriptor, 'hash' | 'filename'>): string {
    const hex = hashHex(wheel.hash);
    return path.join(this.wheelsDir(), hex.slice(0, 2), hex, wheel.filename);
  }

  /**
   * 캐시된 휠 경로 조회
   * 해시가 맞지 않으면 제거 후 null
   */
  async getCachedPath(wheel: WheelDescriptor): Promise<string | null> {
    if (!this.enabled) return null;
    const manifest = await this.ensureManifest();

    const hex = hashHex(wheel.hash);
    const entry = manifest.entries.get(hex);
    if (!entry) return null;

    if (!(await fs.pathExists(entry.filePath))) {
      await this.removeEntry(hex);
      return null;
    }

    const actual = await calculateChecksum(entry.filePath);
    if (actual !== hex) {
      logger.warn('캐시 파일 체크섬 불일치, 캐시에서 제거', { filename: entry.filename });
      await this.removeEntry(hex);
      return null;
    }

    // 마지막 접근 시간 업데이트 (LRU)
    entry.lastAccessedAt = new Date().toISOString();
    this.pinned.add(hex);
    await this.saveManifest();

    logger.debug('캐시 히트', { filename: entry.filename });
    return entry.filePath;
  }

  /**
   * 휠이 캐시에 있도록 보장
   * 같은 해시에 대한 동시 호출은 하나의 producer 실행을 공유
   * @throws IntegrityError producer가 기록한 파일의 해시가 다름
   */
  ensure(wheel: WheelDescriptor, producer: WheelProducer): Promise<EnsureResult> {
    const hex = hashHex(wheel.hash);
    const pending = this.inflight.get(hex);
    if (pending) return pending;

    const promise = this.store(wheel, producer).finally(() => {
      this.inflight.delete(hex);
    });
    this.inflight.set(hex, promise);
    return promise;
  }

  private async store(wheel: WheelDescriptor, producer: WheelProducer): Promise<EnsureResult> {
    const cached = await this.getCachedPath(wheel);
    if (cached) return { filePath: cached, fromCache: true };

    const hex = hashHex(wheel.hash);
    await fs.ensureDir(this.tempDir());
    const tempPath = path.join(this.tempDir(), `${hex}-${crypto.randomBytes(4).toString('hex')}.part`);

    try {
      await producer(tempPath);

      const actual = await calculateChecksum(tempPath);
      if (actual !== hex) {
        throw new IntegrityError(wheel.filename, wheel.hash, `sha256:${actual}`);
      }

      const { size } = await fs.stat(tempPath);
      await this.ensureCacheSpace(size);

      const filePath = this.getWheelPath(wheel);
      await fs.ensureDir(path.dirname(filePath));
      await fs.move(tempPath, filePath, { overwrite: true });

      this.pinned.add(hex);
      await this.addEntry({
        hash: hex,
        filename: wheel.filename,
        name: wheel.name,
        version: wheel.version,
        filePath,
        size,
        cachedAt: new Date().toISOString(),
        lastAccessedAt: new Date().toISOString(),
      });

      logger.info('캐시에 추가', { filename: wheel.filename, size });
      return { filePath, fromCache: false };
    } finally {
      await fs.remove(tempPath);
    }
  }

  /**
   * 넘겨준 경로의 사용이 끝났음을 알림
   * 이후로는 해당 휠도 LRU 제거 대상이 됨
   */
  release(): void {
    this.pinned.clear();
  }

  /**
   * 휠 캐시 전체 삭제
   */
  async clearCache(): Promise<void> {
    // 같은 디렉토리의 프로젝트, git 캐시는 유지
    await fs.remove(this.wheelsDir());
    await fs.remove(this.tempDir());
    this.manifest = this.createEmptyManifest();
    this.pinned.clear();
    await this.saveManifest();
    logger.info('캐시 전체 삭제 완료');
  }

  /**
   * 캐시 목록 조회 (최근 사용 순)
   */
  async getCacheEntries(): Promise<CacheEntry[]> {
    const manifest = await this.ensureManifest();
    return [...manifest.entries.values()].sort((a, b) => b.lastAccessedAt.localeCompare(a.lastAccessedAt));
  }

  /**
   * 캐시 통계 조회
   */
  async getStats(): Promise<CacheStats> {
    const manifest = await this.ensureManifest();
    return {
      enabled: this.enabled,
      cacheDir: this.cacheDir,
      totalSize: manifest.totalSize,
      maxSize: this.maxSizeBytes,
      entryCount: manifest.entries.size,
      usagePercent: this.maxSizeBytes > 0 ? (manifest.totalSize / this.maxSizeBytes) * 100 : 0,
    };
  }

  private wheelsDir(): string {
    return path.join(this.cacheDir, 'wheels');
  }

  private tempDir(): string {
    return path.join(this.cacheDir, 'tmp');
  }

  private async addEntry(entry: CacheEntry): Promise<void> {
    const manifest = await this.ensureManifest();
    const previous = manifest.entries.get(entry.hash);
    if (previous) manifest.totalSize -= previous.size;
    manifest.entries.set(entry.hash, entry);
    manifest.totalSize += entry.size;
    await this.saveManifest();
  }

  private async removeEntry(hex: string): Promise<void> {
    const manifest = await this.ensureManifest();
    const entry = manifest.entries.get(hex);
    if (!entry) return;

    await fs.remove(path.dirname(entry.filePath));
    manifest.totalSize -= entry.size;
    manifest.entries.delete(hex);
    await this.saveManifest();
  }

  /**
   * 캐시 공간 확보 (LRU 정책)
   */
  private async ensureCacheSpace(requiredSize: number): Promise<void> {
    const manifest = await this.ensureManifest();
    const targetSize = this.maxSizeBytes - requiredSize;
    if (manifest.totalSize <= targetSize) return;

    const entries = [...manifest.entries.values()].sort((a, b) =>
      a.lastAccessedAt.localeCompare(b.lastAccessedAt)
    );

    for (const entry of entries) {
      if (manifest.totalSize <= targetSize) break;
      if (this.inflight.has(entry.hash) || this.pinned.has(entry.hash)) continue;
      logger.info('LRU 정책에 의해 캐시 삭제', { filename: entry.filename });
      await this.removeEntry(entry.hash);
    }
  }

  private async loadManifest(): Promise<CacheManifest> {
    const manifestPath = path.join(this.cacheDir, MANIFEST_FILE);
    let manifest = this.createEmptyManifest();

    if (await fs.pathExists(manifestPath)) {
      try {
        const data: unknown = await fs.readJson(manifestPath);
        manifest = this.parseManifest(data);
      } catch (err) {
        logger.warn('캐시 매니페스트 로드 실패, 새로 생성', { error: String(err) });
      }
    }

    this.manifest = manifest;
    return manifest;
  }

  private parseManifest(data: unknown): CacheManifest {
    const manifest = this.createEmptyManifest();
    if (typeof data !== 'object' || data === null || !('entries' in data) || !Array.isArray(data.entries)) {
      return manifest;
    }
    for (const entry of data.entries) {
      if (!isCacheEntry(entry)) continue;
      manifest.entries.set(entry.hash, entry);
      manifest.totalSize += entry.size;
    }
    return manifest;
  }

  /**
   * 매니페스트 저장 (순차 실행, 임시 파일 후 rename)
   */
  private saveManifest(): Promise<void> {
    const manifest = this.manifest;
    if (!manifest) return Promise.resolve();

    const write = async (): Promise<void> => {
      manifest.lastUpdated = new Date().toISOString();
      const data: CacheManifestJson = {
        version: manifest.version,
        entries: [...manifest.entries.values()],
        totalSize: manifest.totalSize,
        lastUpdated: manifest.lastUpdated,
      };
      const manifestPath = path.join(this.cacheDir, MANIFEST_FILE);
      await fs.ensureDir(this.cacheDir);
      await fs.writeJson(`${manifestPath}.tmp`, data, { spaces: 2 });
      await fs.move(`${manifestPath}.tmp`, manifestPath, { overwrite: true });
    };

    this.saveChain = this.saveChain.then(write, write);
    return this.saveChain;
  }

  private createEmptyManifest(): CacheManifest {
    return {
      version: CACHE_VERSION,
      entries: new Map(),
      totalSize: 0,
      lastUpdated: new Date().toISOString(),
    };
  }

  private async ensureManifest(): Promise<CacheManifest> {
    return this.manifest ?? this.loadManifest();
  }
}
