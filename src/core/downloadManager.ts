import PQueue from 'p-queue';
import { EventEmitter } from 'eventemitter3';
import * as path from 'path';
import fs from 'fs-extra';
import type { WheelDescriptor } from '../types';
import logger from '../utils/logger';
import type { TargetResolution } from './buildMatrix';
import type { BuildConfig } from './config';
import type { WheelCache } from './cacheManager';
import { BuildCancelledError, DownloadError } from './errors';
import { HttpWheelFetcher, type WheelFetcher, type WheelFetchProgress } from './shared/pip-fetcher';
import { hashHex } from './shared/pip-wheel';

// 다운로드 아이템 상태
export type DownloadItemStatus =
  | 'pending'
  | 'downloading'
  | 'completed'
  | 'cached'
  | 'failed'
  | 'cancelled';

// 다운로드 요청 (targets: 이 휠이 필요한 타겟 키)
export interface DownloadRequest {
  wheel: WheelDescriptor;
  targets: readonly string[];
}

// 다운로드 아이템 (휠 해시 하나당 하나)
export interface DownloadItem {
  id: string;
  wheel: WheelDescriptor;
  targets: string[];
  status: DownloadItemStatus;
  progress: number;
  downloadedBytes: number;
  totalBytes: number;
  filePath?: string;
  error?: string;
  retryCount: number;
}

// 다운로드 결과
export interface DownloadResult {
  success: boolean;
  cancelled: boolean;
  items: DownloadItem[];
  totalSize: number;
  duration: number;
  outputPath?: string;
  /** 실패한 휠이 필요했던 타겟 */
  failedTargets: string[];
}

// 다운로드 옵션
export interface DownloadOptions {
  /** 지정하면 완료된 휠을 복사 */
  outputPath?: string;
  signal?: AbortSignal;
}

export type WheelDownloadManagerOptions = Pick<
  BuildConfig,
  'concurrency' | 'maxRetries' | 'retryDelayMs' | 'requestTimeoutMs'
> & {
  fetcher?: WheelFetcher;
};

// 이벤트 타입
export interface DownloadManagerEvents {
  progress: (item: DownloadItem, overall: OverallProgress) => void;
  itemStart: (item: DownloadItem) => void;
  itemComplete: (item: DownloadItem) => void;
  itemFailed: (item: DownloadItem, error: Error) => void;
  cacheHit: (item: DownloadItem) => void;
  allComplete: (result: DownloadResult) => void;
  cancelled: () => void;
}

// 전체 진행률
export interface OverallProgress {
  totalItems: number;
  completedItems: number;
  cachedItems: number;
  failedItems: number;
  totalBytes: number;
  downloadedBytes: number;
  overallProgress: number;
  currentSpeed: number;
}

/**
 * 타겟별 선택 휠을 다운로드 요청으로 변환
 */
export function downloadRequestsFor(targets: readonly TargetResolution[]): DownloadRequest[] {
  return targets.flatMap(({ target, dependencies }) =>
    dependencies.flatMap((dep) => dep.wheels.map(({ wheel }) => ({ wheel, targets: [target.key] })))
  );
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * 취소되면 즉시 끝나는 대기
 */
function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}

export class WheelDownloadManager extends EventEmitter<DownloadManagerEvents> {
  private items: Map<string, DownloadItem> = new Map();
  private readonly fetcher: WheelFetcher;
  private controller: AbortController | null = null;
  private isRunning = false;
  private isCancelled = false;
  private startTime = 0;
  private fetchedBytes = 0;

  constructor(
    private readonly cache: WheelCache,
    private readonly options: WheelDownloadManagerOptions
  ) {
    super();
    this.fetcher = options.fetcher ?? new HttpWheelFetcher({ timeoutMs: options.requestTimeoutMs });
  }

  /**
   * 다운로드 큐에 휠 추가
   * 같은 해시의 휠은 하나로 합치고 타겟만 병합
   */
  addToQueue(requests: readonly DownloadRequest[]): void {
    for (const { wheel, targets } of requests) {
      const id = hashHex(wheel.hash);
      const existing = this.items.get(id);
      if (existing) {
        for (const target of targets) {
          if (!existing.targets.includes(target)) existing.targets.push(target);
        }
        continue;
      }

      this.items.set(id, {
        id,
        wheel,
        targets: [...targets],
        status: 'pending',
        progress: 0,
        downloadedBytes: 0,
        totalBytes: wheel.size,
        retryCount: 0,
      });
    }

    logger.info('다운로드 큐에 휠 추가', { requested: requests.length, unique: this.items.size });
  }

  /**
   * 다운로드 시작
   */
  async startDownload(options: DownloadOptions = {}): Promise<DownloadResult> {
    if (this.isRunning) {
      throw new Error('다운로드가 이미 진행 중입니다');
    }

    const queue = new PQueue({ concurrency: this.options.concurrency });
    const controller = new AbortController();
    const onAbort = (): void => this.cancelDownload();

    this.controller = controller;
    this.isRunning = true;
    this.isCancelled = false;
    this.startTime = Date.now();
    this.fetchedBytes = 0;

    if (options.signal?.aborted) {
      this.cancelDownload();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    if (options.outputPath) {
      await fs.ensureDir(options.outputPath);
    }

    logger.info('다운로드 시작', {
      itemCount: this.items.size,
      outputPath: options.outputPath,
      concurrency: this.options.concurrency,
    });

    const downloads: Promise<void>[] = [];
    for (const item of this.items.values()) {
      if (item.status !== 'pending') continue;
      downloads.push(
        queue.add(async () => {
          // 취소 후 대기열에 남은 작업은 실행하지 않음
          if (controller.signal.aborted) return;
          await this.downloadItem(item, controller.signal, options.outputPath);
        })
      );
    }

    try {
      await Promise.all(downloads);
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
      this.isRunning = false;
      this.controller = null;
    }

    const result = this.createResult(options.outputPath);
    if (this.isCancelled) {
      this.emit('cancelled');
    } else {
      this.emit('allComplete', result);
    }

    logger.info('다운로드 완료', {
      success: result.success,
      totalSize: result.totalSize,
      duration: result.duration,
      failedTargets: result.failedTargets,
    });

    return result;
  }

  /**
   * 단일 휠 다운로드 (캐시 우선)
   */
  private async downloadItem(item: DownloadItem, signal: AbortSignal, outputPath?: string): Promise<void> {
    try {
      const cached = await this.cache.getCachedPath(item.wheel);
      if (cached) {
        item.status = 'cached';
        this.finishItem(item, cached);
        this.emit('cacheHit', item);
      } else {
        item.status = 'downloading';
        this.emit('itemStart', item);
        const filePath = await this.fetchWithRetry(item, signal);
        item.status = 'completed';
        this.finishItem(item, filePath);
        this.emit('itemComplete', item);
        logger.info('휠 다운로드 완료', { filename: item.wheel.filename, retryCount: item.retryCount });
      }

      if (outputPath && item.filePath) {
        await fs.copy(item.filePath, path.join(outputPath, item.wheel.filename), { overwrite: true });
      }
    } catch (error) {
      if (signal.aborted || error instanceof BuildCancelledError) {
        item.status = 'cancelled';
        return;
      }
      const err = toError(error);
      item.status = 'failed';
      item.error = err.message;
      logger.error('휠 다운로드 실패', { filename: item.wheel.filename, targets: item.targets, error: err.message });
      this.emit('itemFailed', item, err);
    }
  }

  /**
   * DownloadError만 지수 백오프로 재시도 (무결성 에러는 즉시 실패)
   */
  private async fetchWithRetry(item: DownloadItem, signal: AbortSignal): Promise<string> {
    for (;;) {
      try {
        const { filePath } = await this.cache.ensure(item.wheel, (tempPath) =>
          this.fetcher.fetch(item.wheel, tempPath, {
            signal,
            onProgress: (progress) => this.updateItemProgress(item, progress),
          })
        );
        return filePath;
      } catch (error) {
        if (!(error instanceof DownloadError) || item.retryCount >= this.options.maxRetries || signal.aborted) {
          throw error;
        }

        item.retryCount++;
        item.progress = 0;
        item.downloadedBytes = 0;
        const wait = this.options.retryDelayMs * 2 ** (item.retryCount - 1);
        logger.warn('휠 다운로드 재시도', {
          filename: item.wheel.filename,
          retryCount: item.retryCount,
          delayMs: wait,
          error: error.message,
        });
        await delay(wait, signal);
        if (signal.aborted) throw new BuildCancelledError('download');
      }
    }
  }

  private finishItem(item: DownloadItem, filePath: string): void {
    item.filePath = filePath;
    item.progress = 100;
    item.downloadedBytes = item.totalBytes;
    this.emit('progress', item, this.getOverallProgress());
  }

  /**
   * 아이템 진행률 업데이트
   */
  private updateItemProgress(item: DownloadItem, progress: WheelFetchProgress): void {
    this.fetchedBytes += progress.downloadedBytes - item.downloadedBytes;
    item.downloadedBytes = progress.downloadedBytes;
    item.totalBytes = progress.totalBytes;
    item.progress = progress.totalBytes > 0 ? (progress.downloadedBytes / progress.totalBytes) * 100 : 0;

    this.emit('progress', item, this.getOverallProgress());
  }

  /**
   * 전체 진행률 계산
   */
  getOverallProgress(): OverallProgress {
    let completedItems = 0;
    let cachedItems = 0;
    let failedItems = 0;
    let totalBytes = 0;
    let downloadedBytes = 0;

    for (const item of this.items.values()) {
      totalBytes += item.totalBytes;
      downloadedBytes += item.downloadedBytes;

      switch (item.status) {
        case 'completed':
          completedItems++;
          break;
        case 'cached':
          cachedItems++;
          break;
        case 'failed':
          failedItems++;
          break;
      }
    }

    const elapsedSeconds = (Date.now() - this.startTime) / 1000;

    return {
      totalItems: this.items.size,
      completedItems,
      cachedItems,
      failedItems,
      totalBytes,
      downloadedBytes,
      overallProgress: totalBytes > 0 ? (downloadedBytes / totalBytes) * 100 : 0,
      currentSpeed: elapsedSeconds > 0 ? this.fetchedBytes / elapsedSeconds : 0,
    };
  }

  /**
   * 다운로드 취소
   * 진행 중인 요청을 중단하고 남은 아이템은 cancelled로 표시
   */
  cancelDownload(): void {
    if (this.isCancelled) return;
    this.isCancelled = true;
    this.controller?.abort();

    for (const item of this.items.values()) {
      if (item.status === 'downloading' || item.status === 'pending') {
        item.status = 'cancelled';
      }
    }

    logger.info('다운로드 취소');
  }

  /**
   * 결과 생성
   */
  private createResult(outputPath?: string): DownloadResult {
    const items = Array.from(this.items.values());
    const failedTargets = new Set<string>();
    for (const item of items) {
      if (item.status === 'failed') item.targets.forEach((t) => failedTargets.add(t));
    }

    return {
      success: !this.isCancelled && failedTargets.size === 0,
      cancelled: this.isCancelled,
      items,
      totalSize: this.fetchedBytes,
      duration: Date.now() - this.startTime,
      outputPath,
      failedTargets: [...failedTargets].sort(),
    };
  }

  /**
   * 아이템 목록 조회
   */
  getItems(): DownloadItem[] {
    return Array.from(this.items.values());
  }

  /**
   * 초기화
   */
  reset(): void {
    this.items.clear();
    this.isRunning = false;
    this.isCancelled = false;
  }

  /**
   * 실행 중 여부
   */
  get running(): boolean {
    return this.isRunning;
  }
}
