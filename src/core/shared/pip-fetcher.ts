/**
 * 휠 파일 다운로드
 */

import axios from 'axios';
import fs from 'fs-extra';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { WheelDescriptor } from '../../types';
import { BuildCancelledError, DownloadError } from '../errors';

export interface WheelFetchProgress {
  downloadedBytes: number;
  totalBytes: number;
}

export interface WheelFetchOptions {
  signal: AbortSignal;
  onProgress?: (progress: WheelFetchProgress) => void;
}

/**
 * 휠을 지정한 경로에 기록
 * 일시적 실패는 DownloadError, 취소는 BuildCancelledError
 */
export interface WheelFetcher {
  fetch(wheel: WheelDescriptor, destination: string, options: WheelFetchOptions): Promise<void>;
}

export interface HttpWheelFetcherOptions {
  timeoutMs?: number;
  userAgent?: string;
}

export class HttpWheelFetcher implements WheelFetcher {
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: HttpWheelFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 300000;
    this.userAgent = options.userAgent ?? 'blpack (+https://pypi.org)';
  }

  async fetch(wheel: WheelDescriptor, destination: string, options: WheelFetchOptions): Promise<void> {
    const { signal, onProgress } = options;
    if (signal.aborted) throw new BuildCancelledError('download');

    try {
      const response = await axios.get<Readable>(wheel.url, {
        responseType: 'stream',
        timeout: this.timeoutMs,
        headers: { 'User-Agent': this.userAgent },
        signal,
      });

      const totalBytes = parseInt(String(response.headers['content-length'] ?? wheel.size), 10) || wheel.size;
      let downloadedBytes = 0;

      response.data.on('data', (chunk: Buffer) => {
        downloadedBytes += chunk.length;
        onProgress?.({ downloadedBytes, totalBytes });
      });

      await pipeline(response.data, fs.createWriteStream(destination), { signal });
    } catch (error) {
      if (signal.aborted) {
        throw new BuildCancelledError('download');
      }
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new DownloadError(wheel.filename, error instanceof Error ? error.message : String(error), status);
    }
  }
}
