/**
 * 패키지 인덱스 클라이언트
 * PyPI JSON API (https://warehouse.pypa.io/api-reference/json.html)
 */

import axios from 'axios';
import type { PackageRelease, WheelDescriptor } from '../../types';
import logger from '../../utils/logger';
import { BlpackError, BuildCancelledError, IndexQueryError, PackageNotFoundError } from '../errors';
import { createWheelDescriptor, normalizePackageName } from './pip-wheel';
import { tryParseVersion } from './version-utils';

/**
 * 패키지 인덱스 조회 기능
 */
export interface PackageIndex {
  /** 파일이 하나 이상 있는 모든 버전 */
  listVersions(name: string, signal?: AbortSignal): Promise<string[]>;
  /** 특정 버전의 메타데이터와 휠 목록 */
  getRelease(name: string, version: string, signal?: AbortSignal): Promise<PackageRelease>;
}

/**
 * PyPI JSON API 파일 항목
 */
interface PyPIFile {
  filename: string;
  url: string;
  packagetype: string;
  size: number;
  yanked?: boolean;
  digests: {
    sha256: string;
  };
}

interface PyPIProjectResponse {
  info: { name: string; version: string };
  releases: Record<string, PyPIFile[]>;
}

interface PyPIReleaseResponse {
  info: {
    name: string;
    version: string;
    requires_dist: string[] | null;
    requires_python: string | null;
  };
  urls: PyPIFile[];
}

export interface PyPIJsonIndexOptions {
  indexUrl?: string;
  timeoutMs?: number;
  userAgent?: string;
}

const DEFAULT_INDEX_URL = 'https://pypi.org';
const DEFAULT_USER_AGENT = 'blpack (+https://pypi.org)';

/**
 * PyPI JSON API 기반 인덱스
 */
export class PyPIJsonIndex implements PackageIndex {
  private readonly indexUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: PyPIJsonIndexOptions = {}) {
    this.indexUrl = (options.indexUrl || DEFAULT_INDEX_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.userAgent = options.userAgent || DEFAULT_USER_AGENT;
  }

  async listVersions(name: string, signal?: AbortSignal): Promise<string[]> {
    const url = `${this.indexUrl}/pypi/${this.urlName(name)}/json`;
    const data = await this.fetchJson<PyPIProjectResponse>(url, name, undefined, signal);

    const versions = Object.entries(data.releases ?? {})
      .filter(([version, files]) => tryParseVersion(version) !== null && files.some((f) => !f.yanked))
      .map(([version]) => version);

    logger.debug('버전 목록 조회', { name, count: versions.length });
    return versions;
  }

  async getRelease(name: string, version: string, signal?: AbortSignal): Promise<PackageRelease> {
    const url = `${this.indexUrl}/pypi/${this.urlName(name)}/${version}/json`;
    const data = await this.fetchJson<PyPIReleaseResponse>(url, name, version, signal);

    const wheels: WheelDescriptor[] = [];
    for (const file of data.urls ?? []) {
      if (file.packagetype !== 'bdist_wheel' || file.yanked) continue;
      try {
        wheels.push(
          createWheelDescriptor({
            filename: file.filename,
            url: file.url,
            size: file.size,
            sha256: file.digests.sha256,
          })
        );
      } catch (error) {
        if (!(error instanceof BlpackError)) throw error;
        logger.warn('휠 메타데이터 해석 실패, 건너뜀', { filename: file.filename, error: error.message });
      }
    }

    return {
      name: normalizePackageName(data.info.name),
      version: data.info.version,
      requiresDist: data.info.requires_dist ?? [],
      requiresPython: data.info.requires_python || null,
      wheels,
    };
  }

  private urlName(name: string): string {
    return normalizePackageName(name).replace(/_/g, '-');
  }

  private async fetchJson<T>(url: string, name: string, version: string | undefined, signal?: AbortSignal): Promise<T> {
    try {
      const response = await axios.get<T>(url, {
        timeout: this.timeoutMs,
        headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
        signal,
      });
      return response.data;
    } catch (error) {
      if (signal?.aborted) {
        throw new BuildCancelledError('index query');
      }
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        throw new PackageNotFoundError(name, version);
      }
      throw new IndexQueryError(url, error instanceof Error ? error.message : String(error));
    }
  }
}
