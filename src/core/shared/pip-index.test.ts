/**
 * pip-index.ts 단위 테스트
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios from 'axios';
import { PyPIJsonIndex } from './pip-index';
import { IndexQueryError, PackageNotFoundError } from '../errors';

// axios 모킹
vi.mock('axios');
const mockedAxios = vi.mocked(axios, true);

const HEX_A = 'a'.repeat(64);
const HEX_B = 'B'.repeat(64);

describe('pip-index', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('listVersions', () => {
    it('파일이 있고 모두 yank되지 않은 버전만 반환', async () => {
      mockedAxios.get.mockResolvedValueOnce({
        data: {
          info: { name: 'Pillow', version: '11.0.0' },
          releases: {
            '10.4.0': [{ filename: 'pillow-10.4.0.tar.gz', yanked: false }],
            '11.0.0': [{ filename: 'pillow-11.0.0.tar.gz', yanked: false }],
            '9.0.0': [{ filename: 'pillow-9.0.0.tar.gz', yanked: true }],
            '8.0.0': [],
            'not-a-version': [{ filename: 'x.tar.gz' }],
          },
        },
      });

      const index = new PyPIJsonIndex({ indexUrl: 'https://index.test/', timeoutMs: 500 });
      const versions = await index.listVersions('Pillow');

      expect(versions).toEqual(['10.4.0', '11.0.0']);
      expect(mockedAxios.get).toHaveBeenCalledWith('https://index.test/pypi/pillow/json', {
        timeout: 500,
        headers: { 'User-Agent': 'blpack (+https://pypi.org)', Accept: 'application/json' },
        signal: undefined,
      });
    });

    it('404는 PackageNotFoundError', async () => {
      mockedAxios.get.mockRejectedValueOnce({ response: { status: 404 } });
      mockedAxios.isAxiosError.mockReturnValue(true);

      const index = new PyPIJsonIndex();
      await expect(index.listVersions('no-such-package')).rejects.toBeInstanceOf(PackageNotFoundError);
    });

    it('그 외 실패는 IndexQueryError', async () => {
      mockedAxios.get.mockRejectedValueOnce(new Error('socket hang up'));
      mockedAxios.isAxiosError.mockReturnValue(false);

      const index = new PyPIJsonIndex();
      await expect(index.listVersions('numpy')).rejects.toThrow(
        'Index query failed for https://pypi.org/pypi/numpy/json: socket hang up'
      );
      mockedAxios.get.mockRejectedValueOnce(new Error('socket hang up'));
      await expect(index.listVersions('numpy')).rejects.toBeInstanceOf(IndexQueryError);
    });
  });

  describe('getRelease', () => {
    it('휠만 WheelDescriptor로 변환하고 메타데이터 정규화', async () => {
      mockedAxios.get.mockResolvedValueOnce({
        data: {
          info: {
            name: 'Typing_Extensions',
            version: '4.12.2',
            requires_dist: null,
            requires_python: '',
          },
          urls: [
            {
              filename: 'typing_extensions-4.12.2-py3-none-any.whl',
              url: 'https://files.test/te.whl',
              packagetype: 'bdist_wheel',
              size: 37438,
              digests: { sha256: HEX_B },
            },
            {
              filename: 'typing_extensions-4.12.2.tar.gz',
              url: 'https://files.test/te.tar.gz',
              packagetype: 'sdist',
              size: 85321,
              digests: { sha256: HEX_A },
            },
          ],
        },
      });

      const index = new PyPIJsonIndex();
      const release = await index.getRelease('typing-extensions', '4.12.2');

      expect(mockedAxios.get.mock.calls[0][0]).toBe('https://pypi.org/pypi/typing-extensions/4.12.2/json');
      expect(release.name).toBe('typing_extensions');
      expect(release.requiresDist).toEqual([]);
      expect(release.requiresPython).toBeNull();
      expect(release.wheels).toHaveLength(1);
      expect(release.wheels[0].hash).toBe(`sha256:${'b'.repeat(64)}`);
      expect(release.wheels[0].platformTags[0].tag).toBe('any');
    });

    it('yank된 휠과 해석할 수 없는 휠은 건너뜀', async () => {
      mockedAxios.get.mockResolvedValueOnce({
        data: {
          info: { name: 'demo', version: '1.0', requires_dist: ['numpy>=1.20'], requires_python: '>=3.9' },
          urls: [
            {
              filename: 'demo-1.0-cp311-cp311-solaris_2_11_sparc.whl',
              url: 'https://files.test/a.whl',
              packagetype: 'bdist_wheel',
              size: 10,
              digests: { sha256: HEX_A },
            },
            {
              filename: 'demo-1.0-py3-none-any.whl',
              url: 'https://files.test/b.whl',
              packagetype: 'bdist_wheel',
              size: 10,
              yanked: true,
              digests: { sha256: HEX_A },
            },
            {
              filename: 'demo-1.0-cp311-cp311-win_amd64.whl',
              url: 'https://files.test/c.whl',
              packagetype: 'bdist_wheel',
              size: 12,
              digests: { sha256: HEX_A },
            },
          ],
        },
      });

      const index = new PyPIJsonIndex();
      const release = await index.getRelease('demo', '1.0');

      expect(release.requiresDist).toEqual(['numpy>=1.20']);
      expect(release.requiresPython).toBe('>=3.9');
      expect(release.wheels.map((w) => w.filename)).toEqual(['demo-1.0-cp311-cp311-win_amd64.whl']);
    });

    it('404는 버전 정보를 포함한 PackageNotFoundError', async () => {
      mockedAxios.get.mockRejectedValueOnce({ response: { status: 404 } });
      mockedAxios.isAxiosError.mockReturnValue(true);

      const index = new PyPIJsonIndex();
      await expect(index.getRelease('numpy', '0.0.1')).rejects.toThrow("Package 'numpy==0.0.1' not found");
    });
  });
});
