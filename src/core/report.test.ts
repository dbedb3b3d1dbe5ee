import { describe, it, expect } from 'vitest';
import { fakeWheel } from '../test-utils/fakeIndex';
import { fakeResolution } from '../test-utils/fakeResolution';
import { buildDependencyReport, isReportSortKey, renderDependencyReport } from './report';

const TQDM = fakeWheel('tqdm-4.66.0-py3-none-any.whl', 78_000);
const NUMPY_LINUX = fakeWheel('numpy-1.26.4-cp311-cp311-manylinux_2_17_x86_64.whl', 18_000_000);
const NUMPY_WIN = fakeWheel('numpy-1.26.4-cp311-cp311-win_amd64.whl', 15_000_000);
const ATTRS = fakeWheel('attrs-23.2.0-py3-none-any.whl', 60_000);

const TARGETS = [
  fakeResolution('4.2.0', 'windows-x64', [TQDM, NUMPY_WIN]),
  fakeResolution('4.2.0', 'linux-x64', [TQDM, NUMPY_LINUX, ATTRS]),
  fakeResolution('4.2.1', 'linux-x64', [TQDM, NUMPY_LINUX, ATTRS]),
];

describe('report', () => {
  it('타겟 전체의 휠을 휠 단위로 합침', () => {
    const report = buildDependencyReport(TARGETS);

    expect(report.rows).toEqual([
      {
        filename: 'attrs-23.2.0-py3-none-any.whl',
        name: 'attrs',
        version: '23.2.0',
        platforms: ['linux-x64'],
        pythonAbi: 'py3|none',
        size: 60_000,
      },
      {
        filename: 'numpy-1.26.4-cp311-cp311-manylinux_2_17_x86_64.whl',
        name: 'numpy',
        version: '1.26.4',
        platforms: ['linux-x64'],
        pythonAbi: 'cp311|cp311',
        size: 18_000_000,
      },
      {
        filename: 'numpy-1.26.4-cp311-cp311-win_amd64.whl',
        name: 'numpy',
        version: '1.26.4',
        platforms: ['windows-x64'],
        pythonAbi: 'cp311|cp311',
        size: 15_000_000,
      },
      {
        filename: 'tqdm-4.66.0-py3-none-any.whl',
        name: 'tqdm',
        version: '4.66.0',
        platforms: ['linux-x64', 'windows-x64'],
        pythonAbi: 'py3|none',
        size: 78_000,
      },
    ]);
    expect(report.wheelCount).toBe(4);
    expect(report.platforms).toEqual(['linux-x64', 'windows-x64']);
    expect(report.totalSize).toBe(33_138_000);
  });

  it('크기 순 정렬은 큰 휠부터', () => {
    const report = buildDependencyReport(TARGETS, { sortBy: 'size' });
    expect(report.rows.map((r) => r.size)).toEqual([18_000_000, 15_000_000, 78_000, 60_000]);
  });

  it('이름 순 정렬', () => {
    const report = buildDependencyReport(TARGETS, { sortBy: 'name' });
    expect(report.rows.map((r) => r.name)).toEqual(['attrs', 'numpy', 'numpy', 'tqdm']);
  });

  it('빈 결과', () => {
    expect(buildDependencyReport([])).toEqual({ rows: [], wheelCount: 0, platforms: [], totalSize: 0 });
  });

  it('isReportSortKey', () => {
    expect(isReportSortKey('size')).toBe(true);
    expect(isReportSortKey('date')).toBe(false);
  });

  it('표로 렌더링', () => {
    const lines = renderDependencyReport(buildDependencyReport(TARGETS), { color: false }).split('\n');
    const cells = (line: string) =>
      line
        .split('│')
        .map((c) => c.trim())
        .filter((c) => c.length > 0);

    const rows = lines.filter((line) => line.includes('│')).map(cells);
    expect(rows[0]).toEqual(['Name', 'Version', 'Platforms', 'Py|ABI', 'Size']);
    expect(rows).toContainEqual(['tqdm', '4.66.0', 'linux-x64, windows-x64', 'py3|none', '76.17 KB']);
    expect(rows[rows.length - 1]).toEqual(['Total (4 wheels)', 'linux-x64, windows-x64', '31.6 MB']);
  });
});
