/**
 * 의존성 보고서
 * 모든 타겟에서 선택된 휠을 휠 단위로 합쳐 표로 출력
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { BlenderPlatform, WheelDescriptor } from '../types';
import { formatBytes } from '../utils/format';
import { BLENDER_PLATFORMS } from './blender/platforms';
import type { TargetResolution } from './buildMatrix';
import { compareVersions } from './shared/version-utils';

export type ReportSortKey = 'filename' | 'size' | 'name';

export const REPORT_SORT_KEYS: readonly ReportSortKey[] = ['filename', 'size', 'name'];

export interface DependencyReportRow {
  filename: string;
  name: string;
  version: string;
  platforms: BlenderPlatform[];
  /** 예: cp311|abi3 */
  pythonAbi: string;
  size: number;
}

export interface DependencyReport {
  rows: DependencyReportRow[];
  wheelCount: number;
  platforms: BlenderPlatform[];
  totalSize: number;
}

export function isReportSortKey(value: string): value is ReportSortKey {
  return REPORT_SORT_KEYS.some((key) => key === value);
}

function sortPlatforms(platforms: Iterable<BlenderPlatform>): BlenderPlatform[] {
  const set = new Set(platforms);
  return BLENDER_PLATFORMS.filter((p) => set.has(p));
}

const COMPARATORS: Record<ReportSortKey, (a: DependencyReportRow, b: DependencyReportRow) => number> = {
  filename: (a, b) => a.filename.localeCompare(b.filename),
  // 큰 휠부터
  size: (a, b) => b.size - a.size || a.filename.localeCompare(b.filename),
  name: (a, b) =>
    a.name.localeCompare(b.name) || compareVersions(a.version, b.version) || a.filename.localeCompare(b.filename),
};

/**
 * 타겟별 해결 결과로 보고서 생성
 */
export function buildDependencyReport(
  targets: readonly TargetResolution[],
  options: { sortBy?: ReportSortKey } = {}
): DependencyReport {
  const wheels = new Map<string, { wheel: WheelDescriptor; platforms: Set<BlenderPlatform> }>();

  for (const resolution of targets) {
    for (const dep of resolution.dependencies) {
      for (const selected of dep.wheels) {
        const entry = wheels.get(selected.wheel.hash) ?? { wheel: selected.wheel, platforms: new Set() };
        entry.platforms.add(selected.platform);
        wheels.set(selected.wheel.hash, entry);
      }
    }
  }

  const rows = [...wheels.values()].map(({ wheel, platforms }) => ({
    filename: wheel.filename,
    name: wheel.name,
    version: wheel.version,
    platforms: sortPlatforms(platforms),
    pythonAbi: `${wheel.pythonTags.join('.')}|${wheel.abiTags.join('.')}`,
    size: wheel.size,
  }));
  rows.sort(COMPARATORS[options.sortBy ?? 'filename']);

  return {
    rows,
    wheelCount: rows.length,
    platforms: sortPlatforms(rows.flatMap((r) => r.platforms)),
    totalSize: rows.reduce((sum, r) => sum + r.size, 0),
  };
}

/**
 * 보고서를 cli-table3 표로 렌더링
 */
export function renderDependencyReport(report: DependencyReport, options: { color?: boolean } = {}): string {
  const heading = (text: string): string => (options.color === false ? text : chalk.cyan(text));

  const table = new Table({
    head: ['Name', 'Version', 'Platforms', 'Py|ABI', 'Size'].map(heading),
    style: options.color === false ? { head: [], border: [] } : undefined,
  });

  for (const row of report.rows) {
    table.push([row.name, row.version, row.platforms.join(', '), row.pythonAbi, formatBytes(row.size)]);
  }
  table.push([
    `Total (${report.wheelCount} wheels)`,
    '',
    report.platforms.join(', '),
    '',
    formatBytes(report.totalSize),
  ]);

  return table.toString();
}
