import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import AdmZip from 'adm-zip';
import { parse } from 'smol-toml';
import type { ProjectConfig } from '../../types';
import { ManifestValidationError } from '../errors';
import type { ProjectSource } from '../project/projectLoader';
import { fakeWheel } from '../../test-utils/fakeIndex';
import { fakeResolution as resolution } from '../../test-utils/fakeResolution';
import {
  archiveFilename,
  groupTargets,
  listPackedEntries,
  missingWheels,
  packExtension,
  readPackedManifest,
  type ExtensionGroup,
} from './extensionPackager';

const TQDM = 'tqdm-4.66.0-py3-none-any.whl';
const NUMPY_OLD = 'numpy-1.24.3-cp311-cp311-manylinux_2_17_x86_64.whl';
const NUMPY_NEW = 'numpy-1.26.4-cp311-cp311-manylinux_2_17_x86_64.whl';

const CONFIG: ProjectConfig = {
  id: 'mesh_tools',
  prettyName: 'Mesh Tools',
  version: '1.2.0',
  tagline: 'Handy mesh helpers',
  maintainer: 'Jane Doe <jane@example.com>',
  license: 'GPL-3.0-or-later',
  requiresPython: null,
  blenderVersionMin: '4.2.0',
  copyright: ['2025 Jane Doe'],
  tags: ['Mesh'],
  permissions: {},
  website: null,
};

describe('extensionPackager', () => {
  describe('groupTargets', () => {
    it('휠 집합이 같은 연속 릴리스는 하나의 그룹', () => {
      const groups = groupTargets([
        resolution('4.2.0', 'linux-x64', [TQDM]),
        resolution('4.2.0', 'windows-x64', [TQDM]),
        resolution('4.2.1', 'linux-x64', [TQDM]),
        resolution('4.2.1', 'windows-x64', [TQDM]),
      ]);

      expect(groups).toHaveLength(1);
      expect(groups[0]).toMatchObject({
        releases: ['4.2.0', '4.2.1'],
        blenderVersionMin: '4.2.0',
        blenderVersionMax: '4.2.2',
        platforms: ['linux-x64', 'windows-x64'],
      });
      expect(groups[0].wheels.map((w) => w.filename)).toEqual([TQDM]);
    });

    it('휠이 달라지면 새 그룹', () => {
      const groups = groupTargets([
        resolution('4.2.0', 'linux-x64', [NUMPY_OLD, TQDM]),
        resolution('4.2.1', 'linux-x64', [NUMPY_OLD, TQDM]),
        resolution('4.3.0', 'linux-x64', [NUMPY_NEW, TQDM]),
      ]);

      expect(groups.map((g) => [g.blenderVersionMin, g.blenderVersionMax])).toEqual([
        ['4.2.0', '4.2.2'],
        ['4.3.0', '4.3.1'],
      ]);
      expect(groups[1].wheels.map((w) => w.filename)).toEqual([NUMPY_NEW, TQDM]);
    });

    it('같은 휠 집합이라도 연속하지 않으면 합치지 않음', () => {
      const groups = groupTargets([
        resolution('4.2.0', 'linux-x64', [NUMPY_OLD]),
        resolution('4.2.1', 'linux-x64', [NUMPY_NEW]),
        resolution('4.2.2', 'linux-x64', [NUMPY_OLD]),
      ]);
      expect(groups.map((g) => g.releases)).toEqual([['4.2.0'], ['4.2.1'], ['4.2.2']]);
    });

    it('플랫폼 구성이 다르면 새 그룹', () => {
      const groups = groupTargets([
        resolution('4.2.0', 'linux-x64', [TQDM]),
        resolution('4.2.1', 'linux-x64', [TQDM]),
        resolution('4.2.1', 'windows-arm64', [TQDM]),
      ]);
      expect(groups.map((g) => g.platforms)).toEqual([['linux-x64'], ['linux-x64', 'windows-arm64']]);
    });

    it('입력 순서와 상관없이 릴리스 오름차순으로 묶음', () => {
      const groups = groupTargets([
        resolution('4.3.0', 'linux-x64', [TQDM]),
        resolution('4.2.0', 'linux-x64', [TQDM]),
      ]);
      expect(groups.map((g) => [g.releases, g.blenderVersionMin, g.blenderVersionMax])).toEqual([
        [['4.2.0', '4.3.0'], '4.2.0', '4.3.1'],
      ]);
    });
  });

  describe('missingWheels', () => {
    it('받지 못한 휠만 반환', () => {
      const [group] = groupTargets([resolution('4.2.0', 'linux-x64', [NUMPY_OLD, TQDM])]);
      const tqdm = fakeWheel(TQDM);

      expect(missingWheels(group, new Map([[tqdm.hash, '/w/tqdm.whl']])).map((w) => w.filename)).toEqual([NUMPY_OLD]);
      expect(missingWheels(group, new Map())).toHaveLength(2);
    });
  });

  describe('archiveFilename', () => {
    const group: ExtensionGroup = {
      releases: ['4.3.0'],
      blenderVersionMin: '4.3.0',
      blenderVersionMax: '4.3.1',
      platforms: [],
      wheels: [],
      validTags: [],
    };

    it('그룹이 하나면 <id>-<version>.zip', () => {
      expect(archiveFilename('mesh_tools', '1.2.0', group, false)).toBe('mesh_tools-1.2.0.zip');
    });

    it('그룹이 여럿이면 Blender 최소 버전 포함', () => {
      expect(archiveFilename('mesh_tools', '1.2.0', group, true)).toBe('mesh_tools-1.2.0-blender4.3.0.zip');
    });
  });

  describe('packExtension', () => {
    let root: string;
    let wheelPaths: Map<string, string>;
    let group: ExtensionGroup;

    beforeEach(async () => {
      root = await fs.mkdtemp(path.join(os.tmpdir(), 'blpack-pack-'));

      const wheel = fakeWheel(TQDM);
      const wheelPath = path.join(root, 'downloads', TQDM);
      await fs.outputFile(wheelPath, 'wheel-bytes');
      wheelPaths = new Map([[wheel.hash, wheelPath]]);

      [group] = groupTargets([resolution('4.2.0', 'linux-x64', [TQDM]), resolution('4.2.1', 'linux-x64', [TQDM])]);
    });

    afterEach(async () => {
      await fs.remove(root);
    });

    async function packageProject(): Promise<ProjectSource> {
      const sourcePath = path.join(root, 'project', 'mesh_tools');
      await fs.outputFile(path.join(sourcePath, '__init__.py'), 'bl_info = {}\n');
      await fs.outputFile(path.join(sourcePath, 'utils', 'helpers.py'), 'def helper():\n    pass\n');
      await fs.outputFile(path.join(sourcePath, '__pycache__', '__init__.cpython-311.pyc'), 'compiled');
      return {
        config: CONFIG,
        dependencies: [],
        specPath: path.join(root, 'project', 'pyproject.toml'),
        isScript: false,
        sourcePath,
      };
    }

    it('패키지 디렉토리, 매니페스트, 휠을 zip으로 묶음', async () => {
      const project = await packageProject();
      const result = await packExtension({
        project,
        group,
        wheelPaths,
        outputDir: path.join(root, 'dist'),
        profile: 'release',
      });

      expect(result.archivePath).toBe(path.join(root, 'dist', 'mesh_tools-1.2.0.zip'));
      expect(result.size).toBe((await fs.stat(result.archivePath)).size);
      expect(listPackedEntries(result.archivePath)).toEqual([
        '__init__.py',
        'blender_manifest.toml',
        'release_config.toml',
        'utils/helpers.py',
        `wheels/${TQDM}`,
      ]);

      const zip = new AdmZip(result.archivePath);
      expect(zip.readAsText(`wheels/${TQDM}`)).toBe('wheel-bytes');
      expect(parse(zip.readAsText('release_config.toml'))).toMatchObject({ log_console_level: 'warning' });
    });

    it('패킹된 매니페스트를 다시 읽음', async () => {
      const { archivePath } = await packExtension({
        project: await packageProject(),
        group,
        wheelPaths,
        outputDir: path.join(root, 'dist'),
        profile: 'dev',
      });

      expect(parse(readPackedManifest(archivePath))).toMatchObject({
        id: 'mesh_tools',
        blender_version_min: '4.2.0',
        blender_version_max: '4.2.2',
        platforms: ['linux-x64'],
        wheels: [`./wheels/${TQDM}`],
      });
    });

    it('스크립트는 __init__.py로 패킹', async () => {
      const scriptPath = path.join(root, 'mesh_tools.py');
      await fs.writeFile(scriptPath, 'print("hello")\n');

      const { archivePath } = await packExtension({
        project: { config: CONFIG, dependencies: [], specPath: scriptPath, isScript: true, sourcePath: scriptPath },
        group,
        wheelPaths,
        outputDir: path.join(root, 'dist'),
        profile: 'test',
        multipleGroups: true,
      });

      expect(path.basename(archivePath)).toBe('mesh_tools-1.2.0-blender4.2.0.zip');
      expect(new AdmZip(archivePath).readAsText('__init__.py')).toBe('print("hello")\n');
    });

    it('다운로드되지 않은 휠이 있으면 실패', async () => {
      await expect(
        packExtension({
          project: await packageProject(),
          group,
          wheelPaths: new Map(),
          outputDir: path.join(root, 'dist'),
          profile: 'release',
        })
      ).rejects.toThrow(`Wheel ${TQDM} was not downloaded`);
    });

    it('매니페스트가 유효하지 않으면 zip을 만들지 않음', async () => {
      const project = await packageProject();
      await expect(
        packExtension({
          project: { ...project, config: { ...CONFIG, tags: ['Robots'] } },
          group,
          wheelPaths,
          outputDir: path.join(root, 'dist'),
          profile: 'release',
        })
      ).rejects.toBeInstanceOf(ManifestValidationError);
      expect(await fs.pathExists(path.join(root, 'dist'))).toBe(false);
    });
  });

  describe('readPackedManifest', () => {
    it('매니페스트가 없는 zip은 에러', async () => {
      const root = await fs.mkdtemp(path.join(os.tmpdir(), 'blpack-packed-'));
      try {
        const archivePath = path.join(root, 'empty.zip');
        const zip = new AdmZip();
        zip.addFile('readme.txt', Buffer.from('hi'));
        zip.writeZip(archivePath);

        expect(() => readPackedManifest(archivePath)).toThrow(
          `${archivePath}: invalid 'blender_manifest.toml': not found in archive`
        );
      } finally {
        await fs.remove(root);
      }
    });
  });
});
