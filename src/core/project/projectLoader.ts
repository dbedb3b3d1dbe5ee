/**
 * 프로젝트 설정 로더
 * pyproject.toml의 [project], [tool.blpack] 또는 스크립트의 인라인 메타데이터 (# /// script)
 */

import fs from 'fs-extra';
import * as path from 'path';
import { parse as parseToml } from 'smol-toml';
import type {
  BlenderPlatform,
  DependencySpec,
  ExtensionPermission,
  LoadedProject,
  OsVersion,
  ProjectConfig,
} from '../../types';
import { BlpackError, ProjectConfigError } from '../errors';
import { isBlenderPlatform } from '../blender/platforms';
import { parseOsVersion } from '../shared/pip-tags';
import { parseRequirement } from '../shared/pip-requirement';
import type { ProjectFiles } from './location';

export const TOOL_TABLE = 'blpack';

const PERMISSIONS: readonly ExtensionPermission[] = ['files', 'network', 'clipboard', 'camera', 'microphone'];
const DEFAULT_MAINTAINER = 'Unknown <unknown@example.com>';
const BLENDER_EXTRA_PATTERN = /^blender(\d+)[-_](\d+)$/;

type Table = Record<string, unknown>;

export interface ProjectSource extends LoadedProject {
  specPath: string;
  isScript: boolean;
  /** 패키지 디렉토리 또는 스크립트 파일 */
  sourcePath: string;
}

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/**
 * 인라인 스크립트 메타데이터 블록 추출
 * @returns TOML 텍스트, 블록이 없으면 null
 */
export function extractInlineScriptMetadata(source: string, file = '<script>'): string | null {
  const lines = source.split(/\r?\n/);
  const blocks: string[] = [];

  for (let i = 0; i < lines.length; i++) {
    if (lines[i].trimEnd() !== '# /// script') continue;

    const body: string[] = [];
    let closed = false;
    for (i++; i < lines.length; i++) {
      const line = lines[i];
      if (line.trimEnd() === '# ///') {
        closed = true;
        break;
      }
      if (line === '#') body.push('');
      else if (line.startsWith('# ')) body.push(line.slice(2));
      else break;
    }
    if (!closed) {
      throw new ProjectConfigError(file, 'script metadata', "unterminated '# /// script' block");
    }
    blocks.push(body.join('\n'));
  }

  if (blocks.length > 1) {
    throw new ProjectConfigError(file, 'script metadata', "multiple '# /// script' blocks");
  }
  return blocks[0] ?? null;
}

class FieldReader {
  constructor(
    private readonly file: string,
    private readonly table: Table,
    private readonly prefix: string
  ) {}

  private field(key: string): string {
    return this.prefix ? `${this.prefix}.${key}` : key;
  }

  fail(key: string, reason: string): never {
    throw new ProjectConfigError(this.file, this.field(key), reason);
  }

  optionalString(key: string): string | undefined {
    const value = this.table[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') this.fail(key, 'must be a string');
    return value;
  }

  string(key: string): string {
    const value = this.optionalString(key);
    if (value === undefined) this.fail(key, 'is not defined');
    return value;
  }

  stringArray(key: string): string[] {
    const value = this.table[key];
    if (value === undefined) return [];
    if (!isStringArray(value)) this.fail(key, 'must be an array of strings');
    return value;
  }

  subTable(key: string): Table | undefined {
    const value = this.table[key];
    if (value === undefined) return undefined;
    if (!isTable(value)) this.fail(key, 'must be a table');
    return value;
  }

  osVersion(key: string): OsVersion | undefined {
    const value = this.table[key];
    if (value === undefined) return undefined;
    const parsed =
      typeof value === 'string' || (Array.isArray(value) && value.every((v) => typeof v === 'number'))
        ? parseOsVersion(value)
        : null;
    if (!parsed) this.fail(key, 'must look like "2.28" or [2, 28]');
    return parsed;
  }
}

function readMaintainer(file: string, project: Table): string {
  for (const key of ['maintainers', 'authors']) {
    const value = project[key];
    if (value === undefined) continue;
    if (!Array.isArray(value)) throw new ProjectConfigError(file, `project.${key}`, 'must be an array');
    const first: unknown = value[0];
    if (!isTable(first) || typeof first.name !== 'string') {
      throw new ProjectConfigError(file, `project.${key}`, 'must be a non-empty array of { name, email } tables');
    }
    return typeof first.email === 'string' ? `${first.name} <${first.email}>` : first.name;
  }
  return DEFAULT_MAINTAINER;
}

function readLicense(file: string, project: Table): string {
  const license = project.license;
  if (typeof license === 'string') return license;
  if (isTable(license) && typeof license.text === 'string') return license.text;
  throw new ProjectConfigError(file, 'project.license', 'must be an SPDX identifier string');
}

function readPlatforms(reader: FieldReader, key: string): BlenderPlatform[] | undefined {
  const values = reader.stringArray(key);
  if (values.length === 0) return undefined;
  return values.map((value) => {
    if (!isBlenderPlatform(value)) reader.fail(key, `unknown platform '${value}'`);
    return value;
  });
}

function readPermissions(reader: FieldReader, key: string): Partial<Record<ExtensionPermission, string>> {
  const table = reader.subTable(key) ?? {};
  const permissions: Partial<Record<ExtensionPermission, string>> = {};
  for (const [name, reason] of Object.entries(table)) {
    const permission = PERMISSIONS.find((p) => p === name);
    if (!permission) reader.fail(key, `unknown permission '${name}'`);
    if (typeof reason !== 'string') reader.fail(`${key}.${name}`, 'must be a string');
    permissions[permission] = reason;
  }
  return permissions;
}

function parseDependencyList(file: string, field: string, requirements: string[], series?: string): DependencySpec[] {
  return requirements.map((text) => {
    try {
      const spec = parseRequirement(text);
      return series ? { ...spec, blenderSeries: series } : spec;
    } catch (error) {
      if (error instanceof BlpackError) throw new ProjectConfigError(file, field, error.message);
      throw error;
    }
  });
}

/**
 * 파싱된 TOML 문서를 프로젝트 설정으로 변환
 */
export function parseProjectDocument(document: Table, file: string, isScript: boolean): LoadedProject {
  const project = document.project;
  if (!isTable(project)) {
    throw new ProjectConfigError(file, 'project', 'table is missing');
  }
  const tool = document.tool;
  const settings = isTable(tool) ? tool[TOOL_TABLE] : undefined;
  if (!isTable(settings)) {
    throw new ProjectConfigError(file, `tool.${TOOL_TABLE}`, 'table is missing');
  }

  const proj: FieldReader = new FieldReader(file, project, 'project');
  const ext: FieldReader = new FieldReader(file, settings, `tool.${TOOL_TABLE}`);
  const top: FieldReader = new FieldReader(file, document, '');

  const urls = proj.subTable('urls');
  const homepage = urls && typeof urls.Homepage === 'string' ? urls.Homepage : null;

  const config: ProjectConfig = {
    id: proj.string('name'),
    prettyName: ext.string('pretty_name'),
    version: proj.string('version'),
    tagline: proj.string('description'),
    maintainer: readMaintainer(file, project),
    license: readLicense(file, project),
    requiresPython: (isScript ? top.optionalString('requires-python') : undefined) ?? proj.optionalString('requires-python') ?? null,
    blenderVersionMin: ext.string('blender_version_min'),
    blenderVersionMax: ext.optionalString('blender_version_max'),
    copyright: ext.stringArray('copyright'),
    tags: ext.stringArray('bl_tags'),
    platforms: readPlatforms(ext, 'supported_platforms'),
    permissions: readPermissions(ext, 'permissions'),
    website: ext.optionalString('website') ?? homepage,
    minGlibcVersion: ext.osVersion('min_glibc_version'),
    minMacosVersion: ext.osVersion('min_macos_version'),
  };

  if (config.copyright.length === 0) {
    ext.fail('copyright', 'is not defined (e.g. ["2025 Example Contributors"])');
  }

  // PEP 723: 스크립트는 최상위 dependencies 우선
  const scriptDeps = isScript ? top.stringArray('dependencies') : [];
  const dependencies = parseDependencyList(
    file,
    scriptDeps.length > 0 ? 'dependencies' : 'project.dependencies',
    scriptDeps.length > 0 ? scriptDeps : proj.stringArray('dependencies')
  );

  const optional = proj.subTable('optional-dependencies') ?? {};
  for (const [extra, requirements] of Object.entries(optional)) {
    const match = BLENDER_EXTRA_PATTERN.exec(extra);
    if (!match) continue;
    if (!isStringArray(requirements)) {
      proj.fail(`optional-dependencies.${extra}`, 'must be an array of strings');
    }
    dependencies.push(
      ...parseDependencyList(file, `project.optional-dependencies.${extra}`, requirements, `${match[1]}.${match[2]}`)
    );
  }

  return { config, dependencies };
}

function parseTomlText(text: string, file: string): Table {
  try {
    return parseToml(text);
  } catch (error) {
    throw new ProjectConfigError(file, 'toml', error instanceof Error ? error.message : String(error));
  }
}

/**
 * 프로젝트 파일 로드
 * 프로젝트는 <root>/<name>/ 패키지, 스크립트는 파일명이 name.py 이어야 함
 */
export async function loadProject(files: Extract<ProjectFiles, { kind: 'source' }>): Promise<ProjectSource> {
  const { specPath, isScript } = files;
  const text = await fs.readFile(specPath, 'utf8');

  let document: Table;
  if (isScript) {
    const metadata = extractInlineScriptMetadata(text, specPath);
    if (metadata === null) {
      throw new ProjectConfigError(specPath, 'script metadata', "no '# /// script' block found");
    }
    document = parseTomlText(metadata, specPath);
  } else {
    document = parseTomlText(text, specPath);
  }

  const loaded = parseProjectDocument(document, specPath, isScript);
  const { id } = loaded.config;

  let sourcePath: string;
  if (isScript) {
    const scriptName = path.basename(specPath, '.py');
    if (scriptName !== id) {
      throw new ProjectConfigError(specPath, 'project.name', `must match the script name '${scriptName}'`);
    }
    sourcePath = specPath;
  } else {
    sourcePath = path.join(path.dirname(specPath), id);
    const stat = await fs.stat(sourcePath).catch(() => null);
    if (!stat?.isDirectory()) {
      throw new ProjectConfigError(specPath, 'project.name', `no package directory '${id}/' next to ${path.basename(specPath)}`);
    }
  }

  return { ...loaded, specPath, isScript, sourcePath };
}
