/**
 * 빌드 도구 에러 클래스
 * 모든 에러는 code + details를 가지며, 해결 가능한 경우 remedy를 제공
 */

import type { OsVersion } from '../types';
import logger from '../utils/logger';

export enum ErrorCodes {
  UNRECOGNIZED_TAG = 'UNRECOGNIZED_TAG',
  MARKER_SYNTAX = 'MARKER_SYNTAX',
  REQUIREMENT_SYNTAX = 'REQUIREMENT_SYNTAX',
  VERSION_SYNTAX = 'VERSION_SYNTAX',
  REFERENCE_CONFLICT = 'REFERENCE_CONFLICT',
  RESOLUTION_CONFLICT = 'RESOLUTION_CONFLICT',
  RESOLUTION_TOO_DEEP = 'RESOLUTION_TOO_DEEP',
  NO_MATCHING_VERSION = 'NO_MATCHING_VERSION',
  NO_COMPATIBLE_WHEEL = 'NO_COMPATIBLE_WHEEL',
  PACKAGE_NOT_FOUND = 'PACKAGE_NOT_FOUND',
  INDEX_QUERY_ERROR = 'INDEX_QUERY_ERROR',
  INTEGRITY_ERROR = 'INTEGRITY_ERROR',
  DOWNLOAD_ERROR = 'DOWNLOAD_ERROR',
  CANCELLED = 'CANCELLED',
  PROJECT_CONFIG_ERROR = 'PROJECT_CONFIG_ERROR',
  MANIFEST_VALIDATION = 'MANIFEST_VALIDATION',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

export class BlpackError extends Error {
  readonly code: ErrorCodes;
  readonly details: Record<string, unknown>;
  readonly remedy?: string;

  constructor(message: string, code: ErrorCodes, details: Record<string, unknown> = {}, remedy?: string) {
    super(message);
    this.name = 'BlpackError';
    this.code = code;
    this.details = details;
    this.remedy = remedy;
  }
}

export class UnrecognizedTagError extends BlpackError {
  constructor(tag: string, reason: string) {
    super(`Unrecognized tag '${tag}': ${reason}`, ErrorCodes.UNRECOGNIZED_TAG, { tag });
    this.name = 'UnrecognizedTagError';
  }
}

export class VersionSyntaxError extends BlpackError {
  constructor(input: string) {
    super(`Invalid version or specifier '${input}'`, ErrorCodes.VERSION_SYNTAX, { input });
    this.name = 'VersionSyntaxError';
  }
}

export class MarkerSyntaxError extends BlpackError {
  constructor(marker: string, position: number, expected: string) {
    super(
      `Invalid marker '${marker}' at position ${position}: expected ${expected}`,
      ErrorCodes.MARKER_SYNTAX,
      { marker, position }
    );
    this.name = 'MarkerSyntaxError';
  }
}

export class RequirementSyntaxError extends BlpackError {
  constructor(requirement: string, reason: string) {
    super(`Invalid requirement '${requirement}': ${reason}`, ErrorCodes.REQUIREMENT_SYNTAX, { requirement });
    this.name = 'RequirementSyntaxError';
  }
}

export class ReferenceConflictError extends BlpackError {
  constructor(
    readonly packageName: string,
    readonly pinnedVersion: string,
    readonly constraint: string,
    readonly blenderVersion: string,
    remedy: string
  ) {
    super(
      `'${packageName}${constraint}' conflicts with ${packageName}==${pinnedVersion} bundled by Blender ${blenderVersion}`,
      ErrorCodes.REFERENCE_CONFLICT,
      { packageName, pinnedVersion, constraint, blenderVersion },
      remedy
    );
    this.name = 'ReferenceConflictError';
  }
}

/** 제약을 건 요구자와 프로젝트로부터의 경로 */
export interface ConstraintSource {
  requirer: string;
  constraint: string;
  path: readonly string[];
}

export class ResolutionConflictError extends BlpackError {
  constructor(
    readonly packageName: string,
    readonly requirers: readonly ConstraintSource[],
    readonly commonAncestor: string,
    readonly candidates: readonly string[]
  ) {
    const lines = requirers.map(
      (r) => `  ${r.requirer} requires ${packageName}${r.constraint || ' (any)'} via ${r.path.join(' -> ')}`
    );
    super(
      `No version of '${packageName}' satisfies all constraints (common ancestor: ${commonAncestor}):\n${lines.join('\n')}`,
      ErrorCodes.RESOLUTION_CONFLICT,
      { packageName, requirers, commonAncestor, candidates }
    );
    this.name = 'ResolutionConflictError';
  }
}

export class NoMatchingVersionError extends BlpackError {
  constructor(
    readonly packageName: string,
    readonly source: ConstraintSource,
    readonly availableVersions: readonly string[],
    reason?: string
  ) {
    const available = availableVersions.length ? availableVersions.join(', ') : 'none';
    super(
      `No published version of '${packageName}' satisfies '${source.constraint || '*'}' required by ${source.requirer}` +
        `${reason ? ` (${reason})` : ''}. Available: ${available}`,
      ErrorCodes.NO_MATCHING_VERSION,
      { packageName, source, availableVersions }
    );
    this.name = 'NoMatchingVersionError';
  }
}

export class BacktrackLimitError extends BlpackError {
  constructor(readonly limit: number, readonly targetKey: string) {
    super(
      `Resolution for ${targetKey} gave up after ${limit} backtracks`,
      ErrorCodes.RESOLUTION_TOO_DEEP,
      { limit, targetKey },
      'narrow the version ranges of your dependencies'
    );
    this.name = 'BacktrackLimitError';
  }
}

/** 거부된 휠과 사유 */
export interface RejectedWheel {
  filename: string;
  reason: 'interpreter' | 'platform' | 'os-version';
  /** os-version으로 거부된 경우 휠이 요구하는 최소 버전 */
  requiredOsVersion?: OsVersion;
}

export class NoCompatibleWheelError extends BlpackError {
  constructor(
    readonly packageName: string,
    readonly version: string,
    readonly targetKey: string,
    readonly rejected: readonly RejectedWheel[],
    remedy?: string
  ) {
    super(
      `No wheel of ${packageName}==${version} is compatible with ${targetKey} (${rejected.length} rejected)`,
      ErrorCodes.NO_COMPATIBLE_WHEEL,
      { packageName, version, targetKey, rejected },
      remedy
    );
    this.name = 'NoCompatibleWheelError';
  }
}

export class PackageNotFoundError extends BlpackError {
  constructor(packageName: string, version?: string) {
    super(
      version ? `Package '${packageName}==${version}' not found` : `Package '${packageName}' not found`,
      ErrorCodes.PACKAGE_NOT_FOUND,
      { packageName, version }
    );
    this.name = 'PackageNotFoundError';
  }
}

export class IndexQueryError extends BlpackError {
  constructor(url: string, cause: string) {
    super(`Index query failed for ${url}: ${cause}`, ErrorCodes.INDEX_QUERY_ERROR, { url });
    this.name = 'IndexQueryError';
  }
}

export class IntegrityError extends BlpackError {
  constructor(filename: string, expected: string, actual: string) {
    super(
      `Hash mismatch for ${filename}: expected ${expected}, got ${actual}`,
      ErrorCodes.INTEGRITY_ERROR,
      { filename, expected, actual }
    );
    this.name = 'IntegrityError';
  }
}

export class DownloadError extends BlpackError {
  constructor(filename: string, cause: string, readonly status?: number) {
    super(`Download of ${filename} failed: ${cause}`, ErrorCodes.DOWNLOAD_ERROR, { filename, status });
    this.name = 'DownloadError';
  }
}

export class BuildCancelledError extends BlpackError {
  constructor(stage: string) {
    super(`Cancelled during ${stage}`, ErrorCodes.CANCELLED, { stage });
    this.name = 'BuildCancelledError';
  }
}

export class ProjectConfigError extends BlpackError {
  constructor(file: string, field: string, reason: string) {
    super(`${file}: invalid '${field}': ${reason}`, ErrorCodes.PROJECT_CONFIG_ERROR, { file, field });
    this.name = 'ProjectConfigError';
  }
}

export class ManifestValidationError extends BlpackError {
  constructor(readonly problems: readonly string[]) {
    super(`Invalid extension manifest:\n${problems.map((p) => `  - ${p}`).join('\n')}`, ErrorCodes.MANIFEST_VALIDATION, {
      problems,
    });
    this.name = 'ManifestValidationError';
  }
}

export class ConfigError extends BlpackError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * 에러를 사용자에게 보여줄 문자열로 변환
 */
export function formatError(error: unknown): string {
  if (error instanceof BlpackError) {
    return error.remedy ? `${error.message}\n  hint: ${error.remedy}` : error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * 에러 로깅 후 메시지 반환
 */
export function handleError(error: unknown): string {
  if (error instanceof BlpackError) {
    logger.debug(error.message, { code: error.code, details: error.details });
  } else if (error instanceof Error) {
    logger.logError(error, '예상치 못한 에러');
  } else {
    logger.error('알 수 없는 에러', { error: String(error) });
  }
  return formatError(error);
}

/**
 * Commander 액션용 에러 핸들링 래퍼
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      console.error(handleError(error));
      process.exit(1);
    }
  };
}
