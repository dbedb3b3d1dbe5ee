/**
 * PEP 508 요구사항 문자열 파싱
 * 형식: name[extra1,extra2] specifier ; marker
 */

import type { DependencySpec, MarkerNode } from '../../types';
import { BlpackError, RequirementSyntaxError } from '../errors';
import { markerToString, normalizeExtraName, parseMarker } from './pip-marker';
import { normalizePackageName } from './pip-wheel';
import { parseSpecifierSet } from './version-utils';

const NAME_PATTERN = /^\s*([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*/;
const EXTRAS_PATTERN = /^\[([^\]]*)\]\s*/;

/**
 * 요구사항 문자열을 DependencySpec으로 파싱
 * @throws RequirementSyntaxError
 */
export function parseRequirement(text: string): DependencySpec {
  const nameMatch = NAME_PATTERN.exec(text);
  if (!nameMatch) {
    throw new RequirementSyntaxError(text, 'missing package name');
  }
  const rawName = nameMatch[1];
  let rest = text.slice(nameMatch[0].length);

  let extras: string[] = [];
  const extrasMatch = EXTRAS_PATTERN.exec(rest);
  if (extrasMatch) {
    extras = extrasMatch[1]
      .split(',')
      .map((e) => e.trim())
      .filter((e) => e.length > 0)
      .map(normalizeExtraName);
    rest = rest.slice(extrasMatch[0].length);
  }

  if (rest.startsWith('@')) {
    throw new RequirementSyntaxError(text, 'direct URL references are not supported');
  }

  const semicolon = rest.indexOf(';');
  const specifierText = (semicolon === -1 ? rest : rest.slice(0, semicolon)).trim();
  const markerText = semicolon === -1 ? null : rest.slice(semicolon + 1).trim();

  const specifier = specifierText.replace(/^\((.*)\)$/, '$1').replace(/\s+/g, '');
  try {
    parseSpecifierSet(specifier);
  } catch (error) {
    if (error instanceof BlpackError) {
      throw new RequirementSyntaxError(text, error.message);
    }
    throw error;
  }

  let marker: MarkerNode | null = null;
  if (markerText) {
    try {
      marker = parseMarker(markerText);
    } catch (error) {
      if (error instanceof BlpackError) {
        throw new RequirementSyntaxError(text, error.message);
      }
      throw error;
    }
  }

  return {
    name: normalizePackageName(rawName),
    rawName,
    extras: [...new Set(extras)].sort(),
    specifier,
    marker,
    markerText: marker ? markerToString(marker) : null,
  };
}

/**
 * DependencySpec을 PEP 508 문자열로 변환
 */
export function formatRequirement(spec: DependencySpec): string {
  const extras = spec.extras.length > 0 ? `[${spec.extras.join(',')}]` : '';
  const marker = spec.markerText ? `; ${spec.markerText}` : '';
  return `${spec.rawName}${extras}${spec.specifier}${marker}`;
}
