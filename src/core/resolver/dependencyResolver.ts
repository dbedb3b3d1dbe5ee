/**
 * 의존성 그래프 해결기
 *
 * 하나의 타겟 (Blender 릴리스 x 플랫폼 x Python ABI)에 대해 백트래킹으로 버전을 결정한다.
 * Blender가 번들하는 패키지는 고정된 결정으로 취급하며 결과에 포함하지 않는다.
 */

import type {
  BlenderRelease,
  DependencySpec,
  PackageRelease,
  ReferencePin,
  ResolvedDependency,
  TargetEnvironment,
} from '../../types';
import logger from '../../utils/logger';
import {
  BacktrackLimitError,
  BlpackError,
  BuildCancelledError,
  ErrorCodes,
  NoMatchingVersionError,
  ReferenceConflictError,
  ResolutionConflictError,
  type ConstraintSource,
} from '../errors';
import { suggestReferenceRemedy } from '../blender/releases';
import { evaluateMarker, type MarkerContext } from '../shared/pip-marker';
import { parseRequirement } from '../shared/pip-requirement';
import type { PackageIndex } from '../shared/pip-index';
import {
  isVersionCompatible,
  sortVersionsDescending,
  specifierAllowsPrereleases,
  tryParseSpecifierSet,
} from '../shared/version-utils';

/** 프로젝트 루트 요구자 이름 */
export const PROJECT_REQUIRER = '<project>';

export interface DependencyResolverOptions {
  /** 최대 백트래킹 횟수 */
  maxBacktracks: number;
  allowPrereleases: boolean;
  signal?: AbortSignal;
}

/** 제약과 함께 요청된 extra */
interface Constraint extends ConstraintSource {
  extras: readonly string[];
}

interface Decision {
  version: string;
  release: PackageRelease;
  extras: readonly string[];
  /** 프로젝트에서 이 패키지까지의 경로 (자신 포함) */
  path: readonly string[];
}

interface ResolutionState {
  decisions: Map<string, Decision>;
  constraints: Map<string, Constraint[]>;
  /** 도입 순서 (루트 요구사항이 선언 순서대로 앞에 옴) */
  order: string[];
}

/** 실패 기록 (최종 에러 생성용) */
type Failure =
  | { kind: 'constraints'; name: string; sources: readonly ConstraintSource[] }
  | { kind: 'pin'; name: string; sources: readonly ConstraintSource[]; pinVersion: string }
  | { kind: 'unusable'; name: string; sources: readonly ConstraintSource[]; skipped: readonly string[] };

function cloneState(state: ResolutionState): ResolutionState {
  return {
    decisions: new Map(state.decisions),
    constraints: new Map([...state.constraints].map(([name, list]) => [name, [...list]])),
    order: [...state.order],
  };
}

/**
 * 요구자 경로들의 가장 가까운 공통 조상
 */
export function findCommonAncestor(paths: readonly (readonly string[])[]): string {
  if (paths.length === 0) return PROJECT_REQUIRER;
  let ancestor = PROJECT_REQUIRER;
  const shortest = Math.min(...paths.map((p) => p.length));
  for (let i = 0; i < shortest; i++) {
    const segment = paths[0][i];
    if (!paths.every((p) => p[i] === segment)) break;
    ancestor = segment;
  }
  return ancestor;
}

function unionExtras(a: readonly string[], b: readonly string[]): string[] {
  return [...new Set([...a, ...b])].sort();
}

export class DependencyResolver {
  private readonly pins: ReadonlyMap<string, ReferencePin>;
  private readonly requirementCache = new Map<string, DependencySpec | null>();
  private backtracks = 0;
  private failures: Failure[] = [];

  constructor(
    private readonly index: PackageIndex,
    private readonly release: BlenderRelease,
    private readonly target: TargetEnvironment,
    private readonly options: DependencyResolverOptions
  ) {
    const pins = new Map<string, ReferencePin>();
    for (const [name, pin] of release.referencePackages) {
      if (pin.platforms.includes(target.platform)) pins.set(name, pin);
    }
    this.pins = pins;
  }

  /**
   * 타겟에 적용되는 루트 요구사항만 남김
   */
  pruneRootSpecs(specs: readonly DependencySpec[]): DependencySpec[] {
    return specs.filter((spec) => {
      if (spec.blenderSeries !== undefined && spec.blenderSeries !== this.target.series) return false;
      return spec.marker ? evaluateMarker(spec.marker, this.markerContext([])) : true;
    });
  }

  /**
   * 의존성 해결
   * @returns 결정 순서대로 정렬된 해결 결과 (휠 미포함)
   */
  async resolve(specs: readonly DependencySpec[]): Promise<ResolvedDependency[]> {
    this.backtracks = 0;
    this.failures = [];

    const roots = this.pruneRootSpecs(specs);
    this.checkReferenceConflicts(roots);

    const state: ResolutionState = { decisions: new Map(), constraints: new Map(), order: [] };
    for (const spec of roots) {
      this.addEdge(state, spec, PROJECT_REQUIRER, [PROJECT_REQUIRER]);
    }

    const solved = await this.solve(state);
    if (!solved) {
      throw await this.buildError();
    }

    logger.debug('의존성 해결 완료', {
      target: this.target.key,
      packages: solved.decisions.size,
      backtracks: this.backtracks,
    });

    return solved.order.flatMap((name): ResolvedDependency[] => {
      const decision = solved.decisions.get(name);
      if (!decision) return [];
      const requiredBy = [...new Set((solved.constraints.get(name) ?? []).map((c) => c.requirer))];
      return [{ name, version: decision.version, requiredBy, wheels: [] }];
    });
  }

  /**
   * 백트래킹 횟수 (마지막 resolve 기준)
   */
  getBacktrackCount(): number {
    return this.backtracks;
  }

  private markerContext(extras: readonly string[]): MarkerContext {
    return {
      environment: this.target.markerEnvironment,
      extras: [...this.target.extras, ...extras],
    };
  }

  private checkReferenceConflicts(roots: readonly DependencySpec[]): void {
    for (const spec of roots) {
      const pin = this.pins.get(spec.name);
      if (pin && !isVersionCompatible(pin.version, spec.specifier, { prereleases: true })) {
        throw new ReferenceConflictError(
          spec.name,
          pin.version,
          spec.specifier,
          this.release.version,
          suggestReferenceRemedy(spec.name, spec.specifier, this.release)
        );
      }
    }
  }

  private pinSource(pin: ReferencePin): ConstraintSource {
    const requirer = `Blender ${this.release.version}`;
    return { requirer, constraint: `==${pin.version}`, path: [requirer] };
  }

  /**
   * 의존성 간선 추가
   * @returns 기존 결정 또는 레퍼런스 고정과 충돌하면 false
   */
  private addEdge(state: ResolutionState, spec: DependencySpec, requirer: string, path: readonly string[]): boolean {
    const source: Constraint = { requirer, constraint: spec.specifier, path, extras: spec.extras };

    const pin = this.pins.get(spec.name);
    if (pin) {
      if (isVersionCompatible(pin.version, spec.specifier, { prereleases: true })) return true;
      this.failures.push({
        kind: 'pin',
        name: spec.name,
        sources: [source, this.pinSource(pin)],
        pinVersion: pin.version,
      });
      return false;
    }

    const constraints = state.constraints.get(spec.name) ?? [];
    state.constraints.set(spec.name, [...constraints, source]);
    if (!state.order.includes(spec.name)) {
      state.order.push(spec.name);
    }

    const decision = state.decisions.get(spec.name);
    if (!decision) return true;

    if (!isVersionCompatible(decision.version, spec.specifier, { prereleases: true })) {
      this.failures.push({ kind: 'constraints', name: spec.name, sources: [...constraints, source] });
      return false;
    }

    // 이미 결정된 패키지에 새 extra가 추가되면 해당 의존성 확장
    const added = spec.extras.filter((e) => !decision.extras.includes(e));
    if (added.length === 0) return true;
    const extras = unionExtras(decision.extras, added);
    state.decisions.set(spec.name, { ...decision, extras });
    return this.expandDependencies(state, spec.name, { ...decision, extras }, decision.extras);
  }

  /**
   * 결정된 패키지의 requires_dist 확장
   * previousExtras가 주어지면 새 extra로 인해 추가되는 간선만 확장
   */
  private expandDependencies(
    state: ResolutionState,
    name: string,
    decision: Decision,
    previousExtras?: readonly string[]
  ): boolean {
    for (const text of decision.release.requiresDist) {
      const dep = this.parseDependency(name, decision.version, text);
      if (!dep) continue;

      const applies = dep.marker ? evaluateMarker(dep.marker, this.markerContext(decision.extras)) : true;
      if (!applies) continue;
      if (previousExtras) {
        const appliedBefore = dep.marker ? evaluateMarker(dep.marker, this.markerContext(previousExtras)) : true;
        if (appliedBefore) continue;
      }

      if (!this.addEdge(state, dep, name, decision.path)) {
        return false;
      }
    }
    return true;
  }

  private parseDependency(name: string, version: string, text: string): DependencySpec | null {
    const cached = this.requirementCache.get(text);
    if (cached !== undefined) return cached;

    let parsed: DependencySpec | null = null;
    try {
      parsed = parseRequirement(text);
    } catch (error) {
      if (!(error instanceof BlpackError)) throw error;
      logger.warn('해석할 수 없는 의존성 메타데이터, 건너뜀', { package: name, version, requirement: text });
    }
    this.requirementCache.set(text, parsed);
    return parsed;
  }

  private allowsPrereleases(constraints: readonly Constraint[]): boolean {
    return this.options.allowPrereleases || constraints.some((c) => specifierAllowsPrereleases(c.constraint));
  }

  private satisfiesAll(version: string, constraints: readonly ConstraintSource[], prereleases: boolean): boolean {
    return constraints.every((c) => isVersionCompatible(version, c.constraint, { prereleases }));
  }

  private nextUndecided(state: ResolutionState): string | undefined {
    return state.order.find((name) => !state.decisions.has(name));
  }

  private checkCancelled(): void {
    if (this.options.signal?.aborted) {
      throw new BuildCancelledError('resolution');
    }
  }

  private countBacktrack(): void {
    this.backtracks++;
    if (this.backtracks > this.options.maxBacktracks) {
      throw new BacktrackLimitError(this.options.maxBacktracks, this.target.key);
    }
  }

  /**
   * 후보가 이 타겟에서 사용 가능한지 (requires_python, 휠 존재)
   */
  private isUsable(release: PackageRelease): boolean {
    if (release.wheels.length === 0) return false;
    if (!release.requiresPython) return true;
    const specs = tryParseSpecifierSet(release.requiresPython);
    if (!specs) {
      logger.warn('requires_python 해석 실패, 무시함', {
        package: release.name,
        version: release.version,
        requiresPython: release.requiresPython,
      });
      return true;
    }
    return isVersionCompatible(this.target.pythonVersion, specs, { prereleases: true });
  }

  private async solve(state: ResolutionState): Promise<ResolutionState | null> {
    this.checkCancelled();

    const name = this.nextUndecided(state);
    if (name === undefined) return state;

    const constraints = state.constraints.get(name) ?? [];
    const prereleases = this.allowsPrereleases(constraints);
    const versions = await this.index.listVersions(name, this.options.signal);
    const candidates = sortVersionsDescending(versions).filter((v) => this.satisfiesAll(v, constraints, prereleases));

    if (candidates.length === 0) {
      this.failures.push({ kind: 'constraints', name, sources: constraints });
      return null;
    }

    const skipped: string[] = [];
    const requestedExtras = constraints.reduce<string[]>((acc, c) => unionExtras(acc, c.extras), []);
    const path = [...(constraints[0]?.path ?? [PROJECT_REQUIRER]), name];

    for (const version of candidates) {
      this.checkCancelled();
      const release = await this.index.getRelease(name, version, this.options.signal);
      if (!this.isUsable(release)) {
        skipped.push(version);
        continue;
      }

      const next = cloneState(state);
      const decision: Decision = { version, release, extras: requestedExtras, path };
      next.decisions.set(name, decision);

      if (this.expandDependencies(next, name, decision)) {
        const solved = await this.solve(next);
        if (solved) return solved;
      }

      logger.debug('후보 거부, 백트래킹', { target: this.target.key, package: name, version });
      this.countBacktrack();
    }

    if (skipped.length === candidates.length) {
      this.failures.push({ kind: 'unusable', name, sources: constraints, skipped });
    }
    return null;
  }

  /**
   * 실패 기록으로 최종 에러 생성
   * 최근 기록부터 만족 불가능한 제약 집합을 찾음
   */
  private async buildError(): Promise<BlpackError> {
    for (const failure of [...this.failures].reverse()) {
      const error = await this.errorFromFailure(failure);
      if (error) return error;
    }

    const last = this.failures[this.failures.length - 1];
    if (last && last.sources.length >= 2) {
      const versions = sortVersionsDescending(await this.index.listVersions(last.name, this.options.signal));
      return new ResolutionConflictError(
        last.name,
        last.sources,
        findCommonAncestor(last.sources.map((s) => s.path)),
        versions.filter((v) => !this.satisfiesAll(v, last.sources, true))
      );
    }
    return new BlpackError(`Resolution failed for ${this.target.key}`, ErrorCodes.RESOLUTION_CONFLICT);
  }

  private async errorFromFailure(failure: Failure): Promise<BlpackError | null> {
    switch (failure.kind) {
      case 'pin':
        return new ResolutionConflictError(
          failure.name,
          failure.sources,
          findCommonAncestor(failure.sources.map((s) => s.path)),
          [failure.pinVersion]
        );

      case 'unusable': {
        const source = failure.sources[0] ?? { requirer: PROJECT_REQUIRER, constraint: '', path: [PROJECT_REQUIRER] };
        return new NoMatchingVersionError(
          failure.name,
          source,
          failure.skipped,
          `no wheels usable with Python ${this.target.pythonVersion}`
        );
      }

      case 'constraints': {
        const versions = sortVersionsDescending(await this.index.listVersions(failure.name, this.options.signal));
        const prereleases =
          this.options.allowPrereleases || failure.sources.some((s) => specifierAllowsPrereleases(s.constraint));
        if (versions.some((v) => this.satisfiesAll(v, failure.sources, prereleases))) {
          return null;
        }

        for (const source of failure.sources) {
          if (!versions.some((v) => this.satisfiesAll(v, [source], prereleases))) {
            return new NoMatchingVersionError(failure.name, source, versions);
          }
        }

        // 최소 불만족 부분집합 (각 제약은 단독으로 만족 가능하므로 2개 이상 남음)
        let minimal = [...failure.sources];
        for (const source of failure.sources) {
          const without = minimal.filter((s) => s !== source);
          if (!versions.some((v) => this.satisfiesAll(v, without, prereleases))) {
            minimal = without;
          }
        }
        return new ResolutionConflictError(
          failure.name,
          minimal,
          findCommonAncestor(minimal.map((s) => s.path)),
          versions
        );
      }
    }
  }
}
