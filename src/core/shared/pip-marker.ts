/**
 * PEP 508 환경 마커 파서 및 평가기
 *
 * 참고:
 * - https://peps.python.org/pep-0508/#environment-markers
 */

import type { MarkerEnvironment, MarkerNode, MarkerOperand, MarkerOperator, MarkerVariable } from '../../types';
import { MarkerSyntaxError } from '../errors';
import { isVersionCompatible, tryParseSpecifierSet, tryParseVersion } from './version-utils';

type Token =
  | { type: 'lparen' | 'rparen'; pos: number }
  | { type: 'string'; value: string; pos: number }
  | { type: 'op'; value: MarkerOperator; pos: number }
  | { type: 'ident'; value: string; pos: number };

const MARKER_VARIABLES: readonly MarkerVariable[] = [
  'python_version',
  'python_full_version',
  'os_name',
  'sys_platform',
  'platform_release',
  'platform_system',
  'platform_version',
  'platform_machine',
  'platform_python_implementation',
  'implementation_name',
  'implementation_version',
  'extra',
];

// PEP 345 시절 점 표기 별칭
const LEGACY_ALIASES: Record<string, MarkerVariable> = {
  'os.name': 'os_name',
  'sys.platform': 'sys_platform',
  'platform.version': 'platform_version',
  'platform.machine': 'platform_machine',
  'platform.python_implementation': 'platform_python_implementation',
  python_implementation: 'platform_python_implementation',
};

const VERSION_VARIABLES: ReadonlySet<MarkerVariable> = new Set([
  'python_version',
  'python_full_version',
  'implementation_version',
]);

const OPERATOR_PATTERN = /^(===|==|!=|<=|>=|~=|<|>)/;

function toVariable(ident: string): MarkerVariable | null {
  const found = MARKER_VARIABLES.find((v) => v === ident);
  if (found) return found;
  return Object.prototype.hasOwnProperty.call(LEGACY_ALIASES, ident) ? LEGACY_ALIASES[ident] : null;
}

function isOperator(value: string): value is MarkerOperator {
  return ['===', '==', '!=', '<=', '>=', '~=', '<', '>'].includes(value);
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < text.length) {
    const ch = text[pos];
    if (/\s/.test(ch)) {
      pos++;
      continue;
    }
    if (ch === '(' || ch === ')') {
      tokens.push({ type: ch === '(' ? 'lparen' : 'rparen', pos });
      pos++;
      continue;
    }
    if (ch === '"' || ch === "'") {
      const end = text.indexOf(ch, pos + 1);
      if (end === -1) {
        throw new MarkerSyntaxError(text, pos, 'closing quote');
      }
      tokens.push({ type: 'string', value: text.slice(pos + 1, end), pos });
      pos = end + 1;
      continue;
    }
    const opMatch = OPERATOR_PATTERN.exec(text.slice(pos));
    if (opMatch && isOperator(opMatch[1])) {
      tokens.push({ type: 'op', value: opMatch[1], pos });
      pos += opMatch[1].length;
      continue;
    }
    const identMatch = /^[A-Za-z_][A-Za-z0-9_.]*/.exec(text.slice(pos));
    if (identMatch) {
      tokens.push({ type: 'ident', value: identMatch[0], pos });
      pos += identMatch[0].length;
      continue;
    }
    throw new MarkerSyntaxError(text, pos, 'a marker token');
  }

  return tokens;
}

class MarkerParser {
  private index = 0;

  constructor(
    private readonly text: string,
    private readonly tokens: Token[]
  ) {}

  parse(): MarkerNode {
    const node = this.parseOr();
    const rest = this.peek();
    if (rest) {
      throw new MarkerSyntaxError(this.text, rest.pos, 'end of marker');
    }
    return node;
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private position(): number {
    return this.peek()?.pos ?? this.text.length;
  }

  private isKeyword(keyword: string): boolean {
    const token = this.peek();
    return token !== undefined && token.type === 'ident' && token.value === keyword;
  }

  private parseOr(): MarkerNode {
    let left = this.parseAnd();
    while (this.isKeyword('or')) {
      this.index++;
      left = { kind: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): MarkerNode {
    let left = this.parseAtom();
    while (this.isKeyword('and')) {
      this.index++;
      left = { kind: 'and', left, right: this.parseAtom() };
    }
    return left;
  }

  private parseAtom(): MarkerNode {
    const token = this.peek();
    if (token?.type === 'lparen') {
      this.index++;
      const inner = this.parseOr();
      if (this.peek()?.type !== 'rparen') {
        throw new MarkerSyntaxError(this.text, this.position(), "')'");
      }
      this.index++;
      return inner;
    }
    const left = this.parseOperand();
    const op = this.parseOperator();
    const right = this.parseOperand();
    return { kind: 'compare', left, op, right };
  }

  private parseOperand(): MarkerOperand {
    const token = this.peek();
    if (token?.type === 'string') {
      this.index++;
      return { kind: 'string', value: token.value };
    }
    if (token?.type === 'ident') {
      const variable = toVariable(token.value);
      if (variable) {
        this.index++;
        return { kind: 'variable', name: variable };
      }
    }
    throw new MarkerSyntaxError(this.text, this.position(), 'a marker variable or quoted string');
  }

  private parseOperator(): MarkerOperator {
    const token = this.peek();
    if (token?.type === 'op') {
      this.index++;
      return token.value;
    }
    if (this.isKeyword('in')) {
      this.index++;
      return 'in';
    }
    if (this.isKeyword('not')) {
      this.index++;
      if (!this.isKeyword('in')) {
        throw new MarkerSyntaxError(this.text, this.position(), "'in' after 'not'");
      }
      this.index++;
      return 'not in';
    }
    throw new MarkerSyntaxError(this.text, this.position(), 'a comparison operator');
  }
}

/**
 * 마커 문자열 파싱
 * @throws MarkerSyntaxError
 */
export function parseMarker(text: string): MarkerNode {
  return new MarkerParser(text, tokenize(text)).parse();
}

/**
 * 마커 평가 컨텍스트
 */
export interface MarkerContext {
  environment: MarkerEnvironment;
  /** 요청된 extra 목록 */
  extras: readonly string[];
}

/**
 * extra 이름 정규화 (PEP 685)
 */
export function normalizeExtraName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

function operandValues(operand: MarkerOperand, context: MarkerContext): readonly string[] {
  if (operand.kind === 'string') return [operand.value];
  if (operand.name === 'extra') {
    return context.extras.length > 0 ? context.extras.map(normalizeExtraName) : [''];
  }
  if (operand.name === 'platform_machine') {
    return context.environment.platform_machine;
  }
  return [context.environment[operand.name]];
}

function compareValues(left: string, op: MarkerOperator, right: string, versionLike: boolean): boolean {
  switch (op) {
    case 'in':
      return right.includes(left);
    case 'not in':
      return !right.includes(left);
    case '===':
      return left === right;
  }

  const specs = versionLike && tryParseVersion(left) ? tryParseSpecifierSet(`${op}${right}`) : null;
  if (specs) {
    return isVersionCompatible(left, specs, { prereleases: true });
  }

  switch (op) {
    case '==':
      return left === right;
    case '!=':
      return left !== right;
    default:
      return false;
  }
}

function evaluateCompare(node: Extract<MarkerNode, { kind: 'compare' }>, context: MarkerContext): boolean {
  const operands = [node.left, node.right];
  const comparesExtra = operands.some((o) => o.kind === 'variable' && o.name === 'extra');
  const values = (operand: MarkerOperand): readonly string[] => {
    const raw = operandValues(operand, context);
    return comparesExtra && operand.kind === 'string' ? raw.map(normalizeExtraName) : raw;
  };
  const versionLike =
    operands.some((o) => o.kind === 'variable' && VERSION_VARIABLES.has(o.name)) ||
    operands.every((o) => o.kind === 'string');

  // extra는 요청된 것 중 하나라도 참이면 참
  const lefts = values(node.left);
  const rights = values(node.right);
  return lefts.some((l) => rights.some((r) => compareValues(l, node.op, r, versionLike)));
}

function evaluateNode(marker: MarkerNode, context: MarkerContext): boolean {
  switch (marker.kind) {
    case 'and':
      return evaluateNode(marker.left, context) && evaluateNode(marker.right, context);
    case 'or':
      return evaluateNode(marker.left, context) || evaluateNode(marker.right, context);
    case 'compare':
      return evaluateCompare(marker, context);
  }
}

/**
 * 마커 평가
 * platform_machine 값마다 마커 전체를 평가하고 하나라도 참이면 참
 */
export function evaluateMarker(marker: MarkerNode, context: MarkerContext): boolean {
  const machines = context.environment.platform_machine;
  if (machines.length <= 1) return evaluateNode(marker, context);
  return machines.some((machine) =>
    evaluateNode(marker, { ...context, environment: { ...context.environment, platform_machine: [machine] } })
  );
}

function operandToString(operand: MarkerOperand): string {
  return operand.kind === 'variable' ? operand.name : `"${operand.value}"`;
}

/**
 * 마커를 정규 문자열로 변환
 */
export function markerToString(marker: MarkerNode): string {
  if (marker.kind === 'compare') {
    return `${operandToString(marker.left)} ${marker.op} ${operandToString(marker.right)}`;
  }
  const wrap = (child: MarkerNode): string =>
    child.kind !== 'compare' && child.kind !== marker.kind ? `(${markerToString(child)})` : markerToString(child);
  return `${wrap(marker.left)} ${marker.kind} ${wrap(marker.right)}`;
}
