/**
 * Filter Language
 *
 * A small boolean expression language over one free variable: the value of
 * the rule's column in the current row. Filters are written the way report
 * authors already write them on the command line:
 *
 *   Size -gt 100
 *   Status -eq 'Warning' -or Status -eq 'ProhibitSend'
 *   -not (Name -like 'svc-*') -and TotalMB -ge 1.5GB
 *
 * Compiled once into an immutable tree, then evaluated per row. Nothing in the
 * filter text is ever executed.
 *
 * @example
 * const filter = compileFilter('Size -gt 100', 'Size');
 * filter.test({ text: '120', value: 120 });  // true
 */

import { ConfigurationError } from './errors';
import type {
  BoundCell,
  CellValue,
  ComparisonOperator,
  FilterNode,
  FilterOperand,
} from './types';

// ============================================================================
// Tokens
// ============================================================================

type LogicalKeyword = 'and' | 'or' | 'xor' | 'not';

type Token =
  | { type: 'value'; pos: number }
  | { type: 'number'; value: number; pos: number }
  | { type: 'string'; value: string; pos: number }
  | { type: 'constant'; value: boolean | null; pos: number }
  | { type: 'operator'; operator: ComparisonOperator; caseSensitive: boolean; pos: number }
  | { type: 'logical'; keyword: LogicalKeyword; pos: number }
  | { type: 'lparen' | 'rparen'; pos: number }
  | { type: 'eof'; pos: number };

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set<ComparisonOperator>([
  'eq', 'ne', 'lt', 'le', 'gt', 'ge', 'like', 'notlike', 'match', 'notmatch',
]);

const LOGICAL_KEYWORDS: ReadonlySet<string> = new Set<LogicalKeyword>(['and', 'or', 'xor', 'not']);

const PATTERN_OPERATORS: ReadonlySet<ComparisonOperator> = new Set([
  'like', 'notlike', 'match', 'notmatch',
]);

const NUMBER_PATTERN = /[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?(kb|mb|gb|tb|pb)?(?![\w.])/iy;

const MULTIPLIERS: Record<string, number> = {
  kb: 1024,
  mb: 1024 ** 2,
  gb: 1024 ** 3,
  tb: 1024 ** 4,
  pb: 1024 ** 5,
};

const WORD_CHAR = /[\w]/;

function isComparisonOperator(word: string): word is ComparisonOperator {
  return COMPARISON_OPERATORS.has(word);
}

function isLogicalKeyword(word: string): word is LogicalKeyword {
  return LOGICAL_KEYWORDS.has(word);
}

// ============================================================================
// Lexer
// ============================================================================

/**
 * Does `property` start at `index` on identifier boundaries?
 * Boundaries only matter where the property itself begins/ends with a word char.
 */
function propertyAt(source: string, index: number, property: string): boolean {
  const candidate = source.slice(index, index + property.length);
  if (candidate.toLowerCase() !== property.toLowerCase()) return false;

  const before = source[index - 1];
  const after = source[index + property.length];
  if (WORD_CHAR.test(property[0]) && before !== undefined && WORD_CHAR.test(before)) {
    return false;
  }
  if (WORD_CHAR.test(property[property.length - 1]) && after !== undefined && WORD_CHAR.test(after)) {
    return false;
  }
  return true;
}

function readWord(source: string, start: number): string {
  let end = start;
  while (end < source.length && WORD_CHAR.test(source[end])) end++;
  return source.slice(start, end);
}

function tokenize(source: string, property: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  function fail(message: string): never {
    throw new ConfigurationError(`Invalid filter "${source}": ${message}`, { filter: source });
  }

  while (i < source.length) {
    const char = source[i];

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    // The rule's column stands for the current row's value
    if (propertyAt(source, i, property)) {
      tokens.push({ type: 'value', pos: i });
      i += property.length;
      continue;
    }

    if (char === '(' || char === ')') {
      tokens.push({ type: char === '(' ? 'lparen' : 'rparen', pos: i });
      i++;
      continue;
    }

    if (char === '!') {
      tokens.push({ type: 'logical', keyword: 'not', pos: i });
      i++;
      continue;
    }

    // Quoted string; a doubled quote is a literal quote
    if (char === "'" || char === '"') {
      const start = i;
      let value = '';
      i++;
      for (;;) {
        if (i >= source.length) fail(`unterminated string starting at position ${start}`);
        if (source[i] === char) {
          if (source[i + 1] === char) {
            value += char;
            i += 2;
            continue;
          }
          i++;
          break;
        }
        value += source[i];
        i++;
      }
      tokens.push({ type: 'string', value, pos: start });
      continue;
    }

    // Number, possibly signed, possibly with a size multiplier
    if (/[\d.+-]/.test(char)) {
      NUMBER_PATTERN.lastIndex = i;
      const match = NUMBER_PATTERN.exec(source);
      if (match) {
        const suffix = match[1]?.toLowerCase();
        const base = parseFloat(suffix ? match[0].slice(0, -2) : match[0]);
        tokens.push({ type: 'number', value: suffix ? base * MULTIPLIERS[suffix] : base, pos: i });
        i += match[0].length;
        continue;
      }
    }

    // -operator / -keyword
    if (char === '-' && /[a-z]/i.test(source[i + 1] ?? '')) {
      const word = readWord(source, i + 1).toLowerCase();
      const start = i;
      i += word.length + 1;

      if (isLogicalKeyword(word)) {
        tokens.push({ type: 'logical', keyword: word, pos: start });
        continue;
      }

      // -ceq is case-sensitive, -ieq is the explicit form of the default
      const prefix = word[0];
      const bare = prefix === 'c' || prefix === 'i' ? word.slice(1) : word;
      if (bare !== word && isComparisonOperator(bare)) {
        tokens.push({ type: 'operator', operator: bare, caseSensitive: prefix === 'c', pos: start });
        continue;
      }
      if (isComparisonOperator(word)) {
        tokens.push({ type: 'operator', operator: word, caseSensitive: false, pos: start });
        continue;
      }
      fail(`unknown operator "-${word}" at position ${start}`);
    }

    if (char === '$') {
      const word = readWord(source, i + 1).toLowerCase();
      if (word === 'true' || word === 'false' || word === 'null') {
        tokens.push({
          type: 'constant',
          value: word === 'null' ? null : word === 'true',
          pos: i,
        });
        i += word.length + 1;
        continue;
      }
      fail(`unknown variable "$${word}" at position ${i}`);
    }

    const word = readWord(source, i);
    if (word) {
      fail(`unexpected "${word}" at position ${i}; only "${property}" may appear unquoted`);
    }
    fail(`unexpected "${char}" at position ${i}`);
  }

  tokens.push({ type: 'eof', pos: source.length });
  return tokens;
}

// ============================================================================
// Parser (recursive descent, lowest precedence first)
// ============================================================================

class FilterParser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly source: string
  ) {}

  parse(): FilterNode {
    const node = this.parseOr();
    const next = this.peek();
    if (next.type !== 'eof') {
      this.fail(`unexpected ${describeToken(next)} at position ${next.pos}`);
    }
    return node;
  }

  private parseOr(): FilterNode {
    let left = this.parseAnd();
    for (;;) {
      const next = this.peek();
      if (next.type !== 'logical' || (next.keyword !== 'or' && next.keyword !== 'xor')) {
        return left;
      }
      this.index++;
      left = { type: next.keyword, left, right: this.parseAnd() };
    }
  }

  private parseAnd(): FilterNode {
    let left = this.parseUnary();
    for (;;) {
      const next = this.peek();
      if (next.type !== 'logical' || next.keyword !== 'and') return left;
      this.index++;
      left = { type: 'and', left, right: this.parseUnary() };
    }
  }

  private parseUnary(): FilterNode {
    const next = this.peek();
    if (next.type === 'logical' && next.keyword === 'not') {
      this.index++;
      return { type: 'not', operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): FilterNode {
    const next = this.peek();
    if (next.type === 'lparen') {
      this.index++;
      const inner = this.parseOr();
      const close = this.peek();
      if (close.type !== 'rparen') {
        this.fail(`expected ")" at position ${close.pos}, found ${describeToken(close)}`);
      }
      this.index++;
      return inner;
    }
    return this.parseComparison();
  }

  private parseComparison(): FilterNode {
    const left = this.parseOperand();
    const op = this.peek();
    if (op.type !== 'operator') {
      this.fail(`expected a comparison operator at position ${op.pos}, found ${describeToken(op)}`);
    }
    this.index++;
    const right = this.parseOperand();

    return {
      type: 'comparison',
      operator: op.operator,
      caseSensitive: op.caseSensitive,
      left,
      right,
      pattern: PATTERN_OPERATORS.has(op.operator)
        ? this.compilePattern(op.operator, op.caseSensitive, right)
        : undefined,
    };
  }

  private parseOperand(): FilterOperand {
    const token = this.peek();
    switch (token.type) {
      case 'value':
        this.index++;
        return { kind: 'value' };
      case 'number':
        this.index++;
        return { kind: 'number', value: token.value };
      case 'string':
        this.index++;
        return { kind: 'string', value: token.value };
      case 'constant':
        this.index++;
        return token.value === null ? { kind: 'null' } : { kind: 'boolean', value: token.value };
      default:
        return this.fail(`expected a value at position ${token.pos}, found ${describeToken(token)}`);
    }
  }

  private compilePattern(
    operator: ComparisonOperator,
    caseSensitive: boolean,
    operand: FilterOperand
  ): RegExp {
    if (operand.kind !== 'string' && operand.kind !== 'number') {
      return this.fail(`the pattern for -${operator} must be a quoted string`);
    }
    const text = String(operand.value);
    const flags = caseSensitive ? 's' : 'is';

    const wildcard = operator === 'like' || operator === 'notlike';
    try {
      return wildcard ? wildcardToRegExp(text, flags) : new RegExp(text, flags);
    } catch (err) {
      // e.g. a reversed range such as [z-a]
      throw new ConfigurationError(
        `Invalid filter "${this.source}": bad ${wildcard ? 'wildcard pattern' : 'regular expression'} "${text}"`,
        { filter: this.source, cause: err }
      );
    }
  }

  private peek(): Token {
    return this.tokens[this.index] ?? this.tokens[this.tokens.length - 1];
  }

  private fail(message: string): never {
    throw new ConfigurationError(`Invalid filter "${this.source}": ${message}`, {
      filter: this.source,
    });
  }
}

function describeToken(token: Token): string {
  switch (token.type) {
    case 'eof': return 'end of filter';
    case 'value': return 'the column value';
    case 'number': return `number ${token.value}`;
    case 'string': return `'${token.value}'`;
    case 'constant': return `$${String(token.value)}`;
    case 'operator': return `-${token.operator}`;
    case 'logical': return `-${token.keyword}`;
    case 'lparen': return '"("';
    case 'rparen': return '")"';
  }
}

/**
 * Convert a -like wildcard pattern to an anchored RegExp.
 *   *      any run of characters
 *   ?      exactly one character
 *   [a-c]  character set
 *   `x     literal x
 */
export function wildcardToRegExp(pattern: string, flags = 'is'): RegExp {
  let source = '';

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];

    if (char === '`' && i + 1 < pattern.length) {
      source += escapeRegExp(pattern[++i]);
    } else if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '[') {
      const close = pattern.indexOf(']', i + 1);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      const set = pattern.slice(i + 1, close).replace(/\\/g, '\\\\');
      source += `[${set}]`;
      i = close;
    } else {
      source += escapeRegExp(char);
    }
  }

  return new RegExp(`^${source}$`, flags);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

// ============================================================================
// Evaluation
// ============================================================================

type Scalar = string | number | boolean | null;

function resolveOperand(operand: FilterOperand, cell: BoundCell): Scalar {
  switch (operand.kind) {
    case 'value': return cell.value;
    case 'null': return null;
    default: return operand.value;
  }
}

function operandText(operand: FilterOperand, cell: BoundCell): string {
  switch (operand.kind) {
    case 'value': return cell.text;
    case 'null': return '';
    case 'boolean': return operand.value ? 'True' : 'False';
    default: return String(operand.value);
  }
}

function kindOf(value: Scalar): string {
  if (value === null) return '$null';
  return typeof value === 'string' ? `string '${value}'` : `${typeof value} ${String(value)}`;
}

function compare(
  node: Extract<FilterNode, { type: 'comparison' }>,
  cell: BoundCell,
  source: string
): boolean {
  const { operator, caseSensitive } = node;

  if (node.pattern) {
    const matched = node.pattern.test(operandText(node.left, cell));
    return operator === 'like' || operator === 'match' ? matched : !matched;
  }

  const left = resolveOperand(node.left, cell);
  const right = resolveOperand(node.right, cell);

  const mismatch = (): never => {
    throw new ConfigurationError(
      `Filter "${source}" compares ${kindOf(left)} with ${kindOf(right)} using -${operator}`,
      { filter: source }
    );
  };

  // $null only answers "is this cell empty?"
  if (left === null || right === null) {
    if (operator !== 'eq' && operator !== 'ne') return mismatch();
    const other = left === null ? right : left;
    const empty = other === null || other === '';
    return operator === 'eq' ? empty : !empty;
  }

  if (typeof left === 'number' && typeof right === 'number') {
    return ordered(operator, left, right);
  }

  if (typeof left === 'string' && typeof right === 'string') {
    return caseSensitive
      ? ordered(operator, left, right)
      : ordered(operator, left.toLowerCase(), right.toLowerCase());
  }

  if (typeof left === 'boolean' && typeof right === 'boolean') {
    if (operator === 'eq') return left === right;
    if (operator === 'ne') return left !== right;
  }

  return mismatch();
}

function ordered<T extends string | number>(operator: ComparisonOperator, a: T, b: T): boolean {
  switch (operator) {
    case 'eq': return a === b;
    case 'ne': return a !== b;
    case 'lt': return a < b;
    case 'le': return a <= b;
    case 'gt': return a > b;
    case 'ge': return a >= b;
    default: return false;
  }
}

/**
 * Evaluate a compiled tree against one cell.
 * Throws ConfigurationError when a comparison mixes value kinds.
 */
export function evaluateFilter(node: FilterNode, cell: BoundCell, source = ''): boolean {
  switch (node.type) {
    case 'comparison':
      return compare(node, cell, source);
    case 'and':
      return evaluateFilter(node.left, cell, source) && evaluateFilter(node.right, cell, source);
    case 'or':
      return evaluateFilter(node.left, cell, source) || evaluateFilter(node.right, cell, source);
    case 'xor':
      return evaluateFilter(node.left, cell, source) !== evaluateFilter(node.right, cell, source);
    case 'not':
      return !evaluateFilter(node.operand, cell, source);
  }
}

function referencesValue(node: FilterNode): boolean {
  switch (node.type) {
    case 'comparison':
      return node.left.kind === 'value' || node.right.kind === 'value';
    case 'not':
      return referencesValue(node.operand);
    default:
      return referencesValue(node.left) || referencesValue(node.right);
  }
}

// ============================================================================
// Public API
// ============================================================================

export interface CompiledFilter {
  readonly source: string;
  readonly property: string;
  readonly root: FilterNode;
  test(cell: BoundCell): boolean;
}

/**
 * Compile a filter for one column. Fails with ConfigurationError when the
 * filter never mentions the column or does not parse.
 */
export function compileFilter(source: string, property: string): CompiledFilter {
  if (!property || !source.toLowerCase().includes(property.toLowerCase())) {
    throw new ConfigurationError(
      `filter does not reference target property "${property}": ${source}`,
      { filter: source }
    );
  }

  const root = new FilterParser(tokenize(source, property), source).parse();

  // "'Status' -eq 'x'" mentions the column only inside a literal
  if (!referencesValue(root)) {
    throw new ConfigurationError(
      `filter does not reference target property "${property}": ${source}`,
      { filter: source }
    );
  }

  return Object.freeze({
    source,
    property,
    root,
    test: (cell: BoundCell) => evaluateFilter(root, cell, source),
  });
}

const CELL_NUMBER = /^[+-]?(?:\d{1,3}(?:,\d{3})+|\d+)?(?:\.\d+)?(?:e[+-]?\d+)?$/i;

/**
 * Interpret cell text: a number when it reads as one (with optional
 * thousands separators), otherwise the trimmed text.
 */
export function parseCellValue(text: string): CellValue {
  const trimmed = text.trim();
  if (!trimmed || !CELL_NUMBER.test(trimmed) || !/\d/.test(trimmed)) return trimmed;

  const num = Number(trimmed.replace(/,/g, ''));
  return Number.isFinite(num) ? num : trimmed;
}

/** Bind cell text to the shape the evaluator reads */
export function bindCell(text: string): BoundCell {
  const trimmed = text.trim();
  return { text: trimmed, value: parseCellValue(trimmed) };
}
