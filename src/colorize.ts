/**
 * TableColorizer - conditional background colors for rendered HTML tables
 *
 * Takes table markup that was rendered moments earlier, a column, a color
 * and a filter, and styles every body row (or just its cell) whose value in
 * that column passes the filter. Passes compose: a second rule only touches
 * the rows/cells it matches, and recoloring replaces a previous
 * background-color instead of stacking a second one.
 *
 * Usage:
 *   const html = new TableColorizer(tableHtml)
 *     .color({ property: 'Status', color: 'orange', filter: "Status -eq 'Warning'", scope: 'row' })
 *     .color({ property: 'TotalMB', color: 'red', filter: 'TotalMB -gt 2048' })
 *     .html();
 */

import { ConfigurationError, LookupError } from './errors';
import { bindCell, compileFilter } from './filter';
import {
  applyEdits,
  findRows,
  scanMarkup,
  setBackgroundColor,
  type MarkupEdit,
  type RowMarkup,
} from './markup';
import type { ColorRule, ColorScope } from './types';

// ============================================================================
// Validation
// ============================================================================

const NAMED_COLOR = /^[a-z]+$/i;
const HEX_COLOR = /^#(?:[0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;
const FUNCTION_COLOR = /^(?:rgb|hsl)a?\(\s*[\d.%\s,/]+\)$/i;

/**
 * Accept a CSS named, hex or rgb()/hsl() color; anything else would have to
 * be escaped into the style attribute, so it is refused outright.
 */
export function validateColor(color: string): string {
  const trimmed = color.trim();
  if (NAMED_COLOR.test(trimmed) || HEX_COLOR.test(trimmed) || FUNCTION_COLOR.test(trimmed)) {
    return trimmed;
  }
  throw new ConfigurationError(`Invalid color "${color}": expected a named, hex or rgb() color`);
}

function resolveColumn(row: RowMarkup, property: string): number {
  const wanted = property.trim().toLowerCase();
  const index = row.cells.findIndex(cell => cell.text.toLowerCase() === wanted);
  if (index === -1) {
    throw new LookupError(
      `target property not found in header: "${property}"`,
      property,
      row.cells.map(cell => cell.text)
    );
  }
  return index;
}

// ============================================================================
// Core Pass
// ============================================================================

export interface ColorizeResult {
  lines: string[];
  /** Rows (row scope) or cells (cell scope) that were styled */
  matched: number;
}

/**
 * One colorize pass over table lines.
 *
 * All setup (color, filter) is validated before the first line is read, and
 * the output is only returned once every line has been processed, so a
 * failure never leaves the caller with half-colored markup.
 */
export function applyColorRule(lines: readonly string[], rule: ColorRule): ColorizeResult {
  const color = validateColor(rule.color);
  const property = rule.property.trim();
  const filter = compileFilter(rule.filter, property);
  const scope: ColorScope = rule.scope ?? 'cell';

  let columnIndex: number | undefined;
  let matched = 0;

  const output = lines.map(line => {
    if (!line.includes('<')) return line;

    const rows = findRows(scanMarkup(line));
    if (rows.length === 0) return line;

    const edits: MarkupEdit[] = [];

    for (const row of rows) {
      if (row.kind === 'header') {
        columnIndex = resolveColumn(row, property);
        continue;
      }

      if (columnIndex === undefined) {
        throw new LookupError(
          `target property not found in header: "${rule.property}" (no header row before the first data row)`,
          rule.property
        );
      }

      const cell = row.cells[columnIndex];
      if (!cell) continue;

      if (!filter.test(bindCell(cell.text))) continue;

      edits.push(setBackgroundColor(scope === 'row' ? row.tag : cell.tag, color));
      matched++;
    }

    return edits.length > 0 ? applyEdits(line, edits) : line;
  });

  return { lines: output, matched };
}

/**
 * Color the cells (or rows, with `rowScope`) of a table whose `property`
 * column satisfies `filter`.
 *
 * @throws ConfigurationError bad color, filter not mentioning the property,
 *         malformed filter, or a comparison of mismatched kinds
 * @throws LookupError the property is not a header of the table
 */
export function colorize(
  lines: readonly string[],
  property: string,
  color: string,
  filter: string,
  rowScope = false
): string[] {
  return applyColorRule(lines, {
    property,
    color,
    filter,
    scope: rowScope ? 'row' : 'cell',
  }).lines;
}

/**
 * String-in, string-out form of colorize. Splits on "\n" only, so "\r\n"
 * documents keep their line endings.
 */
export function colorizeHtml(html: string, rule: ColorRule): string {
  return applyColorRule(html.split('\n'), rule).lines.join('\n');
}

// ============================================================================
// TableColorizer Class
// ============================================================================

export interface AppliedRule {
  rule: ColorRule;
  matched: number;
}

export class TableColorizer {
  private current: string[];
  private readonly original: string[];
  private history: AppliedRule[] = [];

  constructor(markup: string | readonly string[]) {
    this.original = typeof markup === 'string' ? markup.split('\n') : [...markup];
    this.current = [...this.original];
  }

  /**
   * Apply one rule on top of the previous ones.
   * On failure the markup is left as it was before this call.
   */
  color(rule: ColorRule): this {
    const result = applyColorRule(this.current, rule);
    this.current = result.lines;
    this.history.push({ rule, matched: result.matched });
    return this;
  }

  /**
   * Apply several rules in order
   */
  colorAll(rules: readonly ColorRule[]): this {
    for (const rule of rules) this.color(rule);
    return this;
  }

  /**
   * Rules applied so far, with how many rows/cells each styled
   */
  get applied(): AppliedRule[] {
    return [...this.history];
  }

  lines(): string[] {
    return [...this.current];
  }

  html(): string {
    return this.current.join('\n');
  }

  /**
   * Drop all applied rules
   */
  reset(): this {
    this.current = [...this.original];
    this.history = [];
    return this;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createColorizer(markup: string | readonly string[]): TableColorizer {
  return new TableColorizer(markup);
}

/**
 * Apply a list of rules to an HTML table in one call
 */
export function colorizeTable(html: string, rules: readonly ColorRule[]): string {
  return new TableColorizer(html).colorAll(rules).html();
}
