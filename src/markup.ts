/**
 * Table Markup Scanner
 *
 * Recognizes the narrow table shape our renderer (and other simple HTML
 * table writers) emit: one <tr> per line, each cell an open tag, inner text and a
 * close tag. Not a general HTML parser.
 *
 *   <tr><th>Name</th><th>Size</th></tr>                     → header row
 *   <tr><td>Alice</td><td>120</td></tr>                     → data row
 *   <tr style="background-color:red"><td>Bob</td>...</tr>   → data row
 *   <table>, </table>, <colgroup>..., blank                → passed through
 *
 * Every token keeps its source span so rewrites splice into the original
 * line and leave every other byte alone.
 */

// ============================================================================
// Tokens
// ============================================================================

export interface MarkupAttribute {
  /** Lower-cased */
  name: string;
  /** Raw (undecoded) value, null for a bare attribute */
  value: string | null;
  quote: '"' | "'" | '';
  /** Span of the value inside the line, quotes excluded */
  valueStart: number;
  valueEnd: number;
}

export interface TagToken {
  type: 'tag';
  /** Lower-cased */
  name: string;
  closing: boolean;
  selfClosing: boolean;
  attributes: MarkupAttribute[];
  start: number;
  end: number;
  /** Where a new attribute goes: before ">" or "/>" */
  insertAt: number;
}

export interface TextToken {
  type: 'text';
  text: string;
  start: number;
  end: number;
}

export type MarkupToken = TagToken | TextToken;

const NAME_CHAR = /[A-Za-z0-9:-]/;
const ATTR_NAME_CHAR = /[^\s=>/"']/;

/**
 * Parse one tag starting at `start` (which holds "<").
 * Returns null when the text there is not a complete tag.
 */
function scanTag(line: string, start: number): TagToken | null {
  let i = start + 1;
  const closing = line[i] === '/';
  if (closing) i++;

  if (!/[A-Za-z]/.test(line[i] ?? '')) return null;

  let name = '';
  while (i < line.length && NAME_CHAR.test(line[i])) name += line[i++];

  const attributes: MarkupAttribute[] = [];
  let selfClosing = false;

  while (i < line.length) {
    const char = line[i];

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    if (char === '>') {
      return {
        type: 'tag',
        name: name.toLowerCase(),
        closing,
        selfClosing,
        attributes,
        start,
        end: i + 1,
        insertAt: selfClosing ? i - 1 : i,
      };
    }

    if (char === '/') {
      selfClosing = line[i + 1] === '>';
      i++;
      continue;
    }

    if (!ATTR_NAME_CHAR.test(char)) return null;

    let attrName = '';
    while (i < line.length && ATTR_NAME_CHAR.test(line[i])) attrName += line[i++];
    const nameEnd = i;
    while (i < line.length && /\s/.test(line[i])) i++;

    if (line[i] !== '=') {
      attributes.push({
        name: attrName.toLowerCase(),
        value: null,
        quote: '',
        valueStart: nameEnd,
        valueEnd: nameEnd,
      });
      continue;
    }

    i++;
    while (i < line.length && /\s/.test(line[i])) i++;

    const quote = line[i];
    if (quote === '"' || quote === "'") {
      const close = line.indexOf(quote, i + 1);
      if (close === -1) return null;
      attributes.push({
        name: attrName.toLowerCase(),
        value: line.slice(i + 1, close),
        quote,
        valueStart: i + 1,
        valueEnd: close,
      });
      i = close + 1;
    } else {
      const valueStart = i;
      while (i < line.length && !/[\s>]/.test(line[i])) i++;
      attributes.push({
        name: attrName.toLowerCase(),
        value: line.slice(valueStart, i),
        quote: '',
        valueStart,
        valueEnd: i,
      });
    }
  }

  return null;
}

/**
 * Split a line into tag and text tokens.
 * Anything that does not scan as a complete tag is kept as text.
 */
export function scanMarkup(line: string): MarkupToken[] {
  const tokens: MarkupToken[] = [];
  let textStart = 0;
  let i = 0;

  const flushText = (end: number) => {
    if (end > textStart) {
      tokens.push({ type: 'text', text: line.slice(textStart, end), start: textStart, end });
    }
  };

  while (i < line.length) {
    const open = line.indexOf('<', i);
    if (open === -1) break;

    const tag = scanTag(line, open);
    if (!tag) {
      i = open + 1;
      continue;
    }

    flushText(open);
    tokens.push(tag);
    i = tag.end;
    textStart = tag.end;
  }

  flushText(line.length);
  return tokens;
}

// ============================================================================
// Rows & Cells
// ============================================================================

export interface CellMarkup {
  /** The <td>/<th> open tag */
  tag: TagToken;
  /** Entity-decoded, trimmed inner text (inner tags dropped) */
  text: string;
}

export interface RowMarkup {
  kind: 'header' | 'data';
  /** The <tr> open tag */
  tag: TagToken;
  cells: CellMarkup[];
}

function openTag(token: MarkupToken | undefined, ...names: string[]): TagToken | undefined {
  return token?.type === 'tag' && !token.closing && names.includes(token.name) ? token : undefined;
}

function closeTag(token: MarkupToken | undefined, ...names: string[]): TagToken | undefined {
  return token?.type === 'tag' && token.closing && names.includes(token.name) ? token : undefined;
}

function nextSignificant(tokens: MarkupToken[], from: number): number {
  let j = from;
  while (j < tokens.length) {
    const token = tokens[j];
    if (token.type === 'text' && token.text.trim() === '') {
      j++;
      continue;
    }
    break;
  }
  return j;
}

/**
 * Find every header/data row in a scanned line.
 *
 * A row is an open <tr> immediately followed (whitespace aside) by an open
 * <th> (header) or <td> (data). Cells run until </tr>, the next <tr> or the
 * end of the line.
 */
export function findRows(tokens: MarkupToken[]): RowMarkup[] {
  const rows: RowMarkup[] = [];

  for (let k = 0; k < tokens.length; k++) {
    const rowTag = openTag(tokens[k], 'tr');
    if (!rowTag) continue;

    const first = nextSignificant(tokens, k + 1);
    const firstCell = openTag(tokens[first], 'th', 'td');
    if (!firstCell) continue;

    const cells: CellMarkup[] = [];
    let current: { tag: TagToken; text: string } | null = null;
    let j = first;

    for (; j < tokens.length; j++) {
      const token = tokens[j];
      if (closeTag(token, 'tr') || openTag(token, 'tr')) break;

      const cellTag = openTag(token, 'td', 'th');
      if (cellTag) {
        if (current) cells.push(finishCell(current));
        current = { tag: cellTag, text: '' };
      } else if (closeTag(token, 'td', 'th')) {
        if (current) cells.push(finishCell(current));
        current = null;
      } else if (token.type === 'text' && current) {
        current.text += token.text;
      }
    }
    if (current) cells.push(finishCell(current));

    rows.push({
      kind: firstCell.name === 'th' ? 'header' : 'data',
      tag: rowTag,
      cells,
    });
    k = j - 1;
  }

  return rows;
}

function finishCell(cell: { tag: TagToken; text: string }): CellMarkup {
  return { tag: cell.tag, text: decodeEntities(cell.text).trim() };
}

// ============================================================================
// Styles
// ============================================================================

export interface StyleDeclaration {
  property: string;
  value: string;
}

export function parseStyle(style: string): StyleDeclaration[] {
  return style
    .split(';')
    .map(part => {
      const colon = part.indexOf(':');
      if (colon === -1) return null;
      return {
        property: part.slice(0, colon).trim().toLowerCase(),
        value: part.slice(colon + 1).trim(),
      };
    })
    .filter((decl): decl is StyleDeclaration => decl !== null && decl.property !== '');
}

/** Current background-color of a tag, if it has one */
export function backgroundColorOf(tag: TagToken): string | undefined {
  const style = tag.attributes.find(a => a.name === 'style');
  if (!style?.value) return undefined;
  return parseStyle(style.value).find(d => d.property === 'background-color')?.value;
}

const BACKGROUND_DECLARATION = /(background-color\s*:\s*)([^;]*)/i;

/** A replacement of line[start, end) */
export interface MarkupEdit {
  start: number;
  end: number;
  text: string;
}

/**
 * The edit that gives `tag` a background color. An existing declaration is
 * replaced in place, so repeated passes never stack styles.
 */
export function setBackgroundColor(tag: TagToken, color: string): MarkupEdit {
  const style = tag.attributes.find(a => a.name === 'style');

  if (!style || style.value === null) {
    // No style (or a bare `style`): add a fresh attribute
    if (style) {
      return { start: style.valueStart, end: style.valueEnd, text: `="background-color:${color}"` };
    }
    return { start: tag.insertAt, end: tag.insertAt, text: ` style="background-color:${color}"` };
  }

  let value: string;
  if (BACKGROUND_DECLARATION.test(style.value)) {
    value = style.value.replace(BACKGROUND_DECLARATION, (_, prefix: string, old: string) => {
      const trailing = old.match(/\s*$/)?.[0] ?? '';
      return `${prefix}${color}${trailing}`;
    });
  } else {
    const trimmed = style.value.trimEnd();
    const separator = trimmed === '' || trimmed.endsWith(';') ? '' : ';';
    value = `${trimmed}${separator}background-color:${color}`;
  }

  if (style.quote === '') {
    return { start: style.valueStart, end: style.valueEnd, text: `"${value}"` };
  }
  return { start: style.valueStart, end: style.valueEnd, text: value };
}

/** Apply non-overlapping edits to a line */
export function applyEdits(line: string, edits: MarkupEdit[]): string {
  return [...edits]
    .sort((a, b) => b.start - a.start)
    .reduce((acc, edit) => acc.slice(0, edit.start) + edit.text + acc.slice(edit.end), line);
}

// ============================================================================
// Entities
// ============================================================================

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body[0] === '#') {
      const code = body[1] === 'x' || body[1] === 'X'
        ? parseInt(body.slice(2), 16)
        : parseInt(body.slice(1), 10);
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : entity;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}
