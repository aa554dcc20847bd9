/**
 * Column Mapping
 *
 * Conversion between logical columns (character offsets into a line) and
 * visual columns (terminal cells after tab expansion). Every UTF-16 code
 * unit other than a tab occupies one cell.
 */

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Code units taken by the character starting at `col` (2 for a surrogate
 * pair, 0 at or past the end of the line).
 */
export function charLengthAt(line: string, col: number): number {
  if (col < 0 || col >= line.length) return 0;
  if (isHighSurrogate(line.charCodeAt(col)) && isLowSurrogate(line.charCodeAt(col + 1))) return 2;
  return 1;
}

/**
 * Code units taken by the character ending at `col`.
 */
export function charLengthBefore(line: string, col: number): number {
  if (col <= 0 || col > line.length) return 0;
  if (col >= 2 && isLowSurrogate(line.charCodeAt(col - 1)) && isHighSurrogate(line.charCodeAt(col - 2))) return 2;
  return 1;
}

/**
 * Move `col` back to the start of the character it falls inside.
 */
export function snapToCharStart(line: string, col: number): number {
  return charLengthAt(line, col - 1) === 2 ? col - 1 : col;
}

/**
 * Cell width of a character starting at `visual`.
 */
function advance(ch: string, visual: number, tabSize: number): number {
  if (ch === '\t') {
    return (Math.floor(visual / tabSize) + 1) * tabSize;
  }
  return visual + 1;
}

/**
 * Visual column of logical column `charCol` in `line`.
 * Columns past the end of the line count as one cell each.
 */
export function visualColumn(line: string, charCol: number, tabSize: number): number {
  const end = Math.max(0, charCol);
  const walk = Math.min(end, line.length);
  let visual = 0;
  for (let i = 0; i < walk; i++) {
    visual = advance(line[i] ?? ' ', visual, tabSize);
  }
  return visual + (end - walk);
}

/**
 * Logical column whose visual position is closest to `visualTarget`
 * without passing it. A target inside a tab's expansion resolves to the
 * column before the tab, and one inside a surrogate pair to the column
 * before the pair; a target past the end resolves to the line length.
 */
export function logicalColumn(line: string, visualTarget: number, tabSize: number): number {
  let visual = 0;
  let i = 0;
  while (i < line.length) {
    if (visual >= visualTarget) return i;
    const size = charLengthAt(line, i);
    const next = size === 2 ? visual + 2 : advance(line[i] ?? ' ', visual, tabSize);
    if (next > visualTarget) return i;
    visual = next;
    i += size;
  }
  return line.length;
}

/**
 * Replace every tab with spaces up to the next tab stop.
 */
export function expandTabs(line: string, tabSize: number): string {
  if (!line.includes('\t')) return line;

  let out = '';
  for (const ch of line) {
    if (ch === '\t') {
      const width = tabSize - (out.length % tabSize);
      out += ' '.repeat(width);
    } else {
      out += ch;
    }
  }
  return out;
}

/**
 * Visual width of a whole line.
 */
export function lineWidth(line: string, tabSize: number): number {
  return visualColumn(line, line.length, tabSize);
}
