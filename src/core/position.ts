/**
 * Positions and Ranges
 */

/**
 * A place in the document. `col` may equal the line length
 * (just after the last character).
 */
export interface Position {
  row: number;
  col: number;
}

/**
 * Normalized span with start <= end in row-major order.
 */
export interface Range {
  start: Position;
  end: Position;
}

export function comparePositions(a: Position, b: Position): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.col - b.col;
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.row === b.row && a.col === b.col;
}

/**
 * Order two positions into a range.
 */
export function normalizeRange(a: Position, b: Position): Range {
  return comparePositions(a, b) <= 0
    ? { start: { ...a }, end: { ...b } }
    : { start: { ...b }, end: { ...a } };
}
