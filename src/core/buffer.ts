/**
 * Text Buffer
 *
 * The document model: an ordered, never-empty list of lines without
 * separators. The buffer knows nothing about cursors; callers pass
 * positions and receive the counts they need for dirty tracking.
 */

import type { Position, Range } from './position.ts';

export class TextBuffer {
  private lines: string[];
  private modified = false;

  constructor(lines: readonly string[] = ['']) {
    this.lines = lines.length > 0 ? [...lines] : [''];
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────────────

  lineCount(): number {
    return this.lines.length;
  }

  lineAt(row: number): string {
    return this.lines[row] ?? '';
  }

  lineLength(row: number): number {
    return this.lineAt(row).length;
  }

  getLines(): readonly string[] {
    return this.lines;
  }

  getText(): string {
    return this.lines.join('\n');
  }

  isModified(): boolean {
    return this.modified;
  }

  setModified(modified: boolean): void {
    this.modified = modified;
  }

  /**
   * Text spanned by a normalized range, lines joined with '\n'.
   */
  textInRange(range: Range): string {
    const { start, end } = range;
    if (start.row === end.row) {
      return this.lineAt(start.row).slice(start.col, end.col);
    }

    const parts = [this.lineAt(start.row).slice(start.col)];
    for (let row = start.row + 1; row < end.row; row++) {
      parts.push(this.lineAt(row));
    }
    parts.push(this.lineAt(end.row).slice(0, end.col));
    return parts.join('\n');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Mutations
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Replace the whole document, e.g. after loading another file.
   */
  replaceAll(lines: readonly string[]): void {
    this.lines = lines.length > 0 ? [...lines] : [''];
    this.modified = false;
  }

  /**
   * Insert text without separators at a position.
   */
  insert(at: Position, text: string): void {
    const line = this.lineAt(at.row);
    this.lines[at.row] = line.slice(0, at.col) + text + line.slice(at.col);
    this.modified = true;
  }

  /**
   * Split a line in two at a position.
   */
  splitLine(at: Position): void {
    const line = this.lineAt(at.row);
    this.lines.splice(at.row, 1, line.slice(0, at.col), line.slice(at.col));
    this.modified = true;
  }

  /**
   * Remove a normalized range, merging its first and last lines.
   * Returns the number of lines removed from the document.
   */
  deleteRange(range: Range): number {
    const { start, end } = range;
    const head = this.lineAt(start.row).slice(0, start.col);
    const tail = this.lineAt(end.row).slice(end.col);
    const removed = end.row - start.row;

    this.lines.splice(start.row, removed + 1, head + tail);
    this.modified = true;
    return removed;
  }
}
