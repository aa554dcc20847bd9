/**
 * Editor Session
 *
 * The single owner of everything an open document needs: the buffer, the
 * cursor and selection anchor, the remembered visual column for vertical
 * movement, the viewport and the dirty tracker. Every mutation records the
 * rows it touched so the renderer can redraw only those.
 */

import { TextBuffer } from './buffer.ts';
import { Viewport } from './viewport.ts';
import { DirtyTracker } from './dirty-tracker.ts';
import { charLengthAt, charLengthBefore, logicalColumn, snapToCharStart, visualColumn } from './columns.ts';
import { normalizeRange, positionsEqual, type Position, type Range } from './position.ts';

// ============================================
// Types
// ============================================

export interface EditorOptions {
  /** Tab stop width in cells */
  tabSize: number;
  /** Left/right movement crosses line boundaries */
  wrapAtEdges: boolean;
  /** Up on the first line goes to its start, down on the last line to its end */
  edgeJump: boolean;
  /** Matches one word character; must not carry the g or y flag */
  wordPattern: RegExp;
}

export const DEFAULT_EDITOR_OPTIONS: EditorOptions = {
  tabSize: 8,
  wrapAtEdges: true,
  edgeJump: true,
  wordPattern: /[A-Za-z0-9_]/,
};

export type Direction = -1 | 1;

export interface MoveOptions {
  /** Keep the remembered visual column (vertical movement) */
  keepColumnMemory?: boolean;
}

// ============================================
// Editor Session
// ============================================

export class EditorSession {
  readonly buffer: TextBuffer;
  readonly viewport: Viewport;
  readonly dirty: DirtyTracker;

  private cursor: Position = { row: 0, col: 0 };
  private anchor: Position = { row: 0, col: 0 };
  private selecting = false;
  /** Visual column vertical movement aims for, null when unset */
  private columnMemory: number | null = null;
  private options: EditorOptions;

  constructor(
    lines: readonly string[] = [''],
    size: { height: number; width: number } = { height: 24, width: 80 },
    options: Partial<EditorOptions> = {}
  ) {
    this.buffer = new TextBuffer(lines);
    this.viewport = new Viewport(size.height, size.width);
    this.dirty = new DirtyTracker();
    this.options = { ...DEFAULT_EDITOR_OPTIONS, ...options };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // State
  // ─────────────────────────────────────────────────────────────────────────

  getOptions(): EditorOptions {
    return { ...this.options };
  }

  setOptions(options: Partial<EditorOptions>): void {
    this.options = { ...this.options, ...options };
    this.dirty.requestFullRedraw();
  }

  getCursor(): Position {
    return { ...this.cursor };
  }

  getAnchor(): Position {
    return { ...this.anchor };
  }

  getColumnMemory(): number | null {
    return this.columnMemory;
  }

  /**
   * While selecting, cursor movement leaves the anchor in place.
   */
  setSelecting(selecting: boolean): void {
    this.selecting = selecting;
  }

  cursorVisualColumn(): number {
    return visualColumn(this.buffer.lineAt(this.cursor.row), this.cursor.col, this.options.tabSize);
  }

  /**
   * Load new contents, e.g. after opening another file.
   */
  replaceDocument(lines: readonly string[]): void {
    this.buffer.replaceAll(lines);
    this.cursor = { row: 0, col: 0 };
    this.anchor = { row: 0, col: 0 };
    this.columnMemory = null;
    this.viewport.reset();
    this.dirty.requestFullRedraw();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Selection
  // ─────────────────────────────────────────────────────────────────────────

  selectionExists(): boolean {
    return !positionsEqual(this.anchor, this.cursor);
  }

  /**
   * Normalized selection, derived from anchor and cursor on every call.
   */
  selectionRange(): Range | null {
    if (!this.selectionExists()) return null;
    return normalizeRange(this.anchor, this.cursor);
  }

  getSelectedText(): string | null {
    const range = this.selectionRange();
    if (!range) return null;
    return this.buffer.textInRange(range);
  }

  selectAll(): void {
    const last = this.buffer.lineCount() - 1;
    this.anchor = { row: 0, col: 0 };
    this.cursor = { row: last, col: this.buffer.lineLength(last) };
    this.columnMemory = null;
    this.dirty.record(0, last);
  }

  /**
   * Drop the selection without moving the cursor.
   */
  clearSelection(): void {
    const range = this.selectionRange();
    this.anchor = { ...this.cursor };
    if (range) {
      this.dirty.record(range.start.row, range.end.row);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Cursor Movement
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Place the cursor. The row is clamped to the document; the column is
   * clamped to the target line and never splits a surrogate pair.
   */
  moveCursor(row: number, col: number, opts: MoveOptions = {}): void {
    const lastRow = this.buffer.lineCount() - 1;
    const r = Math.min(Math.max(0, row), lastRow);
    const c = snapToCharStart(this.buffer.lineAt(r), Math.min(Math.max(0, col), this.buffer.lineLength(r)));

    const before = this.selectionRange();
    const oldCursor = this.cursor;
    const oldAnchor = this.anchor;

    this.cursor = { row: r, col: c };
    if (!this.selecting) {
      this.anchor = { ...this.cursor };
    }
    if (!opts.keepColumnMemory) {
      this.columnMemory = null;
    }

    this.recordSelectionChange(before, oldCursor, oldAnchor);
  }

  /**
   * Move up (negative) or down (positive) by `delta` rows, tracking the
   * remembered visual column across lines of different length.
   */
  moveVertical(delta: number): void {
    if (delta === 0) return;

    if (this.collapseSelection(delta < 0 ? -1 : 1)) return;

    const { row, col } = this.cursor;
    const lastRow = this.buffer.lineCount() - 1;
    const target = Math.min(Math.max(0, row + delta), lastRow);

    if (target === row) {
      if (this.options.edgeJump) {
        this.moveCursor(row, delta < 0 ? 0 : this.buffer.lineLength(row));
      }
      return;
    }

    if (this.columnMemory === null) {
      this.columnMemory = visualColumn(this.buffer.lineAt(row), col, this.options.tabSize);
    }
    const targetCol = logicalColumn(this.buffer.lineAt(target), this.columnMemory, this.options.tabSize);
    this.moveCursor(target, targetCol, { keepColumnMemory: true });
  }

  /**
   * Move one character or one word left (-1) or right (1).
   */
  moveHorizontal(direction: Direction, byWord: boolean = false): void {
    if (this.collapseSelection(direction)) return;

    const target = byWord ? this.wordTarget(direction) : this.charTarget(direction);
    this.moveCursor(target.row, target.col);
  }

  moveToLineStart(): void {
    this.moveCursor(this.cursor.row, 0);
  }

  moveToLineEnd(): void {
    this.moveCursor(this.cursor.row, this.buffer.lineLength(this.cursor.row));
  }

  moveToDocumentStart(): void {
    this.moveCursor(0, 0);
  }

  moveToDocumentEnd(): void {
    const last = this.buffer.lineCount() - 1;
    this.moveCursor(last, this.buffer.lineLength(last));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Editing
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Remove the selected span. Returns false when nothing is selected.
   */
  deleteSelection(): boolean {
    const range = this.selectionRange();
    if (!range) return false;
    this.deleteSpan(range);
    return true;
  }

  /**
   * Insert text containing no line separators at the cursor.
   */
  insertText(text: string): void {
    this.deleteSelection();
    if (text.length === 0) return;

    const { row, col } = this.cursor;
    this.buffer.insert(this.cursor, text);
    this.cursor = { row, col: col + text.length };
    this.anchor = { ...this.cursor };
    this.columnMemory = null;
    this.dirty.record(row, row);
  }

  /**
   * Split the current line at the cursor.
   */
  insertNewline(): void {
    this.deleteSelection();

    const { row } = this.cursor;
    this.buffer.splitLine(this.cursor);
    this.cursor = { row: row + 1, col: 0 };
    this.anchor = { ...this.cursor };
    this.columnMemory = null;
    this.dirty.record(row, row + 1, 1);
  }

  /**
   * Insert text that may span several lines, e.g. from the clipboard.
   */
  insertMultilineText(text: string): void {
    this.deleteSelection();

    const segments = text.split(/\r\n|\r|\n/);
    segments.forEach((segment, i) => {
      if (i > 0) this.insertNewline();
      if (segment.length > 0) this.insertText(segment);
    });
  }

  /**
   * Delete the selection, or the character before the cursor, joining
   * with the previous line at column 0.
   */
  backspace(): boolean {
    if (this.deleteSelection()) return true;

    const { row, col } = this.cursor;
    if (col > 0) {
      const size = charLengthBefore(this.buffer.lineAt(row), col);
      this.deleteSpan({ start: { row, col: col - size }, end: { row, col } });
      return true;
    }
    if (row > 0) {
      this.deleteSpan({ start: { row: row - 1, col: this.buffer.lineLength(row - 1) }, end: { row, col: 0 } });
      return true;
    }
    return false;
  }

  /**
   * Delete the selection, or the character under the cursor, joining
   * with the next line at the end of a line.
   */
  deleteForward(): boolean {
    if (this.deleteSelection()) return true;

    const { row, col } = this.cursor;
    const length = this.buffer.lineLength(row);
    if (col < length) {
      const size = charLengthAt(this.buffer.lineAt(row), col);
      this.deleteSpan({ start: { row, col }, end: { row, col: col + size } });
      return true;
    }
    if (row < this.buffer.lineCount() - 1) {
      this.deleteSpan({ start: { row, col }, end: { row: row + 1, col: 0 } });
      return true;
    }
    return false;
  }

  /**
   * Delete the selection, or back to the previous word boundary.
   */
  deleteWordBackward(): boolean {
    if (this.deleteSelection()) return true;

    const target = this.wordTarget(-1);
    if (positionsEqual(target, this.cursor)) return false;
    this.deleteSpan({ start: target, end: { ...this.cursor } });
    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────

  private deleteSpan(range: Range): void {
    const removed = this.buffer.deleteRange(range);
    this.cursor = { ...range.start };
    this.anchor = { ...range.start };
    this.columnMemory = null;
    this.dirty.record(range.start.row, range.start.row, -removed);
  }

  /**
   * With a selection present and selecting off, a direction key only
   * collapses the selection onto its start or end.
   */
  private collapseSelection(direction: Direction): boolean {
    if (this.selecting) return false;
    const range = this.selectionRange();
    if (!range) return false;

    const edge = direction < 0 ? range.start : range.end;
    this.moveCursor(edge.row, edge.col);
    return true;
  }

  private charTarget(direction: Direction): Position {
    const { row, col } = this.cursor;
    const line = this.buffer.lineAt(row);
    const length = line.length;

    if (direction < 0) {
      if (col > 0) return { row, col: col - charLengthBefore(line, col) };
      if (row > 0 && this.options.wrapAtEdges) {
        return { row: row - 1, col: this.buffer.lineLength(row - 1) };
      }
      return { row, col };
    }

    if (col < length) return { row, col: col + charLengthAt(line, col) };
    if (row < this.buffer.lineCount() - 1 && this.options.wrapAtEdges) {
      return { row: row + 1, col: 0 };
    }
    return { row, col };
  }

  private wordTarget(direction: Direction): Position {
    const { row, col } = this.cursor;
    const line = this.buffer.lineAt(row);

    if (direction > 0) {
      if (col >= line.length) return this.charTarget(1);
      let i = col;
      while (i < line.length && !this.isWordChar(line[i])) i++;
      while (i < line.length && this.isWordChar(line[i])) i++;
      return { row, col: i };
    }

    if (col === 0) return this.charTarget(-1);
    let i = col;
    while (i > 0 && !this.isWordChar(line[i - 1])) i--;
    while (i > 0 && this.isWordChar(line[i - 1])) i--;
    return { row, col: i };
  }

  private isWordChar(ch: string | undefined): boolean {
    return ch !== undefined && this.options.wordPattern.test(ch);
  }

  /**
   * Record the rows whose selection highlight may have changed.
   */
  private recordSelectionChange(before: Range | null, oldCursor: Position, oldAnchor: Position): void {
    const after = this.selectionRange();
    if (!before && !after) return;

    if (positionsEqual(oldAnchor, this.anchor)) {
      this.dirty.record(oldCursor.row, this.cursor.row);
      return;
    }
    for (const range of [before, after]) {
      if (range) this.dirty.record(range.start.row, range.end.row);
    }
  }
}

// ============================================
// Factory Functions
// ============================================

export function createEditorSession(
  lines?: readonly string[],
  size?: { height: number; width: number },
  options?: Partial<EditorOptions>
): EditorSession {
  return new EditorSession(lines, size, options);
}
