/**
 * Renderer
 *
 * Keeps the terminal in step with the editing session while writing as
 * little as possible. Each pass picks one of three strategies:
 *
 *   1. full    - resize, horizontal pan or a line-count change: repaint
 *                every visible row
 *   2. scroll  - vertical scroll only: shift the text area with the
 *                terminal's scroll region and draw the exposed rows
 *   3. partial - redraw the recorded dirty rows
 *
 * Output is collected per pass and written in a single call.
 */

import { CURSOR, SCREEN, STYLE, styled } from '../terminal/ansi.ts';
import { expandTabs, lineWidth, visualColumn } from '../core/columns.ts';
import type { EditorSession } from '../core/session.ts';
import type { Range } from '../core/position.ts';
import { fitToWidth, formatStatusLine, type StatusInfo } from './status-bar.ts';

// ============================================
// Types
// ============================================

export interface RendererOptions {
  /** Output function. Defaults to process.stdout.write */
  output?: (data: string) => void;
  /** Sequence that starts selection highlighting */
  highlightStart?: string;
  /** Sequence that ends selection highlighting */
  highlightEnd?: string;
}

export type RenderMode = 'full' | 'scroll' | 'partial' | 'none';

/**
 * What a pass did, in document rows.
 */
export interface RenderReport {
  mode: RenderMode;
  rowsDrawn: number[];
  scrolled: number;
  panned: number;
}

/**
 * Replacement for the status row while a prompt is open.
 */
export interface PromptLine {
  text: string;
  cursorColumn: number;
}

export interface RowFormat {
  minCol: number;
  width: number;
  tabSize: number;
  /** Highlighted visual columns [from, to) */
  highlight?: { from: number; to: number } | null;
  highlightStart: string;
  highlightEnd: string;
}

// ============================================
// Row formatting
// ============================================

/**
 * Text for one document row: tabs expanded, a blank end-of-line cell
 * appended, clipped to the viewport columns, and selection markers
 * spliced in. The end marker goes in first so the start offset stays valid.
 */
export function formatRow(line: string, format: RowFormat): string {
  const cells = expandTabs(line, format.tabSize) + ' ';
  let text = cells.slice(format.minCol, format.minCol + format.width);

  const highlight = format.highlight;
  if (highlight) {
    const from = Math.min(Math.max(highlight.from - format.minCol, 0), text.length);
    const to = Math.min(Math.max(highlight.to - format.minCol, 0), text.length);
    if (to > from) {
      text = text.slice(0, to) + format.highlightEnd + text.slice(to);
      text = text.slice(0, from) + format.highlightStart + text.slice(from);
    }
  }
  return text;
}

/**
 * Visual columns of `row` covered by a selection, or null. A row whose
 * line break is selected includes its end-of-line cell.
 */
export function selectionSpanForRow(
  line: string,
  row: number,
  selection: Range | null,
  tabSize: number
): { from: number; to: number } | null {
  if (!selection || row < selection.start.row || row > selection.end.row) return null;

  const from = row === selection.start.row ? visualColumn(line, selection.start.col, tabSize) : 0;
  const to = row === selection.end.row ? visualColumn(line, selection.end.col, tabSize) : lineWidth(line, tabSize) + 1;
  return to > from ? { from, to } : null;
}

// ============================================
// Renderer Class
// ============================================

export class Renderer {
  private output: (data: string) => void;
  private highlightStart: string;
  private highlightEnd: string;

  constructor(options: RendererOptions = {}) {
    this.output = options.output ?? ((data: string) => process.stdout.write(data));
    this.highlightStart = options.highlightStart ?? STYLE.inverse;
    this.highlightEnd = options.highlightEnd ?? STYLE.noInverse;
  }

  setHighlight(start: string, end: string): void {
    this.highlightStart = start;
    this.highlightEnd = end;
  }

  /**
   * Bring the screen up to date with the session and place the cursor.
   */
  render(session: EditorSession, status: StatusInfo, prompt: PromptLine | null = null): RenderReport {
    const viewport = session.viewport;
    const dirty = session.dirty;
    const cursor = session.getCursor();

    const scroll = viewport.requiredScroll(cursor.row);
    const pan = viewport.requiredPan(session.cursorVisualColumn());

    const report: RenderReport = { mode: 'none', rowsDrawn: [], scrolled: scroll, panned: pan };
    let out = CURSOR.hide;

    if (dirty.needsFullRedraw() || pan !== 0 || Math.abs(scroll) >= viewport.height) {
      viewport.scrollBy(scroll);
      viewport.panBy(pan);
      for (let row = viewport.minRow; row <= viewport.maxRow; row++) {
        out += this.drawRow(session, row, report);
      }
      report.mode = 'full';
    } else {
      if (scroll !== 0) {
        out += SCREEN.setScrollRegion(1, viewport.height);
        out += scroll > 0 ? SCREEN.scrollUp(scroll) : SCREEN.scrollDown(-scroll);
        out += SCREEN.resetScrollRegion;
        viewport.scrollBy(scroll);

        const first = scroll > 0 ? viewport.maxRow - scroll + 1 : viewport.minRow;
        const last = scroll > 0 ? viewport.maxRow : viewport.minRow - scroll - 1;
        for (let row = first; row <= last; row++) {
          out += this.drawRow(session, row, report);
        }
        report.mode = 'scroll';
      }

      const region = dirty.snapshot();
      if (region.firstRow !== null && region.lastRow !== null) {
        const first = Math.max(region.firstRow, viewport.minRow);
        const last = Math.min(region.lastRow, viewport.maxRow);
        for (let row = first; row <= last; row++) {
          if (report.rowsDrawn.includes(row)) continue;
          out += this.drawRow(session, row, report);
          if (report.mode === 'none') report.mode = 'partial';
        }
      }
    }
    dirty.clear();

    out += this.drawStatus(viewport.height + 1, viewport.width, status, prompt);

    if (prompt) {
      out += CURSOR.moveTo(viewport.height + 1, Math.min(prompt.cursorColumn, viewport.width - 1) + 1);
    } else {
      const screenRow = cursor.row - viewport.minRow + 1;
      const screenCol = session.cursorVisualColumn() - viewport.minCol + 1;
      out += CURSOR.moveTo(screenRow, screenCol);
    }
    out += CURSOR.show;

    this.output(out);
    return report;
  }

  /**
   * Clear the whole screen; the next render must be a full one.
   */
  clearScreen(session: EditorSession): void {
    this.output(STYLE.reset + SCREEN.clear);
    session.dirty.requestFullRedraw();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Drawing
  // ─────────────────────────────────────────────────────────────────────────

  private drawRow(session: EditorSession, row: number, report: RenderReport): string {
    const viewport = session.viewport;
    const screenRow = row - viewport.minRow + 1;
    report.rowsDrawn.push(row);

    let out = CURSOR.moveTo(screenRow, 1) + SCREEN.clearLine;
    if (row >= session.buffer.lineCount()) {
      return out;
    }

    const line = session.buffer.lineAt(row);
    const tabSize = session.getOptions().tabSize;
    out += formatRow(line, {
      minCol: viewport.minCol,
      width: viewport.width,
      tabSize,
      highlight: selectionSpanForRow(line, row, session.selectionRange(), tabSize),
      highlightStart: this.highlightStart,
      highlightEnd: this.highlightEnd,
    });
    return out;
  }

  private drawStatus(screenRow: number, width: number, status: StatusInfo, prompt: PromptLine | null): string {
    const text = prompt ? fitToWidth(prompt.text, width) : formatStatusLine(status, width);
    return CURSOR.moveTo(screenRow, 1) + SCREEN.clearLine + styled(text, STYLE.inverse);
  }
}

// ============================================
// Factory Functions
// ============================================

export function createRenderer(options?: RendererOptions): Renderer {
  return new Renderer(options);
}

/**
 * Create a renderer that captures output (for testing).
 */
export function createTestRenderer(
  options: Omit<RendererOptions, 'output'> = {}
): { renderer: Renderer; getOutput: () => string; clearOutput: () => void } {
  let captured = '';

  const renderer = new Renderer({
    ...options,
    output: (data: string) => {
      captured += data;
    },
  });

  return {
    renderer,
    getOutput: () => captured,
    clearOutput: () => {
      captured = '';
    },
  };
}
