/**
 * Dirty Tracker
 *
 * Accumulates what changed between two render passes: the union of the
 * touched document rows, the net change in line count, and whether the
 * whole screen has to be repainted.
 */

export interface DirtyRegion {
  /** First touched document row, or null if no row was recorded */
  firstRow: number | null;
  /** Last touched document row, or null if no row was recorded */
  lastRow: number | null;
  /** Net lines added (positive) or removed (negative) */
  lineDelta: number;
  fullRedraw: boolean;
}

export class DirtyTracker {
  private firstRow: number | null = null;
  private lastRow: number | null = null;
  private lineDelta = 0;
  private fullRedraw = false;

  /**
   * Widen the region to cover [firstRow, lastRow] and add `lineDelta`.
   * Any change to the line count shifts the rows below it, so a non-zero
   * `lineDelta` also requests a full redraw, even if a later record
   * cancels it out.
   */
  record(firstRow: number, lastRow: number, lineDelta: number = 0): void {
    const lo = Math.min(firstRow, lastRow);
    const hi = Math.max(firstRow, lastRow);
    this.firstRow = this.firstRow === null ? lo : Math.min(this.firstRow, lo);
    this.lastRow = this.lastRow === null ? hi : Math.max(this.lastRow, hi);
    this.lineDelta += lineDelta;
    if (lineDelta !== 0) this.fullRedraw = true;
  }

  requestFullRedraw(): void {
    this.fullRedraw = true;
  }

  /**
   * Whether the next render has to repaint every row.
   */
  needsFullRedraw(): boolean {
    return this.fullRedraw;
  }

  isClean(): boolean {
    return !this.fullRedraw && this.firstRow === null;
  }

  snapshot(): DirtyRegion {
    return {
      firstRow: this.firstRow,
      lastRow: this.lastRow,
      lineDelta: this.lineDelta,
      fullRedraw: this.fullRedraw,
    };
  }

  clear(): void {
    this.firstRow = null;
    this.lastRow = null;
    this.lineDelta = 0;
    this.fullRedraw = false;
  }
}
