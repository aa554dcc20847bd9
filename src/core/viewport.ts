/**
 * Viewport
 *
 * The window of the document shown on screen: an origin in document
 * coordinates (row, visual column) and a size in terminal cells.
 */

export class Viewport {
  private _minRow = 0;
  private _minCol = 0;
  private _height: number;
  private _width: number;

  constructor(height: number, width: number) {
    this._height = Math.max(1, height);
    this._width = Math.max(1, width);
  }

  get minRow(): number {
    return this._minRow;
  }

  get minCol(): number {
    return this._minCol;
  }

  get height(): number {
    return this._height;
  }

  get width(): number {
    return this._width;
  }

  get maxRow(): number {
    return this._minRow + this._height - 1;
  }

  get maxCol(): number {
    return this._minCol + this._width - 1;
  }

  /**
   * Signed row delta that brings `row` into view; 0 when already visible.
   */
  requiredScroll(row: number): number {
    if (row < this._minRow) return row - this._minRow;
    if (row > this.maxRow) return row - this.maxRow;
    return 0;
  }

  /**
   * Signed column delta that brings visual column `col` into view.
   */
  requiredPan(col: number): number {
    if (col < this._minCol) return col - this._minCol;
    if (col > this.maxCol) return col - this.maxCol;
    return 0;
  }

  scrollBy(delta: number): void {
    this._minRow = Math.max(0, this._minRow + delta);
  }

  panBy(delta: number): void {
    this._minCol = Math.max(0, this._minCol + delta);
  }

  /**
   * Change the size, keeping the origin.
   */
  resize(height: number, width: number): void {
    this._height = Math.max(1, height);
    this._width = Math.max(1, width);
  }

  /**
   * Move the origin back to the top-left corner.
   */
  reset(): void {
    this._minRow = 0;
    this._minCol = 0;
  }
}
