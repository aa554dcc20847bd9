/**
 * Status Bar
 *
 * The last terminal row: a transient message or the document name and
 * modified flag on the left, the cursor position on the right.
 */

// ============================================
// Types
// ============================================

export interface StatusInfo {
  /** Transient message; replaces the document name when set */
  message: string | null;
  documentName: string;
  modified: boolean;
  /** 0-indexed cursor row */
  row: number;
  /** 0-indexed logical column */
  col: number;
  /** 0-indexed visual column */
  visualCol: number;
  /** Mark (sticky selection) mode indicator */
  marking?: boolean;
}

// ============================================
// Formatting
// ============================================

/**
 * Fit text to exactly `width` cells, cutting from the end.
 */
export function fitToWidth(text: string, width: number): string {
  if (width <= 0) return '';
  if (text.length > width) return text.slice(0, width);
  return text + ' '.repeat(width - text.length);
}

export function formatPosition(info: Pick<StatusInfo, 'row' | 'col' | 'visualCol'>): string {
  return `Ln ${info.row + 1}, Col ${info.col + 1} (${info.visualCol + 1})`;
}

/**
 * Build the status text for a row `width` cells wide. The position is
 * kept whole; the left part is cut when space runs out.
 */
export function formatStatusLine(info: StatusInfo, width: number): string {
  let left = info.message ?? `${info.documentName}${info.modified ? ' [+]' : ''}`;
  if (info.marking && info.message === null) {
    left += ' [mark]';
  }
  const right = formatPosition(info);

  const room = width - right.length - 2;
  if (room <= 0) {
    return fitToWidth(right, width);
  }
  return ` ${fitToWidth(left, room)}${right} `;
}

// ============================================
// Status Bar
// ============================================

/**
 * Holds the transient message between renders.
 */
export class StatusBar {
  private message: string | null = null;

  setMessage(message: string): void {
    this.message = message;
  }

  getMessage(): string | null {
    return this.message;
  }

  clearMessage(): void {
    this.message = null;
  }
}

export function createStatusBar(): StatusBar {
  return new StatusBar();
}
