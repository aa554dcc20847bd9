/**
 * Status Bar Tests
 */

import { describe, test, expect } from 'vitest';
import { StatusBar, fitToWidth, formatPosition, formatStatusLine, type StatusInfo } from '../../../src/ui/status-bar.ts';

const info: StatusInfo = {
  message: null,
  documentName: 'notes.txt',
  modified: false,
  row: 0,
  col: 4,
  visualCol: 8,
};

describe('fitToWidth', () => {
  test('pads short text and cuts long text', () => {
    expect(fitToWidth('abc', 5)).toBe('abc  ');
    expect(fitToWidth('abcdef', 3)).toBe('abc');
    expect(fitToWidth('abc', 0)).toBe('');
  });
});

describe('formatStatusLine', () => {
  test('shows the position as line, column and visual column', () => {
    expect(formatPosition(info)).toBe('Ln 1, Col 5 (9)');
  });

  test('puts the document name left and the position right', () => {
    expect(formatStatusLine(info, 40)).toBe(' notes.txt' + ' '.repeat(14) + 'Ln 1, Col 5 (9) ');
  });

  test('flags unsaved changes', () => {
    expect(formatStatusLine({ ...info, modified: true }, 40)).toBe(' notes.txt [+]' + ' '.repeat(10) + 'Ln 1, Col 5 (9) ');
  });

  test('shows mark mode next to the name', () => {
    expect(formatStatusLine({ ...info, marking: true }, 40)).toBe(' notes.txt [mark]' + ' '.repeat(7) + 'Ln 1, Col 5 (9) ');
  });

  test('a message replaces the name', () => {
    expect(formatStatusLine({ ...info, message: 'Saved', marking: true }, 30)).toBe(' Saved' + ' '.repeat(8) + 'Ln 1, Col 5 (9) ');
  });

  test('the left part is cut first', () => {
    expect(formatStatusLine({ ...info, documentName: 'a-very-long-name.txt' }, 24)).toBe(' a-very-Ln 1, Col 5 (9) ');
  });

  test('a very narrow row keeps the start of the position', () => {
    expect(formatStatusLine(info, 10)).toBe('Ln 1, Col ');
  });

  test('is always exactly the requested width', () => {
    for (const width of [5, 17, 18, 40, 120]) {
      expect(formatStatusLine(info, width)).toHaveLength(width);
    }
  });
});

describe('StatusBar', () => {
  test('holds a message until cleared', () => {
    const bar = new StatusBar();
    expect(bar.getMessage()).toBeNull();
    bar.setMessage('Saved');
    expect(bar.getMessage()).toBe('Saved');
    bar.clearMessage();
    expect(bar.getMessage()).toBeNull();
  });
});
