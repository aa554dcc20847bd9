/**
 * TextBuffer Tests
 */

import { describe, test, expect } from 'vitest';
import { TextBuffer } from '../../../src/core/buffer.ts';

describe('TextBuffer', () => {
  test('is never empty', () => {
    const buffer = new TextBuffer([]);
    expect(buffer.lineCount()).toBe(1);
    expect(buffer.lineAt(0)).toBe('');
  });

  test('out-of-range rows read as empty lines', () => {
    const buffer = new TextBuffer(['one']);
    expect(buffer.lineAt(5)).toBe('');
    expect(buffer.lineLength(5)).toBe(0);
  });

  test('insert splices text into a line', () => {
    const buffer = new TextBuffer(['held']);
    buffer.insert({ row: 0, col: 2 }, 'l');
    expect(buffer.getLines()).toEqual(['helld']);
    expect(buffer.isModified()).toBe(true);
  });

  test('splitLine breaks a line at a column', () => {
    const buffer = new TextBuffer(['abc', 'def']);
    buffer.splitLine({ row: 0, col: 3 });
    expect(buffer.getLines()).toEqual(['abc', '', 'def']);

    buffer.splitLine({ row: 2, col: 1 });
    expect(buffer.getLines()).toEqual(['abc', '', 'd', 'ef']);
  });

  test('deleteRange merges the first and last lines and reports removed lines', () => {
    const buffer = new TextBuffer(['foo', 'bar', 'baz']);
    const removed = buffer.deleteRange({ start: { row: 0, col: 1 }, end: { row: 2, col: 2 } });
    expect(removed).toBe(2);
    expect(buffer.getLines()).toEqual(['fz']);
  });

  test('deleteRange within a line removes nothing from the line count', () => {
    const buffer = new TextBuffer(['abcdef']);
    expect(buffer.deleteRange({ start: { row: 0, col: 1 }, end: { row: 0, col: 4 } })).toBe(0);
    expect(buffer.getLines()).toEqual(['aef']);
  });

  test('textInRange joins spanned lines with newlines', () => {
    const buffer = new TextBuffer(['foo', 'bar', 'baz']);
    expect(buffer.textInRange({ start: { row: 0, col: 1 }, end: { row: 2, col: 2 } })).toBe('oo\nbar\nba');
    expect(buffer.textInRange({ start: { row: 1, col: 0 }, end: { row: 1, col: 2 } })).toBe('ba');
  });

  test('replaceAll resets the modified flag', () => {
    const buffer = new TextBuffer(['x']);
    buffer.insert({ row: 0, col: 0 }, 'y');
    buffer.replaceAll(['a', 'b']);
    expect(buffer.getText()).toBe('a\nb');
    expect(buffer.isModified()).toBe(false);
  });
});
