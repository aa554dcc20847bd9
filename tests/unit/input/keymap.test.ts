/**
 * Keymap Tests
 */

import { describe, test, expect } from 'vitest';
import { Keymap, createKeymap } from '../../../src/input/keymap.ts';
import { defaultKeybindings } from '../../../src/input/default-keybindings.ts';
import type { KeyEvent } from '../../../src/terminal/input.ts';

describe('Keymap.normalizeKey', () => {
  test('orders modifiers and lower-cases', () => {
    expect(Keymap.normalizeKey('Shift+Ctrl+Right')).toBe('ctrl+shift+right');
    expect(Keymap.normalizeKey('alt + x')).toBe('alt+x');
  });

  test('binds the plus key itself', () => {
    expect(Keymap.normalizeKey('ctrl++')).toBe('ctrl++');
  });
});

describe('Keymap.eventToString', () => {
  test('names keys and characters with their modifiers', () => {
    const right: KeyEvent = { type: 'key', key: 'right', ctrl: true, alt: false, shift: true };
    const s: KeyEvent = { type: 'char', char: 's', ctrl: true, alt: false, shift: false };
    expect(Keymap.eventToString(right)).toBe('ctrl+shift+right');
    expect(Keymap.eventToString(s)).toBe('ctrl+s');
  });
});

describe('Keymap', () => {
  test('looks up commands for events', () => {
    const keymap = createKeymap([{ key: 'ctrl+s', command: 'file.save' }]);
    expect(keymap.getCommand({ type: 'char', char: 's', ctrl: true, alt: false, shift: false })).toBe('file.save');
    expect(keymap.getCommand({ type: 'char', char: 's', ctrl: false, alt: false, shift: false })).toBeNull();
  });

  test('later bindings replace earlier ones for the same key', () => {
    const keymap = createKeymap([
      { key: 'ctrl+s', command: 'file.save' },
      { key: 'Ctrl+S', command: 'file.saveAs' },
    ]);
    expect(keymap.getCommand({ type: 'char', char: 's', ctrl: true, alt: false, shift: false })).toBe('file.saveAs');
  });

  test('the defaults bind shifted movement to the same command', () => {
    const keymap = createKeymap(defaultKeybindings);
    const shiftedWordRight: KeyEvent = { type: 'key', key: 'right', ctrl: true, alt: false, shift: true };
    const shiftedEnd: KeyEvent = { type: 'key', key: 'end', ctrl: false, alt: false, shift: true };
    expect(keymap.getCommand(shiftedWordRight)).toBe('cursor.wordRight');
    expect(keymap.getCommand(shiftedEnd)).toBe('cursor.lineEnd');
  });
});
