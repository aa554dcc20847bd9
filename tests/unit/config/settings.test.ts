/**
 * Settings Tests
 */

import { describe, test, expect } from 'vitest';
import { createSettings, defaultSettings } from '../../../src/config/settings.ts';

describe('Settings', () => {
  test('starts from the defaults', () => {
    const settings = createSettings();
    expect(settings.getAll()).toEqual(defaultSettings);
    expect(settings.get('editor.tabSize')).toBe(8);
  });

  test('notifies listeners on change only', () => {
    const settings = createSettings();
    const seen: number[] = [];
    const unsubscribe = settings.onChange('editor.tabSize', (value) => seen.push(value));

    settings.set('editor.tabSize', 4);
    settings.set('editor.tabSize', 4);
    unsubscribe();
    settings.set('editor.tabSize', 2);

    expect(seen).toEqual([4]);
  });

  test('reset restores the defaults and notifies', () => {
    const settings = createSettings({ 'editor.edgeJump': false });
    const seen: boolean[] = [];
    settings.onChange('editor.edgeJump', (value) => seen.push(value));

    settings.reset();
    expect(settings.get('editor.edgeJump')).toBe(true);
    expect(seen).toEqual([true]);
  });

  test('builds session options', () => {
    const settings = createSettings({ 'editor.tabSize': 4, 'editor.wrapAtEdges': false });
    const options = settings.toEditorOptions();
    expect(options.tabSize).toBe(4);
    expect(options.wrapAtEdges).toBe(false);
    expect(options.edgeJump).toBe(true);
    expect(options.wordPattern.test('_')).toBe(true);
    expect(options.wordPattern.test('-')).toBe(false);
  });

  test('an invalid word pattern falls back to the default', () => {
    const settings = createSettings({ 'editor.wordCharacters': '[' });
    expect(settings.getWordPattern().source).toBe('[A-Za-z0-9_]');
  });
});
