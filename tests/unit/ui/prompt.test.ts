/**
 * Prompt Tests
 */

import { describe, test, expect } from 'vitest';
import { createPrompt } from '../../../src/ui/prompt.ts';
import type { KeyEvent, NamedKey } from '../../../src/terminal/input.ts';

function ch(char: string, ctrl = false): KeyEvent {
  return { type: 'char', char, ctrl, alt: false, shift: false };
}

function named(key: NamedKey): KeyEvent {
  return { type: 'key', key, ctrl: false, alt: false, shift: false };
}

describe('Prompt', () => {
  test('collects typed text and submits on enter', () => {
    const prompt = createPrompt({ label: 'Open: ' });
    for (const c of 'a.tx') prompt.handleKey(ch(c));
    prompt.handleKey(named('backspace'));
    prompt.handleKey(ch('t'));

    expect(prompt.getText()).toBe('Open: a.tt');
    expect(prompt.getCursorColumn()).toBe(10);
    expect(prompt.handleKey(named('enter'))).toEqual({ type: 'submit', value: 'a.tt' });
  });

  test('starts from the initial value', () => {
    const prompt = createPrompt({ label: 'Save as: ', initial: 'draft.txt' });
    expect(prompt.getValue()).toBe('draft.txt');
  });

  test('escape and ctrl+c cancel', () => {
    expect(createPrompt({ label: '> ' }).handleKey(named('escape'))).toEqual({ type: 'cancel' });
    expect(createPrompt({ label: '> ' }).handleKey(ch('c', true))).toEqual({ type: 'cancel' });
  });

  test('other ctrl keys are ignored', () => {
    const prompt = createPrompt({ label: '> ' });
    expect(prompt.handleKey(ch('s', true))).toEqual({ type: 'pending' });
    expect(prompt.getValue()).toBe('');
  });

  test('a choice prompt submits on the first matching key', () => {
    const prompt = createPrompt({ label: 'Save changes? ', choices: ['y', 'n'] });
    expect(prompt.handleKey(ch('x'))).toEqual({ type: 'pending' });
    expect(prompt.handleKey(named('enter'))).toEqual({ type: 'pending' });
    expect(prompt.handleKey(ch('Y'))).toEqual({ type: 'submit', value: 'y' });
  });
});
