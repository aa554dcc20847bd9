/**
 * KeyDecoder Tests
 *
 * Byte vectors for both dialects, including the modifier-mask layout.
 */

import { describe, test, expect } from 'vitest';
import { QueuedByteSource } from '../../../src/terminal/byte-source.ts';
import {
  createKeyDecoder,
  decodeModifierMask,
  detectDialect,
  type DecodeResult,
  type Dialect,
  type Modifiers,
  type NamedKey,
} from '../../../src/terminal/input.ts';

// ============================================
// Test Helpers
// ============================================

function key(name: NamedKey, mods: Partial<Modifiers> = {}): DecodeResult {
  return { ok: true, event: { type: 'key', key: name, ctrl: false, alt: false, shift: false, ...mods } };
}

function char(ch: string, mods: Partial<Modifiers> = {}): DecodeResult {
  return { ok: true, event: { type: 'char', char: ch, ctrl: false, alt: false, shift: false, ...mods } };
}

/**
 * Decode everything in `input` with the stream closed afterwards.
 */
async function decodeAll(input: string | number[], dialect: Dialect = 'generic'): Promise<DecodeResult[]> {
  const source = new QueuedByteSource();
  source.push(typeof input === 'string' ? input : Uint8Array.from(input));
  source.close();

  const decoder = createKeyDecoder(source, dialect, { escapeTimeout: 5 });
  const results: DecodeResult[] = [];
  for (;;) {
    const result = await decoder.decode();
    if (!result.ok && result.error === 'end-of-input') return results;
    results.push(result);
  }
}

async function decodeOne(input: string | number[], dialect: Dialect = 'generic'): Promise<DecodeResult | undefined> {
  return (await decodeAll(input, dialect))[0];
}

// ============================================
// Modifier Masks
// ============================================

describe('decodeModifierMask', () => {
  test('reads ctrl, alt and shift from the high bit down', () => {
    expect(decodeModifierMask(1)).toEqual({ ctrl: false, alt: false, shift: false });
    expect(decodeModifierMask(2)).toEqual({ ctrl: false, alt: false, shift: true });
    expect(decodeModifierMask(3)).toEqual({ ctrl: false, alt: true, shift: false });
    expect(decodeModifierMask(5)).toEqual({ ctrl: true, alt: false, shift: false });
    expect(decodeModifierMask(6)).toEqual({ ctrl: true, alt: false, shift: true });
    expect(decodeModifierMask(8)).toEqual({ ctrl: true, alt: true, shift: true });
  });

  test('rejects values outside 1..8', () => {
    expect(decodeModifierMask(0)).toBeNull();
    expect(decodeModifierMask(9)).toBeNull();
  });
});

describe('detectDialect', () => {
  test('picks the console dialect for the Linux console', () => {
    expect(detectDialect('linux')).toBe('console');
    expect(detectDialect('cons25')).toBe('console');
  });

  test('defaults to generic', () => {
    expect(detectDialect('xterm-256color')).toBe('generic');
    expect(detectDialect(undefined)).toBe('generic');
  });
});

// ============================================
// Ground State
// ============================================

describe('KeyDecoder ground state', () => {
  test('printable bytes decode to characters', async () => {
    expect(await decodeAll('aZ ')).toEqual([char('a'), char('Z'), char(' ')]);
  });

  test('control bytes decode to ctrl letters', async () => {
    expect(await decodeAll([0x01, 0x11, 0x13])).toEqual([
      char('a', { ctrl: true }),
      char('q', { ctrl: true }),
      char('s', { ctrl: true }),
    ]);
  });

  test('tab, enter and backspace have their own keys', async () => {
    expect(await decodeAll([0x09, 0x0d, 0x0a, 0x08])).toEqual([
      key('tab'),
      key('enter'),
      key('enter'),
      key('backspace'),
    ]);
  });

  test('0x7F is plain backspace in the generic dialect', async () => {
    expect(await decodeOne([0x7f], 'generic')).toEqual(key('backspace'));
  });

  test('0x7F is ctrl+backspace in the console dialect', async () => {
    expect(await decodeOne([0x7f], 'console')).toEqual(key('backspace', { ctrl: true }));
  });

  test('multi-byte UTF-8 decodes to one character', async () => {
    expect(await decodeAll('é€')).toEqual([char('é'), char('€')]);
  });

  test('a stray continuation byte is rejected', async () => {
    expect(await decodeOne([0x80])).toEqual({ ok: false, error: 'unknown-sequence' });
  });
});

// ============================================
// Escape Sequences
// ============================================

describe('KeyDecoder escape sequences', () => {
  test('arrows decode in both dialects', async () => {
    for (const dialect of ['generic', 'console'] as const) {
      expect(await decodeAll('\x1b[A\x1b[B\x1b[C\x1b[D', dialect)).toEqual([
        key('up'),
        key('down'),
        key('right'),
        key('left'),
      ]);
    }
  });

  test('ctrl+shift+right from a modifier mask', async () => {
    expect(await decodeOne('\x1b[1;6C')).toEqual(key('right', { ctrl: true, shift: true }));
  });

  test('other masks on arrows', async () => {
    expect(await decodeOne('\x1b[1;2A')).toEqual(key('up', { shift: true }));
    expect(await decodeOne('\x1b[1;5D')).toEqual(key('left', { ctrl: true }));
    expect(await decodeOne('\x1b[1;3B')).toEqual(key('down', { alt: true }));
  });

  test('home and end letters in the generic dialect', async () => {
    expect(await decodeAll('\x1b[H\x1b[F\x1b[1;5H')).toEqual([key('home'), key('end'), key('home', { ctrl: true })]);
  });

  test('tilde codes in the generic dialect', async () => {
    expect(await decodeAll('\x1b[2~\x1b[3~\x1b[5~\x1b[6~\x1b[3;2~')).toEqual([
      key('insert'),
      key('delete'),
      key('pageup'),
      key('pagedown'),
      key('delete', { shift: true }),
    ]);
  });

  test('home and end tilde codes in the console dialect', async () => {
    expect(await decodeAll('\x1b[1~\x1b[4~\x1b[3~', 'console')).toEqual([key('home'), key('end'), key('delete')]);
  });

  test('the console dialect has no modifier masks', async () => {
    expect(await decodeAll('\x1b[1;5Cx', 'console')).toEqual([{ ok: false, error: 'unknown-sequence' }, char('x')]);
  });

  test('the generic dialect has no 1~ home', async () => {
    expect(await decodeOne('\x1b[1~')).toEqual({ ok: false, error: 'unknown-sequence' });
  });

  test('an unknown sequence is drained to its final byte', async () => {
    expect(await decodeAll('\x1b[99;5Xq')).toEqual([{ ok: false, error: 'unknown-sequence' }, char('q')]);
  });

  test('an out-of-range mask is rejected', async () => {
    expect(await decodeAll('\x1b[1;9Cq')).toEqual([{ ok: false, error: 'unknown-sequence' }, char('q')]);
  });

  test('console function keys are rejected whole', async () => {
    expect(await decodeAll('\x1b[[Ar', 'console')).toEqual([{ ok: false, error: 'unknown-sequence' }, char('r')]);
  });

  test('overlong parameters are rejected', async () => {
    expect(await decodeAll('\x1b[123456~k')).toEqual([{ ok: false, error: 'unknown-sequence' }, char('k')]);
  });

  test('ESC followed by anything but [ is rejected', async () => {
    expect(await decodeOne('\x1bx')).toEqual({ ok: false, error: 'unknown-sequence' });
  });
});

// ============================================
// Timing
// ============================================

describe('KeyDecoder timing', () => {
  test('a lone ESC decodes as escape once the deadline passes', async () => {
    const source = new QueuedByteSource();
    const decoder = createKeyDecoder(source, 'generic', { escapeTimeout: 5 });
    source.push('\x1b');

    expect(await decoder.decode()).toEqual(key('escape'));
  });

  test('a sequence cut off mid-way times out', async () => {
    const source = new QueuedByteSource();
    const decoder = createKeyDecoder(source, 'generic', { escapeTimeout: 5 });
    source.push('\x1b[1;');

    expect(await decoder.decode()).toEqual({ ok: false, error: 'timeout' });
  });

  test('ESC at end of input is escape', async () => {
    expect(await decodeAll('\x1b')).toEqual([key('escape')]);
  });

  test('an interrupted blocking read reports it', async () => {
    const source = new QueuedByteSource();
    const decoder = createKeyDecoder(source);
    const pending = decoder.decode();
    source.interrupt();

    expect(await pending).toEqual({ ok: false, error: 'interrupted' });
  });
});
