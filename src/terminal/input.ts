/**
 * Key Decoder
 *
 * Turns the raw terminal byte stream into key events, one key per call.
 * Escape sequences are decoded with a small state machine:
 *
 *   Ground --ESC--> EscapeSeen --'['--> CSI --final--> event
 *
 * Continuation bytes are read with a short deadline so a lone ESC press
 * can be told apart from the start of a sequence.
 */

import type { ByteSource, ReadOutcome } from './byte-source.ts';

// ============================================
// Types
// ============================================

export type NamedKey =
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'home'
  | 'end'
  | 'pageup'
  | 'pagedown'
  | 'insert'
  | 'delete'
  | 'backspace'
  | 'tab'
  | 'enter'
  | 'escape';

export interface Modifiers {
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
}

/**
 * A printable character, or a control letter (ctrl set, char is the
 * lower-cased byte + 0x40).
 */
export interface CharKeyEvent extends Modifiers {
  type: 'char';
  char: string;
}

export interface NamedKeyEvent extends Modifiers {
  type: 'key';
  key: NamedKey;
}

export type KeyEvent = CharKeyEvent | NamedKeyEvent;

export type DecodeError = 'unknown-sequence' | 'timeout' | 'end-of-input' | 'interrupted';

export type DecodeResult =
  | { ok: true; event: KeyEvent }
  | { ok: false; error: DecodeError };

export type Dialect = 'generic' | 'console';

/**
 * The parts of escape-sequence handling that differ between dialects.
 */
export interface DialectRules {
  /** CSI final letters and the keys they map to */
  finalLetters: Readonly<Record<string, NamedKey>>;
  /** Numeric codes terminated by '~' */
  tildeCodes: Readonly<Record<number, NamedKey>>;
  /** Whether "<n>;<mask>" modifier parameters are understood */
  modifierMasks: boolean;
  /** Whether 0x7F reports Ctrl+Backspace rather than Backspace */
  delIsCtrlBackspace: boolean;
}

export interface KeyDecoderOptions {
  /** Deadline for continuation bytes, in milliseconds */
  escapeTimeout?: number;
}

// ============================================
// Dialects
// ============================================

const ARROWS: Record<string, NamedKey> = {
  A: 'up',
  B: 'down',
  C: 'right',
  D: 'left',
};

export const GENERIC_DIALECT: DialectRules = {
  finalLetters: { ...ARROWS, F: 'end', H: 'home' },
  tildeCodes: { 2: 'insert', 3: 'delete', 5: 'pageup', 6: 'pagedown' },
  modifierMasks: true,
  delIsCtrlBackspace: false,
};

export const CONSOLE_DIALECT: DialectRules = {
  finalLetters: { ...ARROWS },
  tildeCodes: { 1: 'home', 2: 'insert', 3: 'delete', 4: 'end', 5: 'pageup', 6: 'pagedown' },
  modifierMasks: false,
  delIsCtrlBackspace: true,
};

/**
 * Pick the dialect for a TERM value. Anything unrecognized is generic.
 */
export function detectDialect(term: string | undefined): Dialect {
  if (!term) return 'generic';
  if (term === 'linux' || term.startsWith('linux') || term.startsWith('cons')) {
    return 'console';
  }
  return 'generic';
}

export function dialectRules(dialect: Dialect): DialectRules {
  return dialect === 'console' ? CONSOLE_DIALECT : GENERIC_DIALECT;
}

/**
 * Decode an xterm modifier parameter. The transmitted value minus one is
 * a 3-bit field read from the highest bit down: 4 = ctrl, 2 = alt, 1 = shift.
 * Returns null for values outside 1..8.
 */
export function decodeModifierMask(mask: number): Modifiers | null {
  if (!Number.isInteger(mask) || mask < 1 || mask > 8) return null;

  let bits = mask - 1;
  const mods: Modifiers = { ctrl: false, alt: false, shift: false };
  if (bits >= 4) {
    mods.ctrl = true;
    bits -= 4;
  }
  if (bits >= 2) {
    mods.alt = true;
    bits -= 2;
  }
  if (bits >= 1) {
    mods.shift = true;
  }
  return mods;
}

// ============================================
// Constants
// ============================================

const BYTE_ESC = 0x1b;
const BYTE_DEL = 0x7f;
const BYTE_BS = 0x08;
const BYTE_TAB = 0x09;
const BYTE_LF = 0x0a;
const BYTE_CR = 0x0d;
const BYTE_LBRACKET = 0x5b;
const BYTE_SEMICOLON = 0x3b;
const BYTE_TILDE = 0x7e;

/** Longest parameter run accepted before a sequence is rejected */
const MAX_PARAM_DIGITS = 4;

const NO_MODS: Modifiers = { ctrl: false, alt: false, shift: false };

function named(key: NamedKey, mods: Modifiers = NO_MODS): DecodeResult {
  return { ok: true, event: { type: 'key', key, ...mods } };
}

function char(ch: string, mods: Modifiers = NO_MODS): DecodeResult {
  return { ok: true, event: { type: 'char', char: ch, ...mods } };
}

function fail(error: DecodeError): DecodeResult {
  return { ok: false, error };
}

function isDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x39;
}

function isFinalByte(byte: number): boolean {
  return byte >= 0x40 && byte <= 0x7e;
}

/**
 * Map a failed continuation read to the error it stands for.
 */
function readFailure(outcome: Exclude<ReadOutcome, number>): DecodeError {
  return outcome === 'eof' ? 'end-of-input' : 'timeout';
}

// ============================================
// Decoder
// ============================================

export class KeyDecoder {
  private readonly source: ByteSource;
  private readonly rules: DialectRules;
  private readonly escapeTimeout: number;

  constructor(source: ByteSource, rules: DialectRules = GENERIC_DIALECT, options: KeyDecoderOptions = {}) {
    this.source = source;
    this.rules = rules;
    this.escapeTimeout = options.escapeTimeout ?? 10;
  }

  /**
   * Read one logical key. Blocks on the first byte only.
   */
  async decode(): Promise<DecodeResult> {
    const first = await this.source.read();
    if (first === 'eof') return fail('end-of-input');
    if (first === 'interrupted' || first === 'timeout') return fail('interrupted');

    if (first === BYTE_ESC) {
      return this.decodeEscape();
    }
    if (first < 0x20 || first === BYTE_DEL) {
      return this.decodeControl(first);
    }
    if (first < 0x80) {
      return char(String.fromCharCode(first));
    }
    return this.decodeUtf8(first);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Ground state
  // ─────────────────────────────────────────────────────────────────────────

  private decodeControl(byte: number): DecodeResult {
    switch (byte) {
      case BYTE_DEL:
        return named('backspace', { ...NO_MODS, ctrl: this.rules.delIsCtrlBackspace });
      case BYTE_BS:
        return named('backspace');
      case BYTE_TAB:
        return named('tab');
      case BYTE_LF:
      case BYTE_CR:
        return named('enter');
      default:
        return char(String.fromCharCode(byte + 0x40).toLowerCase(), { ...NO_MODS, ctrl: true });
    }
  }

  private async decodeUtf8(lead: number): Promise<DecodeResult> {
    let length: number;
    if (lead >= 0xc2 && lead <= 0xdf) length = 2;
    else if (lead >= 0xe0 && lead <= 0xef) length = 3;
    else if (lead >= 0xf0 && lead <= 0xf4) length = 4;
    else return fail('unknown-sequence');

    const bytes = [lead];
    while (bytes.length < length) {
      const next = await this.source.readWithin(this.escapeTimeout);
      if (typeof next !== 'number') return fail(readFailure(next));
      if ((next & 0xc0) !== 0x80) return fail('unknown-sequence');
      bytes.push(next);
    }

    const decoded = Buffer.from(bytes).toString('utf8');
    if (decoded.includes('\uFFFD')) return fail('unknown-sequence');
    return char(decoded);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Escape sequences
  // ─────────────────────────────────────────────────────────────────────────

  private async decodeEscape(): Promise<DecodeResult> {
    const next = await this.source.readWithin(this.escapeTimeout);
    if (next === 'timeout' || next === 'interrupted') return named('escape');
    if (next === 'eof') return named('escape');
    if (next !== BYTE_LBRACKET) return fail('unknown-sequence');
    return this.decodeCsi();
  }

  private async decodeCsi(): Promise<DecodeResult> {
    let byte = await this.source.readWithin(this.escapeTimeout);
    if (typeof byte !== 'number') return fail(readFailure(byte));

    // Console function keys: ESC [ [ A
    if (byte === BYTE_LBRACKET) {
      const tail = await this.source.readWithin(this.escapeTimeout);
      return typeof tail === 'number' ? this.reject(tail) : fail(readFailure(tail));
    }

    // Bare final letter: ESC [ A
    if (!isDigit(byte)) {
      const key = this.rules.finalLetters[String.fromCharCode(byte)];
      if (key) return named(key);
      return this.reject(byte);
    }

    const param = await this.readNumber(byte);
    if (!param.ok) return param.result;
    byte = param.terminator;

    if (byte === BYTE_TILDE) {
      const key = this.rules.tildeCodes[param.value];
      return key ? named(key) : fail('unknown-sequence');
    }

    if (byte !== BYTE_SEMICOLON || !this.rules.modifierMasks) {
      return this.reject(byte);
    }

    // ESC [ <n> ; <mask> <final>
    const first = await this.source.readWithin(this.escapeTimeout);
    if (typeof first !== 'number') return fail(readFailure(first));
    if (!isDigit(first)) return this.reject(first);

    const mask = await this.readNumber(first);
    if (!mask.ok) return mask.result;

    const mods = decodeModifierMask(mask.value);
    if (!mods) return this.reject(mask.terminator);

    if (mask.terminator === BYTE_TILDE) {
      const key = this.rules.tildeCodes[param.value];
      return key ? named(key, mods) : fail('unknown-sequence');
    }

    const letterKey = this.rules.finalLetters[String.fromCharCode(mask.terminator)];
    if (letterKey && param.value === 1) {
      return named(letterKey, mods);
    }
    return this.reject(mask.terminator);
  }

  /**
   * Read a decimal parameter whose first digit has already been consumed.
   * Resolves with the value and the byte that ended it.
   */
  private async readNumber(
    firstDigit: number
  ): Promise<{ ok: true; value: number; terminator: number } | { ok: false; result: DecodeResult }> {
    let value = firstDigit - 0x30;
    let digits = 1;

    for (;;) {
      const next = await this.source.readWithin(this.escapeTimeout);
      if (typeof next !== 'number') {
        return { ok: false, result: fail(readFailure(next)) };
      }
      if (!isDigit(next)) {
        return { ok: true, value, terminator: next };
      }
      if (++digits > MAX_PARAM_DIGITS) {
        return { ok: false, result: await this.reject(next) };
      }
      value = value * 10 + (next - 0x30);
    }
  }

  /**
   * Reject the sequence. If `last` did not already end it, drain the rest
   * so its tail is not decoded as ordinary keys.
   */
  private async reject(last: number): Promise<DecodeResult> {
    let byte = last;
    while (!isFinalByte(byte)) {
      const next = await this.source.readWithin(this.escapeTimeout);
      if (typeof next !== 'number') break;
      byte = next;
    }
    return fail('unknown-sequence');
  }
}

// ============================================
// Factory Functions
// ============================================

export function createKeyDecoder(
  source: ByteSource,
  dialect: Dialect = 'generic',
  options?: KeyDecoderOptions
): KeyDecoder {
  return new KeyDecoder(source, dialectRules(dialect), options);
}
