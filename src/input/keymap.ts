/**
 * Keymap System
 *
 * Maps key combinations such as "ctrl+s" or "ctrl+shift+right" to
 * command ids.
 */

import type { KeyEvent } from '../terminal/input.ts';

export interface KeyBinding {
  key: string;           // e.g., "ctrl+s", "shift+up"
  command: string;       // Command ID
}

const MODIFIER_ORDER = ['ctrl', 'alt', 'shift'] as const;

export class Keymap {
  private bindings: Map<string, KeyBinding> = new Map();

  /**
   * Load keybindings, replacing any existing binding for the same key
   */
  loadBindings(bindings: readonly KeyBinding[]): void {
    for (const binding of bindings) {
      this.addBinding(binding);
    }
  }

  addBinding(binding: KeyBinding): void {
    this.bindings.set(Keymap.normalizeKey(binding.key), binding);
  }

  /**
   * Get command for a key event
   */
  getCommand(event: KeyEvent): string | null {
    return this.bindings.get(Keymap.eventToString(event))?.command ?? null;
  }

  /**
   * Canonical form: lower case, modifiers in ctrl/alt/shift order.
   */
  static normalizeKey(key: string): string {
    const parts = key.toLowerCase().split('+').map((p) => p.trim());
    // "ctrl++" binds the plus key
    const base = parts[parts.length - 1] === '' && parts.length > 1 ? '+' : parts[parts.length - 1] ?? '';
    const mods = new Set(parts.slice(0, -1));
    const prefix = MODIFIER_ORDER.filter((m) => mods.has(m));
    return [...prefix, base].join('+');
  }

  /**
   * Canonical string for a decoded key event.
   */
  static eventToString(event: KeyEvent): string {
    const base = event.type === 'key' ? event.key : event.char.toLowerCase();
    const prefix = MODIFIER_ORDER.filter((m) => event[m]);
    return [...prefix, base].join('+');
  }
}

export function createKeymap(bindings: readonly KeyBinding[] = []): Keymap {
  const keymap = new Keymap();
  keymap.loadBindings(bindings);
  return keymap;
}
