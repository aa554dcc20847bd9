/**
 * Settings Manager
 *
 * Editor configuration, keyed in the dotted settings.json style.
 * Applied once at startup; listeners exist for the few values the
 * running session picks up.
 */

import type { EditorOptions } from '../core/session.ts';
import { debugLog } from '../debug.ts';

export type DialectSetting = 'auto' | 'generic' | 'console';

export interface EditorSettings {
  'editor.tabSize': number;
  'editor.wrapAtEdges': boolean;
  'editor.edgeJump': boolean;
  'editor.wordCharacters': string;
  'editor.selectionHighlight.start': string;
  'editor.selectionHighlight.end': string;
  'input.escapeTimeout': number;
  'terminal.dialect': DialectSetting;
}

export type SettingKey = keyof EditorSettings;

export const defaultSettings: Readonly<EditorSettings> = {
  'editor.tabSize': 8,
  'editor.wrapAtEdges': true,
  'editor.edgeJump': true,
  'editor.wordCharacters': '[A-Za-z0-9_]',
  'editor.selectionHighlight.start': '\x1b[7m',
  'editor.selectionHighlight.end': '\x1b[27m',
  'input.escapeTimeout': 10,
  'terminal.dialect': 'auto',
};

export class Settings {
  private settings: EditorSettings;
  private listeners: Map<SettingKey, Set<() => void>> = new Map();

  constructor(initial: Partial<EditorSettings> = {}) {
    this.settings = { ...defaultSettings, ...initial };
  }

  /**
   * Get a setting value
   */
  get<K extends SettingKey>(key: K): EditorSettings[K] {
    return this.settings[key];
  }

  /**
   * Set a setting value
   */
  set<K extends SettingKey>(key: K, value: EditorSettings[K]): void {
    const oldValue = this.settings[key];
    this.settings[key] = value;

    if (oldValue !== value) {
      this.notifyListeners(key);
    }
  }

  /**
   * Get all settings
   */
  getAll(): EditorSettings {
    return { ...this.settings };
  }

  /**
   * Update multiple settings
   */
  update(partial: Partial<EditorSettings>): void {
    for (const key of Object.keys(partial) as SettingKey[]) {
      this.assign(partial, key);
    }
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    const previous = this.settings;
    this.settings = { ...defaultSettings };
    for (const key of Object.keys(this.settings) as SettingKey[]) {
      if (previous[key] !== this.settings[key]) {
        this.notifyListeners(key);
      }
    }
  }

  /**
   * Listen for changes to a specific setting
   */
  onChange<K extends SettingKey>(key: K, callback: (value: EditorSettings[K]) => void): () => void {
    let keyListeners = this.listeners.get(key);
    if (!keyListeners) {
      keyListeners = new Set();
      this.listeners.set(key, keyListeners);
    }
    const listener = () => callback(this.settings[key]);
    keyListeners.add(listener);

    return () => {
      this.listeners.get(key)?.delete(listener);
    };
  }

  /**
   * The word-character pattern, falling back to the default class when
   * the configured one does not compile.
   */
  getWordPattern(): RegExp {
    const source = this.settings['editor.wordCharacters'];
    try {
      return new RegExp(source, 'u');
    } catch (error) {
      debugLog(`[Settings] Invalid editor.wordCharacters ${JSON.stringify(source)}: ${error}`);
      return new RegExp(defaultSettings['editor.wordCharacters'], 'u');
    }
  }

  /**
   * Options for the editing session.
   */
  toEditorOptions(): EditorOptions {
    return {
      tabSize: this.settings['editor.tabSize'],
      wrapAtEdges: this.settings['editor.wrapAtEdges'],
      edgeJump: this.settings['editor.edgeJump'],
      wordPattern: this.getWordPattern(),
    };
  }

  private assign<K extends SettingKey>(partial: Partial<EditorSettings>, key: K): void {
    const value = partial[key];
    if (value === undefined) return;
    this.set(key, value);
  }

  private notifyListeners(key: SettingKey): void {
    const keyListeners = this.listeners.get(key);
    if (!keyListeners) return;
    for (const listener of keyListeners) {
      listener();
    }
  }
}

export function createSettings(initial?: Partial<EditorSettings>): Settings {
  return new Settings(initial);
}
