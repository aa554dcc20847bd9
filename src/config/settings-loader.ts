/**
 * Settings Loader
 *
 * Reads the user's settings.json (comments allowed) once at startup and
 * applies every recognized, well-typed value. Anything else is skipped
 * with a debug-log line so a bad file never stops the editor.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { defaultSettings, type EditorSettings, type SettingKey, type Settings } from './settings.ts';
import { debugLog } from '../debug.ts';

export interface LoadSettingsResult {
  /** Path that was read */
  path: string;
  /** Keys applied from the file */
  applied: SettingKey[];
  /** Human-readable reasons for skipped entries */
  problems: string[];
}

type Validator = (value: unknown) => string | null;

const positiveInteger =
  (max: number): Validator =>
  (value) =>
    typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= max
      ? null
      : `expected an integer between 1 and ${max}`;

const boolean: Validator = (value) => (typeof value === 'boolean' ? null : 'expected true or false');

const string: Validator = (value) => (typeof value === 'string' ? null : 'expected a string');

const pattern: Validator = (value) => {
  if (typeof value !== 'string' || value.length === 0) return 'expected a non-empty pattern';
  try {
    new RegExp(value, 'u');
    return null;
  } catch {
    return 'not a valid regular expression';
  }
};

const VALIDATORS: Record<SettingKey, Validator> = {
  'editor.tabSize': positiveInteger(32),
  'editor.wrapAtEdges': boolean,
  'editor.edgeJump': boolean,
  'editor.wordCharacters': pattern,
  'editor.selectionHighlight.start': string,
  'editor.selectionHighlight.end': string,
  'input.escapeTimeout': positiveInteger(1000),
  'terminal.dialect': (value) =>
    value === 'auto' || value === 'generic' || value === 'console'
      ? null
      : 'expected "auto", "generic" or "console"',
};

function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(defaultSettings, key);
}

/**
 * Directory holding the user's configuration.
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.QUIRE_CONFIG_DIR) return env.QUIRE_CONFIG_DIR;
  return path.join(env.HOME || env.USERPROFILE || os.homedir(), '.quire');
}

/**
 * Strip // and /* *\/ comments outside of strings.
 */
export function stripJsonComments(content: string): string {
  let out = '';
  let inString = false;
  let i = 0;

  while (i < content.length) {
    const ch = content[i] ?? '';
    const next = content[i + 1] ?? '';

    if (inString) {
      out += ch;
      if (ch === '\\') {
        out += next;
        i += 2;
        continue;
      }
      if (ch === '"') inString = false;
      i++;
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
      i++;
    } else if (ch === '/' && next === '/') {
      while (i < content.length && content[i] !== '\n') i++;
    } else if (ch === '/' && next === '*') {
      const end = content.indexOf('*/', i + 2);
      i = end === -1 ? content.length : end + 2;
    } else {
      out += ch;
      i++;
    }
  }
  return out;
}

/**
 * Validate a parsed settings object. Returns the accepted values and
 * the problems found.
 */
export function validateSettings(raw: unknown): { values: Partial<EditorSettings>; problems: string[] } {
  const values: Partial<EditorSettings> = {};
  const problems: string[] = [];

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { values, problems: ['settings file must contain a JSON object'] };
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!isSettingKey(key)) {
      problems.push(`${key}: unknown setting`);
      continue;
    }
    const problem = VALIDATORS[key](value);
    if (problem) {
      problems.push(`${key}: ${problem}`);
      continue;
    }
    Object.assign(values, { [key]: value });
  }

  return { values, problems };
}

/**
 * Load settings.json from the config directory into `settings`.
 * A missing file leaves the defaults in place.
 */
export async function loadUserSettings(settings: Settings, configDir: string = getConfigDir()): Promise<LoadSettingsResult> {
  const filePath = path.join(configDir, 'settings.json');
  const result: LoadSettingsResult = { path: filePath, applied: [], problems: [] };

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      debugLog(`[Settings] No settings file at ${filePath}, using defaults`);
    } else {
      debugLog(`[Settings] Failed to read ${filePath}: ${error}`);
      result.problems.push(`could not read ${filePath}`);
    }
    return result;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripJsonComments(content));
  } catch (error) {
    debugLog(`[Settings] Failed to parse ${filePath}: ${error}`);
    result.problems.push(`${filePath} is not valid JSON`);
    return result;
  }

  const { values, problems } = validateSettings(parsed);
  for (const problem of problems) {
    debugLog(`[Settings] Ignoring ${problem}`);
  }
  settings.update(values);

  result.applied = Object.keys(values).filter(isSettingKey);
  result.problems.push(...problems);
  return result;
}
