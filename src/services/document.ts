/**
 * Document Persistence
 *
 * Loading a file into lines and writing lines back. Failures come back
 * as results carrying a message for the status bar.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { debugLog } from '../debug.ts';

export type LoadResult =
  | { ok: true; lines: string[]; isNew: boolean }
  | { ok: false; message: string };

export type SaveResult = { ok: true; bytes: number } | { ok: false; message: string };

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Split file content on line separators. A trailing separator ends the
 * last line rather than starting an empty one.
 */
export function splitLines(content: string): string[] {
  const lines = content.split(/\r\n|\r|\n/);
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Join lines, writing a separator after each one.
 */
export function joinLines(lines: readonly string[]): string {
  return lines.map((line) => `${line}\n`).join('');
}

/**
 * Read a file. A path that does not exist yet opens as an empty new document.
 */
export async function loadDocument(filePath: string): Promise<LoadResult> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return { ok: true, lines: splitLines(content), isNew: false };
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      debugLog(`[Document] ${filePath} does not exist, starting a new file`);
      return { ok: true, lines: [''], isNew: true };
    }
    debugLog(`[Document] Failed to read ${filePath}: ${error}`);
    return { ok: false, message: `Cannot open ${filePath}: ${describe(error)}` };
  }
}

/**
 * Write lines to a file, creating missing parent directories.
 */
export async function saveDocument(filePath: string, lines: readonly string[]): Promise<SaveResult> {
  const content = joinLines(lines);
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
    return { ok: true, bytes: Buffer.byteLength(content, 'utf8') };
  } catch (error) {
    debugLog(`[Document] Failed to write ${filePath}: ${error}`);
    return { ok: false, message: `Cannot save ${filePath}: ${describe(error)}` };
  }
}
