/**
 * Debug Logging
 *
 * Appends timestamped lines to debug.log when enabled with --debug.
 * The editor owns stdout while running, so this is the only log sink.
 */

import * as fs from 'fs';
import * as path from 'path';

let debugEnabled = false;
let logPath = path.join(process.cwd(), 'debug.log');

/**
 * Enable or disable debug logging
 */
export function setDebugEnabled(enabled: boolean, filePath?: string): void {
  debugEnabled = enabled;
  if (filePath) {
    logPath = filePath;
  }
  if (enabled) {
    debugLog(`[Debug] Logging to ${logPath}`);
  }
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

/**
 * Write a message to the debug log. Synchronous so the last lines
 * before a crash are not lost.
 */
export function debugLog(message: string): void {
  if (!debugEnabled) return;
  try {
    fs.appendFileSync(logPath, `${new Date().toISOString()} ${message}\n`);
  } catch {
    debugEnabled = false;
  }
}
