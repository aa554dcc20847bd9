#!/usr/bin/env tsx
/**
 * Quire - Terminal Text Editor
 *
 * Entry point for the application.
 */

import * as path from 'path';
import { createApp, type App } from './app.ts';
import { createTerminal, type Terminal } from './terminal/terminal.ts';
import { createKeyDecoder, detectDialect, type Dialect } from './terminal/input.ts';
import { createRenderer } from './ui/renderer.ts';
import { createSettings } from './config/settings.ts';
import { loadUserSettings } from './config/settings-loader.ts';
import { createClipboard } from './services/clipboard.ts';
import { setDebugEnabled, debugLog } from './debug.ts';

// Parse command line arguments
const args = process.argv.slice(2);

// Handle help flag
if (args.includes('--help') || args.includes('-h')) {
  console.log(`
Quire - Terminal Text Editor

Usage: quire [options] [file]

Options:
  -h, --help              Show this help message
  --debug                 Enable debug logging to debug.log

Examples:
  quire                   Start with an empty document
  quire notes.txt         Open notes.txt (created on first save)
  quire --debug notes.txt Open with debug logging

`);
  process.exit(0);
}

const debugMode = args.includes('--debug');
setDebugEnabled(debugMode);

// First non-flag argument is the file to open
const pathArg = args.filter((arg) => !arg.startsWith('-'))[0];

let terminal: Terminal | null = null;
let app: App | null = null;

function expandHome(filePath: string): string {
  if (filePath === '~') return process.env.HOME || '';
  if (filePath.startsWith('~/')) return path.join(process.env.HOME || '', filePath.slice(2));
  return filePath;
}

async function main(): Promise<void> {
  debugLog('[Main] Starting...');

  const settings = createSettings();
  const loaded = await loadUserSettings(settings);
  for (const problem of loaded.problems) {
    console.error(`settings: ${problem}`);
  }

  const dialectSetting = settings.get('terminal.dialect');
  const dialect: Dialect = dialectSetting === 'auto' ? detectDialect(process.env.TERM) : dialectSetting;
  debugLog(`[Main] Using ${dialect} key dialect (TERM=${process.env.TERM ?? ''})`);

  terminal = createTerminal();
  const decoder = createKeyDecoder(terminal.getByteSource(), dialect, {
    escapeTimeout: settings.get('input.escapeTimeout'),
  });
  const activeTerminal = terminal;

  app = createApp({
    host: terminal,
    decoder,
    renderer: createRenderer({ output: (data) => activeTerminal.write(data) }),
    settings,
    clipboard: createClipboard(),
  });

  if (pathArg) {
    await app.openFile(expandHome(pathArg));
  }

  terminal.start();
  await app.run();
  terminal.stop();

  debugLog('[Main] Exited normally');
}

// Handle graceful shutdown
function shutdown(code: number): void {
  debugLog('[Main] Shutting down...');
  app?.stop();
  terminal?.stop();
  process.exit(code);
}

process.on('SIGTERM', () => shutdown(0));
process.on('SIGHUP', () => shutdown(0));

// Global error handler
process.on('uncaughtException', (error: Error) => {
  const msg = `[CRASH] Uncaught Exception:\n${error.stack || error.message}`;
  debugLog(msg);
  terminal?.stop();
  console.error(msg);
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  const msg = `[CRASH] Unhandled Rejection:\n${reason instanceof Error ? reason.stack : reason}`;
  debugLog(msg);
  terminal?.stop();
  console.error(msg);
  process.exit(1);
});

// Start the application
main()
  .then(() => process.exit(0))
  .catch((error) => {
    const msg = `[Main] Fatal error: ${error instanceof Error ? error.stack || error.message : error}`;
    debugLog(msg);
    terminal?.stop();
    console.error(msg);
    process.exit(1);
  });
