/**
 * Clipboard
 *
 * Copy/paste storage. The system clipboard is reached through whichever
 * helper program the platform has; an in-process copy is always kept so
 * paste works without one.
 */

import { spawn } from 'child_process';
import { debugLog } from '../debug.ts';

export interface Clipboard {
  provide(text: string): Promise<void>;
  retrieve(): Promise<string>;
}

interface ClipboardCommands {
  copy: [string, ...string[]];
  paste: [string, ...string[]];
}

/**
 * Clipboard held in memory only.
 */
export class MemoryClipboard implements Clipboard {
  private text = '';

  async provide(text: string): Promise<void> {
    this.text = text;
  }

  async retrieve(): Promise<string> {
    return this.text;
  }
}

/**
 * Helper programs for the current platform, most specific first.
 */
export function clipboardCommandsFor(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): ClipboardCommands[] {
  if (platform === 'darwin') {
    return [{ copy: ['pbcopy'], paste: ['pbpaste'] }];
  }
  if (platform === 'win32') {
    return [];
  }
  const commands: ClipboardCommands[] = [];
  if (env.WAYLAND_DISPLAY) {
    commands.push({ copy: ['wl-copy'], paste: ['wl-paste', '--no-newline'] });
  }
  if (env.DISPLAY) {
    commands.push({
      copy: ['xclip', '-selection', 'clipboard'],
      paste: ['xclip', '-selection', 'clipboard', '-o'],
    });
  }
  return commands;
}

/**
 * Pipe `input` to a copy helper. Resolves when the helper itself exits:
 * xclip and wl-copy fork a process that holds the selection, so nothing
 * waits on the streams it inherits.
 */
function runCopyCommand(argv: [string, ...string[]], input: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const [command, ...args] = argv;
    const child = spawn(command, args, { stdio: ['pipe', 'ignore', 'ignore'] });

    child.on('error', reject);
    child.on('exit', (code) => resolve(code ?? 1));

    child.stdin.on('error', reject);
    child.stdin.end(input);
  });
}

function runPasteCommand(argv: [string, ...string[]]): Promise<{ code: number; stdout: string }> {
  return new Promise((resolve, reject) => {
    const [command, ...args] = argv;
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'ignore'] });
    const chunks: Buffer[] = [];

    child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
    child.on('error', reject);
    child.on('close', (code) => {
      resolve({ code: code ?? 1, stdout: Buffer.concat(chunks).toString('utf8') });
    });
  });
}

/**
 * System clipboard with an in-memory fallback.
 */
export class SystemClipboard implements Clipboard {
  private fallback = new MemoryClipboard();
  private commands: ClipboardCommands[];

  constructor(commands: ClipboardCommands[] = clipboardCommandsFor(process.platform, process.env)) {
    this.commands = commands;
  }

  async provide(text: string): Promise<void> {
    await this.fallback.provide(text);

    for (const { copy } of this.commands) {
      try {
        const code = await runCopyCommand(copy, text);
        debugLog(`[Clipboard] ${copy[0]} exited with code ${code}`);
        if (code === 0) return;
      } catch (error) {
        debugLog(`[Clipboard] ${copy[0]} failed: ${error}`);
      }
    }
  }

  async retrieve(): Promise<string> {
    for (const { paste } of this.commands) {
      try {
        const { code, stdout } = await runPasteCommand(paste);
        debugLog(`[Clipboard] ${paste[0]} exited with code ${code}, got ${stdout.length} chars`);
        if (code === 0) return stdout;
      } catch (error) {
        debugLog(`[Clipboard] ${paste[0]} failed: ${error}`);
      }
    }
    return this.fallback.retrieve();
  }
}

export function createClipboard(): Clipboard {
  return new SystemClipboard();
}
