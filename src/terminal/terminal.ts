/**
 * Terminal
 *
 * Owns the controlling terminal's modes: raw input, the alternate screen
 * and cursor visibility. Signals (resize, suspend, continue) are turned
 * into flags in a mailbox that the event loop drains between keys.
 */

import type { Readable, Writable } from 'stream';
import { CURSOR, SCREEN, STYLE } from './ansi.ts';
import { createStreamByteSource, type QueuedByteSource } from './byte-source.ts';
import { debugLog } from '../debug.ts';

// ============================================
// Types
// ============================================

export interface Size {
  rows: number;
  columns: number;
}

export type PendingSignal = 'resize' | 'suspend' | 'continue';

/**
 * Input stream as exposed by a TTY. setRawMode is absent when stdin is
 * not a terminal (pipes, tests).
 */
export interface TerminalInput extends Readable {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
}

export interface TerminalOutput extends Writable {
  rows?: number;
  columns?: number;
}

export interface TerminalOptions {
  input?: TerminalInput;
  output?: TerminalOutput;
  /** Install process signal handlers (off in tests) */
  handleSignals?: boolean;
}

// ============================================
// Signal Mailbox
// ============================================

/**
 * Flags set by signal handlers and consumed by the event loop. Handlers
 * only post here; the loop applies every visible effect.
 */
export class SignalMailbox {
  private pending: Set<PendingSignal> = new Set();
  private wake: (() => void) | null = null;

  /**
   * Called after each post, used to interrupt a blocking read.
   */
  onPost(wake: () => void): void {
    this.wake = wake;
  }

  post(signal: PendingSignal): void {
    this.pending.add(signal);
    this.wake?.();
  }

  /**
   * Take every pending flag, clearing the mailbox.
   */
  drain(): PendingSignal[] {
    const signals = [...this.pending];
    this.pending.clear();
    return signals;
  }
}

// ============================================
// Terminal
// ============================================

export class Terminal {
  private input: TerminalInput;
  private output: TerminalOutput;
  private handleSignals: boolean;
  private byteSource: QueuedByteSource | null = null;
  private detachInput: (() => void) | null = null;
  private active = false;
  private cleanupHandlers: Array<() => void> = [];

  readonly mailbox = new SignalMailbox();

  constructor(options: TerminalOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.handleSignals = options.handleSignals ?? true;
  }

  get size(): Size {
    return {
      rows: this.output.rows || 24,
      columns: this.output.columns || 80,
    };
  }

  write(data: string): void {
    this.output.write(data);
  }

  /**
   * Byte source over the input stream. Created once and kept across
   * suspend/resume.
   */
  getByteSource(): QueuedByteSource {
    if (!this.byteSource) {
      const { source, detach } = createStreamByteSource(this.input);
      this.byteSource = source;
      this.detachInput = detach;
      this.mailbox.onPost(() => source.interrupt());
    }
    return this.byteSource;
  }

  /**
   * Enter raw mode and the alternate screen, and start listening for signals.
   */
  start(): void {
    this.getByteSource();
    this.enterEditingMode();

    if (this.handleSignals) {
      this.installSignalHandlers();
    }
  }

  /**
   * Restore the terminal and stop listening.
   */
  stop(): void {
    this.leaveEditingMode();
    for (const cleanup of this.cleanupHandlers) {
      cleanup();
    }
    this.cleanupHandlers = [];
    this.detachInput?.();
    this.detachInput = null;
    this.input.pause();
  }

  /**
   * Hand the terminal back to the shell and stop the process. Execution
   * continues here once the shell resumes us.
   */
  suspend(): void {
    debugLog('[Terminal] Suspending');
    this.leaveEditingMode();
    try {
      process.kill(process.pid, 'SIGSTOP');
    } catch (error) {
      debugLog(`[Terminal] SIGSTOP failed: ${error}`);
    }
    debugLog('[Terminal] Resumed');
    this.enterEditingMode();
  }

  /**
   * Re-apply editing mode after an external SIGCONT.
   */
  resume(): void {
    this.enterEditingMode();
  }

  private enterEditingMode(): void {
    if (this.active) return;
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    }
    this.input.resume();
    this.write(SCREEN.enterAlt + SCREEN.clear + CURSOR.moveTo(1, 1));
    this.active = true;
  }

  private leaveEditingMode(): void {
    if (!this.active) return;
    this.write(SCREEN.resetScrollRegion + STYLE.reset + CURSOR.show + SCREEN.exitAlt);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    this.active = false;
  }

  private installSignalHandlers(): void {
    const onResize = () => this.mailbox.post('resize');
    const onSuspend = () => this.mailbox.post('suspend');
    const onContinue = () => this.mailbox.post('continue');

    this.output.on('resize', onResize);
    process.on('SIGTSTP', onSuspend);
    process.on('SIGCONT', onContinue);

    this.cleanupHandlers.push(
      () => this.output.off('resize', onResize),
      () => process.off('SIGTSTP', onSuspend),
      () => process.off('SIGCONT', onContinue)
    );
  }
}

export function createTerminal(options?: TerminalOptions): Terminal {
  return new Terminal(options);
}
