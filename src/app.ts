/**
 * Main Application
 *
 * The event loop: wait for one key, apply it to the editing session,
 * render once. Signals arrive as mailbox flags and are handled at the top
 * of the next iteration, never in the middle of an edit.
 */

import * as path from 'path';
import { EditorSession } from './core/session.ts';
import type { KeyDecoder, KeyEvent } from './terminal/input.ts';
import type { SignalMailbox, Size } from './terminal/terminal.ts';
import type { Renderer } from './ui/renderer.ts';
import { createStatusBar, type StatusBar, type StatusInfo } from './ui/status-bar.ts';
import { Prompt, type PromptOptions } from './ui/prompt.ts';
import { Keymap, createKeymap } from './input/keymap.ts';
import { defaultKeybindings, HELP_TEXT } from './input/default-keybindings.ts';
import { MemoryClipboard, type Clipboard } from './services/clipboard.ts';
import { loadDocument, saveDocument } from './services/document.ts';
import type { Settings } from './config/settings.ts';
import { debugLog } from './debug.ts';

// ============================================
// Types
// ============================================

/**
 * What the app needs from the terminal.
 */
export interface AppHost {
  readonly size: Size;
  readonly mailbox: SignalMailbox;
  suspend(): void;
  resume(): void;
}

export interface AppOptions {
  host: AppHost;
  decoder: KeyDecoder;
  renderer: Renderer;
  settings: Settings;
  clipboard?: Clipboard;
  keymap?: Keymap;
}

interface ActivePrompt {
  prompt: Prompt;
  onSubmit: (value: string) => Promise<void>;
}

// ============================================
// App
// ============================================

export class App {
  private session: EditorSession;
  private host: AppHost;
  private decoder: KeyDecoder;
  private renderer: Renderer;
  private clipboard: Clipboard;
  private keymap: Keymap;
  private statusBar: StatusBar = createStatusBar();
  private filePath: string | null = null;
  private markMode = false;
  private activePrompt: ActivePrompt | null = null;
  private running = false;

  constructor(options: AppOptions) {
    this.host = options.host;
    this.decoder = options.decoder;
    this.renderer = options.renderer;
    this.clipboard = options.clipboard ?? new MemoryClipboard();
    this.keymap = options.keymap ?? createKeymap(defaultKeybindings);

    const settings = options.settings;
    this.session = new EditorSession([''], this.textAreaSize(), settings.toEditorOptions());
    this.applyHighlight(settings);

    const applyOptions = () => this.session.setOptions(settings.toEditorOptions());
    settings.onChange('editor.tabSize', applyOptions);
    settings.onChange('editor.wrapAtEdges', applyOptions);
    settings.onChange('editor.edgeJump', applyOptions);
    settings.onChange('editor.wordCharacters', applyOptions);
    settings.onChange('editor.selectionHighlight.start', () => this.applyHighlight(settings));
    settings.onChange('editor.selectionHighlight.end', () => this.applyHighlight(settings));
  }

  private applyHighlight(settings: Settings): void {
    this.renderer.setHighlight(
      settings.get('editor.selectionHighlight.start'),
      settings.get('editor.selectionHighlight.end')
    );
    this.session.dirty.requestFullRedraw();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Accessors
  // ─────────────────────────────────────────────────────────────────────────

  getSession(): EditorSession {
    return this.session;
  }

  getFilePath(): string | null {
    return this.filePath;
  }

  getStatusBar(): StatusBar {
    return this.statusBar;
  }

  isRunning(): boolean {
    return this.running;
  }

  isMarking(): boolean {
    return this.markMode;
  }

  getPrompt(): Prompt | null {
    return this.activePrompt?.prompt ?? null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Load a file into the session. Returns false when it could not be read.
   */
  async openFile(filePath: string): Promise<boolean> {
    const resolved = path.resolve(filePath);
    const result = await loadDocument(resolved);
    if (!result.ok) {
      this.statusBar.setMessage(result.message);
      return false;
    }

    this.session.replaceDocument(result.lines);
    this.filePath = resolved;
    this.markMode = false;
    const name = path.basename(resolved);
    this.statusBar.setMessage(
      result.isNew ? `New file: ${name}` : `Opened ${name} (${result.lines.length} lines)`
    );
    debugLog(`[App] Opened ${resolved}`);
    return true;
  }

  /**
   * Run until the user quits or input ends.
   */
  async run(): Promise<void> {
    this.running = true;
    this.session.dirty.requestFullRedraw();
    this.render();

    while (this.running) {
      if (this.applySignals()) {
        this.render();
      }

      const result = await this.decoder.decode();
      if (!result.ok) {
        if (result.error === 'end-of-input') {
          debugLog('[App] Input closed');
          this.running = false;
        } else if (result.error !== 'interrupted') {
          debugLog(`[App] Discarded input: ${result.error}`);
        }
        continue;
      }

      await this.handleKey(result.event);
      if (this.running) {
        this.render();
      }
    }
  }

  stop(): void {
    this.running = false;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Signals
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Apply pending signal flags. Returns true if any were handled.
   */
  applySignals(): boolean {
    const signals = this.host.mailbox.drain();
    for (const signal of signals) {
      switch (signal) {
        case 'resize': {
          const { height, width } = this.textAreaSize();
          this.session.viewport.resize(height, width);
          this.renderer.clearScreen(this.session);
          debugLog(`[App] Resized to ${width}x${height}`);
          break;
        }
        case 'suspend':
          this.suspend();
          break;
        case 'continue':
          this.host.resume();
          this.session.dirty.requestFullRedraw();
          break;
      }
    }
    return signals.length > 0;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Input
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Apply one key event.
   */
  async handleKey(event: KeyEvent): Promise<void> {
    this.statusBar.clearMessage();

    if (this.activePrompt) {
      await this.handlePromptKey(this.activePrompt, event);
      return;
    }

    const command = this.keymap.getCommand(event);
    if (command) {
      await this.executeCommand(command, event);
      return;
    }

    if (event.type === 'char' && !event.ctrl && !event.alt) {
      this.session.insertText(event.char);
      this.markMode = false;
      return;
    }

    debugLog(`[App] Unbound key: ${Keymap.eventToString(event)}`);
  }

  private async handlePromptKey(active: ActivePrompt, event: KeyEvent): Promise<void> {
    const outcome = active.prompt.handleKey(event);
    if (outcome.type === 'pending') return;

    this.activePrompt = null;
    if (outcome.type === 'cancel') {
      this.statusBar.setMessage('Cancelled');
      return;
    }
    await active.onSubmit(outcome.value);
  }

  private openPrompt(options: PromptOptions, onSubmit: (value: string) => Promise<void>): void {
    this.activePrompt = { prompt: new Prompt(options), onSubmit };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Commands
  // ─────────────────────────────────────────────────────────────────────────

  async executeCommand(command: string, event?: KeyEvent): Promise<void> {
    const session = this.session;

    if (command.startsWith('cursor.')) {
      session.setSelecting(this.markMode || (event?.shift ?? false));
      this.moveCursor(command);
      session.setSelecting(false);
      return;
    }

    switch (command) {
      case 'edit.newline':
        session.insertNewline();
        this.markMode = false;
        break;
      case 'edit.tab':
        session.insertText('\t');
        this.markMode = false;
        break;
      case 'edit.backspace':
        session.backspace();
        this.markMode = false;
        break;
      case 'edit.deleteWordLeft':
        session.deleteWordBackward();
        this.markMode = false;
        break;
      case 'edit.delete':
        session.deleteForward();
        this.markMode = false;
        break;
      case 'edit.copy':
        await this.copy(false);
        break;
      case 'edit.cut':
        await this.copy(true);
        break;
      case 'edit.paste':
        await this.paste();
        break;
      case 'edit.selectAll':
        session.selectAll();
        break;
      case 'edit.toggleMark':
        this.markMode = !this.markMode;
        this.statusBar.setMessage(this.markMode ? 'Mark set' : 'Mark cleared');
        break;
      case 'edit.cancel':
        this.markMode = false;
        session.clearSelection();
        break;
      case 'file.save':
        await this.save();
        break;
      case 'file.open':
        this.requestOpen();
        break;
      case 'app.quit':
        this.requestQuit();
        break;
      case 'app.suspend':
        this.suspend();
        break;
      case 'app.help':
        this.statusBar.setMessage(HELP_TEXT);
        break;
      case 'app.redraw':
        this.renderer.clearScreen(session);
        break;
      default:
        debugLog(`[App] Unknown command: ${command}`);
    }
  }

  private moveCursor(command: string): void {
    const session = this.session;
    switch (command) {
      case 'cursor.up':
        session.moveVertical(-1);
        break;
      case 'cursor.down':
        session.moveVertical(1);
        break;
      case 'cursor.left':
        session.moveHorizontal(-1);
        break;
      case 'cursor.right':
        session.moveHorizontal(1);
        break;
      case 'cursor.wordLeft':
        session.moveHorizontal(-1, true);
        break;
      case 'cursor.wordRight':
        session.moveHorizontal(1, true);
        break;
      case 'cursor.lineStart':
        session.moveToLineStart();
        break;
      case 'cursor.lineEnd':
        session.moveToLineEnd();
        break;
      case 'cursor.documentStart':
        session.moveToDocumentStart();
        break;
      case 'cursor.documentEnd':
        session.moveToDocumentEnd();
        break;
      case 'cursor.pageUp':
        session.moveVertical(-session.viewport.height);
        break;
      case 'cursor.pageDown':
        session.moveVertical(session.viewport.height);
        break;
      default:
        debugLog(`[App] Unknown cursor command: ${command}`);
    }
  }

  private async copy(cut: boolean): Promise<void> {
    const text = this.session.getSelectedText();
    if (text === null) {
      this.statusBar.setMessage('Nothing selected');
      return;
    }

    await this.clipboard.provide(text);
    if (cut) {
      this.session.deleteSelection();
    }
    this.markMode = false;
    this.statusBar.setMessage(`${cut ? 'Cut' : 'Copied'} ${text.length} characters`);
  }

  private async paste(): Promise<void> {
    const text = await this.clipboard.retrieve();
    if (text.length === 0) {
      this.statusBar.setMessage('Clipboard is empty');
      return;
    }
    this.session.insertMultilineText(text);
    this.markMode = false;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Files and quitting
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Save to the current path, asking for one first if there is none.
   * Resolves true once the document is on disk.
   */
  private async save(after?: () => void): Promise<boolean> {
    if (!this.filePath) {
      this.openPrompt({ label: 'Save as: ' }, async (value) => {
        const target = value.trim();
        if (!target) {
          this.statusBar.setMessage('No file name given');
          return;
        }
        if (await this.writeFile(path.resolve(target))) after?.();
      });
      return false;
    }

    const saved = await this.writeFile(this.filePath);
    if (saved) after?.();
    return saved;
  }

  /**
   * Write the document to `target`, binding it to that path only once the
   * write succeeds.
   */
  private async writeFile(target: string): Promise<boolean> {
    const result = await saveDocument(target, this.session.buffer.getLines());
    if (!result.ok) {
      this.statusBar.setMessage(result.message);
      return false;
    }
    this.filePath = target;
    this.session.buffer.setModified(false);
    this.statusBar.setMessage(`Saved ${path.basename(target)} (${result.bytes} bytes)`);
    debugLog(`[App] Saved ${target}`);
    return true;
  }

  private requestOpen(): void {
    const ask = () =>
      this.openPrompt({ label: 'Open: ' }, async (value) => {
        const target = value.trim();
        if (!target) {
          this.statusBar.setMessage('No file name given');
          return;
        }
        await this.openFile(target);
      });

    if (!this.session.buffer.isModified()) {
      ask();
      return;
    }

    this.openPrompt({ label: 'Discard unsaved changes? (y/n) ', choices: ['y', 'n'] }, async (answer) => {
      if (answer === 'y') {
        ask();
      } else {
        this.statusBar.setMessage('Cancelled');
      }
    });
  }

  private requestQuit(): void {
    if (!this.session.buffer.isModified()) {
      this.stop();
      return;
    }

    this.openPrompt({ label: 'Save changes? (y/n, Esc cancels) ', choices: ['y', 'n'] }, async (answer) => {
      if (answer === 'n') {
        this.stop();
        return;
      }
      await this.save(() => this.stop());
    });
  }

  private suspend(): void {
    this.host.suspend();
    this.session.dirty.requestFullRedraw();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Rendering
  // ─────────────────────────────────────────────────────────────────────────

  private textAreaSize(): { height: number; width: number } {
    const { rows, columns } = this.host.size;
    return { height: Math.max(1, rows - 1), width: Math.max(1, columns) };
  }

  getStatusInfo(): StatusInfo {
    const cursor = this.session.getCursor();
    return {
      message: this.statusBar.getMessage(),
      documentName: this.filePath ? path.basename(this.filePath) : '[No Name]',
      modified: this.session.buffer.isModified(),
      row: cursor.row,
      col: cursor.col,
      visualCol: this.session.cursorVisualColumn(),
      marking: this.markMode,
    };
  }

  render(): void {
    const prompt = this.activePrompt?.prompt;
    this.renderer.render(
      this.session,
      this.getStatusInfo(),
      prompt ? { text: prompt.getText(), cursorColumn: prompt.getCursorColumn() } : null
    );
  }
}

export function createApp(options: AppOptions): App {
  return new App(options);
}
