/**
 * Prompt
 *
 * One-line input shown on the status row, used for the open-file path
 * and the save-before-quit question.
 */

import type { KeyEvent } from '../terminal/input.ts';

export type PromptOutcome =
  | { type: 'pending' }
  | { type: 'submit'; value: string }
  | { type: 'cancel' };

export interface PromptOptions {
  /** Text shown before the input */
  label: string;
  /** Initial input value */
  initial?: string;
  /**
   * Single-key answers: the first printable key submits immediately
   * when it is one of these characters (compared case-insensitively).
   */
  choices?: readonly string[];
}

export class Prompt {
  readonly label: string;
  private value: string;
  private choices: readonly string[] | null;

  constructor(options: PromptOptions) {
    this.label = options.label;
    this.value = options.initial ?? '';
    this.choices = options.choices ? options.choices.map((c) => c.toLowerCase()) : null;
  }

  getValue(): string {
    return this.value;
  }

  /**
   * Text for the status row.
   */
  getText(): string {
    return this.label + this.value;
  }

  /**
   * Column (0-indexed) of the input cursor within getText().
   */
  getCursorColumn(): number {
    return this.label.length + this.value.length;
  }

  handleKey(event: KeyEvent): PromptOutcome {
    if (event.type === 'key') {
      switch (event.key) {
        case 'escape':
          return { type: 'cancel' };
        case 'enter':
          return this.choices ? { type: 'pending' } : { type: 'submit', value: this.value };
        case 'backspace':
          this.value = this.value.slice(0, -1);
          return { type: 'pending' };
        case 'tab':
          if (!this.choices) this.value += '\t';
          return { type: 'pending' };
        default:
          return { type: 'pending' };
      }
    }

    if (event.ctrl) {
      // Ctrl+C / Ctrl+G back out like Escape
      return event.char === 'c' || event.char === 'g' ? { type: 'cancel' } : { type: 'pending' };
    }

    if (this.choices) {
      const answer = event.char.toLowerCase();
      return this.choices.includes(answer) ? { type: 'submit', value: answer } : { type: 'pending' };
    }

    this.value += event.char;
    return { type: 'pending' };
  }
}

export function createPrompt(options: PromptOptions): Prompt {
  return new Prompt(options);
}
