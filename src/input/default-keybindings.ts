/**
 * Default Keybindings
 *
 * Movement keys are bound with and without shift; shift extends the
 * selection, which the app reads from the event itself.
 */

import type { KeyBinding } from './keymap.ts';

const movement: Array<[string, string]> = [
  ['up', 'cursor.up'],
  ['down', 'cursor.down'],
  ['left', 'cursor.left'],
  ['right', 'cursor.right'],
  ['ctrl+left', 'cursor.wordLeft'],
  ['ctrl+right', 'cursor.wordRight'],
  ['home', 'cursor.lineStart'],
  ['end', 'cursor.lineEnd'],
  ['ctrl+home', 'cursor.documentStart'],
  ['ctrl+end', 'cursor.documentEnd'],
  ['pageup', 'cursor.pageUp'],
  ['pagedown', 'cursor.pageDown'],
];

function withShift(key: string): string {
  return key.startsWith('ctrl+') ? `ctrl+shift+${key.slice(5)}` : `shift+${key}`;
}

export const defaultKeybindings: readonly KeyBinding[] = [
  ...movement.flatMap(([key, command]) => [
    { key, command },
    { key: withShift(key), command },
  ]),

  // Editing
  { key: 'enter', command: 'edit.newline' },
  { key: 'tab', command: 'edit.tab' },
  { key: 'backspace', command: 'edit.backspace' },
  { key: 'shift+backspace', command: 'edit.backspace' },
  { key: 'ctrl+backspace', command: 'edit.deleteWordLeft' },
  { key: 'ctrl+w', command: 'edit.deleteWordLeft' },
  { key: 'delete', command: 'edit.delete' },
  { key: 'shift+delete', command: 'edit.cut' },
  { key: 'ctrl+c', command: 'edit.copy' },
  { key: 'ctrl+x', command: 'edit.cut' },
  { key: 'ctrl+v', command: 'edit.paste' },
  { key: 'ctrl+a', command: 'edit.selectAll' },
  { key: 'insert', command: 'edit.toggleMark' },
  { key: 'escape', command: 'edit.cancel' },

  // Files and application
  { key: 'ctrl+s', command: 'file.save' },
  { key: 'ctrl+o', command: 'file.open' },
  { key: 'ctrl+q', command: 'app.quit' },
  { key: 'ctrl+z', command: 'app.suspend' },
  { key: 'ctrl+g', command: 'app.help' },
  { key: 'ctrl+l', command: 'app.redraw' },
];

export const HELP_TEXT =
  '^S save  ^O open  ^Q quit  ^C copy  ^X cut  ^V paste  ^A all  Ins mark  ^Z suspend';
