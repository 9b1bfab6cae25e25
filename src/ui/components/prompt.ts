/**
 * Prompt
 *
 * Single-line input read through the message bar. Each keystroke redraws
 * the screen and is reported to an optional callback, which lets a caller
 * react as the user types (incremental search).
 */

import type { KeyEvent } from '../../terminal/input.ts';

export type PromptCallback = (input: string, key: KeyEvent) => void;

/**
 * What a prompt needs from the editor hosting it
 */
export interface PromptHost {
  setStatusMessage(text: string): void;
  refreshScreen(): void;
  readKey(): Promise<KeyEvent>;
}

/**
 * Printable ASCII, the only bytes a prompt accepts as text
 */
export function isPrintable(key: KeyEvent): key is KeyEvent & { char: string } {
  if (key.ctrl || key.char === undefined || key.char.length !== 1) return false;
  const code = key.char.charCodeAt(0);
  return code >= 32 && code <= 126;
}

/**
 * Read a line of input. `template` renders the message bar text for the
 * current input. Resolves to null when the user presses Escape.
 */
export async function prompt(
  host: PromptHost,
  template: (input: string) => string,
  callback?: PromptCallback
): Promise<string | null> {
  let input = '';

  while (true) {
    host.setStatusMessage(template(input));
    host.refreshScreen();

    const key = await host.readKey();

    if (key.key === 'BACKSPACE' || key.key === 'DELETE') {
      input = input.slice(0, -1);
    } else if (key.key === 'ESCAPE') {
      host.setStatusMessage('');
      callback?.(input, key);
      return null;
    } else if (key.key === 'ENTER') {
      if (input.length > 0) {
        host.setStatusMessage('');
        callback?.(input, key);
        return input;
      }
    } else if (isPrintable(key)) {
      input += key.char;
    }

    callback?.(input, key);
  }
}
