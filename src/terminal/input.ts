/**
 * Raw Terminal Input Decoder
 *
 * Turns the raw byte stream from stdin into key events. Bytes arrive as
 * latin1 strings, one char per byte. Escape sequences that are incomplete
 * when the escape timeout fires, or that are not recognised, decode as a
 * bare ESCAPE key.
 */

import { ESC } from './ansi.ts';

export interface KeyEvent {
  key: string;        // Key name (e.g. 'UP', 'ENTER', 'PAGEDOWN') or the upper-cased character
  char?: string;      // The byte itself when the key carries one
  ctrl: boolean;
}

export interface CursorPosition {
  rows: number;
  cols: number;
}

type KeyCallback = (event: KeyEvent) => void;
type CursorPositionCallback = (position: CursorPosition) => void;

// Sequences after ESC that map to navigation keys
const ESCAPE_SEQUENCES: Record<string, string> = {
  // Arrow keys
  '[A': 'UP',
  '[B': 'DOWN',
  '[C': 'RIGHT',
  '[D': 'LEFT',
  'OA': 'UP',
  'OB': 'DOWN',
  'OC': 'RIGHT',
  'OD': 'LEFT',
  // Home/End
  '[H': 'HOME',
  '[F': 'END',
  'OH': 'HOME',
  'OF': 'END',
  '[1~': 'HOME',
  '[7~': 'HOME',
  '[4~': 'END',
  '[8~': 'END',
  // Delete
  '[3~': 'DELETE',
  // Page Up/Down
  '[5~': 'PAGEUP',
  '[6~': 'PAGEDOWN',
};

const CURSOR_POSITION_REPORT = /^\[(\d+);(\d+)R$/;

// Longest CSI parameter run we wait for before giving up on a sequence
const MAX_CSI_LENGTH = 16;

export function keyEvent(key: string, char?: string, ctrl: boolean = false): KeyEvent {
  return char === undefined ? { key, ctrl } : { key, char, ctrl };
}

export class KeyDecoder {
  private keyCallbacks: Set<KeyCallback> = new Set();
  private positionCallbacks: Set<CursorPositionCallback> = new Set();
  private buffer: string = '';
  private escapeTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(private readonly escapeTimeout: number = 100) {}

  /**
   * Register key event callback
   */
  onKey(callback: KeyCallback): () => void {
    this.keyCallbacks.add(callback);
    return () => this.keyCallbacks.delete(callback);
  }

  /**
   * Register cursor position report callback
   */
  onCursorPosition(callback: CursorPositionCallback): () => void {
    this.positionCallbacks.add(callback);
    return () => this.positionCallbacks.delete(callback);
  }

  /**
   * Feed raw input bytes
   */
  feed(data: string): void {
    if (this.escapeTimer) {
      clearTimeout(this.escapeTimer);
      this.escapeTimer = null;
    }
    this.buffer += data;
    this.parseBuffer(false);
  }

  /**
   * Drop buffered input and any pending timer
   */
  reset(): void {
    if (this.escapeTimer) {
      clearTimeout(this.escapeTimer);
      this.escapeTimer = null;
    }
    this.buffer = '';
  }

  private parseBuffer(force: boolean): void {
    while (this.buffer.length > 0) {
      const consumed = this.tryParse();
      if (consumed > 0) {
        this.buffer = this.buffer.slice(consumed);
        continue;
      }

      // Incomplete escape sequence
      if (force) {
        this.buffer = '';
        this.emitKey(keyEvent('ESCAPE'));
        return;
      }
      this.escapeTimer = setTimeout(() => {
        this.escapeTimer = null;
        this.parseBuffer(true);
      }, this.escapeTimeout);
      return;
    }
  }

  /**
   * Try to parse the start of the buffer.
   * Returns number of bytes consumed, 0 when more input is needed.
   */
  private tryParse(): number {
    if (this.buffer[0] === ESC) {
      return this.parseEscape();
    }

    const event = this.parseByte(this.buffer.charCodeAt(0));
    this.emitKey(event);
    return 1;
  }

  private parseEscape(): number {
    if (this.buffer.length < 2) return 0;

    const intro = this.buffer[1];

    if (intro === '[') {
      let i = 2;
      // Parameter and intermediate bytes
      while (i < this.buffer.length) {
        const c = this.buffer.charCodeAt(i);
        if (c < 0x20 || c > 0x3f) break;
        i++;
      }
      if (i === this.buffer.length) {
        if (i - 2 >= MAX_CSI_LENGTH) {
          this.emitKey(keyEvent('ESCAPE'));
          return i;
        }
        return 0;
      }

      const final = this.buffer.charCodeAt(i);
      if (final < 0x40 || final > 0x7e) {
        // Not a CSI sequence; the offending byte goes with the escape
        this.emitKey(keyEvent('ESCAPE'));
        return i + 1;
      }

      const seq = this.buffer.slice(1, i + 1);
      const report = CURSOR_POSITION_REPORT.exec(seq);
      if (report) {
        this.emitCursorPosition({
          rows: parseInt(report[1] ?? '0', 10),
          cols: parseInt(report[2] ?? '0', 10),
        });
        return i + 1;
      }

      this.emitKey(keyEvent(ESCAPE_SEQUENCES[seq] ?? 'ESCAPE'));
      return i + 1;
    }

    if (intro === 'O') {
      if (this.buffer.length < 3) return 0;
      const seq = this.buffer.slice(1, 3);
      this.emitKey(keyEvent(ESCAPE_SEQUENCES[seq] ?? 'ESCAPE'));
      return 3;
    }

    // ESC followed by an ordinary byte (Alt+key): one escape for both
    this.emitKey(keyEvent('ESCAPE'));
    return 2;
  }

  /**
   * Decode a single non-escape byte
   */
  private parseByte(code: number): KeyEvent {
    const char = String.fromCharCode(code);
    switch (code) {
      case 8:   // Ctrl+H
      case 127: // DEL, sent by most terminals for Backspace
        return keyEvent('BACKSPACE');
      case 9:
        return keyEvent('TAB', char);
      case 13:
        return keyEvent('ENTER');
      default:
        if (code < 32) {
          // Ctrl+letter: 1 -> A ... 26 -> Z
          return keyEvent(String.fromCharCode(code + 64), char, true);
        }
        return keyEvent(char.toUpperCase(), char);
    }
  }

  private emitKey(event: KeyEvent): void {
    for (const callback of this.keyCallbacks) {
      callback(event);
    }
  }

  private emitCursorPosition(position: CursorPosition): void {
    for (const callback of this.positionCallbacks) {
      callback(position);
    }
  }
}

/**
 * Whether a key is the given Ctrl+letter chord
 */
export function isCtrl(event: KeyEvent, letter: string): boolean {
  return event.ctrl && event.key === letter.toUpperCase();
}
