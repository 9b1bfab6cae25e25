/**
 * Main Renderer
 *
 * Composes a full frame (text rows, status bar, message bar) from the
 * document and editor state and hands it to the terminal in one write,
 * so the screen never shows a half-drawn frame.
 */

import { CURSOR, SCREEN, STYLE, fgCode, FG_CODE } from '../terminal/ansi.ts';
import { highlightColorCode } from './colors.ts';
import { StatusBar } from './components/status-bar.ts';
import { MessageBar } from './components/message-bar.ts';
import type { Document } from '../core/document.ts';
import type { Row } from '../core/row.ts';
import type { EditorState } from '../state/index.ts';
import { VERSION } from '../version.ts';

export interface FrameSink {
  write(data: string): void;
}

export const WELCOME_MESSAGE = `Quill editor -- version ${VERSION}`;

/**
 * Placeholder glyph for a control byte: ^A..^Z style letters, '?' otherwise
 */
export function controlGlyph(code: number): string {
  return code <= 26 ? String.fromCharCode(64 + code) : '?';
}

function isControl(code: number): boolean {
  return code < 32 || code === 127;
}

export class Renderer {
  private outputBuffer: string = '';

  constructor(
    private readonly sink: FrameSink,
    readonly statusBar: StatusBar = new StatusBar(),
    readonly messageBar: MessageBar = new MessageBar()
  ) {}

  /**
   * Clamp the viewport so the cursor is on screen.
   * Returns the cursor's display column.
   */
  scroll(state: EditorState, document: Document): number {
    const row = document.row(state.cy);
    const rx = row ? document.renderer.toDisplayColumn(row, state.cx) : 0;

    if (state.cy < state.rowOffset) {
      state.rowOffset = state.cy;
    }
    if (state.cy >= state.rowOffset + state.screenRows) {
      state.rowOffset = state.cy - state.screenRows + 1;
    }
    if (rx < state.colOffset) {
      state.colOffset = rx;
    }
    if (rx >= state.colOffset + state.screenCols) {
      state.colOffset = rx - state.screenCols + 1;
    }
    return rx;
  }

  /**
   * Build the complete frame for the current state
   */
  composeFrame(state: EditorState, document: Document): string {
    const rx = this.scroll(state, document);

    this.outputBuffer = CURSOR.hide + CURSOR.home;
    this.drawRows(state, document);
    this.outputBuffer += this.statusBar.render(
      {
        filename: document.filename,
        rowCount: document.rowCount,
        isDirty: document.isDirty,
        mode: state.mode,
        filetype: document.syntax?.name ?? null,
        currentRow: state.cy + 1,
      },
      state.screenCols
    );
    this.outputBuffer += this.messageBar.render(state.statusMessage, state.screenCols);
    this.outputBuffer += CURSOR.moveTo(state.cy - state.rowOffset + 1, rx - state.colOffset + 1);
    this.outputBuffer += CURSOR.show;

    const frame = this.outputBuffer;
    this.outputBuffer = '';
    return frame;
  }

  /**
   * Compose and flush a frame in a single write
   */
  render(state: EditorState, document: Document): void {
    this.sink.write(this.composeFrame(state, document));
  }

  private drawRows(state: EditorState, document: Document): void {
    for (let y = 0; y < state.screenRows; y++) {
      const row = document.row(y + state.rowOffset);

      if (!row) {
        if (document.rowCount === 0 && y === Math.floor(state.screenRows / 2)) {
          this.drawWelcome(state.screenCols);
        } else {
          this.outputBuffer += '~';
        }
      } else {
        this.drawRow(row, state.colOffset, state.screenCols);
      }

      this.outputBuffer += SCREEN.clearToEnd + '\r\n';
    }
  }

  private drawWelcome(width: number): void {
    const welcome = WELCOME_MESSAGE.slice(0, width);
    let padding = Math.floor((width - welcome.length) / 2);
    if (padding > 0) {
      this.outputBuffer += '~';
      padding--;
    }
    this.outputBuffer += ' '.repeat(Math.max(0, padding)) + welcome;
  }

  /**
   * Emit the visible slice of a row, switching colour only where the
   * highlight class changes.
   */
  private drawRow(row: Row, colOffset: number, width: number): void {
    const start = Math.min(colOffset, row.display.length);
    const end = Math.min(row.display.length, colOffset + width);
    let currentColor: number | null = null;

    for (let j = start; j < end; j++) {
      const ch = row.display.charAt(j);
      const code = row.display.charCodeAt(j);
      const highlight = row.highlight[j] ?? 'normal';

      if (isControl(code)) {
        this.outputBuffer += STYLE.inverse + controlGlyph(code) + STYLE.reset;
        if (currentColor !== null) {
          this.outputBuffer += fgCode(currentColor);
        }
      } else if (highlight === 'normal') {
        if (currentColor !== null) {
          this.outputBuffer += fgCode(FG_CODE.default);
          currentColor = null;
        }
        this.outputBuffer += ch;
      } else {
        const color = highlightColorCode(highlight);
        if (color !== currentColor) {
          currentColor = color;
          this.outputBuffer += fgCode(color);
        }
        this.outputBuffer += ch;
      }
    }

    this.outputBuffer += fgCode(FG_CODE.default);
  }
}
