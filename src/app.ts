/**
 * Main Application Controller
 *
 * Owns the editor state and the open document, runs the
 * read-key / dispatch / redraw loop and implements every editing command.
 */

import { Document } from './core/document.ts';
import { readDocumentFile, writeDocumentFile } from './core/file-io.ts';
import { Settings } from './config/settings.ts';
import { IncrementalSearch } from './features/search/incremental-search.ts';
import { createEditorState, RESERVED_ROWS, type EditorState } from './state/index.ts';
import { CURSOR, SCREEN } from './terminal/ansi.ts';
import { isCtrl, type KeyEvent } from './terminal/input.ts';
import { Renderer } from './ui/renderer.ts';
import { MessageBar } from './ui/components/message-bar.ts';
import { StatusBar } from './ui/components/status-bar.ts';
import { prompt, type PromptCallback, type PromptHost } from './ui/components/prompt.ts';
import { debugLog } from './debug.ts';
import { errorMessage } from './errors.ts';

/**
 * The parts of a terminal the editor drives
 */
export interface EditorTerminal {
  readKey(): Promise<KeyEvent>;
  write(data: string): void;
}

export interface WindowDimensions {
  rows: number;
  cols: number;
}

export interface EditorOptions {
  settings?: Settings;
  document?: Document;
  /** Clock used for status message timestamps */
  now?: () => number;
}

export const HELP_MESSAGE =
  'HELP: Ctrl-S = save | Ctrl-Q = quit | Ctrl-F = find | i = insert, Ctrl-J = leave insert';

type Direction = 'LEFT' | 'RIGHT' | 'UP' | 'DOWN';

// Navigation mode keys that move like the arrows
const VI_MOVES: Record<string, Direction> = {
  h: 'LEFT',
  j: 'DOWN',
  k: 'UP',
  l: 'RIGHT',
};

function isDirection(key: string): key is Direction {
  return key === 'LEFT' || key === 'RIGHT' || key === 'UP' || key === 'DOWN';
}

export class Editor implements PromptHost {
  readonly state: EditorState;
  readonly document: Document;
  readonly settings: Settings;
  private readonly renderer: Renderer;
  private readonly now: () => number;
  private isRunning: boolean = false;

  constructor(
    private readonly terminal: EditorTerminal,
    size: WindowDimensions,
    options: EditorOptions = {}
  ) {
    this.settings = options.settings ?? new Settings();
    this.now = options.now ?? Date.now;
    this.document = options.document ?? new Document();
    this.document.setTabStop(this.settings.get('editor.tabSize'));

    this.state = createEditorState(size.rows, size.cols, this.settings.get('editor.quitConfirmations'));
    const messageBar = new MessageBar(this.settings.get('editor.messageTimeout'), this.now);
    this.renderer = new Renderer(terminal, new StatusBar(), messageBar);
  }

  get running(): boolean {
    return this.isRunning;
  }

  // ──────────────────────────────────────────────────────────────────
  // Lifecycle
  // ──────────────────────────────────────────────────────────────────

  /**
   * Load a file into the document. Throws FileOpenError when it can't be read.
   */
  async open(filePath: string): Promise<void> {
    const lines = await readDocumentFile(filePath);
    this.document.setFilename(filePath);
    this.document.load(lines);
    debugLog(`[Editor] opened ${filePath} (${lines.length} rows, filetype ${this.document.syntax?.name ?? 'none'})`);
  }

  /**
   * Main loop: draw, wait for a key, act on it. Resolves when the user quits.
   */
  async run(): Promise<void> {
    this.isRunning = true;
    while (this.isRunning) {
      this.refreshScreen();
      const key = await this.readKey();
      await this.processKey(key);
    }
  }

  /**
   * Adopt a new terminal size; the next frame uses it
   */
  resize(size: WindowDimensions): void {
    this.state.screenRows = Math.max(1, size.rows - RESERVED_ROWS);
    this.state.screenCols = Math.max(1, size.cols);
    debugLog(`[Editor] resized to ${size.rows}x${size.cols}`);
  }

  // ──────────────────────────────────────────────────────────────────
  // Prompt host
  // ──────────────────────────────────────────────────────────────────

  setStatusMessage(text: string): void {
    this.state.statusMessage = { text, time: this.now() };
  }

  refreshScreen(): void {
    this.renderer.render(this.state, this.document);
  }

  readKey(): Promise<KeyEvent> {
    return this.terminal.readKey();
  }

  // ──────────────────────────────────────────────────────────────────
  // Key dispatch
  // ──────────────────────────────────────────────────────────────────

  async processKey(key: KeyEvent): Promise<void> {
    if (isCtrl(key, 'q')) {
      this.quit();
      return;
    }

    await this.dispatch(key);
    this.state.quitConfirmationsRemaining = this.settings.get('editor.quitConfirmations');
  }

  private async dispatch(key: KeyEvent): Promise<void> {
    if (isCtrl(key, 's')) {
      await this.save();
      return;
    }
    if (isCtrl(key, 'f')) {
      await this.find();
      return;
    }
    if (isCtrl(key, 'y') || key.key === 'PAGEUP') {
      this.pageMove('UP');
      return;
    }
    if (isCtrl(key, 'e') || key.key === 'PAGEDOWN') {
      this.pageMove('DOWN');
      return;
    }
    // Redraw happens every iteration anyway
    if (isCtrl(key, 'l') || key.key === 'ESCAPE') return;

    if (key.key === 'HOME') {
      this.state.cx = 0;
      return;
    }
    if (key.key === 'END') {
      const row = this.document.row(this.state.cy);
      if (row) this.state.cx = row.raw.length;
      return;
    }
    if (isDirection(key.key)) {
      this.moveCursor(key.key);
      return;
    }

    if (this.state.mode === 'insert') {
      this.dispatchInsert(key);
    } else {
      this.dispatchNavigation(key);
    }
  }

  private dispatchInsert(key: KeyEvent): void {
    if (key.key === 'ENTER') {
      this.insertNewline();
    } else if (key.key === 'BACKSPACE') {
      this.deleteChar();
    } else if (key.key === 'DELETE') {
      this.moveCursor('RIGHT');
      this.deleteChar();
    } else if (isCtrl(key, 'j')) {
      this.setMode('navigation');
    } else if (key.char !== undefined) {
      this.insertChar(key.char);
    }
  }

  private dispatchNavigation(key: KeyEvent): void {
    if (key.ctrl || key.char === undefined) return;

    const move = VI_MOVES[key.char];
    if (move) {
      this.moveCursor(move);
    } else if (key.char === 'i') {
      this.setMode('insert');
    }
  }

  private setMode(mode: EditorState['mode']): void {
    this.state.mode = mode;
    debugLog(`[Editor] mode ${mode}`);
  }

  // ──────────────────────────────────────────────────────────────────
  // Quit
  // ──────────────────────────────────────────────────────────────────

  private quit(): void {
    const remaining = this.state.quitConfirmationsRemaining;
    if (this.document.isDirty && remaining > 0) {
      this.setStatusMessage(
        `WARNING!!! File has unsaved changes. Press Ctrl-Q ${remaining} more times to quit.`
      );
      this.state.quitConfirmationsRemaining = remaining - 1;
      return;
    }

    this.terminal.write(SCREEN.clear + CURSOR.home);
    this.isRunning = false;
    debugLog('[Editor] quit');
  }

  // ──────────────────────────────────────────────────────────────────
  // Cursor movement
  // ──────────────────────────────────────────────────────────────────

  moveCursor(direction: Direction): void {
    const state = this.state;
    const row = this.document.row(state.cy);

    switch (direction) {
      case 'LEFT':
        if (state.cx !== 0) {
          state.cx--;
        } else if (state.cy > 0) {
          state.cy--;
          state.cx = this.document.row(state.cy)?.raw.length ?? 0;
        }
        break;
      case 'RIGHT':
        if (row && state.cx < row.raw.length) {
          state.cx++;
        } else if (row && state.cx === row.raw.length) {
          state.cy++;
          state.cx = 0;
        }
        break;
      case 'UP':
        if (state.cy !== 0) state.cy--;
        break;
      case 'DOWN':
        if (state.cy < this.document.rowCount) state.cy++;
        break;
    }

    // Snap to the end of the row we landed on
    const rowLength = this.document.row(state.cy)?.raw.length ?? 0;
    if (state.cx > rowLength) state.cx = rowLength;
  }

  /**
   * Jump to the top (bottom) edge of the viewport, then move a screenful
   */
  private pageMove(direction: 'UP' | 'DOWN'): void {
    const state = this.state;
    if (direction === 'UP') {
      state.cy = state.rowOffset;
    } else {
      state.cy = Math.min(state.rowOffset + state.screenRows - 1, this.document.rowCount);
    }

    for (let i = 0; i < state.screenRows; i++) {
      this.moveCursor(direction);
    }
  }

  // ──────────────────────────────────────────────────────────────────
  // Editing
  // ──────────────────────────────────────────────────────────────────

  insertChar(ch: string): void {
    if (this.state.cy === this.document.rowCount) {
      this.document.insertRow(this.document.rowCount, '');
    }
    this.document.insertChar(this.state.cy, this.state.cx, ch);
    this.state.cx += ch.length;
  }

  insertNewline(): void {
    if (this.state.cx === 0) {
      this.document.insertRow(this.state.cy, '');
    } else {
      this.document.splitRowAt(this.state.cy, this.state.cx);
    }
    this.state.cy++;
    this.state.cx = 0;
  }

  /**
   * Delete the byte left of the cursor, or join the row onto the one above
   */
  deleteChar(): void {
    const state = this.state;
    if (state.cy === this.document.rowCount) return;
    if (state.cx === 0 && state.cy === 0) return;

    if (state.cx > 0) {
      this.document.deleteChar(state.cy, state.cx - 1);
      state.cx--;
    } else {
      state.cx = this.document.row(state.cy - 1)?.raw.length ?? 0;
      this.document.joinWithPrevious(state.cy);
      state.cy--;
    }
  }

  // ──────────────────────────────────────────────────────────────────
  // Save
  // ──────────────────────────────────────────────────────────────────

  async save(): Promise<void> {
    let filename = this.document.filename;
    if (filename === null) {
      filename = await prompt(this, (input) => `Save as: ${input} (ESC to cancel)`);
      if (filename === null) {
        this.setStatusMessage('Save aborted');
        return;
      }
      this.document.setFilename(filename);
    }

    const { content, byteLength } = this.document.serializeAll();
    try {
      const written = await writeDocumentFile(filename, content);
      this.document.markClean();
      this.setStatusMessage(`${written} bytes written to disk`);
      debugLog(`[Editor] saved ${byteLength} bytes to ${filename}`);
    } catch (error) {
      this.setStatusMessage(`Can't save! I/O error: ${errorMessage(error)}`);
      debugLog(`[Editor] save of ${filename} failed: ${errorMessage(error)}`);
    }
  }

  // ──────────────────────────────────────────────────────────────────
  // Find
  // ──────────────────────────────────────────────────────────────────

  /**
   * Incremental search. Escape puts the cursor and viewport back.
   */
  async find(): Promise<void> {
    const { cx, cy, colOffset, rowOffset } = this.state;
    const search = new IncrementalSearch(this.document, this.state);
    const onKey: PromptCallback = (query, key) => {
      search.onKey(query, key);
    };

    const query = await prompt(this, (input) => `Search: ${input} (Use ESC/Arrows/Enter)`, onKey);
    search.restoreHighlight();

    if (query === null) {
      this.state.cx = cx;
      this.state.cy = cy;
      this.state.colOffset = colOffset;
      this.state.rowOffset = rowOffset;
    } else {
      debugLog(`[Search] accepted "${query}" at row ${this.state.cy}`);
    }
  }
}
