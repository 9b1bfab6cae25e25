/**
 * Document
 *
 * Ordered rows of the file being edited. Every mutation regenerates the
 * touched row's display text and highlighting and bumps the dirty counter.
 * Rows are addressed by index; `Row.index` is kept in step on insert and
 * delete so no row's identity depends on its neighbours.
 */

import { createRow, type Row } from './row.ts';
import { RowRenderer } from './row-renderer.ts';
import { findSyntax, SYNTAX_REGISTRY, type SyntaxDescriptor } from '../features/syntax/languages.ts';
import { updateAllSyntax, updateSyntax } from '../features/syntax/highlighter.ts';

export interface SerializedDocument {
  content: string;
  /** Byte length of `content` (latin1: one char per byte) */
  byteLength: number;
}

export class Document {
  private _rows: Row[] = [];
  private _dirty: number = 0;
  private _filename: string | null = null;
  private _syntax: SyntaxDescriptor | null = null;

  constructor(
    readonly renderer: RowRenderer = new RowRenderer(),
    private readonly registry: readonly SyntaxDescriptor[] = SYNTAX_REGISTRY
  ) {}

  get rows(): readonly Row[] {
    return this._rows;
  }

  get rowCount(): number {
    return this._rows.length;
  }

  /** Mutation counter; non-zero means unsaved changes */
  get dirty(): number {
    return this._dirty;
  }

  get isDirty(): boolean {
    return this._dirty > 0;
  }

  get filename(): string | null {
    return this._filename;
  }

  get syntax(): SyntaxDescriptor | null {
    return this._syntax;
  }

  row(at: number): Row | undefined {
    return this._rows[at];
  }

  markClean(): void {
    this._dirty = 0;
  }

  /**
   * Replace the contents with freshly loaded lines. The result is clean.
   */
  load(lines: readonly string[]): void {
    this._rows = lines.map((line, index) => {
      const row = createRow(index, line);
      this.renderer.regenerate(row);
      return row;
    });
    updateAllSyntax(this._rows, this._syntax);
    this._dirty = 0;
  }

  /**
   * Set the filename and pick the matching syntax descriptor
   */
  setFilename(filename: string | null): void {
    this._filename = filename;
    this.selectSyntax();
  }

  /**
   * Select the descriptor for the current filename and re-highlight every row.
   * No match leaves the document without a filetype.
   */
  selectSyntax(): void {
    this._syntax = findSyntax(this._filename, this.registry);
    updateAllSyntax(this._rows, this._syntax);
  }

  /**
   * Change the tab stop and re-render every row
   */
  setTabStop(width: number): void {
    this.renderer.tabStop = width;
    for (const row of this._rows) {
      this.renderer.regenerate(row);
    }
    updateAllSyntax(this._rows, this._syntax);
  }

  insertRow(at: number, content: string): void {
    if (at < 0 || at > this._rows.length) return;

    const row = createRow(at, content);
    // Seed with the state the row below was highlighted against
    row.commentOpenAtEnd = at > 0 ? (this._rows[at - 1]?.commentOpenAtEnd ?? false) : false;
    this._rows.splice(at, 0, row);
    this.reindexFrom(at + 1);
    this.update(at);
    this._dirty++;
  }

  deleteRow(at: number): void {
    if (at < 0 || at >= this._rows.length) return;

    this._rows.splice(at, 1);
    this.reindexFrom(at);
    // The row moving into this slot now follows a different neighbour
    if (at < this._rows.length) {
      updateSyntax(this._rows, at, this._syntax);
    }
    this._dirty++;
  }

  insertChar(rowIndex: number, at: number, ch: string): void {
    const row = this._rows[rowIndex];
    if (!row) return;

    const col = at < 0 || at > row.raw.length ? row.raw.length : at;
    row.raw = row.raw.slice(0, col) + ch + row.raw.slice(col);
    this.update(rowIndex);
    this._dirty++;
  }

  deleteChar(rowIndex: number, at: number): void {
    const row = this._rows[rowIndex];
    if (!row || at < 0 || at >= row.raw.length) return;

    row.raw = row.raw.slice(0, at) + row.raw.slice(at + 1);
    this.update(rowIndex);
    this._dirty++;
  }

  appendString(rowIndex: number, text: string): void {
    const row = this._rows[rowIndex];
    if (!row) return;

    row.raw += text;
    this.update(rowIndex);
    this._dirty++;
  }

  /**
   * Move everything from `cx` onward into a new row below
   */
  splitRowAt(cy: number, cx: number): void {
    const row = this._rows[cy];
    if (!row) return;

    const col = Math.max(0, Math.min(cx, row.raw.length));
    this.insertRow(cy + 1, row.raw.slice(col));
    row.raw = row.raw.slice(0, col);
    this.update(cy);
    this._dirty++;
  }

  /**
   * Append row `cy` onto the row above and remove it
   */
  joinWithPrevious(cy: number): void {
    const row = this._rows[cy];
    if (!row || cy === 0) return;

    this.appendString(cy - 1, row.raw);
    this.deleteRow(cy);
  }

  /**
   * File contents: every row followed by a single newline
   */
  serializeAll(): SerializedDocument {
    const content = this._rows.map((row) => `${row.raw}\n`).join('');
    return { content, byteLength: content.length };
  }

  private update(rowIndex: number): void {
    const row = this._rows[rowIndex];
    if (!row) return;
    this.renderer.regenerate(row);
    updateSyntax(this._rows, rowIndex, this._syntax);
  }

  private reindexFrom(start: number): void {
    for (let i = start; i < this._rows.length; i++) {
      const row = this._rows[i];
      if (row) row.index = i;
    }
  }
}
