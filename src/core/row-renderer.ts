/**
 * Row Renderer
 *
 * Expands tabs into a row's display text and maps cursor columns between
 * raw bytes (cx) and display cells (rx). One byte is one cell, except a
 * tab, which advances to the next multiple of the tab stop.
 */

import type { Row } from './row.ts';

export const DEFAULT_TAB_STOP = 2;

export class RowRenderer {
  constructor(private _tabStop: number = DEFAULT_TAB_STOP) {}

  get tabStop(): number {
    return this._tabStop;
  }

  set tabStop(width: number) {
    this._tabStop = Math.max(1, Math.floor(width));
  }

  /**
   * Display column of raw column `cx`
   */
  toDisplayColumn(row: Row, cx: number): number {
    let rx = 0;
    for (let j = 0; j < cx && j < row.raw.length; j++) {
      rx = this.advance(row.raw[j], rx);
    }
    return rx;
  }

  /**
   * Raw column whose cell covers display column `rx`.
   * Returns the row length when `rx` lies past the end.
   */
  toRawColumn(row: Row, rx: number): number {
    let current = 0;
    for (let cx = 0; cx < row.raw.length; cx++) {
      current = this.advance(row.raw[cx], current);
      if (current > rx) return cx;
    }
    return row.raw.length;
  }

  /**
   * Rebuild `display` from `raw`
   */
  regenerate(row: Row): void {
    let display = '';
    for (const ch of row.raw) {
      if (ch === '\t') {
        display += ' ';
        while (display.length % this._tabStop !== 0) display += ' ';
      } else {
        display += ch;
      }
    }
    row.display = display;
  }

  private advance(ch: string | undefined, rx: number): number {
    if (ch === '\t') {
      return rx + this._tabStop - (rx % this._tabStop);
    }
    return rx + 1;
  }
}
