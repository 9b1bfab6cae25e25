/**
 * Incremental Search
 *
 * Drives find-as-you-type from the prompt callback. Arrow keys step to the
 * next or previous match, wrapping around the document; any other key
 * restarts the scan from the top. The row holding the current match has
 * its highlighting saved and painted with the match colour until the next
 * keystroke.
 */

import type { Document } from '../../core/document.ts';
import type { Highlight } from '../../core/row.ts';
import type { EditorState } from '../../state/index.ts';
import type { KeyEvent } from '../../terminal/input.ts';

export type SearchDirection = 1 | -1;

export interface SearchMatch {
  row: number;
  /** Display column of the first matched byte */
  column: number;
}

interface SavedHighlight {
  row: number;
  highlight: Highlight[];
}

export class IncrementalSearch {
  private lastMatch: number = -1;
  private direction: SearchDirection = 1;
  private saved: SavedHighlight | null = null;

  constructor(
    private readonly document: Document,
    private readonly state: EditorState
  ) {}

  get currentDirection(): SearchDirection {
    return this.direction;
  }

  /** Row of the last match, -1 when there is none */
  get lastMatchRow(): number {
    return this.lastMatch;
  }

  /**
   * Prompt callback: react to one keystroke with the query as it now stands
   */
  onKey(query: string, key: KeyEvent): SearchMatch | null {
    this.restoreHighlight();

    if (key.key === 'ENTER' || key.key === 'ESCAPE') {
      this.reset();
      return null;
    }

    if (key.key === 'RIGHT' || key.key === 'DOWN') {
      this.direction = 1;
    } else if (key.key === 'LEFT' || key.key === 'UP') {
      this.direction = -1;
    } else {
      this.reset();
    }

    if (this.lastMatch === -1) this.direction = 1;
    if (query.length === 0) return null;

    const match = this.scan(query);
    if (match) this.jumpTo(match, query.length);
    return match;
  }

  reset(): void {
    this.lastMatch = -1;
    this.direction = 1;
  }

  /**
   * Put back the highlighting of the row painted by the previous match
   */
  restoreHighlight(): void {
    if (!this.saved) return;
    const row = this.document.row(this.saved.row);
    if (row && row.highlight.length === this.saved.highlight.length) {
      row.highlight = this.saved.highlight;
    }
    this.saved = null;
  }

  private scan(query: string): SearchMatch | null {
    const rowCount = this.document.rowCount;
    let current = this.lastMatch;

    for (let i = 0; i < rowCount; i++) {
      current += this.direction;
      if (current === -1) current = rowCount - 1;
      else if (current === rowCount) current = 0;

      const row = this.document.row(current);
      if (!row) continue;

      const column = row.display.indexOf(query);
      if (column !== -1) {
        this.lastMatch = current;
        return { row: current, column };
      }
    }
    return null;
  }

  private jumpTo(match: SearchMatch, length: number): void {
    const row = this.document.row(match.row);
    if (!row) return;

    this.state.cy = match.row;
    this.state.cx = this.document.renderer.toRawColumn(row, match.column);
    // Past the end so the next scroll puts the match at the top of the screen
    this.state.rowOffset = this.document.rowCount;

    this.saved = { row: match.row, highlight: [...row.highlight] };
    row.highlight.fill('match', match.column, match.column + length);
  }
}
