/**
 * Status Bar Component
 *
 * Inverted bar under the text area: file name, row count, modified flag
 * and mode on the left; filetype and cursor row on the right.
 */

import { STYLE, styled } from '../../terminal/ansi.ts';
import type { EditorMode } from '../../state/index.ts';

export interface StatusBarState {
  filename: string | null;
  rowCount: number;
  isDirty: boolean;
  mode: EditorMode;
  filetype: string | null;
  /** 1-based cursor row */
  currentRow: number;
}

const MAX_FILENAME_WIDTH = 20;

const MODE_LABELS: Record<EditorMode, string> = {
  navigation: 'nav',
  insert: 'insert',
};

export class StatusBar {
  /**
   * Left segment, before truncation to the screen width
   */
  leftText(state: StatusBarState): string {
    const name = (state.filename ?? '[No Name]').slice(0, MAX_FILENAME_WIDTH);
    const modified = state.isDirty ? '(modified)' : '';
    return `${name} - ${state.rowCount} lines ${modified} - ${MODE_LABELS[state.mode]}`;
  }

  rightText(state: StatusBarState): string {
    return `${state.filetype ?? 'no ft'} | ${state.currentRow}/${state.rowCount}`;
  }

  /**
   * Render the bar. The right segment is drawn only when it fits exactly
   * into the space left over.
   */
  render(state: StatusBarState, width: number): string {
    const left = this.leftText(state).slice(0, width);
    const right = this.rightText(state);

    let line = left;
    while (line.length < width) {
      if (width - line.length === right.length) {
        line += right;
        break;
      }
      line += ' ';
    }

    return styled(line, STYLE.inverse) + '\r\n';
  }
}
