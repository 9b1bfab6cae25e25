/**
 * Editor State
 *
 * Cursor, viewport, mode and status message of the single open document.
 * Owned by the editor controller and passed by reference to whatever
 * needs to read or move it.
 */

export type EditorMode = 'navigation' | 'insert';

export interface StatusMessage {
  text: string;
  /** Wall-clock time (ms) the message was set */
  time: number;
}

export interface EditorState {
  /** Cursor column in raw bytes of row `cy` */
  cx: number;
  /** Cursor row; equal to the row count on the append line */
  cy: number;
  rowOffset: number;
  colOffset: number;
  /** Rows available for text (window height minus status and message bars) */
  screenRows: number;
  screenCols: number;
  mode: EditorMode;
  quitConfirmationsRemaining: number;
  statusMessage: StatusMessage;
}

/** Status bar plus message bar */
export const RESERVED_ROWS = 2;

export function createEditorState(
  windowRows: number,
  windowCols: number,
  quitConfirmations: number
): EditorState {
  return {
    cx: 0,
    cy: 0,
    rowOffset: 0,
    colOffset: 0,
    screenRows: Math.max(1, windowRows - RESERVED_ROWS),
    screenCols: Math.max(1, windowCols),
    mode: 'navigation',
    quitConfirmationsRemaining: quitConfirmations,
    statusMessage: { text: '', time: 0 },
  };
}
