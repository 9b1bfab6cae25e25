/**
 * IncrementalSearch Unit Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { Document } from '../../../../src/core/document.ts';
import { IncrementalSearch } from '../../../../src/features/search/incremental-search.ts';
import { createEditorState, type EditorState } from '../../../../src/state/index.ts';
import { keyEvent } from '../../../../src/terminal/input.ts';

const typed = (ch: string) => keyEvent(ch.toUpperCase(), ch);

describe('IncrementalSearch', () => {
  let doc: Document;
  let state: EditorState;
  let search: IncrementalSearch;

  beforeEach(() => {
    doc = new Document();
    doc.load(['alpha', 'beta', 'gamma alpha']);
    state = createEditorState(10, 40, 3);
    search = new IncrementalSearch(doc, state);
  });

  test('a new query scans from the top', () => {
    state.cy = 2;
    expect(search.onKey('alpha', typed('a'))).toEqual({ row: 0, column: 0 });
    expect(state.cy).toBe(0);
    expect(state.cx).toBe(0);
  });

  test('forces the viewport to re-anchor on the match', () => {
    search.onKey('alpha', typed('a'));
    expect(state.rowOffset).toBe(3);
  });

  test('arrow down steps to the next match', () => {
    search.onKey('alpha', typed('a'));
    expect(search.onKey('alpha', keyEvent('DOWN'))).toEqual({ row: 2, column: 6 });
    expect(state.cy).toBe(2);
    expect(state.cx).toBe(6);
  });

  test('wraps past the last row back to the first', () => {
    search.onKey('alpha', typed('a'));
    search.onKey('alpha', keyEvent('RIGHT'));
    expect(search.onKey('alpha', keyEvent('DOWN'))).toEqual({ row: 0, column: 0 });
  });

  test('arrow up searches backwards and wraps', () => {
    search.onKey('alpha', typed('a'));
    expect(search.onKey('alpha', keyEvent('UP'))).toEqual({ row: 2, column: 6 });
    expect(search.currentDirection).toBe(-1);
  });

  test('arrow up with no match yet still searches forward', () => {
    expect(search.onKey('beta', keyEvent('UP'))).toEqual({ row: 1, column: 0 });
    expect(search.currentDirection).toBe(1);
  });

  test('finds a query present only in the first row from the last row', () => {
    doc.load(['needle here', 'b', 'c']);
    state.cy = 2;
    expect(search.onKey('needle', typed('e'))).toEqual({ row: 0, column: 0 });
  });

  test('leaves the cursor alone when nothing matches', () => {
    state.cx = 1;
    state.cy = 1;
    expect(search.onKey('zeta', typed('a'))).toBeNull();
    expect(state.cy).toBe(1);
    expect(state.cx).toBe(1);
  });

  test('does not scan for an empty query', () => {
    expect(search.onKey('', keyEvent('BACKSPACE'))).toBeNull();
    expect(search.lastMatchRow).toBe(-1);
  });

  test('maps a match after a tab to its raw column', () => {
    doc.load(['\tfoo']);
    expect(search.onKey('foo', typed('o'))).toEqual({ row: 0, column: 2 });
    expect(state.cx).toBe(1);
  });

  // ──────────────────────────────────────────────────────────────────
  // Match highlighting
  // ──────────────────────────────────────────────────────────────────

  test('paints the matched span', () => {
    search.onKey('alpha', typed('a'));
    search.onKey('alpha', keyEvent('DOWN'));
    expect(doc.row(2)?.highlight).toEqual([
      'normal', 'normal', 'normal', 'normal', 'normal', 'normal',
      'match', 'match', 'match', 'match', 'match',
    ]);
  });

  test('restores the previous row before moving on', () => {
    search.onKey('alpha', typed('a'));
    search.onKey('alpha', keyEvent('DOWN'));
    expect(doc.row(0)?.highlight).toEqual(new Array(5).fill('normal'));
  });

  test('Escape restores the syntax colours and resets the scan', () => {
    doc.setFilename('main.c');
    doc.load(['int alpha;']);
    const original = [...(doc.row(0)?.highlight ?? [])];

    search.onKey('alpha', typed('a'));
    expect(doc.row(0)?.highlight.slice(4, 9)).toEqual(new Array(5).fill('match'));

    expect(search.onKey('alpha', keyEvent('ESCAPE'))).toBeNull();
    expect(doc.row(0)?.highlight).toEqual(original);
    expect(search.lastMatchRow).toBe(-1);
  });
});
