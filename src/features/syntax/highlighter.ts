/**
 * Syntax Highlighter
 *
 * Classifies every display byte of a row with a single forward scan. The
 * only state crossing row boundaries is whether a block comment is still
 * open; when a row's open-comment state flips, the following rows are
 * rescanned until the state settles.
 */

import type { Highlight, Row } from '../../core/row.ts';
import type { SyntaxDescriptor } from './languages.ts';

const SEPARATOR_CHARS = ',.()+-/*=~%<>[];';
const WHITESPACE_CHARS = ' \t\n\v\f\r';

/**
 * Separators delimit keywords and numbers. End of row counts as one.
 */
export function isSeparator(ch: string | undefined): boolean {
  if (ch === undefined || ch === '' || ch === '\0') return true;
  return WHITESPACE_CHARS.includes(ch) || SEPARATOR_CHARS.includes(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/**
 * Re-highlight one row and carry any change of block-comment state
 * forward through the rows below it.
 */
export function updateSyntax(rows: Row[], index: number, syntax: SyntaxDescriptor | null): void {
  for (let at = index; at < rows.length; at++) {
    const row = rows[at];
    if (!row) return;
    const openAtStart = at > 0 ? (rows[at - 1]?.commentOpenAtEnd ?? false) : false;
    if (!highlightRow(row, openAtStart, syntax)) return;
  }
}

/**
 * Re-highlight every row top to bottom (used when the filetype changes)
 */
export function updateAllSyntax(rows: Row[], syntax: SyntaxDescriptor | null): void {
  let openAtStart = false;
  for (const row of rows) {
    highlightRow(row, openAtStart, syntax);
    openAtStart = row.commentOpenAtEnd;
  }
}

/**
 * Scan a single row. Returns true when its open-comment state changed.
 */
export function highlightRow(row: Row, openAtStart: boolean, syntax: SyntaxDescriptor | null): boolean {
  const text = row.display;
  const hl = new Array<Highlight>(text.length).fill('normal');

  let inComment = false;

  if (syntax) {
    const lineComment = syntax.lineCommentStart;
    const blockStart = syntax.blockCommentStart;
    const blockEnd = syntax.blockCommentEnd;
    const blockComments = blockStart !== null && blockEnd !== null;

    let prevSep = true;
    let inString: string | null = null;
    inComment = blockComments && openAtStart;

    let i = 0;
    while (i < text.length) {
      const c = text.charAt(i);
      const prevHl = i > 0 ? hl[i - 1] : 'normal';

      if (lineComment && inString === null && !inComment && text.startsWith(lineComment, i)) {
        hl.fill('comment', i);
        break;
      }

      if (blockStart !== null && blockEnd !== null && inString === null) {
        if (inComment) {
          hl[i] = 'blockComment';
          if (text.startsWith(blockEnd, i)) {
            hl.fill('blockComment', i, i + blockEnd.length);
            i += blockEnd.length;
            inComment = false;
            prevSep = true;
          } else {
            i++;
          }
          continue;
        }
        if (text.startsWith(blockStart, i)) {
          hl.fill('blockComment', i, i + blockStart.length);
          i += blockStart.length;
          inComment = true;
          continue;
        }
      }

      if (syntax.flags.highlightStrings) {
        if (inString !== null) {
          hl[i] = 'string';
          if (c === '\\' && i + 1 < text.length) {
            hl[i + 1] = 'string';
            i += 2;
            continue;
          }
          if (c === inString) inString = null;
          i++;
          prevSep = true;
          continue;
        }
        if (c === '"' || c === "'") {
          inString = c;
          hl[i] = 'string';
          i++;
          continue;
        }
      }

      if (syntax.flags.highlightNumbers) {
        if ((isDigit(c) && (prevSep || prevHl === 'number')) || (c === '.' && prevHl === 'number')) {
          hl[i] = 'number';
          i++;
          prevSep = false;
          continue;
        }
      }

      if (prevSep) {
        const keyword = syntax.keywords.find(
          (k) => text.startsWith(k.text, i) && isSeparator(text[i + k.text.length])
        );
        if (keyword) {
          hl.fill(keyword.kind === 'secondary' ? 'keyword2' : 'keyword1', i, i + keyword.text.length);
          i += keyword.text.length;
          prevSep = false;
          continue;
        }
      }

      prevSep = isSeparator(c);
      i++;
    }
  }

  row.highlight = hl;
  const changed = row.commentOpenAtEnd !== inComment;
  row.commentOpenAtEnd = inComment;
  return changed;
}
