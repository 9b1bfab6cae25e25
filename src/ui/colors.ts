/**
 * Highlight Palette
 *
 * Fixed mapping from highlight class to SGR foreground colour.
 */

import { FG_CODE, type ForegroundColor } from '../terminal/ansi.ts';
import type { Highlight } from '../core/row.ts';

export const HIGHLIGHT_COLORS: Record<Highlight, ForegroundColor> = {
  normal: 'default',
  comment: 'cyan',
  blockComment: 'cyan',
  keyword1: 'yellow',
  keyword2: 'green',
  string: 'magenta',
  number: 'red',
  match: 'blue',
};

export function highlightColorCode(highlight: Highlight): number {
  return FG_CODE[HIGHLIGHT_COLORS[highlight]];
}
