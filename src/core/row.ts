/**
 * Row
 *
 * One line of the document. `raw` holds the bytes as a latin1 string (one
 * char per byte, no newline), `display` is `raw` with tabs expanded, and
 * `highlight` classifies every display byte.
 */

export type Highlight =
  | 'normal'
  | 'comment'
  | 'blockComment'
  | 'keyword1'
  | 'keyword2'
  | 'string'
  | 'number'
  | 'match';

export interface Row {
  /** Position in the document, kept in step with inserts and deletes */
  index: number;
  raw: string;
  display: string;
  /** Same length as `display` */
  highlight: Highlight[];
  /** Row ends inside an unterminated block comment */
  commentOpenAtEnd: boolean;
}

/**
 * Create a row whose display and highlight still need regenerating
 */
export function createRow(index: number, raw: string): Row {
  return {
    index,
    raw,
    display: raw,
    highlight: new Array<Highlight>(raw.length).fill('normal'),
    commentOpenAtEnd: false,
  };
}
