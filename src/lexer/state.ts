/**
 * Lexer State
 * Tracks position in source text during tokenization
 */

export interface LexerState {
  readonly source: string;
  /** UTF-16 index into `source` */
  pos: number;
  /** UTF-8 byte offset matching `pos` */
  offset: number;
}

export function createLexerState(source: string): LexerState {
  return { source, pos: 0, offset: 0 };
}

export function peek(state: LexerState, ahead = 0): string {
  return state.source[state.pos + ahead] ?? '';
}

/** Consume one full code point and return it */
export function advance(state: LexerState): string {
  const cp = state.source.codePointAt(state.pos);
  if (cp === undefined) return '';
  const ch = String.fromCodePoint(cp);
  state.pos += ch.length;
  state.offset += Buffer.byteLength(ch, 'utf8');
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
