/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  makeToken,
} from './helpers.js';
import { KEYWORDS } from './operators.js';
import { advance, isAtEnd, type LexerState, peek } from './state.js';

/**
 * Read a double-quoted string. Strings may span lines and have no escapes.
 * Without a closing quote the token covers the rest of the input.
 */
export function readString(state: LexerState): Token {
  const start = state.offset;
  advance(state); // consume opening "

  let value = '';
  while (!isAtEnd(state) && peek(state) !== '"') {
    value += advance(state);
  }

  if (isAtEnd(state)) {
    return makeToken(
      TOKEN_TYPES.UNTERMINATED_STRING,
      value,
      start,
      state.offset
    );
  }

  advance(state); // consume closing "
  return makeToken(TOKEN_TYPES.STRING, value, start, state.offset);
}

/** `123` or `123.45`; a `.` not followed by a digit is left for the next token */
export function readNumber(state: LexerState): Token {
  const start = state.offset;
  let value = '';

  while (isDigit(peek(state))) {
    value += advance(state);
  }

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    value += advance(state); // consume .
    while (isDigit(peek(state))) {
      value += advance(state);
    }
  }

  return makeToken(TOKEN_TYPES.NUMBER, value, start, state.offset);
}

export function readIdentifier(state: LexerState): Token {
  const start = state.offset;
  let value = '';

  if (isIdentifierStart(peek(state))) {
    value += advance(state);
  }
  while (isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const keyword = KEYWORDS.get(value);
  return makeToken(
    keyword ?? TOKEN_TYPES.IDENTIFIER,
    value,
    start,
    state.offset
  );
}
