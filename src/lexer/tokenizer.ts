/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  createLexerState,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Skip whitespace and `//` comments */
function skipTrivia(state: LexerState): void {
  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (isWhitespace(ch)) {
      advance(state);
    } else if (ch === '/' && peek(state, 1) === '/') {
      while (!isAtEnd(state) && peek(state) !== '\n') {
        advance(state);
      }
    } else {
      return;
    }
  }
}

/** Next token, or null once the input is exhausted */
export function nextToken(state: LexerState): Token | null {
  skipTrivia(state);
  if (isAtEnd(state)) return null;

  const ch = peek(state);

  if (ch === '"') {
    return readString(state);
  }

  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  const twoChar = ch + peek(state, 1);
  const twoCharType = TWO_CHAR_OPERATORS.get(twoChar);
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS.get(ch);
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch);
  }

  // Read a whole code point so astral characters stay one token
  const start = state.offset;
  const unknown = advance(state);
  return {
    type: TOKEN_TYPES.UNKNOWN_CHAR,
    value: unknown,
    span: { start, end: state.offset },
  };
}

/**
 * Scan source into tokens. Never throws: malformed input becomes
 * UNTERMINATED_STRING or UNKNOWN_CHAR tokens for the parser to report.
 */
export function scan(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];

  for (let token = nextToken(state); token; token = nextToken(state)) {
    tokens.push(token);
  }

  return tokens;
}
