/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { Diagnostic, SourceSpan, Token, TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { describeToken } from './helpers.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Diagnostics collected while parsing; parsing never throws */
  readonly diagnostics: Diagnostic[];
  /** Returned for every lookup past the last token */
  readonly eof: Token;
}

export function createParserState(tokens: Token[]): ParserState {
  const end = tokens[tokens.length - 1]?.span.end ?? 0;
  return {
    tokens,
    pos: 0,
    diagnostics: [],
    eof: { type: TOKEN_TYPES.EOF, value: '', span: { start: end, end } },
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  return state.tokens[state.pos + offset] ?? state.eof;
}

/** @internal */
export function previous(state: ParserState): Token {
  return state.tokens[state.pos - 1] ?? state.eof;
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return state.pos >= state.tokens.length;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(peek(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = peek(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** Advance past the current token when it has the given type */
export function is(state: ParserState, type: TokenType): boolean {
  if (!check(state, type)) return false;
  advance(state);
  return true;
}

/** Advance past the current token when it has any of the types */
export function oneOf(state: ParserState, ...types: TokenType[]): Token | null {
  return check(state, ...types) ? advance(state) : null;
}

/**
 * Consume a token of the expected type. On mismatch, record
 * `<message> but found <token>.` and leave the token in place.
 * @internal
 */
export function expect(
  state: ParserState,
  type: TokenType,
  message: string
): Token | null {
  if (check(state, type)) return advance(state);
  const token = peek(state);
  error(state, `${message} but found ${describeToken(token)}.`, token.span);
  return null;
}

/** @internal */
export function error(
  state: ParserState,
  message: string,
  span: SourceSpan
): void {
  state.diagnostics.push({ message, span });
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** Span from `start` to the end of the last consumed token */
export function spanFrom(state: ParserState, start: SourceSpan): SourceSpan {
  return makeSpan(start.start, Math.max(start.end, previous(state).span.end));
}

/** @internal */
export function makeSpan(start: number, end: number): SourceSpan {
  return { start, end };
}
