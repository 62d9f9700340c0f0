/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { Token, TokenType } from '../types.js';
import { advance, type LexerState } from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

export function makeToken(
  type: TokenType,
  value: string,
  start: number,
  end: number
): Token {
  return { type, value, span: { start, end } };
}

/** Advance n characters and return a token ending at the new offset */
export function advanceAndMakeToken(
  state: LexerState,
  n: number,
  type: TokenType,
  value: string
): Token {
  const start = state.offset;
  for (let i = 0; i < n; i++) advance(state);
  return makeToken(type, value, start, state.offset);
}
