/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: ReadonlyMap<string, TokenType> = new Map([
  ['!=', TOKEN_TYPES.BANG_EQUAL],
  ['==', TOKEN_TYPES.EQUAL_EQUAL],
  ['<=', TOKEN_TYPES.LESS_EQUAL],
  ['>=', TOKEN_TYPES.GREATER_EQUAL],
]);

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: ReadonlyMap<string, TokenType> = new Map([
  ['(', TOKEN_TYPES.LEFT_PAREN],
  [')', TOKEN_TYPES.RIGHT_PAREN],
  ['{', TOKEN_TYPES.LEFT_BRACE],
  ['}', TOKEN_TYPES.RIGHT_BRACE],
  [',', TOKEN_TYPES.COMMA],
  ['.', TOKEN_TYPES.DOT],
  ['-', TOKEN_TYPES.MINUS],
  ['+', TOKEN_TYPES.PLUS],
  [';', TOKEN_TYPES.SEMICOLON],
  ['/', TOKEN_TYPES.SLASH],
  ['*', TOKEN_TYPES.STAR],
  ['!', TOKEN_TYPES.BANG],
  ['=', TOKEN_TYPES.EQUAL],
  ['<', TOKEN_TYPES.LESS],
  ['>', TOKEN_TYPES.GREATER],
]);

/** Keyword lookup table. A Map, so `constructor` stays an identifier. */
export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['and', TOKEN_TYPES.AND],
  ['class', TOKEN_TYPES.CLASS],
  ['else', TOKEN_TYPES.ELSE],
  ['false', TOKEN_TYPES.FALSE],
  ['fun', TOKEN_TYPES.FUN],
  ['for', TOKEN_TYPES.FOR],
  ['if', TOKEN_TYPES.IF],
  ['nil', TOKEN_TYPES.NIL],
  ['or', TOKEN_TYPES.OR],
  ['print', TOKEN_TYPES.PRINT],
  ['return', TOKEN_TYPES.RETURN],
  ['super', TOKEN_TYPES.SUPER],
  ['this', TOKEN_TYPES.THIS],
  ['true', TOKEN_TYPES.TRUE],
  ['var', TOKEN_TYPES.VAR],
  ['while', TOKEN_TYPES.WHILE],
]);
