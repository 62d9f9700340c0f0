/**
 * Parser Helpers
 * Limits and small node and message builders
 * @internal This module contains internal parser utilities
 */

import type { NilLiteralNode, SourceSpan, Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Maximum number of call arguments and function parameters */
export const MAX_ARGUMENTS = 255;

/** Human-readable form of a token for diagnostics */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.EOF:
      return 'end of input';
    case TOKEN_TYPES.STRING:
      return `"${token.value}"`;
    case TOKEN_TYPES.UNTERMINATED_STRING:
      return 'unterminated string';
    default:
      return `'${token.value}'`;
  }
}

/** Stand-in for an omitted initializer or return value */
export function nilAt(span: SourceSpan): NilLiteralNode {
  return { type: 'NilLiteral', span };
}
