/**
 * Lux Parser
 * Main entry point and re-exports
 */

import { scan } from '../lexer/index.js';
import type { ParseResult, Token } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-control.js';
import './parser-functions.js';
import './parser-expr.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse Lux source (or an already-scanned token list) into a program.
 *
 * Never throws on a syntax error. After a failed declaration the parser
 * discards tokens through the next `;` and keeps going, so a single call
 * reports every independent error.
 *
 * @example
 * ```typescript
 * const result = parse('print 1 + 2;');
 * if (!result.success) {
 *   for (const d of result.diagnostics) console.error(d.message);
 * }
 * ```
 */
export function parse(input: string | Token[]): ParseResult {
  const tokens = typeof input === 'string' ? scan(input) : input;
  return new Parser(tokens).parse();
}

export { Parser } from './parser.js';
export { MAX_ARGUMENTS } from './helpers.js';
