/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { Diagnostic, ParseResult, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts tokens into a program.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program, declarations, panic-mode recovery
 * - parser-control.ts: Statements, blocks, if/while/for
 * - parser-functions.ts: Function declarations and calls
 * - parser-expr.ts: Assignment and the precedence chain
 *
 * @example
 * ```typescript
 * const parser = new Parser(scan('print 1 + 2;'));
 * const result = parser.parse();
 * ```
 */
export class Parser {
  /** Parser state including tokens, position, and collected diagnostics */
  state: ParserState;

  constructor(tokens: Token[]) {
    this.state = createParserState(tokens);
  }

  /**
   * Parse every declaration, recovering after each failure.
   */
  parse(): ParseResult {
    return this.parseProgram();
  }

  get diagnostics(): Diagnostic[] {
    return this.state.diagnostics;
  }
}
