/**
 * Parser Extension: Program Parsing
 * Program, declarations and panic-mode recovery
 */

import { Parser } from './parser.js';
import type {
  ExpressionNode,
  ParseResult,
  StatementNode,
  VarDeclNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { nilAt } from './helpers.js';
import {
  advance,
  check,
  expect,
  is,
  isAtEnd,
  makeSpan,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ParseResult;
    parseDeclaration(): StatementNode | null;
    parseVarDeclaration(): VarDeclNode | null;
    recoverToNextStatement(): void;
  }
}

// ============================================================
// PROGRAM PARSING
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ParseResult {
  const statements: StatementNode[] = [];

  while (!isAtEnd(this.state)) {
    const statement = this.parseDeclaration();
    if (statement) {
      statements.push(statement);
    } else {
      this.recoverToNextStatement();
    }
  }

  if (this.state.diagnostics.length > 0) {
    return { success: false, diagnostics: this.state.diagnostics };
  }

  const first = statements[0];
  const last = statements[statements.length - 1];
  return {
    success: true,
    program: {
      type: 'Program',
      statements,
      span: makeSpan(first?.span.start ?? 0, last?.span.end ?? 0),
    },
  };
};

// ============================================================
// DECLARATIONS
// ============================================================

Parser.prototype.parseDeclaration = function (
  this: Parser
): StatementNode | null {
  if (check(this.state, TOKEN_TYPES.FUN)) {
    return this.parseFunctionDeclaration();
  }
  if (check(this.state, TOKEN_TYPES.VAR)) {
    return this.parseVarDeclaration();
  }
  return this.parseStatement();
};

Parser.prototype.parseVarDeclaration = function (
  this: Parser
): VarDeclNode | null {
  const start = advance(this.state).span; // consume var
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expected variable name'
  );
  if (!name) return null;

  let initializer: ExpressionNode | null = nilAt(name.span);
  if (is(this.state, TOKEN_TYPES.EQUAL)) {
    initializer = this.parseExpression();
  }
  if (!initializer) return null;

  if (
    !expect(
      this.state,
      TOKEN_TYPES.SEMICOLON,
      "Expected ';' after variable declaration"
    )
  ) {
    return null;
  }

  return {
    type: 'VarDecl',
    name: name.value,
    initializer,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// ERROR RECOVERY
// ============================================================

/**
 * Discard tokens up to and including the next `;`, or to end of input.
 */
Parser.prototype.recoverToNextStatement = function (this: Parser): void {
  while (!isAtEnd(this.state)) {
    if (advance(this.state).type === TOKEN_TYPES.SEMICOLON) return;
  }
};
