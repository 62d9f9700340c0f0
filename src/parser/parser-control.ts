/**
 * Parser Extension: Control Flow Parsing
 * Statements, blocks, conditionals and loops
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  ExpressionNode,
  ExpressionStmtNode,
  IfStmtNode,
  PrintStmtNode,
  ReturnStmtNode,
  StatementNode,
  WhileStmtNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { nilAt } from './helpers.js';
import {
  advance,
  check,
  expect,
  is,
  isAtEnd,
  peek,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseStatement(): StatementNode | null;
    parseBlock(openMessage?: string): BlockNode | null;
    parseIf(): IfStmtNode | null;
    parseWhile(): WhileStmtNode | null;
    parseFor(): StatementNode | null;
    parsePrint(): PrintStmtNode | null;
    parseReturn(): ReturnStmtNode | null;
    parseExpressionStatement(): ExpressionStmtNode | null;
  }
}

// ============================================================
// STATEMENTS
// ============================================================

Parser.prototype.parseStatement = function (
  this: Parser
): StatementNode | null {
  switch (peek(this.state).type) {
    case TOKEN_TYPES.FOR:
      return this.parseFor();
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.PRINT:
      return this.parsePrint();
    case TOKEN_TYPES.RETURN:
      return this.parseReturn();
    case TOKEN_TYPES.WHILE:
      return this.parseWhile();
    case TOKEN_TYPES.LEFT_BRACE:
      return this.parseBlock();
    default:
      return this.parseExpressionStatement();
  }
};

Parser.prototype.parsePrint = function (this: Parser): PrintStmtNode | null {
  const start = advance(this.state).span; // consume print
  const expression = this.parseExpression();
  if (!expression) return null;
  if (!expect(this.state, TOKEN_TYPES.SEMICOLON, "Expected ';' after value")) {
    return null;
  }
  return { type: 'PrintStmt', expression, span: spanFrom(this.state, start) };
};

Parser.prototype.parseReturn = function (this: Parser): ReturnStmtNode | null {
  const keyword = advance(this.state); // consume return
  const value = check(this.state, TOKEN_TYPES.SEMICOLON)
    ? nilAt(keyword.span)
    : this.parseExpression();
  if (!value) return null;
  if (
    !expect(this.state, TOKEN_TYPES.SEMICOLON, "Expected ';' after return value")
  ) {
    return null;
  }
  return {
    type: 'ReturnStmt',
    value,
    span: spanFrom(this.state, keyword.span),
  };
};

Parser.prototype.parseExpressionStatement = function (
  this: Parser
): ExpressionStmtNode | null {
  const start = peek(this.state).span;
  const expression = this.parseExpression();
  if (!expression) return null;
  if (
    !expect(this.state, TOKEN_TYPES.SEMICOLON, "Expected ';' after expression")
  ) {
    return null;
  }
  return {
    type: 'ExpressionStmt',
    expression,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// BLOCKS
// ============================================================

/**
 * Parse `{ declaration* }`. Any failing declaration fails the whole block,
 * so recovery happens at the enclosing top-level declaration.
 */
Parser.prototype.parseBlock = function (
  this: Parser,
  openMessage = "Expected '{'"
): BlockNode | null {
  const open = expect(this.state, TOKEN_TYPES.LEFT_BRACE, openMessage);
  if (!open) return null;

  const statements: StatementNode[] = [];
  while (!check(this.state, TOKEN_TYPES.RIGHT_BRACE) && !isAtEnd(this.state)) {
    const statement = this.parseDeclaration();
    if (!statement) return null;
    statements.push(statement);
  }

  if (
    !expect(this.state, TOKEN_TYPES.RIGHT_BRACE, "Expected '}' after block")
  ) {
    return null;
  }
  return { type: 'Block', statements, span: spanFrom(this.state, open.span) };
};

// ============================================================
// CONDITIONALS
// ============================================================

Parser.prototype.parseIf = function (this: Parser): IfStmtNode | null {
  const start = advance(this.state).span; // consume if
  if (!expect(this.state, TOKEN_TYPES.LEFT_PAREN, "Expected '(' after 'if'")) {
    return null;
  }
  const condition = this.parseExpression();
  if (!condition) return null;
  if (
    !expect(this.state, TOKEN_TYPES.RIGHT_PAREN, "Expected ')' after if condition")
  ) {
    return null;
  }

  const thenBranch = this.parseStatement();
  if (!thenBranch) return null;

  let elseBranch: StatementNode | null = null;
  if (is(this.state, TOKEN_TYPES.ELSE)) {
    elseBranch = this.parseStatement();
    if (!elseBranch) return null;
  }

  return {
    type: 'IfStmt',
    condition,
    thenBranch,
    elseBranch,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// LOOPS
// ============================================================

Parser.prototype.parseWhile = function (this: Parser): WhileStmtNode | null {
  const start = advance(this.state).span; // consume while
  if (
    !expect(this.state, TOKEN_TYPES.LEFT_PAREN, "Expected '(' after 'while'")
  ) {
    return null;
  }
  const condition = this.parseExpression();
  if (!condition) return null;
  if (
    !expect(this.state, TOKEN_TYPES.RIGHT_PAREN, "Expected ')' after condition")
  ) {
    return null;
  }

  const body = this.parseStatement();
  if (!body) return null;

  return {
    type: 'WhileStmt',
    condition,
    body,
    span: spanFrom(this.state, start),
  };
};

/**
 * Desugar `for (init; cond; incr) body` into
 * `{ init; while (cond) { body; incr; } }`.
 * No init means no outer block, no increment means the body is used as is,
 * and a missing condition is `true`.
 */
Parser.prototype.parseFor = function (this: Parser): StatementNode | null {
  const keyword = advance(this.state); // consume for
  if (!expect(this.state, TOKEN_TYPES.LEFT_PAREN, "Expected '(' after 'for'")) {
    return null;
  }

  let initializer: StatementNode | null = null;
  if (is(this.state, TOKEN_TYPES.SEMICOLON)) {
    initializer = null;
  } else if (check(this.state, TOKEN_TYPES.VAR)) {
    initializer = this.parseVarDeclaration();
    if (!initializer) return null;
  } else {
    initializer = this.parseExpressionStatement();
    if (!initializer) return null;
  }

  let condition: ExpressionNode | null = null;
  if (!check(this.state, TOKEN_TYPES.SEMICOLON)) {
    condition = this.parseExpression();
    if (!condition) return null;
  }
  if (
    !expect(this.state, TOKEN_TYPES.SEMICOLON, "Expected ';' after loop condition")
  ) {
    return null;
  }

  let increment: ExpressionNode | null = null;
  if (!check(this.state, TOKEN_TYPES.RIGHT_PAREN)) {
    increment = this.parseExpression();
    if (!increment) return null;
  }
  if (
    !expect(this.state, TOKEN_TYPES.RIGHT_PAREN, "Expected ')' after for clauses")
  ) {
    return null;
  }

  let body = this.parseStatement();
  if (!body) return null;
  const span = spanFrom(this.state, keyword.span);

  if (increment) {
    body = {
      type: 'Block',
      statements: [
        body,
        { type: 'ExpressionStmt', expression: increment, span: increment.span },
      ],
      span: body.span,
    };
  }

  const loop: WhileStmtNode = {
    type: 'WhileStmt',
    condition: condition ?? {
      type: 'BoolLiteral',
      value: true,
      span: keyword.span,
    },
    body,
    span,
  };

  if (!initializer) return loop;
  return { type: 'Block', statements: [initializer, loop], span };
};
