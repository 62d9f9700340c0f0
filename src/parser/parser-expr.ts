/**
 * Parser Extension: Expression Parsing
 * Assignment and the binary precedence chain
 */

import { Parser } from './parser.js';
import type {
  BinaryOp,
  ExpressionNode,
  LogicalOp,
  TokenType,
  UnaryOp,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { describeToken } from './helpers.js';
import {
  advance,
  error,
  expect,
  makeSpan,
  oneOf,
  peek,
} from './state.js';

// ============================================================
// OPERATOR TABLES
// ============================================================

const EQUALITY_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map([
  [TOKEN_TYPES.BANG_EQUAL, '!='],
  [TOKEN_TYPES.EQUAL_EQUAL, '=='],
]);

const COMPARISON_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map([
  [TOKEN_TYPES.GREATER, '>'],
  [TOKEN_TYPES.GREATER_EQUAL, '>='],
  [TOKEN_TYPES.LESS, '<'],
  [TOKEN_TYPES.LESS_EQUAL, '<='],
]);

const TERM_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map([
  [TOKEN_TYPES.MINUS, '-'],
  [TOKEN_TYPES.PLUS, '+'],
]);

const FACTOR_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map([
  [TOKEN_TYPES.SLASH, '/'],
  [TOKEN_TYPES.STAR, '*'],
]);

const UNARY_OPS: ReadonlyMap<TokenType, UnaryOp> = new Map([
  [TOKEN_TYPES.BANG, '!'],
  [TOKEN_TYPES.MINUS, '-'],
]);

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode | null;
    parseAssignment(): ExpressionNode | null;
    parseLogical(
      op: LogicalOp,
      operand: () => ExpressionNode | null
    ): ExpressionNode | null;
    parseBinary(
      ops: ReadonlyMap<TokenType, BinaryOp>,
      operand: () => ExpressionNode | null
    ): ExpressionNode | null;
    parseOr(): ExpressionNode | null;
    parseAnd(): ExpressionNode | null;
    parseEquality(): ExpressionNode | null;
    parseComparison(): ExpressionNode | null;
    parseTerm(): ExpressionNode | null;
    parseFactor(): ExpressionNode | null;
    parseUnary(): ExpressionNode | null;
    parsePrimary(): ExpressionNode | null;
  }
}

// ============================================================
// ASSIGNMENT
// ============================================================

Parser.prototype.parseExpression = function (
  this: Parser
): ExpressionNode | null {
  return this.parseAssignment();
};

/** assignment → IDENTIFIER "=" assignment | logic_or (right-associative) */
Parser.prototype.parseAssignment = function (
  this: Parser
): ExpressionNode | null {
  const target = this.parseOr();
  if (!target) return null;

  const equals = oneOf(this.state, TOKEN_TYPES.EQUAL);
  if (!equals) return target;

  const value = this.parseAssignment();
  if (!value) return null;

  if (target.type !== 'Variable') {
    error(this.state, 'Invalid assignment target.', equals.span);
    return null;
  }

  return {
    type: 'Assign',
    name: target.name,
    value,
    span: makeSpan(target.span.start, value.span.end),
  };
};

// ============================================================
// PRECEDENCE CHAIN
// ============================================================

Parser.prototype.parseLogical = function (
  this: Parser,
  op: LogicalOp,
  operand: () => ExpressionNode | null
): ExpressionNode | null {
  const type = op === 'and' ? TOKEN_TYPES.AND : TOKEN_TYPES.OR;
  let left = operand();
  if (!left) return null;

  while (oneOf(this.state, type)) {
    const right = operand();
    if (!right) return null;
    left = {
      type: 'LogicalExpr',
      op,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }

  return left;
};

/** Left-associative binary level over the operators in `ops` */
Parser.prototype.parseBinary = function (
  this: Parser,
  ops: ReadonlyMap<TokenType, BinaryOp>,
  operand: () => ExpressionNode | null
): ExpressionNode | null {
  let left = operand();
  if (!left) return null;

  for (let op = ops.get(peek(this.state).type); op; ) {
    advance(this.state);
    const right = operand();
    if (!right) return null;
    left = {
      type: 'BinaryExpr',
      op,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
    op = ops.get(peek(this.state).type);
  }

  return left;
};

Parser.prototype.parseOr = function (this: Parser): ExpressionNode | null {
  return this.parseLogical('or', () => this.parseAnd());
};

Parser.prototype.parseAnd = function (this: Parser): ExpressionNode | null {
  return this.parseLogical('and', () => this.parseEquality());
};

Parser.prototype.parseEquality = function (
  this: Parser
): ExpressionNode | null {
  return this.parseBinary(EQUALITY_OPS, () => this.parseComparison());
};

Parser.prototype.parseComparison = function (
  this: Parser
): ExpressionNode | null {
  return this.parseBinary(COMPARISON_OPS, () => this.parseTerm());
};

Parser.prototype.parseTerm = function (this: Parser): ExpressionNode | null {
  return this.parseBinary(TERM_OPS, () => this.parseFactor());
};

Parser.prototype.parseFactor = function (this: Parser): ExpressionNode | null {
  return this.parseBinary(FACTOR_OPS, () => this.parseUnary());
};

Parser.prototype.parseUnary = function (this: Parser): ExpressionNode | null {
  const op = UNARY_OPS.get(peek(this.state).type);
  if (!op) return this.parseCall();

  const start = advance(this.state).span;
  const operand = this.parseUnary();
  if (!operand) return null;
  return {
    type: 'UnaryExpr',
    op,
    operand,
    span: makeSpan(start.start, operand.span.end),
  };
};

// ============================================================
// PRIMARY
// ============================================================

/**
 * Literals, grouping and variable references. Error tokens from the
 * scanner are reported here and left in place for recovery.
 */
Parser.prototype.parsePrimary = function (
  this: Parser
): ExpressionNode | null {
  const token = peek(this.state);

  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return { type: 'NumberLiteral', value: Number(token.value), span: token.span };
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, span: token.span };
    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return {
        type: 'BoolLiteral',
        value: token.type === TOKEN_TYPES.TRUE,
        span: token.span,
      };
    case TOKEN_TYPES.NIL:
      advance(this.state);
      return { type: 'NilLiteral', span: token.span };
    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      return { type: 'Variable', name: token.value, span: token.span };
    case TOKEN_TYPES.LEFT_PAREN: {
      advance(this.state);
      const expression = this.parseExpression();
      if (!expression) return null;
      const close = expect(
        this.state,
        TOKEN_TYPES.RIGHT_PAREN,
        "Expected ')' after expression"
      );
      if (!close) return null;
      return {
        type: 'GroupedExpr',
        expression,
        span: makeSpan(token.span.start, close.span.end),
      };
    }
    case TOKEN_TYPES.UNTERMINATED_STRING:
      error(this.state, 'Unterminated string.', token.span);
      return null;
    case TOKEN_TYPES.UNKNOWN_CHAR:
      error(this.state, `Unexpected character '${token.value}'.`, token.span);
      return null;
    default:
      error(
        this.state,
        `Expected expression but found ${describeToken(token)}.`,
        token.span
      );
      return null;
  }
};
