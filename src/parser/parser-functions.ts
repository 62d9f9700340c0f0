/**
 * Parser Extension: Function Parsing
 * Function declarations, calls and argument lists
 */

import { Parser } from './parser.js';
import type { ExpressionNode, FunctionDeclNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { MAX_ARGUMENTS } from './helpers.js';
import {
  advance,
  check,
  error,
  expect,
  is,
  makeSpan,
  peek,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseFunctionDeclaration(): FunctionDeclNode | null;
    parseCall(): ExpressionNode | null;
    parseArgumentList(): ExpressionNode[] | null;
  }
}

// ============================================================
// FUNCTION DECLARATIONS
// ============================================================

Parser.prototype.parseFunctionDeclaration = function (
  this: Parser
): FunctionDeclNode | null {
  const start = advance(this.state).span; // consume fun
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'Expected function name'
  );
  if (!name) return null;
  if (
    !expect(
      this.state,
      TOKEN_TYPES.LEFT_PAREN,
      "Expected '(' after function name"
    )
  ) {
    return null;
  }

  const params: string[] = [];
  if (!check(this.state, TOKEN_TYPES.RIGHT_PAREN)) {
    do {
      if (params.length >= MAX_ARGUMENTS) {
        error(
          this.state,
          `Can't have more than ${MAX_ARGUMENTS} parameters.`,
          peek(this.state).span
        );
      }
      const param = expect(
        this.state,
        TOKEN_TYPES.IDENTIFIER,
        'Expected parameter name'
      );
      if (!param) return null;
      params.push(param.value);
    } while (is(this.state, TOKEN_TYPES.COMMA));
  }

  if (
    !expect(
      this.state,
      TOKEN_TYPES.RIGHT_PAREN,
      "Expected ')' after parameters"
    )
  ) {
    return null;
  }

  const body = this.parseBlock("Expected '{' before function body");
  if (!body) return null;

  return {
    type: 'FunctionDecl',
    name: name.value,
    params,
    body,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// CALLS
// ============================================================

/** call → primary ( "(" arguments? ")" )* */
Parser.prototype.parseCall = function (this: Parser): ExpressionNode | null {
  let expr = this.parsePrimary();
  if (!expr) return null;

  while (is(this.state, TOKEN_TYPES.LEFT_PAREN)) {
    const args = this.parseArgumentList();
    if (!args) return null;
    const close = expect(
      this.state,
      TOKEN_TYPES.RIGHT_PAREN,
      "Expected ')' after arguments"
    );
    if (!close) return null;
    expr = {
      type: 'Call',
      callee: expr,
      args,
      span: makeSpan(expr.span.start, close.span.end),
    };
  }

  return expr;
};

/**
 * Comma-separated arguments up to (not including) `)`.
 * Too many arguments is reported but parsing continues.
 */
Parser.prototype.parseArgumentList = function (
  this: Parser
): ExpressionNode[] | null {
  const args: ExpressionNode[] = [];
  if (check(this.state, TOKEN_TYPES.RIGHT_PAREN)) return args;

  do {
    if (args.length >= MAX_ARGUMENTS) {
      error(
        this.state,
        `Can't have more than ${MAX_ARGUMENTS} arguments.`,
        peek(this.state).span
      );
    }
    const arg = this.parseExpression();
    if (!arg) return null;
    args.push(arg);
  } while (is(this.state, TOKEN_TYPES.COMMA));

  return args;
};
