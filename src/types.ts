/**
 * Lux AST Types
 * Tokens, syntax tree nodes, diagnostics and the error hierarchy
 */

// ============================================================
// SOURCE SPANS
// ============================================================

/** Half-open UTF-8 byte range `[start, end)` into the original source */
export interface SourceSpan {
  readonly start: number;
  readonly end: number;
}

/** Compile-time problem report (scan, parse or resolve) */
export interface Diagnostic {
  readonly message: string;
  readonly span: SourceSpan;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

/** Error codes for programmatic handling */
export const LUX_ERROR_CODES = {
  RUNTIME_TYPE_ERROR: 'RUNTIME_TYPE_ERROR',
  RUNTIME_DIVIDE_BY_ZERO: 'RUNTIME_DIVIDE_BY_ZERO',
  RUNTIME_UNDEFINED_VARIABLE: 'RUNTIME_UNDEFINED_VARIABLE',
  RUNTIME_ARITY_MISMATCH: 'RUNTIME_ARITY_MISMATCH',
  RUNTIME_NATIVE_ERROR: 'RUNTIME_NATIVE_ERROR',
} as const;

export type LuxErrorCode = (typeof LUX_ERROR_CODES)[keyof typeof LUX_ERROR_CODES];

/** Structured error data for host applications */
export interface LuxErrorData {
  readonly code: LuxErrorCode;
  readonly message: string;
  readonly span?: SourceSpan | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Base error class for all Lux errors.
 * Provides structured data for host applications to format as needed.
 */
export class LuxError extends Error {
  readonly code: LuxErrorCode;
  readonly span?: SourceSpan | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: LuxErrorData) {
    super(data.message);
    this.name = 'LuxError';
    this.code = data.code;
    this.span = data.span;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LuxErrorData {
    return {
      code: this.code,
      message: this.message,
      span: this.span,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LuxErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/** Runtime execution errors */
export class RuntimeError extends LuxError {
  constructor(
    code: LuxErrorCode,
    message: string,
    span?: SourceSpan,
    context?: Record<string, unknown>
  ) {
    super({ code, message, span, context });
    this.name = 'RuntimeError';
  }

  /** Create from an AST node */
  static fromNode(
    code: LuxErrorCode,
    message: string,
    node?: { span: SourceSpan },
    context?: Record<string, unknown>
  ): RuntimeError {
    return new RuntimeError(code, message, node?.span, context);
  }
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Single-character tokens
  LEFT_PAREN: 'LEFT_PAREN', // (
  RIGHT_PAREN: 'RIGHT_PAREN', // )
  LEFT_BRACE: 'LEFT_BRACE', // {
  RIGHT_BRACE: 'RIGHT_BRACE', // }
  COMMA: 'COMMA', // ,
  DOT: 'DOT', // .
  MINUS: 'MINUS', // -
  PLUS: 'PLUS', // +
  SEMICOLON: 'SEMICOLON', // ;
  SLASH: 'SLASH', // /
  STAR: 'STAR', // *

  // One or two character tokens
  BANG: 'BANG', // !
  BANG_EQUAL: 'BANG_EQUAL', // !=
  EQUAL: 'EQUAL', // =
  EQUAL_EQUAL: 'EQUAL_EQUAL', // ==
  GREATER: 'GREATER', // >
  GREATER_EQUAL: 'GREATER_EQUAL', // >=
  LESS: 'LESS', // <
  LESS_EQUAL: 'LESS_EQUAL', // <=

  // Literals
  IDENTIFIER: 'IDENTIFIER',
  STRING: 'STRING',
  NUMBER: 'NUMBER',

  // Keywords
  AND: 'AND',
  CLASS: 'CLASS',
  ELSE: 'ELSE',
  FALSE: 'FALSE',
  FUN: 'FUN',
  FOR: 'FOR',
  IF: 'IF',
  NIL: 'NIL',
  OR: 'OR',
  PRINT: 'PRINT',
  RETURN: 'RETURN',
  SUPER: 'SUPER',
  THIS: 'THIS',
  TRUE: 'TRUE',
  VAR: 'VAR',
  WHILE: 'WHILE',

  // Lexical error sentinels
  UNTERMINATED_STRING: 'UNTERMINATED_STRING',
  UNKNOWN_CHAR: 'UNKNOWN_CHAR',

  // Returned by out-of-range lookups, never emitted by the scanner
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/**
 * A scanned token. `value` holds the lexeme, except for strings where it
 * holds the text between the quotes.
 */
export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}

// ============================================================
// AST NODE TYPES
// ============================================================

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// PROGRAM
// ============================================================

export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  readonly statements: StatementNode[];
}

// ============================================================
// EXPRESSIONS
// ============================================================

export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
}

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

export interface NilLiteralNode extends BaseNode {
  readonly type: 'NilLiteral';
}

export interface GroupedExprNode extends BaseNode {
  readonly type: 'GroupedExpr';
  readonly expression: ExpressionNode;
}

export type UnaryOp = '!' | '-';

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOp;
  readonly operand: ExpressionNode;
}

export type BinaryOp =
  | '+'
  | '-'
  | '*'
  | '/'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>=';

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export type LogicalOp = 'and' | 'or';

/** Short-circuit `and` / `or`; evaluates to an operand, not a coerced boolean */
export interface LogicalExprNode extends BaseNode {
  readonly type: 'LogicalExpr';
  readonly op: LogicalOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface VariableNode extends BaseNode {
  readonly type: 'Variable';
  readonly name: string;
}

export interface AssignNode extends BaseNode {
  readonly type: 'Assign';
  readonly name: string;
  readonly value: ExpressionNode;
}

export interface CallNode extends BaseNode {
  readonly type: 'Call';
  /** Any expression; `f()()` chains call the result of a call */
  readonly callee: ExpressionNode;
  readonly args: ExpressionNode[];
}

export type LiteralNode =
  | NumberLiteralNode
  | StringLiteralNode
  | BoolLiteralNode
  | NilLiteralNode;

export type ExpressionNode =
  | LiteralNode
  | GroupedExprNode
  | UnaryExprNode
  | BinaryExprNode
  | LogicalExprNode
  | VariableNode
  | AssignNode
  | CallNode;

// ============================================================
// STATEMENTS
// ============================================================

export interface ExpressionStmtNode extends BaseNode {
  readonly type: 'ExpressionStmt';
  readonly expression: ExpressionNode;
}

export interface PrintStmtNode extends BaseNode {
  readonly type: 'PrintStmt';
  readonly expression: ExpressionNode;
}

export interface VarDeclNode extends BaseNode {
  readonly type: 'VarDecl';
  readonly name: string;
  /** A `NilLiteral` when the declaration has no initializer */
  readonly initializer: ExpressionNode;
}

/** Statement order is both scope order and evaluation order */
export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly statements: StatementNode[];
}

export interface IfStmtNode extends BaseNode {
  readonly type: 'IfStmt';
  readonly condition: ExpressionNode;
  readonly thenBranch: StatementNode;
  readonly elseBranch: StatementNode | null;
}

/** Also the target of `for` loop desugaring; there is no For node */
export interface WhileStmtNode extends BaseNode {
  readonly type: 'WhileStmt';
  readonly condition: ExpressionNode;
  readonly body: StatementNode;
}

export interface FunctionDeclNode extends BaseNode {
  readonly type: 'FunctionDecl';
  readonly name: string;
  readonly params: string[];
  readonly body: BlockNode;
}

export interface ReturnStmtNode extends BaseNode {
  readonly type: 'ReturnStmt';
  /** A `NilLiteral` for a bare `return;` */
  readonly value: ExpressionNode;
}

export type StatementNode =
  | ExpressionStmtNode
  | PrintStmtNode
  | VarDeclNode
  | BlockNode
  | IfStmtNode
  | WhileStmtNode
  | FunctionDeclNode
  | ReturnStmtNode;

export type ASTNode = ProgramNode | ExpressionNode | StatementNode;

// ============================================================
// PARSE RESULT
// ============================================================

/** Either the full statement sequence or every collected diagnostic */
export type ParseResult =
  | { readonly success: true; readonly program: ProgramNode }
  | { readonly success: false; readonly diagnostics: Diagnostic[] };
