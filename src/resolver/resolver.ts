/**
 * Resolver
 *
 * Static pass between parsing and execution. Walks the program with a
 * stack of lexical scopes and records, for every local variable
 * reference, how many frames separate it from its binding. References
 * found in no scope are left unrecorded and read as globals.
 */

import type {
  Diagnostic,
  ExpressionNode,
  FunctionDeclNode,
  ProgramNode,
  StatementNode,
} from '../types.js';
import type { ResolvableNode } from '../runtime/index.js';

/** name -> whether its initializer has finished resolving */
type Scope = Map<string, boolean>;

export class Resolver {
  private readonly scopes: Scope[] = [];
  private functionDepth = 0;
  readonly diagnostics: Diagnostic[] = [];

  constructor(private readonly locals: WeakMap<ResolvableNode, number>) {}

  resolveProgram(program: ProgramNode): Diagnostic[] {
    this.resolveStatements(program.statements);
    return this.diagnostics;
  }

  // ============================================================
  // STATEMENTS
  // ============================================================

  private resolveStatements(statements: StatementNode[]): void {
    for (const statement of statements) {
      this.resolveStatement(statement);
    }
  }

  private resolveStatement(stmt: StatementNode): void {
    switch (stmt.type) {
      case 'Block':
        this.scoped(() => this.resolveStatements(stmt.statements));
        break;
      case 'VarDecl':
        this.declare(stmt.name);
        this.resolveExpression(stmt.initializer);
        this.define(stmt.name);
        break;
      case 'FunctionDecl':
        // Defined before the body so the function can call itself
        this.declare(stmt.name);
        this.define(stmt.name);
        this.resolveFunction(stmt);
        break;
      case 'ExpressionStmt':
      case 'PrintStmt':
        this.resolveExpression(stmt.expression);
        break;
      case 'ReturnStmt':
        if (this.functionDepth === 0) {
          this.diagnostics.push({
            message: "Can't return from top-level code.",
            span: stmt.span,
          });
        }
        this.resolveExpression(stmt.value);
        break;
      case 'IfStmt':
        this.resolveExpression(stmt.condition);
        this.resolveStatement(stmt.thenBranch);
        if (stmt.elseBranch) this.resolveStatement(stmt.elseBranch);
        break;
      case 'WhileStmt':
        this.resolveExpression(stmt.condition);
        this.resolveStatement(stmt.body);
        break;
    }
  }

  /** Parameters and the body's own declarations share one scope */
  private resolveFunction(fn: FunctionDeclNode): void {
    this.functionDepth++;
    this.scoped(() => {
      for (const param of fn.params) {
        this.declare(param);
        this.define(param);
      }
      this.resolveStatements(fn.body.statements);
    });
    this.functionDepth--;
  }

  // ============================================================
  // EXPRESSIONS
  // ============================================================

  private resolveExpression(expr: ExpressionNode): void {
    switch (expr.type) {
      case 'Variable':
        if (this.scopes[this.scopes.length - 1]?.get(expr.name) === false) {
          this.diagnostics.push({
            message: `Can't read local variable '${expr.name}' in its own initializer.`,
            span: expr.span,
          });
        }
        this.resolveLocal(expr);
        break;
      case 'Assign':
        this.resolveExpression(expr.value);
        this.resolveLocal(expr);
        break;
      case 'Call':
        this.resolveExpression(expr.callee);
        for (const arg of expr.args) this.resolveExpression(arg);
        break;
      case 'BinaryExpr':
      case 'LogicalExpr':
        this.resolveExpression(expr.left);
        this.resolveExpression(expr.right);
        break;
      case 'UnaryExpr':
        this.resolveExpression(expr.operand);
        break;
      case 'GroupedExpr':
        this.resolveExpression(expr.expression);
        break;
      case 'NumberLiteral':
      case 'StringLiteral':
      case 'BoolLiteral':
      case 'NilLiteral':
        break;
    }
  }

  /** Record the depth of the innermost scope declaring the name, if any */
  private resolveLocal(node: ResolvableNode): void {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      if (this.scopes[i]?.has(node.name)) {
        this.locals.set(node, this.scopes.length - 1 - i);
        return;
      }
    }
  }

  // ============================================================
  // SCOPES
  // ============================================================

  private scoped(fn: () => void): void {
    this.scopes.push(new Map());
    try {
      fn();
    } finally {
      this.scopes.pop();
    }
  }

  /** Globals are not tracked; only the innermost local scope is touched */
  private declare(name: string): void {
    this.scopes[this.scopes.length - 1]?.set(name, false);
  }

  private define(name: string): void {
    this.scopes[this.scopes.length - 1]?.set(name, true);
  }
}

/**
 * Resolve every local reference in `program` into `locals`.
 * Keeps going after errors and returns all diagnostics found.
 */
export function resolve(
  program: ProgramNode,
  locals: WeakMap<ResolvableNode, number>
): Diagnostic[] {
  return new Resolver(locals).resolveProgram(program);
}
