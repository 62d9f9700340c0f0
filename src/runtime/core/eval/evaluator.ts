/**
 * Composed Evaluator
 *
 * The complete evaluator: the layer stack plus node dispatch.
 * Uses WeakMap caching to reuse evaluator instances per Interpreter.
 *
 * Layer order (bottom to top):
 * 1. EvaluatorBase - Frame switching, error helpers
 * 2. VariablesEvaluator - Declaration, lookup, assignment
 * 3. ExpressionsEvaluator - Unary, binary, logical operators
 * 4. ControlFlowEvaluator - Blocks, if, while, print
 * 5. ClosuresEvaluator - Function declarations, calls, returns
 *
 * Each layer can call the methods of the layers below it, and every layer
 * can dispatch back through the abstract methods on EvaluatorBase.
 *
 * @internal
 */

import type { ExpressionNode, StatementNode } from '../../../types.js';
import type { StatementOutcome } from '../signals.js';
import { normal } from '../signals.js';
import type { Interpreter } from '../types.js';
import type { LuxValue } from '../values.js';
import { ClosuresEvaluator } from './layers/closures.js';

export class Evaluator extends ClosuresEvaluator {
  evaluateExpression(expr: ExpressionNode): LuxValue {
    switch (expr.type) {
      case 'NumberLiteral':
      case 'StringLiteral':
      case 'BoolLiteral':
        return expr.value;
      case 'NilLiteral':
        return null;
      case 'GroupedExpr':
        return this.evaluateExpression(expr.expression);
      case 'UnaryExpr':
        return this.evaluateUnary(expr);
      case 'BinaryExpr':
        return this.evaluateBinary(expr);
      case 'LogicalExpr':
        return this.evaluateLogical(expr);
      case 'Variable':
        return this.evaluateVariable(expr);
      case 'Assign':
        return this.evaluateAssign(expr);
      case 'Call':
        return this.evaluateCall(expr);
    }
  }

  executeStatement(stmt: StatementNode): StatementOutcome {
    switch (stmt.type) {
      case 'ExpressionStmt':
        return normal(this.evaluateExpression(stmt.expression));
      case 'PrintStmt':
        return this.executePrint(stmt);
      case 'VarDecl':
        return this.executeVarDecl(stmt);
      case 'Block':
        return this.executeBlock(stmt);
      case 'IfStmt':
        return this.executeIf(stmt);
      case 'WhileStmt':
        return this.executeWhile(stmt);
      case 'FunctionDecl':
        return this.declareFunction(stmt);
      case 'ReturnStmt':
        return this.executeReturn(stmt);
    }
  }
}

/**
 * WeakMap cache for evaluator instances.
 *
 * Key: Interpreter object reference
 * Value: Evaluator instance for that interpreter
 *
 * Cache eviction happens automatically when the Interpreter is
 * garbage collected, since WeakMap keys don't prevent GC.
 */
const evaluatorCache = new WeakMap<Interpreter, Evaluator>();

/**
 * Get or create an evaluator instance for a given Interpreter.
 *
 * @internal
 */
export function getEvaluator(ctx: Interpreter): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
