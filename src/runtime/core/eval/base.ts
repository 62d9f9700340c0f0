/**
 * Evaluator Base Class
 *
 * Foundation for the layered evaluator. Each layer in `layers/` extends
 * the one below it, and the concrete `Evaluator` supplies the dispatch
 * methods declared abstract here.
 *
 * @internal
 */

import type { ASTNode, ExpressionNode, StatementNode } from '../../../types.js';
import { LUX_ERROR_CODES, RuntimeError } from '../../../types.js';
import type { Environment } from '../environment.js';
import type { StatementOutcome } from '../signals.js';
import type { Interpreter } from '../types.js';
import type { LuxValue } from '../values.js';

export abstract class EvaluatorBase {
  constructor(readonly ctx: Interpreter) {}

  /** Evaluate any expression node */
  abstract evaluateExpression(expr: ExpressionNode): LuxValue;

  /** Execute any statement node */
  abstract executeStatement(stmt: StatementNode): StatementOutcome;

  /**
   * Run `fn` with `env` as the current frame. The previous frame is
   * restored on every exit path, including thrown runtime errors.
   */
  protected withEnvironment<T>(env: Environment, fn: () => T): T {
    const previous = this.ctx.environment;
    this.ctx.environment = env;
    try {
      return fn();
    } finally {
      this.ctx.environment = previous;
    }
  }

  protected typeError(
    message: string,
    node: ASTNode,
    context?: Record<string, unknown>
  ): RuntimeError {
    return RuntimeError.fromNode(
      LUX_ERROR_CODES.RUNTIME_TYPE_ERROR,
      message,
      node,
      context
    );
  }
}
