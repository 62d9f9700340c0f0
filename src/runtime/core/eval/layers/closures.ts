/**
 * ClosuresEvaluator: Function Declarations, Calls and Returns
 *
 * A script function body runs in a child of the frame captured at
 * declaration, never the caller's frame. Parameters and the body's
 * top-level declarations share that one child frame.
 *
 * @internal
 */

import type {
  CallNode,
  FunctionDeclNode,
  ReturnStmtNode,
} from '../../../../types.js';
import {
  LUX_ERROR_CODES,
  LuxError,
  RuntimeError,
} from '../../../../types.js';
import {
  isCallable,
  scriptCallable,
  type LuxCallable,
} from '../../callable.js';
import {
  normal,
  returning,
  type StatementOutcome,
} from '../../signals.js';
import { typeName, type LuxValue } from '../../values.js';
import { ControlFlowEvaluator } from './control-flow.js';

export abstract class ClosuresEvaluator extends ControlFlowEvaluator {
  protected declareFunction(node: FunctionDeclNode): StatementOutcome {
    const fn = scriptCallable(node, this.ctx.environment);
    this.ctx.environment.define(node.name, fn);
    return normal();
  }

  protected executeReturn(node: ReturnStmtNode): StatementOutcome {
    return returning(this.evaluateExpression(node.value));
  }

  /**
   * The callee must be callable before any argument is evaluated.
   * Arguments are then evaluated left to right and must match the arity.
   */
  protected evaluateCall(node: CallNode): LuxValue {
    const callee = this.evaluateExpression(node.callee);
    if (!isCallable(callee)) {
      throw this.typeError(
        `Can only call functions, got ${typeName(callee)}.`,
        node,
        { calleeType: typeName(callee) }
      );
    }

    const args = node.args.map((arg) => this.evaluateExpression(arg));

    if (args.length !== callee.arity) {
      throw RuntimeError.fromNode(
        LUX_ERROR_CODES.RUNTIME_ARITY_MISMATCH,
        `Expected ${callee.arity} arguments but got ${args.length}.`,
        node,
        {
          functionName: callee.name,
          expectedCount: callee.arity,
          actualCount: args.length,
        }
      );
    }

    return this.invokeCallable(callee, args, node);
  }

  /** Invoke with arguments already checked against the arity */
  invokeCallable(
    callee: LuxCallable,
    args: LuxValue[],
    node: CallNode
  ): LuxValue {
    if (callee.kind === 'native') {
      try {
        return callee.fn(args);
      } catch (err) {
        if (err instanceof LuxError) throw err;
        const message = err instanceof Error ? err.message : String(err);
        throw RuntimeError.fromNode(
          LUX_ERROR_CODES.RUNTIME_NATIVE_ERROR,
          `Function '${callee.name}' failed: ${message}`,
          node,
          { functionName: callee.name }
        );
      }
    }

    const frame = callee.closure.extend();
    callee.declaration.params.forEach((param, i) => {
      frame.define(param, args[i] ?? null);
    });

    const outcome = this.executeStatements(
      callee.declaration.body.statements,
      frame
    );
    return outcome.kind === 'return' ? outcome.value : null;
  }
}
