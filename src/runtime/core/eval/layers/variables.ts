/**
 * VariablesEvaluator: Variable Declaration, Lookup and Assignment
 *
 * References the resolver bound to a depth go straight to that frame.
 * Everything else is a global.
 *
 * @internal
 */

import type {
  AssignNode,
  VarDeclNode,
  VariableNode,
} from '../../../../types.js';
import { LUX_ERROR_CODES, RuntimeError } from '../../../../types.js';
import { normal, type StatementOutcome } from '../../signals.js';
import type { LuxValue } from '../../values.js';
import { EvaluatorBase } from '../base.js';

export abstract class VariablesEvaluator extends EvaluatorBase {
  protected evaluateVariable(node: VariableNode): LuxValue {
    const depth = this.ctx.locals.get(node);
    const value =
      depth === undefined
        ? this.ctx.globals.get(node.name)
        : this.ctx.environment.getAt(node.name, depth);

    if (value === undefined) throw this.undefinedVariable(node);
    return value;
  }

  protected evaluateAssign(node: AssignNode): LuxValue {
    const value = this.evaluateExpression(node.value);
    const depth = this.ctx.locals.get(node);

    if (depth !== undefined) {
      this.ctx.environment.assignAt(node.name, value, depth);
    } else if (!this.ctx.globals.assign(node.name, value)) {
      throw this.undefinedVariable(node);
    }
    return value;
  }

  /** `var` always defines in the current frame; redefinition is allowed */
  protected executeVarDecl(node: VarDeclNode): StatementOutcome {
    const value = this.evaluateExpression(node.initializer);
    this.ctx.environment.define(node.name, value);
    return normal(value);
  }

  private undefinedVariable(node: VariableNode | AssignNode): RuntimeError {
    return RuntimeError.fromNode(
      LUX_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
      `Undefined variable '${node.name}'.`,
      node,
      { name: node.name }
    );
  }
}
