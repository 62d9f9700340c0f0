/**
 * ExpressionsEvaluator: Unary, Binary and Logical Operators
 *
 * No implicit coercion: arithmetic and comparison take numbers, `+` also
 * concatenates two strings, and equality never converts across types.
 *
 * @internal
 */

import type {
  BinaryExprNode,
  LogicalExprNode,
  UnaryExprNode,
} from '../../../../types.js';
import { LUX_ERROR_CODES, RuntimeError } from '../../../../types.js';
import {
  isTruthy,
  typeName,
  valuesEqual,
  type LuxValue,
} from '../../values.js';
import { VariablesEvaluator } from './variables.js';

export abstract class ExpressionsEvaluator extends VariablesEvaluator {
  protected evaluateUnary(node: UnaryExprNode): LuxValue {
    const operand = this.evaluateExpression(node.operand);

    if (node.op === '!') return !isTruthy(operand);

    if (typeof operand !== 'number') {
      throw this.typeError(
        `Operator '-' expects a number, got ${typeName(operand)}.`,
        node,
        { operator: '-', operandType: typeName(operand) }
      );
    }
    return -operand;
  }

  /** Both operands are evaluated, left first, before the operator applies */
  protected evaluateBinary(node: BinaryExprNode): LuxValue {
    const left = this.evaluateExpression(node.left);
    const right = this.evaluateExpression(node.right);

    switch (node.op) {
      case '==':
        return valuesEqual(left, right);
      case '!=':
        return !valuesEqual(left, right);
      case '+':
        if (typeof left === 'number' && typeof right === 'number') {
          return left + right;
        }
        if (typeof left === 'string' && typeof right === 'string') {
          return left + right;
        }
        throw this.operandError(node, left, right, 'two numbers or two strings');
      case '-': {
        const [a, b] = this.numberOperands(node, left, right);
        return a - b;
      }
      case '*': {
        const [a, b] = this.numberOperands(node, left, right);
        return a * b;
      }
      case '/': {
        const [a, b] = this.numberOperands(node, left, right);
        if (b === 0) {
          throw RuntimeError.fromNode(
            LUX_ERROR_CODES.RUNTIME_DIVIDE_BY_ZERO,
            'Cannot divide by zero.',
            node
          );
        }
        return a / b;
      }
      case '<': {
        const [a, b] = this.numberOperands(node, left, right);
        return a < b;
      }
      case '<=': {
        const [a, b] = this.numberOperands(node, left, right);
        return a <= b;
      }
      case '>': {
        const [a, b] = this.numberOperands(node, left, right);
        return a > b;
      }
      case '>=': {
        const [a, b] = this.numberOperands(node, left, right);
        return a >= b;
      }
    }
  }

  /** Short-circuits and yields the deciding operand, not a boolean */
  protected evaluateLogical(node: LogicalExprNode): LuxValue {
    const left = this.evaluateExpression(node.left);

    if (node.op === 'or') {
      return isTruthy(left) ? left : this.evaluateExpression(node.right);
    }
    return isTruthy(left) ? this.evaluateExpression(node.right) : left;
  }

  private numberOperands(
    node: BinaryExprNode,
    left: LuxValue,
    right: LuxValue
  ): [number, number] {
    if (typeof left !== 'number' || typeof right !== 'number') {
      throw this.operandError(node, left, right, 'two numbers');
    }
    return [left, right];
  }

  private operandError(
    node: BinaryExprNode,
    left: LuxValue,
    right: LuxValue,
    expected: string
  ): RuntimeError {
    return this.typeError(
      `Operator '${node.op}' expects ${expected}, got ${typeName(left)} and ${typeName(right)}.`,
      node,
      {
        operator: node.op,
        leftType: typeName(left),
        rightType: typeName(right),
      }
    );
  }
}
