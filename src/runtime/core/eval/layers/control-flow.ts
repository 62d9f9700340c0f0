/**
 * ControlFlowEvaluator: Blocks, Conditionals, Loops and Print
 *
 * A `return` outcome from any nested statement stops the enclosing
 * statement sequence or loop and is handed upward unchanged.
 *
 * @internal
 */

import type {
  BlockNode,
  IfStmtNode,
  PrintStmtNode,
  StatementNode,
  WhileStmtNode,
} from '../../../../types.js';
import type { Environment } from '../../environment.js';
import { normal, type StatementOutcome } from '../../signals.js';
import { isTruthy, type LuxValue } from '../../values.js';
import { ExpressionsEvaluator } from './expressions.js';

export abstract class ControlFlowEvaluator extends ExpressionsEvaluator {
  /**
   * Execute statements in order inside `env`. The outcome's value is the
   * value of the last statement executed.
   */
  executeStatements(
    statements: StatementNode[],
    env: Environment
  ): StatementOutcome {
    return this.withEnvironment(env, () => {
      let last: LuxValue | undefined;
      for (const statement of statements) {
        const outcome = this.executeStatement(statement);
        if (outcome.kind === 'return') return outcome;
        last = outcome.value;
      }
      return normal(last);
    });
  }

  protected executeBlock(node: BlockNode): StatementOutcome {
    return this.executeStatements(
      node.statements,
      this.ctx.environment.extend()
    );
  }

  protected executeIf(node: IfStmtNode): StatementOutcome {
    if (isTruthy(this.evaluateExpression(node.condition))) {
      return this.executeStatement(node.thenBranch);
    }
    if (node.elseBranch) {
      return this.executeStatement(node.elseBranch);
    }
    return normal();
  }

  protected executeWhile(node: WhileStmtNode): StatementOutcome {
    let last: LuxValue | undefined;
    while (isTruthy(this.evaluateExpression(node.condition))) {
      const outcome = this.executeStatement(node.body);
      if (outcome.kind === 'return') return outcome;
      last = outcome.value;
    }
    return normal(last);
  }

  protected executePrint(node: PrintStmtNode): StatementOutcome {
    const value = this.evaluateExpression(node.expression);
    this.ctx.callbacks.onPrint(value);
    return normal();
  }
}
