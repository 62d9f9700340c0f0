/**
 * Program Execution
 *
 * Runs a resolved program against an interpreter session.
 * Public API for host applications.
 */

import type { ProgramNode } from '../../types.js';
import { getEvaluator } from './eval/evaluator.js';
import type { ExecutionResult, Interpreter } from './types.js';

/**
 * Execute every top-level statement in the interpreter's current frame.
 *
 * The program must already be resolved against `ctx.locals`. Runtime
 * errors propagate as thrown `RuntimeError`s and stop execution; effects
 * of statements that already ran are kept.
 */
export function execute(
  program: ProgramNode,
  ctx: Interpreter
): ExecutionResult {
  const outcome = getEvaluator(ctx).executeStatements(
    program.statements,
    ctx.environment
  );
  return { value: outcome.value };
}
