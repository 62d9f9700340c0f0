/**
 * Run Pipeline
 *
 * scan -> parse -> resolve -> execute, against one interpreter session.
 */

import { parse } from './parser/index.js';
import { resolve } from './resolver/index.js';
import { reportRunResult } from './report.js';
import { execute } from './runtime/index.js';
import type { Interpreter, LuxValue } from './runtime/index.js';
import type { Diagnostic } from './types.js';
import { LuxError } from './types.js';

/** Structured outcome of running one source string */
export type RunResult =
  | { readonly status: 'ok'; readonly value: LuxValue | undefined }
  | { readonly status: 'diagnostics'; readonly diagnostics: Diagnostic[] }
  | { readonly status: 'runtime-error'; readonly error: LuxError };

/**
 * Scan, parse, resolve and execute `source`.
 *
 * Parse or resolve diagnostics stop the run before anything executes.
 * A runtime error stops execution at the failing statement; definitions
 * made before it stay in the session. Errors that are not Lux errors,
 * such as host stack exhaustion from unbounded recursion, propagate.
 */
export function runSource(source: string, interpreter: Interpreter): RunResult {
  const parsed = parse(source);
  if (!parsed.success) {
    return { status: 'diagnostics', diagnostics: parsed.diagnostics };
  }

  const diagnostics = resolve(parsed.program, interpreter.locals);
  if (diagnostics.length > 0) {
    return { status: 'diagnostics', diagnostics };
  }

  try {
    const { value } = execute(parsed.program, interpreter);
    return { status: 'ok', value };
  } catch (err) {
    if (err instanceof LuxError) {
      return { status: 'runtime-error', error: err };
    }
    throw err;
  }
}

/**
 * Run `source` and report problems through the interpreter's `onError`
 * callback, one formatted line each.
 *
 * @returns the value of the last statement, or undefined when there was
 * none or the run failed
 *
 * @example
 * ```typescript
 * const lux = createInterpreter();
 * run('var x = 1;', lux);
 * run('print x + 1;', lux); // prints 2
 * ```
 */
export function run(
  source: string,
  interpreter: Interpreter
): LuxValue | undefined {
  const result = runSource(source, interpreter);
  reportRunResult(result, source, interpreter.callbacks.onError);
  return result.status === 'ok' ? result.value : undefined;
}
