/**
 * Lux Runtime
 *
 * Public API for executing Lux programs.
 *
 * Module Structure:
 * - core/: Essential execution engine
 *   - types.ts: Public types (Interpreter, InterpreterOptions, etc.)
 *   - callable.ts: Callable types and type guards
 *   - values.ts: LuxValue and value utilities
 *   - environment.ts: Frames and the scope chain
 *   - signals.ts: Statement outcomes
 *   - context.ts: Interpreter factory
 *   - execute.ts: Program execution
 *   - eval/: Layered tree-walking evaluator (internal)
 * - ext/: Native functions
 *   - stdlib.ts: Standard library
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ExecutionResult,
  Interpreter,
  InterpreterCallbacks,
  InterpreterOptions,
  ResolvableNode,
} from './core/types.js';

// ============================================================
// CALLABLE TYPES AND GUARDS
// ============================================================

export type {
  HostFunctionDefinition,
  LuxCallable,
  NativeCallable,
  NativeFn,
  ScriptCallable,
} from './core/callable.js';

export {
  callable,
  isCallable,
  isNativeCallable,
  isScriptCallable,
} from './core/callable.js';

// ============================================================
// VALUE TYPES AND UTILITIES
// ============================================================

export type { LuxTypeName, LuxValue } from './core/values.js';

export {
  formatNumber,
  formatValue,
  inspectValue,
  isTruthy,
  typeName,
  valuesEqual,
} from './core/values.js';

// ============================================================
// ENVIRONMENT AND OUTCOMES
// ============================================================

export { Environment } from './core/environment.js';
export type { StatementOutcome } from './core/signals.js';

// ============================================================
// EXECUTION
// ============================================================

export { createInterpreter } from './core/context.js';
export { execute } from './core/execute.js';
export { STDLIB_FUNCTIONS } from './ext/stdlib.js';
