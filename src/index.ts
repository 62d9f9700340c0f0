/**
 * Lux Module
 * Exports lexer, parser, resolver, runtime, and AST types
 */

export { nextToken, scan } from './lexer/index.js';
export { MAX_ARGUMENTS, parse, Parser } from './parser/index.js';
export { resolve, Resolver } from './resolver/index.js';
export {
  callable,
  createInterpreter,
  Environment,
  execute,
  type ExecutionResult,
  formatNumber,
  formatValue,
  type HostFunctionDefinition,
  inspectValue,
  type Interpreter,
  type InterpreterCallbacks,
  type InterpreterOptions,
  isCallable,
  isNativeCallable,
  isScriptCallable,
  isTruthy,
  type LuxCallable,
  type LuxTypeName,
  type LuxValue,
  type NativeCallable,
  type NativeFn,
  type ResolvableNode,
  type ScriptCallable,
  type StatementOutcome,
  STDLIB_FUNCTIONS,
  typeName,
  valuesEqual,
} from './runtime/index.js';

// ============================================================
// RUN PIPELINE AND REPORTING
// ============================================================
export { run, runSource, type RunResult } from './run.js';
export {
  formatDiagnostic,
  formatRuntimeError,
  reportRunResult,
} from './report.js';
export { LineOffsets } from './line-offsets.js';

export * from './types.js';
