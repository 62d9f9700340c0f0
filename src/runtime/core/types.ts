/**
 * Runtime Types
 *
 * Public types for interpreter configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { AssignNode, VariableNode } from '../../types.js';
import type { HostFunctionDefinition } from './callable.js';
import type { Environment } from './environment.js';
import type { LuxValue } from './values.js';

/** I/O callbacks for runtime operations */
export interface InterpreterCallbacks {
  /** Called by each `print` statement */
  onPrint: (value: LuxValue) => void;
  /** Called with each formatted diagnostic or runtime error line */
  onError: (message: string) => void;
}

/** A variable reference the resolver can bind to a lexical depth */
export type ResolvableNode = VariableNode | AssignNode;

/**
 * Interpreter session state. Persists across `run` calls, which is what
 * lets the REPL keep definitions between lines.
 */
export interface Interpreter {
  /** Outermost frame, holding the standard library and host globals */
  readonly globals: Environment;
  /** Frame statements currently execute in */
  environment: Environment;
  /**
   * Resolution table: reference node to the number of frames between the
   * reference and its binding. Unresolved references are globals.
   */
  readonly locals: WeakMap<ResolvableNode, number>;
  /** I/O callbacks */
  readonly callbacks: InterpreterCallbacks;
}

/** Options for creating an interpreter */
export interface InterpreterOptions {
  /** Initial global variables */
  variables?: Record<string, LuxValue>;
  /** Host functions, defined as globals after the standard library */
  functions?: Record<string, HostFunctionDefinition>;
  /** I/O callbacks */
  callbacks?: Partial<InterpreterCallbacks>;
}

/** Result of program execution */
export interface ExecutionResult {
  /** Value of the last statement that produced one, if any */
  value: LuxValue | undefined;
}
