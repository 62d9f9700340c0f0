/**
 * Interpreter Factory
 *
 * Creates and configures an interpreter session.
 * Public API for host applications.
 */

import { STDLIB_FUNCTIONS } from '../ext/stdlib.js';
import { callable } from './callable.js';
import { Environment } from './environment.js';
import type {
  Interpreter,
  InterpreterCallbacks,
  InterpreterOptions,
  ResolvableNode,
} from './types.js';
import { formatValue } from './values.js';

const defaultCallbacks: InterpreterCallbacks = {
  onPrint: (value) => {
    console.log(formatValue(value));
  },
  onError: (message) => {
    console.error(message);
  },
};

/**
 * Create an interpreter session.
 * This is the main entry point for configuring the Lux runtime.
 *
 * @throws Error when a host function declares an invalid arity
 */
export function createInterpreter(
  options: InterpreterOptions = {}
): Interpreter {
  const globals = new Environment();

  for (const [name, definition] of Object.entries(STDLIB_FUNCTIONS)) {
    globals.define(name, callable(name, definition.arity, definition.fn));
  }

  // Host functions can override the standard library
  if (options.functions) {
    for (const [name, definition] of Object.entries(options.functions)) {
      if (!Number.isInteger(definition.arity) || definition.arity < 0) {
        throw new Error(
          `Function '${name}' has invalid arity ${definition.arity}`
        );
      }
      globals.define(name, callable(name, definition.arity, definition.fn));
    }
  }

  if (options.variables) {
    for (const [name, value] of Object.entries(options.variables)) {
      globals.define(name, value);
    }
  }

  return {
    globals,
    environment: globals,
    locals: new WeakMap<ResolvableNode, number>(),
    callbacks: {
      ...defaultCallbacks,
      ...options.callbacks,
    },
  };
}
