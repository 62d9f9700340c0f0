/**
 * Standard Library
 *
 * Native functions defined in every interpreter's global frame.
 */

import type { HostFunctionDefinition } from '../core/callable.js';

export const STDLIB_FUNCTIONS: Record<string, HostFunctionDefinition> = {
  /** Milliseconds since the UNIX epoch */
  clock: {
    arity: 0,
    fn: () => Date.now(),
  },
};
