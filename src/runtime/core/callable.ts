/**
 * Callable Types
 *
 * Closed representation for callable values in Lux:
 * - NativeCallable: host functions (the standard library and any
 *   functions registered through `createInterpreter`)
 * - ScriptCallable: functions declared in Lux source, with the frame
 *   they were declared in
 *
 * Public API for host applications.
 */

import type { FunctionDeclNode } from '../../types.js';
import type { Environment } from './environment.js';
import type { LuxValue } from './values.js';

/** Host function signature. Throwing surfaces as a runtime error. */
export type NativeFn = (args: LuxValue[]) => LuxValue;

/** Host function registration */
export interface HostFunctionDefinition {
  /** Exact number of arguments callers must pass */
  readonly arity: number;
  readonly fn: NativeFn;
}

/** Common fields for all callable types */
interface CallableBase {
  readonly __type: 'callable';
  readonly name: string;
  readonly arity: number;
}

export interface NativeCallable extends CallableBase {
  readonly kind: 'native';
  readonly fn: NativeFn;
}

export interface ScriptCallable extends CallableBase {
  readonly kind: 'script';
  readonly declaration: FunctionDeclNode;
  /** Frame active when the declaration ran */
  readonly closure: Environment;
}

export type LuxCallable = NativeCallable | ScriptCallable;

/**
 * Wrap a host function as a Lux callable.
 *
 * @example
 * ```typescript
 * const double = callable('double', 1, ([n]) => (typeof n === 'number' ? n * 2 : null));
 * ```
 */
export function callable(
  name: string,
  arity: number,
  fn: NativeFn
): NativeCallable {
  return { __type: 'callable', kind: 'native', name, arity, fn };
}

export function scriptCallable(
  declaration: FunctionDeclNode,
  closure: Environment
): ScriptCallable {
  return {
    __type: 'callable',
    kind: 'script',
    name: declaration.name,
    arity: declaration.params.length,
    declaration,
    closure,
  };
}

export function isCallable(value: unknown): value is LuxCallable {
  return (
    typeof value === 'object' &&
    value !== null &&
    '__type' in value &&
    value.__type === 'callable'
  );
}

export function isScriptCallable(value: unknown): value is ScriptCallable {
  return isCallable(value) && value.kind === 'script';
}

export function isNativeCallable(value: unknown): value is NativeCallable {
  return isCallable(value) && value.kind === 'native';
}
