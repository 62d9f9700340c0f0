/**
 * Lux Values
 *
 * The closed set of runtime values and the operations every part of the
 * interpreter shares: truthiness, equality, type names and display.
 */

import type { LuxCallable } from './callable.js';
import { isCallable } from './callable.js';

/** Runtime value. `null` is Lux `nil`. */
export type LuxValue = null | boolean | number | string | LuxCallable;

export type LuxTypeName = 'nil' | 'boolean' | 'number' | 'string' | 'function';

/** Only `nil` and `false` are falsy; `0` and `""` are truthy */
export function isTruthy(value: LuxValue): boolean {
  return value !== null && value !== false;
}

/**
 * Structural equality for primitives, identity for callables.
 * No coercion across types. NaN is not equal to itself.
 */
export function valuesEqual(a: LuxValue, b: LuxValue): boolean {
  return a === b;
}

export function typeName(value: LuxValue): LuxTypeName {
  if (value === null) return 'nil';
  if (isCallable(value)) return 'function';
  switch (typeof value) {
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'number';
    default:
      return 'string';
  }
}

/**
 * Shortest round-trip digits in plain decimal notation. Integral numbers
 * print without a fractional part, and no magnitude uses an exponent.
 */
export function formatNumber(n: number): string {
  if (Number.isNaN(n)) return 'NaN';
  if (n === Infinity) return 'inf';
  if (n === -Infinity) return '-inf';
  return expandExponent(String(n));
}

/** `1e+21` -> `1000000000000000000000`, `1.5e-7` -> `0.00000015` */
function expandExponent(text: string): string {
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;

  const [, sign = '', lead = '', fraction = '', exponentText = '0'] = match;
  const digits = lead + fraction;
  const exponent = Number(exponentText);

  if (exponent >= 0) {
    return sign + digits.padEnd(exponent + 1, '0');
  }
  return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
}

/** Display form used by `print` */
export function formatValue(value: LuxValue): string {
  if (value === null) return 'nil';
  if (isCallable(value)) {
    return value.kind === 'native'
      ? `<native fn ${value.name}>`
      : `<fn ${value.name}>`;
  }
  if (typeof value === 'number') return formatNumber(value);
  return String(value);
}

/** Debug form used by the REPL echo: strings are quoted */
export function inspectValue(value: LuxValue): string {
  return typeof value === 'string' ? JSON.stringify(value) : formatValue(value);
}
