/**
 * Lux Runtime Tests: Values
 */

import { describe, expect, it } from 'vitest';
import {
  callable,
  formatNumber,
  formatValue,
  inspectValue,
  isCallable,
  isNativeCallable,
  isScriptCallable,
  isTruthy,
  typeName,
  valuesEqual,
} from '../../src/index.js';
import { valueOf } from '../helpers/runtime.js';

const noop = callable('noop', 0, () => null);

describe('Lux Values', () => {
  describe('isTruthy', () => {
    it('treats only nil and false as falsy', () => {
      expect(isTruthy(null)).toBe(false);
      expect(isTruthy(false)).toBe(false);
      expect(isTruthy(0)).toBe(true);
      expect(isTruthy('')).toBe(true);
      expect(isTruthy(noop)).toBe(true);
    });
  });

  describe('valuesEqual', () => {
    it('never converts across types', () => {
      expect(valuesEqual(1, 1)).toBe(true);
      expect(valuesEqual(1, '1')).toBe(false);
      expect(valuesEqual(null, false)).toBe(false);
      expect(valuesEqual(null, null)).toBe(true);
    });

    it('compares callables by identity', () => {
      expect(valuesEqual(noop, noop)).toBe(true);
      expect(valuesEqual(noop, callable('noop', 0, () => null))).toBe(false);
    });

    it('follows IEEE NaN semantics', () => {
      expect(valuesEqual(NaN, NaN)).toBe(false);
    });
  });

  describe('typeName', () => {
    it('names every kind of value', () => {
      expect([null, true, 1, 's', noop].map(typeName)).toEqual([
        'nil',
        'boolean',
        'number',
        'string',
        'function',
      ]);
    });
  });

  describe('formatting', () => {
    it('prints integral numbers without a fraction', () => {
      expect(formatNumber(3)).toBe('3');
      expect(formatNumber(2.5)).toBe('2.5');
      expect(formatNumber(-0.5)).toBe('-0.5');
    });

    it('prints large and small magnitudes without an exponent', () => {
      expect(formatNumber(1e21)).toBe('1000000000000000000000');
      expect(formatNumber(1.2345e21)).toBe('1234500000000000000000');
      expect(formatNumber(-2.5e22)).toBe('-25000000000000000000000');
      expect(formatNumber(1e-7)).toBe('0.0000001');
      expect(formatNumber(-1.5e-7)).toBe('-0.00000015');
    });

    it('names non-finite numbers', () => {
      expect(formatNumber(NaN)).toBe('NaN');
      expect(formatNumber(Infinity)).toBe('inf');
      expect(formatNumber(-Infinity)).toBe('-inf');
    });

    it('prints values for display', () => {
      expect(formatValue(null)).toBe('nil');
      expect(formatValue(true)).toBe('true');
      expect(formatValue('raw text')).toBe('raw text');
      expect(formatValue(noop)).toBe('<native fn noop>');
    });

    it('quotes strings only in the inspect form', () => {
      expect(inspectValue('a"b')).toBe('"a\\"b"');
      expect(inspectValue(4)).toBe('4');
      expect(inspectValue(null)).toBe('nil');
    });
  });

  describe('callable guards', () => {
    it('recognises native callables', () => {
      expect(isCallable(noop)).toBe(true);
      expect(isNativeCallable(noop)).toBe(true);
      expect(isCallable('noop')).toBe(false);
      expect(isCallable({ name: 'noop' })).toBe(false);
      expect(isScriptCallable(noop)).toBe(false);
    });

    it('recognises functions declared in source', () => {
      const fn = valueOf('fun f(a, b) {} f;');
      expect(isScriptCallable(fn)).toBe(true);
      expect(isNativeCallable(fn)).toBe(false);
      if (!isScriptCallable(fn)) return;
      expect(fn.name).toBe('f');
      expect(fn.arity).toBe(2);
      expect(formatValue(fn)).toBe('<fn f>');
    });
  });
});
