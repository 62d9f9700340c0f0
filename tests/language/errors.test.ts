/**
 * Lux Language Tests: Runtime Errors
 */

import { describe, expect, it } from 'vitest';
import { LUX_ERROR_CODES } from '../../src/index.js';
import { runLux, runtimeError } from '../helpers/runtime.js';

describe('Lux Language: Runtime Errors', () => {
  describe('Type errors', () => {
    it('rejects negating a non-number', () => {
      const err = runtimeError('print -"a";');
      expect(err.code).toBe(LUX_ERROR_CODES.RUNTIME_TYPE_ERROR);
      expect(err.message).toBe("Operator '-' expects a number, got string.");
    });

    it('rejects mixed operands to +', () => {
      expect(runtimeError('print 1 + "a";').message).toBe(
        "Operator '+' expects two numbers or two strings, got number and string."
      );
    });

    it('rejects comparing non-numbers', () => {
      expect(runtimeError('print 1 < nil;').message).toBe(
        "Operator '<' expects two numbers, got number and nil."
      );
    });

    it('rejects calling a non-function', () => {
      const err = runtimeError('"not fn"();');
      expect(err.code).toBe(LUX_ERROR_CODES.RUNTIME_TYPE_ERROR);
      expect(err.message).toBe('Can only call functions, got string.');
    });

    it('checks the callee before evaluating arguments', () => {
      const { output, result } = runLux(
        'fun side() { print "arg"; return 1; } 3(side());'
      );
      expect(output).toEqual([]);
      expect(result.status).toBe('runtime-error');
      if (result.status !== 'runtime-error') return;
      expect(result.error.message).toBe('Can only call functions, got number.');
    });
  });

  describe('Other errors', () => {
    it('rejects division by zero at the division', () => {
      const err = runtimeError('print 1 / 0;');
      expect(err.code).toBe(LUX_ERROR_CODES.RUNTIME_DIVIDE_BY_ZERO);
      expect(err.message).toBe('Cannot divide by zero.');
      expect(err.span).toEqual({ start: 6, end: 11 });
    });

    it('rejects division by a fractional zero literal', () => {
      const err = runtimeError('print 1 / 0.0;');
      expect(err.code).toBe(LUX_ERROR_CODES.RUNTIME_DIVIDE_BY_ZERO);
      expect(err.message).toBe('Cannot divide by zero.');
    });

    it('rejects reading an undefined variable', () => {
      const err = runtimeError('print y;');
      expect(err.code).toBe(LUX_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE);
      expect(err.message).toBe("Undefined variable 'y'.");
      expect(err.span).toEqual({ start: 6, end: 7 });
      expect(err.context).toEqual({ name: 'y' });
    });

    it('exposes structured data for host formatting', () => {
      const err = runtimeError('print y;');
      expect(err.toData()).toEqual({
        code: 'RUNTIME_UNDEFINED_VARIABLE',
        message: "Undefined variable 'y'.",
        span: { start: 6, end: 7 },
        context: { name: 'y' },
      });
      expect(err.format()).toBe("Undefined variable 'y'.");
      expect(err.format((data) => `${data.code}: ${data.message}`)).toBe(
        "RUNTIME_UNDEFINED_VARIABLE: Undefined variable 'y'."
      );
    });

    it('rejects assigning an undefined variable', () => {
      expect(runtimeError('y = 1;').message).toBe("Undefined variable 'y'.");
    });

    it('rejects a wrong argument count', () => {
      const err = runtimeError('fun f(a) {} f(1, 2);');
      expect(err.code).toBe(LUX_ERROR_CODES.RUNTIME_ARITY_MISMATCH);
      expect(err.message).toBe('Expected 1 arguments but got 2.');
    });

    it('rejects too few arguments', () => {
      const err = runtimeError('fun add(a, b) { return a + b; } add(1);');
      expect(err.code).toBe(LUX_ERROR_CODES.RUNTIME_ARITY_MISMATCH);
      expect(err.message).toBe('Expected 2 arguments but got 1.');
    });

    it('stops at the failing statement', () => {
      const { output, result } = runLux('print 1; print nil + 1; print 2;');
      expect(output).toEqual(['1']);
      expect(result.status).toBe('runtime-error');
    });

    it('lets host stack exhaustion propagate', () => {
      expect(() => runLux('fun f(n) { return f(n + 1); } f(0);')).toThrow(
        RangeError
      );
    });
  });
});
