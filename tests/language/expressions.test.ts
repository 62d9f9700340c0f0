/**
 * Lux Language Tests: Expressions
 * Arithmetic, comparison, equality, truthiness and logical operators
 */

import { describe, expect, it } from 'vitest';
import { printed, valueOf } from '../helpers/runtime.js';

describe('Lux Language: Expressions', () => {
  describe('Arithmetic', () => {
    it('follows precedence and grouping', () => {
      expect(printed('print 1 + 2 * 3; print (1 + 2) * 3;')).toEqual(['7', '9']);
    });

    it('uses floating point division', () => {
      expect(printed('print 10 / 4;')).toEqual(['2.5']);
    });

    it('negates numbers', () => {
      expect(printed('print -3 - -2;')).toEqual(['-1']);
    });

    it('prints integral results without a fraction', () => {
      expect(printed('print 3.0; print 0.1 + 0.2;')).toEqual([
        '3',
        '0.30000000000000004',
      ]);
    });

    it('prints very large numbers in full', () => {
      expect(printed('print 1000000000000000000000; print 1 / 10000000;')).toEqual([
        '1000000000000000000000',
        '0.0000001',
      ]);
    });

    it('concatenates strings', () => {
      expect(printed('print "con" + "cat";')).toEqual(['concat']);
    });

    it('yields the value of an expression statement', () => {
      expect(valueOf('1 + 2;')).toBe(3);
    });
  });

  describe('Comparison and equality', () => {
    it('compares numbers', () => {
      expect(
        printed('print 1 < 2; print 2 <= 2; print 3 > 4; print 3 >= 4;')
      ).toEqual(['true', 'true', 'false', 'false']);
    });

    it('never equates values of different types', () => {
      expect(
        printed(
          'print 1 == 1; print "a" == "a"; print nil == nil; print 1 == "1"; print nil == false; print 1 != 2;'
        )
      ).toEqual(['true', 'true', 'true', 'false', 'false', 'true']);
    });
  });

  describe('Truthiness', () => {
    it('treats zero and the empty string as true', () => {
      expect(
        printed('if (0) print "zero"; if ("") print "empty";')
      ).toEqual(['zero', 'empty']);
    });

    it('treats nil as false', () => {
      expect(printed('if (nil) print "yes"; else print "no";')).toEqual(['no']);
    });

    it('negates by truthiness', () => {
      expect(printed('print !nil; print !0;')).toEqual(['true', 'false']);
    });
  });

  describe('Logical operators', () => {
    it('return the deciding operand', () => {
      expect(
        printed('print nil or "x"; print 1 or 2; print nil and 1; print 1 and 2;')
      ).toEqual(['x', '1', 'nil', '2']);
    });

    it('short-circuit the right operand', () => {
      const source = `
        fun boom() { print "called"; return true; }
        print false and boom();
        print true or boom();`;
      expect(printed(source)).toEqual(['false', 'true']);
    });
  });
});
