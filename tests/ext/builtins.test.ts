/**
 * Tangle Builtin Functions
 */

import { describe, expect, it } from 'vitest';
import { output, run, show } from '../helpers/runtime.js';

describe('Tangle Runtime: Builtin Functions', () => {
  describe('print', () => {
    it('joins display forms with spaces', () => {
      expect(output('print("a", 1, [2, "b"], none)')).toEqual(['a 1 [2, "b"] none']);
    });

    it('prints one line per call', () => {
      expect(output('print(1)\nprint()\nprint(:done)')).toEqual(['1', '', ':done']);
    });
  });

  describe('len', () => {
    it('measures strings, lists and maps', () => {
      expect(show('[len("héllo"), len([1, 2]), len({"a": 1})]')).toBe('[5, 2, 1]');
    });

    it('rejects other values', () => {
      expect(() => run('len(5)')).toThrow('len() is not supported for num');
    });
  });

  describe('range', () => {
    it('counts up to an exclusive end', () => {
      expect(show('[range(3), range(2, 5), range(0, 1, 0.25)]')).toBe(
        '[[0, 1, 2], [2, 3, 4], [0, 0.25, 0.5, 0.75]]'
      );
    });

    it('yields nothing when the step points away from the end', () => {
      expect(show('range(5, 1)')).toBe('[]');
    });

    it('rejects a zero step', () => {
      expect(() => run('range(1, 2, 0)')).toThrow('range() step cannot be zero');
    });
  });

  describe('type_of', () => {
    it('names every kind of value', () => {
      expect(show('[type_of(1), type_of("a"), type_of([]), type_of({}), type_of(none), type_of(:s), type_of(true)]')).toBe(
        '["num", "string", "list", "map", "none", "symbol", "bool"]'
      );
    });

    it('names functions and errors', () => {
      expect(show('fn f() {\n}\n[type_of(f), type_of(x => x), type_of(ValueError("v"))]')).toBe(
        '["function", "function", "error"]'
      );
    });
  });

  describe('error constructors', () => {
    it('builds each error type', () => {
      const source = '[IOError("a").type(), NetworkError("b").type(), ParseError("c").type()]';
      expect(show(source)).toBe('["IOError", "NetworkError", "ParseError"]');
    });

    it('takes exactly one message', () => {
      expect(() => run('TypeError("a", "b")')).toThrow(
        'TypeError constructor expects 1 argument (message), got 2'
      );
    });
  });
});
