/**
 * Tangle Language Tests: Control Flow
 * Branches, loops and their completions
 */

import { describe, expect, it } from 'vitest';
import { run, show } from '../helpers/runtime.js';

describe('Tangle Language: Control Flow', () => {
  describe('if', () => {
    it('chains else if branches', () => {
      const source = [
        'fn grade(n) {',
        '  if n >= 90 {',
        '    return "A"',
        '  } else if n >= 80 {',
        '    return "B"',
        '  } else {',
        '    return "C"',
        '  }',
        '}',
        '[grade(95), grade(85), grade(10)]',
      ].join('\n');
      expect(show(source)).toBe('["A", "B", "C"]');
    });

    it('accepts else on the next line', () => {
      expect(run('x = 0\nif false {\n  x = 1\n}\nelse {\n  x = 2\n}\nx')).toBe(2);
    });

    it('keeps variables first assigned inside the block', () => {
      expect(run('if true {\n  inner = 5\n}\ninner')).toBe(5);
    });
  });

  describe('while', () => {
    it('honors break and continue', () => {
      const source = [
        'total = 0',
        'i = 0',
        'while true {',
        '  i = i + 1',
        '  if i > 5 {',
        '    break',
        '  }',
        '  if i % 2 == 0 {',
        '    continue',
        '  }',
        '  total = total + i',
        '}',
        'total',
      ].join('\n');
      expect(run(source)).toBe(9);
    });

    it('breaks only the innermost loop', () => {
      const source = [
        'count = 0',
        'for a in [1, 2, 3] {',
        '  for b in [1, 2, 3] {',
        '    if b == 2 {',
        '      break',
        '    }',
        '    count = count + 1',
        '  }',
        '}',
        'count',
      ].join('\n');
      expect(run(source)).toBe(3);
    });
  });

  describe('for', () => {
    it('iterates list elements', () => {
      expect(run('sum = 0\nfor x in [1, 2, 3] {\n  sum = sum + x\n}\nsum')).toBe(6);
    });

    it('leaves the loop variable bound afterwards', () => {
      expect(run('for x in [1, 2] {\n}\nx')).toBe(2);
    });

    it('iterates map keys in insertion order', () => {
      expect(run('m = {"b": 1, "a": 2}\nout = ""\nfor k in m {\n  out = out + k\n}\nout')).toBe(
        'ba'
      );
    });

    it('iterates string characters', () => {
      expect(run('out = ""\nfor c in "abc" {\n  out = c + out\n}\nout')).toBe('cba');
    });

    it('iterates ranges', () => {
      expect(run('sum = 0\nfor i in range(4) {\n  sum = sum + i\n}\nsum')).toBe(6);
      expect(show('range(10, 0, -3)')).toBe('[10, 7, 4, 1]');
    });

    it('returns out of a loop inside a function', () => {
      const source = [
        'fn find(xs, target) {',
        '  for x in xs {',
        '    if x == target {',
        '      return "found"',
        '    }',
        '  }',
        '  return "missing"',
        '}',
        '[find([1, 2], 2), find([1, 2], 5)]',
      ].join('\n');
      expect(show(source)).toBe('["found", "missing"]');
    });

    it('rejects values that cannot be iterated', () => {
      expect(() => run('for x in 5 {\n}')).toThrow('Cannot iterate over value of type num');
    });
  });

  describe('misplaced loop signals', () => {
    it('rejects break at the top level', () => {
      expect(() => run('break')).toThrow("'break' outside of loop");
    });

    it('rejects continue in a function body', () => {
      expect(() => run('fn f() {\n  continue\n}\nf()')).toThrow(
        "'continue' outside of loop in function 'f'"
      );
    });
  });

  describe('script value', () => {
    it('is the last evaluated expression', () => {
      expect(run('1\n2\nx = 3')).toBe(2);
    });

    it('is the value of a top-level return', () => {
      expect(run('return 4\n5')).toBe(4);
    });
  });
});
