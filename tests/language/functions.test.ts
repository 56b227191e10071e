/**
 * Tangle Language Tests: Functions
 * Overloads, guards, argument passing and pattern clauses
 */

import { describe, expect, it } from 'vitest';
import { run, show } from '../helpers/runtime.js';

describe('Tangle Language: Functions', () => {
  describe('declaration and return', () => {
    it('returns the value of an explicit return', () => {
      expect(run('fn square(n) {\n  return n * n\n}\nsquare(7)')).toBe(49);
    });

    it('returns none when the body finishes without return', () => {
      expect(run('fn f() {\n  1 + 1\n}\nf()')).toBeNull();
    });

    it('recurses', () => {
      const source = [
        'fn fact(n) {',
        '  if n <= 1 {',
        '    return 1',
        '  }',
        '  return n * fact(n - 1)',
        '}',
        'fact(6)',
      ].join('\n');
      expect(run(source)).toBe(720);
    });

    it('passes functions as values', () => {
      expect(run('fn twice(f, x) {\n  return f(f(x))\n}\ntwice(n => n + 3, 1)')).toBe(7);
    });
  });

  describe('overloads', () => {
    it('dispatches on argument count', () => {
      const source = [
        'fn area(s) {',
        '  return s * s',
        '}',
        'fn area(w, h) {',
        '  return w * h',
        '}',
        '[area(3), area(2, 5)]',
      ].join('\n');
      expect(show(source)).toBe('[9, 10]');
    });

    it('replaces a declaration with the same arity', () => {
      expect(run('fn f() {\n  return 1\n}\nfn f() {\n  return 2\n}\nf()')).toBe(2);
    });

    it('tries guarded overloads before the fallback', () => {
      const source = [
        'fn describe(n) {',
        '  return "non-negative"',
        '}',
        'fn describe(n) when n < 0 {',
        '  return "negative"',
        '}',
        '[describe(-1), describe(4)]',
      ].join('\n');
      expect(show(source)).toBe('["negative", "non-negative"]');
    });
  });

  describe('arguments', () => {
    it('evaluates defaults in the caller scope', () => {
      const source = [
        'fn level(value = depth) {',
        '  return value',
        '}',
        'fn outer() {',
        '  depth = 7',
        '  return level()',
        '}',
        'outer()',
      ].join('\n');
      expect(run(source)).toBe(7);
    });

    it('binds named arguments', () => {
      expect(run('fn box(w, h) {\n  return w - h\n}\nbox(h: 1, w: 5)')).toBe(4);
    });

    it('binds arguments in the order they are written', () => {
      const source = 'fn pair(a, b) {\n  return [a, b]\n}\n';
      expect(show(`${source}pair(1, b: 2)`)).toBe('[1, 2]');
      expect(show(`${source}pair(b: 1, 2)`)).toBe('[2, 1]');
      expect(() => run(`${source}pair(1, a: 2)`)).toThrow(
        "Parameter 'a' specified multiple times"
      );
    });

    it('collects extra arguments into a variadic parameter', () => {
      expect(run('fn total(first, ...rest) {\n  return first + len(rest)\n}\ntotal(10, 1, 1, 1)')).toBe(
        13
      );
    });

    it('writes a parameter back to a marked argument', () => {
      const source = 'fn bump(n) {\n  n = n + 1\n}\ncount = 1\n';
      expect(run(`${source}bump(count!)\ncount`)).toBe(2);
      expect(run(`${source}bump(count)\ncount`)).toBe(1);
    });

    it('rejects write-back of an expression', () => {
      expect(() => run('fn f(n) {\n}\nf(1 + 1!)')).toThrow(
        'Write-back argument must be a variable'
      );
    });

    it('reports arity problems', () => {
      expect(() => run('fn f(a) {\n  return a\n}\nf(1, 2)')).toThrow(
        "Too many arguments for function 'f'"
      );
      expect(() => run('fn f(a) {\n  return a\n}\nf()')).toThrow(
        "Missing required parameter 'a' in function 'f'"
      );
    });
  });

  describe('pattern clauses', () => {
    it('selects the first matching clause', () => {
      const source = [
        'fn fib(n) {',
        '  |0| => 0',
        '  |1| => 1',
        '  |n| => fib(n - 1) + fib(n - 2)',
        '}',
        'fib(10)',
      ].join('\n');
      expect(run(source)).toBe(55);
    });

    it('yields none when no clause matches', () => {
      const source = [
        'fn sign(n) {',
        '  |0| => "zero"',
        '  |n| if n > 0 => "positive"',
        '}',
        '[sign(0), sign(3), sign(-2)]',
      ].join('\n');
      expect(show(source)).toBe('["zero", "positive", none]');
    });
  });

  describe('call resolution', () => {
    it('reports unknown functions', () => {
      expect(() => run('nope(1)')).toThrow('Undefined function: nope');
    });

    it('refuses to call plain values', () => {
      expect(() => run('x = 3\nx(1)')).toThrow('Cannot call value of type num');
    });

    it('keeps builtins positional', () => {
      expect(() => run('len(value: [1])')).toThrow(
        "Builtin function 'len' does not accept named arguments"
      );
    });

    it('prefers a script function over a builtin of the same name', () => {
      expect(run('fn len(x) {\n  return -1\n}\nlen([1, 2])')).toBe(-1);
    });
  });
});
