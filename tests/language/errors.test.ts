/**
 * Tangle Language Tests: Error Handling
 * try/catch/finally, raise, error values and error modes
 */

import { describe, expect, it } from 'vitest';
import { run, show } from '../helpers/runtime.js';

describe('Tangle Language: Errors', () => {
  describe('try and catch', () => {
    it('binds the caught error', () => {
      const source = [
        'result = ""',
        'try {',
        '  raise ValueError("bad input")',
        '} catch as e {',
        '  result = e.type() + "/" + e.message()',
        '}',
        'result',
      ].join('\n');
      expect(run(source)).toBe('ValueError/bad input');
    });

    it('picks the clause matching the error type', () => {
      const source = [
        'caught = "none"',
        'try {',
        '  raise TypeError("t")',
        '} catch ValueError {',
        '  caught = "value"',
        '} catch TypeError {',
        '  caught = "type"',
        '}',
        'caught',
      ].join('\n');
      expect(run(source)).toBe('type');
    });

    it('rethrows when no clause matches', () => {
      expect(() => run('try {\n  raise "boom"\n} catch ValueError {\n}')).toThrow('boom');
    });

    it('catches runtime failures under their kind', () => {
      const source = [
        'kinds = ""',
        'try {',
        '  x = 1 / 0',
        '} catch as e {',
        '  kinds = e.full_chain()',
        '}',
        'try {',
        '  y = "a" - 1',
        '} catch as e {',
        '  kinds = kinds + "|" + e.type()',
        '}',
        'kinds',
      ].join('\n');
      expect(run(source)).toBe('RuntimeError: Division by zero|TypeError');
    });

    it('keeps the error variable inside the clause', () => {
      expect(() => run('try {\n  raise "x"\n} catch as e {\n}\ne')).toThrow(
        'Undefined variable: e'
      );
    });

    it('runs the try body in the enclosing scope', () => {
      expect(run('try {\n  made = 1\n} catch {\n}\nmade')).toBe(1);
    });
  });

  describe('finally', () => {
    it('runs when the body returns', () => {
      const source = [
        'cleanups = 0',
        'fn risky() {',
        '  try {',
        '    return "body"',
        '  } finally {',
        '    cleanups = cleanups + 1',
        '  }',
        '}',
        'r = risky()',
        '[r, cleanups]',
      ].join('\n');
      expect(show(source)).toBe('["body", 1]');
    });

    it('runs when the body raises', () => {
      const source = [
        'done = false',
        'try {',
        '  try {',
        '    raise "inner"',
        '  } finally {',
        '    done = true',
        '  }',
        '} catch {',
        '}',
        'done',
      ].join('\n');
      expect(run(source)).toBe(true);
    });
  });

  describe('raise', () => {
    it('wraps a string in a RuntimeError', () => {
      expect(run('t = ""\ntry {\n  raise "plain"\n} catch as e {\n  t = e.full_chain()\n}\nt')).toBe(
        'RuntimeError: plain'
      );
    });

    it('rejects other values', () => {
      expect(() => run('raise 5')).toThrow('raise expects an error value or a string, got num');
    });

    it('checks constructor arity', () => {
      expect(() => run('ValueError()')).toThrow(
        'ValueError constructor expects 1 argument (message), got 0'
      );
    });
  });

  describe('error values', () => {
    it('chains causes', () => {
      const source = [
        'low = IOError("disk")',
        'high = RuntimeError("save failed").caused_by(low)',
        '[high.full_chain(), high.cause().message()]',
      ].join('\n');
      expect(show(source)).toBe('["RuntimeError: save failed\\nCaused by: IOError: disk", "disk"]');
    });

    it('records where the error was built', () => {
      const source = [
        'fn fail() {',
        '  raise ValueError("deep")',
        '}',
        'trace = ""',
        'try {',
        '  fail()',
        '} catch as e {',
        '  trace = e.stack_trace()',
        '}',
        'trace',
      ].join('\n');
      expect(run(source)).toBe('  at <unknown>:2:9\n  at fail');
    });
  });

  describe('error modes', () => {
    it('collects raised errors', () => {
      const source = [
        'configure { error_mode: :collect }',
        'raise ValueError("first")',
        'raise "second"',
        'errs = get_errors()',
        '[len(errs), errs[0].type(), errs[1].message()]',
      ].join('\n');
      expect(show(source)).toBe('[2, "ValueError", "second"]');
    });

    it('clears collected errors', () => {
      expect(
        run('configure { error_mode: :collect }\nraise "a"\nclear_errors()\nlen(get_errors())')
      ).toBe(0);
    });

    it('ignores raised errors when lenient', () => {
      expect(run('configure { error_mode: :lenient }\nraise "ignored"\nlen(get_errors())')).toBe(0);
    });

    it('restores strict mode after a scoped block', () => {
      const source = 'configure { error_mode: :lenient } {\n  raise "quiet"\n}\nraise "loud"';
      expect(() => run(source)).toThrow('loud');
    });

    it('yields none for missing indexes under lenient bounds', () => {
      expect(run('configure { bounds_checking: :lenient }\n[1, 2][9]')).toBeNull();
    });
  });
});
