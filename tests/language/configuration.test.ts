/**
 * Tangle Language Tests: Configuration
 * configure blocks, precision blocks and numeric modes
 */

import { describe, expect, it } from 'vitest';
import { output, run } from '../helpers/runtime.js';

describe('Tangle Language: Configuration', () => {
  describe('configure', () => {
    it('formats printed numbers with fixed decimal places', () => {
      expect(output('configure { decimal_places: 2 }\nprint(1 / 4)\nprint(2)')).toEqual([
        '0.25',
        '2.00',
      ]);
    });

    it('scopes settings to a block', () => {
      expect(output('configure { decimal_places: 1 } {\n  print(1 / 3)\n}\nprint(1 / 3)')).toEqual([
        '0.3',
        '0.3333333333333333',
      ]);
    });

    it('accepts entries on separate lines', () => {
      const source = [
        'configure {',
        '  error_mode: :collect',
        '  decimal_places: 0',
        '}',
        'raise "x"',
        'print(len(get_errors()))',
      ].join('\n');
      expect(output(source)).toEqual(['1']);
    });

    it('rejects unknown keys', () => {
      expect(() => run('configure { verbose: true }')).toThrow(
        'Unknown configuration key: verbose'
      );
    });

    it('rejects invalid values', () => {
      expect(() => run('configure { error_mode: :loud }')).toThrow(
        'Invalid error_mode: :loud, expected :strict, :lenient, or :collect'
      );
    });
  });

  describe('precision blocks', () => {
    it('rounds arithmetic results', () => {
      expect(run('precision 2 {\n  x = 10 / 3\n}\nx')).toBe(3.33);
    });

    it('rounds to whole numbers with :int', () => {
      expect(run('precision :int {\n  x = 10 / 3\n}\nx')).toBe(3);
    });

    it('stops rounding after the block', () => {
      expect(run('precision 1 {\n  a = 1 / 3\n}\nb = 1 / 3\nb - a')).toBeCloseTo(0.0333333, 6);
    });
  });

  describe('numeric modes', () => {
    it('computes with bignums under high precision', () => {
      expect(run('configure { :high } {\n  x = 1 / 3\n}\ntype_of(x)')).toBe('bignum');
    });

    it('keeps large integers exact under extended precision', () => {
      expect(run('configure { :extended } {\n  big = 2 ** 70\n}\nbig.to_string()')).toBe(
        '1180591620717411303424'
      );
    });

    it('truncates bound numbers in integer mode', () => {
      expect(run('configure { integer: true } {\n  n = 7 / 2\n}\nn')).toBe(3);
    });

    it('leaves standard arithmetic untouched outside the block', () => {
      expect(run('configure { integer: true } {\n}\n7 / 2')).toBe(3.5);
    });
  });
});
