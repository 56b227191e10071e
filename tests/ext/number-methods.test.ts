/**
 * Tangle Builtin Methods: Numbers and Bignums
 */

import { describe, expect, it } from 'vitest';
import { run, show } from '../helpers/runtime.js';

describe('Tangle Runtime: Number Methods', () => {
  it('takes absolute values and roots', () => {
    expect(show('n = -4.5\nm = 16\n[n.abs(), m.sqrt()]')).toBe('[4.5, 4]');
  });

  it('rounds to decimal places', () => {
    expect(show('n = 3.14159\n[n.round(2), n.up(1), n.down()]')).toBe('[3.14, 3.2, 3]');
  });

  it('rounds to tens and hundreds', () => {
    expect(show('n = 1234\n[n.round(:nearest_ten), n.up(:nearest_hundred), n.down(:nearest_hundred)]')).toBe(
      '[1230, 1300, 1200]'
    );
  });

  it('rejects unknown rounding modes', () => {
    expect(() => run('n = 5\nn.round(:nearest_mile)')).toThrow(
      'Unknown round() mode: :nearest_mile. Valid modes: :nearest_ten, :nearest_hundred'
    );
  });

  it('takes logarithms in any base', () => {
    expect(run('n = 8\nn.log(2)')).toBeCloseTo(3, 10);
    expect(run('n = 1\nn.log()')).toBe(0);
  });

  it('converts ASCII codes to characters', () => {
    expect(run('n = 65\nn.to_char()')).toBe('A');
    expect(() => run('n = 200\nn.to_char()')).toThrow(
      'Character code 200 out of ASCII range (0-127)'
    );
  });

  describe('bignums', () => {
    const big = 'configure { :extended } {\n  big = 2 ** 70\n}\n';

    it('reports bignum status', () => {
      expect(show(`${big}[big.is_bignum(), big.fits_in_num()]`)).toBe('[true, true]');
    });

    it('refuses to narrow values outside int64', () => {
      expect(() => run(`${big}big.to_int()`)).toThrow(
        'Value 1180591620717411303424 exceeds Int64 range, cannot convert to int'
      );
    });

    it('converts numbers into bignums', () => {
      expect(show('n = 2\nb = n.to_bignum()\n[b.is_bignum(), type_of(b)]')).toBe(
        '[true, "bignum"]'
      );
    });
  });
});
