/**
 * Tangle Runtime Tests: Configuration
 * Settings changes, the scope stack and frontmatter parsing
 */

import { describe, expect, it } from 'vitest';
import { ConfigError, DEFAULT_CONFIG, list, symbol } from '../../src/index.js';
import { applyConfigChanges, ConfigStack } from '../../src/runtime/core/config.js';
import { configEntries, parseFrontmatter } from '../../src/runtime/core/frontmatter.js';

describe('Tangle Runtime: Configuration', () => {
  describe('applyConfigChanges', () => {
    it('applies each known key', () => {
      const next = applyConfigChanges(DEFAULT_CONFIG, [
        ['error_mode', symbol('collect')],
        ['bounds_checking', symbol('lenient')],
        ['decimal_places', 2.9],
        ['precision', symbol('high')],
        ['integer', true],
        ['unsigned', 1],
      ]);
      expect(next).toEqual({
        errorMode: 'collect',
        boundsChecking: 'lenient',
        decimalPlaces: 2,
        precision: 'high',
        integerMode: true,
        unsignedMode: true,
        roundingPlaces: null,
      });
    });

    it('leaves the base settings untouched', () => {
      applyConfigChanges(DEFAULT_CONFIG, [['error_mode', symbol('lenient')]]);
      expect(DEFAULT_CONFIG.errorMode).toBe('strict');
    });

    it('treats precision names as flags', () => {
      expect(applyConfigChanges(DEFAULT_CONFIG, [['extended', true]]).precision).toBe('extended');
      expect(applyConfigChanges(DEFAULT_CONFIG, [['high', false]]).precision).toBe('standard');
    });

    it('rejects unknown keys', () => {
      expect(() => applyConfigChanges(DEFAULT_CONFIG, [['verbose', true]])).toThrow(
        'Unknown configuration key: verbose'
      );
    });

    it('rejects values of the wrong kind', () => {
      expect(() => applyConfigChanges(DEFAULT_CONFIG, [['error_mode', 'strict']])).toThrow(
        'error_mode must be a symbol, got string'
      );
      expect(() =>
        applyConfigChanges(DEFAULT_CONFIG, [['error_mode', symbol('loud')]])
      ).toThrow('Invalid error_mode: :loud, expected :strict, :lenient, or :collect');
      expect(() => applyConfigChanges(DEFAULT_CONFIG, [['decimal_places', list()]])).toThrow(
        'decimal_places must be a number, got list'
      );
    });

    it('raises ConfigError with the config kind', () => {
      try {
        applyConfigChanges(DEFAULT_CONFIG, [['verbose', true]]);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        if (error instanceof ConfigError) expect(error.kind).toBe('ConfigError');
      }
    });
  });

  describe('ConfigStack', () => {
    it('scopes pushed changes', () => {
      const stack = new ConfigStack();
      stack.pushWithChanges([['error_mode', symbol('lenient')]]);
      expect(stack.current.errorMode).toBe('lenient');
      expect(stack.depth).toBe(2);
      stack.pop();
      expect(stack.current.errorMode).toBe('strict');
    });

    it('never pops the base settings', () => {
      const stack = new ConfigStack();
      stack.pop();
      stack.pop();
      expect(stack.depth).toBe(1);
      expect(stack.current).toBe(DEFAULT_CONFIG);
    });

    it('replaces the active settings in place', () => {
      const stack = new ConfigStack();
      stack.replaceCurrent([['decimal_places', 3]]);
      expect(stack.depth).toBe(1);
      expect(stack.current.decimalPlaces).toBe(3);
    });

    it('pushes a rounding scope', () => {
      const stack = new ConfigStack();
      stack.pushRounding(2);
      expect(stack.current.roundingPlaces).toBe(2);
      stack.pop();
      expect(stack.current.roundingPlaces).toBeNull();
    });

    it('reports the numeric mode', () => {
      const stack = new ConfigStack();
      stack.pushWithChanges([
        ['precision', symbol('high')],
        ['integer', true],
      ]);
      expect(stack.numericMode()).toEqual({
        precision: 'high',
        integerMode: true,
        unsignedMode: false,
      });
    });
  });

  describe('parseFrontmatter', () => {
    it('reads module, alias and config', () => {
      const fm = parseFrontmatter(
        'module: geometry\nalias: geo\nconfig:\n  error_mode: collect\n  decimal_places: 2'
      );
      expect(fm.module).toBe('geometry');
      expect(fm.alias).toBe('geo');
      expect(fm.config).toEqual([
        ['error_mode', symbol('collect')],
        ['decimal_places', 2],
      ]);
    });

    it('returns empty frontmatter for blank text', () => {
      expect(parseFrontmatter(null)).toEqual({ module: null, alias: null, config: [] });
      expect(parseFrontmatter('  \n')).toEqual({ module: null, alias: null, config: [] });
    });

    it('ignores non-string names', () => {
      expect(parseFrontmatter('module: 3').module).toBeNull();
    });

    it('rejects malformed documents', () => {
      expect(() => parseFrontmatter('a: [1')).toThrow('Invalid frontmatter:');
      expect(() => parseFrontmatter('- a\n- b')).toThrow('Frontmatter must be a YAML mapping');
      expect(() => parseFrontmatter('config: [1]')).toThrow(
        'Frontmatter config must be a mapping'
      );
    });
  });

  describe('configEntries', () => {
    it('strips a leading colon from symbol strings', () => {
      expect(configEntries({ error_mode: ':lenient', integer: true })).toEqual([
        ['error_mode', symbol('lenient')],
        ['integer', true],
      ]);
    });

    it('rejects nested values', () => {
      expect(() => configEntries({ error_mode: { a: 1 } })).toThrow(
        "Invalid value for config key 'error_mode' in frontmatter"
      );
    });

    it('treats a missing section as empty', () => {
      expect(configEntries(undefined)).toEqual([]);
      expect(configEntries(null)).toEqual([]);
    });
  });
});
