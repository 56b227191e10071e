/**
 * Tangle Builtin Methods: Lists
 * Queries, copy-on-write updates, `!` forms, rules and list statics
 */

import { describe, expect, it } from 'vitest';
import { run, show } from '../helpers/runtime.js';

describe('Tangle Runtime: List Methods', () => {
  describe('queries', () => {
    it('compares elements structurally', () => {
      expect(show('[[[1], 2].contains([1]), [1, 2].index_of(5), [1, 2].index_of(2)]')).toBe(
        '[true, -1, 1]'
      );
    });

    it('rejects first on an empty list', () => {
      expect(() => run('[].first()')).toThrow('Cannot get first element of empty list');
    });
  });

  describe('transformations', () => {
    it('maps, filters and rejects with functions', () => {
      expect(show('[1, 2, 3].map(x => x * 10)')).toBe('[10, 20, 30]');
      expect(show('[1, 2, 3, 4].filter(x => x > 2)')).toBe('[3, 4]');
      expect(show('[1, 2, 3, 4].reject(x => x > 2)')).toBe('[1, 2]');
    });

    it('accepts named transformations and predicates', () => {
      expect(show('[1, 2, 3].map(:double)')).toBe('[2, 4, 6]');
      expect(show('[1, 2, 3, 4].filter(:even)')).toBe('[2, 4]');
      expect(show('[1, -2, 0].reject(:negative)')).toBe('[1, 0]');
    });

    it('reports unknown names and non-numbers', () => {
      expect(() => run('[1].map(:triple)')).toThrow("Unknown named transformation: 'triple'");
      expect(() => run('["a"].filter(:even)')).toThrow("Predicate 'even' requires a number, got a");
    });

    it('folds with reduce', () => {
      expect(run('[1, 2, 3, 4].reduce(0, (acc, x) => acc + x)')).toBe(10);
    });

    it('slices with negative bounds and steps', () => {
      expect(show('[1, 2, 3, 4, 5].slice(1, -1)')).toBe('[2, 3, 4]');
      expect(show('[1, 2, 3, 4, 5].slice(0, 5, 2)')).toBe('[1, 3, 5]');
      expect(() => run('[1].slice(0, 1, 0)')).toThrow('slice step must be positive');
    });

    it('sorts numbers or strings', () => {
      expect(show('[3, 1, 2].sort()')).toBe('[1, 2, 3]');
      expect(show('["b", "a"].sort()')).toBe('["a", "b"]');
      expect(() => run('[1, "a"].sort()')).toThrow(
        'sort() requires a list of numbers or a list of strings'
      );
    });

    it('joins display forms', () => {
      expect(run('[1, "a", 2.5].join("-")')).toBe('1-a-2.5');
      expect(run('configure { decimal_places: 2 }\n[1, 2].join(",")')).toBe('1.00,2.00');
    });

    it('drops duplicates and none values', () => {
      expect(show('[1, 2, 1, 3, 2].uniq()')).toBe('[1, 2, 3]');
      expect(show('[1, none, 2].compact()')).toBe('[1, 2]');
    });
  });

  describe('updates', () => {
    it('returns a new list and leaves the receiver alone', () => {
      expect(show('xs = [1]\nys = xs.append(2)\n[xs, ys]')).toBe('[[1], [1, 2]]');
    });

    it('stores the result back with the ! form', () => {
      expect(show('xs = [1]\nxs.append!(2)\nxs.prepend!(0)\nxs')).toBe('[0, 1, 2]');
    });

    it('pops the last element', () => {
      expect(show('xs = [1, 2, 3]\nlast = xs.pop!()\n[last, xs]')).toBe('[3, [1, 2]]');
      expect(() => run('xs = []\nxs.pop!()')).toThrow('Cannot pop from empty list');
    });

    it('inserts within bounds', () => {
      expect(show('[1, 3].insert(1, 2)')).toBe('[1, 2, 3]');
      expect(() => run('[1, 3].insert(5, 0)')).toThrow(
        'Index 5 out of bounds for list of length 2'
      );
    });

    it('removes by value and by position', () => {
      expect(show('[1, 2, 1].remove(1)')).toBe('[2, 1]');
      expect(show('[1, 2, 3].remove_at_index(-1)')).toBe('[1, 2]');
      expect(show('[1, 2].clear()')).toBe('[]');
    });
  });

  describe('frozen lists', () => {
    it('reports frozen state', () => {
      expect(show('xs = [1, 2].freeze()\n[xs.is_frozen(), [1].is_frozen()]')).toBe(
        '[true, false]'
      );
    });

    it('refuses updates', () => {
      expect(() => run('xs = [1, 2].freeze()\nxs.append!(3)')).toThrow(
        'Cannot modify frozen list'
      );
      expect(() => run('xs = [1, 2].freeze()\nxs.append(3)')).toThrow('Cannot modify frozen list');
    });
  });

  describe('rules', () => {
    it('rejects duplicates once the rule is added', () => {
      expect(() => run('xs = []\nxs.add_rule!(:no_duplicates)\nxs.append!(1)\nxs.append!(1)')).toThrow(
        'Value 1 already exists in collection'
      );
    });

    it('transforms inserted values', () => {
      expect(show('xs = [].add_rule(:uppercase)\nxs.append("a")')).toBe('["A"]');
      expect(
        show('xs = [].add_rule(:validate_range, 0, 10)\nxs.append!(15)\nxs.append!(-3)\nxs')
      ).toBe('[10, 0]');
    });

    it('answers to rule aliases', () => {
      expect(run('[].add_rule(:no_dups).has_rule(:no_duplicates)')).toBe(true);
    });

    it('removes rules', () => {
      expect(run('xs = [].add_rule(:uppercase)\nxs.remove_rule!(:uppercase)\nxs.has_rule(:uppercase)')).toBe(
        false
      );
    });
  });

  describe('list statics', () => {
    it('generates ranges and mapped sequences', () => {
      expect(show('list.generate(1, 10, 3)')).toBe('[1, 4, 7, 10]');
      expect(show('list.generate(1, 3, n => n * n)')).toBe('[1, 4, 9]');
      expect(show('list.upto(3)')).toBe('[0, 1, 2, 3]');
    });

    it('rejects unknown statics', () => {
      expect(() => run('list.nope()')).toThrow("list does not have static method 'nope'");
    });

    it('steps aside for a variable named list', () => {
      expect(run('list = [5]\nlist.size()')).toBe(1);
    });
  });
});
