/**
 * Tangle Builtin Methods: Maps
 */

import { describe, expect, it } from 'vitest';
import { run, show } from '../helpers/runtime.js';

describe('Tangle Runtime: Map Methods', () => {
  it('lists keys and values in insertion order', () => {
    expect(show('m = {"b": 1, a: 2}\n[m.keys(), m.values()]')).toBe('[["b", "a"], [1, 2]]');
  });

  it('reads entries with an optional fallback', () => {
    const source = 'm = {"a": 1}\n[m.get("a"), m.get("z"), m.get("z", 0), m.has_key("a")]';
    expect(show(source)).toBe('[1, none, 0, true]');
  });

  it('reports size and emptiness', () => {
    expect(show('m = {}\n[m.size(), m.is_empty(), len({"k": 1})]')).toBe('[0, true, 1]');
  });

  it('sets entries on a copy', () => {
    expect(show('m = {"a": 1}\nn = m.set("b", 2)\n[m, n]')).toBe('[{"a": 1}, {"a": 1, "b": 2}]');
  });

  it('stores updates back with the ! form', () => {
    expect(show('m = {"a": 1, "b": 2}\nm.set!("c", 3)\nm.remove!("a")\nm')).toBe(
      '{"b": 2, "c": 3}'
    );
  });

  it('refuses updates when frozen', () => {
    expect(() => run('m = {"a": 1}.freeze()\nm.set!("b", 2)')).toThrow('Cannot modify frozen map');
  });

  it('runs inserted values through its rules', () => {
    expect(run('m = {}\nm.add_rule!(:none_to_zero)\nm.set!("a", none)\nm["a"]')).toBe(0);
  });

  it('rejects duplicate values under :no_duplicates', () => {
    const source = 'm = {"a": 1}.add_rule(:no_duplicates)\nm.set!("b", 1)';
    expect(() => run(source)).toThrow('Value 1 already exists in collection');
  });

  it('allows rewriting a key with its own value', () => {
    expect(show('m = {"a": 1}.add_rule(:no_duplicates)\nm.set!("a", 1)\nm')).toBe('{"a": 1}');
  });

  it('requires string keys', () => {
    expect(() => run('m = {}\nm.get(1)')).toThrow('get() expects a string, got num');
  });
});
