/**
 * Map methods. Like lists, updates return a copy and `m.set!(k, v)`
 * stores it back.
 *
 * @internal
 */

import { frozenError, mapWithEntry } from '../../core/indexing.js';
import { withRule, withoutRule } from '../../core/rules.js';
import { list, type MapValue, type Value } from '../../core/values.js';
import {
  expectArgs,
  hasRuleNamed,
  ruleFromArgs,
  ruleParamArg,
  stringArg,
  symbolArg,
  type MethodTable,
} from './shared.js';

function mutable(m: MapValue): MapValue {
  if (m.frozen) throw frozenError('map');
  return m.clone();
}

function size(m: MapValue, args: Value[]): number {
  expectArgs('size', args, 0);
  return m.entries.size;
}

export const MAP_METHODS: MethodTable<MapValue> = {
  size,
  len: size,
  length: size,

  keys: (m, args) => {
    expectArgs('keys', args, 0);
    return list([...m.entries.keys()]);
  },

  values: (m, args) => {
    expectArgs('values', args, 0);
    return list([...m.entries.values()]);
  },

  has_key: (m, args, _host, location) => {
    expectArgs('has_key', args, 1, 1, location);
    return m.entries.has(stringArg('has_key', args, 0, location));
  },

  is_empty: (m, args) => {
    expectArgs('is_empty', args, 0);
    return m.entries.size === 0;
  },

  /** `get(key[, fallback])` */
  get: (m, args, _host, location) => {
    expectArgs('get', args, 1, 2, location);
    const key = stringArg('get', args, 0, location);
    return m.entries.has(key) ? (m.entries.get(key) ?? null) : (args[1] ?? null);
  },

  set: (m, args, host, location) => {
    expectArgs('set', args, 2, 2, location);
    return mapWithEntry(m, stringArg('set', args, 0, location), args[1] ?? null, host);
  },

  remove: (m, args, _host, location) => {
    expectArgs('remove', args, 1, 1, location);
    const copy = mutable(m);
    copy.entries.delete(stringArg('remove', args, 0, location));
    return copy;
  },

  add_rule: (m, args, _host, location) => {
    const copy = mutable(m);
    copy.rules = withRule(copy.rules, ruleFromArgs('add_rule', args, location));
    return copy;
  },

  remove_rule: (m, args, _host, location) => {
    expectArgs('remove_rule', args, 1, 2, location);
    const copy = mutable(m);
    copy.rules = withoutRule(
      copy.rules,
      symbolArg('remove_rule', args, 0, location),
      ruleParamArg(args, 1, location)
    );
    return copy;
  },

  has_rule: (m, args, _host, location) => {
    expectArgs('has_rule', args, 1, 1, location);
    return hasRuleNamed(m.rules, symbolArg('has_rule', args, 0, location));
  },
};
