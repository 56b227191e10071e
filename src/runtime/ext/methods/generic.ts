/**
 * Methods every value answers to, tried before the kind-specific tables.
 *
 * @internal
 */

import { float128, isBigNum } from '../../core/numbers.js';
import {
  freeze,
  formatValue,
  hasFrozen,
  isFrozen,
  isGraph,
  isList,
  isMap,
  isSymbol,
  isTruthy,
  map,
  typeName,
  type Value,
} from '../../core/values.js';
import { expectArgs, type MethodTable } from './shared.js';

/** Number parsed from the whole string, or none */
function parseNumber(text: string): Value {
  const trimmed = text.trim();
  if (trimmed === '') return null;
  const n = Number(trimmed);
  return Number.isNaN(n) ? null : n;
}

function children(value: Value): Value[] {
  if (isList(value)) return value.items;
  if (isMap(value)) return [...value.entries.values()];
  if (isGraph(value)) return value.dataNodeValues();
  return [];
}

interface FrozenCounts {
  total: number;
  collections: number;
}

/** Frozen direct children, or every frozen descendant when `deep` */
function countFrozen(value: Value, deep: boolean, counts: FrozenCounts): void {
  for (const child of children(value)) {
    if (isFrozen(child)) {
      counts.total++;
      counts.collections++;
    }
    if (deep) countFrozen(child, deep, counts);
  }
}

export const GENERIC_METHODS: MethodTable<Value> = {
  freeze: (receiver, args) => {
    expectArgs('freeze', args, 0);
    return freeze(receiver);
  },

  is_frozen: (receiver, args) => {
    expectArgs('is_frozen', args, 0);
    return isFrozen(receiver);
  },

  /** `has_frozen()`, or `has_frozen(:count[, :deep])` for a breakdown */
  has_frozen: (receiver, args) => {
    expectArgs('has_frozen', args, 0, 2);
    const [mode, depth] = args;
    if (!(mode !== undefined && isSymbol(mode) && mode.name === 'count')) {
      return hasFrozen(receiver);
    }
    const deep = depth !== undefined && isSymbol(depth) && depth.name === 'deep';
    const counts: FrozenCounts = { total: 0, collections: 0 };
    countFrozen(receiver, deep, counts);
    return map([
      ['has_frozen', counts.total > 0],
      ['frozen_count', counts.total],
      ['frozen_collections', counts.collections],
      ['frozen_primitives', 0],
    ]);
  },

  to_num: (receiver, args) => {
    expectArgs('to_num', args, 0);
    if (receiver === null) return 0;
    if (typeof receiver === 'number') return receiver;
    if (typeof receiver === 'boolean') return receiver ? 1 : 0;
    if (typeof receiver === 'string') return parseNumber(receiver);
    if (isBigNum(receiver)) return Number(receiver.value);
    if (isList(receiver)) return receiver.items.length;
    if (isMap(receiver)) return receiver.entries.size;
    return 0;
  },

  to_bignum: (receiver, args) => {
    expectArgs('to_bignum', args, 0);
    if (typeof receiver === 'number') return float128(receiver);
    if (isBigNum(receiver)) return receiver;
    if (typeof receiver === 'string') {
      const n = parseNumber(receiver);
      return typeof n === 'number' ? float128(n) : null;
    }
    return null;
  },

  fits_in_num: (receiver, args) => {
    expectArgs('fits_in_num', args, 0);
    return isBigNum(receiver) ? Number.isFinite(Number(receiver.value)) : true;
  },

  is_bignum: (receiver, args) => {
    expectArgs('is_bignum', args, 0);
    return isBigNum(receiver);
  },

  to_string: (receiver, args, host) => {
    expectArgs('to_string', args, 0);
    if (receiver === null) return '';
    return formatValue(receiver, {
      decimalPlaces: host.ctx.config.current.decimalPlaces,
    });
  },

  to_bool: (receiver, args) => {
    expectArgs('to_bool', args, 0);
    return isTruthy(receiver);
  },

  type: (receiver, args) => {
    expectArgs('type', args, 0);
    return typeName(receiver);
  },

  type_name: (receiver, args) => {
    expectArgs('type_name', args, 0);
    return typeName(receiver);
  },
};
