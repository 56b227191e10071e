/**
 * List methods. Mutators (`append`, `insert`, `remove`, ...) return an
 * updated copy; the `!` form stores it back into the receiver variable.
 * Insertions go through the list's rules.
 *
 * @internal
 */

import type { SourceLocation } from '../../../types.js';
import type { CallHost } from '../../core/types.js';
import { frozenError, listWithItem, normalizePosition } from '../../core/indexing.js';
import { dedupe, withRule, withoutRule } from '../../core/rules.js';
import {
  formatValue,
  isFunction,
  isSymbol,
  isTruthy,
  list,
  valuesEqual,
  ListValue,
  type Value,
} from '../../core/values.js';
import {
  expectArgs,
  functionArg,
  hasRuleNamed,
  methodError,
  numberArg,
  positionArg,
  ruleFromArgs,
  ruleParamArg,
  stringArg,
  symbolArg,
  type MethodTable,
} from './shared.js';

const TRANSFORMS: Readonly<Record<string, (n: number) => number>> = {
  double: (n) => n * 2,
  square: (n) => n * n,
  negate: (n) => -n,
  increment: (n) => n + 1,
  inc: (n) => n + 1,
  decrement: (n) => n - 1,
  dec: (n) => n - 1,
};

const PREDICATES: Readonly<Record<string, (n: number) => boolean>> = {
  even: (n) => n % 2 === 0,
  odd: (n) => Math.abs(n % 2) === 1,
  positive: (n) => n > 0,
  pos: (n) => n > 0,
  negative: (n) => n < 0,
  neg: (n) => n < 0,
  zero: (n) => n === 0,
};

function namedTransform(name: string, value: Value, location?: SourceLocation): Value {
  const transform = Object.hasOwn(TRANSFORMS, name) ? TRANSFORMS[name] : undefined;
  if (transform === undefined) {
    throw methodError(`Unknown named transformation: '${name}'`, location);
  }
  if (typeof value !== 'number') {
    throw methodError(`Transformation '${name}' requires a number, got ${formatValue(value)}`, location);
  }
  return transform(value);
}

function namedPredicate(name: string, value: Value, location?: SourceLocation): boolean {
  const predicate = Object.hasOwn(PREDICATES, name) ? PREDICATES[name] : undefined;
  if (predicate === undefined) {
    throw methodError(`Unknown named predicate: '${name}'`, location);
  }
  if (typeof value !== 'number') {
    throw methodError(`Predicate '${name}' requires a number, got ${formatValue(value)}`, location);
  }
  return predicate(value);
}

/** `map(fn)` or `map(:double)` */
function mapper(
  args: Value[],
  host: CallHost,
  location?: SourceLocation
): (item: Value) => Value {
  const [arg] = args;
  if (arg !== undefined && isSymbol(arg)) {
    return (item) => namedTransform(arg.name, item, location);
  }
  const fn = functionArg('map', args, 0, location);
  return (item) => host.callFunction(fn, [item]);
}

/** `filter(fn)` or `filter(:even)` */
function predicate(
  method: string,
  args: Value[],
  host: CallHost,
  location?: SourceLocation
): (item: Value) => boolean {
  const [arg] = args;
  if (arg !== undefined && isSymbol(arg)) {
    return (item) => namedPredicate(arg.name, item, location);
  }
  const fn = functionArg(method, args, 0, location);
  return (item) => isTruthy(host.callFunction(fn, [item]));
}

/** Copy for a structural change that bypasses insertion rules */
function mutable(xs: ListValue): ListValue {
  if (xs.frozen) throw frozenError('list');
  return xs.clone();
}

function compareForSort(a: Value, b: Value, location?: SourceLocation): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  throw methodError('sort() requires a list of numbers or a list of strings', location);
}

function size(xs: ListValue, args: Value[]): number {
  expectArgs('size', args, 0);
  return xs.items.length;
}

export const LIST_METHODS: MethodTable<ListValue> = {
  size,
  length: size,
  len: size,

  is_empty: (xs, args) => {
    expectArgs('is_empty', args, 0);
    return xs.items.length === 0;
  },

  first: (xs, args, _host, location) => {
    expectArgs('first', args, 0);
    const [head] = xs.items;
    if (head === undefined) throw methodError('Cannot get first element of empty list', location);
    return head;
  },

  last: (xs, args, _host, location) => {
    expectArgs('last', args, 0);
    const tail = xs.items[xs.items.length - 1];
    if (tail === undefined) throw methodError('Cannot get last element of empty list', location);
    return tail;
  },

  contains: (xs, args, _host, location) => {
    expectArgs('contains', args, 1, 1, location);
    const [needle = null] = args;
    return xs.items.some((item) => valuesEqual(item, needle));
  },

  index_of: (xs, args, _host, location) => {
    expectArgs('index_of', args, 1, 1, location);
    const [needle = null] = args;
    return xs.items.findIndex((item) => valuesEqual(item, needle));
  },

  map: (xs, args, host, location) => {
    expectArgs('map', args, 1, 1, location);
    return list(xs.items.map(mapper(args, host, location)));
  },

  filter: (xs, args, host, location) => {
    expectArgs('filter', args, 1, 1, location);
    return list(xs.items.filter(predicate('filter', args, host, location)));
  },

  select: (xs, args, host, location) => {
    expectArgs('select', args, 1, 1, location);
    return list(xs.items.filter(predicate('select', args, host, location)));
  },

  reject: (xs, args, host, location) => {
    expectArgs('reject', args, 1, 1, location);
    const keep = predicate('reject', args, host, location);
    return list(xs.items.filter((item) => !keep(item)));
  },

  each: (xs, args, host, location) => {
    expectArgs('each', args, 1, 1, location);
    const fn = functionArg('each', args, 0, location);
    for (const item of xs.items) host.callFunction(fn, [item]);
    return xs;
  },

  reduce: (xs, args, host, location) => {
    expectArgs('reduce', args, 2, 2, location);
    const fn = functionArg('reduce', args, 1, location);
    let accumulator = args[0] ?? null;
    for (const item of xs.items) accumulator = host.callFunction(fn, [accumulator, item]);
    return accumulator;
  },

  /** Negative bounds count from the end; both clamp to the list */
  slice: (xs, args, _host, location) => {
    expectArgs('slice', args, 2, 3, location);
    const length = xs.items.length;
    const clamp = (n: number): number => (n < 0 ? Math.max(length + n, 0) : Math.min(n, length));
    const start = clamp(positionArg('slice', args, 0));
    const end = clamp(positionArg('slice', args, 1));
    const step = args.length === 3 ? positionArg('slice', args, 2) : 1;
    if (step <= 0) throw methodError('slice step must be positive', location);
    const result: Value[] = [];
    for (let i = start; i < end; i += step) result.push(xs.items[i] ?? null);
    return list(result);
  },

  sort: (xs, args, _host, location) => {
    expectArgs('sort', args, 0);
    const copy = xs.clone();
    copy.items.sort((a, b) => compareForSort(a, b, location));
    return copy;
  },

  reverse: (xs, args) => {
    expectArgs('reverse', args, 0);
    const copy = xs.clone();
    copy.items.reverse();
    return copy;
  },

  join: (xs, args, host, location) => {
    expectArgs('join', args, 0, 1, location);
    const separator = args.length === 1 ? stringArg('join', args, 0, location) : '';
    const decimalPlaces = host.ctx.config.current.decimalPlaces;
    return xs.items
      .map((item) => (typeof item === 'string' ? item : formatValue(item, { decimalPlaces })))
      .join(separator);
  },

  uniq: (xs, args) => {
    expectArgs('uniq', args, 0);
    return list(dedupe(xs.items));
  },

  compact: (xs, args) => {
    expectArgs('compact', args, 0);
    return list(xs.items.filter((item) => item !== null));
  },

  append: (xs, args, host, location) => {
    expectArgs('append', args, 1, 1, location);
    return listWithItem(xs, args[0] ?? null, host);
  },

  prepend: (xs, args, host, location) => {
    expectArgs('prepend', args, 1, 1, location);
    return listWithItem(xs, args[0] ?? null, host, 0);
  },

  insert: (xs, args, host, location) => {
    expectArgs('insert', args, 2, 2, location);
    const position = positionArg('insert', args, 0);
    if (position < 0 || position > xs.items.length) {
      throw methodError(
        `Index ${position} out of bounds for list of length ${xs.items.length}`,
        location
      );
    }
    return listWithItem(xs, args[1] ?? null, host, position);
  },

  /** First equal element; the list is unchanged when there is none */
  remove: (xs, args, _host, location) => {
    expectArgs('remove', args, 1, 1, location);
    const [needle = null] = args;
    const copy = mutable(xs);
    const at = copy.items.findIndex((item) => valuesEqual(item, needle));
    if (at >= 0) copy.items.splice(at, 1);
    return copy;
  },

  remove_at_index: (xs, args, _host, location) => {
    expectArgs('remove_at_index', args, 1, 1, location);
    const position = positionArg('remove_at_index', args, 0);
    const resolved = normalizePosition(position, xs.items.length);
    if (resolved === null) {
      throw methodError(
        `Index ${position} out of bounds for list of length ${xs.items.length}`,
        location
      );
    }
    const copy = mutable(xs);
    copy.items.splice(resolved, 1);
    return copy;
  },

  /** Last element; `xs.pop!()` also drops it from `xs` */
  pop: (xs, args, _host, location) => {
    expectArgs('pop', args, 0);
    const tail = xs.items[xs.items.length - 1];
    if (tail === undefined) throw methodError('Cannot pop from empty list', location);
    return tail;
  },

  clear: (xs, args) => {
    expectArgs('clear', args, 0);
    const copy = mutable(xs);
    copy.items = [];
    return copy;
  },

  add_rule: (xs, args, _host, location) => {
    const copy = mutable(xs);
    copy.rules = withRule(copy.rules, ruleFromArgs('add_rule', args, location));
    return copy;
  },

  remove_rule: (xs, args, _host, location) => {
    expectArgs('remove_rule', args, 1, 2, location);
    const copy = mutable(xs);
    copy.rules = withoutRule(
      copy.rules,
      symbolArg('remove_rule', args, 0, location),
      ruleParamArg(args, 1, location)
    );
    return copy;
  },

  has_rule: (xs, args, _host, location) => {
    expectArgs('has_rule', args, 1, 1, location);
    return hasRuleNamed(xs.rules, symbolArg('has_rule', args, 0, location));
  },
};

/** `list.generate(start, end, step | fn)` and `list.upto(n)` */
export const LIST_STATICS: Readonly<
  Record<string, (args: Value[], host: CallHost, location?: SourceLocation) => Value>
> = {
  generate: (args, host, location) => {
    expectArgs('list.generate', args, 3, 3, location);
    const start = numberArg('list.generate', args, 0, location);
    const end = numberArg('list.generate', args, 1, location);
    const [, , third = null] = args;
    const items: Value[] = [];
    if (isFunction(third)) {
      for (let i = Math.trunc(start); i <= Math.trunc(end); i++) {
        items.push(host.callFunction(third, [i]));
      }
      return list(items);
    }
    const step = numberArg('list.generate', args, 2, location);
    if (step === 0) throw methodError('generate step cannot be zero', location);
    for (let n = start; step > 0 ? n <= end : n >= end; n += step) items.push(n);
    return list(items);
  },

  upto: (args, _host, location) => {
    expectArgs('list.upto', args, 1, 1, location);
    const n = Math.trunc(numberArg('list.upto', args, 0, location));
    return list(Array.from({ length: Math.max(n + 1, 0) }, (_, i) => i));
  },
};
