/**
 * Number and bignum methods.
 *
 * @internal
 */

import type { SourceLocation } from '../../../types.js';
import {
  bigInteger,
  fixedInteger,
  inRange,
  type BigNumValue,
} from '../../core/numbers.js';
import { isSymbol, typeName, type Value } from '../../core/values.js';
import { expectArgs, methodError, numberArg, type MethodTable } from './shared.js';

type Rounder = (n: number) => number;

/**
 * `up`, `down` and `round` share their argument forms: none (to an
 * integer), decimal places, or `:nearest_ten` / `:nearest_hundred`.
 */
function rounding(name: string, round: Rounder) {
  return (n: number, args: Value[], location?: SourceLocation): number => {
    expectArgs(name, args, 0, 1, location);
    const [mode] = args;
    if (mode === undefined) return round(n);
    if (typeof mode === 'number') {
      const factor = 10 ** Math.trunc(mode);
      return round(n * factor) / factor;
    }
    if (isSymbol(mode)) {
      if (mode.name === 'nearest_ten') return round(n / 10) * 10;
      if (mode.name === 'nearest_hundred') return round(n / 100) * 100;
      throw methodError(
        `Unknown ${name}() mode: :${mode.name}. Valid modes: :nearest_ten, :nearest_hundred`,
        location
      );
    }
    throw methodError(
      `${name}() argument must be a number (decimal places) or symbol (mode), got ${typeName(mode)}`,
      location
    );
  };
}

const roundUp = rounding('up', Math.ceil);
const roundDown = rounding('down', Math.floor);
const roundNearest = rounding('round', Math.round);

export const NUMBER_METHODS: MethodTable<number> = {
  abs: (n, args) => {
    expectArgs('abs', args, 0);
    return Math.abs(n);
  },

  sqrt: (n, args) => {
    expectArgs('sqrt', args, 0);
    return Math.sqrt(n);
  },

  up: (n, args, _host, location) => roundUp(n, args, location),
  down: (n, args, _host, location) => roundDown(n, args, location),
  round: (n, args, _host, location) => roundNearest(n, args, location),

  /** Natural log, or `log(base)` */
  log: (n, args, _host, location) => {
    expectArgs('log', args, 0, 1, location);
    if (args.length === 0) return Math.log(n);
    return Math.log(n) / Math.log(numberArg('log', args, 0, location));
  },

  to_char: (n, args, _host, location) => {
    expectArgs('to_char', args, 0);
    const code = Math.trunc(n);
    if (code < 0 || code > 127) {
      throw methodError(`Character code ${code} out of ASCII range (0-127)`, location);
    }
    return String.fromCharCode(code);
  },
};

function integerPart(value: BigNumValue, location?: SourceLocation): bigint {
  if (value.repr !== 'float128') return value.value;
  if (!Number.isFinite(value.value)) {
    throw methodError('Float128 value is not finite, cannot convert to an integer', location);
  }
  return BigInt(Math.trunc(value.value));
}

export const BIGNUM_METHODS: MethodTable<BigNumValue> = {
  /** Convert to a fixed-width int64 */
  to_int: (value, args, _host, location) => {
    expectArgs('to_int', args, 0);
    const n = integerPart(value, location);
    if (!inRange('int64', n)) {
      throw methodError(`Value ${n} exceeds Int64 range, cannot convert to int`, location);
    }
    return fixedInteger('int64', n);
  },

  to_bigint: (value, args, _host, location) => {
    expectArgs('to_bigint', args, 0);
    return bigInteger(integerPart(value, location));
  },
};
