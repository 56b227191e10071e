/**
 * Argument helpers shared by the builtin method tables.
 *
 * @internal
 */

import type { SourceLocation } from '../../../types.js';
import { RuntimeError, TANGLE_ERROR_CODES } from '../../../types.js';
import type { FunctionValue } from '../../core/callable.js';
import { toPosition } from '../../core/indexing.js';
import {
  canonicalRuleName,
  ruleFromSymbol,
  type RuleSpec,
} from '../../core/rules.js';
import {
  isFunction,
  isSymbol,
  typeName,
  type Value,
} from '../../core/values.js';
import type { BuiltinMethod } from '../../core/types.js';

/** Builtin methods for one kind of receiver, by name */
export type MethodTable<T extends Value> = Readonly<Record<string, BuiltinMethod<T>>>;

/** Own entries only: `toString` and friends are not methods */
export function lookupMethod<T extends Value>(
  table: MethodTable<T>,
  name: string
): BuiltinMethod<T> | undefined {
  return Object.hasOwn(table, name) ? table[name] : undefined;
}

export function methodError(message: string, location?: SourceLocation): RuntimeError {
  return new RuntimeError(TANGLE_ERROR_CODES.RUNTIME_ARGUMENT_ERROR, message, location);
}

function typeError(message: string, location?: SourceLocation): RuntimeError {
  return new RuntimeError(TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR, message, location);
}

function plural(n: number): string {
  return n === 1 ? 'argument' : 'arguments';
}

/** Arity check: `Method 'm' expects 1 argument, but got 2` */
export function expectArgs(
  method: string,
  args: readonly Value[],
  min: number,
  max: number = min,
  location?: SourceLocation
): void {
  if (args.length >= min && args.length <= max) return;
  const expected =
    min === max ? `${min} ${plural(min)}` : `${min} to ${max} arguments`;
  throw methodError(
    `Method '${method}' expects ${expected}, but got ${args.length}`,
    location
  );
}

function arg(args: readonly Value[], index: number): Value {
  return args[index] ?? null;
}

export function stringArg(
  method: string,
  args: readonly Value[],
  index: number,
  location?: SourceLocation
): string {
  const value = arg(args, index);
  if (typeof value !== 'string') {
    throw typeError(`${method}() expects a string, got ${typeName(value)}`, location);
  }
  return value;
}

export function numberArg(
  method: string,
  args: readonly Value[],
  index: number,
  location?: SourceLocation
): number {
  const value = arg(args, index);
  if (typeof value !== 'number') {
    throw typeError(`${method}() expects a number, got ${typeName(value)}`, location);
  }
  return value;
}

/** Integer position; accepts integer bignums */
export function positionArg(method: string, args: readonly Value[], index: number): number {
  return toPosition(arg(args, index), `${method}() index`);
}

export function functionArg(
  method: string,
  args: readonly Value[],
  index: number,
  location?: SourceLocation
): FunctionValue {
  const value = arg(args, index);
  if (!isFunction(value)) {
    throw typeError(`${method}() expects a function, got ${typeName(value)}`, location);
  }
  return value;
}

export function symbolArg(
  method: string,
  args: readonly Value[],
  index: number,
  location?: SourceLocation
): string {
  const value = arg(args, index);
  if (!isSymbol(value)) {
    throw typeError(`${method}() expects a symbol, got ${typeName(value)}`, location);
  }
  return value.name;
}

/** Optional numeric rule parameter: `add_rule(:max_degree, 3)` */
export function ruleParamArg(
  args: readonly Value[],
  index: number,
  location?: SourceLocation
): number | null {
  const value = arg(args, index);
  if (value === null) return null;
  if (typeof value !== 'number') {
    throw typeError(`Rule parameter must be a number, got ${typeName(value)}`, location);
  }
  return value;
}

/**
 * Rule named by `add_rule` arguments:
 * - `(:name[, param])` for symbol rules
 * - `(:validate_range, min, max)`
 * - `(fn)` for a custom transform, `(predicate, transform[, fallback])` for a conditional one
 */
export function ruleFromArgs(
  method: string,
  args: readonly Value[],
  location?: SourceLocation
): RuleSpec {
  expectArgs(method, args, 1, 3, location);
  if (isFunction(args[0] ?? null)) {
    if (args.length === 1) {
      return { kind: 'custom_function', fn: functionArg(method, args, 0, location) };
    }
    return {
      kind: 'conditional',
      predicate: functionArg(method, args, 0, location),
      transform: functionArg(method, args, 1, location),
      fallback: args.length === 3 ? functionArg(method, args, 2, location) : null,
    };
  }
  const name = symbolArg(method, args, 0, location);
  if (name === 'validate_range') {
    expectArgs(method, args, 3, 3, location);
    return {
      kind: 'validate_range',
      min: numberArg(method, args, 1, location),
      max: numberArg(method, args, 2, location),
    };
  }
  expectArgs(method, args, 1, 2, location);
  return ruleFromSymbol(name, ruleParamArg(args, 1, location));
}

export function hasRuleNamed(rules: readonly RuleSpec[], name: string): boolean {
  const canonical = canonicalRuleName(name);
  return rules.some((rule) => rule.kind === canonical);
}
