/**
 * Pattern Builtins
 *
 * `node()`, `edge()` and `path()` build the pieces of a `graph.match()`
 * query. Unlike other builtins they take named arguments.
 */

import type { SourceLocation } from '../../types.js';
import type { CallArgument } from '../core/callable.js';
import {
  isSymbol,
  typeName,
  type PatternDirection,
  type PatternValue,
  type Value,
} from '../core/values.js';
import { methodError } from './methods/shared.js';

export type PatternBuiltin = (
  args: readonly CallArgument[],
  location?: SourceLocation
) => PatternValue;

const DIRECTIONS: readonly PatternDirection[] = ['outgoing', 'incoming', 'both'];

/** Named arguments by name; rejects names outside `accepted` */
function namedArgs(
  fn: string,
  args: readonly CallArgument[],
  accepted: readonly string[],
  location?: SourceLocation
): Map<string, Value> {
  const named = new Map<string, Value>();
  for (const arg of args) {
    if (arg.name === null) continue;
    if (!accepted.includes(arg.name)) {
      throw methodError(`${fn}() does not accept parameter '${arg.name}'`, location);
    }
    named.set(arg.name, arg.value);
  }
  return named;
}

function noPositional(fn: string, args: readonly CallArgument[], location?: SourceLocation): void {
  if (args.some((a) => a.name === null)) {
    throw methodError(`${fn}() does not accept positional arguments`, location);
  }
}

function optionalString(
  fn: string,
  param: string,
  value: Value | undefined,
  location?: SourceLocation
): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') {
    throw methodError(`${fn}() ${param} must be a string, got ${typeName(value)}`, location);
  }
  return value;
}

function directionArg(
  fn: string,
  value: Value | undefined,
  location?: SourceLocation
): PatternDirection {
  if (value === undefined) return 'outgoing';
  if (!isSymbol(value)) {
    throw methodError(`${fn}() direction must be a symbol`, location);
  }
  const direction = DIRECTIONS.find((d) => d === value.name);
  if (direction === undefined) {
    throw methodError(
      `Invalid direction :${value.name}. Expected :outgoing, :incoming, or :both`,
      location
    );
  }
  return direction;
}

function hopCount(param: string, value: Value | undefined, location?: SourceLocation): number {
  if (value === undefined) {
    throw methodError(`path() requires '${param}' parameter`, location);
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw methodError(`path() ${param} must be a non-negative integer`, location);
  }
  return value;
}

export const PATTERN_BUILTINS: Readonly<Record<string, PatternBuiltin>> = {
  /** `node()`, `node("var")`, `node("var", type: "User")` */
  node: (args, location) => {
    const named = namedArgs('node', args, ['type'], location);
    const positional = args.filter((a) => a.name === null);
    if (positional.length > 1) {
      throw methodError(
        `node() expects at most 1 positional argument, got ${positional.length}`,
        location
      );
    }
    return {
      kind: 'pattern_node',
      variable: optionalString('node', 'variable', positional[0]?.value, location),
      nodeType: optionalString('node', 'type', named.get('type'), location),
    };
  },

  /** `edge()`, `edge(type: "FRIEND", direction: :both)` */
  edge: (args, location) => {
    noPositional('edge', args, location);
    const named = namedArgs('edge', args, ['type', 'direction'], location);
    return {
      kind: 'pattern_edge',
      edgeType: optionalString('edge', 'type', named.get('type'), location),
      direction: directionArg('edge', named.get('direction'), location),
    };
  },

  /** `path(edge_type: "FOLLOWS", min: 1, max: 3)` */
  path: (args, location) => {
    noPositional('path', args, location);
    const named = namedArgs('path', args, ['edge_type', 'min', 'max', 'direction'], location);
    const edgeType = optionalString('path', 'edge_type', named.get('edge_type'), location);
    if (edgeType === null) {
      throw methodError(`path() requires 'edge_type' parameter`, location);
    }
    const min = hopCount('min', named.get('min'), location);
    const max = hopCount('max', named.get('max'), location);
    if (min > max) {
      throw methodError(`path() min (${min}) cannot be greater than max (${max})`, location);
    }
    return {
      kind: 'pattern_path',
      edgeType,
      min,
      max,
      direction: directionArg('path', named.get('direction'), location),
    };
  },
};

export function getPatternBuiltin(name: string): PatternBuiltin | undefined {
  return Object.hasOwn(PATTERN_BUILTINS, name) ? PATTERN_BUILTINS[name] : undefined;
}
