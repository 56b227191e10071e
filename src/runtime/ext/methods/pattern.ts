/**
 * Properties of the `node()`, `edge()` and `path()` query pieces. Read
 * with or without parentheses: `p.variable` and `p.variable()` agree.
 *
 * @internal
 */

import {
  symbol,
  type PatternEdgeValue,
  type PatternNodeValue,
  type PatternPathValue,
  type PatternValue,
  type Value,
} from '../../core/values.js';
import { expectArgs, stringArg, type MethodTable } from './shared.js';

function noArgs<T extends PatternValue>(name: string, read: (p: T) => Value) {
  return (p: T, args: Value[]): Value => {
    expectArgs(name, args, 0);
    return read(p);
  };
}

export const PATTERN_NODE_METHODS: MethodTable<PatternNodeValue> = {
  variable: noArgs('variable', (p) => p.variable),
  type: noArgs('type', (p) => p.nodeType),
  pattern_type: noArgs('pattern_type', () => symbol('node')),

  /** Copy of the node bound to a new variable name */
  bind: (p, args, _host, location) => {
    expectArgs('bind', args, 1, 1, location);
    return { ...p, variable: stringArg('bind', args, 0, location) };
  },
};

export const PATTERN_EDGE_METHODS: MethodTable<PatternEdgeValue> = {
  edge_type: noArgs('edge_type', (p) => p.edgeType),
  direction: noArgs('direction', (p) => symbol(p.direction)),
  pattern_type: noArgs('pattern_type', () => symbol('edge')),
};

export const PATTERN_PATH_METHODS: MethodTable<PatternPathValue> = {
  edge_type: noArgs('edge_type', (p) => p.edgeType),
  min: noArgs('min', (p) => p.min),
  max: noArgs('max', (p) => p.max),
  direction: noArgs('direction', (p) => symbol(p.direction)),
  pattern_type: noArgs('pattern_type', () => symbol('path')),
};
