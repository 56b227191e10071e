/**
 * Builtin method lookup by receiver kind. Kind-specific tables win over the
 * generic one, so `err.type()` reports the error type, not `"error"`.
 *
 * @internal
 */

import { isBigNum } from '../../core/numbers.js';
import type { CallHost } from '../../core/types.js';
import {
  isErrorValue,
  isGraph,
  isList,
  isMap,
  isObjectValue,
  type Value,
} from '../../core/values.js';
import type { SourceLocation } from '../../../types.js';
import { ERROR_METHODS } from './error.js';
import { GENERIC_METHODS } from './generic.js';
import { GRAPH_METHODS, GRAPH_MUTATORS } from './graph.js';
import { LIST_METHODS, LIST_STATICS } from './list.js';
import { MAP_METHODS } from './map.js';
import { BIGNUM_METHODS, NUMBER_METHODS } from './number.js';
import {
  PATTERN_EDGE_METHODS,
  PATTERN_NODE_METHODS,
  PATTERN_PATH_METHODS,
} from './pattern.js';
import { lookupMethod } from './shared.js';
import { STRING_METHODS } from './string.js';

export { GRAPH_MUTATORS, LIST_STATICS };

/** A builtin bound to its receiver */
export type BoundMethod = (args: Value[], host: CallHost, location?: SourceLocation) => Value;

function kindMethod(receiver: Value, name: string): BoundMethod | undefined {
  if (typeof receiver === 'number') {
    const method = lookupMethod(NUMBER_METHODS, name);
    return method && ((args, host, loc) => method(receiver, args, host, loc));
  }
  if (typeof receiver === 'string') {
    const method = lookupMethod(STRING_METHODS, name);
    return method && ((args, host, loc) => method(receiver, args, host, loc));
  }
  if (isBigNum(receiver)) {
    const method = lookupMethod(BIGNUM_METHODS, name);
    return method && ((args, host, loc) => method(receiver, args, host, loc));
  }
  if (isList(receiver)) {
    const method = lookupMethod(LIST_METHODS, name);
    return method && ((args, host, loc) => method(receiver, args, host, loc));
  }
  if (isMap(receiver)) {
    const method = lookupMethod(MAP_METHODS, name);
    return method && ((args, host, loc) => method(receiver, args, host, loc));
  }
  if (isGraph(receiver)) {
    const method = lookupMethod(GRAPH_METHODS, name);
    return method && ((args, host, loc) => method(receiver, args, host, loc));
  }
  if (isErrorValue(receiver)) {
    const method = lookupMethod(ERROR_METHODS, name);
    return method && ((args, host, loc) => method(receiver, args, host, loc));
  }
  if (isObjectValue(receiver) && receiver.kind === 'pattern_node') {
    const method = lookupMethod(PATTERN_NODE_METHODS, name);
    return method && ((args, host, loc) => method(receiver, args, host, loc));
  }
  if (isObjectValue(receiver) && receiver.kind === 'pattern_edge') {
    const method = lookupMethod(PATTERN_EDGE_METHODS, name);
    return method && ((args, host, loc) => method(receiver, args, host, loc));
  }
  if (isObjectValue(receiver) && receiver.kind === 'pattern_path') {
    const method = lookupMethod(PATTERN_PATH_METHODS, name);
    return method && ((args, host, loc) => method(receiver, args, host, loc));
  }
  return undefined;
}

/** Builtin `name` for `receiver`, or undefined when no table has it */
export function resolveBuiltinMethod(receiver: Value, name: string): BoundMethod | undefined {
  const specific = kindMethod(receiver, name);
  if (specific) return specific;
  const generic = lookupMethod(GENERIC_METHODS, name);
  return generic && ((args, host, loc) => generic(receiver, args, host, loc));
}
