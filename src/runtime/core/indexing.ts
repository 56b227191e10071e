/**
 * Element Access
 *
 * `container[index]` reads and copy-on-write updates for lists, maps,
 * strings and graphs. Writes return a new container; the caller stores it
 * back into whatever held the original.
 */

import { RuntimeError, TANGLE_ERROR_CODES } from '../../types.js';
import { Graph, isInternalNodeId } from './graph.js';
import { isBigNum } from './numbers.js';
import { checkNoDuplicates, prepareInsert, type RuleHost } from './rules.js';
import {
  ListValue,
  MapValue,
  formatValue,
  isGraph,
  isList,
  isMap,
  typeName,
  type Value,
} from './values.js';

/** A missing element is reported, not thrown, so bounds modes can decide */
export type IndexLookup =
  | { readonly found: true; readonly value: Value }
  | { readonly found: false; readonly error: RuntimeError };

function indexError(message: string): RuntimeError {
  return new RuntimeError(TANGLE_ERROR_CODES.RUNTIME_INDEX_ERROR, message);
}

function typeError(message: string): RuntimeError {
  return new RuntimeError(TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR, message);
}

export function frozenError(kind: string): RuntimeError {
  return new RuntimeError(
    TANGLE_ERROR_CODES.RUNTIME_FROZEN_VALUE,
    `Cannot modify frozen ${kind}`
  );
}

/** Integer position from a number or integer bignum */
export function toPosition(index: Value, what = 'List index'): number {
  if (typeof index === 'number') {
    if (!Number.isInteger(index)) {
      throw typeError(`${what} must be an integer, got ${formatValue(index)}`);
    }
    return index;
  }
  if (isBigNum(index) && index.repr !== 'float128') return Number(index.value);
  throw typeError(`${what} must be a number, got ${typeName(index)}`);
}

/** Negative positions count from the end; null when out of range */
export function normalizePosition(position: number, length: number): number | null {
  const resolved = position < 0 ? length + position : position;
  return resolved >= 0 && resolved < length ? resolved : null;
}

function nodeKey(index: Value): string {
  if (typeof index !== 'string') {
    throw typeError(`Graph node id must be a string, got ${typeName(index)}`);
  }
  return index;
}

export function readIndex(container: Value, index: Value): IndexLookup {
  if (isList(container)) {
    const position = toPosition(index);
    const resolved = normalizePosition(position, container.items.length);
    const value = resolved === null ? undefined : container.items[resolved];
    if (value === undefined) {
      return {
        found: false,
        error: indexError(
          `Index ${position} out of bounds for list of length ${container.items.length}`
        ),
      };
    }
    return { found: true, value };
  }

  if (typeof container === 'string') {
    const chars = [...container];
    const position = toPosition(index, 'String index');
    const resolved = normalizePosition(position, chars.length);
    const value = resolved === null ? undefined : chars[resolved];
    if (value === undefined) {
      return {
        found: false,
        error: indexError(
          `Index ${position} out of bounds for string of length ${chars.length}`
        ),
      };
    }
    return { found: true, value };
  }

  if (isMap(container)) {
    if (typeof index !== 'string') {
      throw typeError(`Map key must be a string, got ${typeName(index)}`);
    }
    const value = container.entries.get(index);
    if (value === undefined) {
      return { found: false, error: indexError(`Map key not found: '${index}'`) };
    }
    return { found: true, value };
  }

  if (isGraph(container)) {
    const id = nodeKey(index);
    const value = isInternalNodeId(id) ? undefined : container.getNode(id);
    if (value === undefined) {
      return { found: false, error: indexError(`Node '${id}' not found in graph`) };
    }
    return { found: true, value };
  }

  throw typeError(`Cannot index into value of type ${typeName(container)}`);
}

/** Updated copy of `container` with `value` stored at `index` */
export function writeIndex(
  container: Value,
  index: Value,
  value: Value,
  host: RuleHost
): Value {
  if (isList(container)) {
    if (container.frozen) throw frozenError('list');
    const position = toPosition(index);
    const resolved = normalizePosition(position, container.items.length);
    if (resolved === null) {
      throw indexError(
        `Index ${position} out of bounds for list of length ${container.items.length}`
      );
    }
    const stored = prepareInsert(container.rules, value, host);
    checkNoDuplicates(
      container.rules,
      container.items.filter((_, i) => i !== resolved),
      stored
    );
    const copy = container.clone();
    copy.items[resolved] = stored;
    return copy;
  }

  if (isMap(container)) {
    if (container.frozen) throw frozenError('map');
    if (typeof index !== 'string') {
      throw typeError(`Map key must be a string, got ${typeName(index)}`);
    }
    return mapWithEntry(container, index, value, host);
  }

  if (isGraph(container)) {
    const id = nodeKey(index);
    if (isInternalNodeId(id)) {
      throw typeError(`Cannot assign to internal node '${id}'`);
    }
    return graphWithNode(container, id, value, host);
  }

  if (typeof container === 'string') {
    throw typeError('Strings are immutable; cannot assign by index');
  }
  throw typeError(`Cannot index into value of type ${typeName(container)}`);
}

/** Copy of `map` with `key` set, after its rules have seen the value */
export function mapWithEntry(
  map: MapValue,
  key: string,
  value: Value,
  host: RuleHost
): MapValue {
  if (map.frozen) throw frozenError('map');
  const stored = prepareInsert(map.rules, value, host);
  checkNoDuplicates(
    map.rules,
    [...map.entries].filter(([k]) => k !== key).map(([, v]) => v),
    stored
  );
  const copy = map.clone();
  copy.entries.set(key, stored);
  return copy;
}

/** Copy of `list` with `value` inserted at `position` (appends by default) */
export function listWithItem(
  list: ListValue,
  value: Value,
  host: RuleHost,
  position = list.items.length
): ListValue {
  if (list.frozen) throw frozenError('list');
  const stored = prepareInsert(list.rules, value, host);
  checkNoDuplicates(list.rules, list.items, stored);
  const copy = list.clone();
  copy.items.splice(position, 0, stored);
  return copy;
}

/** Copy of `graph` with node `id` added or replaced */
export function graphWithNode(
  graph: Graph,
  id: string,
  value: Value,
  host: RuleHost
): Graph {
  if (graph.frozen) throw frozenError('graph');
  const copy = graph.clone();
  copy.addNode(id, prepareInsert(graph.rules, value, host));
  return copy;
}
