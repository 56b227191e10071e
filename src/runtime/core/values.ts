/**
 * Tangle Value Types and Utilities
 *
 * Core value types that flow through Tangle programs.
 * Scalars are plain JS values (number, string, boolean, null for `none`);
 * containers and objects are tagged by a `kind` field.
 */

import type { FunctionValue } from './callable.js';
import type { Graph } from './graph.js';
import { formatBigNum, isBigNum, type BigNumValue } from './numbers.js';
import type { RuleSpec } from './rules.js';

/** `:name` */
export interface SymbolValue {
  readonly kind: 'symbol';
  readonly name: string;
}

/** Ordered, mutable list with optional attached rules */
export class ListValue {
  readonly kind = 'list' as const;

  constructor(
    public items: Value[] = [],
    public frozen = false,
    public rules: RuleSpec[] = []
  ) {}

  /** Copy for copy-on-mutation; keeps frozen state and rules */
  clone(): ListValue {
    return new ListValue([...this.items], this.frozen, [...this.rules]);
  }
}

/** String-keyed map preserving insertion order */
export class MapValue {
  readonly kind = 'map' as const;

  constructor(
    public entries: Map<string, Value> = new Map(),
    public frozen = false,
    public rules: RuleSpec[] = []
  ) {}

  clone(): MapValue {
    return new MapValue(new Map(this.entries), this.frozen, [...this.rules]);
  }
}

/** Namespace produced by `import` */
export class ModuleValue {
  readonly kind = 'module' as const;

  constructor(
    readonly name: string,
    readonly alias: string | null,
    readonly bindings: Map<string, Value>,
    readonly filePath: string | null,
    readonly privateSymbols: ReadonlySet<string>
  ) {}
}

/** Script-level error value: created by error constructors, bound by `catch ... as e` */
export class UserErrorValue {
  readonly kind = 'error' as const;

  constructor(
    readonly errorType: string,
    readonly message: string,
    readonly file: string | null = null,
    readonly line: number | null = null,
    readonly column: number | null = null,
    readonly callStack: readonly string[] = [],
    readonly cause: UserErrorValue | null = null
  ) {}

  /** `Type: message` */
  fullMessage(): string {
    return `${this.errorType}: ${this.message}`;
  }

  /** Full message followed by one `Caused by:` line per cause */
  fullChain(): string {
    const lines = [this.fullMessage()];
    let cause = this.cause;
    while (cause) {
      lines.push(`Caused by: ${cause.fullMessage()}`);
      cause = cause.cause;
    }
    return lines.join('\n');
  }

  withCause(cause: UserErrorValue): UserErrorValue {
    return new UserErrorValue(
      this.errorType,
      this.message,
      this.file,
      this.line,
      this.column,
      this.callStack,
      cause
    );
  }
}

/** Which way a pattern edge or path is followed from its source node */
export type PatternDirection = 'outgoing' | 'incoming' | 'both';

/** `node("person", type: "User")`: one node of a graph query */
export interface PatternNodeValue {
  readonly kind: 'pattern_node';
  /** Key the matched node id is bound to; null for an anonymous node */
  readonly variable: string | null;
  readonly nodeType: string | null;
}

/** `edge(type: "FRIEND")`: a single hop between two pattern nodes */
export interface PatternEdgeValue {
  readonly kind: 'pattern_edge';
  readonly edgeType: string | null;
  readonly direction: PatternDirection;
}

/** `path(edge_type: "FOLLOWS", min: 1, max: 3)`: between min and max hops */
export interface PatternPathValue {
  readonly kind: 'pattern_path';
  readonly edgeType: string;
  readonly min: number;
  readonly max: number;
  readonly direction: PatternDirection;
}

export type PatternValue = PatternNodeValue | PatternEdgeValue | PatternPathValue;

/** Union of all runtime values */
export type Value =
  | number
  | string
  | boolean
  | null
  | SymbolValue
  | BigNumValue
  | ListValue
  | MapValue
  | Graph
  | FunctionValue
  | ModuleValue
  | UserErrorValue
  | PatternValue;

/** Object-shaped values, discriminated by `kind` */
export type ObjectValue = Exclude<Value, number | string | boolean | null>;

export type ValueTypeName =
  | 'num'
  | 'bignum'
  | 'string'
  | 'bool'
  | 'none'
  | 'symbol'
  | 'list'
  | 'map'
  | 'graph'
  | 'function'
  | 'module'
  | 'error'
  | 'pattern_node'
  | 'pattern_edge'
  | 'pattern_path';

// ============================================================
// CONSTRUCTORS AND GUARDS
// ============================================================

export function symbol(name: string): SymbolValue {
  return { kind: 'symbol', name };
}

export function list(items: Value[] = []): ListValue {
  return new ListValue(items);
}

export function map(entries: Iterable<[string, Value]> = []): MapValue {
  return new MapValue(new Map(entries));
}

export function isObjectValue(value: Value): value is ObjectValue {
  return typeof value === 'object' && value !== null;
}

export function isSymbol(value: Value): value is SymbolValue {
  return isObjectValue(value) && value.kind === 'symbol';
}

export function isList(value: Value): value is ListValue {
  return isObjectValue(value) && value.kind === 'list';
}

export function isMap(value: Value): value is MapValue {
  return isObjectValue(value) && value.kind === 'map';
}

export function isGraph(value: Value): value is Graph {
  return isObjectValue(value) && value.kind === 'graph';
}

export function isFunction(value: Value): value is FunctionValue {
  return isObjectValue(value) && value.kind === 'function';
}

export function isModule(value: Value): value is ModuleValue {
  return isObjectValue(value) && value.kind === 'module';
}

export function isErrorValue(value: Value): value is UserErrorValue {
  return isObjectValue(value) && value.kind === 'error';
}

export function isPatternValue(value: Value): value is PatternValue {
  return (
    isObjectValue(value) &&
    (value.kind === 'pattern_node' || value.kind === 'pattern_edge' || value.kind === 'pattern_path')
  );
}

export function isPatternNode(value: Value): value is PatternNodeValue {
  return isObjectValue(value) && value.kind === 'pattern_node';
}

/** A hop between pattern nodes: an edge or a variable-length path */
export function isPatternStep(value: Value): value is PatternEdgeValue | PatternPathValue {
  return isObjectValue(value) && (value.kind === 'pattern_edge' || value.kind === 'pattern_path');
}

/** Numbers and bignums */
export function isNumeric(value: Value): value is number | BigNumValue {
  return typeof value === 'number' || isBigNum(value);
}

// ============================================================
// INSPECTION
// ============================================================

/** Script-visible type name */
export function typeName(value: Value): ValueTypeName {
  if (value === null) return 'none';
  switch (typeof value) {
    case 'number':
      return 'num';
    case 'string':
      return 'string';
    case 'boolean':
      return 'bool';
    default:
      return value.kind;
  }
}

/**
 * Truthiness: false, none, 0, "", empty list or map, and a graph
 * without data nodes are falsy. Everything else is truthy.
 */
export function isTruthy(value: Value): boolean {
  if (value === null) return false;
  switch (typeof value) {
    case 'boolean':
      return value;
    case 'number':
      return value !== 0 && !Number.isNaN(value);
    case 'string':
      return value.length > 0;
  }
  switch (value.kind) {
    case 'bignum':
      return value.repr === 'float128' ? value.value !== 0 : value.value !== 0n;
    case 'list':
      return value.items.length > 0;
    case 'map':
      return value.entries.size > 0;
    case 'graph':
      return value.nodeCount() > 0;
    default:
      return true;
  }
}

export interface FormatOptions {
  /** Fixed decimal places for numbers (from the `decimal_places` setting) */
  readonly decimalPlaces?: number | null | undefined;
}

export function formatNumber(n: number, options: FormatOptions = {}): string {
  if (Number.isNaN(n)) return 'NaN';
  if (!Number.isFinite(n)) return n > 0 ? 'inf' : '-inf';
  if (options.decimalPlaces !== undefined && options.decimalPlaces !== null) {
    return n.toFixed(options.decimalPlaces);
  }
  if (Object.is(n, -0)) return '0';
  return String(n);
}

/**
 * Display form used by `print` and string conversion.
 * Strings print raw at the top level and quoted inside containers.
 */
export function formatValue(value: Value, options: FormatOptions = {}): string {
  return format(value, options, false);
}

function format(value: Value, options: FormatOptions, nested: boolean): string {
  if (value === null) return 'none';
  switch (typeof value) {
    case 'number':
      return formatNumber(value, options);
    case 'string':
      return nested ? JSON.stringify(value) : value;
    case 'boolean':
      return value ? 'true' : 'false';
  }
  switch (value.kind) {
    case 'symbol':
      return `:${value.name}`;
    case 'bignum':
      return formatBigNum(value);
    case 'list':
      return `[${value.items.map((v) => format(v, options, true)).join(', ')}]`;
    case 'map': {
      const parts = [...value.entries].map(
        ([k, v]) => `${JSON.stringify(k)}: ${format(v, options, true)}`
      );
      return `{${parts.join(', ')}}`;
    }
    case 'graph':
      return `<graph: ${value.nodeCount()} nodes, ${value.edgeCount()} edges>`;
    case 'function':
      return value.name === null
        ? `<lambda(${value.params.map((p) => p.name).join(', ')})>`
        : `<function ${value.name}>`;
    case 'module':
      return `<module ${value.name}>`;
    case 'error':
      return value.fullMessage();
    case 'pattern_node':
    case 'pattern_edge':
    case 'pattern_path':
      return formatPattern(value);
  }
}

function formatPattern(value: PatternValue): string {
  const parts: string[] = [];
  switch (value.kind) {
    case 'pattern_node':
      if (value.variable !== null) parts.push(JSON.stringify(value.variable));
      if (value.nodeType !== null) parts.push(`type: ${JSON.stringify(value.nodeType)}`);
      return `<pattern node(${parts.join(', ')})>`;
    case 'pattern_edge':
      if (value.edgeType !== null) parts.push(`type: ${JSON.stringify(value.edgeType)}`);
      parts.push(`direction: :${value.direction}`);
      return `<pattern edge(${parts.join(', ')})>`;
    case 'pattern_path':
      return `<pattern path(edge_type: ${JSON.stringify(value.edgeType)}, min: ${value.min}, max: ${value.max}, direction: :${value.direction})>`;
  }
}

/** Text used by string concatenation and `to_string` */
export function toDisplayString(value: Value, options: FormatOptions = {}): string {
  return formatValue(value, options);
}

// ============================================================
// EQUALITY
// ============================================================

/**
 * Deep structural equality used by `==`, `contains`, `index_of` and
 * the no-duplicates rule. Numbers compare numerically across kinds.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;

  if (isNumeric(a) && isNumeric(b)) {
    return numericValue(a) === numericValue(b);
  }
  if (typeof a !== 'object' || typeof b !== 'object') return false;

  switch (a.kind) {
    case 'symbol':
      return b.kind === 'symbol' && a.name === b.name;
    case 'list':
      return (
        b.kind === 'list' &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => {
          const other = b.items[i];
          return other !== undefined && valuesEqual(item, other);
        })
      );
    case 'map': {
      if (b.kind !== 'map' || a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !valuesEqual(value, other)) return false;
      }
      return true;
    }
    case 'graph':
      return b.kind === 'graph' && a.structurallyEquals(b);
    case 'error':
      return (
        b.kind === 'error' &&
        a.errorType === b.errorType &&
        a.message === b.message
      );
    case 'pattern_node':
    case 'pattern_edge':
    case 'pattern_path':
      return isPatternValue(b) && formatPattern(a) === formatPattern(b);
    default:
      return false;
  }
}

/** Numeric value as a comparable JS value; bigints stay exact */
function numericValue(v: number | BigNumValue): number | bigint {
  if (typeof v === 'number') {
    return v;
  }
  if (v.repr === 'float128') return v.value;
  const asNumber = Number(v.value);
  return Number.isSafeInteger(asNumber) ? asNumber : v.value;
}

// ============================================================
// FREEZING
// ============================================================

/**
 * Frozen copy of a value. Scalars are immutable and come back unchanged.
 * Nested containers are frozen too unless `shallow` is set.
 */
export function freeze(value: Value, shallow = false): Value {
  if (!isObjectValue(value)) return value;
  switch (value.kind) {
    case 'list': {
      const items = shallow
        ? [...value.items]
        : value.items.map((item) => freeze(item));
      return new ListValue(items, true, [...value.rules]);
    }
    case 'map': {
      const entries = new Map<string, Value>();
      for (const [k, v] of value.entries) {
        entries.set(k, shallow ? v : freeze(v));
      }
      return new MapValue(entries, true, [...value.rules]);
    }
    case 'graph': {
      const copy = value.clone();
      copy.freezeInPlace(shallow);
      return copy;
    }
    default:
      return value;
  }
}

export function isFrozen(value: Value): boolean {
  if (!isObjectValue(value)) return false;
  switch (value.kind) {
    case 'list':
    case 'map':
    case 'graph':
      return value.frozen;
    default:
      return false;
  }
}

/** True when any element (at any depth) of a container is frozen */
export function hasFrozen(value: Value): boolean {
  if (!isObjectValue(value)) return false;
  switch (value.kind) {
    case 'list':
      return value.items.some((item) => isFrozen(item) || hasFrozen(item));
    case 'map':
      return [...value.entries.values()].some(
        (item) => isFrozen(item) || hasFrozen(item)
      );
    case 'graph':
      return value
        .dataNodeValues()
        .some((item) => isFrozen(item) || hasFrozen(item));
    default:
      return false;
  }
}

/** Recursive copy with every frozen flag cleared */
export function deepCopyUnfrozen(value: Value): Value {
  if (!isObjectValue(value)) return value;
  switch (value.kind) {
    case 'list':
      return new ListValue(
        value.items.map(deepCopyUnfrozen),
        false,
        [...value.rules]
      );
    case 'map': {
      const entries = new Map<string, Value>();
      for (const [k, v] of value.entries) entries.set(k, deepCopyUnfrozen(v));
      return new MapValue(entries, false, [...value.rules]);
    }
    case 'graph': {
      const copy = value.clone();
      copy.unfreezeInPlace();
      return copy;
    }
    default:
      return value;
  }
}
