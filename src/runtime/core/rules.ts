/**
 * Rule Engine
 *
 * Rules attach to lists, maps and graphs. Four families:
 * - structural: checked on graph mutations, rejected mutations never land
 * - transformation: rewrite each inserted value, in declaration order
 * - freeze control: govern frozen values entering a collection
 * - method constraints: checked by diffing a graph around a method call
 */

import { RuntimeError, TANGLE_ERROR_CODES, TangleError } from '../../types.js';
import type { FunctionValue } from './callable.js';
import type { Graph } from './graph.js';
import { isBigNum } from './numbers.js';
import {
  deepCopyUnfrozen,
  formatValue,
  isFrozen,
  isTruthy,
  valuesEqual,
  type Value,
} from './values.js';

// ============================================================
// RULE SPECS
// ============================================================

export type StructuralRule =
  | { readonly kind: 'no_cycles' }
  | { readonly kind: 'single_root' }
  | { readonly kind: 'connected' }
  | { readonly kind: 'binary_tree' }
  | { readonly kind: 'no_duplicates' }
  | { readonly kind: 'max_degree'; readonly max: number }
  | { readonly kind: 'weighted_edges' }
  | { readonly kind: 'unweighted_edges' }
  | { readonly kind: 'bst_ordering' };

export type TransformRule =
  | { readonly kind: 'none_to_zero' }
  | { readonly kind: 'none_to_empty' }
  | { readonly kind: 'positive' }
  | { readonly kind: 'round_to_int' }
  | { readonly kind: 'uppercase' }
  | { readonly kind: 'lowercase' }
  | { readonly kind: 'validate_range'; readonly min: number; readonly max: number }
  | { readonly kind: 'custom_function'; readonly fn: FunctionValue }
  | {
      readonly kind: 'conditional';
      readonly predicate: FunctionValue;
      readonly transform: FunctionValue;
      readonly fallback: FunctionValue | null;
    };

export type FreezeRule =
  | { readonly kind: 'no_frozen' }
  | { readonly kind: 'copy_elements' }
  | { readonly kind: 'shallow_freeze_only' };

export type MethodConstraintRule =
  | { readonly kind: 'no_node_removals' }
  | { readonly kind: 'no_edge_removals' }
  | { readonly kind: 'read_only' }
  | {
      readonly kind: 'custom_method_constraint';
      readonly fn: FunctionValue;
      readonly name: string;
    };

export type RuleSpec =
  | StructuralRule
  | TransformRule
  | FreezeRule
  | MethodConstraintRule;

type SimpleRuleKind = Exclude<
  RuleSpec,
  | { kind: 'max_degree' }
  | { kind: 'validate_range' }
  | { kind: 'custom_function' }
  | { kind: 'conditional' }
  | { kind: 'custom_method_constraint' }
>['kind'];

const SIMPLE_RULES: Record<string, SimpleRuleKind> = {
  no_cycles: 'no_cycles',
  single_root: 'single_root',
  connected: 'connected',
  binary_tree: 'binary_tree',
  no_dups: 'no_duplicates',
  no_duplicates: 'no_duplicates',
  weighted_edges: 'weighted_edges',
  unweighted_edges: 'unweighted_edges',
  bst_ordering: 'bst_ordering',
  none_to_zero: 'none_to_zero',
  none_to_empty: 'none_to_empty',
  positive: 'positive',
  round_to_int: 'round_to_int',
  uppercase: 'uppercase',
  lowercase: 'lowercase',
  no_frozen: 'no_frozen',
  copy_elements: 'copy_elements',
  shallow_freeze_only: 'shallow_freeze_only',
  no_node_removals: 'no_node_removals',
  no_edge_removals: 'no_edge_removals',
  read_only: 'read_only',
};

function ruleError(message: string): RuntimeError {
  return new RuntimeError(TANGLE_ERROR_CODES.RUNTIME_ARGUMENT_ERROR, message);
}

function violation(message: string): RuntimeError {
  return new RuntimeError(TANGLE_ERROR_CODES.RUNTIME_RULE_VIOLATION, message);
}

/** Rule from `rule :name[, param]` or `add_rule(:name[, param])` */
export function ruleFromSymbol(name: string, param: number | null): RuleSpec {
  if (name === 'max_degree') {
    if (param === null) throw ruleError('Rule :max_degree requires a parameter');
    return { kind: 'max_degree', max: Math.trunc(param) };
  }
  const kind = SIMPLE_RULES[name];
  if (kind === undefined) {
    throw ruleError(`Unknown rule: :${name}`);
  }
  if (param !== null) {
    throw ruleError(`Rule :${name} does not accept parameters`);
  }
  return { kind };
}

/** Rules bundled by a declared graph type such as `(:tree)` */
export function rulesetRules(name: string): RuleSpec[] {
  switch (name) {
    case 'dag':
      return [{ kind: 'no_cycles' }];
    case 'tree':
      return [
        { kind: 'no_cycles' },
        { kind: 'single_root' },
        { kind: 'connected' },
      ];
    case 'binary_tree':
      return [...rulesetRules('tree'), { kind: 'max_degree', max: 2 }];
    case 'bst':
      return [...rulesetRules('binary_tree'), { kind: 'bst_ordering' }];
    default:
      return [];
  }
}

export function isRuleset(name: string): boolean {
  return ['dag', 'tree', 'binary_tree', 'bst'].includes(name);
}

/** Symbol name a rule answers to in `has_rule` / `rule` / `remove_rule` */
export function ruleName(rule: RuleSpec): string {
  return rule.kind;
}

/** Normalize a user-supplied rule name (`:no_dups` is `:no_duplicates`) */
export function canonicalRuleName(name: string): string {
  return SIMPLE_RULES[name] ?? name;
}

/** Equality used to avoid duplicate rules and to remove one */
export function sameRule(a: RuleSpec, b: RuleSpec): boolean {
  if (a.kind !== b.kind) return false;
  if (a.kind === 'max_degree' && b.kind === 'max_degree') return a.max === b.max;
  if (a.kind === 'validate_range' && b.kind === 'validate_range') {
    return a.min === b.min && a.max === b.max;
  }
  if (a.kind === 'custom_method_constraint' && b.kind === 'custom_method_constraint') {
    return a.name === b.name;
  }
  if (a.kind === 'custom_function' && b.kind === 'custom_function') {
    return a.fn === b.fn;
  }
  return true;
}

/** Append unless an identical rule is already present */
export function withRule(rules: readonly RuleSpec[], rule: RuleSpec): RuleSpec[] {
  return rules.some((r) => sameRule(r, rule)) ? [...rules] : [...rules, rule];
}

/** Remove rules named `name`; with a parameter only the matching max_degree */
export function withoutRule(
  rules: readonly RuleSpec[],
  name: string,
  param: number | null
): RuleSpec[] {
  const canonical = canonicalRuleName(name);
  return rules.filter((r) => {
    if (r.kind !== canonical) return true;
    if (param !== null && r.kind === 'max_degree') return r.max !== param;
    return false;
  });
}

export function isTransformRule(rule: RuleSpec): rule is TransformRule {
  switch (rule.kind) {
    case 'none_to_zero':
    case 'none_to_empty':
    case 'positive':
    case 'round_to_int':
    case 'uppercase':
    case 'lowercase':
    case 'validate_range':
    case 'custom_function':
    case 'conditional':
      return true;
    default:
      return false;
  }
}

export function isMethodConstraint(rule: RuleSpec): rule is MethodConstraintRule {
  return (
    rule.kind === 'no_node_removals' ||
    rule.kind === 'no_edge_removals' ||
    rule.kind === 'read_only' ||
    rule.kind === 'custom_method_constraint'
  );
}

// ============================================================
// TRANSFORMATION
// ============================================================

/** Calls back into the evaluator for rules that run user functions */
export interface RuleHost {
  callFunction(fn: FunctionValue, args: Value[]): Value;
}

function applyTransform(rule: TransformRule, value: Value, host: RuleHost): Value {
  switch (rule.kind) {
    case 'none_to_zero':
      return value === null ? 0 : value;
    case 'none_to_empty':
      return value === null ? '' : value;
    case 'positive':
      return typeof value === 'number' && value < 0 ? Math.abs(value) : value;
    case 'round_to_int':
      return typeof value === 'number' ? Math.round(value) : value;
    case 'uppercase':
      return typeof value === 'string' ? value.toUpperCase() : value;
    case 'lowercase':
      return typeof value === 'string' ? value.toLowerCase() : value;
    case 'validate_range':
      return typeof value === 'number'
        ? Math.min(Math.max(value, rule.min), rule.max)
        : value;
    case 'custom_function':
      return host.callFunction(rule.fn, [value]);
    case 'conditional':
      if (isTruthy(host.callFunction(rule.predicate, [value]))) {
        return host.callFunction(rule.transform, [value]);
      }
      return rule.fallback ? host.callFunction(rule.fallback, [value]) : value;
  }
}

/**
 * Run a value through a collection's rules before it is stored:
 * transformations in order, then freeze control.
 */
export function prepareInsert(
  rules: readonly RuleSpec[],
  value: Value,
  host: RuleHost
): Value {
  let result = value;
  for (const rule of rules) {
    if (isTransformRule(rule)) result = applyTransform(rule, result, host);
  }
  if (rules.some((r) => r.kind === 'no_frozen') && isFrozen(result)) {
    throw violation(
      'Cannot add frozen value to a collection with the :no_frozen rule'
    );
  }
  if (rules.some((r) => r.kind === 'copy_elements')) {
    result = deepCopyUnfrozen(result);
  }
  return result;
}

/** :no_duplicates for list and map insertion */
export function checkNoDuplicates(
  rules: readonly RuleSpec[],
  existing: Iterable<Value>,
  value: Value
): void {
  if (!rules.some((r) => r.kind === 'no_duplicates')) return;
  for (const item of existing) {
    if (valuesEqual(item, value)) {
      throw violation(`Value ${formatValue(value)} already exists in collection`);
    }
  }
}

/** Keep the first of each run of equal values */
export function dedupe(values: readonly Value[]): Value[] {
  const result: Value[] = [];
  for (const value of values) {
    if (!result.some((v) => valuesEqual(v, value))) result.push(value);
  }
  return result;
}

// ============================================================
// STRUCTURAL VALIDATION
// ============================================================

export type GraphOperation =
  | { readonly op: 'add_node'; readonly id: string; readonly value: Value }
  | {
      readonly op: 'add_edge';
      readonly from: string;
      readonly to: string;
      readonly edgeType: string;
      readonly weight: number | null;
    }
  | { readonly op: 'remove_node'; readonly id: string }
  | { readonly op: 'remove_edge'; readonly from: string; readonly to: string };

function numericNodeValue(graph: Graph, id: string): number | null {
  const value = graph.getNode(id);
  if (typeof value === 'number') return value;
  if (value !== undefined && value !== null && isBigNum(value)) {
    return Number(value.value);
  }
  return null;
}

/**
 * Checks that must pass before an addition is applied.
 * Called with the graph in its pre-mutation state.
 */
export function validateBeforeAdd(
  graph: Graph,
  operation: GraphOperation,
  rules: readonly RuleSpec[]
): void {
  for (const rule of rules) {
    if (operation.op === 'add_node') {
      if (rule.kind === 'no_duplicates') {
        for (const id of graph.dataNodeIds()) {
          const existing = graph.getNode(id);
          if (
            id !== operation.id &&
            existing !== undefined &&
            valuesEqual(existing, operation.value)
          ) {
            throw violation(
              `Value ${formatValue(operation.value)} already exists in collection`
            );
          }
        }
      }
      continue;
    }
    if (operation.op !== 'add_edge') continue;

    const { from, to } = operation;
    switch (rule.kind) {
      case 'no_cycles':
        if (
          graph.graphType === 'directed' &&
          (from === to || graph.hasPath(to, from))
        ) {
          throw violation(
            `Adding edge from '${from}' to '${to}' would create a cycle`
          );
        }
        break;
      case 'max_degree':
      case 'binary_tree': {
        const max = rule.kind === 'max_degree' ? rule.max : 2;
        const degree = graph.neighbors(from).length;
        if (degree >= max && !graph.hasEdge(from, to)) {
          throw violation(
            `Node '${from}' already has ${degree} edges, maximum is ${max}`
          );
        }
        break;
      }
      case 'weighted_edges':
        if (operation.weight === null) {
          throw violation(`Edge from '${from}' to '${to}' requires a weight`);
        }
        break;
      case 'unweighted_edges':
        if (operation.weight !== null) {
          throw violation(`Edge from '${from}' to '${to}' must not have a weight`);
        }
        break;
      case 'bst_ordering': {
        const parent = numericNodeValue(graph, from);
        const child = numericNodeValue(graph, to);
        if (parent === null || child === null) {
          throw violation('BST ordering requires numeric node values');
        }
        if (operation.edgeType === 'left' && !(child < parent)) {
          throw violation(
            `BST ordering violated: left child ${child} must be less than ${parent}`
          );
        }
        if (operation.edgeType === 'right' && !(child > parent)) {
          throw violation(
            `BST ordering violated: right child ${child} must be greater than ${parent}`
          );
        }
        break;
      }
      default:
        break;
    }
  }
}

/**
 * Checks on the post-removal state. The caller rolls back when this throws.
 */
export function validateAfterRemoval(
  graph: Graph,
  rules: readonly RuleSpec[]
): void {
  for (const rule of rules) {
    if (rule.kind === 'single_root') {
      const ids = graph.dataNodeIds();
      if (ids.length === 0) continue;
      const roots = ids.filter((id) => graph.predecessors(id).length === 0);
      if (roots.length === 0) {
        throw violation('Tree must have at least one root node (no incoming edges)');
      }
      if (roots.length > 1) {
        throw violation(`Tree must have exactly one root, found ${roots.length} roots`);
      }
    }
    if (rule.kind === 'connected' && !graph.isConnected()) {
      throw violation('Graph must be connected (all nodes reachable)');
    }
  }
}

/**
 * Check an existing graph against a newly added structural rule.
 * Rules that only make sense during incremental construction are not
 * checked retroactively.
 */
export function validateExisting(graph: Graph, rule: RuleSpec): void {
  switch (rule.kind) {
    case 'no_cycles':
      if (graph.graphType === 'directed' && graph.hasCycle()) {
        throw violation('Cannot add rule :no_cycles: graph already contains a cycle');
      }
      break;
    case 'max_degree':
    case 'binary_tree': {
      const max = rule.kind === 'max_degree' ? rule.max : 2;
      for (const id of graph.dataNodeIds()) {
        const degree = graph.neighbors(id).length;
        if (degree > max) {
          throw violation(`Node '${id}' has ${degree} edges, maximum is ${max}`);
        }
      }
      break;
    }
    default:
      break;
  }
}

// ============================================================
// METHOD CONSTRAINTS
// ============================================================

function constraintError(message: string): RuntimeError {
  return new RuntimeError(TANGLE_ERROR_CODES.RUNTIME_CONSTRAINT_VIOLATION, message);
}

/**
 * Compare a graph before and after a method ran against the constraint
 * rules of `before`. Throws on the first violation.
 */
export function checkMethodConstraints(
  method: string,
  before: Graph,
  after: Graph,
  host: RuleHost
): void {
  const constraints = before.rules.filter(isMethodConstraint);
  if (constraints.length === 0) return;
  const was = before.snapshot();
  const now = after.snapshot();

  for (const rule of constraints) {
    switch (rule.kind) {
      case 'read_only': {
        const sameNodes =
          was.nodeIds.size === now.nodeIds.size &&
          [...was.nodeIds].every((id) => now.nodeIds.has(id));
        if (!sameNodes || was.edgeCount !== now.edgeCount) {
          throw constraintError(
            `Method '${method}' violates :read_only constraint: graph was modified`
          );
        }
        break;
      }
      case 'no_node_removals': {
        const removed = [...was.nodeIds].filter((id) => !now.nodeIds.has(id));
        if (removed.length > 0) {
          const ids = removed.map((id) => `"${id}"`).join(', ');
          throw constraintError(
            `Method '${method}' violates :no_node_removals constraint: removed node(s) [${ids}]`
          );
        }
        break;
      }
      case 'no_edge_removals':
        if (now.edgeCount < was.edgeCount) {
          throw constraintError(
            `Method '${method}' violates :no_edge_removals constraint: edges removed`
          );
        }
        break;
      case 'custom_method_constraint': {
        let allowed: boolean;
        try {
          allowed = isTruthy(host.callFunction(rule.fn, [before, after]));
        } catch (error) {
          const reason =
            error instanceof TangleError
              ? error.detail
              : error instanceof Error
                ? error.message
                : String(error);
          throw constraintError(
            `Method '${method}': custom constraint '${rule.name}' failed: ${reason}`
          );
        }
        if (!allowed) {
          throw constraintError(
            `Method '${method}' violates custom constraint '${rule.name}': constraint returned false`
          );
        }
        break;
      }
    }
  }
}
