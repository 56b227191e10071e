/**
 * Graph Object Model
 *
 * A graph is both a data structure (nodes, typed edges, structural rules)
 * and an object type: named declarations store properties as
 * `__properties__/<name>` nodes and methods in per-name variant tables.
 * Inheritance keeps the parent graph as an owned link.
 */

import { RuntimeError, TANGLE_ERROR_CODES } from '../../types.js';
import type { FunctionValue } from './callable.js';
import {
  validateAfterRemoval,
  validateBeforeAdd,
  validateExisting,
  withRule,
  withoutRule,
  canonicalRuleName,
  type GraphOperation,
  type RuleSpec,
} from './rules.js';
import { freeze, valuesEqual, type Value } from './values.js';

export type GraphType = 'directed' | 'undirected';

export interface Edge {
  readonly edgeType: string;
  readonly weight: number | null;
}

/** Edge triple as reported by `edges()` */
export interface EdgeRecord {
  readonly from: string;
  readonly to: string;
  readonly edgeType: string;
  readonly weight: number | null;
}

/** State captured before a method call for constraint diffing */
export interface GraphSnapshot {
  readonly nodeIds: ReadonlySet<string>;
  readonly edgeCount: number;
}

export const PROPERTY_PREFIX = '__properties__/';
export const METHOD_PREFIX = '__methods__';
export const PARENT_NODE = '__parent__';
export const SELF_NODE = '__self__';

/** Bookkeeping nodes: never data, never part of constraint diffs */
function isBookkeeping(id: string): boolean {
  return id.startsWith(METHOD_PREFIX) || id === PARENT_NODE || id === SELF_NODE;
}

export function isInternalNodeId(id: string): boolean {
  return isBookkeeping(id) || id.startsWith(PROPERTY_PREFIX);
}

function frozenError(): RuntimeError {
  return new RuntimeError(
    TANGLE_ERROR_CODES.RUNTIME_FROZEN_VALUE,
    'Cannot modify frozen graph'
  );
}

export class Graph {
  readonly kind = 'graph' as const;

  private nodes = new Map<string, Value>();
  private outgoing = new Map<string, Map<string, Edge>>();
  private incoming = new Map<string, Map<string, Edge>>();
  /** Optional type label per data node, matched by `node(type: ...)` queries */
  private nodeTypes = new Map<string, string>();

  graphType: GraphType;
  /** Declared ruleset, e.g. `tree` for `graph T(:tree)` */
  ruleset: string | null = null;
  /** Type identity; set by declarations and first variable binding */
  typeName: string | null = null;
  parent: Graph | null = null;
  rules: RuleSpec[] = [];
  /** Instance methods; each name maps to guarded variants plus a fallback */
  methods = new Map<string, FunctionValue[]>();
  staticMethods = new Map<string, FunctionValue>();
  setters = new Map<string, FunctionValue>();
  frozen = false;

  constructor(graphType: GraphType = 'directed') {
    this.graphType = graphType;
  }

  /**
   * Child graph inheriting everything from `parent`. When the parent is a
   * named type the child records the link as `__self__ -inherits_from->
   * __parent__`.
   */
  static fromParent(parent: Graph): Graph {
    const child = parent.clone();
    child.frozen = false;
    child.parent = parent;
    child.typeName = null;
    if (parent.typeName !== null) {
      child.nodes.set(PARENT_NODE, parent.typeName);
      child.nodes.set(SELF_NODE, null);
      child.link(SELF_NODE, PARENT_NODE, { edgeType: 'inherits_from', weight: null });
    }
    return child;
  }

  clone(): Graph {
    const copy = new Graph(this.graphType);
    copy.nodes = new Map(this.nodes);
    copy.outgoing = cloneAdjacency(this.outgoing);
    copy.incoming = cloneAdjacency(this.incoming);
    copy.nodeTypes = new Map(this.nodeTypes);
    copy.ruleset = this.ruleset;
    copy.typeName = this.typeName;
    copy.parent = this.parent;
    copy.rules = [...this.rules];
    copy.methods = new Map(
      [...this.methods].map(([name, variants]) => [name, [...variants]])
    );
    copy.staticMethods = new Map(this.staticMethods);
    copy.setters = new Map(this.setters);
    copy.frozen = this.frozen;
    return copy;
  }

  // ============================================================
  // NODE VIEWS
  // ============================================================

  /** User data nodes, in insertion order */
  dataNodeIds(): string[] {
    return [...this.nodes.keys()].filter((id) => !isInternalNodeId(id));
  }

  /** Data nodes plus declared properties */
  constrainableNodeIds(): string[] {
    return [...this.nodes.keys()].filter((id) => !isBookkeeping(id));
  }

  dataNodeValues(): Value[] {
    return this.dataNodeIds().map((id) => this.nodes.get(id) ?? null);
  }

  nodeCount(): number {
    return this.dataNodeIds().length;
  }

  edgeCount(): number {
    return this.edges().length;
  }

  /** Edges among constrainable nodes */
  dataEdgeCount(): number {
    const ids = new Set(this.constrainableNodeIds());
    return this.edgeRecords().filter((e) => ids.has(e.from) && ids.has(e.to))
      .length;
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  getNode(id: string): Value | undefined {
    return this.nodes.get(id);
  }

  // ============================================================
  // MUTATION
  // ============================================================

  private assertMutable(): void {
    if (this.frozen) throw frozenError();
  }

  /** Insert or replace a node; edges of an existing node are kept */
  addNode(id: string, value: Value): void {
    this.assertMutable();
    validateBeforeAdd(this, { op: 'add_node', id, value }, this.rules);
    this.nodes.set(id, value);
  }

  addEdge(
    from: string,
    to: string,
    edgeType = 'edge',
    weight: number | null = null
  ): void {
    this.assertMutable();
    for (const id of [from, to]) {
      if (!this.nodes.has(id)) {
        throw new RuntimeError(
          TANGLE_ERROR_CODES.RUNTIME_INDEX_ERROR,
          `Cannot add edge: node '${id}' does not exist`
        );
      }
    }
    const operation: GraphOperation = { op: 'add_edge', from, to, edgeType, weight };
    validateBeforeAdd(this, operation, this.rules);
    this.link(from, to, { edgeType, weight });
    if (this.graphType === 'undirected' && from !== to) {
      this.link(to, from, { edgeType, weight });
    }
  }

  private link(from: string, to: string, edge: Edge): void {
    adjacency(this.outgoing, from).set(to, edge);
    adjacency(this.incoming, to).set(from, edge);
  }

  private unlink(from: string, to: string): boolean {
    const removed = this.outgoing.get(from)?.delete(to) ?? false;
    this.incoming.get(to)?.delete(from);
    return removed;
  }

  /** Remove a node and its edges; false when absent */
  removeNode(id: string): boolean {
    this.assertMutable();
    if (!this.nodes.has(id)) return false;
    this.transaction(() => {
      for (const to of [...(this.outgoing.get(id)?.keys() ?? [])]) this.unlink(id, to);
      for (const from of [...(this.incoming.get(id)?.keys() ?? [])]) this.unlink(from, id);
      this.outgoing.delete(id);
      this.incoming.delete(id);
      this.nodes.delete(id);
    });
    this.nodeTypes.delete(id);
    return true;
  }

  removeEdge(from: string, to: string): boolean {
    this.assertMutable();
    if (!this.hasEdge(from, to)) return false;
    this.transaction(() => {
      this.unlink(from, to);
      if (this.graphType === 'undirected') this.unlink(to, from);
    });
    return true;
  }

  /** Apply a removal; restore the prior structure if a rule rejects it */
  private transaction(mutate: () => void): void {
    const nodes = new Map(this.nodes);
    const outgoing = cloneAdjacency(this.outgoing);
    const incoming = cloneAdjacency(this.incoming);
    mutate();
    try {
      validateAfterRemoval(this, this.rules);
    } catch (error) {
      this.nodes = nodes;
      this.outgoing = outgoing;
      this.incoming = incoming;
      throw error;
    }
  }

  setNodeType(id: string, nodeType: string): void {
    this.assertMutable();
    if (!this.nodes.has(id)) {
      throw new RuntimeError(
        TANGLE_ERROR_CODES.RUNTIME_INDEX_ERROR,
        `Cannot set type: node '${id}' does not exist`
      );
    }
    this.nodeTypes.set(id, nodeType);
  }

  nodeType(id: string): string | null {
    return this.nodeTypes.get(id) ?? null;
  }

  hasEdge(from: string, to: string): boolean {
    return this.outgoing.get(from)?.has(to) ?? false;
  }

  getEdge(from: string, to: string): Edge | undefined {
    return this.outgoing.get(from)?.get(to);
  }

  /** Outgoing neighbors of a node */
  neighbors(id: string): string[] {
    return [...(this.outgoing.get(id)?.keys() ?? [])];
  }

  /** Nodes with an edge into `id` */
  predecessors(id: string): string[] {
    return [...(this.incoming.get(id)?.keys() ?? [])];
  }

  /** Every stored directed edge */
  private edgeRecords(): EdgeRecord[] {
    const records: EdgeRecord[] = [];
    for (const [from, targets] of this.outgoing) {
      for (const [to, edge] of targets) {
        records.push({ from, to, edgeType: edge.edgeType, weight: edge.weight });
      }
    }
    return records;
  }

  /** Data edges; an undirected edge is reported once */
  edges(): EdgeRecord[] {
    const seen = new Set<string>();
    return this.edgeRecords().filter((e) => {
      if (isInternalNodeId(e.from) || isInternalNodeId(e.to)) return false;
      if (this.graphType === 'undirected') {
        const key = [e.from, e.to].sort().join('\u0000');
        if (seen.has(key)) return false;
        seen.add(key);
      }
      return true;
    });
  }

  /** Breadth-first reachability along outgoing edges */
  hasPath(from: string, to: string): boolean {
    if (!this.nodes.has(from) || !this.nodes.has(to)) return false;
    if (from === to) return true;
    const visited = new Set([from]);
    const queue = [from];
    for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
      for (const next of this.neighbors(current)) {
        if (next === to) return true;
        if (!visited.has(next)) {
          visited.add(next);
          queue.push(next);
        }
      }
    }
    return false;
  }

  hasCycle(): boolean {
    const state = new Map<string, 'visiting' | 'done'>();
    const visit = (id: string): boolean => {
      state.set(id, 'visiting');
      for (const next of this.neighbors(id)) {
        const s = state.get(next);
        if (s === 'visiting') return true;
        if (s === undefined && visit(next)) return true;
      }
      state.set(id, 'done');
      return false;
    };
    return this.dataNodeIds().some((id) => !state.has(id) && visit(id));
  }

  /** Every data node reachable from the first, ignoring edge direction */
  isConnected(): boolean {
    const ids = this.dataNodeIds();
    const first = ids[0];
    if (first === undefined) return true;
    const visited = new Set([first]);
    const stack = [first];
    for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
      for (const next of [...this.neighbors(current), ...this.predecessors(current)]) {
        if (!visited.has(next) && !isInternalNodeId(next)) {
          visited.add(next);
          stack.push(next);
        }
      }
    }
    return visited.size === ids.length;
  }

  // ============================================================
  // PROPERTIES
  // ============================================================

  hasProperty(name: string): boolean {
    return this.nodes.has(PROPERTY_PREFIX + name);
  }

  property(name: string): Value | undefined {
    return this.nodes.get(PROPERTY_PREFIX + name);
  }

  /** Properties bypass structural rules: they are object state, not data */
  setProperty(name: string, value: Value): void {
    this.assertMutable();
    this.nodes.set(PROPERTY_PREFIX + name, value);
  }

  propertyNames(): string[] {
    return [...this.nodes.keys()]
      .filter((id) => id.startsWith(PROPERTY_PREFIX))
      .map((id) => id.slice(PROPERTY_PREFIX.length));
  }

  // ============================================================
  // METHODS
  // ============================================================

  /**
   * Register an instance method. An unguarded definition replaces the
   * existing fallback; guarded variants accumulate in declaration order.
   */
  addMethod(name: string, fn: FunctionValue): void {
    const variants = this.methods.get(name) ?? [];
    const next =
      fn.guard === null ? variants.filter((v) => v.guard !== null) : [...variants];
    next.push(fn);
    this.methods.set(name, next);
  }

  methodVariants(name: string): readonly FunctionValue[] {
    return this.methods.get(name) ?? [];
  }

  /**
   * The graph up the parent chain whose own declaration added `fn`.
   * Inherited variants are shared by reference, so the climb stops at the
   * first parent that no longer holds this exact function.
   */
  declarerOf(name: string, fn: FunctionValue): Graph {
    let owner: Graph = this;
    while (owner.parent !== null && owner.parent.methodVariants(name).includes(fn)) {
      owner = owner.parent;
    }
    return owner;
  }

  hasMethod(name: string): boolean {
    return (this.methods.get(name)?.length ?? 0) > 0;
  }

  methodNames(): string[] {
    return [...this.methods.keys()];
  }

  // ============================================================
  // RULES
  // ============================================================

  addRule(rule: RuleSpec): void {
    this.assertMutable();
    validateExisting(this, rule);
    this.rules = withRule(this.rules, rule);
  }

  removeRule(name: string, param: number | null = null): void {
    this.assertMutable();
    this.rules = withoutRule(this.rules, name, param);
  }

  hasRule(name: string): boolean {
    const canonical = canonicalRuleName(name);
    return this.rules.some((r) => r.kind === canonical);
  }

  getRule(name: string): RuleSpec | undefined {
    const canonical = canonicalRuleName(name);
    return this.rules.find((r) => r.kind === canonical);
  }

  // ============================================================
  // TYPE IDENTITY
  // ============================================================

  /** This graph's type or any ancestor's is `name` */
  isA(name: string): boolean {
    for (let g: Graph | null = this; g; g = g.parent) {
      if (g.typeName === name) return true;
    }
    return false;
  }

  /** Type names up the parent chain, nearest first */
  ancestors(): string[] {
    const names: string[] = [];
    for (let g = this.parent; g; g = g.parent) {
      if (g.typeName !== null) names.push(g.typeName);
    }
    return names;
  }

  // ============================================================
  // FREEZING, EQUALITY, SNAPSHOTS
  // ============================================================

  freezeInPlace(shallow: boolean): void {
    this.frozen = true;
    if (shallow) return;
    for (const id of this.dataNodeIds()) {
      this.nodes.set(id, freeze(this.nodes.get(id) ?? null));
    }
  }

  unfreezeInPlace(): void {
    this.frozen = false;
  }

  /** Same data nodes with equal values and the same data edges */
  structurallyEquals(other: Graph): boolean {
    const ids = this.dataNodeIds();
    const otherIds = other.dataNodeIds();
    if (ids.length !== otherIds.length) return false;
    for (const id of ids) {
      const mine = this.nodes.get(id);
      const theirs = other.nodes.get(id);
      if (mine === undefined || theirs === undefined) return false;
      if (!valuesEqual(mine, theirs)) return false;
    }
    const edges = this.edges();
    return (
      edges.length === other.edges().length &&
      edges.every((e) => {
        const match = other.getEdge(e.from, e.to);
        return match !== undefined && match.edgeType === e.edgeType;
      })
    );
  }

  snapshot(): GraphSnapshot {
    return {
      nodeIds: new Set(this.constrainableNodeIds()),
      edgeCount: this.dataEdgeCount(),
    };
  }
}

function adjacency(
  table: Map<string, Map<string, Edge>>,
  id: string
): Map<string, Edge> {
  let entry = table.get(id);
  if (!entry) {
    entry = new Map();
    table.set(id, entry);
  }
  return entry;
}

function cloneAdjacency(
  table: Map<string, Map<string, Edge>>
): Map<string, Map<string, Edge>> {
  return new Map([...table].map(([id, edges]) => [id, new Map(edges)]));
}
