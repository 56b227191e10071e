/**
 * Graph builtins. Queries read the receiver; the mutators listed in
 * GRAPH_MUTATORS change it in place, so the dispatcher hands them a copy
 * and stores that copy back into the receiver expression.
 *
 * @internal
 */

import { RuntimeError, TANGLE_ERROR_CODES, type SourceLocation } from '../../../types.js';
import { isInternalNodeId, type Graph } from '../../core/graph.js';
import { matchGraph, type QueryStep } from '../../core/graph-query.js';
import { prepareInsert } from '../../core/rules.js';
import {
  isGraph,
  isPatternNode,
  isPatternStep,
  list,
  map,
  typeName,
  type PatternNodeValue,
  type Value,
} from '../../core/values.js';
import {
  expectArgs,
  functionArg,
  methodError,
  numberArg,
  ruleFromArgs,
  ruleParamArg,
  stringArg,
  symbolArg,
  type MethodTable,
} from './shared.js';

export const GRAPH_MUTATORS: ReadonlySet<string> = new Set([
  'add_node',
  'add_edge',
  'remove_node',
  'remove_edge',
  'add_rule',
  'remove_rule',
  'add_method_constraint',
  'set_node_type',
]);

function nodeIdArg(
  method: string,
  args: readonly Value[],
  index: number,
  location?: SourceLocation
): string {
  const id = stringArg(method, args, index, location);
  if (isInternalNodeId(id)) {
    throw new RuntimeError(
      TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
      `Node id '${id}' is reserved`,
      location
    );
  }
  return id;
}

/** `node, step, node, ...`: split into pattern nodes and the steps between them */
function queryArgs(
  args: readonly Value[],
  location?: SourceLocation
): { nodes: PatternNodeValue[]; steps: QueryStep[] } {
  if (args.length === 0) {
    throw methodError('match() requires at least one pattern node', location);
  }
  const nodes: PatternNodeValue[] = [];
  const steps: QueryStep[] = [];
  args.forEach((arg, i) => {
    if (i % 2 === 0) {
      if (!isPatternNode(arg)) {
        throw methodError(
          `match() argument ${i} should be a pattern node, got ${typeName(arg)}`,
          location
        );
      }
      nodes.push(arg);
    } else {
      if (!isPatternStep(arg)) {
        throw methodError(
          `match() argument ${i} should be a pattern edge or path, got ${typeName(arg)}`,
          location
        );
      }
      steps.push(arg);
    }
  });
  if (steps.length === nodes.length) {
    throw methodError('match() pattern must end with a node', location);
  }
  return { nodes, steps };
}

function count(read: (g: Graph) => number, name: string) {
  return (g: Graph, args: Value[]): Value => {
    expectArgs(name, args, 0);
    return read(g);
  };
}

export const GRAPH_METHODS: MethodTable<Graph> = {
  // ------------------------------------------------------------
  // Mutators
  // ------------------------------------------------------------

  add_node: (g, args, host, location) => {
    expectArgs('add_node', args, 2, 2, location);
    const id = nodeIdArg('add_node', args, 0, location);
    g.addNode(id, prepareInsert(g.rules, args[1] ?? null, host));
    return null;
  },

  /** `add_edge(from, to, type = "edge", weight?)` */
  add_edge: (g, args, _host, location) => {
    expectArgs('add_edge', args, 2, 4, location);
    const from = nodeIdArg('add_edge', args, 0, location);
    const to = nodeIdArg('add_edge', args, 1, location);
    const edgeType = args.length >= 3 ? stringArg('add_edge', args, 2, location) : 'edge';
    const weight = args.length === 4 ? numberArg('add_edge', args, 3, location) : null;
    g.addEdge(from, to, edgeType, weight);
    return null;
  },

  remove_node: (g, args, _host, location) => {
    expectArgs('remove_node', args, 1, 1, location);
    g.removeNode(nodeIdArg('remove_node', args, 0, location));
    return null;
  },

  remove_edge: (g, args, _host, location) => {
    expectArgs('remove_edge', args, 2, 2, location);
    g.removeEdge(
      nodeIdArg('remove_edge', args, 0, location),
      nodeIdArg('remove_edge', args, 1, location)
    );
    return null;
  },

  add_rule: (g, args, _host, location) => {
    g.addRule(ruleFromArgs('add_rule', args, location));
    return null;
  },

  remove_rule: (g, args, _host, location) => {
    expectArgs('remove_rule', args, 1, 2, location);
    g.removeRule(symbolArg('remove_rule', args, 0, location), ruleParamArg(args, 1, location));
    return null;
  },

  /** `add_method_constraint(fn, name = "custom_constraint")` */
  add_method_constraint: (g, args, _host, location) => {
    expectArgs('add_method_constraint', args, 1, 2, location);
    g.addRule({
      kind: 'custom_method_constraint',
      fn: functionArg('add_method_constraint', args, 0, location),
      name:
        args.length === 2
          ? stringArg('add_method_constraint', args, 1, location)
          : 'custom_constraint',
    });
    return null;
  },

  set_node_type: (g, args, _host, location) => {
    expectArgs('set_node_type', args, 2, 2, location);
    g.setNodeType(
      nodeIdArg('set_node_type', args, 0, location),
      stringArg('set_node_type', args, 1, location)
    );
    return null;
  },

  // ------------------------------------------------------------
  // Rules
  // ------------------------------------------------------------

  has_rule: (g, args, _host, location) => {
    expectArgs('has_rule', args, 1, 1, location);
    return g.hasRule(symbolArg('has_rule', args, 0, location));
  },

  /** Parameter of a rule: the degree, `[min, max]`, true, or none when absent */
  rule: (g, args, _host, location) => {
    expectArgs('rule', args, 1, 1, location);
    const rule = g.getRule(symbolArg('rule', args, 0, location));
    if (rule === undefined) return null;
    if (rule.kind === 'max_degree') return rule.max;
    if (rule.kind === 'validate_range') return list([rule.min, rule.max]);
    return true;
  },

  // ------------------------------------------------------------
  // Structure
  // ------------------------------------------------------------

  node_count: count((g) => g.nodeCount(), 'node_count'),
  edge_count: count((g) => g.edgeCount(), 'edge_count'),

  nodes: (g, args) => {
    expectArgs('nodes', args, 0);
    return list(g.dataNodeIds());
  },

  /** `[from, to, type]` per data edge */
  edges: (g, args) => {
    expectArgs('edges', args, 0);
    return list(g.edges().map((e) => list([e.from, e.to, e.edgeType])));
  },

  has_node: (g, args, _host, location) => {
    expectArgs('has_node', args, 1, 1, location);
    const id = stringArg('has_node', args, 0, location);
    return !isInternalNodeId(id) && g.hasNode(id);
  },

  has_edge: (g, args, _host, location) => {
    expectArgs('has_edge', args, 2, 2, location);
    return g.hasEdge(
      stringArg('has_edge', args, 0, location),
      stringArg('has_edge', args, 1, location)
    );
  },

  get_node: (g, args, _host, location) => {
    expectArgs('get_node', args, 1, 1, location);
    const id = stringArg('get_node', args, 0, location);
    return isInternalNodeId(id) ? null : (g.getNode(id) ?? null);
  },

  neighbors: (g, args, _host, location) => {
    expectArgs('neighbors', args, 1, 1, location);
    const id = stringArg('neighbors', args, 0, location);
    return list(g.neighbors(id).filter((n) => !isInternalNodeId(n)));
  },

  predecessors: (g, args, _host, location) => {
    expectArgs('predecessors', args, 1, 1, location);
    const id = stringArg('predecessors', args, 0, location);
    return list(g.predecessors(id).filter((n) => !isInternalNodeId(n)));
  },

  has_path: (g, args, _host, location) => {
    expectArgs('has_path', args, 2, 2, location);
    return g.hasPath(
      stringArg('has_path', args, 0, location),
      stringArg('has_path', args, 1, location)
    );
  },

  node_type: (g, args, _host, location) => {
    expectArgs('node_type', args, 1, 1, location);
    return g.nodeType(stringArg('node_type', args, 0, location));
  },

  /** `match(node("a"), edge(type: "F"), node("b"))`: one map of variable to node id per match */
  match: (g, args, _host, location) =>
    list(matchGraph(g, queryArgs(args, location)).map((bindings) => map(bindings))),

  clone: (g, args) => {
    expectArgs('clone', args, 0);
    const copy = g.clone();
    copy.frozen = false;
    return copy;
  },

  // ------------------------------------------------------------
  // Type identity
  // ------------------------------------------------------------

  type_of: (g, args) => {
    expectArgs('type_of', args, 0);
    return g.typeName ?? 'graph';
  },

  /** `is_a("Animal")` or `is_a(Animal)` */
  is_a: (g, args, _host, location) => {
    expectArgs('is_a', args, 1, 1, location);
    const [target = null] = args;
    if (typeof target === 'string') return g.isA(target);
    if (isGraph(target)) return g.isA(target.typeName ?? 'graph');
    throw methodError(
      `is_a() expects a type name (string) or graph, but got ${typeName(target)}`,
      location
    );
  },

  responds_to: (g, args, _host, location) => {
    expectArgs('responds_to', args, 1, 1, location);
    const name = stringArg('responds_to', args, 0, location);
    return g.hasMethod(name) || g.staticMethods.has(name);
  },

  ancestors: (g, args) => {
    expectArgs('ancestors', args, 0);
    return list(g.ancestors());
  },

  parent: (g, args) => {
    expectArgs('parent', args, 0);
    return g.parent;
  },

  methods: (g, args) => {
    expectArgs('methods', args, 0);
    return list(g.methodNames());
  },
};
