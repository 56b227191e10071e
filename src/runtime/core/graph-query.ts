/**
 * Graph Queries
 *
 * Matches an alternating chain `node, step, node, step, node ...` against a
 * graph. Every complete match binds each named pattern node to the id of
 * the graph node it landed on. A name used twice must land on the same node.
 */

import { isInternalNodeId, type Graph } from './graph.js';
import type {
  PatternDirection,
  PatternEdgeValue,
  PatternNodeValue,
  PatternPathValue,
} from './values.js';

export type QueryStep = PatternEdgeValue | PatternPathValue;

export interface GraphQuery {
  readonly nodes: readonly PatternNodeValue[];
  /** `steps[i]` joins `nodes[i]` to `nodes[i + 1]` */
  readonly steps: readonly QueryStep[];
}

/** Variable name to node id, in pattern order */
export type QueryMatch = Map<string, string>;

function nodeMatches(graph: Graph, id: string, pattern: PatternNodeValue): boolean {
  return pattern.nodeType === null || graph.nodeType(id) === pattern.nodeType;
}

/** Nodes one hop from `from` along edges of `edgeType` (any type when null) */
function hop(
  graph: Graph,
  from: string,
  edgeType: string | null,
  direction: PatternDirection
): string[] {
  const found = new Set<string>();
  if (direction !== 'incoming') {
    for (const to of graph.neighbors(from)) {
      if (edgeType === null || graph.getEdge(from, to)?.edgeType === edgeType) found.add(to);
    }
  }
  if (direction !== 'outgoing') {
    for (const source of graph.predecessors(from)) {
      if (edgeType === null || graph.getEdge(source, from)?.edgeType === edgeType) {
        found.add(source);
      }
    }
  }
  return [...found].filter((id) => !isInternalNodeId(id));
}

/**
 * Nodes reachable from `from` in `min..max` hops. A node reached at two
 * different distances is reported once per distance.
 */
function reach(graph: Graph, from: string, path: PatternPathValue): string[] {
  const results: string[] = path.min === 0 ? [from] : [];
  let frontier = [from];
  for (let depth = 1; depth <= path.max && frontier.length > 0; depth++) {
    const next = new Set<string>();
    for (const id of frontier) {
      for (const to of hop(graph, id, path.edgeType, path.direction)) next.add(to);
    }
    frontier = [...next];
    if (depth >= path.min) results.push(...frontier);
  }
  return results;
}

function targets(graph: Graph, from: string, step: QueryStep): string[] {
  return step.kind === 'pattern_path'
    ? reach(graph, from, step)
    : hop(graph, from, step.edgeType, step.direction);
}

/** Every match, ordered by start node then by edge insertion order */
export function matchGraph(graph: Graph, query: GraphQuery): QueryMatch[] {
  const { nodes, steps } = query;
  const matches: QueryMatch[] = [];

  const conflicts = (ids: readonly string[], pattern: PatternNodeValue, id: string): boolean =>
    pattern.variable !== null &&
    ids.some((bound, i) => nodes[i]?.variable === pattern.variable && bound !== id);

  const extend = (ids: string[]): void => {
    const index = ids.length - 1;
    const step = steps[index];
    const from = ids[index];
    if (step === undefined || from === undefined) {
      matches.push(bindingsOf(nodes, ids));
      return;
    }
    const pattern = nodes[index + 1];
    if (pattern === undefined) return;
    for (const to of targets(graph, from, step)) {
      if (!nodeMatches(graph, to, pattern) || conflicts(ids, pattern, to)) continue;
      extend([...ids, to]);
    }
  };

  const first = nodes[0];
  if (first === undefined) return matches;
  for (const id of graph.dataNodeIds()) {
    if (nodeMatches(graph, id, first)) extend([id]);
  }
  return matches;
}

function bindingsOf(nodes: readonly PatternNodeValue[], ids: readonly string[]): QueryMatch {
  const bindings: QueryMatch = new Map();
  nodes.forEach((pattern, i) => {
    const id = ids[i];
    if (pattern.variable !== null && id !== undefined) bindings.set(pattern.variable, id);
  });
  return bindings;
}
