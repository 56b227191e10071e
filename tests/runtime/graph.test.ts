/**
 * Tangle Runtime Tests: Graph Object Model
 * Nodes, edges, queries, properties, methods, inheritance and rules
 */

import { describe, expect, it } from 'vitest';
import { Graph, isInternalNodeId, ruleFromSymbol } from '../../src/index.js';
import { rulesetRules } from '../../src/runtime/core/rules.js';

function chain(...ids: string[]): Graph {
  const g = new Graph();
  ids.forEach((id, i) => g.addNode(id, i));
  for (let i = 1; i < ids.length; i++) {
    const from = ids[i - 1];
    const to = ids[i];
    if (from !== undefined && to !== undefined) g.addEdge(from, to);
  }
  return g;
}

function withRules(g: Graph, ...names: string[]): Graph {
  for (const name of names) g.addRule(ruleFromSymbol(name, null));
  return g;
}

describe('Tangle Runtime: Graph', () => {
  describe('nodes and edges', () => {
    it('reports data edges with type and weight', () => {
      const g = chain('a', 'b');
      g.addNode('c', 9);
      g.addEdge('b', 'c', 'road', 4);
      expect(g.edges()).toEqual([
        { from: 'a', to: 'b', edgeType: 'edge', weight: null },
        { from: 'b', to: 'c', edgeType: 'road', weight: 4 },
      ]);
    });

    it('requires both endpoints to exist', () => {
      const g = chain('a');
      expect(() => g.addEdge('a', 'missing')).toThrow(
        "Cannot add edge: node 'missing' does not exist"
      );
    });

    it('mirrors edges in undirected graphs and counts them once', () => {
      const g = new Graph('undirected');
      g.addNode('a', 1);
      g.addNode('b', 2);
      g.addEdge('a', 'b');
      expect(g.hasEdge('b', 'a')).toBe(true);
      expect(g.edgeCount()).toBe(1);
    });

    it('replaces a node value in place and keeps its edges', () => {
      const g = chain('a', 'b');
      g.addNode('a', 'changed');
      expect(g.getNode('a')).toBe('changed');
      expect(g.hasEdge('a', 'b')).toBe(true);
    });

    it('removes a node with its edges', () => {
      const g = chain('a', 'b', 'c');
      expect(g.removeNode('b')).toBe(true);
      expect(g.dataNodeIds()).toEqual(['a', 'c']);
      expect(g.edgeCount()).toBe(0);
      expect(g.predecessors('c')).toEqual([]);
      expect(g.removeNode('b')).toBe(false);
    });

    it('removes a single edge', () => {
      const g = chain('a', 'b');
      expect(g.removeEdge('a', 'b')).toBe(true);
      expect(g.removeEdge('a', 'b')).toBe(false);
    });
  });

  describe('queries', () => {
    it('follows outgoing edges for neighbors and paths', () => {
      const g = chain('a', 'b', 'c');
      expect(g.neighbors('a')).toEqual(['b']);
      expect(g.predecessors('b')).toEqual(['a']);
      expect(g.hasPath('a', 'c')).toBe(true);
      expect(g.hasPath('c', 'a')).toBe(false);
      expect(g.hasPath('a', 'a')).toBe(true);
      expect(g.hasPath('a', 'zzz')).toBe(false);
    });

    it('detects cycles', () => {
      const g = chain('a', 'b', 'c');
      expect(g.hasCycle()).toBe(false);
      g.addEdge('c', 'a');
      expect(g.hasCycle()).toBe(true);
    });

    it('judges connectivity ignoring direction', () => {
      const g = chain('a', 'b');
      g.addNode('c', 3);
      expect(g.isConnected()).toBe(false);
      g.addEdge('c', 'b');
      expect(g.isConnected()).toBe(true);
    });
  });

  describe('properties and internal nodes', () => {
    it('stores properties outside the data nodes', () => {
      const g = chain('a');
      g.setProperty('width', 3);
      expect(g.property('width')).toBe(3);
      expect(g.hasProperty('width')).toBe(true);
      expect(g.propertyNames()).toEqual(['width']);
      expect(g.dataNodeIds()).toEqual(['a']);
      expect(g.nodeCount()).toBe(1);
    });

    it('classifies internal node ids', () => {
      expect(isInternalNodeId('__properties__/x')).toBe(true);
      expect(isInternalNodeId('__methods__area')).toBe(true);
      expect(isInternalNodeId('__parent__')).toBe(true);
      expect(isInternalNodeId('__self__')).toBe(true);
      expect(isInternalNodeId('plain')).toBe(false);
    });

    it('rejects changes to a frozen graph', () => {
      const g = chain('a');
      g.freezeInPlace(false);
      expect(() => g.addNode('b', 1)).toThrow('Cannot modify frozen graph');
      expect(() => g.setProperty('x', 1)).toThrow('Cannot modify frozen graph');
    });
  });

  describe('inheritance', () => {
    it('links a child to a named parent', () => {
      const base = chain('a');
      base.typeName = 'Shape';
      base.setProperty('sides', 0);
      const child = Graph.fromParent(base);
      expect(child.parent).toBe(base);
      expect(child.typeName).toBeNull();
      expect(child.property('sides')).toBe(0);
      expect(child.getNode('__parent__')).toBe('Shape');
      expect(child.getEdge('__self__', '__parent__')).toEqual({
        edgeType: 'inherits_from',
        weight: null,
      });
      expect(child.dataNodeIds()).toEqual(['a']);
      expect(child.edgeCount()).toBe(0);
    });

    it('answers isA and ancestors along the chain', () => {
      const shape = new Graph();
      shape.typeName = 'Shape';
      const square = Graph.fromParent(shape);
      square.typeName = 'Square';
      const unit = Graph.fromParent(square);
      unit.typeName = 'UnitSquare';
      expect(unit.isA('Shape')).toBe(true);
      expect(unit.isA('Circle')).toBe(false);
      expect(unit.ancestors()).toEqual(['Square', 'Shape']);
    });

    it('clones independently of the original', () => {
      const g = chain('a', 'b');
      const copy = g.clone();
      copy.addNode('c', 3);
      copy.addEdge('b', 'c');
      expect(g.nodeCount()).toBe(2);
      expect(g.edgeCount()).toBe(1);
    });
  });

  describe('rules', () => {
    it('blocks edges that close a cycle', () => {
      const g = withRules(chain('a', 'b', 'c'), 'no_cycles');
      expect(() => g.addEdge('c', 'a')).toThrow(
        "Adding edge from 'c' to 'a' would create a cycle"
      );
      expect(() => g.addEdge('a', 'a')).toThrow(
        "Adding edge from 'a' to 'a' would create a cycle"
      );
      expect(g.edgeCount()).toBe(2);
    });

    it('refuses :no_cycles on a graph that already has one', () => {
      const g = chain('a', 'b');
      g.addEdge('b', 'a');
      expect(() => g.addRule({ kind: 'no_cycles' })).toThrow(
        'Cannot add rule :no_cycles: graph already contains a cycle'
      );
      expect(g.hasRule('no_cycles')).toBe(false);
    });

    it('limits out-degree', () => {
      const g = new Graph();
      for (const id of ['r', 'a', 'b', 'c']) g.addNode(id, 0);
      g.addRule(ruleFromSymbol('max_degree', 2));
      g.addEdge('r', 'a');
      g.addEdge('r', 'b');
      expect(() => g.addEdge('r', 'c')).toThrow(
        "Node 'r' already has 2 edges, maximum is 2"
      );
    });

    it('requires or forbids weights', () => {
      const weighted = withRules(chain('a'), 'weighted_edges');
      weighted.addNode('b', 1);
      expect(() => weighted.addEdge('a', 'b')).toThrow(
        "Edge from 'a' to 'b' requires a weight"
      );
      const plain = withRules(chain('a'), 'unweighted_edges');
      plain.addNode('b', 1);
      expect(() => plain.addEdge('a', 'b', 'edge', 2)).toThrow(
        "Edge from 'a' to 'b' must not have a weight"
      );
    });

    it('rejects duplicate node values', () => {
      const g = withRules(chain('a'), 'no_dups');
      expect(() => g.addNode('b', 0)).toThrow('Value 0 already exists in collection');
      g.addNode('a', 0);
      expect(g.getNode('a')).toBe(0);
    });

    it('orders BST children', () => {
      const g = new Graph();
      g.addNode('root', 5);
      g.addNode('small', 3);
      g.addNode('big', 7);
      for (const rule of rulesetRules('bst')) g.addRule(rule);
      g.addEdge('root', 'small', 'left');
      expect(() => g.addEdge('root', 'big', 'left')).toThrow(
        'BST ordering violated: left child 7 must be less than 5'
      );
      g.addEdge('root', 'big', 'right');
      expect(g.edgeCount()).toBe(2);
    });

    it('rolls back removals that break a tree', () => {
      const g = chain('root', 'mid', 'leaf');
      for (const rule of rulesetRules('tree')) g.addRule(rule);
      expect(() => g.removeEdge('root', 'mid')).toThrow(
        'Tree must have exactly one root, found 2 roots'
      );
      expect(g.hasEdge('root', 'mid')).toBe(true);
      expect(() => g.removeNode('mid')).toThrow(
        'Tree must have exactly one root, found 2 roots'
      );
      expect(g.dataNodeIds()).toEqual(['root', 'mid', 'leaf']);
      expect(g.hasEdge('mid', 'leaf')).toBe(true);
      expect(g.removeNode('leaf')).toBe(true);
    });

    it('keeps connectivity on undirected graphs', () => {
      const g = new Graph('undirected');
      for (const id of ['a', 'b', 'c']) g.addNode(id, id);
      g.addEdge('a', 'b');
      g.addEdge('b', 'c');
      g.addRule({ kind: 'connected' });
      expect(() => g.removeEdge('a', 'b')).toThrow(
        'Graph must be connected (all nodes reachable)'
      );
      expect(g.hasEdge('b', 'a')).toBe(true);
    });

    it('does not duplicate rules and removes them by name', () => {
      const g = withRules(new Graph(), 'no_cycles', 'no_cycles', 'no_dups');
      expect(g.rules).toEqual([{ kind: 'no_cycles' }, { kind: 'no_duplicates' }]);
      g.removeRule('no_dups');
      expect(g.hasRule('no_duplicates')).toBe(false);
      expect(g.getRule('no_cycles')).toEqual({ kind: 'no_cycles' });
    });
  });
});
