/**
 * Tangle Builtin Methods: Graph Patterns
 * node(), edge() and path() query pieces and graph.match()
 */

import { describe, expect, it } from 'vitest';
import { run, show } from '../helpers/runtime.js';

const FOLLOWS = [
  'g = graph {}',
  'g.add_node("A", 1)',
  'g.add_node("B", 2)',
  'g.add_node("C", 3)',
  'g.add_edge("A", "B", "F")',
  'g.add_edge("B", "C", "F")',
].join('\n');

describe('Tangle Runtime: Graph Patterns', () => {
  describe('pattern pieces', () => {
    it('reads node properties', () => {
      const source = ['n = node("p", type: "User")', '[n.variable, n.type, n.pattern_type]'].join(
        '\n'
      );
      expect(show(source)).toBe('["p", "User", :node]');
      expect(run('node().variable')).toBeNull();
    });

    it('reads edge and path properties', () => {
      const source = [
        'e = edge(type: "F", direction: :both)',
        'p = path(edge_type: "F", min: 1, max: 3)',
        '[e.edge_type, e.direction, e.pattern_type, p.edge_type, p.min, p.max, p.direction, p.pattern_type]',
      ].join('\n');
      expect(show(source)).toBe('["F", :both, :edge, "F", 1, 3, :outgoing, :path]');
    });

    it('rebinds a node to a new variable', () => {
      const source = ['n = node("p", type: "User")', 'm = n.bind("q")', '[n.variable, m.variable, m.type]'].join(
        '\n'
      );
      expect(show(source)).toBe('["p", "q", "User"]');
    });

    it('formats pieces', () => {
      expect(show('node("p", type: "User")')).toBe('<pattern node("p", type: "User")>');
      expect(show('edge()')).toBe('<pattern edge(direction: :outgoing)>');
      expect(show('path(edge_type: "F", min: 0, max: 2, direction: :incoming)')).toBe(
        '<pattern path(edge_type: "F", min: 0, max: 2, direction: :incoming)>'
      );
    });

    it('compares pieces by content', () => {
      expect(show('[node("a") == node("a"), node("a") == node("b")]')).toBe('[true, false]');
    });
  });

  describe('argument checks', () => {
    it('rejects unknown and positional parameters', () => {
      expect(() => run('node("a", kind: "User")')).toThrow(
        "node() does not accept parameter 'kind'"
      );
      expect(() => run('edge("F")')).toThrow('edge() does not accept positional arguments');
    });

    it('validates directions', () => {
      expect(() => run('edge(direction: "out")')).toThrow('edge() direction must be a symbol');
      expect(() => run('edge(direction: :sideways)')).toThrow(
        'Invalid direction :sideways. Expected :outgoing, :incoming, or :both'
      );
    });

    it('validates path bounds', () => {
      expect(() => run('path(edge_type: "F", min: 1)')).toThrow(
        "path() requires 'max' parameter"
      );
      expect(() => run('path(edge_type: "F", min: 5, max: 2)')).toThrow(
        'path() min (5) cannot be greater than max (2)'
      );
    });

    it('checks the shape of a match query', () => {
      expect(() => run(`${FOLLOWS}\ng.match()`)).toThrow(
        'match() requires at least one pattern node'
      );
      expect(() => run(`${FOLLOWS}\ng.match(edge())`)).toThrow(
        'match() argument 0 should be a pattern node, got pattern_edge'
      );
      expect(() => run(`${FOLLOWS}\ng.match(node("a"), node("b"))`)).toThrow(
        'match() argument 1 should be a pattern edge or path, got pattern_node'
      );
      expect(() => run(`${FOLLOWS}\ng.match(node("a"), edge())`)).toThrow(
        'match() pattern must end with a node'
      );
    });
  });

  describe('match', () => {
    it('binds each single hop', () => {
      expect(show(`${FOLLOWS}\ng.match(node("a"), edge(type: "F"), node("b"))`)).toBe(
        '[{"a": "A", "b": "B"}, {"a": "B", "b": "C"}]'
      );
    });

    it('matches every node for a lone pattern node', () => {
      expect(run(`${FOLLOWS}\nlen(g.match(node("n")))`)).toBe(3);
    });

    it('leaves anonymous nodes out of the bindings', () => {
      expect(show(`${FOLLOWS}\ng.match(node(), edge(), node("t"))`)).toBe(
        '[{"t": "B"}, {"t": "C"}]'
      );
    });

    it('filters by edge type', () => {
      expect(show(`${FOLLOWS}\ng.add_edge("A", "C", "K")\ng.match(node("x"), edge(type: "K"), node("y"))`)).toBe(
        '[{"x": "A", "y": "C"}]'
      );
    });

    it('follows edges backwards and both ways', () => {
      expect(show(`${FOLLOWS}\ng.match(node("x"), edge(direction: :incoming), node("y"))`)).toBe(
        '[{"x": "B", "y": "A"}, {"x": "C", "y": "B"}]'
      );
      expect(run(`${FOLLOWS}\nlen(g.match(node("x"), edge(direction: :both), node("y")))`)).toBe(4);
    });

    it('requires a repeated variable to land on the same node', () => {
      const source = [
        'g = graph {}',
        'g.add_node("A", 1)',
        'g.add_node("B", 2)',
        'g.add_node("C", 3)',
        'g.add_edge("A", "B")',
        'g.add_edge("B", "A")',
        'g.add_edge("B", "C")',
        'g.match(node("x"), edge(), node("y"), edge(), node("x"))',
      ].join('\n');
      expect(show(source)).toBe('[{"x": "A", "y": "B"}, {"x": "B", "y": "A"}]');
    });

    it('matches variable-length paths within their bounds', () => {
      expect(
        show(`${FOLLOWS}\ng.match(node("s"), path(edge_type: "F", min: 1, max: 2), node("t"))`)
      ).toBe('[{"s": "A", "t": "B"}, {"s": "A", "t": "C"}, {"s": "B", "t": "C"}]');
    });

    it('matches paths of an exact length', () => {
      const source = [
        FOLLOWS,
        'g.add_node("D", 4)',
        'g.add_edge("C", "D", "F")',
        'g.match(node("s"), path(edge_type: "F", min: 2, max: 2), node("t"))',
      ].join('\n');
      expect(show(source)).toBe('[{"s": "A", "t": "C"}, {"s": "B", "t": "D"}]');
    });
  });

  describe('node types', () => {
    const TYPED = [
      FOLLOWS,
      'g.set_node_type("A", "User")',
      'g.set_node_type("B", "Post")',
      'g.set_node_type("C", "User")',
    ].join('\n');

    it('stores and reads node types', () => {
      expect(show(`${TYPED}\n[g.node_type("B"), g.node_type("Z")]`)).toBe('["Post", none]');
    });

    it('filters matches by node type', () => {
      expect(show(`${TYPED}\ng.match(node("u", type: "User"), edge(), node("p", type: "Post"))`)).toBe(
        '[{"u": "A", "p": "B"}]'
      );
    });

    it('rejects types for missing nodes', () => {
      expect(() => run(`${FOLLOWS}\ng.set_node_type("Z", "User")`)).toThrow(
        "Cannot set type: node 'Z' does not exist"
      );
    });
  });
});
