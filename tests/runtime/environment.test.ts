/**
 * Tangle Runtime Tests: Scopes, Argument Binding and Patterns
 */

import { describe, expect, it } from 'vitest';
import {
  FunctionValue,
  formatValue,
  list,
  parse,
  type ExpressionNode,
  type MatchPattern,
  type PatternClauseNode,
  type Value,
} from '../../src/index.js';
import { bindArguments, type CallArgument } from '../../src/runtime/core/callable.js';
import { Environment } from '../../src/runtime/core/environment.js';
import { findMatch, matchPattern } from '../../src/runtime/core/patterns.js';

function fn(
  name: string | null,
  params: { name: string; hasDefault?: boolean; isVariadic?: boolean }[]
): FunctionValue {
  const defaultValue: ExpressionNode = {
    type: 'NumberLiteral',
    value: 10,
    raw: '10',
    span: { start: { line: 1, column: 1, offset: 0 }, end: { line: 1, column: 1, offset: 0 } },
  };
  return new FunctionValue({
    name,
    params: params.map((p) => ({
      name: p.name,
      defaultValue: p.hasDefault ? defaultValue : null,
      isVariadic: p.isVariadic ?? false,
    })),
    body: [],
    env: new Environment(),
  });
}

function positional(...values: Value[]): CallArgument[] {
  return values.map((value) => ({ name: null, value }));
}

/** Default expressions here are always the literal 10 */
function evaluateDefault(expr: ExpressionNode): Value {
  return expr.type === 'NumberLiteral' ? expr.value : null;
}

function bound(f: FunctionValue, args: CallArgument[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [k, v] of bindArguments(f, args, evaluateDefault)) result[k] = formatValue(v);
  return result;
}

function clausesOf(source: string): PatternClauseNode[] {
  const [decl] = parse(source).statements;
  if (decl?.type !== 'FunctionDecl' || decl.clauses === null) {
    throw new Error('expected a clause function');
  }
  return decl.clauses;
}

describe('Tangle Runtime: Environment', () => {
  it('resolves names through parent scopes', () => {
    const outer = new Environment();
    outer.define('x', 1);
    const inner = outer.child();
    expect(inner.get('x')).toBe(1);
    expect(inner.exists('x')).toBe(true);
    expect(inner.has('x')).toBe(false);
  });

  it('updates the nearest defining scope', () => {
    const outer = new Environment();
    outer.define('x', 1);
    const inner = outer.child();
    inner.set('x', 2);
    expect(outer.get('x')).toBe(2);
    expect(inner.bindings().size).toBe(0);
  });

  it('shadows without touching the parent', () => {
    const outer = new Environment();
    outer.define('x', 1);
    const inner = outer.child();
    inner.define('x', 5);
    expect(inner.get('x')).toBe(5);
    expect(outer.get('x')).toBe(1);
  });

  it('reports undefined names', () => {
    const env = new Environment();
    expect(() => env.get('ghost')).toThrow('Undefined variable: ghost');
    expect(() => env.set('ghost', 1)).toThrow('Cannot assign to undefined variable: ghost');
    expect(env.lookup('ghost')).toBeUndefined();
  });

  it('distinguishes a none binding from a missing one', () => {
    const env = new Environment();
    env.define('empty', null);
    expect(env.get('empty')).toBeNull();
    expect(env.exists('empty')).toBe(true);
  });

  it('detaches its parent', () => {
    const outer = new Environment();
    const inner = outer.child();
    expect(inner.takeParent()).toBe(outer);
    expect(inner.getParent()).toBeNull();
  });
});

describe('Tangle Runtime: Argument Binding', () => {
  it('binds positional arguments and defaults', () => {
    const f = fn('area', [{ name: 'w' }, { name: 'h', hasDefault: true }]);
    expect(bound(f, positional(3))).toEqual({ w: '3', h: '10' });
    expect(bound(f, positional(3, 4))).toEqual({ w: '3', h: '4' });
  });

  it('skips parameters already claimed by name', () => {
    const f = fn('area', [{ name: 'w' }, { name: 'h' }]);
    expect(bound(f, [{ name: 'w', value: 1 }, { name: null, value: 2 }])).toEqual({
      w: '1',
      h: '2',
    });
  });

  it('binds arguments in source order', () => {
    const f = fn('area', [{ name: 'w' }, { name: 'h' }]);
    expect(bound(f, [{ name: null, value: 1 }, { name: 'h', value: 2 }])).toEqual({
      w: '1',
      h: '2',
    });
    expect(() => bound(f, [{ name: null, value: 1 }, { name: 'w', value: 2 }])).toThrow(
      "Parameter 'w' specified multiple times"
    );
  });

  it('rejects a named variadic after positional extras', () => {
    const f = fn('sum', [{ name: 'first' }, { name: 'rest', isVariadic: true }]);
    expect(() => bound(f, [...positional(1, 2), { name: 'rest', value: 3 }])).toThrow(
      "Parameter 'rest' specified multiple times"
    );
  });

  it('collects extra arguments into the variadic parameter', () => {
    const f = fn('sum', [{ name: 'first' }, { name: 'rest', isVariadic: true }]);
    expect(bound(f, positional(1, 2, 3))).toEqual({ first: '1', rest: '[2, 3]' });
    expect(bound(f, positional(1))).toEqual({ first: '1', rest: '[]' });
  });

  it('wraps a named scalar for a variadic parameter', () => {
    const f = fn('sum', [{ name: 'rest', isVariadic: true }]);
    expect(bound(f, [{ name: 'rest', value: 4 }])).toEqual({ rest: '[4]' });
    expect(bound(f, [{ name: 'rest', value: list([4, 5]) }])).toEqual({ rest: '[4, 5]' });
  });

  it('reports argument errors', () => {
    const f = fn('f', [{ name: 'a' }]);
    expect(() => bound(f, [{ name: 'b', value: 1 }])).toThrow(
      "Unknown parameter 'b' in function 'f'"
    );
    expect(() =>
      bound(f, [
        { name: 'a', value: 1 },
        { name: 'a', value: 2 },
      ])
    ).toThrow("Parameter 'a' specified multiple times");
    expect(() => bound(f, positional(1, 2))).toThrow("Too many arguments for function 'f'");
    expect(() => bound(f, [])).toThrow("Missing required parameter 'a' in function 'f'");
  });

  it('names anonymous functions in messages', () => {
    expect(() => bound(fn(null, []), positional(1))).toThrow(
      "Too many arguments for function '<anonymous>'"
    );
  });

  it('reports the arities a function accepts', () => {
    const two = fn('f', [{ name: 'a' }, { name: 'b' }]);
    const rest = fn('f', [{ name: 'a' }, { name: 'b', hasDefault: true }, { name: 'c', isVariadic: true }]);
    expect([two.acceptsArity(1), two.acceptsArity(2), two.acceptsArity(3)]).toEqual([
      false,
      true,
      false,
    ]);
    expect([rest.acceptsArity(0), rest.acceptsArity(1), rest.acceptsArity(9)]).toEqual([
      false,
      true,
      true,
    ]);
  });
});

describe('Tangle Runtime: Patterns', () => {
  it('binds list patterns with a rest name', () => {
    const bindings = matchPattern(
      {
        kind: 'list',
        elements: [{ kind: 'variable', name: 'head' }],
        rest: 'tail',
      },
      list([1, 2, 3])
    );
    expect(bindings?.get('head')).toBe(1);
    expect(formatValue(bindings?.get('tail') ?? null)).toBe('[2, 3]');
  });

  it('requires an exact length without a rest', () => {
    const pattern: MatchPattern = { kind: 'list', elements: [{ kind: 'wildcard' }], rest: null };
    expect(matchPattern(pattern, list([1]))).not.toBeNull();
    expect(matchPattern(pattern, list([1, 2]))).toBeNull();
    expect(matchPattern(pattern, 'x')).toBeNull();
  });

  it('matches literals by kind', () => {
    expect(matchPattern({ kind: 'literal', literal: { kind: 'number', value: 0 } }, 0)).not.toBeNull();
    expect(matchPattern({ kind: 'literal', literal: { kind: 'number', value: 0 } }, '0')).toBeNull();
    expect(matchPattern({ kind: 'literal', literal: { kind: 'none' } }, null)).not.toBeNull();
  });

  it('picks the first clause whose guard passes', () => {
    const clauses = clausesOf('fn f(n) {\n  |0| => "zero"\n  |n| if n > 0 => "pos"\n  |_| => "neg"\n}');
    const passAll = (): boolean => true;
    const rejectAll = (): boolean => false;
    expect(findMatch(clauses, [0], passAll)?.clause).toBe(clauses[0]);
    expect(findMatch(clauses, [5], passAll)?.clause).toBe(clauses[1]);
    expect(findMatch(clauses, [5], rejectAll)?.clause).toBe(clauses[2]);
  });

  it('requires exactly one argument', () => {
    const clauses = clausesOf('fn f(n) {\n  |_| => 1\n}');
    expect(() => findMatch(clauses, [1, 2], () => true)).toThrow(
      'Pattern matching requires exactly 1 argument, got 2'
    );
  });
});
