/**
 * Tangle Parser Tests
 * Statement and expression shapes, graph declarations and parse errors
 */

import { describe, expect, it } from 'vitest';
import {
  parse,
  ParseError,
  type ExpressionNode,
  type StatementNode,
} from '../../src/index.js';

function statements(source: string): StatementNode[] {
  return parse(source).statements;
}

function only(source: string): StatementNode {
  const [statement, ...rest] = statements(source);
  if (statement === undefined || rest.length > 0) {
    throw new Error(`expected one statement in: ${source}`);
  }
  return statement;
}

/** Expression of a single expression statement */
function expr(source: string): ExpressionNode {
  const statement = only(source);
  if (statement.type !== 'ExpressionStatement') {
    throw new Error(`expected an expression statement, got ${statement.type}`);
  }
  return statement.expression;
}

describe('Tangle Parser', () => {
  describe('statements', () => {
    it('separates statements by newlines and semicolons', () => {
      expect(statements('a = 1; b = 2\nc = 3').map((s) => s.type)).toEqual([
        'Assignment',
        'Assignment',
        'Assignment',
      ]);
    });

    it('parses an untyped assignment', () => {
      expect(only('x = 1')).toMatchObject({
        type: 'Assignment',
        target: { kind: 'variable', name: 'x' },
        value: { type: 'NumberLiteral', value: 1 },
      });
    });

    it('parses typed and private declarations', () => {
      expect(only('num count = 5')).toMatchObject({
        type: 'VariableDecl',
        name: 'count',
        typeAnnotation: 'num',
        isPrivate: false,
      });
      expect(only('graph g = graph {}')).toMatchObject({
        type: 'VariableDecl',
        typeAnnotation: 'graph',
        value: { type: 'GraphLiteral', config: [], parent: null },
      });
      expect(only('priv secret = "x"')).toMatchObject({
        type: 'VariableDecl',
        name: 'secret',
        typeAnnotation: null,
        isPrivate: true,
      });
    });

    it('parses index and property assignment targets', () => {
      expect(only('xs[0] = 1')).toMatchObject({
        target: { kind: 'index', object: { type: 'Variable', name: 'xs' } },
      });
      expect(only('p.x = 1')).toMatchObject({
        target: { kind: 'property', property: 'x' },
      });
    });

    it('rejects a literal as assignment target', () => {
      expect(() => parse('1 = 2')).toThrow('Invalid assignment target');
    });

    it('requires a statement terminator', () => {
      expect(() => parse('x = 1 2')).toThrow("Expected end of statement, got '2'");
    });
  });

  describe('expressions', () => {
    it('gives multiplication precedence over addition', () => {
      expect(expr('1 + 2 * 3')).toMatchObject({
        type: 'BinaryExpr',
        op: '+',
        left: { type: 'NumberLiteral', value: 1 },
        right: { type: 'BinaryExpr', op: '*' },
      });
    });

    it('makes exponentiation right associative', () => {
      expect(expr('2 ** 3 ** 2')).toMatchObject({
        op: '**',
        left: { value: 2 },
        right: { op: '**', left: { value: 3 }, right: { value: 2 } },
      });
    });

    it('marks element-wise operators', () => {
      expect(expr('a .* b')).toMatchObject({
        type: 'BinaryExpr',
        op: '*',
        elementWise: true,
      });
      expect(expr('a * b')).toMatchObject({ elementWise: false });
    });

    it('parses word and symbol logic operators alike', () => {
      expect(expr('a && b || not c')).toMatchObject({
        op: 'or',
        left: { op: 'and' },
        right: { type: 'UnaryExpr', op: 'not' },
      });
      expect(expr('!a')).toMatchObject({ type: 'UnaryExpr', op: 'not' });
    });

    it('parses suffix conditionals', () => {
      expect(expr('"yes" if ok else "no"')).toMatchObject({
        type: 'Conditional',
        isUnless: false,
        thenExpr: { value: 'yes' },
        elseExpr: { value: 'no' },
      });
      expect(expr('x unless done')).toMatchObject({
        type: 'Conditional',
        isUnless: true,
        elseExpr: null,
      });
    });

    it('parses calls with named and write-back arguments', () => {
      expect(expr('f(a!, key: 2)')).toMatchObject({
        type: 'Call',
        callee: { type: 'Variable', name: 'f' },
        args: [
          { type: 'PositionalArg', mutable: true },
          { type: 'NamedArg', name: 'key', mutable: false },
        ],
      });
    });

    it('parses mutating method calls', () => {
      expect(expr('xs.append!(4)')).toMatchObject({
        type: 'MethodCall',
        method: 'append!',
      });
    });

    it('accepts keywords as method names and map keys', () => {
      expect(expr('m.set("k", 1)')).toMatchObject({ type: 'MethodCall', method: 'set' });
      expect(expr('{type: 1, "two": 2}')).toMatchObject({
        type: 'MapLiteral',
        entries: [{ key: 'type' }, { key: 'two' }],
      });
    });

    it('parses property access and indexing', () => {
      expect(expr('a.b[0]')).toMatchObject({
        type: 'Index',
        object: { type: 'PropertyAccess', property: 'b' },
      });
    });

    it('parses lambdas with one or more parameters', () => {
      expect(expr('x => x * 2')).toMatchObject({
        type: 'Lambda',
        params: ['x'],
        body: [{ type: 'Return', value: { op: '*' } }],
      });
      expect(expr('(a, b) => a + b')).toMatchObject({ type: 'Lambda', params: ['a', 'b'] });
    });

    it('parses a parenthesized expression without a lambda', () => {
      expect(expr('(1 + 2) * 3')).toMatchObject({
        op: '*',
        left: { op: '+' },
      });
    });

    it('parses instantiation braces', () => {
      expect(expr('Point { x: 1 }')).toMatchObject({
        type: 'Instantiate',
        className: { type: 'Variable', name: 'Point' },
        overrides: [{ key: 'x', value: { value: 1 } }],
      });
      expect(expr('Point {}')).toMatchObject({ type: 'Instantiate', overrides: [] });
    });

    it('parses super calls and raise', () => {
      expect(expr('super.area(2)')).toMatchObject({
        type: 'SuperCall',
        method: 'area',
        args: [{ type: 'PositionalArg' }],
      });
      expect(expr('raise ValueError("bad")')).toMatchObject({
        type: 'Raise',
        error: { type: 'Call' },
      });
    });

    it('parses symbols, bools and none', () => {
      expect(expr('[:a, true, none]')).toMatchObject({
        type: 'ListLiteral',
        elements: [
          { type: 'SymbolLiteral', name: 'a' },
          { type: 'BoolLiteral', value: true },
          { type: 'NoneLiteral' },
        ],
      });
    });
  });

  describe('control flow', () => {
    it('does not read a condition followed by a block as instantiation', () => {
      expect(only('if ok {}')).toMatchObject({
        type: 'If',
        condition: { type: 'Variable', name: 'ok' },
        thenBranch: [],
        elseBranch: null,
      });
    });

    it('accepts else on the following line and chains else if', () => {
      const node = only('if a {\n  x = 1\n}\nelse if b {\n  x = 2\n} else {\n  x = 3\n}');
      expect(node).toMatchObject({
        type: 'If',
        elseBranch: [{ type: 'If', elseBranch: [{ type: 'Assignment' }] }],
      });
    });

    it('parses loops', () => {
      expect(only('for item in items { print(item) }')).toMatchObject({
        type: 'For',
        variable: 'item',
        iterable: { type: 'Variable', name: 'items' },
        body: [{ type: 'ExpressionStatement' }],
      });
      expect(only('while i < 3 { i = i + 1 }')).toMatchObject({
        type: 'While',
        condition: { op: '<' },
      });
    });

    it('parses try with typed catches and finally', () => {
      const node = only(
        'try {\n  risky()\n} catch TypeError as e {\n  a = 1\n} catch {\n  b = 2\n} finally {\n  c = 3\n}'
      );
      expect(node).toMatchObject({
        type: 'Try',
        catchClauses: [
          { errorType: 'TypeError', variable: 'e' },
          { errorType: null, variable: null },
        ],
        finallyBlock: [{ type: 'Assignment' }],
      });
    });

    it('requires catch or finally after try', () => {
      expect(() => parse('try { x = 1 }')).toThrow(
        "Expected 'catch' or 'finally' after try block"
      );
    });

    it('parses match arms with list patterns', () => {
      const node = expr('match v {\n  0 => "zero"\n  [a, ...rest] => a\n  _ => "other"\n}');
      expect(node).toMatchObject({
        type: 'Match',
        arms: [
          { pattern: { kind: 'literal', literal: { kind: 'number', value: 0 } } },
          {
            pattern: {
              kind: 'list',
              elements: [{ kind: 'variable', name: 'a' }],
              rest: 'rest',
            },
          },
          { pattern: { kind: 'wildcard' } },
        ],
      });
    });

    it('parses return with and without a value', () => {
      const [fn] = statements('fn f() {\n  return\n}');
      expect(fn).toMatchObject({ body: [{ type: 'Return', value: null }] });
    });
  });

  describe('functions', () => {
    it('parses defaults, variadics and guards', () => {
      expect(only('fn f(a, b = 2, ...rest) when a > 0 { return a }')).toMatchObject({
        type: 'FunctionDecl',
        name: 'f',
        receiver: null,
        params: [
          { name: 'a', defaultValue: null, isVariadic: false },
          { name: 'b', defaultValue: { value: 2 } },
          { name: 'rest', isVariadic: true },
        ],
        guard: { op: '>' },
        clauses: null,
      });
    });

    it('parses pattern clause functions', () => {
      const node = only('fn fact(n) {\n  |0| => 1\n  |n| if n > 0 => n * fact(n - 1)\n}');
      expect(node).toMatchObject({
        body: [],
        clauses: [
          { pattern: { kind: 'literal' }, guard: null },
          { pattern: { kind: 'variable', name: 'n' }, guard: { op: '>' } },
        ],
      });
    });

    it('parses receiver methods, setters and statics', () => {
      expect(only('fn Stack.push(x) { return x }')).toMatchObject({
        receiver: 'Stack',
        name: 'push',
      });
      expect(only('set Point.x(value) { return value }')).toMatchObject({
        isSetter: true,
        receiver: 'Point',
      });
      expect(only('static fn Point.origin() { return 0 }')).toMatchObject({
        isStatic: true,
      });
    });

    it('rejects a static function without a receiver', () => {
      expect(() => parse('static fn helper() {}')).toThrow(
        'Static methods must be attached to a graph'
      );
    });

    it('requires setters to take one parameter', () => {
      expect(() => parse('set Point.x(a, b) {}')).toThrow(
        'Setters must have exactly one parameter'
      );
    });

    it('rejects a second variadic parameter', () => {
      expect(() => parse('fn f(...a, ...b) {}')).toThrow(
        'Only one variadic parameter is allowed'
      );
    });
  });

  describe('graphs', () => {
    it('parses a full graph declaration', () => {
      const node = only(
        [
          'graph Tree(:tree) from Base {',
          '  size: 0',
          '  rule :max_degree, 3',
          '  priv fn helper() { return 1 }',
          '  static fn make() { return 2 }',
          '  set size(v) { self.size = v }',
          '  configure { readable: [:size], writable: :size }',
          '}',
        ].join('\n')
      );
      expect(node).toMatchObject({
        type: 'GraphDecl',
        name: 'Tree',
        graphType: 'tree',
        parent: { type: 'Variable', name: 'Base' },
        properties: [{ name: 'size', value: { value: 0 } }],
        rules: [{ name: 'max_degree', param: { value: 3 } }],
        methods: [
          { name: 'helper', isPrivate: true, isStatic: false },
          { name: 'make', isStatic: true },
          { name: 'size', isSetter: true },
        ],
        accessors: { readable: ['size'], writable: ['size'], accessible: [] },
      });
    });

    it('rejects unknown accessor keys', () => {
      expect(() => parse('graph G {\n  configure { visible: :x }\n}')).toThrow(
        "Unknown config key 'visible'. Valid keys: readable, writable, accessible"
      );
    });

    it('parses graph literals with options and parents', () => {
      expect(expr('graph { type: :undirected }')).toMatchObject({
        type: 'GraphLiteral',
        config: [{ key: 'type', value: { type: 'SymbolLiteral', name: 'undirected' } }],
      });
      expect(expr('graph from Shape')).toMatchObject({
        type: 'GraphLiteral',
        parent: { type: 'Variable', name: 'Shape' },
      });
    });
  });

  describe('modules and configuration', () => {
    it('parses import, load and module declarations', () => {
      expect(statements('import "lib/math" as m\nload "setup.tgl"\nmodule geometry alias geo')).toMatchObject([
        { type: 'Import', path: 'lib/math', alias: 'm' },
        { type: 'Load', path: 'setup.tgl' },
        { type: 'ModuleDecl', name: 'geometry', alias: 'geo' },
      ]);
    });

    it('parses configure settings and flags', () => {
      expect(only('configure { error_mode: :lenient, :high }')).toMatchObject({
        type: 'Configure',
        settings: [
          { key: 'error_mode', value: { type: 'SymbolLiteral', name: 'lenient' } },
          { key: 'high', value: { type: 'SymbolLiteral', name: 'high' } },
        ],
        body: null,
      });
      expect(only('configure { decimal_places: 2 } {\n  x = 1\n}')).toMatchObject({
        body: [{ type: 'Assignment' }],
      });
    });

    it('parses precision blocks', () => {
      expect(only('precision 2 { x = 1 / 3 }')).toMatchObject({ type: 'Precision', places: 2 });
      expect(only('precision :int { x = 1 }')).toMatchObject({ places: 0 });
      expect(() => parse('precision :float {}')).toThrow(
        'Invalid precision specifier :float, expected :int'
      );
    });

    it('keeps frontmatter text on the script', () => {
      const script = parse('---\nmodule: shapes\n---\nx = 1');
      expect(script.frontmatter).toBe('module: shapes');
      expect(script.statements).toHaveLength(1);
    });
  });

  describe('errors', () => {
    it('throws ParseError with a location', () => {
      try {
        parse('x = (1 + ');
        expect.fail('expected a parse error');
      } catch (error) {
        expect(error).toBeInstanceOf(ParseError);
        if (error instanceof ParseError) {
          expect(error.code).toBe('PARSE_INVALID_SYNTAX');
          expect(error.kind).toBe('SyntaxError');
          expect(error.location).toEqual({ line: 1, column: 10, offset: 9 });
        }
      }
    });

    it('hints at an unclosed parenthesis', () => {
      expect(() => parse('f(1, 2')).toThrow(
        "Expected ')' after arguments. Hint: Check for unclosed parenthesis"
      );
    });

    it('suggests keywords for common typos', () => {
      expect(() => parse('fn f() retrun')).toThrow(
        "Expected '{' before function body. Hint: Did you mean 'return'?"
      );
    });

    it('hints at the arrow in match arms', () => {
      expect(() => parse('y = match x { 1 -> 2 }')).toThrow(
        "Expected '=>' after match pattern. Hint: Clauses and match arms use '=>'"
      );
    });

    it('reports unexpected end of input', () => {
      expect(() => parse('x = ')).toThrow('Unexpected end of input');
    });
  });
});
