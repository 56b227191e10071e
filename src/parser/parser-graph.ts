/**
 * Parser Extension: Graph Parsing
 * Named graph declarations (types) and graph literals
 */

import { Parser } from './parser.js';
import type {
  AccessorConfig,
  ExpressionNode,
  GraphDeclNode,
  GraphLiteralNode,
  GraphMethodNode,
  GraphPropertyNode,
  GraphRuleNode,
  MapEntryNode,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  match,
  spanFrom,
  withoutInstantiation,
} from './state.js';
import { expectIdentifier, expectName } from './helpers.js';

type AccessorKey = keyof AccessorConfig;

const ACCESSOR_KEYS: readonly AccessorKey[] = [
  'readable',
  'writable',
  'accessible',
];

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseGraphDecl(): GraphDeclNode;
    parseGraphMethod(isPrivate: boolean, isStatic: boolean): GraphMethodNode;
    parseAccessorConfig(into: Record<AccessorKey, string[]>): void;
    parseGraphLiteral(): GraphLiteralNode;
  }
}

// ============================================================
// GRAPH DECLARATIONS
// ============================================================

/**
 * ```
 * graph Name[(:type)] [from Parent] {
 *   prop: value
 *   fn method() { ... }
 *   rule :no_cycles
 *   configure { readable: [:prop] }
 * }
 * ```
 */
Parser.prototype.parseGraphDecl = function (this: Parser): GraphDeclNode {
  const start = advance(this.state).span.start;
  const name = expectIdentifier(this.state, "Expected graph name after 'graph'");

  let graphType: string | null = null;
  if (match(this.state, TOKEN_TYPES.LPAREN)) {
    graphType = expect(
      this.state,
      TOKEN_TYPES.SYMBOL,
      'Expected graph type symbol (e.g., :dag, :tree)'
    ).value;
    expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')' after graph type");
  }

  let parent: ExpressionNode | null = null;
  if (match(this.state, TOKEN_TYPES.FROM)) {
    parent = withoutInstantiation(this.state, () => this.parseExpression());
  }

  expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{' after graph declaration");

  const properties: GraphPropertyNode[] = [];
  const methods: GraphMethodNode[] = [];
  const rules: GraphRuleNode[] = [];
  const accessors: Record<AccessorKey, string[]> = {
    readable: [],
    writable: [],
    accessible: [],
  };

  for (;;) {
    while (
      check(
        this.state,
        TOKEN_TYPES.NEWLINE,
        TOKEN_TYPES.SEMICOLON,
        TOKEN_TYPES.COMMA
      )
    ) {
      advance(this.state);
    }
    if (check(this.state, TOKEN_TYPES.RBRACE) || isAtEnd(this.state)) break;

    const token = current(this.state);

    if (token.type === TOKEN_TYPES.CONFIGURE) {
      advance(this.state);
      expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{' after 'configure'");
      this.parseAccessorConfig(accessors);
      expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}' to close configure block");
      continue;
    }

    if (token.type === TOKEN_TYPES.RULE) {
      advance(this.state);
      const ruleName = expect(
        this.state,
        TOKEN_TYPES.SYMBOL,
        "Expected symbol after 'rule' (e.g., rule :no_cycles)"
      ).value;
      const param = match(this.state, TOKEN_TYPES.COMMA)
        ? this.parseExpression()
        : null;
      rules.push({
        type: 'GraphRule',
        name: ruleName,
        param,
        span: spanFrom(this.state, token.span.start),
      });
      continue;
    }

    const isPrivate = match(this.state, TOKEN_TYPES.PRIV);
    const isStatic = !isPrivate && match(this.state, TOKEN_TYPES.STATIC);
    if (check(this.state, TOKEN_TYPES.FN, TOKEN_TYPES.SET)) {
      methods.push(this.parseGraphMethod(isPrivate, isStatic));
      continue;
    }
    if (isPrivate || isStatic) {
      throw new ParseError(
        `Expected 'fn' or 'set' after '${token.value}' in graph body`,
        current(this.state).span.start
      );
    }

    if (token.type === TOKEN_TYPES.IDENTIFIER) {
      advance(this.state);
      expect(
        this.state,
        TOKEN_TYPES.COLON,
        `Expected ':' after property name '${token.value}' in graph body`
      );
      const value = this.parseExpression();
      properties.push({
        type: 'GraphProperty',
        name: token.value,
        value,
        span: spanFrom(this.state, token.span.start),
      });
      continue;
    }

    throw new ParseError(
      `Unexpected token in graph body: '${token.value}'`,
      token.span.start
    );
  }

  expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}' to close graph declaration");

  return {
    type: 'GraphDecl',
    name,
    graphType,
    parent,
    properties,
    methods,
    rules,
    accessors,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseGraphMethod = function (
  this: Parser,
  isPrivate: boolean,
  isStatic: boolean
): GraphMethodNode {
  const start = current(this.state).span.start;
  const isSetter = advance(this.state).type === TOKEN_TYPES.SET;
  const name = expectName(this.state, 'Expected method name');
  const parts = this.parseFunctionParts(isSetter, false);

  return {
    type: 'GraphMethod',
    name,
    params: parts.params,
    body: parts.body,
    isStatic,
    isSetter,
    isPrivate,
    guard: parts.guard,
    span: spanFrom(this.state, start),
  };
};

/** `readable: :x, writable: [:y, :z]` inside a graph body's configure block */
Parser.prototype.parseAccessorConfig = function (
  this: Parser,
  into: Record<AccessorKey, string[]>
): void {
  for (;;) {
    while (check(this.state, TOKEN_TYPES.NEWLINE, TOKEN_TYPES.COMMA)) {
      advance(this.state);
    }
    if (check(this.state, TOKEN_TYPES.RBRACE) || isAtEnd(this.state)) return;

    const keyToken = current(this.state);
    const key = ACCESSOR_KEYS.find((k) => k === keyToken.value);
    if (keyToken.type !== TOKEN_TYPES.IDENTIFIER || key === undefined) {
      throw new ParseError(
        `Unknown config key '${keyToken.value}'. Valid keys: readable, writable, accessible`,
        keyToken.span.start
      );
    }
    advance(this.state);
    expect(this.state, TOKEN_TYPES.COLON, `Expected ':' after config key '${key}'`);

    const symbols: string[] = [];
    if (match(this.state, TOKEN_TYPES.LBRACKET)) {
      while (check(this.state, TOKEN_TYPES.SYMBOL)) {
        symbols.push(advance(this.state).value);
        if (!match(this.state, TOKEN_TYPES.COMMA)) break;
      }
      expect(this.state, TOKEN_TYPES.RBRACKET, "Expected ']' after symbol list");
    } else if (check(this.state, TOKEN_TYPES.SYMBOL)) {
      symbols.push(advance(this.state).value);
    }

    if (symbols.length === 0) {
      throw new ParseError(
        `Config '${key}' requires at least one symbol`,
        keyToken.span.start
      );
    }
    into[key].push(...symbols);
  }
};

// ============================================================
// GRAPH LITERALS
// ============================================================

/** `graph {}`, `graph { type: :dag }`, `graph from Parent` */
Parser.prototype.parseGraphLiteral = function (this: Parser): GraphLiteralNode {
  const start = advance(this.state).span.start;

  if (match(this.state, TOKEN_TYPES.FROM)) {
    const parent = this.parsePostfix();
    return {
      type: 'GraphLiteral',
      config: [],
      parent,
      span: spanFrom(this.state, start),
    };
  }

  let config: MapEntryNode[] = [];
  if (check(this.state, TOKEN_TYPES.LBRACE)) {
    config = this.parseMapLiteral().entries;
  }
  return { type: 'GraphLiteral', config, parent: null, span: spanFrom(this.state, start) };
};
