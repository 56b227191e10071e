/**
 * Parser Extension: Literal Parsing
 * Scalars, lists, maps and patterns
 */

import { Parser } from './parser.js';
import type {
  ClausePattern,
  ExpressionNode,
  ListLiteralNode,
  MapEntryNode,
  MapLiteralNode,
  MatchPattern,
  PatternLiteral,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  match,
  peek,
  skipNewlines,
  spanFrom,
  withInstantiation,
} from './state.js';
import { expectIdentifier, isNameToken } from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseScalarLiteral(): ExpressionNode | null;
    parseListLiteral(): ListLiteralNode;
    parseMapLiteral(): MapLiteralNode;
    parsePatternLiteral(): PatternLiteral | null;
    parseClausePattern(): ClausePattern;
    parseMatchPattern(): MatchPattern;
  }
}

// ============================================================
// SCALARS
// ============================================================

/** Number, string, bool, none or symbol; null when the token is none of these */
Parser.prototype.parseScalarLiteral = function (
  this: Parser
): ExpressionNode | null {
  const token = current(this.state);
  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return {
        type: 'NumberLiteral',
        value: Number(token.value),
        raw: token.value,
        span: token.span,
      };
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, span: token.span };
    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return {
        type: 'BoolLiteral',
        value: token.type === TOKEN_TYPES.TRUE,
        span: token.span,
      };
    case TOKEN_TYPES.NONE:
      advance(this.state);
      return { type: 'NoneLiteral', span: token.span };
    case TOKEN_TYPES.SYMBOL:
      advance(this.state);
      return { type: 'SymbolLiteral', name: token.value, span: token.span };
    default:
      return null;
  }
};

// ============================================================
// COLLECTIONS
// ============================================================

/** `[a, b, c]` with an optional trailing comma */
Parser.prototype.parseListLiteral = function (this: Parser): ListLiteralNode {
  const start = expect(this.state, TOKEN_TYPES.LBRACKET, "Expected '['").span.start;
  const elements = withInstantiation(this.state, () => {
    const parsed: ExpressionNode[] = [];
    while (!check(this.state, TOKEN_TYPES.RBRACKET)) {
      parsed.push(this.parseExpression());
      if (!match(this.state, TOKEN_TYPES.COMMA)) break;
    }
    return parsed;
  });
  expect(this.state, TOKEN_TYPES.RBRACKET, "Expected ']' after list elements");
  return { type: 'ListLiteral', elements, span: spanFrom(this.state, start) };
};

/** `{ "key": value, name: value }`; entries may span lines */
Parser.prototype.parseMapLiteral = function (this: Parser): MapLiteralNode {
  const start = expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{'").span.start;
  const entries = withInstantiation(this.state, () => {
    const parsed: MapEntryNode[] = [];
    skipNewlines(this.state);
    while (!check(this.state, TOKEN_TYPES.RBRACE)) {
      const keyToken = current(this.state);
      if (keyToken.type !== TOKEN_TYPES.STRING && !isNameToken(keyToken)) {
        throw new ParseError(
          `Expected map key, got '${keyToken.value}'`,
          keyToken.span.start
        );
      }
      advance(this.state);
      expect(this.state, TOKEN_TYPES.COLON, "Expected ':' after map key");
      skipNewlines(this.state);
      const value = this.parseExpression();
      parsed.push({
        type: 'MapEntry',
        key: keyToken.value,
        value,
        span: spanFrom(this.state, keyToken.span.start),
      });
      skipNewlines(this.state);
      if (!match(this.state, TOKEN_TYPES.COMMA)) break;
      skipNewlines(this.state);
    }
    return parsed;
  });
  expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}' after map entries");
  return { type: 'MapLiteral', entries, span: spanFrom(this.state, start) };
};

// ============================================================
// PATTERNS
// ============================================================

/** Literal allowed in a pattern: number (optionally negative), string, bool, none */
Parser.prototype.parsePatternLiteral = function (
  this: Parser
): PatternLiteral | null {
  const token = current(this.state);
  switch (token.type) {
    case TOKEN_TYPES.MINUS: {
      const next = peek(this.state, 1);
      if (next.type !== TOKEN_TYPES.NUMBER) return null;
      advance(this.state);
      advance(this.state);
      return { kind: 'number', value: -Number(next.value) };
    }
    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return { kind: 'number', value: Number(token.value) };
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { kind: 'string', value: token.value };
    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return { kind: 'bool', value: token.type === TOKEN_TYPES.TRUE };
    case TOKEN_TYPES.NONE:
      advance(this.state);
      return { kind: 'none' };
    default:
      return null;
  }
};

/** `0`, `"s"`, `none`, `x`, `_` */
Parser.prototype.parseClausePattern = function (this: Parser): ClausePattern {
  const literal = this.parsePatternLiteral();
  if (literal) return { kind: 'literal', literal };

  const token = current(this.state);
  if (token.type === TOKEN_TYPES.IDENTIFIER) {
    advance(this.state);
    return token.value === '_'
      ? { kind: 'wildcard' }
      : { kind: 'variable', name: token.value };
  }

  throw new ParseError(
    `Expected pattern (literal, variable, or _), got '${token.value}'`,
    token.span.start
  );
};

/** Clause patterns plus `[a, b, ...rest]` */
Parser.prototype.parseMatchPattern = function (this: Parser): MatchPattern {
  if (!match(this.state, TOKEN_TYPES.LBRACKET)) {
    return this.parseClausePattern();
  }

  const elements: MatchPattern[] = [];
  let rest: string | null = null;
  while (!check(this.state, TOKEN_TYPES.RBRACKET)) {
    if (match(this.state, TOKEN_TYPES.ELLIPSIS)) {
      rest = expectIdentifier(this.state, "Expected name after '...'");
      break;
    }
    elements.push(this.parseMatchPattern());
    if (!match(this.state, TOKEN_TYPES.COMMA)) break;
  }
  expect(this.state, TOKEN_TYPES.RBRACKET, "Expected ']' after list pattern");
  return { kind: 'list', elements, rest };
};
