/**
 * Parser Extension: Expression Parsing
 * Precedence chain, postfix operators, match, super and raise
 */

import { Parser } from './parser.js';
import type {
  BinaryOp,
  ExpressionNode,
  MatchArmNode,
  MatchNode,
  SourceLocation,
  SuperCallNode,
  TokenType,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  match,
  peek,
  skipSeparators,
  spanFrom,
  withInstantiation,
  withoutInstantiation,
} from './state.js';
import { expectName, isInstantiationStart, isLambdaStart } from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseOr(): ExpressionNode;
    parseAnd(): ExpressionNode;
    parseNot(): ExpressionNode;
    parseEquality(): ExpressionNode;
    parseComparison(): ExpressionNode;
    parseBitOr(): ExpressionNode;
    parseBitXor(): ExpressionNode;
    parseBitAnd(): ExpressionNode;
    parseShift(): ExpressionNode;
    parseAdditive(): ExpressionNode;
    parseMultiplicative(): ExpressionNode;
    parsePower(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parsePostfix(): ExpressionNode;
    parsePrimary(): ExpressionNode;
    parseSuperCall(): SuperCallNode;
    parseMatch(): MatchNode;
  }
}

// ============================================================
// OPERATOR TABLES
// ============================================================

/** Operators of one precedence level, keyed by token type */
type OperatorTable = Partial<Record<TokenType, BinaryOp>>;

/** Element-wise forms of the same level, keyed by base operator */
type ElementWiseTable = Partial<Record<string, BinaryOp>>;

const EQUALITY_OPS: OperatorTable = {
  [TOKEN_TYPES.EQ]: '==',
  [TOKEN_TYPES.NE]: '!=',
};
const EQUALITY_DOT_OPS: ElementWiseTable = { '==': '==', '!=': '!=' };

const COMPARISON_OPS: OperatorTable = {
  [TOKEN_TYPES.LT]: '<',
  [TOKEN_TYPES.LE]: '<=',
  [TOKEN_TYPES.GT]: '>',
  [TOKEN_TYPES.GE]: '>=',
  [TOKEN_TYPES.MATCH_OP]: '=~',
  [TOKEN_TYPES.NO_MATCH_OP]: '!~',
};
const COMPARISON_DOT_OPS: ElementWiseTable = {
  '<': '<',
  '<=': '<=',
  '>': '>',
  '>=': '>=',
};

const ADDITIVE_OPS: OperatorTable = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
};
const ADDITIVE_DOT_OPS: ElementWiseTable = { '+': '+', '-': '-' };

const MULTIPLICATIVE_OPS: OperatorTable = {
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
  [TOKEN_TYPES.SLASH_SLASH]: '//',
  [TOKEN_TYPES.PERCENT]: '%',
};
const MULTIPLICATIVE_DOT_OPS: ElementWiseTable = {
  '*': '*',
  '/': '/',
  '//': '//',
  '%': '%',
};

const NO_DOT_OPS: ElementWiseTable = {};

/**
 * Left-associative binary level: `next (op next)*`
 */
function parseLeftAssoc(
  parser: Parser,
  next: () => ExpressionNode,
  ops: OperatorTable,
  dotOps: ElementWiseTable
): ExpressionNode {
  const start = current(parser.state).span.start;
  let left = next();

  for (;;) {
    const token = current(parser.state);
    const elementWise = token.type === TOKEN_TYPES.DOT_OP;
    const op = elementWise ? dotOps[token.value] : ops[token.type];
    if (op === undefined) return left;

    advance(parser.state);
    const right = next();
    left = {
      type: 'BinaryExpr',
      op,
      elementWise,
      left,
      right,
      span: spanFrom(parser.state, start),
    };
  }
}

// ============================================================
// PRECEDENCE CHAIN
// ============================================================

/**
 * Lowest precedence: suffix conditionals.
 * `a if c`, `a if c else b`, `a unless c`
 */
Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  const value = this.parseOr();

  if (check(this.state, TOKEN_TYPES.IF, TOKEN_TYPES.UNLESS)) {
    const isUnless = advance(this.state).type === TOKEN_TYPES.UNLESS;
    const condition = this.parseOr();
    let elseExpr: ExpressionNode | null = null;
    if (!isUnless && match(this.state, TOKEN_TYPES.ELSE)) {
      elseExpr = this.parseExpression();
    }
    return {
      type: 'Conditional',
      condition,
      thenExpr: value,
      elseExpr,
      isUnless,
      span: spanFrom(this.state, start),
    };
  }

  return value;
};

Parser.prototype.parseOr = function (this: Parser): ExpressionNode {
  return parseLeftAssoc(
    this,
    () => this.parseAnd(),
    { [TOKEN_TYPES.OR]: 'or' },
    NO_DOT_OPS
  );
};

Parser.prototype.parseAnd = function (this: Parser): ExpressionNode {
  return parseLeftAssoc(
    this,
    () => this.parseNot(),
    { [TOKEN_TYPES.AND]: 'and' },
    NO_DOT_OPS
  );
};

Parser.prototype.parseNot = function (this: Parser): ExpressionNode {
  if (!check(this.state, TOKEN_TYPES.NOT)) return this.parseEquality();
  const start = advance(this.state).span.start;
  const operand = this.parseNot();
  return {
    type: 'UnaryExpr',
    op: 'not',
    operand,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseEquality = function (this: Parser): ExpressionNode {
  return parseLeftAssoc(
    this,
    () => this.parseComparison(),
    EQUALITY_OPS,
    EQUALITY_DOT_OPS
  );
};

Parser.prototype.parseComparison = function (this: Parser): ExpressionNode {
  return parseLeftAssoc(
    this,
    () => this.parseBitOr(),
    COMPARISON_OPS,
    COMPARISON_DOT_OPS
  );
};

Parser.prototype.parseBitOr = function (this: Parser): ExpressionNode {
  return parseLeftAssoc(
    this,
    () => this.parseBitXor(),
    { [TOKEN_TYPES.PIPE_BAR]: '|' },
    NO_DOT_OPS
  );
};

Parser.prototype.parseBitXor = function (this: Parser): ExpressionNode {
  return parseLeftAssoc(
    this,
    () => this.parseBitAnd(),
    { [TOKEN_TYPES.CARET]: '^' },
    { '^': '^' }
  );
};

Parser.prototype.parseBitAnd = function (this: Parser): ExpressionNode {
  return parseLeftAssoc(
    this,
    () => this.parseShift(),
    { [TOKEN_TYPES.AMPERSAND]: '&' },
    NO_DOT_OPS
  );
};

Parser.prototype.parseShift = function (this: Parser): ExpressionNode {
  return parseLeftAssoc(
    this,
    () => this.parseAdditive(),
    { [TOKEN_TYPES.SHL]: '<<', [TOKEN_TYPES.SHR]: '>>' },
    NO_DOT_OPS
  );
};

Parser.prototype.parseAdditive = function (this: Parser): ExpressionNode {
  return parseLeftAssoc(
    this,
    () => this.parseMultiplicative(),
    ADDITIVE_OPS,
    ADDITIVE_DOT_OPS
  );
};

Parser.prototype.parseMultiplicative = function (this: Parser): ExpressionNode {
  return parseLeftAssoc(
    this,
    () => this.parsePower(),
    MULTIPLICATIVE_OPS,
    MULTIPLICATIVE_DOT_OPS
  );
};

/** `**` is right associative: `2 ** 3 ** 2` is `2 ** 9` */
Parser.prototype.parsePower = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  const base = this.parseUnary();

  const token = current(this.state);
  const elementWise = token.type === TOKEN_TYPES.DOT_OP && token.value === '**';
  if (token.type !== TOKEN_TYPES.STAR_STAR && !elementWise) return base;

  advance(this.state);
  const exponent = this.parsePower();
  return {
    type: 'BinaryExpr',
    op: '**',
    elementWise,
    left: base,
    right: exponent,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  let op: '-' | 'not' | '~' | null = null;
  if (token.type === TOKEN_TYPES.MINUS) op = '-';
  else if (token.type === TOKEN_TYPES.BANG) op = 'not';
  else if (token.type === TOKEN_TYPES.TILDE) op = '~';
  if (op === null) return this.parsePostfix();

  advance(this.state);
  const operand = this.parseUnary();
  return {
    type: 'UnaryExpr',
    op,
    operand,
    span: spanFrom(this.state, token.span.start),
  };
};

// ============================================================
// POSTFIX
// ============================================================

/** Calls, indexing, `.method(args)`, `.property` and `Name { overrides }` */
Parser.prototype.parsePostfix = function (this: Parser): ExpressionNode {
  const start: SourceLocation = current(this.state).span.start;
  let expr = this.parsePrimary();

  for (;;) {
    if (check(this.state, TOKEN_TYPES.LPAREN)) {
      const args = this.parseArguments();
      expr = { type: 'Call', callee: expr, args, span: spanFrom(this.state, start) };
      continue;
    }

    if (match(this.state, TOKEN_TYPES.LBRACKET)) {
      const index = withInstantiation(this.state, () => this.parseExpression());
      expect(this.state, TOKEN_TYPES.RBRACKET, "Expected ']' after index");
      expr = { type: 'Index', object: expr, index, span: spanFrom(this.state, start) };
      continue;
    }

    if (match(this.state, TOKEN_TYPES.DOT)) {
      let name = expectName(this.state, "Expected method or property name after '.'");
      if (
        check(this.state, TOKEN_TYPES.BANG) &&
        peek(this.state, 1).type === TOKEN_TYPES.LPAREN
      ) {
        advance(this.state);
        name = `${name}!`;
      }
      if (check(this.state, TOKEN_TYPES.LPAREN)) {
        const args = this.parseArguments();
        expr = {
          type: 'MethodCall',
          object: expr,
          method: name,
          args,
          span: spanFrom(this.state, start),
        };
      } else {
        expr = {
          type: 'PropertyAccess',
          object: expr,
          property: name,
          span: spanFrom(this.state, start),
        };
      }
      continue;
    }

    if (expr.type === 'Variable' && isInstantiationStart(this.state)) {
      const overrides = this.parseMapLiteral().entries;
      expr = {
        type: 'Instantiate',
        className: expr,
        overrides,
        span: spanFrom(this.state, start),
      };
      continue;
    }

    return expr;
  }
};

// ============================================================
// PRIMARY
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const literal = this.parseScalarLiteral();
  if (literal) return literal;

  if (isLambdaStart(this.state)) return this.parseLambda();

  const token = current(this.state);
  switch (token.type) {
    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      return { type: 'Variable', name: token.value, span: token.span };

    case TOKEN_TYPES.LPAREN: {
      advance(this.state);
      const inner = withInstantiation(this.state, () => this.parseExpression());
      expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')' after expression");
      return inner;
    }

    case TOKEN_TYPES.LBRACKET:
      return this.parseListLiteral();

    case TOKEN_TYPES.LBRACE:
      return this.parseMapLiteral();

    case TOKEN_TYPES.GRAPH:
      return this.parseGraphLiteral();

    case TOKEN_TYPES.SUPER:
      return this.parseSuperCall();

    case TOKEN_TYPES.MATCH:
      return this.parseMatch();

    case TOKEN_TYPES.RAISE: {
      advance(this.state);
      const error = this.parseOr();
      return { type: 'Raise', error, span: spanFrom(this.state, token.span.start) };
    }

    default:
      throw new ParseError(
        token.type === TOKEN_TYPES.EOF
          ? 'Unexpected end of input'
          : `Unexpected token: '${token.value}'`,
        token.span.start,
        { actual: token.type }
      );
  }
};

/** `super.method(args)` */
Parser.prototype.parseSuperCall = function (this: Parser): SuperCallNode {
  const start = advance(this.state).span.start;
  expect(this.state, TOKEN_TYPES.DOT, "Expected '.' after 'super'");
  const method = expectName(this.state, "Expected method name after 'super.'");
  const args = this.parseArguments();
  return { type: 'SuperCall', method, args, span: spanFrom(this.state, start) };
};

/** `match value { pattern => expr, ... }` */
Parser.prototype.parseMatch = function (this: Parser): MatchNode {
  const start = advance(this.state).span.start;
  const value = withoutInstantiation(this.state, () => this.parseExpression());
  expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{' after match value");

  const arms: MatchArmNode[] = withInstantiation(this.state, () => {
    const parsed: MatchArmNode[] = [];
    skipSeparators(this.state);
    while (!check(this.state, TOKEN_TYPES.RBRACE)) {
      const armStart = current(this.state).span.start;
      const pattern = this.parseMatchPattern();
      expect(this.state, TOKEN_TYPES.FAT_ARROW, "Expected '=>' after match pattern");
      const body = this.parseExpression();
      parsed.push({
        type: 'MatchArm',
        pattern,
        body,
        span: spanFrom(this.state, armStart),
      });
      while (
        check(this.state, TOKEN_TYPES.COMMA, TOKEN_TYPES.NEWLINE, TOKEN_TYPES.SEMICOLON)
      ) {
        advance(this.state);
      }
    }
    return parsed;
  });

  expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}' after match arms");
  if (arms.length === 0) {
    throw new ParseError('Match expression must have at least one arm', start);
  }
  return { type: 'Match', value, arms, span: spanFrom(this.state, start) };
};
