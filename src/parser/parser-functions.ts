/**
 * Parser Extension: Function Parsing
 * Function declarations, parameters, arguments, clauses and lambdas
 */

import { Parser } from './parser.js';
import type {
  ArgumentNode,
  ExpressionNode,
  FunctionDeclNode,
  LambdaNode,
  ParamNode,
  PatternClauseNode,
  StatementNode,
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
  withoutLambda,
} from './state.js';
import { expectIdentifier, expectName, isNameToken } from './helpers.js';

export interface FunctionDeclOptions {
  readonly isPrivate: boolean;
  readonly isStatic: boolean;
}

/** Parameter list, guard and body shared by functions and graph methods */
export interface FunctionParts {
  readonly params: ParamNode[];
  readonly guard: ExpressionNode | null;
  readonly body: StatementNode[];
  readonly clauses: PatternClauseNode[] | null;
}

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseFunctionDecl(options: FunctionDeclOptions): FunctionDeclNode;
    parseFunctionParts(isSetter: boolean, allowClauses: boolean): FunctionParts;
    parseParams(): ParamNode[];
    parseArguments(): ArgumentNode[];
    parsePatternClause(): PatternClauseNode;
    parseLambda(): LambdaNode;
  }
}

// ============================================================
// FUNCTION DECLARATIONS
// ============================================================

/**
 * `fn name(params) [when guard] { body | clauses }`
 * `fn Recv.name(...)`, `set Recv.name(value)`, `static fn Recv.name(...)`
 */
Parser.prototype.parseFunctionDecl = function (
  this: Parser,
  options: FunctionDeclOptions
): FunctionDeclNode {
  const start = current(this.state).span.start;
  const keyword = advance(this.state);
  if (keyword.type !== TOKEN_TYPES.FN && keyword.type !== TOKEN_TYPES.SET) {
    throw new ParseError("Expected 'fn'", keyword.span.start);
  }
  const isSetter = keyword.type === TOKEN_TYPES.SET;

  let name = expectIdentifier(this.state, 'Expected function name');
  let receiver: string | null = null;
  if (match(this.state, TOKEN_TYPES.DOT)) {
    receiver = name;
    name = expectName(this.state, "Expected method name after '.'");
  }

  if (options.isStatic && receiver === null) {
    throw new ParseError(
      'Static methods must be attached to a graph. Use `static fn GraphName.method_name()`.',
      keyword.span.start
    );
  }

  const parts = this.parseFunctionParts(isSetter, true);

  return {
    type: 'FunctionDecl',
    name,
    receiver,
    params: parts.params,
    body: parts.body,
    clauses: parts.clauses,
    isPrivate: options.isPrivate,
    isSetter,
    isStatic: options.isStatic,
    guard: parts.guard,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseFunctionParts = function (
  this: Parser,
  isSetter: boolean,
  allowClauses: boolean
): FunctionParts {
  const paramsStart = current(this.state).span.start;
  const params = this.parseParams();
  if (isSetter && params.length !== 1) {
    throw new ParseError(
      'Setters must have exactly one parameter (the value being assigned).',
      paramsStart
    );
  }

  let guard: ExpressionNode | null = null;
  if (match(this.state, TOKEN_TYPES.WHEN)) {
    guard = withoutInstantiation(this.state, () => this.parseExpression());
  }

  expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{' before function body");
  skipSeparators(this.state);

  if (allowClauses && check(this.state, TOKEN_TYPES.PIPE_BAR)) {
    const clauses: PatternClauseNode[] = [];
    while (check(this.state, TOKEN_TYPES.PIPE_BAR)) {
      clauses.push(this.parsePatternClause());
      skipSeparators(this.state);
    }
    expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}' after pattern clauses");
    return { params, guard, body: [], clauses };
  }

  const body = this.parseStatementList();
  expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}' after function body");
  return { params, guard, body, clauses: null };
};

/** `(a, b = 1, ...rest)` */
Parser.prototype.parseParams = function (this: Parser): ParamNode[] {
  expect(this.state, TOKEN_TYPES.LPAREN, "Expected '(' after function name");
  const params: ParamNode[] = [];
  let sawVariadic = false;

  while (!check(this.state, TOKEN_TYPES.RPAREN)) {
    const start = current(this.state).span.start;
    const isVariadic = match(this.state, TOKEN_TYPES.ELLIPSIS);
    const name = expectIdentifier(this.state, 'Expected parameter name');

    let defaultValue: ExpressionNode | null = null;
    if (check(this.state, TOKEN_TYPES.ASSIGN)) {
      if (isVariadic) {
        throw new ParseError(
          'Variadic parameters cannot have default values',
          current(this.state).span.start
        );
      }
      advance(this.state);
      defaultValue = this.parseExpression();
    }

    if (isVariadic) {
      if (sawVariadic) {
        throw new ParseError('Only one variadic parameter is allowed', start);
      }
      sawVariadic = true;
    }

    params.push({
      type: 'Param',
      name,
      defaultValue,
      isVariadic,
      span: spanFrom(this.state, start),
    });

    if (!match(this.state, TOKEN_TYPES.COMMA)) break;
  }

  expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')' after parameters");
  return params;
};

// ============================================================
// ARGUMENTS
// ============================================================

/** `(a, name: b, x!)` */
Parser.prototype.parseArguments = function (this: Parser): ArgumentNode[] {
  expect(this.state, TOKEN_TYPES.LPAREN, "Expected '('");
  const args = withInstantiation(this.state, () => {
    const parsed: ArgumentNode[] = [];
    while (!check(this.state, TOKEN_TYPES.RPAREN)) {
      const start = current(this.state).span.start;

      if (
        isNameToken(current(this.state)) &&
        peek(this.state, 1).type === TOKEN_TYPES.COLON
      ) {
        const name = advance(this.state).value;
        advance(this.state);
        const value = this.parseExpression();
        const mutable = match(this.state, TOKEN_TYPES.BANG);
        parsed.push({
          type: 'NamedArg',
          name,
          value,
          mutable,
          span: spanFrom(this.state, start),
        });
      } else {
        const value = this.parseExpression();
        const mutable = match(this.state, TOKEN_TYPES.BANG);
        parsed.push({
          type: 'PositionalArg',
          value,
          mutable,
          span: spanFrom(this.state, start),
        });
      }

      if (!match(this.state, TOKEN_TYPES.COMMA)) break;
    }
    return parsed;
  });
  expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')' after arguments");
  return args;
};

// ============================================================
// PATTERN CLAUSES
// ============================================================

/** `|pattern| [if guard] => body` */
Parser.prototype.parsePatternClause = function (
  this: Parser
): PatternClauseNode {
  const start = current(this.state).span.start;
  expect(this.state, TOKEN_TYPES.PIPE_BAR, "Expected '|' to start pattern");
  const pattern = this.parseClausePattern();
  expect(this.state, TOKEN_TYPES.PIPE_BAR, "Expected '|' after pattern");

  let guard: ExpressionNode | null = null;
  if (match(this.state, TOKEN_TYPES.IF)) {
    guard = withoutLambda(this.state, () => this.parseExpression());
  }

  expect(this.state, TOKEN_TYPES.FAT_ARROW, "Expected '=>' after pattern");
  const body = this.parseExpression();

  return {
    type: 'PatternClause',
    pattern,
    guard,
    body,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// LAMBDAS
// ============================================================

/** `x => expr`, `(a, b) => expr`, `() => { statements }` */
Parser.prototype.parseLambda = function (this: Parser): LambdaNode {
  const start = current(this.state).span.start;
  const params: string[] = [];

  if (match(this.state, TOKEN_TYPES.LPAREN)) {
    while (!check(this.state, TOKEN_TYPES.RPAREN)) {
      params.push(expectIdentifier(this.state, 'Expected lambda parameter name'));
      if (!match(this.state, TOKEN_TYPES.COMMA)) break;
    }
    expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')' after lambda parameters");
  } else {
    params.push(expectIdentifier(this.state, 'Expected lambda parameter name'));
  }

  expect(this.state, TOKEN_TYPES.FAT_ARROW, "Expected '=>' after lambda parameters");

  if (check(this.state, TOKEN_TYPES.LBRACE)) {
    const body = withInstantiation(this.state, () => this.parseBlock());
    return { type: 'Lambda', params, body, span: spanFrom(this.state, start) };
  }

  const bodyStart = current(this.state).span.start;
  const value = this.parseExpression();
  return {
    type: 'Lambda',
    params,
    body: [{ type: 'Return', value, span: spanFrom(this.state, bodyStart) }],
    span: spanFrom(this.state, start),
  };
};
