/**
 * Parser Extension: Control Flow Parsing
 * Conditionals, loops, try/catch/finally and blocks
 */

import { Parser } from './parser.js';
import type {
  CatchClauseNode,
  ForNode,
  IfNode,
  ReturnNode,
  StatementNode,
  TryNode,
  WhileNode,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  match,
  spanFrom,
  withoutInstantiation,
} from './state.js';
import {
  expectIdentifier,
  isStatementEnd,
  skipNewlinesBefore,
} from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseBlock(): StatementNode[];
    parseIf(): IfNode;
    parseWhile(): WhileNode;
    parseFor(): ForNode;
    parseTry(): TryNode;
    parseCatchClause(): CatchClauseNode;
    parseReturn(): ReturnNode;
  }
}

// ============================================================
// BLOCKS
// ============================================================

/** `{ statements }` */
Parser.prototype.parseBlock = function (this: Parser): StatementNode[] {
  expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{'");
  const statements = this.parseStatementList();
  expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}'");
  return statements;
};

// ============================================================
// CONDITIONALS
// ============================================================

Parser.prototype.parseIf = function (this: Parser): IfNode {
  const start = advance(this.state).span.start;
  const condition = withoutInstantiation(this.state, () =>
    this.parseExpression()
  );
  const thenBranch = this.parseBlock();

  let elseBranch: StatementNode[] | null = null;
  if (skipNewlinesBefore(this.state, TOKEN_TYPES.ELSE)) {
    advance(this.state);
    // else if chains nest as a single If in the else branch
    elseBranch = check(this.state, TOKEN_TYPES.IF)
      ? [this.parseIf()]
      : this.parseBlock();
  }

  return {
    type: 'If',
    condition,
    thenBranch,
    elseBranch,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// LOOPS
// ============================================================

Parser.prototype.parseWhile = function (this: Parser): WhileNode {
  const start = advance(this.state).span.start;
  const condition = withoutInstantiation(this.state, () =>
    this.parseExpression()
  );
  const body = this.parseBlock();
  return { type: 'While', condition, body, span: spanFrom(this.state, start) };
};

Parser.prototype.parseFor = function (this: Parser): ForNode {
  const start = advance(this.state).span.start;
  const variable = expectIdentifier(
    this.state,
    "Expected loop variable after 'for'"
  );
  expect(this.state, TOKEN_TYPES.IN, "Expected 'in' after loop variable");
  const iterable = withoutInstantiation(this.state, () =>
    this.parseExpression()
  );
  const body = this.parseBlock();
  return {
    type: 'For',
    variable,
    iterable,
    body,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// TRY / CATCH / FINALLY
// ============================================================

Parser.prototype.parseTry = function (this: Parser): TryNode {
  const start = advance(this.state).span.start;
  const body = this.parseBlock();

  const catchClauses: CatchClauseNode[] = [];
  while (skipNewlinesBefore(this.state, TOKEN_TYPES.CATCH)) {
    catchClauses.push(this.parseCatchClause());
  }

  let finallyBlock: StatementNode[] | null = null;
  if (skipNewlinesBefore(this.state, TOKEN_TYPES.FINALLY)) {
    advance(this.state);
    finallyBlock = this.parseBlock();
  }

  if (catchClauses.length === 0 && finallyBlock === null) {
    throw new ParseError(
      "Expected 'catch' or 'finally' after try block",
      current(this.state).span.start
    );
  }

  return {
    type: 'Try',
    body,
    catchClauses,
    finallyBlock,
    span: spanFrom(this.state, start),
  };
};

/** `catch`, `catch Type`, `catch as e`, `catch Type as e` */
Parser.prototype.parseCatchClause = function (this: Parser): CatchClauseNode {
  const start = advance(this.state).span.start;
  let errorType: string | null = null;
  let variable: string | null = null;

  if (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
    errorType = advance(this.state).value;
  }
  if (match(this.state, TOKEN_TYPES.AS)) {
    variable = expectIdentifier(this.state, "Expected variable name after 'as'");
  }

  const body = this.parseBlock();
  return {
    type: 'CatchClause',
    errorType,
    variable,
    body,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// RETURN
// ============================================================

Parser.prototype.parseReturn = function (this: Parser): ReturnNode {
  const start = advance(this.state).span.start;
  const value = isStatementEnd(this.state) ? null : this.parseExpression();
  return { type: 'Return', value, span: spanFrom(this.state, start) };
};
