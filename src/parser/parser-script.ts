/**
 * Parser Extension: Script Parsing
 * Script, frontmatter, statements, declarations, modules and configuration
 */

import { Parser } from './parser.js';
import type {
  AssignTarget,
  ConfigEntryNode,
  ConfigureNode,
  ExpressionNode,
  ImportNode,
  LoadNode,
  ModuleDeclNode,
  PrecisionNode,
  ScriptNode,
  StatementNode,
  TypeAnnotation,
  VariableDeclNode,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  makeSpan,
  match,
  peek,
  skipSeparators,
  spanFrom,
} from './state.js';
import {
  asTypeAnnotation,
  expectIdentifier,
  isStatementEnd,
  isTypedDeclaration,
} from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseScript(): ScriptNode;
    parseStatement(): StatementNode;
    parseStatementList(): StatementNode[];
    parseVariableDecl(isPrivate: boolean): VariableDeclNode;
    parseExpressionStatement(): StatementNode;
    parseImport(): ImportNode;
    parseLoad(): LoadNode;
    parseModuleDecl(): ModuleDeclNode;
    parseConfigure(): ConfigureNode;
    parseConfigEntries(): ConfigEntryNode[];
    parsePrecision(): PrecisionNode;
  }
}

// ============================================================
// SCRIPT PARSING
// ============================================================

Parser.prototype.parseScript = function (this: Parser): ScriptNode {
  const start = current(this.state).span.start;
  skipSeparators(this.state);

  let frontmatter: string | null = null;
  if (check(this.state, TOKEN_TYPES.FRONTMATTER)) {
    frontmatter = advance(this.state).value;
  }

  const statements = this.parseStatementList();
  if (!isAtEnd(this.state)) {
    const token = current(this.state);
    throw new ParseError(`Unexpected token: ${token.value}`, token.span.start);
  }

  return {
    type: 'Script',
    frontmatter,
    statements,
    span: makeSpan(start, current(this.state).span.end),
  };
};

/**
 * Statements up to `}` or end of input. Each statement must be followed by
 * a newline, `;`, `}` or the end of input.
 */
Parser.prototype.parseStatementList = function (
  this: Parser
): StatementNode[] {
  const statements: StatementNode[] = [];
  skipSeparators(this.state);
  while (!isAtEnd(this.state) && !check(this.state, TOKEN_TYPES.RBRACE)) {
    statements.push(this.parseStatement());
    if (!isStatementEnd(this.state)) {
      const token = current(this.state);
      throw new ParseError(
        `Expected end of statement, got '${token.value}'`,
        token.span.start
      );
    }
    skipSeparators(this.state);
  }
  return statements;
};

// ============================================================
// STATEMENT DISPATCH
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.FN:
      return this.parseFunctionDecl({ isPrivate: false, isStatic: false });
    case TOKEN_TYPES.SET:
      return this.parseFunctionDecl({ isPrivate: false, isStatic: false });
    case TOKEN_TYPES.STATIC:
      advance(this.state);
      return this.parseFunctionDecl({ isPrivate: false, isStatic: true });
    case TOKEN_TYPES.PRIV:
      advance(this.state);
      if (check(this.state, TOKEN_TYPES.FN, TOKEN_TYPES.SET)) {
        return this.parseFunctionDecl({ isPrivate: true, isStatic: false });
      }
      return this.parseVariableDecl(true);
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.WHILE:
      return this.parseWhile();
    case TOKEN_TYPES.FOR:
      return this.parseFor();
    case TOKEN_TYPES.TRY:
      return this.parseTry();
    case TOKEN_TYPES.RETURN:
      return this.parseReturn();
    case TOKEN_TYPES.BREAK:
      advance(this.state);
      return { type: 'Break', span: token.span };
    case TOKEN_TYPES.CONTINUE:
      advance(this.state);
      return { type: 'Continue', span: token.span };
    case TOKEN_TYPES.IMPORT:
      return this.parseImport();
    case TOKEN_TYPES.LOAD:
      return this.parseLoad();
    case TOKEN_TYPES.MODULE:
      return this.parseModuleDecl();
    case TOKEN_TYPES.CONFIGURE:
      return this.parseConfigure();
    case TOKEN_TYPES.PRECISION:
      return this.parsePrecision();
    case TOKEN_TYPES.GRAPH:
      if (isTypedDeclaration(this.state)) return this.parseVariableDecl(false);
      if (peek(this.state, 1).type === TOKEN_TYPES.IDENTIFIER) {
        return this.parseGraphDecl();
      }
      return this.parseExpressionStatement();
    default:
      if (isTypedDeclaration(this.state)) return this.parseVariableDecl(false);
      return this.parseExpressionStatement();
  }
};

// ============================================================
// VARIABLES AND ASSIGNMENT
// ============================================================

/** `[priv] [type] name = value`; the `priv` keyword is already consumed */
Parser.prototype.parseVariableDecl = function (
  this: Parser,
  isPrivate: boolean
): VariableDeclNode {
  const start = current(this.state).span.start;
  let typeAnnotation: TypeAnnotation | null = null;
  if (isTypedDeclaration(this.state)) {
    typeAnnotation = asTypeAnnotation(advance(this.state));
  }
  const name = expectIdentifier(this.state, 'Expected variable name');
  expect(this.state, TOKEN_TYPES.ASSIGN, `Expected '=' after '${name}'`);
  const value = this.parseExpression();

  return {
    type: 'VariableDecl',
    name,
    typeAnnotation,
    value,
    isPrivate,
    span: spanFrom(this.state, start),
  };
};

function toAssignTarget(expr: ExpressionNode): AssignTarget | null {
  switch (expr.type) {
    case 'Variable':
      return { kind: 'variable', name: expr.name };
    case 'Index':
      return { kind: 'index', object: expr.object, index: expr.index };
    case 'PropertyAccess':
      return {
        kind: 'property',
        object: expr.object,
        property: expr.property,
      };
    default:
      return null;
  }
}

Parser.prototype.parseExpressionStatement = function (
  this: Parser
): StatementNode {
  const start = current(this.state).span.start;
  const expression = this.parseExpression();

  if (check(this.state, TOKEN_TYPES.ASSIGN)) {
    const assignToken = advance(this.state);
    const target = toAssignTarget(expression);
    if (!target) {
      throw new ParseError('Invalid assignment target', assignToken.span.start);
    }
    const value = this.parseExpression();
    return {
      type: 'Assignment',
      target,
      value,
      span: spanFrom(this.state, start),
    };
  }

  return {
    type: 'ExpressionStatement',
    expression,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// MODULES
// ============================================================

Parser.prototype.parseImport = function (this: Parser): ImportNode {
  const start = advance(this.state).span.start;
  const path = expect(
    this.state,
    TOKEN_TYPES.STRING,
    "Expected module path string after 'import'"
  ).value;
  let alias: string | null = null;
  if (match(this.state, TOKEN_TYPES.AS)) {
    alias = expectIdentifier(this.state, "Expected alias name after 'as'");
  }
  return { type: 'Import', path, alias, span: spanFrom(this.state, start) };
};

Parser.prototype.parseLoad = function (this: Parser): LoadNode {
  const start = advance(this.state).span.start;
  const path = expect(
    this.state,
    TOKEN_TYPES.STRING,
    "Expected file path string after 'load'"
  ).value;
  return { type: 'Load', path, span: spanFrom(this.state, start) };
};

Parser.prototype.parseModuleDecl = function (this: Parser): ModuleDeclNode {
  const start = advance(this.state).span.start;
  const name = expectIdentifier(this.state, "Expected module name after 'module'");
  let alias: string | null = null;
  if (match(this.state, TOKEN_TYPES.ALIAS)) {
    alias = expectIdentifier(this.state, "Expected alias name after 'alias'");
  }
  return { type: 'ModuleDecl', name, alias, span: spanFrom(this.state, start) };
};

// ============================================================
// CONFIGURATION
// ============================================================

/**
 * `configure { key: value, :flag }` optionally followed by a body.
 * Without a body the settings stay in force for the enclosing scope.
 */
Parser.prototype.parseConfigure = function (this: Parser): ConfigureNode {
  const start = advance(this.state).span.start;
  expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{' after 'configure'");
  const settings = this.parseConfigEntries();
  expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}' to close configure settings");

  let body: StatementNode[] | null = null;
  if (check(this.state, TOKEN_TYPES.LBRACE)) {
    body = this.parseBlock();
  }
  return { type: 'Configure', settings, body, span: spanFrom(this.state, start) };
};

Parser.prototype.parseConfigEntries = function (
  this: Parser
): ConfigEntryNode[] {
  const entries: ConfigEntryNode[] = [];
  for (;;) {
    while (check(this.state, TOKEN_TYPES.NEWLINE, TOKEN_TYPES.COMMA)) {
      advance(this.state);
    }
    if (check(this.state, TOKEN_TYPES.RBRACE) || isAtEnd(this.state)) break;

    const token = current(this.state);
    if (token.type === TOKEN_TYPES.SYMBOL) {
      advance(this.state);
      entries.push({
        type: 'ConfigEntry',
        key: token.value,
        value: { type: 'SymbolLiteral', name: token.value, span: token.span },
        span: token.span,
      });
      continue;
    }

    if (
      token.type !== TOKEN_TYPES.IDENTIFIER &&
      token.type !== TOKEN_TYPES.PRECISION
    ) {
      throw new ParseError(
        `Expected configuration key or symbol, got '${token.value}'`,
        token.span.start
      );
    }
    advance(this.state);
    expect(this.state, TOKEN_TYPES.COLON, "Expected ':' after configuration key");
    const value = this.parseExpression();
    entries.push({
      type: 'ConfigEntry',
      key: token.value,
      value,
      span: spanFrom(this.state, token.span.start),
    });
  }
  return entries;
};

/** `precision N { body }` or `precision :int { body }` */
Parser.prototype.parsePrecision = function (this: Parser): PrecisionNode {
  const start = advance(this.state).span.start;
  const token = current(this.state);
  let places: number;

  if (token.type === TOKEN_TYPES.NUMBER) {
    places = Number(token.value);
    if (!Number.isInteger(places) || places < 0) {
      throw new ParseError(
        'Precision must be a non-negative integer',
        token.span.start
      );
    }
  } else if (token.type === TOKEN_TYPES.SYMBOL) {
    if (token.value !== 'int') {
      throw new ParseError(
        `Invalid precision specifier :${token.value}, expected :int`,
        token.span.start
      );
    }
    places = 0;
  } else {
    throw new ParseError(
      "Expected number or :int after 'precision'",
      token.span.start
    );
  }
  advance(this.state);

  const body = this.parseBlock();
  return { type: 'Precision', places, body, span: spanFrom(this.state, start) };
};
