/**
 * Parser Helpers
 * Lookahead predicates and utility parsing functions
 * @internal This module contains internal parser utilities
 */

import type { Token, TypeAnnotation } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  type ParserState,
  advance,
  check,
  current,
  peek,
  skipNewlines,
} from './state.js';

// ============================================================
// TYPE ANNOTATIONS
// ============================================================

/** @internal */
export const TYPE_ANNOTATIONS: readonly TypeAnnotation[] = [
  'num',
  'bignum',
  'string',
  'bool',
  'list',
  'map',
  'graph',
];

/** @internal */
export function asTypeAnnotation(token: Token): TypeAnnotation | null {
  return TYPE_ANNOTATIONS.find((name) => name === token.value) ?? null;
}

// ============================================================
// NAMES
// ============================================================

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Identifiers and keywords spelled like identifiers.
 * Method, property and map-key positions accept both (`obj.set`, `{type: 1}`).
 * @internal
 */
export function isNameToken(token: Token): boolean {
  if (token.type === TOKEN_TYPES.IDENTIFIER) return true;
  if (token.type === TOKEN_TYPES.STRING || token.type === TOKEN_TYPES.SYMBOL) {
    return false;
  }
  return NAME_PATTERN.test(token.value);
}

/** @internal */
export function expectName(state: ParserState, message: string): string {
  const token = current(state);
  if (!isNameToken(token)) {
    throw new ParseError(message, token.span.start, { actual: token.type });
  }
  advance(state);
  return token.value;
}

/** @internal */
export function expectIdentifier(state: ParserState, message: string): string {
  const token = current(state);
  if (token.type !== TOKEN_TYPES.IDENTIFIER) {
    throw new ParseError(message, token.span.start, { actual: token.type });
  }
  advance(state);
  return token.value;
}

// ============================================================
// LOOKAHEAD PREDICATES
// ============================================================

/**
 * Check for a statement terminator: newline, `;`, `}` or end of input
 * @internal
 */
export function isStatementEnd(state: ParserState): boolean {
  return check(
    state,
    TOKEN_TYPES.NEWLINE,
    TOKEN_TYPES.SEMICOLON,
    TOKEN_TYPES.RBRACE,
    TOKEN_TYPES.EOF
  );
}

/**
 * Check for a typed declaration: `num x =`, `graph g =`
 * @internal
 */
export function isTypedDeclaration(state: ParserState, offset = 0): boolean {
  const head = peek(state, offset);
  const isType =
    head.type === TOKEN_TYPES.GRAPH
      ? true
      : head.type === TOKEN_TYPES.IDENTIFIER && asTypeAnnotation(head) !== null;
  return (
    isType &&
    peek(state, offset + 1).type === TOKEN_TYPES.IDENTIFIER &&
    peek(state, offset + 2).type === TOKEN_TYPES.ASSIGN
  );
}

/**
 * Index of the token after the group closing the `(` at `offset`,
 * or -1 when the group never closes.
 * @internal
 */
export function skipParenGroup(state: ParserState, offset: number): number {
  let depth = 0;
  let i = offset;
  for (;;) {
    const token = peek(state, i);
    if (token.type === TOKEN_TYPES.EOF) return -1;
    if (token.type === TOKEN_TYPES.LPAREN) depth++;
    if (token.type === TOKEN_TYPES.RPAREN) {
      depth--;
      if (depth === 0) return i + 1;
    }
    i++;
  }
}

/**
 * Check for lambda start: `x =>` or `(a, b) =>`
 * @internal
 */
export function isLambdaStart(state: ParserState): boolean {
  if (state.noLambda > 0) return false;
  if (check(state, TOKEN_TYPES.IDENTIFIER)) {
    return peek(state, 1).type === TOKEN_TYPES.FAT_ARROW;
  }
  if (!check(state, TOKEN_TYPES.LPAREN)) return false;
  const after = skipParenGroup(state, 0);
  return after > 0 && peek(state, after).type === TOKEN_TYPES.FAT_ARROW;
}

/**
 * Check for instantiation braces after a class name: `Name {}` or
 * `Name { prop: value }`
 * @internal
 */
export function isInstantiationStart(state: ParserState): boolean {
  if (state.noInstantiation > 0 || !check(state, TOKEN_TYPES.LBRACE)) {
    return false;
  }
  let offset = 1;
  while (peek(state, offset).type === TOKEN_TYPES.NEWLINE) offset++;
  const first = peek(state, offset);
  if (first.type === TOKEN_TYPES.RBRACE) return true;
  return (
    isNameToken(first) && peek(state, offset + 1).type === TOKEN_TYPES.COLON
  );
}

/**
 * Continuation keyword on a later line: `}\n else {`. Consumes the
 * newlines only when the keyword follows them.
 * @internal
 */
export function skipNewlinesBefore(state: ParserState, type: string): boolean {
  let offset = 0;
  while (peek(state, offset).type === TOKEN_TYPES.NEWLINE) offset++;
  if (peek(state, offset).type !== type) return false;
  skipNewlines(state);
  return true;
}
