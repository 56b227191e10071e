/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /**
   * Nesting count of heads (if/while/for/match subjects) where
   * `Name {` opens a block rather than an instantiation.
   */
  noInstantiation: number;
  /** Nesting count of clause guards, where `name =>` ends the guard */
  noLambda: number;
}

export function createParserState(tokens: Token[]): ParserState {
  return { tokens, pos: 0, noInstantiation: 0, noLambda: 0 };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: string[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** Consume the token when it has the given type */
export function match(state: ParserState, type: string): boolean {
  if (!check(state, type)) return false;
  advance(state);
  return true;
}

/** @internal */
export function expect(
  state: ParserState,
  type: string,
  message: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  const hint = generateHint(type, token);
  const fullMessage = hint ? `${message}. ${hint}` : message;
  throw new ParseError(fullMessage, token.span.start, {
    expected: type,
    actual: token.type,
  });
}

/** @internal */
export function skipNewlines(state: ParserState): void {
  while (check(state, TOKEN_TYPES.NEWLINE)) advance(state);
}

/** Skip statement separators: newlines and semicolons */
export function skipSeparators(state: ParserState): void {
  while (check(state, TOKEN_TYPES.NEWLINE, TOKEN_TYPES.SEMICOLON)) {
    advance(state);
  }
}

/** Run `fn` with brace instantiation disabled (condition and loop heads) */
export function withoutInstantiation<T>(state: ParserState, fn: () => T): T {
  state.noInstantiation++;
  try {
    return fn();
  } finally {
    state.noInstantiation--;
  }
}

/** Run `fn` with brace instantiation and lambdas re-enabled (inside delimiters) */
export function withInstantiation<T>(state: ParserState, fn: () => T): T {
  const saved = state.noInstantiation;
  const savedLambda = state.noLambda;
  state.noInstantiation = 0;
  state.noLambda = 0;
  try {
    return fn();
  } finally {
    state.noInstantiation = saved;
    state.noLambda = savedLambda;
  }
}

/** Run `fn` where `name =>` must not start a lambda (clause guards) */
export function withoutLambda<T>(state: ParserState, fn: () => T): T {
  state.noLambda++;
  try {
    return fn();
  } finally {
    state.noLambda--;
  }
}

// ============================================================
// ERROR HINTS
// ============================================================

const KEYWORD_TYPOS: Record<string, string> = {
  tru: 'true',
  ture: 'true',
  fals: 'false',
  flase: 'false',
  retrun: 'return',
  retrn: 'return',
  brek: 'break',
  esle: 'else',
  fucn: 'fn',
  func: 'fn',
  def: 'fn',
  function: 'fn',
  nil: 'none',
  null: 'none',
};

function generateHint(expectedType: string, actual: Token): string | null {
  if (actual.type === TOKEN_TYPES.EOF) {
    if (expectedType === TOKEN_TYPES.RPAREN) {
      return 'Hint: Check for unclosed parenthesis';
    }
    if (expectedType === TOKEN_TYPES.RBRACE) {
      return 'Hint: Check for unclosed brace';
    }
    if (expectedType === TOKEN_TYPES.RBRACKET) {
      return 'Hint: Check for unclosed bracket';
    }
  }

  if (actual.type === TOKEN_TYPES.IDENTIFIER) {
    const suggestion = KEYWORD_TYPOS[actual.value.toLowerCase()];
    if (suggestion) return `Hint: Did you mean '${suggestion}'?`;
  }

  if (expectedType === TOKEN_TYPES.FAT_ARROW) {
    return "Hint: Clauses and match arms use '=>'";
  }

  return null;
}

// ============================================================
// SPAN HELPERS
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** Span from `start` to the end of the previously consumed token */
export function spanFrom(state: ParserState, start: SourceLocation): SourceSpan {
  const previous = state.tokens[state.pos - 1];
  return makeSpan(start, previous ? previous.span.end : start);
}
