/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Three-character operator lookup table */
export const THREE_CHAR_OPERATORS: Record<string, TokenType> = {
  '...': TOKEN_TYPES.ELLIPSIS,
};

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '//': TOKEN_TYPES.SLASH_SLASH,
  '**': TOKEN_TYPES.STAR_STAR,
  '<<': TOKEN_TYPES.SHL,
  '>>': TOKEN_TYPES.SHR,
  '==': TOKEN_TYPES.EQ,
  '!=': TOKEN_TYPES.NE,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
  '=~': TOKEN_TYPES.MATCH_OP,
  '!~': TOKEN_TYPES.NO_MATCH_OP,
  '=>': TOKEN_TYPES.FAT_ARROW,
  '&&': TOKEN_TYPES.AND,
  '||': TOKEN_TYPES.OR,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '.': TOKEN_TYPES.DOT,
  ':': TOKEN_TYPES.COLON,
  ',': TOKEN_TYPES.COMMA,
  ';': TOKEN_TYPES.SEMICOLON,
  '!': TOKEN_TYPES.BANG,
  '=': TOKEN_TYPES.ASSIGN,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  '|': TOKEN_TYPES.PIPE_BAR,
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
  '&': TOKEN_TYPES.AMPERSAND,
  '^': TOKEN_TYPES.CARET,
  '~': TOKEN_TYPES.TILDE,
};

/**
 * Element-wise operators, longest first. The token value is the base
 * operator: `.+` yields DOT_OP with value `+`.
 */
export const ELEMENT_WISE_OPERATORS: readonly string[] = [
  './/',
  '.**',
  '.==',
  '.!=',
  '.<=',
  '.>=',
  '.+',
  '.-',
  '.*',
  './',
  '.%',
  '.^',
  '.<',
  '.>',
];

/** Keyword lookup table */
export const KEYWORDS: Record<string, TokenType> = {
  true: TOKEN_TYPES.TRUE,
  false: TOKEN_TYPES.FALSE,
  none: TOKEN_TYPES.NONE,
  fn: TOKEN_TYPES.FN,
  set: TOKEN_TYPES.SET,
  static: TOKEN_TYPES.STATIC,
  priv: TOKEN_TYPES.PRIV,
  if: TOKEN_TYPES.IF,
  else: TOKEN_TYPES.ELSE,
  unless: TOKEN_TYPES.UNLESS,
  while: TOKEN_TYPES.WHILE,
  for: TOKEN_TYPES.FOR,
  in: TOKEN_TYPES.IN,
  return: TOKEN_TYPES.RETURN,
  break: TOKEN_TYPES.BREAK,
  continue: TOKEN_TYPES.CONTINUE,
  try: TOKEN_TYPES.TRY,
  catch: TOKEN_TYPES.CATCH,
  finally: TOKEN_TYPES.FINALLY,
  raise: TOKEN_TYPES.RAISE,
  as: TOKEN_TYPES.AS,
  import: TOKEN_TYPES.IMPORT,
  load: TOKEN_TYPES.LOAD,
  module: TOKEN_TYPES.MODULE,
  alias: TOKEN_TYPES.ALIAS,
  configure: TOKEN_TYPES.CONFIGURE,
  precision: TOKEN_TYPES.PRECISION,
  graph: TOKEN_TYPES.GRAPH,
  from: TOKEN_TYPES.FROM,
  rule: TOKEN_TYPES.RULE,
  when: TOKEN_TYPES.WHEN,
  match: TOKEN_TYPES.MATCH,
  super: TOKEN_TYPES.SUPER,
  and: TOKEN_TYPES.AND,
  or: TOKEN_TYPES.OR,
  not: TOKEN_TYPES.NOT,
};
