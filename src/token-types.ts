/**
 * Token Types
 */

import type { SourceSpan } from './source-location.js';

export const TOKEN_TYPES = {
  // Literals
  NUMBER: 'NUMBER',
  STRING: 'STRING',
  SYMBOL: 'SYMBOL', // :name
  TRUE: 'TRUE',
  FALSE: 'FALSE',
  NONE: 'NONE',

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Keywords
  FN: 'FN',
  SET: 'SET',
  STATIC: 'STATIC',
  PRIV: 'PRIV',
  IF: 'IF',
  ELSE: 'ELSE',
  UNLESS: 'UNLESS',
  WHILE: 'WHILE',
  FOR: 'FOR',
  IN: 'IN',
  RETURN: 'RETURN',
  BREAK: 'BREAK',
  CONTINUE: 'CONTINUE',
  TRY: 'TRY',
  CATCH: 'CATCH',
  FINALLY: 'FINALLY',
  RAISE: 'RAISE',
  AS: 'AS',
  IMPORT: 'IMPORT',
  LOAD: 'LOAD',
  MODULE: 'MODULE',
  ALIAS: 'ALIAS',
  CONFIGURE: 'CONFIGURE',
  PRECISION: 'PRECISION',
  GRAPH: 'GRAPH',
  FROM: 'FROM',
  RULE: 'RULE',
  WHEN: 'WHEN',
  MATCH: 'MATCH',
  SUPER: 'SUPER',
  AND: 'AND', // and, &&
  OR: 'OR', // or, ||
  NOT: 'NOT', // not

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  SLASH_SLASH: 'SLASH_SLASH', // //
  PERCENT: 'PERCENT', // %
  STAR_STAR: 'STAR_STAR', // **

  // Bitwise operators
  AMPERSAND: 'AMPERSAND', // &
  PIPE_BAR: 'PIPE_BAR', // | (also delimits clause patterns)
  CARET: 'CARET', // ^
  TILDE: 'TILDE', // ~
  SHL: 'SHL', // <<
  SHR: 'SHR', // >>

  // Comparison operators
  EQ: 'EQ', // ==
  NE: 'NE', // !=
  LT: 'LT', // <
  GT: 'GT', // >
  LE: 'LE', // <=
  GE: 'GE', // >=
  MATCH_OP: 'MATCH_OP', // =~
  NO_MATCH_OP: 'NO_MATCH_OP', // !~

  // Element-wise operators (.+ .== ...); value holds the base operator
  DOT_OP: 'DOT_OP',

  // Punctuation
  BANG: 'BANG', // !
  ASSIGN: 'ASSIGN', // =
  FAT_ARROW: 'FAT_ARROW', // =>
  ELLIPSIS: 'ELLIPSIS', // ...
  DOT: 'DOT', // .
  COLON: 'COLON', // :
  COMMA: 'COMMA', // ,
  SEMICOLON: 'SEMICOLON', // ;

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]

  // Frontmatter
  FRONTMATTER: 'FRONTMATTER', // raw YAML between --- delimiters

  // Special
  NEWLINE: 'NEWLINE',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}
