/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { LexerError, TANGLE_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import {
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  makeToken,
} from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

const ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '0': '\0',
  '\\': '\\',
  '"': '"',
  "'": "'",
};

/** Process escape sequence and return the unescaped character */
function processEscape(state: LexerState): string {
  const location = currentLocation(state);
  const escaped = advance(state);
  const replacement = ESCAPES[escaped];
  if (replacement === undefined) {
    throw new LexerError(
      TANGLE_ERROR_CODES.LEXER_UNEXPECTED_CHARACTER,
      `Invalid escape sequence: \\${escaped}`,
      location
    );
  }
  return replacement;
}

/** Reads a single- or double-quoted string; quotes may not span lines */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  const quote = advance(state);

  let value = '';
  while (!isAtEnd(state) && peek(state) !== quote) {
    if (peek(state) === '\\') {
      advance(state);
      value += processEscape(state);
    } else if (peek(state) === '\n') {
      break;
    } else {
      value += advance(state);
    }
  }

  if (peek(state) !== quote) {
    throw new LexerError(
      TANGLE_ERROR_CODES.LEXER_UNTERMINATED_STRING,
      'Unterminated string literal',
      start
    );
  }
  advance(state);

  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

function readDigits(state: LexerState): string {
  let digits = '';
  while (isDigit(peek(state)) || (peek(state) === '_' && isDigit(peek(state, 1)))) {
    const ch = advance(state);
    if (ch !== '_') digits += ch;
  }
  return digits;
}

/**
 * Reads a decimal number. `_` separates digit groups and is dropped from
 * the token value: `1_000.5e-3` yields `1000.5e-3`.
 */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = readDigits(state);

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    value += advance(state);
    value += readDigits(state);
  }

  if (peek(state) === 'e' || peek(state) === 'E') {
    const sign = peek(state, 1);
    const hasSign = sign === '+' || sign === '-';
    if (isDigit(peek(state, hasSign ? 2 : 1))) {
      value += advance(state);
      if (hasSign) value += advance(state);
      value += readDigits(state);
    }
  }

  if (isIdentifierStart(peek(state))) {
    throw new LexerError(
      TANGLE_ERROR_CODES.LEXER_INVALID_NUMBER,
      `Invalid number literal: ${value}${peek(state)}`,
      start
    );
  }

  return makeToken(TOKEN_TYPES.NUMBER, value, start, currentLocation(state));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const type = KEYWORDS[value] ?? TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, value, start, currentLocation(state));
}

/** Reads `:name`; the token value omits the colon */
export function readSymbol(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state);
  let name = '';
  while (isIdentifierChar(peek(state))) {
    name += advance(state);
  }
  return makeToken(TOKEN_TYPES.SYMBOL, name, start, currentLocation(state));
}

/**
 * Reads YAML frontmatter: `---` on the first line up to the next line
 * holding only `---`. The token value is the raw YAML between them.
 */
export function readFrontmatter(state: LexerState): Token {
  const start = currentLocation(state);
  for (let i = 0; i < 3; i++) advance(state);
  while (!isAtEnd(state) && peek(state) !== '\n') advance(state);
  advance(state);

  const lines: string[] = [];
  let line = '';
  let closed = false;
  while (!isAtEnd(state)) {
    const ch = advance(state);
    if (ch !== '\n') {
      line += ch;
      if (!isAtEnd(state)) continue;
    }
    if (line.trimEnd() === '---') {
      closed = true;
      break;
    }
    lines.push(line);
    line = '';
  }

  if (!closed) {
    throw new LexerError(
      TANGLE_ERROR_CODES.LEXER_UNEXPECTED_CHARACTER,
      'Unterminated frontmatter: missing closing ---',
      start
    );
  }

  return makeToken(
    TOKEN_TYPES.FRONTMATTER,
    lines.join('\n'),
    start,
    currentLocation(state)
  );
}
