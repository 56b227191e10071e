/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { LexerError, TANGLE_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import {
  advanceAndMakeToken,
  canStartSymbol,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import {
  ELEMENT_WISE_OPERATORS,
  SINGLE_CHAR_OPERATORS,
  THREE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import {
  readFrontmatter,
  readIdentifier,
  readNumber,
  readString,
  readSymbol,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
  previousChar,
} from './state.js';

const CLOSERS: Record<string, string> = { ')': '(', ']': '[', '}': '{' };

/** Newlines only separate statements outside ( ) and [ ] */
function newlineIsSignificant(state: LexerState): boolean {
  const top = state.groups[state.groups.length - 1];
  return top === undefined || top === '{';
}

function skipTrivia(state: LexerState): void {
  for (;;) {
    const ch = peek(state);
    if (isWhitespace(ch) || (ch === '\n' && !newlineIsSignificant(state))) {
      advance(state);
    } else if (ch === '\\' && peek(state, 1) === '\n') {
      // line continuation
      advance(state);
      advance(state);
    } else if (ch === '#') {
      while (!isAtEnd(state) && peek(state) !== '\n') advance(state);
    } else {
      return;
    }
  }
}

function trackGroup(state: LexerState, ch: string): void {
  if (ch === '(' || ch === '[' || ch === '{') {
    state.groups.push(ch);
    return;
  }
  const opener = CLOSERS[ch];
  if (opener !== undefined && state.groups[state.groups.length - 1] === opener) {
    state.groups.pop();
  }
}

export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === '\n') {
    advance(state);
    return makeToken(TOKEN_TYPES.NEWLINE, '\n', start, currentLocation(state));
  }

  if (ch === '"' || ch === "'") {
    return readString(state);
  }

  // Number (positive only - unary minus handled by parser)
  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  if (
    ch === ':' &&
    isIdentifierStart(peek(state, 1)) &&
    canStartSymbol(previousChar(state))
  ) {
    return readSymbol(state);
  }

  // Element-wise operators (.+ .== ...), longest first
  if (ch === '.') {
    for (const op of ELEMENT_WISE_OPERATORS) {
      if (peekString(state, op.length) === op) {
        return advanceAndMakeToken(
          state,
          op.length,
          TOKEN_TYPES.DOT_OP,
          op.slice(1),
          start
        );
      }
    }
  }

  const threeChar = peekString(state, 3);
  const threeCharType = THREE_CHAR_OPERATORS[threeChar];
  if (threeCharType) {
    return advanceAndMakeToken(state, 3, threeCharType, threeChar, start);
  }

  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar, start);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    trackGroup(state, ch);
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  throw new LexerError(
    TANGLE_ERROR_CODES.LEXER_UNEXPECTED_CHARACTER,
    `Unexpected character: ${ch}`,
    start
  );
}

function startsWithFrontmatter(source: string): boolean {
  if (!source.startsWith('---')) return false;
  const after = source[3];
  return after === undefined || after === '\n' || after === '\r';
}

export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];

  if (startsWithFrontmatter(source)) {
    tokens.push(readFrontmatter(state));
  }

  let token: Token;
  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
