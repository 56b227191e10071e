/**
 * Tangle Core Types
 * Re-exports source locations, tokens, AST nodes and error classes.
 */

export type { SourceLocation, SourceSpan } from './source-location.js';
export { NO_LOCATION, NO_SPAN } from './source-location.js';

export { TOKEN_TYPES } from './token-types.js';
export type { Token, TokenType } from './token-types.js';

export * from './ast-nodes.js';

export {
  TANGLE_ERROR_CODES,
  TangleError,
  LexerError,
  ParseError,
  RuntimeError,
  errorKindForCode,
  internalError,
} from './error-classes.js';
export type { TangleErrorCode, TangleErrorData } from './error-classes.js';
