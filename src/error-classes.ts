/**
 * Tangle Error Classes
 * Structured error types with code-based classification
 */

import type { SourceLocation, SourceSpan } from './source-location.js';

// ============================================================
// ERROR CODES
// ============================================================

/** Error codes for programmatic handling */
export const TANGLE_ERROR_CODES = {
  // Lexer errors
  LEXER_UNEXPECTED_CHARACTER: 'LEXER_UNEXPECTED_CHARACTER',
  LEXER_UNTERMINATED_STRING: 'LEXER_UNTERMINATED_STRING',
  LEXER_INVALID_NUMBER: 'LEXER_INVALID_NUMBER',

  // Parse errors
  PARSE_UNEXPECTED_TOKEN: 'PARSE_UNEXPECTED_TOKEN',
  PARSE_INVALID_SYNTAX: 'PARSE_INVALID_SYNTAX',

  // Runtime errors
  RUNTIME_UNDEFINED_VARIABLE: 'RUNTIME_UNDEFINED_VARIABLE',
  RUNTIME_UNDEFINED_FUNCTION: 'RUNTIME_UNDEFINED_FUNCTION',
  RUNTIME_UNDEFINED_METHOD: 'RUNTIME_UNDEFINED_METHOD',
  RUNTIME_TYPE_ERROR: 'RUNTIME_TYPE_ERROR',
  RUNTIME_ARGUMENT_ERROR: 'RUNTIME_ARGUMENT_ERROR',
  RUNTIME_INDEX_ERROR: 'RUNTIME_INDEX_ERROR',
  RUNTIME_DIVISION_BY_ZERO: 'RUNTIME_DIVISION_BY_ZERO',
  RUNTIME_FROZEN_VALUE: 'RUNTIME_FROZEN_VALUE',
  RUNTIME_RULE_VIOLATION: 'RUNTIME_RULE_VIOLATION',
  RUNTIME_CONSTRAINT_VIOLATION: 'RUNTIME_CONSTRAINT_VIOLATION',
  RUNTIME_NO_MATCH: 'RUNTIME_NO_MATCH',
  RUNTIME_CONTROL_FLOW: 'RUNTIME_CONTROL_FLOW',
  RUNTIME_USER_ERROR: 'RUNTIME_USER_ERROR',
  RUNTIME_LIMIT_EXCEEDED: 'RUNTIME_LIMIT_EXCEEDED',
  RUNTIME_INTERNAL: 'RUNTIME_INTERNAL',

  // Module and host errors
  MODULE_NOT_FOUND: 'MODULE_NOT_FOUND',
  MODULE_CIRCULAR_DEPENDENCY: 'MODULE_CIRCULAR_DEPENDENCY',
  IO_ERROR: 'IO_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
} as const;

export type TangleErrorCode =
  (typeof TANGLE_ERROR_CODES)[keyof typeof TANGLE_ERROR_CODES];

/**
 * Script-visible error type for each code.
 * `catch TypeError as e` matches any error whose kind is `TypeError`.
 */
const ERROR_KINDS: Record<TangleErrorCode, string> = {
  LEXER_UNEXPECTED_CHARACTER: 'SyntaxError',
  LEXER_UNTERMINATED_STRING: 'SyntaxError',
  LEXER_INVALID_NUMBER: 'SyntaxError',
  PARSE_UNEXPECTED_TOKEN: 'SyntaxError',
  PARSE_INVALID_SYNTAX: 'SyntaxError',
  RUNTIME_UNDEFINED_VARIABLE: 'RuntimeError',
  RUNTIME_UNDEFINED_FUNCTION: 'RuntimeError',
  RUNTIME_UNDEFINED_METHOD: 'RuntimeError',
  RUNTIME_TYPE_ERROR: 'TypeError',
  RUNTIME_ARGUMENT_ERROR: 'RuntimeError',
  RUNTIME_INDEX_ERROR: 'RuntimeError',
  RUNTIME_DIVISION_BY_ZERO: 'RuntimeError',
  RUNTIME_FROZEN_VALUE: 'RuntimeError',
  RUNTIME_RULE_VIOLATION: 'RuleViolation',
  RUNTIME_CONSTRAINT_VIOLATION: 'RuntimeError',
  RUNTIME_NO_MATCH: 'RuntimeError',
  RUNTIME_CONTROL_FLOW: 'RuntimeError',
  RUNTIME_USER_ERROR: 'RuntimeError',
  RUNTIME_LIMIT_EXCEEDED: 'RuntimeError',
  RUNTIME_INTERNAL: 'RuntimeError',
  MODULE_NOT_FOUND: 'ModuleNotFound',
  MODULE_CIRCULAR_DEPENDENCY: 'CircularDependency',
  IO_ERROR: 'IOError',
  CONFIG_ERROR: 'ConfigError',
};

/** Get the script-visible error type name for a code */
export function errorKindForCode(code: TangleErrorCode): string {
  return ERROR_KINDS[code];
}

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface TangleErrorData {
  readonly code: TangleErrorCode;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Tangle errors.
 * Provides structured data for host applications to format as needed.
 */
export class TangleError extends Error {
  readonly code: TangleErrorCode;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: TangleErrorData) {
    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'TangleError';
    this.code = data.code;
    this.location = data.location;
    this.context = data.context;
  }

  /** Script-visible error type (RuntimeError, TypeError, RuleViolation, ...) */
  get kind(): string {
    return errorKindForCode(this.code);
  }

  /** Message without the location suffix */
  get detail(): string {
    return this.message.replace(/ at \d+:\d+$/, '');
  }

  /** Same error reported at `location`; used when a node adds its position */
  withLocation(location: SourceLocation): TangleError {
    return new TangleError({
      code: this.code,
      message: this.detail,
      location,
      context: this.context,
    });
  }

  /** Get structured error data for custom formatting */
  toData(): TangleErrorData {
    return {
      code: this.code,
      message: this.detail,
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: TangleErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Lexer errors always carry a location */
export class LexerError extends TangleError {
  override readonly location: SourceLocation;

  constructor(
    code: TangleErrorCode,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({ code, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }
}

/** Parse-time errors */
export class ParseError extends TangleError {
  constructor(
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({
      code: TANGLE_ERROR_CODES.PARSE_INVALID_SYNTAX,
      message,
      location,
      context,
    });
    this.name = 'ParseError';
  }
}

/** Runtime execution errors */
export class RuntimeError extends TangleError {
  constructor(
    code: TangleErrorCode,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({ code, message, location, context });
    this.name = 'RuntimeError';
  }

  /** Create from an AST node */
  static fromNode(
    code: TangleErrorCode,
    message: string,
    node?: { span: SourceSpan },
    context?: Record<string, unknown>
  ): RuntimeError {
    return new RuntimeError(code, message, node?.span.start, context);
  }
}

/** Interpreter invariant violations: always a bug in the runtime */
export function internalError(
  message: string,
  location?: SourceLocation
): RuntimeError {
  return new RuntimeError(
    TANGLE_ERROR_CODES.RUNTIME_INTERNAL,
    `Internal error: ${message}`,
    location
  );
}
