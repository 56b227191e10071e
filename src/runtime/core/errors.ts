/**
 * Script Errors
 *
 * Bridges host-side error classes and script-level error values:
 * `raise` throws a ScriptError carrying the raised value, and `catch`
 * turns any TangleError back into an error value.
 */

import type { SourceLocation } from '../../types.js';
import { TANGLE_ERROR_CODES, TangleError } from '../../types.js';
import { UserErrorValue } from './values.js';

/** A user-raised error crossing the evaluator boundary */
export class ScriptError extends TangleError {
  constructor(
    readonly value: UserErrorValue,
    location?: SourceLocation
  ) {
    super({
      code: TANGLE_ERROR_CODES.RUNTIME_USER_ERROR,
      message: value.message,
      location,
    });
    this.name = 'ScriptError';
  }

  override get kind(): string {
    return this.value.errorType;
  }

  override withLocation(location: SourceLocation): ScriptError {
    const { value } = this;
    return new ScriptError(
      new UserErrorValue(
        value.errorType,
        value.message,
        value.file,
        value.line ?? location.line,
        value.column ?? location.column,
        value.callStack,
        value.cause
      ),
      location
    );
  }
}

/** Attach `location` unless the error already carries one */
export function locate(error: unknown, location: SourceLocation | undefined): unknown {
  if (error instanceof TangleError && error.location === undefined && location) {
    return error.withLocation(location);
  }
  return error;
}

/** Script-visible value for a caught error */
export function toErrorValue(
  error: TangleError,
  file: string | null,
  callStack: readonly string[]
): UserErrorValue {
  if (error instanceof ScriptError) return error.value;
  return new UserErrorValue(
    error.kind,
    error.detail,
    file,
    error.location?.line ?? null,
    error.location?.column ?? null,
    callStack
  );
}
