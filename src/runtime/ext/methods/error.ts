/**
 * Methods on error values bound by `catch ... as e` or built by the
 * error constructors.
 *
 * @internal
 */

import {
  isErrorValue,
  typeName,
  type UserErrorValue,
  type Value,
} from '../../core/values.js';
import { expectArgs, methodError, type MethodTable } from './shared.js';

/** `  at file:line:col` followed by one `  at fn` per active call, innermost first */
export function formatStackTrace(err: UserErrorValue): string {
  const lines = [`  at ${err.file ?? '<unknown>'}:${err.line ?? 0}:${err.column ?? 0}`];
  for (const frame of err.callStack) lines.push(`  at ${frame}`);
  return lines.join('\n');
}

function noArgs(name: string, read: (err: UserErrorValue) => Value) {
  return (err: UserErrorValue, args: Value[]): Value => {
    expectArgs(name, args, 0);
    return read(err);
  };
}

export const ERROR_METHODS: MethodTable<UserErrorValue> = {
  type: noArgs('type', (err) => err.errorType),
  message: noArgs('message', (err) => err.message),
  file: noArgs('file', (err) => err.file),
  line: noArgs('line', (err) => err.line),
  column: noArgs('column', (err) => err.column),
  stack_trace: noArgs('stack_trace', formatStackTrace),
  full_chain: noArgs('full_chain', (err) => err.fullChain()),
  cause: noArgs('cause', (err) => err.cause),

  /** Copy of the error with `other` as its cause */
  caused_by: (err, args, _host, location) => {
    expectArgs('caused_by', args, 1, 1, location);
    const [cause = null] = args;
    if (!isErrorValue(cause)) {
      throw methodError(`caused_by() expects an error argument, got ${typeName(cause)}`, location);
    }
    return err.withCause(cause);
  },
};
