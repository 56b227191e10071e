/**
 * Builtin Functions
 *
 * Global functions every script can call. Script-defined functions and
 * bound callables shadow these.
 */

import type { SourceLocation } from '../../types.js';
import type { BuiltinFunction, CallHost } from '../core/types.js';
import {
  isGraph,
  isList,
  isMap,
  list,
  toDisplayString,
  typeName,
  UserErrorValue,
  type Value,
} from '../core/values.js';
import {
  expectArgs,
  methodError,
  numberArg,
  stringArg,
} from './methods/shared.js';

/** Error types constructible from scripts: `raise ValueError("bad")` */
export const ERROR_CONSTRUCTORS = [
  'RuntimeError',
  'ValueError',
  'TypeError',
  'IOError',
  'NetworkError',
  'ParseError',
] as const;

function errorConstructor(errorType: string): BuiltinFunction {
  return (args, host, location) => {
    if (args.length !== 1) {
      throw methodError(
        `${errorType} constructor expects 1 argument (message), got ${args.length}`,
        location
      );
    }
    const [message = null] = args;
    return new UserErrorValue(
      errorType,
      typeof message === 'string' ? message : toDisplayString(message),
      host.ctx.currentFile,
      location?.line ?? null,
      location?.column ?? null,
      host.ctx.callGraph.callStack()
    );
  };
}

function displayOptions(host: CallHost): { decimalPlaces: number | null } {
  return { decimalPlaces: host.ctx.config.current.decimalPlaces };
}

function lengthOf(value: Value, location?: SourceLocation): number {
  if (typeof value === 'string') return [...value].length;
  if (isList(value)) return value.items.length;
  if (isMap(value)) return value.entries.size;
  if (isGraph(value)) return value.nodeCount();
  throw methodError(`len() is not supported for ${typeName(value)}`, location);
}

/** `range(end)` or `range(start, end[, step])`; the end is exclusive */
function range(args: Value[], location?: SourceLocation): Value {
  expectArgs('range', args, 1, 3, location);
  const start = args.length === 1 ? 0 : numberArg('range', args, 0, location);
  const end = numberArg('range', args, args.length === 1 ? 0 : 1, location);
  const step = args.length === 3 ? numberArg('range', args, 2, location) : 1;
  if (step === 0) throw methodError('range() step cannot be zero', location);
  const items: Value[] = [];
  for (let n = start; step > 0 ? n < end : n > end; n += step) items.push(n);
  return list(items);
}

const BUILTIN_FUNCTIONS: Readonly<Record<string, BuiltinFunction>> = {
  /** Space-separated display forms on one line */
  print: (args, host) => {
    const options = displayOptions(host);
    host.emitOutput(args.map((arg) => toDisplayString(arg, options)).join(' '));
    return null;
  },

  get_errors: (args, host, location) => {
    expectArgs('get_errors', args, 0, 0, location);
    return list([...host.ctx.errors.getErrors()]);
  },

  clear_errors: (args, host, location) => {
    expectArgs('clear_errors', args, 0, 0, location);
    host.ctx.errors.clear();
    return null;
  },

  /** Run a file in isolation; its printed lines come back joined by newlines */
  exec: (args, host, location) => {
    expectArgs('exec', args, 1, 1, location);
    return host.runFileCaptured(stringArg('exec', args, 0, location), location);
  },

  len: (args, _host, location) => {
    expectArgs('len', args, 1, 1, location);
    return lengthOf(args[0] ?? null, location);
  },

  range: (args, _host, location) => range(args, location),

  type_of: (args, _host, location) => {
    expectArgs('type_of', args, 1, 1, location);
    const [value = null] = args;
    return isGraph(value) && value.typeName !== null ? value.typeName : typeName(value);
  },

  ...Object.fromEntries(ERROR_CONSTRUCTORS.map((name) => [name, errorConstructor(name)])),
};

export function getBuiltinFunction(name: string): BuiltinFunction | undefined {
  return Object.hasOwn(BUILTIN_FUNCTIONS, name) ? BUILTIN_FUNCTIONS[name] : undefined;
}
