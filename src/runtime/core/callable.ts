/**
 * Callable Types
 *
 * Script functions (named functions, lambdas, graph methods) and the
 * argument binder shared by every call path.
 */

import type {
  ExpressionNode,
  PatternClauseNode,
  StatementNode,
} from '../../types.js';
import { RuntimeError, TANGLE_ERROR_CODES } from '../../types.js';
import type { Environment } from './environment.js';
import { ListValue, isList, type Value } from './values.js';

export interface FunctionParam {
  readonly name: string;
  readonly defaultValue: ExpressionNode | null;
  readonly isVariadic: boolean;
}

export interface FunctionInit {
  readonly name: string | null;
  readonly params: readonly FunctionParam[];
  readonly body: readonly StatementNode[];
  readonly clauses?: readonly PatternClauseNode[] | null | undefined;
  readonly env: Environment;
  readonly isSetter?: boolean | undefined;
  readonly isStatic?: boolean | undefined;
  readonly isPrivate?: boolean | undefined;
  readonly guard?: ExpressionNode | null | undefined;
}

/**
 * A function value. Parameters and pattern clauses are mutually
 * exclusive; clause functions take exactly one argument.
 */
export class FunctionValue {
  readonly kind = 'function' as const;
  readonly name: string | null;
  readonly params: readonly FunctionParam[];
  readonly body: readonly StatementNode[];
  readonly clauses: readonly PatternClauseNode[] | null;
  /** Captured scope; shared, never copied */
  readonly env: Environment;
  readonly isSetter: boolean;
  readonly isStatic: boolean;
  readonly isPrivate: boolean;
  /** Structural overload guard, evaluated with `self` and params bound */
  readonly guard: ExpressionNode | null;

  constructor(init: FunctionInit) {
    this.name = init.name;
    this.params = init.params;
    this.body = init.body;
    this.clauses = init.clauses ?? null;
    this.env = init.env;
    this.isSetter = init.isSetter ?? false;
    this.isStatic = init.isStatic ?? false;
    this.isPrivate = init.isPrivate ?? false;
    this.guard = init.guard ?? null;
  }

  /** Name used in diagnostics */
  get displayName(): string {
    return this.name ?? '<anonymous>';
  }

  get requiredCount(): number {
    if (this.clauses) return 1;
    return this.params.filter((p) => p.defaultValue === null && !p.isVariadic)
      .length;
  }

  get maxCount(): number {
    if (this.clauses) return 1;
    return this.params.some((p) => p.isVariadic)
      ? Number.POSITIVE_INFINITY
      : this.params.length;
  }

  acceptsArity(count: number): boolean {
    return count >= this.requiredCount && count <= this.maxCount;
  }
}

// ============================================================
// ARGUMENT BINDING
// ============================================================

/** Evaluated call argument; `name` is set for `name: value` arguments */
export interface CallArgument {
  readonly name: string | null;
  readonly value: Value;
  /** Caller variable that receives the parameter's final value (`x!`) */
  readonly writeBack?: string | null | undefined;
}

function argumentError(message: string): RuntimeError {
  return new RuntimeError(TANGLE_ERROR_CODES.RUNTIME_ARGUMENT_ERROR, message);
}

/**
 * Bind evaluated arguments to parameters.
 *
 * Arguments bind in source order. A named argument claims its parameter;
 * a positional one fills the next unclaimed parameter and spills into the
 * variadic slot once it is reached. Unfilled parameters take their default
 * from `evaluateDefault`.
 * When `origins` is given it records which argument filled each
 * non-variadic parameter.
 */
export function bindArguments(
  fn: FunctionValue,
  args: readonly CallArgument[],
  evaluateDefault: (expr: ExpressionNode) => Value,
  origins?: Map<string, CallArgument>
): Map<string, Value> {
  const bound = new Map<string, Value>();
  const collected: Value[] = [];
  const fnName = fn.displayName;
  let next = 0;

  for (const arg of args) {
    if (arg.name !== null) {
      const param = fn.params.find((p) => p.name === arg.name);
      if (!param) {
        throw argumentError(
          `Unknown parameter '${arg.name}' in function '${fnName}'`
        );
      }
      if (bound.has(arg.name) || (param.isVariadic && collected.length > 0)) {
        throw argumentError(`Parameter '${arg.name}' specified multiple times`);
      }
      bound.set(
        arg.name,
        param.isVariadic && !isList(arg.value)
          ? new ListValue([arg.value])
          : arg.value
      );
      if (!param.isVariadic) origins?.set(arg.name, arg);
      continue;
    }

    let param = fn.params[next];
    while (param !== undefined && bound.has(param.name)) {
      next++;
      param = fn.params[next];
    }
    if (param === undefined) {
      throw argumentError(`Too many arguments for function '${fnName}'`);
    }
    if (param.isVariadic) {
      collected.push(arg.value);
      continue;
    }
    bound.set(param.name, arg.value);
    origins?.set(param.name, arg);
    next++;
  }

  const variadic = fn.params.find((p) => p.isVariadic);
  if (variadic !== undefined && !bound.has(variadic.name)) {
    bound.set(variadic.name, new ListValue(collected));
  }

  for (const param of fn.params) {
    if (bound.has(param.name)) continue;
    if (param.defaultValue === null) {
      throw argumentError(
        `Missing required parameter '${param.name}' in function '${fnName}'`
      );
    }
    bound.set(param.name, evaluateDefault(param.defaultValue));
  }

  return bound;
}
