/**
 * ClosuresMixin: Function Declaration and Invocation
 *
 * Handles function declarations and every call path that runs a script
 * function:
 * - `fn name(...)` binds in the current scope and, at the top level,
 *   joins the global overload table (one entry per arity range)
 * - `fn Graph.name(...)`, `set Graph.name(v)`, `static fn Graph.name()`
 *   attach to a graph held in a variable
 * - `f(args)` resolves through overloads, an implicit `self` method, the
 *   scope chain, then builtin functions
 *
 * Function bodies run in a child of the captured scope. Defaults are
 * evaluated in the caller's scope before the switch. Every call enters
 * and leaves the call graph, including on error paths.
 *
 * @internal
 */

import type {
  ArgumentNode,
  CallNode,
  FunctionDeclNode,
  ParamNode,
  SourceLocation,
} from '../../../../types.js';
import { RuntimeError, TANGLE_ERROR_CODES } from '../../../../types.js';
import { getBuiltinFunction } from '../../../ext/builtins.js';
import { getPatternBuiltin } from '../../../ext/graph-patterns.js';
import {
  FunctionValue,
  bindArguments,
  type CallArgument,
  type FunctionParam,
} from '../../callable.js';
import type { Environment } from '../../environment.js';
import { findMatch } from '../../patterns.js';
import {
  isFunction,
  isGraph,
  isTruthy,
  typeName,
  type Value,
} from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

export function toFunctionParams(params: readonly ParamNode[]): FunctionParam[] {
  return params.map((p) => ({
    name: p.name,
    defaultValue: p.defaultValue,
    isVariadic: p.isVariadic,
  }));
}

function sameArity(a: FunctionValue, b: FunctionValue): boolean {
  return a.requiredCount === b.requiredCount && a.maxCount === b.maxCount;
}

function createClosuresMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class ClosuresEvaluator extends Base {
    override executeFunctionDecl(node: FunctionDeclNode): void {
      const fn = new FunctionValue({
        name: node.name,
        params: toFunctionParams(node.params),
        body: node.body,
        clauses: node.clauses,
        env: this.ctx.env,
        isSetter: node.isSetter,
        isStatic: node.isStatic,
        isPrivate: node.isPrivate,
        guard: node.guard,
      });

      if (node.receiver !== null) {
        this.attachToGraph(node.receiver, fn, node);
        return;
      }

      // The captured scope is this one, so defining the name here makes
      // the function visible to its own body.
      this.ctx.env.define(node.name, fn);
      if (node.isPrivate) this.ctx.privateSymbols.add(node.name);
      if (this.ctx.env === this.ctx.globals) this.registerOverload(fn);
    }

    /** Same arity range and no guard on either side replaces; else append */
    override registerOverload(fn: FunctionValue): void {
      if (fn.name === null) return;
      const overloads = this.ctx.functions.get(fn.name) ?? [];
      const index = overloads.findIndex(
        (existing) =>
          existing.guard === null && fn.guard === null && sameArity(existing, fn)
      );
      if (index >= 0) {
        overloads[index] = fn;
      } else {
        overloads.push(fn);
      }
      this.ctx.functions.set(fn.name, overloads);
    }

    attachToGraph(receiverName: string, fn: FunctionValue, node: FunctionDeclNode): void {
      const receiver = this.evaluateVariable(receiverName, this.getNodeLocation(node));
      if (!isGraph(receiver)) {
        throw RuntimeError.fromNode(
          TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
          `Cannot attach method '${node.name}' to '${receiverName}': expected graph, got ${typeName(receiver)}`,
          node
        );
      }
      const updated = receiver.clone();
      const name = fn.name ?? node.name;
      if (fn.isStatic) {
        updated.staticMethods.set(name, fn);
      } else if (fn.isSetter) {
        updated.setters.set(name, fn);
      } else {
        updated.addMethod(name, fn);
      }
      if (this.ctx.env.exists(receiverName)) {
        this.ctx.env.set(receiverName, updated);
      } else {
        this.ctx.env.define(receiverName, updated);
      }
    }

    override evaluateArguments(args: readonly ArgumentNode[]): CallArgument[] {
      return args.map((arg) => {
        const value = this.evaluateExpression(arg.value);
        let writeBack: string | null = null;
        if (arg.mutable) {
          if (arg.value.type !== 'Variable') {
            throw RuntimeError.fromNode(
              TANGLE_ERROR_CODES.RUNTIME_ARGUMENT_ERROR,
              'Write-back argument must be a variable',
              arg
            );
          }
          writeBack = arg.value.name;
        }
        return {
          name: arg.type === 'NamedArg' ? arg.name : null,
          value,
          writeBack,
        };
      });
    }

    override evaluateCall(node: CallNode): Value {
      const location = this.getNodeLocation(node);
      const args = this.evaluateArguments(node.args);

      if (node.callee.type !== 'Variable') {
        const callee = this.evaluateExpression(node.callee);
        return this.callValue(callee, args, location);
      }

      const name = node.callee.name;
      const overload = this.resolveOverload(name, args);
      if (overload) return this.invokeFunction(overload, args, location);

      const self = this.ctx.env.lookup('self');
      if (self !== undefined && isGraph(self)) {
        const result = this.callGraphMethod(self, name, args, {
          fromSelf: true,
          location,
        });
        if (result !== null) {
          this.ctx.env.set('self', result.self);
          return result.value;
        }
      }

      const bound = this.ctx.env.lookup(name);
      if (bound !== undefined && isFunction(bound)) {
        return this.invokeFunction(bound, args, location);
      }

      const pattern = getPatternBuiltin(name);
      if (pattern) return pattern(args, location);

      const builtin = getBuiltinFunction(name);
      if (builtin) {
        if (args.some((a) => a.name !== null)) {
          throw new RuntimeError(
            TANGLE_ERROR_CODES.RUNTIME_ARGUMENT_ERROR,
            `Builtin function '${name}' does not accept named arguments`,
            location
          );
        }
        return builtin(
          args.map((a) => a.value),
          this.host,
          location
        );
      }

      if (bound !== undefined) return this.callValue(bound, args, location);
      throw new RuntimeError(
        TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_FUNCTION,
        `Undefined function: ${name}`,
        location
      );
    }

    callValue(callee: Value, args: readonly CallArgument[], location?: SourceLocation): Value {
      if (!isFunction(callee)) {
        throw new RuntimeError(
          TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
          `Cannot call value of type ${typeName(callee)}`,
          location
        );
      }
      return this.invokeFunction(callee, args, location);
    }

    /**
     * Global overload for `name` accepting this many arguments. Guarded
     * overloads are tried first; an unguarded one is the fallback.
     */
    resolveOverload(name: string, args: readonly CallArgument[]): FunctionValue | undefined {
      const candidates = (this.ctx.functions.get(name) ?? []).filter((fn) =>
        fn.acceptsArity(args.length)
      );
      for (const fn of candidates) {
        if (fn.guard !== null && this.guardAccepts(fn, args)) return fn;
      }
      return candidates.find((fn) => fn.guard === null);
    }

    /** Evaluate a function's guard with its parameters bound */
    override guardAccepts(fn: FunctionValue, args: readonly CallArgument[], self?: Value): boolean {
      if (fn.guard === null) return true;
      const guard = fn.guard;
      const scope = fn.env.child();
      if (self !== undefined) scope.define('self', self);
      const bound = bindArguments(fn, args, (expr) => this.evaluateExpression(expr));
      for (const [name, value] of bound) scope.define(name, value);
      return this.withScope(scope, () => isTruthy(this.evaluateExpression(guard)));
    }

    override invokeFunction(
      fn: FunctionValue,
      args: readonly CallArgument[],
      location?: SourceLocation
    ): Value {
      return this.invokeInScope(fn, args, fn.env.child(), location);
    }

    override invokeInScope(
      fn: FunctionValue,
      args: readonly CallArgument[],
      scope: Environment,
      location?: SourceLocation,
      label = fn.displayName
    ): Value {
      const { observability, callGraph } = this.ctx;
      observability.onFunctionCall?.({
        name: label,
        args: args.map((a) => a.value),
        depth: callGraph.depth,
      });
      const startTime = performance.now();

      const result = this.inCallFrame(label, location, () =>
        fn.clauses ? this.runClauses(fn, args, scope) : this.runBody(fn, args, scope)
      );

      observability.onFunctionReturn?.({
        name: label,
        value: result,
        durationMs: performance.now() - startTime,
      });
      return result;
    }

    /** Balanced call-graph entry around `body`, on error paths too */
    inCallFrame<T>(name: string, location: SourceLocation | undefined, body: () => T): T {
      this.ctx.callGraph.enter(name, location);
      try {
        return body();
      } finally {
        this.ctx.callGraph.exit();
      }
    }

    runBody(fn: FunctionValue, args: readonly CallArgument[], scope: Environment): Value {
      const origins = new Map<string, CallArgument>();
      const bound = bindArguments(
        fn,
        args,
        (expr) => this.evaluateExpression(expr),
        origins
      );
      for (const [name, value] of bound) scope.define(name, value);

      const completion = this.withScope(scope, () => this.executeStatements(fn.body));

      for (const [param, arg] of origins) {
        if (!arg.writeBack) continue;
        const final = scope.lookup(param) ?? null;
        if (this.ctx.env.exists(arg.writeBack)) {
          this.ctx.env.set(arg.writeBack, final);
        } else {
          this.ctx.env.define(arg.writeBack, final);
        }
      }

      switch (completion.kind) {
        case 'return':
          return completion.value;
        case 'normal':
          return null;
        case 'break':
        case 'continue':
          throw new RuntimeError(
            TANGLE_ERROR_CODES.RUNTIME_CONTROL_FLOW,
            `'${completion.kind}' outside of loop in function '${fn.displayName}'`
          );
      }
    }

    /** `|pattern| if guard => body`; no matching clause yields none */
    runClauses(fn: FunctionValue, args: readonly CallArgument[], scope: Environment): Value {
      const clauses = fn.clauses ?? [];
      const match = findMatch(
        clauses,
        args.map((a) => a.value),
        (clause, bindings) => {
          const guard = clause.guard;
          if (guard === null) return true;
          const guardScope = scope.child();
          for (const [name, value] of bindings) guardScope.define(name, value);
          return this.withScope(guardScope, () => isTruthy(this.evaluateExpression(guard)));
        }
      );
      if (match === null) return null;
      for (const [name, value] of match.bindings) scope.define(name, value);
      return this.withScope(scope, () => this.evaluateExpression(match.clause.body));
    }
  };
}

export const ClosuresMixin = createClosuresMixin;
