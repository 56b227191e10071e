/**
 * MethodsMixin: Method Call Dispatch
 *
 * `receiver.name(args)` resolves in this order:
 * 1. `list.generate(...)` / `list.upto(...)` statics, while `list` is unbound
 * 2. module members
 * 3. user-defined graph methods (static first, then instance)
 * 4. builtin methods for the receiver's kind, then generic builtins
 *
 * `name!` runs the builtin `name` and stores its result back into the
 * receiver. Graph builtins that mutate work on a copy that is stored back
 * the same way, as is the final `self` of a user method.
 *
 * @internal
 */

import type { MethodCallNode, SourceLocation } from '../../../../types.js';
import { RuntimeError, TANGLE_ERROR_CODES } from '../../../../types.js';
import {
  GRAPH_MUTATORS,
  LIST_STATICS,
  resolveBuiltinMethod,
} from '../../../ext/methods/index.js';
import type { CallArgument } from '../../callable.js';
import { frozenError } from '../../indexing.js';
import {
  isFrozen,
  isFunction,
  isGraph,
  isList,
  isModule,
  type ModuleValue,
  typeName,
  type Value,
} from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

/** Builtin outcome plus the receiver as it should be stored back */
interface BuiltinOutcome {
  readonly value: Value;
  readonly receiver: Value;
}

function positional(args: readonly CallArgument[], method: string, location?: SourceLocation): Value[] {
  if (args.some((a) => a.name !== null)) {
    throw new RuntimeError(
      TANGLE_ERROR_CODES.RUNTIME_ARGUMENT_ERROR,
      `Method '${method}' does not accept named arguments`,
      location
    );
  }
  return args.map((a) => a.value);
}

function createMethodsMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class MethodsEvaluator extends Base {
    override evaluateMethodCall(node: MethodCallNode): Value {
      const location = this.getNodeLocation(node);
      const { object, method } = node;

      if (
        object.type === 'Variable' &&
        object.name === 'list' &&
        this.ctx.env.lookup('list') === undefined
      ) {
        return this.callListStatic(method, node, location);
      }

      const receiver = this.evaluateExpression(object);
      const args = this.evaluateArguments(node.args);

      if (isModule(receiver)) return this.callModuleMember(receiver, method, args, location);

      if (method.endsWith('!')) return this.callMutating(node, receiver, args, location);

      if (isGraph(receiver)) {
        const result = this.callGraphMethod(receiver, method, args, {
          fromSelf: object.type === 'Variable' && object.name === 'self',
          location,
        });
        if (result !== null) {
          this.writeBack(object, result.self);
          return result.value;
        }
      }

      const outcome = this.dispatchBuiltin(receiver, method, positional(args, method, location), location);
      if (outcome === undefined) throw this.undefinedMethod(receiver, method, location);
      if (outcome.receiver !== receiver) this.writeBack(object, outcome.receiver);
      return outcome.value;
    }

    override callBuiltinMethod(
      receiver: Value,
      name: string,
      args: readonly Value[],
      location?: SourceLocation
    ): Value | undefined {
      return this.dispatchBuiltin(receiver, name, [...args], location)?.value;
    }

    /** Undefined when no builtin table answers to `name` */
    dispatchBuiltin(
      receiver: Value,
      name: string,
      args: Value[],
      location?: SourceLocation
    ): BuiltinOutcome | undefined {
      const target = isGraph(receiver) && GRAPH_MUTATORS.has(name) ? receiver.clone() : receiver;
      const method = resolveBuiltinMethod(target, name);
      if (method === undefined) return undefined;
      let value: Value;
      try {
        value = method(args, this.host, location);
      } catch (error) {
        this.notifyViolation(error, location);
        throw error;
      }
      return { value, receiver: target };
    }

    callListStatic(method: string, node: MethodCallNode, location?: SourceLocation): Value {
      const fn = Object.hasOwn(LIST_STATICS, method) ? LIST_STATICS[method] : undefined;
      if (fn === undefined) {
        throw new RuntimeError(
          TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_METHOD,
          `list does not have static method '${method}'`,
          location
        );
      }
      const args = positional(this.evaluateArguments(node.args), method, location);
      return fn(args, this.host, location);
    }

    callModuleMember(
      module: ModuleValue,
      member: string,
      args: readonly CallArgument[],
      location?: SourceLocation
    ): Value {
      const label = module.alias ?? module.name;
      if (module.privateSymbols.has(member)) {
        throw new RuntimeError(
          TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
          `Cannot access private symbol '${member}' from module '${label}'`,
          location
        );
      }
      const value = module.bindings.get(member);
      if (value === undefined) {
        throw new RuntimeError(
          TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
          `Module '${label}' has no member '${member}'`,
          location
        );
      }
      if (isFunction(value)) return this.invokeFunction(value, args, location);
      if (args.length > 0) {
        throw new RuntimeError(
          TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
          `Module member '${member}' is not a function, cannot be called with arguments`,
          location
        );
      }
      return value;
    }

    /**
     * `xs.m!(args)`: store the result of `m` into `xs` and yield none.
     * `xs.pop!()` yields the removed element instead.
     */
    callMutating(
      node: MethodCallNode,
      receiver: Value,
      args: readonly CallArgument[],
      location?: SourceLocation
    ): Value {
      const base = node.method.slice(0, -1);
      const target = node.object;
      if (target.type !== 'Variable' && target.type !== 'Index' && target.type !== 'PropertyAccess') {
        throw new RuntimeError(
          TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
          `Mutating method '${node.method}' requires a variable, not an expression`,
          location
        );
      }
      if (isFrozen(receiver)) throw frozenError(typeName(receiver));

      const outcome = this.dispatchBuiltin(receiver, base, positional(args, base, location), location);
      if (outcome === undefined) throw this.undefinedMethod(receiver, base, location);

      if (base === 'pop' && isList(receiver)) {
        const rest = receiver.clone();
        rest.items.pop();
        this.writeBack(target, rest);
        return outcome.value;
      }
      const stored = isGraph(receiver) && GRAPH_MUTATORS.has(base) ? outcome.receiver : outcome.value;
      this.writeBack(target, stored);
      return null;
    }

    undefinedMethod(receiver: Value, method: string, location?: SourceLocation): RuntimeError {
      const kind = isGraph(receiver) && receiver.typeName !== null ? receiver.typeName : typeName(receiver);
      return new RuntimeError(
        TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_METHOD,
        `Type '${kind}' does not have method '${method}'`,
        location
      );
    }
  };
}

export const MethodsMixin = createMethodsMixin;
