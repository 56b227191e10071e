/**
 * GraphsMixin: Graph Types, Instances and Method Dispatch
 *
 * A `graph Name(:type) from Parent { ... }` declaration builds a graph
 * carrying properties, rules and method tables, then binds it by name.
 * Instances are copies: `Name { prop: value }` clones the type and
 * overrides declared properties.
 *
 * Instance methods run against a copy of the receiver bound as `self`.
 * When the body finishes, the final `self` is checked against the
 * receiver's method constraints and only then handed back to the caller,
 * which stores it where the receiver came from. A rejected call leaves
 * the receiver untouched.
 *
 * @internal
 */

import type {
  AccessorConfig,
  GraphDeclNode,
  GraphMethodNode,
  InstantiateNode,
  SourceLocation,
  StatementNode,
  SuperCallNode,
} from '../../../../types.js';
import { NO_SPAN, RuntimeError, TANGLE_ERROR_CODES } from '../../../../types.js';
import { FunctionValue, type CallArgument } from '../../callable.js';
import { Graph } from '../../graph.js';
import {
  checkMethodConstraints,
  isRuleset,
  ruleFromSymbol,
  rulesetRules,
} from '../../rules.js';
import { isGraph, typeName, type Value } from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor, MethodResult } from '../types.js';
import { toFunctionParams } from './closures.js';

/** `self.name` */
function getterBody(property: string): StatementNode[] {
  return [
    {
      type: 'Return',
      span: NO_SPAN,
      value: {
        type: 'PropertyAccess',
        span: NO_SPAN,
        object: { type: 'Variable', span: NO_SPAN, name: 'self' },
        property,
      },
    },
  ];
}

/** `self.name = value` */
function setterBody(property: string): StatementNode[] {
  return [
    {
      type: 'Assignment',
      span: NO_SPAN,
      target: {
        kind: 'property',
        object: { type: 'Variable', span: NO_SPAN, name: 'self' },
        property,
      },
      value: { type: 'Variable', span: NO_SPAN, name: 'value' },
    },
  ];
}

function accessorNames(config: AccessorConfig): { readers: string[]; writers: string[] } {
  return {
    readers: [...new Set([...config.readable, ...config.accessible])],
    writers: [...new Set([...config.writable, ...config.accessible])],
  };
}

function createGraphsMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class GraphsEvaluator extends Base {
    override executeGraphDecl(node: GraphDeclNode): void {
      const graph = this.declaredGraph(node);
      graph.typeName = node.name;

      for (const property of node.properties) {
        graph.setProperty(property.name, this.evaluateExpression(property.value));
      }

      for (const rule of node.rules) {
        let param: number | null = null;
        if (rule.param !== null) {
          const value = this.evaluateExpression(rule.param);
          if (typeof value !== 'number') {
            throw RuntimeError.fromNode(
              TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
              `Rule parameter must be a number, got ${typeName(value)}`,
              rule
            );
          }
          param = value;
        }
        graph.addRule(ruleFromSymbol(rule.name, param));
      }

      // Methods may refer to the type by name while it is being built
      this.ctx.env.define(node.name, graph);

      for (const method of node.methods) {
        this.attachMethod(graph, this.methodFromNode(method));
      }
      this.synthesizeAccessors(graph, node.accessors);

      this.ctx.env.define(node.name, graph);
    }

    declaredGraph(node: GraphDeclNode): Graph {
      let graph: Graph;
      if (node.parent !== null) {
        const parent = this.evaluateExpression(node.parent);
        if (!isGraph(parent)) {
          throw RuntimeError.fromNode(
            TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
            `Cannot inherit from non-graph type '${typeName(parent)}'. Expected graph.`,
            node.parent
          );
        }
        graph = Graph.fromParent(parent);
      } else {
        graph = new Graph();
      }

      const declared = node.graphType;
      if (declared === null || declared === 'directed') return graph;
      if (declared === 'undirected') {
        graph.graphType = 'undirected';
        return graph;
      }
      if (!isRuleset(declared)) {
        throw RuntimeError.fromNode(
          TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
          `Invalid graph type: :${declared}. Expected :directed or :undirected`,
          node
        );
      }
      graph.ruleset = declared;
      for (const rule of rulesetRules(declared)) graph.addRule(rule);
      return graph;
    }

    methodFromNode(method: GraphMethodNode): FunctionValue {
      return new FunctionValue({
        name: method.name,
        params: toFunctionParams(method.params),
        body: method.body,
        env: this.ctx.env,
        isSetter: method.isSetter,
        isStatic: method.isStatic,
        isPrivate: method.isPrivate,
        guard: method.guard,
      });
    }

    attachMethod(graph: Graph, fn: FunctionValue): void {
      const name = fn.displayName;
      if (fn.isStatic) {
        graph.staticMethods.set(name, fn);
      } else if (fn.isSetter) {
        graph.setters.set(name, fn);
      } else {
        graph.addMethod(name, fn);
      }
    }

    /**
     * `readable` adds `name()`, `writable` adds `set_name(value)`;
     * `accessible` adds both. Declared methods win.
     */
    synthesizeAccessors(graph: Graph, config: AccessorConfig): void {
      const { readers, writers } = accessorNames(config);
      for (const name of readers) {
        if (graph.hasMethod(name)) continue;
        graph.addMethod(
          name,
          new FunctionValue({ name, params: [], body: getterBody(name), env: this.ctx.env })
        );
      }
      for (const name of writers) {
        const setter = `set_${name}`;
        if (graph.hasMethod(setter)) continue;
        graph.addMethod(
          setter,
          new FunctionValue({
            name: setter,
            params: [{ name: 'value', defaultValue: null, isVariadic: false }],
            body: setterBody(name),
            env: this.ctx.env,
            isSetter: true,
          })
        );
      }
    }

    /** `Type { prop: value }`: a copy of the type with properties overridden */
    override evaluateInstantiate(node: InstantiateNode): Value {
      const type = this.evaluateExpression(node.className);
      if (!isGraph(type)) {
        throw RuntimeError.fromNode(
          TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
          `Cannot instantiate value of type ${typeName(type)}`,
          node.className
        );
      }
      const instance = type.clone();
      instance.frozen = false;
      for (const entry of node.overrides) {
        if (!instance.hasProperty(entry.key)) {
          throw RuntimeError.fromNode(
            TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
            `Property '${entry.key}' does not exist on this graph. Available properties: [${instance.propertyNames().join(', ')}]`,
            entry
          );
        }
        instance.setProperty(entry.key, this.evaluateExpression(entry.value));
      }
      return instance;
    }

    /**
     * `super.m(args)` runs the parent's `m` against the current `self`.
     * The parent is taken from the graph whose method is executing, so a
     * chain of super calls climbs one level at a time.
     */
    override evaluateSuperCall(node: SuperCallNode): Value {
      const location = this.getNodeLocation(node);
      const self = this.ctx.env.lookup('self');
      if (self === undefined || !isGraph(self)) {
        throw new RuntimeError(
          TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
          "'super' can only be used within a method",
          location
        );
      }
      const owner = this.ctx.methodOwners[this.ctx.methodOwners.length - 1] ?? self;
      const parent = owner.parent;
      if (parent === null) {
        throw new RuntimeError(
          TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_METHOD,
          `Cannot call super.${node.method}(): graph has no parent`,
          location
        );
      }

      const args = this.evaluateArguments(node.args);
      const fn = this.selectVariant(parent, node.method, args, self);
      if (fn === undefined) {
        throw new RuntimeError(
          TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_METHOD,
          `Method '${node.method}' not found on parent graph`,
          location
        );
      }
      const result = this.runMethod(
        self,
        fn,
        args,
        parent.declarerOf(node.method, fn),
        location
      );
      this.ctx.env.set('self', result.self);
      return result.value;
    }

    override callGraphMethod(
      receiver: Graph,
      name: string,
      args: readonly CallArgument[],
      options: { fromSelf: boolean; location?: SourceLocation | undefined }
    ): MethodResult | null {
      const { location } = options;
      const staticMethod = receiver.staticMethods.get(name);
      if (staticMethod !== undefined) {
        return { value: this.invokeStatic(staticMethod, args, location), self: receiver };
      }

      const fn = this.selectVariant(receiver, name, args, receiver);
      if (fn === undefined) return null;
      if (fn.isPrivate && !options.fromSelf && !this.insideMethodOf(receiver)) {
        throw new RuntimeError(
          TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_METHOD,
          `Cannot call private method '${name}' from outside the graph's methods`,
          location
        );
      }
      return this.invokeMethod(receiver, fn, args, location);
    }

    /** First guarded variant whose guard holds, else the unguarded one */
    selectVariant(
      graph: Graph,
      name: string,
      args: readonly CallArgument[],
      self: Graph
    ): FunctionValue | undefined {
      const variants = graph.methodVariants(name);
      for (const fn of variants) {
        if (fn.guard !== null && this.guardAccepts(fn, args, self)) return fn;
      }
      return variants.find((fn) => fn.guard === null);
    }

    insideMethodOf(receiver: Graph): boolean {
      return this.ctx.methodOwners.some(
        (owner) => owner.typeName !== null && receiver.isA(owner.typeName)
      );
    }

    override invokeMethod(
      receiver: Graph,
      fn: FunctionValue,
      args: readonly CallArgument[],
      location?: SourceLocation
    ): MethodResult {
      return this.runMethod(
        receiver,
        fn,
        args,
        receiver.declarerOf(fn.displayName, fn),
        location
      );
    }

    /**
     * Run `fn` with `self` bound to a copy of `receiver`. `owner` is the
     * graph that declared `fn`; `super` resolves from its parent.
     */
    runMethod(
      receiver: Graph,
      fn: FunctionValue,
      args: readonly CallArgument[],
      owner: Graph,
      location?: SourceLocation
    ): MethodResult {
      if (fn.isStatic) {
        return { value: this.invokeStatic(fn, args, location), self: receiver };
      }

      const scope = fn.env.child();
      scope.define('self', receiver.clone());
      // The type as it is now, with every method attached
      const type = receiver.typeName;
      if (type !== null) {
        const current = this.ctx.env.lookup(type);
        if (current !== undefined && isGraph(current)) scope.define(type, current);
      }

      const label = type !== null ? `${type}.${fn.displayName}` : fn.displayName;
      const value = this.withOwner(owner, () =>
        this.invokeInScope(fn, args, scope, location, label)
      );

      const final = scope.lookup('self');
      const updated = final !== undefined && isGraph(final) ? final : receiver;
      try {
        checkMethodConstraints(fn.displayName, receiver, updated, this.host);
      } catch (error) {
        this.notifyViolation(error, location);
        throw error;
      }
      return { value, self: updated };
    }

    /** Run `body` with `owner` on top of the method-owner stack */
    withOwner<T>(owner: Graph, body: () => T): T {
      this.ctx.methodOwners.push(owner);
      try {
        return body();
      } finally {
        this.ctx.methodOwners.pop();
      }
    }

    /**
     * Static methods have no `self` and run in the caller's scope.
     * Parameters shadow caller bindings only for the duration of the call.
     */
    invokeStatic(
      fn: FunctionValue,
      args: readonly CallArgument[],
      location?: SourceLocation
    ): Value {
      const env = this.ctx.env;
      const saved = fn.params.map(
        (param): [string, Value | undefined] => [
          param.name,
          env.has(param.name) ? env.lookup(param.name) : undefined,
        ]
      );
      try {
        return this.invokeInScope(fn, args, env, location);
      } finally {
        for (const [name, value] of saved) {
          if (value === undefined) {
            env.remove(name);
          } else {
            env.define(name, value);
          }
        }
      }
    }
  };
}

export const GraphsMixin = createGraphsMixin;
