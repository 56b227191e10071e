/**
 * VariablesMixin: Variable Access and Mutation
 *
 * Handles declarations, assignment, element and property access:
 * - `[priv] [type] name = value` always binds in the current scope
 * - `name = value` updates the nearest defining scope, else binds locally
 * - `a[i] = v` and `a.p = v` copy the container and store the copy back
 *   through the chain of expressions that produced it (value semantics)
 *
 * Missing elements honor `bounds_checking` (`:lenient` yields none) and
 * the `:collect` error mode.
 *
 * @internal
 */

import type {
  AssignmentNode,
  ExpressionNode,
  IndexNode,
  PropertyAccessNode,
  SourceLocation,
  TypeAnnotation,
  VariableDeclNode,
} from '../../../../types.js';
import { RuntimeError, TANGLE_ERROR_CODES } from '../../../../types.js';
import {
  mapWithEntry,
  readIndex,
  writeIndex,
} from '../../indexing.js';
import {
  isBigNum,
  toBigNum,
  truncateForIntegerMode,
} from '../../numbers.js';
import {
  isGraph,
  isMap,
  isModule,
  isNumeric,
  typeName,
  type Value,
} from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

/** Does `value` satisfy a declared type? `bignum` also takes plain numbers */
function matchesAnnotation(annotation: TypeAnnotation, value: Value): boolean {
  if (annotation === 'bignum') return isNumeric(value);
  if (annotation === 'num') return typeof value === 'number' || isBigNum(value);
  return typeName(value) === annotation;
}

function typeError(message: string, location?: SourceLocation): RuntimeError {
  return new RuntimeError(TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR, message, location);
}

function createVariablesMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class VariablesEvaluator extends Base {
    override executeVariableDecl(node: VariableDeclNode): void {
      let value = this.evaluateExpression(node.value);
      if (node.typeAnnotation !== null) {
        if (!matchesAnnotation(node.typeAnnotation, value)) {
          throw typeError(
            `Type mismatch: cannot assign ${typeName(value)} to ${node.typeAnnotation} ${node.name}`,
            this.getNodeLocation(node)
          );
        }
        if (node.typeAnnotation === 'bignum' && isNumeric(value)) {
          value = toBigNum(value);
        }
      }
      if (node.isPrivate) this.ctx.privateSymbols.add(node.name);
      this.ctx.env.define(node.name, this.prepareBinding(node.name, value));
    }

    override executeAssignment(node: AssignmentNode): void {
      const { target } = node;
      const value = this.evaluateExpression(node.value);
      switch (target.kind) {
        case 'variable': {
          const bound = this.prepareBinding(target.name, value);
          if (!this.ctx.env.exists(target.name) && this.assignSelfProperty(target.name, bound)) {
            return;
          }
          this.assignVariable(target.name, bound);
          return;
        }
        case 'index': {
          const container = this.evaluateExpression(target.object);
          const index = this.evaluateExpression(target.index);
          let updated: Value;
          try {
            updated = writeIndex(container, index, value, this.host);
          } catch (error) {
            this.notifyViolation(error, this.getNodeLocation(node));
            throw error;
          }
          this.storeInto(target.object, updated, node);
          return;
        }
        case 'property':
          this.assignProperty(target.object, target.property, value, node);
          return;
      }
    }

    /**
     * Value as it will be bound to `name`: integer mode truncates numbers,
     * and an anonymous graph takes the variable's name as its type.
     */
    prepareBinding(name: string, value: Value): Value {
      if (this.ctx.config.current.integerMode && isNumeric(value)) {
        return truncateForIntegerMode(value);
      }
      if (isGraph(value) && value.typeName === null) {
        const named = value.clone();
        named.typeName = name;
        return named;
      }
      return value;
    }

    assignVariable(name: string, value: Value): void {
      if (this.ctx.env.exists(name)) {
        this.ctx.env.set(name, value);
      } else {
        this.ctx.env.define(name, value);
      }
    }

    /** Inside a method, a bare property name assigns to `self` */
    assignSelfProperty(name: string, value: Value): boolean {
      const self = this.ctx.env.lookup('self');
      if (self === undefined || !isGraph(self) || !self.hasProperty(name)) return false;
      const copy = self.clone();
      copy.setProperty(name, value);
      this.ctx.env.set('self', copy);
      return true;
    }

    /** Scope chain, then a property of `self`, then the latest global overload */
    override evaluateVariable(name: string, location?: SourceLocation): Value {
      const value = this.ctx.env.lookup(name);
      if (value !== undefined) return value;
      const self = this.ctx.env.lookup('self');
      if (self !== undefined && isGraph(self)) {
        const property = self.property(name);
        if (property !== undefined) return property;
      }
      const overloads = this.ctx.functions.get(name) ?? [];
      const latest = overloads[overloads.length - 1];
      if (latest !== undefined) return latest;
      throw new RuntimeError(
        TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
        `Undefined variable: ${name}`,
        location
      );
    }

    override evaluateIndex(node: IndexNode): Value {
      const container = this.evaluateExpression(node.object);
      const index = this.evaluateExpression(node.index);
      const lookup = readIndex(container, index);
      if (lookup.found) return lookup.value;
      if (this.ctx.config.current.boundsChecking === 'lenient') return null;
      return this.collectOrThrow(lookup.error);
    }

    /**
     * `obj.name`: module member, map key, graph property, then a
     * zero-argument method of that name.
     */
    override evaluatePropertyAccess(node: PropertyAccessNode): Value {
      const object = this.evaluateExpression(node.object);
      const { property } = node;
      const location = this.getNodeLocation(node);

      if (isModule(object)) {
        const label = object.alias ?? object.name;
        if (object.privateSymbols.has(property)) {
          throw new RuntimeError(
            TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
            `Cannot access private symbol '${property}' from module '${label}'`,
            location
          );
        }
        const member = object.bindings.get(property);
        if (member === undefined) {
          throw new RuntimeError(
            TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
            `Module '${label}' has no member '${property}'`,
            location
          );
        }
        return member;
      }

      if (isMap(object)) {
        const value = object.entries.get(property);
        if (value !== undefined) return value;
        const builtin = this.callBuiltinMethod(object, property, [], location);
        if (builtin !== undefined) return builtin;
        if (this.ctx.config.current.boundsChecking === 'lenient') return null;
        return this.collectOrThrow(
          new RuntimeError(
            TANGLE_ERROR_CODES.RUNTIME_INDEX_ERROR,
            `Map key not found: '${property}'`,
            location
          )
        );
      }

      if (isGraph(object)) {
        const value = object.property(property);
        if (value !== undefined && !property.startsWith('__')) return value;
        const result = this.callGraphMethod(object, property, [], {
          fromSelf: node.object.type === 'Variable' && node.object.name === 'self',
          location,
        });
        if (result !== null) {
          this.writeBack(node.object, result.self);
          return result.value;
        }
      }

      const builtin = this.callBuiltinMethod(object, property, [], location);
      if (builtin !== undefined) return builtin;
      throw new RuntimeError(
        TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_METHOD,
        `Type '${typeName(object)}' has no property '${property}'`,
        location
      );
    }

    /** `obj.name = value`: setter, graph property or map key */
    assignProperty(
      objectExpr: ExpressionNode,
      property: string,
      value: Value,
      node: AssignmentNode
    ): void {
      const object = this.evaluateExpression(objectExpr);
      const location = this.getNodeLocation(node);

      if (isGraph(object)) {
        const setter = object.setters.get(property);
        if (setter !== undefined) {
          const result = this.invokeMethod(object, setter, [{ name: null, value }], location);
          this.storeInto(objectExpr, result.self, node);
          return;
        }
        if (property.startsWith('__')) {
          throw typeError(`Cannot assign to internal property '${property}'`, location);
        }
        const copy = object.clone();
        copy.setProperty(property, value);
        this.storeInto(objectExpr, copy, node);
        return;
      }

      if (isMap(object)) {
        this.storeInto(objectExpr, mapWithEntry(object, property, value, this.host), node);
        return;
      }

      throw typeError(
        `Cannot use property assignment on type ${typeName(object)}`,
        location
      );
    }

    storeInto(target: ExpressionNode, value: Value, node: AssignmentNode): void {
      if (!this.writeBack(target, value)) {
        throw new RuntimeError(
          TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
          'Invalid assignment target: cannot modify a temporary value',
          this.getNodeLocation(node)
        );
      }
    }

    /**
     * Store `value` where `target` reads from, copying each enclosing
     * container on the way out. Setters are not consulted here: this is
     * how a mutated element returns to its owner.
     */
    override writeBack(target: ExpressionNode, value: Value): boolean {
      switch (target.type) {
        case 'Variable':
          this.assignVariable(target.name, value);
          return true;
        case 'Index': {
          const container = this.evaluateExpression(target.object);
          const index = this.evaluateExpression(target.index);
          return this.writeBack(
            target.object,
            writeIndex(container, index, value, this.host)
          );
        }
        case 'PropertyAccess': {
          const container = this.evaluateExpression(target.object);
          if (isGraph(container)) {
            const copy = container.clone();
            copy.setProperty(target.property, value);
            return this.writeBack(target.object, copy);
          }
          if (isMap(container)) {
            return this.writeBack(
              target.object,
              mapWithEntry(container, target.property, value, this.host)
            );
          }
          return false;
        }
        default:
          return false;
      }
    }
  };
}

export const VariablesMixin = createVariablesMixin;
