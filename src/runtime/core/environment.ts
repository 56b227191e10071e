/**
 * Lexical Scopes
 *
 * A scope owns its bindings and links to an optional parent. Closures hold
 * the Environment object itself, so mutations on either side stay visible
 * to the other.
 */

import { RuntimeError, TANGLE_ERROR_CODES } from '../../types.js';
import type { Value } from './values.js';

export class Environment {
  private readonly vars = new Map<string, Value>();

  constructor(private parent: Environment | null = null) {}

  /** New scope whose parent is this one */
  child(): Environment {
    return new Environment(this);
  }

  /** Insert or overwrite in this scope */
  define(name: string, value: Value): void {
    this.vars.set(name, value);
  }

  /** Walk the chain; UndefinedVariable when no scope defines `name` */
  get(name: string): Value {
    const value = this.lookup(name);
    if (value === undefined) {
      throw new RuntimeError(
        TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
        `Undefined variable: ${name}`
      );
    }
    return value;
  }

  /** `undefined` when the chain has no binding */
  lookup(name: string): Value | undefined {
    let scope: Environment | null = this;
    while (scope) {
      if (scope.vars.has(name)) return scope.vars.get(name);
      scope = scope.parent;
    }
    return undefined;
  }

  /** Update the nearest scope that defines `name` */
  set(name: string, value: Value): void {
    let scope: Environment | null = this;
    while (scope) {
      if (scope.vars.has(name)) {
        scope.vars.set(name, value);
        return;
      }
      scope = scope.parent;
    }
    throw new RuntimeError(
      TANGLE_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
      `Cannot assign to undefined variable: ${name}`
    );
  }

  /** Defined anywhere on the chain */
  exists(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /** Defined in this scope only */
  has(name: string): boolean {
    return this.vars.has(name);
  }

  remove(name: string): void {
    this.vars.delete(name);
  }

  /**
   * Detach and return the parent scope. The caller continues with the
   * returned scope; bindings made in this scope are dropped with it.
   */
  takeParent(): Environment | null {
    const parent = this.parent;
    this.parent = null;
    return parent;
  }

  getParent(): Environment | null {
    return this.parent;
  }

  /** Snapshot of this scope's own bindings */
  bindings(): Map<string, Value> {
    return new Map(this.vars);
  }
}
