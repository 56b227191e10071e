/**
 * ErrorsMixin: try/catch/finally, raise and the collect error mode
 *
 * The `try` body runs in the enclosing scope. A matching `catch` clause
 * runs in a child scope holding the bound error, so `e` does not outlive
 * the clause while assignments to existing variables do. `finally` runs on
 * every exit path; an abrupt completion from it wins.
 *
 * Loop signals travel as completions, never as errors, and internal
 * failures are not catchable.
 *
 * @internal
 */

import type { CatchClauseNode, RaiseNode, TryNode } from '../../../../types.js';
import { RuntimeError, TANGLE_ERROR_CODES, TangleError } from '../../../../types.js';
import type { Completion } from '../../completion.js';
import { ScriptError, toErrorValue } from '../../errors.js';
import { isErrorValue, typeName, UserErrorValue, type Value } from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

const UNCATCHABLE: ReadonlySet<string> = new Set([
  TANGLE_ERROR_CODES.RUNTIME_CONTROL_FLOW,
  TANGLE_ERROR_CODES.RUNTIME_INTERNAL,
]);

function isCatchable(error: unknown): error is TangleError {
  return error instanceof TangleError && !UNCATCHABLE.has(error.code);
}

function createErrorsMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class ErrorsEvaluator extends Base {
    override executeTry(node: TryNode): Completion {
      let completion: Completion;
      try {
        completion = this.runGuarded(node);
      } catch (error) {
        this.runFinally(node);
        throw error;
      }
      const after = this.runFinally(node);
      return after === null || after.kind === 'normal' ? completion : after;
    }

    /** Body, then the first clause matching a thrown error */
    runGuarded(node: TryNode): Completion {
      try {
        return this.executeStatements(node.body);
      } catch (error) {
        if (!isCatchable(error)) throw error;
        const caught = toErrorValue(
          error,
          this.ctx.currentFile,
          this.ctx.callGraph.callStack()
        );
        const clause = node.catchClauses.find(
          (c) => c.errorType === null || c.errorType === caught.errorType
        );
        if (clause === undefined) throw error;
        return this.runCatch(clause, caught);
      }
    }

    runCatch(clause: CatchClauseNode, caught: UserErrorValue): Completion {
      const saved = this.ctx.env;
      const scope = saved.child();
      if (clause.variable !== null) scope.define(clause.variable, caught);
      this.ctx.env = scope;
      try {
        return this.executeStatements(clause.body);
      } finally {
        this.ctx.env = scope.takeParent() ?? saved;
      }
    }

    runFinally(node: TryNode): Completion | null {
      return node.finallyBlock === null ? null : this.executeStatements(node.finallyBlock);
    }

    /** `raise ValueError("msg")`, or `raise "msg"` for a RuntimeError */
    override evaluateRaise(node: RaiseNode): Value {
      const location = this.getNodeLocation(node);
      const raised = this.evaluateExpression(node.error);
      let error: UserErrorValue;
      if (isErrorValue(raised)) {
        error = raised;
      } else if (typeof raised === 'string') {
        error = new UserErrorValue(
          'RuntimeError',
          raised,
          this.ctx.currentFile,
          location?.line ?? null,
          location?.column ?? null,
          this.ctx.callGraph.callStack()
        );
      } else {
        throw new RuntimeError(
          TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
          `raise expects an error value or a string, got ${typeName(raised)}`,
          location
        );
      }
      return this.collectOrThrow(new ScriptError(error, location));
    }

    /**
     * `:collect` records the error and yields none, `:lenient` yields none
     * silently, `:strict` rethrows.
     */
    override collectOrThrow(error: TangleError): Value {
      switch (this.ctx.config.current.errorMode) {
        case 'strict':
          throw error;
        case 'lenient':
          return null;
        case 'collect':
          this.ctx.errors.collect(
            toErrorValue(error, this.ctx.currentFile, this.ctx.callGraph.callStack())
          );
          return null;
      }
    }
  };
}

export const ErrorsMixin = createErrorsMixin;
