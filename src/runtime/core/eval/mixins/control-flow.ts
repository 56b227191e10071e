/**
 * ControlFlowMixin: Branches, Loops and Scoped Settings
 *
 * Statement blocks run in the enclosing scope: a variable first assigned
 * inside an `if` or loop body stays visible after it. Loops consume
 * `break` and `continue` completions; `return` passes through untouched.
 *
 * `configure { ... } { body }` and `precision N { body }` push settings
 * for the body and pop them on every exit path.
 *
 * @internal
 */

import type {
  ConditionalNode,
  ConfigureNode,
  ForNode,
  IfNode,
  MatchNode,
  PrecisionNode,
  StatementNode,
  WhileNode,
} from '../../../../types.js';
import { RuntimeError, TANGLE_ERROR_CODES } from '../../../../types.js';
import { NORMAL, type Completion } from '../../completion.js';
import { matchPattern } from '../../patterns.js';
import {
  formatValue,
  isGraph,
  isList,
  isMap,
  isTruthy,
  typeName,
  type Value,
} from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

function createControlFlowMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class ControlFlowEvaluator extends Base {
    override executeIf(node: IfNode): Completion {
      if (isTruthy(this.evaluateExpression(node.condition))) {
        return this.executeStatements(node.thenBranch);
      }
      return node.elseBranch ? this.executeStatements(node.elseBranch) : NORMAL;
    }

    override executeWhile(node: WhileNode): Completion {
      while (isTruthy(this.evaluateExpression(node.condition))) {
        const completion = this.runLoopBody(node.body);
        if (completion === 'break') break;
        if (completion !== null) return completion;
      }
      return NORMAL;
    }

    /**
     * `for x in items`: lists by element, maps by key, strings by
     * character, graphs by data node id. The loop variable is bound in the
     * enclosing scope.
     */
    override executeFor(node: ForNode): Completion {
      const iterable = this.evaluateExpression(node.iterable);
      for (const item of this.iterationValues(iterable, node)) {
        if (this.ctx.env.exists(node.variable)) {
          this.ctx.env.set(node.variable, item);
        } else {
          this.ctx.env.define(node.variable, item);
        }
        const completion = this.runLoopBody(node.body);
        if (completion === 'break') break;
        if (completion !== null) return completion;
      }
      return NORMAL;
    }

    iterationValues(iterable: Value, node: ForNode): Value[] {
      if (isList(iterable)) return [...iterable.items];
      if (isMap(iterable)) return [...iterable.entries.keys()];
      if (typeof iterable === 'string') return [...iterable];
      if (isGraph(iterable)) return iterable.dataNodeIds();
      throw RuntimeError.fromNode(
        TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
        `Cannot iterate over value of type ${typeName(iterable)}`,
        node.iterable
      );
    }

    /** One iteration: null to keep going, 'break' to stop, or a return */
    runLoopBody(body: readonly StatementNode[]): Completion | 'break' | null {
      const completion = this.executeStatements(body);
      switch (completion.kind) {
        case 'break':
          return 'break';
        case 'continue':
        case 'normal':
          return null;
        case 'return':
          return completion;
      }
    }

    override executeConfigure(node: ConfigureNode): Completion {
      const changes: Array<[string, Value]> = node.settings.map((entry) => [
        entry.key,
        this.evaluateExpression(entry.value),
      ]);
      if (node.body === null) {
        this.ctx.config.replaceCurrent(changes);
        return NORMAL;
      }
      this.ctx.config.pushWithChanges(changes);
      try {
        return this.executeStatements(node.body);
      } finally {
        this.ctx.config.pop();
      }
    }

    override executePrecision(node: PrecisionNode): Completion {
      this.ctx.config.pushRounding(node.places);
      try {
        return this.executeStatements(node.body);
      } finally {
        this.ctx.config.pop();
      }
    }

    /** `a if c else b`, `a if c` (none otherwise), `a unless c` */
    override evaluateConditional(node: ConditionalNode): Value {
      const condition = isTruthy(this.evaluateExpression(node.condition));
      if (condition !== node.isUnless) return this.evaluateExpression(node.thenExpr);
      return node.elseExpr ? this.evaluateExpression(node.elseExpr) : null;
    }

    /** First matching arm wins; its bindings live in a fresh child scope */
    override evaluateMatch(node: MatchNode): Value {
      const value = this.evaluateExpression(node.value);
      for (const arm of node.arms) {
        const bindings = matchPattern(arm.pattern, value);
        if (bindings === null) continue;
        const scope = this.ctx.env.child();
        for (const [name, bound] of bindings) scope.define(name, bound);
        return this.withScope(scope, () => this.evaluateExpression(arm.body));
      }
      throw RuntimeError.fromNode(
        TANGLE_ERROR_CODES.RUNTIME_NO_MATCH,
        `No match arm matched value: ${formatValue(value)}`,
        node
      );
    }
  };
}

export const ControlFlowMixin = createControlFlowMixin;
