/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins, one instance per
 * RuntimeContext.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - shared utilities and the builtin host
 * 2. CoreMixin - statement and expression dispatch, blocks, scripts
 * 3. LiteralsMixin - numbers, lists, maps, graph literals, lambdas
 * 4. VariablesMixin - declarations, assignment, indexing, write-back
 * 5. ControlFlowMixin - if, loops, configure, precision, match
 * 6. ClosuresMixin - function declarations, calls and argument binding
 * 7. GraphsMixin - graph types, instantiation, user methods, super
 * 8. MethodsMixin - method call dispatch and builtin method tables
 * 9. ExpressionsMixin - binary and unary operators
 * 10. ErrorsMixin - try/catch/finally, raise, collect mode
 * 11. ModulesMixin - import, load, module declarations (outermost)
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { CoreMixin } from './mixins/core.js';
import { LiteralsMixin } from './mixins/literals.js';
import { VariablesMixin } from './mixins/variables.js';
import { ControlFlowMixin } from './mixins/control-flow.js';
import { ClosuresMixin } from './mixins/closures.js';
import { GraphsMixin } from './mixins/graphs.js';
import { MethodsMixin } from './mixins/methods.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import { ErrorsMixin } from './mixins/errors.js';
import { ModulesMixin } from './mixins/modules.js';
import type { RuntimeContext } from '../types.js';

export const Evaluator = ModulesMixin(
  ErrorsMixin(
    ExpressionsMixin(
      MethodsMixin(
        GraphsMixin(
          ClosuresMixin(
            ControlFlowMixin(
              VariablesMixin(LiteralsMixin(CoreMixin(EvaluatorBase)))
            )
          )
        )
      )
    )
  )
);

// eslint-disable-next-line no-redeclare
export type Evaluator = InstanceType<typeof Evaluator>;

/**
 * Evaluators keyed by context. Entries go away with their context, since
 * WeakMap keys don't prevent GC.
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create the evaluator for a context.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
