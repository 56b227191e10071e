/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides shared utilities and context access for all mixins.
 *
 * @internal
 */

import type { ASTNode, SourceLocation } from '../../../types.js';
import { TANGLE_ERROR_CODES, TangleError } from '../../../types.js';
import type { Environment } from '../environment.js';
import { resolveModulePath } from '../modules.js';
import type { CallHost, RuntimeContext } from '../types.js';
import type { Value } from '../values.js';
import type { EvaluatorSurface } from './types.js';

// Mixins implement the surface; merging makes it visible to each of them.
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface EvaluatorBase extends EvaluatorSurface {}

/**
 * Base class for the evaluator.
 * Contains shared utilities used by all mixins.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class EvaluatorBase {
  /** Value of the most recent expression statement */
  lastValue: Value = null;

  constructor(readonly ctx: RuntimeContext) {}

  /**
   * Get source location from an AST node.
   * Used for error reporting with precise location information.
   */
  getNodeLocation(node?: ASTNode): SourceLocation | undefined {
    const start = node?.span.start;
    // Synthesized nodes sit at line 0
    return start !== undefined && start.line > 0 ? start : undefined;
  }

  /** Run `body` with `scope` as the current scope, restoring it afterwards */
  withScope<T>(scope: Environment, body: () => T): T {
    const saved = this.ctx.env;
    this.ctx.env = scope;
    try {
      return body();
    } finally {
      this.ctx.env = saved;
    }
  }

  /** Builtins reach the evaluator through this object */
  get host(): CallHost {
    return {
      ctx: this.ctx,
      callFunction: (fn, args) =>
        this.invokeFunction(
          fn,
          args.map((value) => ({ name: null, value }))
        ),
      runFileCaptured: (path, location) => this.runFileCaptured(path, location),
      emitOutput: (text) => this.emitOutput(text),
    };
  }

  /** `exec(path)`: run a file in isolation and return its printed output */
  runFileCaptured(path: string, location?: SourceLocation): string {
    const resolved = resolveModulePath(
      path,
      this.ctx.currentFile,
      this.ctx.searchPaths,
      location
    );
    const child = this.ctx.runner.runIsolated(resolved, { captureOutput: true });
    return (child.output ?? []).join('\n');
  }

  /** Write a `print` line to the capture buffer or the log callback */
  emitOutput(text: string): void {
    if (this.ctx.output) {
      this.ctx.output.push(text);
      return;
    }
    this.ctx.callbacks.onLog(text);
  }

  /** Report rule and constraint failures to observability hooks */
  notifyViolation(error: unknown, location?: SourceLocation): void {
    if (!(error instanceof TangleError)) return;
    if (
      error.code !== TANGLE_ERROR_CODES.RUNTIME_RULE_VIOLATION &&
      error.code !== TANGLE_ERROR_CODES.RUNTIME_CONSTRAINT_VIOLATION
    ) {
      return;
    }
    this.ctx.observability.onRuleViolation?.({
      message: error.detail,
      location: error.location ?? location,
    });
  }
}
