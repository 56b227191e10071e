/**
 * Call Graph
 *
 * Tracks active calls independently of scopes. Every `enter` is paired
 * with an `exit` in a `finally`, so the stack stays balanced on error
 * paths.
 */

import type { SourceLocation } from '../../types.js';
import { RuntimeError, TANGLE_ERROR_CODES } from '../../types.js';

export interface CallRecord {
  readonly name: string;
  readonly location: SourceLocation | undefined;
}

export class CallGraph {
  private readonly stack: CallRecord[] = [];

  constructor(private readonly maxDepth?: number) {}

  enter(name: string, location?: SourceLocation): void {
    if (this.maxDepth !== undefined && this.stack.length >= this.maxDepth) {
      throw new RuntimeError(
        TANGLE_ERROR_CODES.RUNTIME_LIMIT_EXCEEDED,
        `Maximum call depth of ${this.maxDepth} exceeded in '${name}'`,
        location
      );
    }
    this.stack.push({ name, location });
  }

  exit(): void {
    this.stack.pop();
  }

  get depth(): number {
    return this.stack.length;
  }

  /** Active call names, innermost first */
  callStack(): string[] {
    return this.stack.map((r) => r.name).reverse();
  }
}
