/**
 * Script Execution
 *
 * Public API for running Tangle source. An Executor owns one runtime
 * context; imported modules and `exec` run in child executors that share
 * its module cache, options and callbacks.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from '../../parser/index.js';
import { RuntimeError, TANGLE_ERROR_CODES } from '../../types.js';
import { createRuntimeContext } from './context.js';
import { getEvaluator } from './eval/evaluator.js';
import type { ModuleManager } from './modules.js';
import type { RuntimeContext, RuntimeOptions, ScriptRunner } from './types.js';
import type { UserErrorValue, Value } from './values.js';

/** Final value and the global bindings left behind */
export interface ExecutionResult {
  readonly value: Value;
  readonly variables: Record<string, Value>;
}

export class Executor implements ScriptRunner {
  readonly context: RuntimeContext;

  constructor(
    private readonly options: RuntimeOptions = {},
    modules?: ModuleManager
  ) {
    this.context = createRuntimeContext(options, { runner: this, modules });
  }

  /**
   * Parse and run `source` in this executor's global scope. Bindings
   * persist across calls.
   */
  executeSource(source: string): Value {
    try {
      return getEvaluator(this.context).executeScript(parse(source));
    } catch (error) {
      this.context.observability.onError?.({
        error: error instanceof Error ? error : new Error(String(error)),
      });
      throw error;
    }
  }

  /** Run a file; relative imports inside it resolve against its directory */
  executeFile(filePath: string): Value {
    const resolved = path.resolve(filePath);
    let source: string;
    try {
      source = fs.readFileSync(resolved, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RuntimeError(
        TANGLE_ERROR_CODES.IO_ERROR,
        `Cannot read file '${filePath}': ${reason}`
      );
    }
    const previous = this.context.currentFile;
    this.context.currentFile = resolved;
    try {
      return this.executeSource(source);
    } finally {
      this.context.currentFile = previous;
    }
  }

  /** Child executor for an import, `load` or `exec` */
  runIsolated(filePath: string, options: { captureOutput: boolean }): RuntimeContext {
    const child = new Executor(
      { ...this.options, variables: undefined, currentFile: filePath },
      this.context.modules
    );
    if (options.captureOutput) child.enableOutputCapture();
    child.executeFile(filePath);
    return child.context;
  }

  getVariable(name: string): Value | undefined {
    return this.context.globals.lookup(name);
  }

  variables(): Record<string, Value> {
    return Object.fromEntries(this.context.globals.bindings());
  }

  enableOutputCapture(): void {
    this.context.output ??= [];
  }

  disableOutputCapture(): void {
    this.context.output = null;
  }

  /** Captured lines joined with newlines; the buffer starts over afterwards */
  getCapturedOutput(): string {
    const lines = this.context.output;
    if (lines === null) return '';
    const text = lines.join('\n');
    lines.length = 0;
    return text;
  }

  getErrors(): readonly UserErrorValue[] {
    return this.context.errors.getErrors();
  }
}

/** Create an executor with the given options */
export function createRuntime(options: RuntimeOptions = {}): Executor {
  return new Executor(options);
}

/**
 * Run `source` in a fresh executor.
 *
 * @example
 * ```typescript
 * const { value } = execute('x = 2\nx * 21');
 * ```
 */
export function execute(source: string, options: RuntimeOptions = {}): ExecutionResult {
  const executor = new Executor(options);
  const value = executor.executeSource(source);
  return { value, variables: executor.variables() };
}
