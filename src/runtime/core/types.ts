/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { SourceLocation } from '../../types.js';
import type { CallGraph } from './call-graph.js';
import type { FunctionValue } from './callable.js';
import type { ConfigSettings, ConfigStack } from './config.js';
import type { Environment } from './environment.js';
import type { ErrorCollector } from './error-collector.js';
import type { Graph } from './graph.js';
import type { ModuleManager } from './modules.js';
import type { RuleHost } from './rules.js';
import type { Value } from './values.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called for each `print`, with the formatted line */
  onLog: (text: string) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before a script function or method runs */
  onFunctionCall?: (event: FunctionCallEvent) => void;
  /** Called after a function returns */
  onFunctionReturn?: (event: FunctionReturnEvent) => void;
  /** Called when a structural rule or method constraint rejects a change */
  onRuleViolation?: (event: RuleViolationEvent) => void;
  /** Called when an error escapes a top-level evaluation */
  onError?: (event: ErrorEvent) => void;
  /** Called after a module finishes loading */
  onModuleLoad?: (event: ModuleLoadEvent) => void;
}

/** Event emitted before a function call */
export interface FunctionCallEvent {
  /** Function name; `Type.method` for graph methods */
  name: string;
  /** Positional view of the evaluated arguments */
  args: Value[];
  /** Call depth after entering */
  depth: number;
}

/** Event emitted after a function returns */
export interface FunctionReturnEvent {
  name: string;
  value: Value;
  /** Execution time in milliseconds */
  durationMs: number;
}

export interface RuleViolationEvent {
  message: string;
  location?: SourceLocation | undefined;
}

/** Event emitted on error */
export interface ErrorEvent {
  error: Error;
}

export interface ModuleLoadEvent {
  name: string;
  path: string;
}

/** Options for creating a runtime */
export interface RuntimeOptions {
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks> | undefined;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks | undefined;
  /** Initial variables */
  variables?: Record<string, Value> | undefined;
  /** Initial configuration, merged over the defaults */
  config?: Partial<ConfigSettings> | undefined;
  /** Path of the script being run; relative imports resolve against it */
  currentFile?: string | undefined;
  /** Extra directories searched by `import` and `load` */
  searchPaths?: string[] | undefined;
  /** Maximum nested call depth; unbounded when omitted */
  maxCallDepth?: number | undefined;
}

/**
 * Runs a file in a fresh, isolated context. Supplied by the executor so the
 * evaluator can load modules without depending on it.
 */
export interface ScriptRunner {
  runIsolated(filePath: string, options: { captureOutput: boolean }): RuntimeContext;
}

/** Runtime context with scopes, tables and callbacks */
export interface RuntimeContext {
  /** Root scope of this script */
  readonly globals: Environment;
  /** Scope statements currently execute in */
  env: Environment;
  /** Global functions by name; each name keeps one overload per arity */
  readonly functions: Map<string, FunctionValue[]>;
  readonly config: ConfigStack;
  readonly callGraph: CallGraph;
  readonly errors: ErrorCollector;
  /** I/O callbacks */
  readonly callbacks: RuntimeCallbacks;
  /** Observability callbacks */
  readonly observability: ObservabilityCallbacks;
  /**
   * Graph whose method body is currently executing, innermost last.
   * `super` resolves against the top entry's parent.
   */
  readonly methodOwners: Graph[];
  /** Names declared with `priv` in this script */
  readonly privateSymbols: Set<string>;
  currentFile: string | null;
  readonly searchPaths: readonly string[];
  readonly modules: ModuleManager;
  readonly runner: ScriptRunner;
  /** Set by a `module` declaration or frontmatter */
  moduleName: string | null;
  moduleAlias: string | null;
  /** Captured `print` lines while output capture is enabled */
  output: string[] | null;
}

/** What builtin functions and methods can ask of the evaluator */
export interface CallHost extends RuleHost {
  readonly ctx: RuntimeContext;
  /** Run a file in isolation and return everything it printed */
  runFileCaptured(path: string, location?: SourceLocation): string;
  /** Print a line (to the capture buffer when one is active) */
  emitOutput(text: string): void;
}

/**
 * Built-in function: `print(x)`, `len(xs)`.
 * @internal
 */
export type BuiltinFunction = (
  args: Value[],
  host: CallHost,
  location?: SourceLocation
) => Value;

/**
 * Built-in method on a receiver value: `xs.append(1)`.
 * @internal
 */
export type BuiltinMethod<T extends Value = Value> = (
  receiver: T,
  args: Value[],
  host: CallHost,
  location?: SourceLocation
) => Value;
