/**
 * Tangle Runtime
 *
 * Public API for executing Tangle scripts.
 *
 * Module Structure:
 * - core/: Execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, callbacks)
 *   - values.ts: Value union and value utilities
 *   - graph.ts: Graph objects
 *   - rules.ts: Structural, transformation and method-constraint rules
 *   - context.ts: Runtime context factory
 *   - execute.ts: Executor and embedding API
 *   - eval/: Mixin-composed evaluator (internal)
 * - ext/: Builtin functions and method tables
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  CallHost,
  ErrorEvent,
  FunctionCallEvent,
  FunctionReturnEvent,
  ModuleLoadEvent,
  ObservabilityCallbacks,
  RuleViolationEvent,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  ScriptRunner,
} from './core/types.js';

// ============================================================
// VALUES
// ============================================================

export type {
  FormatOptions,
  SymbolValue,
  Value,
  ValueTypeName,
} from './core/values.js';

export {
  deepCopyUnfrozen,
  formatValue,
  freeze,
  hasFrozen,
  isErrorValue,
  isFrozen,
  isGraph,
  isList,
  isMap,
  isTruthy,
  list,
  ListValue,
  map,
  MapValue,
  ModuleValue,
  symbol,
  toDisplayString,
  typeName,
  UserErrorValue,
  valuesEqual,
} from './core/values.js';

export type { BigNumValue, PrecisionMode } from './core/numbers.js';
export { isBigNum } from './core/numbers.js';

export { FunctionValue } from './core/callable.js';
export type { CallArgument, FunctionParam } from './core/callable.js';

// ============================================================
// GRAPHS AND RULES
// ============================================================

export { Graph, isInternalNodeId } from './core/graph.js';
export type { Edge, EdgeRecord } from './core/graph.js';
export type { RuleSpec } from './core/rules.js';
export { ruleFromSymbol, ruleName } from './core/rules.js';

// ============================================================
// CONFIGURATION AND ERRORS
// ============================================================

export type { ConfigSettings, ErrorMode } from './core/config.js';
export { ConfigError, DEFAULT_CONFIG } from './core/config.js';
export { ScriptError } from './core/errors.js';

// ============================================================
// EXECUTION
// ============================================================

export { createRuntimeContext } from './core/context.js';
export type { ExecutionResult } from './core/execute.js';
export { createRuntime, execute, Executor } from './core/execute.js';
