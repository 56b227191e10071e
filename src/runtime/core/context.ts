/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for script execution.
 */

import { CallGraph } from './call-graph.js';
import { ConfigStack, DEFAULT_CONFIG } from './config.js';
import { Environment } from './environment.js';
import { ErrorCollector } from './error-collector.js';
import { ModuleManager } from './modules.js';
import type {
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  ScriptRunner,
} from './types.js';

const defaultCallbacks: RuntimeCallbacks = {
  onLog: (text) => {
    console.log(text);
  },
};

/** Services shared between an executor and the executors it spawns */
export interface ContextServices {
  readonly runner: ScriptRunner;
  /** Module cache; a fresh one when omitted */
  readonly modules?: ModuleManager | undefined;
}

/**
 * Create a runtime context for script execution.
 * Initial variables land in the global scope.
 */
export function createRuntimeContext(
  options: RuntimeOptions,
  services: ContextServices
): RuntimeContext {
  const globals = new Environment();
  for (const [name, value] of Object.entries(options.variables ?? {})) {
    globals.define(name, value);
  }

  return {
    globals,
    env: globals,
    functions: new Map(),
    config: new ConfigStack({ ...DEFAULT_CONFIG, ...options.config }),
    callGraph: new CallGraph(options.maxCallDepth),
    errors: new ErrorCollector(),
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
    methodOwners: [],
    privateSymbols: new Set(),
    currentFile: options.currentFile ?? null,
    searchPaths: options.searchPaths ?? [],
    modules: services.modules ?? new ModuleManager(),
    runner: services.runner,
    moduleName: null,
    moduleAlias: null,
    output: null,
  };
}
