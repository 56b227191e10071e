/**
 * ModulesMixin: import, load, module declarations and frontmatter
 *
 * `import` runs a file once per executor tree in an isolated context and
 * binds its public namespace. `load` re-runs the file every time and copies
 * its bindings into the current scope.
 *
 * @internal
 */

import type {
  ImportNode,
  LoadNode,
  ModuleDeclNode,
  ScriptNode,
  SourceLocation,
} from '../../../../types.js';
import type { FunctionValue } from '../../callable.js';
import { parseFrontmatter } from '../../frontmatter.js';
import {
  moduleNameFromPath,
  resolveModulePath,
  type LoadedModule,
} from '../../modules.js';
import type { RuntimeContext } from '../../types.js';
import { ModuleValue, type Value } from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

/** Names reserved for the runtime never cross a `load` */
function isInternalName(name: string): boolean {
  return name.startsWith('__');
}

function publicFunctions(child: RuntimeContext): Map<string, FunctionValue[]> {
  const functions = new Map<string, FunctionValue[]>();
  for (const [name, overloads] of child.functions) {
    if (child.privateSymbols.has(name)) continue;
    functions.set(name, [...overloads]);
  }
  return functions;
}

function createModulesMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class ModulesEvaluator extends Base {
    override executeImport(node: ImportNode): void {
      const location = this.getNodeLocation(node);
      const resolved = resolveModulePath(
        node.path,
        this.ctx.currentFile,
        this.ctx.searchPaths,
        location
      );

      let loaded = this.ctx.modules.get(resolved);
      if (loaded === undefined) {
        loaded = this.loadModule(resolved, location);
      }

      const { value } = loaded;
      const aliased =
        node.alias === null
          ? value
          : new ModuleValue(value.name, node.alias, value.bindings, value.filePath, value.privateSymbols);
      this.ctx.env.define(aliased.alias ?? aliased.name, aliased);
      for (const overloads of loaded.functions.values()) {
        for (const fn of overloads) this.registerOverload(fn);
      }
    }

    loadModule(resolved: string, location?: SourceLocation): LoadedModule {
      this.ctx.modules.begin(resolved, location);
      let child: RuntimeContext;
      try {
        child = this.ctx.runner.runIsolated(resolved, { captureOutput: false });
      } finally {
        this.ctx.modules.end(resolved);
      }

      const bindings = new Map<string, Value>();
      for (const [name, bound] of child.globals.bindings()) {
        if (!child.privateSymbols.has(name)) bindings.set(name, bound);
      }
      const name = child.moduleName ?? moduleNameFromPath(resolved);
      const loaded: LoadedModule = {
        value: new ModuleValue(name, child.moduleAlias, bindings, resolved, new Set(child.privateSymbols)),
        functions: publicFunctions(child),
      };
      this.ctx.modules.store(resolved, loaded);
      this.ctx.observability.onModuleLoad?.({ name, path: resolved });
      return loaded;
    }

    override executeLoad(node: LoadNode): void {
      const resolved = resolveModulePath(
        node.path,
        this.ctx.currentFile,
        this.ctx.searchPaths,
        this.getNodeLocation(node)
      );
      const child = this.ctx.runner.runIsolated(resolved, { captureOutput: false });
      for (const [name, bound] of child.globals.bindings()) {
        if (!isInternalName(name)) this.ctx.env.define(name, bound);
      }
      if (this.ctx.env === this.ctx.globals) {
        for (const overloads of child.functions.values()) {
          for (const fn of overloads) this.registerOverload(fn);
        }
      }
    }

    override executeModuleDecl(node: ModuleDeclNode): void {
      this.ctx.moduleName = node.name;
      this.ctx.moduleAlias = node.alias;
    }

    /** Frontmatter names the module and sets config for the whole file */
    override applyFrontmatter(script: ScriptNode): void {
      const frontmatter = parseFrontmatter(script.frontmatter);
      if (frontmatter.module !== null) this.ctx.moduleName = frontmatter.module;
      if (frontmatter.alias !== null) this.ctx.moduleAlias = frontmatter.alias;
      if (frontmatter.config.length > 0) this.ctx.config.replaceCurrent(frontmatter.config);
    }
  };
}

export const ModulesMixin = createModulesMixin;
