/**
 * Module Cache and Resolution
 *
 * `import` runs each resolved file at most once per executor tree; the
 * in-progress stack turns import cycles into an error instead of a loop.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { SourceLocation } from '../../types.js';
import { RuntimeError, TANGLE_ERROR_CODES } from '../../types.js';
import type { FunctionValue } from './callable.js';
import type { ModuleValue } from './values.js';

export const SCRIPT_EXTENSION = '.tgl';

/** A finished import: its namespace plus the global functions it declared */
export interface LoadedModule {
  readonly value: ModuleValue;
  readonly functions: ReadonlyMap<string, readonly FunctionValue[]>;
}

function isFile(candidate: string): boolean {
  return fs.existsSync(candidate) && fs.statSync(candidate).isFile();
}

/**
 * Resolve a module path: relative to the importing file's directory (or
 * the working directory), then each search path. `.tgl` is added when the
 * path has no extension.
 */
export function resolveModulePath(
  specifier: string,
  fromFile: string | null,
  searchPaths: readonly string[],
  location?: SourceLocation
): string {
  const bases = path.isAbsolute(specifier)
    ? ['']
    : [fromFile ? path.dirname(fromFile) : process.cwd(), ...searchPaths];
  const names =
    path.extname(specifier) === ''
      ? [specifier + SCRIPT_EXTENSION, specifier]
      : [specifier];

  for (const base of bases) {
    for (const name of names) {
      const candidate = path.resolve(base, name);
      if (isFile(candidate)) return candidate;
    }
  }
  throw new RuntimeError(
    TANGLE_ERROR_CODES.MODULE_NOT_FOUND,
    `Module not found: '${specifier}'`,
    location,
    { searched: bases }
  );
}

/** Module name when neither a declaration nor frontmatter names one */
export function moduleNameFromPath(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export class ModuleManager {
  private readonly cache = new Map<string, LoadedModule>();
  private readonly loading: string[] = [];

  get(resolvedPath: string): LoadedModule | undefined {
    return this.cache.get(resolvedPath);
  }

  /** Mark a path as loading; throws when it is already on the stack */
  begin(resolvedPath: string, location?: SourceLocation): void {
    const start = this.loading.indexOf(resolvedPath);
    if (start !== -1) {
      const cycle = [...this.loading.slice(start), resolvedPath]
        .map((p) => path.basename(p))
        .join(' -> ');
      throw new RuntimeError(
        TANGLE_ERROR_CODES.MODULE_CIRCULAR_DEPENDENCY,
        `Circular import: ${cycle}`,
        location
      );
    }
    this.loading.push(resolvedPath);
  }

  end(resolvedPath: string): void {
    const index = this.loading.lastIndexOf(resolvedPath);
    if (index !== -1) this.loading.splice(index, 1);
  }

  store(resolvedPath: string, module: LoadedModule): void {
    this.cache.set(resolvedPath, module);
  }

  get size(): number {
    return this.cache.size;
  }
}
