/**
 * CLI Shared Utilities
 * Error formatting, project config and version lookup for the `tangle` binary
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import * as yaml from 'yaml';
import { ScriptError } from './runtime/core/errors.js';
import { configEntries } from './runtime/core/frontmatter.js';
import {
  applyConfigChanges,
  ConfigError,
  DEFAULT_CONFIG,
  type ConfigSettings,
} from './runtime/core/config.js';
import { TangleError } from './types.js';

export const PROJECT_CONFIG_FILE = 'tangle.yaml';

/** Settings read from `tangle.yaml` */
export interface ProjectConfig {
  readonly searchPaths: string[];
  readonly config: ConfigSettings;
}

/** Bad command line; exits with code 2 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Format an error for stderr: `Kind: message (file:line:col)`.
 * The location part is dropped when the error has no position.
 */
export function formatError(err: unknown, file: string | null): string {
  if (err instanceof TangleError) {
    const origin = err instanceof ScriptError ? (err.value.file ?? file) : file;
    const where = err.location
      ? ` (${origin ?? '<eval>'}:${err.location.line}:${err.location.column})`
      : '';
    return `${err.kind}: ${err.detail}${where}`;
  }
  if (err instanceof Error) return `Error: ${err.message}`;
  return `Error: ${String(err)}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read `tangle.yaml` from `dir`. Relative search paths resolve against
 * `dir`. A missing file yields the defaults.
 */
export function loadProjectConfig(dir: string): ProjectConfig {
  const file = path.join(dir, PROJECT_CONFIG_FILE);
  if (!fs.existsSync(file)) return { searchPaths: [], config: DEFAULT_CONFIG };

  let data: unknown;
  try {
    data = yaml.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid ${PROJECT_CONFIG_FILE}: ${reason}`);
  }
  if (data === null || data === undefined) {
    return { searchPaths: [], config: DEFAULT_CONFIG };
  }
  if (!isRecord(data)) {
    throw new ConfigError(`${PROJECT_CONFIG_FILE} must be a YAML mapping`);
  }

  const rawPaths = data['search_paths'] ?? [];
  if (!Array.isArray(rawPaths) || !rawPaths.every((p): p is string => typeof p === 'string')) {
    throw new ConfigError('search_paths must be a list of strings');
  }
  return {
    searchPaths: rawPaths.map((p) => path.resolve(dir, p)),
    config: applyConfigChanges(DEFAULT_CONFIG, configEntries(data['config'])),
  };
}

/** Version from the package.json one level above this file */
export function readVersion(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const raw: unknown = JSON.parse(
    fs.readFileSync(path.resolve(here, '../package.json'), 'utf-8')
  );
  if (isRecord(raw) && typeof raw['version'] === 'string') return raw['version'];
  return '0.0.0';
}
