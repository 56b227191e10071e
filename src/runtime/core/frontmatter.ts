/**
 * Script Frontmatter
 *
 * ```
 * ---
 * module: geometry
 * alias: geo
 * config:
 *   error_mode: collect
 *   decimal_places: 2
 * ---
 * ```
 *
 * Config strings become symbols, so `error_mode: collect` means
 * `error_mode: :collect`.
 */

import * as yaml from 'yaml';
import { ConfigError } from './config.js';
import { symbol, type Value } from './values.js';

export interface Frontmatter {
  readonly module: string | null;
  readonly alias: string | null;
  readonly config: Array<[string, Value]>;
}

const EMPTY: Frontmatter = { module: null, alias: null, config: [] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function configValue(key: string, raw: unknown): Value {
  if (typeof raw === 'string') {
    return symbol(raw.startsWith(':') ? raw.slice(1) : raw);
  }
  if (typeof raw === 'number' || typeof raw === 'boolean') return raw;
  throw new ConfigError(`Invalid value for config key '${key}' in frontmatter`);
}

/** Config entries from a YAML mapping, in document order */
export function configEntries(raw: unknown): Array<[string, Value]> {
  if (raw === undefined || raw === null) return [];
  if (!isRecord(raw)) {
    throw new ConfigError('Frontmatter config must be a mapping');
  }
  return Object.entries(raw).map(([key, value]) => [key, configValue(key, value)]);
}

export function parseFrontmatter(text: string | null): Frontmatter {
  if (text === null || text.trim() === '') return EMPTY;

  let data: unknown;
  try {
    data = yaml.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid frontmatter: ${reason}`);
  }
  if (data === null || data === undefined) return EMPTY;
  if (!isRecord(data)) {
    throw new ConfigError('Frontmatter must be a YAML mapping');
  }

  const name = data['module'];
  const alias = data['alias'];
  return {
    module: typeof name === 'string' ? name : null,
    alias: typeof alias === 'string' ? alias : null,
    config: configEntries(data['config']),
  };
}
