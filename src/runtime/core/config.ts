/**
 * Scoped Runtime Configuration
 *
 * `configure { ... } { body }` pushes a modified copy of the active
 * settings for the body; without a body the change lasts until the end
 * of the file. `precision N { }` pushes a rounding scope.
 */

import { TANGLE_ERROR_CODES, TangleError } from '../../types.js';
import type { NumericMode, PrecisionMode } from './numbers.js';
import { isSymbol, isTruthy, typeName, type Value } from './values.js';

export type ErrorMode = 'strict' | 'lenient' | 'collect';
export type BoundsCheckingMode = 'strict' | 'lenient';

export interface ConfigSettings {
  readonly errorMode: ErrorMode;
  readonly boundsChecking: BoundsCheckingMode;
  /** Fixed decimals when printing numbers; null prints the shortest form */
  readonly decimalPlaces: number | null;
  readonly precision: PrecisionMode;
  readonly integerMode: boolean;
  readonly unsignedMode: boolean;
  /** Rounding applied to arithmetic results inside `precision N { }` */
  readonly roundingPlaces: number | null;
}

export const DEFAULT_CONFIG: ConfigSettings = {
  errorMode: 'strict',
  boundsChecking: 'strict',
  decimalPlaces: null,
  precision: 'standard',
  integerMode: false,
  unsignedMode: false,
  roundingPlaces: null,
};

/** Invalid configuration key or value */
export class ConfigError extends TangleError {
  constructor(message: string) {
    super({ code: TANGLE_ERROR_CODES.CONFIG_ERROR, message });
    this.name = 'ConfigError';
  }
}

function symbolSetting<T extends string>(
  key: string,
  value: Value,
  allowed: readonly T[],
  expected: string
): T {
  if (!isSymbol(value)) {
    throw new ConfigError(`${key} must be a symbol, got ${typeName(value)}`);
  }
  const match = allowed.find((a) => a === value.name);
  if (match === undefined) {
    throw new ConfigError(`Invalid ${key}: :${value.name}, expected ${expected}`);
  }
  return match;
}

function numberSetting(key: string, value: Value): number {
  if (typeof value !== 'number') {
    throw new ConfigError(`${key} must be a number, got ${typeName(value)}`);
  }
  return Math.trunc(value);
}

/** `:standard`, `:high` and `:extended` select the precision mode */
function isPrecisionFlag(key: string): key is PrecisionMode {
  return key === 'standard' || key === 'high' || key === 'extended';
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/** Settings with `changes` applied; throws ConfigError on bad keys or values */
export function applyConfigChanges(
  base: ConfigSettings,
  changes: Iterable<readonly [string, Value]>
): ConfigSettings {
  const next: Mutable<ConfigSettings> = { ...base };
  for (const [key, value] of changes) {
    if (isPrecisionFlag(key)) {
      if (isTruthy(value)) next.precision = key;
      continue;
    }
    switch (key) {
      case 'error_mode':
        next.errorMode = symbolSetting(
          key,
          value,
          ['strict', 'lenient', 'collect'],
          ':strict, :lenient, or :collect'
        );
        break;
      case 'bounds_checking':
        next.boundsChecking = symbolSetting(
          key,
          value,
          ['strict', 'lenient'],
          ':strict or :lenient'
        );
        break;
      case 'decimal_places':
        next.decimalPlaces = numberSetting(key, value);
        break;
      case 'precision':
        next.precision = symbolSetting(
          key,
          value,
          ['standard', 'high', 'extended'],
          ':standard, :high, or :extended'
        );
        break;
      case 'integer':
        next.integerMode = isTruthy(value);
        break;
      case 'unsigned':
        next.unsignedMode = isTruthy(value);
        break;
      default:
        throw new ConfigError(`Unknown configuration key: ${key}`);
    }
  }
  return next;
}

export class ConfigStack {
  private readonly stack: ConfigSettings[];

  constructor(initial: ConfigSettings = DEFAULT_CONFIG) {
    this.stack = [initial];
  }

  get current(): ConfigSettings {
    return this.stack[this.stack.length - 1] ?? DEFAULT_CONFIG;
  }

  get depth(): number {
    return this.stack.length;
  }

  push(settings: ConfigSettings): void {
    this.stack.push(settings);
  }

  pushWithChanges(changes: Iterable<readonly [string, Value]>): void {
    this.push(applyConfigChanges(this.current, changes));
  }

  /** Replace the active settings without opening a scope */
  replaceCurrent(changes: Iterable<readonly [string, Value]>): void {
    const next = applyConfigChanges(this.current, changes);
    this.stack[this.stack.length - 1] = next;
  }

  pushRounding(places: number): void {
    this.push({ ...this.current, roundingPlaces: places });
  }

  /** The base settings are never popped */
  pop(): void {
    if (this.stack.length > 1) this.stack.pop();
  }

  numericMode(): NumericMode {
    const { precision, integerMode, unsignedMode } = this.current;
    return { precision, integerMode, unsignedMode };
  }
}
