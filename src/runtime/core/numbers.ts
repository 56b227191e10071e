/**
 * Numeric Representations
 *
 * Plain numbers are IEEE doubles. Bignums are selected by the precision
 * configuration:
 * - int64 / uint64: fixed-width integers (`:high` with `:integer`)
 * - float128: extended float, carried as a double
 * - bigint: arbitrary precision integer (`:extended`, or fixed-width overflow)
 */

import { RuntimeError, TANGLE_ERROR_CODES } from '../../types.js';

export type IntRepr = 'int64' | 'uint64' | 'bigint';

export interface IntBigNum {
  readonly kind: 'bignum';
  readonly repr: IntRepr;
  readonly value: bigint;
}

export interface FloatBigNum {
  readonly kind: 'bignum';
  readonly repr: 'float128';
  readonly value: number;
}

export type BigNumValue = IntBigNum | FloatBigNum;

export type PrecisionMode = 'standard' | 'high' | 'extended';

/** Slice of the active configuration that numeric operations read */
export interface NumericMode {
  readonly precision: PrecisionMode;
  readonly integerMode: boolean;
  readonly unsignedMode: boolean;
}

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '//' | '%' | '**';

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

const OPERATION_NAMES: Record<ArithmeticOperator, string> = {
  '+': 'addition',
  '-': 'subtraction',
  '*': 'multiplication',
  '/': 'division',
  '//': 'integer division',
  '%': 'modulo',
  '**': 'power',
};

// ============================================================
// CONSTRUCTION
// ============================================================

export function isBigNum(value: unknown): value is BigNumValue {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'bignum'
  );
}

export function float128(value: number): FloatBigNum {
  return { kind: 'bignum', repr: 'float128', value };
}

export function bigInteger(value: bigint): IntBigNum {
  return { kind: 'bignum', repr: 'bigint', value };
}

export function inRange(repr: IntRepr, value: bigint): boolean {
  switch (repr) {
    case 'int64':
      return value >= INT64_MIN && value <= INT64_MAX;
    case 'uint64':
      return value >= 0n && value <= UINT64_MAX;
    case 'bigint':
      return true;
  }
}

/** Fixed-width integer; throws when the value does not fit */
export function fixedInteger(repr: IntRepr, value: bigint): IntBigNum {
  if (!inRange(repr, value)) {
    throw new RuntimeError(
      TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
      `Value ${value} does not fit in ${repr}`
    );
  }
  return { kind: 'bignum', repr, value };
}

/**
 * Interpret a numeric literal under the active precision mode.
 * `raw` holds the source digits so large integers stay exact.
 */
export function numericLiteral(
  raw: string,
  value: number,
  mode: NumericMode
): number | BigNumValue {
  const integral = /^\d+$/.test(raw);
  switch (mode.precision) {
    case 'standard':
      return value;
    case 'high': {
      if (!mode.integerMode) return float128(value);
      const exact = integral ? BigInt(raw) : BigInt(Math.trunc(value));
      const repr: IntRepr = mode.unsignedMode ? 'uint64' : 'int64';
      return inRange(repr, exact) ? fixedInteger(repr, exact) : bigInteger(exact);
    }
    case 'extended':
      return integral ? bigInteger(BigInt(raw)) : float128(value);
  }
}

/** `bignum x = 1.5` converts a plain number to float128 */
export function toBigNum(value: number | BigNumValue): BigNumValue {
  return typeof value === 'number' ? float128(value) : value;
}

export function bigNumToNumber(value: BigNumValue): number {
  return typeof value.value === 'number' ? value.value : Number(value.value);
}

export function formatBigNum(value: BigNumValue): string {
  if (value.repr !== 'float128') return value.value.toString();
  return Number.isFinite(value.value) ? String(value.value) : value.value > 0 ? 'inf' : '-inf';
}

/** Truncate toward zero when `:integer` is active */
export function truncateForIntegerMode(
  value: number | BigNumValue
): number | BigNumValue {
  if (typeof value === 'number') return Math.trunc(value);
  if (value.repr === 'float128') return float128(Math.trunc(value.value));
  return value;
}

// ============================================================
// ARITHMETIC
// ============================================================

function divisionByZero(): RuntimeError {
  return new RuntimeError(
    TANGLE_ERROR_CODES.RUNTIME_DIVISION_BY_ZERO,
    'Division by zero'
  );
}

/** Arithmetic on two plain numbers under standard precision */
export function numberArithmetic(
  op: ArithmeticOperator,
  left: number,
  right: number
): number {
  switch (op) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
      if (right === 0) throw divisionByZero();
      return left / right;
    case '//':
      if (right === 0) throw divisionByZero();
      return Math.floor(left / right);
    case '%':
      if (right === 0) throw divisionByZero();
      return left % right;
    case '**':
      return left ** right;
  }
}

/** Representation a plain number takes on when combined with `other` */
function coerceNumber(n: number, other: BigNumValue): BigNumValue {
  if (other.repr === 'float128' || !Number.isInteger(n)) return float128(n);
  return { kind: 'bignum', repr: other.repr, value: BigInt(n) };
}

/** Plain number promoted for arithmetic under a non-standard precision mode */
function promoteForMode(n: number, mode: NumericMode): BigNumValue {
  if (mode.precision === 'extended') return bigInteger(BigInt(Math.trunc(n)));
  if (!mode.integerMode) return float128(n);
  const exact = BigInt(Math.trunc(n));
  const repr: IntRepr = mode.unsignedMode ? 'uint64' : 'int64';
  return inRange(repr, exact) ? fixedInteger(repr, exact) : bigInteger(exact);
}

/** Widest common integer representation of two operands */
function commonRepr(a: IntRepr, b: IntRepr): IntRepr {
  if (a === 'bigint' || b === 'bigint') return 'bigint';
  if (a === 'uint64' && b === 'uint64') return 'uint64';
  return 'int64';
}

function integerResult(
  op: ArithmeticOperator,
  repr: IntRepr,
  value: bigint,
  mode: NumericMode
): IntBigNum {
  if (inRange(repr, value)) return { kind: 'bignum', repr, value };
  if (mode.precision !== 'standard') return bigInteger(value);
  throw new RuntimeError(
    TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
    `Integer overflow in ${OPERATION_NAMES[op]}`
  );
}

function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b;
  return (a % b !== 0n) && ((a < 0n) !== (b < 0n)) ? q - 1n : q;
}

function integerArithmetic(
  op: ArithmeticOperator,
  left: IntBigNum,
  right: IntBigNum,
  mode: NumericMode
): BigNumValue {
  const repr = commonRepr(left.repr, right.repr);
  const a = left.value;
  const b = right.value;
  switch (op) {
    case '+':
      return integerResult(op, repr, a + b, mode);
    case '-':
      return integerResult(op, repr, a - b, mode);
    case '*':
      return integerResult(op, repr, a * b, mode);
    case '/':
      if (b === 0n) throw divisionByZero();
      return integerResult(op, repr, a / b, mode);
    case '//':
      if (b === 0n) throw divisionByZero();
      return integerResult(op, repr, floorDiv(a, b), mode);
    case '%':
      if (b === 0n) throw divisionByZero();
      return integerResult(op, repr, a % b, mode);
    case '**':
      if (b < 0n) return float128(Number(a) ** Number(b));
      return integerResult(op, repr, a ** b, mode);
  }
}

/**
 * Arithmetic where at least one side is a bignum, or where the active
 * precision mode turns plain numbers into bignums.
 */
export function bigArithmetic(
  op: ArithmeticOperator,
  left: number | BigNumValue,
  right: number | BigNumValue,
  mode: NumericMode
): BigNumValue {
  let l: BigNumValue;
  let r: BigNumValue;
  if (typeof left === 'number' && typeof right === 'number') {
    l = promoteForMode(left, mode);
    r = promoteForMode(right, mode);
  } else if (typeof left === 'number') {
    r = toBigNum(right);
    l = coerceNumber(left, r);
  } else if (typeof right === 'number') {
    l = left;
    r = coerceNumber(right, left);
  } else {
    l = left;
    r = right;
  }

  if (l.repr !== 'float128' && r.repr !== 'float128') {
    return integerArithmetic(op, l, r, mode);
  }
  return float128(numberArithmetic(op, bigNumToNumber(l), bigNumToNumber(r)));
}

export function negateNumeric(value: number | BigNumValue): number | BigNumValue {
  if (typeof value === 'number') return -value;
  switch (value.repr) {
    case 'float128':
      return float128(-value.value);
    case 'uint64':
      throw new RuntimeError(
        TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
        'Cannot negate unsigned bignum value'
      );
    case 'int64': {
      const negated = -value.value;
      return inRange('int64', negated)
        ? fixedInteger('int64', negated)
        : bigInteger(negated);
    }
    case 'bigint':
      return bigInteger(-value.value);
  }
}

/** -1, 0 or 1; integers compare exactly */
export function compareNumeric(
  left: number | BigNumValue,
  right: number | BigNumValue
): number {
  const a = exactOrFloat(left);
  const b = exactOrFloat(right);
  if (typeof a === 'bigint' && typeof b === 'bigint') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  const x = Number(a);
  const y = Number(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

function exactOrFloat(value: number | BigNumValue): bigint | number {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? BigInt(value) : value;
  }
  return value.value;
}

// ============================================================
// BITWISE
// ============================================================

export type BitwiseOperator = '&' | '|' | '^' | '<<' | '>>';

function toIntegerOperand(value: number | BigNumValue, op: string): bigint {
  const n = typeof value === 'number' ? value : value.value;
  if (typeof n === 'number') {
    if (!Number.isInteger(n)) {
      throw new RuntimeError(
        TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR,
        `Bitwise operator '${op}' requires integer operands, got ${n}`
      );
    }
    return BigInt(n);
  }
  return n;
}

/**
 * Bitwise operators work on integers. Plain numbers give a plain number;
 * integer bignums keep their representation.
 */
export function bitwise(
  op: BitwiseOperator,
  left: number | BigNumValue,
  right: number | BigNumValue
): number | BigNumValue {
  const a = toIntegerOperand(left, op);
  const b = toIntegerOperand(right, op);
  let result: bigint;
  switch (op) {
    case '&':
      result = a & b;
      break;
    case '|':
      result = a | b;
      break;
    case '^':
      result = a ^ b;
      break;
    case '<<':
      result = a << b;
      break;
    case '>>':
      result = a >> b;
      break;
  }

  const repr = [left, right]
    .filter(isBigNum)
    .map((v) => v.repr)
    .find((r): r is IntRepr => r !== 'float128');
  if (repr === undefined) return Number(result);
  return inRange(repr, result) ? fixedInteger(repr, result) : bigInteger(result);
}

export function bitwiseNot(value: number | BigNumValue): number | BigNumValue {
  const n = toIntegerOperand(value, '~');
  if (typeof value === 'number' || value.repr === 'float128') return Number(~n);
  if (value.repr === 'uint64') return fixedInteger('uint64', UINT64_MAX ^ n);
  return { kind: 'bignum', repr: value.repr, value: ~n };
}

/** Round to `places` decimal places (used by `precision N { }` blocks) */
export function roundToPlaces(
  value: number | BigNumValue,
  places: number
): number | BigNumValue {
  const factor = 10 ** places;
  const round = (n: number): number => Math.round(n * factor) / factor;
  if (typeof value === 'number') return round(value);
  if (value.repr === 'float128') return float128(round(value.value));
  return value;
}
