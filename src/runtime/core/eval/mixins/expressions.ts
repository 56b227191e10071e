/**
 * ExpressionsMixin: Binary and Unary Expressions
 *
 * Handles arithmetic, comparison, logical, regex and bitwise operators.
 * - `and` / `or` short-circuit and always yield a bool
 * - `+` with a string on either side concatenates display forms
 * - arithmetic follows the active precision mode; inside `precision N { }`
 *   numeric results are rounded to N places
 * - `.op` applies `op` element by element: list with list zips to the
 *   shorter length, list with scalar broadcasts the scalar
 *
 * @internal
 */

import type {
  ArithmeticOp,
  BinaryExprNode,
  BinaryOp,
  ComparisonOp,
  UnaryExprNode,
} from '../../../../types.js';
import { RuntimeError, TANGLE_ERROR_CODES } from '../../../../types.js';
import {
  bigArithmetic,
  bitwise,
  bitwiseNot,
  compareNumeric,
  negateNumeric,
  numberArithmetic,
  roundToPlaces,
  type BigNumValue,
  type BitwiseOperator,
} from '../../numbers.js';
import {
  isList,
  isNumeric,
  isTruthy,
  list,
  toDisplayString,
  typeName,
  valuesEqual,
  type Value,
} from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

function typeError(message: string): RuntimeError {
  return new RuntimeError(TANGLE_ERROR_CODES.RUNTIME_TYPE_ERROR, message);
}

function isArithmetic(op: BinaryOp): op is ArithmeticOp {
  return ['+', '-', '*', '/', '//', '%', '**'].includes(op);
}

function isComparison(op: BinaryOp): op is ComparisonOp {
  return ['==', '!=', '<', '<=', '>', '>='].includes(op);
}

function isBitwise(op: BinaryOp): op is BitwiseOperator {
  return ['&', '|', '^', '<<', '>>'].includes(op);
}

function compare(op: ComparisonOp, left: Value, right: Value): boolean {
  if (op === '==') return valuesEqual(left, right);
  if (op === '!=') return !valuesEqual(left, right);

  let order: number;
  if (isNumeric(left) && isNumeric(right)) {
    order = compareNumeric(left, right);
  } else if (typeof left === 'string' && typeof right === 'string') {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else {
    throw typeError(
      `Cannot compare ${typeName(left)} and ${typeName(right)} with '${op}'`
    );
  }
  switch (op) {
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
  }
}

/** `text =~ pattern` */
function regexMatches(left: Value, right: Value, op: string): boolean {
  if (typeof left !== 'string' || typeof right !== 'string') {
    throw typeError(
      `Operator '${op}' expects a string and a pattern string, got ${typeName(left)} and ${typeName(right)}`
    );
  }
  let pattern: RegExp;
  try {
    pattern = new RegExp(right, 'u');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RuntimeError(
      TANGLE_ERROR_CODES.RUNTIME_ARGUMENT_ERROR,
      `Invalid regular expression '${right}': ${reason}`
    );
  }
  return pattern.test(left);
}

function createExpressionsMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class ExpressionsEvaluator extends Base {
    override evaluateBinaryExpr(node: BinaryExprNode): Value {
      const { op } = node;

      if (op === 'and') {
        return isTruthy(this.evaluateExpression(node.left)) &&
          isTruthy(this.evaluateExpression(node.right));
      }
      if (op === 'or') {
        return isTruthy(this.evaluateExpression(node.left)) ||
          isTruthy(this.evaluateExpression(node.right));
      }

      const left = this.evaluateExpression(node.left);
      const right = this.evaluateExpression(node.right);
      if (node.elementWise) return this.elementWise(op, left, right);
      return this.applyOperator(op, left, right);
    }

    override evaluateUnaryExpr(node: UnaryExprNode): Value {
      const operand = this.evaluateExpression(node.operand);
      switch (node.op) {
        case 'not':
          return !isTruthy(operand);
        case '-':
          if (!isNumeric(operand)) {
            throw typeError(`Cannot negate value of type ${typeName(operand)}`);
          }
          return negateNumeric(operand);
        case '~':
          if (!isNumeric(operand)) {
            throw typeError(`Operator '~' requires an integer, got ${typeName(operand)}`);
          }
          return bitwiseNot(operand);
      }
    }

    applyOperator(op: BinaryOp, left: Value, right: Value): Value {
      if (isArithmetic(op)) return this.arithmetic(op, left, right);
      if (isComparison(op)) return compare(op, left, right);
      if (isBitwise(op)) {
        if (!isNumeric(left) || !isNumeric(right)) {
          throw typeError(
            `Operator '${op}' requires integers, got ${typeName(left)} and ${typeName(right)}`
          );
        }
        return bitwise(op, left, right);
      }
      if (op === '=~') return regexMatches(left, right, op);
      if (op === '!~') return !regexMatches(left, right, op);
      throw typeError(`Operator '${op}' cannot be applied here`);
    }

    arithmetic(op: ArithmeticOp, left: Value, right: Value): Value {
      if (op === '+' && (typeof left === 'string' || typeof right === 'string')) {
        return toDisplayString(left) + toDisplayString(right);
      }
      if (!isNumeric(left) || !isNumeric(right)) {
        throw typeError(
          `Unsupported operand types for '${op}': ${typeName(left)} and ${typeName(right)}`
        );
      }
      const config = this.ctx.config.current;
      let result: number | BigNumValue;
      if (
        typeof left === 'number' &&
        typeof right === 'number' &&
        config.precision === 'standard'
      ) {
        result = numberArithmetic(op, left, right);
      } else {
        result = bigArithmetic(op, left, right, config);
      }
      return config.roundingPlaces === null
        ? result
        : roundToPlaces(result, config.roundingPlaces);
    }

    elementWise(op: BinaryOp, left: Value, right: Value): Value {
      if (isList(left) && isList(right)) {
        const length = Math.min(left.items.length, right.items.length);
        return list(
          left.items
            .slice(0, length)
            .map((l, i) => this.applyOperator(op, l, right.items[i] ?? null))
        );
      }
      if (isList(left)) {
        return list(left.items.map((l) => this.applyOperator(op, l, right)));
      }
      if (isList(right)) {
        return list(right.items.map((r) => this.applyOperator(op, left, r)));
      }
      throw typeError(
        `Element-wise operations require at least one list, got ${typeName(left)} and ${typeName(right)}`
      );
    }
  };
}

export const ExpressionsMixin = createExpressionsMixin;
