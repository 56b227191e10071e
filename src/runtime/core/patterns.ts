/**
 * Pattern Matching
 *
 * Shared by function-clause dispatch (`|0| => ...`) and `match`
 * expressions. A kind mismatch is a non-match, never an error.
 */

import type {
  MatchPattern,
  PatternClauseNode,
  PatternLiteral,
} from '../../types.js';
import { RuntimeError, TANGLE_ERROR_CODES } from '../../types.js';
import { bigNumToNumber, isBigNum } from './numbers.js';
import { ListValue, isList, type Value } from './values.js';

export type Bindings = Map<string, Value>;

/** Numeric tolerance for literal patterns */
export const PATTERN_EPSILON = Number.EPSILON;

function numericOf(value: Value): number | null {
  if (typeof value === 'number') return value;
  if (isBigNum(value)) return bigNumToNumber(value);
  return null;
}

export function literalMatches(literal: PatternLiteral, value: Value): boolean {
  switch (literal.kind) {
    case 'number': {
      const n = numericOf(value);
      return n !== null && Math.abs(n - literal.value) < PATTERN_EPSILON;
    }
    case 'string':
      return value === literal.value;
    case 'bool':
      return value === literal.value;
    case 'none':
      return value === null;
  }
}

/** Bindings for a match, or null */
export function matchPattern(pattern: MatchPattern, value: Value): Bindings | null {
  const bindings: Bindings = new Map();
  return bindInto(pattern, value, bindings) ? bindings : null;
}

function bindInto(pattern: MatchPattern, value: Value, bindings: Bindings): boolean {
  switch (pattern.kind) {
    case 'wildcard':
      return true;
    case 'variable':
      if (pattern.name !== '_') bindings.set(pattern.name, value);
      return true;
    case 'literal':
      return literalMatches(pattern.literal, value);
    case 'list': {
      if (!isList(value)) return false;
      const items = value.items;
      const fixed = pattern.elements.length;
      if (pattern.rest === null ? items.length !== fixed : items.length < fixed) {
        return false;
      }
      for (let i = 0; i < fixed; i++) {
        const sub = pattern.elements[i];
        const item = items[i];
        if (sub === undefined || item === undefined) return false;
        if (!bindInto(sub, item, bindings)) return false;
      }
      if (pattern.rest !== null && pattern.rest !== '_') {
        bindings.set(pattern.rest, new ListValue(items.slice(fixed)));
      }
      return true;
    }
  }
}

/** Accepts or rejects a clause whose pattern matched, given its bindings */
export type GuardCheck = (clause: PatternClauseNode, bindings: Bindings) => boolean;

/**
 * First clause whose pattern matches and whose guard (if any) passes.
 * Null when nothing matches; callers turn that into `none`.
 */
export function findMatch(
  clauses: readonly PatternClauseNode[],
  args: readonly Value[],
  checkGuard: GuardCheck
): { clause: PatternClauseNode; bindings: Bindings } | null {
  const value = args[0];
  if (args.length !== 1 || value === undefined) {
    throw new RuntimeError(
      TANGLE_ERROR_CODES.RUNTIME_ARGUMENT_ERROR,
      `Pattern matching requires exactly 1 argument, got ${args.length}`
    );
  }
  for (const clause of clauses) {
    const bindings = matchPattern(clause.pattern, value);
    if (bindings === null) continue;
    if (clause.guard !== null && !checkGuard(clause, bindings)) continue;
    return { clause, bindings };
  }
  return null;
}
