/**
 * Statement Completion
 *
 * Result of executing a statement or block. Non-local control flow travels
 * here as a value rather than as a thrown error, so `try`/`catch` never
 * sees it.
 */

import type { Value } from './values.js';

export type Completion =
  | { readonly kind: 'normal' }
  | { readonly kind: 'return'; readonly value: Value }
  | { readonly kind: 'break' }
  | { readonly kind: 'continue' };

export const NORMAL: Completion = { kind: 'normal' };
export const BREAK: Completion = { kind: 'break' };
export const CONTINUE: Completion = { kind: 'continue' };

export function returnWith(value: Value): Completion {
  return { kind: 'return', value };
}
