/**
 * Tangle Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ScriptNode } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-control.js';
import './parser-functions.js';
import './parser-graph.js';
import './parser-expr.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse Tangle source code into an AST.
 *
 * Throws LexerError or ParseError on the first syntax error.
 *
 * @example
 * ```typescript
 * const ast = parse('x = 1 + 2');
 * ```
 */
export function parse(source: string): ScriptNode {
  const parser = new Parser(tokenize(source));
  return parser.parse();
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { createParserState, type ParserState } from './state.js';
export { Parser } from './parser.js';
