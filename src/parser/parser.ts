/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ScriptNode, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Script, statements, declarations, modules, configure
 * - parser-control.ts: if/while/for/try, blocks, return/break/continue
 * - parser-functions.ts: Function declarations, parameters, arguments, lambdas
 * - parser-graph.ts: Graph declarations and graph literals
 * - parser-expr.ts: Precedence chain, postfix operators, match, raise
 * - parser-literals.ts: Literals, lists, maps, patterns
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens);
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  /** Token stream and cursor */
  state: ParserState;

  constructor(tokens: Token[]) {
    this.state = createParserState(tokens);
  }

  /**
   * Parse tokens into a complete AST.
   */
  parse(): ScriptNode {
    return this.parseScript();
  }
}
