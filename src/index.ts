/**
 * Tangle Module
 * Exports lexer, parser, runtime, and AST types
 */

export { tokenize } from './lexer/index.js';
export { parse } from './parser/index.js';
export * from './runtime/index.js';

// ============================================================
// CORE TYPES AND ERRORS
// ============================================================
export * from './types.js';
