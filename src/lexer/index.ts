export { tokenize, nextToken } from './tokenizer.js';
export { createLexerState, type LexerState } from './state.js';
