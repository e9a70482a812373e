/**
 * Lexer Module
 * Converts source text into tokens
 */

export { LexicalError } from './errors.js';
export { createLexerState, type LexerState } from './state.js';
export { markComments } from './comments.js';
export { nextToken, tokenize, type TokenizeOptions } from './tokenizer.js';
