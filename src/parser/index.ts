/**
 * Muffasa Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ProgramNode, Token } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-control.js';
import './parser-expr.js';
import './parser-functions.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse Muffasa source code (or an already-lexed token list) into an AST.
 *
 * Throws LexicalError or ParseError on the first error.
 *
 * @example
 * ```typescript
 * const ast = parse('x = 1 + 2~');
 * ```
 */
export function parse(input: string | Token[]): ProgramNode {
  const tokens = typeof input === 'string' ? tokenize(input) : input;
  const parser = new Parser(tokens);
  return parser.parse();
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';
