/**
 * Muffasa Module
 * Exports lexer, parser, runtime, and AST types
 */

import { parse } from './parser/index.js';
import {
  createRuntimeContext,
  execute,
  type ExecutionResult,
  type RuntimeOptions,
} from './runtime/index.js';

export {
  LexicalError,
  markComments,
  tokenize,
  type TokenizeOptions,
} from './lexer/index.js';
export { parse, Parser } from './parser/index.js';
export * from './runtime/index.js';
export * from './types.js';

/**
 * Tokenize, parse and execute source text in one call.
 *
 * Lexical and syntax errors are thrown; runtime errors are returned in
 * `result.error`.
 *
 * @example
 * ```typescript
 * const result = run('x = 2 ^ 3~');
 * // result.variables.x -> { kind: 'number', value: 8 }
 * ```
 */
export function run(
  source: string,
  options: RuntimeOptions = {}
): ExecutionResult {
  return execute(parse(source), createRuntimeContext(options));
}
