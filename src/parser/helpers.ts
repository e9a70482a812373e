/**
 * Parser Helpers
 * Token classification shared by the parser extension modules
 */

import type { BinaryOp, ConstructorName, Token } from '../types.js';
import { CONSTRUCTOR_NAMES, TOKEN_TYPES } from '../types.js';

export function isConstructorName(value: string): value is ConstructorName {
  return CONSTRUCTOR_NAMES.some((name) => name === value);
}

/**
 * Check whether a token is one of the given operators.
 * Narrows the lexeme so the caller can build a BinaryOpNode without casts.
 */
export function matchOperator<T extends BinaryOp>(
  token: Token,
  operators: readonly T[]
): T | null {
  if (token.type !== TOKEN_TYPES.OPERATOR) return null;
  return operators.find((op) => op === token.value) ?? null;
}
