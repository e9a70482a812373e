/**
 * Operator Lookup Tables
 */

import type { Keyword, TokenType } from '../types.js';
import { KEYWORD_NAMES, TOKEN_TYPES } from '../types.js';

/** Two-character operators, matched before single characters */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '==': TOKEN_TYPES.OPERATOR,
  '!=': TOKEN_TYPES.OPERATOR,
  '&&': TOKEN_TYPES.OPERATOR,
  '||': TOKEN_TYPES.OPERATOR,
};

/** Single-character operator and punctuation lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '=': TOKEN_TYPES.OPERATOR,
  '<': TOKEN_TYPES.OPERATOR,
  '>': TOKEN_TYPES.OPERATOR,
  '+': TOKEN_TYPES.OPERATOR,
  '-': TOKEN_TYPES.OPERATOR,
  '*': TOKEN_TYPES.OPERATOR,
  '/': TOKEN_TYPES.OPERATOR,
  '^': TOKEN_TYPES.OPERATOR,
  '(': TOKEN_TYPES.PUNCTUATION,
  ')': TOKEN_TYPES.PUNCTUATION,
  '{': TOKEN_TYPES.PUNCTUATION,
  '}': TOKEN_TYPES.PUNCTUATION,
  ',': TOKEN_TYPES.PUNCTUATION,
  '.': TOKEN_TYPES.PUNCTUATION,
  '~': TOKEN_TYPES.STATEMENT_END,
  ';': TOKEN_TYPES.STATEMENT_END,
};

const KEYWORD_SET: ReadonlySet<string> = new Set(KEYWORD_NAMES);

export function isKeyword(value: string): value is Keyword {
  return KEYWORD_SET.has(value);
}
