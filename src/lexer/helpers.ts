/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { advance, currentLocation, type LexerState } from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

/** Identifiers must start with a letter; underscores only after that */
export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch);
}

export function isIdentifierChar(ch: string): boolean {
  return isLetter(ch) || isDigit(ch) || ch === '_';
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

export function makeToken(
  type: TokenType,
  value: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { type, value, span: { start, end } };
}

/** Advance n times and return a token */
export function advanceAndMakeToken(
  state: LexerState,
  n: number,
  type: TokenType,
  value: string,
  start: SourceLocation
): Token {
  for (let i = 0; i < n; i++) advance(state);
  return makeToken(type, value, start, currentLocation(state));
}

/**
 * Check whether a token can end a value, so that a following `-`
 * is subtraction rather than the sign of a number literal.
 */
export function endsValue(token: Token | undefined): boolean {
  if (!token) return false;
  switch (token.type) {
    case TOKEN_TYPES.IDENTIFIER:
    case TOKEN_TYPES.NUMBER:
    case TOKEN_TYPES.STRING:
      return true;
    case TOKEN_TYPES.KEYWORD:
      return token.value === 'True' || token.value === 'False';
    case TOKEN_TYPES.PUNCTUATION:
      return token.value === ')';
    default:
      return false;
  }
}
