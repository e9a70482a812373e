/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { LEXICAL_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { LexicalError } from './errors.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { isKeyword } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/**
 * Read a double-quoted string. There are no escape sequences:
 * the next `"` always closes the literal.
 */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  while (!isAtEnd(state) && peek(state) !== '"') {
    value += advance(state);
  }

  if (isAtEnd(state)) {
    throw new LexicalError(
      LEXICAL_ERROR_CODES.UNTERMINATED_STRING,
      'Unterminated string literal',
      start,
      '"'
    );
  }

  advance(state); // consume closing "
  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

/** Read `-?digits(.digits)?`; the caller decides whether a `-` belongs here */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  if (peek(state) === '-') {
    value += advance(state);
  }

  while (!isAtEnd(state) && isDigit(peek(state))) {
    value += advance(state);
  }

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    value += advance(state); // consume .
    while (!isAtEnd(state) && isDigit(peek(state))) {
      value += advance(state);
    }
  }

  return makeToken(TOKEN_TYPES.NUMBER, value, start, currentLocation(state));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const type = isKeyword(value) ? TOKEN_TYPES.KEYWORD : TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, value, start, currentLocation(state));
}
