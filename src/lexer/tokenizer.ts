/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { LEXICAL_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { markComments } from './comments.js';
import { LexicalError } from './errors.js';
import {
  advanceAndMakeToken,
  endsValue,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  remember,
} from './state.js';

export interface TokenizeOptions {
  /** Keep COMMENT tokens in the output instead of discarding them */
  readonly preserveComments?: boolean;
}

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

/** Read the next token and record it on the state */
export function nextToken(state: LexerState): Token {
  return remember(state, scanToken(state));
}

function scanToken(state: LexerState): Token {
  skipWhitespace(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  // String
  if (ch === '"') {
    return readString(state);
  }

  // Number, with a sign only where no value precedes it
  if (
    isDigit(ch) ||
    (ch === '-' && isDigit(peek(state, 1)) && !endsValue(state.previous))
  ) {
    return readNumber(state);
  }

  // Identifier or keyword
  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  // Two-character operators (lookup table)
  const twoChar = ch + peek(state, 1);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar, start);
  }

  // Single-character operators (lookup table)
  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  throw new LexicalError(
    LEXICAL_ERROR_CODES.UNEXPECTED_CHARACTER,
    `Unexpected character '${ch}'`,
    start,
    ch
  );
}

export function tokenize(
  source: string,
  options: TokenizeOptions = {}
): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token | undefined;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  const marked = markComments(tokens);
  if (options.preserveComments) {
    return marked;
  }
  return marked.filter((t) => t.type !== TOKEN_TYPES.COMMENT);
}
