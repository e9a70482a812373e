/**
 * Lexer State
 * Scanner position plus the last token read, which decides whether
 * `-` before a digit is a sign or subtraction
 */

import type { SourceLocation, Token } from '../types.js';

export interface LexerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
  /** Last token produced, undefined before the first */
  previous: Token | undefined;
}

export function createLexerState(source: string): LexerState {
  return {
    source,
    pos: 0,
    line: 1,
    column: 1,
    previous: undefined,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function advance(state: LexerState): string {
  const ch = state.source[state.pos] ?? '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

/** Record a token as the one the next read follows */
export function remember(state: LexerState, token: Token): Token {
  state.previous = token;
  return token;
}
