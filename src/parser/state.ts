/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token, TokenType } from '../types.js';
import { ParseError, SYNTAX_ERROR_CODES, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Number of enclosing loop bodies; break/continue need at least one */
  loopDepth: number;
  /** Index of the first token of the statement being parsed */
  statementStart: number;
}

export function createParserState(tokens: Token[]): ParserState {
  return {
    tokens,
    pos: 0,
    loopDepth: 0,
    statementStart: 0,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  const token = state.tokens[state.pos];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const idx = state.pos + offset;
  const token = state.tokens[idx];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function previous(state: ParserState): Token {
  return state.tokens[state.pos - 1] ?? current(state);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/**
 * Check the current token's type and, when values are given, its lexeme.
 * @internal
 */
export function check(
  state: ParserState,
  type: TokenType,
  ...values: string[]
): boolean {
  const token = current(state);
  if (token.type !== type) return false;
  return values.length === 0 || values.includes(token.value);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * Consume a token of the given type (and lexeme, if not null) or throw.
 * @param expected - Description of what was expected, used in the error
 * @internal
 */
export function expect(
  state: ParserState,
  type: TokenType,
  value: string | null,
  expected: string
): Token {
  const matches = value === null ? check(state, type) : check(state, type, value);
  if (matches) return advance(state);
  throw unexpectedToken(state, expected);
}

/** Description used whenever a statement terminator is required */
export const STATEMENT_END_DESCRIPTION = "'~' or ';'";

/**
 * Build a ParseError for the current token.
 * @internal
 */
export function unexpectedToken(
  state: ParserState,
  expected: string
): ParseError {
  const token = current(state);
  const found = describeToken(token);
  const hint = generateHint(state, expected, token);
  const message = `Expected ${expected} but found ${found}`;
  return new ParseError(
    SYNTAX_ERROR_CODES.UNEXPECTED_TOKEN,
    hint ? `${message}. ${hint}` : message,
    token.span.start,
    { expected, found }
  );
}

/** Human-readable description of a token for error messages */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.EOF:
      return 'end of input';
    case TOKEN_TYPES.STRING:
      return `string "${token.value}"`;
    case TOKEN_TYPES.NUMBER:
      return `number ${token.value}`;
    default:
      return `'${token.value}'`;
  }
}

// ============================================================
// ERROR HINTS
// ============================================================

const TYPO_HINTS = new Map<string, string>([
  ['whlie', 'while'],
  ['wihle', 'while'],
  ['whiel', 'while'],
  ['esle', 'else'],
  ['els', 'else'],
  ['fi', 'if'],
  ['fro', 'for'],
  ['ture', 'True'],
  ['tru', 'True'],
  ['true', 'True'],
  ['flase', 'False'],
  ['fals', 'False'],
  ['false', 'False'],
  ['brek', 'break'],
  ['braek', 'break'],
  ['contineu', 'continue'],
  ['contiune', 'continue'],
  ['shmple', 'Shmuple'],
  ['array', 'Arrays'],
  ['stringbean', 'StringBeans'],
]);

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(
  state: ParserState,
  expected: string,
  actualToken: Token
): string | null {
  const actual = actualToken.type;

  // Hint for unclosed parens/braces
  if (expected === "')'" && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed parenthesis';
  }
  if (expected === "'}'" && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed brace';
  }

  // Hint for keyword typos, at the failing token or at the start of the statement
  const candidates = [actualToken, state.tokens[state.statementStart]];
  for (const candidate of candidates) {
    if (candidate?.type !== TOKEN_TYPES.IDENTIFIER) continue;
    const suggestion = TYPO_HINTS.get(candidate.value.toLowerCase());
    if (suggestion) {
      return `Hint: Did you mean '${suggestion}'?`;
    }
  }

  return null;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}
