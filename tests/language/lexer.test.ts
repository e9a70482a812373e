/**
 * Muffasa Lexer Tests
 * Token types, spans, signed numbers and lexical errors
 */

import { describe, expect, it } from 'vitest';
import { LexicalError, TOKEN_TYPES, tokenize } from '../../src/index.js';
import { createLexerState, nextToken } from '../../src/lexer/index.js';

/** Token types and lexemes, without spans */
function lex(source: string): [string, string][] {
  return tokenize(source).map((t) => [t.type, t.value]);
}

describe('Muffasa Lexer', () => {
  describe('token types', () => {
    it('tokenizes an assignment', () => {
      expect(lex('x = 5~')).toEqual([
        ['IDENTIFIER', 'x'],
        ['OPERATOR', '='],
        ['NUMBER', '5'],
        ['STATEMENT_END', '~'],
        ['EOF', ''],
      ]);
    });

    it('accepts both statement terminators', () => {
      expect(lex('a; b~')).toEqual([
        ['IDENTIFIER', 'a'],
        ['STATEMENT_END', ';'],
        ['IDENTIFIER', 'b'],
        ['STATEMENT_END', '~'],
        ['EOF', ''],
      ]);
    });

    it('separates keywords from identifiers', () => {
      expect(lex('while whilex True Truth Arrays')).toEqual([
        ['KEYWORD', 'while'],
        ['IDENTIFIER', 'whilex'],
        ['KEYWORD', 'True'],
        ['IDENTIFIER', 'Truth'],
        ['KEYWORD', 'Arrays'],
        ['EOF', ''],
      ]);
    });

    it('allows digits and underscores after the first letter', () => {
      expect(lex('check_index a1')).toEqual([
        ['IDENTIFIER', 'check_index'],
        ['IDENTIFIER', 'a1'],
        ['EOF', ''],
      ]);
    });

    it('matches two-character operators before single characters', () => {
      expect(lex('a == b != c && d || e')).toEqual([
        ['IDENTIFIER', 'a'],
        ['OPERATOR', '=='],
        ['IDENTIFIER', 'b'],
        ['OPERATOR', '!='],
        ['IDENTIFIER', 'c'],
        ['OPERATOR', '&&'],
        ['IDENTIFIER', 'd'],
        ['OPERATOR', '||'],
        ['IDENTIFIER', 'e'],
        ['EOF', ''],
      ]);
    });

    it('classifies brackets, commas and dots as punctuation', () => {
      const types = tokenize('f(a, b).g{}').map((t) => t.type);
      expect(types).toEqual([
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.PUNCTUATION,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.PUNCTUATION,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.PUNCTUATION,
        TOKEN_TYPES.PUNCTUATION,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.PUNCTUATION,
        TOKEN_TYPES.PUNCTUATION,
        TOKEN_TYPES.EOF,
      ]);
    });

    it('keeps string contents verbatim without escapes', () => {
      expect(lex('s = "a \\n b"~')[2]).toEqual(['STRING', 'a \\n b']);
    });

    it('reads decimal numbers', () => {
      expect(lex('2.75')[0]).toEqual(['NUMBER', '2.75']);
    });

    it('leaves a trailing dot for a method call', () => {
      expect(lex('3.x')).toEqual([
        ['NUMBER', '3'],
        ['PUNCTUATION', '.'],
        ['IDENTIFIER', 'x'],
        ['EOF', ''],
      ]);
    });
  });

  describe('signed numbers', () => {
    it('lexes a minus after an operator as part of the number', () => {
      expect(lex('x = -3~')[2]).toEqual(['NUMBER', '-3']);
    });

    it('lexes a minus after a value as subtraction', () => {
      expect(lex('x-1')).toEqual([
        ['IDENTIFIER', 'x'],
        ['OPERATOR', '-'],
        ['NUMBER', '1'],
        ['EOF', ''],
      ]);
    });

    it('treats a minus after a closing paren as subtraction', () => {
      expect(lex('(2)-1').slice(3, 5)).toEqual([
        ['OPERATOR', '-'],
        ['NUMBER', '1'],
      ]);
    });

    it('lexes a minus inside an argument list as a sign', () => {
      expect(lex('min(-2, 1)')[2]).toEqual(['NUMBER', '-2']);
    });

    it('leaves a minus before an identifier as an operator', () => {
      expect(lex('y = -x~')[2]).toEqual(['OPERATOR', '-']);
    });

    it('decides the sign from the token recorded on the state', () => {
      const state = createLexerState('x -1');
      expect(state.previous).toBeUndefined();

      const name = nextToken(state);
      expect(state.previous).toBe(name);

      expect(nextToken(state).value).toBe('-');
      expect(nextToken(state).value).toBe('1');
    });
  });

  describe('spans', () => {
    it('records 1-based line and column', () => {
      const tokens = tokenize('a = 1~\n  bb = 2~');
      const bb = tokens[4];
      expect(bb?.value).toBe('bb');
      expect(bb?.span.start).toEqual({ line: 2, column: 3, offset: 9 });
      expect(bb?.span.end).toEqual({ line: 2, column: 5, offset: 11 });
    });

    it('places EOF after the last character', () => {
      const tokens = tokenize('x~');
      expect(tokens[tokens.length - 1]?.span.start).toEqual({
        line: 1,
        column: 3,
        offset: 2,
      });
    });
  });

  describe('errors', () => {
    it('rejects unknown characters', () => {
      expect(() => tokenize('x = 1 @ 2~')).toThrow(LexicalError);
      expect(() => tokenize('x = 1 @ 2~')).toThrow(
        "Unexpected character '@' at 1:7"
      );
    });

    it('rejects a lone ampersand', () => {
      expect(() => tokenize('a & b')).toThrow("Unexpected character '&'");
    });

    it('rejects identifiers starting with an underscore', () => {
      expect(() => tokenize('_x = 1~')).toThrow("Unexpected character '_'");
    });

    it('reports an unterminated string at its opening quote', () => {
      try {
        tokenize('x = 1~\ns = "open');
        expect.unreachable('should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(LexicalError);
        if (!(err instanceof LexicalError)) return;
        expect(err.code).toBe('UnterminatedString');
        expect(err.location).toEqual({ line: 2, column: 5, offset: 11 });
        expect(err.character).toBe('"');
        expect(err.toData().message).toBe('Unterminated string literal');
      }
    });

    it('carries structured data', () => {
      try {
        tokenize('#');
        expect.unreachable('should have thrown');
      } catch (err) {
        if (!(err instanceof LexicalError)) throw err;
        expect(err.toData()).toEqual({
          stage: 'LexicalError',
          code: 'UnexpectedCharacter',
          message: "Unexpected character '#'",
          location: { line: 1, column: 1, offset: 0 },
          context: { character: '#' },
        });
      }
    });
  });
});
