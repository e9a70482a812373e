/**
 * Muffasa Parser Tests: Syntax Errors
 * Expected/found reporting, hints, and misplaced control statements
 */

import { describe, expect, it } from 'vitest';
import { LexicalError, ParseError, parse } from '../../src/index.js';

/** Parse and return the ParseError raised */
function parseError(source: string): ParseError {
  try {
    parse(source);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error(`Expected a parse error for: ${source}`);
}

describe('Muffasa Parser: Syntax Errors', () => {
  describe('expected and found', () => {
    it('reports a missing terminator at end of input', () => {
      const err = parseError('x = 1');
      expect(err.code).toBe('UnexpectedToken');
      expect(err.stage).toBe('SyntaxError');
      expect(err.expected).toBe("'~' or ';'");
      expect(err.found).toBe('end of input');
      expect(err.location).toEqual({ line: 1, column: 6, offset: 5 });
      expect(err.message).toBe(
        "Expected '~' or ';' but found end of input at 1:6"
      );
    });

    it('strips the location from structured data', () => {
      const data = parseError('x = 1').toData();
      expect(data.message).toBe("Expected '~' or ';' but found end of input");
      expect(data.context).toEqual({
        expected: "'~' or ';'",
        found: 'end of input',
      });
    });

    it('describes a string token by its contents', () => {
      const err = parseError('x = 1 "s"~');
      expect(err.found).toBe('string "s"');
    });

    it('describes a number token by its digits', () => {
      const err = parseError('a.5~');
      expect(err.toData().message).toBe(
        'Expected method name but found number 5'
      );
    });

    it('reports a missing expression', () => {
      const err = parseError('= 5~');
      expect(err.toData().message).toBe("Expected expression but found '='");
      expect(err.expected).toBe('expression');
    });

    it('requires terminators between for-loop header parts', () => {
      const err = parseError('for (i = 0, i < 3; i = i + 1) { }');
      expect(err.toData().message).toBe("Expected '~' or ';' but found ','");
    });

    it('accepts either terminator character', () => {
      expect(parse('x = 1; y = 2~').statements).toHaveLength(2);
    });

    it('reports line and column on later lines', () => {
      const err = parseError('x = 1~\ny = (2 + 3~');
      expect(err.location.line).toBe(2);
      expect(err.location.column).toBe(11);
      expect(err.toData().message).toBe("Expected ')' but found '~'");
    });
  });

  describe('hints', () => {
    it('suggests a closing parenthesis at end of input', () => {
      const err = parseError('y = (1 + 2');
      expect(err.toData().message).toBe(
        "Expected ')' but found end of input. Hint: Check for unclosed parenthesis"
      );
    });

    it('suggests a closing brace at end of input', () => {
      const err = parseError('if (x > 1) { y = 2~');
      expect(err.toData().message).toBe(
        "Expected '}' but found end of input. Hint: Check for unclosed brace"
      );
    });

    it('suggests a keyword for a misspelled statement start', () => {
      const err = parseError('whlie (x < 3) { x = x + 1~ }');
      expect(err.toData().message).toBe(
        "Expected '~' or ';' but found '{'. Hint: Did you mean 'while'?"
      );
    });

    it('suggests a keyword for a misspelled failing token', () => {
      const err = parseError('x = 1 ture~');
      expect(err.toData().message).toBe(
        "Expected '~' or ';' but found 'ture'. Hint: Did you mean 'True'?"
      );
    });

    it('gives no hint when nothing matches', () => {
      const err = parseError('y = (1 + 2~');
      expect(err.toData().message).toBe("Expected ')' but found '~'");
    });
  });

  describe('conditionals', () => {
    it('rejects else if', () => {
      const err = parseError('if (a) { } else if (b) { }');
      expect(err.code).toBe('UnexpectedToken');
      expect(err.toData().message).toBe(
        "'else if' is not supported; nest the 'if' inside an 'else' block"
      );
      expect(err.location.column).toBe(17);
    });

    it('accepts an if nested inside an else block', () => {
      const program = parse('if (a) { } else { if (b) { } }');
      expect(program.statements[0]).toMatchObject({
        type: 'If',
        elseBlock: { statements: [{ type: 'If' }] },
      });
    });

    it('rejects else without a matching if', () => {
      const err = parseError('else { x = 1~ }');
      expect(err.toData().message).toBe(
        "Unexpected 'else' without a matching 'if'"
      );
      expect(err.found).toBe("'else'");
    });
  });

  describe('loop control', () => {
    it('rejects break outside of a loop', () => {
      const err = parseError('break~');
      expect(err.code).toBe('MisplacedControl');
      expect(err.toData().message).toBe("'break' outside of a loop");
    });

    it('rejects continue in a conditional outside of a loop', () => {
      const err = parseError('if (True) { continue~ }');
      expect(err.code).toBe('MisplacedControl');
      expect(err.found).toBe("'continue'");
    });

    it('rejects break after a loop has closed', () => {
      const err = parseError('while (False) { } break~');
      expect(err.code).toBe('MisplacedControl');
    });

    it('accepts break nested in a conditional inside a loop', () => {
      const program = parse('while (True) { if (True) { break~ } }');
      expect(program.statements[0]).toMatchObject({
        type: 'While',
        body: {
          statements: [
            { type: 'If', thenBlock: { statements: [{ type: 'Break' }] } },
          ],
        },
      });
    });

    it('accepts loop control without a terminator', () => {
      const program = parse('for (i = 0; i < 3; i = i + 1) { continue }');
      expect(program.statements[0]).toMatchObject({
        type: 'For',
        body: { statements: [{ type: 'Continue' }] },
      });
    });
  });

  describe('lexical errors', () => {
    it('surfaces lexical errors from parse', () => {
      expect(() => parse('x = 1 @ 2~')).toThrow(LexicalError);
      expect(() => parse('x = 1 @ 2~')).toThrow("Unexpected character '@'");
    });
  });
});
