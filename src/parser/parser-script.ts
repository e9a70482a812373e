/**
 * Parser Extension: Program and Statement Parsing
 */

import { Parser } from './parser.js';
import type {
  AssignmentNode,
  BreakNode,
  ContinueNode,
  ProgramNode,
  StatementNode,
} from '../types.js';
import { ParseError, SYNTAX_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import {
  STATEMENT_END_DESCRIPTION,
  advance,
  check,
  current,
  expect,
  isAtEnd,
  makeSpan,
  peek,
  previous,
  unexpectedToken,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseStatement(): StatementNode;
    parseAssignment(): AssignmentNode;
    parseLoopControl(): BreakNode | ContinueNode;
    expectStatementEnd(): void;
  }
}

// ============================================================
// PROGRAM PARSING
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const start = current(this.state).span.start;
  const statements: StatementNode[] = [];

  while (!isAtEnd(this.state)) {
    statements.push(this.parseStatement());
  }

  const end = current(this.state).span.end;
  return {
    type: 'Program',
    statements,
    span: makeSpan(start, end),
  };
};

// ============================================================
// STATEMENT PARSING
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  this.state.statementStart = this.state.pos;
  const token = current(this.state);

  if (token.type === TOKEN_TYPES.KEYWORD) {
    switch (token.value) {
      case 'if':
        return this.parseIf();
      case 'while':
        return this.parseWhile();
      case 'for':
        return this.parseFor();
      case 'break':
      case 'continue':
        return this.parseLoopControl();
      case 'else':
        throw new ParseError(
          SYNTAX_ERROR_CODES.UNEXPECTED_TOKEN,
          "Unexpected 'else' without a matching 'if'",
          token.span.start,
          { expected: 'statement', found: "'else'" }
        );
    }
  }

  if (check(this.state, TOKEN_TYPES.PUNCTUATION, '{')) {
    return this.parseBlock();
  }

  if (
    token.type === TOKEN_TYPES.IDENTIFIER &&
    peek(this.state, 1).type === TOKEN_TYPES.OPERATOR &&
    peek(this.state, 1).value === '='
  ) {
    const assignment = this.parseAssignment();
    this.expectStatementEnd();
    return assignment;
  }

  const expression = this.parseExpression();
  this.expectStatementEnd();
  return {
    type: 'ExpressionStatement',
    expression,
    span: makeSpan(token.span.start, expression.span.end),
  };
};

/**
 * Parse `name = expression` without its terminator.
 * Shared by plain assignments and the for-loop header.
 */
Parser.prototype.parseAssignment = function (this: Parser): AssignmentNode {
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, null, 'variable name');
  expect(this.state, TOKEN_TYPES.OPERATOR, '=', "'='");
  const value = this.parseExpression();
  return {
    type: 'Assignment',
    target: name.value,
    value,
    span: makeSpan(name.span.start, value.span.end),
  };
};

/**
 * Parse break/continue. Only valid inside a loop body; the terminator is optional.
 */
Parser.prototype.parseLoopControl = function (
  this: Parser
): BreakNode | ContinueNode {
  const token = current(this.state);
  if (this.state.loopDepth === 0) {
    throw new ParseError(
      SYNTAX_ERROR_CODES.MISPLACED_CONTROL,
      `'${token.value}' outside of a loop`,
      token.span.start,
      { expected: 'loop body', found: `'${token.value}'` }
    );
  }
  advance(this.state);
  if (check(this.state, TOKEN_TYPES.STATEMENT_END)) {
    advance(this.state);
  }
  const span = makeSpan(token.span.start, previous(this.state).span.end);
  return token.value === 'break'
    ? { type: 'Break', span }
    : { type: 'Continue', span };
};

Parser.prototype.expectStatementEnd = function (this: Parser): void {
  if (!check(this.state, TOKEN_TYPES.STATEMENT_END)) {
    throw unexpectedToken(this.state, STATEMENT_END_DESCRIPTION);
  }
  advance(this.state);
};
