/**
 * Parser Extension: Control Flow Parsing
 * Conditionals, loops, and blocks
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  ExpressionNode,
  ForNode,
  IfNode,
  StatementNode,
  WhileNode,
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
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseIf(): IfNode;
    parseWhile(): WhileNode;
    parseFor(): ForNode;
    parseBlock(): BlockNode;
    parseLoopBody(): BlockNode;
    parseCondition(): ExpressionNode;
  }
}

// ============================================================
// CONDITIONALS
// ============================================================

/**
 * Parse if (cond) { ... } with an optional else { ... }.
 * `else if` is rejected: the else branch must be a block.
 */
Parser.prototype.parseIf = function (this: Parser): IfNode {
  const start = expect(this.state, TOKEN_TYPES.KEYWORD, 'if', "'if'").span.start;
  const condition = this.parseCondition();
  const thenBlock = this.parseBlock();

  let elseBlock: BlockNode | null = null;
  if (check(this.state, TOKEN_TYPES.KEYWORD, 'else')) {
    advance(this.state);
    if (check(this.state, TOKEN_TYPES.KEYWORD, 'if')) {
      throw new ParseError(
        SYNTAX_ERROR_CODES.UNEXPECTED_TOKEN,
        "'else if' is not supported; nest the 'if' inside an 'else' block",
        current(this.state).span.start,
        { expected: "'{'", found: "'if'" }
      );
    }
    elseBlock = this.parseBlock();
  }

  const end = (elseBlock ?? thenBlock).span.end;
  return {
    type: 'If',
    condition,
    thenBlock,
    elseBlock,
    span: makeSpan(start, end),
  };
};

/** Parse a parenthesized condition: ( expression ) */
Parser.prototype.parseCondition = function (this: Parser): ExpressionNode {
  expect(this.state, TOKEN_TYPES.PUNCTUATION, '(', "'('");
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.PUNCTUATION, ')', "')'");
  return condition;
};

// ============================================================
// LOOPS
// ============================================================

Parser.prototype.parseWhile = function (this: Parser): WhileNode {
  const start = expect(this.state, TOKEN_TYPES.KEYWORD, 'while', "'while'")
    .span.start;
  const condition = this.parseCondition();
  const body = this.parseLoopBody();
  return {
    type: 'While',
    condition,
    body,
    span: makeSpan(start, body.span.end),
  };
};

/**
 * Parse for (init; condition; step) { body }.
 * The header separators accept either terminator character.
 */
Parser.prototype.parseFor = function (this: Parser): ForNode {
  const start = expect(this.state, TOKEN_TYPES.KEYWORD, 'for', "'for'").span
    .start;
  expect(this.state, TOKEN_TYPES.PUNCTUATION, '(', "'('");
  const init = this.parseAssignment();
  expect(this.state, TOKEN_TYPES.STATEMENT_END, null, STATEMENT_END_DESCRIPTION);
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.STATEMENT_END, null, STATEMENT_END_DESCRIPTION);
  const step = this.parseAssignment();
  expect(this.state, TOKEN_TYPES.PUNCTUATION, ')', "')'");
  const body = this.parseLoopBody();
  return {
    type: 'For',
    init,
    condition,
    step,
    body,
    span: makeSpan(start, body.span.end),
  };
};

/** Parse a block in which break/continue are allowed */
Parser.prototype.parseLoopBody = function (this: Parser): BlockNode {
  this.state.loopDepth++;
  try {
    return this.parseBlock();
  } finally {
    this.state.loopDepth--;
  }
};

// ============================================================
// BLOCKS
// ============================================================

Parser.prototype.parseBlock = function (this: Parser): BlockNode {
  const start = expect(this.state, TOKEN_TYPES.PUNCTUATION, '{', "'{'").span
    .start;
  const statements: StatementNode[] = [];

  while (
    !check(this.state, TOKEN_TYPES.PUNCTUATION, '}') &&
    !isAtEnd(this.state)
  ) {
    statements.push(this.parseStatement());
  }

  const end = expect(this.state, TOKEN_TYPES.PUNCTUATION, '}', "'}'").span.end;
  return {
    type: 'Block',
    statements,
    span: makeSpan(start, end),
  };
};
