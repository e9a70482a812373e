/**
 * Parser Extension: Primaries and Calls
 * Literals, variables, constructor and function calls, method chains
 */

import { Parser } from './parser.js';
import type {
  ConstructorCallNode,
  Token,
  ExpressionNode,
  FunctionCallNode,
  MethodCallNode,
} from '../types.js';
import { ParseError, SYNTAX_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { isConstructorName } from './helpers.js';
import {
  advance,
  check,
  current,
  describeToken,
  expect,
  makeSpan,
  peek,
  previous,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePostfix(): ExpressionNode;
    parsePrimary(): ExpressionNode;
    parseArguments(): ExpressionNode[];
    parseConstructorCall(): ConstructorCallNode;
    parseFunctionCall(): FunctionCallNode;
  }
}

// ============================================================
// METHOD CHAINS
// ============================================================

/**
 * Parse a primary followed by any number of .method(args) suffixes.
 * Each suffix wraps the expression parsed so far.
 */
Parser.prototype.parsePostfix = function (this: Parser): ExpressionNode {
  let expr = this.parsePrimary();

  while (check(this.state, TOKEN_TYPES.PUNCTUATION, '.')) {
    advance(this.state);
    const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, null, 'method name');
    const args = this.parseArguments();
    const call: MethodCallNode = {
      type: 'MethodCall',
      receiver: expr,
      method: name.value,
      args,
      span: makeSpan(expr.span.start, previous(this.state).span.end),
    };
    expr = call;
  }

  return expr;
};

// ============================================================
// PRIMARIES
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return {
        type: 'NumberLiteral',
        value: Number(token.value),
        span: token.span,
      };

    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, span: token.span };

    case TOKEN_TYPES.KEYWORD:
      if (token.value === 'True' || token.value === 'False') {
        advance(this.state);
        return {
          type: 'BoolLiteral',
          value: token.value === 'True',
          span: token.span,
        };
      }
      if (isConstructorName(token.value)) {
        return this.parseConstructorCall();
      }
      break;

    case TOKEN_TYPES.IDENTIFIER:
      if (isOpenParen(peek(this.state, 1))) {
        return this.parseFunctionCall();
      }
      advance(this.state);
      return { type: 'Identifier', name: token.value, span: token.span };

    case TOKEN_TYPES.PUNCTUATION:
      if (token.value === '(') {
        advance(this.state);
        const inner = this.parseExpression();
        expect(this.state, TOKEN_TYPES.PUNCTUATION, ')', "')'");
        return inner;
      }
      break;
  }

  throw new ParseError(
    SYNTAX_ERROR_CODES.UNEXPECTED_TOKEN,
    `Expected expression but found ${describeToken(token)}`,
    token.span.start,
    { expected: 'expression', found: describeToken(token) }
  );
};

// ============================================================
// CALLS
// ============================================================

/** Parse ( [expr (, expr)*] ) */
Parser.prototype.parseArguments = function (this: Parser): ExpressionNode[] {
  expect(this.state, TOKEN_TYPES.PUNCTUATION, '(', "'('");
  const args: ExpressionNode[] = [];

  if (!check(this.state, TOKEN_TYPES.PUNCTUATION, ')')) {
    args.push(this.parseExpression());
    while (check(this.state, TOKEN_TYPES.PUNCTUATION, ',')) {
      advance(this.state);
      args.push(this.parseExpression());
    }
  }

  expect(this.state, TOKEN_TYPES.PUNCTUATION, ')', "')'");
  return args;
};

Parser.prototype.parseConstructorCall = function (
  this: Parser
): ConstructorCallNode {
  const token = advance(this.state);
  if (!isConstructorName(token.value)) {
    throw new ParseError(
      SYNTAX_ERROR_CODES.UNEXPECTED_TOKEN,
      `Expected type name but found ${describeToken(token)}`,
      token.span.start,
      { expected: 'type name', found: describeToken(token) }
    );
  }
  const args = this.parseArguments();
  return {
    type: 'ConstructorCall',
    typeName: token.value,
    args,
    span: makeSpan(token.span.start, previous(this.state).span.end),
  };
};

Parser.prototype.parseFunctionCall = function (
  this: Parser
): FunctionCallNode {
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, null, 'function name');
  const args = this.parseArguments();
  return {
    type: 'FunctionCall',
    name: name.value,
    args,
    span: makeSpan(name.span.start, previous(this.state).span.end),
  };
};

function isOpenParen(token: Token): boolean {
  return token.type === TOKEN_TYPES.PUNCTUATION && token.value === '(';
}
