/**
 * Parser Extension: Expression Parsing
 * Precedence chain from logical-or down to unary minus
 */

import { Parser } from './parser.js';
import type {
  BinaryOp,
  BinaryOpNode,
  ExpressionNode,
  UnaryOpNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { matchOperator } from './helpers.js';
import { advance, check, current, makeSpan } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseLogicalOr(): ExpressionNode;
    parseLogicalAnd(): ExpressionNode;
    parseEquality(): ExpressionNode;
    parseRelational(): ExpressionNode;
    parseAdditive(): ExpressionNode;
    parseMultiplicative(): ExpressionNode;
    parseExponent(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parseLeftAssociative<T extends BinaryOp>(
      operators: readonly T[],
      next: () => ExpressionNode
    ): ExpressionNode;
  }
}

// ============================================================
// EXPRESSION ENTRY POINT
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseLogicalOr();
};

/**
 * Parse one left-associative precedence level.
 * Operands come from the next-tighter level.
 */
Parser.prototype.parseLeftAssociative = function <T extends BinaryOp>(
  this: Parser,
  operators: readonly T[],
  next: () => ExpressionNode
): ExpressionNode {
  let left = next();

  for (;;) {
    const op = matchOperator(current(this.state), operators);
    if (op === null) return left;
    advance(this.state);
    const right = next();
    left = binary(op, left, right);
  }
};

// ============================================================
// PRECEDENCE CHAIN
// ============================================================

Parser.prototype.parseLogicalOr = function (this: Parser): ExpressionNode {
  return this.parseLeftAssociative(['||'], () => this.parseLogicalAnd());
};

Parser.prototype.parseLogicalAnd = function (this: Parser): ExpressionNode {
  return this.parseLeftAssociative(['&&'], () => this.parseEquality());
};

Parser.prototype.parseEquality = function (this: Parser): ExpressionNode {
  return this.parseLeftAssociative(['==', '!='], () => this.parseRelational());
};

Parser.prototype.parseRelational = function (this: Parser): ExpressionNode {
  return this.parseLeftAssociative(['<', '>'], () => this.parseAdditive());
};

Parser.prototype.parseAdditive = function (this: Parser): ExpressionNode {
  return this.parseLeftAssociative(['+', '-'], () =>
    this.parseMultiplicative()
  );
};

Parser.prototype.parseMultiplicative = function (
  this: Parser
): ExpressionNode {
  return this.parseLeftAssociative(['*', '/'], () => this.parseExponent());
};

/**
 * Exponent is right-associative: 2 ^ 3 ^ 2 is 2 ^ (3 ^ 2).
 * Its left operand is a unary expression, so -2 ^ 2 is (-2) ^ 2.
 */
Parser.prototype.parseExponent = function (this: Parser): ExpressionNode {
  const base = this.parseUnary();
  if (!check(this.state, TOKEN_TYPES.OPERATOR, '^')) return base;
  advance(this.state);
  const exponent = this.parseExponent();
  return binary('^', base, exponent);
};

Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  if (check(this.state, TOKEN_TYPES.OPERATOR, '-')) {
    const start = advance(this.state).span.start;
    const operand = this.parseUnary();
    const node: UnaryOpNode = {
      type: 'UnaryOp',
      op: '-',
      operand,
      span: makeSpan(start, operand.span.end),
    };
    return node;
  }
  return this.parsePostfix();
};

// ============================================================
// HELPERS
// ============================================================

function binary(
  op: BinaryOp,
  left: ExpressionNode,
  right: ExpressionNode
): BinaryOpNode {
  return {
    type: 'BinaryOp',
    op,
    left,
    right,
    span: makeSpan(left.span.start, right.span.end),
  };
}
