/**
 * ExpressionsMixin: Operators
 *
 * Binary and unary operator evaluation.
 * - Operands evaluate left before right
 * - && and || short-circuit and require Boolean operands
 * - Any operand combination outside the operator table is a TypeMismatch
 *
 * @internal
 */

import type {
  ArithmeticOp,
  BinaryOpNode,
  ComparisonOp,
  UnaryOpNode,
} from '../../../../types.js';
import { RUNTIME_ERROR_CODES, RuntimeError } from '../../../../types.js';
import type { Environment } from '../../environment.js';
import { valuesEqual } from '../../equals.js';
import {
  bool,
  formatNumber,
  num,
  str,
  typeName,
  type MuffasaValue,
} from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function ExpressionsMixin<TBase extends EvaluatorConstructor>(
  Base: TBase
) {
  return class ExpressionsEvaluator extends Base {
    evaluateBinaryOp(node: BinaryOpNode, env: Environment): MuffasaValue {
      const { op } = node;

      if (op === '&&' || op === '||') {
        const left = this.requireBoolean(
          this.evaluateExpression(node.left, env),
          node,
          `left operand of '${op}'`
        );
        // Short-circuit: the right operand is never evaluated
        if (op === '&&' && !left) return bool(false);
        if (op === '||' && left) return bool(true);
        return bool(
          this.requireBoolean(
            this.evaluateExpression(node.right, env),
            node,
            `right operand of '${op}'`
          )
        );
      }

      const left = this.evaluateExpression(node.left, env);
      const right = this.evaluateExpression(node.right, env);

      switch (op) {
        case '==':
          return bool(valuesEqual(left, right));
        case '!=':
          return bool(!valuesEqual(left, right));
        case '<':
        case '>':
          return bool(compare(op, left, right, node));
        default:
          return arithmetic(op, left, right, node);
      }
    }

    evaluateUnaryOp(node: UnaryOpNode, env: Environment): MuffasaValue {
      const operand = this.evaluateExpression(node.operand, env);
      if (operand.kind !== 'number') {
        throw this.error(
          RUNTIME_ERROR_CODES.TYPE_MISMATCH,
          `Unary '-' requires a Number, got ${typeName(operand)}`,
          node,
          { operator: '-', operand: typeName(operand) }
        );
      }
      return num(-operand.value);
    }
  };
}

// ============================================================
// OPERATOR TABLE
// ============================================================

function compare(
  op: Extract<ComparisonOp, '<' | '>'>,
  left: MuffasaValue,
  right: MuffasaValue,
  node: BinaryOpNode
): boolean {
  let a: number | string;
  let b: number | string;
  if (left.kind === 'number' && right.kind === 'number') {
    a = left.value;
    b = right.value;
  } else if (left.kind === 'string' && right.kind === 'string') {
    a = left.value;
    b = right.value;
  } else if (left.kind === 'stringbeans' && right.kind === 'stringbeans') {
    a = left.text;
    b = right.text;
  } else {
    throw operatorMismatch(op, left, right, node);
  }
  return op === '<' ? a < b : a > b;
}

function arithmetic(
  op: ArithmeticOp,
  left: MuffasaValue,
  right: MuffasaValue,
  node: BinaryOpNode
): MuffasaValue {
  if (op === '+' && left.kind === 'string' && right.kind === 'string') {
    return str(left.value + right.value);
  }
  if (left.kind !== 'number' || right.kind !== 'number') {
    throw operatorMismatch(op, left, right, node);
  }

  return finite(op, left.value, right.value, node);
}

function finite(
  op: ArithmeticOp,
  a: number,
  b: number,
  node: BinaryOpNode
): MuffasaValue {
  const result = compute(op, a, b, node);
  if (!Number.isFinite(result)) {
    throw RuntimeError.fromNode(
      RUNTIME_ERROR_CODES.DOMAIN_ERROR,
      `${formatNumber(a)} ${op} ${formatNumber(b)} is not a finite number`,
      node,
      { operator: op, left: a, right: b }
    );
  }
  return num(result);
}

function compute(
  op: ArithmeticOp,
  a: number,
  b: number,
  node: BinaryOpNode
): number {
  switch (op) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
      if (b === 0) {
        throw RuntimeError.fromNode(
          RUNTIME_ERROR_CODES.DIVISION_BY_ZERO,
          'Division by zero',
          node
        );
      }
      return a / b;
    case '^': {
      const result = a ** b;
      // Negative base with a fractional exponent
      if (Number.isNaN(result) && !Number.isNaN(a) && !Number.isNaN(b)) {
        throw RuntimeError.fromNode(
          RUNTIME_ERROR_CODES.DOMAIN_ERROR,
          `${formatNumber(a)} ^ ${formatNumber(b)} has no real result`,
          node,
          { base: a, exponent: b }
        );
      }
      return result;
    }
  }
}

function operatorMismatch(
  op: string,
  left: MuffasaValue,
  right: MuffasaValue,
  node: BinaryOpNode
): RuntimeError {
  return RuntimeError.fromNode(
    RUNTIME_ERROR_CODES.TYPE_MISMATCH,
    `Operator '${op}' cannot be applied to ${typeName(left)} and ${typeName(right)}`,
    node,
    { operator: op, left: typeName(left), right: typeName(right) }
  );
}
