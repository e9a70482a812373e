/**
 * CoreMixin: Main Dispatch
 *
 * Provides the entry points for expression evaluation and statement
 * execution and dispatches to the specialized handlers based on AST node
 * type. This is the central coordination point that ties together all
 * other mixins, so it sits outermost in the composition.
 *
 * Depends on:
 * - LiteralsMixin: evaluateLiteral()
 * - VariablesMixin: evaluateIdentifier(), executeAssignment()
 * - ExpressionsMixin: evaluateBinaryOp(), evaluateUnaryOp()
 * - CallsMixin: evaluateMethodCall(), evaluateConstructorCall(), evaluateFunctionCall()
 * - ControlFlowMixin: executeBlock(), executeIf(), executeWhile(), executeFor()
 *
 * @internal
 */

import type { ExpressionNode, StatementNode } from '../../../../types.js';
import type { Environment } from '../../environment.js';
import {
  BREAK,
  CONTINUE,
  completed,
  type ControlOutcome,
} from '../../signals.js';
import type { MuffasaValue } from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor, EvaluatorHandlers } from '../types.js';

export function CoreMixin<
  TBase extends EvaluatorConstructor<EvaluatorBase & EvaluatorHandlers>,
>(Base: TBase) {
  return class CoreEvaluator extends Base {
    override evaluateExpression(
      node: ExpressionNode,
      env: Environment
    ): MuffasaValue {
      switch (node.type) {
        case 'NumberLiteral':
        case 'StringLiteral':
        case 'BoolLiteral':
          return this.evaluateLiteral(node);
        case 'Identifier':
          return this.evaluateIdentifier(node, env);
        case 'BinaryOp':
          return this.evaluateBinaryOp(node, env);
        case 'UnaryOp':
          return this.evaluateUnaryOp(node, env);
        case 'MethodCall':
          return this.evaluateMethodCall(node, env);
        case 'ConstructorCall':
          return this.evaluateConstructorCall(node, env);
        case 'FunctionCall':
          return this.evaluateFunctionCall(node, env);
      }
    }

    override executeStatement(
      node: StatementNode,
      env: Environment
    ): ControlOutcome {
      switch (node.type) {
        case 'Assignment':
          return completed(this.executeAssignment(node, env));
        case 'ExpressionStatement':
          return completed(this.evaluateExpression(node.expression, env));
        case 'Block':
          return this.executeBlock(node, env);
        case 'If':
          return this.executeIf(node, env);
        case 'While':
          return this.executeWhile(node, env);
        case 'For':
          return this.executeFor(node, env);
        case 'Break':
          return BREAK;
        case 'Continue':
          return CONTINUE;
      }
    }
  };
}
