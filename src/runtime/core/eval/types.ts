/**
 * Type Infrastructure for Evaluator Mixins
 *
 * Defines the constructor type for the mixin pattern.
 * Mixins receive a base constructor and return an extended constructor.
 *
 * @internal
 */

import type {
  AssignmentNode,
  BinaryOpNode,
  BlockNode,
  ConstructorCallNode,
  ForNode,
  FunctionCallNode,
  IdentifierNode,
  IfNode,
  LiteralNode,
  MethodCallNode,
  UnaryOpNode,
  WhileNode,
} from '../../../types.js';
import type { Environment } from '../environment.js';
import type { ControlOutcome } from '../signals.js';
import type { MuffasaValue } from '../values.js';
import type { EvaluatorBase } from './base.js';

/**
 * Constructor type for EvaluatorBase or any class extending it.
 * This is the input type for mixin functions.
 *
 * Note: `any[]` is required for constructor args because mixins don't know
 * what parameters the base constructor accepts. This is the standard TypeScript
 * mixin pattern.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type EvaluatorConstructor<TBase extends EvaluatorBase = EvaluatorBase> = new (...args: any[]) => TBase;

/**
 * Node handlers contributed by the inner mixins.
 * CoreMixin requires them on its base to dispatch without casts.
 */
export interface EvaluatorHandlers {
  evaluateLiteral(node: LiteralNode): MuffasaValue;
  evaluateIdentifier(node: IdentifierNode, env: Environment): MuffasaValue;
  evaluateBinaryOp(node: BinaryOpNode, env: Environment): MuffasaValue;
  evaluateUnaryOp(node: UnaryOpNode, env: Environment): MuffasaValue;
  evaluateMethodCall(node: MethodCallNode, env: Environment): MuffasaValue;
  evaluateConstructorCall(
    node: ConstructorCallNode,
    env: Environment
  ): MuffasaValue;
  evaluateFunctionCall(node: FunctionCallNode, env: Environment): MuffasaValue;
  executeAssignment(node: AssignmentNode, env: Environment): MuffasaValue;
  executeBlock(
    node: BlockNode,
    env: Environment,
    scoped?: boolean
  ): ControlOutcome;
  executeIf(node: IfNode, env: Environment): ControlOutcome;
  executeWhile(node: WhileNode, env: Environment): ControlOutcome;
  executeFor(node: ForNode, env: Environment): ControlOutcome;
}
