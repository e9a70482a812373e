/**
 * CallsMixin: Constructor, Function and Method Calls
 *
 * Arguments evaluate left to right after the receiver; dispatch then goes
 * through the ext tables.
 *
 * @internal
 */

import type {
  ConstructorCallNode,
  ExpressionNode,
  FunctionCallNode,
  MethodCallNode,
} from '../../../../types.js';
import { callFunction, callMethod, construct } from '../../../ext/methods.js';
import type { Environment } from '../../environment.js';
import type { MuffasaValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function CallsMixin<TBase extends EvaluatorConstructor>(Base: TBase) {
  return class CallsEvaluator extends Base {
    evaluateMethodCall(node: MethodCallNode, env: Environment): MuffasaValue {
      const receiver = this.evaluateExpression(node.receiver, env);
      const args = this.evaluateArgs(node.args, env);
      return callMethod(
        receiver,
        node.method,
        args,
        this.ctx,
        this.getNodeLocation(node)
      );
    }

    evaluateConstructorCall(
      node: ConstructorCallNode,
      env: Environment
    ): MuffasaValue {
      const args = this.evaluateArgs(node.args, env);
      return construct(node.typeName, args, this.getNodeLocation(node));
    }

    evaluateFunctionCall(
      node: FunctionCallNode,
      env: Environment
    ): MuffasaValue {
      const args = this.evaluateArgs(node.args, env);
      return callFunction(node.name, args, this.ctx, this.getNodeLocation(node));
    }

    protected evaluateArgs(
      args: ExpressionNode[],
      env: Environment
    ): MuffasaValue[] {
      return args.map((arg) => this.evaluateExpression(arg, env));
    }
  };
}
