/**
 * ControlFlowMixin: Conditionals, Loops, and Blocks
 *
 * Handles control flow constructs:
 * - Blocks push a frame and release it on every exit path
 * - Conditionals (if-else), scoped per RuntimeContext.conditionalScope
 * - While loops with a fresh body frame per iteration
 * - For loops with one frame for init/step plus a body frame per iteration
 *
 * break/continue arrive as returned outcomes; loops consume them, blocks
 * and conditionals pass them outward.
 *
 * Error Handling:
 * - Non-Boolean conditions throw RuntimeError(TypeMismatch)
 *
 * @internal
 */

import type {
  BlockNode,
  ForNode,
  IfNode,
  WhileNode,
} from '../../../../types.js';
import type { Environment } from '../../environment.js';
import { COMPLETED, type ControlOutcome } from '../../signals.js';
import type { EvaluatorConstructor } from '../types.js';

export function ControlFlowMixin<TBase extends EvaluatorConstructor>(
  Base: TBase
) {
  return class ControlFlowEvaluator extends Base {
    /**
     * Run a block's statements in order.
     * Stops at the first break/continue and returns it; otherwise returns
     * the last statement's outcome.
     */
    override executeBlock(
      node: BlockNode,
      env: Environment,
      scoped = true
    ): ControlOutcome {
      if (scoped) env.pushFrame();
      try {
        let outcome: ControlOutcome = COMPLETED;
        for (const statement of node.statements) {
          outcome = this.executeStatement(statement, env);
          if (outcome.kind !== 'normal') return outcome;
        }
        return outcome;
      } finally {
        if (scoped) env.popFrame();
      }
    }

    executeIf(node: IfNode, env: Environment): ControlOutcome {
      const condition = this.requireBoolean(
        this.evaluateExpression(node.condition, env),
        node.condition,
        'if condition'
      );
      const scoped = this.ctx.conditionalScope === 'block';

      if (condition) return this.executeBlock(node.thenBlock, env, scoped);
      if (node.elseBlock) return this.executeBlock(node.elseBlock, env, scoped);
      return COMPLETED;
    }

    executeWhile(node: WhileNode, env: Environment): ControlOutcome {
      while (
        this.requireBoolean(
          this.evaluateExpression(node.condition, env),
          node.condition,
          'while condition'
        )
      ) {
        const outcome = this.executeBlock(node.body, env);
        if (outcome.kind === 'break') break;
      }
      return COMPLETED;
    }

    /**
     * init runs once in the loop frame; continue still runs the step,
     * break skips it.
     */
    executeFor(node: ForNode, env: Environment): ControlOutcome {
      env.pushFrame();
      try {
        this.executeAssignment(node.init, env);
        while (
          this.requireBoolean(
            this.evaluateExpression(node.condition, env),
            node.condition,
            'for condition'
          )
        ) {
          const outcome = this.executeBlock(node.body, env);
          if (outcome.kind === 'break') break;
          this.executeAssignment(node.step, env);
        }
        return COMPLETED;
      } finally {
        env.popFrame();
      }
    }
  };
}
