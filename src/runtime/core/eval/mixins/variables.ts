/**
 * VariablesMixin: Variable Access and Assignment
 *
 * - Lookup walks frames innermost first
 * - Assignment updates the innermost frame holding the name, or binds
 *   the name in the current frame
 *
 * Error Handling:
 * - Undefined variables throw RuntimeError(UndefinedVariable)
 *
 * @internal
 */

import type { AssignmentNode, IdentifierNode } from '../../../../types.js';
import { RUNTIME_ERROR_CODES } from '../../../../types.js';
import type { Environment } from '../../environment.js';
import type { MuffasaValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function VariablesMixin<TBase extends EvaluatorConstructor>(
  Base: TBase
) {
  return class VariablesEvaluator extends Base {
    evaluateIdentifier(
      node: IdentifierNode,
      env: Environment
    ): MuffasaValue {
      const value = env.lookup(node.name);
      if (value === undefined) {
        throw this.error(
          RUNTIME_ERROR_CODES.UNDEFINED_VARIABLE,
          `Undefined variable '${node.name}'`,
          node,
          { name: node.name }
        );
      }
      return value;
    }

    /**
     * Evaluate the right-hand side, bind it, and fire onAssign.
     * Returns the assigned value.
     */
    override executeAssignment(
      node: AssignmentNode,
      env: Environment
    ): MuffasaValue {
      const value = this.evaluateExpression(node.value, env);
      env.assign(node.target, value);
      this.ctx.observability.onAssign?.({ name: node.target, value });
      return value;
    }
  };
}
