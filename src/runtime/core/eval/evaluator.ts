/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins.
 * Uses WeakMap caching to reuse evaluator instances per RuntimeContext.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - Foundation utilities and dispatch stubs
 * 2. LiteralsMixin - Number, string, boolean literals
 * 3. VariablesMixin - Lookup and assignment
 * 4. ExpressionsMixin - Binary and unary operators
 * 5. CallsMixin - Constructor, function and method calls
 * 6. ControlFlowMixin - Blocks, conditionals, loops
 * 7. CoreMixin - Expression/statement dispatch (outermost)
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { CallsMixin } from './mixins/calls.js';
import { ControlFlowMixin } from './mixins/control-flow.js';
import { CoreMixin } from './mixins/core.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import { LiteralsMixin } from './mixins/literals.js';
import { VariablesMixin } from './mixins/variables.js';
import type { RuntimeContext } from '../types.js';

/**
 * Complete Evaluator class composed from all mixins.
 */
export const Evaluator = CoreMixin(
  ControlFlowMixin(
    CallsMixin(ExpressionsMixin(VariablesMixin(LiteralsMixin(EvaluatorBase))))
  )
);

// eslint-disable-next-line no-redeclare
export type Evaluator = InstanceType<typeof Evaluator>;

/**
 * WeakMap cache for evaluator instances.
 *
 * Cache eviction happens automatically when the RuntimeContext is
 * garbage collected, since WeakMap keys don't prevent GC.
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create an evaluator instance for a given RuntimeContext.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
