/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides shared utilities and context access for all mixins.
 *
 * @internal
 */

import type {
  ASTNode,
  AssignmentNode,
  BlockNode,
  ExpressionNode,
  RuntimeErrorCode,
  SourceLocation,
  StatementNode,
} from '../../../types.js';
import { RUNTIME_ERROR_CODES, RuntimeError } from '../../../types.js';
import type { Environment } from '../environment.js';
import type { ControlOutcome } from '../signals.js';
import type { RuntimeContext } from '../types.js';
import { typeName, type MuffasaValue } from '../values.js';

/**
 * Base class for the evaluator.
 * Contains shared utilities used by all mixins, plus the dispatch entry
 * points that later mixins call before the full composition defines them.
 */
export class EvaluatorBase {
  constructor(protected ctx: RuntimeContext) {}

  /**
   * Get source location from an AST node.
   * Used for error reporting with precise location information.
   */
  protected getNodeLocation(node?: ASTNode): SourceLocation | undefined {
    return node?.span.start;
  }

  /** Build a RuntimeError located at a node */
  protected error(
    code: RuntimeErrorCode,
    message: string,
    node: ASTNode,
    context?: Record<string, unknown>
  ): RuntimeError {
    return RuntimeError.fromNode(code, message, node, context);
  }

  /**
   * Narrow a value to a boolean or raise TypeMismatch.
   * Shared by logical operators and if/loop conditions.
   */
  protected requireBoolean(
    value: MuffasaValue,
    node: ASTNode,
    what: string
  ): boolean {
    if (value.kind === 'boolean') return value.value;
    throw this.error(
      RUNTIME_ERROR_CODES.TYPE_MISMATCH,
      `Expected Boolean for ${what}, got ${typeName(value)}`,
      node,
      { expected: 'Boolean', actual: typeName(value) }
    );
  }

  /**
   * Evaluate an expression node to a value.
   *
   * NOTE: Stub implementation - actual implementation requires CoreMixin.
   */
  evaluateExpression(_node: ExpressionNode, _env: Environment): MuffasaValue {
    throw new Error(
      'evaluateExpression requires full Evaluator composition with CoreMixin'
    );
  }

  /**
   * Execute a statement node.
   *
   * NOTE: Stub implementation - actual implementation requires CoreMixin.
   */
  executeStatement(_node: StatementNode, _env: Environment): ControlOutcome {
    throw new Error(
      'executeStatement requires full Evaluator composition with CoreMixin'
    );
  }

  /**
   * Bind an assignment's value and return it.
   *
   * NOTE: Stub implementation - actual implementation requires VariablesMixin.
   */
  executeAssignment(_node: AssignmentNode, _env: Environment): MuffasaValue {
    throw new Error(
      'executeAssignment requires full Evaluator composition with VariablesMixin'
    );
  }

  /**
   * Execute a block, in its own frame when `scoped`.
   *
   * NOTE: Stub implementation - actual implementation requires ControlFlowMixin.
   */
  executeBlock(
    _node: BlockNode,
    _env: Environment,
    _scoped?: boolean
  ): ControlOutcome {
    throw new Error(
      'executeBlock requires full Evaluator composition with ControlFlowMixin'
    );
  }
}
