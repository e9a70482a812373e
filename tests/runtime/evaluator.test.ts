/**
 * Muffasa Runtime Tests: Evaluator Composition
 * Mixin stubs, dispatch and per-context caching
 */

import { describe, expect, it } from 'vitest';
import {
  BREAK,
  Environment,
  createRuntimeContext,
  num,
  parse,
  type ExpressionNode,
  type StatementNode,
} from '../../src/index.js';
import { EvaluatorBase } from '../../src/runtime/core/eval/base.js';
import {
  Evaluator,
  getEvaluator,
} from '../../src/runtime/core/eval/evaluator.js';
import {
  ExpressionsMixin,
} from '../../src/runtime/core/eval/mixins/expressions.js';
import { LiteralsMixin } from '../../src/runtime/core/eval/mixins/literals.js';

function firstStatement(source: string): StatementNode {
  const stmt = parse(source).statements[0];
  if (!stmt) throw new Error(`No statement in: ${source}`);
  return stmt;
}

function expression(source: string): ExpressionNode {
  const stmt = firstStatement(`${source}~`);
  if (stmt.type !== 'ExpressionStatement') {
    throw new Error(`Expected an expression statement for: ${source}`);
  }
  return stmt.expression;
}

describe('Muffasa Runtime: Evaluator Composition', () => {
  it('reuses one evaluator per context', () => {
    const ctx = createRuntimeContext();
    expect(getEvaluator(ctx)).toBe(getEvaluator(ctx));
    expect(getEvaluator(ctx)).not.toBe(getEvaluator(createRuntimeContext()));
  });

  it('executes statements with the full composition', () => {
    const evaluator = new Evaluator(createRuntimeContext());
    const env = new Environment();
    expect(evaluator.executeStatement(firstStatement('x = 2~'), env)).toEqual({
      kind: 'normal',
      value: num(2),
    });
    expect(env.lookup('x')).toEqual(num(2));
  });

  it('returns break as an outcome', () => {
    const loop = firstStatement('while (True) { break~ }');
    if (loop.type !== 'While') throw new Error('Expected a while loop');
    const body = loop.body.statements[0];
    if (!body) throw new Error('Expected a loop body statement');

    const evaluator = new Evaluator(createRuntimeContext());
    expect(evaluator.executeStatement(body, new Environment())).toBe(BREAK);
  });

  it('needs CoreMixin for expression dispatch', () => {
    const base = new EvaluatorBase(createRuntimeContext());
    expect(() =>
      base.evaluateExpression(expression('1'), new Environment())
    ).toThrow(
      'evaluateExpression requires full Evaluator composition with CoreMixin'
    );
  });

  it('needs CoreMixin even when operator handlers are present', () => {
    const Partial = ExpressionsMixin(LiteralsMixin(EvaluatorBase));
    const partial = new Partial(createRuntimeContext());
    const node = expression('1 + 2');
    if (node.type !== 'BinaryOp') throw new Error('Expected a binary node');
    expect(() => partial.evaluateBinaryOp(node, new Environment())).toThrow(
      'evaluateExpression requires full Evaluator composition with CoreMixin'
    );
  });

  it('needs ControlFlowMixin for blocks', () => {
    const base = new EvaluatorBase(createRuntimeContext());
    const block = firstStatement('{ }');
    if (block.type !== 'Block') throw new Error('Expected a block');
    expect(() => base.executeBlock(block, new Environment())).toThrow(
      'executeBlock requires full Evaluator composition with ControlFlowMixin'
    );
  });
});
