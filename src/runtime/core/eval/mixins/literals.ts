/**
 * LiteralsMixin: Constant Values
 *
 * Number, string and boolean literals. Composite values are built by
 * constructor calls (CallsMixin), not literal syntax.
 *
 * @internal
 */

import type { LiteralNode } from '../../../../types.js';
import { bool, num, str, type MuffasaValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function LiteralsMixin<TBase extends EvaluatorConstructor>(Base: TBase) {
  return class LiteralsEvaluator extends Base {
    evaluateLiteral(node: LiteralNode): MuffasaValue {
      switch (node.type) {
        case 'NumberLiteral':
          return num(node.value);
        case 'StringLiteral':
          return str(node.value);
        case 'BoolLiteral':
          return bool(node.value);
      }
    }
  };
}
