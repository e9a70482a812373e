/**
 * Built-in Functions
 *
 * min, max and squareRoot. Any other call name raises NoSuchMethod.
 *
 * @internal - Not part of public API
 */

import { RUNTIME_ERROR_CODES, RuntimeError } from '../../types.js';
import type { MuffasaFunction } from '../core/types.js';
import { formatNumber, num } from '../core/values.js';
import { argAt, expectArity, expectNumber } from './args.js';

export const BUILTIN_FUNCTIONS: Record<string, MuffasaFunction> = {
  /** Smaller of two numbers */
  min: (args, _ctx, location) => {
    expectArity('min', args, 2, location);
    const a = expectNumber('min', argAt(args, 0), location);
    const b = expectNumber('min', argAt(args, 1), location);
    return num(Math.min(a, b));
  },

  /** Larger of two numbers */
  max: (args, _ctx, location) => {
    expectArity('max', args, 2, location);
    const a = expectNumber('max', argAt(args, 0), location);
    const b = expectNumber('max', argAt(args, 1), location);
    return num(Math.max(a, b));
  },

  squareRoot: (args, _ctx, location) => {
    expectArity('squareRoot', args, 1, location);
    const x = expectNumber('squareRoot', argAt(args, 0), location);
    if (x < 0) {
      throw new RuntimeError(
        RUNTIME_ERROR_CODES.DOMAIN_ERROR,
        `squareRoot of negative number ${formatNumber(x)}`,
        location,
        { name: 'squareRoot', value: x }
      );
    }
    return num(Math.sqrt(x));
  },
};
