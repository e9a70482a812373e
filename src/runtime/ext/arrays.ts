/**
 * Arrays: mutable ordered sequence with reference semantics
 *
 * @internal
 */

import { RUNTIME_ERROR_CODES, RuntimeError } from '../../types.js';
import type { SourceLocation } from '../../types.js';
import type { MuffasaMethod } from '../core/types.js';
import {
  TRUE,
  UNIT,
  arrays,
  formatValue,
  num,
  type ArraysValue,
  type MuffasaValue,
} from '../core/values.js';
import { argAt, elementAt, expectArity, expectIndex } from './args.js';

/**
 * Arrays() is empty; Arrays(n) holds n zeros.
 */
export function createArrays(
  args: MuffasaValue[],
  location?: SourceLocation
): ArraysValue {
  if (args.length === 0) return arrays();
  if (args.length > 1) {
    throw new RuntimeError(
      RUNTIME_ERROR_CODES.INVALID_ARGUMENT,
      `Arrays expects 0 or 1 arguments, got ${args.length}`,
      location,
      { name: 'Arrays', expected: 1, actual: args.length }
    );
  }
  const size = argAt(args, 0);
  if (
    size.kind !== 'number' ||
    !Number.isInteger(size.value) ||
    size.value < 0
  ) {
    throw new RuntimeError(
      RUNTIME_ERROR_CODES.INVALID_ARGUMENT,
      `Arrays size must be a non-negative integer, got ${formatValue(size)}`,
      location,
      { name: 'Arrays', value: formatValue(size) }
    );
  }
  return arrays(Array.from({ length: size.value }, () => num(0)));
}

export const ARRAYS_METHODS: Record<string, MuffasaMethod<ArraysValue>> = {
  /** Append in place */
  add: (receiver, args, _ctx, location) => {
    expectArity('Arrays.add', args, 1, location);
    receiver.elements.push(argAt(args, 0));
    return UNIT;
  },

  /** Insert before position i; i == length appends */
  insert: (receiver, args, _ctx, location) => {
    expectArity('Arrays.insert', args, 2, location);
    const index = expectIndex(
      'Arrays.insert',
      argAt(args, 0),
      receiver.elements.length,
      location,
      true
    );
    receiver.elements.splice(index, 0, argAt(args, 1));
    return UNIT;
  },

  remove: (receiver, args, _ctx, location) => {
    expectArity('Arrays.remove', args, 1, location);
    const index = expectIndex(
      'Arrays.remove',
      argAt(args, 0),
      receiver.elements.length,
      location
    );
    receiver.elements.splice(index, 1);
    return UNIT;
  },

  at: (receiver, args, _ctx, location) => {
    expectArity('Arrays.at', args, 1, location);
    return elementAt('Arrays.at', receiver.elements, argAt(args, 0), location);
  },

  /** True for a valid index; an invalid one raises IndexOutOfBounds */
  check_index: (receiver, args, _ctx, location) => {
    expectArity('Arrays.check_index', args, 1, location);
    expectIndex(
      'Arrays.check_index',
      argAt(args, 0),
      receiver.elements.length,
      location
    );
    return TRUE;
  },

  length: (receiver, args, _ctx, location) => {
    expectArity('Arrays.length', args, 0, location);
    return num(receiver.elements.length);
  },

  /** Write the textual form to output */
  display: (receiver, args, ctx, location) => {
    expectArity('Arrays.display', args, 0, location);
    ctx.callbacks.onOutput(formatValue(receiver));
    return UNIT;
  },
};
