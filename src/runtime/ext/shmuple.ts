/**
 * Shmuple: immutable ordered sequence
 *
 * Every method leaves the receiver untouched and returns a new value.
 *
 * @internal
 */

import { RUNTIME_ERROR_CODES, RuntimeError } from '../../types.js';
import { compareValues, valuesEqual } from '../core/equals.js';
import type { MuffasaMethod } from '../core/types.js';
import {
  num,
  shmuple,
  typeName,
  type MuffasaValue,
  type ShmupleValue,
} from '../core/values.js';
import { argAt, elementAt, expectArity } from './args.js';

/** Shmuple(a, b, ...) */
export function createShmuple(args: MuffasaValue[]): ShmupleValue {
  return shmuple(args);
}

export const SHMUPLE_METHODS: Record<string, MuffasaMethod<ShmupleValue>> = {
  /** New Shmuple in default order; equal elements keep their order */
  sortuple: (receiver, args, _ctx, location) => {
    expectArity('Shmuple.sortuple', args, 0, location);
    return shmuple([...receiver.elements].sort(compareValues));
  },

  /** Concatenation with another Shmuple */
  Add: (receiver, args, _ctx, location) => {
    expectArity('Shmuple.Add', args, 1, location);
    const other = argAt(args, 0);
    if (other.kind !== 'shmuple') {
      throw new RuntimeError(
        RUNTIME_ERROR_CODES.TYPE_MISMATCH,
        `Shmuple.Add expects a Shmuple, got ${typeName(other)}`,
        location,
        { name: 'Shmuple.Add', expected: 'Shmuple', actual: typeName(other) }
      );
    }
    return shmuple([...receiver.elements, ...other.elements]);
  },

  getitem: (receiver, args, _ctx, location) => {
    expectArity('Shmuple.getitem', args, 1, location);
    return elementAt(
      'Shmuple.getitem',
      receiver.elements,
      argAt(args, 0),
      location
    );
  },

  /** First position holding an equal value, or -1 */
  Index: (receiver, args, _ctx, location) => {
    expectArity('Shmuple.Index', args, 1, location);
    const target = argAt(args, 0);
    return num(receiver.elements.findIndex((e) => valuesEqual(e, target)));
  },

  Length: (receiver, args, _ctx, location) => {
    expectArity('Shmuple.Length', args, 0, location);
    return num(receiver.elements.length);
  },
};
