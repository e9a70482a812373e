/**
 * Argument validation shared by built-in functions, constructors and methods
 *
 * @internal
 */

import type { SourceLocation } from '../../types.js';
import { RUNTIME_ERROR_CODES, RuntimeError } from '../../types.js';
import {
  UNIT,
  formatNumber,
  typeName,
  type MuffasaValue,
} from '../core/values.js';

/** Throw InvalidArgument unless exactly `expected` arguments were passed */
export function expectArity(
  label: string,
  args: MuffasaValue[],
  expected: number,
  location?: SourceLocation
): void {
  if (args.length === expected) return;
  const noun = expected === 1 ? 'argument' : 'arguments';
  throw new RuntimeError(
    RUNTIME_ERROR_CODES.INVALID_ARGUMENT,
    `${label} expects ${expected} ${noun}, got ${args.length}`,
    location,
    { name: label, expected, actual: args.length }
  );
}

/** Positional argument; call after expectArity */
export function argAt(args: MuffasaValue[], index: number): MuffasaValue {
  return args[index] ?? UNIT;
}

export function expectNumber(
  label: string,
  value: MuffasaValue,
  location?: SourceLocation
): number {
  if (value.kind === 'number') return value.value;
  throw new RuntimeError(
    RUNTIME_ERROR_CODES.TYPE_MISMATCH,
    `${label} expects a Number, got ${typeName(value)}`,
    location,
    { name: label, expected: 'Number', actual: typeName(value) }
  );
}

export function expectInteger(
  label: string,
  value: MuffasaValue,
  location?: SourceLocation
): number {
  const n = expectNumber(label, value, location);
  if (Number.isInteger(n)) return n;
  throw new RuntimeError(
    RUNTIME_ERROR_CODES.INVALID_ARGUMENT,
    `${label} expects an integer, got ${formatNumber(n)}`,
    location,
    { name: label, value: n }
  );
}

/**
 * Validate an index into a sequence of `length` elements.
 * With `allowEnd`, `length` itself is accepted (insert position).
 */
export function expectIndex(
  label: string,
  value: MuffasaValue,
  length: number,
  location?: SourceLocation,
  allowEnd = false
): number {
  const index = expectInteger(label, value, location);
  const limit = allowEnd ? length : length - 1;
  if (index >= 0 && index <= limit) return index;
  throw new RuntimeError(
    RUNTIME_ERROR_CODES.INDEX_OUT_OF_BOUNDS,
    `Index ${index} out of bounds for length ${length}`,
    location,
    { index, length }
  );
}

/** Element at a validated index */
export function elementAt(
  label: string,
  elements: readonly MuffasaValue[],
  value: MuffasaValue,
  location?: SourceLocation
): MuffasaValue {
  const index = expectIndex(label, value, elements.length, location);
  return elements[index] ?? UNIT;
}

/** Text of a String or StringBeans argument */
export function expectText(
  label: string,
  value: MuffasaValue,
  location?: SourceLocation
): string {
  if (value.kind === 'string') return value.value;
  if (value.kind === 'stringbeans') return value.text;
  throw new RuntimeError(
    RUNTIME_ERROR_CODES.TYPE_MISMATCH,
    `${label} expects a String or StringBeans, got ${typeName(value)}`,
    location,
    { name: label, expected: 'String', actual: typeName(value) }
  );
}

/** Own-property lookup in a method table */
export function lookupMethod<T>(
  table: Record<string, T>,
  name: string
): T | undefined {
  return Object.hasOwn(table, name) ? table[name] : undefined;
}
