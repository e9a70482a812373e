/**
 * StringBeans: immutable text with its own method table
 *
 * Text arguments accept plain Strings and StringBeans alike.
 *
 * @internal
 */

import { RUNTIME_ERROR_CODES, RuntimeError } from '../../types.js';
import type { SourceLocation } from '../../types.js';
import type { MuffasaMethod } from '../core/types.js';
import {
  UNIT,
  arrays,
  bool,
  stringBeans,
  type MuffasaValue,
  type StringBeansValue,
} from '../core/values.js';
import { argAt, expectArity, expectText } from './args.js';

/** StringBeans() is empty; StringBeans(s) wraps a String or StringBeans */
export function createStringBeans(
  args: MuffasaValue[],
  location?: SourceLocation
): StringBeansValue {
  if (args.length === 0) return stringBeans('');
  expectArity('StringBeans', args, 1, location);
  return stringBeans(expectText('StringBeans', argAt(args, 0), location));
}

function expectNonEmpty(
  label: string,
  text: string,
  location?: SourceLocation
): string {
  if (text.length > 0) return text;
  throw new RuntimeError(
    RUNTIME_ERROR_CODES.INVALID_ARGUMENT,
    `${label} expects a non-empty separator`,
    location,
    { name: label }
  );
}

/** Every cased character satisfies the predicate; uncased ones are skipped */
function allCased(text: string, upper: boolean): boolean {
  for (const char of text) {
    const lower = char.toLowerCase();
    const upperChar = char.toUpperCase();
    if (lower === upperChar) continue;
    if (char !== (upper ? upperChar : lower)) return false;
  }
  return true;
}

export const STRING_BEANS_METHODS: Record<
  string,
  MuffasaMethod<StringBeansValue>
> = {
  /** Replace every non-overlapping occurrence, scanning left to right */
  Replace: (receiver, args, _ctx, location) => {
    expectArity('StringBeans.Replace', args, 2, location);
    const search = expectNonEmpty(
      'StringBeans.Replace',
      expectText('StringBeans.Replace', argAt(args, 0), location),
      location
    );
    const replacement = expectText(
      'StringBeans.Replace',
      argAt(args, 1),
      location
    );
    return stringBeans(receiver.text.split(search).join(replacement));
  },

  allUpper: (receiver, args, _ctx, location) => {
    expectArity('StringBeans.allUpper', args, 0, location);
    return bool(allCased(receiver.text, true));
  },

  allLower: (receiver, args, _ctx, location) => {
    expectArity('StringBeans.allLower', args, 0, location);
    return bool(allCased(receiver.text, false));
  },

  Conjoin: (receiver, args, _ctx, location) => {
    expectArity('StringBeans.Conjoin', args, 1, location);
    const other = expectText('StringBeans.Conjoin', argAt(args, 0), location);
    return stringBeans(receiver.text + other);
  },

  /** Arrays of StringBeans split on every occurrence of the separator */
  splitBeans: (receiver, args, _ctx, location) => {
    expectArity('StringBeans.splitBeans', args, 1, location);
    const separator = expectNonEmpty(
      'StringBeans.splitBeans',
      expectText('StringBeans.splitBeans', argAt(args, 0), location),
      location
    );
    return arrays(receiver.text.split(separator).map(stringBeans));
  },

  /** Write the raw text to output */
  show: (receiver, args, ctx, location) => {
    expectArity('StringBeans.show', args, 0, location);
    ctx.callbacks.onOutput(receiver.text);
    return UNIT;
  },
};
