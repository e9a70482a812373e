/**
 * Method Dispatch
 *
 * Resolves calls over the closed (receiver kind, method name) table and
 * the built-in constructors and functions.
 *
 * @internal
 */

import type { ConstructorName, SourceLocation } from '../../types.js';
import { RUNTIME_ERROR_CODES, RuntimeError } from '../../types.js';
import type { MuffasaMethod, RuntimeContext } from '../core/types.js';
import { typeName, type MuffasaValue } from '../core/values.js';
import { lookupMethod } from './args.js';
import { ARRAYS_METHODS, createArrays } from './arrays.js';
import { BUILTIN_FUNCTIONS } from './builtins.js';
import { SHMUPLE_METHODS, createShmuple } from './shmuple.js';
import { STRING_BEANS_METHODS, createStringBeans } from './string-beans.js';

/** receiver.name(args) */
export function callMethod(
  receiver: MuffasaValue,
  name: string,
  args: MuffasaValue[],
  ctx: RuntimeContext,
  location?: SourceLocation
): MuffasaValue {
  switch (receiver.kind) {
    case 'shmuple':
      return dispatch(SHMUPLE_METHODS, receiver, name, args, ctx, location);
    case 'arrays':
      return dispatch(ARRAYS_METHODS, receiver, name, args, ctx, location);
    case 'stringbeans':
      return dispatch(STRING_BEANS_METHODS, receiver, name, args, ctx, location);
    case 'number':
    case 'boolean':
    case 'string':
    case 'unit':
      throw noSuchMethod(typeName(receiver), name, location);
  }
}

function dispatch<T extends MuffasaValue>(
  table: Record<string, MuffasaMethod<T>>,
  receiver: T,
  name: string,
  args: MuffasaValue[],
  ctx: RuntimeContext,
  location?: SourceLocation
): MuffasaValue {
  const method = lookupMethod(table, name);
  if (!method) throw noSuchMethod(typeName(receiver), name, location);
  return method(receiver, args, ctx, location);
}

/** Shmuple(...), Arrays(...), StringBeans(...) */
export function construct(
  name: ConstructorName,
  args: MuffasaValue[],
  location?: SourceLocation
): MuffasaValue {
  switch (name) {
    case 'Shmuple':
      return createShmuple(args);
    case 'Arrays':
      return createArrays(args, location);
    case 'StringBeans':
      return createStringBeans(args, location);
  }
}

/** name(args) for the built-in function table */
export function callFunction(
  name: string,
  args: MuffasaValue[],
  ctx: RuntimeContext,
  location?: SourceLocation
): MuffasaValue {
  const fn = lookupMethod(BUILTIN_FUNCTIONS, name);
  if (!fn) {
    throw new RuntimeError(
      RUNTIME_ERROR_CODES.NO_SUCH_METHOD,
      `Unknown function '${name}'`,
      location,
      { kind: 'function', name }
    );
  }
  return fn(args, ctx, location);
}

function noSuchMethod(
  kind: string,
  name: string,
  location?: SourceLocation
): RuntimeError {
  return new RuntimeError(
    RUNTIME_ERROR_CODES.NO_SUCH_METHOD,
    `${kind} has no method '${name}'`,
    location,
    { kind, name }
  );
}
