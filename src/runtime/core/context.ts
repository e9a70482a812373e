/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for script execution.
 * Public API for host applications.
 */

import { Environment } from './environment.js';
import type {
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';

const defaultCallbacks: RuntimeCallbacks = {
  onOutput: (text) => {
    console.log(text);
  },
};

/**
 * Create a runtime context for script execution.
 * This is the main entry point for configuring the Muffasa runtime.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  return {
    variables: new Map(Object.entries(options.variables ?? {})),
    callbacks: {
      onOutput: options.callbacks?.onOutput ?? defaultCallbacks.onOutput,
    },
    observability: options.observability ?? {},
    conditionalScope: options.conditionalScope ?? 'enclosing',
  };
}

/** Create a fresh environment seeded with the context's initial variables */
export function createEnvironment(ctx: RuntimeContext): Environment {
  return new Environment(ctx.variables);
}
