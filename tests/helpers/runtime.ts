/**
 * Test utilities for Muffasa runtime tests
 */

import {
  createRuntimeContext,
  createStepper,
  execute,
  type ExecutionResult,
  type MuffasaValue,
  type ObservabilityCallbacks,
  parse,
  type RuntimeOptions,
  type StepResult,
} from '../../src/index.js';

/** Shared setup for all execution modes */
function setup(source: string, options: RuntimeOptions = {}) {
  return { ast: parse(source), ctx: createRuntimeContext(options) };
}

/**
 * Execute a program and return its global variables.
 * A runtime error is rethrown so tests can assert on it with toThrow.
 */
export function run(
  source: string,
  options: RuntimeOptions = {}
): Record<string, MuffasaValue> {
  const result = runFull(source, options);
  if (result.error) throw result.error;
  return result.variables;
}

/** Execute and return the full result, runtime error included */
export function runFull(
  source: string,
  options: RuntimeOptions = {}
): ExecutionResult {
  const { ast, ctx } = setup(source, options);
  return execute(ast, ctx);
}

/** Execute using stepper and return all step results */
export function runStepped(
  source: string,
  options: RuntimeOptions = {}
): StepResult[] {
  const { ast, ctx } = setup(source, options);
  const stepper = createStepper(ast, ctx);
  const results: StepResult[] = [];

  while (!stepper.done) {
    results.push(stepper.step());
  }

  return results;
}

/** Output collector for display() and show() */
export function createOutputCollector(): {
  output: string[];
  callbacks: { onOutput: (text: string) => void };
} {
  const output: string[] = [];
  return {
    output,
    callbacks: {
      onOutput: (text: string) => output.push(text),
    },
  };
}

/** Event collector for observability testing */
export interface CollectedEvents {
  stepStart: { index: number; total: number }[];
  stepEnd: { index: number; total: number; durationMs: number }[];
  assign: { name: string; value: MuffasaValue }[];
  error: { error: Error; index: number }[];
}

/** Create an event collector for observability callbacks */
export function createEventCollector(): {
  events: CollectedEvents;
  callbacks: ObservabilityCallbacks;
} {
  const events: CollectedEvents = {
    stepStart: [],
    stepEnd: [],
    assign: [],
    error: [],
  };

  const callbacks: ObservabilityCallbacks = {
    onStepStart: (e) => events.stepStart.push(e),
    onStepEnd: (e) => events.stepEnd.push(e),
    onAssign: (e) => events.assign.push(e),
    onError: (e) => events.error.push(e),
  };

  return { events, callbacks };
}
