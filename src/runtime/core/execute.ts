/**
 * Script Execution
 *
 * Public API for executing Muffasa programs.
 * Provides both full execution and step-by-step execution.
 */

import type { ProgramNode } from '../../types.js';
import { RuntimeError } from '../../types.js';
import { createEnvironment } from './context.js';
import type { Environment } from './environment.js';
import { getEvaluator } from './eval/evaluator.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  StepResult,
} from './types.js';
import { UNIT, type MuffasaValue } from './values.js';

/**
 * Execute a parsed Muffasa program.
 *
 * Runtime errors end the run and are returned in `result.error`; the
 * environment then holds the state reached before the failure.
 *
 * @param program The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 * @param environment Environment to run in; a fresh one by default
 */
export function execute(
  program: ProgramNode,
  context: RuntimeContext,
  environment: Environment = createEnvironment(context)
): ExecutionResult {
  const stepper = createStepper(program, context, environment);
  while (!stepper.done) {
    stepper.step();
  }
  return stepper.getResult();
}

/**
 * Create a stepper for controlled step-by-step execution.
 * Allows the caller to control the execution loop and inspect state between steps.
 */
export function createStepper(
  program: ProgramNode,
  context: RuntimeContext,
  environment: Environment = createEnvironment(context)
): ExecutionStepper {
  const evaluator = getEvaluator(context);
  const statements = program.statements;
  const total = statements.length;
  let index = 0;
  let lastValue: MuffasaValue = UNIT;
  let lastError: RuntimeError | null = null;
  let isDone = total === 0;

  return {
    get done() {
      return isDone;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get environment() {
      return environment;
    },

    step(): StepResult {
      const stmt = statements[index];
      if (isDone || !stmt) {
        isDone = true;
        return { value: lastValue, done: true, index, total, error: lastError };
      }

      const startTime = Date.now();
      context.observability.onStepStart?.({ index, total });

      try {
        const outcome = evaluator.executeStatement(stmt, environment);
        const value = outcome.kind === 'normal' ? outcome.value : UNIT;
        lastValue = value;

        context.observability.onStepEnd?.({
          index,
          total,
          durationMs: Date.now() - startTime,
        });

        index++;
        isDone = index >= total;
        return { value, done: isDone, index: index - 1, total, error: null };
      } catch (error) {
        if (!(error instanceof RuntimeError)) throw error;

        lastError = error;
        isDone = true;
        context.observability.onError?.({ error, index });
        return { value: UNIT, done: true, index, total, error };
      }
    },

    getResult(): ExecutionResult {
      return {
        environment,
        variables: environment.snapshot(),
        value: lastValue,
        error: lastError,
      };
    },
  };
}
