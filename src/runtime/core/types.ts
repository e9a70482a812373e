/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { RuntimeError, SourceLocation } from '../../types.js';
import type { Environment } from './environment.js';
import type { MuffasaValue } from './values.js';

/**
 * Signature for built-in functions: min(a, b)
 * @internal
 */
export type MuffasaFunction = (
  args: MuffasaValue[],
  ctx: RuntimeContext,
  location?: SourceLocation
) => MuffasaValue;

/**
 * Method signature for built-in methods, keyed by receiver type.
 * Methods are called on a receiver value: value.method(args)
 * @internal
 */
export type MuffasaMethod<TReceiver extends MuffasaValue> = (
  receiver: TReceiver,
  args: MuffasaValue[],
  ctx: RuntimeContext,
  location?: SourceLocation
) => MuffasaValue;

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called by display() and show() with the text to write */
  onOutput: (text: string) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each top-level statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each top-level statement executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called after every assignment, at any depth */
  onAssign?: (event: AssignEvent) => void;
  /** Called when a runtime error ends the run */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
}

/** Event emitted after a statement executes */
export interface StepEndEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted when a variable is bound */
export interface AssignEvent {
  name: string;
  value: MuffasaValue;
}

/** Event emitted on runtime error */
export interface ErrorEvent {
  error: RuntimeError;
  /** Index of the top-level statement that failed */
  index: number;
}

/**
 * How if/else branches are scoped.
 * - 'enclosing': branches run in the frame around the if
 * - 'block': each branch gets its own frame
 */
export type ConditionalScope = 'enclosing' | 'block';

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Initial global bindings */
  variables?: Record<string, MuffasaValue>;
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks>;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks;
  /** Scoping of if/else branches (default 'enclosing') */
  conditionalScope?: ConditionalScope;
}

/** Runtime context shared by every evaluation of one run */
export interface RuntimeContext {
  readonly variables: ReadonlyMap<string, MuffasaValue>;
  readonly callbacks: RuntimeCallbacks;
  readonly observability: ObservabilityCallbacks;
  readonly conditionalScope: ConditionalScope;
}

/** Result of script execution */
export interface ExecutionResult {
  /** Environment after the run; only the global frame remains */
  environment: Environment;
  /** Global bindings as a plain record */
  variables: Record<string, MuffasaValue>;
  /** Value produced by the last completed top-level statement */
  value: MuffasaValue;
  /** Runtime error that ended the run, if any */
  error: RuntimeError | null;
}

/** Result of executing one top-level statement */
export interface StepResult {
  /** Value produced by this statement (Unit for control statements) */
  value: MuffasaValue;
  /** Whether execution is complete */
  done: boolean;
  /** Index of the statement that ran (0-based) */
  index: number;
  /** Total statements */
  total: number;
  /** Runtime error raised by this statement, if any */
  error: RuntimeError | null;
}

/** Stepper for controlled, statement-by-statement execution */
export interface ExecutionStepper {
  /** Whether execution is complete (all statements run, or an error ended it) */
  readonly done: boolean;
  /** Index of the next statement to execute */
  readonly index: number;
  /** Total number of statements */
  readonly total: number;
  /** Environment the statements run in */
  readonly environment: Environment;
  /** Execute the next statement */
  step(): StepResult;
  /** Final result (or the state so far, when not done) */
  getResult(): ExecutionResult;
}
