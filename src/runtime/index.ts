/**
 * Muffasa Runtime
 *
 * Public API for executing Muffasa programs.
 *
 * Module Structure:
 * - core/: Essential execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, etc.)
 *   - values.ts: MuffasaValue and value utilities
 *   - equals.ts: Structural equality and default ordering
 *   - environment.ts: Scope frame stack
 *   - signals.ts: Control outcomes (break, continue)
 *   - context.ts: Runtime context factory
 *   - execute.ts: Program execution (execute, createStepper)
 *   - eval/: Mixin-composed evaluator (internal)
 * - ext/: Built-in functions and per-type method tables
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  AssignEvent,
  ConditionalScope,
  ErrorEvent,
  ExecutionResult,
  ExecutionStepper,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

// ============================================================
// VALUES
// ============================================================

export type {
  ArraysValue,
  BooleanValue,
  MuffasaValue,
  NumberValue,
  ShmupleValue,
  StringBeansValue,
  StringValue,
  UnitValue,
  ValueKind,
} from './core/values.js';

export {
  FALSE,
  TRUE,
  UNIT,
  arrays,
  bool,
  formatNumber,
  formatValue,
  inspectValue,
  num,
  shmuple,
  str,
  stringBeans,
  typeName,
} from './core/values.js';

export { compareValues, valuesEqual } from './core/equals.js';

// ============================================================
// CONTROL FLOW
// ============================================================

export {
  BREAK,
  COMPLETED,
  CONTINUE,
  type BreakOutcome,
  type ContinueOutcome,
  type ControlOutcome,
  type NormalOutcome,
} from './core/signals.js';

// ============================================================
// EXECUTION
// ============================================================

export { Environment } from './core/environment.js';
export { createEnvironment, createRuntimeContext } from './core/context.js';
export { createStepper, execute } from './core/execute.js';
