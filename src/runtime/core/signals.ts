/**
 * Control Flow Outcomes
 *
 * Statement execution returns an outcome instead of throwing for loop
 * control. Loops consume break/continue; blocks and conditionals pass
 * them outward unchanged.
 */

import type { MuffasaValue } from './values.js';
import { UNIT } from './values.js';

/** Statement completed; carries the value it produced */
export interface NormalOutcome {
  readonly kind: 'normal';
  readonly value: MuffasaValue;
}

/** `break` reached: leave the nearest loop */
export interface BreakOutcome {
  readonly kind: 'break';
}

/** `continue` reached: go to the nearest loop's next iteration */
export interface ContinueOutcome {
  readonly kind: 'continue';
}

export type ControlOutcome = NormalOutcome | BreakOutcome | ContinueOutcome;

export const BREAK: BreakOutcome = Object.freeze({ kind: 'break' });
export const CONTINUE: ContinueOutcome = Object.freeze({ kind: 'continue' });
export const COMPLETED: NormalOutcome = Object.freeze({
  kind: 'normal',
  value: UNIT,
});

export function completed(value: MuffasaValue): NormalOutcome {
  return { kind: 'normal', value };
}
