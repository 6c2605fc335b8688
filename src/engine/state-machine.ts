/**
 * Refinement loop state machine.
 *
 * Enforces valid phase transitions, producing typed errors on invalid ones.
 */

import { LoopPhase, VALID_LOOP_TRANSITIONS } from '../domain/refinement';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newPhase?: S;
  error?: TypedError;
}

/** Attempt a loop phase transition. */
export function transitionLoopPhase(
  current: LoopPhase,
  target: LoopPhase,
): TransitionResult<LoopPhase> {
  const validTargets = VALID_LOOP_TRANSITIONS[current];
  if (!validTargets || !validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'LOOP.INVALID_TRANSITION',
        message: `Invalid loop phase transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newPhase: target };
}

/** Check if a loop phase is terminal. */
export function isTerminalLoopPhase(phase: LoopPhase): boolean {
  return phase === LoopPhase.Stopped;
}
