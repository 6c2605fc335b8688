/**
 * Refinement loop domain types.
 *
 * One loop shape serves every producer: propose, execute, evaluate, then
 * either stop or revise and propose again.
 */

/** Loop phases. */
export enum LoopPhase {
  Propose = 'propose',
  Execute = 'execute',
  Evaluate = 'evaluate',
  Revise = 'revise',
  Stopped = 'stopped',
}

/** Valid phase transitions. */
export const VALID_LOOP_TRANSITIONS: Record<LoopPhase, LoopPhase[]> = {
  [LoopPhase.Propose]: [LoopPhase.Execute],
  [LoopPhase.Execute]: [LoopPhase.Evaluate],
  [LoopPhase.Evaluate]: [LoopPhase.Revise, LoopPhase.Stopped],
  [LoopPhase.Revise]: [LoopPhase.Propose],
  [LoopPhase.Stopped]: [],
};

/** Why a loop stopped. */
export type StopReason = 'accepted' | 'halted' | 'max-iterations';

/** Outcome of parsing a critique. */
export type VerdictDecision = 'accept' | 'revise';

export interface Verdict {
  decision: VerdictDecision;
  /** Text after the sentinel (justification for ACCEPT, requested changes for REVISE). */
  detail: string;
  /** False when the critique carried neither sentinel and was treated as REVISE. */
  recognized: boolean;
}

/** One retained iteration: what was proposed, what executing it produced, and the critique. */
export interface RefinementIteration<P, O> {
  /** 1-based. */
  ordinal: number;
  proposal: P;
  output: O;
  critique: string;
  verdict: Verdict;
}

/** Recorded phase transition. */
export interface PhaseTransition {
  iteration: number;
  from: LoopPhase;
  to: LoopPhase;
}
