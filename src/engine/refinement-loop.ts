/**
 * Generic refinement loop.
 *
 * PROPOSE → EXECUTE → EVALUATE → { STOP | REVISE → PROPOSE }, bounded by
 * `maxIterations`. A strategy supplies the four phases; the loop owns the
 * phase bookkeeping, the retained history and the stop decision.
 *
 * Calls into the strategy are awaited one at a time. Errors thrown by a
 * strategy propagate unchanged; there is no internal retry or timeout.
 */

import {
  LoopPhase,
  PhaseTransition,
  RefinementIteration,
  StopReason,
  Verdict,
} from '../domain/refinement';
import { TypedError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { transitionLoopPhase } from './state-machine';
import { parseVerdict } from './verdict';

/** What a strategy sees when asked for the next proposal. */
export interface RefinementContext<P, O> {
  /** 1-based ordinal of the iteration being run. */
  iteration: number;
  maxIterations: number;
  /** Completed iterations, oldest first. */
  history: ReadonlyArray<RefinementIteration<P, O>>;
  previous?: RefinementIteration<P, O>;
}

/** Result of the EVALUATE phase. */
export interface Evaluation {
  critique: string;
  /** Stop now regardless of the critique. */
  halt?: boolean;
}

export interface RefinementStrategy<P, O> {
  propose(context: RefinementContext<P, O>): Promise<P>;
  execute(proposal: P, context: RefinementContext<P, O>): Promise<O>;
  evaluate(proposal: P, output: O, context: RefinementContext<P, O>): Promise<Evaluation>;
  /** Fold the critique of `iteration` into the state the next propose() reads. */
  revise?(iteration: RefinementIteration<P, O>, verdict: Verdict): void | Promise<void>;
}

export interface RefinementOptions {
  maxIterations: number;
  /** Label for log lines, e.g. "chart-refinement". */
  label?: string;
  logger?: Logger;
}

export interface RefinementResult<P, O> {
  iterations: Array<RefinementIteration<P, O>>;
  stopReason: StopReason;
  /** The last iteration's output. */
  final: O;
  phases: PhaseTransition[];
}

/** Raised when the loop bookkeeping attempts an illegal phase change. */
export class LoopError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'LoopError';
  }
}

function assertMaxIterations(value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`maxIterations must be a positive integer, got ${value}`);
  }
}

export async function runRefinementLoop<P, O>(
  strategy: RefinementStrategy<P, O>,
  options: RefinementOptions,
): Promise<RefinementResult<P, O>> {
  assertMaxIterations(options.maxIterations);
  const label = options.label ?? 'refinement';
  const log = options.logger ?? rootLogger.child({ component: 'refinement-loop', loop: label });

  const iterations: Array<RefinementIteration<P, O>> = [];
  const phases: PhaseTransition[] = [];
  let phase = LoopPhase.Propose;
  let stopReason: StopReason | undefined;

  const move = (iteration: number, target: LoopPhase): void => {
    const result = transitionLoopPhase(phase, target);
    if (result.error) {
      throw new LoopError(result.error);
    }
    phases.push({ iteration, from: phase, to: target });
    log.debug('Loop phase transition', { iteration, from: phase, to: target });
    phase = target;
  };

  for (let ordinal = 1; ordinal <= options.maxIterations; ordinal++) {
    const context: RefinementContext<P, O> = {
      iteration: ordinal,
      maxIterations: options.maxIterations,
      history: [...iterations],
      previous: iterations[iterations.length - 1],
    };

    const proposal = await strategy.propose(context);
    move(ordinal, LoopPhase.Execute);

    const output = await strategy.execute(proposal, context);
    move(ordinal, LoopPhase.Evaluate);

    const evaluation = await strategy.evaluate(proposal, output, context);
    const verdict = parseVerdict(evaluation.critique);
    const record: RefinementIteration<P, O> = {
      ordinal,
      proposal,
      output,
      critique: evaluation.critique,
      verdict,
    };
    iterations.push(record);

    if (!verdict.recognized) {
      log.warn('Critique carried no sentinel; treating as revise', { iteration: ordinal });
    }

    if (evaluation.halt) {
      stopReason = 'halted';
    } else if (verdict.decision === 'accept') {
      stopReason = 'accepted';
    } else if (ordinal === options.maxIterations) {
      stopReason = 'max-iterations';
    }

    if (stopReason) {
      move(ordinal, LoopPhase.Stopped);
      break;
    }

    move(ordinal, LoopPhase.Revise);
    if (strategy.revise) {
      await strategy.revise(record, verdict);
    }
    move(ordinal, LoopPhase.Propose);
  }

  const last = iterations[iterations.length - 1];
  if (!last || !stopReason) {
    // Unreachable: maxIterations >= 1 guarantees one iteration and a stop decision.
    throw new RangeError('Refinement loop finished without running an iteration');
  }

  log.info('Refinement loop finished', {
    stopReason,
    iterations: iterations.length,
    maxIterations: options.maxIterations,
  });

  return { iterations, stopReason, final: last.output, phases };
}
