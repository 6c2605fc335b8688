/**
 * Analysis stepper.
 *
 * The refinement loop with generated code as the proposal. Each iteration
 * asks for the next script, runs it in the sandbox with the store bound, and
 * appends a chain step. Evaluation is deterministic: a fault halts the run,
 * a proposal marked complete is accepted, anything else continues.
 */

import { ArtifactStore } from '../storage/artifact-store';
import { SandboxResult, Bindings } from '../sandbox/sandbox';
import { ChainStep } from '../domain/analysis';
import { StopReason } from '../domain/refinement';
import { Evaluation, RefinementContext, RefinementStrategy, runRefinementLoop } from '../engine/refinement-loop';
import { formatVerdict } from '../engine/verdict';
import { GenerationCapability } from '../llm';
import { AnalysisProposal, AnalysisProposalSchema } from '../llm/schemas';
import { Logger, logger as rootLogger } from '../logger';
import { Orchestrator } from '../runtime/orchestrator';
import { Chain, ChainStepDraft } from './chain';

export const ANALYSIS_CHAIN_ARTIFACT = 'analysis_chain';

export interface AnalysisStepLog {
  step: number;
  prompt: string;
  plan: AnalysisProposal;
  stdout: string;
  stderr: string;
  success: boolean;
}

export interface AnalysisOutcome {
  chain: Chain;
  uid: string;
  stopReason: StopReason;
  stepLogs: AnalysisStepLog[];
}

export interface AnalysisStepperOptions {
  maxSteps?: number;
  /** Extra bindings for every script, on top of `store` and `tools`. */
  bindings?: Bindings;
  /** Per-value character budget for the store snapshot in prompts. */
  snapshotValueChars?: number;
  logger?: Logger;
}

interface StepOutput {
  execution: SandboxResult;
  step: ChainStep;
}

/** Resolve evidence entries (uids or artifact names) to uids; unknown entries are dropped. */
export function resolveEvidence(store: ArtifactStore, entries: readonly string[]): string[] {
  const uids: string[] = [];
  for (const entry of entries) {
    const matches = store.has(entry) ? [entry] : store.findByName(entry).map((a) => a.uid);
    for (const uid of matches) {
      if (!uids.includes(uid)) uids.push(uid);
    }
  }
  return uids;
}

function basePrompt(goal: string): string {
  return (
    'You are the analysis agent operating in a code-first environment.\n' +
    'Given the current artifact snapshot, propose JavaScript that advances the analysis goal.\n' +
    'The script runs once with `store` bound (get(uid), findByName(name), list(), snapshot()) and ' +
    '`tools` bound to the registered tools. Report findings with console.log.\n' +
    `Analysis goal: ${goal}\n` +
    'Return JSON with fields: focus (string), code (string), commentary (list of insights), ' +
    'evidence (list of artifact names or uids), complete (true once the goal is reached).'
  );
}

class AnalysisStrategy implements RefinementStrategy<AnalysisProposal, StepOutput> {
  readonly chain = new Chain();
  readonly stepLogs: AnalysisStepLog[] = [];
  private lastPrompt = '';

  constructor(
    private readonly goal: string,
    private readonly orchestrator: Orchestrator,
    private readonly generation: GenerationCapability,
    private readonly options: AnalysisStepperOptions,
  ) {}

  async propose(context: RefinementContext<AnalysisProposal, StepOutput>): Promise<AnalysisProposal> {
    let prompt =
      `${basePrompt(this.goal)}\n` +
      `Current memory: ${this.orchestrator.store.renderSnapshot(this.options.snapshotValueChars)}`;
    if (context.previous) {
      prompt +=
        `\nPrevious step stdout: ${context.previous.output.execution.stdout}` +
        `\nPrevious insights: ${JSON.stringify(context.previous.output.step.insights)}`;
    }
    this.lastPrompt = prompt;
    return this.generation.generateStructured(prompt, AnalysisProposalSchema, 'analysis.proposal');
  }

  async execute(
    proposal: AnalysisProposal,
    context: RefinementContext<AnalysisProposal, StepOutput>,
  ): Promise<StepOutput> {
    const execution = this.orchestrator.executeAgentCode(proposal.code, this.options.bindings);

    const draft = new ChainStepDraft({
      ordinal: context.iteration,
      focus: proposal.focus ?? `Step ${context.iteration}`,
      code: proposal.code,
      stdout: execution.stdout,
      stderr: execution.stderr,
      fault: execution.fault,
    });
    proposal.commentary.forEach((insight) => draft.addInsight(insight));
    resolveEvidence(this.orchestrator.store, proposal.evidence).forEach((uid) => draft.addEvidence(uid));
    const step = this.chain.append(draft);

    this.stepLogs.push({
      step: context.iteration,
      prompt: this.lastPrompt,
      plan: proposal,
      stdout: execution.stdout,
      stderr: execution.stderr,
      success: execution.success,
    });
    return { execution, step };
  }

  async evaluate(proposal: AnalysisProposal, output: StepOutput): Promise<Evaluation> {
    const { fault } = output.execution;
    if (fault) {
      return { critique: formatVerdict('revise', `execution fault: ${fault.name}: ${fault.message}`), halt: true };
    }
    if (proposal.complete) {
      return { critique: formatVerdict('accept', 'analysis goal reached') };
    }
    return { critique: formatVerdict('revise', 'continue the analysis') };
  }
}

export class AnalysisStepper {
  readonly name = 'analysis_stepper';
  private readonly maxSteps: number;
  private readonly log: Logger;

  constructor(
    private readonly orchestrator: Orchestrator,
    private readonly generation: GenerationCapability,
    private readonly options: AnalysisStepperOptions = {},
  ) {
    this.maxSteps = options.maxSteps ?? 5;
    this.log = options.logger ?? rootLogger.child({ component: 'analysis-stepper' });
  }

  async run(goal: string): Promise<AnalysisOutcome> {
    const strategy = new AnalysisStrategy(goal, this.orchestrator, this.generation, this.options);
    const result = await runRefinementLoop(strategy, {
      maxIterations: this.maxSteps,
      label: 'analysis',
      logger: this.log,
    });

    const uid = this.orchestrator.registerData(
      ANALYSIS_CHAIN_ARTIFACT,
      {
        goal,
        steps: strategy.chain.toJSON(),
        stopReason: result.stopReason,
        stepLogs: strategy.stepLogs,
      },
      {
        description: `Chain of analysis for: ${goal}`,
        tags: ['analysis', 'chain_of_analysis'],
        source: this.name,
      },
    );

    return { chain: strategy.chain, uid, stopReason: result.stopReason, stepLogs: strategy.stepLogs };
  }
}
