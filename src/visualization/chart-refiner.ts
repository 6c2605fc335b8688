/**
 * Chart refinement agent.
 *
 * The refinement loop with a ChartSpec as the proposal: render, ask for a
 * critique of the rendered chart, and fold REVISE feedback into the spec
 * through the feedback rule table. A failed render is still critiqued.
 */

import { PayloadShapeError, describeError } from '../domain/errors';
import { TabularPayload, isTabularPayload } from '../domain/artifact';
import { RefinementIteration, StopReason } from '../domain/refinement';
import { RefinementContext, RefinementStrategy, runRefinementLoop } from '../engine/refinement-loop';
import { sentinelInstruction } from '../engine/verdict';
import { GenerationCapability, PromptPart, inlinePart, textPart } from '../llm';
import { Logger, logger as rootLogger } from '../logger';
import { Orchestrator } from '../runtime/orchestrator';
import { ChartSpec, RenderOutcome, Renderer, cloneChartSpec, createChartSpec } from './chart-spec';
import { DEFAULT_FEEDBACK_RULES, FeedbackRule, applyFeedback } from './feedback-rules';

export interface VisualizationIterationRecord {
  iteration: number;
  spec: ChartSpec;
  canonical: string;
  rasterBase64: string;
  renderError?: string;
  critique: string;
  /** Rule ids the critique triggered; empty when it was not applied. */
  matchedRules: string[];
}

export interface VisualizationResult {
  tableUid: string;
  iterations: VisualizationIterationRecord[];
  finalSpec: ChartSpec;
  stopReason: StopReason;
}

export interface ChartRefinementOutcome {
  uid: string;
  iterations: number;
  stopReason: StopReason;
  result: VisualizationResult;
}

export interface ChartRefinementOptions {
  maxIterations?: number;
  rules?: readonly FeedbackRule[];
  logger?: Logger;
}

export function visualizationArtifactName(tableName: string): string {
  return `visualization_${tableName}`;
}

const CRITIC_INSTRUCTIONS =
  'You are the visualization critic. Evaluate the chart against the stated goal.\n' +
  sentinelInstruction('short justification', 'bullet list with actionable changes');

class ChartRefinementStrategy implements RefinementStrategy<ChartSpec, RenderOutcome> {
  readonly matchedRules = new Map<number, string[]>();
  private current: ChartSpec;

  constructor(
    initial: ChartSpec,
    private readonly table: TabularPayload,
    private readonly goal: string,
    private readonly renderer: Renderer,
    private readonly generation: GenerationCapability,
    private readonly rules: readonly FeedbackRule[],
  ) {
    this.current = cloneChartSpec(initial);
  }

  async propose(): Promise<ChartSpec> {
    return cloneChartSpec(this.current);
  }

  async execute(spec: ChartSpec): Promise<RenderOutcome> {
    try {
      const rendered = await this.renderer.render(this.table, spec);
      return { canonical: rendered.canonical, raster: rendered.raster };
    } catch (err) {
      return { canonical: '', raster: new Uint8Array(0), error: describeError(err).message };
    }
  }

  async evaluate(
    spec: ChartSpec,
    output: RenderOutcome,
    context: RefinementContext<ChartSpec, RenderOutcome>,
  ): Promise<{ critique: string }> {
    const parts: PromptPart[] = [
      textPart(CRITIC_INSTRUCTIONS),
      textPart(`Iteration: ${context.iteration}`),
      textPart(`Goal: ${this.goal}`),
      textPart(`Current Spec: ${JSON.stringify(spec)}`),
    ];
    if (output.raster.length > 0) {
      parts.push(inlinePart('image/png', output.raster));
    } else if (output.error) {
      parts.push(textPart(`The chart could not be rendered: ${output.error}`));
    } else {
      parts.push(textPart(`Rendered figure: ${output.canonical}`));
    }
    return { critique: await this.generation.generateWithAttachment(parts) };
  }

  revise(iteration: RefinementIteration<ChartSpec, RenderOutcome>): void {
    const applied = applyFeedback(iteration.proposal, iteration.critique, this.rules);
    this.matchedRules.set(iteration.ordinal, applied.matchedRules);
    this.current = applied.spec;
  }
}

export class ChartRefinementAgent {
  readonly name = 'chart_refinement_agent';
  private readonly maxIterations: number;
  private readonly rules: readonly FeedbackRule[];
  private readonly log: Logger;

  constructor(
    private readonly orchestrator: Orchestrator,
    private readonly generation: GenerationCapability,
    private readonly renderer: Renderer,
    options: ChartRefinementOptions = {},
  ) {
    this.maxIterations = options.maxIterations ?? 3;
    this.rules = options.rules ?? DEFAULT_FEEDBACK_RULES;
    this.log = options.logger ?? rootLogger.child({ component: 'chart-refinement' });
  }

  /**
   * @throws NotFoundError if `tableUid` is not in the store
   * @throws PayloadShapeError if it does not hold a table
   */
  async run(tableUid: string, spec: Partial<ChartSpec>, goal: string): Promise<ChartRefinementOutcome> {
    const artifact = this.orchestrator.store.get(tableUid);
    if (!isTabularPayload(artifact.value)) {
      throw new PayloadShapeError(tableUid, 'table');
    }

    const strategy = new ChartRefinementStrategy(
      createChartSpec(spec),
      artifact.value,
      goal,
      this.renderer,
      this.generation,
      this.rules,
    );
    const loop = await runRefinementLoop(strategy, {
      maxIterations: this.maxIterations,
      label: 'chart-refinement',
      logger: this.log,
    });

    const iterations = loop.iterations.map((it) => ({
      iteration: it.ordinal,
      spec: it.proposal,
      canonical: it.output.canonical,
      rasterBase64: Buffer.from(it.output.raster).toString('base64'),
      ...(it.output.error ? { renderError: it.output.error } : {}),
      critique: it.critique,
      matchedRules: strategy.matchedRules.get(it.ordinal) ?? [],
    }));
    const last = loop.iterations[loop.iterations.length - 1];

    const result: VisualizationResult = {
      tableUid,
      iterations,
      finalSpec: last.proposal,
      stopReason: loop.stopReason,
    };
    const uid = this.orchestrator.registerData(visualizationArtifactName(artifact.metadata.name), result, {
      description: `Visualization refinements for ${artifact.metadata.name}`,
      tags: ['visualization', 'chart'],
      source: this.name,
    });

    return { uid, iterations: iterations.length, stopReason: loop.stopReason, result };
  }
}
