/**
 * Research pipeline.
 *
 * One run, one store: collection → deep search → analysis stepping →
 * chain compilation → optional chart refinement → report writing.
 */

import { AnalysisStepper } from '../analysis/analysis-stepper';
import { ChainCompiler } from '../analysis/chain-compiler';
import { JsonlAuditSink } from '../audit/sinks';
import { CollectionRequest, DataCollectionAgent, DataCollector } from '../collection/data-collection';
import { Config } from '../config';
import { AuditSink } from '../domain/audit';
import { NotFoundError } from '../domain/errors';
import { StopReason } from '../domain/refinement';
import { GenerationCapability } from '../llm';
import { createGeminiAdapter } from '../llm/adapters/gemini';
import { GenerationClient } from '../llm/generation-client';
import { Logger, logger as rootLogger } from '../logger';
import { Orchestrator } from '../runtime/orchestrator';
import { DeepSearchAgent } from '../search/deep-search';
import { SearchClient, SerperSearchClient } from '../search/search-client';
import { Clock } from '../storage/artifact-store';
import { ChartRefinementAgent } from '../visualization/chart-refiner';
import { ChartSpec, Renderer } from '../visualization/chart-spec';
import { FigureJsonRenderer } from '../visualization/figure-renderer';
import { ReviewRecord } from '../writing/self-review';
import { ReportWriter } from '../writing/report-writer';

export interface PipelineCollaborators {
  generation: GenerationCapability;
  search: SearchClient;
  collectors: readonly DataCollector[];
  /** Without a renderer the chart stage is skipped. */
  renderer?: Renderer;
  auditSink?: AuditSink;
  clock?: Clock;
  logger?: Logger;
}

export interface PipelineSettings {
  analysisMaxSteps: number;
  searchMaxIterations: number;
  chartMaxIterations: number;
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  analysisMaxSteps: 5,
  searchMaxIterations: 3,
  chartMaxIterations: 3,
};

export interface ChartRequest {
  /** Name of a collected table artifact. */
  tableName: string;
  spec: Partial<ChartSpec>;
  goal: string;
}

export interface ResearchRequest extends CollectionRequest {
  question: string;
  analysisGoal: string;
  chart?: ChartRequest;
  outline?: readonly string[];
}

export interface ResearchResult {
  /** The run's own orchestrator; its store holds every artifact listed below. */
  orchestrator: Orchestrator;
  /** Collected artifact name → uid. */
  collected: Record<string, string>;
  deepSearchUid: string;
  analysisUid: string;
  perspectivesUid: string;
  visualizationUid?: string;
  reportUid: string;
  markdown: string;
  review: ReviewRecord;
  stopReasons: {
    search: StopReason;
    analysis: StopReason;
    chart?: StopReason;
  };
}

export class ResearchPipeline {
  private readonly settings: PipelineSettings;
  private readonly log: Logger;

  constructor(
    private readonly collaborators: PipelineCollaborators,
    settings: Partial<PipelineSettings> = {},
  ) {
    this.settings = { ...DEFAULT_PIPELINE_SETTINGS, ...settings };
    this.log = collaborators.logger ?? rootLogger.child({ component: 'research-pipeline' });
  }

  /** A fresh orchestrator, with its own empty store, wired to this pipeline's audit sink and clock. */
  createOrchestrator(): Orchestrator {
    return new Orchestrator({
      auditSink: this.collaborators.auditSink,
      clock: this.collaborators.clock,
      logger: this.log.child({ component: 'orchestrator' }),
    });
  }

  /**
   * Run every stage against one orchestrator. Without one, the run gets a
   * fresh orchestrator so runs never see each other's artifacts; pass one
   * from createOrchestrator() to inspect its store while the run is going.
   *
   * @throws NotFoundError if the chart request names a table that was not collected
   */
  async run(request: ResearchRequest, orchestrator: Orchestrator = this.createOrchestrator()): Promise<ResearchResult> {
    const { generation, search, collectors, renderer } = this.collaborators;
    this.log.info('Research run started', { companyName: request.companyName, ticker: request.ticker });

    const collected = await new DataCollectionAgent(orchestrator, collectors, this.log.child({ component: 'data-collection' })).run(request);

    const searchOutcome = await new DeepSearchAgent(orchestrator, generation, search, {
      maxIterations: this.settings.searchMaxIterations,
      logger: this.log.child({ component: 'deep-search' }),
    }).run(`${request.companyName} latest developments`);

    const analysis = await new AnalysisStepper(orchestrator, generation, {
      maxSteps: this.settings.analysisMaxSteps,
      logger: this.log.child({ component: 'analysis-stepper' }),
    }).run(request.analysisGoal);

    const compiled = await new ChainCompiler(orchestrator, generation).compile(analysis.chain, request.question);

    let visualizationUid: string | undefined;
    let chartStop: StopReason | undefined;
    if (request.chart && renderer) {
      const tableUid = collected[request.chart.tableName];
      if (!tableUid) {
        throw new NotFoundError(request.chart.tableName);
      }
      const chart = await new ChartRefinementAgent(orchestrator, generation, renderer, {
        maxIterations: this.settings.chartMaxIterations,
        logger: this.log.child({ component: 'chart-refinement' }),
      }).run(tableUid, request.chart.spec, request.chart.goal);
      visualizationUid = chart.uid;
      chartStop = chart.stopReason;
    } else if (request.chart) {
      this.log.warn('Chart requested but no renderer configured; skipping', { tableName: request.chart.tableName });
    }

    const extraUids = [searchOutcome.uid, ...Object.values(collected)];
    const report = await new ReportWriter(orchestrator, generation, this.log.child({ component: 'report-writer' })).write({
      question: request.question,
      perspectives: compiled.perspectives,
      outline: request.outline,
      visualizationUid,
      extraUids,
    });

    this.log.info('Research run finished', { reportUid: report.uid, artifacts: orchestrator.store.size });

    return {
      orchestrator,
      collected,
      deepSearchUid: searchOutcome.uid,
      analysisUid: analysis.uid,
      perspectivesUid: compiled.uid,
      ...(visualizationUid ? { visualizationUid } : {}),
      reportUid: report.uid,
      markdown: report.markdown,
      review: report.review,
      stopReasons: {
        search: searchOutcome.stopReason,
        analysis: analysis.stopReason,
        ...(chartStop ? { chart: chartStop } : {}),
      },
    };
  }
}

/**
 * Build a pipeline on the Gemini and Serper clients from a loaded configuration.
 *
 * The default FigureJsonRenderer produces the canonical figure only, with no
 * raster, so the memo gets no embedded chart image unless a rasterizing
 * renderer is passed.
 */
export function createResearchPipeline(
  config: Config,
  collectors: readonly DataCollector[],
  renderer: Renderer = new FigureJsonRenderer(),
): ResearchPipeline {
  const generation = new GenerationClient({
    adapter: createGeminiAdapter(),
    apiKey: config.generation.apiKey,
    model: config.generation.model,
    maxAttempts: config.generation.maxAttempts,
  });
  return new ResearchPipeline(
    {
      generation,
      search: new SerperSearchClient({ apiKey: config.search.apiKey }),
      collectors,
      renderer,
      auditSink: config.auditLogPath ? new JsonlAuditSink(config.auditLogPath) : undefined,
    },
    config.loops,
  );
}
