/**
 * Deep search agent.
 *
 * Runs the refinement loop with a search query as the proposal: each
 * iteration issues a news and a text search, then asks the generation
 * capability whether enough context has been gathered. A REVISE critique
 * carries the refined query for the next iteration.
 */

import { RefinementIteration, StopReason, Verdict } from '../domain/refinement';
import { RefinementStrategy, runRefinementLoop } from '../engine/refinement-loop';
import { sentinelInstruction } from '../engine/verdict';
import { GenerationCapability } from '../llm';
import { Logger, logger as rootLogger } from '../logger';
import { Orchestrator } from '../runtime/orchestrator';
import { SearchClient, SearchResult } from './search-client';

export const DEEP_SEARCH_ARTIFACT = 'deep_search_summary';
const RESULTS_PER_QUERY = 5;
const MAX_SOURCES = 20;
const SNIPPETS_IN_PROMPT = 5;

/** What one iteration's searches returned. */
export interface SearchRound {
  query: string;
  newsResults: SearchResult[];
  textResults: SearchResult[];
  snippets: string[];
  urls: string[];
}

export interface ItineraryEntry {
  iteration: number;
  query: string;
  newsResults: SearchResult[];
  textResults: SearchResult[];
  critique: string;
}

export interface DeepSearchSummary {
  initialQuery: string;
  itinerary: ItineraryEntry[];
  snippets: string[];
  sources: string[];
  url: string | null;
}

export interface DeepSearchOutcome {
  uid: string;
  iterations: number;
  stopReason: StopReason;
  summary: DeepSearchSummary;
}

export interface DeepSearchOptions {
  maxIterations?: number;
  logger?: Logger;
}

export function snippetsOf(results: SearchResult[]): string[] {
  return results.map((item) => item.body || item.snippet || '').filter((snippet) => snippet.length > 0);
}

export function urlsOf(results: SearchResult[]): string[] {
  return results.map((item) => item.link ?? '').filter((link) => link.length > 0);
}

class DeepSearchStrategy implements RefinementStrategy<string, SearchRound> {
  constructor(
    private currentQuery: string,
    private readonly generation: GenerationCapability,
    private readonly search: SearchClient,
  ) {}

  async propose(): Promise<string> {
    return this.currentQuery;
  }

  async execute(query: string): Promise<SearchRound> {
    const newsResults = await this.search.searchNews(query, RESULTS_PER_QUERY);
    const textResults = await this.search.searchText(query, RESULTS_PER_QUERY);
    const combined = [...newsResults, ...textResults];
    return {
      query,
      newsResults,
      textResults,
      snippets: snippetsOf(combined),
      urls: urlsOf(combined),
    };
  }

  async evaluate(query: string, round: SearchRound): Promise<{ critique: string }> {
    const prompt =
      'You are assisting a financial analyst. Judge whether the snippets below give enough ' +
      'context, or propose a refined search query.\n' +
      `${sentinelInstruction('reason enough context is gathered', 'refined search query')}\n` +
      `Current query: ${query}\n` +
      `Snippets: ${JSON.stringify(round.snippets.slice(0, SNIPPETS_IN_PROMPT))}`;
    return { critique: await this.generation.generate(prompt) };
  }

  revise(_iteration: RefinementIteration<string, SearchRound>, verdict: Verdict): void {
    const refined = verdict.detail.trim();
    if (refined) {
      this.currentQuery = refined;
    }
  }
}

export class DeepSearchAgent {
  readonly name = 'deep_search_agent';
  private readonly maxIterations: number;
  private readonly log: Logger;

  constructor(
    private readonly orchestrator: Orchestrator,
    private readonly generation: GenerationCapability,
    private readonly search: SearchClient,
    options: DeepSearchOptions = {},
  ) {
    this.maxIterations = options.maxIterations ?? 3;
    this.log = options.logger ?? rootLogger.child({ component: 'deep-search' });
  }

  async run(query: string): Promise<DeepSearchOutcome> {
    const strategy = new DeepSearchStrategy(query, this.generation, this.search);
    const result = await runRefinementLoop(strategy, {
      maxIterations: this.maxIterations,
      label: 'deep-search',
      logger: this.log,
    });

    const itinerary = result.iterations.map((it) => ({
      iteration: it.ordinal,
      query: it.output.query,
      newsResults: it.output.newsResults,
      textResults: it.output.textResults,
      critique: it.critique,
    }));
    const snippets = result.iterations.flatMap((it) => it.output.snippets);
    const urls = result.iterations.flatMap((it) => it.output.urls);

    const summary: DeepSearchSummary = {
      initialQuery: query,
      itinerary,
      snippets,
      sources: urls.slice(0, MAX_SOURCES),
      url: urls[0] ?? null,
    };

    const uid = this.orchestrator.registerData(DEEP_SEARCH_ARTIFACT, summary, {
      description: 'Deep search exploration results',
      tags: ['search', 'web'],
      source: this.name,
    });

    return { uid, iterations: result.iterations.length, stopReason: result.stopReason, summary };
  }
}
