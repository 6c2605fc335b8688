/**
 * Data collection boundary.
 *
 * Collectors (market data, filings, macro series) are external; they hand
 * back opaque payloads that the agent registers as data artifacts.
 */

import { Logger, logger as rootLogger } from '../logger';
import { Orchestrator } from '../runtime/orchestrator';

export interface CollectionRequest {
  companyName: string;
  ticker: string;
  parameters?: Record<string, unknown>;
}

export interface CollectedArtifact {
  name: string;
  value: unknown;
  description?: string;
  tags?: string[];
  /** Provenance; defaults to the collector's name. */
  source?: string;
}

export interface DataCollector {
  readonly name: string;
  collect(request: CollectionRequest): Promise<CollectedArtifact[]>;
}

export class DataCollectionAgent {
  readonly name = 'data_collection_agent';
  private readonly log: Logger;

  constructor(
    private readonly orchestrator: Orchestrator,
    private readonly collectors: readonly DataCollector[],
    logger?: Logger,
  ) {
    this.log = logger ?? rootLogger.child({ component: 'data-collection' });
  }

  /**
   * Run every collector in order and register what it returns.
   * @returns artifact name → uid; a later artifact with the same name wins.
   */
  async run(request: CollectionRequest): Promise<Record<string, string>> {
    const uids: Record<string, string> = {};
    for (const collector of this.collectors) {
      const collected = await collector.collect(request);
      for (const item of collected) {
        uids[item.name] = this.orchestrator.registerData(item.name, item.value, {
          description: item.description,
          tags: item.tags,
          source: item.source ?? collector.name,
        });
      }
      this.log.info('Collector finished', { collector: collector.name, artifacts: collected.length });
    }
    return uids;
  }
}
