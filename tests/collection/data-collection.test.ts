import { CollectedArtifact, CollectionRequest, DataCollectionAgent, DataCollector } from '../../src/collection/data-collection';
import { Orchestrator } from '../../src/runtime/orchestrator';
import { MemoryAuditSink } from '../../src/audit/sinks';
import { captureLogs, priceTable } from '../helpers/fakes';

class StaticCollector implements DataCollector {
  readonly requests: CollectionRequest[] = [];

  constructor(
    readonly name: string,
    private readonly items: CollectedArtifact[],
  ) {}

  async collect(request: CollectionRequest): Promise<CollectedArtifact[]> {
    this.requests.push(request);
    return this.items;
  }
}

describe('DataCollectionAgent', () => {
  let logs: ReturnType<typeof captureLogs>;

  beforeEach(() => {
    logs = captureLogs();
  });

  afterEach(() => {
    logs.restore();
  });

  test('registers every collected payload as data', async () => {
    const sink = new MemoryAuditSink();
    const orchestrator = new Orchestrator({ auditSink: sink });
    const market = new StaticCollector('market_data', [
      { name: 'prices', value: priceTable(), description: 'Daily prices', tags: ['market'] },
    ]);
    const filings = new StaticCollector('filings', [{ name: 'annual_report', value: 'text', source: 'sec' }]);
    const request = { companyName: 'Acme', ticker: 'ACME' };

    const uids = await new DataCollectionAgent(orchestrator, [market, filings]).run(request);

    expect(Object.keys(uids)).toEqual(['prices', 'annual_report']);
    expect(market.requests).toEqual([request]);
    expect(orchestrator.store.get(uids.prices).metadata).toMatchObject({
      name: 'prices',
      kind: 'data',
      description: 'Daily prices',
      tags: ['market'],
      source: 'market_data',
    });
    expect(orchestrator.store.get(uids.annual_report).metadata.source).toBe('sec');
    expect(sink.byEvent('register_data')).toHaveLength(2);
    expect(logs.entries.filter((e) => e.message === 'Collector finished').map((e) => e.context?.collector)).toEqual([
      'market_data',
      'filings',
    ]);
  });

  test('a later artifact with the same name wins the mapping', async () => {
    const orchestrator = new Orchestrator();
    const first = new StaticCollector('a', [{ name: 'prices', value: 1 }]);
    const second = new StaticCollector('b', [{ name: 'prices', value: 2 }]);

    const uids = await new DataCollectionAgent(orchestrator, [first, second]).run({ companyName: 'Acme', ticker: 'ACME' });

    expect(orchestrator.store.get(uids.prices).value).toBe(2);
    expect(orchestrator.store.findByName('prices')).toHaveLength(2);
  });

  test('no collectors collect nothing', async () => {
    const orchestrator = new Orchestrator();
    await expect(new DataCollectionAgent(orchestrator, []).run({ companyName: 'Acme', ticker: 'ACME' })).resolves.toEqual({});
    expect(orchestrator.store.size).toBe(0);
  });
});
