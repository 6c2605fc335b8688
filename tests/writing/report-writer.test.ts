import {
  DEFAULT_OUTLINE,
  FINAL_REPORT_ARTIFACT,
  ReportWriter,
  finalRasterOf,
  renderReferencesTable,
  stripReferencesSection,
} from '../../src/writing/report-writer';
import { Perspective } from '../../src/domain/analysis';
import { Orchestrator } from '../../src/runtime/orchestrator';
import { MemoryAuditSink } from '../../src/audit/sinks';
import { ScriptedGeneration, captureLogs, priceTable } from '../helpers/fakes';

const PRICES_URL = 'https://example.com/prices';

describe('stripReferencesSection', () => {
  test('drops the section up to the next heading of the same level', () => {
    const input = ['## Summary', 'Up.', '## References', '- a', '### Detail', '- b', '## Outlook', 'Flat.'].join('\n');
    expect(stripReferencesSection(input)).toBe(['## Summary', 'Up.', '## Outlook', 'Flat.'].join('\n'));
  });

  test('drops a trailing section to the end', () => {
    expect(stripReferencesSection('Body.\n# References\n1. x')).toBe('Body.');
  });

  test('leaves text without a references heading untouched', () => {
    expect(stripReferencesSection('Body.\nReferences are below.')).toBe('Body.\nReferences are below.');
  });
});

describe('finalRasterOf', () => {
  test('reads the last iteration raster', () => {
    expect(finalRasterOf({ iterations: [{ rasterBase64: 'AAA' }, { rasterBase64: 'BBB' }] })).toBe('BBB');
  });

  test('is undefined for anything else', () => {
    expect(finalRasterOf({ iterations: [] })).toBeUndefined();
    expect(finalRasterOf({ iterations: [{ rasterBase64: '' }] })).toBeUndefined();
    expect(finalRasterOf('chart')).toBeUndefined();
  });
});

describe('renderReferencesTable', () => {
  test('escapes cells and links urls', () => {
    const table = renderReferencesTable({
      allowedIds: ['A1', 'B2'],
      lookup: new Map([
        ['A1', { name: 'prices', description: 'open|close', url: 'https://a.example' }],
        ['B2', { name: '', description: 'two\nlines' }],
      ]),
    });

    expect(table).toBe(
      [
        '### References',
        '',
        '| UID | Name | Description | Link |',
        '| :--- | :--- | :--- | :--- |',
        '| A1 | prices | open\\|close | [https://a.example](https://a.example) |',
        '| B2 | B2 | two lines |  |',
      ].join('\n'),
    );
  });
});

describe('ReportWriter', () => {
  let logs: ReturnType<typeof captureLogs>;
  let sink: MemoryAuditSink;
  let orchestrator: Orchestrator;
  let pricesUid: string;
  let perspectives: Perspective[];

  const DRAFT = [
    '# Memo',
    '',
    '## Executive Summary',
    'Revenue grew. [Ref: Z9]',
    '',
    '## References',
    '- old list',
    '',
    '## Outlook',
    'See chart below',
  ].join('\n');

  beforeEach(() => {
    logs = captureLogs();
    sink = new MemoryAuditSink();
    orchestrator = new Orchestrator({ auditSink: sink });
    pricesUid = orchestrator.registerData('prices', priceTable(), { description: 'Daily prices' });
    perspectives = [{ id: 'P-1', focus: 'Growth', narrative: 'Prices rose.', evidenceUids: [pricesUid], resolvedArtifacts: [] }];
  });

  afterEach(() => {
    logs.restore();
  });

  test('reviews citations, replaces the references section and registers the memo', async () => {
    const generation = new ScriptedGeneration({ text: [DRAFT] });

    const report = await new ReportWriter(orchestrator, generation).write({ question: 'Will prices hold?', perspectives });

    expect(report.markdown).toBe(
      [
        '# Memo',
        '',
        '## Executive Summary',
        `Revenue grew. [Ref: P-1](${PRICES_URL})`,
        '',
        '## Outlook',
        'See chart below',
        '',
        '### References',
        '',
        '| UID | Name | Description | Link |',
        '| :--- | :--- | :--- | :--- |',
        `| P-1 | Perspective P-1 | Growth | [${PRICES_URL}](${PRICES_URL}) |`,
        `| ${pricesUid} | prices | Daily prices | [${PRICES_URL}](${PRICES_URL}) |`,
        '',
      ].join('\n'),
    );
    expect(report.review.substitutions).toEqual([{ line: 4, original: 'Z9', replacement: 'P-1' }]);
    expect(report.review.fallbackId).toBe('P-1');

    const artifact = orchestrator.store.get(report.uid);
    expect(artifact.metadata.name).toBe(FINAL_REPORT_ARTIFACT);
    expect(artifact.metadata.tags).toEqual(['report', 'memo']);
    expect(artifact.value).toMatchObject({ markdown: report.markdown, outline: [...DEFAULT_OUTLINE], question: 'Will prices hold?' });
  });

  test('prompt lists the allowed ids and the outline', async () => {
    const generation = new ScriptedGeneration({ text: ['Body.'] });

    await new ReportWriter(orchestrator, generation).write({ question: 'Q', perspectives, outline: ['Summary', 'Risks'] });

    expect(generation.prompts[0]).toContain(`Allowed IDs: ["P-1","${pricesUid}"]`);
    expect(generation.prompts[0]).toContain('Research Question: Q\nOutline: ["Summary","Risks"]');
  });

  test('embeds the final chart raster', async () => {
    const chartUid = orchestrator.registerData('visualization_prices', {
      iterations: [{ rasterBase64: 'AAA' }, { rasterBase64: 'iVBORw==' }],
    });
    const generation = new ScriptedGeneration({ text: ['Body [Ref: P-1].'] });

    const report = await new ReportWriter(orchestrator, generation).write({
      question: 'Q',
      perspectives,
      visualizationUid: chartUid,
    });

    expect(report.markdown).toContain(
      `Body [Ref: P-1](${PRICES_URL}).\n\n### Figure: Final Chart\n\n![Final Chart](data:image/png;base64,iVBORw==)\n\n### References`,
    );
  });

  test('records the review in the audit log', async () => {
    const generation = new ScriptedGeneration({ text: ['Revenue grew.'] });

    await new ReportWriter(orchestrator, generation).write({ question: 'Q', perspectives });

    const [event] = sink.byEvent('self_review');
    expect(event.uid).toBeNull();
    expect(event.payload).toEqual({
      substitutions: [],
      inserted: [{ line: 1, id: 'P-1' }],
      allowedIds: ['P-1', pricesUid],
      fallbackId: 'P-1',
    });
  });
});
