import { ChainCompiler, PERSPECTIVES_ARTIFACT, assignPerspectiveIds } from '../../src/analysis/chain-compiler';
import { Chain, ChainStepDraft } from '../../src/analysis/chain';
import { Orchestrator } from '../../src/runtime/orchestrator';
import { ScriptedGeneration, captureLogs } from '../helpers/fakes';

describe('assignPerspectiveIds', () => {
  test('keeps unique ids and numbers the rest by position', () => {
    expect(assignPerspectiveIds([{ id: 'P-1', evidence_uids: [] }, { evidence_uids: [] }, { id: 'P-1', evidence_uids: [] }])).toEqual([
      'P-1',
      'P-2',
      'P-3',
    ]);
  });

  test('suffixes a positional id that is already taken', () => {
    expect(assignPerspectiveIds([{ id: 'P-2', evidence_uids: [] }, { evidence_uids: [] }])).toEqual(['P-2', 'P-2.1']);
  });

  test('blank ids count as missing', () => {
    expect(assignPerspectiveIds([{ id: '  ', evidence_uids: [] }])).toEqual(['P-1']);
  });
});

describe('ChainCompiler', () => {
  let logs: ReturnType<typeof captureLogs>;
  let orchestrator: Orchestrator;
  let pricesUid: string;
  let chain: Chain;

  beforeEach(() => {
    logs = captureLogs();
    orchestrator = new Orchestrator();
    pricesUid = orchestrator.registerData('prices', [10, 20, 30], { description: 'Daily prices' });
    chain = new Chain();
    chain.append(
      new ChainStepDraft({ ordinal: 1, focus: 'Average', code: 'console.log(20)', stdout: '20\n', stderr: '', fault: null })
        .addInsight('Average price is 20')
        .addEvidence(pricesUid),
    );
  });

  afterEach(() => {
    logs.restore();
  });

  test('compiles perspectives with resolved evidence', async () => {
    const generation = new ScriptedGeneration({
      structured: [
        {
          perspectives: [
            { id: 'P-1', focus: 'Growth', narrative: 'Prices rose.', evidence_uids: [pricesUid, pricesUid, 'art_ghost'] },
            { focus: 'Risk' },
          ],
        },
      ],
    });

    const { perspectives } = await new ChainCompiler(orchestrator, generation).compile(chain, 'Will prices hold?');

    expect(perspectives).toEqual([
      {
        id: 'P-1',
        focus: 'Growth',
        narrative: 'Prices rose.',
        evidenceUids: [pricesUid, 'art_ghost'],
        resolvedArtifacts: [
          { uid: pricesUid, name: 'prices', kind: 'data', description: 'Daily prices' },
          { uid: 'art_ghost', name: 'UNKNOWN', kind: 'unknown', description: '' },
        ],
      },
      { id: 'P-2', focus: 'Risk', narrative: '', evidenceUids: [], resolvedArtifacts: [] },
    ]);
  });

  test('perspectives are frozen', async () => {
    const generation = new ScriptedGeneration({ structured: [[{ id: 'X', evidence_uids: [pricesUid] }]] });

    const { perspectives } = await new ChainCompiler(orchestrator, generation).compile(chain, 'q');

    expect(Object.isFrozen(perspectives)).toBe(true);
    expect(Object.isFrozen(perspectives[0])).toBe(true);
    expect(Object.isFrozen(perspectives[0].evidenceUids)).toBe(true);
    expect(Object.isFrozen(perspectives[0].resolvedArtifacts[0])).toBe(true);
  });

  test('prompt carries the question and the chain steps', async () => {
    const generation = new ScriptedGeneration({ structured: [{ perspectives: [] }] });

    await new ChainCompiler(orchestrator, generation).compile(chain, 'Will prices hold?');

    expect(generation.structuredCalls[0].callSite).toBe('chain.perspectives');
    const prompt = generation.structuredCalls[0].prompt;
    expect(prompt).toContain('Research Question: Will prices hold?');
    expect(prompt).toContain(
      `Chain Steps: [{"step":1,"focus":"Average","code":"console.log(20)","stdout":"20\\n","success":true,` +
        `"insights":["Average price is 20"],"evidence_uids":["${pricesUid}"]}]`,
    );
  });

  test('registers the perspectives artifact', async () => {
    const generation = new ScriptedGeneration({ structured: [{ perspectives: [{ id: 'P-1' }] }] });

    const { uid, perspectives } = await new ChainCompiler(orchestrator, generation).compile(chain, 'q');

    const artifact = orchestrator.store.get(uid);
    expect(artifact.metadata.name).toBe(PERSPECTIVES_ARTIFACT);
    expect(artifact.metadata.tags).toEqual(['chain_of_analysis']);
    expect(artifact.value).toBe(perspectives);
  });
});
