/**
 * Chain compiler — turns a chain of analysis into citable perspectives.
 */

import { ChainStep, Perspective, ResolvedArtifact } from '../domain/analysis';
import { GenerationCapability } from '../llm';
import { PerspectiveDraft, PerspectivesSchema } from '../llm/schemas';
import { ArtifactStore } from '../storage/artifact-store';
import { Orchestrator } from '../runtime/orchestrator';
import { Chain } from './chain';

export const PERSPECTIVES_ARTIFACT = 'chain_of_analysis_perspectives';

export interface CompiledPerspectives {
  perspectives: readonly Perspective[];
  uid: string;
}

function resolveArtifact(store: ArtifactStore, uid: string): ResolvedArtifact {
  if (!store.has(uid)) {
    return { uid, name: 'UNKNOWN', kind: 'unknown', description: '' };
  }
  const { metadata } = store.get(uid);
  return { uid, name: metadata.name, kind: metadata.kind, description: metadata.description };
}

/**
 * Give every draft a unique id. A draft without an id, or repeating one
 * already taken, gets `P-<position>`.
 */
export function assignPerspectiveIds(drafts: readonly PerspectiveDraft[]): string[] {
  const taken = new Set<string>();
  return drafts.map((draft, index) => {
    const requested = draft.id?.trim();
    let id = requested && !taken.has(requested) ? requested : `P-${index + 1}`;
    let suffix = 1;
    while (taken.has(id)) {
      id = `P-${index + 1}.${suffix++}`;
    }
    taken.add(id);
    return id;
  });
}

function summarizeSteps(steps: readonly ChainStep[]): unknown[] {
  return steps.map((s) => ({
    step: s.ordinal,
    focus: s.focus,
    code: s.code,
    stdout: s.stdout,
    success: s.success,
    insights: s.insights,
    evidence_uids: s.evidenceUids,
  }));
}

export class ChainCompiler {
  readonly name = 'chain_compiler';

  constructor(
    private readonly orchestrator: Orchestrator,
    private readonly generation: GenerationCapability,
  ) {}

  async compile(chain: Chain, question: string): Promise<CompiledPerspectives> {
    const store = this.orchestrator.store;
    const prompt =
      'You are the chain-of-analysis compiler.\n' +
      'Given the raw analytical steps, produce structured perspectives.\n' +
      'Respond with JSON containing: perspectives (list of {id, focus, narrative, evidence_uids}).\n' +
      'evidence_uids must be uids from the chain steps or the artifact snapshot.\n' +
      `Research Question: ${question}\n` +
      `Chain Steps: ${JSON.stringify(summarizeSteps(chain.steps))}\n` +
      `Artifact Snapshot: ${store.renderSnapshot()}`;

    const drafts = await this.generation.generateStructured(prompt, PerspectivesSchema, 'chain.perspectives');
    const ids = assignPerspectiveIds(drafts);

    const perspectives = drafts.map((draft, index): Perspective => {
      const evidenceUids = [...new Set(draft.evidence_uids)];
      return Object.freeze({
        id: ids[index],
        focus: draft.focus ?? '',
        narrative: draft.narrative ?? '',
        evidenceUids: Object.freeze(evidenceUids),
        resolvedArtifacts: Object.freeze(evidenceUids.map((uid) => Object.freeze(resolveArtifact(store, uid)))),
      });
    });
    const frozen = Object.freeze(perspectives);

    const uid = this.orchestrator.registerData(PERSPECTIVES_ARTIFACT, frozen, {
      description: 'Structured perspectives from chain-of-analysis',
      tags: ['chain_of_analysis'],
      source: this.name,
    });
    return { perspectives: frozen, uid };
  }
}
