/**
 * Reference index: which ids a report may cite, and what each id points at.
 */

import { citationUrlOf } from '../domain/artifact';
import { Perspective } from '../domain/analysis';
import { ArtifactStore } from '../storage/artifact-store';
import { ReferenceEntry } from './self-review';

export interface ReferenceIndex {
  /** Sorted by UTF-16 code units. */
  allowedIds: string[];
  lookup: Map<string, ReferenceEntry>;
}

function artifactEntry(store: ArtifactStore, uid: string): ReferenceEntry {
  const artifact = store.get(uid);
  const url = citationUrlOf(artifact.value);
  return {
    name: artifact.metadata.name,
    description: artifact.metadata.description,
    ...(url ? { url } : {}),
  };
}

/**
 * Allowed ids are the perspectives' evidence uids and `extraUids` that are
 * actually in the store, plus every perspective id. A perspective inherits
 * the URL of its first evidence artifact that has one.
 */
export function buildReferenceIndex(
  store: ArtifactStore,
  perspectives: readonly Perspective[],
  extraUids: readonly string[] = [],
): ReferenceIndex {
  const lookup = new Map<string, ReferenceEntry>();

  const candidates = [...perspectives.flatMap((p) => p.evidenceUids), ...extraUids];
  for (const uid of candidates) {
    if (!lookup.has(uid) && store.has(uid)) {
      lookup.set(uid, artifactEntry(store, uid));
    }
  }

  for (const perspective of perspectives) {
    const inherited = perspective.evidenceUids
      .map((uid) => lookup.get(uid)?.url)
      .find((url): url is string => Boolean(url));
    lookup.set(perspective.id, {
      name: `Perspective ${perspective.id}`,
      description: perspective.focus || 'Perspective',
      ...(inherited ? { url: inherited } : {}),
    });
  }

  return { allowedIds: [...lookup.keys()].sort(), lookup };
}
