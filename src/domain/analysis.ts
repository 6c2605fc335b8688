/**
 * Chain-of-analysis domain model.
 *
 * A chain is the ordered record of an analysis run; perspectives are the
 * citable narratives compiled from it. Both are immutable once appended.
 */

import { ArtifactKind } from './artifact';
import { ExecutionFault } from './errors';

export interface ChainStep {
  /** 1-based position in the chain. */
  readonly ordinal: number;
  readonly focus: string;
  readonly code: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly success: boolean;
  readonly fault: ExecutionFault | null;
  readonly insights: readonly string[];
  /** Unique, in insertion order. */
  readonly evidenceUids: readonly string[];
}

/** How a perspective's evidence uid resolved against the store. */
export interface ResolvedArtifact {
  uid: string;
  name: string;
  kind: ArtifactKind | 'unknown';
  description: string;
}

export interface Perspective {
  /** Citable id, `P-<n>` unless the compiler supplied a unique one. */
  readonly id: string;
  readonly focus: string;
  readonly narrative: string;
  readonly evidenceUids: readonly string[];
  readonly resolvedArtifacts: readonly ResolvedArtifact[];
}
