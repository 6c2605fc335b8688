/**
 * Artifact domain model.
 *
 * An artifact is a named, typed value held in the store and addressed by an
 * opaque uid. Names are not unique; uids are assigned once and never reused.
 */

/** What an artifact holds. */
export type ArtifactKind = 'data' | 'tool' | 'agent';

export const ARTIFACT_KINDS: readonly ArtifactKind[] = ['data', 'tool', 'agent'];

/** Artifact metadata. Timestamps are ISO-8601 strings. */
export interface ArtifactMetadata {
  name: string;
  kind: ArtifactKind;
  description: string;
  tags: string[];
  /** Provenance: which collaborator or agent produced the current value. */
  source?: string;
  createdAt: string;
  updatedAt: string;
}

/** A uid-addressed value in the store. */
export interface Artifact<T = unknown> {
  readonly uid: string;
  metadata: ArtifactMetadata;
  value: T;
}

/** Serializable view of one artifact, as produced by a store snapshot. */
export interface ArtifactSnapshotEntry {
  metadata: {
    name: string;
    kind: ArtifactKind;
    description: string;
    source: string | null;
    tags: string[];
    createdAt: string;
    updatedAt: string;
  };
  value: unknown;
}

/** uid → snapshot entry, in registration order. */
export type StoreSnapshot = Record<string, ArtifactSnapshotEntry>;

export function isArtifactKind(value: string): value is ArtifactKind {
  return ARTIFACT_KINDS.some((kind) => kind === value);
}

// ─── Payload conventions ────────────────────────────────────────────────────
// Collaborators (market data, filings, search) hand the core opaque payloads.
// The core only relies on the declared kind, column names and citation URL.

/** Tabular payload: rows plus a shape descriptor. */
export interface TabularPayload {
  kind: 'table';
  columns: string[];
  shape: [rows: number, cols: number];
  rows: unknown;
  sourceUrl?: string;
}

/** Textual payload such as a filing excerpt. */
export interface TextPayload {
  kind: 'text';
  content: string;
  sourceUrl?: string;
  metadata?: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isTabularPayload(value: unknown): value is TabularPayload {
  return (
    isRecord(value) &&
    value.kind === 'table' &&
    Array.isArray(value.columns) &&
    value.columns.every((c) => typeof c === 'string') &&
    Array.isArray(value.shape) &&
    value.shape.length === 2
  );
}

export function isTextPayload(value: unknown): value is TextPayload {
  return isRecord(value) && value.kind === 'text' && typeof value.content === 'string';
}

/** The URL a citation of this value should link to, if it declares one. */
export function citationUrlOf(value: unknown): string | undefined {
  if (!isRecord(value)) return undefined;
  for (const key of ['sourceUrl', 'url']) {
    const candidate = value[key];
    if (typeof candidate === 'string' && candidate.length > 0) return candidate;
  }
  return undefined;
}
