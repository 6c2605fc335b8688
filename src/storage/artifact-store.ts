/**
 * In-memory artifact store (the "variable space").
 *
 * One instance per run, passed explicitly to every component that needs it.
 * Single-writer: a port that runs agents in parallel must serialize access to
 * the uid map before sharing an instance.
 */

import { v4 as uuid } from 'uuid';
import {
  Artifact,
  ArtifactKind,
  ArtifactMetadata,
  ArtifactSnapshotEntry,
  StoreSnapshot,
} from '../domain/artifact';
import { CollisionError, NotFoundError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { toPreviewText, toSerializable } from './serialize';

export type Clock = () => Date;

/** Input for creating a new artifact record. */
export interface CreateArtifactInput<T = unknown> {
  name: string;
  kind: ArtifactKind;
  value: T;
  description?: string;
  tags?: string[];
  source?: string;
}

export interface ArtifactStoreOptions {
  clock?: Clock;
  logger?: Logger;
}

/** Build an artifact with a fresh uid. Registration is a separate step. */
export function createArtifact<T>(input: CreateArtifactInput<T>, clock: Clock = () => new Date()): Artifact<T> {
  const now = clock().toISOString();
  return {
    uid: `art_${uuid()}`,
    metadata: {
      name: input.name,
      kind: input.kind,
      description: input.description ?? '',
      tags: [...(input.tags ?? [])],
      source: input.source,
      createdAt: now,
      updatedAt: now,
    },
    value: input.value,
  };
}

function copyRecord<T>(artifact: Artifact<T>): Artifact<T> {
  return {
    uid: artifact.uid,
    metadata: { ...artifact.metadata, tags: [...artifact.metadata.tags] },
    value: artifact.value,
  };
}

export class ArtifactStore {
  private readonly records = new Map<string, Artifact>();
  /** name → uids in registration order. */
  private readonly nameIndex = new Map<string, string[]>();
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: ArtifactStoreOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.log = options.logger ?? rootLogger.child({ component: 'artifact-store' });
  }

  get size(): number {
    return this.records.size;
  }

  /** Create and register in one step. */
  create<T>(input: CreateArtifactInput<T>): Artifact<T> {
    const artifact = createArtifact(input, this.clock);
    this.register(artifact);
    return copyRecord(artifact);
  }

  /**
   * Register an artifact under its uid.
   * @throws CollisionError if the uid is already present.
   */
  register(artifact: Artifact): string {
    if (this.records.has(artifact.uid)) {
      throw new CollisionError(artifact.uid);
    }
    this.records.set(artifact.uid, copyRecord(artifact));

    const uids = this.nameIndex.get(artifact.metadata.name) ?? [];
    uids.push(artifact.uid);
    this.nameIndex.set(artifact.metadata.name, uids);

    this.log.debug('Artifact registered', {
      uid: artifact.uid,
      name: artifact.metadata.name,
      kind: artifact.metadata.kind,
    });
    return artifact.uid;
  }

  has(uid: string): boolean {
    return this.records.has(uid);
  }

  /**
   * Look up an artifact. The returned record is a copy; its value is the
   * registered value itself.
   * @throws NotFoundError if the uid was never registered.
   */
  get(uid: string): Artifact {
    return copyRecord(this.require(uid));
  }

  /** Replace a value in place; the uid never changes and updatedAt never goes backwards. */
  update(uid: string, value: unknown, source?: string): Artifact {
    const record = this.require(uid);
    record.value = value;
    if (source) {
      record.metadata.source = source;
    }
    record.metadata.updatedAt = this.nextTimestamp(record.metadata.updatedAt);

    this.log.debug('Artifact updated', { uid, source: record.metadata.source });
    return copyRecord(record);
  }

  /** Every artifact with this exact name, in registration order. */
  findByName(name: string): Artifact[] {
    const uids = this.nameIndex.get(name) ?? [];
    return uids.map((uid) => copyRecord(this.require(uid)));
  }

  /** All artifacts, optionally of one kind, in registration order. */
  list(kind?: ArtifactKind): Artifact[] {
    const items = [...this.records.values()];
    return (kind ? items.filter((a) => a.metadata.kind === kind) : items).map(copyRecord);
  }

  /**
   * Serializable view uid → { metadata, value } in registration order.
   * Values without a JSON shape degrade to a string form instead of failing.
   */
  snapshot(kind?: ArtifactKind): StoreSnapshot {
    const out: StoreSnapshot = {};
    for (const artifact of this.records.values()) {
      if (kind && artifact.metadata.kind !== kind) continue;
      out[artifact.uid] = snapshotEntry(artifact);
    }
    return out;
  }

  /**
   * Serializable view of a single artifact.
   * @throws NotFoundError if the uid was never registered.
   */
  entry(uid: string): ArtifactSnapshotEntry {
    return snapshotEntry(this.require(uid));
  }

  /** Stable JSON text of the snapshot for prompt context, each value capped at `maxValueChars`. */
  renderSnapshot(maxValueChars = 2000): string {
    const entries: string[] = [];
    for (const artifact of this.records.values()) {
      const meta = JSON.stringify(snapshotMetadata(artifact.metadata));
      entries.push(
        `${JSON.stringify(artifact.uid)}: {"metadata": ${meta}, "value": ${toPreviewText(artifact.value, maxValueChars)}}`,
      );
    }
    return `{${entries.join(', ')}}`;
  }

  private require(uid: string): Artifact {
    const record = this.records.get(uid);
    if (!record) {
      throw new NotFoundError(uid);
    }
    return record;
  }

  private nextTimestamp(previous: string): string {
    const now = this.clock().getTime();
    const prev = Date.parse(previous);
    return new Date(Math.max(now, Number.isNaN(prev) ? now : prev)).toISOString();
  }
}

function snapshotEntry(artifact: Artifact): ArtifactSnapshotEntry {
  return {
    metadata: snapshotMetadata(artifact.metadata),
    value: toSerializable(artifact.value),
  };
}

function snapshotMetadata(metadata: ArtifactMetadata): ArtifactSnapshotEntry['metadata'] {
  return {
    name: metadata.name,
    kind: metadata.kind,
    description: metadata.description,
    source: metadata.source ?? null,
    tags: [...metadata.tags],
    createdAt: metadata.createdAt,
    updatedAt: metadata.updatedAt,
  };
}
