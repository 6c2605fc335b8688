/**
 * Audit sinks.
 *
 * JsonlAuditSink appends one JSON document per line to a local file, so each
 * line parses on its own and the file is only ever appended to.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { AuditRecord, AuditSink } from '../domain/audit';

export class JsonlAuditSink implements AuditSink {
  constructor(public readonly path: string) {
    mkdirSync(dirname(path), { recursive: true });
  }

  append(record: AuditRecord): void {
    appendFileSync(this.path, `${JSON.stringify(record)}\n`, 'utf8');
  }
}

/** Keeps records in memory; used by tests and the inspection API. */
export class MemoryAuditSink implements AuditSink {
  readonly records: AuditRecord[] = [];

  append(record: AuditRecord): void {
    this.records.push(record);
  }

  byEvent(event: string): AuditRecord[] {
    return this.records.filter((r) => r.event === event);
  }
}
