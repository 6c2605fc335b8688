/**
 * Audit Trail Service.
 *
 * Builds audit records and hands them to the configured sink. Without a
 * sink, recording is a no-op.
 */

import { AuditEventName, AuditRecord, AuditSink } from '../domain/audit';
import { toSerializable } from '../storage/serialize';

export class AuditService {
  constructor(
    private readonly sink?: AuditSink,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  get enabled(): boolean {
    return this.sink !== undefined;
  }

  /** Record an audit event. Returns the record written, or null when there is no sink. */
  record(event: AuditEventName, uid: string | null, payload: Record<string, unknown> = {}): AuditRecord | null {
    if (!this.sink) return null;
    const record: AuditRecord = {
      event,
      uid,
      payload: toPayload(payload),
      timestamp: this.clock().toISOString(),
    };
    this.sink.append(record);
    return record;
  }
}

function toPayload(payload: Record<string, unknown>): Record<string, unknown> {
  const converted = toSerializable(payload);
  if (typeof converted === 'object' && converted !== null && !Array.isArray(converted)) {
    return { ...converted };
  }
  return { value: converted };
}
