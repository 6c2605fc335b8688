/**
 * Audit trail domain model.
 *
 * Append-only records of what the orchestrator did during a run, one record
 * per event. Records are never rewritten.
 */

/** Events the runtime itself emits. Callers may record their own names too. */
export type AuditEventName =
  | 'register_data'
  | 'register_tool'
  | 'register_agent'
  | 'update_data'
  | 'execute_agent_code'
  | 'self_review'
  | (string & {});

export interface AuditRecord {
  event: AuditEventName;
  /** Artifact the event concerns, when there is one. */
  uid: string | null;
  /** JSON-safe event payload. */
  payload: Record<string, unknown>;
  timestamp: string;
}

/** Destination for audit records. Appends are synchronous and in order. */
export interface AuditSink {
  append(record: AuditRecord): void;
}
