/**
 * Orchestrator — owns one run's store, tool table, sandbox and audit trail.
 *
 * Every registration and code execution goes through here so the audit log
 * sees it. Components that only read the store may take the store directly.
 */

import { Artifact } from '../domain/artifact';
import { AuditEventName, AuditRecord, AuditSink } from '../domain/audit';
import { AuditService } from '../audit/audit-service';
import { ArtifactStore, Clock } from '../storage/artifact-store';
import { Bindings, ExecutionSandbox, SandboxResult } from '../sandbox/sandbox';
import { Logger, logger as rootLogger } from '../logger';

/** Any callable a script may invoke through the `tools` binding. */
export type ToolFunction = (...args: never[]) => unknown;

export interface OrchestratorOptions {
  store?: ArtifactStore;
  sandbox?: ExecutionSandbox;
  /** Audit destination. Without one, audit recording is a no-op. */
  auditSink?: AuditSink;
  clock?: Clock;
  logger?: Logger;
}

export interface RegisterDataOptions {
  description?: string;
  source?: string;
  tags?: string[];
}

export class Orchestrator {
  readonly store: ArtifactStore;
  readonly sandbox: ExecutionSandbox;
  readonly audit: AuditService;
  private readonly tools = new Map<string, ToolFunction>();
  private readonly log: Logger;

  constructor(options: OrchestratorOptions = {}) {
    this.log = options.logger ?? rootLogger.child({ component: 'orchestrator' });
    this.store = options.store ?? new ArtifactStore({ clock: options.clock, logger: this.log.child({ component: 'artifact-store' }) });
    this.sandbox = options.sandbox ?? new ExecutionSandbox({ logger: this.log.child({ component: 'sandbox' }) });
    this.audit = new AuditService(options.auditSink, options.clock);
  }

  /** Register a data artifact. */
  registerData(name: string, value: unknown, options: RegisterDataOptions = {}): string {
    const artifact = this.store.create({
      name,
      kind: 'data',
      value,
      description: options.description,
      source: options.source,
      tags: options.tags,
    });
    this.audit.record('register_data', artifact.uid, {
      name,
      description: options.description ?? '',
      source: options.source ?? null,
      tags: options.tags ?? [],
    });
    return artifact.uid;
  }

  /** Register a tool artifact and expose it to scripts under `tools[name]`. */
  registerTool(name: string, fn: ToolFunction, description = ''): string {
    const artifact = this.store.create({ name, kind: 'tool', value: fn, description });
    this.tools.set(name, fn);
    this.audit.record('register_tool', artifact.uid, metadataPayload(artifact));
    return artifact.uid;
  }

  /** Register an agent artifact. */
  registerAgent(name: string, agent: unknown, description = ''): string {
    const artifact = this.store.create({ name, kind: 'agent', value: agent, description });
    this.audit.record('register_agent', artifact.uid, metadataPayload(artifact));
    return artifact.uid;
  }

  /** Replace an artifact's value in place. */
  updateData(uid: string, value: unknown, source?: string): Artifact {
    const updated = this.store.update(uid, value, source);
    this.audit.record('update_data', uid, {
      name: updated.metadata.name,
      source: updated.metadata.source ?? null,
      updatedAt: updated.metadata.updatedAt,
    });
    return updated;
  }

  /** Record a free-form audit event. */
  recordEvent(event: AuditEventName, uid: string | null, payload: Record<string, unknown> = {}): AuditRecord | null {
    return this.audit.record(event, uid, payload);
  }

  /** Snapshot of the tool table. */
  toolTable(): Record<string, ToolFunction> {
    return Object.fromEntries(this.tools);
  }

  /**
   * Run a script in the sandbox with `store` and `tools` bound, plus any
   * extra bindings. Faults come back on the result; nothing is thrown.
   */
  executeAgentCode(code: string, context: Bindings = {}): SandboxResult {
    const result = this.sandbox.run(code, {
      store: this.store,
      tools: this.toolTable(),
      ...context,
    });
    this.audit.record('execute_agent_code', null, {
      code,
      stdout: result.stdout,
      stderr: result.stderr,
      success: result.success,
      fault: result.fault,
      durationMs: result.durationMs,
    });
    this.log.debug('Agent code executed', { success: result.success, durationMs: result.durationMs });
    return result;
  }
}

function metadataPayload(artifact: Artifact): Record<string, unknown> {
  return {
    name: artifact.metadata.name,
    kind: artifact.metadata.kind,
    description: artifact.metadata.description,
    tags: artifact.metadata.tags,
  };
}
