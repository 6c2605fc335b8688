/**
 * Execution sandbox for generated code.
 *
 * Runs a script once, synchronously, in a fresh vm context whose globals are
 * the caller's bindings plus an explicit allow-list of host capabilities.
 * console output is captured into the result instead of reaching the host
 * streams, and anything the script throws comes back as an ExecutionFault.
 *
 * Only synchronous completion is reported in `fault`/`success`. When the
 * script's completion value is a promise, its rejection is caught and
 * delivered through `asyncFault`; it never reaches the host as an unhandled
 * rejection.
 *
 * This is advisory isolation only. The script shares the host process and
 * can reach host objects through any binding it is handed; running untrusted
 * code needs a separate process or container with resource limits.
 */

import { Script, createContext } from 'vm';
import { format } from 'util';
import { ExecutionFault, describeError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';

export type Bindings = Record<string, unknown>;

export interface SandboxResult {
  /**
   * Globals after the run: the initial bindings (possibly reassigned) plus
   * whatever the script declared with `var`/`function` or assigned to
   * `globalThis`. Script-scoped `let`/`const` are not visible.
   */
  bindings: Bindings;
  stdout: string;
  stderr: string;
  fault: ExecutionFault | null;
  success: boolean;
  timedOut: boolean;
  durationMs: number;
  /**
   * Rejection of a promise the script completed with, once it settles; null
   * when it fulfils or the completion value was not a promise.
   */
  asyncFault: Promise<ExecutionFault | null>;
}

export interface SandboxOptions {
  /** Host capabilities exposed to every script, by global name. */
  capabilities?: Bindings;
  /** Wall-clock limit for synchronous execution. Unset means no limit. */
  timeoutMs?: number;
  /** Script filename used in fault stacks. */
  filename?: string;
  logger?: Logger;
}

const RESERVED_GLOBALS = new Set(['console']);

interface CapturedStreams {
  stdout: string[];
  stderr: string[];
}

function createCapturedConsole(streams: CapturedStreams): Bindings {
  const write = (target: string[]) => (...args: unknown[]): void => {
    target.push(`${format(...args)}\n`);
  };
  return {
    log: write(streams.stdout),
    info: write(streams.stdout),
    debug: write(streams.stdout),
    warn: write(streams.stderr),
    error: write(streams.stderr),
  };
}

// Errors thrown inside the context come from another realm and fail
// `instanceof Error`, so read their fields structurally.
function toFault(err: unknown): ExecutionFault {
  const { name, message } = describeError(err);
  const stack =
    typeof err === 'object' && err !== null && 'stack' in err && typeof err.stack === 'string'
      ? err.stack
      : undefined;
  return stack ? { name, message, stack } : { name, message };
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

function isTimeout(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT';
}

export class ExecutionSandbox {
  private readonly capabilities: Bindings;
  private readonly timeoutMs?: number;
  private readonly filename: string;
  private readonly log: Logger;

  constructor(options: SandboxOptions = {}) {
    this.capabilities = { ...(options.capabilities ?? {}) };
    this.timeoutMs = options.timeoutMs;
    this.filename = options.filename ?? 'agent-code.js';
    this.log = options.logger ?? rootLogger.child({ component: 'sandbox' });

    for (const name of Object.keys(this.capabilities)) {
      if (RESERVED_GLOBALS.has(name)) {
        throw new RangeError(`"${name}" is reserved and cannot be exposed as a capability`);
      }
    }
  }

  /** Names of the host capabilities every script sees. */
  get capabilityNames(): string[] {
    return Object.keys(this.capabilities);
  }

  run(code: string, initialBindings: Bindings = {}): SandboxResult {
    const streams: CapturedStreams = { stdout: [], stderr: [] };
    const sandbox: Bindings = {
      ...this.capabilities,
      ...initialBindings,
      console: createCapturedConsole(streams),
    };
    const context = createContext(sandbox);

    const started = Date.now();
    let fault: ExecutionFault | null = null;
    let timedOut = false;
    let asyncFault: Promise<ExecutionFault | null> = Promise.resolve(null);
    try {
      const script = new Script(code, { filename: this.filename });
      const completion: unknown = script.runInContext(
        context,
        this.timeoutMs !== undefined ? { timeout: this.timeoutMs } : {},
      );
      if (isThenable(completion)) {
        asyncFault = this.watchCompletion(completion);
      }
    } catch (err) {
      fault = toFault(err);
      timedOut = isTimeout(err);
    }
    const durationMs = Date.now() - started;

    const bindings: Bindings = {};
    // createContext contextifies `sandbox` in place; script globals land on it.
    for (const [name, value] of Object.entries(sandbox)) {
      if (RESERVED_GLOBALS.has(name)) continue;
      if (name in this.capabilities && !(name in initialBindings) && value === this.capabilities[name]) continue;
      bindings[name] = value;
    }

    if (fault) {
      this.log.warn('Sandboxed code raised', { fault: fault.name, message: fault.message, timedOut });
    }

    return {
      bindings,
      stdout: streams.stdout.join(''),
      stderr: streams.stderr.join(''),
      fault,
      success: fault === null,
      timedOut,
      durationMs,
      asyncFault,
    };
  }

  private watchCompletion(completion: PromiseLike<unknown>): Promise<ExecutionFault | null> {
    return Promise.resolve(
      completion.then(
        () => null,
        (err: unknown) => {
          const fault = toFault(err);
          this.log.warn('Sandboxed code rejected after completion', { fault: fault.name, message: fault.message });
          return fault;
        },
      ),
    );
  }
}
