/**
 * Typed error model.
 *
 * Every failure the runtime raises carries a machine-readable TypedError so
 * callers (and the audit log) can act on the code rather than the message.
 * Sandbox faults are the exception: they are reported as ExecutionFault
 * records on the sandbox result and never thrown.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain = 'STORE' | 'GENERATION' | 'SEARCH' | 'SANDBOX' | 'LOOP' | 'CONFIG' | 'VALIDATION' | 'SYSTEM';

/** Typed suggested fix that a caller can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "STORE.NOT_FOUND"). */
  code: string;
  message: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** A fault raised by sandboxed code, captured rather than propagated. */
export interface ExecutionFault {
  name: string;
  message: string;
  stack?: string;
}

// ─── Error classes ──────────────────────────────────────────────────────────

/** Lookup of a uid that was never registered. */
export class NotFoundError extends Error {
  public readonly typedError: TypedError;

  constructor(public readonly uid: string) {
    super(`Artifact not found: ${uid}`);
    this.name = 'NotFoundError';
    this.typedError = createTypedError({
      code: 'STORE.NOT_FOUND',
      message: this.message,
      details: { uid },
    });
  }
}

/** Registration of a uid that is already present. */
export class CollisionError extends Error {
  public readonly typedError: TypedError;

  constructor(public readonly uid: string) {
    super(`Artifact uid collision: ${uid}`);
    this.name = 'CollisionError';
    this.typedError = createTypedError({
      code: 'STORE.COLLISION',
      message: this.message,
      details: { uid },
      suggestedFixes: [
        { type: 'REGENERATE_UID', params: {}, description: 'Create the artifact again with createArtifact() to obtain a fresh uid' },
      ],
    });
  }
}

/** The generation capability returned no usable output or failed outright. */
export class GenerationError extends Error {
  public readonly typedError: TypedError;
  public readonly finishReason?: string;
  public readonly statusCode?: number;

  constructor(message: string, options: { finishReason?: string; statusCode?: number } = {}) {
    super(message);
    this.name = 'GenerationError';
    this.finishReason = options.finishReason;
    this.statusCode = options.statusCode;
    const providerFailure = options.statusCode !== undefined;
    this.typedError = createTypedError({
      code: providerFailure ? 'GENERATION.PROVIDER' : 'GENERATION.EMPTY',
      message,
      retryable: providerFailure
        ? options.statusCode === 429 || (options.statusCode ?? 0) >= 500
        : true,
      details: { finishReason: options.finishReason, statusCode: options.statusCode },
      suggestedFixes: providerFailure
        ? [
            { type: 'CHECK_API_KEY', params: {} },
            { type: 'WAIT_AND_RETRY', params: { delayMs: 2000 } },
          ]
        : [{ type: 'RETRY_WITH_SIMPLER_PROMPT', params: {} }],
    });
  }
}

/** Structured output from the generation capability was malformed. */
export class ParseError extends Error {
  public readonly typedError: TypedError;

  constructor(
    message: string,
    public readonly rawResponse: string,
    public readonly callSite: string,
    public readonly attempts: number = 1,
  ) {
    super(message);
    this.name = 'ParseError';
    this.typedError = createTypedError({
      code: 'GENERATION.PARSE',
      message,
      retryable: true,
      details: {
        callSite,
        rawResponsePreview: rawResponse.slice(0, 500),
        attempts,
      },
      suggestedFixes: [
        { type: 'RETRY_WITH_SIMPLER_PROMPT', params: {} },
        { type: 'REDUCE_OUTPUT_COMPLEXITY', params: {} },
      ],
    });
  }
}

/** The web search provider failed or answered with an error status. */
export class SearchError extends Error {
  public readonly typedError: TypedError;

  constructor(message: string, public readonly statusCode?: number) {
    super(message);
    this.name = 'SearchError';
    this.typedError = createTypedError({
      code: 'SEARCH.PROVIDER',
      message,
      retryable: statusCode === undefined || statusCode === 429 || statusCode >= 500,
      details: { statusCode },
      suggestedFixes: [{ type: 'CHECK_API_KEY', params: {} }],
    });
  }
}

/** An artifact value does not have the payload shape a component requires. */
export class PayloadShapeError extends Error {
  public readonly typedError: TypedError;

  constructor(public readonly uid: string, expected: string) {
    super(`Artifact ${uid} does not hold a ${expected} payload`);
    this.name = 'PayloadShapeError';
    this.typedError = createTypedError({
      code: 'VALIDATION.PAYLOAD_SHAPE',
      message: this.message,
      details: { uid, expected },
    });
  }
}

/** Required external credentials or capabilities are missing or invalid. */
export class ConfigurationError extends Error {
  public readonly typedError: TypedError;

  constructor(message: string, public readonly keys: string[]) {
    super(message);
    this.name = 'ConfigurationError';
    this.typedError = createTypedError({
      code: 'CONFIG.INVALID',
      message,
      details: { keys },
      suggestedFixes: keys.map((key) => ({
        type: 'PROVIDE_SETTING',
        params: { key },
        description: `Provide a valid value for "${key}"`,
      })),
    });
  }
}

/** The TypedError carried by one of the runtime's error classes, if `err` is one. */
export function typedErrorOf(err: unknown): TypedError | undefined {
  if (
    err instanceof NotFoundError ||
    err instanceof CollisionError ||
    err instanceof GenerationError ||
    err instanceof ParseError ||
    err instanceof SearchError ||
    err instanceof PayloadShapeError ||
    err instanceof ConfigurationError
  ) {
    return err.typedError;
  }
  return undefined;
}

/**
 * String form of any value. Objects without a usable conversion (a null
 * prototype, a throwing toString) get their `[object Tag]` form instead.
 */
export function safeString(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/** Render any caught value as a name/message pair for logs and audit payloads. Never throws. */
export function describeError(err: unknown): { name: string; message: string } {
  if (err instanceof Error) return { name: err.name, message: err.message };
  if (typeof err === 'object' && err !== null) {
    const name = 'name' in err && typeof err.name === 'string' ? err.name : 'Error';
    const message = 'message' in err && typeof err.message === 'string' ? err.message : safeString(err);
    return { name, message };
  }
  return { name: 'Error', message: safeString(err) };
}

// ─── Secret masking ─────────────────────────────────────────────────────────

/**
 * Mask a secret value, preserving only the last 4 characters.
 * Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** Replace every occurrence of the given secrets in a message with their masked form. */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
