/**
 * GenerationClient — the generation capability over a provider adapter.
 *
 * Text calls fail with GenerationError when the provider returns nothing.
 * Structured calls run the JSON parsing chain, validate against the call
 * site's schema and, when `maxAttempts` > 1, re-prompt with a corrective
 * instruction before giving up with ParseError.
 */

import { GenerationError, ParseError, maskSecretsInMessage } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import {
  GenerationCapability,
  LLMAdapter,
  LLMRawResponse,
  OutputSchema,
  PromptPart,
  ResponseFormatConfig,
  cleanLLMResponse,
  describeSchemaIssues,
  textPart,
} from './index';

export interface GenerationClientOptions {
  adapter: LLMAdapter;
  apiKey: string;
  model: string;
  baseUrl?: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  /** Structured-output attempts, including the first (default: 1). */
  maxAttempts?: number;
  /** Base delay in ms for exponential backoff between attempts (default: 1000). */
  backoffBaseMs?: number;
  logger?: Logger;
}

const CORRECTIVE_INSTRUCTION =
  'Your previous response was not valid JSON for the requested shape. ' +
  'Respond with ONLY a valid JSON value: no markdown fencing, no trailing commas, ' +
  'no unescaped newlines in strings.';

export class GenerationClient implements GenerationCapability {
  private readonly maxAttempts: number;
  private readonly backoffBaseMs: number;
  private readonly log: Logger;

  constructor(private readonly options: GenerationClientOptions) {
    this.maxAttempts = options.maxAttempts ?? 1;
    this.backoffBaseMs = options.backoffBaseMs ?? 1000;
    this.log = options.logger ?? rootLogger.child({ component: 'generation-client', model: options.model });
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
    }
  }

  async generate(prompt: string): Promise<string> {
    return this.generateText([textPart(prompt)]);
  }

  async generateWithAttachment(parts: PromptPart[]): Promise<string> {
    return this.generateText(parts);
  }

  async generateStructured<T>(prompt: string, schema: OutputSchema<T>, callSite: string): Promise<T> {
    let lastError: ParseError | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const parts = [textPart(prompt)];
      if (lastError) {
        parts.push(textPart(CORRECTIVE_INSTRUCTION));
      }

      const response = await this.call(parts, { type: 'json_object' });
      try {
        return this.validate(response.content, schema, callSite, attempt);
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        lastError = err;
        this.log.warn('Structured output rejected', {
          callSite,
          attempt,
          maxAttempts: this.maxAttempts,
          reason: err.message,
        });
        if (attempt < this.maxAttempts) {
          await sleep(this.backoffBaseMs * Math.pow(2, attempt - 1));
        }
      }
    }

    if (lastError && this.maxAttempts === 1) throw lastError;
    throw new ParseError(
      `Structured output for ${callSite} still invalid after ${this.maxAttempts} attempts`,
      lastError?.rawResponse ?? '',
      callSite,
      this.maxAttempts,
    );
  }

  private validate<T>(content: string, schema: OutputSchema<T>, callSite: string, attempt: number): T {
    const parsed = cleanLLMResponse(content, callSite);
    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new ParseError(
        `Model response for ${callSite} does not match the expected shape: ${describeSchemaIssues(result.error.issues)}`,
        content,
        callSite,
        attempt,
      );
    }
    return result.data;
  }

  private async generateText(parts: PromptPart[]): Promise<string> {
    const response = await this.call(parts, undefined);
    if (!response.content.trim()) {
      throw new GenerationError(
        `Model returned no text (finish_reason=${response.finishReason ?? 'unknown'})`,
        { finishReason: response.finishReason },
      );
    }
    return response.content;
  }

  private async call(parts: PromptPart[], responseFormat: ResponseFormatConfig | undefined): Promise<LLMRawResponse> {
    try {
      return await this.options.adapter({
        model: this.options.model,
        parts,
        systemPrompt: this.options.systemPrompt,
        apiKey: this.options.apiKey,
        baseUrl: this.options.baseUrl,
        maxTokens: this.options.maxTokens,
        temperature: this.options.temperature,
        responseFormat,
      });
    } catch (err) {
      if (err instanceof GenerationError) throw err;
      const message = maskSecretsInMessage(
        `Generation provider call failed: ${err instanceof Error ? err.message : String(err)}`,
        [this.options.apiKey],
      );
      throw new GenerationError(message, { statusCode: 0 });
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
