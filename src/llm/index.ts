/**
 * Generation capability — contracts and resilient JSON parsing.
 *
 * The core never runs inference. It talks to an opaque capability that
 * returns text, or a structured value checked against a per-call-site
 * schema. Models frequently return slightly malformed JSON (trailing commas,
 * unescaped control characters, markdown fencing), so structured output goes
 * through several layers:
 *
 * Layer 1: API-level constraint (JSON response mode where the provider has one)
 * Layer 2: Repair (fix common JSON mistakes before parsing)
 * Layer 3: Schema validation at the call site, with optional re-prompting
 */

import { ZodType, ZodTypeDef } from 'zod';
import { ParseError } from '../domain/errors';

// ─── Types ──────────────────────────────────────────────────────────────────

/** One piece of a prompt: text, or inline binary data such as a PNG. */
export type PromptPart =
  | { type: 'text'; text: string }
  | { type: 'inline'; mimeType: string; data: Uint8Array };

/** Response from a raw provider call. */
export interface LLMRawResponse {
  content: string;
  finishReason?: string;
  usage?: { promptTokens?: number; completionTokens?: number; totalTokens?: number };
}

/** Configuration for response format constraint. */
export interface ResponseFormatConfig {
  type: 'json_object' | 'text';
}

/** Options for the underlying provider call (used by adapters). */
export interface LLMCallOptions {
  model: string;
  parts: PromptPart[];
  systemPrompt?: string;
  apiKey: string;
  baseUrl?: string;
  maxTokens?: number;
  temperature?: number;
  responseFormat?: ResponseFormatConfig;
}

/**
 * Adapter function type for calling a provider.
 * Implementations handle the HTTP call to the specific provider API and
 * raise GenerationError (with a status code) on provider failure.
 */
export type LLMAdapter = (options: LLMCallOptions) => Promise<LLMRawResponse>;

/** Schema for one call site's output; its input side is whatever the model sent. */
export type OutputSchema<T> = ZodType<T, ZodTypeDef, unknown>;

/** The capability every producer depends on. */
export interface GenerationCapability {
  /** @throws GenerationError when no text comes back. */
  generate(prompt: string): Promise<string>;
  /**
   * @param callSite - label used in errors and logs, e.g. "analysis.proposal"
   * @throws ParseError when the output is not JSON or does not match the schema.
   */
  generateStructured<T>(prompt: string, schema: OutputSchema<T>, callSite: string): Promise<T>;
  /** @throws GenerationError when no text comes back. */
  generateWithAttachment(parts: PromptPart[]): Promise<string>;
}

export function textPart(text: string): PromptPart {
  return { type: 'text', text };
}

export function inlinePart(mimeType: string, data: Uint8Array): PromptPart {
  return { type: 'inline', mimeType, data };
}

// ─── JSON Repair ────────────────────────────────────────────────────────────

/**
 * Repair common JSON mistakes:
 * 1. Trailing commas before } or ]
 * 2. Unescaped control characters (newlines, tabs, carriage returns) inside strings
 */
export function repairJSON(raw: string): string {
  let result = raw.replace(/,\s*([}\]])/g, '$1');
  result = escapeControlCharsInStrings(result);
  return result;
}

/** Escape control characters found inside string values, leaving structure alone. */
function escapeControlCharsInStrings(json: string): string {
  const chars: string[] = [];
  let inString = false;
  let escaped = false;

  for (const ch of json) {
    if (escaped) {
      chars.push(ch);
      escaped = false;
      continue;
    }
    if (ch === '\\' && inString) {
      chars.push(ch);
      escaped = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      chars.push(ch);
      continue;
    }
    const code = ch.charCodeAt(0);
    if (inString && code < 0x20) {
      switch (ch) {
        case '\n': chars.push('\\n'); break;
        case '\r': chars.push('\\r'); break;
        case '\t': chars.push('\\t'); break;
        case '\b': chars.push('\\b'); break;
        case '\f': chars.push('\\f'); break;
        default:
          chars.push('\\u' + code.toString(16).padStart(4, '0'));
          break;
      }
      continue;
    }
    chars.push(ch);
  }

  return chars.join('');
}

// ─── JSON Extraction ────────────────────────────────────────────────────────

/**
 * Extract and parse JSON from a model response.
 *
 * 1. Strips markdown code fences (```json ... ```)
 * 2. Tries JSON.parse() directly
 * 3. Finds the outermost JSON object {...} or array [...]
 * 4. Applies repairJSON() and retries
 *
 * @throws ParseError when nothing parses
 */
export function cleanLLMResponse(raw: string, callSite = 'unknown'): unknown {
  let cleaned = raw.trim();

  const fenceMatch = cleaned.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  if (fenceMatch) {
    cleaned = fenceMatch[1].trim();
  }

  try {
    return JSON.parse(cleaned);
  } catch {
    // fall through to extraction
  }

  const jsonStr = extractOutermostJSON(cleaned);
  if (!jsonStr) {
    throw new ParseError('No JSON object or array found in model response', raw, callSite);
  }

  try {
    return JSON.parse(jsonStr);
  } catch {
    // fall through to repair
  }

  try {
    return JSON.parse(repairJSON(jsonStr));
  } catch (err) {
    throw new ParseError(
      `Failed to parse model response as JSON: ${err instanceof Error ? err.message : 'unknown error'}`,
      raw,
      callSite,
    );
  }
}

/**
 * Extract the outermost JSON object or array from a string by tracking
 * bracket depth. Prefers whichever bracket type appears first.
 */
export function extractOutermostJSON(text: string): string | null {
  const objIdx = text.indexOf('{');
  const arrIdx = text.indexOf('[');

  const candidates: Array<[string, string]> = [];
  if (objIdx !== -1 && arrIdx !== -1) {
    if (arrIdx < objIdx) {
      candidates.push(['[', ']'], ['{', '}']);
    } else {
      candidates.push(['{', '}'], ['[', ']']);
    }
  } else if (objIdx !== -1) {
    candidates.push(['{', '}']);
  } else if (arrIdx !== -1) {
    candidates.push(['[', ']']);
  }

  for (const [open, close] of candidates) {
    const startIdx = text.indexOf(open);
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = startIdx; i < text.length; i++) {
      const ch = text[i];
      if (escaped) {
        escaped = false;
        continue;
      }
      if (ch === '\\' && inString) {
        escaped = true;
        continue;
      }
      if (ch === '"') {
        inString = !inString;
        continue;
      }
      if (inString) continue;
      if (ch === open) depth++;
      else if (ch === close) {
        depth--;
        if (depth === 0) {
          return text.slice(startIdx, i + 1);
        }
      }
    }
  }

  return null;
}

/** Render zod issues as one line for error messages. */
export function describeSchemaIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
