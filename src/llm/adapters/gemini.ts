/**
 * Gemini adapter — calls the Generative Language `generateContent` endpoint.
 *
 * Default base URL: https://generativelanguage.googleapis.com/v1beta
 *
 * Usage:
 *   const client = new GenerationClient({
 *     adapter: createGeminiAdapter(),
 *     apiKey: config.generation.apiKey,
 *     model: 'gemini-flash-latest',
 *   });
 */

import { z } from 'zod';
import { GenerationError, maskSecretsInMessage } from '../../domain/errors';
import { LLMCallOptions, LLMRawResponse, PromptPart } from '../index';

export const GEMINI_DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

type GeminiPart = { text: string } | { inlineData: { mimeType: string; data: string } };

/** generateContent request body. */
interface GeminiRequest {
  contents: Array<{ role: 'user'; parts: GeminiPart[] }>;
  systemInstruction?: { parts: Array<{ text: string }> };
  generationConfig: {
    temperature?: number;
    maxOutputTokens?: number;
    responseMimeType?: string;
  };
}

/** The subset of the generateContent response the adapter reads. */
const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).default([]) })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .default([]),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
});

function toGeminiPart(part: PromptPart): GeminiPart {
  if (part.type === 'text') return { text: part.text };
  return { inlineData: { mimeType: part.mimeType, data: Buffer.from(part.data).toString('base64') } };
}

/** Accept model names with or without the "models/" prefix. */
function modelPath(model: string): string {
  return model.startsWith('models/') ? model : `models/${model}`;
}

/**
 * Create a Gemini adapter function.
 *
 * The API key travels in the `x-goog-api-key` header, never in the URL, and
 * is masked out of every error message.
 */
export function createGeminiAdapter() {
  return async function geminiAdapter(options: LLMCallOptions): Promise<LLMRawResponse> {
    const baseUrl = (options.baseUrl || GEMINI_DEFAULT_BASE_URL).replace(/\/+$/, '');
    const url = `${baseUrl}/${modelPath(options.model)}:generateContent`;
    const mask = (message: string) => maskSecretsInMessage(message, [options.apiKey]);

    const body: GeminiRequest = {
      contents: [{ role: 'user', parts: options.parts.map(toGeminiPart) }],
      generationConfig: {
        temperature: options.temperature,
        maxOutputTokens: options.maxTokens,
      },
    };
    if (options.systemPrompt) {
      body.systemInstruction = { parts: [{ text: options.systemPrompt }] };
    }
    if (options.responseFormat?.type === 'json_object') {
      body.generationConfig.responseMimeType = 'application/json';
    }

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': options.apiKey,
        },
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new GenerationError(
        mask(`Gemini connection failed: ${err instanceof Error ? err.message : 'unknown error'}`),
        { statusCode: 0 },
      );
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new GenerationError(mask(`Gemini returned HTTP ${res.status}: ${text.slice(0, 200)}`), {
        statusCode: res.status,
      });
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch {
      throw new GenerationError(`Gemini returned a non-JSON body (HTTP ${res.status})`, { statusCode: res.status });
    }

    const parsed = GeminiResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new GenerationError(`Gemini response has an unexpected shape (HTTP ${res.status})`, {
        statusCode: res.status,
      });
    }

    const candidate = parsed.data.candidates[0];
    const content = (candidate?.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .filter((part) => part.length > 0)
      .join('\n');
    const usage = parsed.data.usageMetadata;

    return {
      content,
      finishReason: candidate?.finishReason,
      usage: usage
        ? {
            promptTokens: usage.promptTokenCount,
            completionTokens: usage.candidatesTokenCount,
            totalTokens: usage.totalTokenCount,
          }
        : undefined,
    };
  };
}
