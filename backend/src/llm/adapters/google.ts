/**
 * Google Provider Adapter
 *
 * Implements the ProviderAdapter interface for Google's Gemini API (generateContent).
 * Prompts go out as user `contents` with a `generationConfig`; the reply text is
 * the concatenated `candidates[0].content.parts`.
 */

import { z } from 'zod';
import type { ProviderID, LLMRequestParams, LLMResponse } from '../types.js';
import { LLMError } from '../types.js';
import type { ProviderAdapter, AdapterRequest } from './types.js';

// ---------------------------------------------------------------------------
// Google-specific types (internal)
// ---------------------------------------------------------------------------

interface GoogleContent {
  role: 'user';
  parts: Array<{ text: string }>;
}

const googlePartSchema = z
  .object({
    text: z.string().optional(),
  })
  .passthrough();

const googleResponseSchema = z
  .object({
    candidates: z
      .array(
        z
          .object({
            content: z
              .object({ parts: z.array(googlePartSchema).optional() })
              .passthrough()
              .optional(),
            finishReason: z.string().optional(),
          })
          .passthrough(),
      )
      .optional(),
    promptFeedback: z
      .object({ blockReason: z.string().optional() })
      .passthrough()
      .optional(),
    usageMetadata: z
      .object({
        promptTokenCount: z.number().optional(),
        candidatesTokenCount: z.number().optional(),
        totalTokenCount: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const googleErrorSchema = z
  .object({
    error: z
      .object({
        message: z.string().optional(),
        status: z.string().optional(),
        code: z.number().optional(),
      })
      .passthrough(),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export class GoogleAdapter implements ProviderAdapter {
  readonly id: ProviderID = 'google';

  private baseUrl: string;
  private apiKey: string;

  constructor(opts: { baseUrl?: string; apiKey: string }) {
    this.baseUrl = (opts.baseUrl ?? 'https://generativelanguage.googleapis.com').replace(/\/+$/, '');
    this.apiKey = opts.apiKey;
  }

  // ---- buildRequest -------------------------------------------------------

  buildRequest(params: LLMRequestParams): AdapterRequest {
    const contents: GoogleContent[] = params.messages.map(msg => ({
      role: msg.role,
      parts: [{ text: msg.content }],
    }));

    const body: Record<string, unknown> = { contents };

    const generationConfig: Record<string, number> = {};
    if (params.temperature !== undefined) generationConfig.temperature = params.temperature;
    if (params.topP !== undefined) generationConfig.topP = params.topP;
    if (params.topK !== undefined) generationConfig.topK = params.topK;
    if (params.maxOutputTokens !== undefined)
      generationConfig.maxOutputTokens = params.maxOutputTokens;

    if (Object.keys(generationConfig).length > 0) {
      body.generationConfig = generationConfig;
    }

    return {
      url: `${this.baseUrl}/v1beta/models/${params.model}:generateContent`,
      headers: {
        'Content-Type': 'application/json',
        'x-goog-api-key': this.apiKey,
      },
      body,
    };
  }

  // ---- parseResponse ------------------------------------------------------

  parseResponse(raw: unknown): LLMResponse {
    const parsed = googleResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LLMError('Google API returned an unexpected response body', {
        provider: 'google',
        statusCode: 200,
        cause: parsed.error,
      });
    }

    const body = parsed.data;
    const blockReason = body.promptFeedback?.blockReason;
    if (blockReason) {
      throw new LLMError(`Google API blocked the prompt: ${blockReason}`, {
        provider: 'google',
        statusCode: 200,
      });
    }

    const candidate = body.candidates?.[0];
    const parts = candidate?.content?.parts ?? [];
    const text = parts.map(part => part.text ?? '').join('');

    return {
      text,
      finishReason: this.mapFinishReason(candidate?.finishReason),
      usage: {
        inputTokens: body.usageMetadata?.promptTokenCount ?? 0,
        outputTokens: body.usageMetadata?.candidatesTokenCount ?? 0,
        totalTokens: body.usageMetadata?.totalTokenCount ?? 0,
      },
    };
  }

  // ---- convertError -------------------------------------------------------

  convertError(status: number, body: unknown): LLMError {
    const parsed = googleErrorSchema.safeParse(body);
    const message =
      (parsed.success ? parsed.data.error.message : undefined) ??
      `Google API error (HTTP ${status})`;

    return new LLMError(message, {
      provider: 'google',
      statusCode: status,
    });
  }

  // ---- helpers ------------------------------------------------------------

  private mapFinishReason(reason: string | undefined): LLMResponse['finishReason'] {
    switch (reason) {
      case 'STOP':
        return 'stop';
      case 'MAX_TOKENS':
        return 'max_tokens';
      case 'SAFETY':
      case 'RECITATION':
      case 'OTHER':
        return 'error';
      default:
        return 'stop';
    }
  }
}
