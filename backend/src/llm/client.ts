/**
 * LLMClient - unified LLM call client
 *
 * Isolates provider API differences behind ProviderAdapter and bounds each
 * request with a timeout signal. A single attempt per call: callers decide how
 * to degrade on failure.
 */

import type { ProviderID, LLMRequestParams, LLMResponse } from './types.js';
import { LLMError } from './types.js';
import type { ProviderAdapter } from './adapters/types.js';

const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

export interface LLMClientOptions {
  /** Per-request timeout in milliseconds */
  requestTimeoutMs?: number;
}

export class LLMClient {
  private requestTimeoutMs: number;

  constructor(
    private adapters: Map<ProviderID, ProviderAdapter>,
    options: LLMClientOptions = {},
  ) {
    this.requestTimeoutMs = this.resolveTimeout(options.requestTimeoutMs);
  }

  /**
   * Non-streaming LLM completion.
   *
   * 1. Look up adapter for params.provider
   * 2. adapter.buildRequest(params) → { url, headers, body }
   * 3. fetch(url, { method: 'POST', headers, body, signal })
   * 4. On non-ok response → adapter.convertError(status, body) → throw
   * 5. Parse JSON → adapter.parseResponse(json) → LLMResponse
   */
  async complete(params: LLMRequestParams): Promise<LLMResponse> {
    const adapter = this.adapters.get(params.provider);
    if (!adapter) {
      throw new LLMError(`No adapter registered for provider: ${params.provider}`, {
        provider: params.provider,
        statusCode: 0,
      });
    }

    const { url, headers, body } = adapter.buildRequest(params);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new LLMError(`LLM request failed: ${reason}`, {
        provider: params.provider,
        statusCode: 0,
        cause: error,
      });
    }

    if (!response.ok) {
      const errorBody = await response.text().catch(() => '');
      let parsedBody: unknown;
      try {
        parsedBody = JSON.parse(errorBody);
      } catch {
        parsedBody = errorBody;
      }
      throw adapter.convertError(response.status, parsedBody);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error: unknown) {
      throw new LLMError('LLM response body is not valid JSON', {
        provider: params.provider,
        statusCode: response.status,
        cause: error,
      });
    }
    return adapter.parseResponse(json);
  }

  private resolveTimeout(value: number | undefined): number {
    if (value === undefined || !Number.isFinite(value) || value <= 0) {
      return DEFAULT_REQUEST_TIMEOUT_MS;
    }
    return Math.floor(value);
  }
}
