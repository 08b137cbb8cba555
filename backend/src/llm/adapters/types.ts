/**
 * Provider adapter contract.
 *
 * LLMClient owns the transport (fetch, timeout, JSON decoding); an adapter only
 * maps between LLMRequestParams/LLMResponse and one provider's wire format.
 */

import type { ProviderID, LLMRequestParams, LLMResponse, LLMError } from '../types.js';

/** A fully prepared POST: the client serializes `body` as JSON. */
export interface AdapterRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

export interface ProviderAdapter {
  readonly id: ProviderID;

  buildRequest(params: LLMRequestParams): AdapterRequest;

  /** Map a decoded 2xx body; throws LLMError when the body is unusable. */
  parseResponse(raw: unknown): LLMResponse;

  /** Map a non-2xx status and its decoded (or raw text) body. */
  convertError(status: number, body: unknown): LLMError;
}
