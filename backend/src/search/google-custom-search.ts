/**
 * Google Custom Search JSON API client.
 */

import { z } from 'zod';
import type { SearchResultItem } from '@usecase-studio/shared-types';
import { SearchError } from '../errors.js';
import { createLogger } from '../logging/log.js';
import type { SearchClient } from './types.js';

const log = createLogger('google-search');

/** The API serves at most 10 results per page. */
const MAX_RESULTS_PER_CALL = 10;

const searchResponseSchema = z
  .object({
    items: z
      .array(
        z
          .object({
            title: z.string().optional(),
            snippet: z.string().optional(),
            link: z.string().optional(),
          })
          .passthrough(),
      )
      .optional(),
    error: z
      .object({ code: z.number().optional(), message: z.string().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export interface GoogleCustomSearchOptions {
  apiKey: string;
  engineId: string;
  baseUrl?: string;
  defaultResults?: number;
  timeoutMs?: number;
}

export class GoogleCustomSearchClient implements SearchClient {
  private apiKey: string;
  private engineId: string;
  private baseUrl: string;
  private defaultResults: number;
  private timeoutMs: number;

  constructor(options: GoogleCustomSearchOptions) {
    this.apiKey = options.apiKey;
    this.engineId = options.engineId;
    this.baseUrl = options.baseUrl ?? 'https://www.googleapis.com/customsearch/v1';
    this.defaultResults = options.defaultResults ?? 5;
    this.timeoutMs = options.timeoutMs ?? 15000;

    if (!this.apiKey || !this.engineId) {
      log.warn('No API key or engine id provided. Set GOOGLE_CSE_API_KEY and GOOGLE_CSE_ID.');
    }
  }

  async search(query: string, maxResults: number = this.defaultResults): Promise<SearchResultItem[]> {
    if (!this.apiKey || !this.engineId) {
      throw new SearchError('Google Custom Search is not configured', { query });
    }

    const num = Math.min(Math.max(Math.floor(maxResults), 1), MAX_RESULTS_PER_CALL);
    const params = new URLSearchParams({
      key: this.apiKey,
      cx: this.engineId,
      q: query,
      num: String(num),
    });

    log.debug(`Searching: "${query}" (max ${num} results)`);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}?${params.toString()}`, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SearchError(`Search request failed: ${reason}`, { query, cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      throw new SearchError(
        `Custom Search API error (${response.status}): ${errorText.slice(0, 300)}`,
        { query, statusCode: response.status },
      );
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error: unknown) {
      throw new SearchError('Custom Search API returned invalid JSON', {
        query,
        statusCode: response.status,
        cause: error,
      });
    }

    const parsed = searchResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new SearchError('Custom Search API returned an unexpected body', {
        query,
        statusCode: response.status,
        cause: parsed.error,
      });
    }
    if (parsed.data.error) {
      throw new SearchError(
        `Custom Search API error: ${parsed.data.error.message ?? 'unknown error'}`,
        { query, statusCode: parsed.data.error.code },
      );
    }

    const results: SearchResultItem[] = (parsed.data.items ?? []).slice(0, num).map(item => ({
      title: item.title ?? '',
      snippet: item.snippet ?? '',
      link: item.link ?? '',
    }));

    log.debug(`Found ${results.length} results for "${query}"`);
    return results;
  }
}
