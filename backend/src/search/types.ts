/**
 * Web search capability consumed by the proposal agents.
 */

import type { SearchResultItem } from '@usecase-studio/shared-types';

export interface SearchClient {
  /**
   * Run one query and return at most `maxResults` items in ranking order.
   * Rejects with SearchError when the backing API call fails.
   */
  search(query: string, maxResults?: number): Promise<SearchResultItem[]>;
}
