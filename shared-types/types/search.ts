/**
 * Web search result types shared by the search client and the agents.
 */

/** One organic result returned by a search backend. `link` is the dedup key downstream. */
export interface SearchResultItem {
  readonly title: string;
  readonly snippet: string;
  readonly link: string;
}
