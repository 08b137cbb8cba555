/**
 * In-process stand-ins for the search and text-generation capabilities.
 */

import type { SearchResultItem } from '@usecase-studio/shared-types';
import type { TextGenerator } from '../../llm/text-generator.js';
import type { SearchClient } from '../../search/types.js';

export interface RecordedSearch {
  query: string;
  maxResults: number | undefined;
}

export class FakeSearchClient implements SearchClient {
  readonly calls: RecordedSearch[] = [];

  constructor(
    private readonly respond: (query: string, callIndex: number) => SearchResultItem[] = () => [],
  ) {}

  async search(query: string, maxResults?: number): Promise<SearchResultItem[]> {
    this.calls.push({ query, maxResults });
    return this.respond(query, this.calls.length - 1);
  }

  queries(): string[] {
    return this.calls.map(call => call.query);
  }
}

/** Replies from a queue: a string resolves, an Error rejects. */
export class FakeTextGenerator implements TextGenerator {
  readonly prompts: string[] = [];

  constructor(private readonly replies: Array<string | Error> = []) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('FakeTextGenerator has no reply queued');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export function result(title: string, link: string, snippet = `${title} snippet`): SearchResultItem {
  return { title, link, snippet };
}
