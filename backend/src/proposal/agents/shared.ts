/**
 * Helpers shared by the proposal agents.
 */

import type { EntityProfile, SearchResultItem } from '@usecase-studio/shared-types';
import { describeError } from '../../errors.js';
import type { Log } from '../../logging/log.js';
import type { TextGenerator } from '../../llm/text-generator.js';
import type { SearchClient } from '../../search/types.js';

/** Upper bound on search/trend text embedded in a prompt. */
export const PROMPT_TEXT_LIMIT = 7000;

export interface AgentDependencies {
  searchClient: SearchClient;
  textGenerator: TextGenerator;
}

/**
 * Run one query; a failed search counts as zero results.
 */
export async function searchOrEmpty(
  searchClient: SearchClient,
  query: string,
  maxResults: number,
  log: Log,
): Promise<SearchResultItem[]> {
  try {
    return await searchClient.search(query, maxResults);
  } catch (error: unknown) {
    log.warn(`search failed query="${query}" error=${describeError(error)}`);
    return [];
  }
}

/** Render results as `Title/Snippet/URL` blocks, one blank line apart. */
export function formatSearchResults(items: readonly SearchResultItem[]): string {
  return items
    .map(
      item =>
        `Title: ${item.title || 'N/A'}\nSnippet: ${item.snippet || 'N/A'}\nURL: ${item.link || '#'}\n\n`,
    )
    .join('');
}

/** Cut to PROMPT_TEXT_LIMIT code points, never splitting a surrogate pair. */
export function truncateForPrompt(text: string): string {
  if (text.length <= PROMPT_TEXT_LIMIT) {
    return text;
  }
  return Array.from(text).slice(0, PROMPT_TEXT_LIMIT).join('');
}

/** Prompt-ready view of a profile, with readable stand-ins for empty lists. */
export interface ProfileContext {
  companyName: string;
  industry: string;
  segment: string;
  offerings: string;
  focusAreas: string;
}

export function describeProfile(profile: EntityProfile): ProfileContext {
  return {
    companyName: profile.inputName || 'The company',
    industry: profile.industry,
    segment: profile.segment || profile.industry,
    offerings:
      profile.offerings.length > 0 ? profile.offerings.join(', ') : 'various products/services',
    focusAreas:
      profile.strategicFocus.length > 0
        ? profile.strategicFocus.join(', ')
        : 'improving operations and customer experience',
  };
}
