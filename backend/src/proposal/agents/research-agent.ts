/**
 * ResearchAgent - builds an entity profile for a company or industry.
 *
 * Fans out four search queries, then asks the model to condense the snippets
 * into industry, segment, offerings and strategic focus. This is the first
 * stage of the proposal pipeline and the only one that can fail it.
 */

import type { EntityProfile, SearchResultItem } from '@usecase-studio/shared-types';
import { describeError, GenerationError } from '../../errors.js';
import { createLogger } from '../../logging/log.js';
import { extractObject } from '../structured-extractor.js';
import {
  generationFailureMarker,
  NOT_AVAILABLE,
  PARSE_FAILURE_MARKER,
} from '../research-gate.js';
import { researchFieldsSchema, stringEntries } from './schemas.js';
import {
  formatSearchResults,
  searchOrEmpty,
  truncateForPrompt,
  type AgentDependencies,
} from './shared.js';

const RESULTS_PER_QUERY = 5;

const log = createLogger('research-agent');

type ProfileFields = Pick<EntityProfile, 'industry' | 'segment' | 'offerings' | 'strategicFocus'>;

export function researchQueries(name: string): string[] {
  return [
    `${name} industry sector`,
    `${name} key products and services`,
    `${name} strategic priorities focus areas`,
    `${name} company profile`,
  ];
}

export class ResearchAgent {
  readonly id = 'research' as const;
  readonly title = 'Research Agent';

  constructor(private readonly deps: AgentDependencies) {}

  /**
   * Research `name`. Resolves to null when no search returned anything;
   * otherwise the profile always has a string `industry`.
   */
  async run(name: string): Promise<EntityProfile | null> {
    const searchResults: SearchResultItem[] = [];
    let searchText = '';

    for (const query of researchQueries(name)) {
      const results = await searchOrEmpty(this.deps.searchClient, query, RESULTS_PER_QUERY, log);
      searchResults.push(...results);
      searchText += formatSearchResults(results);
    }

    if (!searchText) {
      log.warn(`no search results for "${name}"`);
      return null;
    }

    const prompt = this.buildPrompt(name, searchText);
    let fields: ProfileFields;
    try {
      const raw = await this.deps.textGenerator.generate(prompt);
      fields = this.parseOutput(raw);
    } catch (error: unknown) {
      const message = error instanceof GenerationError ? error.message : describeError(error);
      log.error(`generation failed for "${name}": ${message}`);
      const marker = generationFailureMarker(message);
      fields = { industry: marker, segment: marker, offerings: [marker], strategicFocus: [marker] };
    }

    log.info(
      `research finished for "${name}" industry="${fields.industry}" results=${searchResults.length}`,
    );
    return { inputName: name, ...fields, searchResults };
  }

  buildPrompt(name: string, searchText: string): string {
    return `Analyze the following text snippets from web searches about "${name}".
Identify and extract the following information:
1. The main industry sector (e.g., Automotive, Finance, Healthcare).
2. The specific segment within that industry (e.g., Commercial Banking, Oncology, E-commerce).
3. Key products, services, or offerings (as a list of strings).
4. Strategic focus areas or priorities (as a list of strings, e.g., improving efficiency, customer experience, expansion).

Provide the output *only* as a single JSON object with the keys: "industry", "segment", "offerings", "strategic_focus".
If information for a key is not found, use "N/A" or an empty list [] where appropriate (e.g., offerings: []).
Do not include any other text, explanation, or markdown formatting outside the JSON object.

--- Text Snippets ---
${truncateForPrompt(searchText)}

--- JSON Output ---
`;
  }

  /**
   * Merge model output over the defaults. Only well-typed values override;
   * unparseable output turns every field into the parse-failure marker.
   */
  parseOutput(raw: string): ProfileFields {
    const defaults: ProfileFields = {
      industry: NOT_AVAILABLE,
      segment: NOT_AVAILABLE,
      offerings: [],
      strategicFocus: [],
    };

    const extracted = extractObject(raw);
    if (!extracted.ok) {
      log.warn(`could not parse research output (${extracted.reason})`);
      return {
        industry: PARSE_FAILURE_MARKER,
        segment: PARSE_FAILURE_MARKER,
        offerings: [PARSE_FAILURE_MARKER],
        strategicFocus: [PARSE_FAILURE_MARKER],
      };
    }

    const parsed = researchFieldsSchema.safeParse(extracted.value);
    if (!parsed.success) {
      return defaults;
    }
    const wire = parsed.data;
    return {
      industry: wire.industry ?? defaults.industry,
      segment: wire.segment ?? defaults.segment,
      offerings: wire.offerings ? stringEntries(wire.offerings) : defaults.offerings,
      strategicFocus: wire.strategic_focus
        ? stringEntries(wire.strategic_focus)
        : defaults.strategicFocus,
    };
  }
}
