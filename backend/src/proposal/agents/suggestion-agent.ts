/**
 * SuggestionAgent - general-purpose GenAI solution ideas for a researched entity.
 *
 * Unlike the use case agent, a profile that passes the research gate always
 * yields at least one suggestion: an empty model answer is replaced with
 * FALLBACK_SUGGESTION.
 */

import type {
  EntityProfile,
  GenAISuggestion,
  ResearchFailureReason,
} from '@usecase-studio/shared-types';
import { describeError } from '../../errors.js';
import { createLogger } from '../../logging/log.js';
import type { TextGenerator } from '../../llm/text-generator.js';
import { classifyResearch } from '../research-gate.js';
import { extractArray } from '../structured-extractor.js';
import { parseRecords, suggestionWireSchema } from './schemas.js';
import { describeProfile, type ProfileContext } from './shared.js';

const log = createLogger('suggestion-agent');

export const FALLBACK_SUGGESTION: GenAISuggestion = Object.freeze({
  title: 'Generic AI-Powered Chatbot for FAQs',
  application:
    'Implement a chatbot on the company website or internal portal to answer frequently asked questions.',
  potentialBenefit:
    'Improve efficiency by automating responses to common queries, free up staff time, provide 24/7 support.',
  fitArea: 'Customer Service, Internal Operations, HR',
});

export type SuggestionResult =
  | { kind: 'skipped'; reason: ResearchFailureReason }
  | { kind: 'generated'; suggestions: GenAISuggestion[]; usedFallback: boolean };

export class SuggestionAgent {
  readonly id = 'suggestions' as const;
  readonly title = 'GenAI Suggestion Agent';

  constructor(private readonly deps: { textGenerator: TextGenerator }) {}

  async run(profile: EntityProfile | null): Promise<SuggestionResult> {
    const outcome = classifyResearch(profile);
    if (outcome.kind === 'failed') {
      log.warn(`insufficient research data (${outcome.reason}), no suggestions proposed`);
      return { kind: 'skipped', reason: outcome.reason };
    }

    const context = describeProfile(outcome.profile);
    let suggestions: GenAISuggestion[] = [];
    try {
      const raw = await this.deps.textGenerator.generate(this.buildPrompt(context));
      suggestions = this.parseOutput(raw);
    } catch (error: unknown) {
      log.error(`suggestion generation failed: ${describeError(error)}`);
    }

    if (suggestions.length === 0) {
      log.info('no specific suggestions returned, using the generic fallback');
      return { kind: 'generated', suggestions: [FALLBACK_SUGGESTION], usedFallback: true };
    }
    return { kind: 'generated', suggestions, usedFallback: false };
  }

  buildPrompt(context: ProfileContext): string {
    const { companyName, industry, segment, offerings, focusAreas } = context;
    return `Considering "${companyName}" in the "${industry}" sector, particularly the "${segment}" segment,
with offerings like "${offerings}" and focusing on "${focusAreas}".

Propose potential applications for general-purpose Generative AI solutions within this context.
Think about solutions like:
- AI-powered internal document search or knowledge base chatbots.
- Automated report generation or summarization (e.g., market reports, performance summaries).
- AI-powered customer support chatbots or virtual assistants.
- Automated content creation (e.g., marketing copy, product descriptions).

Provide the output *only* as a JSON list of objects, where each object has keys: "title", "application", "potential_benefit", "fit_area".
Do not include any other text, explanation, or markdown formatting outside the JSON array.
If you cannot think of specific suggestions relevant to this context, return an empty JSON array [].

--- JSON Output ---
`;
  }

  parseOutput(raw: string): GenAISuggestion[] {
    const extracted = extractArray(raw);
    if (!extracted.ok) {
      log.warn(`could not parse suggestion output (${extracted.reason})`);
      return [];
    }
    return parseRecords(extracted.value, suggestionWireSchema);
  }
}
