/**
 * UseCaseAgent - proposes AI/ML/GenAI use cases for a researched entity.
 */

import type { EntityProfile, UseCase } from '@usecase-studio/shared-types';
import { describeError } from '../../errors.js';
import { createLogger } from '../../logging/log.js';
import { classifyResearch } from '../research-gate.js';
import { extractArray } from '../structured-extractor.js';
import { parseRecords, useCaseWireSchema } from './schemas.js';
import {
  describeProfile,
  formatSearchResults,
  searchOrEmpty,
  truncateForPrompt,
  type AgentDependencies,
  type ProfileContext,
} from './shared.js';

const RESULTS_PER_QUERY = 3;

const log = createLogger('use-case-agent');

export function trendQueries(industry: string, segment: string): string[] {
  return [
    `AI trends in ${industry} sector`,
    `Generative AI applications ${segment}`,
    `Machine Learning use cases ${industry} operations`,
    `${industry} companies using AI for customer experience`,
  ];
}

/**
 * Supplementary static context appended to every trend block.
 *
 * These lines are illustrative industry insights, not search results; they
 * give the model something to anchor on when trend searches come back thin.
 */
export function buildSupplementaryTrendContext(industry: string): string {
  return `
Based on recent reports from McKinsey and Deloitte on digital transformation in the ${industry} sector:
- Companies are seeing significant ROI from AI in supply chain forecasting.
- GenAI is increasingly used for personalizing customer communication and support.
- ML models are improving fraud detection rates by over 30%.
- Automation of routine tasks using AI frees up employees for strategic work.
`;
}

export class UseCaseAgent {
  readonly id = 'use_cases' as const;
  readonly title = 'Use Case Generation Agent';

  constructor(private readonly deps: AgentDependencies) {}

  async run(profile: EntityProfile | null): Promise<UseCase[]> {
    const outcome = classifyResearch(profile);
    if (outcome.kind === 'failed') {
      log.warn(`insufficient research data (${outcome.reason}), skipping`);
      return [];
    }

    const context = describeProfile(outcome.profile);
    let trendText = '';
    for (const query of trendQueries(context.industry, context.segment)) {
      const results = await searchOrEmpty(this.deps.searchClient, query, RESULTS_PER_QUERY, log);
      trendText += formatSearchResults(results);
    }
    trendText += buildSupplementaryTrendContext(context.industry);

    try {
      const raw = await this.deps.textGenerator.generate(this.buildPrompt(context, trendText));
      const useCases = this.parseOutput(raw);
      log.info(`generated ${useCases.length} use cases for "${context.companyName}"`);
      return useCases;
    } catch (error: unknown) {
      log.error(`use case generation failed: ${describeError(error)}`);
      return [];
    }
  }

  buildPrompt(context: ProfileContext, trendText: string): string {
    const { companyName, industry, segment, offerings, focusAreas } = context;
    return `Based on the following research about "${companyName}", which is in the "${industry}" sector,
specifically the "${segment}" segment, offering products/services like "${offerings}",
and focusing strategically on areas like "${focusAreas}".

Also consider the following industry trends and insights regarding AI, ML, and Generative AI:
--- Industry Trends/Insights ---
${truncateForPrompt(trendText)}

Propose a list of 5-10 relevant AI/ML/GenAI use cases for "${companyName}".
For each use case:
1. Give it a clear title.
2. Briefly describe the problem it solves or the opportunity it addresses.
3. Explain how AI/ML/GenAI is applied.
4. Mention the potential benefit (e.g., improve process X, enhance customer Y, boost operational efficiency Z).
5. Briefly mention *why* this use case is relevant to the company/industry context (link to their offerings, focus areas, or industry trends).

Provide the output *only* as a JSON list of objects, where each object has keys: "title", "description", "ai_application", "potential_benefit", "relevance".
Do not include any other text, explanation, or markdown formatting outside the JSON array.
If you cannot think of specific relevant use cases based on this information, return an empty JSON array [].

--- JSON Output ---
`;
  }

  parseOutput(raw: string): UseCase[] {
    const extracted = extractArray(raw);
    if (!extracted.ok) {
      log.warn(`could not parse use case output (${extracted.reason})`);
      return [];
    }
    return parseRecords(extracted.value, useCaseWireSchema);
  }
}
