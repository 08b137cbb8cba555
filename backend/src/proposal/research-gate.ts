/**
 * Research gate.
 *
 * Decides whether a research profile is good enough to build proposals on.
 * The research agent signals trouble only through the `industry` string, so
 * the checks below must stay exactly as they are: a null profile, the literal
 * "N/A", or the case-sensitive substring "Error".
 */

import type { EntityProfile, ResearchOutcome } from '@usecase-studio/shared-types';

/** Placeholder used when a profile field was not found. */
export const NOT_AVAILABLE = 'N/A';

/** Industry marker written when the model output could not be parsed. */
export const PARSE_FAILURE_MARKER = 'Extraction Failed (Parsing Error)';

/** Industry marker prefix written when text generation failed. */
export function generationFailureMarker(message: string): string {
  return `Error: ${message}`;
}

export function classifyResearch(profile: EntityProfile | null): ResearchOutcome {
  if (profile === null) {
    return { kind: 'failed', reason: 'no_results', profile: null };
  }
  if (profile.industry === NOT_AVAILABLE) {
    return { kind: 'failed', reason: 'industry_unavailable', profile };
  }
  if (profile.industry.includes('Error')) {
    return { kind: 'failed', reason: 'extraction_error', profile };
  }
  return { kind: 'ok', profile };
}
