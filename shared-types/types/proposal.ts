/**
 * Proposal pipeline types.
 *
 * Records produced by the four agents and the bundle returned by the
 * orchestrator. Each agent owns the record it builds; downstream consumers
 * only ever see readonly views.
 */

import type { SearchResultItem } from './search.js';

// ============================================================================
// Research
// ============================================================================

/**
 * Entity profile extracted by the research agent.
 *
 * `industry` is always a string: "N/A" when the model found nothing, or an
 * error marker when extraction or generation failed.
 */
export interface EntityProfile {
  readonly inputName: string;
  readonly industry: string;
  readonly segment: string;
  readonly offerings: readonly string[];
  readonly strategicFocus: readonly string[];
  readonly searchResults: readonly SearchResultItem[];
}

export type ResearchFailureReason =
  | 'no_results'
  | 'industry_unavailable'
  | 'extraction_error';

/** Gate verdict over a research profile. */
export type ResearchOutcome =
  | { readonly kind: 'ok'; readonly profile: EntityProfile }
  | {
      readonly kind: 'failed';
      readonly reason: ResearchFailureReason;
      readonly profile: EntityProfile | null;
    };

// ============================================================================
// Use cases & resources
// ============================================================================

export interface UseCase {
  readonly title: string;
  readonly description: string;
  readonly aiApplication: string;
  readonly potentialBenefit: string;
  readonly relevance: string;
}

export interface ResourceLink {
  readonly title: string;
  readonly link: string;
  readonly snippet: string;
}

/** Use case title → links collected for it (unique by `link`). */
export type ResourceMap = Readonly<Record<string, readonly ResourceLink[]>>;

// ============================================================================
// Suggestions
// ============================================================================

export interface GenAISuggestion {
  readonly title: string;
  readonly application: string;
  readonly potentialBenefit: string;
  readonly fitArea: string;
}

// ============================================================================
// Bundle
// ============================================================================

export type ProposalStatus = 'success' | 'failed_research';

export interface ProposalBundle {
  readonly useCases: readonly UseCase[];
  readonly resourceLinks: ResourceMap;
  readonly genaiSuggestions: readonly GenAISuggestion[];
  readonly researchData: EntityProfile | null;
  readonly status: ProposalStatus;
}

export type ProposalStage = 'research' | 'use_cases' | 'resources' | 'suggestions';

export interface ProposalStageEvent {
  readonly stage: ProposalStage;
  readonly state: 'started' | 'completed';
  readonly subject: string;
}
