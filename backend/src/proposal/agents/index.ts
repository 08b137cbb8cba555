/**
 * Proposal agents, in pipeline order.
 */

export { ResearchAgent, researchQueries } from './research-agent.js';
export { UseCaseAgent, trendQueries, buildSupplementaryTrendContext } from './use-case-agent.js';
export { ResourceAgent, resourceQueries } from './resource-agent.js';
export { SuggestionAgent, FALLBACK_SUGGESTION } from './suggestion-agent.js';
export type { SuggestionResult } from './suggestion-agent.js';
export type { AgentDependencies } from './shared.js';
