/**
 * Backend Module - Unified Export Point
 */

// Proposal pipeline
export { ProposalOrchestrator } from './proposal/proposal-orchestrator.js';
export type {
  OrchestrateOptions,
  ProposalOrchestratorConfig,
} from './proposal/proposal-orchestrator.js';
export {
  ResearchAgent,
  UseCaseAgent,
  ResourceAgent,
  SuggestionAgent,
  FALLBACK_SUGGESTION,
  buildSupplementaryTrendContext,
} from './proposal/agents/index.js';
export type { SuggestionResult, AgentDependencies } from './proposal/agents/index.js';
export { classifyResearch } from './proposal/research-gate.js';
export {
  extractStructured,
  parseVerbatim,
  stripCodeFence,
  sliceBracketed,
} from './proposal/structured-extractor.js';
export type { ExtractionResult, ExpectedShape } from './proposal/structured-extractor.js';

// External capabilities
export type { SearchClient } from './search/types.js';
export { GoogleCustomSearchClient } from './search/google-custom-search.js';
export type { TextGenerator } from './llm/text-generator.js';
export { LLMTextGenerator } from './llm/text-generator.js';
export { LLMClient } from './llm/client.js';
export { GoogleAdapter } from './llm/adapters/google.js';

// Wiring
export {
  createDefaultOrchestrator,
  getDefaultSearchClient,
  getDefaultTextGenerator,
} from './clients.js';
export { createApp } from './app.js';
export {
  renderProposalMarkdown,
  renderResourceLinksMarkdown,
  resourceFileName,
} from './report/markdown.js';

// Errors
export {
  UseCaseStudioError,
  SearchError,
  GenerationError,
  ConfigurationError,
  describeError,
} from './errors.js';
