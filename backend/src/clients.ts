/**
 * Client registry.
 *
 * Search and text-generation handles are built once per process from the
 * loaded configuration and shared by every orchestrator run.
 */

import { config as defaultConfig, type Config } from './config/index.js';
import { GoogleAdapter } from './llm/adapters/google.js';
import type { ProviderAdapter } from './llm/adapters/types.js';
import { LLMClient } from './llm/client.js';
import { LLMTextGenerator, type TextGenerator } from './llm/text-generator.js';
import type { ProviderID } from './llm/types.js';
import { ProposalOrchestrator } from './proposal/proposal-orchestrator.js';
import { GoogleCustomSearchClient } from './search/google-custom-search.js';
import type { SearchClient } from './search/types.js';

let searchClient: SearchClient | null = null;
let textGenerator: TextGenerator | null = null;

export function createSearchClient(target: Config): SearchClient {
  return new GoogleCustomSearchClient({
    apiKey: target.search.apiKey,
    engineId: target.search.engineId,
    baseUrl: target.search.baseUrl,
    defaultResults: target.search.defaultResults,
    timeoutMs: target.search.timeoutMs,
  });
}

export function createTextGenerator(target: Config): TextGenerator {
  const adapters = new Map<ProviderID, ProviderAdapter>([
    ['google', new GoogleAdapter({ baseUrl: target.llm.baseUrl, apiKey: target.llm.apiKey })],
  ]);
  const llmClient = new LLMClient(adapters, { requestTimeoutMs: target.llm.timeoutMs });
  return new LLMTextGenerator({
    llmClient,
    provider: target.llm.provider,
    model: target.llm.model,
    temperature: target.llm.temperature,
    topP: target.llm.topP,
    topK: target.llm.topK,
    maxOutputTokens: target.llm.maxOutputTokens,
  });
}

export function getDefaultSearchClient(): SearchClient {
  if (!searchClient) {
    searchClient = createSearchClient(defaultConfig);
  }
  return searchClient;
}

export function getDefaultTextGenerator(): TextGenerator {
  if (!textGenerator) {
    textGenerator = createTextGenerator(defaultConfig);
  }
  return textGenerator;
}

export function createDefaultOrchestrator(): ProposalOrchestrator {
  return new ProposalOrchestrator({
    searchClient: getDefaultSearchClient(),
    textGenerator: getDefaultTextGenerator(),
  });
}
