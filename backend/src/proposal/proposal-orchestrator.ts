/**
 * ProposalOrchestrator - sequential proposal pipeline.
 *
 * research → (failed_research | use_cases → resources → suggestions → success)
 *
 * Stages run one after another. A research profile that fails the gate ends
 * the run early; after that, no stage can abort the pipeline: a stage that
 * throws is logged and contributes its empty value.
 */

import type {
  EntityProfile,
  GenAISuggestion,
  ProposalBundle,
  ProposalStage,
  ProposalStageEvent,
  ResourceMap,
  UseCase,
} from '@usecase-studio/shared-types';
import { describeError } from '../errors.js';
import { createLogger } from '../logging/log.js';
import type { TextGenerator } from '../llm/text-generator.js';
import type { SearchClient } from '../search/types.js';
import { ResearchAgent, ResourceAgent, SuggestionAgent, UseCaseAgent } from './agents/index.js';
import { classifyResearch } from './research-gate.js';

const log = createLogger('orchestrator');

export interface ProposalOrchestratorConfig {
  searchClient: SearchClient;
  textGenerator: TextGenerator;
}

export interface OrchestrateOptions {
  /** Called when each stage starts and completes. */
  onStageChange?: (event: ProposalStageEvent) => void;
}

export class ProposalOrchestrator {
  private researchAgent: ResearchAgent;
  private useCaseAgent: UseCaseAgent;
  private resourceAgent: ResourceAgent;
  private suggestionAgent: SuggestionAgent;

  constructor(config: ProposalOrchestratorConfig) {
    this.researchAgent = new ResearchAgent(config);
    this.useCaseAgent = new UseCaseAgent(config);
    this.resourceAgent = new ResourceAgent(config);
    this.suggestionAgent = new SuggestionAgent(config);
  }

  /** Never rejects; failures are reported through `status` and empty collections. */
  async orchestrate(subjectName: string, options: OrchestrateOptions = {}): Promise<ProposalBundle> {
    const subject = subjectName.trim();
    if (!subject) {
      log.warn('empty subject, nothing to research');
      return failedResearch(null);
    }

    const startedAt = Date.now();
    log.info(`generating proposal for "${subject}"`);
    const emit = (stage: ProposalStage, state: ProposalStageEvent['state']) => {
      try {
        options.onStageChange?.({ stage, state, subject });
      } catch (error: unknown) {
        log.warn(`stage listener failed stage=${stage} error=${describeError(error)}`);
      }
    };

    const run = async <T>(stage: ProposalStage, fallback: T, work: () => Promise<T>): Promise<T> => {
      emit(stage, 'started');
      try {
        return await work();
      } catch (error: unknown) {
        log.error(`stage ${stage} failed unexpectedly: ${describeError(error)}`);
        return fallback;
      } finally {
        emit(stage, 'completed');
      }
    };

    const profile = await run<EntityProfile | null>('research', null, () =>
      this.researchAgent.run(subject),
    );
    const outcome = classifyResearch(profile);
    if (outcome.kind === 'failed') {
      log.error(`research failed for "${subject}" reason=${outcome.reason}`);
      return failedResearch(outcome.profile);
    }

    const researched = outcome.profile;
    const useCases = await run<UseCase[]>('use_cases', [], () => this.useCaseAgent.run(researched));
    const resourceLinks = await run<ResourceMap>('resources', {}, () =>
      this.resourceAgent.run(useCases),
    );
    const suggestions = await run<GenAISuggestion[]>('suggestions', [], async () => {
      const result = await this.suggestionAgent.run(researched);
      return result.kind === 'generated' ? result.suggestions : [];
    });

    log.info(
      `proposal ready for "${subject}" useCases=${useCases.length} suggestions=${suggestions.length} durationMs=${Date.now() - startedAt}`,
    );
    const bundle: ProposalBundle = {
      useCases,
      resourceLinks,
      genaiSuggestions: suggestions,
      researchData: researched,
      status: 'success',
    };
    return Object.freeze(bundle);
  }
}

function failedResearch(profile: EntityProfile | null): ProposalBundle {
  const bundle: ProposalBundle = {
    useCases: [],
    resourceLinks: {},
    genaiSuggestions: [],
    researchData: profile,
    status: 'failed_research',
  };
  return Object.freeze(bundle);
}
