/**
 * ResourceAgent - collects dataset and code links per use case.
 *
 * Search only; no model call.
 */

import type { ResourceLink, ResourceMap, UseCase } from '@usecase-studio/shared-types';
import { createLogger } from '../../logging/log.js';
import type { SearchClient } from '../../search/types.js';
import { searchOrEmpty } from './shared.js';

const RESULTS_PER_QUERY = 2;

const log = createLogger('resource-agent');

export function resourceQueries(title: string): string[] {
  return [
    `${title} dataset site:kaggle.com OR site:huggingface.co/datasets OR site:github.com`,
    `${title} github code OR example site:github.com`,
  ];
}

export class ResourceAgent {
  readonly id = 'resources' as const;
  readonly title = 'Resource Collection Agent';

  constructor(private readonly deps: { searchClient: SearchClient }) {}

  /**
   * Links are unique per use case (first occurrence wins). A title seen twice
   * restarts its list, so the later use case owns the entry.
   */
  async run(useCases: readonly UseCase[]): Promise<ResourceMap> {
    if (useCases.length === 0) {
      log.warn('no use cases provided, skipping');
      return {};
    }

    const collected = new Map<string, ResourceLink[]>();
    for (const useCase of useCases) {
      const links: ResourceLink[] = [];
      collected.set(useCase.title, links);

      for (const query of resourceQueries(useCase.title)) {
        const results = await searchOrEmpty(this.deps.searchClient, query, RESULTS_PER_QUERY, log);
        for (const item of results) {
          if (!item.link || links.some(existing => existing.link === item.link)) {
            continue;
          }
          links.push({
            title: item.title || 'No Title',
            link: item.link,
            snippet: item.snippet || 'N/A',
          });
        }
      }
      log.debug(`collected ${links.length} links for "${useCase.title}"`);
    }

    return Object.fromEntries(collected);
  }
}
