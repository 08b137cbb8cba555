/**
 * Wire schemas for model-emitted records.
 *
 * Keys arrive snake_case from the model. Missing or mistyped fields fall back
 * to placeholders instead of rejecting the record; only non-object entries
 * are dropped.
 */

import { z } from 'zod';
import type { GenAISuggestion, UseCase } from '@usecase-studio/shared-types';
import type { JsonValue } from '../structured-extractor.js';

const text = (fallback: string) => z.string().catch(fallback);

export const researchFieldsSchema = z.object({
  industry: z.string().optional().catch(undefined),
  segment: z.string().optional().catch(undefined),
  offerings: z.array(z.unknown()).optional().catch(undefined),
  strategic_focus: z.array(z.unknown()).optional().catch(undefined),
});

export const useCaseWireSchema = z
  .object({
    title: text('Untitled Use Case'),
    description: text('N/A'),
    ai_application: text('N/A'),
    potential_benefit: text('N/A'),
    relevance: text('N/A'),
  })
  .transform(
    (wire): UseCase => ({
      title: wire.title,
      description: wire.description,
      aiApplication: wire.ai_application,
      potentialBenefit: wire.potential_benefit,
      relevance: wire.relevance,
    }),
  );

export const suggestionWireSchema = z
  .object({
    title: text('Untitled Suggestion'),
    application: text('N/A'),
    potential_benefit: text('N/A'),
    fit_area: text('N/A'),
  })
  .transform(
    (wire): GenAISuggestion => ({
      title: wire.title,
      application: wire.application,
      potentialBenefit: wire.potential_benefit,
      fitArea: wire.fit_area,
    }),
  );

/** Keep the entries that are objects, normalized through `schema`. */
export function parseRecords<T>(
  items: readonly JsonValue[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T[] {
  const records: T[] = [];
  for (const item of items) {
    const result = schema.safeParse(item);
    if (result.success) {
      records.push(result.data);
    }
  }
  return records;
}

/** String entries of a list, in order. */
export function stringEntries(values: readonly unknown[]): string[] {
  return values.filter((value): value is string => typeof value === 'string');
}
