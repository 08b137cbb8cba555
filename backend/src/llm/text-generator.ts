/**
 * TextGenerator - prompt in, text out.
 *
 * The capability the proposal agents depend on. LLMTextGenerator backs it with
 * LLMClient and folds every provider failure into GenerationError.
 */

import { GenerationError } from '../errors.js';
import { createLogger } from '../logging/log.js';
import type { LLMClient } from './client.js';
import { LLMError, type ProviderID } from './types.js';

const log = createLogger('text-generator');

export interface TextGenerator {
  /** Generate text for a single-turn prompt. Rejects with GenerationError. */
  generate(prompt: string): Promise<string>;
}

export interface LLMTextGeneratorConfig {
  llmClient: LLMClient;
  provider: ProviderID;
  model: string;
  temperature?: number;
  topP?: number;
  topK?: number;
  maxOutputTokens?: number;
}

export class LLMTextGenerator implements TextGenerator {
  constructor(private readonly config: LLMTextGeneratorConfig) {}

  async generate(prompt: string): Promise<string> {
    const startedAt = Date.now();
    try {
      const response = await this.config.llmClient.complete({
        provider: this.config.provider,
        model: this.config.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.config.temperature,
        topP: this.config.topP,
        topK: this.config.topK,
        maxOutputTokens: this.config.maxOutputTokens,
      });

      const text = response.text.trim();
      log.debug(
        `model=${this.config.model} promptChars=${prompt.length} responseChars=${text.length} finish=${response.finishReason} durationMs=${Date.now() - startedAt}`,
      );
      if (!text) {
        throw new GenerationError(
          `Model returned no text (finishReason=${response.finishReason})`,
          { provider: this.config.provider },
        );
      }
      return text;
    } catch (error: unknown) {
      if (error instanceof GenerationError) {
        throw error;
      }
      if (error instanceof LLMError) {
        throw new GenerationError(error.message, {
          provider: error.provider,
          statusCode: error.statusCode,
          cause: error,
        });
      }
      throw new GenerationError(error instanceof Error ? error.message : String(error), {
        provider: this.config.provider,
        cause: error,
      });
    }
  }
}
