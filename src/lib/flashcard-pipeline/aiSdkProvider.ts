/**
 * LLMProvider backed by the AI SDK over any OpenAI-compatible endpoint.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { generateText, type LanguageModel } from 'ai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import type { LLMConfig } from './types';
import type { LLMProvider, LLMRequest } from './llmProvider';
import { parseJsonResponse } from './llmProvider';
import { ConfigurationError, ParseError, ServiceError } from './errors';

export const PROVIDER_NAME = 'ankify-openai-compatible';

const normalizeBaseURL = (baseURL: string) => baseURL.trim().replace(/\/+$/, '');

export type ModelFactory = (modelId: string) => LanguageModel;

export interface AiSdkProviderOptions {
  config: LLMConfig;
  /** Overrides model construction, e.g. with a mock language model */
  modelFactory?: ModelFactory;
}

/**
 * Build a model factory for the configured endpoint.
 * Throws ConfigurationError when the endpoint or key is missing.
 */
export function buildModelFactory(config: LLMConfig): ModelFactory {
  const baseURL = normalizeBaseURL(config.base_url);
  if (!baseURL) {
    throw new ConfigurationError('LLM base URL is required');
  }
  if (!config.api_key) {
    throw new ConfigurationError('API key is not set (OPENAI_API_KEY or ANKIFY_API_KEY)');
  }

  const provider = createOpenAICompatible({
    baseURL,
    name: PROVIDER_NAME,
    apiKey: config.api_key,
  });
  return (modelId) => provider.chatModel(modelId);
}

export class AiSdkProvider implements LLMProvider {
  private config: LLMConfig;
  private modelFactory: ModelFactory;
  private lastCallAt = 0;

  constructor({ config, modelFactory }: AiSdkProviderOptions) {
    this.config = config;
    this.modelFactory = modelFactory ?? buildModelFactory(config);
  }

  private async respectCallDelay(): Promise<void> {
    const delay = this.config.call_delay_ms;
    if (delay <= 0 || this.lastCallAt === 0) return;
    const remaining = this.lastCallAt + delay - Date.now();
    if (remaining > 0) await sleep(remaining);
  }

  async complete(request: LLMRequest): Promise<unknown> {
    await this.respectCallDelay();

    let text: string;
    try {
      // maxRetries covers 429/5xx with exponential backoff. The timeout
      // signal bounds the whole call, backoff and retries included.
      const result = await generateText({
        model: this.modelFactory(request.model),
        system: request.system,
        prompt: request.prompt,
        temperature: this.config.temperature,
        maxRetries: this.config.max_retries,
        abortSignal: AbortSignal.timeout(this.config.timeout_ms),
      });
      text = result.text;
    } catch (error) {
      throw new ServiceError(`Capability call failed (${request.purpose})`, {
        model: request.model,
        cause: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.lastCallAt = Date.now();
    }

    if (request.raw_text) {
      const trimmed = text.trim();
      if (!trimmed) {
        throw new ParseError('Capability returned empty text', { purpose: request.purpose });
      }
      return trimmed;
    }
    return parseJsonResponse(text);
  }
}
