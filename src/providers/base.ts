/**
 * Base Provider Adapter
 * Shared plumbing for every LLM provider adapter
 */

import type {
  LlmProvider,
  ProviderName,
  ProviderCredentials,
  GenerationRequest,
  GenerationResponse,
  TokenUsage,
} from '../types/index.js';
import { ProviderError, RateLimitError } from '../types/index.js';

export interface ModelPricing {
  inputPer1k: number;
  outputPer1k: number;
}

export abstract class BaseProvider implements LlmProvider {
  abstract name: ProviderName;
  protected credentials: ProviderCredentials;

  constructor(credentials: ProviderCredentials) {
    this.credentials = credentials;
  }

  abstract generate(request: GenerationRequest): Promise<GenerationResponse>;

  abstract listModels(): Promise<string[]>;

  abstract getModelCost(model: string): ModelPricing;

  async isAvailable(): Promise<boolean> {
    try {
      await this.listModels();
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Calculate cost based on token usage and model pricing
   */
  protected calculateCost(model: string, usage: TokenUsage): number {
    const pricing = this.getModelCost(model);
    const inputCost = (usage.inputTokens / 1000) * pricing.inputPer1k;
    const outputCost = (usage.outputTokens / 1000) * pricing.outputPer1k;
    return Math.round((inputCost + outputCost) * 1000000) / 1000000; // 6 decimal precision
  }

  /**
   * Normalize an SDK failure into ProviderError / RateLimitError so the
   * router can decide whether to retry.
   */
  protected toProviderError(error: unknown): Error {
    if (error instanceof ProviderError || error instanceof RateLimitError) return error;

    const status = readStatus(error);
    if (status === 429) {
      return new RateLimitError(this.name);
    }

    const message = error instanceof Error ? error.message : String(error);
    const wrapped = new ProviderError(message, this.name, status);
    if (error instanceof Error) wrapped.cause = error;
    return wrapped;
  }
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}
