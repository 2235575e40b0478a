/**
 * OpenAI-compatible Provider Adapters
 * GPT models via the OpenAI API, and Groq-hosted open models via Groq's
 * OpenAI-compatible endpoint
 */

import OpenAI from 'openai';
import { BaseProvider, type ModelPricing } from './base.js';
import type {
  ProviderCredentials,
  GenerationRequest,
  GenerationResponse,
  TokenUsage,
} from '../types/index.js';

// Per 1K tokens
const OPENAI_PRICING: Record<string, ModelPricing> = {
  'gpt-4o': { inputPer1k: 0.005, outputPer1k: 0.015 },
  'gpt-4o-mini': { inputPer1k: 0.00015, outputPer1k: 0.0006 },
  'gpt-4-turbo': { inputPer1k: 0.01, outputPer1k: 0.03 },
  'gpt-3.5-turbo': { inputPer1k: 0.0005, outputPer1k: 0.0015 },
};

const GROQ_PRICING: Record<string, ModelPricing> = {
  'llama-3.3-70b-versatile': { inputPer1k: 0.00059, outputPer1k: 0.00079 },
  'llama-3.1-8b-instant': { inputPer1k: 0.00005, outputPer1k: 0.00008 },
  'mixtral-8x7b-32768': { inputPer1k: 0.00024, outputPer1k: 0.00024 },
};

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

export class OpenAIProvider extends BaseProvider {
  name: 'openai' | 'groq' = 'openai';
  protected client: OpenAI;
  protected pricing: Record<string, ModelPricing> = OPENAI_PRICING;
  protected defaultPricing: ModelPricing = { inputPer1k: 0.005, outputPer1k: 0.015 };

  constructor(credentials: ProviderCredentials) {
    super(credentials);
    this.client = new OpenAI({
      apiKey: credentials.apiKey,
      baseURL: credentials.baseUrl,
      organization: credentials.organizationId,
    });
  }

  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    const startTime = Date.now();

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: request.prompt });

    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages,
      ...(request.maxTokens ? { max_tokens: request.maxTokens } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      ...(request.responseFormat === 'json' ? { response_format: { type: 'json_object' as const } } : {}),
    };

    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(params);
    } catch (error) {
      throw this.toProviderError(error);
    }

    const choice = response.choices[0];
    const usage: TokenUsage = {
      inputTokens: response.usage?.prompt_tokens ?? 0,
      outputTokens: response.usage?.completion_tokens ?? 0,
      totalTokens: response.usage?.total_tokens ?? 0,
    };

    return {
      content: choice?.message.content ?? '',
      finishReason: this.mapFinishReason(choice?.finish_reason ?? null),
      meta: {
        latencyMs: Date.now() - startTime,
        tokens: usage,
        cost: this.calculateCost(request.model, usage),
        model: request.model,
        provider: this.name,
        failoverAttempts: 0,
      },
    };
  }

  async listModels(): Promise<string[]> {
    const response = await this.client.models.list();
    return response.data.map((m) => m.id);
  }

  getModelCost(model: string): ModelPricing {
    // Longest prefix wins, so gpt-4o-mini is not priced as gpt-4o
    const match = Object.keys(this.pricing)
      .filter((key) => model.startsWith(key))
      .sort((a, b) => b.length - a.length)[0];
    return match ? this.pricing[match] : this.defaultPricing;
  }

  private mapFinishReason(reason: string | null): GenerationResponse['finishReason'] {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'other';
    }
  }
}

/**
 * Groq exposes an OpenAI-compatible API, so the OpenAI SDK is reused with
 * Groq's base URL.
 */
export class GroqProvider extends OpenAIProvider {
  constructor(credentials: ProviderCredentials) {
    super({ ...credentials, baseUrl: credentials.baseUrl ?? GROQ_BASE_URL });
    this.name = 'groq';
    this.pricing = GROQ_PRICING;
    this.defaultPricing = { inputPer1k: 0.00059, outputPer1k: 0.00079 };
  }
}
