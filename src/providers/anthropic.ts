/**
 * Anthropic Provider Adapter
 * Handles Claude models via the Anthropic API
 */

import Anthropic from '@anthropic-ai/sdk';
import { BaseProvider, type ModelPricing } from './base.js';
import type {
  ProviderCredentials,
  GenerationRequest,
  GenerationResponse,
  TokenUsage,
} from '../types/index.js';

// Per 1K tokens
const MODEL_PRICING: Record<string, ModelPricing> = {
  'claude-3-5-sonnet-20241022': { inputPer1k: 0.003, outputPer1k: 0.015 },
  'claude-3-5-haiku-20241022': { inputPer1k: 0.001, outputPer1k: 0.005 },
  'claude-3-haiku-20240307': { inputPer1k: 0.00025, outputPer1k: 0.00125 },
};

const MODEL_ALIASES: Record<string, string> = {
  'claude-3.5-sonnet': 'claude-3-5-sonnet-20241022',
  'claude-3.5-haiku': 'claude-3-5-haiku-20241022',
  'claude-3-haiku': 'claude-3-haiku-20240307',
};

export const JSON_ONLY_INSTRUCTION = 'Respond with a single JSON object and nothing else.';

// Messages API has no JSON mode; ask for it in the system prompt instead
function systemPrompt(request: GenerationRequest): string | undefined {
  if (request.responseFormat !== 'json') return request.systemPrompt;
  return request.systemPrompt ? `${request.systemPrompt}\n\n${JSON_ONLY_INSTRUCTION}` : JSON_ONLY_INSTRUCTION;
}

export class AnthropicProvider extends BaseProvider {
  name = 'anthropic' as const;
  private client: Anthropic;

  constructor(credentials: ProviderCredentials) {
    super(credentials);
    this.client = new Anthropic({
      apiKey: credentials.apiKey,
      baseURL: credentials.baseUrl,
    });
  }

  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    const startTime = Date.now();
    const resolvedModel = this.resolveModel(request.model);

    const system = systemPrompt(request);
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: resolvedModel,
      max_tokens: request.maxTokens ?? 4096,
      messages: [{ role: 'user', content: request.prompt }],
      ...(system ? { system } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    };

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(params);
    } catch (error) {
      throw this.toProviderError(error);
    }

    const usage: TokenUsage = {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens,
    };

    let content = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        content += block.text;
      }
    }

    return {
      content,
      finishReason: this.mapStopReason(response.stop_reason),
      meta: {
        latencyMs: Date.now() - startTime,
        tokens: usage,
        cost: this.calculateCost(resolvedModel, usage),
        model: resolvedModel,
        provider: 'anthropic',
        failoverAttempts: 0,
      },
    };
  }

  async listModels(): Promise<string[]> {
    return Object.keys(MODEL_PRICING);
  }

  getModelCost(model: string): ModelPricing {
    return MODEL_PRICING[this.resolveModel(model)] ?? { inputPer1k: 0.003, outputPer1k: 0.015 };
  }

  private resolveModel(model: string): string {
    return MODEL_ALIASES[model] ?? model;
  }

  private mapStopReason(reason: string | null): GenerationResponse['finishReason'] {
    switch (reason) {
      case 'end_turn':
      case 'stop_sequence':
        return 'stop';
      case 'max_tokens':
        return 'length';
      default:
        return 'other';
    }
  }
}
