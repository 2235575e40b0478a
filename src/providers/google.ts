/**
 * Google Provider Adapter
 * Handles Gemini models via the Google Generative AI API
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import { BaseProvider, type ModelPricing } from './base.js';
import type {
  ProviderCredentials,
  GenerationRequest,
  GenerationResponse,
  TokenUsage,
} from '../types/index.js';

// Per 1K tokens
const MODEL_PRICING: Record<string, ModelPricing> = {
  'gemini-1.5-pro': { inputPer1k: 0.00125, outputPer1k: 0.005 },
  'gemini-1.5-flash': { inputPer1k: 0.000075, outputPer1k: 0.0003 },
  'gemini-2.0-flash': { inputPer1k: 0.0001, outputPer1k: 0.0004 },
};

const MODEL_ALIASES: Record<string, string> = {
  'gemini-pro': 'gemini-1.5-pro',
  'gemini-flash': 'gemini-2.0-flash',
};

export class GoogleProvider extends BaseProvider {
  name = 'google' as const;
  private client: GoogleGenerativeAI;

  constructor(credentials: ProviderCredentials) {
    super(credentials);
    this.client = new GoogleGenerativeAI(credentials.apiKey);
  }

  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    const startTime = Date.now();
    const resolvedModel = this.resolveModel(request.model);

    const model = this.client.getGenerativeModel({
      model: resolvedModel,
      ...(request.systemPrompt ? { systemInstruction: request.systemPrompt } : {}),
      generationConfig: {
        maxOutputTokens: request.maxTokens ?? 4096,
        temperature: request.temperature,
        ...(request.responseFormat === 'json' ? { responseMimeType: 'application/json' } : {}),
      },
    });

    let content: string;
    let usage: TokenUsage;
    let finishReason: string | undefined;
    try {
      const { response } = await model.generateContent(request.prompt);
      content = response.text();
      finishReason = response.candidates?.[0]?.finishReason;
      usage = {
        inputTokens: response.usageMetadata?.promptTokenCount ?? 0,
        outputTokens: response.usageMetadata?.candidatesTokenCount ?? 0,
        totalTokens: response.usageMetadata?.totalTokenCount ?? 0,
      };
    } catch (error) {
      throw this.toProviderError(error);
    }

    return {
      content,
      finishReason: this.mapFinishReason(finishReason),
      meta: {
        latencyMs: Date.now() - startTime,
        tokens: usage,
        cost: this.calculateCost(resolvedModel, usage),
        model: resolvedModel,
        provider: 'google',
        failoverAttempts: 0,
      },
    };
  }

  async listModels(): Promise<string[]> {
    // No public list endpoint through this SDK; report the known models
    return Object.keys(MODEL_PRICING);
  }

  getModelCost(model: string): ModelPricing {
    return MODEL_PRICING[this.resolveModel(model)] ?? { inputPer1k: 0.00125, outputPer1k: 0.005 };
  }

  private resolveModel(model: string): string {
    return MODEL_ALIASES[model] ?? model;
  }

  private mapFinishReason(reason: string | undefined): GenerationResponse['finishReason'] {
    switch (reason) {
      case 'STOP':
        return 'stop';
      case 'MAX_TOKENS':
        return 'length';
      case 'SAFETY':
        return 'content_filter';
      default:
        return 'other';
    }
  }
}
