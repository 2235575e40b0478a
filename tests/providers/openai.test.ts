/**
 * OpenAI Provider Tests
 * Tests for the GPT adapter and the Groq adapter built on it
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import OpenAI from 'openai';
import { OpenAIProvider, GroqProvider, GROQ_BASE_URL } from '../../src/providers/openai.js';
import { createMockGenerationRequest } from '../utils/mocks.js';
import { ProviderError, RateLimitError, type ProviderCredentials } from '../../src/types/index.js';

const sdk = vi.hoisted(() => ({
  create: vi.fn(),
  list: vi.fn(),
}));

// Mock the OpenAI SDK
vi.mock('openai', () => ({
  default: vi.fn().mockImplementation(() => ({
    chat: { completions: { create: sdk.create } },
    models: { list: sdk.list },
  })),
}));

function completion(content: string | null, finishReason: string) {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 1700000000,
    model: 'gpt-4o-mini',
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: finishReason }],
    usage: { prompt_tokens: 2000, completion_tokens: 1000, total_tokens: 3000 },
  };
}

describe('OpenAIProvider', () => {
  let provider: OpenAIProvider;
  const mockCredentials: ProviderCredentials = {
    apiKey: 'test-openai-key',
    baseUrl: 'https://api.openai.com/v1',
    organizationId: 'org-test',
  };

  beforeEach(() => {
    sdk.create.mockReset();
    sdk.list.mockReset();
    provider = new OpenAIProvider(mockCredentials);
  });

  describe('constructor', () => {
    it('should_setProviderName_when_initialized', () => {
      expect(provider.name).toBe('openai');
    });

    it('should_createOpenAIClient_when_constructed', () => {
      expect(OpenAI).toHaveBeenCalledWith({
        apiKey: 'test-openai-key',
        baseURL: 'https://api.openai.com/v1',
        organization: 'org-test',
      });
    });
  });

  describe('generate', () => {
    it('should_returnGenerationResponse_when_apiSucceeds', async () => {
      sdk.create.mockResolvedValueOnce(completion('Hello from GPT!', 'stop'));

      const response = await provider.generate(createMockGenerationRequest({ model: 'gpt-4o-mini' }));

      expect(response.content).toBe('Hello from GPT!');
      expect(response.finishReason).toBe('stop');
      expect(response.meta.provider).toBe('openai');
      expect(response.meta.tokens).toEqual({ inputTokens: 2000, outputTokens: 1000, totalTokens: 3000 });
      // 2 * 0.00015 + 1 * 0.0006
      expect(response.meta.cost).toBe(0.0009);
    });

    it('should_sendSystemAndUserMessages_when_systemPromptGiven', async () => {
      sdk.create.mockResolvedValueOnce(completion('ok', 'stop'));

      await provider.generate(
        createMockGenerationRequest({ model: 'gpt-4o', systemPrompt: 'Be brief', prompt: 'Plan a trip', temperature: 0.5 })
      );

      expect(sdk.create).toHaveBeenCalledWith({
        model: 'gpt-4o',
        messages: [
          { role: 'system', content: 'Be brief' },
          { role: 'user', content: 'Plan a trip' },
        ],
        max_tokens: 1024,
        temperature: 0.5,
      });
    });

    it('should_requestJsonObject_when_jsonFormatAsked', async () => {
      sdk.create.mockResolvedValueOnce(completion('{}', 'stop'));

      await provider.generate(createMockGenerationRequest({ model: 'gpt-4o-mini', responseFormat: 'json' }));

      expect(sdk.create).toHaveBeenCalledWith(
        expect.objectContaining({ response_format: { type: 'json_object' } })
      );
    });

    it('should_mapLengthFinishReason_when_truncated', async () => {
      sdk.create.mockResolvedValueOnce(completion('partial', 'length'));

      const response = await provider.generate(createMockGenerationRequest({ model: 'gpt-4o' }));

      expect(response.finishReason).toBe('length');
    });

    it('should_returnEmptyContent_when_messageContentNull', async () => {
      sdk.create.mockResolvedValueOnce(completion(null, 'tool_calls'));

      const response = await provider.generate(createMockGenerationRequest({ model: 'gpt-4o' }));

      expect(response.content).toBe('');
      expect(response.finishReason).toBe('other');
    });

    it('should_throwRateLimitError_when_statusIs429', async () => {
      sdk.create.mockRejectedValueOnce(Object.assign(new Error('Too many requests'), { status: 429 }));

      await expect(provider.generate(createMockGenerationRequest({ model: 'gpt-4o' }))).rejects.toBeInstanceOf(
        RateLimitError
      );
    });

    it('should_wrapProviderError_when_apiFails', async () => {
      sdk.create.mockRejectedValueOnce(Object.assign(new Error('Bad gateway'), { status: 502 }));

      const failure = await provider
        .generate(createMockGenerationRequest({ model: 'gpt-4o' }))
        .catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(ProviderError);
      if (failure instanceof ProviderError) {
        expect(failure.statusCode).toBe(502);
        expect(failure.provider).toBe('openai');
        expect(failure.message).toBe('Bad gateway');
      }
    });
  });

  describe('listModels', () => {
    it('should_returnModelIds_when_listSucceeds', async () => {
      sdk.list.mockResolvedValueOnce({ data: [{ id: 'gpt-4o' }, { id: 'gpt-4o-mini' }] });

      expect(await provider.listModels()).toEqual(['gpt-4o', 'gpt-4o-mini']);
    });

    it('should_reportUnavailable_when_listFails', async () => {
      sdk.list.mockRejectedValueOnce(new Error('unauthorized'));

      expect(await provider.isAvailable()).toBe(false);
    });
  });

  describe('getModelCost', () => {
    it('should_matchByPrefix_when_modelHasDatedSuffix', () => {
      expect(provider.getModelCost('gpt-4o-mini-2024-07-18')).toEqual({ inputPer1k: 0.00015, outputPer1k: 0.0006 });
    });
  });
});

describe('GroqProvider', () => {
  beforeEach(() => {
    sdk.create.mockReset();
  });

  it('should_useGroqBaseUrl_when_noneGiven', () => {
    const provider = new GroqProvider({ apiKey: 'test-groq-key' });

    expect(provider.name).toBe('groq');
    expect(OpenAI).toHaveBeenCalledWith({
      apiKey: 'test-groq-key',
      baseURL: GROQ_BASE_URL,
      organization: undefined,
    });
  });

  it('should_reportGroqProvider_when_generating', async () => {
    sdk.create.mockResolvedValueOnce(completion('{"ok":true}', 'stop'));
    const provider = new GroqProvider({ apiKey: 'test-groq-key' });

    const response = await provider.generate(createMockGenerationRequest({ model: 'llama-3.3-70b-versatile' }));

    expect(response.meta.provider).toBe('groq');
    expect(provider.getModelCost('llama-3.3-70b-versatile')).toEqual({ inputPer1k: 0.00059, outputPer1k: 0.00079 });
  });
});
