/**
 * Provider Registry
 * Central registry for all LLM provider adapters
 */

export { BaseProvider, type ModelPricing } from './base.js';
export { AnthropicProvider } from './anthropic.js';
export { OpenAIProvider, GroqProvider, GROQ_BASE_URL } from './openai.js';
export { GoogleProvider } from './google.js';

import type { LlmProvider, ProviderName, ProvidersConfig } from '../types/index.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAIProvider, GroqProvider } from './openai.js';
import { GoogleProvider } from './google.js';

/**
 * Create provider instances for every provider with an API key
 */
export function createProviders(config: ProvidersConfig): Map<ProviderName, LlmProvider> {
  const providers = new Map<ProviderName, LlmProvider>();

  if (config.groq?.apiKey) {
    providers.set('groq', new GroqProvider(config.groq));
  }

  if (config.openai?.apiKey) {
    providers.set('openai', new OpenAIProvider(config.openai));
  }

  if (config.google?.apiKey) {
    providers.set('google', new GoogleProvider(config.google));
  }

  if (config.anthropic?.apiKey) {
    providers.set('anthropic', new AnthropicProvider(config.anthropic));
  }

  return providers;
}

const PREFIXES: Array<[string, ProviderName]> = [
  ['claude', 'anthropic'],
  ['gpt', 'openai'],
  ['o1', 'openai'],
  ['gemini', 'google'],
  ['llama', 'groq'],
  ['mixtral', 'groq'],
  ['gemma', 'groq'],
];

/**
 * Get provider name for a model
 */
export function getProviderForModel(model: string): ProviderName | undefined {
  return PREFIXES.find(([prefix]) => model.startsWith(prefix))?.[1];
}
