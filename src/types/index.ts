/**
 * Core type definitions for planwire
 */

// ============================================================================
// Provider Types
// ============================================================================

export type ProviderName = 'openai' | 'groq' | 'google' | 'anthropic';

export interface ProviderCredentials {
  apiKey: string;
  baseUrl?: string;
  organizationId?: string;
}

export interface ProvidersConfig {
  openai?: ProviderCredentials;
  groq?: ProviderCredentials;
  google?: ProviderCredentials;
  anthropic?: ProviderCredentials;
}

// ============================================================================
// Generation Request/Response Types
// ============================================================================

export interface GenerationRequest {
  model: string;
  prompt: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  /** 'json' asks the provider for a single JSON object where it supports that */
  responseFormat?: 'text' | 'json';

  // Routing
  fallback?: string[];
  timeout?: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface GenerationMeta {
  latencyMs: number;
  tokens: TokenUsage;
  cost: number;
  model: string;
  provider: ProviderName;
  failoverAttempts: number;
}

export interface GenerationResponse {
  content: string;
  finishReason: 'stop' | 'length' | 'content_filter' | 'other';
  meta: GenerationMeta;
}

export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryableErrors: string[];
}

export interface TracingConfig {
  enabled: boolean;
  exportEndpoint?: string;
  sampleRate?: number;
  exportIntervalMs?: number;
}

// ============================================================================
// Provider Adapter Interface
// ============================================================================

export interface LlmProvider {
  name: ProviderName;

  generate(request: GenerationRequest): Promise<GenerationResponse>;

  listModels(): Promise<string[]>;

  isAvailable(): Promise<boolean>;

  getModelCost(model: string): { inputPer1k: number; outputPer1k: number };
}

/**
 * Anything that can turn a generation request into text. Agents depend on
 * this rather than on the router so tests can hand them a stub.
 */
export interface TextGenerator {
  route(request: GenerationRequest): Promise<{ response: GenerationResponse }>;
}

// ============================================================================
// Error Types
// ============================================================================

export class PlannerError extends Error {
  constructor(
    message: string,
    public code: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'PlannerError';
  }
}

export class CanonicalizationError extends PlannerError {
  constructor(
    message: string,
    public path: string
  ) {
    super(`Cannot canonicalize value at ${path}: ${message}`, 'CANONICALIZATION');
    this.name = 'CanonicalizationError';
  }
}

export class InvalidTransitionError extends PlannerError {
  constructor(
    public from: string,
    public to: string
  ) {
    super(`Invalid task status transition: ${from} -> ${to}`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

export class ResponseParseError extends PlannerError {
  constructor(message: string, cause?: Error) {
    super(message, 'RESPONSE_PARSE', cause);
    this.name = 'ResponseParseError';
  }
}

export class ConfigError extends PlannerError {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG');
    this.name = 'ConfigError';
  }
}

export class ProviderError extends PlannerError {
  constructor(
    message: string,
    public provider: ProviderName,
    public statusCode?: number
  ) {
    super(message, 'PROVIDER_ERROR');
    this.name = 'ProviderError';
  }
}

export class RateLimitError extends PlannerError {
  constructor(
    public provider: ProviderName,
    public retryAfterMs?: number
  ) {
    super(`Rate limit exceeded for ${provider}`, 'RATE_LIMIT');
    this.name = 'RateLimitError';
  }
}

export class TimeoutError extends PlannerError {
  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export class AllProvidersFailedError extends PlannerError {
  constructor(
    public attempts: Array<{ provider: ProviderName; model: string; error: Error }>
  ) {
    super(
      `All providers failed: ${attempts.map(a => `${a.provider}/${a.model}`).join(', ')}`,
      'ALL_PROVIDERS_FAILED'
    );
    this.name = 'AllProvidersFailedError';
  }
}
