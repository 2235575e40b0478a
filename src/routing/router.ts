/**
 * Routing Engine
 * Model selection, retry with backoff, and failover between providers
 */

import type {
  LlmProvider,
  ProviderName,
  GenerationRequest,
  GenerationResponse,
  RetryConfig,
  TextGenerator,
} from '../types/index.js';
import { AllProvidersFailedError, TimeoutError } from '../types/index.js';
import { getProviderForModel } from '../providers/index.js';
import { createLogger, type Logger } from '../logging/logger.js';

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableErrors: ['RATE_LIMIT', 'TIMEOUT', 'NETWORK_ERROR', '503', '529'],
};

export interface RouterConfig {
  providers: Map<ProviderName, LlmProvider>;
  retry?: Partial<RetryConfig>;
  defaultTimeout?: number;
  logger?: Logger;
}

export interface RouteAttempt {
  provider: ProviderName;
  model: string;
  success: boolean;
  error?: Error;
  latencyMs: number;
}

export interface RouteResult {
  response: GenerationResponse;
  attempts: RouteAttempt[];
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Router handles model selection and failover between providers
 */
export class Router implements TextGenerator {
  private providers: Map<ProviderName, LlmProvider>;
  private retryConfig: RetryConfig;
  private defaultTimeout: number;
  private logger: Logger;

  constructor(config: RouterConfig) {
    this.providers = config.providers;
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...config.retry };
    this.defaultTimeout = config.defaultTimeout ?? 60000;
    this.logger = config.logger ?? createLogger({ name: 'router' });
  }

  /**
   * Route a generation request with automatic failover
   */
  async route(request: GenerationRequest): Promise<RouteResult> {
    const models = this.buildModelChain(request);
    const attempts: RouteAttempt[] = [];

    for (const { model, provider } of models) {
      const adapter = this.providers.get(provider);
      if (!adapter) {
        attempts.push({
          provider,
          model,
          success: false,
          error: new Error(`Provider ${provider} not configured`),
          latencyMs: 0,
        });
        continue;
      }

      // Try with retries
      for (let retry = 0; retry <= this.retryConfig.maxRetries; retry++) {
        const startTime = Date.now();
        try {
          const response = await this.executeWithTimeout(
            adapter.generate({ ...request, model }),
            request.timeout ?? this.defaultTimeout
          );

          attempts.push({
            provider,
            model,
            success: true,
            latencyMs: Date.now() - startTime,
          });

          return {
            response: { ...response, meta: { ...response.meta, failoverAttempts: attempts.length - 1 } },
            attempts,
          };
        } catch (caught) {
          const error = toError(caught);
          const isRetryable = this.isRetryable(error);

          attempts.push({
            provider,
            model,
            success: false,
            error,
            latencyMs: Date.now() - startTime,
          });

          this.logger.warn(
            { provider, model, retry, retryable: isRetryable, err: error },
            `Generation failed on ${provider}/${model}`
          );

          if (!isRetryable || retry === this.retryConfig.maxRetries) {
            // Move to next model in chain
            break;
          }

          // Wait before retry with exponential backoff
          const delay = Math.min(
            this.retryConfig.initialDelayMs * Math.pow(this.retryConfig.backoffMultiplier, retry),
            this.retryConfig.maxDelayMs
          );
          await this.sleep(delay);
        }
      }
    }

    throw new AllProvidersFailedError(
      attempts.map((attempt) => ({
        provider: attempt.provider,
        model: attempt.model,
        error: attempt.error ?? new Error('Unknown error'),
      }))
    );
  }

  /**
   * Build the model chain for failover
   */
  private buildModelChain(request: GenerationRequest): Array<{ model: string; provider: ProviderName }> {
    const chain: Array<{ model: string; provider: ProviderName }> = [];

    for (const model of [request.model, ...(request.fallback ?? [])]) {
      const provider = getProviderForModel(model);
      if (provider) {
        chain.push({ model, provider });
      }
    }

    return chain;
  }

  /**
   * Execute a promise with timeout
   */
  private async executeWithTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([promise, timeoutPromise]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Check if an error is retryable
   */
  private isRetryable(error: Error): boolean {
    const rawCode = 'code' in error ? error.code : undefined;
    const rawStatus =
      'statusCode' in error ? error.statusCode : 'status' in error ? error.status : undefined;
    const errorCode = rawCode !== undefined ? String(rawCode) : '';
    const errorStatus = rawStatus !== undefined ? String(rawStatus) : '';

    return this.retryConfig.retryableErrors.some(
      (code) => errorCode.includes(code) || errorStatus.includes(code) || error.message.includes(code)
    );
  }

  /**
   * Sleep for a given duration
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  /**
   * Get available providers
   */
  getAvailableProviders(): ProviderName[] {
    return Array.from(this.providers.keys());
  }

  /**
   * Check if a provider is available
   */
  async isProviderAvailable(provider: ProviderName): Promise<boolean> {
    const adapter = this.providers.get(provider);
    if (!adapter) return false;
    return adapter.isAvailable();
  }
}
