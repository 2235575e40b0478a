/**
 * Shared mock utilities for planwire tests
 */

import { vi } from 'vitest';
import type {
  GenerationRequest,
  GenerationResponse,
  LlmProvider,
  ProviderName,
  TextGenerator,
  TokenUsage,
} from '../../src/types/index.js';
import { ProviderError, RateLimitError, TimeoutError } from '../../src/types/index.js';
import { createLogger, type Logger } from '../../src/logging/logger.js';
import { MonitoringCallbacks, type MonitoringEvent } from '../../src/monitoring/callbacks.js';
import { PlanningRequestSchema, type PlanningRequest } from '../../src/models/itinerary.js';
import type { SearchClient, SearchResponse } from '../../src/integrations/web-search.js';
import { TaskContext } from '../../src/workflows/task-context.js';

export const TEST_SECRET = 'test-secret';

export function silentLogger(): Logger {
  return createLogger({ name: 'test', level: 'silent' });
}

// ============================================================================
// LLM Mocks
// ============================================================================

export function createMockGenerationRequest(overrides?: Partial<GenerationRequest>): GenerationRequest {
  return {
    model: 'test-model',
    prompt: 'Hello, world!',
    maxTokens: 1024,
    temperature: 0.7,
    ...overrides,
  };
}

export function createMockGenerationResponse(overrides?: {
  content?: string;
  provider?: ProviderName;
  model?: string;
  tokens?: Partial<TokenUsage>;
  cost?: number;
  latencyMs?: number;
}): GenerationResponse {
  const inputTokens = overrides?.tokens?.inputTokens ?? 10;
  const outputTokens = overrides?.tokens?.outputTokens ?? 20;

  return {
    content: overrides?.content ?? 'Mock response',
    finishReason: 'stop',
    meta: {
      latencyMs: overrides?.latencyMs ?? 100,
      tokens: {
        inputTokens,
        outputTokens,
        totalTokens: overrides?.tokens?.totalTokens ?? inputTokens + outputTokens,
      },
      cost: overrides?.cost ?? 0.001,
      model: overrides?.model ?? 'test-model',
      provider: overrides?.provider ?? 'groq',
      failoverAttempts: 0,
    },
  };
}

/**
 * A provider whose methods are all vi.fn, succeeding by default
 */
export function createMockProvider(name: ProviderName) {
  return {
    name,
    generate: vi.fn(async (request: GenerationRequest) =>
      createMockGenerationResponse({ provider: name, model: request.model })
    ),
    listModels: vi.fn(async () => ['test-model']),
    isAvailable: vi.fn(async () => true),
    getModelCost: vi.fn(() => ({ inputPer1k: 0.001, outputPer1k: 0.002 })),
  } satisfies LlmProvider;
}

type Reply = string | Error;

/**
 * A TextGenerator answering each call with the next reply in order; the last
 * reply repeats. Errors are thrown.
 */
export function createStubGenerator(...replies: Reply[]) {
  let index = 0;
  const route = vi.fn(async (request: GenerationRequest) => {
    const reply = replies[Math.min(index, replies.length - 1)];
    index += 1;
    if (reply instanceof Error) throw reply;
    return { response: createMockGenerationResponse({ content: reply, model: request.model }) };
  });
  return { route } satisfies TextGenerator;
}

export function createMockRateLimitError(provider: ProviderName): RateLimitError {
  return new RateLimitError(provider, 1000);
}

export function createMockTimeoutError(): TimeoutError {
  return new TimeoutError(30000);
}

export function createMockNetworkError(): ProviderError {
  return new ProviderError('Network error: connection refused', 'openai');
}

// ============================================================================
// Domain fixtures
// ============================================================================

export function createPlanningRequest(overrides?: {
  destination?: string;
  startDate?: string;
  endDate?: string;
  currency?: string;
  budgetMax?: number;
}): PlanningRequest {
  return PlanningRequestSchema.parse({
    traveler: {
      travelerId: 'traveler-1',
      name: 'Test Traveler',
      homeLocation: 'Mumbai',
      preferences: {
        budgetMin: 20000,
        budgetMax: overrides?.budgetMax ?? 60000,
        interests: ['heritage', 'food'],
      },
    },
    request: {
      destination: overrides?.destination ?? 'Jaipur',
      startDate: overrides?.startDate ?? '2025-03-10',
      endDate: overrides?.endDate ?? '2025-03-13',
      ...(overrides?.currency ? { currency: overrides.currency } : {}),
    },
  });
}

export function createTaskContext(overrides?: {
  taskId?: string;
  traceId?: string;
  correlationId?: string;
  request?: PlanningRequest;
}): TaskContext {
  return new TaskContext({
    taskId: overrides?.taskId ?? 'task-1',
    traceId: overrides?.traceId ?? 'trace-1',
    correlationId: overrides?.correlationId ?? 'corr-1',
    request: overrides?.request ?? createPlanningRequest(),
  });
}

/**
 * Callbacks with a listener that records every event
 */
export function createRecordingCallbacks(ids?: { traceId?: string; correlationId?: string }) {
  const events: MonitoringEvent[] = [];
  const callbacks = new MonitoringCallbacks({
    traceId: ids?.traceId ?? 'trace-1',
    correlationId: ids?.correlationId ?? 'corr-1',
    logger: silentLogger(),
  });
  callbacks.registerListener((event) => {
    events.push(event);
  });
  return { callbacks, events };
}

export function createStubSearch(response?: Partial<SearchResponse>) {
  const search = vi.fn(async (query: string) => ({
    query,
    results: response?.results ?? [
      { title: 'Amber Fort', url: 'https://example.com/amber', snippet: 'Hilltop fort', source: 'example.com' },
    ],
    totalResults: response?.totalResults ?? 1,
  }));
  return { search } satisfies SearchClient;
}

/**
 * A planner reply shaped like the planning prompt asks for
 */
export function plannerReply(overrides?: Record<string, unknown>): string {
  return JSON.stringify({
    destination: 'Jaipur',
    duration_days: 3,
    accommodation: {
      name: 'Haveli Stay',
      cost_per_night: 3500,
      total_nights: 3,
      total_cost: 10500,
      recommendation: 'Central and quiet',
    },
    daily_schedule: [
      {
        day: 1,
        date: 'March 10, 2025',
        activities: [
          {
            time: '9:00 AM - 11:00 AM',
            name: 'Amber Fort',
            description: 'Morning fort visit',
            location: 'Amer',
            cost: 500,
          },
        ],
      },
      {
        day: 2,
        date: 'March 11, 2025',
        activities: [
          {
            time: '2:00 PM - 4:30 PM',
            name: 'City Palace',
            description: 'Museum and courtyards',
            location: 'Old City',
            cost: 700,
          },
        ],
      },
    ],
    transportation: {
      to_destination: { method: 'Train', cost: 1500, duration: '5 hours' },
    },
    cost_breakdown: {
      accommodation: 10500,
      activities: 1200,
      transportation: 1500,
      total: 20000,
      currency: 'INR',
    },
    ...overrides,
  });
}
