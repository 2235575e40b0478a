/**
 * Research Agent
 * Destination research from an LLM plus supporting web results, persisted
 * for the other agents under the run's correlation id
 */

import { z } from 'zod';
import type { TextGenerator } from '../types/index.js';
import { ResponseParseError } from '../types/index.js';
import type { SearchClient } from '../integrations/web-search.js';
import type { StateStore } from '../state/store.js';
import type { MonitoringCallbacks } from '../monitoring/callbacks.js';
import type { ResearchResult } from '../models/research.js';
import { DEFAULT_CURRENCY } from '../models/money.js';
import type { TaskContext } from '../workflows/task-context.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { AGENT_IDS } from './identities.js';
import { parseJsonObject } from './json-response.js';
import { buildResearchPrompt, RESEARCH_SYSTEM_PROMPT } from './prompts.js';

export const RESEARCH_TTL_SECONDS = 1800;

// The model sometimes answers a text field with a list or an object
const TextField = z
  .unknown()
  .transform((value) => {
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') return value;
    if (Array.isArray(value)) return value.map((item) => (typeof item === 'string' ? item : JSON.stringify(item))).join('\n');
    return JSON.stringify(value);
  });

const ResearchReplySchema = z.object({
  weather_summary: TextField,
  accommodation_suggestions: TextField,
  top_attractions: TextField,
  estimated_daily_cost: z.coerce.number().finite().optional().catch(undefined),
  currency: z.string().length(3).optional().catch(undefined),
  travel_tips: TextField,
  best_time_to_visit: TextField,
});

export interface ResearchAgentOptions {
  generator: TextGenerator;
  search: SearchClient;
  store: StateStore;
  model: string;
  fallbackModels?: string[];
  agentId?: string;
  maxResults?: number;
  ttlSeconds?: number;
  logger?: Logger;
}

export class ResearchAgent {
  readonly agentId: string;
  private generator: TextGenerator;
  private search: SearchClient;
  private store: StateStore;
  private model: string;
  private fallbackModels: string[];
  private maxResults: number;
  private ttlSeconds: number;
  private logger: Logger;

  constructor(options: ResearchAgentOptions) {
    this.agentId = options.agentId ?? AGENT_IDS.research;
    this.generator = options.generator;
    this.search = options.search;
    this.store = options.store;
    this.model = options.model;
    this.fallbackModels = options.fallbackModels ?? [];
    this.maxResults = options.maxResults ?? 8;
    this.ttlSeconds = options.ttlSeconds ?? RESEARCH_TTL_SECONDS;
    this.logger = options.logger ?? createLogger({ name: 'research-agent' });
  }

  /**
   * Research the context's destination and store the result under
   * `{correlationId}:research` and `{correlationId}:web_results`.
   * A failing LLM call propagates; an unreadable reply leaves the text fields empty.
   */
  async run(context: TaskContext, callbacks: MonitoringCallbacks): Promise<ResearchResult> {
    const { request, traveler } = context.request;
    const corr = context.correlationId;
    const log = this.logger.child({ agentId: this.agentId, taskId: context.taskId, correlationId: corr, traceId: context.traceId });

    log.info({ destination: request.destination }, 'Research started');

    const startedAt = Date.now();
    const { response } = await this.generator.route({
      model: this.model,
      fallback: this.fallbackModels,
      prompt: buildResearchPrompt(context.request),
      systemPrompt: RESEARCH_SYSTEM_PROMPT,
      temperature: 0.4,
      maxTokens: 2000,
      responseFormat: 'json',
    });
    callbacks.onApiCall(context.taskId, this.agentId, 'llm.research', {
      latencyMs: Date.now() - startedAt,
      data: { model: response.meta.model, provider: response.meta.provider },
    });

    const reply = this.readReply(response.content, log);

    const query = `${request.destination} travel tips and best places to visit`;
    const search = await this.search.search(query, this.maxResults);
    callbacks.onApiCall(context.taskId, this.agentId, 'web.search', {
      data: { query, results: search.totalResults },
    });

    const result: ResearchResult = {
      destination: request.destination,
      dateRange: { startDate: request.startDate.slice(0, 10), endDate: request.endDate.slice(0, 10) },
      interests: traveler.preferences.interests,
      weatherSummary: reply.weather_summary,
      accommodationSuggestions: reply.accommodation_suggestions,
      topAttractions: reply.top_attractions,
      ...(reply.estimated_daily_cost !== undefined && { estimatedDailyCost: reply.estimated_daily_cost }),
      currency: reply.currency ?? request.currency ?? DEFAULT_CURRENCY,
      travelTips: reply.travel_tips,
      bestTimeToVisit: reply.best_time_to_visit,
      webResults: search.results,
      sourceTools: ['llm_research', 'web_search'],
    };

    await this.store.set(`${corr}:research`, result, this.ttlSeconds);
    await this.store.set(`${corr}:web_results`, search.results, this.ttlSeconds);

    log.info({ storedKeys: [`${corr}:research`, `${corr}:web_results`] }, 'Research completed');
    return result;
  }

  private readReply(content: string, log: Logger): z.infer<typeof ResearchReplySchema> {
    try {
      return ResearchReplySchema.parse(parseJsonObject(content));
    } catch (error) {
      if (!(error instanceof ResponseParseError)) throw error;
      log.warn({ err: error }, 'Research reply was not JSON; continuing without research text');
      return ResearchReplySchema.parse({});
    }
  }
}
