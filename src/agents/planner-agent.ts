/**
 * Planner Agent
 * Turns a planning request into an LLM-drafted itinerary and publishes it
 * to the optimizer as a signed proposal
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { TextGenerator } from '../types/index.js';
import { ResponseParseError } from '../types/index.js';
import { createProposal, signEnvelope, type Envelope } from '../a2a/envelope.js';
import { toPayload } from '../a2a/canonical.js';
import type { MessageBus } from '../a2a/message-bus.js';
import type { StateStore } from '../state/store.js';
import type { MonitoringCallbacks } from '../monitoring/callbacks.js';
import type { Offer, OfferType } from '../models/itinerary.js';
import { DEFAULT_CURRENCY, formatMinor, money, zero } from '../models/money.js';
import type { TaskContext } from '../workflows/task-context.js';
import type { Tracer } from '../tracing/tracer.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { AGENT_IDS } from './identities.js';
import { parseJsonObject } from './json-response.js';
import { buildPlanningPrompt, PLANNER_SYSTEM_PROMPT } from './prompts.js';

export const PLAN_TTL_SECONDS = 3600;

const Amount = z.union([z.number(), z.string()]).catch(0);

const TransportSchema = z.object({
  to_destination: z
    .object({
      method: z.string().default('Transport'),
      cost: Amount.default(0),
      duration: z.string().optional(),
    })
    .optional(),
});

const AccommodationSchema = z.object({
  name: z.string().default('Accommodation'),
  cost_per_night: Amount.optional(),
  total_cost: Amount.default(0),
  recommendation: z.string().default(''),
});

const PlannedActivitySchema = z.object({
  time: z.string().default(''),
  name: z.string().default('Activity'),
  description: z.string().default(''),
  location: z.string().default(''),
  cost: Amount.default(0),
});

const PlannedDaySchema = z.object({
  activities: z.array(z.unknown()).default([]),
});

const CostBreakdownSchema = z
  .object({
    total: Amount.optional(),
    currency: z.string().optional(),
  })
  .passthrough();

function offerId(kind: string): string {
  return `${kind}-${randomUUID().slice(0, 8)}`;
}

function simpleOffer(
  offerType: OfferType,
  fields: { provider: string; title: string; description: string; total: unknown; base?: unknown; location: string },
  currency: string
): Offer {
  const total = money(fields.total, currency);
  return {
    offerId: offerId(offerType === 'flight' ? 'transport' : offerType),
    offerType,
    provider: fields.provider,
    title: fields.title,
    description: fields.description,
    pricing: {
      basePrice: fields.base === undefined ? total : money(fields.base, currency),
      taxes: zero(currency),
      fees: zero(currency),
      total,
    },
    location: { name: fields.location, city: fields.location, country: '' },
    amenities: [],
  };
}

/**
 * Offers for the trip to the destination
 */
export function transportOffers(data: unknown, currency: string): Offer[] {
  const parsed = TransportSchema.safeParse(data ?? {});
  const toDestination = parsed.success ? parsed.data.to_destination : undefined;
  if (!toDestination) return [];

  return [
    simpleOffer(
      'flight',
      {
        provider: toDestination.method,
        title: toDestination.method,
        description: `Duration: ${toDestination.duration ?? 'N/A'}`,
        total: toDestination.cost,
        location: 'Destination',
      },
      currency
    ),
  ];
}

export function accommodationOffers(data: unknown, currency: string): Offer[] {
  if (data === undefined || data === null) return [];
  const parsed = AccommodationSchema.safeParse(data);
  if (!parsed.success) return [];

  const stay = parsed.data;
  return [
    simpleOffer(
      'hotel',
      {
        provider: stay.name,
        title: stay.name,
        description: stay.recommendation,
        total: stay.total_cost,
        base: stay.cost_per_night,
        location: stay.name,
      },
      currency
    ),
  ];
}

export function activityOffers(schedule: unknown[], currency: string): Offer[] {
  const offers: Offer[] = [];
  for (const day of schedule) {
    const parsedDay = PlannedDaySchema.safeParse(day);
    if (!parsedDay.success) continue;

    for (const entry of parsedDay.data.activities) {
      const parsed = PlannedActivitySchema.safeParse(entry);
      if (!parsed.success) continue;
      const activity = parsed.data;
      offers.push(
        simpleOffer(
          'activity',
          {
            provider: activity.location || 'Local Activity',
            title: activity.name,
            description: `${activity.time}: ${activity.description}`,
            total: activity.cost,
            location: activity.location,
          },
          currency
        )
      );
    }
  }
  return offers;
}

/**
 * Publishes a proposal for a run and persists its working payload
 */
export interface ProposalProducer {
  propose(context: TaskContext, callbacks: MonitoringCallbacks): Promise<Envelope>;
}

export interface PlannerAgentOptions {
  generator: TextGenerator;
  bus: MessageBus;
  store: StateStore;
  model: string;
  fallbackModels?: string[];
  signingSecret?: string;
  agentId?: string;
  /** Identity proposals are addressed to */
  optimizerId?: string;
  ttlSeconds?: number;
  tracer?: Tracer;
  logger?: Logger;
}

export class PlannerAgent implements ProposalProducer {
  readonly agentId: string;
  private generator: TextGenerator;
  private bus: MessageBus;
  private store: StateStore;
  private model: string;
  private fallbackModels: string[];
  private signingSecret?: string;
  private optimizerId: string;
  private ttlSeconds: number;
  private tracer?: Tracer;
  private logger: Logger;

  constructor(options: PlannerAgentOptions) {
    this.agentId = options.agentId ?? AGENT_IDS.planner;
    this.generator = options.generator;
    this.bus = options.bus;
    this.store = options.store;
    this.model = options.model;
    this.fallbackModels = options.fallbackModels ?? [];
    this.signingSecret = options.signingSecret;
    this.optimizerId = options.optimizerId ?? AGENT_IDS.optimizer;
    this.ttlSeconds = options.ttlSeconds ?? PLAN_TTL_SECONDS;
    this.tracer = options.tracer;
    this.logger = options.logger ?? createLogger({ name: 'planner-agent' });
  }

  async propose(context: TaskContext, callbacks: MonitoringCallbacks): Promise<Envelope> {
    const log = this.logger.child({
      agentId: this.agentId,
      taskId: context.taskId,
      traceId: context.traceId,
      correlationId: context.correlationId,
    });
    const { traveler, request } = context.request;
    const requestCurrency = request.currency ?? DEFAULT_CURRENCY;

    const itinerary = await this.draftItinerary(context, callbacks, log);

    const costBreakdown = CostBreakdownSchema.safeParse(itinerary.cost_breakdown ?? {});
    const breakdown = costBreakdown.success ? costBreakdown.data : {};
    const currency = breakdown.currency ?? requestCurrency;
    const schedule = Array.isArray(itinerary.daily_schedule) ? itinerary.daily_schedule : [];

    const flights = transportOffers(itinerary.transportation, currency);
    const hotels = accommodationOffers(itinerary.accommodation, currency);
    const activities = activityOffers(schedule, currency);

    const payload = toPayload({
      task_id: context.taskId,
      destination: typeof itinerary.destination === 'string' ? itinerary.destination : request.destination,
      daily_schedule: schedule,
      flights,
      hotels,
      activities,
      estimated_total: formatMinor(money(breakdown.total ?? 0, currency).minor),
      currency,
      cost_breakdown: breakdown,
      budget_max: traveler.preferences.budgetMax,
      budget_min: traveler.preferences.budgetMin,
    });

    await this.store.set(`llm_itinerary:${context.taskId}`, itinerary, this.ttlSeconds);
    await this.store.set(`proposal:${context.taskId}`, payload, this.ttlSeconds);

    const unsigned = createProposal({
      payload,
      traceId: context.traceId,
      correlationId: context.correlationId,
      sender: this.agentId,
      receiver: this.optimizerId,
    });
    const envelope = this.signingSecret ? signEnvelope(unsigned, this.signingSecret) : unsigned;

    this.bus.send(envelope);

    callbacks.onAgentMessage(context.taskId, this.agentId, 'proposal', `Sent proposal to ${this.optimizerId}`, {
      messageId: envelope.messageId,
      days: schedule.length,
    });
    log.info({ messageId: envelope.messageId, offers: flights.length + hotels.length + activities.length }, 'Proposal published');

    return envelope;
  }

  /**
   * Ask the LLM for an itinerary. An unreadable reply becomes an empty draft.
   */
  private async draftItinerary(
    context: TaskContext,
    callbacks: MonitoringCallbacks,
    log: Logger
  ): Promise<Record<string, unknown>> {
    const prompt = buildPlanningPrompt(context.request, context.intermediateResults.research);

    const generate = async () => {
      const startedAt = Date.now();
      const { response } = await this.generator.route({
        model: this.model,
        fallback: this.fallbackModels,
        prompt,
        systemPrompt: PLANNER_SYSTEM_PROMPT,
        temperature: 0.7,
        maxTokens: 3000,
        responseFormat: 'json',
      });
      callbacks.onApiCall(context.taskId, this.agentId, 'llm.plan', {
        latencyMs: Date.now() - startedAt,
        data: { model: response.meta.model, provider: response.meta.provider, cost: response.meta.cost },
      });
      return response;
    };

    const response = this.tracer
      ? await this.tracer.trace(
          'planner.generate',
          async (span) => {
            const result = await generate();
            this.tracer?.recordLLMCall(span, {
              provider: result.meta.provider,
              model: result.meta.model,
              tokens: result.meta.tokens,
              cost: result.meta.cost,
              latencyMs: result.meta.latencyMs,
            });
            return result;
          },
          { taskId: context.taskId },
          { traceId: context.traceId, kind: 'client' }
        )
      : await generate();

    try {
      const itinerary = parseJsonObject(response.content);
      const days = Array.isArray(itinerary.daily_schedule) ? itinerary.daily_schedule.length : 0;
      if (days === 0) {
        log.warn({ keys: Object.keys(itinerary) }, 'LLM itinerary has an empty daily_schedule');
      }
      return itinerary;
    } catch (error) {
      if (!(error instanceof ResponseParseError)) throw error;
      log.error({ err: error, preview: response.content.slice(0, 500) }, 'Failed to parse LLM itinerary');
      return { destination: context.request.request.destination, daily_schedule: [] };
    }
  }
}
