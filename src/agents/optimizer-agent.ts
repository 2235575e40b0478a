/**
 * Optimizer Agent
 * Consumes proposals from the bus, cuts their cost and answers the
 * orchestrator with an optimized plan
 */

import { z } from 'zod';
import type { TextGenerator } from '../types/index.js';
import {
  createOptimizedPlan,
  isEnvelopeExpired,
  signEnvelope,
  verifyEnvelope,
  type Envelope,
} from '../a2a/envelope.js';
import { toPayload, type Payload } from '../a2a/canonical.js';
import type { MessageBus } from '../a2a/message-bus.js';
import type { StateStore } from '../state/store.js';
import { OfferSchema } from '../models/itinerary.js';
import { DEFAULT_CURRENCY, formatMinor, toMinorUnits } from '../models/money.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { AGENT_IDS } from './identities.js';
import { parseJsonObject } from './json-response.js';
import { buildOptimizationPrompt, OPTIMIZER_SYSTEM_PROMPT } from './prompts.js';

export const OPTIMIZED_PLAN_TTL_SECONDS = 3600;

export const AI_OPTIMIZATION_NOTE = 'AI-powered optimization applied';
export const BASIC_OPTIMIZATION_NOTES = ['Applied standard 10% cost optimization', 'Selected best value options'];
export const STANDARD_OPTIMIZATION_NOTE = 'Standard optimization applied';

const OfferListSchema = z.array(OfferSchema);
const NotesSchema = z.array(z.string()).min(1);

const CARRIED_SECTIONS = ['daily_schedule', 'flights', 'hotels', 'activities'] as const;
const OFFER_SECTIONS = new Set<string>(['flights', 'hotels', 'activities']);

export type OptimizationSource = 'llm' | 'basic';

export interface OptimizationResult {
  taskId: string;
  plan: Payload;
  source: OptimizationSource;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Reduce `estimated_total` by 10%. The reduced total goes into
 * `cost_breakdown.total` when the proposal has a breakdown, otherwise into
 * `total_cost`.
 */
export function basicOptimization(proposal: Readonly<Payload>): Payload {
  const plan: Record<string, unknown> = { ...proposal };
  const estimated = toMinorUnits(proposal.estimated_total);

  if (estimated === undefined) {
    plan.optimization_applied = [STANDARD_OPTIMIZATION_NOTE];
    plan.total_cost = proposal.estimated_total;
    return toPayload(plan);
  }

  const reduced = formatMinor(Math.round(estimated * 0.9));
  const breakdown = proposal.cost_breakdown;
  if (isRecord(breakdown) && Object.keys(breakdown).length > 0) {
    plan.cost_breakdown = { ...breakdown, total: reduced };
  } else {
    plan.total_cost = reduced;
  }
  plan.optimization_applied = [...BASIC_OPTIMIZATION_NOTES];
  return toPayload(plan);
}

/**
 * Merge an LLM-optimized plan over the proposal it came from. Sections the
 * model dropped, or offers it returned in a shape that no longer parses, are
 * taken from the proposal.
 */
export function mergeOptimizedPlan(proposal: Readonly<Payload>, optimized: Record<string, unknown>): Payload {
  const plan: Record<string, unknown> = { ...optimized };

  const notes = NotesSchema.safeParse(plan.optimization_applied);
  plan.optimization_applied = notes.success ? notes.data : [AI_OPTIMIZATION_NOTE];

  for (const section of CARRIED_SECTIONS) {
    const value = plan[section];
    const usable = OFFER_SECTIONS.has(section) ? OfferListSchema.safeParse(value).success : Array.isArray(value);
    if (!usable) plan[section] = proposal[section];
  }

  plan.task_id = proposal.task_id;
  return toPayload(plan);
}

export interface OptimizerAgentOptions {
  generator: TextGenerator;
  bus: MessageBus;
  store: StateStore;
  model: string;
  fallbackModels?: string[];
  signingSecret?: string;
  agentId?: string;
  /** Identity optimized plans are sent to */
  replyTo?: string;
  ttlSeconds?: number;
  now?: () => number;
  logger?: Logger;
}

export class OptimizerAgent {
  readonly agentId: string;
  private generator: TextGenerator;
  private bus: MessageBus;
  private store: StateStore;
  private model: string;
  private fallbackModels: string[];
  private signingSecret?: string;
  private replyTo: string;
  private ttlSeconds: number;
  private now: () => number;
  private logger: Logger;
  private inFlight = new Set<Promise<void>>();
  private unsubscribe?: () => void;

  constructor(options: OptimizerAgentOptions) {
    this.agentId = options.agentId ?? AGENT_IDS.optimizer;
    this.generator = options.generator;
    this.bus = options.bus;
    this.store = options.store;
    this.model = options.model;
    this.fallbackModels = options.fallbackModels ?? [];
    this.signingSecret = options.signingSecret;
    this.replyTo = options.replyTo ?? AGENT_IDS.orchestrator;
    this.ttlSeconds = options.ttlSeconds ?? OPTIMIZED_PLAN_TTL_SECONDS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger({ name: 'optimizer-agent' });
  }

  get running(): boolean {
    return this.unsubscribe !== undefined;
  }

  get pending(): number {
    return this.inFlight.size;
  }

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.bus.subscribe(this.agentId, (envelope) => this.handle(envelope));
    this.logger.info({ agentId: this.agentId }, 'Optimizer listening for proposals');
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
  }

  /**
   * Resolves once every optimization started so far has settled
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  /**
   * Optimize one proposal, persist the result and reply to the orchestrator
   */
  async optimize(envelope: Envelope): Promise<OptimizationResult> {
    const proposal = envelope.payload;
    const taskId = typeof proposal.task_id === 'string' ? proposal.task_id : envelope.correlationId;
    const log = this.logger.child({
      agentId: this.agentId,
      taskId,
      traceId: envelope.traceId,
      correlationId: envelope.correlationId,
      messageId: envelope.messageId,
    });

    let plan: Payload;
    let source: OptimizationSource;
    try {
      plan = await this.optimizeWithLlm(proposal);
      source = 'llm';
    } catch (error) {
      log.warn({ err: error }, 'LLM optimization failed; applying basic optimization');
      plan = basicOptimization(proposal);
      source = 'basic';
    }

    await this.store.set(`optimized_plan:${taskId}`, plan, this.ttlSeconds);
    try {
      await this.store.set(`optimized_plan:${envelope.traceId}`, plan, this.ttlSeconds);
    } catch (error) {
      log.warn({ err: error }, 'Could not store optimized plan under the trace id');
    }

    const unsigned = createOptimizedPlan({
      payload: plan,
      traceId: envelope.traceId,
      correlationId: envelope.correlationId,
      sender: this.agentId,
      receiver: this.replyTo,
    });
    const reply = this.signingSecret ? signEnvelope(unsigned, this.signingSecret) : unsigned;
    this.bus.send(reply);

    log.info({ source, replyId: reply.messageId }, 'Optimized plan sent');
    return { taskId, plan, source };
  }

  private handle(envelope: Envelope): void {
    if (envelope.messageType !== 'proposal') return;

    const log = this.logger.child({ messageId: envelope.messageId, correlationId: envelope.correlationId });
    if (this.signingSecret && !verifyEnvelope(envelope, this.signingSecret)) {
      log.warn('Discarding proposal with an invalid signature');
      return;
    }
    if (isEnvelopeExpired(envelope, this.now())) {
      log.warn('Discarding expired proposal');
      return;
    }

    const task: Promise<void> = this.optimize(envelope)
      .then(
        () => undefined,
        (error: unknown) => {
          log.error({ err: error }, 'Optimization failed');
        }
      )
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private async optimizeWithLlm(proposal: Readonly<Payload>): Promise<Payload> {
    const currency = typeof proposal.currency === 'string' ? proposal.currency : DEFAULT_CURRENCY;
    const budgetMax = typeof proposal.budget_max === 'number' ? proposal.budget_max : 0;
    const currentTotal = (toMinorUnits(proposal.estimated_total) ?? 0) / 100;

    const { response } = await this.generator.route({
      model: this.model,
      fallback: this.fallbackModels,
      prompt: buildOptimizationPrompt({ ...proposal }, budgetMax, currentTotal, currency),
      systemPrompt: OPTIMIZER_SYSTEM_PROMPT,
      temperature: 0.5,
      maxTokens: 2500,
      responseFormat: 'json',
    });

    return mergeOptimizedPlan(proposal, parseJsonObject(response.content));
  }
}
