/**
 * Planner Workflow
 * Drives one planning run: research, propose, await optimization, assemble
 */

import { verifyEnvelope } from '../a2a/envelope.js';
import type { MessageBus, ReceiveOptions } from '../a2a/message-bus.js';
import type { StateStore } from '../state/store.js';
import type { MonitoringCallbacks } from '../monitoring/callbacks.js';
import { EMPTY_PLAN, type Itinerary, type PlanningRequest } from '../models/itinerary.js';
import type { ResearchResult } from '../models/research.js';
import { formatMoney } from '../models/money.js';
import type { ProposalProducer } from '../agents/planner-agent.js';
import { AGENT_IDS } from '../agents/identities.js';
import { createNoopTracer, type Span, type SpanContext, type Tracer } from '../tracing/tracer.js';
import type { Logger } from '../logging/logger.js';
import { TaskContext } from './task-context.js';
import { assembleItinerary } from './assembly.js';

export const DEFAULT_OPTIMIZATION_TIMEOUT_MS = 30000;

export interface Researcher {
  run(context: TaskContext, callbacks: MonitoringCallbacks): Promise<ResearchResult>;
}

export type PlanSource = 'bus' | 'task_key' | 'trace_key' | 'empty';

export interface AwaitedPlan {
  plan: Record<string, unknown>;
  source: PlanSource;
}

export interface PlannerWorkflowOptions {
  bus: MessageBus;
  store: StateStore;
  planner: ProposalProducer;
  research?: Researcher;
  tracer?: Tracer;
  logger: Logger;
  optimizationTimeoutMs?: number;
  signingSecret?: string;
  /** Identity the workflow receives optimized plans on */
  agentId?: string;
  now?: () => Date;
}

export interface ExecuteOptions {
  taskId?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class PlannerWorkflow {
  private bus: MessageBus;
  private store: StateStore;
  private planner: ProposalProducer;
  private research?: Researcher;
  private tracer: Tracer;
  private logger: Logger;
  private optimizationTimeoutMs: number;
  private signingSecret?: string;
  private agentId: string;
  private now?: () => Date;

  constructor(options: PlannerWorkflowOptions) {
    this.bus = options.bus;
    this.store = options.store;
    this.planner = options.planner;
    this.research = options.research;
    this.tracer = options.tracer ?? createNoopTracer();
    this.logger = options.logger;
    this.optimizationTimeoutMs = options.optimizationTimeoutMs ?? DEFAULT_OPTIMIZATION_TIMEOUT_MS;
    this.signingSecret = options.signingSecret;
    this.agentId = options.agentId ?? AGENT_IDS.orchestrator;
    this.now = options.now;
  }

  /**
   * Run the whole pipeline for one request. Any failure marks the task
   * failed, emits task_error and is rethrown.
   */
  async execute(request: PlanningRequest, callbacks: MonitoringCallbacks, options: ExecuteOptions = {}): Promise<Itinerary> {
    const context = new TaskContext({
      taskId: options.taskId,
      correlationId: callbacks.correlationId,
      traceId: callbacks.traceId,
      request,
      now: this.now,
    });
    const log = this.logger.child({
      taskId: context.taskId,
      traceId: context.traceId,
      correlationId: context.correlationId,
    });

    context.transition('running', callbacks);
    callbacks.onTaskStart(context.taskId, {
      agentId: this.agentId,
      message: `Planning trip to ${request.request.destination}`,
      data: { destination: request.request.destination },
    });

    try {
      const itinerary = await this.span('workflow.execute', context, (span) =>
        this.run(context, callbacks, log, span.getContext())
      );

      context.transition('completed', callbacks);
      callbacks.onTaskEnd(context.taskId, {
        agentId: this.agentId,
        message: 'Itinerary ready',
        data: { itineraryId: itinerary.itineraryId, totalCost: formatMoney(itinerary.totalCost.total) },
      });
      return itinerary;
    } catch (error) {
      if (context.status === 'running') context.transition('failed', callbacks);
      const cause = error instanceof Error ? error : new Error(String(error));
      callbacks.onTaskError(context.taskId, cause, { agentId: this.agentId, message: `Workflow failed: ${cause.message}` });
      log.error({ err: cause }, 'Planning run failed');
      throw error;
    }
  }

  /**
   * Wait for the optimizer's reply on the bus, then fall back to the stored
   * plan under the task id, the trace id, and finally an empty plan.
   */
  async awaitOptimization(context: TaskContext, timeoutMs: number = this.optimizationTimeoutMs): Promise<AwaitedPlan> {
    const deadline = Date.now() + timeoutMs;
    const log = this.logger.child({ taskId: context.taskId, correlationId: context.correlationId });
    const filter: ReceiveOptions = {
      messageType: 'optimized_plan',
      match: (candidate) => candidate.correlationId === context.correlationId,
    };

    for (;;) {
      const envelope = await this.bus.receive(this.agentId, {
        ...filter,
        timeoutMs: Math.max(deadline - Date.now(), 0),
      });
      if (!envelope) break;

      if (this.signingSecret && !verifyEnvelope(envelope, this.signingSecret)) {
        log.warn({ messageId: envelope.messageId }, 'Discarding optimized plan with an invalid signature');
        continue;
      }

      log.info({ messageId: envelope.messageId }, 'Received optimized plan');
      // Duplicate replies for this run would otherwise sit in the queue
      this.bus.drain(this.agentId, filter);
      return { plan: { ...envelope.payload }, source: 'bus' };
    }

    log.warn({ timeoutMs }, 'Optimization timeout - falling back to stored plans');

    const byTask = await this.store.get(`optimized_plan:${context.taskId}`);
    if (isRecord(byTask)) return { plan: byTask, source: 'task_key' };

    const byTrace = await this.store.get(`optimized_plan:${context.traceId}`);
    if (isRecord(byTrace)) return { plan: byTrace, source: 'trace_key' };

    return { plan: { ...EMPTY_PLAN }, source: 'empty' };
  }

  private async run(
    context: TaskContext,
    callbacks: MonitoringCallbacks,
    log: Logger,
    parent: SpanContext
  ): Promise<Itinerary> {
    if (this.research) {
      const research = this.research;
      callbacks.onTaskProgress(context.taskId, 0.1, { agentId: this.agentId, message: 'Researching destination' });
      const result = await this.span('workflow.research', context, () => research.run(context, callbacks), parent);
      context.setResult('research', result);
    }

    callbacks.onTaskProgress(context.taskId, 0.3, { agentId: this.agentId, message: 'Drafting itinerary' });
    const proposal = await this.span('workflow.propose', context, async (span) => {
      const sent = await this.planner.propose(context, callbacks);
      this.tracer.recordMessage(span, sent, 'sent');
      return sent;
    }, parent);
    context.setResult('proposalMessageId', proposal.messageId);
    callbacks.onTaskProgress(context.taskId, 0.5, {
      agentId: this.agentId,
      message: 'Proposal sent for optimization',
      data: { messageId: proposal.messageId },
    });

    callbacks.onTaskProgress(context.taskId, 0.6, { agentId: this.agentId, message: 'Waiting for optimization' });
    const { plan, source } = await this.span('workflow.await', context, async (span) => {
      const awaited = await this.awaitOptimization(context);
      span.setAttribute('plan.source', awaited.source);
      return awaited;
    }, parent);
    context.setResult('optimizationSource', source);
    callbacks.onTaskProgress(context.taskId, 0.8, {
      agentId: this.agentId,
      message: 'Assembling itinerary',
      data: { source },
    });

    const itinerary = await this.span('workflow.assemble', context, async (span) => {
      const assembled = assembleItinerary(context, plan, { logger: log, now: this.now });
      span.setAttributes({ 'itinerary.id': assembled.itineraryId, 'itinerary.segments': assembled.segments.length });
      return assembled;
    }, parent);
    await this.store.set(`itinerary:${context.taskId}`, itinerary);

    log.info({ itineraryId: itinerary.itineraryId, segments: itinerary.segments.length, source }, 'Itinerary assembled');
    return itinerary;
  }

  /**
   * Stage spans nest under `parent`; without one the span is a root in the
   * context's trace.
   */
  private span<T>(
    name: string,
    context: TaskContext,
    fn: (span: Span) => Promise<T>,
    parent?: SpanContext
  ): Promise<T> {
    return this.tracer.trace(name, fn, { taskId: context.taskId }, { traceId: context.traceId, parentContext: parent });
  }
}
