/**
 * Planner Workflow Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PlannerWorkflow, type Researcher } from '../../src/workflows/planner-workflow.js';
import type { TaskContext } from '../../src/workflows/task-context.js';
import { PlannerAgent, type ProposalProducer } from '../../src/agents/planner-agent.js';
import { BASIC_OPTIMIZATION_NOTES, OptimizerAgent } from '../../src/agents/optimizer-agent.js';
import { MessageBus } from '../../src/a2a/message-bus.js';
import { createOptimizedPlan, createProposal, signEnvelope, type Envelope } from '../../src/a2a/envelope.js';
import type { Payload } from '../../src/a2a/canonical.js';
import { InMemoryStateStore } from '../../src/state/memory-store.js';
import { Tracer } from '../../src/tracing/tracer.js';
import type { ResearchResult } from '../../src/models/research.js';
import { ProviderError } from '../../src/types/index.js';
import {
  TEST_SECRET,
  createPlanningRequest,
  createRecordingCallbacks,
  createStubGenerator,
  createTaskContext,
  plannerReply,
  silentLogger,
} from '../utils/mocks.js';

const STORED_PLAN = {
  daily_schedule: [{ day: 1, activities: [{ time: '10:00 AM - 12:00 PM', name: 'Hawa Mahal', cost: 200 }] }],
  cost_breakdown: { total: '5000.00', currency: 'INR' },
};

function proposalFor(context: TaskContext): Envelope {
  return createProposal({
    payload: { task_id: context.taskId },
    traceId: context.traceId,
    correlationId: context.correlationId,
    sender: 'planner',
    receiver: 'optimizer',
  });
}

/**
 * A planner that sends nothing to an optimizer; `onPropose` stands in for
 * whatever the optimizer would have done
 */
function scriptedPlanner(onPropose: (context: TaskContext) => Promise<void> = async () => undefined) {
  const propose = vi.fn(async (context: TaskContext) => {
    await onPropose(context);
    return proposalFor(context);
  });
  return { propose } satisfies ProposalProducer;
}

describe('PlannerWorkflow', () => {
  let bus: MessageBus;
  let store: InMemoryStateStore;

  beforeEach(() => {
    bus = new MessageBus({ pollIntervalMs: 5, logger: silentLogger() });
    store = new InMemoryStateStore({ logger: silentLogger() });
  });

  function workflow(planner: ProposalProducer, extra: { research?: Researcher; tracer?: Tracer; timeoutMs?: number } = {}) {
    return new PlannerWorkflow({
      bus,
      store,
      planner,
      research: extra.research,
      tracer: extra.tracer,
      logger: silentLogger(),
      optimizationTimeoutMs: extra.timeoutMs ?? 20,
      signingSecret: TEST_SECRET,
      now: () => new Date('2025-03-01T12:00:00.000Z'),
    });
  }

  describe('execute with live agents', () => {
    function agents(optimizerReply: string) {
      const planner = new PlannerAgent({
        generator: createStubGenerator(plannerReply()),
        bus,
        store,
        model: 'llama-3.3-70b-versatile',
        signingSecret: TEST_SECRET,
        logger: silentLogger(),
      });
      const optimizer = new OptimizerAgent({
        generator: createStubGenerator(optimizerReply),
        bus,
        store,
        model: 'gemini-2.0-flash',
        signingSecret: TEST_SECRET,
        logger: silentLogger(),
      });
      optimizer.start();
      return { planner, optimizer };
    }

    it('should_assembleOptimizedItinerary_when_optimizerReplies', async () => {
      const { planner, optimizer } = agents('not json');
      const { callbacks } = createRecordingCallbacks();

      const itinerary = await workflow(planner, { timeoutMs: 2000 }).execute(createPlanningRequest(), callbacks, {
        taskId: 'task-1',
      });
      optimizer.stop();

      expect(itinerary.segments.map((s) => s.segmentType)).toEqual(['flight', 'hotel', 'activity', 'activity']);
      // Basic optimization takes 10% off the 20000 breakdown total
      expect(itinerary.totalCost.total).toEqual({ minor: 1800000, currency: 'INR' });
      expect(itinerary.optimizationNotes).toBe(BASIC_OPTIMIZATION_NOTES.join('\n'));
      expect(itinerary.createdAt).toBe('2025-03-01T12:00:00.000Z');
      expect(await store.get('itinerary:task-1')).toEqual(itinerary);
    });

    it('should_sumSegments_when_optimizerReturnsNullTotal', async () => {
      const { planner, optimizer } = agents(
        JSON.stringify({ cost_breakdown: { total: null, currency: 'INR' }, optimization_applied: ['Kept plan'] })
      );
      const { callbacks, events } = createRecordingCallbacks();

      const itinerary = await workflow(planner, { timeoutMs: 2000 }).execute(createPlanningRequest(), callbacks);
      optimizer.stop();

      // 1500 transport + 10500 hotel + 500 + 700 activities
      expect(itinerary.totalCost.total).toEqual({ minor: 1320000, currency: 'INR' });
      expect(itinerary.optimizationNotes).toBe('Kept plan');
      expect(events.map((e) => e.eventType)).not.toContain('task_error');
    });

    it('should_emitLifecycleEventsInOrder_when_runSucceeds', async () => {
      const { planner, optimizer } = agents('not json');
      const { callbacks, events } = createRecordingCallbacks();

      const itinerary = await workflow(planner, { timeoutMs: 2000 }).execute(createPlanningRequest(), callbacks);
      optimizer.stop();

      expect(events.map((e) => e.eventType)).toEqual([
        'state_change',
        'task_start',
        'task_progress',
        'api_call',
        'agent_message',
        'task_progress',
        'task_progress',
        'task_progress',
        'state_change',
        'task_end',
      ]);
      expect(events[1].message).toBe('Planning trip to Jaipur');
      expect(events.filter((e) => e.eventType === 'task_progress').map((e) => e.data.progress)).toEqual([
        0.3, 0.5, 0.6, 0.8,
      ]);
      expect(events[7].data).toEqual({ source: 'bus', progress: 0.8 });
      expect(events[9].data).toEqual({ itineraryId: itinerary.itineraryId, totalCost: 'INR 18000.00' });
      expect(new Set(events.map((e) => e.correlationId))).toEqual(new Set(['corr-1']));
    });
  });

  describe('execute', () => {
    it('should_runResearchFirst_when_researcherConfigured', async () => {
      const research: ResearchResult = {
        destination: 'Jaipur',
        dateRange: { startDate: '2025-03-10', endDate: '2025-03-13' },
        interests: [],
        weatherSummary: 'Sunny',
        accommodationSuggestions: '',
        topAttractions: '',
        currency: 'INR',
        travelTips: '',
        bestTimeToVisit: '',
        webResults: [],
        sourceTools: ['llm_research'],
      };
      const researcher = { run: vi.fn(async () => research) } satisfies Researcher;
      let seen: unknown;
      const planner = scriptedPlanner(async (context) => {
        seen = context.intermediateResults.research;
      });
      const { callbacks, events } = createRecordingCallbacks();

      await workflow(planner, { research: researcher }).execute(createPlanningRequest(), callbacks);

      expect(researcher.run).toHaveBeenCalledTimes(1);
      expect(seen).toBe(research);
      expect(events.find((e) => e.eventType === 'task_progress')?.data.progress).toBe(0.1);
    });

    it('should_markFailedAndRethrow_when_plannerFails', async () => {
      const failure = new ProviderError('All providers down', 'groq');
      const planner = scriptedPlanner(async () => {
        throw failure;
      });
      const { callbacks, events } = createRecordingCallbacks();

      await expect(workflow(planner).execute(createPlanningRequest(), callbacks)).rejects.toBe(failure);

      const error = events.find((e) => e.eventType === 'task_error');
      expect(error?.message).toBe('Workflow failed: All providers down');
      expect(error?.error).toEqual({ type: 'ProviderError', message: 'All providers down' });
      const lastState = events.filter((e) => e.eventType === 'state_change').at(-1);
      expect(lastState?.data).toEqual({ key: 'status', oldValue: 'running', newValue: 'failed' });
      expect(events.some((e) => e.eventType === 'task_end')).toBe(false);
    });

    it('should_fail_when_fallbackPlanMalformed', async () => {
      const planner = scriptedPlanner(async (context) => {
        await store.set(`optimized_plan:${context.taskId}`, { flights: [{ title: 'broken' }] });
      });
      const { callbacks } = createRecordingCallbacks();

      await expect(workflow(planner).execute(createPlanningRequest(), callbacks)).rejects.toThrow(
        'Malformed flight offer at index 0'
      );
    });

    it('should_recordWorkflowSpans_when_tracerGiven', async () => {
      const tracer = new Tracer({ enabled: true }, { logger: silentLogger() });
      const { callbacks } = createRecordingCallbacks();

      await workflow(scriptedPlanner(), { tracer }).execute(createPlanningRequest(), callbacks);

      const spans = tracer.getSpans();
      expect(spans.map((s) => s.name)).toEqual([
        'workflow.propose',
        'workflow.await',
        'workflow.assemble',
        'workflow.execute',
      ]);
      expect(spans.every((s) => s.context.traceId === 'trace-1')).toBe(true);

      const [propose, awaited, assemble, execute] = spans;
      expect(execute.context.parentSpanId).toBeUndefined();
      for (const stage of [propose, awaited, assemble]) {
        expect(stage.context.parentSpanId).toBe(execute.context.spanId);
      }
      expect(propose.events.map((e) => e.name)).toEqual(['a2a.sent']);
      expect(propose.events[0].attributes).toMatchObject({
        'a2a.message_type': 'proposal',
        'a2a.sender': 'planner',
        'a2a.receiver': 'optimizer',
        'a2a.correlation_id': 'corr-1',
      });
      expect(awaited.attributes['plan.source']).toBe('empty');
      expect(assemble.attributes['itinerary.segments']).toBe(0);
    });
  });

  describe('awaitOptimization', () => {
    it('should_returnBusPlan_when_signedReplyArrives', async () => {
      const context = createTaskContext();
      bus.send(
        signEnvelope(
          createOptimizedPlan({
            payload: { destination: 'Jaipur' },
            traceId: 'trace-1',
            correlationId: 'corr-1',
            sender: 'optimizer',
            receiver: 'orchestrator',
          }),
          TEST_SECRET
        )
      );

      const awaited = await workflow(scriptedPlanner()).awaitOptimization(context);

      expect(awaited).toEqual({ plan: { destination: 'Jaipur' }, source: 'bus' });
    });

    it('should_skipForeignAndUnsignedReplies_when_waiting', async () => {
      const context = createTaskContext();
      const reply = (payload: Payload, correlationId: string) =>
        createOptimizedPlan({ payload, traceId: 'trace-1', correlationId, sender: 'optimizer', receiver: 'orchestrator' });
      bus.send(signEnvelope(reply({ from: 'other run' }, 'corr-2'), TEST_SECRET));
      bus.send(reply({ from: 'unsigned' }, 'corr-1'));
      bus.send(signEnvelope(reply({ from: 'wrong key' }, 'corr-1'), 'other-secret'));

      const awaited = await workflow(scriptedPlanner()).awaitOptimization(context);

      expect(awaited.source).toBe('empty');
      // The other run's reply stays queued for it
      expect(bus.queueSize('orchestrator')).toBe(1);
    });

    it('should_drainDuplicateReplies_when_busPlanReturned', async () => {
      const reply = (payload: Payload, correlationId: string) =>
        signEnvelope(
          createOptimizedPlan({ payload, traceId: 'trace-1', correlationId, sender: 'optimizer', receiver: 'orchestrator' }),
          TEST_SECRET
        );
      bus.send(reply({ from: 'first' }, 'corr-1'));
      bus.send(reply({ from: 'second' }, 'corr-1'));
      bus.send(reply({ from: 'other run' }, 'corr-2'));

      const awaited = await workflow(scriptedPlanner()).awaitOptimization(createTaskContext());

      expect(awaited).toEqual({ plan: { from: 'first' }, source: 'bus' });
      expect(bus.queueSize('orchestrator')).toBe(1);
      expect(await bus.receive('orchestrator')).toMatchObject({ correlationId: 'corr-2' });
    });

    it('should_dropLateReplies_when_ttlRunsOut', async () => {
      // A reply to an earlier run that timed out, living 10ms
      bus.send(
        signEnvelope(
          createOptimizedPlan({
            payload: { from: 'late' },
            traceId: 'trace-0',
            correlationId: 'corr-0',
            sender: 'optimizer',
            receiver: 'orchestrator',
            ttl: 0.01,
          }),
          TEST_SECRET
        )
      );
      await new Promise((resolve) => setTimeout(resolve, 20));

      const awaited = await workflow(scriptedPlanner()).awaitOptimization(createTaskContext());

      expect(awaited.source).toBe('empty');
      expect(bus.queueSize('orchestrator')).toBe(0);
    });

    it('should_fallBackToTaskKey_when_timeoutElapses', async () => {
      await store.set('optimized_plan:task-1', STORED_PLAN);
      await store.set('optimized_plan:trace-1', { destination: 'wrong' });

      const awaited = await workflow(scriptedPlanner()).awaitOptimization(createTaskContext());

      expect(awaited).toEqual({ plan: STORED_PLAN, source: 'task_key' });
    });

    it('should_fallBackToTraceKey_when_taskKeyMissing', async () => {
      await store.set('optimized_plan:trace-1', STORED_PLAN);

      const awaited = await workflow(scriptedPlanner()).awaitOptimization(createTaskContext());

      expect(awaited).toEqual({ plan: STORED_PLAN, source: 'trace_key' });
    });

    it('should_ignoreNonRecordFallbacks_when_stored', async () => {
      await store.set('optimized_plan:task-1', ['not', 'a', 'plan']);

      const awaited = await workflow(scriptedPlanner()).awaitOptimization(createTaskContext());

      expect(awaited).toEqual({ plan: { flights: [], hotels: [], activities: [] }, source: 'empty' });
    });

    it('should_assembleStoredPlan_when_optimizerSilent', async () => {
      const planner = scriptedPlanner(async (context) => {
        await store.set(`optimized_plan:${context.taskId}`, STORED_PLAN);
      });
      const { callbacks, events } = createRecordingCallbacks();

      const itinerary = await workflow(planner).execute(createPlanningRequest(), callbacks, { taskId: 'task-9' });

      expect(itinerary.segments).toHaveLength(1);
      expect(itinerary.segments[0]).toMatchObject({
        title: 'Hawa Mahal',
        startTime: '2025-03-10T10:00:00',
        endTime: '2025-03-10T12:00:00',
      });
      expect(itinerary.totalCost.total).toEqual({ minor: 500000, currency: 'INR' });
      expect(events.find((e) => e.data.source !== undefined)?.data.source).toBe('task_key');
    });
  });
});
