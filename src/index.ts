/**
 * planwire
 * Signed agent-to-agent messaging, shared state and a research / plan /
 * optimize workflow for travel itineraries
 *
 * @packageDocumentation
 */

export * from './types/index.js';
export * from './a2a/index.js';
export * from './state/index.js';
export * from './monitoring/index.js';
export * from './agents/index.js';

export { loadSettings } from './config/settings.js';
export type { Settings, Environment } from './config/settings.js';
export { createLogger, createChildLogger, resolveLogLevel } from './logging/logger.js';
export type { Logger, LogLevel, LoggerConfig } from './logging/logger.js';

export * from './models/money.js';
export * from './models/itinerary.js';
export type { ResearchResult } from './models/research.js';

export { createProviders, getProviderForModel } from './providers/index.js';
export { Router } from './routing/router.js';
export type { RouterConfig, RouteAttempt, RouteResult } from './routing/router.js';
export { Tracer, Span, createNoopTracer } from './tracing/tracer.js';
export { DuckDuckGoClient } from './integrations/web-search.js';
export type { SearchClient, SearchResponse, SearchResult } from './integrations/web-search.js';

export { TaskContext, isTerminal } from './workflows/task-context.js';
export type { TaskStatus, StageResults } from './workflows/task-context.js';
export { parseTimeRange, addDays } from './workflows/time-range.js';
export type { TimeRange } from './workflows/time-range.js';
export { assembleItinerary } from './workflows/assembly.js';
export { PlannerWorkflow, DEFAULT_OPTIMIZATION_TIMEOUT_MS } from './workflows/planner-workflow.js';
export type { AwaitedPlan, PlanSource, PlannerWorkflowOptions, Researcher } from './workflows/planner-workflow.js';

export { PlanwireRuntime, chooseModels } from './runtime.js';
export type { RunIds, RuntimeOverrides } from './runtime.js';
