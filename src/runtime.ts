/**
 * Planwire runtime
 * Wires settings, bus, state store, LLM routing, agents and the workflow
 */

import { randomUUID } from 'crypto';
import type { ProviderName, ProvidersConfig, TextGenerator } from './types/index.js';
import { ConfigError } from './types/index.js';
import type { Settings } from './config/settings.js';
import { createLogger, type Logger } from './logging/logger.js';
import { MessageBus } from './a2a/message-bus.js';
import { createStateStore, type StateStore } from './state/index.js';
import { createProviders } from './providers/index.js';
import { Router } from './routing/router.js';
import { Tracer, createNoopTracer } from './tracing/tracer.js';
import { DuckDuckGoClient, type SearchClient } from './integrations/web-search.js';
import { MonitoringCallbacks } from './monitoring/callbacks.js';
import { createLogListener } from './monitoring/log-listener.js';
import { ResearchAgent } from './agents/research-agent.js';
import { PlannerAgent } from './agents/planner-agent.js';
import { OptimizerAgent } from './agents/optimizer-agent.js';
import { PlannerWorkflow } from './workflows/planner-workflow.js';
import type { Itinerary, PlanningRequest } from './models/itinerary.js';

const OPENAI_MODEL = 'gpt-4o-mini';
const ANTHROPIC_MODEL = 'claude-3-5-haiku-20241022';

export interface ModelChoice {
  model: string;
  fallback: string[];
}

export interface RuntimeOverrides {
  logger?: Logger;
  /** Replaces the provider router, e.g. with a stub in tests */
  generator?: TextGenerator;
  search?: SearchClient;
  store?: StateStore;
}

export interface RunIds {
  traceId?: string;
  correlationId?: string;
  taskId?: string;
}

function providersConfig(settings: Settings): ProvidersConfig {
  const { groqApiKey, openaiApiKey, anthropicApiKey, geminiApiKey } = settings.providers;
  return {
    ...(groqApiKey ? { groq: { apiKey: groqApiKey } } : {}),
    ...(openaiApiKey ? { openai: { apiKey: openaiApiKey } } : {}),
    ...(geminiApiKey ? { google: { apiKey: geminiApiKey } } : {}),
    ...(anthropicApiKey ? { anthropic: { apiKey: anthropicApiKey } } : {}),
  };
}

/**
 * Primary model and fallbacks among the configured providers, starting with
 * `preferred`. With `available` undefined every provider counts as configured.
 */
export function chooseModels(
  settings: Settings,
  preferred: ProviderName,
  available?: ReadonlySet<ProviderName>
): ModelChoice {
  const byProvider: Record<ProviderName, string> = {
    groq: settings.groqModel,
    google: settings.geminiModel,
    openai: OPENAI_MODEL,
    anthropic: ANTHROPIC_MODEL,
  };
  const order: ProviderName[] = [preferred, 'groq', 'google', 'openai', 'anthropic'];
  const models = [...new Set(order)]
    .filter((provider) => available === undefined || available.has(provider))
    .map((provider) => byProvider[provider]);

  if (models.length === 0) {
    throw new ConfigError([
      'providers: set at least one of GROQ_API_KEY, GEMINI_API_KEY, OPENAI_API_KEY or ANTHROPIC_API_KEY',
    ]);
  }
  const [model, ...fallback] = models;
  return { model, fallback };
}

export class PlanwireRuntime {
  readonly settings: Settings;
  readonly logger: Logger;
  readonly bus: MessageBus;
  readonly store: StateStore;
  readonly tracer: Tracer;
  readonly research: ResearchAgent;
  readonly planner: PlannerAgent;
  readonly optimizer: OptimizerAgent;
  readonly workflow: PlannerWorkflow;

  constructor(settings: Settings, overrides: RuntimeOverrides = {}) {
    this.settings = settings;
    this.logger = overrides.logger ?? createLogger({ name: 'planwire', level: settings.logLevel });
    const child = (component: string) => this.logger.child({ component });

    this.bus = new MessageBus({ logger: child('message-bus') });
    this.store =
      overrides.store ??
      createStateStore({ backend: settings.stateBackend, dir: settings.stateDir, logger: child('state-store') });

    this.tracer = settings.traceExportEndpoint
      ? new Tracer({ enabled: true, exportEndpoint: settings.traceExportEndpoint }, { logger: child('tracer') })
      : createNoopTracer();

    let generator: TextGenerator;
    let available: ReadonlySet<ProviderName> | undefined;
    if (overrides.generator) {
      generator = overrides.generator;
    } else {
      const providers = createProviders(providersConfig(settings));
      available = new Set(providers.keys());
      generator = new Router({ providers, logger: child('router') });
    }

    const planning = chooseModels(settings, 'groq', available);
    const optimizing = chooseModels(settings, 'google', available);
    const secret = settings.sharedSecret;

    this.research = new ResearchAgent({
      generator,
      search: overrides.search ?? new DuckDuckGoClient({ logger: child('web-search') }),
      store: this.store,
      model: planning.model,
      fallbackModels: planning.fallback,
      logger: child('research-agent'),
    });

    this.planner = new PlannerAgent({
      generator,
      bus: this.bus,
      store: this.store,
      model: planning.model,
      fallbackModels: planning.fallback,
      signingSecret: secret,
      tracer: this.tracer,
      logger: child('planner-agent'),
    });

    this.optimizer = new OptimizerAgent({
      generator,
      bus: this.bus,
      store: this.store,
      model: optimizing.model,
      fallbackModels: optimizing.fallback,
      signingSecret: secret,
      logger: child('optimizer-agent'),
    });

    this.workflow = new PlannerWorkflow({
      bus: this.bus,
      store: this.store,
      planner: this.planner,
      research: this.research,
      tracer: this.tracer,
      logger: child('workflow'),
      optimizationTimeoutMs: settings.optimizationTimeoutMs,
      signingSecret: secret,
    });
  }

  start(): void {
    this.optimizer.start();
  }

  /**
   * Callbacks for one run, with the log listener attached when monitoring is enabled
   */
  createCallbacks(ids: RunIds = {}): MonitoringCallbacks {
    const callbacks = new MonitoringCallbacks({
      traceId: ids.traceId ?? randomUUID(),
      correlationId: ids.correlationId ?? randomUUID(),
      logger: this.logger.child({ component: 'monitoring' }),
    });
    if (this.settings.enableMonitoring) {
      callbacks.registerListener(
        createLogListener(this.logger.child({ component: 'events' }), { eventsFile: this.settings.monitoringEventsFile })
      );
    }
    return callbacks;
  }

  async plan(request: PlanningRequest, ids: RunIds = {}): Promise<Itinerary> {
    const callbacks = this.createCallbacks(ids);
    return this.workflow.execute(request, callbacks, { taskId: ids.taskId });
  }

  /**
   * Stop consuming, let in-flight optimizations settle and flush spans
   */
  async shutdown(): Promise<void> {
    this.optimizer.stop();
    await this.optimizer.whenIdle();
    await this.tracer.shutdown();
  }
}
