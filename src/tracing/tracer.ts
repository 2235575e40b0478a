/**
 * Tracing
 * Spans around planning stages, LLM calls and bus messages, keyed by the
 * run's trace id and exported in batches
 */

import { randomBytes } from 'crypto';
import type { TracingConfig, ProviderName, TokenUsage } from '../types/index.js';
import type { Envelope } from '../a2a/envelope.js';
import { createLogger, type Logger } from '../logging/logger.js';

const DEFAULT_EXPORT_INTERVAL_MS = 5000;
const EXPORT_BATCH_SIZE = 100;

export type SpanKind = 'internal' | 'client' | 'producer' | 'consumer';
export type SpanStatus = 'unset' | 'ok' | 'error';
export type SpanAttributes = Record<string, unknown>;

export interface SpanContext {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
}

export interface SpanEvent {
  name: string;
  timestamp: number;
  attributes?: SpanAttributes;
}

export interface SpanData {
  context: SpanContext;
  name: string;
  kind: SpanKind;
  startTime: number;
  endTime?: number;
  status: SpanStatus;
  attributes: SpanAttributes;
  events: SpanEvent[];
}

export interface StartSpanOptions {
  /** Nests the span under this parent instead of the tracer's current span */
  parentContext?: SpanContext;
  /**
   * Places the span in this trace. Without a parentContext the span is a root,
   * so concurrent runs never nest under each other's current span.
   */
  traceId?: string;
  kind?: SpanKind;
}

export interface SpanExporter {
  export(spans: SpanData[]): Promise<void>;
}

/**
 * POSTs `{ spans }` as JSON; any non-2xx status is a failure
 */
export class HttpSpanExporter implements SpanExporter {
  constructor(private readonly endpoint: string) {}

  async export(spans: SpanData[]): Promise<void> {
    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ spans }),
    });
    if (!response.ok) {
      throw new Error(`Span export returned HTTP ${response.status}`);
    }
  }
}

export interface LlmCallRecord {
  provider: ProviderName;
  model: string;
  tokens?: TokenUsage;
  cost?: number;
  latencyMs?: number;
}

interface SpanInit {
  context: SpanContext;
  kind: SpanKind;
  attributes?: SpanAttributes;
  onEnd: (span: Span) => void;
}

/**
 * One timed operation. Ending a span hands it back to its tracer once.
 */
export class Span {
  readonly name: string;
  private data: SpanData;
  private onEnd: (span: Span) => void;

  constructor(name: string, init: SpanInit) {
    this.name = name;
    this.onEnd = init.onEnd;
    this.data = {
      context: init.context,
      name,
      kind: init.kind,
      startTime: Date.now(),
      status: 'unset',
      attributes: { ...init.attributes },
      events: [],
    };
  }

  getContext(): SpanContext {
    return { ...this.data.context };
  }

  get ended(): boolean {
    return this.data.endTime !== undefined;
  }

  setAttribute(key: string, value: unknown): this {
    this.data.attributes[key] = value;
    return this;
  }

  setAttributes(attributes: SpanAttributes): this {
    Object.assign(this.data.attributes, attributes);
    return this;
  }

  addEvent(name: string, attributes?: SpanAttributes): this {
    this.data.events.push({ name, timestamp: Date.now(), attributes });
    return this;
  }

  setStatus(status: 'ok' | 'error', message?: string): this {
    this.data.status = status;
    if (message) {
      this.data.attributes['error.message'] = message;
    }
    return this;
  }

  recordException(error: Error): this {
    this.setStatus('error', error.message);
    this.addEvent('exception', {
      'exception.type': error.name,
      'exception.message': error.message,
      'exception.stacktrace': error.stack,
    });
    return this;
  }

  /**
   * Stamp the end time; an unset status becomes ok. Later calls are ignored.
   */
  end(): void {
    if (this.ended) return;
    this.data.endTime = Date.now();
    if (this.data.status === 'unset') {
      this.data.status = 'ok';
    }
    this.onEnd(this);
  }

  /** Milliseconds so far, or the final duration once ended */
  getDuration(): number {
    return (this.data.endTime ?? Date.now()) - this.data.startTime;
  }

  getData(): SpanData {
    return {
      ...this.data,
      context: { ...this.data.context },
      attributes: { ...this.data.attributes },
      events: [...this.data.events],
    };
  }
}

export interface TracerOptions {
  logger?: Logger;
  /** Defaults to an HTTP exporter when the config names an export endpoint */
  exporter?: SpanExporter;
}

/**
 * Tracer manages span creation, sampling and export
 */
export class Tracer {
  private config: TracingConfig;
  private logger: Logger;
  private exporter?: SpanExporter;
  private active: Span[] = [];
  private finished: SpanData[] = [];
  private pending: SpanData[] = [];
  private exportTimer?: ReturnType<typeof setInterval>;

  constructor(config: TracingConfig, options: TracerOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? createLogger({ name: 'tracer' });
    this.exporter =
      options.exporter ?? (config.exportEndpoint ? new HttpSpanExporter(config.exportEndpoint) : undefined);

    if (config.enabled && this.exporter) {
      // flush() never rejects; failed batches go back on the queue
      this.exportTimer = setInterval(() => void this.flush(), config.exportIntervalMs ?? DEFAULT_EXPORT_INTERVAL_MS);
      this.exportTimer.unref();
    }
  }

  startSpan(name: string, attributes?: SpanAttributes, options: StartSpanOptions = {}): Span {
    const parent = options.parentContext ?? (options.traceId ? undefined : this.current()?.getContext());
    const span = new Span(name, {
      context: {
        traceId: options.traceId ?? parent?.traceId ?? randomBytes(16).toString('hex'),
        spanId: randomBytes(8).toString('hex'),
        parentSpanId: parent?.spanId,
      },
      kind: options.kind ?? 'internal',
      attributes,
      onEnd: (ended) => this.finish(ended),
    });
    this.active.push(span);
    return span;
  }

  /**
   * Run `fn` inside a span. A thrown error is recorded on the span and rethrown.
   */
  async trace<T>(
    name: string,
    fn: (span: Span) => Promise<T>,
    attributes?: SpanAttributes,
    options?: StartSpanOptions
  ): Promise<T> {
    const span = this.startSpan(name, attributes, options);
    try {
      const result = await fn(span);
      span.setStatus('ok');
      return result;
    } catch (error) {
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.end();
    }
  }

  recordLLMCall(span: Span, call: LlmCallRecord): void {
    span.setAttributes({
      'llm.provider': call.provider,
      'llm.model': call.model,
      'llm.tokens.input': call.tokens?.inputTokens,
      'llm.tokens.output': call.tokens?.outputTokens,
      'llm.tokens.total': call.tokens?.totalTokens,
      'llm.cost': call.cost,
      'llm.latency_ms': call.latencyMs,
    });
  }

  /**
   * Add an `a2a.sent` or `a2a.received` event describing a bus message
   */
  recordMessage(span: Span, envelope: Envelope, direction: 'sent' | 'received'): void {
    span.addEvent(`a2a.${direction}`, {
      'a2a.message_id': envelope.messageId,
      'a2a.message_type': envelope.messageType,
      'a2a.correlation_id': envelope.correlationId,
      'a2a.sender': envelope.metadata.sender,
      'a2a.receiver': envelope.metadata.receiver ?? 'broadcast',
      'a2a.priority': envelope.metadata.priority,
    });
  }

  /**
   * Send queued spans to the exporter. Failures are logged and the batch is
   * queued again ahead of newer spans.
   */
  async flush(): Promise<void> {
    if (!this.exporter || this.pending.length === 0) return;

    const batch = this.pending;
    this.pending = [];

    try {
      await this.exporter.export(batch);
    } catch (error) {
      this.pending = [...batch, ...this.pending];
      this.logger.error({ err: error, pending: this.pending.length }, 'Failed to export spans');
    }
  }

  /** Sampled spans ended so far */
  getSpans(): SpanData[] {
    return [...this.finished];
  }

  clearSpans(): void {
    this.finished = [];
  }

  async shutdown(): Promise<void> {
    if (this.exportTimer) {
      clearInterval(this.exportTimer);
      this.exportTimer = undefined;
    }
    await this.flush();
  }

  private finish(span: Span): void {
    const index = this.active.lastIndexOf(span);
    if (index !== -1) this.active.splice(index, 1);

    if (!this.shouldSample()) return;
    const data = span.getData();
    this.finished.push(data);
    this.pending.push(data);

    if (this.pending.length >= EXPORT_BATCH_SIZE) {
      void this.flush();
    }
  }

  private shouldSample(): boolean {
    if (!this.config.enabled) return false;
    if (this.config.sampleRate === undefined) return true;
    return Math.random() < this.config.sampleRate;
  }

  private current(): Span | undefined {
    return this.active[this.active.length - 1];
  }
}

/**
 * A tracer that records and exports nothing
 */
export function createNoopTracer(): Tracer {
  return new Tracer({ enabled: false });
}
