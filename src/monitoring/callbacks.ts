/**
 * Monitoring Callbacks
 * Lifecycle events for one planning run, fanned out to registered listeners
 */

import { randomUUID } from 'crypto';
import { createLogger, type Logger } from '../logging/logger.js';

export type EventType =
  | 'task_start'
  | 'task_progress'
  | 'task_end'
  | 'task_error'
  | 'state_change'
  | 'agent_message'
  | 'api_call';

export type EventSeverity = 'debug' | 'info' | 'warning' | 'error' | 'critical';

export interface EventErrorDetail {
  type: string;
  message: string;
}

export interface MonitoringEvent {
  readonly eventId: string;
  readonly eventType: EventType;
  readonly severity: EventSeverity;
  /** ISO-8601, UTC */
  readonly timestamp: string;
  readonly traceId: string;
  readonly correlationId: string;
  readonly taskId?: string;
  readonly agentId?: string;
  readonly message: string;
  readonly data: Readonly<Record<string, unknown>>;
  readonly error?: Readonly<EventErrorDetail>;
}

export type MonitoringListener = (event: MonitoringEvent) => void;

export interface MonitoringCallbacksOptions {
  traceId: string;
  correlationId: string;
  logger?: Logger;
}

interface EmitOptions {
  eventType: EventType;
  severity: EventSeverity;
  taskId?: string;
  agentId?: string;
  message: string;
  data?: Record<string, unknown>;
  error?: EventErrorDetail;
}

function describeValue(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * MonitoringCallbacks - carries the trace and correlation ids of one run and
 * delivers each event to every listener, in registration order.
 */
export class MonitoringCallbacks {
  readonly traceId: string;
  readonly correlationId: string;
  private listeners: MonitoringListener[] = [];
  private logger: Logger;

  constructor(options: MonitoringCallbacksOptions) {
    this.traceId = options.traceId;
    this.correlationId = options.correlationId;
    this.logger = (options.logger ?? createLogger({ name: 'monitoring' })).child({
      traceId: options.traceId,
      correlationId: options.correlationId,
    });
  }

  /**
   * Returns a function that removes the listener again
   */
  registerListener(listener: MonitoringListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) this.listeners.splice(index, 1);
    };
  }

  get listenerCount(): number {
    return this.listeners.length;
  }

  // ============================================================================
  // Lifecycle Events
  // ============================================================================

  onTaskStart(taskId: string, options: { agentId?: string; message?: string; data?: Record<string, unknown> } = {}): MonitoringEvent {
    return this.emit({
      eventType: 'task_start',
      severity: 'info',
      taskId,
      agentId: options.agentId,
      message: options.message ?? 'Task started',
      data: options.data,
    });
  }

  /**
   * @param progress - fraction complete, 0 to 1
   */
  onTaskProgress(
    taskId: string,
    progress: number,
    options: { agentId?: string; message?: string; data?: Record<string, unknown> } = {}
  ): MonitoringEvent {
    return this.emit({
      eventType: 'task_progress',
      severity: 'info',
      taskId,
      agentId: options.agentId,
      message: options.message ?? 'Task in progress',
      data: { ...options.data, progress },
    });
  }

  onTaskEnd(taskId: string, options: { agentId?: string; message?: string; data?: Record<string, unknown> } = {}): MonitoringEvent {
    return this.emit({
      eventType: 'task_end',
      severity: 'info',
      taskId,
      agentId: options.agentId,
      message: options.message ?? 'Task completed',
      data: options.data,
    });
  }

  onTaskError(
    taskId: string,
    error: Error,
    options: { agentId?: string; message?: string; data?: Record<string, unknown> } = {}
  ): MonitoringEvent {
    return this.emit({
      eventType: 'task_error',
      severity: 'error',
      taskId,
      agentId: options.agentId,
      message: options.message ?? `Task error: ${error.message}`,
      data: options.data,
      error: { type: error.name, message: error.message },
    });
  }

  onStateChange(
    taskId: string,
    key: string,
    oldValue: unknown,
    newValue: unknown,
    options: { agentId?: string; message?: string } = {}
  ): MonitoringEvent {
    return this.emit({
      eventType: 'state_change',
      severity: 'debug',
      taskId,
      agentId: options.agentId,
      message: options.message ?? `State changed: ${key}`,
      data: { key, oldValue: describeValue(oldValue), newValue: describeValue(newValue) },
    });
  }

  onAgentMessage(
    taskId: string,
    agentId: string,
    messageType: string,
    message: string,
    data?: Record<string, unknown>
  ): MonitoringEvent {
    return this.emit({
      eventType: 'agent_message',
      severity: 'info',
      taskId,
      agentId,
      message,
      data: { ...data, messageType },
    });
  }

  onApiCall(
    taskId: string,
    agentId: string,
    api: string,
    options: { latencyMs?: number; success?: boolean; data?: Record<string, unknown> } = {}
  ): MonitoringEvent {
    const success = options.success ?? true;
    return this.emit({
      eventType: 'api_call',
      severity: success ? 'info' : 'warning',
      taskId,
      agentId,
      message: `API call: ${api}`,
      data: { ...options.data, api, success, ...(options.latencyMs !== undefined && { latencyMs: options.latencyMs }) },
    });
  }

  // ============================================================================
  // Fan-out
  // ============================================================================

  private emit(options: EmitOptions): MonitoringEvent {
    const event: MonitoringEvent = Object.freeze({
      eventId: randomUUID(),
      eventType: options.eventType,
      severity: options.severity,
      timestamp: new Date().toISOString(),
      traceId: this.traceId,
      correlationId: this.correlationId,
      ...(options.taskId !== undefined && { taskId: options.taskId }),
      ...(options.agentId !== undefined && { agentId: options.agentId }),
      message: options.message,
      data: Object.freeze({ ...options.data }),
      ...(options.error && { error: Object.freeze({ ...options.error }) }),
    });

    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error({ err: error, eventId: event.eventId }, 'Error in monitoring listener');
      }
    }

    return event;
  }
}
