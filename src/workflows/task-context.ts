/**
 * Task Context
 * State of one planning run, owned by the workflow that created it
 */

import { randomUUID } from 'crypto';
import { InvalidTransitionError } from '../types/index.js';
import type { PlanningRequest } from '../models/itinerary.js';
import type { ResearchResult } from '../models/research.js';
import type { MonitoringCallbacks } from '../monitoring/callbacks.js';

export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['running', 'cancelled'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminal(status: TaskStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/**
 * Stage outputs gathered during a run. Known stages are typed; collaborators
 * may add their own.
 */
export interface StageResults {
  research?: ResearchResult;
  proposalMessageId?: string;
  optimizationSource?: string;
  [stage: string]: unknown;
}

export interface TaskContextOptions {
  taskId?: string;
  correlationId: string;
  traceId: string;
  request: PlanningRequest;
  now?: () => Date;
}

export class TaskContext {
  readonly taskId: string;
  readonly correlationId: string;
  readonly traceId: string;
  readonly request: PlanningRequest;
  readonly intermediateResults: StageResults = {};
  readonly createdAt: string;
  private _status: TaskStatus = 'pending';
  private _updatedAt: string;
  private now: () => Date;

  constructor(options: TaskContextOptions) {
    this.taskId = options.taskId ?? randomUUID();
    this.correlationId = options.correlationId;
    this.traceId = options.traceId;
    this.request = options.request;
    this.now = options.now ?? (() => new Date());
    this.createdAt = this.now().toISOString();
    this._updatedAt = this.createdAt;
  }

  get status(): TaskStatus {
    return this._status;
  }

  get updatedAt(): string {
    return this._updatedAt;
  }

  /**
   * Move to `next`, emitting a state_change event. Throws
   * InvalidTransitionError when the move is not allowed.
   */
  transition(next: TaskStatus, callbacks?: MonitoringCallbacks): void {
    const previous = this._status;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new InvalidTransitionError(previous, next);
    }

    this._status = next;
    this._updatedAt = this.now().toISOString();
    callbacks?.onStateChange(this.taskId, 'status', previous, next);
  }

  setResult(stage: string, value: unknown): void {
    this.intermediateResults[stage] = value;
    this._updatedAt = this.now().toISOString();
  }
}
