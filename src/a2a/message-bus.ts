/**
 * In-process Message Bus
 * Per-recipient queues, synchronous subscriber fan-out and bounded history
 */

import { isEnvelopeExpired, type Envelope, type MessageType } from './envelope.js';
import { RingBuffer } from './ring-buffer.js';
import { createLogger, type Logger } from '../logging/logger.js';

export type Subscriber = (envelope: Envelope) => void | Promise<void>;

export interface MessageBusOptions {
  historyLimit?: number;
  /** How often a blocked receive re-checks its queue */
  pollIntervalMs?: number;
  logger?: Logger;
}

export interface ReceiveOptions {
  /** Block for up to this long; omit for a non-blocking poll */
  timeoutMs?: number;
  messageType?: MessageType;
  /** Extra condition, e.g. a correlation id the caller is waiting for */
  match?: (envelope: Envelope) => boolean;
}

export interface HistoryQuery {
  traceId?: string;
  correlationId?: string;
  limit?: number;
}

export const DEFAULT_HISTORY_LIMIT = 1000;
export const DEFAULT_POLL_INTERVAL_MS = 100;

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

/**
 * MessageBus - addressed pub/sub between agents in one process.
 *
 * Every mutating method is synchronous, so it runs to completion on the event
 * loop before any other sender or receiver can observe the queues. Only
 * `receive` with a timeout suspends its caller.
 */
export class MessageBus {
  private queues = new Map<string, Envelope[]>();
  private subscribers = new Map<string, Subscriber[]>();
  private sent: RingBuffer<Envelope>;
  private pollIntervalMs: number;
  private logger: Logger;

  constructor(options: MessageBusOptions = {}) {
    this.sent = new RingBuffer(options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = options.logger ?? createLogger({ name: 'message-bus' });
  }

  // ============================================================================
  // Delivery
  // ============================================================================

  /**
   * Queue an envelope for `receiver` (or its metadata receiver) and notify
   * that recipient's subscribers. Returns false when there is nowhere to send it.
   */
  send(envelope: Envelope, receiver?: string): boolean {
    const target = receiver ?? envelope.metadata.receiver;

    if (target === undefined) {
      this.logger.warn(
        { messageId: envelope.messageId, traceId: envelope.traceId },
        'No receiver specified for message'
      );
      return false;
    }

    const queue = this.queues.get(target) ?? [];
    queue.push(envelope);
    this.queues.set(target, queue);
    this.sent.push(envelope);

    this.logger.info(
      {
        messageId: envelope.messageId,
        messageType: envelope.messageType,
        traceId: envelope.traceId,
        correlationId: envelope.correlationId,
        sender: envelope.metadata.sender,
        receiver: target,
      },
      `Message sent to ${target}`
    );

    // Copy so a callback that (un)subscribes does not disturb this fan-out
    for (const callback of [...(this.subscribers.get(target) ?? [])]) {
      this.notify(callback, envelope, target);
    }

    return true;
  }

  /**
   * Take the first queued envelope for `recipient` that matches the filters.
   * Resolves undefined when nothing matches before the timeout.
   */
  async receive(recipient: string, options: ReceiveOptions = {}): Promise<Envelope | undefined> {
    const deadline = options.timeoutMs === undefined ? undefined : Date.now() + options.timeoutMs;

    for (;;) {
      const envelope = this.take(recipient, options);
      if (envelope) return envelope;

      if (deadline === undefined) return undefined;

      const remaining = deadline - Date.now();
      if (remaining <= 0) return undefined;

      await this.sleep(Math.min(this.pollIntervalMs, remaining));
    }
  }

  // ============================================================================
  // Subscriptions
  // ============================================================================

  /**
   * Register a callback for envelopes sent to `recipient`. Registering the
   * same callback twice has no effect. Returns a function that unsubscribes.
   */
  subscribe(recipient: string, callback: Subscriber): () => void {
    const callbacks = this.subscribers.get(recipient) ?? [];
    if (!callbacks.includes(callback)) {
      callbacks.push(callback);
      this.subscribers.set(recipient, callbacks);
      this.logger.debug({ recipient }, `Subscribed callback for ${recipient}`);
    }
    return () => this.unsubscribe(recipient, callback);
  }

  unsubscribe(recipient: string, callback: Subscriber): void {
    const callbacks = this.subscribers.get(recipient);
    if (!callbacks) return;

    const index = callbacks.indexOf(callback);
    if (index === -1) return;

    callbacks.splice(index, 1);
    if (callbacks.length === 0) {
      this.subscribers.delete(recipient);
    }
    this.logger.debug({ recipient }, `Unsubscribed callback for ${recipient}`);
  }

  subscriberCount(recipient: string): number {
    return this.subscribers.get(recipient)?.length ?? 0;
  }

  // ============================================================================
  // Inspection
  // ============================================================================

  /**
   * Sent envelopes, most recent first, optionally filtered by trace and/or correlation id
   */
  history(query: HistoryQuery = {}): Envelope[] {
    const limit = query.limit ?? 100;
    const matches: Envelope[] = [];
    const all = this.sent.toArray();

    for (let i = all.length - 1; i >= 0 && matches.length < limit; i--) {
      const envelope = all[i];
      if (query.traceId !== undefined && envelope.traceId !== query.traceId) continue;
      if (query.correlationId !== undefined && envelope.correlationId !== query.correlationId) continue;
      matches.push(envelope);
    }

    return matches;
  }

  /**
   * Discard everything queued for `recipient`
   */
  clear(recipient: string): number {
    const count = this.queues.get(recipient)?.length ?? 0;
    this.queues.delete(recipient);
    this.logger.info({ recipient, count }, `Cleared ${count} messages from ${recipient} queue`);
    return count;
  }

  /**
   * Discard every queued envelope for `recipient` that matches the filters,
   * without waiting. Returns how many were removed.
   */
  drain(recipient: string, options: Omit<ReceiveOptions, 'timeoutMs'> = {}): number {
    let count = 0;
    while (this.take(recipient, options)) {
      count++;
    }
    if (count > 0) {
      this.logger.debug({ recipient, count }, `Drained ${count} messages from ${recipient} queue`);
    }
    return count;
  }

  queueSize(recipient: string): number {
    return this.queues.get(recipient)?.length ?? 0;
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private take(recipient: string, options: ReceiveOptions): Envelope | undefined {
    const queue = this.evictExpired(recipient);
    if (!queue) return undefined;

    const index = queue.findIndex(
      (envelope) =>
        (options.messageType === undefined || envelope.messageType === options.messageType) &&
        (options.match === undefined || options.match(envelope))
    );
    if (index === -1) return undefined;

    const [envelope] = queue.splice(index, 1);
    if (queue.length === 0) {
      this.queues.delete(recipient);
    }
    return envelope;
  }

  /**
   * Drop envelopes whose ttl has run out; returns what is left of the queue
   */
  private evictExpired(recipient: string): Envelope[] | undefined {
    const queue = this.queues.get(recipient);
    if (!queue) return undefined;

    const now = Date.now();
    const live = queue.filter((envelope) => {
      if (!isEnvelopeExpired(envelope, now)) return true;
      this.logger.warn(
        { messageId: envelope.messageId, messageType: envelope.messageType, traceId: envelope.traceId, recipient },
        'Dropping expired message'
      );
      return false;
    });

    if (live.length === 0) {
      this.queues.delete(recipient);
      return undefined;
    }
    this.queues.set(recipient, live);
    return live;
  }

  private notify(callback: Subscriber, envelope: Envelope, target: string): void {
    const context = {
      messageId: envelope.messageId,
      traceId: envelope.traceId,
      receiver: target,
    };

    try {
      const result = callback(envelope);
      if (isPromiseLike(result)) {
        result.then(undefined, (error: unknown) => {
          this.logger.error({ ...context, err: error }, 'Subscriber callback rejected');
        });
      }
    } catch (error) {
      this.logger.error({ ...context, err: error }, 'Error in subscriber callback');
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
