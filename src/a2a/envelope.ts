/**
 * Agent-to-Agent Envelope
 * Message format, canonical form and HMAC-SHA256 signing for inter-agent traffic
 */

import { createHmac, randomUUID, timingSafeEqual } from 'crypto';
import { canonicalJson, type Payload } from './canonical.js';

export const PROTOCOL_VERSION = '1.0';

export const MESSAGE_TYPES = [
  'handshake',
  'ack',
  'proposal',
  'optimized_plan',
  'state_update',
  'query',
  'response',
  'error',
  'cancel',
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

export interface EnvelopeMetadata {
  readonly sender: string;
  /** Absent means broadcast */
  readonly receiver?: string;
  /** 1-10, higher is more urgent */
  readonly priority: number;
  /** Seconds */
  readonly ttl: number;
}

export interface Envelope {
  readonly messageId: string;
  readonly traceId: string;
  readonly correlationId: string;
  readonly messageType: MessageType;
  readonly version: string;
  /** ISO-8601, UTC */
  readonly timestamp: string;
  readonly payload: Readonly<Payload>;
  readonly metadata: EnvelopeMetadata;
  readonly signature?: string;
}

export interface CreateEnvelopeOptions {
  messageType: MessageType;
  payload: Payload;
  traceId: string;
  correlationId: string;
  sender: string;
  receiver?: string;
  priority?: number;
  ttl?: number;
}

export const DEFAULT_PRIORITY = 5;
export const DEFAULT_TTL_SECONDS = 300;

const SIGNATURE_PATTERN = /^[0-9a-f]{64}$/;

export function isMessageType(value: string): value is MessageType {
  return MESSAGE_TYPES.some((type) => type === value);
}

/**
 * Build an unsigned envelope. Trace and correlation ids are always supplied
 * by the caller so they follow the originating task.
 */
export function createEnvelope(options: CreateEnvelopeOptions): Envelope {
  const priority = options.priority ?? DEFAULT_PRIORITY;
  const ttl = options.ttl ?? DEFAULT_TTL_SECONDS;

  if (!Number.isInteger(priority) || priority < 1 || priority > 10) {
    throw new RangeError(`priority must be an integer from 1 to 10, got ${priority}`);
  }
  if (!(ttl > 0)) {
    throw new RangeError(`ttl must be positive, got ${ttl}`);
  }

  return {
    messageId: randomUUID(),
    traceId: options.traceId,
    correlationId: options.correlationId,
    messageType: options.messageType,
    version: PROTOCOL_VERSION,
    timestamp: new Date().toISOString(),
    payload: options.payload,
    metadata: {
      sender: options.sender,
      ...(options.receiver !== undefined && { receiver: options.receiver }),
      priority,
      ttl,
    },
  };
}

type EnvelopeShortcut = Omit<CreateEnvelopeOptions, 'messageType'>;

export function createProposal(options: EnvelopeShortcut): Envelope {
  return createEnvelope({ ...options, messageType: 'proposal' });
}

export function createOptimizedPlan(options: EnvelopeShortcut): Envelope {
  return createEnvelope({ ...options, messageType: 'optimized_plan' });
}

export function createErrorEnvelope(options: EnvelopeShortcut): Envelope {
  return createEnvelope({ ...options, messageType: 'error' });
}

/**
 * Canonical bytes of every field except the signature
 */
export function canonicalize(envelope: Envelope): Buffer {
  const { signature: _signature, ...unsigned } = envelope;
  return Buffer.from(canonicalJson(unsigned), 'utf8');
}

function computeSignature(envelope: Envelope, secret: string): string {
  return createHmac('sha256', secret).update(canonicalize(envelope)).digest('hex');
}

export function signEnvelope(envelope: Envelope, secret: string): Envelope {
  return { ...envelope, signature: computeSignature(envelope, secret) };
}

/**
 * Check the signature against the envelope's current contents. Returns false
 * for unsigned envelopes and for any field changed after signing.
 */
export function verifyEnvelope(envelope: Envelope, secret: string): boolean {
  if (envelope.signature === undefined || !SIGNATURE_PATTERN.test(envelope.signature)) {
    return false;
  }

  let expected: string;
  try {
    expected = computeSignature(envelope, secret);
  } catch {
    // A payload that cannot be canonicalized cannot carry a valid signature
    return false;
  }

  return timingSafeEqual(Buffer.from(envelope.signature, 'hex'), Buffer.from(expected, 'hex'));
}

export function isEnvelopeExpired(envelope: Envelope, now: number = Date.now()): boolean {
  const created = Date.parse(envelope.timestamp);
  if (Number.isNaN(created)) return true;
  return created + envelope.metadata.ttl * 1000 <= now;
}
