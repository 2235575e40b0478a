/**
 * Envelope Tests
 */

import { describe, it, expect } from 'vitest';
import {
  canonicalize,
  createEnvelope,
  createErrorEnvelope,
  createOptimizedPlan,
  createProposal,
  isEnvelopeExpired,
  isMessageType,
  signEnvelope,
  verifyEnvelope,
  PROTOCOL_VERSION,
  type Envelope,
} from '../../src/a2a/envelope.js';
import { TEST_SECRET } from '../utils/mocks.js';
import { CanonicalizationError } from '../../src/types/index.js';

function proposal(overrides: Partial<Parameters<typeof createProposal>[0]> = {}): Envelope {
  return createProposal({
    payload: { task_id: 'task-1', destination: 'Jaipur', estimated_total: '20000.00' },
    traceId: 'trace-1',
    correlationId: 'corr-1',
    sender: 'planner',
    receiver: 'optimizer',
    ...overrides,
  });
}

describe('createEnvelope', () => {
  it('should_fillDefaults_when_optionsOmitted', () => {
    const envelope = proposal();

    expect(envelope.messageType).toBe('proposal');
    expect(envelope.version).toBe(PROTOCOL_VERSION);
    expect(envelope.messageId).toMatch(/^[0-9a-f-]{36}$/);
    expect(envelope.metadata).toEqual({ sender: 'planner', receiver: 'optimizer', priority: 5, ttl: 300 });
    expect(envelope.signature).toBeUndefined();
    expect(Number.isNaN(Date.parse(envelope.timestamp))).toBe(false);
  });

  it('should_omitReceiver_when_broadcast', () => {
    const envelope = proposal({ receiver: undefined });

    expect('receiver' in envelope.metadata).toBe(false);
  });

  it('should_useShortcutType_when_helperCalled', () => {
    const base = { payload: {}, traceId: 't', correlationId: 'c', sender: 's' };

    expect(createOptimizedPlan(base).messageType).toBe('optimized_plan');
    expect(createErrorEnvelope(base).messageType).toBe('error');
    expect(createEnvelope({ ...base, messageType: 'ack' }).messageType).toBe('ack');
  });

  it('should_throw_when_priorityOutOfRange', () => {
    expect(() => proposal({ priority: 0 })).toThrow(RangeError);
    expect(() => proposal({ priority: 11 })).toThrow('priority must be an integer from 1 to 10, got 11');
    expect(() => proposal({ priority: 2.5 })).toThrow(RangeError);
  });

  it('should_throw_when_ttlNotPositive', () => {
    expect(() => proposal({ ttl: 0 })).toThrow('ttl must be positive, got 0');
  });
});

describe('isMessageType', () => {
  it('should_acceptKnownTypes_when_checked', () => {
    expect(isMessageType('optimized_plan')).toBe(true);
    expect(isMessageType('broadcast')).toBe(false);
  });
});

describe('canonicalize', () => {
  it('should_ignoreSignature_when_computingBytes', () => {
    const envelope = proposal();
    const signed = signEnvelope(envelope, TEST_SECRET);

    expect(canonicalize(signed).equals(canonicalize(envelope))).toBe(true);
  });

  it('should_notMutateEnvelope_when_called', () => {
    const signed = signEnvelope(proposal(), TEST_SECRET);
    const before = JSON.stringify(signed);

    canonicalize(signed);

    expect(JSON.stringify(signed)).toBe(before);
  });
});

describe('signing', () => {
  it('should_attachHexSignature_when_signed', () => {
    const signed = signEnvelope(proposal(), TEST_SECRET);

    expect(signed.signature).toMatch(/^[0-9a-f]{64}$/);
    expect(verifyEnvelope(signed, TEST_SECRET)).toBe(true);
  });

  it('should_returnNewEnvelope_when_signed', () => {
    const envelope = proposal();
    const signed = signEnvelope(envelope, TEST_SECRET);

    expect(signed).not.toBe(envelope);
    expect(envelope.signature).toBeUndefined();
  });

  it('should_rejectUnsigned_when_verified', () => {
    expect(verifyEnvelope(proposal(), TEST_SECRET)).toBe(false);
  });

  it('should_reject_when_secretDiffers', () => {
    const signed = signEnvelope(proposal(), TEST_SECRET);

    expect(verifyEnvelope(signed, 'other-secret')).toBe(false);
  });

  it('should_reject_when_payloadTampered', () => {
    const signed = signEnvelope(proposal(), TEST_SECRET);
    const tampered: Envelope = { ...signed, payload: { ...signed.payload, estimated_total: '1.00' } };

    expect(verifyEnvelope(tampered, TEST_SECRET)).toBe(false);
  });

  it('should_reject_when_metadataTampered', () => {
    const signed = signEnvelope(proposal(), TEST_SECRET);
    const tampered: Envelope = { ...signed, metadata: { ...signed.metadata, priority: 10 } };

    expect(verifyEnvelope(tampered, TEST_SECRET)).toBe(false);
  });

  it('should_reject_when_signatureMalformed', () => {
    const signed = signEnvelope(proposal(), TEST_SECRET);

    expect(verifyEnvelope({ ...signed, signature: 'abc' }, TEST_SECRET)).toBe(false);
    expect(verifyEnvelope({ ...signed, signature: 'Z'.repeat(64) }, TEST_SECRET)).toBe(false);
  });

  it('should_verifyDeterministically_when_payloadKeysReordered', () => {
    const signed = signEnvelope(proposal(), TEST_SECRET);
    const reordered: Envelope = {
      ...signed,
      payload: { estimated_total: '20000.00', destination: 'Jaipur', task_id: 'task-1' },
    };

    expect(verifyEnvelope(reordered, TEST_SECRET)).toBe(true);
  });

  it('should_refuseToSign_when_payloadHoldsNegativeZero', () => {
    expect(() => signEnvelope(proposal({ payload: { total: -0 } }), TEST_SECRET)).toThrow(CanonicalizationError);
  });

  it('should_returnFalse_when_payloadCannotBeCanonicalized', () => {
    const signed = signEnvelope(proposal(), TEST_SECRET);
    const broken: Envelope = { ...signed, payload: { total: Number.NaN } };

    expect(verifyEnvelope(broken, TEST_SECRET)).toBe(false);
  });
});

describe('isEnvelopeExpired', () => {
  const created = Date.parse('2025-03-10T09:00:00.000Z');

  function at(timestamp: string, ttl = 60): Envelope {
    return { ...proposal({ ttl }), timestamp };
  }

  it('should_returnFalse_when_withinTtl', () => {
    expect(isEnvelopeExpired(at('2025-03-10T09:00:00.000Z'), created + 59_999)).toBe(false);
  });

  it('should_returnTrue_when_ttlElapsed', () => {
    expect(isEnvelopeExpired(at('2025-03-10T09:00:00.000Z'), created + 60_000)).toBe(true);
  });

  it('should_returnTrue_when_timestampUnparseable', () => {
    expect(isEnvelopeExpired(at('yesterday'), created)).toBe(true);
  });
});
