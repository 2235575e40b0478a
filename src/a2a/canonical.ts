/**
 * Canonical JSON
 * Deterministic text form of payload values, used as the HMAC input
 */

import { CanonicalizationError } from '../types/index.js';

export type PayloadValue =
  | string
  | number
  | boolean
  | null
  | Date
  | PayloadValue[]
  | { [key: string]: PayloadValue | undefined };

export type Payload = { [key: string]: PayloadValue | undefined };

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function compareKeys(a: string, b: string): number {
  // Code point order, independent of locale
  return a < b ? -1 : a > b ? 1 : 0;
}

function encode(value: unknown, path: string, zeroNegatives: boolean): string {
  if (value === null) return 'null';
  if (typeof value === 'string' || typeof value === 'boolean') return JSON.stringify(value);
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new CanonicalizationError(`non-finite number ${value}`, path);
    }
    // JSON text has no -0; it would sign as 0 yet compare unequal after a round trip
    if (Object.is(value, -0) && !zeroNegatives) {
      throw new CanonicalizationError('negative zero', path);
    }
    return JSON.stringify(value);
  }
  if (typeof value !== 'object' || value === null) {
    throw new CanonicalizationError(`unsupported type ${typeof value}`, path);
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new CanonicalizationError('invalid date', path);
    }
    return JSON.stringify(value.toISOString());
  }

  if (Array.isArray(value)) {
    const items = value.map((item: unknown, index) => {
      if (item === undefined) {
        throw new CanonicalizationError('undefined array element', `${path}[${index}]`);
      }
      return encode(item, `${path}[${index}]`, zeroNegatives);
    });
    return `[${items.join(',')}]`;
  }

  if (!isPlainObject(value)) {
    throw new CanonicalizationError(`unsupported object ${Object.prototype.toString.call(value)}`, path);
  }

  const members = Object.keys(value)
    .sort(compareKeys)
    .flatMap((key) => {
      const member: unknown = Reflect.get(value, key);
      // An undefined member is an absent member
      if (member === undefined) return [];
      return [`${JSON.stringify(key)}:${encode(member, `${path}.${key}`, zeroNegatives)}`];
    });
  return `{${members.join(',')}}`;
}

/**
 * Serialize a value with sorted keys at every depth and dates as ISO-8601.
 * Throws CanonicalizationError for anything without a single text form.
 */
export function canonicalJson(value: unknown): string {
  return encode(value, '$', false);
}

/**
 * Narrow an arbitrary value (typically parsed JSON) to a payload object,
 * throwing CanonicalizationError if some part of it cannot be signed.
 * A -0 (which JSON.parse yields for "-0") becomes 0.
 */
export function toPayload(value: unknown): Payload {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new CanonicalizationError('payload must be a plain object', '$');
  }
  encode(value, '$', true);
  return copyObject(value);
}

// Only called on values canonicalJson has already accepted
function copyObject(value: object): Payload {
  const payload: Payload = {};
  for (const [key, member] of Object.entries(value)) {
    payload[key] = copyValue(member);
  }
  return payload;
}

function copyValue(value: unknown): PayloadValue | undefined {
  if (value === undefined || value === null) return value;
  if (typeof value === 'number') return Object.is(value, -0) ? 0 : value;
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) return value;
  if (Array.isArray(value)) {
    return value.map((item: unknown) => copyValue(item) ?? null);
  }
  if (typeof value === 'object') return copyObject(value);
  return undefined;
}
