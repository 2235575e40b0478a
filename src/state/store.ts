/**
 * Keyed State Store
 * Shared key/value storage with optional per-key expiry
 */

export interface StateStore {
  /** Undefined when the key is absent or expired */
  get(key: string): Promise<unknown>;

  /** `ttlSeconds` omitted or not positive means the entry never expires */
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;

  /** True when a live entry was removed */
  delete(key: string): Promise<boolean>;

  exists(key: string): Promise<boolean>;

  /**
   * Live keys matching `pattern`: `"foo*"` is a prefix match, `"*foo"` a
   * suffix match, anything else a substring match. No pattern lists all keys.
   */
  listKeys(pattern?: string): Promise<string[]>;

  /** Number of live entries removed */
  clear(): Promise<number>;
}

export type Clock = () => number;

export function matchesPattern(key: string, pattern: string | undefined): boolean {
  if (pattern === undefined || pattern === '' || pattern === '*') return true;
  if (pattern.endsWith('*')) return key.startsWith(pattern.slice(0, -1));
  if (pattern.startsWith('*')) return key.endsWith(pattern.slice(1));
  return key.includes(pattern);
}

export function expiryFor(ttlSeconds: number | undefined, now: number): number | undefined {
  return ttlSeconds !== undefined && ttlSeconds > 0 ? now + ttlSeconds * 1000 : undefined;
}

export function isExpired(expiresAt: number | undefined, now: number): boolean {
  return expiresAt !== undefined && expiresAt <= now;
}
