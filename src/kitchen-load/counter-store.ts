import type { CounterStoreKind } from './kitchen-load.types';

export interface DecrementResult {
  count: number;
  /** True when the decrement would have gone below zero and was clamped. */
  clamped: boolean;
}

/**
 * Shared key/value store behind the load counter. Every method is a single
 * atomic operation against the store; implementations reject when the store
 * cannot be reached.
 */
export interface CounterStore {
  readonly kind: CounterStoreKind;

  /** Reads an integer value and extends its expiry. `null` when absent. */
  read(key: string, ttlSeconds: number): Promise<number | null>;

  write(key: string, value: number, ttlSeconds: number): Promise<void>;

  /**
   * Increments an existing key and refreshes its expiry. Resolves `null`
   * without writing when the key is absent.
   */
  increment(key: string, ttlSeconds: number): Promise<number | null>;

  /**
   * Decrements an existing key, clamps at zero and refreshes the expiry.
   * Resolves `null` without writing when the key is absent.
   */
  decrement(key: string, ttlSeconds: number): Promise<DecrementResult | null>;

  /**
   * Sets the key only if it does not exist yet. Resolves the owner token on
   * success and `null` when the lock is held.
   */
  tryLock(key: string, ttlSeconds: number): Promise<string | null>;

  /** Deletes the lock only while it still holds `token`. */
  unlock(key: string, token: string): Promise<void>;

  remove(key: string): Promise<void>;

  /** All integer entries whose key starts with `prefix`. */
  entries(prefix: string): Promise<Map<string, number>>;
}

export function parseCounterValue(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
