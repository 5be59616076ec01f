import { randomUUID } from 'crypto';
import type { CounterStore, DecrementResult } from './counter-store';

type Entry = {
  value: number;
  expiresAt: number;
  token?: string;
};

/**
 * Process-local counter store. Each operation completes synchronously inside
 * the returned promise, so concurrent callers in one process never interleave
 * within an operation. Only suitable for a single process.
 */
export class MemoryCounterStore implements CounterStore {
  readonly kind = 'memory' as const;
  private readonly data = new Map<string, Entry>();

  async read(key: string, ttlSeconds: number): Promise<number | null> {
    const entry = this.live(key);
    if (!entry) {
      return null;
    }
    entry.expiresAt = this.expiry(ttlSeconds);
    return entry.value;
  }

  async write(key: string, value: number, ttlSeconds: number): Promise<void> {
    this.data.set(key, { value, expiresAt: this.expiry(ttlSeconds) });
  }

  async increment(key: string, ttlSeconds: number): Promise<number | null> {
    const entry = this.live(key);
    if (!entry) {
      return null;
    }
    entry.value += 1;
    entry.expiresAt = this.expiry(ttlSeconds);
    return entry.value;
  }

  async decrement(key: string, ttlSeconds: number): Promise<DecrementResult | null> {
    const entry = this.live(key);
    if (!entry) {
      return null;
    }
    const next = entry.value - 1;
    const clamped = next < 0;
    entry.value = clamped ? 0 : next;
    entry.expiresAt = this.expiry(ttlSeconds);
    return { count: entry.value, clamped };
  }

  async tryLock(key: string, ttlSeconds: number): Promise<string | null> {
    if (this.live(key)) {
      return null;
    }
    const token = randomUUID();
    this.data.set(key, { value: 1, expiresAt: this.expiry(ttlSeconds), token });
    return token;
  }

  async unlock(key: string, token: string): Promise<void> {
    if (this.live(key)?.token === token) {
      this.data.delete(key);
    }
  }

  async remove(key: string): Promise<void> {
    this.data.delete(key);
  }

  async entries(prefix: string): Promise<Map<string, number>> {
    const result = new Map<string, number>();
    for (const key of [...this.data.keys()]) {
      if (!key.startsWith(prefix)) {
        continue;
      }
      const entry = this.live(key);
      if (entry) {
        result.set(key, entry.value);
      }
    }
    return result;
  }

  private live(key: string): Entry | null {
    const entry = this.data.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= Date.now()) {
      this.data.delete(key);
      return null;
    }
    return entry;
  }

  private expiry(ttlSeconds: number): number {
    return Date.now() + ttlSeconds * 1000;
  }
}
