import { Inject, Injectable, Logger } from '@nestjs/common';
import type { CounterStore } from './counter-store';
import {
  ACTIVE_ORDER_SOURCE,
  COUNTER_STORE,
  KITCHEN_LOAD_CONFIG,
} from './kitchen-load.constants';
import type { KitchenLoadConfig } from './kitchen-load.config';
import type { ActiveOrderSource, KitchenLoadStats } from './kitchen-load.types';

class ActiveOrderSourceError extends Error {
  constructor(locationId: number, cause: unknown) {
    super(`Active order count for location ${locationId} failed: ${describeError(cause)}`, {
      cause,
    });
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Shared cache of active order counts per location.
 *
 * Reads go through the counter store with a short per-location lock so only
 * one caller recomputes a missing entry; increments and decrements are single
 * atomic store operations. An increment or decrement on a missing entry
 * recomputes it from the database, which already includes the committed
 * change. Store failures never reach callers: reads fall back to the database
 * and writes fall back to a full resync.
 */
@Injectable()
export class LoadCounterService {
  private readonly logger = new Logger(LoadCounterService.name);

  constructor(
    @Inject(KITCHEN_LOAD_CONFIG) private readonly config: KitchenLoadConfig,
    @Inject(COUNTER_STORE) private readonly store: CounterStore,
    @Inject(ACTIVE_ORDER_SOURCE) private readonly source: ActiveOrderSource,
  ) {}

  async getActiveCount(locationId: number): Promise<number> {
    try {
      return await this.readThrough(locationId);
    } catch (error) {
      if (error instanceof ActiveOrderSourceError) {
        this.logger.error(error.message);
        return 0;
      }
      this.logger.warn(
        `Counter store unavailable, reading location ${locationId} from the database: ${describeError(error)}`,
      );
      return this.countOrZero(locationId);
    }
  }

  async setActiveCount(locationId: number, count: number): Promise<void> {
    const value = Math.max(0, Math.trunc(count));
    try {
      await this.store.write(this.countKey(locationId), value, this.config.countTtlSeconds);
      this.logger.debug(`Set location ${locationId} to ${value} active orders`);
    } catch (error) {
      this.logger.warn(
        `Failed to set active orders for location ${locationId}: ${describeError(error)}`,
      );
    }
  }

  async increment(locationId: number): Promise<number> {
    try {
      const count = await this.store.increment(
        this.countKey(locationId),
        this.config.countTtlSeconds,
      );
      if (count !== null) {
        this.logger.debug(`Incremented location ${locationId} to ${count} active orders`);
        return count;
      }
      this.logger.debug(`No cached count for location ${locationId} on increment, resyncing`);
    } catch (error) {
      this.logger.warn(
        `Failed to increment location ${locationId}, resyncing: ${describeError(error)}`,
      );
    }
    return (await this.resync(locationId)) ?? 0;
  }

  async decrement(locationId: number): Promise<number> {
    try {
      const result = await this.store.decrement(
        this.countKey(locationId),
        this.config.countTtlSeconds,
      );
      if (!result) {
        this.logger.debug(`No cached count for location ${locationId} on decrement, resyncing`);
      } else if (!result.clamped) {
        this.logger.debug(`Decremented location ${locationId} to ${result.count} active orders`);
        return result.count;
      } else {
        // Going below zero means an increment was missed; the entry has diverged.
        this.logger.warn(`Active orders for location ${locationId} went below zero, resyncing`);
      }
    } catch (error) {
      this.logger.warn(
        `Failed to decrement location ${locationId}, resyncing: ${describeError(error)}`,
      );
    }
    return (await this.resync(locationId)) ?? 0;
  }

  async invalidate(locationId: number): Promise<void> {
    try {
      await this.store.remove(this.countKey(locationId));
      this.logger.debug(`Cleared cached active orders for location ${locationId}`);
    } catch (error) {
      this.logger.warn(
        `Failed to clear cached active orders for location ${locationId}: ${describeError(error)}`,
      );
    }
  }

  /**
   * Recomputes the count from the database and overwrites the cache entry.
   * Returns `null` when the database could not be queried.
   */
  async resync(locationId: number): Promise<number | null> {
    let count: number;
    try {
      count = await this.source.countActive(locationId);
    } catch (error) {
      this.logger.error(
        `Failed to resync location ${locationId} from the database: ${describeError(error)}`,
      );
      return null;
    }
    await this.setActiveCount(locationId, count);
    this.logger.log(`Resynced location ${locationId}: ${count} active orders`);
    return count;
  }

  async stats(): Promise<KitchenLoadStats> {
    try {
      const entries = await this.store.entries(this.config.keyPrefix);
      let cachedLocations = 0;
      let totalCachedOrders = 0;
      entries.forEach((value, key) => {
        if (key.endsWith(':lock')) {
          return;
        }
        cachedLocations += 1;
        totalCachedOrders += value;
      });
      return {
        store: this.store.kind,
        status: 'healthy',
        cachedLocations,
        totalCachedOrders,
      };
    } catch (error) {
      return {
        store: this.store.kind,
        status: 'unavailable',
        cachedLocations: 0,
        totalCachedOrders: 0,
        error: describeError(error),
      };
    }
  }

  private async readThrough(locationId: number): Promise<number> {
    const key = this.countKey(locationId);
    const ttl = this.config.countTtlSeconds;
    const cached = await this.store.read(key, ttl);
    if (cached !== null) {
      this.logger.debug(`Cache hit for location ${locationId}: ${cached} active orders`);
      return cached;
    }

    const lockKey = this.lockKey(locationId);
    const token = await this.store.tryLock(lockKey, this.config.lockTtlSeconds);
    if (token === null) {
      this.logger.debug(
        `Miss lock for location ${locationId} is held elsewhere, reading the database uncached`,
      );
      return this.countFromSource(locationId);
    }

    try {
      const recheck = await this.store.read(key, ttl);
      if (recheck !== null) {
        this.logger.debug(`Cache hit after lock for location ${locationId}: ${recheck} active orders`);
        return recheck;
      }
      const count = await this.countFromSource(locationId);
      await this.store.write(key, count, ttl);
      this.logger.log(`Cache miss for location ${locationId}, cached ${count} active orders`);
      return count;
    } finally {
      await this.releaseLock(lockKey, token);
    }
  }

  private async countFromSource(locationId: number): Promise<number> {
    try {
      return await this.source.countActive(locationId);
    } catch (error) {
      throw new ActiveOrderSourceError(locationId, error);
    }
  }

  private async countOrZero(locationId: number): Promise<number> {
    try {
      return await this.source.countActive(locationId);
    } catch (error) {
      this.logger.error(
        `Active order count for location ${locationId} failed: ${describeError(error)}`,
      );
      return 0;
    }
  }

  private async releaseLock(lockKey: string, token: string): Promise<void> {
    try {
      await this.store.unlock(lockKey, token);
    } catch (error) {
      // The lock expires on its own after lockTtlSeconds.
      this.logger.warn(`Failed to release ${lockKey}: ${describeError(error)}`);
    }
  }

  private countKey(locationId: number): string {
    return `${this.config.keyPrefix}${locationId}`;
  }

  private lockKey(locationId: number): string {
    return `${this.countKey(locationId)}:lock`;
  }
}
