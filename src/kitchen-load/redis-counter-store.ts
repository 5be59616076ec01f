import { Logger, OnModuleDestroy } from '@nestjs/common';
import { randomUUID } from 'crypto';
import Redis from 'ioredis';
import {
  CounterStore,
  DecrementResult,
  parseCounterValue,
} from './counter-store';
import type { KitchenLoadConfig } from './kitchen-load.config';

// Both update scripts return nil for a missing key and leave it unwritten.
const INCREMENT_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then
  return false
end
local count = redis.call('INCR', KEYS[1])
redis.call('EXPIRE', KEYS[1], ARGV[1])
return count
`;

const DECREMENT_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then
  return false
end
local count = redis.call('DECR', KEYS[1])
local clamped = 0
if count < 0 then
  redis.call('SET', KEYS[1], 0)
  count = 0
  clamped = 1
end
redis.call('EXPIRE', KEYS[1], ARGV[1])
return {count, clamped}
`;

const UNLOCK_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

const SCAN_BATCH_SIZE = 200;

export class RedisCounterStore implements CounterStore, OnModuleDestroy {
  readonly kind = 'redis' as const;

  constructor(private readonly client: Redis) {}

  static connect(config: KitchenLoadConfig, logger: Logger): RedisCounterStore {
    if (!config.redisUrl) {
      throw new Error('REDIS_URL is required for the Redis counter store.');
    }
    const client = new Redis(config.redisUrl, {
      connectTimeout: config.connectTimeoutMs,
      commandTimeout: config.commandTimeoutMs,
      maxRetriesPerRequest: 1,
      // Fail fast while disconnected instead of queueing commands.
      enableOfflineQueue: false,
      retryStrategy: (times) => Math.min(times * 200, 5000),
    });
    client.on('error', (error: Error) => {
      logger.warn(`Redis connection error: ${error.message}`);
    });
    client.on('ready', () => {
      logger.log('Redis counter store connected');
    });
    return new RedisCounterStore(client);
  }

  async read(key: string, ttlSeconds: number): Promise<number | null> {
    const value = await this.client.getex(key, 'EX', ttlSeconds);
    return parseCounterValue(value);
  }

  async write(key: string, value: number, ttlSeconds: number): Promise<void> {
    await this.client.set(key, String(value), 'EX', ttlSeconds);
  }

  async increment(key: string, ttlSeconds: number): Promise<number | null> {
    const result = await this.client.eval(INCREMENT_SCRIPT, 1, key, ttlSeconds);
    if (result === null) {
      return null;
    }
    const count = parseCounterValue(result);
    if (count === null) {
      throw new Error(`Unexpected increment reply for ${key}`);
    }
    return count;
  }

  async decrement(key: string, ttlSeconds: number): Promise<DecrementResult | null> {
    const result = await this.client.eval(DECREMENT_SCRIPT, 1, key, ttlSeconds);
    if (result === null) {
      return null;
    }
    if (!Array.isArray(result)) {
      throw new Error(`Unexpected decrement reply for ${key}`);
    }
    const count = parseCounterValue(result[0]);
    if (count === null) {
      throw new Error(`Unexpected decrement reply for ${key}`);
    }
    return { count, clamped: parseCounterValue(result[1]) === 1 };
  }

  async tryLock(key: string, ttlSeconds: number): Promise<string | null> {
    const token = randomUUID();
    const reply = await this.client.set(key, token, 'EX', ttlSeconds, 'NX');
    return reply === 'OK' ? token : null;
  }

  async unlock(key: string, token: string): Promise<void> {
    await this.client.eval(UNLOCK_SCRIPT, 1, key, token);
  }

  async remove(key: string): Promise<void> {
    await this.client.del(key);
  }

  async entries(prefix: string): Promise<Map<string, number>> {
    const pattern = `${prefix.replace(/[*?[\]\\]/g, '\\$&')}*`;
    const result = new Map<string, number>();
    let cursor = '0';
    do {
      const [next, keys] = await this.client.scan(
        cursor,
        'MATCH',
        pattern,
        'COUNT',
        SCAN_BATCH_SIZE,
      );
      cursor = next;
      if (keys.length) {
        const values = await this.client.mget(keys);
        keys.forEach((key, index) => {
          const value = parseCounterValue(values[index]);
          if (value !== null) {
            result.set(key, value);
          }
        });
      }
    } while (cursor !== '0');
    return result;
  }

  async onModuleDestroy(): Promise<void> {
    try {
      await this.client.quit();
    } catch {
      this.client.disconnect();
    }
  }
}
