export interface KitchenLoadConfig {
  redisUrl: string | null;
  keyPrefix: string;
  countTtlSeconds: number;
  lockTtlSeconds: number;
  commandTimeoutMs: number;
  connectTimeoutMs: number;
}

function toNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadKitchenLoadConfig(): KitchenLoadConfig {
  return {
    redisUrl: process.env.REDIS_URL?.trim() ? process.env.REDIS_URL.trim() : null,
    keyPrefix: process.env.KITCHEN_LOAD_KEY_PREFIX?.trim() || 'location_load:',
    countTtlSeconds: toNumber(process.env.KITCHEN_LOAD_TTL_SECONDS, 3600),
    lockTtlSeconds: toNumber(process.env.KITCHEN_LOAD_LOCK_TTL_SECONDS, 10),
    commandTimeoutMs: toNumber(process.env.REDIS_COMMAND_TIMEOUT_MS, 500),
    connectTimeoutMs: toNumber(process.env.REDIS_CONNECT_TIMEOUT_MS, 2000),
  };
}
