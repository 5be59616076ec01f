export interface LoadInfo {
  activeCount: number;
  multiplier: number;
  isHighLoad: boolean;
}

export type CounterStoreKind = 'redis' | 'memory';

export type CounterStoreStatus = 'healthy' | 'unavailable';

export interface KitchenLoadStats {
  store: CounterStoreKind;
  status: CounterStoreStatus;
  cachedLocations: number;
  totalCachedOrders: number;
  error?: string;
}

/**
 * Answers "how many active orders does this location have" from the durable
 * order store. Slow, but always correct.
 */
export interface ActiveOrderSource {
  countActive(locationId: number): Promise<number>;
}
