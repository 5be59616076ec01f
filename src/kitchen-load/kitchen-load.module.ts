import { Logger, Module } from '@nestjs/common';
import { ActiveOrderCountRepository } from './active-order-count.repository';
import type { CounterStore } from './counter-store';
import { KitchenLoadController } from './kitchen-load.controller';
import {
  ACTIVE_ORDER_SOURCE,
  COUNTER_STORE,
  KITCHEN_LOAD_CONFIG,
} from './kitchen-load.constants';
import { KitchenLoadConfig, loadKitchenLoadConfig } from './kitchen-load.config';
import { LoadCounterService } from './load-counter.service';
import { MemoryCounterStore } from './memory-counter-store';
import { RedisCounterStore } from './redis-counter-store';

function createCounterStore(config: KitchenLoadConfig): CounterStore {
  const logger = new Logger('CounterStore');
  if (!config.redisUrl) {
    logger.warn(
      'REDIS_URL is not set. Active order counts are cached in process memory only.',
    );
    return new MemoryCounterStore();
  }
  return RedisCounterStore.connect(config, logger);
}

@Module({
  controllers: [KitchenLoadController],
  providers: [
    { provide: KITCHEN_LOAD_CONFIG, useFactory: loadKitchenLoadConfig },
    {
      provide: COUNTER_STORE,
      useFactory: createCounterStore,
      inject: [KITCHEN_LOAD_CONFIG],
    },
    ActiveOrderCountRepository,
    { provide: ACTIVE_ORDER_SOURCE, useExisting: ActiveOrderCountRepository },
    LoadCounterService,
  ],
  exports: [LoadCounterService],
})
export class KitchenLoadModule {}
