import { Controller, Get } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import { LoadCounterService } from '../kitchen-load/load-counter.service';
import type { CounterStoreKind, CounterStoreStatus } from '../kitchen-load/kitchen-load.types';

export interface HealthResponse {
  status: 'ok';
  database: 'enabled' | 'disabled';
  counterStore: {
    kind: CounterStoreKind;
    status: CounterStoreStatus;
  };
}

@Controller('health')
export class HealthController {
  constructor(
    private readonly database: DatabaseService,
    private readonly loadCounter: LoadCounterService,
  ) {}

  @Get()
  async check(): Promise<HealthResponse> {
    const stats = await this.loadCounter.stats();
    return {
      status: 'ok',
      database: this.database.enabled ? 'enabled' : 'disabled',
      counterStore: { kind: stats.store, status: stats.status },
    };
  }
}
