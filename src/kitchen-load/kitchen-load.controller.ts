import { Controller, Get } from '@nestjs/common';
import { LoadCounterService } from './load-counter.service';
import type { KitchenLoadStats } from './kitchen-load.types';

@Controller('kitchen-load')
export class KitchenLoadController {
  constructor(private readonly loadCounter: LoadCounterService) {}

  @Get('stats')
  getStats(): Promise<KitchenLoadStats> {
    return this.loadCounter.stats();
  }
}
