import { Module } from '@nestjs/common';
import { KitchenLoadModule } from '../kitchen-load/kitchen-load.module';
import { HealthController } from './health.controller';

@Module({
  imports: [KitchenLoadModule],
  controllers: [HealthController],
})
export class HealthModule {}
