import { Module } from '@nestjs/common';
import { KitchenLoadModule } from '../kitchen-load/kitchen-load.module';
import { OfferingsRepository } from './offerings.repository';
import { PrepTimeService } from './prep-time.service';

@Module({
  imports: [KitchenLoadModule],
  providers: [OfferingsRepository, PrepTimeService],
  exports: [OfferingsRepository, PrepTimeService],
})
export class PrepTimeModule {}
