import { Module } from '@nestjs/common';
import { KitchenLoadModule } from '../kitchen-load/kitchen-load.module';
import { PrepTimeModule } from '../prep-time/prep-time.module';
import { LocationsController } from './locations.controller';
import { LocationsRepository } from './locations.repository';
import { LocationsService } from './locations.service';

@Module({
  imports: [KitchenLoadModule, PrepTimeModule],
  controllers: [LocationsController],
  providers: [LocationsRepository, LocationsService],
  exports: [LocationsRepository],
})
export class LocationsModule {}
