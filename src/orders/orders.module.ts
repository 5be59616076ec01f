import { Module } from '@nestjs/common';
import { KitchenLoadModule } from '../kitchen-load/kitchen-load.module';
import { LocationsModule } from '../locations/locations.module';
import { PrepTimeModule } from '../prep-time/prep-time.module';
import { OrderLifecycleService } from './order-lifecycle.service';
import { OrderLoadBridge } from './order-load-bridge.service';
import { OrdersController } from './orders.controller';
import { OrdersRepository } from './orders.repository';
import { OrdersService } from './orders.service';

@Module({
  imports: [KitchenLoadModule, LocationsModule, PrepTimeModule],
  controllers: [OrdersController],
  providers: [
    OrdersRepository,
    OrderLifecycleService,
    OrderLoadBridge,
    OrdersService,
  ],
  exports: [OrdersService, OrderLifecycleService],
})
export class OrdersModule {}
