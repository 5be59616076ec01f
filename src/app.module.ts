import { Module } from '@nestjs/common';
import { CompaniesModule } from './companies/companies.module';
import { DatabaseModule } from './database/database.module';
import { HealthModule } from './health/health.module';
import { KitchenLoadModule } from './kitchen-load/kitchen-load.module';
import { LocationsModule } from './locations/locations.module';
import { OrdersModule } from './orders/orders.module';
import { PrepTimeModule } from './prep-time/prep-time.module';

@Module({
  imports: [
    DatabaseModule,
    KitchenLoadModule,
    PrepTimeModule,
    LocationsModule,
    CompaniesModule,
    OrdersModule,
    HealthModule,
  ],
})
export class AppModule {}
