import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsIn,
  IsInt,
  Min,
  ValidateNested,
} from 'class-validator';
import { ORDER_SOURCES, ORDER_STATUSES } from './order-status';
import type { OrderSource, OrderStatus } from './order-status';

export class OrderLineDto {
  @IsInt()
  @Min(1)
  offeringId!: number;

  @IsInt()
  @Min(1, { message: 'Quantity must be at least 1.' })
  quantity!: number;
}

export class CreateOrderRequestDto {
  @IsInt()
  @Min(1)
  locationId!: number;

  @IsIn(ORDER_SOURCES)
  source!: OrderSource;

  @IsArray()
  @ArrayMinSize(1, { message: 'At least one product must be ordered.' })
  @ArrayMaxSize(100)
  @ValidateNested({ each: true })
  @Type(() => OrderLineDto)
  items!: OrderLineDto[];
}

export class UpdateOrderStatusDto {
  @IsIn(ORDER_STATUSES)
  status!: OrderStatus;
}
