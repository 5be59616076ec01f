import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsInt,
  IsOptional,
  Min,
  ValidateNested,
} from 'class-validator';
import { OrderLineDto } from '../orders/orders.dto';

export class MenuItemLineDto {
  @IsInt()
  @Min(1)
  menuItemId!: number;

  @IsInt()
  @Min(1, { message: 'Quantity must be at least 1.' })
  quantity!: number;
}

/** Either catalog menu items or location offerings, not both. */
export class EstimateReadyTimeRequestDto {
  @IsOptional()
  @IsArray()
  @ArrayMinSize(1, { message: 'At least one product must be specified for estimation.' })
  @ArrayMaxSize(100)
  @ValidateNested({ each: true })
  @Type(() => MenuItemLineDto)
  items?: MenuItemLineDto[];

  @IsOptional()
  @IsArray()
  @ArrayMinSize(1, { message: 'At least one product must be specified for estimation.' })
  @ArrayMaxSize(100)
  @ValidateNested({ each: true })
  @Type(() => OrderLineDto)
  offerings?: OrderLineDto[];
}
