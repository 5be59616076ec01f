import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Patch,
  Post,
} from '@nestjs/common';
import { CreateOrderRequestDto, UpdateOrderStatusDto } from './orders.dto';
import { OrdersService } from './orders.service';
import type { CreateOrderResponse, OrderDto } from './orders.types';

@Controller('orders')
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  @Post()
  createOrder(
    @Body() payload: CreateOrderRequestDto,
  ): Promise<CreateOrderResponse> {
    return this.ordersService.createOrder(payload);
  }

  @Get(':orderId')
  getOrder(
    @Param('orderId', ParseIntPipe) orderId: number,
  ): Promise<OrderDto> {
    return this.ordersService.getOrderById(orderId);
  }

  @Patch(':orderId/status')
  updateStatus(
    @Param('orderId', ParseIntPipe) orderId: number,
    @Body() payload: UpdateOrderStatusDto,
  ): Promise<OrderDto> {
    return this.ordersService.updateStatus(orderId, payload.status);
  }

  @Delete(':orderId')
  async deleteOrder(
    @Param('orderId', ParseIntPipe) orderId: number,
  ) {
    await this.ordersService.deleteOrder(orderId);
    return { ok: true };
  }

  @Post(':orderId/restore')
  @HttpCode(200)
  restoreOrder(
    @Param('orderId', ParseIntPipe) orderId: number,
  ): Promise<OrderDto> {
    return this.ordersService.restoreOrder(orderId);
  }
}
