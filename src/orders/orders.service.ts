import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { LocationsRepository } from '../locations/locations.repository';
import {
  OFFERINGS_UNAVAILABLE_MESSAGE,
  PrepTimeService,
} from '../prep-time/prep-time.service';
import type { OrderLineDto } from './orders.dto';
import type { OrderSource, OrderStatus } from './order-status';
import { OrderLifecycleService } from './order-lifecycle.service';
import { OrdersRepository } from './orders.repository';
import type { CreateOrderResponse, OrderDto } from './orders.types';

export interface CreateOrderPayload {
  locationId: number;
  source: OrderSource;
  items: OrderLineDto[];
}

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(
    private readonly repository: OrdersRepository,
    private readonly locations: LocationsRepository,
    private readonly prepTime: PrepTimeService,
    private readonly lifecycle: OrderLifecycleService,
  ) {}

  /**
   * Validates the offerings, fixes the ready time from the current load and
   * stores the order. The ready time is never recomputed afterwards.
   */
  async createOrder(payload: CreateOrderPayload): Promise<CreateOrderResponse> {
    const location = await this.locations.findById(payload.locationId);
    if (!location) {
      throw new NotFoundException(`Location ${payload.locationId} not found.`);
    }
    const valid = await this.prepTime.validateOfferings(payload.items, location.id);
    if (!valid) {
      throw new UnprocessableEntityException(OFFERINGS_UNAVAILABLE_MESSAGE);
    }

    const estimate = await this.prepTime.estimate(location.id, payload.items);
    const orderId = await this.repository.createOrder({
      locationId: location.id,
      source: payload.source,
      estimatedReadyAt: estimate.readyAt,
      items: payload.items.map((item) => ({
        offeringId: item.offeringId,
        quantity: item.quantity,
      })),
    });
    this.logger.log(
      `Order ${orderId} created for location ${location.id}, ready at ${estimate.readyAt.toISOString()}`,
    );
    this.lifecycle.emit({
      orderId,
      locationId: location.id,
      kind: 'created',
      previousStatus: null,
      nextStatus: 'received',
    });

    const order = await this.getOrderById(orderId);
    // Reported after creation so the new order is part of the load.
    const loadInfo = await this.prepTime.loadInfo(location.id);
    return { order, loadInfo };
  }

  async getOrderById(orderId: number): Promise<OrderDto> {
    const order = await this.repository.getOrderById(orderId);
    if (!order) {
      throw new NotFoundException(`Order ${orderId} not found.`);
    }
    return order;
  }

  async updateStatus(orderId: number, status: OrderStatus): Promise<OrderDto> {
    const change = await this.repository.updateStatus(orderId, status);
    if (!change) {
      throw new NotFoundException(`Order ${orderId} not found.`);
    }
    this.lifecycle.emit({
      orderId,
      locationId: change.locationId,
      kind: 'status-updated',
      previousStatus: change.previousStatus,
      nextStatus: change.status,
    });
    return this.getOrderById(orderId);
  }

  async deleteOrder(orderId: number): Promise<void> {
    const deleted = await this.repository.softDelete(orderId);
    if (!deleted) {
      throw new NotFoundException(`Order ${orderId} not found.`);
    }
    this.lifecycle.emit({
      orderId,
      locationId: deleted.locationId,
      kind: 'deleted',
      previousStatus: deleted.status,
      nextStatus: null,
    });
  }

  async restoreOrder(orderId: number): Promise<OrderDto> {
    const restored = await this.repository.restore(orderId);
    if (!restored) {
      if (await this.repository.orderExists(orderId)) {
        throw new ConflictException(`Order ${orderId} is not deleted.`);
      }
      throw new NotFoundException(`Order ${orderId} not found.`);
    }
    this.lifecycle.emit({
      orderId,
      locationId: restored.locationId,
      kind: 'restored',
      previousStatus: null,
      nextStatus: restored.status,
    });
    return this.getOrderById(orderId);
  }
}
