import type { LoadInfo } from '../kitchen-load/kitchen-load.types';
import type { OrderSource, OrderStatus } from './order-status';

export interface OrderItemDto {
  offeringId: number;
  menuItemId: number;
  name: string;
  quantity: number;
  basePrepTimeSeconds: number;
}

export interface OrderDto {
  id: number;
  locationId: number;
  source: OrderSource;
  status: OrderStatus;
  estimatedReadyAt: string;
  createdAt: string;
  updatedAt: string;
  items: OrderItemDto[];
}

export interface CreateOrderResponse {
  order: OrderDto;
  loadInfo: LoadInfo;
}

export type OrderTransitionKind =
  | 'created'
  | 'status-updated'
  | 'deleted'
  | 'restored';

/**
 * A change of an order's status. `previousStatus` is null for an order that
 * did not exist (or was deleted) before; `nextStatus` is null once deleted.
 */
export interface OrderTransitionEvent {
  orderId: number;
  locationId: number;
  kind: OrderTransitionKind;
  previousStatus: OrderStatus | null;
  nextStatus: OrderStatus | null;
  at: string;
}
