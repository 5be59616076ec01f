import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import type { OrderSource, OrderStatus } from './order-status';
import type { OrderDto, OrderItemDto } from './orders.types';

type OrderRow = {
  id: number;
  location_id: number;
  source: OrderSource;
  status: OrderStatus;
  estimated_ready_at: Date;
  created_at: Date;
  updated_at: Date;
};

type OrderItemRow = {
  order_id: number;
  offering_id: number;
  menu_item_id: number;
  name: string;
  quantity: number;
  base_prep_time_seconds: number;
};

type StatusChangeRow = {
  id: number;
  location_id: number;
  previous_status: OrderStatus;
  status: OrderStatus;
};

type MembershipRow = {
  id: number;
  location_id: number;
  status: OrderStatus;
};

export interface OrderInsertData {
  locationId: number;
  source: OrderSource;
  estimatedReadyAt: Date;
  items: Array<{ offeringId: number; quantity: number }>;
}

export interface OrderStatusChange {
  orderId: number;
  locationId: number;
  previousStatus: OrderStatus;
  status: OrderStatus;
}

export interface OrderMembership {
  orderId: number;
  locationId: number;
  status: OrderStatus;
}

const ORDER_COLUMNS = `
  id,
  location_id,
  source,
  status,
  estimated_ready_at,
  created_at,
  updated_at
`;

@Injectable()
export class OrdersRepository {
  constructor(private readonly database: DatabaseService) {}

  /** Inserts the order with status `received` and its line items in one transaction. */
  async createOrder(data: OrderInsertData): Promise<number> {
    return this.database.withTransaction(async (client) => {
      const inserted = await client.query<{ id: number }>(
        `
          INSERT INTO kitchen_order (location_id, source, status, estimated_ready_at)
          VALUES ($1, $2, 'received', $3)
          RETURNING id
        `,
        [data.locationId, data.source, data.estimatedReadyAt],
      );
      const orderId = inserted.rows[0]?.id;
      if (orderId === undefined) {
        throw new Error('Order insert returned no id.');
      }
      await client.query(
        `
          INSERT INTO kitchen_order_item (order_id, offering_id, quantity)
          SELECT $1, item.offering_id, item.quantity
          FROM unnest($2::int[], $3::int[]) AS item(offering_id, quantity)
        `,
        [
          orderId,
          data.items.map((item) => item.offeringId),
          data.items.map((item) => item.quantity),
        ],
      );
      return orderId;
    });
  }

  async getOrderById(orderId: number): Promise<OrderDto | null> {
    const result = await this.database.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM kitchen_order WHERE id = $1 AND deleted_at IS NULL`,
      [orderId],
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    const items = await this.database.query<OrderItemRow>(
      `
        SELECT
          i.order_id,
          i.offering_id,
          o.menu_item_id,
          m.name,
          i.quantity,
          m.base_prep_time_seconds
        FROM kitchen_order_item i
        JOIN location_offering o ON o.id = i.offering_id
        JOIN menu_item m ON m.id = o.menu_item_id
        WHERE i.order_id = $1
        ORDER BY i.id
      `,
      [orderId],
    );
    return mapOrderRow(row, items.rows.map(mapOrderItemRow));
  }

  async orderExists(orderId: number): Promise<boolean> {
    const result = await this.database.query<{ id: number }>(
      'SELECT id FROM kitchen_order WHERE id = $1',
      [orderId],
    );
    return result.rows.length > 0;
  }

  /**
   * Writes the new status and returns the status it replaced. The previous
   * status is read under a row lock, so concurrent updates of one order each
   * see the status the other one wrote.
   */
  async updateStatus(
    orderId: number,
    status: OrderStatus,
  ): Promise<OrderStatusChange | null> {
    const result = await this.database.query<StatusChangeRow>(
      `
        UPDATE kitchen_order o
        SET status = $2, updated_at = now()
        FROM (
          SELECT id, status
          FROM kitchen_order
          WHERE id = $1 AND deleted_at IS NULL
          FOR UPDATE
        ) previous
        WHERE o.id = previous.id
        RETURNING o.id, o.location_id, previous.status AS previous_status, o.status
      `,
      [orderId, status],
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      orderId: row.id,
      locationId: row.location_id,
      previousStatus: row.previous_status,
      status: row.status,
    };
  }

  async softDelete(orderId: number): Promise<OrderMembership | null> {
    const result = await this.database.query<MembershipRow>(
      `
        UPDATE kitchen_order
        SET deleted_at = now(), updated_at = now()
        WHERE id = $1 AND deleted_at IS NULL
        RETURNING id, location_id, status
      `,
      [orderId],
    );
    return mapMembershipRow(result.rows[0]);
  }

  async restore(orderId: number): Promise<OrderMembership | null> {
    const result = await this.database.query<MembershipRow>(
      `
        UPDATE kitchen_order
        SET deleted_at = NULL, updated_at = now()
        WHERE id = $1 AND deleted_at IS NOT NULL
        RETURNING id, location_id, status
      `,
      [orderId],
    );
    return mapMembershipRow(result.rows[0]);
  }
}

function mapOrderRow(row: OrderRow, items: OrderItemDto[]): OrderDto {
  return {
    id: row.id,
    locationId: row.location_id,
    source: row.source,
    status: row.status,
    estimatedReadyAt: row.estimated_ready_at.toISOString(),
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
    items,
  };
}

function mapOrderItemRow(row: OrderItemRow): OrderItemDto {
  return {
    offeringId: row.offering_id,
    menuItemId: row.menu_item_id,
    name: row.name,
    quantity: row.quantity,
    basePrepTimeSeconds: row.base_prep_time_seconds,
  };
}

function mapMembershipRow(row: MembershipRow | undefined): OrderMembership | null {
  if (!row) {
    return null;
  }
  return { orderId: row.id, locationId: row.location_id, status: row.status };
}
