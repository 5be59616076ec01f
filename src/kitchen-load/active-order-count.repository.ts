import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import { activeStatusValues } from '../orders/order-status';
import type { ActiveOrderSource } from './kitchen-load.types';

@Injectable()
export class ActiveOrderCountRepository implements ActiveOrderSource {
  constructor(private readonly database: DatabaseService) {}

  async countActive(locationId: number): Promise<number> {
    const result = await this.database.query<{ count: number }>(
      `
        SELECT count(*)::int AS count
        FROM kitchen_order
        WHERE location_id = $1
          AND deleted_at IS NULL
          AND status = ANY($2::text[])
      `,
      [locationId, activeStatusValues()],
    );
    return result.rows[0]?.count ?? 0;
  }
}
