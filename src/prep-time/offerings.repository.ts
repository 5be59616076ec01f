import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import type { OfferingRecord } from './prep-time.types';

type OfferingRow = {
  id: number;
  location_id: number;
  menu_item_id: number;
  menu_item_name: string;
  is_available: boolean;
  base_prep_time_seconds: number;
};

const OFFERING_SELECT = `
  SELECT
    o.id,
    o.location_id,
    o.menu_item_id,
    m.name AS menu_item_name,
    o.is_available,
    m.base_prep_time_seconds
  FROM location_offering o
  JOIN menu_item m ON m.id = o.menu_item_id
`;

@Injectable()
export class OfferingsRepository {
  constructor(private readonly database: DatabaseService) {}

  async findByIds(ids: number[]): Promise<OfferingRecord[]> {
    if (!ids.length) {
      return [];
    }
    const result = await this.database.query<OfferingRow>(
      `${OFFERING_SELECT} WHERE o.id = ANY($1::int[])`,
      [ids],
    );
    return result.rows.map(mapOfferingRow);
  }

  async findByMenuItems(
    locationId: number,
    menuItemIds: number[],
  ): Promise<OfferingRecord[]> {
    if (!menuItemIds.length) {
      return [];
    }
    const result = await this.database.query<OfferingRow>(
      `${OFFERING_SELECT} WHERE o.location_id = $1 AND o.menu_item_id = ANY($2::int[])`,
      [locationId, menuItemIds],
    );
    return result.rows.map(mapOfferingRow);
  }

  async listAvailable(locationId: number): Promise<OfferingRecord[]> {
    const result = await this.database.query<OfferingRow>(
      `${OFFERING_SELECT} WHERE o.location_id = $1 AND o.is_available = TRUE ORDER BY m.name`,
      [locationId],
    );
    return result.rows.map(mapOfferingRow);
  }
}

function mapOfferingRow(row: OfferingRow): OfferingRecord {
  return {
    id: row.id,
    locationId: row.location_id,
    menuItemId: row.menu_item_id,
    menuItemName: row.menu_item_name,
    available: row.is_available,
    basePrepTimeSeconds: row.base_prep_time_seconds,
  };
}
