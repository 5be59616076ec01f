import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import type { LocationDto } from './locations.types';

type LocationRow = {
  id: number;
  company_id: number;
  name: string;
  address: string | null;
};

function mapLocationRow(row: LocationRow): LocationDto {
  return {
    id: row.id,
    companyId: row.company_id,
    name: row.name,
    address: row.address,
  };
}

@Injectable()
export class LocationsRepository {
  constructor(private readonly database: DatabaseService) {}

  async findById(locationId: number): Promise<LocationDto | null> {
    const result = await this.database.query<LocationRow>(
      'SELECT id, company_id, name, address FROM location WHERE id = $1',
      [locationId],
    );
    const row = result.rows[0];
    return row ? mapLocationRow(row) : null;
  }

  async listByCompany(companyId: number): Promise<LocationDto[]> {
    const result = await this.database.query<LocationRow>(
      'SELECT id, company_id, name, address FROM location WHERE company_id = $1 ORDER BY name',
      [companyId],
    );
    return result.rows.map(mapLocationRow);
  }
}
