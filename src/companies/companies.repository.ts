import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import type { CompanyDto, MenuItemDto } from './companies.types';

type CompanyRow = {
  id: number;
  name: string;
};

type MenuItemRow = {
  id: number;
  company_id: number;
  name: string;
  base_prep_time_seconds: number;
};

@Injectable()
export class CompaniesRepository {
  constructor(private readonly database: DatabaseService) {}

  async findById(companyId: number): Promise<CompanyDto | null> {
    const result = await this.database.query<CompanyRow>(
      'SELECT id, name FROM company WHERE id = $1',
      [companyId],
    );
    const row = result.rows[0];
    return row ? { id: row.id, name: row.name } : null;
  }

  async listMenuItems(companyId: number): Promise<MenuItemDto[]> {
    const result = await this.database.query<MenuItemRow>(
      `
        SELECT id, company_id, name, base_prep_time_seconds
        FROM menu_item
        WHERE company_id = $1
        ORDER BY name
      `,
      [companyId],
    );
    return result.rows.map((row) => ({
      id: row.id,
      companyId: row.company_id,
      name: row.name,
      basePrepTimeSeconds: row.base_prep_time_seconds,
    }));
  }
}
