import { Injectable, NotFoundException } from '@nestjs/common';
import { LocationsRepository } from '../locations/locations.repository';
import type { LocationDto } from '../locations/locations.types';
import { CompaniesRepository } from './companies.repository';
import type { MenuItemDto } from './companies.types';

@Injectable()
export class CompaniesService {
  constructor(
    private readonly repository: CompaniesRepository,
    private readonly locations: LocationsRepository,
  ) {}

  async listMenuItems(companyId: number): Promise<MenuItemDto[]> {
    await this.assertCompany(companyId);
    return this.repository.listMenuItems(companyId);
  }

  async listLocations(companyId: number): Promise<LocationDto[]> {
    await this.assertCompany(companyId);
    return this.locations.listByCompany(companyId);
  }

  private async assertCompany(companyId: number): Promise<void> {
    const company = await this.repository.findById(companyId);
    if (!company) {
      throw new NotFoundException(`Company ${companyId} not found.`);
    }
  }
}
