import { Controller, Get, Param, ParseIntPipe } from '@nestjs/common';
import type { LocationDto } from '../locations/locations.types';
import { CompaniesService } from './companies.service';
import type { MenuItemDto } from './companies.types';

@Controller('companies')
export class CompaniesController {
  constructor(private readonly companiesService: CompaniesService) {}

  @Get(':companyId/menu-items')
  listMenuItems(
    @Param('companyId', ParseIntPipe) companyId: number,
  ): Promise<MenuItemDto[]> {
    return this.companiesService.listMenuItems(companyId);
  }

  @Get(':companyId/locations')
  listLocations(
    @Param('companyId', ParseIntPipe) companyId: number,
  ): Promise<LocationDto[]> {
    return this.companiesService.listLocations(companyId);
  }
}
