import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
} from '@nestjs/common';
import type { LoadInfo } from '../kitchen-load/kitchen-load.types';
import { EstimateReadyTimeRequestDto } from './locations.dto';
import { LocationsService } from './locations.service';
import type {
  LocationDto,
  OfferingDto,
  ReadyTimeEstimateResponse,
} from './locations.types';

@Controller('locations')
export class LocationsController {
  constructor(private readonly locationsService: LocationsService) {}

  @Get(':locationId')
  getLocation(
    @Param('locationId', ParseIntPipe) locationId: number,
  ): Promise<LocationDto> {
    return this.locationsService.getLocation(locationId);
  }

  @Get(':locationId/offerings')
  listOfferings(
    @Param('locationId', ParseIntPipe) locationId: number,
  ): Promise<OfferingDto[]> {
    return this.locationsService.listOfferings(locationId);
  }

  @Post(':locationId/estimate-ready-at')
  @HttpCode(200)
  estimateReadyAt(
    @Param('locationId', ParseIntPipe) locationId: number,
    @Body() payload: EstimateReadyTimeRequestDto,
  ): Promise<ReadyTimeEstimateResponse> {
    return this.locationsService.estimateReadyAt(locationId, payload);
  }

  @Get(':locationId/load')
  getLoad(
    @Param('locationId', ParseIntPipe) locationId: number,
  ): Promise<LoadInfo> {
    return this.locationsService.getLoad(locationId);
  }

  @Post(':locationId/load/resync')
  @HttpCode(200)
  resyncLoad(
    @Param('locationId', ParseIntPipe) locationId: number,
  ): Promise<LoadInfo> {
    return this.locationsService.resyncLoad(locationId);
  }
}
