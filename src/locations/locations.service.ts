import {
  BadRequestException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { LoadCounterService } from '../kitchen-load/load-counter.service';
import type { LoadInfo } from '../kitchen-load/kitchen-load.types';
import { OfferingsRepository } from '../prep-time/offerings.repository';
import { PrepTimeService } from '../prep-time/prep-time.service';
import type { ReadyTimeEstimate } from '../prep-time/prep-time.types';
import type { EstimateReadyTimeRequestDto } from './locations.dto';
import { LocationsRepository } from './locations.repository';
import type {
  LocationDto,
  OfferingDto,
  ReadyTimeEstimateResponse,
} from './locations.types';

@Injectable()
export class LocationsService {
  constructor(
    private readonly repository: LocationsRepository,
    private readonly offerings: OfferingsRepository,
    private readonly prepTime: PrepTimeService,
    private readonly loadCounter: LoadCounterService,
  ) {}

  async getLocation(locationId: number): Promise<LocationDto> {
    const location = await this.repository.findById(locationId);
    if (!location) {
      throw new NotFoundException(`Location ${locationId} not found.`);
    }
    return location;
  }

  async listOfferings(locationId: number): Promise<OfferingDto[]> {
    await this.getLocation(locationId);
    const records = await this.offerings.listAvailable(locationId);
    return records.map((record) => ({
      id: record.id,
      menuItemId: record.menuItemId,
      name: record.menuItemName,
      basePrepTimeSeconds: record.basePrepTimeSeconds,
    }));
  }

  /** What-if estimate for a hypothetical order; nothing is persisted. */
  async estimateReadyAt(
    locationId: number,
    payload: EstimateReadyTimeRequestDto,
  ): Promise<ReadyTimeEstimateResponse> {
    const hasItems = !!payload.items?.length;
    const hasOfferings = !!payload.offerings?.length;
    if (hasItems === hasOfferings) {
      throw new BadRequestException('Specify either items or offerings to estimate.');
    }
    await this.getLocation(locationId);

    const estimate = payload.items?.length
      ? await this.prepTime.estimateForMenuItems(locationId, payload.items)
      : await this.prepTime.estimate(locationId, payload.offerings ?? []);
    return toEstimateResponse(estimate);
  }

  async getLoad(locationId: number): Promise<LoadInfo> {
    await this.getLocation(locationId);
    return this.prepTime.loadInfo(locationId);
  }

  async resyncLoad(locationId: number): Promise<LoadInfo> {
    await this.getLocation(locationId);
    await this.loadCounter.resync(locationId);
    return this.prepTime.loadInfo(locationId);
  }
}

function toEstimateResponse(estimate: ReadyTimeEstimate): ReadyTimeEstimateResponse {
  return {
    estimatedReadyAt: estimate.readyAt.toISOString(),
    readyInMinutes: Math.ceil(estimate.prepSeconds / 60),
    basePrepSeconds: estimate.basePrepSeconds,
    prepSeconds: estimate.prepSeconds,
    loadInfo: estimate.loadInfo,
  };
}
