import {
  BadRequestException,
  Injectable,
  Logger,
  UnprocessableEntityException,
} from '@nestjs/common';
import { LoadCounterService } from '../kitchen-load/load-counter.service';
import {
  isHighLoad,
  loadMultiplier,
  roundMultiplier,
} from '../kitchen-load/load-multiplier';
import type { LoadInfo } from '../kitchen-load/kitchen-load.types';
import { OfferingsRepository } from './offerings.repository';
import type {
  MenuItemLine,
  OfferingLine,
  OfferingRecord,
  ReadyTimeEstimate,
} from './prep-time.types';

/** No order is promised in less than ten minutes, however small. */
export const MINIMUM_READY_SECONDS = 10 * 60;

export const OFFERINGS_UNAVAILABLE_MESSAGE =
  'One or more products are not available at this location.';

/**
 * Estimates when an order will be ready:
 *
 * 1. sum `basePrepTimeSeconds * quantity` over all lines,
 * 2. scale by the location's load multiplier,
 * 3. never go below {@link MINIMUM_READY_SECONDS},
 * 4. add the result to the current time.
 *
 * Only reads the load counter; increments and decrements belong to the order
 * lifecycle.
 */
@Injectable()
export class PrepTimeService {
  private readonly logger = new Logger(PrepTimeService.name);

  constructor(
    private readonly offerings: OfferingsRepository,
    private readonly loadCounter: LoadCounterService,
  ) {}

  async estimate(
    locationId: number,
    lines: OfferingLine[],
  ): Promise<ReadyTimeEstimate> {
    this.assertLines(lines);
    const offerings = await this.resolveOfferings(locationId, lines);

    const basePrepSeconds = lines.reduce((total, line) => {
      const offering = offerings.get(line.offeringId);
      return total + (offering?.basePrepTimeSeconds ?? 0) * line.quantity;
    }, 0);

    const activeCount = await this.loadCounter.getActiveCount(locationId);
    const multiplier = loadMultiplier(activeCount);
    // multiplier has at most two decimals; scale in hundredths to stay exact
    const adjusted = (basePrepSeconds * Math.round(multiplier * 100)) / 100;
    const prepSeconds = Math.max(adjusted, MINIMUM_READY_SECONDS);
    const readyAt = new Date(Date.now() + Math.round(prepSeconds * 1000));

    this.logger.debug(
      `Location ${locationId}: base ${basePrepSeconds}s x${multiplier} (${activeCount} active) -> ${prepSeconds}s`,
    );
    return {
      readyAt,
      basePrepSeconds,
      prepSeconds,
      loadInfo: this.toLoadInfo(activeCount),
    };
  }

  /**
   * Estimates by catalog menu item, resolving each one to the location's
   * offering first.
   */
  async estimateForMenuItems(
    locationId: number,
    items: MenuItemLine[],
  ): Promise<ReadyTimeEstimate> {
    if (!items.length) {
      throw new BadRequestException('At least one product must be specified for estimation.');
    }
    const menuItemIds = [...new Set(items.map((item) => item.menuItemId))];
    const records = await this.offerings.findByMenuItems(locationId, menuItemIds);
    const byMenuItem = new Map(records.map((record) => [record.menuItemId, record]));

    const lines = items.map((item): OfferingLine => {
      const offering = byMenuItem.get(item.menuItemId);
      if (!offering) {
        throw new UnprocessableEntityException(OFFERINGS_UNAVAILABLE_MESSAGE);
      }
      return { offeringId: offering.id, quantity: item.quantity };
    });
    return this.estimate(locationId, lines);
  }

  async loadInfo(locationId: number): Promise<LoadInfo> {
    const activeCount = await this.loadCounter.getActiveCount(locationId);
    return this.toLoadInfo(activeCount);
  }

  /**
   * True only when the list is non-empty and every offering exists, belongs
   * to the location and is available.
   */
  async validateOfferings(
    lines: OfferingLine[],
    locationId: number,
  ): Promise<boolean> {
    if (!lines.length || lines.some((line) => !isPositiveInteger(line.quantity))) {
      return false;
    }
    const ids = [...new Set(lines.map((line) => line.offeringId))];
    const records = await this.offerings.findByIds(ids);
    const valid = records.filter((record) => isOrderable(record, locationId));
    return valid.length === ids.length;
  }

  private async resolveOfferings(
    locationId: number,
    lines: OfferingLine[],
  ): Promise<Map<number, OfferingRecord>> {
    const ids = [...new Set(lines.map((line) => line.offeringId))];
    const records = await this.offerings.findByIds(ids);
    const orderable = new Map(
      records
        .filter((record) => isOrderable(record, locationId))
        .map((record) => [record.id, record]),
    );
    if (orderable.size !== ids.length) {
      throw new UnprocessableEntityException(OFFERINGS_UNAVAILABLE_MESSAGE);
    }
    return orderable;
  }

  private assertLines(lines: OfferingLine[]): void {
    if (!lines.length) {
      throw new BadRequestException('At least one product must be ordered.');
    }
    if (lines.some((line) => !isPositiveInteger(line.quantity))) {
      throw new BadRequestException('Quantity must be at least 1.');
    }
  }

  private toLoadInfo(activeCount: number): LoadInfo {
    const multiplier = loadMultiplier(activeCount);
    return {
      activeCount,
      multiplier: roundMultiplier(multiplier),
      isHighLoad: isHighLoad(multiplier),
    };
  }
}

function isOrderable(record: OfferingRecord, locationId: number): boolean {
  return record.locationId === locationId && record.available;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}
