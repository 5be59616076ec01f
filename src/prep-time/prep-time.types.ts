import type { LoadInfo } from '../kitchen-load/kitchen-load.types';

export interface OfferingLine {
  offeringId: number;
  quantity: number;
}

export interface MenuItemLine {
  menuItemId: number;
  quantity: number;
}

export interface OfferingRecord {
  id: number;
  locationId: number;
  menuItemId: number;
  menuItemName: string;
  available: boolean;
  basePrepTimeSeconds: number;
}

export interface ReadyTimeEstimate {
  readyAt: Date;
  /** Sum of base prep time times quantity, before load scaling. */
  basePrepSeconds: number;
  /** Scaled prep time after the minimum has been applied. */
  prepSeconds: number;
  loadInfo: LoadInfo;
}
