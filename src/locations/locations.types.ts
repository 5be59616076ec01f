import type { LoadInfo } from '../kitchen-load/kitchen-load.types';

export interface LocationDto {
  id: number;
  companyId: number;
  name: string;
  address: string | null;
}

export interface OfferingDto {
  id: number;
  menuItemId: number;
  name: string;
  basePrepTimeSeconds: number;
}

export interface ReadyTimeEstimateResponse {
  estimatedReadyAt: string;
  readyInMinutes: number;
  basePrepSeconds: number;
  prepSeconds: number;
  loadInfo: LoadInfo;
}
