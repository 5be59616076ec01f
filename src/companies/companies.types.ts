export interface CompanyDto {
  id: number;
  name: string;
}

export interface MenuItemDto {
  id: number;
  companyId: number;
  name: string;
  basePrepTimeSeconds: number;
}
