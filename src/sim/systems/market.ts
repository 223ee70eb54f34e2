import type { DayWorksheet } from "./worksheet";

export type SalesResult = {
  unitsSold: number;
  unmetDemand: number;
};

export function systemSales(sheet: DayWorksheet, demand: number): SalesResult {
  const unitsSold = Math.max(0, Math.min(sheet.marketInventory, demand));
  sheet.marketInventory -= unitsSold;
  return { unitsSold, unmetDemand: Math.max(0, demand - unitsSold) };
}
