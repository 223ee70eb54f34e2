import type { DayWorksheet } from "./worksheet";

export function systemShipping(sheet: DayWorksheet, requested: number, capacity: number): number {
  const shipped = Math.max(0, Math.min(requested, sheet.farmInventory, capacity));
  sheet.farmInventory -= shipped;
  sheet.marketInventory += shipped;
  return shipped;
}
