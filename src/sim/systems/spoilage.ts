import type { DayWorksheet } from "./worksheet";

function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

function spoil(stock: number, rate: number): number {
  if (stock <= 0) return 0;
  return clamp(stock * rate, 0, stock);
}

// Charged on the full pre-shipment stock.
export function systemFarmSpoilage(sheet: DayWorksheet, rate: number): number {
  const spoiled = spoil(sheet.farmInventory, rate);
  sheet.farmInventory = Math.max(0, sheet.farmInventory - spoiled);
  return spoiled;
}

// Charged after today's shipment has arrived, before sales.
export function systemMarketSpoilage(sheet: DayWorksheet, rate: number): number {
  const spoiled = spoil(sheet.marketInventory, rate);
  sheet.marketInventory = Math.max(0, sheet.marketInventory - spoiled);
  return spoiled;
}
