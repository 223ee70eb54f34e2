import type { DayWorksheet } from "./worksheet";

// Oldest planting matures into farm stock. Returns the harvested amount.
export function systemHarvest(sheet: DayWorksheet): number {
  const harvested = sheet.pendingHarvest.shift() ?? 0;
  sheet.farmInventory += harvested;
  return harvested;
}

export function pipelineSlots(delayDays: number): number {
  return Number.isFinite(delayDays) ? Math.max(1, Math.floor(delayDays)) : 1;
}

// Today's planting joins the back of the pipeline; it never touches today's farm stock.
export function systemPlanting(sheet: DayWorksheet, plantAmount: number, delayDays: number): void {
  const slots = pipelineSlots(delayDays);
  sheet.pendingHarvest.push(plantAmount);
  // Pipeline length tracks the delay even if the config changed mid-run.
  while (sheet.pendingHarvest.length < slots) sheet.pendingHarvest.unshift(0);
  while (sheet.pendingHarvest.length > slots) {
    const early = sheet.pendingHarvest.shift() ?? 0;
    sheet.pendingHarvest[0] += early;
  }
}
