import type { SimConfig } from "../types";

export type DailyLedger = {
  revenue: number;
  plantingCost: number;
  shippingCost: number;
  costs: number;
  dailyProfit: number;
};

export function systemLedger(
  config: SimConfig,
  opts: { unitsSold: number; pricePerUnit: number; planted: number; shipped: number },
): DailyLedger {
  const revenue = opts.unitsSold * opts.pricePerUnit;
  // Planting is paid on what was requested today, shipping only on what actually moved.
  const plantingCost = config.plantingCostPerUnit * opts.planted;
  const shippingCost = config.shippingCostPerUnit * opts.shipped;
  const costs = plantingCost + shippingCost;
  return { revenue, plantingCost, shippingCost, costs, dailyProfit: revenue - costs };
}
