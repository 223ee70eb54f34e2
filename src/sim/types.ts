export type SimConfig = {
  // Fraction of farm stock lost each day (0..1, exclusive of 1).
  farmSpoilRate: number;
  // Fraction of market stock lost each day, applied after the day's shipment arrives.
  marketSpoilRate: number;
  // Max units moved farm -> market per day.
  shippingCapacity: number;
  plantingCostPerUnit: number;
  shippingCostPerUnit: number;
  // Days between planting and the crop landing in farm inventory.
  harvestDelayDays: number;
};

export type Decision = {
  plantAmount: number;
  shipAmount: number;
  pricePerUnit: number;
  marketDemand: number;
};

export type DayReport = {
  day: number;
  decision: Decision; // sanitized inputs actually applied
  harvested: number;
  planted: number;
  shipped: number;
  spoiledAtFarm: number;
  spoiledAtMarket: number;
  unitsSold: number;
  unmetDemand: number;
  revenue: number;
  plantingCost: number;
  shippingCost: number;
  costs: number;
  dailyProfit: number;
  cumulativeProfit: number;
  cashAfter: number;
  farmInventoryAfter: number;
  marketInventoryAfter: number;
  pendingHarvestAfter: number;
};

export type SimulationState = {
  day: number;
  cash: number;
  cumulativeProfit: number;
  farmInventory: number;
  marketInventory: number;
  // Planting pipeline; index 0 matures on the next advance.
  pendingHarvest: number[];
  history: DayReport[];
};

export type DayResult = {
  state: SimulationState;
  report: DayReport;
};

export type InitialStateOptions = {
  config?: SimConfig;
  farmInventory?: number;
  marketInventory?: number;
};
