import type { Decision, SimConfig } from "./types";

export const STARTING_CASH = 100;

// Two trucks of 100 units each.
export const TRUCK_CAPACITY = 100;
export const TRUCK_COUNT = 2;

export const DEFAULT_SIM_CONFIG: SimConfig = {
  farmSpoilRate: 0.1,
  marketSpoilRate: 0.05,
  shippingCapacity: TRUCK_CAPACITY * TRUCK_COUNT,
  plantingCostPerUnit: 1.0,
  shippingCostPerUnit: 0.2,
  harvestDelayDays: 1,
};

export const MAX_HARVEST_DELAY_DAYS = 30;

export const DEFAULT_DECISION: Decision = {
  plantAmount: 50,
  shipAmount: 80,
  pricePerUnit: 3,
  marketDemand: 100,
};

// ============================================================================
// Generated demand (scripted runs without a player-supplied demand)
// ============================================================================

export const DEMAND_TUNING = {
  meanDemand: 100,
  // Salt mixed into every per-day seed so demand streams differ from other seeded draws.
  salt: 0x5eed,
};

// Demand seeds are unsigned 32-bit; larger values would alias.
export const MAX_DEMAND_SEED = 0xffffffff;
