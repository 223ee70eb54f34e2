import { DEFAULT_SIM_CONFIG } from "./constants";
import { sanitizeDecision } from "./decision";
import type { DayReport, DayResult, Decision, InitialStateOptions, SimConfig, SimulationState } from "./types";
import { pipelineSlots, systemHarvest, systemPlanting } from "./systems/growth";
import { systemLedger } from "./systems/ledger";
import { systemSales } from "./systems/market";
import { systemShipping } from "./systems/shipping";
import { systemFarmSpoilage, systemMarketSpoilage } from "./systems/spoilage";
import { openWorksheet } from "./systems/worksheet";

function startingStock(v: number | undefined): number {
  if (v === undefined || !Number.isFinite(v)) return 0;
  return Math.max(0, v);
}

export function createInitialState(startingCash: number, opts?: InitialStateOptions): SimulationState {
  const config = opts?.config ?? DEFAULT_SIM_CONFIG;
  return {
    day: 0,
    cash: startingCash,
    cumulativeProfit: 0,
    farmInventory: startingStock(opts?.farmInventory),
    marketInventory: startingStock(opts?.marketInventory),
    pendingHarvest: Array.from({ length: pipelineSlots(config.harvestDelayDays) }, () => 0),
    history: [],
  };
}

// In-place re-init so holders of the state object keep their reference.
export function resetState(state: SimulationState, startingCash: number, opts?: InitialStateOptions): void {
  Object.assign(state, createInitialState(startingCash, opts));
}

export function cloneState(state: SimulationState): SimulationState {
  return {
    ...state,
    pendingHarvest: [...state.pendingHarvest],
    history: [...state.history],
  };
}

export function getPendingHarvest(state: SimulationState): number {
  return state.pendingHarvest.reduce((sum, v) => sum + v, 0);
}

export function advanceDay(state: SimulationState, rawDecision: Decision, config: SimConfig = DEFAULT_SIM_CONFIG): DayResult {
  const decision = sanitizeDecision(rawDecision);
  const sheet = openWorksheet(state);

  // --------------------------------------------------------------------------
  // Order matters: every step reads stock left behind by the one before it.
  // --------------------------------------------------------------------------
  const harvested = systemHarvest(sheet);
  systemPlanting(sheet, decision.plantAmount, config.harvestDelayDays);
  const spoiledAtFarm = systemFarmSpoilage(sheet, config.farmSpoilRate);
  const shipped = systemShipping(sheet, decision.shipAmount, config.shippingCapacity);
  const spoiledAtMarket = systemMarketSpoilage(sheet, config.marketSpoilRate);
  const { unitsSold, unmetDemand } = systemSales(sheet, decision.marketDemand);
  const ledger = systemLedger(config, {
    unitsSold,
    pricePerUnit: decision.pricePerUnit,
    planted: decision.plantAmount,
    shipped,
  });

  const day = state.day + 1;
  const cash = state.cash + ledger.dailyProfit;
  const cumulativeProfit = state.cumulativeProfit + ledger.dailyProfit;

  const report: DayReport = Object.freeze({
    day,
    decision: Object.freeze(decision),
    harvested,
    planted: decision.plantAmount,
    shipped,
    spoiledAtFarm,
    spoiledAtMarket,
    unitsSold,
    unmetDemand,
    ...ledger,
    cumulativeProfit,
    cashAfter: cash,
    farmInventoryAfter: sheet.farmInventory,
    marketInventoryAfter: sheet.marketInventory,
    pendingHarvestAfter: sheet.pendingHarvest.reduce((sum, v) => sum + v, 0),
  });

  // Commit.
  state.day = day;
  state.cash = cash;
  state.cumulativeProfit = cumulativeProfit;
  state.farmInventory = sheet.farmInventory;
  state.marketInventory = sheet.marketInventory;
  state.pendingHarvest = sheet.pendingHarvest;
  state.history.push(report);

  return { state, report };
}
