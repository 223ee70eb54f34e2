import type { SimulationState } from "../types";

// Scratch copy of the quantities a day touches. Systems mutate this, never the state itself,
// so a day is committed all at once.
export type DayWorksheet = {
  farmInventory: number;
  marketInventory: number;
  pendingHarvest: number[];
};

export function openWorksheet(state: SimulationState): DayWorksheet {
  return {
    farmInventory: state.farmInventory,
    marketInventory: state.marketInventory,
    pendingHarvest: [...state.pendingHarvest],
  };
}
