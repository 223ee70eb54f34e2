import type { DayReport } from "./types";

// Read-only projections of a run's history for charts and tables.

export type ProfitPoint = { day: number; dailyProfit: number; cumulativeProfit: number };
export type InventoryPoint = { day: number; farmInventory: number; marketInventory: number };

export type HistorySummary = {
  days: number;
  harvested: number;
  shipped: number;
  spoiledAtFarm: number;
  spoiledAtMarket: number;
  unitsSold: number;
  unmetDemand: number;
  revenue: number;
  costs: number;
  totalProfit: number;
  // Share of requested demand that was served (1 when there was no demand at all).
  fillRate: number;
  finalCash: number | null;
  bankrupt: boolean;
};

export type TableRow = Record<string, number>;

function lastN<T>(items: readonly T[], window?: number): readonly T[] {
  if (window === undefined || window >= items.length) return items;
  return items.slice(Math.max(0, items.length - Math.max(0, window)));
}

export function profitSeries(history: readonly DayReport[], opts?: { window?: number }): ProfitPoint[] {
  return lastN(history, opts?.window).map((r) => ({
    day: r.day,
    dailyProfit: r.dailyProfit,
    cumulativeProfit: r.cumulativeProfit,
  }));
}

export function inventorySeries(history: readonly DayReport[], opts?: { window?: number }): InventoryPoint[] {
  return lastN(history, opts?.window).map((r) => ({
    day: r.day,
    farmInventory: r.farmInventoryAfter,
    marketInventory: r.marketInventoryAfter,
  }));
}

export function summarizeHistory(history: readonly DayReport[]): HistorySummary {
  const sum = (pick: (r: DayReport) => number): number => history.reduce((s, r) => s + pick(r), 0);

  const unitsSold = sum((r) => r.unitsSold);
  const demanded = sum((r) => r.decision.marketDemand);
  const last = history.length > 0 ? history[history.length - 1] : null;
  const finalCash = last ? last.cashAfter : null;

  return {
    days: history.length,
    harvested: sum((r) => r.harvested),
    shipped: sum((r) => r.shipped),
    spoiledAtFarm: sum((r) => r.spoiledAtFarm),
    spoiledAtMarket: sum((r) => r.spoiledAtMarket),
    unitsSold,
    unmetDemand: sum((r) => r.unmetDemand),
    revenue: sum((r) => r.revenue),
    costs: sum((r) => r.costs),
    totalProfit: last ? last.cumulativeProfit : 0,
    fillRate: demanded > 0 ? unitsSold / demanded : 1,
    finalCash,
    bankrupt: finalCash !== null && finalCash < 0,
  };
}

// One flat row per day: decision fields prefixed `dec_`, everything else as reported.
export function toTableRows(history: readonly DayReport[], opts?: { digits?: number }): TableRow[] {
  const round = (v: number): number => {
    if (opts?.digits === undefined) return v;
    const f = Math.pow(10, opts.digits);
    return Math.round(v * f) / f;
  };

  return history.map((r) => {
    const { decision, ...rest } = r;
    const row: TableRow = {};
    for (const [k, v] of Object.entries(rest)) row[k] = round(v);
    for (const [k, v] of Object.entries(decision)) row[`dec_${k}`] = round(v);
    return row;
  });
}
