// Scripted runs: a JSON scenario supplies config overrides and one decision per day.

import { z } from "zod";

import { formatIssues, parseSimConfig, simConfigOverridesSchema } from "./config";
import { DEFAULT_DECISION, DEMAND_TUNING, MAX_DEMAND_SEED, STARTING_CASH } from "./constants";
import { summarizeHistory, type HistorySummary } from "./history";
import { demandForDay, type DemandOptions } from "./systems/demand";
import { advanceDay, createInitialState } from "./tick";
import type { Decision, SimConfig, SimulationState } from "./types";

// Decision fields are plain numbers here; out-of-range values are clamped by the engine, not rejected.
const decisionEntrySchema = z
  .object({
    plantAmount: z.number(),
    shipAmount: z.number(),
    pricePerUnit: z.number(),
    marketDemand: z.number(),
  })
  .partial();

export const scenarioSchema = z.object({
  name: z.string().optional(),
  startingCash: z.number().finite().default(STARTING_CASH),
  farmInventory: z.number().finite().min(0).optional(),
  marketInventory: z.number().finite().min(0).optional(),
  config: simConfigOverridesSchema.optional(),
  demand: z
    .object({
      seed: z.number().int().min(0).max(MAX_DEMAND_SEED),
      meanDemand: z.number().finite().min(0).optional(),
    })
    .optional(),
  defaultDecision: decisionEntrySchema.optional(),
  days: z.array(decisionEntrySchema).default([]),
});

export type Scenario = z.infer<typeof scenarioSchema>;
export type DecisionEntry = z.infer<typeof decisionEntrySchema>;

export type ScenarioRunOptions = {
  // Days to play; defaults to the number of listed days. Extra days reuse the default decision.
  days?: number;
  // Replaces the scenario's demand seed (and turns generated demand on if it was off).
  seed?: number;
};

export type ScenarioResult = {
  name: string | null;
  config: SimConfig;
  state: SimulationState;
  summary: HistorySummary;
};

export function parseScenario(raw: unknown): Scenario {
  if (raw === null || typeof raw !== "object") {
    throw new Error("Scenario data must be a non-null object");
  }
  const result = scenarioSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Scenario validation failed: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function loadScenarioFromJson(json: string): Scenario {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new Error(`Failed to parse scenario JSON: ${String(err)}`);
  }
  return parseScenario(parsed);
}

function mergeDecision(base: Decision, entry: DecisionEntry | undefined): Decision {
  return {
    plantAmount: entry?.plantAmount ?? base.plantAmount,
    shipAmount: entry?.shipAmount ?? base.shipAmount,
    pricePerUnit: entry?.pricePerUnit ?? base.pricePerUnit,
    marketDemand: entry?.marketDemand ?? base.marketDemand,
  };
}

// A day's own marketDemand always wins; otherwise generated demand (if any) beats the default.
export function resolveDecision(scenario: Scenario, day: number, demand: DemandOptions | null): Decision {
  const base = mergeDecision(DEFAULT_DECISION, scenario.defaultDecision);
  const entry = scenario.days[day - 1];
  const decision = mergeDecision(base, entry);
  if (entry?.marketDemand === undefined && demand) {
    decision.marketDemand = demandForDay(day, demand);
  }
  return decision;
}

export function runScenario(scenario: Scenario, opts?: ScenarioRunOptions): ScenarioResult {
  const config = parseSimConfig(scenario.config ?? {});
  const state = createInitialState(scenario.startingCash, {
    config,
    farmInventory: scenario.farmInventory,
    marketInventory: scenario.marketInventory,
  });

  const seed = opts?.seed ?? scenario.demand?.seed;
  const demand: DemandOptions | null =
    seed === undefined ? null : { seed, meanDemand: scenario.demand?.meanDemand ?? DEMAND_TUNING.meanDemand };

  const days = Math.max(0, Math.floor(opts?.days ?? scenario.days.length));
  for (let day = 1; day <= days; day++) {
    advanceDay(state, resolveDecision(scenario, day, demand), config);
  }

  return {
    name: scenario.name ?? null,
    config,
    state,
    summary: summarizeHistory(state.history),
  };
}
