import fs from "node:fs";

import { MAX_DEMAND_SEED } from "./sim/constants";
import { toTableRows } from "./sim/history";
import { loadScenarioFromJson, runScenario, type ScenarioResult } from "./sim/scenario";

export type CliArgs = {
  scenarioPath: string;
  days?: number;
  seed?: number;
  json: boolean;
};

const USAGE = "Usage: farm-sim <scenario.json> [--days N] [--seed N] [--json]";

function parseIntFlag(flag: string, raw: string | undefined, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const v = Number(raw);
  if (raw === undefined || !Number.isInteger(v) || v < min || v > max) {
    throw new Error(`Invalid ${flag} value: ${raw ?? "(missing)"}. Expected an integer from ${min} to ${max}. ${USAGE}`);
  }
  return v;
}

export function parseCliArgs(argv: string[]): CliArgs {
  let scenarioPath: string | null = null;
  let days: number | undefined;
  let seed: number | undefined;
  let json = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--days") {
      days = parseIntFlag(arg, argv[++i], 0);
    } else if (arg === "--seed") {
      seed = parseIntFlag(arg, argv[++i], 0, MAX_DEMAND_SEED);
    } else if (arg === "--json") {
      json = true;
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown flag: ${arg}. ${USAGE}`);
    } else if (scenarioPath === null) {
      scenarioPath = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}. ${USAGE}`);
    }
  }

  if (scenarioPath === null) throw new Error(`Missing scenario path. ${USAGE}`);
  return { scenarioPath, days, seed, json };
}

function fmtMoney(v: number): string {
  const sign = v < 0 ? "-" : "";
  return `${sign}$${Math.abs(v).toFixed(2)}`;
}

export function formatSummary(result: ScenarioResult): string[] {
  const { summary, state } = result;
  const lines = [
    `Scenario: ${result.name ?? "(unnamed)"}`,
    `Days played: ${summary.days}`,
    `Cash: ${fmtMoney(state.cash)}`,
    `Profit (total): ${fmtMoney(summary.totalProfit)}`,
    `Sold: ${summary.unitsSold.toFixed(1)} units (fill rate ${(summary.fillRate * 100).toFixed(1)}%)`,
    `Spoiled: farm ${summary.spoiledAtFarm.toFixed(1)}, market ${summary.spoiledAtMarket.toFixed(1)}`,
    `Inventory: farm ${state.farmInventory.toFixed(1)}, market ${state.marketInventory.toFixed(1)}`,
  ];
  if (summary.bankrupt) lines.push("Cash is negative: the farm is bankrupt.");
  return lines;
}

export function runCli(argv: string[]): ScenarioResult {
  const args = parseCliArgs(argv);
  const scenario = loadScenarioFromJson(fs.readFileSync(args.scenarioPath, "utf8"));
  const result = runScenario(scenario, { days: args.days, seed: args.seed });

  if (args.json) {
    console.log(JSON.stringify({ name: result.name, config: result.config, summary: result.summary, history: result.state.history }, null, 2));
    return result;
  }

  if (result.state.history.length > 0) {
    console.table(toTableRows(result.state.history, { digits: 2 }));
  } else {
    console.log("No days played.");
  }
  for (const line of formatSummary(result)) console.log(line);
  return result;
}

export function main(argv: string[] = process.argv.slice(2)): void {
  try {
    runCli(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
