export * from "./types";
export * from "./constants";
export { parseSimConfig, resolveShippingCapacity, simConfigSchema, type SimConfigOverrides } from "./config";
export { sanitizeDecision } from "./decision";
export { advanceDay, cloneState, createInitialState, getPendingHarvest, resetState } from "./tick";
export { inventorySeries, profitSeries, summarizeHistory, toTableRows } from "./history";
export type { HistorySummary, InventoryPoint, ProfitPoint, TableRow } from "./history";
export { demandForDay, type DemandOptions } from "./systems/demand";
export { loadScenarioFromJson, parseScenario, resolveDecision, runScenario } from "./scenario";
export type { DecisionEntry, Scenario, ScenarioResult, ScenarioRunOptions } from "./scenario";
