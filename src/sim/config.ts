// Runtime validation for caller-supplied simulation config.
// The engine trusts its config; everything from outside goes through here first.

import { z } from "zod";

import { DEFAULT_SIM_CONFIG, MAX_HARVEST_DELAY_DAYS, TRUCK_CAPACITY, TRUCK_COUNT } from "./constants";
import type { SimConfig } from "./types";

const rateSchema = z.number().finite().min(0).lt(1, "must be below 1");
const amountSchema = z.number().finite().min(0);

export const simConfigSchema = z.object({
  farmSpoilRate: rateSchema,
  marketSpoilRate: rateSchema,
  shippingCapacity: amountSchema,
  plantingCostPerUnit: amountSchema,
  shippingCostPerUnit: amountSchema,
  harvestDelayDays: z.number().int().min(1).max(MAX_HARVEST_DELAY_DAYS),
});

// Overrides may also give capacity as a truck fleet instead of a flat number.
export const simConfigOverridesSchema = simConfigSchema.partial().extend({
  truckCapacity: amountSchema.optional(),
  truckCount: z.number().int().min(0).optional(),
});

export type SimConfigOverrides = z.infer<typeof simConfigOverridesSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}

export function resolveShippingCapacity(overrides: SimConfigOverrides, fallback: number): number {
  if (overrides.shippingCapacity !== undefined) return overrides.shippingCapacity;
  if (overrides.truckCapacity !== undefined || overrides.truckCount !== undefined) {
    const perTruck = overrides.truckCapacity ?? TRUCK_CAPACITY;
    const trucks = overrides.truckCount ?? TRUCK_COUNT;
    return perTruck * trucks;
  }
  return fallback;
}

export function parseSimConfig(raw: unknown, base: SimConfig = DEFAULT_SIM_CONFIG): SimConfig {
  const overrides = simConfigOverridesSchema.safeParse(raw ?? {});
  if (!overrides.success) {
    throw new Error(`Sim config validation failed: ${formatIssues(overrides.error)}`);
  }

  const { truckCapacity: _truckCapacity, truckCount: _truckCount, ...fields } = overrides.data;
  const merged = {
    ...base,
    ...fields,
    shippingCapacity: resolveShippingCapacity(overrides.data, base.shippingCapacity),
  };

  const result = simConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new Error(`Sim config validation failed: ${formatIssues(result.error)}`);
  }
  return result.data;
}
