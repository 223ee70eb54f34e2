import { describe, expect, it } from "vitest";

import { parseSimConfig, resolveShippingCapacity } from "../config";
import { DEFAULT_SIM_CONFIG } from "../constants";

describe("parseSimConfig", () => {
  it("returns the defaults when nothing is overridden", () => {
    expect(parseSimConfig(undefined)).toEqual(DEFAULT_SIM_CONFIG);
    expect(parseSimConfig({})).toEqual(DEFAULT_SIM_CONFIG);
    expect(DEFAULT_SIM_CONFIG.shippingCapacity).toBe(200);
  });

  it("merges overrides over the defaults", () => {
    const config = parseSimConfig({ farmSpoilRate: 0.2, plantingCostPerUnit: 1.5 });
    expect(config).toEqual({ ...DEFAULT_SIM_CONFIG, farmSpoilRate: 0.2, plantingCostPerUnit: 1.5 });
  });

  it("derives capacity from a truck fleet", () => {
    expect(parseSimConfig({ truckCount: 3 }).shippingCapacity).toBe(300);
    expect(parseSimConfig({ truckCapacity: 50, truckCount: 4 }).shippingCapacity).toBe(200);
    expect(parseSimConfig({ shippingCapacity: 75, truckCount: 4 }).shippingCapacity).toBe(75);
  });

  it("rejects spoilage rates outside [0, 1)", () => {
    expect(() => parseSimConfig({ farmSpoilRate: 1 })).toThrow("Sim config validation failed: farmSpoilRate: must be below 1");
    expect(() => parseSimConfig({ marketSpoilRate: -0.1 })).toThrow(/^Sim config validation failed: marketSpoilRate: /);
  });

  it("rejects a harvest delay below one day", () => {
    expect(() => parseSimConfig({ harvestDelayDays: 0 })).toThrow(/harvestDelayDays/);
    expect(() => parseSimConfig({ harvestDelayDays: 1.5 })).toThrow(/harvestDelayDays/);
  });

  it("rejects non-object input", () => {
    expect(() => parseSimConfig("fast")).toThrow(/^Sim config validation failed: \(root\): /);
  });
});

describe("resolveShippingCapacity", () => {
  it("falls back when no capacity field is given", () => {
    expect(resolveShippingCapacity({}, 123)).toBe(123);
  });
});
