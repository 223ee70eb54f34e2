import type { Decision } from "./types";

// Amounts that feed costs or revenue must end up finite.
function finiteNonNegative(v: number): number {
  if (!Number.isFinite(v)) return 0;
  return Math.max(0, v);
}

// Requests capped later by stock and capacity may stay unbounded; `min()` truncates them.
function requestAmount(v: number): number {
  if (Number.isNaN(v)) return 0;
  return Math.max(0, v);
}

// Out-of-range inputs are clamped, never rejected: you cannot plant or ship a negative amount.
// Over-large shipments and demand are left as-is here and truncated when shipping and selling.
export function sanitizeDecision(decision: Decision): Decision {
  return {
    plantAmount: finiteNonNegative(decision.plantAmount),
    shipAmount: requestAmount(decision.shipAmount),
    pricePerUnit: finiteNonNegative(decision.pricePerUnit),
    marketDemand: requestAmount(decision.marketDemand),
  };
}
