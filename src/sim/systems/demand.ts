import { DEMAND_TUNING } from "../constants";

export type DemandOptions = {
  // Unsigned 32-bit.
  seed: number;
  meanDemand?: number;
};

// Past this mean the Poisson CDF walk gets long and exp(-mean) heads for underflow.
const INVERSION_MAX_MEAN = 500;

function mix32(x: number): number {
  let h = x >>> 0;
  h ^= h >>> 16;
  h = Math.imul(h, 0x7feb352d);
  h ^= h >>> 15;
  h = Math.imul(h, 0x846ca68b);
  h ^= h >>> 16;
  return h >>> 0;
}

export function daySeed(seed: number, day: number): number {
  return mix32((seed >>> 0) ^ mix32((day + DEMAND_TUNING.salt) >>> 0));
}

// Counter-based uniforms in [0, 1) for one day; no state carries over between days.
function dayUniforms(seed: number, day: number): () => number {
  const key = daySeed(seed, day);
  let counter = 0;
  return () => {
    counter = (counter + 0x9e3779b9) >>> 0;
    return mix32(key ^ counter) / 4294967296;
  };
}

function poissonByInversion(u: number, mean: number): number {
  const maxK = Math.ceil(mean + 20 * Math.sqrt(mean) + 20);
  let k = 0;
  let p = Math.exp(-mean);
  let cdf = p;
  while (u > cdf && k < maxK) {
    k += 1;
    p *= mean / k;
    cdf += p;
  }
  return k;
}

function poissonByNormal(next: () => number, mean: number): number {
  const u1 = 1 - next(); // (0, 1], keeps log finite
  const u2 = next();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return Math.max(0, Math.round(mean + z * Math.sqrt(mean)));
}

// Exogenous demand for scripted runs. A day's draw depends only on (seed, day),
// so replaying a seed replays the market regardless of what the player did.
export function demandForDay(day: number, opts: DemandOptions): number {
  const mean = opts.meanDemand ?? DEMAND_TUNING.meanDemand;
  if (!(mean > 0)) return 0;
  const next = dayUniforms(opts.seed, day);
  if (mean <= INVERSION_MAX_MEAN) return poissonByInversion(next(), mean);
  return poissonByNormal(next, mean);
}
