import { roundTo } from "@paper-desk/kit";
import type { WalkParams } from "../types/config.js";
import type { RandomSource } from "../lib/random.js";

export interface WalkInput {
  last: number;
  anchor: number;
  nowMs: number;
}

/** Volatility breathes slowly with wall-clock time; the same for every instrument. */
export function walkVolatility(nowMs: number, params: WalkParams): number {
  return params.volatilityBase
    + params.volatilitySwing * Math.sin(nowMs / 1000 / params.volatilityPeriodSec);
}

/**
 * Next simulated price: mild pull toward the anchor plus a gaussian shock,
 * floored and rounded to `params.decimals`. Consumes one draw from `random`.
 */
export function nextPrice(input: WalkInput, params: WalkParams, random: RandomSource): number {
  const drift = (input.anchor - input.last) * params.reversion;
  const shock = random.gaussian(0, walkVolatility(input.nowMs, params));
  const next = Math.max(params.priceFloor, input.last + drift + shock);
  return roundTo(next, params.decimals);
}
