import type { Signal } from "../types/trading.js";
import { movingAverage } from "./rolling-history.js";

/**
 * Classifies the latest step of `history` as a fast/slow moving-average cross.
 *
 * The previous averages are taken over the history without its newest point.
 * Equality at the previous step counts for both directions, so a flat-then-rising
 * fast average is a CROSS_UP and flat-then-falling is a CROSS_DOWN.
 */
export function detectCrossover(
  history: readonly number[],
  fastWindow: number,
  slowWindow: number,
): Signal {
  if (history.length < slowWindow + 2) return "NONE";

  const prev = history.slice(0, -1);
  const fast = movingAverage(history, fastWindow);
  const slow = movingAverage(history, slowWindow);
  const prevFast = movingAverage(prev, fastWindow);
  const prevSlow = movingAverage(prev, slowWindow);

  if (prevFast <= prevSlow && fast > slow) return "CROSS_UP";
  if (prevFast >= prevSlow && fast < slow) return "CROSS_DOWN";
  return "NONE";
}
