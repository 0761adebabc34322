/**
 * Shared test helpers: fixed clock, scripted shocks and small configs.
 */
import { EngineConfigSchema, type EngineConfig, type EngineConfigInput } from "./types/config.js";
import type { Clock } from "./lib/clock.js";
import type { RandomSource } from "./lib/random.js";

/** 2024-01-01T00:00:00Z */
export const T0 = Date.UTC(2024, 0, 1);

export function makeConfig(overrides: Partial<EngineConfigInput> = {}): EngineConfig {
  return EngineConfigSchema.parse({
    instruments: [{ symbol: "ALPHA", anchorPrice: 100 }],
    ...overrides,
  });
}

export function fixedClock(ms: number = T0): Clock & { set(ms: number): void } {
  let current = ms;
  return {
    now: () => current,
    set(next: number) {
      current = next;
    },
  };
}

/**
 * Returns the scripted shocks in order (ignoring the requested stddev), then 0.
 * An Error in the script is thrown instead of returned.
 */
export function scriptedRandom(script: (number | Error)[] = []): RandomSource & { stddevs: number[] } {
  const queue = [...script];
  const stddevs: number[] = [];
  return {
    stddevs,
    gaussian(_mean: number, stddev: number) {
      stddevs.push(stddev);
      const next = queue.shift();
      if (next instanceof Error) throw next;
      return next ?? 0;
    },
  };
}
