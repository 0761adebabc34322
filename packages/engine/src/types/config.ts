import { z } from "zod";

export const InstrumentSchema = z.object({
  symbol: z.string().min(1),
  anchorPrice: z.number().positive(),
});

export const StrategySchema = z
  .object({
    fastWindow: z.number().int().positive().default(7),
    slowWindow: z.number().int().positive().default(21),
    // fraction of cash deployed per entry
    riskPerTrade: z.number().positive().max(1).default(0.12),
  })
  .refine((s) => s.fastWindow < s.slowWindow, {
    message: "fastWindow must be smaller than slowWindow",
  });

export const WalkSchema = z.object({
  reversion: z.number().nonnegative().default(0.003),
  volatilityBase: z.number().nonnegative().default(0.8),
  volatilitySwing: z.number().nonnegative().default(0.2),
  volatilityPeriodSec: z.number().positive().default(4),
  priceFloor: z.number().positive().default(1),
  decimals: z.number().int().nonnegative().default(2),
});

export const HistorySchema = z
  .object({
    capacity: z.number().int().positive().default(200),
    warmup: z.number().int().nonnegative().default(80),
  })
  .refine((h) => h.warmup <= h.capacity, {
    message: "warmup cannot exceed capacity",
  });

export const LimitsSchema = z.object({
  trades: z.number().int().positive().default(250),
  logs: z.number().int().positive().default(200),
  equitySamples: z.number().int().positive().default(600),
});

export const SnapshotLimitsSchema = z.object({
  trades: z.number().int().positive().default(30),
  logs: z.number().int().positive().default(30),
  equityPoints: z.number().int().positive().default(240),
});

export const EngineConfigSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().positive().optional(),
  startingCash: z.number().positive().default(10_000),
  instruments: z
    .array(InstrumentSchema)
    .min(1)
    .refine((list) => new Set(list.map((i) => i.symbol)).size === list.length, {
      message: "instrument symbols must be unique",
    }),
  strategy: StrategySchema.default({}),
  walk: WalkSchema.default({}),
  history: HistorySchema.default({}),
  tickMs: z.number().int().positive().default(1000),
  resetTimeoutMs: z.number().int().positive().default(2500),
  limits: LimitsSchema.default({}),
  snapshot: SnapshotLimitsSchema.default({}),
  logLevels: z.record(z.string()).default({}),
});

export type Instrument = z.infer<typeof InstrumentSchema>;
export type StrategyParams = z.infer<typeof StrategySchema>;
export type WalkParams = z.infer<typeof WalkSchema>;
export type HistoryParams = z.infer<typeof HistorySchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
