// Types
export type {
  EngineConfig,
  EngineConfigInput,
  Instrument,
  StrategyParams,
  WalkParams,
  HistoryParams,
} from "./types/config.js";
export { EngineConfigSchema, InstrumentSchema, StrategySchema, WalkSchema, HistorySchema } from "./types/config.js";
export type { Trade, Position, EquitySample, Side, Signal, OrderRequest } from "./types/trading.js";
export type { EngineSnapshot, PositionView, TradeView, EquityPointView, StrategyParamsView } from "./types/snapshot.js";

// Domain
export { nextPrice, walkVolatility } from "./domain/price-walk.js";
export type { WalkInput } from "./domain/price-walk.js";
export { RollingHistory, movingAverage } from "./domain/rolling-history.js";
export { detectCrossover } from "./domain/crossover.js";
export { Ledger } from "./domain/ledger.js";

// Application
export { PaperEngine } from "./application/paper-engine.js";
export type { PaperEngineDeps } from "./application/paper-engine.js";
export { engineMachine } from "./application/engine-machine.js";
export type { EngineStatus, EngineEvent } from "./application/engine-machine.js";
export { buildSnapshot } from "./application/build-snapshot.js";

// Lib
export { systemClock, isoSeconds } from "./lib/clock.js";
export type { Clock } from "./lib/clock.js";
export { createRandomSource } from "./lib/random.js";
export type { RandomSource } from "./lib/random.js";
export { FatalEngineError } from "./lib/errors.js";
export { loadConfig } from "./lib/load-config.js";

// Server
export { createApp } from "./create-app.js";
export type { AppDeps, EngineControl } from "./create-app.js";
