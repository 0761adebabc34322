import type { EngineConfig } from "../types/config.js";
import type { EquitySample, Trade } from "../types/trading.js";
import { Ledger } from "../domain/ledger.js";
import { RollingHistory } from "../domain/rolling-history.js";
import { RingBuffer } from "../lib/ring-buffer.js";

export interface InstrumentState {
  readonly symbol: string;
  readonly anchorPrice: number;
  price: number;
  readonly history: RollingHistory;
}

/** Everything the tick loop mutates. Guarded by PaperEngine's mutex. */
export interface EngineState {
  readonly ledger: Ledger;
  readonly instruments: InstrumentState[];
  readonly trades: RingBuffer<Trade>;
  readonly logs: RingBuffer<string>;
  readonly equityCurve: RingBuffer<EquitySample>;
  lastTickTs: string | null;
}

export function createEngineState(config: EngineConfig): EngineState {
  const instruments = config.instruments.map((inst) => {
    const history = new RollingHistory(config.history.capacity);
    history.seed(inst.anchorPrice, config.history.warmup);
    return { symbol: inst.symbol, anchorPrice: inst.anchorPrice, price: inst.anchorPrice, history };
  });

  return {
    ledger: new Ledger(instruments.map((i) => i.symbol), config.startingCash),
    instruments,
    trades: new RingBuffer<Trade>(config.limits.trades),
    logs: new RingBuffer<string>(config.limits.logs),
    equityCurve: new RingBuffer<EquitySample>(config.limits.equitySamples),
    lastTickTs: null,
  };
}

/** Back to the starting book in place: cash, flat positions, anchor prices, reseeded history. */
export function resetEngineState(state: EngineState, config: EngineConfig): void {
  state.ledger.reset(config.startingCash);
  for (const inst of state.instruments) {
    inst.price = inst.anchorPrice;
    inst.history.seed(inst.anchorPrice, config.history.warmup);
  }
  state.trades.clear();
  state.logs.clear();
  state.equityCurve.clear();
  state.lastTickTs = null;
}

export function priceMap(state: EngineState): Map<string, number> {
  return new Map(state.instruments.map((i) => [i.symbol, i.price]));
}

export function computeEquity(state: EngineState): number {
  return state.ledger.equity(priceMap(state));
}
