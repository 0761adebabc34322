import type { EngineConfig } from "../types/config.js";
import type { EngineSnapshot, PositionView } from "../types/snapshot.js";
import type { EngineStatus } from "./engine-machine.js";
import { computeEquity, type EngineState } from "./engine-state.js";

export interface SnapshotInput {
  state: EngineState;
  status: EngineStatus;
  running: boolean;
  config: EngineConfig;
  ts: string;
}

/** Read-only projection of engine state. Copies everything; mutates nothing. */
export function buildSnapshot({ state, status, running, config, ts }: SnapshotInput): EngineSnapshot {
  const equity = computeEquity(state);
  const prices: Record<string, number> = {};
  const positions: Record<string, PositionView> = {};

  for (const inst of state.instruments) {
    const pos = state.ledger.position(inst.symbol);
    prices[inst.symbol] = inst.price;
    positions[inst.symbol] = {
      qty: pos.qty,
      avg_price: pos.avgPrice,
      last_price: inst.price,
      market_value: state.ledger.marketValue(inst.symbol, inst.price),
      unrealized_pnl: (inst.price - pos.avgPrice) * pos.qty,
    };
  }

  return {
    ts,
    status,
    running,
    last_tick_ts: state.lastTickTs,
    cash: state.ledger.cash,
    equity,
    pnl: equity - config.startingCash,
    prices,
    positions,
    trades: state.trades.newest(config.snapshot.trades).map((t) => ({ ...t })),
    logs: state.logs.newest(config.snapshot.logs),
    equity_curve: state.equityCurve.latest(config.snapshot.equityPoints).map((p) => ({ ...p })),
    params: {
      fast_window: config.strategy.fastWindow,
      slow_window: config.strategy.slowWindow,
      tick_seconds: config.tickMs / 1000,
      risk_per_trade: config.strategy.riskPerTrade,
    },
  };
}
