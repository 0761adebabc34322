import type { EngineStatus } from "../application/engine-machine.js";

// Wire shape served by GET /api/state; keys stay snake_case like the dashboard expects.

export interface PositionView {
  qty: number;
  avg_price: number;
  last_price: number;
  market_value: number;
  unrealized_pnl: number;
}

export interface TradeView {
  ts: string;
  symbol: string;
  side: "BUY" | "SELL";
  qty: number;
  price: number;
  reason: string;
}

export interface EquityPointView {
  ts: string;
  equity: number;
}

export interface StrategyParamsView {
  fast_window: number;
  slow_window: number;
  tick_seconds: number;
  risk_per_trade: number;
}

export interface EngineSnapshot {
  ts: string;
  status: EngineStatus;
  running: boolean;
  last_tick_ts: string | null;
  cash: number;
  equity: number;
  pnl: number;
  prices: Record<string, number>;
  positions: Record<string, PositionView>;
  trades: TradeView[];
  logs: string[];
  equity_curve: EquityPointView[];
  params: StrategyParamsView;
}
