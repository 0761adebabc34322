export type Side = "BUY" | "SELL";

export type Signal = "NONE" | "CROSS_UP" | "CROSS_DOWN";

export interface Trade {
  readonly ts: string;
  readonly symbol: string;
  readonly side: Side;
  readonly qty: number;
  readonly price: number;
  readonly reason: string;
}

export interface Position {
  symbol: string;
  qty: number;
  /** Meaningful only while qty > 0; exactly 0 once the lot is closed. */
  avgPrice: number;
}

export interface EquitySample {
  readonly ts: string;
  readonly equity: number;
}

export interface OrderRequest {
  symbol: string;
  side: Side;
  qty: number;
  price: number;
  reason: string;
}
