import { assertPositive, floorTo, roundTo } from "@paper-desk/kit";
import type { OrderRequest, Position, Trade } from "../types/trading.js";

const MIN_PRICE = 0.01;
const QTY_EPSILON = 1e-9;

/**
 * Cash and long-only positions for a fixed set of symbols.
 *
 * `execute` never throws for sizing problems: unaffordable buys shrink to the
 * largest whole-cent quantity, oversized sells shrink to the held quantity, and
 * anything that ends up at zero is dropped without a trade.
 */
export class Ledger {
  private cashBalance: number;
  private positionsBySymbol = new Map<string, Position>();

  constructor(
    private readonly symbols: readonly string[],
    startingCash: number,
  ) {
    this.cashBalance = assertPositive(startingCash, "startingCash");
    this.resetPositions();
  }

  get cash(): number {
    return this.cashBalance;
  }

  position(symbol: string): Position {
    const pos = this.positionsBySymbol.get(symbol);
    if (!pos) {
      throw new Error(`Unknown symbol: ${symbol}`);
    }
    return pos;
  }

  isFlat(symbol: string): boolean {
    return this.position(symbol).qty <= 0;
  }

  marketValue(symbol: string, lastPrice: number): number {
    return this.position(symbol).qty * lastPrice;
  }

  /** Cash plus every position marked at `prices`. */
  equity(prices: ReadonlyMap<string, number>): number {
    let total = this.cashBalance;
    for (const pos of this.positionsBySymbol.values()) {
      total += pos.qty * (prices.get(pos.symbol) ?? 0);
    }
    return total;
  }

  /** Applies a buy or sell; returns the executed trade, or null when nothing was executed. */
  execute(order: OrderRequest, ts: string): Trade | null {
    const price = Math.max(MIN_PRICE, order.price);
    const qty = Math.max(0, order.qty);
    if (qty <= 0) return null;

    const pos = this.position(order.symbol);
    return order.side === "BUY"
      ? this.buy(pos, qty, price, order.reason, ts)
      : this.sell(pos, qty, price, order.reason, ts);
  }

  reset(startingCash: number): void {
    this.cashBalance = assertPositive(startingCash, "startingCash");
    this.resetPositions();
  }

  private buy(pos: Position, requested: number, price: number, reason: string, ts: string): Trade | null {
    let qty = requested;
    let cost = qty * price;
    if (cost > this.cashBalance) {
      qty = floorTo(this.cashBalance / price, 2);
      // floorTo can land one cent high when qty × price rounds above the balance
      while (qty > 0 && qty * price > this.cashBalance) {
        qty = roundTo(qty - 0.01, 2);
      }
      if (qty <= 0) return null;
      cost = qty * price;
    }

    const newQty = pos.qty + qty;
    pos.avgPrice = pos.qty > 0 ? (pos.avgPrice * pos.qty + price * qty) / newQty : price;
    pos.qty = newQty;
    this.cashBalance -= cost;

    return { ts, symbol: pos.symbol, side: "BUY", qty, price, reason };
  }

  private sell(pos: Position, requested: number, price: number, reason: string, ts: string): Trade | null {
    const qty = Math.min(pos.qty, requested);
    if (qty <= 0) return null;

    pos.qty -= qty;
    if (pos.qty <= QTY_EPSILON) {
      pos.qty = 0;
      pos.avgPrice = 0;
    }
    this.cashBalance += qty * price;

    return { ts, symbol: pos.symbol, side: "SELL", qty, price, reason };
  }

  private resetPositions(): void {
    this.positionsBySymbol.clear();
    for (const symbol of this.symbols) {
      this.positionsBySymbol.set(symbol, { symbol, qty: 0, avgPrice: 0 });
    }
  }
}
