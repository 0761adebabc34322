import { setTimeout as sleep } from "node:timers/promises";
import pTimeout, { TimeoutError } from "p-timeout";
import { floorTo, isSanePrice } from "@paper-desk/kit";
import type { EngineConfig } from "../types/config.js";
import type { OrderRequest, Trade } from "../types/trading.js";
import type { EngineSnapshot } from "../types/snapshot.js";
import { nextPrice } from "../domain/price-walk.js";
import { detectCrossover } from "../domain/crossover.js";
import { systemClock, isoSeconds, type Clock } from "../lib/clock.js";
import { createRandomSource, type RandomSource } from "../lib/random.js";
import { Mutex } from "../lib/mutex.js";
import { FatalEngineError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { createEngineActor, toEngineStatus, type EngineStatus } from "./engine-machine.js";
import {
  createEngineState,
  resetEngineState,
  computeEquity,
  type EngineState,
  type InstrumentState,
} from "./engine-state.js";
import { buildSnapshot } from "./build-snapshot.js";

const log = logger.createChild("paperEngine");

export interface PaperEngineDeps {
  config: EngineConfig;
  clock?: Clock;
  random?: RandomSource;
}

/**
 * Simulated price feed, SMA crossover strategy and paper ledger behind one lock.
 *
 * Every tick, control call and snapshot runs inside `mutex`; the inter-tick
 * sleep and reset's wait for the loop happen outside it. Each spawned loop
 * carries a generation number, and work from a generation older than the
 * current one is discarded, so a loop that outlives a reset cannot touch the
 * fresh state.
 */
export class PaperEngine {
  private readonly config: EngineConfig;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly mutex = new Mutex();
  private readonly lifecycle = createEngineActor();
  private readonly state: EngineState;
  private generation = 0;
  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(deps: PaperEngineDeps) {
    this.config = deps.config;
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? createRandomSource();
    this.state = createEngineState(this.config);

    this.note("Engine initialized. Paper trading only (simulated prices).");
    this.sampleEquity();
  }

  getStatus(): EngineStatus {
    return toEngineStatus(this.lifecycle.getSnapshot().value);
  }

  isRunning(): boolean {
    return this.getStatus() === "running";
  }

  start(): Promise<void> {
    return this.mutex.runExclusive(() => {
      if (this.isRunning()) {
        this.note("Start ignored: already running.");
        return;
      }
      if (!this.lifecycle.getSnapshot().can({ type: "START" })) {
        this.note(`Start ignored: engine is ${this.getStatus()}.`);
        return;
      }

      const generation = ++this.generation;
      const abort = new AbortController();
      this.abort = abort;
      this.lifecycle.send({ type: "START" });
      this.loop = this.runLoop(generation, abort.signal);
      this.note("Engine started.");
      log.info({ action: "engineStarted", generation, tickMs: this.config.tickMs }, "Engine started");
    });
  }

  stop(): Promise<void> {
    return this.mutex.runExclusive(() => {
      if (!this.isRunning()) {
        this.note("Stop ignored: not running.");
        return;
      }
      this.abort?.abort();
      this.lifecycle.send({ type: "STOP" });
      this.note("Stopping engine...");
      log.info({ action: "engineStopping", generation: this.generation }, "Stop requested");
    });
  }

  /** Stop the loop, wait for it within `resetTimeoutMs`, then restore the starting book. */
  async reset(): Promise<void> {
    const { pending } = await this.mutex.runExclusive(() => {
      // Supersede the running loop now; anything it does from here on is discarded.
      this.generation++;
      this.abort?.abort();
      this.lifecycle.send({ type: "RESET" });
      return { pending: this.loop };
    });

    await this.joinLoop(pending);

    await this.mutex.runExclusive(() => {
      this.abort = null;
      this.loop = null;
      resetEngineState(this.state, this.config);
      this.lifecycle.send({ type: "RESET_DONE" });
      this.note("Engine reset.");
      this.sampleEquity();
      log.info({ action: "engineReset", generation: this.generation }, "Engine reset");
    });
  }

  /** Stop and wait for the loop to exit. Used on process shutdown. */
  async shutdown(): Promise<void> {
    await this.stop();
    await this.joinLoop(this.loop);
  }

  /**
   * Run one tick now, running or not. Refused while a reset is in progress.
   * A FatalEngineError reaches the caller.
   */
  tick(): Promise<void> {
    return this.mutex.runExclusive(() => {
      if (this.getStatus() === "resetting") {
        this.note("Tick ignored: engine is resetting.");
        return;
      }
      this.applyTick();
    });
  }

  snapshot(): Promise<EngineSnapshot> {
    return this.mutex.runExclusive(() =>
      buildSnapshot({
        state: this.state,
        status: this.getStatus(),
        running: this.isRunning(),
        config: this.config,
        ts: isoSeconds(this.clock.now()),
      }),
    );
  }

  private async runLoop(generation: number, signal: AbortSignal): Promise<void> {
    let failure: unknown = null;
    try {
      while (!signal.aborted) {
        await this.mutex.runExclusive(() => {
          if (generation === this.generation) this.applyTick();
        });
        try {
          await sleep(this.config.tickMs, undefined, { signal });
        } catch (err) {
          if (!signal.aborted) throw err;
        }
      }
    } catch (err) {
      failure = err;
      log.error({ action: "loopHalted", generation, err }, "Tick loop halted");
    } finally {
      await this.mutex.runExclusive(() => this.finishLoop(generation, failure));
    }
  }

  private finishLoop(generation: number, failure: unknown): void {
    if (generation !== this.generation) {
      log.debug({ action: "staleLoopExited", generation, current: this.generation }, "Superseded loop exited");
      return;
    }
    if (failure !== null) {
      this.note(`Engine halted: ${errorMessage(failure)}`);
    }
    this.lifecycle.send({ type: "LOOP_EXITED" });
    this.note("Engine stopped.");
    log.info({ action: "engineStopped", generation }, "Engine stopped");
  }

  private async joinLoop(pending: Promise<void> | null): Promise<void> {
    if (!pending) return;
    try {
      await pTimeout(pending, { milliseconds: this.config.resetTimeoutMs });
    } catch (err) {
      if (!(err instanceof TimeoutError)) throw err;
      log.warn(
        { action: "loopJoinTimeout", timeoutMs: this.config.resetTimeoutMs },
        "Tick loop did not exit in time; continuing without it",
      );
    }
  }

  /**
   * Two passes so every trading decision in a tick sees the same fully updated
   * price set: first move all prices, then evaluate all instruments.
   */
  private applyTick(): void {
    const nowMs = this.clock.now();
    const skipped = new Set<string>();

    for (const inst of this.state.instruments) {
      try {
        this.advancePrice(inst, nowMs);
      } catch (err) {
        this.skipInstrument(inst.symbol, err, skipped);
      }
    }

    for (const inst of this.state.instruments) {
      if (skipped.has(inst.symbol)) continue;
      try {
        this.evaluate(inst);
      } catch (err) {
        this.skipInstrument(inst.symbol, err, skipped);
      }
    }

    this.state.lastTickTs = isoSeconds(nowMs);
    this.sampleEquity();
  }

  private advancePrice(inst: InstrumentState, nowMs: number): void {
    const price = nextPrice({ last: inst.price, anchor: inst.anchorPrice, nowMs }, this.config.walk, this.random);
    if (!isSanePrice(price)) {
      throw new Error(`simulated price out of range: ${price}`);
    }
    inst.price = price;
    inst.history.append(price);
  }

  private evaluate(inst: InstrumentState): void {
    const { fastWindow, slowWindow, riskPerTrade } = this.config.strategy;
    const signal = detectCrossover(inst.history.values(), fastWindow, slowWindow);
    const { ledger } = this.state;

    if (signal === "CROSS_UP" && ledger.isFlat(inst.symbol)) {
      const budget = Math.max(0, ledger.cash * riskPerTrade);
      this.placeTrade({
        symbol: inst.symbol,
        side: "BUY",
        qty: floorTo(budget / inst.price, 2),
        price: inst.price,
        reason: `SMA cross UP (${fastWindow}/${slowWindow})`,
      });
      return;
    }

    if (signal === "CROSS_DOWN" && !ledger.isFlat(inst.symbol)) {
      this.placeTrade({
        symbol: inst.symbol,
        side: "SELL",
        qty: ledger.position(inst.symbol).qty,
        price: inst.price,
        reason: `SMA cross DOWN (${fastWindow}/${slowWindow})`,
      });
    }
  }

  private placeTrade(order: OrderRequest): Trade | null {
    const trade = this.state.ledger.execute(order, isoSeconds(this.clock.now()));
    if (!trade) return null;

    this.state.trades.push(trade);
    this.note(`${trade.side} ${trade.symbol} qty=${trade.qty.toFixed(2)} @ ${trade.price.toFixed(2)} (${trade.reason})`);
    log.info({ action: "tradeExecuted", ...trade, cash: this.state.ledger.cash }, "Trade executed");
    return trade;
  }

  private skipInstrument(symbol: string, err: unknown, skipped: Set<string>): void {
    if (err instanceof FatalEngineError) throw err;
    skipped.add(symbol);
    this.note(`Tick error on ${symbol}: ${errorMessage(err)}`);
    log.warn({ action: "instrumentSkipped", symbol, err }, "Instrument skipped for this tick");
  }

  private sampleEquity(): void {
    const equity = computeEquity(this.state);
    if (!Number.isFinite(equity)) {
      throw new FatalEngineError(`equity is not finite: ${equity}`);
    }
    this.state.equityCurve.push({ ts: isoSeconds(this.clock.now()), equity });
  }

  private note(msg: string): void {
    this.state.logs.push(`${isoSeconds(this.clock.now())}  ${msg}`);
  }
}
