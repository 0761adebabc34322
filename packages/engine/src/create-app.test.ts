import { describe, it, expect, afterEach } from "vitest";
import request from "supertest";
import { createApp, type EngineControl } from "./create-app.js";
import { PaperEngine } from "./application/paper-engine.js";
import { fixedClock, makeConfig, scriptedRandom } from "./test-helpers.js";

const T = "2024-01-01T00:00:00Z";

let engine: PaperEngine;

function makeApp(controlRateLimit?: number) {
  // long tick so the loop never advances during a request
  engine = new PaperEngine({ config: makeConfig({ tickMs: 60_000 }), clock: fixedClock(), random: scriptedRandom() });
  return createApp({ engine, controlRateLimit });
}

afterEach(async () => {
  await engine.shutdown();
});

describe("createApp", () => {
  describe("GET /health", () => {
    it("returns ok with the engine status", async () => {
      const res = await request(makeApp()).get("/health");
      expect(res.status).toBe(200);
      expect(res.body.status).toBe("ok");
      expect(res.body.engineStatus).toBe("stopped");
      expect(typeof res.body.uptime).toBe("number");
    });
  });

  describe("GET /api/state", () => {
    it("returns the snapshot", async () => {
      const res = await request(makeApp()).get("/api/state");
      expect(res.status).toBe(200);
      expect(res.body.status).toBe("stopped");
      expect(res.body.running).toBe(false);
      expect(res.body.cash).toBe(10_000);
      expect(res.body.prices).toEqual({ ALPHA: 100 });
      expect(res.body.logs).toEqual([`${T}  Engine initialized. Paper trading only (simulated prices).`]);
      expect(res.body.params).toEqual({ fast_window: 7, slow_window: 21, tick_seconds: 60, risk_per_trade: 0.12 });
    });
  });

  describe("control routes", () => {
    it("POST /api/start starts the engine", async () => {
      const app = makeApp();
      const res = await request(app).post("/api/start");
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ ok: true });

      const state = await request(app).get("/api/state");
      expect(state.body.status).toBe("running");
      expect(state.body.running).toBe(true);
    });

    it("POST /api/stop on a stopped engine is a logged no-op", async () => {
      const app = makeApp();
      const res = await request(app).post("/api/stop");
      expect(res.body).toEqual({ ok: true });

      const state = await request(app).get("/api/state");
      expect(state.body.logs[0]).toBe(`${T}  Stop ignored: not running.`);
    });

    it("POST /api/reset returns to the starting book", async () => {
      const app = makeApp();
      await request(app).post("/api/start");
      const res = await request(app).post("/api/reset");
      expect(res.body).toEqual({ ok: true });

      const state = await request(app).get("/api/state");
      expect(state.body.status).toBe("stopped");
      expect(state.body.logs).toEqual([`${T}  Engine reset.`]);
    });

    it("rate limits control calls", async () => {
      const app = makeApp(2);
      await request(app).post("/api/stop").expect(200);
      await request(app).post("/api/stop").expect(200);
      const res = await request(app).post("/api/stop");
      expect(res.status).toBe(429);
    });

    it("does not rate limit reads", async () => {
      const app = makeApp(1);
      await request(app).get("/api/state").expect(200);
      await request(app).get("/api/state").expect(200);
    });
  });

  describe("errors", () => {
    it("returns 500 with the message when the engine fails", async () => {
      makeApp();
      const failing: EngineControl = {
        start: () => Promise.reject(new Error("start failed")),
        stop: () => Promise.resolve(),
        reset: () => Promise.resolve(),
        snapshot: () => Promise.reject(new Error("snapshot failed")),
        getStatus: () => "stopped",
      };
      const app = createApp({ engine: failing });

      const start = await request(app).post("/api/start");
      expect(start.status).toBe(500);
      expect(start.body).toEqual({ error: "start failed" });

      const state = await request(app).get("/api/state");
      expect(state.status).toBe(500);
      expect(state.body).toEqual({ error: "snapshot failed" });
    });
  });
});
