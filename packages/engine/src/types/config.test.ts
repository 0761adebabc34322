import { describe, it, expect } from "vitest";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { writeFileSync, mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { ZodError } from "zod";
import { formatZodErrors } from "@paper-desk/kit";
import { EngineConfigSchema } from "./config.js";
import { loadConfig } from "../lib/load-config.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

describe("EngineConfigSchema", () => {
  it("fills every default from a minimal config", () => {
    const config = EngineConfigSchema.parse({ instruments: [{ symbol: "ALPHA", anchorPrice: 100 }] });

    expect(config.host).toBe("127.0.0.1");
    expect(config.port).toBeUndefined();
    expect(config.startingCash).toBe(10_000);
    expect(config.tickMs).toBe(1000);
    expect(config.resetTimeoutMs).toBe(2500);
    expect(config.strategy).toEqual({ fastWindow: 7, slowWindow: 21, riskPerTrade: 0.12 });
    expect(config.walk).toEqual({
      reversion: 0.003,
      volatilityBase: 0.8,
      volatilitySwing: 0.2,
      volatilityPeriodSec: 4,
      priceFloor: 1,
      decimals: 2,
    });
    expect(config.history).toEqual({ capacity: 200, warmup: 80 });
    expect(config.limits).toEqual({ trades: 250, logs: 200, equitySamples: 600 });
    expect(config.snapshot).toEqual({ trades: 30, logs: 30, equityPoints: 240 });
    expect(config.logLevels).toEqual({});
  });

  it("requires at least one instrument", () => {
    expect(() => EngineConfigSchema.parse({ instruments: [] })).toThrow(ZodError);
  });

  it("rejects duplicate symbols", () => {
    const result = EngineConfigSchema.safeParse({
      instruments: [
        { symbol: "ALPHA", anchorPrice: 100 },
        { symbol: "ALPHA", anchorPrice: 120 },
      ],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toEqual(["instruments: instrument symbols must be unique"]);
    }
  });

  it("rejects a fast window that is not below the slow window", () => {
    const result = EngineConfigSchema.safeParse({
      instruments: [{ symbol: "ALPHA", anchorPrice: 100 }],
      strategy: { fastWindow: 21, slowWindow: 21 },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toEqual(["strategy: fastWindow must be smaller than slowWindow"]);
    }
  });

  it("rejects a warmup longer than the history capacity", () => {
    const result = EngineConfigSchema.safeParse({
      instruments: [{ symbol: "ALPHA", anchorPrice: 100 }],
      history: { capacity: 10, warmup: 11 },
    });
    expect(result.success).toBe(false);
  });

  it("rejects a non-positive anchor price", () => {
    const result = EngineConfigSchema.safeParse({ instruments: [{ symbol: "ALPHA", anchorPrice: 0 }] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["instruments", 0, "anchorPrice"]);
    }
  });
});

describe("loadConfig", () => {
  it("loads the shipped engine-config.json", () => {
    const config = loadConfig(join(__dirname, "../../engine-config.json"));
    expect(config.instruments.map((i) => i.symbol)).toEqual(["ALPHA", "BRAVO", "CHARLIE", "DELTA", "ECHO"]);
    expect(config.instruments.map((i) => i.anchorPrice)).toEqual([100, 110, 120, 130, 140]);
    expect(config.logLevels).toEqual({ http: "warn" });
  });

  it("throws a ZodError for an invalid file", () => {
    const dir = mkdtempSync(join(tmpdir(), "engine-config-"));
    const path = join(dir, "bad.json");
    writeFileSync(path, JSON.stringify({ instruments: [{ symbol: "ALPHA", anchorPrice: -1 }] }));
    expect(() => loadConfig(path)).toThrow(ZodError);
  });
});
