import express from "express";
import rateLimit from "express-rate-limit";
import type { PaperEngine } from "./application/paper-engine.js";
import { errorMessage } from "./lib/errors.js";
import { logger } from "./lib/logger.js";

const log = logger.createChild("http");

/** The slice of the engine the transport may call. */
export type EngineControl = Pick<PaperEngine, "start" | "stop" | "reset" | "snapshot" | "getStatus">;

export interface AppDeps {
  engine: EngineControl;
  /** POST requests allowed per IP per minute. */
  controlRateLimit?: number;
}

export function createApp(deps: AppDeps): express.Express {
  const { engine } = deps;
  const app = express();
  app.use(express.json({ limit: "10kb" }));

  const postLimiter = rateLimit({
    windowMs: 60_000,
    limit: deps.controlRateLimit ?? 60,
    standardHeaders: false,
    legacyHeaders: false,
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", engineStatus: engine.getStatus(), uptime: process.uptime() });
  });

  app.get("/api/state", async (_req, res) => {
    try {
      res.json(await engine.snapshot());
    } catch (err) {
      log.error({ action: "stateFailed", err }, "Snapshot failed");
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  const controls = {
    start: () => engine.start(),
    stop: () => engine.stop(),
    reset: () => engine.reset(),
  } as const;

  for (const [name, run] of Object.entries(controls)) {
    app.post(`/api/${name}`, postLimiter, async (_req, res) => {
      try {
        await run();
        res.json({ ok: true });
      } catch (err) {
        log.error({ action: "controlFailed", control: name, err }, "Control call failed");
        res.status(500).json({ error: errorMessage(err) });
      }
    });
  }

  return app;
}
