import pino from "pino";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));

function baseLevel(): string {
  return process.env.LOG_LEVEL ?? "info";
}

function createRootLogger(): pino.Logger {
  if (process.env.VITEST) {
    return pino({ level: "silent" });
  }

  const level = baseLevel();
  const logDir = process.env.LOG_DIR || join(__dirname, "../../logs");

  return pino(
    { level },
    pino.transport({
      targets: [
        { target: "pino/file", level, options: { destination: 1 } },
        {
          target: "pino-roll",
          level,
          options: {
            file: join(logDir, "engine"),
            frequency: "daily",
            dateFormat: "yyyy-MM-dd",
            extension: ".ndjson",
            mkdir: true,
          },
        },
      ],
    }),
  );
}

const root = createRootLogger();

/**
 * Module loggers are created at import time, before the daemon has read
 * `logLevels`, so every child is kept here and re-levelled on each
 * `setLogConfig` call.
 */
const modules = new Map<string, pino.Logger>();
let levelOverrides: Record<string, string> = {};

function levelFor(module: string): string {
  return levelOverrides[module] ?? root.level;
}

export const logger = Object.assign(root, {
  /** Replace the per-module overrides and apply them to every module logger, old and new. */
  setLogConfig(overrides: Record<string, string>): void {
    levelOverrides = { ...overrides };
    for (const [module, child] of modules) {
      child.level = levelFor(module);
    }
  },

  /** Logger tagged with `module`; one instance per module name. */
  createChild(module: string): pino.Logger {
    const existing = modules.get(module);
    if (existing) return existing;

    const child = root.child({ module });
    child.level = levelFor(module);
    modules.set(module, child);
    return child;
  },
});
