import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { cac } from "cac";
import { ZodError } from "zod";
import { isMainModule, formatZodErrors } from "@paper-desk/kit";
import type { EngineConfig } from "./types/config.js";
import { loadConfig } from "./lib/load-config.js";
import { loadEnv, type Env } from "./lib/env.js";
import { findFreePort } from "./lib/find-free-port.js";
import { logger } from "./lib/logger.js";
import { PaperEngine } from "./application/paper-engine.js";
import { createApp } from "./create-app.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const log = logger.createChild("daemon");

interface DaemonOptions {
  config: string;
  autostart: boolean;
}

function parseArgs(argv: string[]): DaemonOptions {
  const cli = cac("paper-desk");
  cli
    .option("--config <path>", "Path to engine-config.json", {
      default: join(__dirname, "../engine-config.json"),
    })
    .option("--autostart", "Start the tick loop as soon as the server is listening", {
      default: false,
    });
  cli.help();
  const { options } = cli.parse(argv);
  if (options.help) process.exit(0);
  return { config: String(options.config), autostart: Boolean(options.autostart) };
}

/** PORT from the environment binds every interface; otherwise localhost on the configured or a free port. */
export async function resolveListenAddress(
  config: EngineConfig,
  env: Env,
): Promise<{ host: string; port: number }> {
  if (env.PORT !== undefined) {
    return { host: "0.0.0.0", port: env.PORT };
  }
  const port = config.port ?? (await findFreePort(config.host));
  return { host: config.host, port };
}

async function main() {
  const opts = parseArgs(process.argv);
  const env = loadEnv();

  let config: EngineConfig;
  try {
    config = loadConfig(opts.config);
  } catch (err) {
    if (err instanceof ZodError) {
      logger.error({ issues: formatZodErrors(err), path: opts.config }, "Invalid engine config");
      process.exit(1);
    }
    throw err;
  }

  // Re-levels the module loggers already created at import time
  logger.setLogConfig(config.logLevels);

  const engine = new PaperEngine({ config });
  const { host, port } = await resolveListenAddress(config, env);
  const app = createApp({ engine });

  const server = app.listen(port, host, () => {
    const url = `http://${host === "0.0.0.0" ? "127.0.0.1" : host}:${port}`;
    log.info({ url, instruments: config.instruments.map((i) => i.symbol) }, "Paper engine listening");
    if (opts.autostart) {
      engine.start().catch((err) => {
        log.error({ action: "autostartFailed", err }, "Autostart failed");
      });
    }
  });

  const shutdown = async () => {
    logger.info("Shutting down...");
    await engine.shutdown();
    server.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error(err, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

if (isMainModule(import.meta.url)) {
  main().catch((err) => {
    logger.error(err, "Fatal error");
    process.exit(1);
  });
}
