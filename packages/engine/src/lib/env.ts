import { z } from "zod";
import dotenv from "dotenv";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { parseEnv } from "@paper-desk/kit";

const __dirname = dirname(fileURLToPath(import.meta.url));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).optional(),
  LOG_DIR: z.string().min(1).optional(),
});

export type Env = z.infer<typeof EnvSchema>;

/** Load `.env` from the package root (if present) and return the parsed environment. */
export function loadEnv(): Env {
  dotenv.config({ path: join(__dirname, "../../.env") });
  return parseEnv(EnvSchema);
}
