import { readFileSync } from "node:fs";
import { EngineConfigSchema, type EngineConfig } from "../types/config.js";

/**
 * Loads and validates engine-config.json.
 * Throws a ZodError when the file does not match EngineConfigSchema.
 */
export function loadConfig(configPath: string): EngineConfig {
  const raw = readFileSync(configPath, "utf-8");
  const json: unknown = JSON.parse(raw);
  return EngineConfigSchema.parse(json);
}
