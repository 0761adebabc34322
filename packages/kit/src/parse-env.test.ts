import { describe, it, expect, afterEach } from "vitest";
import { z } from "zod";
import { parseEnv } from "./parse-env.js";

const Schema = z.object({
  PORT: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn"]).default("info"),
});

describe("parseEnv", () => {
  it("coerces string values from the source", () => {
    expect(parseEnv(Schema, { PORT: "8080", LOG_LEVEL: "warn" })).toEqual({ PORT: 8080, LOG_LEVEL: "warn" });
  });

  it("fills defaults for missing keys", () => {
    expect(parseEnv(Schema, {})).toEqual({ LOG_LEVEL: "info" });
  });

  it("throws a ZodError for values outside the schema", () => {
    expect(() => parseEnv(Schema, { PORT: "-1" })).toThrow(z.ZodError);
    expect(() => parseEnv(Schema, { LOG_LEVEL: "loud" })).toThrow(z.ZodError);
  });

  describe("default source", () => {
    const saved = process.env.DESK_TEST_FLAG;

    afterEach(() => {
      if (saved === undefined) delete process.env.DESK_TEST_FLAG;
      else process.env.DESK_TEST_FLAG = saved;
    });

    it("reads process.env when no source is given", () => {
      process.env.DESK_TEST_FLAG = "on";
      const env = parseEnv(z.object({ DESK_TEST_FLAG: z.string() }));
      expect(env.DESK_TEST_FLAG).toBe("on");
    });
  });
});
