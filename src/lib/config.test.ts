import { ZodError } from "zod";
import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("should fall back to defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "info",
      termCount: 200,
      sequenceLimit: 1000,
      m3a5MaxIterations: 100,
    });
  });

  it("should read overrides from the environment", () => {
    const config = loadConfig({
      ORBIT_LOG_LEVEL: "debug",
      ORBIT_TERM_COUNT: "50",
      ORBIT_SEQUENCE_LIMIT: "400",
      ORBIT_M3A5_MAX_ITERATIONS: "25",
    });

    expect(config.logLevel).toBe("debug");
    expect(config.termCount).toBe(50);
    expect(config.sequenceLimit).toBe(400);
    expect(config.m3a5MaxIterations).toBe(25);
  });

  it("should treat blank values as unset", () => {
    expect(loadConfig({ ORBIT_TERM_COUNT: " " }).termCount).toBe(200);
  });

  it("should reject non-numeric counts", () => {
    expect(() => loadConfig({ ORBIT_TERM_COUNT: "many" })).toThrow(ZodError);
  });

  it("should reject unknown log levels", () => {
    expect(() => loadConfig({ ORBIT_LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });

  it("should reject a zero iteration cap", () => {
    expect(() => loadConfig({ ORBIT_M3A5_MAX_ITERATIONS: "0" })).toThrow(ZodError);
  });
});
