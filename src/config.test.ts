import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({ ok: true, config: DEFAULT_CONFIG });
  });

  it("reads every supported variable", () => {
    const result = loadConfig({
      PORT: "8080",
      REDUCE_CONFIDENCE: "off",
      CONFIDENCE_REDUCTION_FACTOR: "0.5",
      SCALE_FALLBACK: "Yes",
      MAX_BODY_BYTES: " 2mb ",
      SESSION_IDLE_TIMEOUT_MS: "5000",
    });

    expect(result).toEqual({
      ok: true,
      config: {
        port: 8080,
        restoreOptions: { reduceConfidence: false, confidenceReductionFactor: 0.5, scaleFallback: true },
        maxBodySize: "2mb",
        sessionIdleTimeoutMs: 5000,
      },
    });
  });

  it("does not share option objects with the defaults", () => {
    const result = loadConfig({});
    if (!result.ok) throw new Error(result.errors.join("; "));
    expect(result.config.restoreOptions).not.toBe(DEFAULT_CONFIG.restoreOptions);
  });

  it.each([
    [{ PORT: "abc" }, 'PORT must be a number, got "abc"'],
    [{ PORT: "70000" }, "PORT must be an integer in [0, 65535], got 70000"],
    [{ REDUCE_CONFIDENCE: "maybe" }, 'REDUCE_CONFIDENCE must be a boolean (true/false), got "maybe"'],
    [{ CONFIDENCE_REDUCTION_FACTOR: "2" }, "confidence_reduction_factor must be a number in [0, 1], got 2"],
    [{ MAX_BODY_BYTES: "  " }, "MAX_BODY_BYTES must not be empty"],
    [{ SESSION_IDLE_TIMEOUT_MS: "0" }, "SESSION_IDLE_TIMEOUT_MS must be positive, got 0"],
  ])("rejects %j", (env, message) => {
    expect(loadConfig(env)).toEqual({ ok: false, errors: [message] });
  });

  it("collects all errors in one pass", () => {
    const result = loadConfig({ PORT: "abc", REDUCE_CONFIDENCE: "maybe" });
    expect(result).toEqual({
      ok: false,
      errors: ['PORT must be a number, got "abc"', 'REDUCE_CONFIDENCE must be a boolean (true/false), got "maybe"'],
    });
  });
});
