// Pose Restorer - Environment configuration
//
// Values come from process.env (populated from .env by the entry point via
// dotenv). Unset variables take their defaults; malformed ones are reported
// together so the entry point can fail once with the full list.

import { resolveRestoreOptions } from "./restore-options.js";
import { DEFAULT_RESTORE_OPTIONS, type RestoreOptions } from "./types.js";

export interface AppConfig {
  port: number;
  /** Defaults for every request and streaming session. */
  restoreOptions: RestoreOptions;
  /** Request body limit passed to express.json(). */
  maxBodySize: string;
  /** Close streaming connections idle for this long. */
  sessionIdleTimeoutMs: number;
}

export const DEFAULT_CONFIG: Readonly<AppConfig> = {
  port: 3000,
  restoreOptions: DEFAULT_RESTORE_OPTIONS,
  maxBodySize: "1mb",
  sessionIdleTimeoutMs: 10 * 60 * 1000,
};

export type ConfigResult = { ok: true; config: AppConfig } | { ok: false; errors: string[] };

type Env = Record<string, string | undefined>;

function parseBoolean(value: string, name: string, errors: string[]): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  errors.push(`${name} must be a boolean (true/false), got "${value}"`);
  return undefined;
}

function parseNumber(value: string, name: string, errors: string[]): number | undefined {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    errors.push(`${name} must be a number, got "${value}"`);
    return undefined;
  }
  return parsed;
}

export function loadConfig(env: Env = process.env): ConfigResult {
  const errors: string[] = [];
  const config: AppConfig = {
    ...DEFAULT_CONFIG,
    restoreOptions: { ...DEFAULT_CONFIG.restoreOptions },
  };

  if (env.PORT !== undefined) {
    const port = parseNumber(env.PORT, "PORT", errors);
    if (port !== undefined) {
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        errors.push(`PORT must be an integer in [0, 65535], got ${port}`);
      } else {
        config.port = port;
      }
    }
  }

  const overrides: Record<string, unknown> = {};
  if (env.REDUCE_CONFIDENCE !== undefined) {
    overrides.reduceConfidence = parseBoolean(env.REDUCE_CONFIDENCE, "REDUCE_CONFIDENCE", errors);
  }
  if (env.CONFIDENCE_REDUCTION_FACTOR !== undefined) {
    overrides.confidenceReductionFactor = parseNumber(
      env.CONFIDENCE_REDUCTION_FACTOR,
      "CONFIDENCE_REDUCTION_FACTOR",
      errors,
    );
  }
  if (env.SCALE_FALLBACK !== undefined) {
    overrides.scaleFallback = parseBoolean(env.SCALE_FALLBACK, "SCALE_FALLBACK", errors);
  }
  const options = resolveRestoreOptions(overrides, config.restoreOptions);
  if (options.ok) {
    config.restoreOptions = options.options;
  } else {
    errors.push(...options.errors);
  }

  if (env.MAX_BODY_BYTES !== undefined) {
    if (env.MAX_BODY_BYTES.trim() === "") {
      errors.push("MAX_BODY_BYTES must not be empty");
    } else {
      config.maxBodySize = env.MAX_BODY_BYTES.trim();
    }
  }

  if (env.SESSION_IDLE_TIMEOUT_MS !== undefined) {
    const timeout = parseNumber(env.SESSION_IDLE_TIMEOUT_MS, "SESSION_IDLE_TIMEOUT_MS", errors);
    if (timeout !== undefined) {
      if (timeout <= 0) {
        errors.push(`SESSION_IDLE_TIMEOUT_MS must be positive, got ${timeout}`);
      } else {
        config.sessionIdleTimeoutMs = timeout;
      }
    }
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, config };
}
