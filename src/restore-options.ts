// Restoration options: defaults, validation of caller-supplied values, and
// the confidence reduction they control.
//
// Accepts both camelCase and the snake_case names used on the wire
// (reduce_confidence, confidence_reduction_factor, scale_fallback).

import { DEFAULT_RESTORE_OPTIONS, type RestoreOptions } from "./types.js";

export type OptionsResult =
  | { ok: true; options: RestoreOptions }
  | { ok: false; errors: string[] };

const FIELD_ALIASES: ReadonlyArray<readonly [keyof RestoreOptions, string]> = [
  ["reduceConfidence", "reduce_confidence"],
  ["confidenceReductionFactor", "confidence_reduction_factor"],
  ["scaleFallback", "scale_fallback"],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge `input` over `base` and validate the result.
 * `undefined` / `null` input yields `base` unchanged.
 */
export function resolveRestoreOptions(
  input: unknown,
  base: RestoreOptions = DEFAULT_RESTORE_OPTIONS,
): OptionsResult {
  const options: RestoreOptions = { ...base };
  if (input === undefined || input === null) return { ok: true, options };

  if (!isRecord(input)) {
    return { ok: false, errors: ["Options must be an object"] };
  }

  const raw = input;
  const errors: string[] = [];

  for (const [field, alias] of FIELD_ALIASES) {
    const value = raw[field] !== undefined ? raw[field] : raw[alias];
    if (value === undefined) continue;

    if (field === "confidenceReductionFactor") {
      if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 1) {
        errors.push(`${alias} must be a number in [0, 1], got ${JSON.stringify(value)}`);
      } else {
        options.confidenceReductionFactor = value;
      }
    } else if (typeof value !== "boolean") {
      errors.push(`${alias} must be a boolean, got ${JSON.stringify(value)}`);
    } else {
      options[field] = value;
    }
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, options };
}

/** Confidence for a restored keypoint, reduced when reduction is enabled. */
export function reduceConfidence(confidence: number, options: RestoreOptions): number {
  return options.reduceConfidence ? confidence * options.confidenceReductionFactor : confidence;
}
