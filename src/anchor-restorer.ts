/**
 * Restoration for groups without a fixed hierarchy (the face).
 *
 * Each missing point borrows the nearest point, measured in reference space,
 * that is confidently present in the current frame. Anchors are drawn from
 * the points present before the pass begins; points restored during the pass
 * are never used as anchors.
 *
 * Confidence of a restored point is the reference point's confidence,
 * reduced by the configured factor when reduction is enabled.
 */

import type { DiagnosticsCollector } from "./diagnostics.js";
import { distance, isConfident, isMissingKeypoint } from "./keypoint.js";
import { transformOffset } from "./offset-transformer.js";
import { reduceConfidence } from "./restore-options.js";
import type { AffineTransform, KeypointGroup, RestoreOptions } from "./types.js";

/**
 * Index of the anchor for `target`: the candidate whose reference position
 * is closest to `reference[target]`. Ties keep the earlier candidate.
 */
export function findAnchor(
  target: number,
  candidates: readonly number[],
  reference: KeypointGroup,
): number | null {
  let best: number | null = null;
  let bestDistance = Infinity;
  for (const j of candidates) {
    if (j === target) continue;
    const d = distance(reference[target], reference[j]);
    if (d < bestDistance) {
      bestDistance = d;
      best = j;
    }
  }
  return best;
}

/** Restore missing points of `current` in place. Returns the number restored. */
export function restoreAnchored(
  current: KeypointGroup,
  reference: KeypointGroup,
  affine: AffineTransform | null,
  options: RestoreOptions,
  diagnostics: DiagnosticsCollector,
): number {
  const n = Math.min(current.length, reference.length);

  const candidates: number[] = [];
  for (let j = 0; j < n; j++) {
    if (isConfident(current[j]) && !isMissingKeypoint(reference[j])) candidates.push(j);
  }

  let restored = 0;
  for (let i = 0; i < n; i++) {
    if (!isMissingKeypoint(current[i])) continue;

    const ref = reference[i];
    if (isMissingKeypoint(ref)) {
      diagnostics.info("reference_missing", `Point ${i} left missing: reference has no position`, i);
      continue;
    }

    const anchor = findAnchor(i, candidates, reference);
    if (anchor === null) {
      diagnostics.info("no_anchor", `Point ${i} left missing: no present point to anchor on`, i);
      continue;
    }

    const refAnchor = reference[anchor];
    const curAnchor = current[anchor];
    const offset = transformOffset(ref.x - refAnchor.x, ref.y - refAnchor.y, affine);
    current[i] = {
      x: curAnchor.x + offset.x,
      y: curAnchor.y + offset.y,
      confidence: reduceConfidence(ref.confidence, options),
    };
    restored++;

    diagnostics.info("restored", `Point ${i} restored from anchor ${anchor}`, i);
  }

  return restored;
}
