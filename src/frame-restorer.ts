/**
 * Frame-level restoration: sequences affine estimation, hierarchical and
 * anchor-based restoration over the four keypoint groups of one person, then
 * produces the clipped export copy.
 *
 * The caller's frames are never mutated. `restored` is a deep copy of the
 * current frame carrying full precision; `exported` is a second copy with
 * out-of-canvas keypoints zeroed.
 */

import { buildCorrespondences, estimateAffineFromCorrespondences } from "./affine-estimator.js";
import { restoreAnchored } from "./anchor-restorer.js";
import { clipFrame } from "./canvas-clipper.js";
import { DiagnosticsCollector } from "./diagnostics.js";
import { restoreHierarchical } from "./hierarchical-restorer.js";
import { cloneFrame, cloneGroup, isMissingKeypoint } from "./keypoint.js";
import { reduceConfidence } from "./restore-options.js";
import { BODY_ORDER, HAND_ORDER } from "./skeleton.js";
import {
  DEFAULT_RESTORE_OPTIONS,
  GROUP_NAMES,
  type AffineTransform,
  type FrameRestoreResult,
  type GroupName,
  type HierarchyTable,
  type KeypointGroup,
  type PoseFrame,
  type RestoreOptions,
} from "./types.js";

/** Walk order per group; `null` means anchor-based restoration. */
const GROUP_TABLES: Readonly<Record<GroupName, HierarchyTable | null>> = {
  body: BODY_ORDER,
  leftHand: HAND_ORDER,
  rightHand: HAND_ORDER,
  face: null,
};

export function restoreFrame(
  current: PoseFrame,
  reference: PoseFrame | null,
  options: RestoreOptions = DEFAULT_RESTORE_OPTIONS,
  diagnostics: DiagnosticsCollector = new DiagnosticsCollector(),
): FrameRestoreResult {
  const restored = cloneFrame(current);

  if (reference === null) {
    diagnostics.info("no_reference", "No reference pose supplied; frame returned unchanged");
    return { restored, exported: cloneFrame(restored), diagnostics: diagnostics.entries };
  }

  for (const name of GROUP_NAMES) {
    const refGroup = reference[name];
    if (!refGroup) continue;

    const scoped = diagnostics.scoped({ group: name });
    const curGroup = restored[name];
    if (!curGroup) {
      restored[name] = fillFromReference(refGroup, options);
      scoped.warn("group_filled_from_reference", "Group absent from current pose; copied from reference");
      continue;
    }

    restoreGroup(name, curGroup, refGroup, options, scoped);
  }

  const exported = clipFrame(restored, diagnostics);
  return { restored, exported, diagnostics: diagnostics.entries };
}

/** Restore one group in place with its own affine estimate. Returns the restored count. */
function restoreGroup(
  name: GroupName,
  current: KeypointGroup,
  reference: KeypointGroup,
  options: RestoreOptions,
  diagnostics: DiagnosticsCollector,
): number {
  const affine = estimateGroupAffine(current, reference, diagnostics);
  const table = GROUP_TABLES[name];
  if (table === null) {
    return restoreAnchored(current, reference, affine, options, diagnostics);
  }
  return restoreHierarchical(current, reference, table, affine, options, diagnostics);
}

function estimateGroupAffine(
  current: KeypointGroup,
  reference: KeypointGroup,
  diagnostics: DiagnosticsCollector,
): AffineTransform | null {
  const pairs = buildCorrespondences(current, reference);
  const affine = estimateAffineFromCorrespondences(pairs);
  if (affine === null) {
    diagnostics.info(
      "affine_unavailable",
      `No affine fit from ${pairs.length} correspondence(s); offsets transferred unchanged`,
    );
  } else {
    diagnostics.info("affine_estimated", `Affine fitted from ${pairs.length} correspondences`);
  }
  return affine;
}

function fillFromReference(reference: KeypointGroup, options: RestoreOptions): KeypointGroup {
  return cloneGroup(reference).map((kp) =>
    isMissingKeypoint(kp) ? kp : { ...kp, confidence: reduceConfidence(kp.confidence, options) },
  );
}
