/**
 * Parent → child restoration for groups with a fixed joint hierarchy
 * (body and hands).
 *
 * A missing child is placed at its current parent plus the reference
 * parent→child offset, rotated/scaled by the group's affine estimate. The
 * walk follows a topologically sorted table, so a child restored early in
 * the walk can serve as parent for its own children later in the same walk.
 *
 * Confidence of a restored joint is min(parent, reference child), reduced by
 * the configured factor when reduction is enabled.
 */

import type { DiagnosticsCollector } from "./diagnostics.js";
import { distance, isMissingKeypoint } from "./keypoint.js";
import { transformOffset, type Vec2 } from "./offset-transformer.js";
import { reduceConfidence } from "./restore-options.js";
import type {
  AffineTransform,
  HierarchyTable,
  KeypointGroup,
  RestoreOptions,
} from "./types.js";

/**
 * Restore missing joints of `current` in place. `table` must already be in
 * parent-before-child order (see `topologicalOrder`). Returns the number of
 * joints restored.
 */
export function restoreHierarchical(
  current: KeypointGroup,
  reference: KeypointGroup,
  table: HierarchyTable,
  affine: AffineTransform | null,
  options: RestoreOptions,
  diagnostics: DiagnosticsCollector,
): number {
  const n = Math.min(current.length, reference.length);
  const parentOf = new Map<number, number>();
  for (const [child, parent] of table) parentOf.set(child, parent);

  let restored = 0;

  for (const [child, parent] of table) {
    if (child >= n || parent >= n) continue;

    const cur = current[child];
    if (!isMissingKeypoint(cur)) continue;

    const curParent = current[parent];
    if (isMissingKeypoint(curParent)) {
      diagnostics.info("parent_missing", `Joint ${child} left missing: parent ${parent} is missing`, child);
      continue;
    }

    const refChild = reference[child];
    const refParent = reference[parent];
    if (isMissingKeypoint(refChild) || isMissingKeypoint(refParent)) {
      diagnostics.info(
        "reference_missing",
        `Joint ${child} left missing: reference has no ${isMissingKeypoint(refChild) ? "child" : "parent"} position`,
        child,
      );
      continue;
    }

    let offset = transformOffset(refChild.x - refParent.x, refChild.y - refParent.y, affine);
    if (affine === null && options.scaleFallback) {
      offset = scaleByParentBone(offset, parent, parentOf.get(parent), current, reference, n);
    }

    const confidence = reduceConfidence(
      Math.min(curParent.confidence, refChild.confidence),
      options,
    );
    current[child] = {
      x: curParent.x + offset.x,
      y: curParent.y + offset.y,
      confidence,
    };
    restored++;

    diagnostics.info(
      "restored",
      `Joint ${child} restored from parent ${parent} at (${current[child].x.toFixed(1)}, ${current[child].y.toFixed(1)})`,
      child,
    );
  }

  return restored;
}

/**
 * Scale an offset by |current parent bone| / |reference parent bone|, where
 * the parent bone runs from the grandparent to the parent. Offsets are
 * returned unchanged when the bone cannot be measured on both sides.
 */
function scaleByParentBone(
  offset: Vec2,
  parent: number,
  grandparent: number | undefined,
  current: KeypointGroup,
  reference: KeypointGroup,
  n: number,
): Vec2 {
  if (grandparent === undefined || grandparent >= n) return offset;

  const joints = [current[parent], current[grandparent], reference[parent], reference[grandparent]];
  if (joints.some(isMissingKeypoint)) return offset;

  const refBone = distance(reference[parent], reference[grandparent]);
  if (refBone === 0) return offset;

  const scale = distance(current[parent], current[grandparent]) / refBone;
  return { x: offset.x * scale, y: offset.y * scale };
}
