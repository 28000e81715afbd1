/**
 * Joint hierarchies for the body (OpenPose COCO-18) and hand (21-joint) groups.
 *
 * Body joint order:
 *   0 nose, 1 neck, 2 r-shoulder, 3 r-elbow, 4 r-wrist, 5 l-shoulder,
 *   6 l-elbow, 7 l-wrist, 8 r-hip, 9 r-knee, 10 r-ankle, 11 l-hip,
 *   12 l-knee, 13 l-ankle, 14 r-eye, 15 l-eye, 16 r-ear, 17 l-ear
 *
 * Hand joint order: 0 wrist, then four joints per finger from base to tip
 * (thumb 1–4, index 5–8, middle 9–12, ring 13–16, little 17–20).
 *
 * Tables are stored by child index; {@link topologicalOrder} turns them into
 * a parent-before-child walk once, at module load.
 */

import type { HierarchyTable } from "./types.js";

export const BODY = {
  NOSE: 0,
  NECK: 1,
  RIGHT_SHOULDER: 2,
  RIGHT_ELBOW: 3,
  RIGHT_WRIST: 4,
  LEFT_SHOULDER: 5,
  LEFT_ELBOW: 6,
  LEFT_WRIST: 7,
  RIGHT_HIP: 8,
  RIGHT_KNEE: 9,
  RIGHT_ANKLE: 10,
  LEFT_HIP: 11,
  LEFT_KNEE: 12,
  LEFT_ANKLE: 13,
  RIGHT_EYE: 14,
  LEFT_EYE: 15,
  RIGHT_EAR: 16,
  LEFT_EAR: 17,
} as const;

export const BODY_HIERARCHY: HierarchyTable = [
  [BODY.NOSE, BODY.NECK],
  [BODY.RIGHT_SHOULDER, BODY.NECK],
  [BODY.RIGHT_ELBOW, BODY.RIGHT_SHOULDER],
  [BODY.RIGHT_WRIST, BODY.RIGHT_ELBOW],
  [BODY.LEFT_SHOULDER, BODY.NECK],
  [BODY.LEFT_ELBOW, BODY.LEFT_SHOULDER],
  [BODY.LEFT_WRIST, BODY.LEFT_ELBOW],
  [BODY.RIGHT_HIP, BODY.NECK],
  [BODY.RIGHT_KNEE, BODY.RIGHT_HIP],
  [BODY.RIGHT_ANKLE, BODY.RIGHT_KNEE],
  [BODY.LEFT_HIP, BODY.NECK],
  [BODY.LEFT_KNEE, BODY.LEFT_HIP],
  [BODY.LEFT_ANKLE, BODY.LEFT_KNEE],
  [BODY.RIGHT_EYE, BODY.NOSE],
  [BODY.LEFT_EYE, BODY.NOSE],
  [BODY.RIGHT_EAR, BODY.RIGHT_EYE],
  [BODY.LEFT_EAR, BODY.LEFT_EYE],
];

const FINGER_BASES = [1, 5, 9, 13, 17];

/** Each finger base hangs off the wrist; every other joint off its predecessor. */
export const HAND_HIERARCHY: HierarchyTable = Array.from({ length: 20 }, (_, k) => {
  const child = k + 1;
  return [child, FINGER_BASES.includes(child) ? 0 : child - 1] as const;
});

/**
 * OpenPose limb sequence (0-based joint pairs) with one colour per limb, in
 * the order the reference renderer draws them.
 */
export const BODY_LIMBS: ReadonlyArray<readonly [number, number]> = [
  [1, 2], [1, 5], [2, 3], [3, 4],
  [5, 6], [6, 7], [1, 8], [8, 9],
  [9, 10], [1, 11], [11, 12], [12, 13],
  [1, 0], [0, 14], [14, 16], [0, 15],
  [15, 17],
];

export const BODY_COLORS: ReadonlyArray<readonly [number, number, number]> = [
  [255, 0, 0], [255, 85, 0], [255, 170, 0], [255, 255, 0],
  [170, 255, 0], [85, 255, 0], [0, 255, 0], [0, 255, 85],
  [0, 255, 170], [0, 255, 255], [0, 170, 255], [0, 85, 255],
  [0, 0, 255], [85, 0, 255], [170, 0, 255], [255, 0, 255],
  [255, 0, 170], [255, 0, 85],
];

// ─── Ordering ───────────────────────────────────────────────────────────────────

/**
 * Reorder a hierarchy table so every parent is emitted before any child that
 * depends on it. Entries already in a valid position keep their relative
 * order. Throws on a self-parent, a child with two parents, or a cycle.
 */
export function topologicalOrder(table: HierarchyTable): HierarchyTable {
  const children = new Set<number>();
  for (const [child, parent] of table) {
    if (child === parent) {
      throw new Error(`Joint ${child} cannot be its own parent`);
    }
    if (children.has(child)) {
      throw new Error(`Joint ${child} has more than one parent`);
    }
    children.add(child);
  }

  // Roots: joints that appear only as parents.
  const resolved = new Set<number>();
  for (const [, parent] of table) {
    if (!children.has(parent)) resolved.add(parent);
  }

  const ordered: Array<readonly [number, number]> = [];
  const pending = [...table];
  while (pending.length > 0) {
    let progressed = false;
    for (let i = 0; i < pending.length; ) {
      const [child, parent] = pending[i];
      if (resolved.has(parent)) {
        ordered.push([child, parent]);
        resolved.add(child);
        pending.splice(i, 1);
        progressed = true;
      } else {
        i++;
      }
    }
    if (!progressed) {
      const stuck = pending.map(([child]) => child).join(", ");
      throw new Error(`Hierarchy contains a cycle through joints: ${stuck}`);
    }
  }
  return ordered;
}

export const BODY_ORDER = topologicalOrder(BODY_HIERARCHY);
export const HAND_ORDER = topologicalOrder(HAND_HIERARCHY);
