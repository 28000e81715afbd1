// Keypoint predicates and copy helpers.
//
// A keypoint is missing only when x, y and confidence are all exactly zero.
// No epsilon: a low-confidence detection at a non-zero position is present.

import type { Keypoint, KeypointGroup, PoseFrame } from "./types.js";

/** Minimum confidence for a keypoint to take part in transform fitting or anchoring. */
export const CONFIDENCE_THRESHOLD = 0.3;

export function isMissing(x: number, y: number, confidence: number): boolean {
  return x === 0 && y === 0 && confidence === 0;
}

export function isMissingKeypoint(kp: Keypoint): boolean {
  return isMissing(kp.x, kp.y, kp.confidence);
}

/** Present and strictly above the confidence threshold. */
export function isConfident(kp: Keypoint, threshold: number = CONFIDENCE_THRESHOLD): boolean {
  return !isMissingKeypoint(kp) && kp.confidence > threshold;
}

export function missingKeypoint(): Keypoint {
  return { x: 0, y: 0, confidence: 0 };
}

export function cloneGroup(group: KeypointGroup): KeypointGroup {
  return group.map((kp) => ({ x: kp.x, y: kp.y, confidence: kp.confidence }));
}

export function cloneFrame(frame: PoseFrame): PoseFrame {
  return {
    body: frame.body ? cloneGroup(frame.body) : null,
    leftHand: frame.leftHand ? cloneGroup(frame.leftHand) : null,
    rightHand: frame.rightHand ? cloneGroup(frame.rightHand) : null,
    face: frame.face ? cloneGroup(frame.face) : null,
    canvasWidth: frame.canvasWidth,
    canvasHeight: frame.canvasHeight,
  };
}

export function distance(p: Keypoint, q: Keypoint): number {
  return Math.hypot(p.x - q.x, p.y - q.y);
}
