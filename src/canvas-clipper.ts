// Export-time canvas clipping.
//
// Keypoints outside [0, width) × [0, height) are replaced by the missing
// sentinel on a copy of the frame. The frame passed in keeps its full,
// unclipped precision for any further restoration math.

import type { DiagnosticsCollector } from "./diagnostics.js";
import { cloneFrame, isMissingKeypoint, missingKeypoint } from "./keypoint.js";
import { GROUP_NAMES, type Keypoint, type PoseFrame } from "./types.js";

export function isOutsideCanvas(kp: Keypoint, width: number, height: number): boolean {
  return kp.x < 0 || kp.x >= width || kp.y < 0 || kp.y >= height;
}

/** Deep copy of `frame` with every out-of-canvas keypoint zeroed. */
export function clipFrame(frame: PoseFrame, diagnostics?: DiagnosticsCollector): PoseFrame {
  const out = cloneFrame(frame);
  for (const name of GROUP_NAMES) {
    const group = out[name];
    if (!group) continue;
    for (let i = 0; i < group.length; i++) {
      const kp = group[i];
      if (isMissingKeypoint(kp)) continue;
      if (isOutsideCanvas(kp, out.canvasWidth, out.canvasHeight)) {
        diagnostics
          ?.scoped({ group: name })
          .info("clipped", `Keypoint at (${kp.x.toFixed(1)}, ${kp.y.toFixed(1)}) lies outside the canvas`, i);
        group[i] = missingKeypoint();
      }
    }
  }
  return out;
}
