/**
 * Renders restored poses as an SVG skeleton on a black canvas.
 *
 * Body limbs follow the OpenPose limb sequence and colours; hand and face
 * points are drawn as small cyan dots. Only geometry inside the canvas is
 * drawn, and missing keypoints are skipped.
 */

import { isMissingKeypoint } from "./keypoint.js";
import { isOutsideCanvas } from "./canvas-clipper.js";
import { BODY_COLORS, BODY_LIMBS } from "./skeleton.js";
import type { Keypoint, KeypointGroup, PoseFrame } from "./types.js";

export interface RenderOptions {
  drawBody: boolean;
  drawHands: boolean;
  drawFace: boolean;
}

export const DEFAULT_RENDER_OPTIONS: Readonly<RenderOptions> = {
  drawBody: true,
  drawHands: true,
  drawFace: true,
};

const STICK_WIDTH = 4;
const JOINT_RADIUS = 3;
const POINT_RADIUS = 2;
const POINT_COLOR: readonly [number, number, number] = [0, 255, 255];

function rgb([r, g, b]: readonly [number, number, number]): string {
  return `rgb(${r},${g},${b})`;
}

/** Round to whole pixels, matching an integer raster. */
function px(value: number): number {
  return Math.trunc(value);
}

export function renderSkeletonSvg(
  frames: PoseFrame[],
  width: number,
  height: number,
  options: RenderOptions = DEFAULT_RENDER_OPTIONS,
): string {
  const visible = (kp: Keypoint | undefined): kp is Keypoint =>
    kp !== undefined && !isMissingKeypoint(kp) && !isOutsideCanvas(kp, width, height);

  const elements: string[] = [];

  for (const frame of frames) {
    if (options.drawBody && frame.body) {
      const body = frame.body;
      BODY_LIMBS.forEach(([from, to], i) => {
        const k1 = body[from];
        const k2 = body[to];
        if (!visible(k1) || !visible(k2)) return;
        elements.push(
          `<line x1="${px(k1.x)}" y1="${px(k1.y)}" x2="${px(k2.x)}" y2="${px(k2.y)}" ` +
            `stroke="${rgb(BODY_COLORS[i])}" stroke-width="${STICK_WIDTH}" stroke-linecap="round"/>`,
        );
      });
      body.forEach((kp, i) => {
        if (!visible(kp) || i >= BODY_COLORS.length) return;
        elements.push(circle(kp, JOINT_RADIUS, BODY_COLORS[i]));
      });
    }

    if (options.drawHands) {
      for (const hand of [frame.leftHand, frame.rightHand]) {
        if (hand) pushPoints(elements, hand, visible);
      }
    }

    if (options.drawFace && frame.face) {
      pushPoints(elements, frame.face, visible);
    }
  }

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="${width}" height="${height}" fill="rgb(0,0,0)"/>`,
    ...elements,
    "</svg>",
  ].join("\n");
}

function circle(kp: Keypoint, radius: number, color: readonly [number, number, number]): string {
  return `<circle cx="${px(kp.x)}" cy="${px(kp.y)}" r="${radius}" fill="${rgb(color)}"/>`;
}

function pushPoints(
  elements: string[],
  group: KeypointGroup,
  visible: (kp: Keypoint | undefined) => kp is Keypoint,
): void {
  for (const kp of group) {
    if (visible(kp)) elements.push(circle(kp, POINT_RADIUS, POINT_COLOR));
  }
}
