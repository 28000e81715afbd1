/**
 * Affine estimation between a reference group and a current group.
 *
 * Fits the map reference → current from the joints both groups observe with
 * confidence above {@link CONFIDENCE_THRESHOLD}:
 *  - fewer than 3 correspondences: no transform (null);
 *  - exactly 3: the unique map through the three pairs;
 *  - more than 3: independent least squares for x′ and y′ over all pairs.
 *
 * Degenerate source geometry (collinear or coincident points) yields null
 * rather than a numerically meaningless map.
 */

import { isConfident } from "./keypoint.js";
import type { AffineTransform, Correspondence, KeypointGroup } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const MIN_CORRESPONDENCES = 3;

/** |sin θ| between the two source edges below which a 3-point fit is rejected. */
const COLLINEARITY_EPSILON = 1e-3;

/** Relative determinant of the centred normal matrix below which least squares is rejected. */
const SINGULARITY_EPSILON = 1e-9;

// ─── Correspondences ────────────────────────────────────────────────────────────

/**
 * Pairs (reference[i], current[i]) for every index in the overlapping range
 * where both keypoints are present and confident.
 */
export function buildCorrespondences(
  current: KeypointGroup,
  reference: KeypointGroup,
): Correspondence[] {
  const n = Math.min(current.length, reference.length);
  const pairs: Correspondence[] = [];
  for (let i = 0; i < n; i++) {
    const ref = reference[i];
    const cur = current[i];
    if (isConfident(ref) && isConfident(cur)) {
      pairs.push({ index: i, reference: ref, current: cur });
    }
  }
  return pairs;
}

// ─── Estimation ─────────────────────────────────────────────────────────────────

export function estimateAffine(
  current: KeypointGroup,
  reference: KeypointGroup,
): AffineTransform | null {
  return estimateAffineFromCorrespondences(buildCorrespondences(current, reference));
}

export function estimateAffineFromCorrespondences(
  pairs: Correspondence[],
): AffineTransform | null {
  if (pairs.length < MIN_CORRESPONDENCES) return null;
  if (pairs.length === MIN_CORRESPONDENCES) return solveExact(pairs);
  return solveLeastSquares(pairs);
}

/**
 * Exact solve through three point pairs, expressed relative to the first
 * pair so the translation drops out of the 2×2 system.
 */
function solveExact(pairs: Correspondence[]): AffineTransform | null {
  const [p0, p1, p2] = pairs;
  const e1x = p1.reference.x - p0.reference.x;
  const e1y = p1.reference.y - p0.reference.y;
  const e2x = p2.reference.x - p0.reference.x;
  const e2y = p2.reference.y - p0.reference.y;

  const det = e1x * e2y - e1y * e2x;
  const norms = Math.hypot(e1x, e1y) * Math.hypot(e2x, e2y);
  if (norms === 0 || Math.abs(det) <= COLLINEARITY_EPSILON * norms) return null;

  const du1 = p1.current.x - p0.current.x;
  const du2 = p2.current.x - p0.current.x;
  const dv1 = p1.current.y - p0.current.y;
  const dv2 = p2.current.y - p0.current.y;

  const a = (du1 * e2y - du2 * e1y) / det;
  const b = (e1x * du2 - e2x * du1) / det;
  const c = (dv1 * e2y - dv2 * e1y) / det;
  const d = (e1x * dv2 - e2x * dv1) / det;

  return {
    a,
    b,
    tx: p0.current.x - a * p0.reference.x - b * p0.reference.y,
    c,
    d,
    ty: p0.current.y - c * p0.reference.x - d * p0.reference.y,
  };
}

/**
 * Least squares over all pairs. Each output coordinate is fitted on its own
 * (p·x + q·y + r); centring on the means reduces each fit to a 2×2 system
 * sharing one normal matrix, with r recovered from the means.
 */
function solveLeastSquares(pairs: Correspondence[]): AffineTransform | null {
  const n = pairs.length;
  let mx = 0;
  let my = 0;
  let mu = 0;
  let mv = 0;
  for (const p of pairs) {
    mx += p.reference.x;
    my += p.reference.y;
    mu += p.current.x;
    mv += p.current.y;
  }
  mx /= n;
  my /= n;
  mu /= n;
  mv /= n;

  let sxx = 0;
  let sxy = 0;
  let syy = 0;
  let sxu = 0;
  let syu = 0;
  let sxv = 0;
  let syv = 0;
  for (const p of pairs) {
    const x = p.reference.x - mx;
    const y = p.reference.y - my;
    const u = p.current.x - mu;
    const v = p.current.y - mv;
    sxx += x * x;
    sxy += x * y;
    syy += y * y;
    sxu += x * u;
    syu += y * u;
    sxv += x * v;
    syv += y * v;
  }

  const det = sxx * syy - sxy * sxy;
  const spread = sxx + syy;
  if (spread === 0 || det <= SINGULARITY_EPSILON * spread * spread) return null;

  const a = (sxu * syy - syu * sxy) / det;
  const b = (syu * sxx - sxu * sxy) / det;
  const c = (sxv * syy - syv * sxy) / det;
  const d = (syv * sxx - sxv * sxy) / det;

  return {
    a,
    b,
    tx: mu - a * mx - b * my,
    c,
    d,
    ty: mv - c * mx - d * my,
  };
}
