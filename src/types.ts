// Pose Restorer - Shared TypeScript interfaces and types

// ─── Keypoints ──────────────────────────────────────────────────────────────────

/**
 * A single 2D joint. The triple (0, 0, 0) is the missing sentinel; any other
 * value is a present keypoint, however low its confidence.
 */
export interface Keypoint {
  x: number;
  y: number;
  /** Detector confidence in [0, 1]. */
  confidence: number;
}

/** Ordered keypoints of one anatomical region. Index encodes joint identity. */
export type KeypointGroup = Keypoint[];

export type GroupName = "body" | "leftHand" | "rightHand" | "face";

export const GROUP_NAMES: readonly GroupName[] = ["body", "leftHand", "rightHand", "face"];

export const DEFAULT_CANVAS_SIZE = 512;

/**
 * One person's complete set of groups plus the canvas they were produced
 * against. A group the input did not carry is `null`.
 */
export interface PoseFrame {
  body: KeypointGroup | null;
  leftHand: KeypointGroup | null;
  rightHand: KeypointGroup | null;
  face: KeypointGroup | null;
  canvasWidth: number;
  canvasHeight: number;
}

// ─── Geometry ───────────────────────────────────────────────────────────────────

/**
 * 2×3 affine map [[a, b, tx], [c, d, ty]] from reference space to current space.
 */
export interface AffineTransform {
  a: number;
  b: number;
  tx: number;
  c: number;
  d: number;
  ty: number;
}

/** (child, parent) joint index pairs for one group type. */
export type HierarchyTable = ReadonlyArray<readonly [child: number, parent: number]>;

export interface Correspondence {
  index: number;
  reference: Keypoint;
  current: Keypoint;
}

// ─── Restoration ────────────────────────────────────────────────────────────────

export interface RestoreOptions {
  /** Multiply restored confidences by `confidenceReductionFactor`. Default: true. */
  reduceConfidence: boolean;
  /** Factor in [0, 1] applied to restored confidences. Default: 0.7. */
  confidenceReductionFactor: number;
  /**
   * When a group has no affine estimate, scale each offset by the ratio of the
   * parent's current bone to its reference bone. Default: false.
   */
  scaleFallback: boolean;
}

export const DEFAULT_RESTORE_OPTIONS: Readonly<RestoreOptions> = {
  reduceConfidence: true,
  confidenceReductionFactor: 0.7,
  scaleFallback: false,
};

export interface FrameRestoreResult {
  /** Working copy with full, unclipped precision. */
  restored: PoseFrame;
  /** Copy of `restored` with out-of-canvas keypoints zeroed. */
  exported: PoseFrame;
  diagnostics: Diagnostic[];
}

// ─── Diagnostics ────────────────────────────────────────────────────────────────

export type DiagnosticLevel = "info" | "warn";

export type DiagnosticCode =
  | "no_reference"
  | "affine_estimated"
  | "affine_unavailable"
  | "restored"
  | "parent_missing"
  | "reference_missing"
  | "no_anchor"
  | "group_filled_from_reference"
  | "field_skipped"
  | "partial_triple_dropped"
  | "person_unpaired"
  | "clipped";

export interface Diagnostic {
  level: DiagnosticLevel;
  code: DiagnosticCode;
  message: string;
  /** Index of the person within the document, when restoring a document. */
  person?: number;
  group?: GroupName;
  /** Joint index within the group. */
  index?: number;
}

// ─── Pose Container (wire format) ───────────────────────────────────────────────

/**
 * One person as carried on the wire: flat (x, y, confidence) triples per
 * group. Other fields (e.g. `person_id`) pass through untouched.
 */
export interface PersonRecord {
  pose_keypoints_2d?: number[] | null;
  hand_left_keypoints_2d?: number[] | null;
  hand_right_keypoints_2d?: number[] | null;
  face_keypoints_2d?: number[] | null;
  [extra: string]: unknown;
}

/** A detector frame: `people` plus optional `canvas_width` / `canvas_height`. */
export interface PoseDocument {
  people: PersonRecord[];
  [extra: string]: unknown;
}

export type PoseParseErrorKind = "unrecognized_shape" | "empty";

export interface PoseParseError {
  kind: PoseParseErrorKind;
  message: string;
}

/** A canonicalized person: decoded frame plus the record it came from. */
export interface DecodedPerson {
  frame: PoseFrame;
  record: PersonRecord;
  /** Groups whose field was present but malformed; left as they arrived. */
  skipped: GroupName[];
}

/** How the input container was laid out, so output can mirror it. */
export type PoseContainerShape = "document" | "person" | "people";

export interface DecodedDocument {
  shape: PoseContainerShape;
  people: DecodedPerson[];
  canvasWidth: number;
  canvasHeight: number;
  /** Top-level document fields other than `people`, kept for re-encoding. */
  source: PoseDocument;
}

export type PoseParseResult =
  | { ok: true; document: DecodedDocument; diagnostics: Diagnostic[] }
  | { ok: false; error: PoseParseError };

/** Restored output, in the same container shape as the input. */
export type PoseOutput = PoseDocument | PersonRecord | PersonRecord[];

export type DocumentRestoreResult =
  | { ok: true; pose: PoseOutput; diagnostics: Diagnostic[] }
  | { ok: false; error: PoseParseError };

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

export type ClientMessage =
  | { type: "set_reference"; pose: unknown }
  | { type: "set_options"; options: unknown }
  | { type: "restore_frame"; pose: unknown }
  | { type: "reset" };

export type ServerMessage =
  | { type: "session_started"; sessionId: string }
  | { type: "reference_set"; people: number }
  | { type: "options_set"; options: RestoreOptions }
  | { type: "restored"; pose: PoseOutput; diagnostics: Diagnostic[]; framesRestored: number }
  | { type: "reset_done" }
  | { type: "error"; message: string; recoverable: boolean };
