/**
 * Pose container codec.
 *
 * Canonicalizes the pose containers seen in the wild into one typed
 * {@link DecodedDocument}, and encodes restored frames back into the shape
 * they arrived in.
 *
 * Accepted containers:
 *  - a document `{ people: [...], canvas_width?, canvas_height? }`
 *  - a bare person record `{ pose_keypoints_2d: [...], ... }`
 *  - a list of person records
 *  - a list of documents (the first one is used)
 *  - any of the above as a JSON string
 *
 * Each group field is a flat list of (x, y, confidence) triples. An absent or
 * `null` field decodes to a `null` group; an empty list to an empty group. A
 * field of the wrong type is skipped with a diagnostic, listed in the person's
 * `skipped` groups and re-encoded untouched; the remaining fields are still
 * decoded.
 */

import { DiagnosticsCollector } from "./diagnostics.js";
import {
  DEFAULT_CANVAS_SIZE,
  type DecodedDocument,
  type DecodedPerson,
  type GroupName,
  type KeypointGroup,
  type PersonRecord,
  type PoseDocument,
  type PoseFrame,
  type PoseOutput,
  type PoseParseResult,
} from "./types.js";

// ─── Field names ────────────────────────────────────────────────────────────────

const FIELD_ENTRIES: ReadonlyArray<readonly [GroupName, string]> = [
  ["body", "pose_keypoints_2d"],
  ["leftHand", "hand_left_keypoints_2d"],
  ["rightHand", "hand_right_keypoints_2d"],
  ["face", "face_keypoints_2d"],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function looksLikePerson(value: unknown): value is PersonRecord {
  return isRecord(value) && FIELD_ENTRIES.some(([, field]) => field in value);
}

function looksLikeDocument(value: unknown): value is Record<string, unknown> & { people: unknown } {
  return isRecord(value) && "people" in value;
}

// ─── Decode ─────────────────────────────────────────────────────────────────────

/** Decode a flat triple list. Returns null for an absent or malformed field. */
export function decodeGroup(
  value: unknown,
  diagnostics: DiagnosticsCollector,
): KeypointGroup | null {
  if (value === undefined || value === null) return null;

  if (!Array.isArray(value) || !value.every((v) => typeof v === "number" && Number.isFinite(v))) {
    diagnostics.warn("field_skipped", "Field is not a flat list of numbers; skipped");
    return null;
  }
  const numbers: number[] = value;
  const usable = numbers.length - (numbers.length % 3);
  if (usable !== numbers.length) {
    diagnostics.warn(
      "partial_triple_dropped",
      `Field length ${numbers.length} is not a multiple of 3; trailing ${numbers.length - usable} value(s) dropped`,
    );
  }

  const group: KeypointGroup = [];
  for (let i = 0; i < usable; i += 3) {
    group.push({ x: numbers[i], y: numbers[i + 1], confidence: numbers[i + 2] });
  }
  return group;
}

export function decodePerson(
  record: PersonRecord,
  canvasWidth: number,
  canvasHeight: number,
  diagnostics: DiagnosticsCollector,
): DecodedPerson {
  const frame: PoseFrame = {
    body: null,
    leftHand: null,
    rightHand: null,
    face: null,
    canvasWidth,
    canvasHeight,
  };
  const skipped: GroupName[] = [];
  for (const [name, field] of FIELD_ENTRIES) {
    const value = record[field];
    const group = decodeGroup(value, diagnostics.scoped({ group: name }));
    if (group === null && value !== undefined && value !== null) skipped.push(name);
    frame[name] = group;
  }
  return { frame, record, skipped };
}

function readCanvasSize(
  value: unknown,
  field: string,
  diagnostics: DiagnosticsCollector,
): number {
  if (value === undefined || value === null) return DEFAULT_CANVAS_SIZE;
  if (typeof value === "number" && Number.isFinite(value) && value > 0) return value;
  diagnostics.warn(
    "field_skipped",
    `${field} must be a positive number, got ${JSON.stringify(value)}; using ${DEFAULT_CANVAS_SIZE}`,
  );
  return DEFAULT_CANVAS_SIZE;
}

/**
 * Canonicalize any supported container. Shape problems come back as an
 * error variant: `unrecognized_shape` when the input cannot be parsed,
 * `empty` when it parsed but holds no people.
 */
export function parsePoseInput(
  input: unknown,
  diagnostics: DiagnosticsCollector = new DiagnosticsCollector(),
): PoseParseResult {
  let value = input;
  if (typeof value === "string") {
    try {
      value = JSON.parse(value);
    } catch {
      return {
        ok: false,
        error: { kind: "unrecognized_shape", message: "Pose input is a string but not valid JSON" },
      };
    }
  }

  if (Array.isArray(value)) {
    if (value.length === 0) {
      return { ok: false, error: { kind: "empty", message: "Pose input is an empty list" } };
    }
    if (looksLikeDocument(value[0])) {
      return decodeDocument(value[0], "document", diagnostics);
    }
    if (value.every(isRecord)) {
      return decodeDocument({ people: value }, "people", diagnostics);
    }
    return {
      ok: false,
      error: { kind: "unrecognized_shape", message: "Pose list must hold person records or documents" },
    };
  }

  if (looksLikeDocument(value)) return decodeDocument(value, "document", diagnostics);
  if (looksLikePerson(value)) return decodeDocument({ people: [value] }, "person", diagnostics);

  const described = value === null ? "null" : typeof value;
  return {
    ok: false,
    error: {
      kind: "unrecognized_shape",
      message: `Unsupported pose container: ${described}. Expected a document with "people", a person record, or a list of either`,
    },
  };
}

function decodeDocument(
  source: Record<string, unknown> & { people: unknown },
  shape: DecodedDocument["shape"],
  diagnostics: DiagnosticsCollector,
): PoseParseResult {
  const { people } = source;
  if (!Array.isArray(people)) {
    return {
      ok: false,
      error: { kind: "unrecognized_shape", message: '"people" must be a list of person records' },
    };
  }
  if (people.length === 0) {
    return { ok: false, error: { kind: "empty", message: "Pose document has no people" } };
  }

  const badIndex = people.findIndex((p) => !isRecord(p));
  if (badIndex !== -1) {
    return {
      ok: false,
      error: { kind: "unrecognized_shape", message: `people[${badIndex}] is not a person record` },
    };
  }

  const records: PersonRecord[] = people;
  const canvasWidth = readCanvasSize(source.canvas_width, "canvas_width", diagnostics);
  const canvasHeight = readCanvasSize(source.canvas_height, "canvas_height", diagnostics);

  const decoded: DecodedPerson[] = records.map((record, person) =>
    decodePerson(record, canvasWidth, canvasHeight, diagnostics.scoped({ person })),
  );

  return {
    ok: true,
    document: {
      shape,
      people: decoded,
      canvasWidth,
      canvasHeight,
      source: { ...source, people: records },
    },
    diagnostics: diagnostics.entries,
  };
}

// ─── Encode ─────────────────────────────────────────────────────────────────────

export function encodeGroup(group: KeypointGroup): number[] {
  const out: number[] = [];
  for (const kp of group) out.push(kp.x, kp.y, kp.confidence);
  return out;
}

/**
 * Re-encode `frame` over `record`. Fields the frame does not carry (absent or
 * skipped on decode) keep the record's original value.
 */
export function encodePerson(frame: PoseFrame, record: PersonRecord): PersonRecord {
  const out: PersonRecord = { ...record };
  for (const [name, field] of FIELD_ENTRIES) {
    const group = frame[name];
    if (group) out[field] = encodeGroup(group);
  }
  return out;
}

/** Encode one frame per person back into the container shape of `doc`. */
export function encodeDocument(doc: DecodedDocument, frames: PoseFrame[]): PoseOutput {
  const people = doc.people.map((person, i) => encodePerson(frames[i] ?? person.frame, person.record));
  switch (doc.shape) {
    case "person":
      return people[0];
    case "people":
      return people;
    case "document":
      return { ...doc.source, people };
  }
}
