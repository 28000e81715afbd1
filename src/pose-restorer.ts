/**
 * Document-level restoration: the operation the server exposes.
 *
 * Parses both containers, pairs each current person with a reference person
 * and restores every pair with {@link restoreFrame}. The output carries the
 * clipped export frames in the container shape the current pose arrived in.
 *
 * Pairing: person i ↔ reference person i; a single-person reference serves
 * every current person. People without a counterpart come back unchanged.
 * A group whose field was malformed in the current pose is never restored or
 * filled; it is re-encoded as it arrived.
 */

import { DiagnosticsCollector } from "./diagnostics.js";
import { restoreFrame } from "./frame-restorer.js";
import { encodeDocument, parsePoseInput } from "./pose-codec.js";
import {
  DEFAULT_RESTORE_OPTIONS,
  type DecodedDocument,
  type DocumentRestoreResult,
  type GroupName,
  type PoseFrame,
  type RestoreOptions,
} from "./types.js";

export function restorePoseDocument(
  current: unknown,
  reference: unknown,
  options: RestoreOptions = DEFAULT_RESTORE_OPTIONS,
): DocumentRestoreResult {
  const diagnostics = new DiagnosticsCollector();

  const parsed = parsePoseInput(current, diagnostics);
  if (!parsed.ok) return parsed;

  let refDoc: DecodedDocument | null = null;
  if (reference !== undefined && reference !== null) {
    const refParsed = parsePoseInput(reference, new DiagnosticsCollector());
    if (!refParsed.ok) {
      if (refParsed.error.kind !== "empty") {
        return {
          ok: false,
          error: { kind: refParsed.error.kind, message: `Reference pose: ${refParsed.error.message}` },
        };
      }
      diagnostics.warn("no_reference", "Reference pose holds no people; nothing to restore from");
    } else {
      refDoc = refParsed.document;
    }
  }

  const frames = parsed.document.people.map((person, i) => {
    const scoped = diagnostics.scoped({ person: i });
    const refFrame = pickReference(refDoc, i);
    if (refDoc !== null && refFrame === null) {
      scoped.warn("person_unpaired", `Person ${i} has no reference counterpart; returned unchanged`);
    }
    const usable = refFrame === null ? null : withoutGroups(refFrame, person.skipped);
    return restoreFrame(person.frame, usable, options, scoped).exported;
  });

  return {
    ok: true,
    pose: encodeDocument(parsed.document, frames),
    diagnostics: diagnostics.entries,
  };
}

function withoutGroups(frame: PoseFrame, groups: readonly GroupName[]): PoseFrame {
  const out: PoseFrame = { ...frame };
  for (const name of groups) out[name] = null;
  return out;
}

function pickReference(refDoc: DecodedDocument | null, person: number): PoseFrame | null {
  if (refDoc === null) return null;
  if (refDoc.people.length === 1) return refDoc.people[0].frame;
  return refDoc.people[person]?.frame ?? null;
}
