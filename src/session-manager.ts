// Pose Restorer - Session Manager
// Per-connection streaming state: the current reference pose and options.
//
// Each restored frame's export copy becomes the reference for the next
// frame, so a stream of partially detected poses is repaired against the
// most recent good frame. Out-of-canvas keypoints are already zeroed in that
// copy and never leak into the next frame's restoration.

import { v4 as uuidv4 } from "uuid";
import { parsePoseInput } from "./pose-codec.js";
import { restorePoseDocument } from "./pose-restorer.js";
import { resolveRestoreOptions } from "./restore-options.js";
import {
  DEFAULT_RESTORE_OPTIONS,
  type DocumentRestoreResult,
  type RestoreOptions,
} from "./types.js";

export interface RestoreSession {
  id: string;
  /** Reference pose for the next frame, in wire form. */
  reference: unknown;
  options: RestoreOptions;
  /** Frames restored since the session started or was last reset. */
  framesRestored: number;
}

export class SessionManager {
  private sessions = new Map<string, RestoreSession>();
  private defaultOptions: RestoreOptions;

  constructor(defaultOptions: RestoreOptions = DEFAULT_RESTORE_OPTIONS) {
    this.defaultOptions = { ...defaultOptions };
  }

  createSession(): RestoreSession {
    const session: RestoreSession = {
      id: uuidv4(),
      reference: null,
      options: { ...this.defaultOptions },
      framesRestored: 0,
    };
    this.sessions.set(session.id, session);
    return session;
  }

  getSession(sessionId: string): RestoreSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`Session not found: ${sessionId}`);
    }
    return session;
  }

  removeSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Replace the session's reference. Throws if the pose cannot be parsed or
   * holds no people. Returns the number of people in the reference.
   */
  setReference(sessionId: string, pose: unknown): number {
    const session = this.getSession(sessionId);
    const parsed = parsePoseInput(pose);
    if (!parsed.ok) {
      throw new Error(`Invalid reference pose (${parsed.error.kind}): ${parsed.error.message}`);
    }
    session.reference = pose;
    return parsed.document.people.length;
  }

  /** Merge option overrides into the session's options. Throws on invalid values. */
  setOptions(sessionId: string, options: unknown): RestoreOptions {
    const session = this.getSession(sessionId);
    const resolved = resolveRestoreOptions(options, session.options);
    if (!resolved.ok) {
      throw new Error(`Invalid options: ${resolved.errors.join("; ")}`);
    }
    session.options = resolved.options;
    return session.options;
  }

  /**
   * Restore one frame against the session's reference. On success the
   * exported result becomes the next reference.
   */
  restoreFrame(sessionId: string, pose: unknown): DocumentRestoreResult {
    const session = this.getSession(sessionId);
    const result = restorePoseDocument(pose, session.reference, session.options);
    if (result.ok) {
      session.reference = result.pose;
      session.framesRestored++;
    }
    return result;
  }

  /** Forget the reference; the next frame passes through unchanged. */
  reset(sessionId: string): void {
    const session = this.getSession(sessionId);
    session.reference = null;
    session.framesRestored = 0;
  }
}
