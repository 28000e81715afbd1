// Pose Restorer - Server Unit Tests
// HTTP endpoints and the WebSocket streaming protocol.

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import WebSocket from "ws";
import { createAppServer, parseClientMessage, type AppServer } from "./server.js";
import { BODY } from "./skeleton.js";
import type { Diagnostic, ServerMessage } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

/** Silent logger for tests */
function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** Document with one person whose body has only the given joints present. */
function bodyDocument(points: Record<number, [number, number, number]>) {
  const flat = Array.from({ length: 18 }, (_, i) => points[i] ?? [0, 0, 0]).flat();
  return { people: [{ pose_keypoints_2d: flat }], canvas_width: 512, canvas_height: 512 };
}

interface RestoreBody {
  pose: { people: { pose_keypoints_2d: number[] }[] };
  diagnostics: Diagnostic[];
}

interface ErrorBody {
  error: { kind: string; message: string };
}

async function readJson<T>(res: Response): Promise<T> {
  return JSON.parse(await res.text());
}

const REFERENCE = bodyDocument({
  [BODY.RIGHT_SHOULDER]: [300, 200, 0.9],
  [BODY.RIGHT_ELBOW]: [350, 150, 0.9],
});
const CURRENT = bodyDocument({ [BODY.RIGHT_SHOULDER]: [310, 200, 0.9] });

/**
 * A test WebSocket client that queues all incoming messages.
 * Messages are buffered so none are lost to race conditions.
 */
class TestClient {
  ws: WebSocket;
  private messageQueue: ServerMessage[] = [];
  private waiters: Array<(msg: ServerMessage) => void> = [];

  constructor(url: string) {
    this.ws = new WebSocket(url);
    this.ws.on("message", (data: WebSocket.RawData) => {
      const text = Buffer.isBuffer(data) ? data.toString("utf-8") : String(data);
      const msg: ServerMessage = JSON.parse(text);
      const waiter = this.waiters.shift();
      if (waiter) waiter(msg);
      else this.messageQueue.push(msg);
    });
  }

  /** Wait for the WebSocket to open */
  async waitForOpen(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN) return;
    return new Promise((resolve, reject) => {
      this.ws.on("open", resolve);
      this.ws.on("error", reject);
    });
  }

  /** Get the next message (from queue or wait for one) */
  nextMessage(timeoutMs = 3000): Promise<ServerMessage> {
    const queued = this.messageQueue.shift();
    if (queued) return Promise.resolve(queued);
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const idx = this.waiters.indexOf(waiterFn);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new Error(`nextMessage timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      const waiterFn = (msg: ServerMessage) => {
        clearTimeout(timer);
        resolve(msg);
      };
      this.waiters.push(waiterFn);
    });
  }

  sendJson(message: unknown): void {
    this.ws.send(JSON.stringify(message));
  }

  /** Wait for the server to close the connection */
  waitForClose(): Promise<{ code: number; reason: string }> {
    return new Promise((resolve) => {
      this.ws.on("close", (code: number, reason: Buffer) => resolve({ code, reason: reason.toString() }));
    });
  }

  close(): void {
    this.ws.close();
  }
}

// ─── HTTP ───────────────────────────────────────────────────────────────────────

describe("HTTP endpoints", () => {
  let server: AppServer;
  let baseUrl: string;
  let logger: ReturnType<typeof createSilentLogger>;

  beforeEach(async () => {
    logger = createSilentLogger();
    server = createAppServer({ logger });
    const port = await server.listen(0);
    baseUrl = `http://localhost:${port}`;
  });

  afterEach(async () => {
    await server.close();
  });

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  it("GET /health reports status and open sessions", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", sessions: 0 });
  });

  it("POST /restore restores against the supplied reference", async () => {
    const res = await post("/restore", { pose: CURRENT, reference: REFERENCE });
    expect(res.status).toBe(200);

    const body = await readJson<RestoreBody>(res);
    const elbow = BODY.RIGHT_ELBOW * 3;
    expect(body.pose.people[0].pose_keypoints_2d.slice(elbow, elbow + 2)).toEqual([360, 150]);
    expect(body.pose.people[0].pose_keypoints_2d[elbow + 2]).toBeCloseTo(0.63, 12);
    expect(body.diagnostics).toContainEqual(
      expect.objectContaining({ code: "restored", person: 0, group: "body", index: BODY.RIGHT_ELBOW }),
    );
  });

  it("POST /restore applies per-request options", async () => {
    const res = await post("/restore", {
      pose: CURRENT,
      reference: REFERENCE,
      options: { reduce_confidence: false },
    });
    const body = await readJson<RestoreBody>(res);
    expect(body.pose.people[0].pose_keypoints_2d[BODY.RIGHT_ELBOW * 3 + 2]).toBe(0.9);
  });

  it("POST /restore without a pose is a 400", async () => {
    const res = await post("/restore", { reference: REFERENCE });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { kind: "unrecognized_shape", message: 'Request body must be an object with a "pose" field' },
    });
  });

  it("POST /restore with invalid options is a 400", async () => {
    const res = await post("/restore", { pose: CURRENT, options: { confidence_reduction_factor: 3 } });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { kind: "invalid_options", message: "confidence_reduction_factor must be a number in [0, 1], got 3" },
    });
  });

  it("POST /restore with no people is a 422", async () => {
    const res = await post("/restore", { pose: { people: [] } });
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: { kind: "empty", message: "Pose document has no people" } });
    expect(logger.warn).toHaveBeenCalledWith("Restore rejected: Pose document has no people");
  });

  it("POST /restore with an unsupported pose is a 400", async () => {
    const res = await post("/restore", { pose: 42 });
    expect(res.status).toBe(400);
    expect((await readJson<ErrorBody>(res)).error.kind).toBe("unrecognized_shape");
  });

  it("answers malformed JSON with a 400", async () => {
    const res = await fetch(`${baseUrl}/restore`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{",
    });
    expect(res.status).toBe(400);
    expect((await readJson<ErrorBody>(res)).error.kind).toBe("bad_request");
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("POST /render returns an SVG", async () => {
    const res = await post("/render", { pose: REFERENCE, draw_face: false });
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toMatch(/^image\/svg\+xml/);

    const svg = await res.text();
    expect(svg.split("\n")[0]).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="512" height="512" viewBox="0 0 512 512">',
    );
    expect(svg).toContain('<line x1="300" y1="200" x2="350" y2="150" stroke="rgb(255,170,0)"');
  });

  it("POST /render with no people is a 422", async () => {
    const res = await post("/render", { pose: [] });
    expect(res.status).toBe(422);
  });
});

// ─── WebSocket ──────────────────────────────────────────────────────────────────

describe("WebSocket streaming", () => {
  let server: AppServer;
  let wsUrl: string;
  let client: TestClient;

  beforeEach(async () => {
    server = createAppServer({ logger: createSilentLogger() });
    const port = await server.listen(0);
    wsUrl = `ws://localhost:${port}`;
    client = new TestClient(wsUrl);
    await client.waitForOpen();
  });

  afterEach(async () => {
    client.close();
    await server.close();
  });

  it("starts a session on connect", async () => {
    const msg = await client.nextMessage();
    expect(msg.type).toBe("session_started");
    if (msg.type !== "session_started") return;
    expect(() => server.sessionManager.getSession(msg.sessionId)).not.toThrow();
  });

  it("restores frames against the reference, then against the last restored frame", async () => {
    await client.nextMessage(); // session_started

    client.sendJson({ type: "set_reference", pose: REFERENCE });
    expect(await client.nextMessage()).toEqual({ type: "reference_set", people: 1 });

    client.sendJson({ type: "set_options", options: { reduce_confidence: false } });
    expect(await client.nextMessage()).toEqual({
      type: "options_set",
      options: { reduceConfidence: false, confidenceReductionFactor: 0.7, scaleFallback: false },
    });

    client.sendJson({ type: "restore_frame", pose: CURRENT });
    const first = await client.nextMessage();
    expect(first).toMatchObject({ type: "restored", framesRestored: 1 });
    expect(first).toMatchObject({
      pose: { people: [{ pose_keypoints_2d: expect.arrayContaining([360, 150, 0.9]) }] },
    });

    client.sendJson({
      type: "restore_frame",
      pose: bodyDocument({ [BODY.RIGHT_SHOULDER]: [320, 200, 0.9] }),
    });
    const second = await client.nextMessage();
    if (second.type !== "restored") throw new Error(`Unexpected ${second.type}`);
    expect(second.framesRestored).toBe(2);
    const people: unknown = "people" in second.pose ? second.pose.people : null;
    if (!Array.isArray(people)) throw new Error("Expected a document");
    const elbow = BODY.RIGHT_ELBOW * 3;
    expect(people[0].pose_keypoints_2d.slice(elbow, elbow + 3)).toEqual([370, 150, 0.9]);
  });

  it("resets the stream", async () => {
    await client.nextMessage();
    client.sendJson({ type: "set_reference", pose: REFERENCE });
    await client.nextMessage();

    client.sendJson({ type: "reset" });
    expect(await client.nextMessage()).toEqual({ type: "reset_done" });

    client.sendJson({ type: "restore_frame", pose: CURRENT });
    const msg = await client.nextMessage();
    expect(msg).toMatchObject({ type: "restored", pose: CURRENT, framesRestored: 1 });
  });

  it("reports bad input as recoverable errors and keeps the connection open", async () => {
    await client.nextMessage();

    client.sendJson({ type: "dance" });
    expect(await client.nextMessage()).toEqual({
      type: "error",
      message: 'Message must be an object with a known "type"',
      recoverable: true,
    });

    client.sendJson({ type: "set_reference", pose: { people: [] } });
    expect(await client.nextMessage()).toEqual({
      type: "error",
      message: "Invalid reference pose (empty): Pose document has no people",
      recoverable: true,
    });

    client.sendJson({ type: "restore_frame", pose: 7 });
    const rejected = await client.nextMessage();
    expect(rejected).toMatchObject({ type: "error", recoverable: true });

    client.ws.send(Buffer.from([1, 2, 3]));
    expect(await client.nextMessage()).toEqual({
      type: "error",
      message: "Binary frames are not supported; send JSON messages.",
      recoverable: true,
    });

    expect(client.ws.readyState).toBe(WebSocket.OPEN);
  });

  it("rejects text that is not JSON", async () => {
    await client.nextMessage();
    client.ws.send("{");
    const msg = await client.nextMessage();
    expect(msg).toMatchObject({ type: "error", recoverable: true });
  });

  it("removes the session when the client disconnects", async () => {
    await client.nextMessage();
    expect(server.sessionManager.size).toBe(1);

    client.close();

    await vi.waitFor(() => expect(server.sessionManager.size).toBe(0));
  });
});

describe("Idle timeout", () => {
  it("closes a connection that stays silent", async () => {
    const server = createAppServer({ logger: createSilentLogger(), sessionIdleTimeoutMs: 50 });
    const port = await server.listen(0);
    const client = new TestClient(`ws://localhost:${port}`);
    const closed = client.waitForClose();
    await client.waitForOpen();

    expect(await closed).toEqual({ code: 1000, reason: "Idle timeout" });

    await server.close();
  });
});

// ─── Message Parsing ────────────────────────────────────────────────────────────

describe("parseClientMessage", () => {
  it("narrows known message types", () => {
    expect(parseClientMessage({ type: "reset", extra: 1 })).toEqual({ type: "reset" });
    expect(parseClientMessage({ type: "set_options", options: { a: 1 } })).toEqual({
      type: "set_options",
      options: { a: 1 },
    });
    expect(parseClientMessage({ type: "restore_frame", pose: "x" })).toEqual({ type: "restore_frame", pose: "x" });
  });

  it("returns null for anything else", () => {
    expect(parseClientMessage(null)).toBeNull();
    expect(parseClientMessage([])).toBeNull();
    expect(parseClientMessage({ type: "unknown" })).toBeNull();
    expect(parseClientMessage("reset")).toBeNull();
  });
});
