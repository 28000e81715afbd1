// Pose Restorer - HTTP and WebSocket server
//
// HTTP:      POST /restore (one-shot restoration), POST /render (SVG skeleton),
//            GET /health.
// WebSocket: streaming restoration, one session per connection; each
//            restored frame becomes the reference for the next one.
//
// Restoration is synchronous and in-memory; nothing is written to disk.

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import { DEFAULT_CONFIG } from "./config.js";
import { parsePoseInput } from "./pose-codec.js";
import { restorePoseDocument } from "./pose-restorer.js";
import { resolveRestoreOptions } from "./restore-options.js";
import { SessionManager } from "./session-manager.js";
import { DEFAULT_RENDER_OPTIONS, renderSkeletonSvg, type RenderOptions } from "./skeleton-renderer.js";
import type { ClientMessage, PoseParseError, RestoreOptions, ServerMessage } from "./types.js";

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  sessionId: string;
  idleTimer: ReturnType<typeof setTimeout> | null;
}

// ─── Logging ────────────────────────────────────────────────────────────────────

export interface ServerLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const defaultLogger: ServerLogger = {
  info: (msg, ...args) => console.log(`[INFO] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[WARN] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[ERROR] ${msg}`, ...args),
};

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  /** Custom logger. Defaults to console-based logger. */
  logger?: ServerLogger;
  /** Defaults for requests that carry no options. */
  restoreOptions?: RestoreOptions;
  /** Externally provided SessionManager (for testing). Created internally if omitted. */
  sessionManager?: SessionManager;
  /** Request body limit for express.json(). */
  maxBodySize?: string;
  /** Idle time after which a streaming connection is closed. */
  sessionIdleTimeoutMs?: number;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start listening on the given port. Resolves with the bound port. */
  listen(port: number): Promise<number>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions = {}): AppServer {
  const {
    logger = defaultLogger,
    restoreOptions = DEFAULT_CONFIG.restoreOptions,
    sessionManager = new SessionManager(restoreOptions),
    maxBodySize = DEFAULT_CONFIG.maxBodySize,
    sessionIdleTimeoutMs = DEFAULT_CONFIG.sessionIdleTimeoutMs,
  } = options;

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: maxBodySize }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", sessions: sessionManager.size });
  });

  app.post("/restore", (req, res) => {
    const body: unknown = req.body;
    if (!isObject(body) || body.pose === undefined) {
      res.status(400).json(errorBody("unrecognized_shape", 'Request body must be an object with a "pose" field'));
      return;
    }

    const resolved = resolveRestoreOptions(body.options, restoreOptions);
    if (!resolved.ok) {
      res.status(400).json(errorBody("invalid_options", resolved.errors.join("; ")));
      return;
    }

    const result = restorePoseDocument(body.pose, body.reference, resolved.options);
    if (!result.ok) {
      logger.warn(`Restore rejected: ${result.error.message}`);
      res.status(statusFor(result.error)).json({ error: result.error });
      return;
    }

    res.json({ pose: result.pose, diagnostics: result.diagnostics });
  });

  app.post("/render", (req, res) => {
    const body: unknown = req.body;
    if (!isObject(body)) {
      res.status(400).json(errorBody("unrecognized_shape", "Request body must be an object"));
      return;
    }

    const parsed = parsePoseInput(body.pose);
    if (!parsed.ok) {
      res.status(statusFor(parsed.error)).json({ error: parsed.error });
      return;
    }

    const renderOptions = readRenderOptions(body);
    const { document } = parsed;
    const svg = renderSkeletonSvg(
      document.people.map((p) => p.frame),
      document.canvasWidth,
      document.canvasHeight,
      renderOptions,
    );
    res.type("image/svg+xml").send(svg);
  });

  // Malformed JSON bodies and other middleware failures
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error(`Request failed: ${err.message}`);
    const status = "status" in err && typeof err.status === "number" ? err.status : 500;
    res.status(status).json(errorBody(status === 500 ? "internal_error" : "bad_request", err.message));
  });

  // WebSocket server attached to the HTTP server
  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, sessionManager, logger, sessionIdleTimeoutMs);
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const bound = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`Server listening on port ${bound}`);
          resolve(bound);
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        // Close all WebSocket connections
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── HTTP Helpers ───────────────────────────────────────────────────────────────

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorBody(kind: string, message: string): { error: { kind: string; message: string } } {
  return { error: { kind, message } };
}

/** 400 when the input cannot be parsed; 422 when it parsed but holds nothing to restore. */
function statusFor(error: PoseParseError): number {
  return error.kind === "empty" ? 422 : 400;
}

function readRenderOptions(body: Record<string, unknown>): RenderOptions {
  const flag = (value: unknown, fallback: boolean): boolean =>
    typeof value === "boolean" ? value : fallback;
  return {
    drawBody: flag(body.draw_body, DEFAULT_RENDER_OPTIONS.drawBody),
    drawHands: flag(body.draw_hands, DEFAULT_RENDER_OPTIONS.drawHands),
    drawFace: flag(body.draw_face, DEFAULT_RENDER_OPTIONS.drawFace),
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(
  ws: WebSocket,
  sessionManager: SessionManager,
  logger: ServerLogger,
  idleTimeoutMs: number,
): void {
  // Each WebSocket connection gets its own session
  const session = sessionManager.createSession();

  const connState: ConnectionState = {
    sessionId: session.id,
    idleTimer: null,
  };

  logger.info(`New WebSocket connection, session ${session.id}`);
  sendMessage(ws, { type: "session_started", sessionId: session.id });
  resetIdleTimer(ws, connState, logger, idleTimeoutMs);

  ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
    resetIdleTimer(ws, connState, logger, idleTimeoutMs);
    try {
      if (isBinary) {
        sendMessage(ws, {
          type: "error",
          message: "Binary frames are not supported; send JSON messages.",
          recoverable: true,
        });
        return;
      }
      const text = Buffer.isBuffer(data) ? data.toString("utf-8") : String(data);
      const message = parseClientMessage(JSON.parse(text));
      if (message === null) {
        sendMessage(ws, {
          type: "error",
          message: 'Message must be an object with a known "type"',
          recoverable: true,
        });
        return;
      }
      handleClientMessage(ws, message, connState, sessionManager, logger);
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Error handling message for session ${connState.sessionId}: ${errorMessage}`);
      sendMessage(ws, {
        type: "error",
        message: errorMessage,
        recoverable: true,
      });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, session ${connState.sessionId}`);
    cleanupConnection(connState, sessionManager);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for session ${connState.sessionId}: ${err.message}`);
    cleanupConnection(connState, sessionManager);
  });
}

/** Narrow an arbitrary JSON value to a ClientMessage, or null. */
export function parseClientMessage(value: unknown): ClientMessage | null {
  if (!isObject(value)) return null;
  switch (value.type) {
    case "set_reference":
      return { type: "set_reference", pose: value.pose };
    case "set_options":
      return { type: "set_options", options: value.options };
    case "restore_frame":
      return { type: "restore_frame", pose: value.pose };
    case "reset":
      return { type: "reset" };
    default:
      return null;
  }
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: ServerLogger,
): void {
  switch (message.type) {
    case "set_reference": {
      const people = sessionManager.setReference(connState.sessionId, message.pose);
      logger.info(`Reference set for session ${connState.sessionId} (${people} people)`);
      sendMessage(ws, { type: "reference_set", people });
      break;
    }

    case "set_options": {
      const options = sessionManager.setOptions(connState.sessionId, message.options);
      sendMessage(ws, { type: "options_set", options });
      break;
    }

    case "restore_frame": {
      const result = sessionManager.restoreFrame(connState.sessionId, message.pose);
      if (!result.ok) {
        logger.warn(`Frame rejected for session ${connState.sessionId}: ${result.error.message}`);
        sendMessage(ws, { type: "error", message: result.error.message, recoverable: true });
        return;
      }
      const { framesRestored } = sessionManager.getSession(connState.sessionId);
      sendMessage(ws, {
        type: "restored",
        pose: result.pose,
        diagnostics: result.diagnostics,
        framesRestored,
      });
      break;
    }

    case "reset":
      sessionManager.reset(connState.sessionId);
      sendMessage(ws, { type: "reset_done" });
      break;

    default: {
      const exhaustiveCheck: never = message;
      sendMessage(ws, {
        type: "error",
        message: `Unknown message type: ${JSON.stringify(exhaustiveCheck)}`,
        recoverable: true,
      });
    }
  }
}

// ─── Idle Timeout ───────────────────────────────────────────────────────────────

function resetIdleTimer(
  ws: WebSocket,
  connState: ConnectionState,
  logger: ServerLogger,
  idleTimeoutMs: number,
): void {
  if (connState.idleTimer !== null) clearTimeout(connState.idleTimer);
  connState.idleTimer = setTimeout(() => {
    connState.idleTimer = null;
    logger.info(`Session ${connState.sessionId} idle for ${idleTimeoutMs}ms, closing`);
    ws.close(1000, "Idle timeout");
  }, idleTimeoutMs);
  connState.idleTimer.unref();
}

// ─── Utilities ──────────────────────────────────────────────────────────────────

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

// ─── Connection Cleanup ─────────────────────────────────────────────────────────

function cleanupConnection(connState: ConnectionState, sessionManager: SessionManager): void {
  if (connState.idleTimer !== null) {
    clearTimeout(connState.idleTimer);
    connState.idleTimer = null;
  }
  sessionManager.removeSession(connState.sessionId);
}
