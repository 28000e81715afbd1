// Pose Restorer - Entry point
// Loads configuration and starts the HTTP/WebSocket server.

import "dotenv/config";
import { loadConfig } from "./config.js";
import { createAppServer } from "./server.js";

export const APP_NAME = "Pose Restorer";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

const loaded = loadConfig(process.env);

if (!loaded.ok) {
  for (const error of loaded.errors) logFatal(error);
  logFatal("Invalid configuration. Fix your environment or .env file.");
  process.exit(1);
}

const { config } = loaded;
const { reduceConfidence, confidenceReductionFactor, scaleFallback } = config.restoreOptions;

logInit(
  `Restore defaults: reduce_confidence=${reduceConfidence}, ` +
    `confidence_reduction_factor=${confidenceReductionFactor}, scale_fallback=${scaleFallback}`,
);

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({
  restoreOptions: config.restoreOptions,
  maxBodySize: config.maxBodySize,
  sessionIdleTimeoutMs: config.sessionIdleTimeoutMs,
});

server
  .listen(config.port)
  .then((port) => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
    logInit("Endpoints: POST /restore, POST /render, GET /health, WebSocket streaming on /");
  })
  .catch((err: unknown) => {
    logFatal(`Failed to start server: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
