// Prosody Insight - Server entry point
// Loads configuration from the environment (and .env) and starts the server.

import "dotenv/config";
import { AnalysisPipeline } from "./analysis-pipeline.js";
import { ConfigError, loadConfigFromEnv, type RuntimeConfig } from "./config.js";
import { APP_NAME, APP_VERSION } from "./index.js";
import { createAppServer } from "./server.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let runtime: RuntimeConfig;
try {
  runtime = loadConfigFromEnv(process.env);
} catch (err) {
  if (err instanceof ConfigError) {
    logFatal(err.message);
    process.exit(1);
  }
  throw err;
}

const { port, analysis } = runtime;
logInit(
  `Pitch range ${analysis.prosody.minPitchHz}-${analysis.prosody.maxPitchHz}Hz, ` +
    `lexicon policy "${analysis.hesitation.lexiconPolicy}"`,
);

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({ pipeline: new AnalysisPipeline(analysis) });

server
  .listen(port)
  .then((boundPort) => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${boundPort}`);
    logInit("Pipeline: Prosody → Formatter | Hesitation | Emotion → Summary");
    logInit("Ready for connections");
  })
  .catch((err: unknown) => {
    logFatal(`Failed to start server: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });

const shutdown = (signal: string) => {
  logInit(`${signal} received, shutting down`);
  server
    .close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logFatal(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
