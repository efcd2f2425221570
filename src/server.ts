// Prosody Insight - HTTP API and WebSocket session server
//
// Privacy: audio is held in memory for the lifetime of one connection (or one
// request) only. Nothing is written to disk.

import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { v4 as uuidv4 } from "uuid";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { AnalysisPipeline } from "./analysis-pipeline.js";
import { createConsoleLogger } from "./logger.js";
import {
  RequestValidationError,
  analyzeRequestSchema,
  clientMessageSchema,
  parseRequest,
  toAnalysisResponse,
  type ClientMessage,
  type ServerMessage,
} from "./protocol.js";
import type { Logger } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Expected audio format for the handshake; any integer sample rate is accepted */
const EXPECTED_FORMAT = {
  channels: 1 as const,
  encoding: "LINEAR16" as const,
};

/** Max buffered speech per connection in seconds (25 minutes) */
const MAX_SPEECH_DURATION_SECONDS = 1500;

/** JSON body limit for POST /api/analyze (base64 PCM is large) */
const MAX_REQUEST_BODY = "64mb";

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  connectionId: string;
  /** Set once the audio_format handshake succeeds */
  sampleRate: number | null;
  audioChunks: Buffer[];
  bufferedBytes: number;
  /** Controller of the in-flight analysis, if any */
  inFlight: AbortController | null;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
  /** Externally provided pipeline (for testing). Created with default config if omitted. */
  pipeline?: AnalysisPipeline;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  pipeline: AnalysisPipeline;
  /** Start listening on the given port. Resolves with the bound port. */
  listen(port: number): Promise<number>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions = {}): AppServer {
  const logger = options.logger ?? createConsoleLogger("Server");
  const pipeline = options.pipeline ?? new AnalysisPipeline(undefined, { logger });

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: MAX_REQUEST_BODY }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/api/analyze", (req, res, next) => {
    handleAnalyzeRequest(req, res, pipeline, logger).catch(next);
  });

  app.use(errorHandler(logger));

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, pipeline, logger);
  });

  return {
    app,
    httpServer,
    wss,
    pipeline,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const boundPort = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`Server listening on port ${boundPort}`);
          resolve(boundPort);
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
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

// ─── HTTP Handlers ──────────────────────────────────────────────────────────────

async function handleAnalyzeRequest(
  req: Request,
  res: Response,
  pipeline: AnalysisPipeline,
  logger: Logger,
): Promise<void> {
  const body = parseRequest(analyzeRequestSchema, req.body, "analyze request");
  const samples = Buffer.from(body.audio, "base64");
  logger.info(`Analyze request: ${samples.length} bytes at ${body.sampleRate}Hz`);

  const output = await pipeline.run({
    audio: { samples, sampleRate: body.sampleRate },
    text: body.text,
    segments: body.segments,
    language: body.language,
  });

  res.json(toAnalysisResponse(output, body.includeWindows));
}

function errorHandler(logger: Logger) {
  // Express recognises error middleware by its four parameters
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof RequestValidationError) {
      res.status(400).json({ error: err.message, issues: err.issues });
      return;
    }
    // body-parser marks malformed JSON with a 4xx status
    if (err instanceof SyntaxError || hasClientStatus(err)) {
      res.status(400).json({ error: err instanceof Error ? err.message : "Bad request" });
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`Unhandled request error: ${message}`);
    res.status(500).json({ error: "Internal server error" });
  };
}

function hasClientStatus(err: unknown): boolean {
  if (typeof err !== "object" || err === null || !("status" in err)) return false;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500;
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(ws: WebSocket, pipeline: AnalysisPipeline, logger: Logger): void {
  const connState: ConnectionState = {
    connectionId: uuidv4(),
    sampleRate: null,
    audioChunks: [],
    bufferedBytes: 0,
    inFlight: null,
  };

  logger.info(`New WebSocket connection ${connState.connectionId}`);

  ws.on("message", (data: RawData, isBinary: boolean) => {
    try {
      if (isBinary) {
        handleBinaryMessage(ws, toBuffer(data), connState, logger);
      } else {
        const message = parseClientMessage(toBuffer(data).toString("utf-8"));
        handleClientMessage(ws, message, connState, pipeline, logger);
      }
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Error handling message for connection ${connState.connectionId}: ${errorMessage}`);
      sendMessage(ws, { type: "error", message: errorMessage, recoverable: true });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, connection ${connState.connectionId}`);
    cleanupConnection(connState);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for connection ${connState.connectionId}: ${err.message}`);
    cleanupConnection(connState);
  });
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function parseClientMessage(text: string): ClientMessage {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new RequestValidationError("Message is not valid JSON");
  }
  return parseRequest(clientMessageSchema, json, "message");
}

// ─── Binary Message Handler (Audio Chunks) ──────────────────────────────────────

function handleBinaryMessage(
  ws: WebSocket,
  data: Buffer,
  connState: ConnectionState,
  logger: Logger,
): void {
  if (connState.sampleRate === null) {
    sendMessage(ws, {
      type: "audio_format_error",
      message: "Audio format handshake required before sending audio chunks.",
    });
    return;
  }

  // 16-bit PCM = 2 bytes per sample
  if (data.length % 2 !== 0) {
    sendMessage(ws, {
      type: "audio_format_error",
      message: `Audio chunk byte length (${data.length}) is not a multiple of 2. Expected 16-bit aligned PCM data.`,
    });
    return;
  }

  const maxBytes = connState.sampleRate * 2 * MAX_SPEECH_DURATION_SECONDS;
  if (connState.bufferedBytes + data.length > maxBytes) {
    logger.warn(`Audio limit reached for connection ${connState.connectionId}`);
    sendMessage(ws, {
      type: "error",
      message: `Buffered audio exceeds ${MAX_SPEECH_DURATION_SECONDS} seconds; send "analyze" or "reset".`,
      recoverable: true,
    });
    return;
  }

  connState.audioChunks.push(Buffer.from(data));
  connState.bufferedBytes += data.length;
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  connState: ConnectionState,
  pipeline: AnalysisPipeline,
  logger: Logger,
): void {
  switch (message.type) {
    case "audio_format":
      handleAudioFormat(ws, message, connState, logger);
      break;

    case "analyze":
      handleAnalyze(ws, message, connState, pipeline, logger).catch((err: unknown) => {
        const errorMessage = err instanceof Error ? err.message : String(err);
        logger.error(`Analysis failed for connection ${connState.connectionId}: ${errorMessage}`);
        sendMessage(ws, { type: "error", message: errorMessage, recoverable: true });
      });
      break;

    case "cancel":
      if (!connState.inFlight) {
        sendMessage(ws, { type: "error", message: "No analysis in progress.", recoverable: true });
        return;
      }
      logger.info(`Cancelling analysis for connection ${connState.connectionId}`);
      connState.inFlight.abort();
      break;

    case "reset":
      clearAudio(connState);
      logger.info(`Audio buffer cleared for connection ${connState.connectionId}`);
      break;

    default: {
      const exhaustiveCheck: never = message;
      throw new RequestValidationError(`Unknown message: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

// ─── Audio Format Handshake ─────────────────────────────────────────────────────

function handleAudioFormat(
  ws: WebSocket,
  message: Extract<ClientMessage, { type: "audio_format" }>,
  connState: ConnectionState,
  logger: Logger,
): void {
  const errors: string[] = [];

  if (message.channels !== EXPECTED_FORMAT.channels) {
    errors.push(`Expected ${EXPECTED_FORMAT.channels} channel(s), got ${message.channels}`);
  }
  if (!Number.isInteger(message.sampleRate) || message.sampleRate <= 0) {
    errors.push(`Expected a positive integer sample rate, got ${message.sampleRate}`);
  }
  if (message.encoding !== EXPECTED_FORMAT.encoding) {
    errors.push(`Expected encoding "${EXPECTED_FORMAT.encoding}", got "${message.encoding}"`);
  }

  if (errors.length > 0) {
    const errorMsg = `Audio format validation failed: ${errors.join("; ")}`;
    logger.warn(`${errorMsg} (connection ${connState.connectionId})`);
    sendMessage(ws, { type: "audio_format_error", message: errorMsg });
    return;
  }

  // A new format invalidates audio buffered under the old one
  clearAudio(connState);
  connState.sampleRate = message.sampleRate;
  logger.info(`Audio format validated for connection ${connState.connectionId} (${message.sampleRate}Hz)`);
}

// ─── Analyze ────────────────────────────────────────────────────────────────────

async function handleAnalyze(
  ws: WebSocket,
  message: Extract<ClientMessage, { type: "analyze" }>,
  connState: ConnectionState,
  pipeline: AnalysisPipeline,
  logger: Logger,
): Promise<void> {
  if (connState.sampleRate === null) {
    sendMessage(ws, {
      type: "audio_format_error",
      message: "Audio format handshake required before analysis.",
    });
    return;
  }
  if (connState.inFlight) {
    sendMessage(ws, { type: "error", message: "Analysis already in progress.", recoverable: true });
    return;
  }

  // The buffered utterance is consumed by this run
  const samples = Buffer.concat(connState.audioChunks);
  clearAudio(connState);

  const controller = new AbortController();
  connState.inFlight = controller;
  logger.info(`Analyzing ${samples.length} bytes for connection ${connState.connectionId}`);

  try {
    const output = await pipeline.run(
      {
        audio: { samples, sampleRate: connState.sampleRate },
        text: message.text,
        segments: message.segments,
        language: message.language,
      },
      { signal: controller.signal },
    );

    if (!output.prosody.ok && output.prosody.reason === "cancelled") {
      sendMessage(ws, { type: "analysis_cancelled" });
      return;
    }
    sendMessage(ws, { type: "analysis_result", result: toAnalysisResponse(output, message.includeWindows) });
  } finally {
    connState.inFlight = null;
  }
}

// ─── Message Sending ────────────────────────────────────────────────────────────

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

// ─── Connection Cleanup ─────────────────────────────────────────────────────────

function clearAudio(connState: ConnectionState): void {
  connState.audioChunks = [];
  connState.bufferedBytes = 0;
}

function cleanupConnection(connState: ConnectionState): void {
  connState.inFlight?.abort();
  clearAudio(connState);
}

// ─── Exports for Testing ────────────────────────────────────────────────────────

export { EXPECTED_FORMAT, MAX_SPEECH_DURATION_SECONDS };
