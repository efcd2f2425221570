// Prosody Insight - Wire protocol
// Request/message schemas for the HTTP API and the WebSocket session, plus the
// JSON shape analysis results take on the wire.

import { z } from "zod";
import type { AnalysisOutput } from "./analysis-pipeline.js";
import type {
  EmotionResult,
  HesitationResult,
  PauseEvent,
  ProsodyFailureReason,
  ProsodyWindow,
} from "./types.js";

// ─── Schemas ────────────────────────────────────────────────────────────────────

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export const transcriptSegmentSchema = z
  .object({
    text: z.string(),
    startTime: z.number().nonnegative(),
    endTime: z.number().nonnegative(),
  })
  .refine((seg) => seg.endTime >= seg.startTime, {
    message: "endTime must be >= startTime",
  });

const transcriptFields = {
  text: z.string(),
  segments: z.array(transcriptSegmentSchema).default([]),
  language: z.string().min(1).nullish(),
};

/** Body of POST /api/analyze */
export const analyzeRequestSchema = z.object({
  /** Base64-encoded 16-bit mono little-endian PCM */
  audio: z.string().regex(BASE64, "audio must be base64-encoded PCM"),
  sampleRate: z.number().int().positive(),
  ...transcriptFields,
  includeWindows: z.boolean().default(false),
});

export const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("audio_format"),
    channels: z.number().int(),
    sampleRate: z.number(),
    encoding: z.string(),
  }),
  z.object({
    type: z.literal("analyze"),
    ...transcriptFields,
    includeWindows: z.boolean().default(false),
  }),
  z.object({ type: z.literal("cancel") }),
  z.object({ type: z.literal("reset") }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

// ─── Errors ─────────────────────────────────────────────────────────────────────

export class RequestValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "RequestValidationError";
  }
}

/**
 * Validate `input` against `schema`, throwing RequestValidationError with one
 * "path: message" entry per issue.
 */
export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string,
): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || what}: ${issue.message}`,
    );
    throw new RequestValidationError(`Invalid ${what}: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

// ─── Responses ──────────────────────────────────────────────────────────────────

export type ProsodySummary =
  | {
      ok: true;
      windowCount: number;
      voicedWindowCount: number;
      pauses: readonly PauseEvent[];
      baselinePitchHz: number;
      baselineEnergyDb: number;
      windows?: readonly ProsodyWindow[];
    }
  | { ok: false; reason: ProsodyFailureReason; error: string };

export interface AnalysisResponse {
  prosody: ProsodySummary;
  text: string;
  formattedText: string;
  hesitation: HesitationResult | null;
  emotion: EmotionResult | null;
  warning: string | null;
}

export type ServerMessage =
  | { type: "analysis_result"; result: AnalysisResponse }
  | { type: "analysis_cancelled" }
  | { type: "audio_format_error"; message: string }
  | { type: "error"; message: string; recoverable: boolean };

/**
 * Shape a pipeline output for JSON. Per-window data is large, so it is only
 * included on request.
 */
export function toAnalysisResponse(output: AnalysisOutput, includeWindows: boolean): AnalysisResponse {
  const { prosody } = output;
  const summary: ProsodySummary = prosody.ok
    ? {
        ok: true,
        windowCount: prosody.windows.length,
        voicedWindowCount: prosody.windows.filter((w) => w.pitchHz > 0).length,
        pauses: prosody.pauses,
        baselinePitchHz: prosody.baselinePitchHz,
        baselineEnergyDb: prosody.baselineEnergyDb,
        ...(includeWindows ? { windows: prosody.windows } : {}),
      }
    : { ok: false, reason: prosody.reason, error: prosody.error };

  return {
    prosody: summary,
    text: output.text,
    formattedText: output.formattedText,
    hesitation: output.hesitation,
    emotion: output.emotion,
    warning: output.warning,
  };
}
