// Prosody Insight - Shared TypeScript interfaces and types
// Every analysis result is produced once per utterance and frozen afterwards.

// ─── Audio Input ────────────────────────────────────────────────────────────────

/**
 * A recorded utterance: 16-bit signed little-endian PCM, mono.
 */
export interface PcmAudio {
  samples: Buffer;
  sampleRate: number;
}

// ─── Prosody ────────────────────────────────────────────────────────────────────

/**
 * Acoustic features for one analysis window (50ms window, 25ms hop by default).
 */
export interface ProsodyWindow {
  readonly startTime: number; // seconds
  readonly endTime: number; // seconds
  /** Fundamental frequency in Hz, 0 when unvoiced or silent */
  readonly pitchHz: number;
  /** (pitch - baseline) / baseline, clamped to [-1, 1]; 0 for unvoiced windows */
  readonly pitchDelta: number;
  /** RMS energy in dB relative to full scale */
  readonly energyDb: number;
  /** energyDb - baseline energy */
  readonly energyDelta: number;
  readonly isSilence: boolean;
  /** Voiced but very quiet */
  readonly isWhisper: boolean;
}

/** Window features before the session baseline is known */
export type RawProsodyWindow = Omit<ProsodyWindow, "pitchDelta" | "energyDelta">;

export interface PauseEvent {
  readonly startTime: number;
  readonly endTime: number;
  readonly durationMs: number;
}

export type ProsodyFailureReason =
  | "unreadable" // container could not be parsed
  | "format" // not 16-bit mono PCM, or an invalid sample rate
  | "empty" // zero-length buffer
  | "too_short" // shorter than one analysis window
  | "cancelled";

export interface ProsodySuccess {
  readonly ok: true;
  readonly windows: readonly ProsodyWindow[];
  readonly pauses: readonly PauseEvent[];
  readonly baselinePitchHz: number;
  readonly baselineEnergyDb: number;
}

export interface ProsodyFailure {
  readonly ok: false;
  readonly reason: ProsodyFailureReason;
  readonly error: string;
}

export type ProsodyResult = ProsodySuccess | ProsodyFailure;

// ─── Transcript ─────────────────────────────────────────────────────────────────

export interface TranscriptSegment {
  text: string;
  startTime: number; // seconds from utterance start
  endTime: number; // seconds from utterance start
}

// ─── Hesitation ─────────────────────────────────────────────────────────────────

export type HesitationType =
  | "filler_word"
  | "self_correction"
  | "uncertainty"
  | "fatigue_warning"
  | "topic_change";

export interface HesitationAnnotation {
  readonly type: HesitationType;
  readonly startTime: number;
  readonly endTime: number;
  /** The affected text span (empty for fatigue and topic changes) */
  readonly text: string;
  readonly suggestion: string | null;
  /** 0 = low, 1 = certain */
  readonly confidence: number;
}

export interface HesitationResult {
  readonly annotations: readonly HesitationAnnotation[];
  /** 0 = constant hesitation, 1 = perfectly fluent */
  readonly fluencyScore: number;
  /** 0 = fresh, 1 = severe speech-rate decline */
  readonly fatigueLevel: number;
  readonly fillerCount: number;
  readonly selfCorrectionCount: number;
}

/** "union" searches every supported lexicon; "detected-only" trusts the detected language */
export type LexiconPolicy = "union" | "detected-only";

// ─── Emotion ────────────────────────────────────────────────────────────────────

export type EmotionTag =
  | "neutral"
  | "angry"
  | "stressed"
  | "excited"
  | "sad"
  | "uncertain"
  | "confident"
  | "calm";

export interface EmotionSegment {
  readonly startTime: number;
  readonly endTime: number;
  readonly emotion: EmotionTag;
  readonly confidence: number;
  readonly text: string;
}

export interface EmotionResult {
  readonly segments: readonly EmotionSegment[];
  readonly dominantEmotion: EmotionTag;
  readonly dominantConfidence: number;
  /** -1 (negative) .. +1 (positive) */
  readonly valence: number;
  /** 0 (calm) .. 1 (intense) */
  readonly arousal: number;
  readonly shouldWarn: boolean;
  readonly warningMessage: string | null;
}

/** Per-segment features the emotion rules are evaluated against */
export interface EmotionFeatures {
  energyDelta: number;
  pitchDelta: number;
  pitchStdDev: number;
  pitchTrend: number;
}

// ─── Logging ────────────────────────────────────────────────────────────────────

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}
