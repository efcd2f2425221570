// Prosody Insight - Emotion Analyzer
// Classifies each transcript segment into a discrete emotion from the prosody
// windows it overlaps, then aggregates a session mood on the valence/arousal
// plane. Deterministic: an ordered rule table, first match wins.

import { DEFAULT_EMOTION_THRESHOLDS, type EmotionThresholds } from "./config.js";
import { clamp, deepFreeze, formatPercent, mean, overlappingVoicedWindows, standardDeviation } from "./utils.js";
import type {
  EmotionFeatures,
  EmotionResult,
  EmotionSegment,
  EmotionTag,
  Logger,
  ProsodyResult,
  ProsodyWindow,
  TranscriptSegment,
} from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const DEFAULT_CONFIDENCE = 0.5;
const NO_PROSODY_CONFIDENCE = 0.3;
const FALLBACK_CONFIDENCE = 0.4;

/** Position of each tag on the valence (-1..1) and arousal (0..1) axes */
export const EMOTION_COORDINATES: Readonly<Record<EmotionTag, { valence: number; arousal: number }>> =
  Object.freeze({
    excited: { valence: 0.7, arousal: 0.85 },
    confident: { valence: 0.5, arousal: 0.5 },
    calm: { valence: 0.3, arousal: 0.15 },
    neutral: { valence: 0, arousal: 0.3 },
    uncertain: { valence: -0.3, arousal: 0.4 },
    sad: { valence: -0.6, arousal: 0.2 },
    stressed: { valence: -0.5, arousal: 0.8 },
    angry: { valence: -0.8, arousal: 0.9 },
  });

export const ANGRY_WARNING =
  "You may have dictated this while frustrated, review before sending?";
export const STRESSED_WARNING =
  "Elevated stress detected in your speech, consider reviewing the tone.";

// ─── Rule Table ─────────────────────────────────────────────────────────────────

export interface EmotionRule {
  readonly emotion: EmotionTag;
  readonly matches: (f: EmotionFeatures, t: EmotionThresholds) => boolean;
  readonly confidence: (f: EmotionFeatures, t: EmotionThresholds) => number;
}

/**
 * Evaluated in order; the first matching rule decides the segment's emotion.
 */
export const EMOTION_RULES: readonly EmotionRule[] = Object.freeze([
  {
    // Loud and high
    emotion: "angry",
    matches: (f, t) => f.energyDelta > t.highEnergyDelta && f.pitchDelta > t.highPitchDelta,
    confidence: (f) => clamp((f.energyDelta / 10 + f.pitchDelta) * 0.8, 0.4, 0.95),
  },
  {
    // Jumpy pitch, above-baseline energy
    emotion: "stressed",
    matches: (f, t) => f.pitchStdDev > t.highPitchVariability && f.energyDelta > 0,
    confidence: (f) => clamp(f.pitchStdDev * 2, 0.4, 0.9),
  },
  {
    emotion: "excited",
    matches: (f, t) => f.energyDelta > t.highEnergyDelta && f.pitchTrend > t.risingPitchTrend,
    confidence: (f) => clamp((f.energyDelta / 8 + f.pitchTrend) * 0.7, 0.4, 0.9),
  },
  {
    emotion: "sad",
    matches: (f, t) => f.energyDelta < t.veryLowEnergyDelta && f.pitchTrend < t.fallingPitchTrend,
    confidence: (f) => clamp((Math.abs(f.energyDelta) / 12) * 0.8, 0.35, 0.85),
  },
  {
    emotion: "uncertain",
    matches: (f, t) => f.energyDelta < t.lowEnergyDelta && f.pitchStdDev > t.uncertainPitchVariability,
    confidence: (f) => clamp((Math.abs(f.energyDelta) / 8 + f.pitchStdDev) * 0.6, 0.35, 0.85),
  },
  {
    emotion: "confident",
    matches: (f, t) =>
      f.energyDelta > t.confidentMinEnergyDelta &&
      f.energyDelta < t.highEnergyDelta &&
      f.pitchStdDev < t.steadyPitchVariability,
    confidence: (f, t) => clamp((1 - f.pitchStdDev / t.steadyPitchVariability) * 0.7, 0.4, 0.85),
  },
  {
    emotion: "calm",
    matches: (f, t) => f.energyDelta < 0 && f.pitchStdDev < t.calmPitchVariability,
    confidence: () => 0.5,
  },
]);

// ─── Feature extraction ─────────────────────────────────────────────────────────

/**
 * Summarise the windows of one segment. Pitch trend compares the mean pitch
 * delta of the second half against the first and needs at least 3 windows.
 */
export function extractEmotionFeatures(windows: readonly ProsodyWindow[]): EmotionFeatures {
  const pitchDeltas = windows.map((w) => w.pitchDelta);

  let pitchTrend = 0;
  if (windows.length >= 3) {
    const half = Math.floor(windows.length / 2);
    pitchTrend = mean(pitchDeltas.slice(half)) - mean(pitchDeltas.slice(0, half));
  }

  return {
    energyDelta: mean(windows.map((w) => w.energyDelta)),
    pitchDelta: mean(pitchDeltas),
    pitchStdDev: standardDeviation(pitchDeltas),
    pitchTrend,
  };
}

export function classifyEmotion(
  features: EmotionFeatures,
  thresholds: EmotionThresholds = DEFAULT_EMOTION_THRESHOLDS,
  rules: readonly EmotionRule[] = EMOTION_RULES,
): { emotion: EmotionTag; confidence: number } {
  for (const rule of rules) {
    if (rule.matches(features, thresholds)) {
      return { emotion: rule.emotion, confidence: rule.confidence(features, thresholds) };
    }
  }
  return { emotion: "neutral", confidence: FALLBACK_CONFIDENCE };
}

// ─── Emotion Analyzer ───────────────────────────────────────────────────────────

export class EmotionAnalyzer {
  private readonly thresholds: EmotionThresholds;
  private readonly logger?: Logger;

  constructor(thresholds: EmotionThresholds = DEFAULT_EMOTION_THRESHOLDS, logger?: Logger) {
    this.thresholds = thresholds;
    this.logger = logger;
  }

  analyze(
    segments: readonly TranscriptSegment[] | null | undefined,
    prosody: ProsodyResult | null | undefined,
  ): EmotionResult {
    if (!segments || segments.length === 0 || !prosody?.ok) {
      return deepFreeze(neutralResult());
    }

    const emotionSegments = segments.map((seg): EmotionSegment => {
      const overlapping = overlappingVoicedWindows(prosody.windows, seg.startTime, seg.endTime);
      const { emotion, confidence } =
        overlapping.length === 0
          ? { emotion: "neutral" as const, confidence: NO_PROSODY_CONFIDENCE }
          : classifyEmotion(extractEmotionFeatures(overlapping), this.thresholds);

      return {
        startTime: seg.startTime,
        endTime: seg.endTime,
        emotion,
        confidence,
        text: seg.text,
      };
    });

    const result = this.aggregate(emotionSegments);
    this.logger?.info(
      `Emotion: dominant=${result.dominantEmotion} (${formatPercent(result.dominantConfidence)}), ` +
        `valence=${result.valence.toFixed(2)}, arousal=${result.arousal.toFixed(2)}`,
    );
    if (result.shouldWarn) {
      this.logger?.warn(`Emotion warning: ${result.warningMessage}`);
    }

    return deepFreeze(result);
  }

  /**
   * Session mood: the tag with the highest summed confidence wins (earliest
   * tag on ties); valence and arousal are confidence-weighted means.
   */
  private aggregate(segments: EmotionSegment[]): EmotionResult {
    const scores = new Map<EmotionTag, number>();
    for (const seg of segments) {
      scores.set(seg.emotion, (scores.get(seg.emotion) ?? 0) + seg.confidence);
    }

    let dominantEmotion: EmotionTag = "neutral";
    let dominantScore = -Infinity;
    for (const [emotion, score] of scores) {
      if (score > dominantScore) {
        dominantEmotion = emotion;
        dominantScore = score;
      }
    }
    const dominantConfidence = dominantScore / segments.length;

    let valenceSum = 0;
    let arousalSum = 0;
    for (const seg of segments) {
      valenceSum += EMOTION_COORDINATES[seg.emotion].valence * seg.confidence;
      arousalSum += EMOTION_COORDINATES[seg.emotion].arousal * seg.confidence;
    }

    let warningMessage: string | null = null;
    if (dominantEmotion === "angry" && dominantConfidence > this.thresholds.angryWarningConfidence) {
      warningMessage = ANGRY_WARNING;
    } else if (
      dominantEmotion === "stressed" &&
      dominantConfidence > this.thresholds.stressedWarningConfidence
    ) {
      warningMessage = STRESSED_WARNING;
    }

    return {
      segments,
      dominantEmotion,
      dominantConfidence,
      valence: clamp(valenceSum / segments.length, -1, 1),
      arousal: clamp(arousalSum / segments.length, 0, 1),
      shouldWarn: warningMessage !== null,
      warningMessage,
    };
  }
}

function neutralResult(): EmotionResult {
  return {
    segments: [],
    dominantEmotion: "neutral",
    dominantConfidence: DEFAULT_CONFIDENCE,
    valence: 0,
    arousal: 0,
    shouldWarn: false,
    warningMessage: null,
  };
}
