// Prosody Insight - Summary footers
// Compact one-line summaries appended to the transcript by the pipeline.

import { formatPercent } from "./utils.js";
import type { EmotionResult, EmotionTag, HesitationResult } from "./types.js";

/** Fatigue is mentioned only above this level */
export const FATIGUE_REPORT_LEVEL = 0.3;

const VALENCE_REPORT_LEVEL = 0.3;
const HIGH_AROUSAL_LEVEL = 0.7;
const MAX_ARC_ENTRIES = 3;

/** "stressed" → "Stressed" */
export function emotionLabel(tag: EmotionTag): string {
  return tag.charAt(0).toUpperCase() + tag.slice(1);
}

/**
 * ```
 * ---
 * [Hesitation Analysis] Fluency: 85% | Fillers: 2 | Self-corrections: 1
 * ```
 */
export function buildHesitationFooter(result: HesitationResult): string {
  const parts = [`Fluency: ${formatPercent(result.fluencyScore)}`];

  if (result.fillerCount > 0) parts.push(`Fillers: ${result.fillerCount}`);
  if (result.selfCorrectionCount > 0) parts.push(`Self-corrections: ${result.selfCorrectionCount}`);
  if (result.fatigueLevel > FATIGUE_REPORT_LEVEL) parts.push(`Fatigue: ${formatPercent(result.fatigueLevel)}`);

  const uncertain = result.annotations.filter((a) => a.type === "uncertainty").length;
  if (uncertain > 0) parts.push(`Uncertain phrases: ${uncertain}`);

  const topicShifts = result.annotations.filter((a) => a.type === "topic_change").length;
  if (topicShifts > 0) parts.push(`Topic shifts: ${topicShifts}`);

  return `\n---\n[Hesitation Analysis] ${parts.join(" | ")}`;
}

/**
 * ```
 * [Emotion] Mood: Calm (50%) | Valence: positive (0.45) | Arc: Calm(2) → Confident(1)
 * ```
 * The arc lists the most frequent non-neutral tags; ties keep first-seen order.
 */
export function buildEmotionFooter(result: EmotionResult): string {
  const parts = [
    `Mood: ${emotionLabel(result.dominantEmotion)} (${formatPercent(result.dominantConfidence)})`,
  ];

  if (result.valence < -VALENCE_REPORT_LEVEL) {
    parts.push(`Valence: negative (${result.valence.toFixed(2)})`);
  } else if (result.valence > VALENCE_REPORT_LEVEL) {
    parts.push(`Valence: positive (${result.valence.toFixed(2)})`);
  }

  if (result.arousal > HIGH_AROUSAL_LEVEL) parts.push("Energy: high");

  const counts = new Map<EmotionTag, number>();
  for (const seg of result.segments) {
    if (seg.emotion === "neutral") continue;
    counts.set(seg.emotion, (counts.get(seg.emotion) ?? 0) + 1);
  }
  // Array.prototype.sort is stable, so equal counts stay in first-seen order
  const arc = [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, MAX_ARC_ENTRIES)
    .map(([tag, count]) => `${emotionLabel(tag)}(${count})`);
  if (arc.length > 0) parts.push(`Arc: ${arc.join(" → ")}`);

  return `\n[Emotion] ${parts.join(" | ")}`;
}
