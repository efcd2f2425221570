// Prosody Insight - Prosody Formatter
// Maps how something was said onto typography:
//   loud            → **bold**
//   whispered/quiet → *italic*
//   rising ending   → ?
//   loud + falling  → !
//   long pause      → paragraph break, medium pause → line break

import { DEFAULT_FORMATTER_CONFIG, type FormatterConfig } from "./config.js";
import { mean, overlappingVoicedWindows } from "./utils.js";
import type { Logger, PauseEvent, ProsodyResult, TranscriptSegment } from "./types.js";

const SENTENCE_PUNCTUATION = new Set([".", "!", "?", ",", ";", ":", "…"]);

// ─── Text helpers ───────────────────────────────────────────────────────────────

/**
 * Wrap the non-whitespace core of `text` in `marker`, leaving leading and
 * trailing whitespace outside the markers.
 */
export function wrapEmphasis(text: string, marker: string): string {
  const match = /^(\s*)(.*?)(\s*)$/s.exec(text);
  if (!match || match[2].length === 0) return text;
  const [, leading, core, trailing] = match;
  return `${leading}${marker}${core}${marker}${trailing}`;
}

/**
 * True when the text already ends in sentence punctuation, looking through
 * trailing emphasis markers ("**done.**").
 */
export function endsWithPunctuation(text: string): boolean {
  const stripped = text.trimEnd().replace(/\*+$/, "");
  if (stripped.length === 0) return false;
  return SENTENCE_PUNCTUATION.has(stripped[stripped.length - 1]);
}

// ─── Prosody Formatter ──────────────────────────────────────────────────────────

export class ProsodyFormatter {
  private readonly config: FormatterConfig;
  private readonly logger?: Logger;

  constructor(config: FormatterConfig = DEFAULT_FORMATTER_CONFIG, logger?: Logger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Re-format a transcript using the prosody of each segment. Returns `text`
   * unchanged when there are no segments or the prosody analysis failed.
   */
  format(
    text: string,
    segments: readonly TranscriptSegment[] | null | undefined,
    prosody: ProsodyResult | null | undefined,
  ): string {
    if (!segments || segments.length === 0 || !prosody?.ok) return text;

    let output = "";
    let emphasized = 0;

    for (let i = 0; i < segments.length; i++) {
      const seg = segments[i];
      const segText = seg.text.trimStart();
      if (segText.length === 0) continue;

      const overlapping = overlappingVoicedWindows(prosody.windows, seg.startTime, seg.endTime);
      let formatted = segText;

      if (overlapping.length > 0) {
        const energyDelta = mean(overlapping.map((w) => w.energyDelta));
        const isWhisper = overlapping.every((w) => w.isWhisper);
        const endWindows = overlapping.filter(
          (w) => w.endTime >= seg.endTime - this.config.endWindowSeconds,
        );
        const endPitchDelta = mean(endWindows.map((w) => w.pitchDelta));

        if (energyDelta > this.config.boldEnergyDelta) {
          formatted = wrapEmphasis(formatted, "**");
          emphasized++;
        } else if (isWhisper || energyDelta < this.config.whisperEnergyDelta) {
          formatted = wrapEmphasis(formatted, "*");
          emphasized++;
        }

        if (!endsWithPunctuation(formatted)) {
          if (endPitchDelta > this.config.risingPitchDelta) {
            formatted = `${formatted.trimEnd()}?`;
          } else if (
            endPitchDelta < this.config.fallingPitchDelta &&
            energyDelta > this.config.exclamationEnergyDelta
          ) {
            formatted = `${formatted.trimEnd()}!`;
          }
        }
      }

      output += formatted;
      const next = i + 1 < segments.length ? segments[i + 1] : null;
      if (next) output += this.separatorBetween(output, seg, next, prosody.pauses);
    }

    this.logger?.debug(`Formatted ${segments.length} segments, ${emphasized} emphasized`);
    return output.trim();
  }

  private separatorBetween(
    output: string,
    current: TranscriptSegment,
    next: TranscriptSegment,
    pauses: readonly PauseEvent[],
  ): string {
    const tolerance = this.config.pauseToleranceSeconds;
    const gap = pauses.find(
      (p) => p.startTime >= current.endTime - tolerance && p.endTime <= next.startTime + tolerance,
    );

    if (gap) {
      if (gap.durationMs >= this.config.paragraphPauseMs) return "\n\n";
      if (gap.durationMs >= this.config.linePauseMs) return "\n";
    }

    const last = output[output.length - 1];
    return output.length > 0 && last !== " " && last !== "\n" ? " " : "";
  }
}
