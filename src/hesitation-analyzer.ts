// Prosody Insight - Hesitation Analyzer
// Flags filler words, self-corrections, uncertain stretches, fatigue and topic
// changes in a transcript, using the prosody result (when available) to
// strengthen or enable the acoustic checks, and scores overall fluency.

import { DEFAULT_HESITATION_CONFIG, type HesitationConfig } from "./config.js";
import { combineLexicons, resolveLanguages, type CombinedLexicon } from "./lexicons.js";
import {
  clamp,
  deepFreeze,
  formatPercent,
  mean,
  overlappingVoicedWindows,
  splitWords,
} from "./utils.js";
import type {
  HesitationAnnotation,
  HesitationResult,
  Logger,
  ProsodyResult,
  TranscriptSegment,
} from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const FILLER_CONFIDENCE = 0.9;
const SELF_CORRECTION_CONFIDENCE = 0.8;
const TOPIC_CHANGE_CONFIDENCE_WITH_PAUSE = 0.85;
const TOPIC_CHANGE_CONFIDENCE = 0.6;

/** Prosody windows each side of a boundary needs before a shift is trusted */
const MIN_WINDOWS_FOR_TOPIC_CHANGE = 2;

const FILLER_PENALTY_PER_HIT = 0.05;
const FILLER_PENALTY_CAP = 0.5;
const CORRECTION_PENALTY_PER_HIT = 0.08;
const CORRECTION_PENALTY_CAP = 0.3;
const UNCERTAINTY_PENALTY_PER_HIT = 0.1;
const UNCERTAINTY_PENALTY_CAP = 0.2;

const UNCERTAINTY_SUGGESTION = "[uncertain]";
const TOPIC_CHANGE_SUGGESTION = "Possible topic change, consider a section break";

/** Punctuation stripped from both ends of a token */
const EDGE_PUNCTUATION = /^[\s.,!?;:"'()[\]*«»¿¡…“”‘’—–-]+|[\s.,!?;:"'()[\]*«»¿¡…“”‘’—–-]+$/g;

/** A token that closes a clause: the next word starts a new one */
const CLAUSE_BREAK = /[.,!?;:…]["'”’)\]]*$/;

/** A token directly followed by a comma ("like," / "so,") */
const TRAILING_COMMA = /,["'”’)\]]*$/;


// ─── Token helpers ──────────────────────────────────────────────────────────────

/** Strip surrounding punctuation and lower-case a token. */
export function cleanWord(token: string): string {
  return token.replace(EDGE_PUNCTUATION, "").toLowerCase();
}

export interface FillerHit {
  /** Index of the first token of the hit */
  tokenIndex: number;
  /** 2 for bigram fillers ("you know") */
  tokenCount: 1 | 2;
  /** Normalised filler text */
  text: string;
}

/**
 * Ambiguous fillers ("like", "so", "right") count only when they stand apart
 * from the sentence: first word, right after a clause break, or followed by a
 * comma. "this is right" is an answer, "right, so" is a filler.
 */
function isInFillerPosition(tokens: readonly string[], index: number): boolean {
  if (index === 0) return true;
  if (CLAUSE_BREAK.test(tokens[index - 1])) return true;
  return TRAILING_COMMA.test(tokens[index]);
}

/**
 * Scan whitespace tokens for fillers. Bigrams are tried first and consume both
 * tokens; a bigram never spans a clause break.
 */
export function findFillers(tokens: readonly string[], lexicon: CombinedLexicon): FillerHit[] {
  const hits: FillerHit[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const word = cleanWord(tokens[i]);
    if (word.length === 0) continue;

    if (i + 1 < tokens.length && !CLAUSE_BREAK.test(tokens[i])) {
      const bigram = `${word} ${cleanWord(tokens[i + 1])}`;
      if (lexicon.fillers.has(bigram)) {
        hits.push({ tokenIndex: i, tokenCount: 2, text: bigram });
        i++;
        continue;
      }
    }

    if (!lexicon.fillers.has(word)) continue;
    if (lexicon.ambiguous.has(word) && !isInFillerPosition(tokens, i)) continue;
    hits.push({ tokenIndex: i, tokenCount: 1, text: word });
  }

  return hits;
}

// ─── Time estimation ────────────────────────────────────────────────────────────

function transcriptSpan(segments: readonly TranscriptSegment[]): { start: number; end: number } {
  return {
    start: segments[0].startTime,
    end: segments[segments.length - 1].endTime,
  };
}

/**
 * Map a token's fractional position linearly onto the transcript's time span.
 * Returns (0, 0) when there are no segments to anchor to.
 */
export function estimateTimeForWordIndex(
  wordIndex: number,
  totalWords: number,
  segments: readonly TranscriptSegment[] | null | undefined,
): { startTime: number; endTime: number } {
  if (!segments || segments.length === 0) return { startTime: 0, endTime: 0 };
  const { start, end } = transcriptSpan(segments);
  if (totalWords <= 0) return { startTime: start, endTime: end };

  const duration = end - start;
  const startTime = start + (wordIndex / totalWords) * duration;
  return { startTime, endTime: Math.min(startTime + duration / totalWords, end) };
}

function estimateTimeForCharIndex(
  charIndex: number,
  length: number,
  text: string,
  segments: readonly TranscriptSegment[] | null | undefined,
): { startTime: number; endTime: number } {
  if (!segments || segments.length === 0 || text.length === 0) {
    return { startTime: 0, endTime: 0 };
  }
  const { start, end } = transcriptSpan(segments);
  const duration = end - start;
  const startTime = start + (charIndex / text.length) * duration;
  return { startTime, endTime: Math.min(startTime + (length / text.length) * duration, end) };
}

// ─── Scoring ────────────────────────────────────────────────────────────────────

export function computeFluencyScore(
  fillerCount: number,
  selfCorrectionCount: number,
  uncertaintyCount: number,
): number {
  const fillerPenalty = Math.min(FILLER_PENALTY_CAP, fillerCount * FILLER_PENALTY_PER_HIT);
  const correctionPenalty = Math.min(
    CORRECTION_PENALTY_CAP,
    selfCorrectionCount * CORRECTION_PENALTY_PER_HIT,
  );
  const uncertaintyPenalty = Math.min(
    UNCERTAINTY_PENALTY_CAP,
    uncertaintyCount * UNCERTAINTY_PENALTY_PER_HIT,
  );
  return clamp(1 - fillerPenalty - correctionPenalty - uncertaintyPenalty, 0, 1);
}

/** Words per second across a run of consecutive segments. */
function computeSpeechRate(segments: readonly TranscriptSegment[]): number {
  if (segments.length === 0) return 0;
  const totalWords = segments.reduce((sum, s) => sum + splitWords(s.text).length, 0);
  const totalTime = segments[segments.length - 1].endTime - segments[0].startTime;
  return totalTime > 0 ? totalWords / totalTime : 0;
}

/**
 * Case-insensitive, global pattern for a correction marker that no letter
 * touches on either side. Matching runs on the original text so the reported
 * span is exactly what was said.
 */
export function markerPattern(marker: string): RegExp {
  const escaped = marker.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(?<!\\p{L})${escaped}(?!\\p{L})`, "giu");
}

// ─── Hesitation Analyzer ────────────────────────────────────────────────────────

export class HesitationAnalyzer {
  private readonly config: HesitationConfig;
  private readonly logger?: Logger;

  constructor(config: HesitationConfig = DEFAULT_HESITATION_CONFIG, logger?: Logger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Analyze a transcript for hesitation patterns.
   *
   * Missing segments or an unsuccessful prosody result only disable the checks
   * that need them; blank text yields a perfect fluency score.
   */
  analyze(
    text: string,
    segments: readonly TranscriptSegment[] | null | undefined,
    prosody: ProsodyResult | null | undefined,
    detectedLanguage?: string | null,
  ): HesitationResult {
    if (text.trim().length === 0) {
      return deepFreeze({
        annotations: [],
        fluencyScore: 1,
        fatigueLevel: 0,
        fillerCount: 0,
        selfCorrectionCount: 0,
      });
    }

    const languages = resolveLanguages(detectedLanguage, this.config.lexiconPolicy);
    const lexicon = combineLexicons(languages);
    this.logger?.debug(`Hesitation lexicons: ${languages.join(", ")}`);

    const fillers = this.detectFillers(text, segments, lexicon);
    const corrections = this.detectSelfCorrections(text, segments, lexicon);
    const uncertainty = this.detectUncertainty(segments, prosody, lexicon);
    const fatigue = this.detectFatigue(segments);
    const topicChanges = this.detectTopicChanges(segments, prosody);

    const annotations: HesitationAnnotation[] = [
      ...fillers,
      ...corrections,
      ...uncertainty,
      ...(fatigue ? [fatigue.annotation] : []),
      ...topicChanges,
    ];

    const result: HesitationResult = {
      annotations,
      fluencyScore: computeFluencyScore(fillers.length, corrections.length, uncertainty.length),
      fatigueLevel: fatigue ? fatigue.level : 0,
      fillerCount: fillers.length,
      selfCorrectionCount: corrections.length,
    };

    this.logger?.info(
      `Hesitation: fluency=${formatPercent(result.fluencyScore)}, fillers=${result.fillerCount}, ` +
        `corrections=${result.selfCorrectionCount}, fatigue=${formatPercent(result.fatigueLevel)}`,
    );

    return deepFreeze(result);
  }

  // ─── Detectors ──────────────────────────────────────────────────────────────

  private detectFillers(
    text: string,
    segments: readonly TranscriptSegment[] | null | undefined,
    lexicon: CombinedLexicon,
  ): HesitationAnnotation[] {
    const tokens = splitWords(text);
    return findFillers(tokens, lexicon).map((hit): HesitationAnnotation => ({
      type: "filler_word",
      ...estimateTimeForWordIndex(hit.tokenIndex, tokens.length, segments),
      text: hit.text,
      suggestion: null,
      confidence: FILLER_CONFIDENCE,
    }));
  }

  /**
   * Case-insensitive marker search, accepted only where no letter touches the
   * marker on either side ("sorry" matches, "sorryful" does not).
   */
  private detectSelfCorrections(
    text: string,
    segments: readonly TranscriptSegment[] | null | undefined,
    lexicon: CombinedLexicon,
  ): HesitationAnnotation[] {
    const annotations: HesitationAnnotation[] = [];

    for (const marker of lexicon.selfCorrections) {
      for (const match of text.matchAll(markerPattern(marker))) {
        const idx = match.index ?? 0;
        const end = idx + match[0].length;
        annotations.push({
          type: "self_correction",
          ...estimateTimeForCharIndex(idx, match[0].length, text, segments),
          text: match[0],
          suggestion: this.buildCorrectionSuggestion(text, end),
          confidence: SELF_CORRECTION_CONFIDENCE,
        });
      }
    }

    return annotations;
  }

  private buildCorrectionSuggestion(text: string, afterIdx: number): string | null {
    if (afterIdx >= text.length) return null;
    const after = text.substring(afterIdx, afterIdx + this.config.suggestionContextChars).trim();
    if (after.length === 0) return null;
    return `Self-correction → "${after}"`;
  }

  /**
   * Slide a window of consecutive segments over the transcript and flag dense
   * filler use. Quiet delivery (energy below baseline) raises the confidence.
   */
  private detectUncertainty(
    segments: readonly TranscriptSegment[] | null | undefined,
    prosody: ProsodyResult | null | undefined,
    lexicon: CombinedLexicon,
  ): HesitationAnnotation[] {
    if (!segments || segments.length < 2) return [];

    const annotations: HesitationAnnotation[] = [];
    const windowSize = Math.min(this.config.uncertaintyWindowSegments, segments.length);

    for (let i = 0; i <= segments.length - windowSize; i++) {
      const windowSegments = segments.slice(i, i + windowSize);
      const first = windowSegments[0];
      const last = windowSegments[windowSegments.length - 1];
      const windowText = windowSegments.map((s) => s.text).join(" ");
      const tokens = splitWords(windowText);
      if (tokens.length === 0) continue;

      const fillerTokens = findFillers(tokens, lexicon).reduce((sum, hit) => sum + hit.tokenCount, 0);
      const density = fillerTokens / tokens.length;
      if (density < this.config.uncertaintyFillerDensity) continue;

      const alreadyFlagged = annotations.some(
        (a) => a.startTime < last.endTime && a.endTime > first.startTime,
      );
      if (alreadyFlagged) continue;

      let confidence = Math.min(1, density * 2);
      if (prosody?.ok) {
        const overlapping = overlappingVoicedWindows(prosody.windows, first.startTime, last.endTime);
        if (
          overlapping.length > 0 &&
          mean(overlapping.map((w) => w.energyDelta)) < this.config.lowConfidenceEnergyDelta
        ) {
          confidence = Math.min(1, confidence + this.config.lowEnergyConfidenceBoost);
        }
      }

      annotations.push({
        type: "uncertainty",
        startTime: first.startTime,
        endTime: last.endTime,
        text: windowText.trim(),
        suggestion: UNCERTAINTY_SUGGESTION,
        confidence,
      });
    }

    return annotations;
  }

  /**
   * Compare the speech rate of the first and last quarter of the session.
   */
  private detectFatigue(
    segments: readonly TranscriptSegment[] | null | undefined,
  ): { level: number; annotation: HesitationAnnotation } | null {
    if (!segments || segments.length < this.config.minSegmentsForFatigue) return null;

    const quarter = Math.floor(segments.length / 4);
    if (quarter < 2) return null;

    const firstQuarter = segments.slice(0, quarter);
    const lastQuarter = segments.slice(segments.length - quarter);

    const firstRate = computeSpeechRate(firstQuarter);
    const lastRate = computeSpeechRate(lastQuarter);
    if (firstRate <= 0) return null;

    const ratio = lastRate / firstRate;
    const threshold = this.config.fatigueRateThreshold;
    if (ratio >= threshold) return null;

    const { start, end } = transcriptSpan(segments);
    const totalMinutes = (end - start) / 60;

    return {
      level: clamp(1 - ratio, 0, 1),
      annotation: {
        type: "fatigue_warning",
        startTime: lastQuarter[0].startTime,
        endTime: lastQuarter[lastQuarter.length - 1].endTime,
        text: "",
        suggestion: `Fatigue detected: ${totalMinutes.toFixed(0)} min in, speech rate down ${formatPercent(1 - ratio)}`,
        confidence: clamp((threshold - ratio) * 5, 0.3, 1),
      },
    };
  }

  /**
   * Flag boundaries where mean pitch or loudness jumps between adjacent
   * segments. A pause at the boundary makes the call more confident.
   */
  private detectTopicChanges(
    segments: readonly TranscriptSegment[] | null | undefined,
    prosody: ProsodyResult | null | undefined,
  ): HesitationAnnotation[] {
    if (!segments || segments.length < this.config.minSegmentsForTopicChange || !prosody?.ok) {
      return [];
    }

    const annotations: HesitationAnnotation[] = [];
    const tolerance = this.config.topicPauseToleranceSeconds;

    for (let i = 1; i < segments.length; i++) {
      const prev = segments[i - 1];
      const curr = segments[i];

      const prevWindows = overlappingVoicedWindows(prosody.windows, prev.startTime, prev.endTime);
      const currWindows = overlappingVoicedWindows(prosody.windows, curr.startTime, curr.endTime);
      if (
        prevWindows.length < MIN_WINDOWS_FOR_TOPIC_CHANGE ||
        currWindows.length < MIN_WINDOWS_FOR_TOPIC_CHANGE
      ) {
        continue;
      }

      const pitchShift = Math.abs(
        mean(currWindows.map((w) => w.pitchDelta)) - mean(prevWindows.map((w) => w.pitchDelta)),
      );
      const energyShift = Math.abs(
        mean(currWindows.map((w) => w.energyDb)) - mean(prevWindows.map((w) => w.energyDb)),
      );

      if (
        pitchShift <= this.config.topicChangePitchShift &&
        energyShift <= this.config.topicChangeEnergyShift
      ) {
        continue;
      }

      const hasPause = prosody.pauses.some(
        (p) => p.startTime >= prev.endTime - tolerance && p.endTime <= curr.startTime + tolerance,
      );

      annotations.push({
        type: "topic_change",
        startTime: prev.endTime,
        endTime: curr.startTime,
        text: "",
        suggestion: TOPIC_CHANGE_SUGGESTION,
        confidence: hasPause ? TOPIC_CHANGE_CONFIDENCE_WITH_PAUSE : TOPIC_CHANGE_CONFIDENCE,
      });
    }

    return annotations;
  }
}
