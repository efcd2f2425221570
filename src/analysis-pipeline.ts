// Prosody Insight - Analysis Pipeline
// Runs the prosody analysis once per utterance and fans the frozen result out
// to the enrichers (formatter, hesitation, emotion), then assembles the final
// transcript with its summary footers.
//
// Audio is held in memory only for the duration of one run.

import { DEFAULT_CONFIG, type AnalysisConfig } from "./config.js";
import { EmotionAnalyzer } from "./emotion-analyzer.js";
import { HesitationAnalyzer } from "./hesitation-analyzer.js";
import { createConsoleLogger } from "./logger.js";
import { ProsodyAnalyzer } from "./prosody-analyzer.js";
import { ProsodyFormatter } from "./prosody-formatter.js";
import { FATIGUE_REPORT_LEVEL, buildEmotionFooter, buildHesitationFooter } from "./summary.js";
import { deepFreeze } from "./utils.js";
import type {
  EmotionResult,
  HesitationResult,
  Logger,
  PcmAudio,
  ProsodyResult,
  TranscriptSegment,
} from "./types.js";

// ─── Types ──────────────────────────────────────────────────────────────────────

export interface AnalysisInput {
  audio: PcmAudio;
  /** Raw transcript text */
  text: string;
  segments?: readonly TranscriptSegment[] | null;
  /** Language reported by the transcriber ("en", "fr-FR", ...) */
  language?: string | null;
}

export interface AnalysisOutput {
  prosody: ProsodyResult;
  /** Formatted transcript with any summary footers appended */
  text: string;
  /** Formatter output alone (the raw text when formatting is off or impossible) */
  formattedText: string;
  /** null when the feature is disabled, the text is blank, or the run was cancelled */
  hesitation: HesitationResult | null;
  /** null unless prosody succeeded and segments were supplied */
  emotion: EmotionResult | null;
  warning: string | null;
}

export interface RunOptions {
  signal?: AbortSignal;
}

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface AnalysisPipelineDeps {
  prosodyAnalyzer?: ProsodyAnalyzer;
  hesitationAnalyzer?: HesitationAnalyzer;
  emotionAnalyzer?: EmotionAnalyzer;
  formatter?: ProsodyFormatter;
  /** Shared by every component built here; defaults to scoped console loggers */
  logger?: Logger;
}

// ─── Pipeline ───────────────────────────────────────────────────────────────────

export class AnalysisPipeline {
  private readonly config: AnalysisConfig;
  private readonly logger: Logger;
  private readonly prosodyAnalyzer: ProsodyAnalyzer;
  private readonly hesitationAnalyzer: HesitationAnalyzer;
  private readonly emotionAnalyzer: EmotionAnalyzer;
  private readonly formatter: ProsodyFormatter;

  constructor(config: AnalysisConfig = DEFAULT_CONFIG, deps: AnalysisPipelineDeps = {}) {
    const loggerFor = (scope: string): Logger => deps.logger ?? createConsoleLogger(scope);

    this.config = config;
    this.logger = loggerFor("AnalysisPipeline");
    this.prosodyAnalyzer =
      deps.prosodyAnalyzer ?? new ProsodyAnalyzer(config.prosody, loggerFor("ProsodyAnalyzer"));
    this.hesitationAnalyzer =
      deps.hesitationAnalyzer ??
      new HesitationAnalyzer(config.hesitation, loggerFor("HesitationAnalyzer"));
    this.emotionAnalyzer =
      deps.emotionAnalyzer ?? new EmotionAnalyzer(config.emotion, loggerFor("EmotionAnalyzer"));
    this.formatter =
      deps.formatter ?? new ProsodyFormatter(config.formatter, loggerFor("ProsodyFormatter"));

    const { formatting, hesitation, emotion } = config.features;
    this.logger.info(
      `Features: formatting=${onOff(formatting)}, hesitation=${onOff(hesitation)}, emotion=${onOff(emotion)}`,
    );
  }

  async run(input: AnalysisInput, options: RunOptions = {}): Promise<AnalysisOutput> {
    const { text } = input;
    const segments = input.segments ?? null;
    const features = this.config.features;

    const prosody = await this.prosodyAnalyzer.analyze(input.audio, { signal: options.signal });

    if (!prosody.ok) {
      if (prosody.reason === "cancelled") {
        this.logger.info("Run cancelled; returning the transcript unchanged");
        return deepFreeze({
          prosody,
          text,
          formattedText: text,
          hesitation: null,
          emotion: null,
          warning: null,
        });
      }
      this.logger.warn(`Prosody analysis failed (${prosody.reason}): ${prosody.error}`);
    }

    const formattedText = features.formatting
      ? this.formatter.format(text, segments, prosody)
      : text;

    // Text-only checks still work without prosody
    const hesitation =
      features.hesitation && text.trim().length > 0
        ? this.hesitationAnalyzer.analyze(text, segments, prosody, input.language)
        : null;

    const emotion =
      features.emotion && prosody.ok && segments !== null && segments.length > 0
        ? this.emotionAnalyzer.analyze(segments, prosody)
        : null;

    let finalText = formattedText;
    if (hesitation && hasNotableHesitation(hesitation)) {
      finalText += buildHesitationFooter(hesitation);
    }
    if (emotion) {
      finalText += buildEmotionFooter(emotion);
    }

    const warning = emotion?.warningMessage ?? null;
    if (warning) this.logger.warn(`Surfacing warning: ${warning}`);

    return deepFreeze({
      prosody,
      text: finalText,
      formattedText,
      hesitation,
      emotion,
      warning,
    });
  }
}

/**
 * Footer-worthy: at least one filler or self-correction, or noticeable fatigue.
 */
export function hasNotableHesitation(result: HesitationResult): boolean {
  return (
    result.fillerCount > 0 ||
    result.selfCorrectionCount > 0 ||
    result.fatigueLevel > FATIGUE_REPORT_LEVEL
  );
}

function onOff(enabled: boolean): string {
  return enabled ? "on" : "off";
}
