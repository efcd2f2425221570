// Prosody Insight - Analysis configuration
//
// Every threshold the analyzers use lives here with its default value, so the
// heuristics can be tuned without touching the algorithms. Overrides are
// merged section by section and validated with zod.

import { z } from "zod";

// ─── Schemas ────────────────────────────────────────────────────────────────────

const prosodyConfigSchema = z
  .object({
    /** Analysis window length */
    windowMs: z.number().int().positive(),
    /** Stride between window starts */
    hopMs: z.number().int().positive(),
    /** Windows quieter than this are silence */
    silenceThresholdDb: z.number(),
    /** Voiced windows quieter than this are whispered */
    whisperThresholdDb: z.number(),
    minPitchHz: z.number().positive(),
    maxPitchHz: z.number().positive(),
    /** CMND dip threshold for the YIN estimator (lower = stricter) */
    yinThreshold: z.number().gt(0).lt(1),
    minPauseMs: z.number().nonnegative(),
    /** Windows analysed between event-loop yields (cancellation latency) */
    yieldEveryWindows: z.number().int().positive(),
  })
  .refine((c) => c.minPitchHz < c.maxPitchHz, {
    message: "minPitchHz must be lower than maxPitchHz",
  })
  .refine((c) => c.hopMs <= c.windowMs, {
    message: "hopMs must not exceed windowMs",
  });

const hesitationConfigSchema = z.object({
  lexiconPolicy: z.enum(["union", "detected-only"]),
  uncertaintyWindowSegments: z.number().int().positive(),
  uncertaintyFillerDensity: z.number().min(0).max(1),
  lowConfidenceEnergyDelta: z.number(),
  lowEnergyConfidenceBoost: z.number().min(0).max(1),
  fatigueRateThreshold: z.number().gt(0).lt(1),
  minSegmentsForFatigue: z.number().int().positive(),
  topicChangePitchShift: z.number().nonnegative(),
  topicChangeEnergyShift: z.number().nonnegative(),
  minSegmentsForTopicChange: z.number().int().min(2),
  topicPauseToleranceSeconds: z.number().nonnegative(),
  suggestionContextChars: z.number().int().positive(),
});

const emotionThresholdsSchema = z.object({
  highEnergyDelta: z.number(),
  lowEnergyDelta: z.number(),
  veryLowEnergyDelta: z.number(),
  confidentMinEnergyDelta: z.number(),
  highPitchDelta: z.number(),
  highPitchVariability: z.number().nonnegative(),
  steadyPitchVariability: z.number().positive(),
  uncertainPitchVariability: z.number().nonnegative(),
  calmPitchVariability: z.number().nonnegative(),
  risingPitchTrend: z.number(),
  fallingPitchTrend: z.number(),
  angryWarningConfidence: z.number().min(0).max(1),
  stressedWarningConfidence: z.number().min(0).max(1),
});

const formatterConfigSchema = z
  .object({
    boldEnergyDelta: z.number(),
    whisperEnergyDelta: z.number(),
    paragraphPauseMs: z.number().nonnegative(),
    linePauseMs: z.number().nonnegative(),
    risingPitchDelta: z.number(),
    fallingPitchDelta: z.number(),
    exclamationEnergyDelta: z.number(),
    endWindowSeconds: z.number().positive(),
    pauseToleranceSeconds: z.number().nonnegative(),
  })
  .refine((c) => c.linePauseMs <= c.paragraphPauseMs, {
    message: "linePauseMs must not exceed paragraphPauseMs",
  });

const featureFlagsSchema = z.object({
  formatting: z.boolean(),
  hesitation: z.boolean(),
  emotion: z.boolean(),
});

export const analysisConfigSchema = z.object({
  prosody: prosodyConfigSchema,
  hesitation: hesitationConfigSchema,
  emotion: emotionThresholdsSchema,
  formatter: formatterConfigSchema,
  features: featureFlagsSchema,
});

export type ProsodyConfig = z.infer<typeof prosodyConfigSchema>;
export type HesitationConfig = z.infer<typeof hesitationConfigSchema>;
export type EmotionThresholds = z.infer<typeof emotionThresholdsSchema>;
export type FormatterConfig = z.infer<typeof formatterConfigSchema>;
export type FeatureFlags = z.infer<typeof featureFlagsSchema>;
export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;

export type ConfigOverrides = {
  [K in keyof AnalysisConfig]?: Partial<AnalysisConfig[K]>;
};

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_PROSODY_CONFIG: ProsodyConfig = {
  windowMs: 50,
  hopMs: 25,
  silenceThresholdDb: -40,
  whisperThresholdDb: -28,
  minPitchHz: 60,
  maxPitchHz: 500,
  yinThreshold: 0.15,
  minPauseMs: 200,
  yieldEveryWindows: 200,
};

export const DEFAULT_HESITATION_CONFIG: HesitationConfig = {
  lexiconPolicy: "union",
  uncertaintyWindowSegments: 3,
  uncertaintyFillerDensity: 0.25,
  lowConfidenceEnergyDelta: -3,
  lowEnergyConfidenceBoost: 0.2,
  fatigueRateThreshold: 0.7,
  minSegmentsForFatigue: 8,
  topicChangePitchShift: 0.3,
  topicChangeEnergyShift: 8,
  minSegmentsForTopicChange: 4,
  topicPauseToleranceSeconds: 0.2,
  suggestionContextChars: 60,
};

export const DEFAULT_EMOTION_THRESHOLDS: EmotionThresholds = {
  highEnergyDelta: 4,
  lowEnergyDelta: -4,
  veryLowEnergyDelta: -8,
  confidentMinEnergyDelta: -2,
  highPitchDelta: 0.2,
  highPitchVariability: 0.25,
  steadyPitchVariability: 0.08,
  uncertainPitchVariability: 0.16,
  calmPitchVariability: 0.12,
  risingPitchTrend: 0.1,
  fallingPitchTrend: -0.05,
  angryWarningConfidence: 0.6,
  stressedWarningConfidence: 0.7,
};

export const DEFAULT_FORMATTER_CONFIG: FormatterConfig = {
  boldEnergyDelta: 6,
  whisperEnergyDelta: -8,
  paragraphPauseMs: 1500,
  linePauseMs: 500,
  risingPitchDelta: 0.15,
  fallingPitchDelta: -0.1,
  exclamationEnergyDelta: 3,
  endWindowSeconds: 0.3,
  pauseToleranceSeconds: 0.1,
};

export const DEFAULT_CONFIG: AnalysisConfig = {
  prosody: DEFAULT_PROSODY_CONFIG,
  hesitation: DEFAULT_HESITATION_CONFIG,
  emotion: DEFAULT_EMOTION_THRESHOLDS,
  formatter: DEFAULT_FORMATTER_CONFIG,
  features: { formatting: true, hesitation: true, emotion: true },
};

// ─── Errors ─────────────────────────────────────────────────────────────────────

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

// ─── Resolution ─────────────────────────────────────────────────────────────────

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws ConfigError listing every invalid field.
 */
export function resolveConfig(overrides: ConfigOverrides = {}): AnalysisConfig {
  const merged = {
    prosody: { ...DEFAULT_CONFIG.prosody, ...overrides.prosody },
    hesitation: { ...DEFAULT_CONFIG.hesitation, ...overrides.hesitation },
    emotion: { ...DEFAULT_CONFIG.emotion, ...overrides.emotion },
    formatter: { ...DEFAULT_CONFIG.formatter, ...overrides.formatter },
    features: { ...DEFAULT_CONFIG.features, ...overrides.features },
  };

  const parsed = analysisConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid analysis configuration: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

// ─── Environment ────────────────────────────────────────────────────────────────

export interface RuntimeConfig {
  port: number;
  analysis: AnalysisConfig;
}

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  throw new ConfigError(`${key} must be true or false, got "${raw}"`);
}

/**
 * Build the runtime configuration from environment variables.
 * Unset variables keep their defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const port = readNumber(env, "PORT") ?? 3000;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`PORT must be an integer between 0 and 65535, got ${port}`);
  }

  const policy = env.HESITATION_LEXICON_POLICY?.trim();
  const prosody: Partial<ProsodyConfig> = {};
  const minPitchHz = readNumber(env, "PROSODY_MIN_PITCH_HZ");
  const maxPitchHz = readNumber(env, "PROSODY_MAX_PITCH_HZ");
  if (minPitchHz !== undefined) prosody.minPitchHz = minPitchHz;
  if (maxPitchHz !== undefined) prosody.maxPitchHz = maxPitchHz;

  const features: Partial<FeatureFlags> = {};
  const formatting = readBoolean(env, "FEATURE_FORMATTING");
  const hesitation = readBoolean(env, "FEATURE_HESITATION");
  const emotion = readBoolean(env, "FEATURE_EMOTION");
  if (formatting !== undefined) features.formatting = formatting;
  if (hesitation !== undefined) features.hesitation = hesitation;
  if (emotion !== undefined) features.emotion = emotion;

  const hesitationOverrides: Partial<HesitationConfig> = {};
  if (policy) {
    const parsedPolicy = hesitationConfigSchema.shape.lexiconPolicy.safeParse(policy);
    if (!parsedPolicy.success) {
      throw new ConfigError(
        `HESITATION_LEXICON_POLICY must be "union" or "detected-only", got "${policy}"`,
      );
    }
    hesitationOverrides.lexiconPolicy = parsedPolicy.data;
  }

  return {
    port,
    analysis: resolveConfig({ prosody, features, hesitation: hesitationOverrides }),
  };
}
