// Prosody Insight - Library entry point

export const APP_NAME = "Prosody Insight";
export const APP_VERSION = "0.1.0";

export * from "./types.js";
export {
  DEFAULT_CONFIG,
  DEFAULT_EMOTION_THRESHOLDS,
  DEFAULT_FORMATTER_CONFIG,
  DEFAULT_HESITATION_CONFIG,
  DEFAULT_PROSODY_CONFIG,
  ConfigError,
  loadConfigFromEnv,
  resolveConfig,
  type AnalysisConfig,
  type ConfigOverrides,
  type EmotionThresholds,
  type FeatureFlags,
  type FormatterConfig,
  type HesitationConfig,
  type ProsodyConfig,
  type RuntimeConfig,
} from "./config.js";
export { createConsoleLogger } from "./logger.js";
export { ProsodyAnalyzer, type AnalyzeOptions } from "./prosody-analyzer.js";
export { decodeWav, encodeWav, isPcm16Mono } from "./wav-reader.js";
export { HesitationAnalyzer } from "./hesitation-analyzer.js";
export { SUPPORTED_LANGUAGES } from "./lexicons.js";
export { EmotionAnalyzer, EMOTION_RULES, classifyEmotion, type EmotionRule } from "./emotion-analyzer.js";
export { ProsodyFormatter } from "./prosody-formatter.js";
export { buildEmotionFooter, buildHesitationFooter } from "./summary.js";
export {
  AnalysisPipeline,
  type AnalysisInput,
  type AnalysisOutput,
  type AnalysisPipelineDeps,
  type RunOptions,
} from "./analysis-pipeline.js";
export { createAppServer, type AppServer, type CreateServerOptions } from "./server.js";
export { RequestValidationError, type AnalysisResponse, type ServerMessage } from "./protocol.js";
