/**
 * Public API of the environmental report scoring engine
 */

export { scoreReport, DEFAULT_STRATEGIES } from './scorer.js';
export type { ScoreOptions, ScoringContext, ScoringStrategy } from './scorer.js';
export { analyzeSubmission } from './pipeline.js';
export type { PipelineOptions } from './pipeline.js';
export {
  classifyRisk,
  createPrecomputedClassifier,
  createUnavailableClassifier,
  labelConfidence,
  positionDecay,
  scoreLabels,
} from './classifier.js';
export type { ImageClassifier, LabelScore } from './classifier.js';
export { analyzeColors, colorBoost, colorFallbackScore } from './colors.js';
export { scoreText } from './text.js';
export { normalize, confidenceFloor } from './normalizer.js';
export { decodeImage, isReadableImage } from './image.js';
export { ENVIRONMENTAL_KEYWORDS, buildKeywordTable } from './keywords.js';
export type { KeywordTable } from './keywords.js';
export { createSeededRandom, createUnseededRandom } from './random.js';
export type { RandomSource } from './random.js';
export { deriveReportStatus, requiresAlert } from './report.js';
export { resolveConfig, loadSettingsFromEnv } from './config.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export {
  ScoringError,
  ClassifierUnavailable,
  ImageUnreadable,
  InsufficientInput,
} from './errors.js';
export { SubmissionSchema, ScoreResultSchema } from './schema.js';
export { DEFAULT_ENGINE_CONFIG, ENGINE_VERSION } from './types.js';
export type * from './types.js';
