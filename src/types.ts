/**
 * TypeScript type definitions for the scoring engine
 */

// Re-export Zod-inferred types
export type {
  KeywordCategory,
  KeywordEntry,
  KeywordTableFile,
  ReportStatus,
  RiskLevel,
  ScoreSource,
  ScoreResult,
  SeverityTier,
  Submission,
  SubmissionInput,
  SubmissionOutcome,
} from './schema.js';

import type { RiskLevel } from './schema.js';

// ============================================================================
// Engine Input Types
// ============================================================================

/**
 * Raw pixel buffer handed to the engine. Decoding from PNG/JPEG happens
 * before scoring (see image.ts) so the engine itself stays synchronous.
 */
export interface DecodedImage {
  width: number;
  height: number;
  channels: number;
  data: Uint8Array;
}

export interface ScoreInput {
  image?: DecodedImage;
  title: string;
  description: string;
  location: string;
  /** Seeds the text scorer's random source when no explicit source is given. */
  requestId?: string;
}

export interface ClassificationLabel {
  label: string;
  score: number;
  rank: number;
}

export interface ColorProfile {
  greenRatio: number;
  blueRatio: number;
  brownRatio: number;
}

/** Inclusive integer range [min, max] used by the randomized text scorer. */
export type IntRange = readonly [number, number];

// ============================================================================
// Configuration Types
// ============================================================================

export interface EngineConfig {
  thresholds: RiskThresholds;
  labels: LabelScoringConfig;
  colorBoost: ColorBoostConfig;
  colorFallback: ColorFallbackConfig;
  text: TextScoringConfig;
  floors: ConfidenceFloors;
}

/** Applied to the accumulated keyword weight, not to a probability. */
export interface RiskThresholds {
  critical: number;
  high: number;
}

export interface LabelScoringConfig {
  positionDecayRate: number;
  confidenceScale: number;
  corroborationMinCategories: number;
  corroborationFactor: number;
  severityMultipliers: Record<'critical' | 'high', number>;
}

export interface ColorBoostConfig {
  greenRatio: number;
  blueRatio: number;
  amount: number;
}

export interface ColorSignal {
  ratio: number;
  score: number;
}

export interface ColorFallbackConfig {
  green: ColorSignal;
  blue: ColorSignal;
  brown: ColorSignal;
  baseConfidence: number;
  maxConfidence: number;
  environmentalThreshold: number;
}

export interface TextScoringConfig {
  base: IntRange;
  habitatBonus: IntRange;
  locationBonus: IntRange;
  keywordBonus: IntRange;
  keywordBonusCap: number;
}

export interface ConfidenceFloors {
  nonEnvironmental: number;
  low: number;
  high: number;
  critical: number;
}

/** Deep partial used for per-call config overrides. */
export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: Partial<EngineConfig[K]>;
};

// ============================================================================
// Report Types
// ============================================================================

export const ALERT_RISK_LEVELS: readonly RiskLevel[] = ['high', 'critical'];

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  // Keyword sums across the taxonomy rarely pass 0.3, so these stay small.
  // Recalibrate together with the table weights.
  thresholds: {
    critical: 0.2,
    high: 0.15,
  },
  labels: {
    positionDecayRate: 0.15,
    confidenceScale: 250,
    corroborationMinCategories: 3, // dampening kicks in above this
    corroborationFactor: 0.1,
    severityMultipliers: { critical: 2.0, high: 1.5 },
  },
  colorBoost: {
    greenRatio: 0.4,  // vegetation
    blueRatio: 0.35,  // water/sky
    amount: 15,
  },
  colorFallback: {
    green: { ratio: 0.3, score: 0.4 },
    blue: { ratio: 0.25, score: 0.3 },
    brown: { ratio: 0.1, score: 0.2 },
    baseConfidence: 60,
    maxConfidence: 85,
    environmentalThreshold: 0.3,
  },
  text: {
    base: [45, 55],
    habitatBonus: [25, 35],
    locationBonus: [15, 25],
    keywordBonus: [8, 15],
    keywordBonusCap: 40,
  },
  floors: {
    nonEnvironmental: 30,
    low: 40,
    high: 50,
    critical: 60,
  },
};

export const ENGINE_VERSION = '1.0.0';
