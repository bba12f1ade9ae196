/**
 * Result normalizer: every strategy's numbers pass through here before they
 * leave the engine.
 */

import type { RiskLevel, ScoreResult, ScoreSource } from './schema.js';
import type { ConfidenceFloors } from './types.js';

export interface RawScore {
  riskLevel: RiskLevel;
  rawConfidence: number;
  source: ScoreSource;
  isEnvironmental: boolean;
  matchedKeywords: readonly string[];
  analysis: string;
}

/**
 * Minimum confidence for a result. The non-environmental floor only applies
 * to low-risk results; high and critical always keep their tier floor.
 */
export function confidenceFloor(
  riskLevel: RiskLevel,
  isEnvironmental: boolean,
  floors: ConfidenceFloors
): number {
  if (riskLevel === 'low' && !isEnvironmental) {
    return floors.nonEnvironmental;
  }
  return floors[riskLevel];
}

export function normalize(raw: RawScore, floors: ConfidenceFloors): ScoreResult {
  const floor = confidenceFloor(raw.riskLevel, raw.isEnvironmental, floors);
  const rawConfidence = Number.isFinite(raw.rawConfidence) ? raw.rawConfidence : 0;
  const confidence = Math.max(0, Math.min(100, Math.round(Math.max(rawConfidence, floor))));

  return Object.freeze({
    isEnvironmental: raw.isEnvironmental,
    riskLevel: raw.riskLevel,
    confidence,
    matchedKeywords: Object.freeze([...raw.matchedKeywords]),
    source: raw.source,
    analysis: raw.analysis,
  });
}
