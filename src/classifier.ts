/**
 * Primary image classifier adapter and label-based environmental scoring
 */

import { ClassifierUnavailable } from './errors.js';
import { isReadableImage } from './image.js';
import { normalizeTerm } from './keywords.js';
import type { KeywordTable } from './keywords.js';
import type { KeywordCategory, KeywordEntry, RiskLevel } from './schema.js';
import type {
  ClassificationLabel,
  DecodedImage,
  LabelScoringConfig,
  RiskThresholds,
} from './types.js';

// ============================================================================
// Classifier Adapters
// ============================================================================

export interface ImageClassifier {
  readonly name: string;
  /**
   * Ranked labels for the image, rank 0 first. Throws ClassifierUnavailable
   * when no model is loaded or the image cannot be decoded.
   */
  classify(image: DecodedImage | undefined): ClassificationLabel[];
}

/** Stand-in used when no model has been loaded. */
export function createUnavailableClassifier(reason = 'No image classification model is loaded'): ImageClassifier {
  return {
    name: 'unavailable',
    classify(): ClassificationLabel[] {
      throw new ClassifierUnavailable(reason);
    },
  };
}

/**
 * Wraps labels already produced by an upstream vision model. Order is
 * taken as rank.
 */
export function createPrecomputedClassifier(
  labels: readonly { label: string; score: number }[]
): ImageClassifier {
  const ranked: ClassificationLabel[] = labels.map((l, i) => ({
    label: l.label,
    score: Math.max(0, Math.min(1, l.score)),
    rank: i,
  }));

  return {
    name: 'precomputed',
    classify(image) {
      if (!isReadableImage(image)) {
        throw new ClassifierUnavailable('Image could not be decoded for classification');
      }
      return ranked.map(l => ({ ...l }));
    },
  };
}

// ============================================================================
// Label Scoring
// ============================================================================

export interface LabelScore {
  rawScore: number;
  adjustedScore: number;
  matchedKeywords: string[];
  categories: KeywordCategory[];
}

export function positionDecay(rank: number, rate: number): number {
  return 1 / (1 + rank * rate);
}

function severityMultiplier(entry: KeywordEntry, config: LabelScoringConfig): number {
  return entry.severity ? config.severityMultipliers[entry.severity] : 1;
}

/**
 * Table entry whose keyword occurs in the label with the largest effective
 * weight. First entry in table order wins a tie.
 */
export function matchLabel(
  label: string,
  table: KeywordTable,
  config: LabelScoringConfig
): KeywordEntry | null {
  const normalized = normalizeTerm(label);
  let best: KeywordEntry | null = null;
  let bestWeight = 0;

  for (const entry of table.entries) {
    if (!normalized.includes(entry.keyword)) continue;
    const effective = entry.weight * severityMultiplier(entry, config);
    if (effective > bestWeight) {
      best = entry;
      bestWeight = effective;
    }
  }

  return best;
}

export function scoreLabels(
  labels: readonly ClassificationLabel[],
  table: KeywordTable,
  config: LabelScoringConfig
): LabelScore {
  let rawScore = 0;
  const matched: string[] = [];
  const categories = new Set<KeywordCategory>();

  for (const label of labels) {
    const entry = matchLabel(label.label, table, config);
    if (!entry) continue;

    rawScore +=
      label.score *
      entry.weight *
      severityMultiplier(entry, config) *
      positionDecay(label.rank, config.positionDecayRate);

    if (!matched.includes(entry.keyword)) matched.push(entry.keyword);
    categories.add(entry.category);
  }

  // Several independent categories corroborate each other; log keeps it sublinear
  const adjustedScore =
    categories.size > config.corroborationMinCategories
      ? rawScore * (1 + Math.log(1 + categories.size) * config.corroborationFactor)
      : rawScore;

  return {
    rawScore,
    adjustedScore,
    matchedKeywords: matched,
    categories: [...categories],
  };
}

export function classifyRisk(score: number, thresholds: RiskThresholds): RiskLevel {
  if (score > thresholds.critical) return 'critical';
  if (score > thresholds.high) return 'high';
  return 'low';
}

export function labelConfidence(adjustedScore: number, config: LabelScoringConfig): number {
  return Math.min(100, adjustedScore * config.confidenceScale);
}
