/**
 * Main scoring orchestrator
 * Runs the strategy chain (classifier -> color heuristic -> text keywords)
 * and normalizes whichever result comes first.
 */

import { classifyRisk, createUnavailableClassifier, labelConfidence, scoreLabels } from './classifier.js';
import type { ImageClassifier } from './classifier.js';
import { analyzeColors, colorBoost, colorFallbackScore } from './colors.js';
import { resolveConfig } from './config.js';
import { ImageUnreadable, InsufficientInput, isRecoverable } from './errors.js';
import { isReadableImage } from './image.js';
import { ENVIRONMENTAL_KEYWORDS } from './keywords.js';
import type { KeywordTable } from './keywords.js';
import { describeError, silentLogger } from './logger.js';
import type { Logger } from './logger.js';
import { normalize } from './normalizer.js';
import type { RawScore } from './normalizer.js';
import { createSeededRandom, createUnseededRandom } from './random.js';
import type { RandomSource } from './random.js';
import type { ScoreResult, ScoreSource } from './schema.js';
import { hasText, scoreText } from './text.js';
import type { EngineConfig, EngineConfigOverrides, ScoreInput } from './types.js';

// ============================================================================
// Options & Strategy Contract
// ============================================================================

export interface ScoreOptions {
  classifier?: ImageClassifier;
  config?: EngineConfigOverrides;
  /** Explicit random source for the text fallback; otherwise seeded from input.requestId. */
  random?: RandomSource;
  logger?: Logger;
  keywordTable?: KeywordTable;
}

export interface ScoringContext {
  input: ScoreInput;
  config: EngineConfig;
  table: KeywordTable;
  classifier: ImageClassifier;
  logger: Logger;
  random: () => RandomSource;
}

/**
 * One tier of the fallback chain. Returns null when it does not apply to
 * the input; throws a recoverable error when it applies but cannot finish.
 */
export interface ScoringStrategy {
  readonly source: ScoreSource;
  attempt(ctx: ScoringContext): RawScore | null;
}

// ============================================================================
// Strategies
// ============================================================================

export const classifierStrategy: ScoringStrategy = {
  source: 'classifier',
  attempt({ input, config, table, classifier, logger }) {
    if (!input.image) return null;

    const labels = classifier.classify(input.image);
    const labelScore = scoreLabels(labels, table, config.labels);
    const riskLevel = classifyRisk(labelScore.adjustedScore, config.thresholds);
    const isEnvironmental = labelScore.matchedKeywords.length > 0;

    let boost = 0;
    try {
      boost = colorBoost(analyzeColors(input.image), config.colorBoost);
    } catch (error) {
      if (!(error instanceof ImageUnreadable)) throw error;
      logger.debug('color boost skipped', describeError(error));
    }

    logger.debug('classifier scored labels', {
      classifier: classifier.name,
      labels: labels.length,
      rawScore: labelScore.rawScore,
      adjustedScore: labelScore.adjustedScore,
      boost,
    });

    return {
      riskLevel,
      rawConfidence: labelConfidence(labelScore.adjustedScore, config.labels) + boost,
      source: 'classifier',
      isEnvironmental,
      matchedKeywords: labelScore.matchedKeywords,
      analysis: isEnvironmental
        ? `Environmental content detected (${riskLevel} risk)`
        : 'Non-environmental content detected',
    };
  },
};

export const colorHeuristicStrategy: ScoringStrategy = {
  source: 'color_heuristic',
  attempt({ input, config }) {
    if (!input.image) return null;

    const colors = colorFallbackScore(analyzeColors(input.image), config.colorFallback);
    const riskLevel = classifyRisk(colors.environmentalScore, config.thresholds);

    return {
      riskLevel,
      rawConfidence: colors.confidence,
      source: 'color_heuristic',
      isEnvironmental: colors.isEnvironmental,
      matchedKeywords: [],
      analysis: colors.signals.length > 0
        ? `Color analysis found ${colors.signals.join(', ')}`
        : 'Color analysis found no natural tones',
    };
  },
};

export const keywordFallbackStrategy: ScoringStrategy = {
  source: 'keyword_fallback',
  attempt({ input, config, table, random }) {
    if (!hasText(input)) return null;

    const text = scoreText(input, random(), table, config.text);
    return {
      riskLevel: text.riskLevel,
      rawConfidence: text.confidence,
      source: 'keyword_fallback',
      isEnvironmental: text.isEnvironmental,
      matchedKeywords: text.matchedKeywords,
      analysis: text.matchedKeywords.length > 0
        ? `Keyword analysis matched ${text.matchedKeywords.length} term(s)`
        : 'Keyword analysis found no environmental terms',
    };
  },
};

export const DEFAULT_STRATEGIES: readonly ScoringStrategy[] = [
  classifierStrategy,
  colorHeuristicStrategy,
  keywordFallbackStrategy,
];

// ============================================================================
// Main Scorer Function
// ============================================================================

/**
 * Scores one report. Synchronous and free of shared mutable state, so
 * concurrent calls need no coordination.
 *
 * @throws InsufficientInput when there is neither a readable image nor any text
 */
export function scoreReport(input: ScoreInput, options: ScoreOptions = {}): ScoreResult {
  const logger = options.logger ?? silentLogger;

  if (!isReadableImage(input.image) && !hasText(input)) {
    throw new InsufficientInput();
  }

  let random = options.random;
  const ctx: ScoringContext = {
    input,
    config: resolveConfig(options.config),
    table: options.keywordTable ?? ENVIRONMENTAL_KEYWORDS,
    classifier: options.classifier ?? createUnavailableClassifier(),
    logger,
    random: () => {
      random ??= input.requestId ? createSeededRandom(input.requestId) : createUnseededRandom();
      return random;
    },
  };

  for (const strategy of DEFAULT_STRATEGIES) {
    let raw: RawScore | null;
    try {
      raw = strategy.attempt(ctx);
    } catch (error) {
      if (error instanceof InsufficientInput) throw error;
      if (isRecoverable(error)) {
        logger.debug(`${strategy.source} unavailable, falling back`, describeError(error));
      } else {
        logger.warn(`${strategy.source} failed, falling back`, describeError(error));
      }
      continue;
    }

    if (raw) {
      const result = normalize(raw, ctx.config.floors);
      logger.info('report scored', {
        requestId: input.requestId ?? null,
        source: result.source,
        riskLevel: result.riskLevel,
        confidence: result.confidence,
      });
      return result;
    }
  }

  // Every image strategy failed and there is no text to fall back on
  throw new InsufficientInput();
}
