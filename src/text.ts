/**
 * Text/keyword fallback scorer: the scorer of last resort, used when no
 * readable image is available. Never throws.
 *
 * Confidence and risk are separate signals here. Confidence says how much
 * usable detail the report carries; risk comes only from threat keywords.
 */

import { findKeywords, highestSeverity } from './keywords.js';
import type { KeywordTable } from './keywords.js';
import { nextInRange } from './random.js';
import type { RandomSource } from './random.js';
import type { RiskLevel } from './schema.js';
import type { TextScoringConfig } from './types.js';

export interface TextFields {
  title: string;
  description: string;
  location: string;
}

export interface TextScore {
  riskLevel: RiskLevel;
  confidence: number;
  isEnvironmental: boolean;
  matchedKeywords: string[];
}

export function hasText(fields: TextFields): boolean {
  return [fields.title, fields.description, fields.location].some(f => f.trim().length > 0);
}

export function scoreText(
  fields: TextFields,
  random: RandomSource,
  table: KeywordTable,
  config: TextScoringConfig
): TextScore {
  let confidence = nextInRange(random, config.base);

  // Location specificity
  const habitatMatches = findKeywords(fields.location, table.habitatTerms);
  if (habitatMatches.length > 0) {
    confidence += nextInRange(random, config.habitatBonus);
  } else if (fields.location.trim()) {
    confidence += nextInRange(random, config.locationBonus);
  }

  // Environmental detail in title/description
  const textMatches = findKeywords(`${fields.title} ${fields.description}`, table.textKeywords);
  let keywordBonus = 0;
  for (let i = 0; i < textMatches.length; i++) {
    keywordBonus += nextInRange(random, config.keywordBonus);
  }
  confidence += Math.min(keywordBonus, config.keywordBonusCap);

  // Risk: threat vocabulary anywhere in the report
  const threatKeywords = findKeywords(
    `${fields.title} ${fields.description} ${fields.location}`,
    table.threats.map(entry => entry.keyword)
  );
  const severity = highestSeverity(table.threats.filter(entry => threatKeywords.includes(entry.keyword)));
  const riskLevel: RiskLevel = severity ?? 'low';

  const matchedKeywords = [...new Set([...threatKeywords, ...textMatches, ...habitatMatches])];

  return {
    riskLevel,
    confidence: Math.max(0, Math.min(100, confidence)),
    isEnvironmental: matchedKeywords.length > 0,
    matchedKeywords,
  };
}
