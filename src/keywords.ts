/**
 * Environmental keyword taxonomy.
 *
 * Loaded once from data/environmental-keywords.json at module load and
 * frozen; every scoring call reads the same table.
 */

import rawTable from '../data/environmental-keywords.json' with { type: 'json' };
import { KeywordTableFileSchema, normalizeTerm } from './schema.js';
import type { KeywordEntry, SeverityTier } from './schema.js';

export interface KeywordTable {
  readonly entries: readonly KeywordEntry[];
  /** Threat-category entries only, in table order. */
  readonly threats: readonly KeywordEntry[];
  /** Reduced set searched in report titles and descriptions. */
  readonly textKeywords: readonly string[];
  /** Location terms marking protected or high-value habitat. */
  readonly habitatTerms: readonly string[];
}

export { normalizeTerm };

/** Keywords (in list order) that occur as substrings of `text`. */
export function findKeywords(text: string, keywords: readonly string[]): string[] {
  const haystack = normalizeTerm(text);
  if (!haystack) return [];
  return keywords.filter(keyword => haystack.includes(keyword));
}

export function buildKeywordTable(file: unknown): KeywordTable {
  const parsed = KeywordTableFileSchema.parse(file);

  const entries = Object.freeze(parsed.taxonomy.map(entry => Object.freeze({ ...entry })));
  return Object.freeze({
    entries,
    threats: Object.freeze(entries.filter(entry => entry.category === 'threat')),
    textKeywords: Object.freeze(parsed.textKeywords),
    habitatTerms: Object.freeze(parsed.habitatTerms),
  });
}

/**
 * Highest threat tier among the matched entries, if any.
 */
export function highestSeverity(entries: readonly KeywordEntry[]): SeverityTier | null {
  let found: SeverityTier | null = null;
  for (const entry of entries) {
    if (entry.severity === 'critical') return 'critical';
    if (entry.severity === 'high') found = 'high';
  }
  return found;
}

export const ENVIRONMENTAL_KEYWORDS: KeywordTable = buildKeywordTable(rawTable);
