/**
 * Report-level decisions derived from a score: the dashboard status and
 * whether the alerting service should notify recipients.
 */

import type { ReportStatus, ScoreResult } from './schema.js';
import { ALERT_RISK_LEVELS } from './types.js';

const MIXED_TITLE_WORDS = ['mixed', 'partial', 'unclear'];
const UNKNOWN_TITLE_WORDS = ['unknown', 'unidentified'];
const FLAGGED_TITLE_WORDS = ['flag', 'alert', 'warning'];

/** Below this an image-based result is shown as mixed rather than completed. */
export const MIXED_CONFIDENCE_CUTOFF = 50;

export function deriveReportStatus(result: ScoreResult, title: string): ReportStatus {
  if (result.source === 'keyword_fallback') {
    // Text-only reports: the reporter's own wording is the best hint
    const lower = title.toLowerCase();
    if (MIXED_TITLE_WORDS.some(w => lower.includes(w))) return 'mixed';
    if (UNKNOWN_TITLE_WORDS.some(w => lower.includes(w))) return 'unknown';
    if (FLAGGED_TITLE_WORDS.some(w => lower.includes(w))) return 'flagged';
    return 'completed';
  }

  if (!result.isEnvironmental) return 'unknown';
  if (result.riskLevel === 'critical') return 'flagged';
  if (result.confidence < MIXED_CONFIDENCE_CUTOFF) return 'mixed';
  return 'completed';
}

export function requiresAlert(result: ScoreResult): boolean {
  return ALERT_RISK_LEVELS.includes(result.riskLevel);
}
