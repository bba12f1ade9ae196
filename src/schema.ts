/**
 * Zod schemas for report submissions, the keyword taxonomy and engine output
 */

import { z } from 'zod';

// ============================================================================
// Shared Enums
// ============================================================================

export const RiskLevelSchema = z.enum(['low', 'high', 'critical']);

export const ScoreSourceSchema = z.enum(['classifier', 'color_heuristic', 'keyword_fallback']);

export const KeywordCategorySchema = z.enum([
  'animal',
  'plant',
  'landscape',
  'weather',
  'material',
  'threat',
]);

export const SeverityTierSchema = z.enum(['critical', 'high']);

export const ReportStatusSchema = z.enum(['completed', 'mixed', 'unknown', 'flagged']);

// ============================================================================
// Keyword Taxonomy (data/environmental-keywords.json)
// ============================================================================

/**
 * Lower-cases and turns `_`/`-` separators into spaces so classifier
 * labels like "oil_spill" line up with table keywords.
 */
export function normalizeTerm(text: string): string {
  return text
    .toLowerCase()
    .replace(/[_-]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

const TermSchema = z
  .string()
  .transform(normalizeTerm)
  .refine(term => term.length > 0, { message: 'keyword must not be blank' });

export const KeywordEntrySchema = z
  .object({
    keyword: TermSchema,
    category: KeywordCategorySchema,
    weight: z.number().positive(),
    severity: SeverityTierSchema.optional(),
  })
  .refine(entry => (entry.category === 'threat') === (entry.severity !== undefined), {
    message: 'threat entries need a severity tier, other categories must not have one',
  });

export const KeywordTableFileSchema = z
  .object({
    version: z.number().int(),
    taxonomy: z.array(KeywordEntrySchema).min(1),
    textKeywords: z.array(TermSchema),
    habitatTerms: z.array(TermSchema),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    for (const entry of file.taxonomy) {
      if (seen.has(entry.keyword)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['taxonomy'],
          message: `duplicate keyword "${entry.keyword}"`,
        });
      }
      seen.add(entry.keyword);
    }
  });

// ============================================================================
// Submission Schema (CLI / pipeline input)
// ============================================================================

export const UpstreamLabelSchema = z.object({
  label: z.string().min(1),
  score: z.number().min(0).max(1),
});

export const SubmissionSchema = z.object({
  request_id: z.string().min(1).optional(),
  title: z.string().default(''),
  description: z.string().default(''),
  location: z.string().default(''),
  image_path: z.string().min(1).optional(),
  image_base64: z.string().min(1).optional(),
  // Ranked output of an upstream vision model, most likely first
  labels: z.array(UpstreamLabelSchema).optional(),
});

// ============================================================================
// Output Schemas
// ============================================================================

export const ScoreResultSchema = z.object({
  isEnvironmental: z.boolean(),
  riskLevel: RiskLevelSchema,
  confidence: z.number().int().min(0).max(100),
  matchedKeywords: z.array(z.string()),
  source: ScoreSourceSchema,
  analysis: z.string(),
});

export const SubmissionOutcomeSchema = z.object({
  version: z.string(),
  request_id: z.string().nullable(),
  result: ScoreResultSchema,
  status: ReportStatusSchema,
  alert: z.boolean(),
});

// ============================================================================
// Type exports (inferred from schemas)
// ============================================================================

export type RiskLevel = z.infer<typeof RiskLevelSchema>;
export type ScoreSource = z.infer<typeof ScoreSourceSchema>;
export type KeywordCategory = z.infer<typeof KeywordCategorySchema>;
export type SeverityTier = z.infer<typeof SeverityTierSchema>;
export type ReportStatus = z.infer<typeof ReportStatusSchema>;
export type KeywordEntry = z.infer<typeof KeywordEntrySchema>;
export type KeywordTableFile = z.infer<typeof KeywordTableFileSchema>;
export type SubmissionInput = z.input<typeof SubmissionSchema>;
export type Submission = z.infer<typeof SubmissionSchema>;
export type ScoreResult = Readonly<
  Omit<z.infer<typeof ScoreResultSchema>, 'matchedKeywords'> & { matchedKeywords: readonly string[] }
>;
export type SubmissionOutcome = Omit<z.infer<typeof SubmissionOutcomeSchema>, 'result'> & {
  result: ScoreResult;
};
