/**
 * Submission pipeline: validate a JSON report submission, load its photo,
 * score it and attach the report status and alert decision.
 */

import { createPrecomputedClassifier } from './classifier.js';
import { ImageUnreadable } from './errors.js';
import { decodeImage } from './image.js';
import { describeError, silentLogger } from './logger.js';
import { deriveReportStatus, requiresAlert } from './report.js';
import { SubmissionSchema } from './schema.js';
import type { Submission, SubmissionOutcome } from './schema.js';
import { scoreReport } from './scorer.js';
import type { ScoreOptions } from './scorer.js';
import { ENGINE_VERSION } from './types.js';
import type { DecodedImage } from './types.js';

export type PipelineOptions = ScoreOptions;

async function loadSubmissionImage(
  submission: Submission,
  options: PipelineOptions
): Promise<DecodedImage | undefined> {
  let source: Buffer | string;
  if (submission.image_path) {
    source = submission.image_path;
  } else if (submission.image_base64) {
    source = Buffer.from(submission.image_base64, 'base64');
  } else {
    return undefined;
  }

  try {
    return await decodeImage(source);
  } catch (error) {
    if (!(error instanceof ImageUnreadable)) throw error;
    // The engine treats a missing image the same as an unreadable one
    (options.logger ?? silentLogger).warn('submission image unreadable', {
      requestId: submission.request_id ?? null,
      ...describeError(error),
    });
    return undefined;
  }
}

export async function analyzeSubmission(
  input: unknown,
  options: PipelineOptions = {}
): Promise<SubmissionOutcome> {
  const submission = SubmissionSchema.parse(input);
  const image = await loadSubmissionImage(submission, options);

  const classifier =
    options.classifier ?? (submission.labels ? createPrecomputedClassifier(submission.labels) : undefined);

  const result = scoreReport(
    {
      image,
      title: submission.title,
      description: submission.description,
      location: submission.location,
      requestId: submission.request_id,
    },
    { ...options, classifier }
  );

  return {
    version: ENGINE_VERSION,
    request_id: submission.request_id ?? null,
    result,
    status: deriveReportStatus(result, submission.title),
    alert: requiresAlert(result),
  };
}
