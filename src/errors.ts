/**
 * Error taxonomy for the scoring engine.
 *
 * ClassifierUnavailable and ImageUnreadable are recoverable: the engine
 * catches them and moves to the next strategy. InsufficientInput is the only
 * error scoreReport() lets escape.
 */

export type ScoringErrorCode =
  | 'CLASSIFIER_UNAVAILABLE'
  | 'IMAGE_UNREADABLE'
  | 'INSUFFICIENT_INPUT';

export class ScoringError extends Error {
  readonly code: ScoringErrorCode;

  constructor(code: ScoringErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ClassifierUnavailable extends ScoringError {
  constructor(message = 'Image classifier is not available', options?: { cause?: unknown }) {
    super('CLASSIFIER_UNAVAILABLE', message, options);
  }
}

export class ImageUnreadable extends ScoringError {
  constructor(message = 'Image pixel data cannot be read', options?: { cause?: unknown }) {
    super('IMAGE_UNREADABLE', message, options);
  }
}

export class InsufficientInput extends ScoringError {
  constructor(message = 'A readable image or at least one non-empty text field is required') {
    super('INSUFFICIENT_INPUT', message);
  }
}

export function isRecoverable(error: unknown): boolean {
  return error instanceof ClassifierUnavailable || error instanceof ImageUnreadable;
}
