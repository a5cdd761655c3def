import type { ExtractionFailure, ExtractionFailureReason } from '../types/index.js';

/**
 * ExtractionError
 * Structured error thrown by requireTotal when an extraction did not yield a total
 * Lets callers branch on the failure category without inspecting the result
 */
export class ExtractionError extends Error {
  /**
   * Error category mirrors the failure reason
   *
   * - "InvalidInput": caller error, fix the input before retrying
   * - "NotFound": nothing usable in the text, route to manual review
   * - "Ambiguous": several totals disagree, route to manual review
   */
  readonly category: ExtractionFailureReason;

  /**
   * The failed extraction result, with candidates and rejections for debugging
   */
  readonly result: ExtractionFailure;

  constructor(result: ExtractionFailure) {
    super(result.message);
    Object.setPrototypeOf(this, ExtractionError.prototype);
    this.name = 'ExtractionError';
    this.category = result.reason;
    this.result = result;
  }

  /**
   * Determine if a human should look at the document
   */
  needsReview(): boolean {
    return this.category === 'NotFound' || this.category === 'Ambiguous';
  }
}

/**
 * ValidationError
 * Thrown when reference data or an explicit configuration fails validation
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, ValidationError.prototype);
    this.name = 'ValidationError';
  }
}
