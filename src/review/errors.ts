/**
 * @fileoverview Errors raised at the review level.
 *
 * @module review/errors
 */

/**
 * Something a batch reported that cannot be merged: a finding reusing a
 * known id with different content, a fix whose finding is unknown or whose
 * id repeats, or a fix verified a second time.
 */
export class ConsolidationError extends Error {
  readonly fixId?: string;
  readonly findingId?: string;

  constructor(message: string, ids: { fixId?: string; findingId?: string } = {}) {
    super(message);
    this.name = 'ConsolidationError';
    this.fixId = ids.fixId;
    this.findingId = ids.findingId;
  }
}

/**
 * Every step of the plan failed.
 *
 * Never thrown past the coordinator: it is logged and turned into a report
 * with status `failed`.
 */
export class AllCapabilitiesFailedError extends Error {
  constructor(public readonly details: string[]) {
    super(
      details.length > 0
        ? `All capabilities failed:\n- ${details.join('\n- ')}`
        : 'All capabilities failed',
    );
    this.name = 'AllCapabilitiesFailedError';
  }
}

/**
 * Submitted input is not a valid review input.
 */
export class InputValidationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid review input:\n- ${problems.join('\n- ')}`);
    this.name = 'InputValidationError';
  }
}

export class UnknownReviewError extends Error {
  constructor(public readonly reviewId: string) {
    super(`Unknown review: ${reviewId}`);
    this.name = 'UnknownReviewError';
  }
}
