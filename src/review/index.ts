/**
 * @fileoverview Review module exports.
 *
 * @module review
 */

export type {
  ReviewError,
  ReviewMetrics,
  ReviewOptions,
  ReviewReport,
  ReviewState,
  ReviewStatus,
  StepReport,
} from './types';
export {
  AllCapabilitiesFailedError,
  ConsolidationError,
  InputValidationError,
  UnknownReviewError,
} from './errors';
export { validateReviewInput } from './inputValidation';
export {
  areDuplicates,
  consolidateFindings,
  normalizeFile,
  normalizeFindingType,
  rangesOverlap,
  similarityKey,
} from './consolidation';
export type { ConsolidationResult } from './consolidation';
export { FixLedger } from './fixLedger';
export type { LedgerDecision } from './fixLedger';
export { createPlanSpec } from './planFactory';
export { buildMetrics, countByCategory, countBySeverity, sortFindings, summarize } from './report';
export type { MetricsInput } from './report';
export { Coordinator, COORDINATOR_SOURCE_ID } from './coordinator';
export type { CoordinatorDeps, RunOptions } from './coordinator';
export { ReviewService } from './reviewService';
export type { ReviewServiceDeps, ReviewSummary } from './reviewService';
