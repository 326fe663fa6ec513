/**
 * @fileoverview Review report and option types.
 *
 * @module review/types
 */

import type { FailureReason, PlanSpec, StepStatus } from '../plan/types';
import type { Finding, FindingCategory, Fix, Severity } from '../types';

/**
 * Overall outcome of a review.
 *
 * - `completed`: every step completed
 * - `partial`: at least one step failed, at least one completed
 * - `failed`: every step failed
 */
export type ReviewStatus = 'completed' | 'partial' | 'failed';

export interface ReviewMetrics {
  totalFindings: number;
  bySeverity: Record<Severity, number>;
  byCategory: Record<FindingCategory, number>;
  duplicatesRemoved: number;
  rejectedFixes: number;
  verifiedFixes: number;
  unverifiedFixes: number;
  stepsCompleted: number;
  stepsFailed: number;
  /** Retries across all steps (attempts beyond the first). */
  retries: number;
  durationMs: number;
}

export interface StepReport {
  stepId: string;
  capabilityId: string;
  status: StepStatus;
  attempts: number;
  findingsCount: number;
  upstreamFailed: boolean;
  failureReason?: FailureReason;
  error?: string;
}

/**
 * A failure recorded in the report. Step failures carry the step and
 * capability they came from.
 */
export interface ReviewError {
  errorType: string;
  message: string;
  stepId?: string;
  capabilityId?: string;
}

export interface ReviewReport {
  reviewId: string;
  planId: string;
  status: ReviewStatus;
  summary: string;
  /** Sorted by severity, then file, then line. */
  findings: Finding[];
  fixes: Fix[];
  steps: StepReport[];
  metrics: ReviewMetrics;
  errors: ReviewError[];
  cancelled: boolean;
  startedAt: number;
  finishedAt: number;
}

/**
 * Per-review options.
 */
export interface ReviewOptions {
  /** Restrict the analyzers to these capability ids. */
  capabilities?: string[];
  /** Explicit plan instead of the generated one. */
  plan?: PlanSpec;
}

/** Lifecycle of a submitted review. */
export type ReviewState = 'queued' | 'running' | ReviewStatus | 'error';
