/**
 * @fileoverview Final report assembly.
 *
 * @module review/report
 */

import type { Finding, FindingCategory, Severity } from '../types';
import { SEVERITIES, severityRank } from '../types';
import type { ReviewMetrics, ReviewStatus, StepReport } from './types';

/**
 * Order findings by severity (critical first), then file, then start line.
 * Returns a new array.
 */
export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(
    (a, b) =>
      severityRank(a.severity) - severityRank(b.severity) ||
      a.location.file.localeCompare(b.location.file) ||
      a.location.lineStart - b.location.lineStart,
  );
}

export function countBySeverity(findings: readonly Finding[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
  for (const f of findings) counts[f.severity]++;
  return counts;
}

export function countByCategory(findings: readonly Finding[]): Record<FindingCategory, number> {
  const counts: Record<FindingCategory, number> = { security: 0, bug: 0, style: 0, performance: 0 };
  for (const f of findings) counts[f.category]++;
  return counts;
}

export interface MetricsInput {
  findings: readonly Finding[];
  steps: readonly StepReport[];
  duplicatesRemoved: number;
  rejectedFixes: number;
  verifiedFixes: number;
  unverifiedFixes: number;
  retries: number;
  durationMs: number;
}

export function buildMetrics(input: MetricsInput): ReviewMetrics {
  return {
    totalFindings: input.findings.length,
    bySeverity: countBySeverity(input.findings),
    byCategory: countByCategory(input.findings),
    duplicatesRemoved: input.duplicatesRemoved,
    rejectedFixes: input.rejectedFixes,
    verifiedFixes: input.verifiedFixes,
    unverifiedFixes: input.unverifiedFixes,
    stepsCompleted: input.steps.filter((s) => s.status === 'completed').length,
    stepsFailed: input.steps.filter((s) => s.status === 'failed').length,
    retries: input.retries,
    durationMs: input.durationMs,
  };
}

/**
 * One-line human summary, e.g.
 * `2 finding(s) (critical: 1, low: 1); 3 of 3 step(s) completed`.
 */
export function summarize(status: ReviewStatus, metrics: ReviewMetrics, cancelled: boolean): string {
  const total = metrics.stepsCompleted + metrics.stepsFailed;
  const steps = `${metrics.stepsCompleted} of ${total} step(s) completed`;
  if (status === 'failed') {
    return cancelled ? `Review cancelled; ${steps}` : `All capabilities failed; ${steps}`;
  }

  const breakdown = SEVERITIES.filter((s) => metrics.bySeverity[s] > 0)
    .map((s) => `${s}: ${metrics.bySeverity[s]}`)
    .join(', ');
  const findings = breakdown
    ? `${metrics.totalFindings} finding(s) (${breakdown})`
    : 'No findings';
  return `${findings}; ${steps}${cancelled ? ' (cancelled)' : ''}`;
}
