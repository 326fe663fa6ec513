/**
 * @fileoverview Review domain model shared by capabilities, events and reports.
 *
 * @module types/review
 */

// ============================================================================
// SEVERITY & CATEGORY
// ============================================================================

/**
 * Finding severity, most severe first.
 */
export type Severity = 'critical' | 'high' | 'medium' | 'low' | 'info';

/** Severities ordered from most to least severe. */
export const SEVERITIES: readonly Severity[] = ['critical', 'high', 'medium', 'low', 'info'];

/**
 * Rank of a severity; lower is more severe.
 */
export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export type FindingCategory = 'security' | 'bug' | 'style' | 'performance';

export const FINDING_CATEGORIES: readonly FindingCategory[] = ['security', 'bug', 'style', 'performance'];

// ============================================================================
// FINDING
// ============================================================================

export interface CodeLocation {
  file: string;
  lineStart: number;
  lineEnd: number;
  codeSnippet: string;
}

/**
 * One issue reported by an analyzer.
 *
 * `findingId` is assigned once at discovery and reused verbatim by every
 * later event, fix and report entry.
 */
export interface Finding {
  findingId: string;
  stepId: string;
  agentId: string;
  category: FindingCategory;
  /** Issue type, e.g. `sql_injection`. */
  findingType: string;
  severity: Severity;
  title: string;
  description: string;
  location: CodeLocation;
  /** In [0, 1]. */
  confidence: number;
  ruleId?: string;
  /** Ids of duplicates folded into this finding during consolidation. */
  mergedFindingIds?: string[];
}

// ============================================================================
// FIX
// ============================================================================

export type VerificationStatus = 'pending' | 'verified' | 'unverified';

/**
 * A proposed change for one finding.
 */
export interface Fix {
  fixId: string;
  findingId: string;
  agentId: string;
  originalCode: string;
  proposedCode: string;
  explanation: string;
  confidence: number;
  verificationStatus: VerificationStatus;
}

/**
 * Outcome of re-checking a pending fix.
 */
export interface FixVerification {
  fixId: string;
  status: 'verified' | 'unverified';
  notes: string;
}

// ============================================================================
// INPUT
// ============================================================================

/**
 * Code submitted for review.
 */
export interface ReviewInput {
  code: string;
  filename: string;
  language?: string;
}
